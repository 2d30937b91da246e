import { parseCsv, serializeCsv } from '../src/runtime/csv';
import { CorvoError } from '../src/runtime/errors';

describe('CSV codec', () => {
  describe('parseCsv()', () => {
    it('should split rows on line breaks and cells on commas', () => {
      expect(parseCsv('name,score\nAda,90\nLin,85\n')).toEqual([
        ['name', 'score'],
        ['Ada', '90'],
        ['Lin', '85'],
      ]);
    });

    it('should accept a file without a final line break', () => {
      expect(parseCsv('a,b\nc,d')).toEqual([['a', 'b'], ['c', 'd']]);
    });

    it('should accept CRLF line endings', () => {
      expect(parseCsv('a,b\r\nc,d\r\n')).toEqual([['a', 'b'], ['c', 'd']]);
    });

    it('should keep spaces and empty cells as written', () => {
      expect(parseCsv(' a ,,c\n')).toEqual([[' a ', '', 'c']]);
    });

    it('should not treat quotes specially', () => {
      expect(parseCsv('"x",y\n')).toEqual([['"x"', 'y']]);
    });

    it('should drop a leading byte order mark', () => {
      expect(parseCsv('\uFEFFName,Score\nAda,90\n')).toEqual([['Name', 'Score'], ['Ada', '90']]);
    });

    it('should read an empty file as an empty table', () => {
      expect(parseCsv('')).toEqual([]);
      expect(parseCsv('\n')).toEqual([]);
    });

    it('should reject rows of different widths', () => {
      expect(() => parseCsv('a,b\nc\n')).toThrow(CorvoError);
      try {
        parseCsv('a,b\nc,d\ne,f,g\n');
      } catch (error) {
        expect(error instanceof CorvoError && error.errorType).toBe('MalformedCsvError');
        expect(error instanceof CorvoError && error.description).toBe('Line 3 has 3 cells but line 1 has 2');
      }
    });

    it('should treat a blank line inside the file as a one-cell row', () => {
      expect(() => parseCsv('a,b\n\nc,d\n')).toThrow('Line 2 has 1 cells but line 1 has 2');
    });
  });

  describe('serializeCsv()', () => {
    it('should join cells with commas and end every row with a line break', () => {
      expect(serializeCsv([['name', 'score'], ['Ada', '90']])).toBe('name,score\nAda,90\n');
    });

    it('should write an empty table as an empty file', () => {
      expect(serializeCsv([])).toBe('');
    });

    it('should reject a cell containing a comma', () => {
      expect(() => serializeCsv([['a', 'b'], ['c', 'd,e']])).toThrow(
        'MalformedCsvError: Cell at row 2, column 2 contains a comma or line break and cannot be written: "d,e"',
      );
    });

    it('should reject a cell containing a line break', () => {
      expect(() => serializeCsv([['one\ntwo']])).toThrow('Cell at row 1, column 1');
    });

    it('should read back exactly what it wrote', () => {
      const rows = [['id', 'city', 'note'], ['1', 'Oslo', ''], ['2', 'São Paulo', ' spaced ']];
      expect(parseCsv(serializeCsv(rows))).toEqual(rows);
    });
  });
});
