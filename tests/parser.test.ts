import { Lexer } from '../src/lexer/lexer';
import { Parser } from '../src/parser/parser';
import * as AST from '../src/parser/ast';
import { CorvoError } from '../src/runtime/errors';

describe('Parser', () => {
  function parse(source: string): AST.Program {
    const tokens = new Lexer(source).tokenize();
    return new Parser().parse(tokens);
  }

  function firstStatement(source: string): AST.Statement {
    return parse(source).body[0];
  }

  /** Drop positions so trees can be compared by shape. */
  function shape(value: unknown): unknown {
    if (Array.isArray(value)) return value.map(shape);
    if (typeof value === 'object' && value !== null) {
      const out: Record<string, unknown> = {};
      for (const [key, inner] of Object.entries(value)) {
        if (key !== 'position') out[key] = shape(inner);
      }
      return out;
    }
    return value;
  }

  function syntaxError(source: string): CorvoError {
    try {
      parse(source);
    } catch (error) {
      if (error instanceof CorvoError) return error;
      throw error;
    }
    throw new Error('expected a syntax error');
  }

  describe('assignment and display', () => {
    it('should parse an assignment', () => {
      expect(shape(firstStatement('the price is 4.5'))).toEqual({
        type: 'Assign',
        name: 'price',
        value: { type: 'Literal', value: { kind: 'number', value: 4.5 } },
      });
    });

    it('should parse display of a variable', () => {
      expect(shape(firstStatement('display price'))).toEqual({
        type: 'Display',
        value: { type: 'VarRef', name: 'price' },
      });
    });

    it('should parse several statements on one line', () => {
      const program = parse('the a is 1 the b is 2 display a');
      expect(program.body.map(s => s.type)).toEqual(['Assign', 'Assign', 'Display']);
    });

    it('should record statement positions', () => {
      const program = parse('the a is 1\n\n  display a');
      expect(program.body[1].position).toEqual({ line: 3, column: 3 });
    });

    it('should parse ask ... remember as', () => {
      expect(shape(firstStatement('ask "Name? " remember as name'))).toEqual({
        type: 'Ask',
        prompt: { type: 'Literal', value: { kind: 'string', value: 'Name? ' } },
        target: 'name',
      });
    });
  });

  describe('expressions', () => {
    it('should give times precedence over plus', () => {
      const stmt = firstStatement('display 1 plus 2 times 3');
      expect(shape(stmt)).toEqual({
        type: 'Display',
        value: {
          type: 'BinaryOp',
          operator: 'plus',
          left: { type: 'Literal', value: { kind: 'number', value: 1 } },
          right: {
            type: 'BinaryOp',
            operator: 'times',
            left: { type: 'Literal', value: { kind: 'number', value: 2 } },
            right: { type: 'Literal', value: { kind: 'number', value: 3 } },
          },
        },
      });
    });

    it('should associate minus to the left', () => {
      const stmt = firstStatement('display 10 minus 3 minus 2');
      expect(shape(stmt)).toEqual({
        type: 'Display',
        value: {
          type: 'BinaryOp',
          operator: 'minus',
          left: {
            type: 'BinaryOp',
            operator: 'minus',
            left: { type: 'Literal', value: { kind: 'number', value: 10 } },
            right: { type: 'Literal', value: { kind: 'number', value: 3 } },
          },
          right: { type: 'Literal', value: { kind: 'number', value: 2 } },
        },
      });
    });

    it('should parse divided by', () => {
      const stmt = firstStatement('the half is total divided by 2');
      expect(stmt.type === 'Assign' && stmt.value.type === 'BinaryOp' && stmt.value.operator).toBe('divide');
    });

    it('should parse list literals', () => {
      expect(shape(firstStatement('the xs is [1, "two", []]'))).toEqual({
        type: 'Assign',
        name: 'xs',
        value: {
          type: 'ListLiteral',
          elements: [
            { type: 'Literal', value: { kind: 'number', value: 1 } },
            { type: 'Literal', value: { kind: 'string', value: 'two' } },
            { type: 'ListLiteral', elements: [] },
          ],
        },
      });
    });

    it('should parse at, count of and length of', () => {
      expect(shape(firstStatement('display count of xs plus length of xs at 2'))).toEqual({
        type: 'Display',
        value: {
          type: 'BinaryOp',
          operator: 'plus',
          left: { type: 'ListCount', list: { type: 'VarRef', name: 'xs' } },
          right: {
            type: 'LengthOf',
            value: {
              type: 'IndexAccess',
              list: { type: 'VarRef', name: 'xs' },
              index: { type: 'Literal', value: { kind: 'number', value: 2 } },
            },
          },
        },
      });
    });

    it('should parse get column and get row ... column', () => {
      expect(shape(firstStatement('display get column 2 from data'))).toEqual({
        type: 'Display',
        value: {
          type: 'ColumnAccess',
          table: { type: 'VarRef', name: 'data' },
          index: { type: 'Literal', value: { kind: 'number', value: 2 } },
        },
      });
      expect(shape(firstStatement('display get row 1 column 3 from data'))).toEqual({
        type: 'Display',
        value: {
          type: 'CellAccess',
          table: { type: 'VarRef', name: 'data' },
          row: { type: 'Literal', value: { kind: 'number', value: 1 } },
          column: { type: 'Literal', value: { kind: 'number', value: 3 } },
        },
      });
    });

    it('should apply at to the result of get column', () => {
      const stmt = firstStatement('display get column 2 from data at 1');
      expect(stmt.type === 'Display' && stmt.value.type).toBe('IndexAccess');
    });
  });

  describe('conditions', () => {
    it('should parse the three comparisons', () => {
      const ops = ['is equal to', 'is greater than', 'is less than'].map(op => {
        const stmt = firstStatement(`if x ${op} 1 then display x`);
        return stmt.type === 'If' && stmt.condition.type === 'BinaryOp' ? stmt.condition.operator : null;
      });
      expect(ops).toEqual(['is-equal', 'is-greater-than', 'is-less-than']);
    });

    it('should bind and tighter than or', () => {
      const stmt = firstStatement('if a is equal to 1 or b is equal to 2 and c is equal to 3 then display a');
      if (stmt.type !== 'If' || stmt.condition.type !== 'BinaryOp') throw new Error('expected an if');
      expect(stmt.condition.operator).toBe('or');
      expect(stmt.condition.right.type === 'BinaryOp' && stmt.condition.right.operator).toBe('and');
    });

    it('should reject a condition without a comparison', () => {
      expect(syntaxError('if x then display x').description)
        .toBe("Expected 'is' but found 'then'");
    });

    it('should reject an unknown comparison word', () => {
      expect(syntaxError('if x is 3 then display x').description)
        .toBe("Expected 'equal to', 'greater than' or 'less than' after 'is' but found the number 3");
    });
  });

  describe('blocks and control flow', () => {
    it('should parse if with otherwise', () => {
      const stmt = firstStatement('if x is greater than 1 then [ display "big" ] otherwise [ display "small" ]');
      if (stmt.type !== 'If') throw new Error('expected an if');
      expect(stmt.thenBody.map(s => s.type)).toEqual(['Display']);
      expect(stmt.elseBody?.map(s => s.type)).toEqual(['Display']);
    });

    it('should leave elseBody undefined without otherwise', () => {
      const stmt = firstStatement('if x is less than 1 then display x');
      expect(stmt.type === 'If' && stmt.elseBody).toBeUndefined();
    });

    it('should produce the same tree for single-line and block bodies', () => {
      const single = shape(firstStatement('repeat 3 loops display "x"'));
      const block = shape(firstStatement('repeat 3 loops : [ display "x" ]'));
      const bare = shape(firstStatement('repeat 3 loops [\n  display "x"\n]'));
      expect(block).toEqual(single);
      expect(bare).toEqual(single);
    });

    it('should parse while ... do', () => {
      const stmt = firstStatement('while n is less than 3 do [ the n is n plus 1 ]');
      expect(stmt.type === 'While' && stmt.body.length).toBe(1);
    });

    it('should parse for each over a list literal', () => {
      expect(shape(firstStatement('for each item in [1, 2] : [ display item ]'))).toEqual({
        type: 'ForEach',
        variable: 'item',
        iterable: {
          type: 'ListLiteral',
          elements: [
            { type: 'Literal', value: { kind: 'number', value: 1 } },
            { type: 'Literal', value: { kind: 'number', value: 2 } },
          ],
        },
        body: [{ type: 'Display', value: { type: 'VarRef', name: 'item' } }],
      });
    });

    it('should parse nested blocks', () => {
      const stmt = firstStatement('repeat 2 loops [ if x is equal to 1 then [ display x ] ]');
      if (stmt.type !== 'Repeat') throw new Error('expected a repeat');
      const inner = stmt.body[0];
      expect(inner.type === 'If' && inner.thenBody.length).toBe(1);
    });

    it('should parse section definitions and calls', () => {
      const program = parse('section greet is: [ display "hi" ]\ngreet');
      expect(shape(program.body)).toEqual([
        {
          type: 'SectionDef',
          name: 'greet',
          body: [{ type: 'Display', value: { type: 'Literal', value: { kind: 'string', value: 'hi' } } }],
        },
        { type: 'SectionCall', name: 'greet' },
      ]);
    });

    it('should accept an empty block', () => {
      const stmt = firstStatement('section nothing is [ ]');
      expect(stmt.type === 'SectionDef' && stmt.body).toEqual([]);
    });
  });

  describe('lists, files and CSV statements', () => {
    it('should parse append and remove', () => {
      expect(parse('append 4 to xs remove 2 from xs').body.map(s => s.type))
        .toEqual(['ListAppend', 'ListRemove']);
    });

    it('should tell text writes from CSV writes', () => {
      const program = parse('write "hi" to "out.txt"\nwrite data to csv "out.csv"');
      expect(program.body.map(s => s.type)).toEqual(['FileWrite', 'CsvWrite']);
    });

    it('should tell text reads from CSV reads', () => {
      const program = parse('read from "a.txt" remember as text\nread csv "a.csv" remember as data');
      expect(shape(program.body)).toEqual([
        { type: 'FileRead', path: { type: 'Literal', value: { kind: 'string', value: 'a.txt' } }, target: 'text' },
        { type: 'CsvRead', path: { type: 'Literal', value: { kind: 'string', value: 'a.csv' } }, target: 'data' },
      ]);
    });

    it('should parse set ... row ... column ... to', () => {
      expect(shape(firstStatement('set data row 2 column 3 to "Updated"'))).toEqual({
        type: 'CsvSetCell',
        table: { type: 'VarRef', name: 'data' },
        row: { type: 'Literal', value: { kind: 'number', value: 2 } },
        column: { type: 'Literal', value: { kind: 'number', value: 3 } },
        value: { type: 'Literal', value: { kind: 'string', value: 'Updated' } },
      });
    });
  });

  describe('syntax errors', () => {
    it('should report an unclosed block at its opening bracket', () => {
      const error = syntaxError('repeat 2 loops [\n  display 1\n');
      expect(error.description).toBe("Unmatched '[': block is never closed");
      expect(error.position).toEqual({ line: 1, column: 16 });
    });

    it('should reject a number literal that overflows', () => {
      const error = syntaxError(`the big is 9${'9'.repeat(320)}`);
      expect(error.description).toBe('Number is too large to represent');
      expect(error.position).toEqual({ line: 1, column: 12 });
    });

    it('should report a stray closing bracket', () => {
      expect(syntaxError('display 1 ]').description).toBe("Unmatched ']'");
    });

    it('should report an unclosed list', () => {
      expect(syntaxError('the xs is [1, 2').description).toBe("Unmatched '[': list is never closed");
    });

    it('should name a reserved word used as a variable', () => {
      expect(syntaxError('the count is 3').description).toBe("Expected a name but found the reserved word 'count'");
    });

    it('should report a statement that cannot start', () => {
      expect(syntaxError('42').description).toBe('Expected a statement but found the number 42');
    });

    it('should report a missing remember as', () => {
      expect(syntaxError('ask "Name?"').description).toBe("Expected 'remember' but found end of input");
    });

    it('should reject read without from or csv', () => {
      expect(syntaxError('read "a.txt" remember as t').description)
        .toBe("Expected 'from' or 'csv' after 'read' but found the string \"a.txt\"");
    });
  });
});
