/**
 * Plain comma-separated text: one row per line, cells split on every comma.
 * There is no quoting, so a cell can never contain a comma or a line break.
 */

import { CorvoError } from './errors';

export function parseCsv(text: string): string[][] {
  // Spreadsheet exports often start with a byte order mark
  let body = text.replace(/^\uFEFF/, '');
  if (body.endsWith('\r\n')) {
    body = body.slice(0, -2);
  } else if (body.endsWith('\n')) {
    body = body.slice(0, -1);
  }
  if (body === '') return [];

  const rows = body.split(/\r?\n/).map(line => line.split(','));
  const width = rows[0].length;
  for (let i = 1; i < rows.length; i++) {
    if (rows[i].length !== width) {
      throw new CorvoError(
        'MalformedCsvError',
        `Line ${i + 1} has ${rows[i].length} cells but line 1 has ${width}`,
      );
    }
  }
  return rows;
}

export function serializeCsv(rows: string[][]): string {
  let out = '';
  rows.forEach((row, r) => {
    row.forEach((cell, c) => {
      if (/[,\r\n]/.test(cell)) {
        throw new CorvoError(
          'MalformedCsvError',
          `Cell at row ${r + 1}, column ${c + 1} contains a comma or line break and cannot be written: ${JSON.stringify(cell)}`,
        );
      }
    });
    out += row.join(',') + '\n';
  });
  return out;
}
