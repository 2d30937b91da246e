/**
 * Error reports for people.
 *
 * Output format:
 * ```
 * TypeMismatchError: 'minus' needs two Numbers but got a String and a Number
 *   --> prices.corvo:3:18
 *    |
 *  3 | the total is "a" minus 1
 *    |                  ^
 * ```
 */

import { isCorvoError } from './errors';

export function formatError(error: unknown, source?: string, fileName?: string): string {
  if (!isCorvoError(error)) {
    const message = error instanceof Error ? error.message : String(error);
    return `InternalError: ${message}`;
  }

  const lines = [`${error.errorType}: ${error.description}`];
  const position = error.position;
  if (!position) return lines.join('\n');

  const location = `${position.line}:${position.column}`;
  lines.push(`  --> ${fileName ? `${fileName}:${location}` : location}`);

  const sourceLine = source?.split(/\r?\n/)[position.line - 1];
  if (sourceLine === undefined) return lines.join('\n');

  const gutter = ' '.repeat(String(position.line).length);
  // Keep tabs so the caret lines up under tab-indented code
  const pad = sourceLine.slice(0, position.column - 1).replace(/[^\t]/g, ' ');
  lines.push(` ${gutter} |`);
  lines.push(` ${position.line} | ${sourceLine}`);
  lines.push(` ${gutter} | ${pad}^`);
  return lines.join('\n');
}
