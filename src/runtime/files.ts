import * as fs from 'fs';
import { CorvoError } from './errors';

export type TextEncoding = 'utf-8' | 'utf8' | 'latin1' | 'ascii';

export const TEXT_ENCODINGS: readonly TextEncoding[] = ['utf-8', 'utf8', 'latin1', 'ascii'];

function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function toCorvoError(error: unknown, filePath: string, action: 'read' | 'write'): CorvoError {
  const code = errnoCode(error);
  if (code === 'ENOENT') {
    return new CorvoError(
      'FileNotFoundError',
      action === 'read'
        ? `File not found: ${filePath}`
        : `Cannot write ${filePath}: its directory does not exist`,
    );
  }
  const reason = error instanceof Error ? error.message : String(error);
  return new CorvoError('FileAccessError', `Cannot ${action} ${filePath}: ${reason}`);
}

/** Read a whole file as text. */
export async function readTextFile(filePath: string, encoding: TextEncoding): Promise<string> {
  try {
    return await fs.promises.readFile(filePath, { encoding });
  } catch (error) {
    throw toCorvoError(error, filePath, 'read');
  }
}

/** Create or truncate a file and write the full text. */
export async function writeTextFile(filePath: string, content: string, encoding: TextEncoding): Promise<void> {
  try {
    await fs.promises.writeFile(filePath, content, { encoding, flag: 'w' });
  } catch (error) {
    throw toCorvoError(error, filePath, 'write');
  }
}
