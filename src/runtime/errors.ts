export interface Position {
  line: number;
  column: number;
}

export type CorvoErrorType =
  | 'SyntaxError'
  | 'UndefinedVariableError'
  | 'UndefinedSectionError'
  | 'TypeMismatchError'
  | 'InvalidIndexError'
  | 'InvalidArgumentError'
  | 'FileNotFoundError'
  | 'FileAccessError'
  | 'MalformedCsvError'
  | 'LoopLimitError'
  | 'RecursionLimitError';

/**
 * Every failure the engine reports to a program's author. Errors abort the
 * whole run; the language has no construct that catches them.
 */
export class CorvoError extends Error {
  constructor(
    public errorType: CorvoErrorType,
    public description: string,
    public position?: Position,
  ) {
    super(
      position
        ? `${errorType}: ${description} (line ${position.line}, column ${position.column})`
        : `${errorType}: ${description}`,
    );
    this.name = 'CorvoError';
  }
}

export function isCorvoError(error: unknown): error is CorvoError {
  return error instanceof CorvoError;
}
