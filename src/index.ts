export { Lexer } from './lexer/lexer';
export { Token, TokenType } from './lexer/tokens';
export { Parser } from './parser/parser';
export * as AST from './parser/ast';
export { Interpreter, InterpreterOptions } from './runtime/interpreter';
export { Environment } from './runtime/environment';
export { CorvoError, CorvoErrorType, Position, isCorvoError } from './runtime/errors';
export {
  CorvoValue,
  CorvoNumber,
  CorvoString,
  CorvoList,
  CorvoTable,
  CorvoNone,
  corvoNumber,
  corvoString,
  corvoList,
  corvoTable,
  corvoNone,
  kindName,
  displayText,
  describeValue,
  valuesEqual,
} from './runtime/values';
export { CorvoHost, ConsoleHost, BufferedHost } from './runtime/host';
export { TraceReporter, TerminalTraceReporter, SilentTraceReporter } from './runtime/trace';
export { CorvoConfig, loadConfig, loadConfigForScript } from './runtime/config';
export { TextEncoding } from './runtime/files';
export { parseCsv, serializeCsv } from './runtime/csv';
export { formatError } from './runtime/report';

import { Lexer } from './lexer/lexer';
import { Parser } from './parser/parser';
import { Interpreter, InterpreterOptions } from './runtime/interpreter';
import { ConsoleHost } from './runtime/host';

/**
 * Parse a Corvo source string into an AST.
 */
export function parse(source: string) {
  const lexer = new Lexer(source);
  const tokens = lexer.tokenize();
  const parser = new Parser();
  return parser.parse(tokens);
}

/**
 * Execute a Corvo source string. Output goes to stdout unless a host is given.
 * Resolves with the interpreter so callers can inspect variables afterwards.
 */
export async function execute(
  source: string,
  options: Partial<InterpreterOptions> = {},
): Promise<Interpreter> {
  const ast = parse(source);
  const interpreter = new Interpreter({ ...options, host: options.host ?? new ConsoleHost() });
  try {
    await interpreter.run(ast);
  } finally {
    interpreter.shutdown();
  }
  return interpreter;
}
