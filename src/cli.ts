#!/usr/bin/env node

import * as fs from 'fs';
import * as path from 'path';
import chalk from 'chalk';
import { Lexer } from './lexer/lexer';
import { Parser } from './parser/parser';
import { Interpreter } from './runtime/interpreter';
import { CorvoHost, ConsoleHost } from './runtime/host';
import { CorvoConfig, loadConfig, loadConfigForScript } from './runtime/config';
import { formatError } from './runtime/report';
import { TerminalTraceReporter } from './runtime/trace';

const USAGE = `
corvo - The Corvo Language Runtime v0.1.0

Usage:
  corvo <file.corvo>          Run a Corvo program
  corvo --parse <file.corvo>  Parse and print the syntax tree
  corvo --lex <file.corvo>    Tokenize and print tokens
  corvo --help                Show this help message

Options:
  --trace                     Print each executed statement to stderr
  --while-limit <n>           Stop any while loop after n iterations
  --config <path>             Path to corvo.config.json (auto-detected by default)

Configuration:
  A corvo.config.json (or .corvorc.json) beside the program or in the current
  directory may set "whileLimit", "trace", "encoding" and "workingDir".
  See corvo.config.example.json for the format.

Examples:
  corvo examples/hello.corvo
  corvo --trace examples/grades.corvo
  corvo --while-limit 1000 examples/countdown.corvo
`;

/** Output streams and console host used by one CLI invocation. */
export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  /** Host for `display` and `ask`. Defaults to the process console. */
  host?: CorvoHost;
  /** Colour the error header and trace output. */
  color?: boolean;
}

const FLAGS_WITH_VALUES = new Set(['--config', '--while-limit']);

function getArg(args: string[], flag: string): string | undefined {
  const idx = args.indexOf(flag);
  if (idx !== -1 && idx + 1 < args.length) {
    return args[idx + 1];
  }
  return undefined;
}

function parseWhileLimit(raw: string): number | undefined {
  const n = Number(raw);
  return /^\d+$/.test(raw) && n >= 1 ? n : undefined;
}

/**
 * Run the CLI with the given arguments and return the process exit code.
 */
export async function runCli(args: string[], io: CliIO): Promise<number> {
  const paint = new chalk.Instance({ level: io.color ? 1 : 0 });
  const println = (text: string) => io.stdout(text + '\n');
  const eprintln = (text: string) => io.stderr(text + '\n');

  if (args.length === 0 || args.includes('--help') || args.includes('-h')) {
    println(USAGE);
    return 0;
  }

  const flags = new Set(args.filter(a => a.startsWith('--')));
  // Files are args that don't start with -- and aren't values for flags
  const files: string[] = [];
  for (let i = 0; i < args.length; i++) {
    if (args[i].startsWith('--')) {
      if (FLAGS_WITH_VALUES.has(args[i])) i++;
      continue;
    }
    files.push(args[i]);
  }

  if (files.length === 0) {
    eprintln('Error: No input file specified.');
    eprintln(USAGE);
    return 1;
  }

  let whileLimit: number | undefined;
  if (flags.has('--while-limit')) {
    const raw = getArg(args, '--while-limit');
    whileLimit = raw === undefined ? undefined : parseWhileLimit(raw);
    if (whileLimit === undefined) {
      eprintln('Error: --while-limit needs a positive whole number.');
      return 1;
    }
  }

  const filePath = path.resolve(files[0]);
  if (!fs.existsSync(filePath)) {
    eprintln(`Error: File not found: ${filePath}`);
    return 1;
  }

  const source = fs.readFileSync(filePath, 'utf-8');
  const fileName = path.basename(filePath);
  const report = (error: unknown) => {
    const [header, ...rest] = formatError(error, source, fileName).split('\n');
    eprintln([paint.red.bold(header), ...rest].join('\n'));
  };

  // Lex-only mode
  if (flags.has('--lex')) {
    try {
      const tokens = new Lexer(source).tokenize();
      for (const tok of tokens) {
        const val = tok.value ? ` ${JSON.stringify(tok.value)}` : '';
        println(`${tok.line}:${tok.column}\t${tok.type}${val}`);
      }
    } catch (error) {
      report(error);
      return 1;
    }
    return 0;
  }

  // Parse-only mode
  if (flags.has('--parse')) {
    try {
      const ast = new Parser().parse(new Lexer(source).tokenize());
      println(JSON.stringify(ast, null, 2));
    } catch (error) {
      report(error);
      return 1;
    }
    return 0;
  }

  let config: CorvoConfig;
  try {
    const explicit = getArg(args, '--config');
    config = explicit ? loadConfig(explicit) : loadConfigForScript(filePath);
  } catch (error) {
    eprintln(`Error: ${error instanceof Error ? error.message : String(error)}`);
    return 1;
  }

  const traceEnabled = flags.has('--trace') || config.trace === true;
  const reporter = new TerminalTraceReporter(io.stderr, paint);
  let interpreter: Interpreter | undefined;

  try {
    const ast = new Parser().parse(new Lexer(source).tokenize());
    interpreter = new Interpreter({
      host: io.host ?? new ConsoleHost(),
      trace: traceEnabled,
      reporter,
      workingDir: config.workingDir ?? process.cwd(),
      whileLimit: whileLimit ?? config.whileLimit,
      encoding: config.encoding,
    });
    await interpreter.run(ast);
    if (traceEnabled) {
      reporter.succeed(`${fileName} finished`);
    }
    return 0;
  } catch (error) {
    if (traceEnabled) {
      reporter.fail(`${fileName} stopped`);
    }
    report(error);
    return 1;
  } finally {
    interpreter?.shutdown();
  }
}

async function main(): Promise<void> {
  process.exitCode = await runCli(process.argv.slice(2), {
    stdout: text => process.stdout.write(text),
    stderr: text => process.stderr.write(text),
    color: process.stderr.isTTY === true,
  });
}

if (require.main === module) {
  main().catch(error => {
    console.error(`Fatal: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
  });
}
