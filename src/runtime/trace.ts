/**
 * Execution trace output for `--trace`.
 *
 * Trace lines go to stderr so they don't mix with a program's own output.
 */

import chalk from 'chalk';

export interface TraceReporter {
  /** One executed statement or other runtime event. */
  event(message: string): void;
  /** The program ran to completion. */
  succeed(message: string): void;
  /** The program stopped on an error. */
  fail(message: string): void;
}

export class TerminalTraceReporter implements TraceReporter {
  constructor(
    private write: (text: string) => void = text => process.stderr.write(text),
    private paint: chalk.Chalk = chalk,
  ) {}

  event(message: string): void {
    this.write(this.paint.dim(`  [trace] ${message}`) + '\n');
  }

  succeed(message: string): void {
    this.write(this.paint.green(`  ✔ ${message}`) + '\n');
  }

  fail(message: string): void {
    this.write(this.paint.red(`  ✖ ${message}`) + '\n');
  }
}

/**
 * Silent reporter for tests and embedding.
 */
export class SilentTraceReporter implements TraceReporter {
  event(_message: string): void {}
  succeed(_message: string): void {}
  fail(_message: string): void {}
}
