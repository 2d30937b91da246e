import * as readline from 'readline';

/**
 * Console boundary of a running program: `display` prints through it and
 * `ask` reads from it.
 */
export interface CorvoHost {
  /** Write one line of output. The host adds the line break. */
  print(line: string): void;

  /**
   * Show a prompt and wait for one line of input.
   * @returns the line without its terminator, or null at end of input
   */
  ask(prompt: string): Promise<string | null>;

  /** Release any input stream the host holds open. */
  close?(): void;
}

/**
 * Host bound to standard output and standard input.
 */
export class ConsoleHost implements CorvoHost {
  private rl: readline.Interface | null = null;
  private lines: AsyncIterableIterator<string> | null = null;

  constructor(
    private input: NodeJS.ReadableStream = process.stdin,
    private output: NodeJS.WritableStream = process.stdout,
  ) {}

  print(line: string): void {
    this.output.write(line + '\n');
  }

  async ask(prompt: string): Promise<string | null> {
    this.output.write(prompt);
    if (!this.lines) {
      // Opened lazily so programs without `ask` never hold stdin open
      this.rl = readline.createInterface({ input: this.input, terminal: false });
      this.lines = this.rl[Symbol.asyncIterator]();
    }
    const next = await this.lines.next();
    return next.done ? null : next.value;
  }

  close(): void {
    if (this.rl) {
      this.rl.close();
      this.rl = null;
      this.lines = null;
    }
  }
}

/**
 * Records output and replays scripted input lines.
 */
export class BufferedHost implements CorvoHost {
  readonly output: string[] = [];
  readonly prompts: string[] = [];
  private inputs: string[];

  constructor(inputs: string[] = []) {
    this.inputs = [...inputs];
  }

  print(line: string): void {
    this.output.push(line);
  }

  async ask(prompt: string): Promise<string | null> {
    this.prompts.push(prompt);
    return this.inputs.shift() ?? null;
  }
}
