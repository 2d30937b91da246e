import { PassThrough } from 'stream';
import chalk from 'chalk';
import { ConsoleHost, BufferedHost } from '../src/runtime/host';
import { TerminalTraceReporter } from '../src/runtime/trace';

describe('ConsoleHost', () => {
  function streams() {
    const input = new PassThrough();
    const output = new PassThrough();
    let written = '';
    output.on('data', chunk => { written += String(chunk); });
    return { input, output, written: () => written };
  }

  const tick = () => new Promise(resolve => setImmediate(resolve));

  it('should print lines with a line break', async () => {
    const { input, output, written } = streams();
    const host = new ConsoleHost(input, output);
    host.print('hello');
    host.print('');
    await tick();
    expect(written()).toBe('hello\n\n');
  });

  it('should show the prompt and read one line per ask', async () => {
    const { input, output, written } = streams();
    const host = new ConsoleHost(input, output);
    input.end('Ada\nLin\n');

    expect(await host.ask('First? ')).toBe('Ada');
    expect(await host.ask('Second? ')).toBe('Lin');
    expect(await host.ask('Third? ')).toBeNull();
    await tick();
    expect(written()).toBe('First? Second? Third? ');
    host.close();
  });

  it('should close safely when nothing was read', () => {
    const { input, output } = streams();
    expect(() => new ConsoleHost(input, output).close()).not.toThrow();
  });
});

describe('BufferedHost', () => {
  it('should replay inputs in order and then report end of input', async () => {
    const host = new BufferedHost(['one', 'two']);
    expect(await host.ask('a')).toBe('one');
    expect(await host.ask('b')).toBe('two');
    expect(await host.ask('c')).toBeNull();
    expect(host.prompts).toEqual(['a', 'b', 'c']);
  });
});

describe('TerminalTraceReporter', () => {
  it('should write plain lines when colour is off', () => {
    const lines: string[] = [];
    const reporter = new TerminalTraceReporter(text => lines.push(text), new chalk.Instance({ level: 0 }));
    reporter.event('line 1: Display');
    reporter.succeed('done');
    reporter.fail('stopped');
    expect(lines).toEqual(['  [trace] line 1: Display\n', '  ✔ done\n', '  ✖ stopped\n']);
  });

  it('should colour lines when colour is on', () => {
    const lines: string[] = [];
    const reporter = new TerminalTraceReporter(text => lines.push(text), new chalk.Instance({ level: 1 }));
    reporter.fail('stopped');
    expect(lines).toEqual(['\u001b[31m  ✖ stopped\u001b[39m\n']);
  });
});
