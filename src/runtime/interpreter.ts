import * as path from 'path';
import * as AST from '../parser/ast';
import { Environment } from './environment';
import { CorvoError, Position } from './errors';
import {
  CorvoValue,
  CorvoList,
  CorvoTable,
  corvoNumber,
  corvoString,
  corvoList,
  corvoTable,
  containsList,
  displayText,
  describeValue,
  formatNumber,
  kindName,
  tableWidth,
  valuesEqual,
} from './values';
import { CorvoHost } from './host';
import { TraceReporter, SilentTraceReporter } from './trace';
import { TextEncoding, readTextFile, writeTextFile } from './files';
import { parseCsv, serializeCsv } from './csv';

/** Nested section calls beyond this depth abort the run. */
const MAX_SECTION_DEPTH = 1000;

export interface InterpreterOptions {
  host: CorvoHost;
  trace?: boolean;
  /** Receives trace events when tracing is on. */
  reporter?: TraceReporter;
  /** Directory relative file paths resolve against. Defaults to cwd. */
  workingDir?: string;
  /** Cap on `while` iterations; unbounded when omitted. */
  whileLimit?: number;
  encoding?: TextEncoding;
}

function arithmetic(operator: AST.ArithmeticOperator, left: number, right: number): number {
  switch (operator) {
    case 'plus': return left + right;
    case 'minus': return left - right;
    case 'times': return left * right;
    case 'divide': return left / right;
  }
}

function article(value: CorvoValue): string {
  const name = kindName(value);
  return /^[AEIOU]/.test(name) ? `an ${name}` : `a ${name}`;
}

export class Interpreter {
  private host: CorvoHost;
  private globalEnv: Environment;
  private traceEnabled: boolean;
  private traceLog: string[] = [];
  private reporter: TraceReporter;
  private workingDir: string;
  private whileLimit?: number;
  private encoding: TextEncoding;
  private sectionDepth = 0;
  private startTime = Date.now();

  constructor(options: InterpreterOptions) {
    this.host = options.host;
    this.globalEnv = new Environment();
    this.traceEnabled = options.trace ?? false;
    this.reporter = options.reporter ?? new SilentTraceReporter();
    this.workingDir = options.workingDir ?? process.cwd();
    this.whileLimit = options.whileLimit;
    this.encoding = options.encoding ?? 'utf-8';
  }

  async run(program: AST.Program): Promise<void> {
    this.startTime = Date.now();
    await this.executeBlock(program.body, this.globalEnv);
  }

  /** Release the host's input stream. */
  shutdown(): void {
    this.host.close?.();
  }

  /** Value of a top-level variable after (or during) a run. */
  getVariable(name: string): CorvoValue | undefined {
    return this.globalEnv.lookup(name);
  }

  /** All top-level variables. */
  getVariables(): Map<string, CorvoValue> {
    return this.globalEnv.snapshot();
  }

  getTrace(): string[] {
    return [...this.traceLog];
  }

  // ─── Statement Execution ───────────────────────────────

  async execute(node: AST.Statement, env: Environment): Promise<void> {
    if (this.traceEnabled) {
      this.trace(`line ${node.position.line}: ${node.type}`);
    }

    try {
      switch (node.type) {
        case 'Assign':
          env.assign(node.name, this.evaluate(node.value, env));
          return;
        case 'Display':
          this.host.print(displayText(this.evaluate(node.value, env)));
          return;
        case 'Ask':
          return await this.executeAsk(node, env);
        case 'If':
          return await this.executeIf(node, env);
        case 'While':
          return await this.executeWhile(node, env);
        case 'Repeat':
          return await this.executeRepeat(node, env);
        case 'ForEach':
          return await this.executeForEach(node, env);
        case 'SectionDef':
          env.defineSection(node.name, node.body);
          return;
        case 'SectionCall':
          return await this.executeSectionCall(node, env);
        case 'ListAppend':
          return this.executeListAppend(node, env);
        case 'ListRemove':
          return this.executeListRemove(node, env);
        case 'FileWrite':
          return await this.executeFileWrite(node, env);
        case 'FileRead':
          return await this.executeFileRead(node, env);
        case 'CsvRead':
          return await this.executeCsvRead(node, env);
        case 'CsvWrite':
          return await this.executeCsvWrite(node, env);
        case 'CsvSetCell':
          return this.executeCsvSetCell(node, env);
      }
    } catch (error) {
      throw this.locate(error, node.position);
    }
  }

  private async executeBlock(body: AST.Statement[], env: Environment): Promise<void> {
    for (const stmt of body) {
      await this.execute(stmt, env);
    }
  }

  private async executeAsk(node: AST.Ask, env: Environment): Promise<void> {
    const prompt = this.evaluate(node.prompt, env);
    if (prompt.kind !== 'string') {
      throw new CorvoError('TypeMismatchError', `'ask' needs a String prompt but got ${article(prompt)}`, node.prompt.position);
    }
    const answer = await this.host.ask(prompt.value);
    env.assign(node.target, corvoString((answer ?? '').trim()));
  }

  // ─── Control Flow ──────────────────────────────────────

  private async executeIf(node: AST.If, env: Environment): Promise<void> {
    if (this.evaluateCondition(node.condition, env)) {
      await this.executeBlock(node.thenBody, env);
    } else if (node.elseBody) {
      await this.executeBlock(node.elseBody, env);
    }
  }

  private async executeWhile(node: AST.While, env: Environment): Promise<void> {
    let iterations = 0;
    while (this.evaluateCondition(node.condition, env)) {
      if (this.whileLimit !== undefined && iterations >= this.whileLimit) {
        throw new CorvoError(
          'LoopLimitError',
          `While loop exceeded the configured limit of ${this.whileLimit} iterations`,
          node.position,
        );
      }
      await this.executeBlock(node.body, env);
      iterations++;
    }
  }

  private async executeRepeat(node: AST.Repeat, env: Environment): Promise<void> {
    const count = this.evaluate(node.count, env);
    if (count.kind !== 'number') {
      throw new CorvoError('TypeMismatchError', `'repeat' needs a Number count but got ${article(count)}`, node.count.position);
    }
    if (count.value < 0) {
      throw new CorvoError('InvalidArgumentError', `Invalid repeat count ${formatNumber(count.value)}: must not be negative`, node.count.position);
    }
    const times = Math.trunc(count.value);
    for (let i = 0; i < times; i++) {
      await this.executeBlock(node.body, env);
    }
  }

  private async executeForEach(node: AST.ForEach, env: Environment): Promise<void> {
    const iterable = this.evaluate(node.iterable, env);
    if (iterable.kind !== 'list') {
      throw new CorvoError('TypeMismatchError', `'for each' needs a List but got ${article(iterable)}`, node.iterable.position);
    }

    // Changes to the list inside the loop don't affect this iteration
    const snapshot = [...iterable.elements];
    const loopEnv = env.child();
    for (const element of snapshot) {
      loopEnv.define(node.variable, element);
      await this.executeBlock(node.body, loopEnv);
    }
  }

  private async executeSectionCall(node: AST.SectionCall, env: Environment): Promise<void> {
    const body = env.getSection(node.name);
    if (!body) {
      const hint = env.has(node.name) ? ` ('${node.name}' is a variable; use 'display ${node.name}' to show it)` : '';
      throw new CorvoError('UndefinedSectionError', `Section '${node.name}' is not defined${hint}`, node.position);
    }
    if (this.sectionDepth >= MAX_SECTION_DEPTH) {
      throw new CorvoError(
        'RecursionLimitError',
        `Section '${node.name}' nested more than ${MAX_SECTION_DEPTH} calls deep`,
        node.position,
      );
    }

    this.sectionDepth++;
    try {
      await this.executeBlock(body, env);
    } finally {
      this.sectionDepth--;
    }
  }

  // ─── Lists ─────────────────────────────────────────────

  private executeListAppend(node: AST.ListAppend, env: Environment): void {
    const list = this.expectList(this.evaluate(node.list, env), 'append', node.list.position);
    const value = this.evaluate(node.value, env);
    // Lists are shared, so this would make the list contain itself
    if (containsList(value, list)) {
      throw new CorvoError('InvalidArgumentError', 'Cannot append a list to itself or to a list inside it', node.value.position);
    }
    list.elements.push(value);
  }

  private executeListRemove(node: AST.ListRemove, env: Environment): void {
    const list = this.expectList(this.evaluate(node.list, env), 'remove', node.list.position);
    const value = this.evaluate(node.value, env);
    const index = list.elements.findIndex(el => valuesEqual(el, value));
    if (index === -1) {
      throw new CorvoError(
        'InvalidArgumentError',
        `Cannot remove ${describeValue(value)}: it is not in the list ${describeValue(list)}`,
        node.value.position,
      );
    }
    list.elements.splice(index, 1);
  }

  // ─── Files and CSV ─────────────────────────────────────

  private async executeFileWrite(node: AST.FileWrite, env: Environment): Promise<void> {
    // The full text exists before the file is opened
    const content = displayText(this.evaluate(node.content, env));
    const filePath = this.evaluatePath(node.path, env);
    await writeTextFile(filePath, content, this.encoding);
  }

  private async executeFileRead(node: AST.FileRead, env: Environment): Promise<void> {
    const filePath = this.evaluatePath(node.path, env);
    const text = await readTextFile(filePath, this.encoding);
    env.assign(node.target, corvoString(text));
  }

  private async executeCsvRead(node: AST.CsvRead, env: Environment): Promise<void> {
    const filePath = this.evaluatePath(node.path, env);
    const text = await readTextFile(filePath, this.encoding);
    env.assign(node.target, corvoTable(parseCsv(text)));
  }

  private async executeCsvWrite(node: AST.CsvWrite, env: Environment): Promise<void> {
    const table = this.expectTable(this.evaluate(node.table, env), 'write ... to csv', node.table.position);
    const text = serializeCsv(table.rows);
    const filePath = this.evaluatePath(node.path, env);
    await writeTextFile(filePath, text, this.encoding);
  }

  private executeCsvSetCell(node: AST.CsvSetCell, env: Environment): void {
    const table = this.expectTable(this.evaluate(node.table, env), 'set', node.table.position);
    const row = this.toIndex(this.evaluate(node.row, env), table.rows.length, 'Row', node.row.position);
    const column = this.toIndex(this.evaluate(node.column, env), tableWidth(table), 'Column', node.column.position);
    const value = this.evaluate(node.value, env);
    table.rows[row][column] = displayText(value);
  }

  private evaluatePath(node: AST.Expression, env: Environment): string {
    const value = this.evaluate(node, env);
    if (value.kind !== 'string') {
      throw new CorvoError('TypeMismatchError', `A file path must be a String but got ${article(value)}`, node.position);
    }
    return path.resolve(this.workingDir, value.value);
  }

  // ─── Expressions ───────────────────────────────────────

  evaluate(node: AST.Expression, env: Environment): CorvoValue {
    switch (node.type) {
      case 'Literal':
        return node.value;
      case 'VarRef': {
        const value = env.lookup(node.name);
        if (value === undefined) {
          throw new CorvoError('UndefinedVariableError', `Variable '${node.name}' has not been given a value`, node.position);
        }
        return value;
      }
      case 'BinaryOp':
        return this.evaluateBinary(node, env);
      case 'ListLiteral':
        return corvoList(node.elements.map(el => this.evaluate(el, env)));
      case 'IndexAccess':
        return this.evaluateIndex(node, env);
      case 'ListCount': {
        const target = this.evaluate(node.list, env);
        if (target.kind === 'list') return corvoNumber(target.elements.length);
        if (target.kind === 'table') return corvoNumber(target.rows.length);
        throw new CorvoError('TypeMismatchError', `'count of' needs a List or a Table but got ${article(target)}`, node.position);
      }
      case 'LengthOf':
        return corvoNumber(this.lengthOf(this.evaluate(node.value, env)));
      case 'ColumnAccess': {
        const table = this.expectTable(this.evaluate(node.table, env), 'get column', node.table.position);
        const column = this.toIndex(this.evaluate(node.index, env), tableWidth(table), 'Column', node.index.position);
        return corvoList(table.rows.map(row => corvoString(row[column])));
      }
      case 'CellAccess': {
        const table = this.expectTable(this.evaluate(node.table, env), 'get row', node.table.position);
        const row = this.toIndex(this.evaluate(node.row, env), table.rows.length, 'Row', node.row.position);
        const column = this.toIndex(this.evaluate(node.column, env), tableWidth(table), 'Column', node.column.position);
        return corvoString(table.rows[row][column]);
      }
    }
  }

  private evaluateBinary(node: AST.BinaryOp, env: Environment): CorvoValue {
    if (AST.isConditionOperator(node.operator)) {
      throw new CorvoError(
        'TypeMismatchError',
        "A comparison can only be used as the condition of 'if' or 'while'",
        node.position,
      );
    }

    const left = this.evaluate(node.left, env);
    const right = this.evaluate(node.right, env);

    if (node.operator === 'plus' && (left.kind === 'string' || right.kind === 'string')) {
      return corvoString(displayText(left) + displayText(right));
    }

    if (left.kind !== 'number' || right.kind !== 'number') {
      throw new CorvoError(
        'TypeMismatchError',
        `'${node.operator}' needs two Numbers but got ${article(left)} and ${article(right)}`,
        node.position,
      );
    }

    const operator = node.operator;
    if (operator === 'divide' && right.value === 0) {
      throw new CorvoError('InvalidArgumentError', `Cannot divide ${formatNumber(left.value)} by zero`, node.position);
    }
    const result = arithmetic(operator, left.value, right.value);

    if (!Number.isFinite(result)) {
      throw new CorvoError('InvalidArgumentError', `The result of '${operator}' is too large to represent`, node.position);
    }
    return corvoNumber(result);
  }

  private evaluateIndex(node: AST.IndexAccess, env: Environment): CorvoValue {
    const target = this.evaluate(node.list, env);
    const indexValue = this.evaluate(node.index, env);

    if (target.kind === 'list') {
      const index = this.toIndex(indexValue, target.elements.length, 'Index', node.index.position);
      return target.elements[index];
    }
    if (target.kind === 'table') {
      const index = this.toIndex(indexValue, target.rows.length, 'Row', node.index.position);
      return corvoList(target.rows[index].map(corvoString));
    }
    throw new CorvoError('TypeMismatchError', `'at' needs a List or a Table but got ${article(target)}`, node.position);
  }

  private lengthOf(value: CorvoValue): number {
    switch (value.kind) {
      case 'string': return Array.from(value.value).length;
      case 'number': return formatNumber(value.value).length;
      case 'list': return value.elements.length;
      case 'table': return value.rows.length;
      case 'none': return 0;
    }
  }

  // ─── Conditions ────────────────────────────────────────

  evaluateCondition(node: AST.Expression, env: Environment): boolean {
    if (node.type !== 'BinaryOp' || !AST.isConditionOperator(node.operator)) {
      throw new CorvoError('TypeMismatchError', 'Expected a comparison such as "x is greater than 3"', node.position);
    }

    const operator = node.operator;
    if (operator === 'and') {
      return this.evaluateCondition(node.left, env) && this.evaluateCondition(node.right, env);
    }
    if (operator === 'or') {
      return this.evaluateCondition(node.left, env) || this.evaluateCondition(node.right, env);
    }

    const left = this.evaluate(node.left, env);
    const right = this.evaluate(node.right, env);

    if (left.kind === 'number' && right.kind === 'number') {
      return this.compare(operator, left.value, right.value);
    }
    if (left.kind === 'string' && right.kind === 'string') {
      return this.compare(operator, left.value, right.value);
    }
    throw new CorvoError(
      'TypeMismatchError',
      `Cannot compare ${article(left)} with ${article(right)}`,
      node.position,
    );
  }

  private compare<T extends number | string>(operator: AST.ComparisonOperator, left: T, right: T): boolean {
    switch (operator) {
      case 'is-equal': return left === right;
      case 'is-greater-than': return left > right;
      case 'is-less-than': return left < right;
    }
  }

  // ─── Helpers ───────────────────────────────────────────

  /**
   * Convert a 1-based user index into a 0-based array index.
   */
  private toIndex(value: CorvoValue, length: number, label: 'Index' | 'Row' | 'Column', position: Position): number {
    if (value.kind !== 'number') {
      throw new CorvoError('TypeMismatchError', `${label} must be a Number but got ${article(value)}`, position);
    }
    const n = value.value;
    if (!Number.isInteger(n) || n < 1 || n > length) {
      const range = length === 0 ? 'there are none' : `valid range is 1 to ${length}`;
      throw new CorvoError('InvalidIndexError', `${label} ${formatNumber(n)} is out of range (${range})`, position);
    }
    return n - 1;
  }

  private expectList(value: CorvoValue, operation: string, position: Position): CorvoList {
    if (value.kind !== 'list') {
      throw new CorvoError('TypeMismatchError', `'${operation}' needs a List but got ${article(value)}`, position);
    }
    return value;
  }

  private expectTable(value: CorvoValue, operation: string, position: Position): CorvoTable {
    if (value.kind !== 'table') {
      throw new CorvoError('TypeMismatchError', `'${operation}' needs a Table but got ${article(value)}`, position);
    }
    return value;
  }

  /** Give position-less errors from helpers the failing statement's location. */
  private locate(error: unknown, position: Position): unknown {
    if (error instanceof CorvoError && !error.position) {
      return new CorvoError(error.errorType, error.description, position);
    }
    return error;
  }

  private trace(message: string): void {
    this.traceLog.push(`[${Date.now() - this.startTime}ms] ${message}`);
    this.reporter.event(message);
  }
}
