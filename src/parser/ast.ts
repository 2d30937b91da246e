import type { Position } from '../runtime/errors';
import type { CorvoNumber, CorvoString } from '../runtime/values';

export type { Position };

export type Statement =
  | Assign
  | Display
  | Ask
  | If
  | While
  | Repeat
  | ForEach
  | SectionDef
  | SectionCall
  | ListAppend
  | ListRemove
  | FileWrite
  | FileRead
  | CsvRead
  | CsvWrite
  | CsvSetCell;

export type Expression =
  | Literal
  | VarRef
  | BinaryOp
  | ListLiteral
  | IndexAccess
  | ListCount
  | LengthOf
  | ColumnAccess
  | CellAccess;

export type Node = Program | Statement | Expression;

export interface BaseNode {
  position: Position;
}

export interface Program extends BaseNode {
  type: 'Program';
  body: Statement[];
}

// ─── Statements ──────────────────────────────────────

export interface Assign extends BaseNode {
  type: 'Assign';
  name: string;
  value: Expression;
}

export interface Display extends BaseNode {
  type: 'Display';
  value: Expression;
}

export interface Ask extends BaseNode {
  type: 'Ask';
  prompt: Expression;
  target: string;
}

export interface If extends BaseNode {
  type: 'If';
  condition: Expression;
  thenBody: Statement[];
  elseBody?: Statement[];
}

export interface While extends BaseNode {
  type: 'While';
  condition: Expression;
  body: Statement[];
}

export interface Repeat extends BaseNode {
  type: 'Repeat';
  count: Expression;
  body: Statement[];
}

export interface ForEach extends BaseNode {
  type: 'ForEach';
  variable: string;
  iterable: Expression;
  body: Statement[];
}

export interface SectionDef extends BaseNode {
  type: 'SectionDef';
  name: string;
  body: Statement[];
}

export interface SectionCall extends BaseNode {
  type: 'SectionCall';
  name: string;
}

export interface ListAppend extends BaseNode {
  type: 'ListAppend';
  list: Expression;
  value: Expression;
}

export interface ListRemove extends BaseNode {
  type: 'ListRemove';
  list: Expression;
  value: Expression;
}

export interface FileWrite extends BaseNode {
  type: 'FileWrite';
  content: Expression;
  path: Expression;
}

export interface FileRead extends BaseNode {
  type: 'FileRead';
  path: Expression;
  target: string;
}

export interface CsvRead extends BaseNode {
  type: 'CsvRead';
  path: Expression;
  target: string;
}

export interface CsvWrite extends BaseNode {
  type: 'CsvWrite';
  table: Expression;
  path: Expression;
}

export interface CsvSetCell extends BaseNode {
  type: 'CsvSetCell';
  table: Expression;
  row: Expression;
  column: Expression;
  value: Expression;
}

// ─── Expressions ─────────────────────────────────────

export interface Literal extends BaseNode {
  type: 'Literal';
  value: CorvoNumber | CorvoString;
}

export interface VarRef extends BaseNode {
  type: 'VarRef';
  name: string;
}

export type ArithmeticOperator = 'plus' | 'minus' | 'times' | 'divide';
export type ComparisonOperator = 'is-equal' | 'is-greater-than' | 'is-less-than';
export type LogicalOperator = 'and' | 'or';
export type BinaryOperator = ArithmeticOperator | ComparisonOperator | LogicalOperator;

export interface BinaryOp extends BaseNode {
  type: 'BinaryOp';
  operator: BinaryOperator;
  left: Expression;
  right: Expression;
}

export interface ListLiteral extends BaseNode {
  type: 'ListLiteral';
  elements: Expression[];
}

/** `list at n` (1-based). */
export interface IndexAccess extends BaseNode {
  type: 'IndexAccess';
  list: Expression;
  index: Expression;
}

/** `count of list` */
export interface ListCount extends BaseNode {
  type: 'ListCount';
  list: Expression;
}

/** `length of value` */
export interface LengthOf extends BaseNode {
  type: 'LengthOf';
  value: Expression;
}

/** `get column n from table` */
export interface ColumnAccess extends BaseNode {
  type: 'ColumnAccess';
  table: Expression;
  index: Expression;
}

/** `get row r column c from table` */
export interface CellAccess extends BaseNode {
  type: 'CellAccess';
  table: Expression;
  row: Expression;
  column: Expression;
}

export function isConditionOperator(operator: BinaryOperator): operator is ComparisonOperator | LogicalOperator {
  return operator !== 'plus' && operator !== 'minus' && operator !== 'times' && operator !== 'divide';
}
