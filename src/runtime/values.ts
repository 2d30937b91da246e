/**
 * Runtime value types for the Corvo language.
 * Every expression in Corvo evaluates to a CorvoValue.
 */

import { CorvoError } from './errors';

export type CorvoValue =
  | CorvoNumber
  | CorvoString
  | CorvoList
  | CorvoTable
  | CorvoNone;

export interface CorvoNumber {
  kind: 'number';
  value: number;
}

export interface CorvoString {
  kind: 'string';
  value: string;
}

export interface CorvoList {
  kind: 'list';
  elements: CorvoValue[];
}

/**
 * CSV data. Rows are rectangular: every row holds the same number of cells.
 */
export interface CorvoTable {
  kind: 'table';
  rows: string[][];
}

export interface CorvoNone {
  kind: 'none';
}

// ─── Constructors ────────────────────────────────────

export function corvoNumber(value: number): CorvoNumber {
  return { kind: 'number', value };
}

export function corvoString(value: string): CorvoString {
  return { kind: 'string', value };
}

export function corvoList(elements: CorvoValue[]): CorvoList {
  return { kind: 'list', elements };
}

export function corvoTable(rows: string[][]): CorvoTable {
  return { kind: 'table', rows };
}

export function corvoNone(): CorvoNone {
  return { kind: 'none' };
}

// ─── Utilities ───────────────────────────────────────

/** Name of a value kind as it appears in error messages. */
export function kindName(value: CorvoValue): string {
  switch (value.kind) {
    case 'number': return 'Number';
    case 'string': return 'String';
    case 'list': return 'List';
    case 'table': return 'Table';
    case 'none': return 'None';
  }
}

export function formatNumber(value: number): string {
  // String(-0) is already "0"
  return String(value);
}

/**
 * Canonical text of a value, as `display` prints it.
 * Tables have no text form; read a column or a cell first.
 */
export function displayText(value: CorvoValue): string {
  switch (value.kind) {
    case 'number': return formatNumber(value.value);
    case 'string': return value.value;
    case 'list': return '[' + value.elements.map(displayText).join(', ') + ']';
    case 'none': return 'none';
    case 'table':
      throw new CorvoError(
        'TypeMismatchError',
        'A Table cannot be displayed directly; use "get column" or "get row ... column ..." first',
      );
  }
}

/**
 * Short rendering of a value for error messages. Unlike displayText this
 * never fails, and strings are quoted.
 */
export function describeValue(value: CorvoValue): string {
  switch (value.kind) {
    case 'number': return formatNumber(value.value);
    case 'string': return JSON.stringify(value.value);
    case 'list': return '[' + value.elements.map(describeValue).join(', ') + ']';
    case 'table': return `<table ${value.rows.length}x${tableWidth(value)}>`;
    case 'none': return 'none';
  }
}

/** Structural equality, used by `remove`. */
export function valuesEqual(a: CorvoValue, b: CorvoValue): boolean {
  switch (a.kind) {
    case 'number':
      return b.kind === 'number' && a.value === b.value;
    case 'string':
      return b.kind === 'string' && a.value === b.value;
    case 'none':
      return b.kind === 'none';
    case 'list':
      return b.kind === 'list'
        && a.elements.length === b.elements.length
        && a.elements.every((el, i) => valuesEqual(el, b.elements[i]));
    case 'table':
      return b.kind === 'table'
        && a.rows.length === b.rows.length
        && a.rows.every((row, i) =>
          row.length === b.rows[i].length && row.every((cell, j) => cell === b.rows[i][j]));
  }
}

/** Whether `target` is `value` itself or sits anywhere inside it. */
export function containsList(value: CorvoValue, target: CorvoList): boolean {
  if (value.kind !== 'list') return false;
  return value === target || value.elements.some(el => containsList(el, target));
}

/** Number of columns of a rectangular table (0 when it has no rows). */
export function tableWidth(table: CorvoTable): number {
  return table.rows.length > 0 ? table.rows[0].length : 0;
}
