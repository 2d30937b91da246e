import * as AST from '../parser/ast';
import { CorvoValue } from './values';

/**
 * Variable bindings and the section table for one program run.
 *
 * The root environment holds every variable a program assigns. Child scopes
 * exist only for `for each` loop variables: a child binds its loop variable
 * and forwards every other write to the nearest scope that already binds the
 * name, or to the root.
 */
export class Environment {
  private bindings: Map<string, CorvoValue> = new Map();
  private sections: Map<string, AST.Statement[]>;
  private parent: Environment | null;

  constructor(parent: Environment | null = null) {
    this.parent = parent;
    // Sections are program-wide, so every scope shares the root's table
    this.sections = parent ? parent.sections : new Map();
  }

  /** Returns undefined for an unbound name; the caller reports the error. */
  lookup(name: string): CorvoValue | undefined {
    const value = this.bindings.get(name);
    if (value !== undefined) return value;
    return this.parent ? this.parent.lookup(name) : undefined;
  }

  has(name: string): boolean {
    return this.lookup(name) !== undefined;
  }

  /** Bind a name in this scope only. */
  define(name: string, value: CorvoValue): void {
    this.bindings.set(name, value);
  }

  /**
   * Set a variable in the nearest scope where it's already defined,
   * or in the root scope if not found anywhere.
   */
  assign(name: string, value: CorvoValue): void {
    if (this.bindings.has(name) || !this.parent) {
      this.bindings.set(name, value);
      return;
    }
    this.parent.assign(name, value);
  }

  child(): Environment {
    return new Environment(this);
  }

  defineSection(name: string, body: AST.Statement[]): void {
    this.sections.set(name, body);
  }

  getSection(name: string): AST.Statement[] | undefined {
    return this.sections.get(name);
  }

  /**
   * Get all bindings visible from this scope, inner scopes shadowing outer ones.
   */
  snapshot(): Map<string, CorvoValue> {
    const merged = this.parent ? this.parent.snapshot() : new Map<string, CorvoValue>();
    for (const [key, value] of this.bindings) {
      merged.set(key, value);
    }
    return merged;
  }
}
