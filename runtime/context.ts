/**
 * Execution Context
 * Variable scope for one row's evaluation.
 */

import { Value } from '../spec/types';

export type ScopeSnapshot = ReadonlyMap<string, Value>;

export class ExecutionContext {
  private variables = new Map<string, Value>();

  get(name: string): Value | undefined {
    return this.variables.get(name);
  }

  has(name: string): boolean {
    return this.variables.has(name);
  }

  set(name: string, value: Value): void {
    this.variables.set(name, value);
  }

  delete(name: string): boolean {
    return this.variables.delete(name);
  }

  setBatch(entries: Iterable<[string, Value]>): void {
    for (const [name, value] of entries) {
      this.variables.set(name, value);
    }
  }

  /**
   * Clear all variables so the scope can be reused.
   */
  reset(): void {
    this.variables.clear();
  }

  snapshot(): ScopeSnapshot {
    return new Map(this.variables);
  }

  /**
   * Replace the whole scope with a previously taken snapshot.
   */
  restore(snapshot: ScopeSnapshot): void {
    this.variables = new Map(snapshot);
  }

  entries(): IterableIterator<[string, Value]> {
    return this.variables.entries();
  }

  get size(): number {
    return this.variables.size;
  }
}
