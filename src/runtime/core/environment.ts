/**
 * Environment
 *
 * Chain of lexical scopes mapping names to value slots. Blocks and calls
 * push a child scope; function values keep their defining scope alive by
 * holding a reference to it.
 */

import type { ForgeValue } from './values.js';

export class Environment {
  private readonly slots = new Map<string, ForgeValue>();

  constructor(readonly parent: Environment | null = null) {}

  /** New scope whose parent is this one */
  child(): Environment {
    return new Environment(this);
  }

  /**
   * Bind `name` in this scope. Re-declaring a name in the same scope
   * replaces its slot.
   */
  define(name: string, value: ForgeValue): void {
    this.slots.set(name, value);
  }

  /** Nearest scope that defines `name` */
  resolve(name: string): Environment | undefined {
    for (let scope: Environment | null = this; scope; scope = scope.parent) {
      if (scope.slots.has(name)) return scope;
    }
    return undefined;
  }

  /** Value of `name`, or undefined when no enclosing scope defines it */
  lookup(name: string): ForgeValue | undefined {
    return this.resolve(name)?.slots.get(name);
  }

  /** Own bindings, in definition order */
  bindings(): [string, ForgeValue][] {
    return [...this.slots];
  }

  /** Every visible name, innermost scope first, without duplicates */
  visibleNames(): string[] {
    const names = new Set<string>();
    for (let scope: Environment | null = this; scope; scope = scope.parent) {
      for (const name of scope.slots.keys()) names.add(name);
    }
    return [...names];
  }
}
