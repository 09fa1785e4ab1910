/**
 * Lexical scopes for identifier resolution.
 */

import type { GoObject } from './types.js';

interface Binding {
  object: GoObject;
  /** Offset from which the binding is visible (scope starts after the declaration) */
  activeFrom: number;
}

export class Scope {
  readonly parent: Scope | undefined;
  private readonly bindings = new Map<string, Binding[]>();

  constructor(parent?: Scope) {
    this.parent = parent;
  }

  /**
   * Declare a name. The blank identifier never binds.
   */
  declare(name: string, object: GoObject, activeFrom = Number.NEGATIVE_INFINITY): void {
    if (name === '_' || name === '') return;
    const list = this.bindings.get(name);
    if (list) {
      list.push({ object, activeFrom });
    } else {
      this.bindings.set(name, [{ object, activeFrom }]);
    }
  }

  /**
   * Resolve a name used at offset `at`, innermost scope first. A binding
   * whose declaration has not completed yet is skipped, so `x := x` sees
   * the outer `x`.
   */
  lookup(name: string, at: number): GoObject | undefined {
    for (let scope: Scope | undefined = this; scope; scope = scope.parent) {
      const list = scope.bindings.get(name);
      if (!list) continue;
      for (let i = list.length - 1; i >= 0; i--) {
        const binding = list[i];
        if (binding && binding.activeFrom <= at) {
          return binding.object;
        }
      }
    }
    return undefined;
  }
}

const BUILTIN_TYPES = [
  'any', 'bool', 'byte', 'comparable', 'complex64', 'complex128', 'error',
  'float32', 'float64', 'int', 'int8', 'int16', 'int32', 'int64', 'rune',
  'string', 'uint', 'uint8', 'uint16', 'uint32', 'uint64', 'uintptr',
];

export const BUILTIN_FUNCS = [
  'append', 'cap', 'clear', 'close', 'complex', 'copy', 'delete', 'imag',
  'len', 'make', 'max', 'min', 'new', 'panic', 'print', 'println', 'real',
  'recover',
];

/**
 * The universe block: predeclared types, constants, functions and nil.
 */
export function createUniverse(): Scope {
  const universe = new Scope();
  for (const name of BUILTIN_TYPES) {
    universe.declare(name, { kind: 'type', name });
  }
  for (const name of BUILTIN_FUNCS) {
    universe.declare(name, { kind: 'builtin', name });
  }
  for (const name of ['true', 'false', 'iota']) {
    universe.declare(name, { kind: 'const', name });
  }
  universe.declare('nil', { kind: 'nil', name: 'nil' });
  return universe;
}
