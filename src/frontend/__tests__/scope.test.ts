/**
 * Scope Tests
 */

import { describe, it, expect } from 'vitest';
import { Scope, createUniverse } from '../scope.js';

describe('Scope', () => {
  it('resolves names through parent scopes', () => {
    const universe = createUniverse();
    const inner = new Scope(new Scope(universe));

    expect(inner.lookup('int', 0)).toEqual({ kind: 'type', name: 'int' });
    expect(inner.lookup('len', 0)).toEqual({ kind: 'builtin', name: 'len' });
    expect(inner.lookup('nil', 0)).toEqual({ kind: 'nil', name: 'nil' });
    expect(inner.lookup('missing', 0)).toBeUndefined();
  });

  it('hides a binding until its declaration completes', () => {
    const outer = new Scope();
    outer.declare('x', { kind: 'var', name: 'x', pkgPath: 'outer' });
    const inner = new Scope(outer);
    inner.declare('x', { kind: 'var', name: 'x' }, 50);

    expect(inner.lookup('x', 40)).toEqual({ kind: 'var', name: 'x', pkgPath: 'outer' });
    expect(inner.lookup('x', 50)).toEqual({ kind: 'var', name: 'x' });
  });

  it('prefers the latest active redeclaration', () => {
    const scope = new Scope();
    scope.declare('v', { kind: 'var', name: 'v' }, 10);
    scope.declare('v', { kind: 'const', name: 'v' }, 20);

    expect(scope.lookup('v', 15)?.kind).toBe('var');
    expect(scope.lookup('v', 25)?.kind).toBe('const');
  });

  it('never binds the blank identifier', () => {
    const scope = new Scope();
    scope.declare('_', { kind: 'var', name: '_' });

    expect(scope.lookup('_', 0)).toBeUndefined();
  });
});
