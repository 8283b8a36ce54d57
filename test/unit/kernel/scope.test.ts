import * as assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { isExtractionError } from '../../../src/kernel/extraction-error.js';
import { Scope } from '../../../src/kernel/scope.js';

describe('Scope', () => {
  it('looks names up through parent scopes', () => {
    const root = Scope.createGlobal(() => 'unbound');
    root.declare('outer', 1);
    const inner = new Scope(root, 'block');
    inner.declare('local', 2, 'let');

    assert.equal(inner.lookup('outer'), 1);
    assert.equal(inner.lookup('local'), 2);
    assert.equal(root.lookup('local'), 'unbound');
  });

  it('hands unbound names to the global handler', () => {
    const seen: string[] = [];
    const root = Scope.createGlobal((scope, name) => {
      seen.push(name);
      scope.declare(name, name.length, 'ambient');
      return name.length;
    });
    const inner = new Scope(root, 'function');

    assert.equal(inner.lookup('abc'), 3);
    assert.equal(inner.lookup('abc'), 3);
    assert.deepEqual(seen, ['abc']);
  });

  it('rejects assignment to constants', () => {
    const root = Scope.createGlobal(() => undefined);
    root.declare('fixed', 1, 'const');

    assert.throws(
      () => root.assign('fixed', 2),
      (error: unknown) =>
        isExtractionError(error) &&
        error.code === 'GUEST_TYPE_ERROR' &&
        error.message === "Assignment to constant variable 'fixed'.",
    );
  });

  it('creates implicit globals for assignments to undeclared names', () => {
    const root = Scope.createGlobal(() => undefined);
    const inner = new Scope(new Scope(root, 'function'), 'block');
    inner.assign('leaked', 7);

    assert.equal(root.get('leaked'), 7);
  });

  it('finds the variable scope and frame past block scopes', () => {
    const root = Scope.createGlobal(() => undefined);
    const frame = { thisValue: 'self', thisInitialized: true };
    const fn = new Scope(root, 'function', frame);
    const block = new Scope(fn, 'block');

    assert.equal(block.variableScope(), fn);
    assert.equal(block.currentFrame(), frame);
  });

  it('copies own bindings into an independent sibling', () => {
    const root = Scope.createGlobal(() => undefined);
    const loop = new Scope(root, 'block');
    loop.declare('i', 0, 'let');
    const next = loop.copy();
    next.assign('i', 1);

    assert.equal(loop.get('i'), 0);
    assert.equal(next.get('i'), 1);
    assert.equal(next.parent, root);
  });
});
