import * as assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { Capability } from '../../../src/kernel/capability.js';
import { callbackFlagName, CIRCULAR_REFERENCE, toDocument } from '../../../src/kernel/graph-serializer.js';

describe('toDocument', () => {
  it('marks back references to an ancestor as circular', () => {
    const node: { name: string; self?: unknown } = { name: 'loop' };
    node.self = node;

    assert.deepEqual(toDocument(node), { name: 'loop', self: { ref: CIRCULAR_REFERENCE } });
  });

  it('serializes a shared object fully at each place it appears', () => {
    const shared = { id: 1 };
    assert.deepEqual(toDocument({ left: shared, right: shared }), { left: { id: 1 }, right: { id: 1 } });
  });

  it('references capabilities by their access path', () => {
    const capability = new Capability('App.game', { placeholder: 'mock' });
    assert.deepEqual(toDocument({ owner: capability }), { owner: { ref: 'App.game' } });
  });

  it('turns maps into objects and sets into arrays', () => {
    const value = {
      counts: new Map<unknown, number>([
        ['a', 1],
        [2, 3],
      ]),
      tags: new Set(['x', 'y']),
    };

    assert.deepEqual(toDocument(value), { counts: { a: 1, '2': 3 }, tags: ['x', 'y'] });
  });

  it('replaces function fields with presence flags', () => {
    assert.deepEqual(toDocument({ reward: () => 1, label: 'r' }), { hasReward: true, label: 'r' });
  });

  it('drops undefined fields and nulls non-finite numbers and array holes', () => {
    assert.deepEqual(toDocument({ gone: undefined, ratio: Number.NaN, list: [undefined, 1] }), {
      ratio: null,
      list: [null, 1],
    });
  });

  it('writes bigints as strings and dates as ISO text', () => {
    assert.deepEqual(toDocument({ big: 12n, at: new Date(Date.UTC(2020, 0, 2)) }), {
      big: '12',
      at: '2020-01-02T00:00:00.000Z',
    });
  });

  it('answers null for a top-level value without a JSON form', () => {
    assert.equal(toDocument(undefined), null);
  });
});

describe('callbackFlagName', () => {
  it('capitalizes the field name behind a has prefix', () => {
    assert.equal(callbackFlagName('rewardFunction'), 'hasRewardFunction');
  });
});
