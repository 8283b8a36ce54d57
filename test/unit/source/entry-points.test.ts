import * as assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { discoverEntryPoints } from '../../../src/source/entry-points.js';

const SOURCE = `
function createA() {}
function helper() {}
declare function createDeclared(): void;
class Helper {
  static createB() {}
  createInstance() {}
  static ['createComputed']() {}
  static other() {}
}
export function createC() {}
`;

describe('discoverEntryPoints', () => {
  it('finds matching top-level functions and static methods in source order', () => {
    assert.deepEqual(discoverEntryPoints(SOURCE, 'helper.ts', /^create/), [
      { name: 'createA', qualifiedName: 'createA' },
      { owner: 'Helper', name: 'createB', qualifiedName: 'Helper.createB' },
      { name: 'createC', qualifiedName: 'createC' },
    ]);
  });

  it('honours a custom pattern', () => {
    assert.deepEqual(
      discoverEntryPoints(SOURCE, 'helper.ts', /^other$/).map((entry) => entry.qualifiedName),
      ['Helper.other'],
    );
  });
});
