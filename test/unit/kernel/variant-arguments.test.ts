import * as assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { Capability } from '../../../src/kernel/capability.js';
import {
  argumentAt,
  comparisonModeOf,
  countOf,
  listOf,
  positionalFields,
  referenceName,
  tableName,
} from '../../../src/kernel/variant-arguments.js';
import { TEST_TABLES } from '../../helpers/extraction-helpers.js';

describe('variant arguments', () => {
  it('applies fallbacks only to undefined arguments', () => {
    assert.equal(argumentAt([undefined, null], 0, 1), 1);
    assert.equal(argumentAt([undefined, null], 1, 1), null);
    assert.equal(argumentAt([], 3), undefined);
  });

  it('accepts finite numbers as counts', () => {
    assert.equal(countOf(4, 1), 4);
    assert.equal(countOf('4', 1), 1);
    assert.equal(countOf(Number.POSITIVE_INFINITY, 1), 1);
  });

  it('names table indices and stringifies anything else', () => {
    assert.equal(tableName(TEST_TABLES.region, 1), 'johto');
    assert.equal(tableName(TEST_TABLES.region, 9), '9');
    assert.equal(tableName(TEST_TABLES.region, 'kanto'), 'kanto');
  });

  it('maps comparison options by name or table value, defaulting to more', () => {
    assert.equal(comparisonModeOf('equal', TEST_TABLES), 'equal');
    assert.equal(comparisonModeOf(0, TEST_TABLES), 'less');
    assert.equal(comparisonModeOf(1, TEST_TABLES), 'equal');
    assert.equal(comparisonModeOf(undefined, TEST_TABLES), 'more');
  });

  it('wraps single values into lists', () => {
    assert.deepEqual(listOf([1, 2]), [1, 2]);
    assert.deepEqual(listOf(3), [3]);
    assert.deepEqual(listOf(null), []);
  });

  it('reads display names from strings, references and capabilities', () => {
    assert.equal(referenceName('Oak', '?'), 'Oak');
    assert.equal(referenceName({ name: 'Professor Oak' }, '?'), 'Professor Oak');
    assert.equal(referenceName(new Capability('TownList.Pallet', { placeholder: 'mock' }), '?'), 'TownList.Pallet');
    assert.equal(referenceName(5, '?'), '?');
  });

  it('names positional fields by index', () => {
    assert.deepEqual(positionalFields([3, 'x']), { arg0: 3, arg1: 'x' });
  });
});
