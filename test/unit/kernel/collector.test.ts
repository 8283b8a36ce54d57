import * as assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import {
  checkpointCollector,
  collectContainer,
  collectedSince,
  createCollector,
  emitDiagnostic,
  rollbackCollector,
} from '../../../src/kernel/collector.js';
import { runFixture } from '../../helpers/extraction-helpers.js';

describe('collector', () => {
  it('records diagnostics only when a collector is present', () => {
    const collector = createCollector();
    const diagnostic = { code: 'X', path: 'unit', severity: 'warning', message: 'm' } as const;

    emitDiagnostic(collector, diagnostic);
    emitDiagnostic(undefined, diagnostic);

    assert.deepEqual(collector.diagnostics, [diagnostic]);
  });

  it('rolls back containers recorded after a checkpoint', () => {
    const { result } = runFixture(`
      new QuestLine('One', '');
      new QuestLine('Two', '');
    `);
    const collector = createCollector();
    const [first, second] = result.containers;
    assert.ok(first !== undefined && second !== undefined);

    collectContainer(collector, first);
    const checkpoint = checkpointCollector(collector);
    collectContainer(collector, second);

    assert.equal(collectedSince(collector, checkpoint), 1);
    assert.equal(rollbackCollector(collector, checkpoint), 1);
    assert.deepEqual(collector.containers, [first]);
    assert.equal(rollbackCollector(collector, checkpoint), 0);
  });

  it('keeps one container per name at its first position', () => {
    const { result } = runFixture(`
      new QuestLine('Blue', 'first');
      new QuestLine('Red', '');
      new QuestLine('Blue', 'second');
    `);
    assert.deepEqual(
      result.document.map((container) => [container.name, container.description]),
      [
        ['Blue', 'second'],
        ['Red', ''],
      ],
    );
    assert.deepEqual(
      result.report.diagnostics.map((diagnostic) => [diagnostic.code, diagnostic.path]),
      [['CONTAINER_REPLACED', 'Blue']],
    );
  });

  it('restores a replaced container when the replacing unit rolls back', () => {
    const { result } = runFixture(`
      new QuestLine('One', '');
      new QuestLine('Two', '');
    `);
    const [one, two] = result.containers;
    assert.ok(one !== undefined && two !== undefined);
    const { result: again } = runFixture(`new QuestLine('One', 'again');`);
    const replacement = again.containers[0];
    assert.ok(replacement !== undefined);

    const collector = createCollector();
    collectContainer(collector, one);
    collectContainer(collector, two);
    const checkpoint = checkpointCollector(collector);
    collectContainer(collector, replacement);

    assert.deepEqual(collector.containers, [replacement, two]);
    assert.equal(collector.diagnostics.length, 1);
    assert.equal(rollbackCollector(collector, checkpoint), 1);
    assert.deepEqual(collector.containers, [one, two]);
    assert.deepEqual(collector.diagnostics, []);
  });
});
