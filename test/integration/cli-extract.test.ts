import * as assert from 'node:assert/strict';
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, it } from 'node:test';
import { fileURLToPath } from 'node:url';

import { main } from '../../src/cli/extract.js';
import { createMemorySink } from '../../src/harness/logger.js';

const fixture = fileURLToPath(new URL('../fixtures/temporary-battle-list.ts', import.meta.url));

const CONFIG = `
version: 1
domain: battles
source: ${JSON.stringify(fixture)}
output: default.json
variants:
  requirements:
    typed: [RouteKillRequirement, GymBadgeRequirement, ClearDungeonRequirement, TemporaryBattleRequirement, MultiRequirement]
  quests: {}
containers: [TemporaryBattle, GymPokemon]
tables:
  region: [kanto]
globals:
  GameConstants:
    Region: { $data: { kanto: 0 } }
  BadgeEnums: { $echo: true }
`;

describe('decl-extract', () => {
  it('writes the document to the --output path and exits with 0', () => {
    const dir = mkdtempSync(join(tmpdir(), 'decl-cli-'));
    try {
      const configPath = join(dir, 'battles.yaml');
      const outputPath = join(dir, 'override.json');
      writeFileSync(configPath, CONFIG, 'utf8');
      const memory = createMemorySink();

      assert.equal(main(['--config', configPath, '--output', outputPath, '--quiet'], memory.sink), 0);

      const written: unknown = JSON.parse(readFileSync(outputPath, 'utf8'));
      assert.ok(Array.isArray(written));
      assert.equal(written.length, 2);
      assert.equal(existsSync(join(dir, 'default.json')), false);
      assert.deepEqual(
        memory.records.map((record) => record.level),
        ['warn'],
      );
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });

  it('exits with 1 and lists issues for an invalid config', () => {
    const dir = mkdtempSync(join(tmpdir(), 'decl-cli-'));
    try {
      const configPath = join(dir, 'broken.yaml');
      writeFileSync(configPath, CONFIG.replace('containers: [TemporaryBattle, GymPokemon]', 'containers: []'), 'utf8');
      const memory = createMemorySink();

      assert.equal(main(['--config', configPath], memory.sink), 1);
      assert.equal(memory.records[0]?.message, `Invalid extraction config ${configPath}.`);
      assert.ok(memory.records.slice(1).some((record) => record.message.startsWith('  containers: ')));
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});
