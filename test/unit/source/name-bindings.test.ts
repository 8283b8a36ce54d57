import * as assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { buildNameBindings } from '../../../src/source/name-bindings.js';

describe('buildNameBindings', () => {
  it('maps identifiers to the first string argument of listed constructors', () => {
    const bindings = buildNameBindings(
      [
        "const Oak = new ProfNPC('Professor Oak', ['hi']);",
        'const Joy = new NPC(`Nurse Joy`);',
        "const Mart = new Shop('Mart');",
        'const Dynamic = new NPC(name);',
        "namespace Town { export const Guide = new NPC('Town Guide'); }",
        'let later;',
      ].join('\n'),
      ['NPC', 'ProfNPC'],
    );

    assert.deepEqual(
      [...bindings],
      [
        ['Oak', 'Professor Oak'],
        ['Joy', 'Nurse Joy'],
        ['Guide', 'Town Guide'],
      ],
    );
  });

  it('returns an empty table when no constructor is listed', () => {
    assert.equal(buildNameBindings("const Oak = new ProfNPC('Professor Oak');", []).size, 0);
  });
});
