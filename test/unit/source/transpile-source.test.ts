import * as assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { isExtractionError } from '../../../src/kernel/extraction-error.js';
import { toJavaScriptFileName, transpileSource } from '../../../src/source/transpile-source.js';

describe('transpileSource', () => {
  it('erases type syntax and parses the output as JavaScript', () => {
    const transpiled = transpileSource('const count: number = 3;\ninterface Shape { size: number }\n', 'shapes.ts');

    assert.equal(transpiled.fileName, 'shapes.js');
    assert.ok(transpiled.code.includes('const count = 3;'));
    assert.ok(!transpiled.code.includes('interface'));
    assert.equal(transpiled.sourceFile.fileName, 'shapes.js');
  });

  it('reports parse errors with their positions', () => {
    assert.throws(
      () => transpileSource('const = 1;\n', 'broken.ts'),
      (error: unknown) => {
        if (!isExtractionError(error) || error.code !== 'SOURCE_UNSUPPORTED_SYNTAX') return false;
        const diagnostics = error.context !== undefined && 'diagnostics' in error.context ? error.context.diagnostics : [];
        return (
          error.message.startsWith('broken.ts does not parse') &&
          Array.isArray(diagnostics) &&
          diagnostics.length > 0
        );
      },
    );
  });
});

describe('toJavaScriptFileName', () => {
  it('swaps TypeScript extensions for .js', () => {
    assert.equal(toJavaScriptFileName('a/QuestLineHelper.ts'), 'a/QuestLineHelper.js');
    assert.equal(toJavaScriptFileName('view.tsx'), 'view.js');
    assert.equal(toJavaScriptFileName('mod.mts'), 'mod.js');
  });
});
