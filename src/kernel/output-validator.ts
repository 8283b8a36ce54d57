import { readFileSync } from 'node:fs';

import type { Diagnostic } from './diagnostics.js';
import { describeThrown } from './extraction-error.js';
import { ExtractionDocumentSchema } from './schemas-document.js';

export interface OutputValidationResult {
  readonly ok: boolean;
  readonly error?: string;
  readonly diagnostics: readonly Diagnostic[];
}

const failure = (message: string): OutputValidationResult => ({
  ok: false,
  error: message,
  diagnostics: [
    {
      code: 'OUTPUT_VALIDATION_FAILED',
      path: 'document',
      severity: 'error',
      message,
    },
  ],
});

/** Reads a written document back from disk and validates what the file holds. */
export function validateDocumentFile(filePath: string): OutputValidationResult {
  let text: string;
  try {
    text = readFileSync(filePath, 'utf8');
  } catch (error) {
    return failure(`Cannot read ${filePath}: ${describeThrown(error)}`);
  }
  return validateDocumentText(text);
}

/**
 * Re-parses written document text and checks it against the document schema.
 * The verdict is advisory; callers log it and keep the file either way.
 */
export function validateDocumentText(documentText: string): OutputValidationResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(documentText);
  } catch (error) {
    return failure(describeThrown(error));
  }

  const result = ExtractionDocumentSchema.safeParse(parsed);
  if (result.success) {
    return { ok: true, diagnostics: [] };
  }

  const diagnostics: Diagnostic[] = result.error.issues.map((issue) => ({
    code: 'OUTPUT_VALIDATION_FAILED',
    path: issue.path.length > 0 ? `document.${issue.path.map(String).join('.')}` : 'document',
    severity: 'error',
    message: issue.message,
  }));
  return {
    ok: false,
    error: diagnostics.map((diagnostic) => `${diagnostic.path}: ${diagnostic.message}`).join('; '),
    diagnostics,
  };
}
