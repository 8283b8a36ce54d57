import { readFileSync } from 'node:fs';

import { describeThrown, sourceLoadFailedError } from '../kernel/extraction-error.js';

export interface SourceText {
  readonly fileName: string;
  readonly text: string;
}

export interface ExtractionSource {
  readonly target: SourceText;
  readonly companion?: SourceText;
}

export function readSourceText(filePath: string, role: 'target' | 'companion'): SourceText {
  try {
    return { fileName: filePath, text: readFileSync(filePath, 'utf8') };
  } catch (error) {
    throw sourceLoadFailedError(`Cannot read ${role} source ${filePath}: ${describeThrown(error)}`, {
      path: filePath,
      role,
    });
  }
}

export function loadExtractionSource(targetPath: string, companionPath?: string): ExtractionSource {
  const target = readSourceText(targetPath, 'target');
  if (companionPath === undefined) {
    return { target };
  }
  return { target, companion: readSourceText(companionPath, 'companion') };
}
