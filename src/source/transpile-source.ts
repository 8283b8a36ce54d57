import ts from 'typescript';

import type { Diagnostic } from '../kernel/diagnostics.js';
import { unsupportedSyntaxError } from '../kernel/extraction-error.js';

export interface TranspiledSource {
  readonly fileName: string;
  readonly code: string;
  readonly sourceFile: ts.SourceFile;
}

const TRANSPILE_OPTIONS: ts.CompilerOptions = {
  target: ts.ScriptTarget.ES2020,
  module: ts.ModuleKind.CommonJS,
  experimentalDecorators: true,
  removeComments: true,
};

export const toJavaScriptFileName = (fileName: string): string => fileName.replace(/\.[cm]?tsx?$/, '') + '.js';

export function toDiagnostic(diagnostic: ts.Diagnostic, code: string): Diagnostic {
  const message = ts.flattenDiagnosticMessageText(diagnostic.messageText, '\n');
  if (diagnostic.file === undefined || diagnostic.start === undefined) {
    return { code, path: 'source', severity: 'error', message };
  }
  const position = diagnostic.file.getLineAndCharacterOfPosition(diagnostic.start);
  return {
    code,
    path: `${diagnostic.file.fileName}:${position.line + 1}`,
    severity: 'error',
    message,
    span: { fileName: diagnostic.file.fileName, line: position.line + 1, column: position.character + 1 },
  };
}

/** Erases type syntax and lowers the module to directly executable JavaScript, then parses the result. */
export function transpileSource(text: string, fileName: string): TranspiledSource {
  const result = ts.transpileModule(text, {
    compilerOptions: TRANSPILE_OPTIONS,
    fileName,
    reportDiagnostics: true,
  });

  const errors = (result.diagnostics ?? []).filter((diagnostic) => diagnostic.category === ts.DiagnosticCategory.Error);
  if (errors.length > 0) {
    throw unsupportedSyntaxError(`${fileName} does not parse (${errors.length} syntax error(s)).`, {
      fileName,
      diagnostics: errors.map((diagnostic) => toDiagnostic(diagnostic, 'SOURCE_UNSUPPORTED_SYNTAX')),
    });
  }

  const jsFileName = toJavaScriptFileName(fileName);
  return {
    fileName: jsFileName,
    code: result.outputText,
    sourceFile: ts.createSourceFile(jsFileName, result.outputText, ts.ScriptTarget.ES2020, true, ts.ScriptKind.JS),
  };
}
