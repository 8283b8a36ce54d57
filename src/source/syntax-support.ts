import ts from 'typescript';

import type { Diagnostic } from '../kernel/diagnostics.js';
import { unsupportedSyntaxError } from '../kernel/extraction-error.js';

const hasAsyncModifier = (node: ts.Node): boolean =>
  ts.canHaveModifiers(node) &&
  (ts.getModifiers(node)?.some((modifier) => modifier.kind === ts.SyntaxKind.AsyncKeyword) ?? false);

function unsupportedConstruct(node: ts.Node): string | undefined {
  if (ts.isFunctionLike(node) && 'asteriskToken' in node && node.asteriskToken !== undefined) {
    return 'generator function';
  }
  if (ts.isYieldExpression(node)) {
    return 'yield expression';
  }
  if (ts.isFunctionLike(node) && hasAsyncModifier(node)) {
    return 'async function';
  }
  if (ts.isAwaitExpression(node) || (ts.isForOfStatement(node) && node.awaitModifier !== undefined)) {
    return 'await';
  }
  if (ts.isWithStatement(node)) {
    return 'with statement';
  }
  if (ts.isLabeledStatement(node)) {
    return 'labelled statement';
  }
  if (ts.isCallExpression(node) && node.expression.kind === ts.SyntaxKind.ImportKeyword) {
    return 'dynamic import()';
  }
  if (ts.isMetaProperty(node)) {
    return node.keywordToken === ts.SyntaxKind.ImportKeyword ? 'import.meta' : 'new.target';
  }
  return undefined;
}

/** Constructs the evaluator does not run, one diagnostic per occurrence, in source order. */
export function findUnsupportedSyntax(sourceFile: ts.SourceFile): Diagnostic[] {
  const diagnostics: Diagnostic[] = [];

  const visit = (node: ts.Node): void => {
    const construct = unsupportedConstruct(node);
    if (construct !== undefined) {
      const position = sourceFile.getLineAndCharacterOfPosition(node.getStart(sourceFile));
      diagnostics.push({
        code: 'SOURCE_UNSUPPORTED_SYNTAX',
        path: `${sourceFile.fileName}:${position.line + 1}`,
        severity: 'error',
        message: `Unsupported ${construct}.`,
        suggestion: 'Rewrite the construct or exclude it from the extracted module.',
        span: { fileName: sourceFile.fileName, line: position.line + 1, column: position.character + 1 },
      });
    }
    ts.forEachChild(node, visit);
  };

  visit(sourceFile);
  return diagnostics;
}

export function assertSupportedSyntax(sourceFile: ts.SourceFile): void {
  const diagnostics = findUnsupportedSyntax(sourceFile);
  if (diagnostics.length > 0) {
    const listed = diagnostics.map((diagnostic) => `${diagnostic.message} (line ${diagnostic.span?.line ?? '?'})`);
    throw unsupportedSyntaxError(`${sourceFile.fileName} uses unsupported syntax: ${listed.join(', ')}`, {
      fileName: sourceFile.fileName,
      diagnostics,
    });
  }
}
