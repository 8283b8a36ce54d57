import ts from 'typescript';

export interface NeutralizedSource {
  readonly text: string;
  /** Number of constructs blanked out. */
  readonly removed: number;
}

const TRIPLE_SLASH_DIRECTIVE = /^[ \t]*\/\/\/[ \t]*<(?:reference|amd-module|amd-dependency)\b[^\n]*$/gm;

const blank = (text: string): string => text.replace(/[^\r\n]/g, ' ');

const isModuleReference = (statement: ts.Statement): boolean => {
  if (ts.isImportDeclaration(statement)) {
    return true;
  }
  if (ts.isImportEqualsDeclaration(statement)) {
    return ts.isExternalModuleReference(statement.moduleReference);
  }
  return ts.isExportDeclaration(statement) && statement.moduleSpecifier !== undefined;
};

/**
 * Blanks out reference directives and module imports so that imported names
 * fall through to the ambient scope. Every character keeps its offset, so
 * line and column numbers still match the file on disk.
 */
export function neutralizeSource(text: string, fileName: string): NeutralizedSource {
  let removed = 0;
  let output = text.replace(TRIPLE_SLASH_DIRECTIVE, (directive) => {
    removed += 1;
    return blank(directive);
  });

  const sourceFile = ts.createSourceFile(fileName, output, ts.ScriptTarget.Latest, true, ts.ScriptKind.TS);
  const ranges = sourceFile.statements
    .filter(isModuleReference)
    .map((statement) => ({ start: statement.getStart(sourceFile), end: statement.getEnd() }));

  for (const range of ranges.reverse()) {
    output = output.slice(0, range.start) + blank(output.slice(range.start, range.end)) + output.slice(range.end);
    removed += 1;
  }
  return { text: output, removed };
}
