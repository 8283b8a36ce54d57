import ts from 'typescript';

export interface EntryPoint {
  /** Class the static method belongs to; absent for a top-level function. */
  readonly owner?: string;
  readonly name: string;
  readonly qualifiedName: string;
}

export const DEFAULT_ENTRY_POINT_PATTERN = '^create';

const isStatic = (node: ts.Node): boolean =>
  ts.canHaveModifiers(node) &&
  (ts.getModifiers(node)?.some((modifier) => modifier.kind === ts.SyntaxKind.StaticKeyword) ?? false);

/**
 * Declarative registration routines, in source order: static methods of
 * top-level classes and top-level functions whose names match `pattern`.
 */
export function discoverEntryPoints(text: string, fileName: string, pattern: RegExp): EntryPoint[] {
  const sourceFile = ts.createSourceFile(fileName, text, ts.ScriptTarget.Latest, true, ts.ScriptKind.TS);
  const entryPoints: EntryPoint[] = [];

  for (const statement of sourceFile.statements) {
    if (ts.isFunctionDeclaration(statement) && statement.name !== undefined && statement.body !== undefined) {
      const name = statement.name.text;
      if (pattern.test(name)) {
        entryPoints.push({ name, qualifiedName: name });
      }
      continue;
    }
    if (!ts.isClassDeclaration(statement) || statement.name === undefined) {
      continue;
    }
    const owner = statement.name.text;
    for (const member of statement.members) {
      if (!ts.isMethodDeclaration(member) || !isStatic(member) || member.body === undefined || !ts.isIdentifier(member.name)) {
        continue;
      }
      const name = member.name.text;
      if (pattern.test(name)) {
        entryPoints.push({ owner, name, qualifiedName: `${owner}.${name}` });
      }
    }
  }
  return entryPoints;
}
