import ts from 'typescript';

export type NameBindingTable = ReadonlyMap<string, string>;

/**
 * Maps declared identifiers to the string literal their constructor receives,
 * e.g. `const Oak = new ProfNPC('Professor Oak', ...)` gives `Oak -> Professor Oak`.
 * Only `new <Ctor>(<string literal>, ...)` initializers with a listed constructor count.
 */
export function buildNameBindings(companionText: string, constructors: readonly string[], fileName = 'companion.ts'): NameBindingTable {
  const recognized = new Set(constructors);
  const bindings = new Map<string, string>();
  const sourceFile = ts.createSourceFile(fileName, companionText, ts.ScriptTarget.Latest, true, ts.ScriptKind.TS);

  const visit = (node: ts.Node): void => {
    if (ts.isVariableDeclaration(node) && ts.isIdentifier(node.name) && node.initializer !== undefined) {
      const displayName = constructedName(node.initializer, recognized);
      if (displayName !== undefined) {
        bindings.set(node.name.text, displayName);
      }
    }
    ts.forEachChild(node, visit);
  };

  visit(sourceFile);
  return bindings;
}

function constructedName(initializer: ts.Expression, recognized: ReadonlySet<string>): string | undefined {
  if (!ts.isNewExpression(initializer) || !ts.isIdentifier(initializer.expression)) {
    return undefined;
  }
  if (!recognized.has(initializer.expression.text)) {
    return undefined;
  }
  const first = initializer.arguments?.[0];
  if (first === undefined || !(ts.isStringLiteral(first) || ts.isNoSubstitutionTemplateLiteral(first))) {
    return undefined;
  }
  return first.text;
}
