export type DiagnosticSeverity = 'error' | 'warning' | 'info';

export interface DiagnosticSourceSpan {
  readonly fileName: string;
  readonly line: number;
  readonly column: number;
}

export interface Diagnostic {
  readonly code: string;
  readonly path: string;
  readonly severity: DiagnosticSeverity;
  readonly message: string;
  readonly suggestion?: string;
  readonly span?: DiagnosticSourceSpan;
  readonly entityId?: string;
}

export function formatDiagnostic(diagnostic: Diagnostic): string {
  const location =
    diagnostic.span === undefined
      ? diagnostic.path
      : `${diagnostic.span.fileName}:${diagnostic.span.line}:${diagnostic.span.column}`;
  const suggestion = diagnostic.suggestion === undefined ? '' : ` (${diagnostic.suggestion})`;
  return `[${diagnostic.code}] ${location}: ${diagnostic.message}${suggestion}`;
}

export function hasErrorDiagnostics(diagnostics: readonly Diagnostic[]): boolean {
  return diagnostics.some((diagnostic) => diagnostic.severity === 'error');
}
