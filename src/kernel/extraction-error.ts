import type { Diagnostic } from './diagnostics.js';

export type ExtractionErrorCode =
  | 'CONFIG_INVALID'
  | 'SOURCE_LOAD_FAILED'
  | 'SOURCE_UNSUPPORTED_SYNTAX'
  | 'ENTRY_POINT_EXECUTION_FAILED'
  | 'STATEMENT_EXECUTION_FAILED'
  | 'GUEST_TYPE_ERROR'
  | 'GUEST_THROW'
  | 'OUTPUT_VALIDATION_FAILED';

export type ExtractionErrorContext = Readonly<Record<string, unknown>>;

export type SourceUnsupportedSyntaxContext = {
  readonly fileName: string;
  readonly diagnostics: readonly Diagnostic[];
};

export type ConfigInvalidContext = {
  readonly configPath?: string;
  readonly issues: readonly string[];
};

export type GuestThrowContext = {
  readonly thrown: unknown;
};

type ExtractionErrorContextByCode = {
  readonly SOURCE_UNSUPPORTED_SYNTAX: SourceUnsupportedSyntaxContext;
  readonly CONFIG_INVALID: ConfigInvalidContext;
  readonly GUEST_THROW: GuestThrowContext;
};

export type ExtractionErrorContextForCode<C extends ExtractionErrorCode> =
  C extends keyof ExtractionErrorContextByCode ? ExtractionErrorContextByCode[C] : ExtractionErrorContext;

const FATAL_CODES: ReadonlySet<ExtractionErrorCode> = new Set([
  'CONFIG_INVALID',
  'SOURCE_LOAD_FAILED',
  'SOURCE_UNSUPPORTED_SYNTAX',
]);

export class ExtractionError<C extends ExtractionErrorCode = ExtractionErrorCode> extends Error {
  readonly code: C;
  readonly context?: ExtractionErrorContextForCode<C>;

  constructor(code: C, message: string, context?: ExtractionErrorContextForCode<C>) {
    super(message);
    this.name = 'ExtractionError';
    this.code = code;
    if (context !== undefined) {
      this.context = context;
    }
  }
}

export function createExtractionError<C extends ExtractionErrorCode>(
  code: C,
  message: string,
  context?: ExtractionErrorContextForCode<C>,
): ExtractionError<C> {
  return new ExtractionError(code, message, context);
}

export function configInvalidError(
  message: string,
  context: ExtractionErrorContextForCode<'CONFIG_INVALID'>,
): ExtractionError<'CONFIG_INVALID'> {
  return createExtractionError('CONFIG_INVALID', message, context);
}

export function sourceLoadFailedError(
  message: string,
  context?: ExtractionErrorContextForCode<'SOURCE_LOAD_FAILED'>,
): ExtractionError<'SOURCE_LOAD_FAILED'> {
  return createExtractionError('SOURCE_LOAD_FAILED', message, context);
}

export function unsupportedSyntaxError(
  message: string,
  context: ExtractionErrorContextForCode<'SOURCE_UNSUPPORTED_SYNTAX'>,
): ExtractionError<'SOURCE_UNSUPPORTED_SYNTAX'> {
  return createExtractionError('SOURCE_UNSUPPORTED_SYNTAX', message, context);
}

export function guestTypeError(message: string, context?: ExtractionErrorContext): ExtractionError<'GUEST_TYPE_ERROR'> {
  return createExtractionError('GUEST_TYPE_ERROR', message, context);
}

export function guestThrowError(thrown: unknown): ExtractionError<'GUEST_THROW'> {
  return createExtractionError('GUEST_THROW', describeThrown(thrown), { thrown });
}

export function isExtractionError(error: unknown): error is ExtractionError {
  return error instanceof ExtractionError;
}

export function isFatalExtractionError(error: unknown): error is ExtractionError {
  return isExtractionError(error) && FATAL_CODES.has(error.code);
}

/** The value guest code observes in a `catch` clause for a host-side failure. */
export function thrownValueOf(error: unknown): unknown {
  if (isExtractionError(error) && error.code === 'GUEST_THROW') {
    const context = error.context;
    return context !== undefined && 'thrown' in context ? context.thrown : error;
  }
  return error;
}

export function describeThrown(thrown: unknown): string {
  if (thrown instanceof Error) {
    return thrown.message;
  }
  if (typeof thrown === 'object' && thrown !== null && 'message' in thrown && typeof thrown.message === 'string') {
    return thrown.message;
  }
  return String(thrown);
}

/** Detail lines carried by a fatal error: syntax diagnostics or configuration issues. */
export function errorDetails(error: unknown): string[] {
  if (!isExtractionError(error) || error.context === undefined) {
    return [];
  }
  const context: ExtractionErrorContext = error.context;
  const details: string[] = [];
  for (const key of ['diagnostics', 'issues']) {
    const entries: unknown = context[key];
    if (!Array.isArray(entries)) continue;
    for (const entry of entries) {
      details.push(typeof entry === 'string' ? entry : describeDetail(entry));
    }
  }
  return details;
}

const describeDetail = (entry: unknown): string => {
  if (typeof entry !== 'object' || entry === null) {
    return String(entry);
  }
  const code = 'code' in entry ? String(entry.code) : 'DETAIL';
  const path = 'path' in entry ? String(entry.path) : '';
  const message = 'message' in entry ? String(entry.message) : '';
  return `[${code}] ${path}: ${message}`;
};
