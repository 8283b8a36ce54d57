export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Readonly<Record<LogLevel, number>> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface LogRecord {
  readonly scope: string;
  readonly level: LogLevel;
  readonly message: string;
}

export type LogSink = (record: LogRecord) => void;

export const formatLogRecord = (record: LogRecord): string =>
  `[${record.scope}:${record.level.toUpperCase()}] ${record.message}`;

export const consoleSink: LogSink = (record) => {
  const line = formatLogRecord(record);
  if (record.level === 'error' || record.level === 'warn') {
    console.error(line);
  } else {
    console.log(line);
  }
};

/** Sink that keeps records in memory, for tests and the run report. */
export function createMemorySink(): { readonly sink: LogSink; readonly records: LogRecord[] } {
  const records: LogRecord[] = [];
  return { sink: (record) => records.push(record), records };
}

export class RunLogger {
  private constructor(
    private readonly scopeName: string,
    private readonly sink: LogSink,
    private readonly threshold: LogLevel,
  ) {}

  static scope(scope: string, sink: LogSink = consoleSink, threshold: LogLevel = 'info'): RunLogger {
    return new RunLogger(scope.toUpperCase(), sink, threshold);
  }

  /** Logger for a sub-scope sharing this logger's sink and threshold. */
  child(scope: string): RunLogger {
    return RunLogger.scope(`${this.scopeName}/${scope}`, this.sink, this.threshold);
  }

  private write(level: LogLevel, message: string): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.threshold]) return;
    this.sink({ scope: this.scopeName, level, message });
  }

  debug(message: string): void {
    this.write('debug', message);
  }

  info(message: string): void {
    this.write('info', message);
  }

  warn(message: string): void {
    this.write('warn', message);
  }

  error(message: string): void {
    this.write('error', message);
  }
}
