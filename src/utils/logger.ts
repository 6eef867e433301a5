/**
 * Structured logging for the enrichment scan.
 *
 * Every entry is a single JSON line on stderr so that stdout stays free for
 * command output and the log can be piped straight into `jq`.
 *
 * @packageDocumentation
 */

/**
 * Severity level for log entries.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * All log levels, lowest severity first.
 */
export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

const LEVEL_PRIORITY: Readonly<Record<LogLevel, number>> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Checks whether a string names a log level.
 *
 * @param value - Candidate level name.
 * @returns True if the value is a valid LogLevel.
 */
export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * A structured log entry as written to the sink.
 */
export interface LogEntry {
  /**
   * ISO 8601 timestamp when the entry was created.
   * @example "2024-01-15T10:30:00.000Z"
   */
  readonly timestamp: string;
  readonly level: LogLevel;
  /**
   * Name of the component that produced the entry.
   * @example "EnrichmentClient"
   */
  readonly component: string;
  /**
   * Short snake_case event name.
   * @example "submission_failed"
   */
  readonly event: string;
  readonly data?: Record<string, unknown>;
}

/**
 * Options for creating a Logger.
 */
export interface LoggerOptions {
  /** Component name stamped on every entry. */
  readonly component: string;

  /**
   * Minimum level that is written. Entries below it are dropped.
   * @defaultValue 'info'
   */
  readonly level?: LogLevel;

  /**
   * Destination for serialised lines (injectable for testing).
   * @defaultValue writes to process.stderr
   */
  readonly sink?: (line: string) => void;

  /** Clock used for timestamps (injectable for testing). */
  readonly now?: () => Date;
}

function defaultSink(line: string): void {
  process.stderr.write(line);
}

/**
 * Structured logger that writes JSON lines.
 *
 * @example
 * ```typescript
 * const logger = new Logger({ component: 'ScanRunner', level: 'debug' });
 * logger.info('window_started', { window: '1-101', genes: 100 });
 * ```
 */
export class Logger {
  private readonly component: string;
  private readonly level: LogLevel;
  private readonly sink: (line: string) => void;
  private readonly now: () => Date;

  constructor(options: LoggerOptions) {
    this.component = options.component;
    this.level = options.level ?? 'info';
    this.sink = options.sink ?? defaultSink;
    this.now = options.now ?? ((): Date => new Date());
  }

  /**
   * Creates a logger for another component sharing this logger's level and sink.
   *
   * @param component - Component name for the new logger.
   * @returns A new Logger.
   */
  child(component: string): Logger {
    return new Logger({ component, level: this.level, sink: this.sink, now: this.now });
  }

  /**
   * Whether entries at the given level would be written.
   */
  isEnabled(level: LogLevel): boolean {
    return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[this.level];
  }

  debug(event: string, data?: Record<string, unknown>): void {
    this.log('debug', event, data);
  }

  info(event: string, data?: Record<string, unknown>): void {
    this.log('info', event, data);
  }

  warn(event: string, data?: Record<string, unknown>): void {
    this.log('warn', event, data);
  }

  error(event: string, data?: Record<string, unknown>): void {
    this.log('error', event, data);
  }

  private log(level: LogLevel, event: string, data?: Record<string, unknown>): void {
    if (!this.isEnabled(level)) {
      return;
    }

    const base: LogEntry = {
      timestamp: this.now().toISOString(),
      level,
      component: this.component,
      event,
    };
    const entry: LogEntry = data === undefined ? base : { ...base, data };

    this.sink(serializeEntry(entry) + '\n');
  }
}

/**
 * Serialises an entry, falling back to a placeholder when the data payload
 * cannot be represented as JSON (cycles, BigInt).
 */
function serializeEntry(entry: LogEntry): string {
  try {
    return JSON.stringify(entry);
  } catch (error) {
    const { data: _data, ...rest } = entry;
    return JSON.stringify({
      ...rest,
      serializationError: error instanceof Error ? error.message : String(error),
      originalData: '[unserializable]',
    });
  }
}

/**
 * A logger that drops everything. Useful as a default for library callers.
 */
export const silentLogger = new Logger({
  component: 'silent',
  level: 'error',
  sink: (): void => {},
});
