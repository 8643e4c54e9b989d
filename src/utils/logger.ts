/**
 * Structured logging utility.
 *
 * Every component logs through a {@link Logger} that writes one JSON object
 * per line to stderr, keeping stdout free for the chat transcript.
 *
 * @packageDocumentation
 */

/**
 * Severity level for log entries.
 *
 * - `debug`: Detailed diagnostic information for debugging
 * - `info`: General informational messages about normal operation
 * - `warn`: Conditions that don't stop the session but may need attention
 * - `error`: Failures scoped to a turn or a side-effect call
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Log levels in ascending order of severity.
 */
export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'] as const;

/**
 * Represents a structured log entry with timestamp and metadata.
 */
export interface LogEntry {
  /**
   * ISO 8601 timestamp when the log entry was created.
   * @example "2024-01-15T10:30:00.000Z"
   */
  readonly timestamp: string;

  /** Severity level of the log entry. */
  readonly level: LogLevel;

  /**
   * Name of the component that generated this log entry.
   * @example "ModelGateway"
   */
  readonly component: string;

  /**
   * Brief description of the logged event.
   * @example "turn_completed"
   */
  readonly event: string;

  /**
   * Additional structured data associated with the log entry.
   * @example { sessionId: "3f0c…", mode: "BUILDER" }
   */
  readonly data?: Record<string, unknown>;
}

/**
 * Configuration options for creating a Logger instance.
 */
export interface LoggerOptions {
  /** Name of the component using this logger. */
  readonly component: string;

  /**
   * Whether debug-level logging is enabled.
   * When `false` (default), debug() calls are no-ops.
   * @defaultValue false
   */
  readonly debugMode?: boolean;

  /**
   * Lowest level that is written. Debug entries additionally require
   * `debugMode`.
   * @defaultValue 'debug'
   */
  readonly minLevel?: LogLevel;

  /** Sink for serialized lines. Defaults to process.stderr. */
  readonly write?: (line: string) => void;
}

/**
 * Structured logger that outputs JSON-formatted log entries.
 *
 * @example
 * ```typescript
 * const logger = new Logger({ component: 'BlueprintSession', debugMode: true });
 * logger.info('turn_completed', { mode: 'DISCOVERY' });
 * logger.warn('transition_rejected', { from: 'BUILDER', to: 'DISCOVERY' });
 * ```
 */
export class Logger {
  private readonly component: string;
  private readonly debugMode: boolean;
  private readonly minLevel: LogLevel;
  private readonly write: (line: string) => void;

  /**
   * Creates a new Logger instance.
   * @param options - Configuration options for the logger.
   */
  constructor(options: LoggerOptions) {
    this.component = options.component;
    this.debugMode = options.debugMode ?? false;
    this.minLevel = options.minLevel ?? 'debug';
    this.write =
      options.write ??
      ((line: string): void => {
        process.stderr.write(line);
      });
  }

  /**
   * Returns a logger for another component sharing this logger's settings.
   *
   * @param component - Name of the child component.
   */
  child(component: string): Logger {
    return new Logger({
      component,
      debugMode: this.debugMode,
      minLevel: this.minLevel,
      write: this.write,
    });
  }

  /**
   * Logs a debug-level message. Only output when debugMode is enabled.
   */
  debug(event: string, data?: Record<string, unknown>): void {
    if (!this.debugMode) {
      return;
    }
    this.log('debug', event, data);
  }

  /**
   * Logs an info-level message.
   */
  info(event: string, data?: Record<string, unknown>): void {
    this.log('info', event, data);
  }

  /**
   * Logs a warning-level message.
   */
  warn(event: string, data?: Record<string, unknown>): void {
    this.log('warn', event, data);
  }

  /**
   * Logs an error-level message.
   */
  error(event: string, data?: Record<string, unknown>): void {
    this.log('error', event, data);
  }

  private log(level: LogLevel, event: string, data?: Record<string, unknown>): void {
    if (LOG_LEVELS.indexOf(level) < LOG_LEVELS.indexOf(this.minLevel)) {
      return;
    }

    const base: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      component: this.component,
      event,
    };
    const entry: LogEntry = data !== undefined ? { ...base, data } : base;

    this.write(serializeEntry(entry) + '\n');
  }
}

/**
 * Serializes a log entry, replacing data that JSON cannot represent
 * (circular references, BigInt) with a marker so a line is always written.
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
 * Logger that discards everything. Used where a caller opts out of logging.
 */
export const silentLogger = new Logger({ component: 'silent', minLevel: 'error', write: () => {} });

/**
 * Default logger instance for library code that is not handed one.
 */
export const logger = new Logger({ component: 'IdeaBlueprint', debugMode: false });
