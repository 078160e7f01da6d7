/**
 * Structured logging utility.
 *
 * Emits one JSON object per line, by default to stderr.
 *
 * @packageDocumentation
 */

/**
 * Severity level for log entries.
 *
 * - `debug`: Detailed diagnostic information, only emitted in debug mode
 * - `info`: General informational messages about normal operation
 * - `warn`: Conditions that don't prevent operation but may need attention
 * - `error`: Failures reported to the caller
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

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
   * @example "normalize"
   */
  readonly component: string;

  /**
   * Brief description of the logged event.
   * @example "profiles_applied"
   */
  readonly event: string;

  /** Additional structured data associated with the log entry. */
  readonly data?: Record<string, unknown>;
}

/**
 * Destination for serialized log lines.
 */
export type LogSink = (line: string) => void;

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
   * Where serialized entries are written.
   * @defaultValue writes to `process.stderr`
   */
  readonly write?: LogSink;
}

const writeToStderr: LogSink = (line) => {
  process.stderr.write(line);
};

/**
 * Structured logger that outputs JSON-formatted log entries.
 *
 * @example
 * ```typescript
 * const logger = new Logger({ component: 'configuration', debugMode: true });
 * logger.debug('configuration_created', { settings: 4 });
 * ```
 */
export class Logger {
  private readonly component: string;
  private readonly debugMode: boolean;
  private readonly write: LogSink;

  /**
   * Creates a new Logger instance.
   * @param options - Configuration options for the logger.
   */
  constructor(options: LoggerOptions) {
    this.component = options.component;
    this.debugMode = options.debugMode ?? false;
    this.write = options.write ?? writeToStderr;
  }

  /**
   * Returns a logger for another component sharing this logger's mode and sink.
   *
   * @param component - Component name for the new logger.
   */
  child(component: string): Logger {
    return new Logger({ component, debugMode: this.debugMode, write: this.write });
  }

  /**
   * Logs a debug-level message. Only emitted when debugMode is enabled.
   *
   * @param event - Brief description of the event.
   * @param data - Optional structured data for additional context.
   */
  debug(event: string, data?: Record<string, unknown>): void {
    if (!this.debugMode) {
      return;
    }
    this.log('debug', event, data);
  }

  /**
   * Logs an info-level message.
   *
   * @param event - Brief description of the event.
   * @param data - Optional structured data for additional context.
   */
  info(event: string, data?: Record<string, unknown>): void {
    this.log('info', event, data);
  }

  /**
   * Logs a warning-level message.
   *
   * @param event - Brief description of the event.
   * @param data - Optional structured data for additional context.
   */
  warn(event: string, data?: Record<string, unknown>): void {
    this.log('warn', event, data);
  }

  /**
   * Logs an error-level message.
   *
   * @param event - Brief description of the event.
   * @param data - Optional structured data for additional context.
   */
  error(event: string, data?: Record<string, unknown>): void {
    this.log('error', event, data);
  }

  private log(level: LogLevel, event: string, data?: Record<string, unknown>): void {
    const base = {
      timestamp: new Date().toISOString(),
      level,
      component: this.component,
      event,
    };

    const entry: LogEntry = data === undefined ? base : { ...base, data };
    this.write(serializeEntry(entry) + '\n');
  }
}

/**
 * Serializes an entry, replacing data that JSON cannot represent
 * (circular references, BigInt) with a marker and the serialization error.
 */
function serializeEntry(entry: LogEntry): string {
  try {
    return JSON.stringify(entry);
  } catch (error) {
    return JSON.stringify({
      timestamp: entry.timestamp,
      level: entry.level,
      component: entry.component,
      event: entry.event,
      serializationError: error instanceof Error ? error.message : String(error),
      originalData: '[unserializable]',
    });
  }
}

/**
 * Package-wide logger. Debug output is enabled with `SCHEMACONF_DEBUG=true`.
 */
export const logger = new Logger({
  component: 'schemaconf',
  debugMode: process.env['SCHEMACONF_DEBUG'] === 'true',
});
