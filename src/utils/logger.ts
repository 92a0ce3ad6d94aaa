/**
 * Structured logging for the loaders.
 *
 * Writes one JSON object per line to stderr. The decoder itself never logs;
 * only the source loaders do, under the `ConfigLoader` component.
 *
 * @packageDocumentation
 */

/**
 * Severity level for log entries.
 */
export type LogLevel = 'debug' | 'warn';

/**
 * A structured log entry as written to stderr.
 */
export interface LogEntry {
  /**
   * ISO 8601 timestamp when the entry was created.
   * @example "2024-01-15T10:30:00.000Z"
   */
  readonly timestamp: string;
  readonly level: LogLevel;
  /**
   * Source of the entry.
   * @example "ConfigLoader"
   */
  readonly component: string;
  /**
   * Short snake_case event name.
   * @example "source_loaded"
   */
  readonly event: string;
  readonly data?: Record<string, unknown>;
}

/**
 * Options for creating a Logger.
 */
export interface LoggerOptions {
  readonly component: string;
  /**
   * Whether debug entries are written.
   * @defaultValue false
   */
  readonly debugMode?: boolean;
}

/**
 * Serializes an entry, falling back to an entry without `data` when the data
 * cannot be turned into JSON (circular references, BigInt values).
 */
function serialize(entry: LogEntry): string {
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
 * Structured logger that outputs JSON-formatted entries to stderr.
 *
 * @example
 * ```typescript
 * const logger = new Logger({ component: 'ConfigLoader', debugMode: true });
 * logger.debug('source_loaded', { source: 'file', location: 'app.toml' });
 * ```
 */
export class Logger {
  private readonly component: string;
  private readonly debugMode: boolean;

  /**
   * @param options - Component name and debug switch.
   */
  constructor(options: LoggerOptions) {
    this.component = options.component;
    this.debugMode = options.debugMode ?? false;
  }

  /**
   * Logs a debug entry. A no-op unless debug mode is on.
   */
  debug(event: string, data?: Record<string, unknown>): void {
    if (!this.debugMode) {
      return;
    }
    this.log('debug', event, data);
  }

  /**
   * Logs a warning entry, written whatever the debug mode.
   */
  warn(event: string, data?: Record<string, unknown>): void {
    this.log('warn', event, data);
  }

  private log(level: LogLevel, event: string, data?: Record<string, unknown>): void {
    const base = {
      timestamp: new Date().toISOString(),
      level,
      component: this.component,
      event,
    };
    const entry: LogEntry = data === undefined ? base : { ...base, data };
    process.stderr.write(serialize(entry) + '\n');
  }
}
