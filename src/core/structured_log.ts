/**
 * Structured Logging
 *
 * Event-name + structured-data logging used by the orchestrator, snapshot
 * store and executors. Entries are kept in a bounded in-memory buffer so the
 * CLI and tests can inspect what happened during a run.
 */

/**
 * Log level enum
 */
export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
  FATAL = 'FATAL',
}

const LEVEL_ORDER: readonly LogLevel[] = [
  LogLevel.DEBUG,
  LogLevel.INFO,
  LogLevel.WARN,
  LogLevel.ERROR,
  LogLevel.FATAL,
];

/**
 * Structured log entry
 */
export interface LogEntry {
  /** Timestamp (ISO format) */
  timestamp: string;

  level: LogLevel;

  /** Event name, snake_case */
  event: string;

  data?: Record<string, unknown>;

  /** Trace ID for correlating the entries of one run */
  traceId: string;

  error?: {
    message: string;
    stack?: string;
    name?: string;
  };
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
  /** Minimum log level to record */
  minLevel?: LogLevel;

  /** Write entries to the console (stderr for every level) */
  consoleOutput?: boolean;

  /** Maximum number of entries to keep in memory */
  maxEntries?: number;

  /** Trace ID used when a call does not pass one */
  defaultTraceId?: string;
}

/**
 * Map a configuration string (`warn`, `INFO`, ...) to a LogLevel
 */
export function parseLogLevel(value: string | undefined, fallback: LogLevel = LogLevel.WARN): LogLevel {
  if (!value) {
    return fallback;
  }
  const upper = value.trim().toUpperCase();
  return LEVEL_ORDER.find(level => level === upper) ?? fallback;
}

/**
 * Structured Logger.
 *
 * Example:
 * ```typescript
 * const logger = new StructuredLogger({ minLevel: LogLevel.INFO });
 *
 * logger.info('plan_validated', { overall: 'MEDIUM', commands: 2 }, traceId);
 * logger.warn('command_timed_out', { index: 0, timeoutMs: 5000 }, traceId);
 *
 * const transitions = logger.getEntriesByTraceId(traceId);
 * ```
 */
export class StructuredLogger {
  private config: Required<LoggerConfig>;
  private entries: LogEntry[] = [];

  constructor(config: LoggerConfig = {}) {
    this.config = {
      minLevel: config.minLevel ?? LogLevel.INFO,
      consoleOutput: config.consoleOutput !== false,
      maxEntries: config.maxEntries ?? 1000,
      defaultTraceId: config.defaultTraceId ?? 'cmdgate',
    };
  }

  debug(event: string, data?: Record<string, unknown>, traceId?: string): void {
    this.log(LogLevel.DEBUG, event, data, traceId);
  }

  info(event: string, data?: Record<string, unknown>, traceId?: string): void {
    this.log(LogLevel.INFO, event, data, traceId);
  }

  warn(event: string, data?: Record<string, unknown>, traceId?: string): void {
    this.log(LogLevel.WARN, event, data, traceId);
  }

  error(event: string, data?: Record<string, unknown>, traceId?: string, error?: Error): void {
    this.log(LogLevel.ERROR, event, data, traceId, error);
  }

  fatal(event: string, data?: Record<string, unknown>, traceId?: string, error?: Error): void {
    this.log(LogLevel.FATAL, event, data, traceId, error);
  }

  private log(
    level: LogLevel,
    event: string,
    data?: Record<string, unknown>,
    traceId?: string,
    error?: Error
  ): void {
    if (LEVEL_ORDER.indexOf(level) < LEVEL_ORDER.indexOf(this.config.minLevel)) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      event,
      data,
      traceId: traceId ?? this.config.defaultTraceId,
      error: error ? { message: error.message, stack: error.stack, name: error.name } : undefined,
    };

    this.entries.push(entry);
    if (this.entries.length > this.config.maxEntries) {
      this.entries = this.entries.slice(-this.config.maxEntries);
    }

    if (this.config.consoleOutput) {
      this.outputToConsole(entry);
    }
  }

  /**
   * stdout belongs to command output, so every level goes to stderr
   */
  private outputToConsole(entry: LogEntry): void {
    let message = `[${entry.timestamp}] [${entry.traceId}] [${entry.level}] ${entry.event}`;

    if (entry.data && Object.keys(entry.data).length > 0) {
      message += ` ${JSON.stringify(entry.data)}`;
    }

    if (entry.error) {
      message += ` ERROR: ${entry.error.message}`;
    }

    console.error(message);
  }

  getEntries(): LogEntry[] {
    return [...this.entries];
  }

  getEntriesByLevel(level: LogLevel): LogEntry[] {
    return this.entries.filter(e => e.level === level);
  }

  /**
   * Get entries by event (supports `*` wildcards)
   */
  getEntriesByEvent(eventPattern: string): LogEntry[] {
    if (!eventPattern.includes('*')) {
      return this.entries.filter(e => e.event === eventPattern);
    }
    const escaped = eventPattern.replace(/[.+?^${}()|[\]\\]/g, '\\$&');
    const regex = new RegExp('^' + escaped.replace(/\*/g, '.*') + '$');
    return this.entries.filter(e => regex.test(e.event));
  }

  getEntriesByTraceId(traceId: string): LogEntry[] {
    return this.entries.filter(e => e.traceId === traceId);
  }

  clear(): void {
    this.entries = [];
  }
}

/**
 * Logger that records entries without writing to the console
 */
export function createSilentLogger(minLevel: LogLevel = LogLevel.DEBUG): StructuredLogger {
  return new StructuredLogger({ minLevel, consoleOutput: false });
}
