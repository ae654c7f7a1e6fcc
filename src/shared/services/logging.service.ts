/**
 * Logging Service
 *
 * Structured logging with RFC 5424 levels, a bounded in-memory history
 * and a pluggable output sink. stdout is left to the CLI's JSON summary.
 */

export type LogLevel =
  | 'debug'
  | 'info'
  | 'notice'
  | 'warning'
  | 'error'
  | 'critical'
  | 'alert'
  | 'emergency';

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: number;
  context?: Record<string, unknown>;
  error?: Error;
}

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  notice(message: string, context?: Record<string, unknown>): void;
  warning(message: string, context?: Record<string, unknown>): void;
  error(message: string, error?: Error, context?: Record<string, unknown>): void;
  critical(message: string, error?: Error, context?: Record<string, unknown>): void;
  alert(message: string, error?: Error, context?: Record<string, unknown>): void;
  emergency(message: string, error?: Error, context?: Record<string, unknown>): void;
}

/**
 * Receives every entry that passes the level filter
 */
export type LogSink = (entry: LogEntry, loggerName: string) => void;

// Log level hierarchy matching RFC 5424 severity levels
const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  notice: 2,
  warning: 3,
  error: 4,
  critical: 5,
  alert: 6,
  emergency: 7,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

/**
 * Format an entry as a single stderr block
 */
export function formatLogEntry(entry: LogEntry, loggerName: string): string {
  const timestamp = new Date(entry.timestamp).toISOString();
  const levelStr = entry.level.toUpperCase().padEnd(8);

  let output = `[${timestamp}] ${levelStr} [${loggerName}] ${entry.message}`;

  if (entry.context && Object.keys(entry.context).length > 0) {
    output += `\n  Context: ${JSON.stringify(entry.context)}`;
  }

  if (entry.error) {
    output += `\n  Error: ${entry.error.message}`;
    if (entry.error.stack) {
      output += `\n  Stack: ${entry.error.stack}`;
    }
  }

  return output;
}

/**
 * Default sink: stderr
 */
export const stderrSink: LogSink = (entry, loggerName) => {
  console.error(formatLogEntry(entry, loggerName));
};

/**
 * Logging Service
 *
 * Centralized logging with configurable minimum level. Entries are kept in a
 * ring of `maxEntries` so callers (and tests) can inspect what was emitted.
 */
export class LoggingService implements Logger {
  private minLevel: LogLevel;
  private logEntries: LogEntry[] = [];
  private readonly maxEntries: number;
  private readonly loggerName: string;
  private sink: LogSink;

  constructor(
    minLevel: LogLevel = 'info',
    maxEntries = 1000,
    loggerName = 'session-harness',
    sink: LogSink = stderrSink,
  ) {
    this.minLevel = minLevel;
    this.maxEntries = maxEntries;
    this.loggerName = loggerName;
    this.sink = sink;
  }

  setSink(sink: LogSink): void {
    this.sink = sink;
  }

  setMinLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  /**
   * Normal but significant
   */
  notice(message: string, context?: Record<string, unknown>): void {
    this.log('notice', message, context);
  }

  warning(message: string, context?: Record<string, unknown>): void {
    this.log('warning', message, context);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.log('error', message, context, error);
  }

  critical(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.log('critical', message, context, error);
  }

  /**
   * Action must be taken immediately
   */
  alert(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.log('alert', message, context, error);
  }

  /**
   * System is unusable
   */
  emergency(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.log('emergency', message, context, error);
  }

  private log(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error,
  ): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const entry: LogEntry = {
      level,
      message,
      timestamp: Date.now(),
      context,
      error,
    };

    this.logEntries.push(entry);
    if (this.logEntries.length > this.maxEntries) {
      this.logEntries.shift();
    }

    try {
      this.sink(entry, this.loggerName);
    } catch (sinkError) {
      // Don't use this.log to avoid infinite recursion
      console.error('[LoggingService] Log sink failed:', sinkError);
      stderrSink(entry, this.loggerName);
    }
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.minLevel];
  }

  /**
   * Get recent log entries, optionally filtered by minimum level
   */
  getRecentLogs(count = 100, minLevel?: LogLevel): LogEntry[] {
    let logs = this.logEntries;

    if (minLevel) {
      const minLevelValue = LOG_LEVELS[minLevel];
      logs = logs.filter((entry) => LOG_LEVELS[entry.level] >= minLevelValue);
    }

    return logs.slice(-count);
  }

  clearLogs(): void {
    this.logEntries = [];
  }

  getLoggerName(): string {
    return this.loggerName;
  }

  getMinLevel(): LogLevel {
    return this.minLevel;
  }
}

/**
 * Global logger instance (singleton pattern)
 */
let globalLogger: LoggingService | null = null;

/**
 * Get or create global logger instance. Honours LOG_LEVEL when it names a known level.
 */
export function getLogger(): LoggingService {
  if (!globalLogger) {
    const envLevel = process.env.LOG_LEVEL;
    globalLogger = new LoggingService(envLevel && isLogLevel(envLevel) ? envLevel : 'info');
  }
  return globalLogger;
}

export function setLogger(logger: LoggingService): void {
  globalLogger = logger;
}
