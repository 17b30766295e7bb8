/**
 * Engine Logger
 *
 * Structured logging for the resolution engine.
 * Supports text and JSON output, level filtering and a pluggable sink,
 * so the same calls end up in a terminal or in the CI runner's log.
 *
 * @module core
 */

import chalk from 'chalk';
import {
  LogLevel,
  LogLevelSeverity,
  type EngineLogFormat,
  type EngineLoggerConfig,
  type LogCategory,
  type LogEntry,
  type LogSink,
} from '../types/log-types.js';

const LEVEL_COLORS: Record<LogLevel, (text: string) => string> = {
  [LogLevel.DEBUG]: chalk.gray,
  [LogLevel.INFO]: chalk.cyan,
  [LogLevel.WARN]: chalk.yellow,
  [LogLevel.ERROR]: chalk.red,
  [LogLevel.FATAL]: chalk.red.bold,
};

/**
 * Check whether `level` passes the `minimum` threshold
 */
export function shouldLog(level: LogLevel, minimum: LogLevel): boolean {
  return LogLevelSeverity[level] >= LogLevelSeverity[minimum];
}

/**
 * Format an entry as a single line
 */
export function formatLogEntry(
  entry: LogEntry,
  options: { format: EngineLogFormat; colors: boolean; timestamp: boolean }
): string {
  if (options.format === 'json') {
    return JSON.stringify({
      timestamp: entry.timestamp.toISOString(),
      level: entry.level,
      category: entry.category,
      source: entry.source,
      message: entry.message,
      context: entry.context,
      error: entry.error ? { name: entry.error.name, message: entry.error.message } : undefined,
    });
  }

  const paint = options.colors ? LEVEL_COLORS[entry.level] : (text: string) => text;
  const parts: string[] = [];
  if (options.timestamp) {
    parts.push(entry.timestamp.toISOString());
  }
  parts.push(paint(entry.level.toUpperCase().padEnd(5)));
  parts.push(`[${entry.source}]`);
  parts.push(entry.message);
  if (entry.context && Object.keys(entry.context).length > 0) {
    parts.push(JSON.stringify(entry.context));
  }
  if (entry.error) {
    parts.push(`(${entry.error.name}: ${entry.error.message})`);
  }
  return parts.join(' ');
}

const consoleSink: LogSink = (entry, formatted) => {
  if (LogLevelSeverity[entry.level] >= LogLevelSeverity[LogLevel.WARN]) {
    console.error(formatted);
  } else {
    console.log(formatted);
  }
};

/**
 * Engine Logger
 */
export class EngineLogger {
  private config: Required<EngineLoggerConfig>;

  constructor(config: EngineLoggerConfig) {
    this.config = {
      level: config.level,
      format: config.format || 'text',
      colors: config.colors ?? true,
      timestamp: config.timestamp ?? false,
      source: config.source || 'pipevars',
      category: config.category,
      sink: config.sink || consoleSink,
    };
  }

  /**
   * Log a debug message
   */
  debug(message: string, context?: Record<string, unknown>, category?: LogCategory, source?: string): void {
    this.log(LogLevel.DEBUG, message, context, undefined, category, source);
  }

  /**
   * Log an info message
   */
  info(message: string, context?: Record<string, unknown>, category?: LogCategory, source?: string): void {
    this.log(LogLevel.INFO, message, context, undefined, category, source);
  }

  /**
   * Log a warning message
   */
  warn(message: string, context?: Record<string, unknown>, category?: LogCategory, source?: string): void {
    this.log(LogLevel.WARN, message, context, undefined, category, source);
  }

  /**
   * Log an error message
   */
  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.log(LogLevel.ERROR, message, context, error);
  }

  /**
   * Log a fatal error message
   */
  fatal(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.log(LogLevel.FATAL, message, context, error);
  }

  private log(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error,
    category?: LogCategory,
    source?: string
  ): void {
    if (!shouldLog(level, this.config.level)) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date(),
      level,
      category: category ?? this.config.category,
      source: source ?? this.config.source,
      message,
      context,
      error,
    };

    this.config.sink(entry, formatLogEntry(entry, this.config));
  }

  /**
   * Update minimum level
   */
  setLevel(level: LogLevel): void {
    this.config.level = level;
  }

  /**
   * Replace the output sink
   */
  setSink(sink: LogSink): void {
    this.config.sink = sink;
  }

  /**
   * Update format
   */
  setFormat(format: EngineLogFormat): void {
    this.config.format = format;
  }

  /**
   * Check if a level will be logged
   */
  willLog(level: LogLevel): boolean {
    return shouldLog(level, this.config.level);
  }

  /**
   * Get current configuration
   */
  getConfig(): Readonly<EngineLoggerConfig> {
    return { ...this.config };
  }
}

/**
 * Map the user-facing level name to a logger level.
 * Returns null for 'silent'.
 */
export function toLogLevel(logLevel: 'debug' | 'info' | 'warn' | 'error' | 'silent'): LogLevel | null {
  if (logLevel === 'silent') {
    return null;
  }

  const levelMap: Record<'debug' | 'info' | 'warn' | 'error', LogLevel> = {
    debug: LogLevel.DEBUG,
    info: LogLevel.INFO,
    warn: LogLevel.WARN,
    error: LogLevel.ERROR,
  };

  return levelMap[logLevel];
}
