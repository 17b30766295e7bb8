/**
 * Log levels, ordered by severity.
 */
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
  FATAL = 'fatal',
}

/**
 * Numeric severity per level (higher is more severe)
 */
export const LogLevelSeverity: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
  [LogLevel.FATAL]: 4,
};

/**
 * Log categories (phase-based, not feature-based)
 *
 * - 'system': Engine setup, configuration, host wiring
 * - 'analysis': Parsing of inputs and assignments, expression evaluation
 * - 'context': Standard-context derivation and metadata lookups
 * - 'output': Merging and projection of the result set
 *
 * Never add feature or variable-family categories here.
 */
export type LogCategory =
  | 'system'
  | 'analysis'
  | 'context'
  | 'output';

/**
 * Enum for log categories (for strict usage)
 */
export enum LogCategoryEnum {
  SYSTEM = 'system',
  ANALYSIS = 'analysis',
  CONTEXT = 'context',
  OUTPUT = 'output',
}

/**
 * Engine-specific log format type
 */
export type EngineLogFormat = 'text' | 'json';

/**
 * A single structured log entry
 */
export interface LogEntry {
  timestamp: Date;
  level: LogLevel;
  category: LogCategory;
  source: string;
  message: string;
  context?: Record<string, unknown>;
  error?: Error;
}

/**
 * Where formatted entries go. The default sink writes to the console;
 * hosts replace it (the action host routes to the runner's log commands).
 */
export type LogSink = (entry: LogEntry, formatted: string) => void;

/**
 * Engine logger configuration
 */
export interface EngineLoggerConfig {
  /** Minimum log level to output */
  level: LogLevel;
  /** Output format */
  format?: EngineLogFormat;
  /** Enable colors in output */
  colors?: boolean;
  /** Include timestamps */
  timestamp?: boolean;
  /** Source identifier */
  source: string;
  /** Log category */
  category: LogCategory;
  /** Output sink */
  sink?: LogSink;
}
