/**
 * CLI Logger
 *
 * Structured logging for the CLI's own messages (not the engine's). Uses
 * the engine's level scale so `--verbose` means the same thing on both
 * sides.
 *
 * @module utils
 */

import chalk from 'chalk';
import { LogLevel, LogLevelSeverity } from '@pipevars/engine';

/**
 * CLI log format type
 */
export type CliLogFormat = 'json' | 'pretty';

/**
 * CLI log context (key-value pairs)
 */
export type CliLogContext = Record<string, unknown>;

export interface CliLogEntry {
    timestamp: Date;
    level: LogLevel;
    message: string;
    context?: CliLogContext;
}

/**
 * CLI Logger configuration
 */
export interface CliLoggerConfig {
    /** Minimum log level to output */
    level: LogLevel;

    /** Output format */
    format: CliLogFormat;

    /** Enable colors in output */
    colors: boolean;

    /** Include timestamps */
    timestamps: boolean;

    /** Receives formatted lines; stderr by default */
    write: (line: string) => void;
}

const LEVEL_STYLES: Record<LogLevel, { symbol: string; paint: (text: string) => string }> = {
    [LogLevel.DEBUG]: { symbol: '·', paint: chalk.gray },
    [LogLevel.INFO]: { symbol: 'ℹ', paint: chalk.blue },
    [LogLevel.WARN]: { symbol: '⚠', paint: chalk.yellow },
    [LogLevel.ERROR]: { symbol: '✖', paint: chalk.red },
    [LogLevel.FATAL]: { symbol: '✖', paint: chalk.red.bold },
};

/**
 * CLI Logger class
 */
export class CliLogger {
    private config: CliLoggerConfig;
    private logHistory: CliLogEntry[] = [];

    constructor(config: Partial<CliLoggerConfig> = {}) {
        this.config = {
            level: config.level ?? LogLevel.INFO,
            format: config.format ?? 'pretty',
            colors: config.colors ?? true,
            timestamps: config.timestamps ?? false,
            write: config.write ?? (line => process.stderr.write(`${line}\n`)),
        };
    }

    // ==================== Core Logging Methods ====================

    log(level: LogLevel, message: string, context?: CliLogContext): void {
        if (!this.willLog(level)) {
            return;
        }

        const entry: CliLogEntry = { timestamp: new Date(), level, message, context };
        this.logHistory.push(entry);
        this.config.write(this.format(entry));
    }

    debug(message: string, context?: CliLogContext): void {
        this.log(LogLevel.DEBUG, message, context);
    }

    info(message: string, context?: CliLogContext): void {
        this.log(LogLevel.INFO, message, context);
    }

    warn(message: string, context?: CliLogContext): void {
        this.log(LogLevel.WARN, message, context);
    }

    /**
     * Log error message
     */
    error(message: string, error?: Error, context?: CliLogContext): void {
        const errorContext = error
            ? { ...context, error: { message: error.message, name: error.name } }
            : context;
        this.log(LogLevel.ERROR, message, errorContext);
    }

    /**
     * Check if a level passes the configured minimum
     */
    willLog(level: LogLevel): boolean {
        return LogLevelSeverity[level] >= LogLevelSeverity[this.config.level];
    }

    getHistory(): ReadonlyArray<CliLogEntry> {
        return this.logHistory;
    }

    private format(entry: CliLogEntry): string {
        if (this.config.format === 'json') {
            return JSON.stringify({
                timestamp: entry.timestamp.toISOString(),
                level: entry.level,
                message: entry.message,
                context: entry.context,
            });
        }

        const style = LEVEL_STYLES[entry.level];
        const symbol = this.config.colors ? style.paint(style.symbol) : style.symbol;
        const time = this.config.timestamps ? `${entry.timestamp.toISOString()} ` : '';
        const context = entry.context && Object.keys(entry.context).length > 0
            ? ` ${JSON.stringify(entry.context)}`
            : '';
        return `${time}${symbol} ${entry.message}${context}`;
    }
}

/**
 * Create a CLI logger instance
 */
export function createCliLogger(config?: Partial<CliLoggerConfig>): CliLogger {
    return new CliLogger(config);
}
