import { LogCategoryEnum, LogLevel, type EngineLoggerConfig } from '../types/log-types.js';
import { EngineLogger } from '../core/EngineLogger.js';

/**
 * Singleton Logger Manager
 *
 * Provides centralized access to the EngineLogger instance without
 * needing to pass it through constructors.
 *
 * Usage:
 * ```typescript
 * // In the entry point (PipevarsEngine or a host)
 * LoggerManager.initialize({ level: LogLevel.INFO, source: 'pipevars', category: 'system' });
 *
 * // In any other file (parsers, resolvers, projector, ...)
 * const logger = LoggerManager.tryGetLogger();
 * logger?.debug('Parsed assignments', { count: 3 });
 * ```
 */
export class LoggerManager {
    private static instance: EngineLogger | null = null;

    /**
     * Initialize the logger instance (call once in main entry point).
     * Returns the existing instance when already initialized.
     */
    static initialize(config: Partial<EngineLoggerConfig> = {}): EngineLogger {
        if (this.instance) {
            return this.instance;
        }

        const defaultConfig: EngineLoggerConfig = {
            level: LogLevel.INFO,
            format: 'text',
            colors: true,
            timestamp: false,
            source: 'pipevars',
            category: LogCategoryEnum.SYSTEM,
        };

        const mergedConfig: EngineLoggerConfig = { ...defaultConfig, ...config };
        this.instance = new EngineLogger(mergedConfig);

        this.instance.debug('LoggerManager initialized', {
            level: mergedConfig.level,
            format: mergedConfig.format,
            source: mergedConfig.source,
        });

        return this.instance;
    }

    /**
     * Get the logger instance (accessible from anywhere)
     *
     * @throws Error if logger not initialized
     */
    static getLogger(): EngineLogger {
        if (!this.instance) {
            throw new Error('[LoggerManager] Logger accessed before initialization. Call LoggerManager.initialize() first.');
        }
        return this.instance;
    }

    /**
     * The logger when one was initialized, otherwise null. Library code
     * logs through this so it also runs without an engine or host.
     */
    static tryGetLogger(): EngineLogger | null {
        return this.instance;
    }

    /**
     * Check if logger is initialized
     */
    static isReady(): boolean {
        return this.instance !== null;
    }

    /**
     * Reset the logger instance (useful for testing)
     */
    static reset(): void {
        this.instance = null;
    }
}
