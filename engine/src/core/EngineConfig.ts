/**
 * Engine Configuration
 *
 * Host-facing configuration for PipevarsEngine. Everything that depends on
 * the user's step inputs lives in InvocationConfig instead; this is what
 * the host decides (logging, strictness, the metadata fetcher).
 *
 * @module core
 */

import type { ContextFetcher } from '../context/ContextFetcher.js';
import type { NullabilityMode } from '../context/StandardContextResolver.js';
import type { StandardCatalog } from '../context/StandardCatalog.js';
import type { EngineLogFormat, LogSink } from '../types/log-types.js';

/**
 * Logging level for engine output
 */
export type LogLevelName = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/**
 * Engine configuration options
 *
 * @example
 * ```ts
 * const engine = new PipevarsEngine({
 *   logLevel: 'debug',
 *   nullability: 'strict',
 *   fetcher: new StaticContextFetcher({ pr: { '42': pullRequest } }),
 * });
 * ```
 */
export interface PipevarsEngineConfig {
  /**
   * Logging level
   * @default 'info'
   */
  logLevel?: LogLevelName;

  /**
   * Enable verbose output (equivalent to logLevel='debug')
   * @default false
   */
  verbose?: boolean;

  /**
   * Log line format
   * @default 'text'
   */
  logFormat?: EngineLogFormat;

  /**
   * Where log lines go; defaults to the console
   */
  logSink?: LogSink;

  /**
   * What to do when a standard variable has a value its trigger type
   * forbids: 'strict' throws, 'lenient' records a warning and uses null
   * @default 'lenient'
   */
  nullability?: NullabilityMode;

  /**
   * Metadata lookups for dispatch auto-detection. Without a fetcher
   * auto-detection is skipped.
   */
  fetcher?: ContextFetcher;

  /**
   * Replacement standard-context catalog (already validated)
   */
  catalog?: StandardCatalog;
}

export type ResolvedEngineConfig = Required<Omit<PipevarsEngineConfig, 'logSink' | 'fetcher' | 'catalog'>>
  & Pick<PipevarsEngineConfig, 'logSink' | 'fetcher' | 'catalog'>;

/**
 * Apply default values to engine configuration
 */
export function applyConfigDefaults(config: PipevarsEngineConfig = {}): ResolvedEngineConfig {
  return {
    logLevel: config.verbose ? 'debug' : (config.logLevel ?? 'info'),
    verbose: config.verbose ?? false,
    logFormat: config.logFormat ?? 'text',
    logSink: config.logSink,
    nullability: config.nullability ?? 'lenient',
    fetcher: config.fetcher,
    catalog: config.catalog,
  };
}

/**
 * Validate engine configuration
 *
 * @throws Error if configuration is invalid
 */
export function validateConfig(config: PipevarsEngineConfig): void {
  if (config.logLevel && !['debug', 'info', 'warn', 'error', 'silent'].includes(config.logLevel)) {
    throw new Error(`Invalid logLevel: ${config.logLevel}`);
  }

  if (config.logFormat && !['text', 'json'].includes(config.logFormat)) {
    throw new Error(`Invalid logFormat: ${config.logFormat}`);
  }

  if (config.nullability && !['strict', 'lenient'].includes(config.nullability)) {
    throw new Error(`Invalid nullability: ${config.nullability}. Must be 'strict' or 'lenient'`);
  }
}
