/**
 * Pipevars Engine - CI pipeline variable resolution
 *
 * @example
 * ```ts
 * import { PipevarsEngine } from '@pipevars/engine';
 *
 * const engine = new PipevarsEngine();
 * const outcome = await engine.resolve({ static_inputs: 'team=core' }, context);
 * ```
 */

// ============================================================================
// PRIMARY EXPORT - Start here!
// ============================================================================

export { PipevarsEngine } from './core/PipevarsEngine.js';

// ============================================================================
// TYPES - Essential types for working with the engine
// ============================================================================

export type { ResolutionOutcome } from './core/PipevarsEngine.js';

export type {
  PipevarsEngineConfig,
  ResolvedEngineConfig,
  LogLevelName,
} from './core/EngineConfig.js';

export * from './types/core-types.js';
export * from './types/log-types.js';

// ============================================================================
// ADVANCED - For hosts and custom tooling
// ============================================================================

// Logging
export { EngineLogger, formatLogEntry, shouldLog, toLogLevel } from './core/EngineLogger.js';
export { LoggerManager } from './logging/LoggerManager.js';

// Parsers
export * from './parser/index.js';

// Expression language
export * from './expression/index.js';

// Standard context and dispatch auto-detection
export * from './context/index.js';

// Merging and projection
export * from './merge/index.js';
export * from './output/index.js';

// Timeouts
export * from './automation/index.js';

// Errors (for error handling)
export * from './errors/index.js';
