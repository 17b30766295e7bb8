/**
 * Errors Module
 *
 * Structured, code-carrying errors for every phase of a resolution.
 *
 * @module errors
 */

export * from './ErrorCodes.js';
export * from './PipevarsError.js';
export * from './InputErrors.js';
export * from './ExpressionError.js';
export * from './ContextErrors.js';
export * from './OutputErrors.js';
export * from './TypoDetector.js';
