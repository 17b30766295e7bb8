/**
 * Output projection
 *
 * @module output
 */

export * from './ValueCodec.js';
export * from './OutputProjector.js';
