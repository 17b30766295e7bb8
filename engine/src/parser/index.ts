/**
 * Parser Module
 *
 * Readers for the step's input declarations and `name=value` blocks.
 *
 * @module parser
 */

export * from './AssignmentParser.js';
export * from './InvocationParser.js';
