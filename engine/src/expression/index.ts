/**
 * Expression language
 *
 * @module expression
 */

export * from './ast.js';
export { tokenize, type Token, type TokenType } from './Lexer.js';
export { Parser } from './Parser.js';
export { Evaluator, type EvaluationScope } from './Evaluator.js';
export { FILTERS, TESTS, type FilterCall, type FilterFunction, type TestFunction } from './filters.js';
export * from './values.js';
export * from './ExpressionEvaluator.js';
export { MapScope } from './Scope.js';
