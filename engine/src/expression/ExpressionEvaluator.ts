/**
 * Expression Evaluator facade
 *
 * Entry point used by the engine. A value is either a bare expression
 * (`pr_number or 'none'`) or a template that contains `{{ ... }}` blocks:
 *
 * - a template that is exactly one `{{ expr }}` keeps the expression's type
 * - any other template renders each block as text and joins the pieces
 * - `{# ... #}` comments are dropped; `{% ... %}` statements are rejected
 *
 * Results are normalized to a ScalarValue: undefined becomes null, lists
 * and mappings become JSON text.
 *
 * @module expression
 */

import { ExpressionError } from '../errors/ExpressionError.js';
import type { JsonValue, ScalarValue } from '../types/core-types.js';
import type { ExpressionNode } from './ast.js';
import { Evaluator, type EvaluationScope } from './Evaluator.js';
import { Parser } from './Parser.js';
import { Undefined, toJinjaString, type JinjaValue } from './values.js';

/**
 * Parsed form of a value: one expression, or text interleaved with
 * expressions
 */
export type CompiledExpression =
  | { kind: 'expression'; source: string; node: ExpressionNode }
  | { kind: 'template'; source: string; parts: TemplatePart[] };

export type TemplatePart =
  | { kind: 'text'; text: string }
  | { kind: 'expression'; source: string; node: ExpressionNode };

export class ExpressionEvaluator {
  /**
   * Whether text is rendered as a template instead of a bare expression
   */
  static isTemplate(text: string): boolean {
    return text.includes('{{') || text.includes('{%') || text.includes('{#');
  }

  /**
   * Parse without evaluating
   *
   * @throws {ExpressionError} On a syntax error
   */
  static compile(text: string): CompiledExpression {
    if (!this.isTemplate(text)) {
      return { kind: 'expression', source: text, node: Parser.parse(text) };
    }
    return { kind: 'template', source: text, parts: parseTemplate(text) };
  }

  /**
   * Evaluate text to a raw expression value
   */
  static evaluateValue(text: string, scope: EvaluationScope): JinjaValue {
    const compiled = this.compile(text);

    if (compiled.kind === 'expression') {
      return new Evaluator(text, scope).evaluate(compiled.node);
    }

    const evaluator = new Evaluator(text, scope);
    const [only] = compiled.parts;
    if (compiled.parts.length === 1 && only?.kind === 'expression') {
      return evaluator.evaluate(only.node);
    }

    return compiled.parts
      .map(part => (part.kind === 'text' ? part.text : toJinjaString(evaluator.evaluate(part.node))))
      .join('');
  }

  /**
   * Evaluate text and normalize the result to a scalar
   *
   * @throws {ExpressionError} On syntax or evaluation errors
   */
  static evaluate(text: string, scope: EvaluationScope): ScalarValue {
    return this.normalize(this.evaluateValue(text, scope), text);
  }

  static normalize(value: JinjaValue, expression: string): ScalarValue {
    if (value instanceof Undefined) return null;
    if (typeof value === 'number' && !Number.isFinite(value)) {
      throw ExpressionError.unsupported(expression, 'A non-finite number result');
    }
    if (value === null || typeof value !== 'object') return value;
    return JSON.stringify(toJson(value));
  }
}

function toJson(value: JinjaValue): JsonValue {
  if (value instanceof Undefined) return null;
  if (Array.isArray(value)) return value.map(toJson);
  if (value !== null && typeof value === 'object') {
    const result: { [key: string]: JsonValue } = {};
    for (const [key, item] of Object.entries(value)) {
      result[key] = toJson(item);
    }
    return result;
  }
  return value;
}

/**
 * Split template text into literal text and `{{ }}` blocks
 */
function parseTemplate(source: string): TemplatePart[] {
  const parts: TemplatePart[] = [];
  let text = '';
  let position = 0;
  let trimNext = false;

  const pushText = () => {
    if (text !== '') parts.push({ kind: 'text', text });
    text = '';
  };

  while (position < source.length) {
    const open = findOpening(source, position);
    if (open === -1) {
      text += trimNext ? source.slice(position).trimStart() : source.slice(position);
      break;
    }

    let literal = source.slice(position, open);
    if (trimNext) literal = literal.trimStart();
    const marker = source.charAt(open + 1);

    if (marker === '%') {
      throw ExpressionError.unsupported(source, 'Template statements ({% ... %})');
    }

    if (marker === '#') {
      const close = source.indexOf('#}', open + 2);
      if (close === -1) {
        throw ExpressionError.syntax(source, 'unterminated comment', open);
      }
      text += literal;
      position = close + 2;
      trimNext = false;
      continue;
    }

    let start = open + 2;
    if (source.charAt(start) === '-') {
      literal = literal.trimEnd();
      start++;
    }
    text += literal;

    const close = findClosing(source, start);
    if (close === -1) {
      throw ExpressionError.syntax(source, 'unterminated "{{" block', open);
    }

    let end = close;
    trimNext = source.charAt(close - 1) === '-' && close - 1 >= start;
    if (trimNext) end--;

    const expression = source.slice(start, end);
    pushText();
    parts.push({ kind: 'expression', source: expression, node: Parser.parse(expression) });
    position = close + 2;
  }

  pushText();
  return parts;
}

function findOpening(source: string, from: number): number {
  const candidates = ['{{', '{%', '{#']
    .map(marker => source.indexOf(marker, from))
    .filter(index => index !== -1);
  return candidates.length > 0 ? Math.min(...candidates) : -1;
}

/**
 * Index of the `}}` that closes a block, skipping string literals
 */
function findClosing(source: string, from: number): number {
  let quote: string | null = null;
  for (let i = from; i < source.length; i++) {
    const char = source.charAt(i);
    if (quote) {
      if (char === '\\') {
        i++;
      } else if (char === quote) {
        quote = null;
      }
      continue;
    }
    if (char === '"' || char === "'") {
      quote = char;
    } else if (char === '}' && source.charAt(i + 1) === '}') {
      return i;
    }
  }
  return -1;
}
