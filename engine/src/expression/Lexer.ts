/**
 * Expression Lexer
 *
 * Turns the text of one expression (without `{{ }}` delimiters) into tokens.
 *
 * @module expression
 */

import { ExpressionError } from '../errors/ExpressionError.js';

export type TokenType = 'string' | 'number' | 'name' | 'operator' | 'eof';

export interface Token {
  type: TokenType;
  /** Source text for names and operators, decoded text for strings */
  value: string;
  /** Offset into the expression */
  position: number;
}

// Longest first so that `//` wins over `/`
const OPERATORS = [
  '**', '//', '==', '!=', '<=', '>=',
  '+', '-', '*', '/', '%', '~', '<', '>', '=',
  '(', ')', '[', ']', '.', ',', '|', ':', '{', '}',
];

const ESCAPES: Record<string, string> = {
  n: '\n',
  t: '\t',
  r: '\r',
  '\\': '\\',
  "'": "'",
  '"': '"',
};

const NAME_START = /[A-Za-z_]/;
const NAME_PART = /[A-Za-z0-9_]/;
const NUMBER = /^\d+(\.\d+)?([eE][+-]?\d+)?/;

export function tokenize(expression: string): Token[] {
  const tokens: Token[] = [];
  let position = 0;

  while (position < expression.length) {
    const char = expression.charAt(position);

    if (/\s/.test(char)) {
      position++;
      continue;
    }

    if (char === '"' || char === "'") {
      const { value, end } = readString(expression, position, char);
      tokens.push({ type: 'string', value, position });
      position = end;
      continue;
    }

    const number = NUMBER.exec(expression.slice(position));
    if (number) {
      tokens.push({ type: 'number', value: number[0], position });
      position += number[0].length;
      continue;
    }

    if (NAME_START.test(char)) {
      let end = position + 1;
      while (end < expression.length && NAME_PART.test(expression.charAt(end))) {
        end++;
      }
      tokens.push({ type: 'name', value: expression.slice(position, end), position });
      position = end;
      continue;
    }

    const operator = OPERATORS.find(op => expression.startsWith(op, position));
    if (operator) {
      tokens.push({ type: 'operator', value: operator, position });
      position += operator.length;
      continue;
    }

    throw ExpressionError.syntax(expression, `unexpected character "${char}"`, position);
  }

  tokens.push({ type: 'eof', value: '', position });
  return tokens;
}

function readString(expression: string, start: number, quote: string): { value: string; end: number } {
  let value = '';
  let position = start + 1;

  while (position < expression.length) {
    const char = expression.charAt(position);
    if (char === quote) {
      return { value, end: position + 1 };
    }
    if (char === '\\' && position + 1 < expression.length) {
      const next = expression.charAt(position + 1);
      value += ESCAPES[next] ?? `\\${next}`;
      position += 2;
      continue;
    }
    value += char;
    position++;
  }

  throw ExpressionError.syntax(expression, 'unterminated string literal', start);
}
