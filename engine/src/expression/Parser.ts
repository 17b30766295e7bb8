/**
 * Expression Parser
 *
 * Recursive descent over the token stream, following Jinja's operator
 * precedence (lowest first):
 *
 *   x if c else y
 *   or
 *   and
 *   not
 *   == != < <= > >= in, not in   (chained)
 *   + -
 *   ~
 *   * / // %
 *   **
 *   unary - +
 *   primary, .attr, [index], | filter, is test
 *
 * @module expression
 */

import { ExpressionError } from '../errors/ExpressionError.js';
import type { CompareOperator, ExpressionNode } from './ast.js';
import { tokenize, type Token } from './Lexer.js';

const COMPARE_OPERATORS = new Set(['==', '!=', '<', '<=', '>', '>=']);

const LITERAL_NAMES: Record<string, boolean | null> = {
  true: true,
  True: true,
  false: false,
  False: false,
  none: null,
  None: null,
};

export class Parser {
  private readonly tokens: Token[];
  private index = 0;

  constructor(private readonly expression: string) {
    this.tokens = tokenize(expression);
  }

  /**
   * Parse a whole expression; trailing tokens are a syntax error
   */
  static parse(expression: string): ExpressionNode {
    const parser = new Parser(expression);
    if (parser.peek().type === 'eof') {
      throw ExpressionError.syntax(expression, 'expected an expression', 0);
    }
    const node = parser.parseConditional();
    parser.expectEnd();
    return node;
  }

  // ---------------------------------------------------------------------------
  // Precedence levels
  // ---------------------------------------------------------------------------

  private parseConditional(): ExpressionNode {
    let node = this.parseOr();
    while (this.acceptName('if')) {
      const test = this.parseOr();
      const otherwise = this.acceptName('else') ? this.parseConditional() : undefined;
      node = { kind: 'conditional', test, then: node, otherwise };
    }
    return node;
  }

  private parseOr(): ExpressionNode {
    let node = this.parseAnd();
    while (this.acceptName('or')) {
      node = { kind: 'logical', operator: 'or', left: node, right: this.parseAnd() };
    }
    return node;
  }

  private parseAnd(): ExpressionNode {
    let node = this.parseNot();
    while (this.acceptName('and')) {
      node = { kind: 'logical', operator: 'and', left: node, right: this.parseNot() };
    }
    return node;
  }

  private parseNot(): ExpressionNode {
    if (this.acceptName('not')) {
      return { kind: 'not', operand: this.parseNot() };
    }
    return this.parseCompare();
  }

  private parseCompare(): ExpressionNode {
    const first = this.parseAdditive();
    const rest: Array<{ operator: CompareOperator; operand: ExpressionNode }> = [];

    for (;;) {
      const token = this.peek();
      let operator: CompareOperator | undefined;

      if (token.type === 'operator' && COMPARE_OPERATORS.has(token.value)) {
        this.index++;
        operator = toCompareOperator(token.value);
      } else if (this.acceptName('in')) {
        operator = 'in';
      } else if (this.isName(token, 'not') && this.isName(this.peek(1), 'in')) {
        this.index += 2;
        operator = 'not in';
      }

      if (!operator) break;
      rest.push({ operator, operand: this.parseAdditive() });
    }

    return rest.length === 0 ? first : { kind: 'compare', first, rest };
  }

  private parseAdditive(): ExpressionNode {
    let node = this.parseConcat();
    for (let op = this.acceptOperator('+', '-'); op; op = this.acceptOperator('+', '-')) {
      node = { kind: 'binary', operator: op === '+' ? '+' : '-', left: node, right: this.parseConcat() };
    }
    return node;
  }

  private parseConcat(): ExpressionNode {
    let node = this.parseMultiplicative();
    while (this.acceptOperator('~')) {
      node = { kind: 'concat', left: node, right: this.parseMultiplicative() };
    }
    return node;
  }

  private parseMultiplicative(): ExpressionNode {
    let node = this.parsePower();
    for (let op = this.acceptOperator('*', '/', '//', '%'); op; op = this.acceptOperator('*', '/', '//', '%')) {
      const operator = op === '*' ? '*' : op === '/' ? '/' : op === '//' ? '//' : '%';
      node = { kind: 'binary', operator, left: node, right: this.parsePower() };
    }
    return node;
  }

  private parsePower(): ExpressionNode {
    let node = this.parseUnary(true);
    while (this.acceptOperator('**')) {
      node = { kind: 'binary', operator: '**', left: node, right: this.parseUnary(true) };
    }
    return node;
  }

  private parseUnary(withFilters: boolean): ExpressionNode {
    const sign = this.acceptOperator('-', '+');
    let node: ExpressionNode = sign
      ? { kind: 'unary', operator: sign === '-' ? '-' : '+', operand: this.parseUnary(false) }
      : this.parsePostfix(this.parsePrimary());

    if (withFilters) {
      node = this.parseFilters(node);
    }
    return node;
  }

  // ---------------------------------------------------------------------------
  // Primary and postfix
  // ---------------------------------------------------------------------------

  private parsePrimary(): ExpressionNode {
    const token = this.next();

    switch (token.type) {
      case 'string': {
        let value = token.value;
        // adjacent string literals are joined
        while (this.peek().type === 'string') {
          value += this.next().value;
        }
        return { kind: 'literal', value };
      }

      case 'number':
        return { kind: 'literal', value: Number(token.value) };

      case 'name':
        if (Object.hasOwn(LITERAL_NAMES, token.value)) {
          return { kind: 'literal', value: LITERAL_NAMES[token.value] ?? null };
        }
        return { kind: 'name', name: token.value };

      case 'operator':
        if (token.value === '(') {
          const inner = this.parseConditional();
          this.expectOperator(')');
          return inner;
        }
        if (token.value === '[') {
          return { kind: 'list', items: this.parseSequence(']') };
        }
        if (token.value === '{') {
          return this.parseDict();
        }
        break;

      case 'eof':
        throw ExpressionError.syntax(this.expression, 'unexpected end of expression', token.position);
    }

    throw ExpressionError.syntax(this.expression, `unexpected "${token.value}"`, token.position);
  }

  private parsePostfix(target: ExpressionNode): ExpressionNode {
    let node = target;
    for (;;) {
      if (this.acceptOperator('.')) {
        const name = this.next();
        if (name.type === 'name') {
          node = { kind: 'attribute', target: node, name: name.value };
        } else if (name.type === 'number' && /^\d+$/.test(name.value)) {
          node = { kind: 'index', target: node, index: { kind: 'literal', value: Number(name.value) } };
        } else {
          throw ExpressionError.syntax(this.expression, 'expected an attribute name after "."', name.position);
        }
      } else if (this.acceptOperator('[')) {
        const index = this.parseConditional();
        if (this.peek().value === ':') {
          throw ExpressionError.unsupported(this.expression, 'Slicing');
        }
        this.expectOperator(']');
        node = { kind: 'index', target: node, index };
      } else if (this.peekOperator('(')) {
        throw ExpressionError.unsupported(this.expression, 'Calling a function or method');
      } else {
        return node;
      }
    }
  }

  private parseFilters(target: ExpressionNode): ExpressionNode {
    let node = target;
    for (;;) {
      if (this.acceptOperator('|')) {
        const name = this.expectName('a filter name');
        const { args, kwargs } = this.peekOperator('(') ? this.parseCallArgs() : { args: [], kwargs: {} };
        node = { kind: 'filter', target: node, name, args, kwargs };
      } else if (this.acceptName('is')) {
        const negated = this.acceptName('not');
        const name = this.expectName('a test name');
        const args = this.peekOperator('(') ? this.parseCallArgs().args : [];
        node = { kind: 'test', target: node, name, negated, args };
      } else {
        return node;
      }
    }
  }

  private parseCallArgs(): { args: ExpressionNode[]; kwargs: Record<string, ExpressionNode> } {
    this.expectOperator('(');
    const args: ExpressionNode[] = [];
    const kwargs: Record<string, ExpressionNode> = {};

    while (!this.acceptOperator(')')) {
      if (args.length > 0 || Object.keys(kwargs).length > 0) {
        this.expectOperator(',');
        if (this.acceptOperator(')')) break;
      }

      const token = this.peek();
      if (token.type === 'name' && this.peek(1).value === '=' && this.peek(1).type === 'operator') {
        this.index += 2;
        kwargs[token.value] = this.parseConditional();
      } else if (Object.keys(kwargs).length > 0) {
        throw ExpressionError.syntax(this.expression, 'positional argument follows keyword argument', token.position);
      } else {
        args.push(this.parseConditional());
      }
    }

    return { args, kwargs };
  }

  private parseSequence(close: string): ExpressionNode[] {
    const items: ExpressionNode[] = [];
    while (!this.acceptOperator(close)) {
      if (items.length > 0) {
        this.expectOperator(',');
        if (this.acceptOperator(close)) break;
      }
      items.push(this.parseConditional());
    }
    return items;
  }

  private parseDict(): ExpressionNode {
    const entries: Array<{ key: ExpressionNode; value: ExpressionNode }> = [];
    while (!this.acceptOperator('}')) {
      if (entries.length > 0) {
        this.expectOperator(',');
        if (this.acceptOperator('}')) break;
      }
      const key = this.parseConditional();
      this.expectOperator(':');
      entries.push({ key, value: this.parseConditional() });
    }
    return { kind: 'dict', entries };
  }

  // ---------------------------------------------------------------------------
  // Token helpers
  // ---------------------------------------------------------------------------

  private peek(offset = 0): Token {
    const last = this.tokens[this.tokens.length - 1];
    const token = this.tokens[this.index + offset] ?? last;
    if (!token) {
      throw ExpressionError.syntax(this.expression, 'expected an expression', 0);
    }
    return token;
  }

  private next(): Token {
    const token = this.peek();
    if (token.type !== 'eof') {
      this.index++;
    }
    return token;
  }

  private isName(token: Token, name: string): boolean {
    return token.type === 'name' && token.value === name;
  }

  private acceptName(name: string): boolean {
    if (this.isName(this.peek(), name)) {
      this.index++;
      return true;
    }
    return false;
  }

  private peekOperator(operator: string): boolean {
    const token = this.peek();
    return token.type === 'operator' && token.value === operator;
  }

  private acceptOperator(...operators: string[]): string | undefined {
    const token = this.peek();
    if (token.type === 'operator' && operators.includes(token.value)) {
      this.index++;
      return token.value;
    }
    return undefined;
  }

  private expectOperator(operator: string): void {
    const token = this.peek();
    if (!this.acceptOperator(operator)) {
      const found = token.type === 'eof' ? 'end of expression' : `"${token.value}"`;
      throw ExpressionError.syntax(this.expression, `expected "${operator}" but found ${found}`, token.position);
    }
  }

  private expectName(what: string): string {
    const token = this.next();
    if (token.type !== 'name') {
      throw ExpressionError.syntax(this.expression, `expected ${what}`, token.position);
    }
    return token.value;
  }

  private expectEnd(): void {
    const token = this.peek();
    if (token.type !== 'eof') {
      throw ExpressionError.syntax(this.expression, `unexpected "${token.value}"`, token.position);
    }
  }
}

function toCompareOperator(value: string): CompareOperator {
  switch (value) {
    case '==':
    case '!=':
    case '<':
    case '<=':
    case '>':
    case '>=':
      return value;
    default:
      return '==';
  }
}
