/**
 * Expression Evaluator
 *
 * Walks a parsed ExpressionNode against a scope. Semantics follow Jinja:
 * `and`/`or` return an operand, comparisons chain, undefined names are
 * falsy and render empty, and touching an undefined value in any other
 * way raises an ExpressionError.
 *
 * @module expression
 */

import { ExpressionError } from '../errors/ExpressionError.js';
import type { ArithmeticOperator, CompareOperator, ExpressionNode } from './ast.js';
import { FILTERS, TESTS } from './filters.js';
import {
  Undefined,
  asNumber,
  isObject,
  isTruthy,
  jinjaEquals,
  toJinjaString,
  typeName,
  type JinjaObject,
  type JinjaValue,
} from './values.js';

/**
 * Names visible to an expression
 */
export interface EvaluationScope {
  /** Value of `name`, or undefined when it is not in scope */
  lookup(name: string): JinjaValue | undefined;
}

export class Evaluator {
  constructor(
    private readonly expression: string,
    private readonly scope: EvaluationScope
  ) {}

  evaluate(node: ExpressionNode): JinjaValue {
    switch (node.kind) {
      case 'literal':
        return node.value;

      case 'list':
        return node.items.map(item => this.evaluate(item));

      case 'dict': {
        const result: JinjaObject = {};
        for (const entry of node.entries) {
          result[toJinjaString(this.evaluate(entry.key))] = this.evaluate(entry.value);
        }
        return result;
      }

      case 'name':
        return this.scope.lookup(node.name) ?? new Undefined(node.name);

      case 'attribute':
        return this.member(this.evaluate(node.target), node.name, describe(node));

      case 'index':
        return this.member(this.evaluate(node.target), this.evaluate(node.index), describe(node));

      case 'unary': {
        const operand = this.evaluate(node.operand);
        const value = asNumber(operand);
        if (operand instanceof Undefined) {
          throw ExpressionError.undefinedAccess(this.expression, operand.hint, `unary ${node.operator}`);
        }
        if (value === null) {
          throw ExpressionError.typeMismatch(this.expression, `unary ${node.operator}`, typeName(operand), typeName(operand));
        }
        return node.operator === '-' ? -value : value;
      }

      case 'not':
        return !isTruthy(this.evaluate(node.operand));

      case 'binary':
        return this.arithmetic(node.operator, this.evaluate(node.left), this.evaluate(node.right));

      case 'concat':
        return toJinjaString(this.evaluate(node.left)) + toJinjaString(this.evaluate(node.right));

      case 'logical': {
        const left = this.evaluate(node.left);
        if (node.operator === 'or') {
          return isTruthy(left) ? left : this.evaluate(node.right);
        }
        return isTruthy(left) ? this.evaluate(node.right) : left;
      }

      case 'compare': {
        let left = this.evaluate(node.first);
        for (const { operator, operand } of node.rest) {
          const right = this.evaluate(operand);
          if (!this.compare(operator, left, right)) {
            return false;
          }
          left = right;
        }
        return true;
      }

      case 'conditional':
        if (isTruthy(this.evaluate(node.test))) {
          return this.evaluate(node.then);
        }
        return node.otherwise ? this.evaluate(node.otherwise) : new Undefined('else branch');

      case 'filter': {
        const filter = FILTERS.get(node.name);
        if (!filter) {
          throw ExpressionError.unknownFilter(this.expression, node.name, [...FILTERS.keys()]);
        }
        const kwargs: Record<string, JinjaValue> = {};
        for (const [key, value] of Object.entries(node.kwargs)) {
          kwargs[key] = this.evaluate(value);
        }
        return filter(this.evaluate(node.target), {
          expression: this.expression,
          name: node.name,
          args: node.args.map(arg => this.evaluate(arg)),
          kwargs,
        });
      }

      case 'test': {
        const test = TESTS.get(node.name);
        if (!test) {
          throw ExpressionError.unknownTest(this.expression, node.name, [...TESTS.keys()]);
        }
        const result = test(this.evaluate(node.target), node.args.map(arg => this.evaluate(arg)));
        return node.negated ? !result : result;
      }
    }
  }

  /**
   * `target.key` and `target[key]`. Missing members are undefined; members
   * of an undefined value are an error.
   */
  private member(target: JinjaValue, key: JinjaValue, hint: string): JinjaValue {
    if (target instanceof Undefined) {
      throw ExpressionError.undefinedAccess(this.expression, target.hint, `attribute access (${hint})`);
    }

    if (isObject(target)) {
      const name = typeof key === 'string' ? key : toJinjaString(key);
      return Object.hasOwn(target, name) ? target[name] : new Undefined(hint);
    }

    if ((Array.isArray(target) || typeof target === 'string') && typeof key === 'number' && Number.isInteger(key)) {
      const index = key < 0 ? target.length + key : key;
      if (index < 0 || index >= target.length) {
        return new Undefined(hint);
      }
      return Array.isArray(target) ? target[index] : target.charAt(index);
    }

    return new Undefined(hint);
  }

  private arithmetic(operator: ArithmeticOperator, left: JinjaValue, right: JinjaValue): JinjaValue {
    if (left instanceof Undefined || right instanceof Undefined) {
      const missing = left instanceof Undefined ? left : right;
      throw ExpressionError.undefinedAccess(this.expression, missing instanceof Undefined ? missing.hint : '', `"${operator}"`);
    }

    if (operator === '+') {
      if (typeof left === 'string' && typeof right === 'string') return left + right;
      if (Array.isArray(left) && Array.isArray(right)) return [...left, ...right];
    }

    if (operator === '*') {
      const repeated = this.repeat(left, right) ?? this.repeat(right, left);
      if (repeated !== null) return repeated;
    }

    const a = asNumber(left);
    const b = asNumber(right);
    if (a === null || b === null) {
      throw ExpressionError.typeMismatch(this.expression, operator, typeName(left), typeName(right));
    }

    switch (operator) {
      case '+':
        return a + b;
      case '-':
        return a - b;
      case '*':
        return a * b;
      case '**':
        return a ** b;
      case '/':
        if (b === 0) throw ExpressionError.divisionByZero(this.expression);
        return a / b;
      case '//':
        if (b === 0) throw ExpressionError.divisionByZero(this.expression);
        return Math.floor(a / b);
      case '%':
        if (b === 0) throw ExpressionError.divisionByZero(this.expression);
        return ((a % b) + b) % b;
    }
  }

  /**
   * `'ab' * 2` and `[1] * 2`
   */
  private repeat(sequence: JinjaValue, times: JinjaValue): JinjaValue | null {
    const count = typeof times === 'number' && Number.isInteger(times) ? Math.max(times, 0) : null;
    if (count === null) return null;
    if (typeof sequence === 'string') return sequence.repeat(count);
    if (Array.isArray(sequence)) {
      const result: JinjaValue[] = [];
      for (let i = 0; i < count; i++) result.push(...sequence);
      return result;
    }
    return null;
  }

  private compare(operator: CompareOperator, left: JinjaValue, right: JinjaValue): boolean {
    switch (operator) {
      case '==':
        return jinjaEquals(left, right);
      case '!=':
        return !jinjaEquals(left, right);
      case 'in':
        return this.contains(right, left);
      case 'not in':
        return !this.contains(right, left);
      default:
        return this.order(operator, left, right);
    }
  }

  private contains(container: JinjaValue, item: JinjaValue): boolean {
    if (container instanceof Undefined) {
      return false;
    }
    if (typeof container === 'string') {
      if (typeof item !== 'string') {
        throw ExpressionError.typeMismatch(this.expression, 'in', typeName(item), 'str');
      }
      return container.includes(item);
    }
    if (Array.isArray(container)) {
      return container.some(element => jinjaEquals(element, item));
    }
    if (isObject(container)) {
      return typeof item === 'string' && Object.hasOwn(container, item);
    }
    throw ExpressionError.typeMismatch(this.expression, 'in', typeName(item), typeName(container));
  }

  private order(operator: '<' | '<=' | '>' | '>=', left: JinjaValue, right: JinjaValue): boolean {
    if (left instanceof Undefined || right instanceof Undefined) {
      const missing = left instanceof Undefined ? left.hint : right instanceof Undefined ? right.hint : '';
      throw ExpressionError.undefinedAccess(this.expression, missing, `comparison (${operator})`);
    }

    let a: number | string;
    let b: number | string;
    const leftNumber = asNumber(left);
    const rightNumber = asNumber(right);

    if (leftNumber !== null && rightNumber !== null) {
      a = leftNumber;
      b = rightNumber;
    } else if (typeof left === 'string' && typeof right === 'string') {
      a = left;
      b = right;
    } else {
      throw ExpressionError.typeMismatch(this.expression, operator, typeName(left), typeName(right));
    }

    switch (operator) {
      case '<':
        return a < b;
      case '<=':
        return a <= b;
      case '>':
        return a > b;
      case '>=':
        return a >= b;
    }
  }
}

/**
 * Source-like text of a name, attribute or index chain
 */
function describe(node: ExpressionNode): string {
  switch (node.kind) {
    case 'name':
      return node.name;
    case 'attribute':
      return `${describe(node.target)}.${node.name}`;
    case 'index':
      return `${describe(node.target)}[${node.index.kind === 'literal' ? JSON.stringify(node.index.value) : '...'}]`;
    default:
      return node.kind;
  }
}
