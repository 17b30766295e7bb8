/**
 * Built-in filters (`value | name(args)`) and tests (`value is name`).
 *
 * The set is closed; an unknown name is an ExpressionError raised by the
 * evaluator with a typo suggestion.
 *
 * @module expression
 */

import { ExpressionError } from '../errors/ExpressionError.js';
import {
  Undefined,
  asNumber,
  isObject,
  isTruthy,
  toJinjaString,
  typeName,
  type JinjaValue,
} from './values.js';

/**
 * Arguments of one filter invocation
 */
export interface FilterCall {
  /** Expression text, for errors */
  expression: string;
  name: string;
  args: JinjaValue[];
  kwargs: Record<string, JinjaValue>;
}

export type FilterFunction = (value: JinjaValue, call: FilterCall) => JinjaValue;
export type TestFunction = (value: JinjaValue, args: JinjaValue[]) => boolean;

/**
 * Argument by position or keyword
 */
function argument(call: FilterCall, index: number, keyword: string, fallback: JinjaValue): JinjaValue {
  const positional = call.args[index];
  if (positional !== undefined) return positional;
  const named = call.kwargs[keyword];
  return named !== undefined ? named : fallback;
}

function defaultFilter(value: JinjaValue, call: FilterCall): JinjaValue {
  const fallback = argument(call, 0, 'default_value', '');
  const boolean = isTruthy(argument(call, 1, 'boolean', false));
  if (value instanceof Undefined || (boolean && !isTruthy(value))) {
    return fallback;
  }
  return value;
}

function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1).toLowerCase();
}

function title(text: string): string {
  return text
    .split(/([-\s({[<]+)/)
    .filter(item => item !== '')
    .map(capitalize)
    .join('');
}

function replace(value: JinjaValue, call: FilterCall): JinjaValue {
  const text = toJinjaString(value);
  const search = toJinjaString(argument(call, 0, 'old', ''));
  const replacement = toJinjaString(argument(call, 1, 'new', ''));
  const countArg = argument(call, 2, 'count', null);

  if (countArg === null || search === '') {
    return text.split(search).join(replacement);
  }

  const count = asNumber(countArg);
  if (count === null) {
    throw ExpressionError.invalidArgument(call.expression, call.name, `count must be a number, got ${typeName(countArg)}`);
  }

  let result = '';
  let rest = text;
  for (let done = 0; done < count; done++) {
    const at = rest.indexOf(search);
    if (at === -1) break;
    result += rest.slice(0, at) + replacement;
    rest = rest.slice(at + search.length);
  }
  return result + rest;
}

function length(value: JinjaValue, call: FilterCall): JinjaValue {
  if (value instanceof Undefined) return 0;
  if (typeof value === 'string' || Array.isArray(value)) return value.length;
  if (isObject(value)) return Object.keys(value).length;
  throw ExpressionError.invalidArgument(call.expression, call.name, `object of type ${typeName(value)} has no length`);
}

function parseNumber(value: JinjaValue, integer: boolean): number | null {
  const numeric = asNumber(value);
  if (numeric !== null) {
    return integer ? Math.trunc(numeric) : numeric;
  }
  if (typeof value !== 'string') {
    return null;
  }

  const text = value.trim().replace(/_/g, '');
  if (!/^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/.test(text)) {
    return null;
  }
  const parsed = Number(text);
  if (!Number.isFinite(parsed)) return null;
  return integer ? Math.trunc(parsed) : parsed;
}

function sequenceItems(value: JinjaValue): JinjaValue[] {
  if (typeof value === 'string') return Array.from(value);
  if (Array.isArray(value)) return value;
  if (isObject(value)) return Object.keys(value);
  return [];
}

export const FILTERS: ReadonlyMap<string, FilterFunction> = new Map<string, FilterFunction>([
  ['default', defaultFilter],
  ['d', defaultFilter],
  ['lower', value => toJinjaString(value).toLowerCase()],
  ['upper', value => toJinjaString(value).toUpperCase()],
  ['trim', value => toJinjaString(value).trim()],
  ['capitalize', value => capitalize(toJinjaString(value))],
  ['title', value => title(toJinjaString(value))],
  ['replace', replace],
  ['length', length],
  ['count', length],
  ['string', value => toJinjaString(value)],
  ['int', (value, call) => parseNumber(value, true) ?? argument(call, 0, 'default', 0)],
  ['float', (value, call) => parseNumber(value, false) ?? argument(call, 0, 'default', 0)],
  ['abs', (value, call) => {
    const numeric = asNumber(value);
    if (numeric === null) {
      throw ExpressionError.invalidArgument(call.expression, call.name, `bad operand type ${typeName(value)}`);
    }
    return Math.abs(numeric);
  }],
  ['join', (value, call) => {
    const separator = toJinjaString(argument(call, 0, 'd', ''));
    return sequenceItems(value).map(toJinjaString).join(separator);
  }],
  ['first', value => {
    const items = sequenceItems(value);
    return items.length > 0 ? items[0] : new Undefined('first item');
  }],
  ['last', value => {
    const items = sequenceItems(value);
    return items.length > 0 ? items[items.length - 1] : new Undefined('last item');
  }],
]);

export const TESTS: ReadonlyMap<string, TestFunction> = new Map<string, TestFunction>([
  ['defined', value => !(value instanceof Undefined)],
  ['undefined', value => value instanceof Undefined],
  ['none', value => value === null],
  ['boolean', value => typeof value === 'boolean'],
  ['string', value => typeof value === 'string'],
  ['number', value => typeof value === 'number' || typeof value === 'boolean'],
  ['true', value => value === true],
  ['false', value => value === false],
]);
