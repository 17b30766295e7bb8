/**
 * Runtime values of the expression language and Jinja's rules for them:
 * truthiness, equality and string conversion.
 *
 * @module expression
 */

/**
 * Value of a name that is not defined in scope (Jinja's `Undefined`).
 * Falsy, renders as the empty string, and fails on attribute access.
 */
export class Undefined {
  constructor(public readonly hint: string) {}
}

export type JinjaValue =
  | string
  | number
  | boolean
  | null
  | Undefined
  | JinjaValue[]
  | { [key: string]: JinjaValue };

export type JinjaObject = { [key: string]: JinjaValue };

export function isUndefined(value: JinjaValue): value is Undefined {
  return value instanceof Undefined;
}

export function isObject(value: JinjaValue): value is JinjaObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Undefined);
}

/**
 * Jinja truthiness: undefined, none, false, 0, '', [] and {} are falsy
 */
export function isTruthy(value: JinjaValue): boolean {
  if (value === null || value instanceof Undefined) return false;
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value !== 0 && !Number.isNaN(value);
  if (typeof value === 'string') return value.length > 0;
  if (Array.isArray(value)) return value.length > 0;
  return Object.keys(value).length > 0;
}

/**
 * Name of a value's type, for error messages
 */
export function typeName(value: JinjaValue): string {
  if (value === null) return 'none';
  if (value instanceof Undefined) return 'undefined';
  if (Array.isArray(value)) return 'list';
  if (typeof value === 'number') return Number.isInteger(value) ? 'int' : 'float';
  if (typeof value === 'boolean') return 'bool';
  if (typeof value === 'string') return 'str';
  return 'dict';
}

/**
 * Booleans take part in arithmetic and comparisons as 0 and 1
 */
export function asNumber(value: JinjaValue): number | null {
  if (typeof value === 'number') return value;
  if (typeof value === 'boolean') return value ? 1 : 0;
  return null;
}

/**
 * Equality as the `==` operator sees it
 */
export function jinjaEquals(left: JinjaValue, right: JinjaValue): boolean {
  if (left instanceof Undefined || right instanceof Undefined) {
    return left instanceof Undefined && right instanceof Undefined;
  }

  const leftNumber = asNumber(left);
  const rightNumber = asNumber(right);
  if (leftNumber !== null && rightNumber !== null) {
    return leftNumber === rightNumber;
  }

  if (Array.isArray(left) && Array.isArray(right)) {
    return left.length === right.length && left.every((item, index) => jinjaEquals(item, right[index]));
  }

  if (isObject(left) && isObject(right)) {
    const keys = Object.keys(left);
    return keys.length === Object.keys(right).length
      && keys.every(key => key in right && jinjaEquals(left[key], right[key]));
  }

  return left === right;
}

/**
 * String conversion used by `~`, templates and the string filter
 */
export function toJinjaString(value: JinjaValue): string {
  if (value instanceof Undefined) return '';
  if (typeof value === 'string') return value;
  return toRepr(value, false);
}

function toRepr(value: JinjaValue, nested: boolean): string {
  if (value instanceof Undefined) return '';
  if (value === null) return 'None';
  if (typeof value === 'boolean') return value ? 'True' : 'False';
  if (typeof value === 'number') return String(value);
  if (typeof value === 'string') return nested ? `'${value.replace(/\\/g, '\\\\').replace(/'/g, "\\'")}'` : value;
  if (Array.isArray(value)) return `[${value.map(item => toRepr(item, true)).join(', ')}]`;
  return `{${Object.entries(value).map(([key, item]) => `${toRepr(key, true)}: ${toRepr(item, true)}`).join(', ')}}`;
}

/**
 * Convert a JSON-like value (event payload, scope values) into a JinjaValue.
 * Anything not representable becomes undefined.
 */
export function fromUnknown(value: unknown, hint: string): JinjaValue {
  if (value === null) return null;
  if (typeof value === 'string' || typeof value === 'boolean') return value;
  if (typeof value === 'number') return Number.isFinite(value) ? value : new Undefined(hint);
  if (Array.isArray(value)) return value.map((item, index) => fromUnknown(item, `${hint}[${index}]`));
  if (typeof value === 'object') {
    const result: JinjaObject = {};
    for (const [key, item] of Object.entries(value)) {
      result[key] = fromUnknown(item, `${hint}.${key}`);
    }
    return result;
  }
  return new Undefined(hint);
}
