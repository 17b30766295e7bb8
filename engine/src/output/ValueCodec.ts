/**
 * Canonical text form of scalar values for string-only output channels.
 *
 *   true  -> "true"      false -> "false"
 *   null  -> ""          42    -> "42"
 *   strings are written verbatim
 *
 * Decoding maps "true", "false" and "" back; everything else stays text.
 * The JSON blob keeps native types, so it is the lossless channel.
 *
 * @module output
 */

import { z } from 'zod';
import type { ResultSet, ScalarValue } from '../types/core-types.js';

export function encodeScalar(value: ScalarValue): string {
  if (value === null) return '';
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  return String(value);
}

export function decodeScalar(text: string): ScalarValue {
  if (text === '') return null;
  if (text === 'true') return true;
  if (text === 'false') return false;
  return text;
}

const ScalarSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);
const ResultObjectSchema = z.record(ScalarSchema);

/**
 * JSON object of every entry, in result order
 */
export function encodeResultSet(resultSet: ResultSet): string {
  // fromEntries defines own properties, so `__proto__` is kept as a key
  return JSON.stringify(Object.fromEntries([...resultSet].map(([name, entry]) => [name, entry.value])));
}

/**
 * Parse a blob written by encodeResultSet
 *
 * @throws {SyntaxError} If the text is not JSON
 * @throws {z.ZodError} If it is not an object of scalars
 */
export function decodeResultSet(json: string): Map<string, ScalarValue> {
  const parsed: unknown = JSON.parse(json);
  ResultObjectSchema.parse(parsed);
  if (typeof parsed !== 'object' || parsed === null) {
    return new Map();
  }
  // Entries come from the parsed JSON itself: the record schema's output omits `__proto__`
  return new Map(Object.entries(parsed).map(([name, value]) => [name, ScalarSchema.parse(value)]));
}
