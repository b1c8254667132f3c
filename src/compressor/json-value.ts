/**
 * Field lookup over decoded JSON records.
 *
 * Conversions follow loose JSON-query semantics: a present field of the
 * wrong type converts to a neutral value instead of raising.
 */

import type { JsonObject, JsonValue } from './types.js';

const DECIMAL_NUMBER = /^[+-]?(?:(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?|Infinity)$/;

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function hasOwn(target: object, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(target, key);
}

/**
 * Look up a field by name or dotted path ('meta.host', 'tags.0').
 * An exact top-level key wins over path traversal.
 * @returns The value, or undefined when the field is absent
 */
export function getPath(record: JsonObject, path: string): JsonValue | undefined {
  if (hasOwn(record, path)) {
    return record[path];
  }

  let current: JsonValue | undefined = record;
  for (const segment of path.split('.')) {
    if (Array.isArray(current)) {
      if (!/^\d+$/.test(segment)) return undefined;
      current = current[Number(segment)];
    } else if (isJsonObject(current) && hasOwn(current, segment)) {
      current = current[segment];
    } else {
      return undefined;
    }
  }
  return current;
}

/**
 * Read a value as an integer: numbers truncate toward zero, numeric strings
 * are parsed, true is 1, anything else is 0
 */
export function valueToInt(value: JsonValue): number {
  const n = valueToFloat(value);
  return Number.isFinite(n) ? Math.trunc(n) : 0;
}

/**
 * Read a value as a float: decimal strings are parsed, true is 1,
 * anything else (hex and binary literals included) is 0
 */
export function valueToFloat(value: JsonValue): number {
  switch (typeof value) {
    case 'number':
      return value;
    case 'boolean':
      return value ? 1 : 0;
    case 'string': {
      const trimmed = value.trim();
      return DECIMAL_NUMBER.test(trimmed) ? Number(trimmed) : 0;
    }
    default:
      return 0;
  }
}

/**
 * String form used for grouping keys and emitted tags.
 * null reads as the empty string; objects and arrays as their JSON text.
 */
export function valueToString(value: JsonValue): string {
  if (value === null) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}
