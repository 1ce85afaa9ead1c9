/**
 * Structured fields
 *
 * Fields are frozen `{ key, value }` pairs whose value is a tagged union over
 * string, integer, float, boolean and null. Everything else is rejected when
 * the field is built, never coerced.
 *
 * @example
 * ```typescript
 * import { field, getLogger } from 'fieldline';
 *
 * getLogger('api').info('request done', field('status', 200), field('cached', false));
 * ```
 */

import type { Field, FieldPrimitive, FieldValue } from './types.js';
import { InvalidFieldValueError } from './errors.js';

/**
 * Describes the runtime type of a rejected value for error messages
 */
function describeValueType(value: unknown): string {
  if (value === undefined) return 'undefined';
  if (Array.isArray(value)) return 'array';
  if (typeof value === 'object' && value !== null) {
    const constructorName = value.constructor?.name;
    return constructorName && constructorName !== 'Object' ? constructorName : 'object';
  }
  return typeof value;
}

/**
 * Classifies a raw value into the tagged value domain
 *
 * @throws {InvalidFieldValueError} If the value is not a supported primitive
 */
export function toFieldValue(key: string, value: unknown): FieldValue {
  if (value === null) {
    return { kind: 'null', value: null };
  }
  switch (typeof value) {
    case 'string':
      return { kind: 'string', value };
    case 'boolean':
      return { kind: 'boolean', value };
    case 'bigint':
      return { kind: 'integer', value };
    case 'number':
      return Number.isInteger(value)
        ? { kind: 'integer', value }
        : { kind: 'float', value };
    default:
      throw new InvalidFieldValueError(key, describeValueType(value));
  }
}

/**
 * Creates a field for structured logging
 *
 * @param key - Field name
 * @param value - String, number, bigint, boolean or null
 * @throws {InvalidFieldValueError} If the value is of any other kind
 */
export function field(key: string, value: FieldPrimitive): Field {
  if (typeof key !== 'string') {
    throw new TypeError('Field key must be a string');
  }
  return Object.freeze({ key, value: Object.freeze(toFieldValue(key, value)) });
}

/**
 * Builds fields from a plain object, in property order
 *
 * @example
 * ```typescript
 * log.info('user login', ...fields({ user: 'ada', attempts: 2 }));
 * ```
 */
export function fields(entries: Readonly<Record<string, FieldPrimitive>>): Field[] {
  return Object.entries(entries).map(([key, value]) => field(key, value));
}

/** Structural equality of two field values */
export function fieldValuesEqual(a: FieldValue, b: FieldValue): boolean {
  return a.kind === b.kind && a.value === b.value;
}

/** Structural equality of two fields */
export function fieldsEqual(a: Field, b: Field): boolean {
  return a.key === b.key && fieldValuesEqual(a.value, b.value);
}

/**
 * Collapses duplicate keys, keeping the last occurrence of each key at the
 * position of that last occurrence
 *
 * @example
 * ```typescript
 * // a=1 b=2 a=3  ->  b=2 a=3
 * resolveShadowedFields([field('a', 1), field('b', 2), field('a', 3)]);
 * ```
 */
export function resolveShadowedFields(input: readonly Field[]): Field[] {
  const seen = new Set<string>();
  const resolved: Field[] = [];
  for (let index = input.length - 1; index >= 0; index--) {
    const candidate = input[index];
    if (candidate === undefined || seen.has(candidate.key)) continue;
    seen.add(candidate.key);
    resolved.push(candidate);
  }
  return resolved.reverse();
}

// Whitespace, quotes, '=' and control characters force quoting
const QUOTE_TRIGGER = /[\s"=\x00-\x1f\x7f]/;

/** JSON string literal; DEL is escaped too since JSON.stringify leaves it raw */
function quoteText(text: string): string {
  return JSON.stringify(text).replace(/\x7f/g, '\\u007f');
}

/**
 * Text of a field key as it appears before `=`
 */
export function renderFieldKey(key: string): string {
  return key === '' || QUOTE_TRIGGER.test(key) ? quoteText(key) : key;
}

/**
 * Formats a float without exponent notation, using the shortest digits that
 * round-trip (the digits `String(n)` picks)
 */
export function formatFloat(value: number): string {
  if (!Number.isFinite(value)) {
    return String(value);
  }
  const text = String(value);
  const exponentAt = text.indexOf('e');
  if (exponentAt === -1) {
    return text;
  }

  const negative = text.startsWith('-');
  const mantissa = text.slice(negative ? 1 : 0, exponentAt);
  const exponent = Number(text.slice(exponentAt + 1));
  const [integerPart = '', fractionPart = ''] = mantissa.split('.');
  const digits = integerPart + fractionPart;
  // Position of the decimal point within `digits` after applying the exponent
  const point = integerPart.length + exponent;

  let result: string;
  if (point <= 0) {
    result = `0.${'0'.repeat(-point)}${digits}`;
  } else if (point >= digits.length) {
    result = digits + '0'.repeat(point - digits.length);
  } else {
    result = `${digits.slice(0, point)}.${digits.slice(point)}`;
  }
  return negative ? `-${result}` : result;
}

/**
 * Canonical text of a field value as it appears after `key=`
 */
export function renderFieldValue(value: FieldValue): string {
  switch (value.kind) {
    case 'string':
      return value.value === '' || QUOTE_TRIGGER.test(value.value)
        ? quoteText(value.value)
        : value.value;
    case 'integer':
      return typeof value.value === 'bigint' ? value.value.toString() : formatFloat(value.value);
    case 'float':
      return formatFloat(value.value);
    case 'boolean':
      return value.value ? 'true' : 'false';
    case 'null':
      return 'null';
  }
}

/**
 * Plain JavaScript value of a field, for serializing themes
 */
export function fieldValueToJSON(value: FieldValue): string | number | boolean | null {
  switch (value.kind) {
    case 'string':
    case 'boolean':
    case 'null':
      return value.value;
    case 'integer':
      if (typeof value.value === 'bigint') return value.value.toString();
      return Number.isSafeInteger(value.value) ? value.value : formatFloat(value.value);
    case 'float':
      return Number.isFinite(value.value) ? value.value : String(value.value);
  }
}
