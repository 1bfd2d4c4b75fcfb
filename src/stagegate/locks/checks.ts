import { isDeepStrictEqual } from 'util';
import { isRecord } from '../element/element';

// Value predicates shared by locks and schemas.

export function isBlank(value: unknown): boolean {
  return value === null || value === undefined || value === ''
    || (Array.isArray(value) && value.length === 0);
}

export function valuesEqual(a: unknown, b: unknown): boolean {
  if (typeof a === 'number' && typeof b === 'number') return a === b;
  return isDeepStrictEqual(a, b);
}

/**
 * Numeric coercion: numbers, booleans and numeric strings.
 */
export function toNumber(value: unknown): number | null {
  if (typeof value === 'number') return Number.isNaN(value) ? null : value;
  if (typeof value === 'boolean') return value ? 1 : 0;
  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (trimmed === '') return null;
    const n = Number(trimmed);
    return Number.isNaN(n) ? null : n;
  }
  return null;
}

export function measure(value: unknown): number | null {
  if (typeof value === 'string') return Array.from(value).length;
  if (Array.isArray(value)) return value.length;
  if (value instanceof Map || value instanceof Set) return value.size;
  if (isRecord(value)) return Object.keys(value).length;
  return null;
}

export function contains(container: unknown, item: unknown): boolean {
  if (typeof container === 'string') {
    return typeof item === 'string' && container.includes(item);
  }
  if (Array.isArray(container)) {
    return container.some(entry => valuesEqual(entry, item));
  }
  if (container instanceof Set) {
    return Array.from(container).some(entry => valuesEqual(entry, item));
  }
  if (container instanceof Map) {
    return container.has(item);
  }
  if (isRecord(container)) {
    return typeof item === 'string' && Object.prototype.hasOwnProperty.call(container, item);
  }
  return false;
}

export function isContainer(value: unknown): boolean {
  return typeof value === 'string' || Array.isArray(value)
    || value instanceof Set || value instanceof Map || isRecord(value);
}

/** Start-anchored match. A malformed pattern never matches. */
export function matchesAtStart(pattern: string, value: string): boolean {
  try {
    return new RegExp(pattern, 'y').test(value);
  } catch {
    return false;
  }
}

const TYPE_NAMES: Record<string, (value: unknown) => boolean> = {
  str: v => typeof v === 'string',
  string: v => typeof v === 'string',
  int: v => typeof v === 'number' && Number.isInteger(v),
  integer: v => typeof v === 'number' && Number.isInteger(v),
  float: v => typeof v === 'number' && Number.isFinite(v),
  number: v => typeof v === 'number' && Number.isFinite(v),
  bool: v => typeof v === 'boolean',
  boolean: v => typeof v === 'boolean',
  list: v => Array.isArray(v),
  array: v => Array.isArray(v),
  tuple: v => Array.isArray(v),
  set: v => v instanceof Set,
  dict: v => isRecord(v) || v instanceof Map,
  dictionary: v => isRecord(v) || v instanceof Map,
  object: v => isRecord(v) || v instanceof Map,
  null: v => v === null,
};

/**
 * `expected` is a type name or a constructor.
 */
export function matchesType(value: unknown, expected: unknown): boolean {
  if (typeof expected === 'string') {
    const key = expected.toLowerCase();
    return Object.prototype.hasOwnProperty.call(TYPE_NAMES, key) ? TYPE_NAMES[key](value) : false;
  }
  if (typeof expected === 'function') {
    if (expected === String) return typeof value === 'string';
    if (expected === Number) return typeof value === 'number';
    if (expected === Boolean) return typeof value === 'boolean';
    if (expected === Array) return Array.isArray(value);
    if (expected === Object) return isRecord(value);
    return value instanceof expected;
  }
  return false;
}

export function describeType(value: unknown): string {
  if (value === null) return 'null';
  if (value === undefined) return 'undefined';
  if (Array.isArray(value)) return 'array';
  if (value instanceof Map) return 'map';
  if (value instanceof Set) return 'set';
  if (typeof value === 'number') return Number.isInteger(value) ? 'integer' : 'number';
  if (isRecord(value)) return 'object';
  return typeof value;
}

export function typeLabel(expected: unknown): string {
  if (typeof expected === 'function') return expected.name || 'anonymous';
  return String(expected);
}
