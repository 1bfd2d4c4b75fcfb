import { isRecord } from '../element/element';

/**
 * Deep copy of arrays and plain records, frozen at every level. Other
 * values (functions, class instances) are kept as given.
 */
export function frozenCopy(value: unknown): unknown {
  if (Array.isArray(value)) return Object.freeze(value.map(frozenCopy));
  if (value instanceof Date) return new Date(value.getTime());
  if (value instanceof Map) return new Map(Array.from(value.entries()).map(([k, v]): [unknown, unknown] => [k, frozenCopy(v)]));
  if (value instanceof Set) return new Set(Array.from(value).map(frozenCopy));
  if (isRecord(value) && isPlain(value)) return frozenRecord(value);
  return value;
}

export function frozenRecord(record: Readonly<Record<string, unknown>>): Readonly<Record<string, unknown>> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(record)) {
    out[key] = frozenCopy(value);
  }
  return Object.freeze(out);
}

function isPlain(value: object): boolean {
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}
