import { createHash } from 'crypto';
import { isRecord } from '../element/element';

/**
 * JSON with sorted object keys, so equal records serialise identically.
 */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(normalise(value));
}

function normalise(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(normalise);
  if (value instanceof Map) return Array.from(value.entries()).map(([k, v]) => [normalise(k), normalise(v)]);
  if (value instanceof Set) return Array.from(value).map(normalise);
  if (value instanceof Date) return value.toISOString();
  if (isRecord(value)) {
    const out: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      out[key] = normalise(value[key]);
    }
    return out;
  }
  if (typeof value === 'bigint') return value.toString();
  if (value === undefined || typeof value === 'function' || typeof value === 'symbol') return null;
  return value;
}

export function stableHash(value: unknown, length = 12): string {
  return createHash('sha256').update(canonicalJson(value)).digest('hex').slice(0, length);
}
