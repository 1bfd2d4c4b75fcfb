import { parsePath, type PathSegment } from './path';

export type Lookup = { found: true; value: unknown } | { found: false };

/**
 * Read-only accessor over a tree-shaped record.
 */
export interface Element {
  getProperty(path: string): unknown;
  hasProperty(path: string): boolean;
  lookup(path: string): Lookup;
  toDict(): Record<string, unknown>;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
    && !(value instanceof Map) && !(value instanceof Set) && !(value instanceof Date);
}

const NOT_FOUND: Lookup = { found: false };

function step(current: unknown, segment: PathSegment): Lookup {
  if (segment.kind === 'key') {
    if (current instanceof Map) {
      return current.has(segment.key) ? { found: true, value: current.get(segment.key) } : NOT_FOUND;
    }
    if (isRecord(current) && Object.prototype.hasOwnProperty.call(current, segment.key)) {
      return { found: true, value: current[segment.key] };
    }
    return NOT_FOUND;
  }

  if (Array.isArray(current)) {
    if (segment.index === null) return NOT_FOUND;
    const idx = segment.index < 0 ? current.length + segment.index : segment.index;
    return idx >= 0 && idx < current.length ? { found: true, value: current[idx] } : NOT_FOUND;
  }
  if (typeof current === 'string' && segment.index !== null) {
    const chars = Array.from(current);
    const idx = segment.index < 0 ? chars.length + segment.index : segment.index;
    return idx >= 0 && idx < chars.length ? { found: true, value: chars[idx] } : NOT_FOUND;
  }
  // Numeric brackets against a map fall back to the string key
  return step(current, { kind: 'key', key: segment.raw });
}

/**
 * Resolves a dotted/bracketed path against a value. Never throws.
 */
export function resolvePath(root: unknown, path: string): Lookup {
  if (path === '') return { found: true, value: root };

  let current: unknown = root;
  for (const segment of parsePath(path)) {
    const next = step(current, segment);
    if (!next.found) return NOT_FOUND;
    current = next.value;
  }
  return { found: true, value: current };
}

export class DictElement implements Element {
  private readonly data: Record<string, unknown>;

  constructor(data: Record<string, unknown>) {
    this.data = data;
  }

  getProperty(path: string): unknown {
    const result = resolvePath(this.data, path);
    return result.found ? result.value : undefined;
  }

  hasProperty(path: string): boolean {
    return resolvePath(this.data, path).found;
  }

  lookup(path: string): Lookup {
    return resolvePath(this.data, path);
  }

  toDict(): Record<string, unknown> {
    return deepCopy(this.data);
  }
}

function deepCopy(data: Record<string, unknown>): Record<string, unknown> {
  return structuredClone(data);
}

export function isElement(value: unknown): value is Element {
  return value instanceof DictElement || (
    typeof value === 'object' && value !== null
    && 'getProperty' in value && typeof value.getProperty === 'function'
    && 'lookup' in value && typeof value.lookup === 'function'
    && 'toDict' in value && typeof value.toDict === 'function'
  );
}

export type ElementInput = Element | Record<string, unknown>;

export function createElement(input: ElementInput): Element {
  if (isElement(input)) return input;
  return new DictElement(input);
}
