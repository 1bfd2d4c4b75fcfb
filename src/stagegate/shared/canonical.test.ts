import { describe, it, expect } from 'vitest';
import { canonicalJson, stableHash } from './canonical';

describe('canonicalJson', () => {
  it('should sort keys at every level', () => {
    expect(canonicalJson({ b: 1, a: { d: [2, { z: 1, y: 2 }], c: null } }))
      .toBe('{"a":{"c":null,"d":[2,{"y":2,"z":1}]},"b":1}');
  });

  it('should normalise maps, sets, dates and undefined', () => {
    expect(canonicalJson({
      m: new Map([['k', 1]]),
      s: new Set(['x']),
      d: new Date('2025-01-01T00:00:00.000Z'),
      u: undefined,
    })).toBe('{"d":"2025-01-01T00:00:00.000Z","m":[["k",1]],"s":["x"],"u":null}');
  });
});

describe('stableHash', () => {
  it('should ignore key order and truncate', () => {
    expect(stableHash({ a: 1, b: 2 })).toBe(stableHash({ b: 2, a: 1 }));
    expect(stableHash({ a: 1 })).toHaveLength(12);
    expect(stableHash({ a: 1 }, 8)).toHaveLength(8);
  });
});
