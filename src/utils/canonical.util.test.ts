import { describe, it, expect } from 'vitest';
import { canonical_stringify, hash_sha256 } from './canonical.util';

describe('canonical_stringify', () => {
  it('sorts keys at every depth and omits null fields', () => {
    expect(canonical_stringify({ b: 1, a: { d: null, c: [{ y: 2, x: 1 }] } })).toBe('{"a":{"c":[{"x":1,"y":2}]},"b":1}');
  });

  it('hashes key-order variants of the same state alike', () => {
    const a = hash_sha256(canonical_stringify({ round: 1, location: 'Beta' }));
    const b = hash_sha256(canonical_stringify({ location: 'Beta', round: 1 }));
    expect(a).toBe(b);
    expect(a.startsWith('sha256:')).toBe(true);
  });
});
