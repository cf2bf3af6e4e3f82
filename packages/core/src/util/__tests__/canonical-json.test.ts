import { describe, it, expect } from 'vitest';
import { canonicalJson, compareCodeUnits, sameLiteralSet } from '../canonical-json.js';

describe('canonicalJson', () => {
  it('sorts object keys and drops undefined members', () => {
    expect(canonicalJson({ b: 1, a: [true, null], c: undefined })).toBe(
      '{"a":[true,null],"b":1}'
    );
  });

  it('folds -0 and non-finite numbers', () => {
    expect(canonicalJson(-0)).toBe('0');
    expect(canonicalJson(Number.NaN)).toBe('null');
  });

  it('gives equal text for structurally equal values', () => {
    expect(canonicalJson({ x: { q: 1, p: 2 } })).toBe(canonicalJson({ x: { p: 2, q: 1 } }));
  });
});

describe('compareCodeUnits', () => {
  it('orders by UTF-16 code units, uppercase before lowercase', () => {
    expect(['b', 'B', 'a', '$.z', '$.A'].sort(compareCodeUnits)).toEqual([
      '$.A',
      '$.z',
      'B',
      'a',
      'b',
    ]);
  });
});

describe('sameLiteralSet', () => {
  it('ignores order and duplicates', () => {
    expect(sameLiteralSet(['a', 'b', 'a'], ['b', 'a'])).toBe(true);
  });

  it('distinguishes literals of different JSON types', () => {
    expect(sameLiteralSet([1], ['1'])).toBe(false);
    expect(sameLiteralSet(['a'], ['a', 'b'])).toBe(false);
  });
});
