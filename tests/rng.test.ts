import { describe, test, expect } from '@jest/globals';
import { cryptoRNG, rngFor, seededRNG, shuffle } from '../src/util/rng.js';

describe('rng', () => {
  test('seeded generator is reproducible and in range', () => {
    const a = seededRNG(7);
    const b = seededRNG(7);
    for (let i = 0; i < 50; i++) {
      const x = a(10);
      expect(x).toBe(b(10));
      expect(x).toBeGreaterThanOrEqual(0);
      expect(x).toBeLessThan(10);
      expect(Number.isInteger(x)).toBe(true);
    }
  });

  test('rngFor falls back to crypto without a seed', () => {
    expect(rngFor()).toBe(cryptoRNG);
    expect(rngFor(3)).not.toBe(cryptoRNG);
  });

  test('cryptoRNG rejects an empty range', () => {
    expect(() => cryptoRNG(0)).toThrow('maxExclusive must be > 0');
  });

  test('shuffle keeps the items and leaves the input alone', () => {
    const input = [1, 2, 3, 4, 5, 6];
    const out = shuffle(input, seededRNG(1));
    expect(input).toEqual([1, 2, 3, 4, 5, 6]);
    expect(out.slice().sort((x, y) => x - y)).toEqual(input);
  });

  test('shuffle with j = i everywhere is the identity', () => {
    expect(shuffle([1, 2, 3], (max) => max - 1)).toEqual([1, 2, 3]);
  });
});
