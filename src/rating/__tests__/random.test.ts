/**
 * Tests for rating/random.ts: seeded sources and pairing draws.
 */

import { describe, it, expect } from 'vitest';
import { mulberry32, createRandomSource, nextIndex, pickDistinctPair, type RandomSource } from '../random';

function sequence(values: number[]): RandomSource {
  let i = 0;
  return { next: () => values[i++ % values.length] };
}

describe('mulberry32', () => {
  it('should produce the same sequence for the same seed', () => {
    const a = mulberry32(42);
    const b = mulberry32(42);
    for (let i = 0; i < 20; i++) {
      expect(a()).toBe(b());
    }
  });

  it('should produce different sequences for different seeds', () => {
    const a = mulberry32(1);
    const b = mulberry32(2);
    const seqA = Array.from({ length: 5 }, () => a());
    const seqB = Array.from({ length: 5 }, () => b());
    expect(seqA).not.toEqual(seqB);
  });

  it('should stay within [0, 1)', () => {
    const rand = mulberry32(7);
    for (let i = 0; i < 1000; i++) {
      const value = rand();
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });
});

describe('createRandomSource', () => {
  it('should be reproducible when seeded', () => {
    const a = createRandomSource(123);
    const b = createRandomSource(123);
    expect([a.next(), a.next(), a.next()]).toEqual([b.next(), b.next(), b.next()]);
  });

  it('should work without a seed', () => {
    const value = createRandomSource().next();
    expect(value).toBeGreaterThanOrEqual(0);
    expect(value).toBeLessThan(1);
  });
});

describe('nextIndex', () => {
  it('should scale the draw to the bound', () => {
    expect(nextIndex(sequence([0]), 5)).toBe(0);
    expect(nextIndex(sequence([0.5]), 5)).toBe(2);
    expect(nextIndex(sequence([0.99]), 5)).toBe(4);
  });

  it('should clamp a draw of exactly 1', () => {
    expect(nextIndex(sequence([1]), 5)).toBe(4);
  });
});

describe('pickDistinctPair', () => {
  it('should keep a second index below the first', () => {
    expect(pickDistinctPair(sequence([0.5, 0.5]), 4)).toEqual([2, 1]);
  });

  it('should skip over the first index', () => {
    expect(pickDistinctPair(sequence([0.5, 0.7]), 4)).toEqual([2, 3]);
  });

  it('should always return two distinct indices in range', () => {
    const random = createRandomSource(99);
    for (let i = 0; i < 500; i++) {
      const [first, second] = pickDistinctPair(random, 3);
      expect(first).not.toBe(second);
      expect(first).toBeLessThan(3);
      expect(second).toBeLessThan(3);
    }
  });

  it('should consume exactly two draws', () => {
    let calls = 0;
    const random: RandomSource = {
      next: () => {
        calls++;
        return 0.3;
      },
    };
    pickDistinctPair(random, 10);
    expect(calls).toBe(2);
  });

  it('should reject fewer than two items', () => {
    expect(() => pickDistinctPair(sequence([0.5]), 1)).toThrow('Cannot pick a pair from 1 items');
  });
});
