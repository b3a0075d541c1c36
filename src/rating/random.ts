/**
 * Seedable random sources.
 *
 * Outcome draws and pairings read from an explicit RandomSource handle so
 * that two runs with the same seed consume the same sequence in the same
 * order. There is no module-level generator.
 */

import { randomBytes } from 'crypto';

/**
 * A stream of uniform numbers in [0, 1).
 */
export interface RandomSource {
  next(): number;
}

/**
 * mulberry32 PRNG. Small state, good enough distribution for simulation.
 */
export function mulberry32(seed: number): () => number {
  let state = seed >>> 0;
  return function rand() {
    let t = (state += 0x6d2b79f5);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Create a random source. Without a seed the source is seeded from the
 * OS entropy pool and runs are not reproducible.
 */
export function createRandomSource(seed?: number): RandomSource {
  const effectiveSeed = seed ?? randomBytes(4).readUInt32LE(0);
  const rand = mulberry32(effectiveSeed);
  return { next: rand };
}

/**
 * Uniform integer in [0, bound).
 */
export function nextIndex(random: RandomSource, bound: number): number {
  const index = Math.floor(random.next() * bound);
  // Guards against a source that returns exactly 1
  return Math.min(index, bound - 1);
}

/**
 * Pick two distinct indices uniformly from [0, count).
 * Always consumes exactly two draws.
 */
export function pickDistinctPair(random: RandomSource, count: number): [number, number] {
  if (count < 2) {
    throw new Error(`Cannot pick a pair from ${count} items`);
  }
  const first = nextIndex(random, count);
  let second = nextIndex(random, count - 1);
  if (second >= first) second++;
  return [first, second];
}
