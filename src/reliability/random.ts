import type { RandomSource } from './types';

/**
 * Deterministic PRNG (mulberry32). Returns values in [0, 1).
 */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0;

  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function uniform(random: RandomSource, min: number, max: number): number {
  if (max <= min) {
    return min;
  }
  return min + random() * (max - min);
}

export function randomInt(random: RandomSource, min: number, max: number): number {
  return Math.floor(uniform(random, min, max + 1));
}

export function pick<T>(random: RandomSource, items: readonly T[]): T {
  if (items.length === 0) {
    throw new Error('Cannot pick from an empty list');
  }
  const index = Math.min(items.length - 1, Math.floor(random() * items.length));
  return items[index];
}
