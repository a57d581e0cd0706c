/**
 * Seeded random source
 *
 * mulberry32: small, fast, and reproducible across runs for a given seed.
 */

import type { Rng } from './types';

export function createRng(seed: number): Rng {
  let a = seed >>> 0;
  return () => {
    let t = (a = (a + 0x6d2b79f5) >>> 0);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Uniform sample in [min, max)
 */
export function uniform(rng: Rng, min: number, max: number): number {
  return min + (max - min) * rng();
}
