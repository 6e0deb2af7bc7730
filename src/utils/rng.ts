/**
 * Random sources for economy rolls.
 *
 * Purpose: every probability-based action takes a `RandomSource` so tests can script
 * or seed the draws. Production code uses `Math.random`.
 */

/** Returns a uniform float in [0, 1). */
export type RandomSource = () => number;

export const mathRandom: RandomSource = () => Math.random();

/** Seeded random source (Mulberry32). */
export function seededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return () => {
    let t = (state += 0x6d2b79f5);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** Uniform float between `min` and `max`. */
export function uniform(rng: RandomSource, min: number, max: number): number {
  return min + rng() * (max - min);
}
