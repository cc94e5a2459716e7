// src/services/random.ts
// Injectable random source for the suggestion search.

export interface RandomSource {
  /** Uniform float in [0, 1). */
  next(): number;
}

/**
 * Seeded 32-bit generator (mulberry32). The same seed always replays the
 * same sequence, which is what makes a search reproducible in tests.
 */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return {
    next() {
      state = (state + 0x6d2b79f5) >>> 0;
      let t = state;
      t = Math.imul(t ^ (t >>> 15), t | 1);
      t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
      return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    },
  };
}

/**
 * Production entry point: seeds from the wall clock unless a seed is given,
 * so every click gets a different suggestion.
 */
export function createRandom(seed?: number): RandomSource {
  return createSeededRandom(seed ?? Date.now());
}

/** Uniform integer in the inclusive range [lo, hi]. One draw. */
export function randomInt(random: RandomSource, lo: number, hi: number): number {
  return lo + Math.floor(random.next() * (hi - lo + 1));
}
