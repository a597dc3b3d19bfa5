import { RandomRangeError } from '../utils/errors';

export interface RandomSource {
  /** Uniform float in [min, max). */
  randFloat(min: number, max: number): number;
}

// Simple LCG PRNG
const createSeededGenerator = (seed: number): (() => number) => {
  let state = seed >>> 0;
  return () => {
    state = (state * 1664525 + 1013904223) >>> 0;
    return state / 4294967296;
  };
};

/**
 * Seeded sources repeat the same sequence for the same seed; without a seed
 * the source draws from Math.random.
 */
export const createRandomSource = (seed?: number): RandomSource => {
  const next = seed === undefined ? Math.random : createSeededGenerator(seed);
  return {
    randFloat(min: number, max: number): number {
      if (!Number.isFinite(min) || !Number.isFinite(max) || min > max) {
        throw new RandomRangeError(min, max);
      }
      return min + next() * (max - min);
    },
  };
};
