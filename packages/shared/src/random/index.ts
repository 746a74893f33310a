/**
 * Seeded pseudo-random source.
 *
 * Each sequence owns its own source, so draws for one sequence never depend
 * on how many draws other sequences made before it.
 */

/** Deterministic uniform random source */
export interface RandomSource {
  /** Seed the source was created with */
  readonly seed: number;
  /** Next value in [0, 1) */
  next(): number;
  /** Next value uniformly distributed in [min, max) */
  uniform(min: number, max: number): number;
}

/**
 * mulberry32 generator: 32-bit state, full period, stable across platforms
 */
export function mulberry32(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) | 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Create a random source seeded with an integer
 */
export function createRandomSource(seed: number): RandomSource {
  if (!Number.isInteger(seed)) {
    throw new RangeError(`Random seed must be an integer, got ${seed}`);
  }
  const next = mulberry32(seed);
  return {
    seed,
    next,
    uniform(min: number, max: number): number {
      return min + (max - min) * next();
    },
  };
}
