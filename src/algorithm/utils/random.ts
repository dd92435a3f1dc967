/**
 * Seedable random source
 *
 * Placement never touches Math.random directly: a RandomSource is created per
 * request and passed down, so layouts are reproducible under a fixed seed and
 * concurrent requests share no generator state.
 */

export interface RandomSource {
  /** Seed this source was created from */
  readonly seed: number;
  /** Uniform float in [0, 1) */
  next(): number;
  /** Uniform float between `min` and `max` (either order) */
  uniform(min: number, max: number): number;
}

/**
 * mulberry32: small, fast 32-bit generator. Not cryptographic.
 */
function mulberry32(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Creates a random source. Without a seed, one is drawn so the run can still
 * be replayed from `source.seed`.
 */
export function createRandomSource(seed?: number): RandomSource {
  const resolvedSeed = seed ?? Math.floor(Math.random() * 4294967296);
  const next = mulberry32(resolvedSeed);

  return {
    seed: resolvedSeed,
    next,
    uniform: (min: number, max: number) => min + (max - min) * next()
  };
}
