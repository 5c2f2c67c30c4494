/**
 * packages/core/src/rng.ts — Random sources for board randomization.
 */

export type Rng = Readonly<{
  /** Uniform integer in `[0, maxExclusive)`. */
  nextInt: (maxExclusive: number) => number;
}>;

export function createMathRng(): Rng {
  return Object.freeze({
    nextInt: (maxExclusive: number) => Math.floor(Math.random() * maxExclusive),
  });
}

/**
 * Deterministic mulberry32 generator. The same seed always yields the same
 * sequence, which makes `--seed` runs and tests reproducible.
 */
export function createSeededRng(seed: number): Rng {
  let state = seed >>> 0;

  const nextFloat = (): number => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };

  return Object.freeze({
    nextInt: (maxExclusive: number) => Math.floor(nextFloat() * maxExclusive),
  });
}
