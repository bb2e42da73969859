/**
 * Seeded PRNG using mulberry32 algorithm.
 * All setup randomness flows through this for reproducibility.
 */
export interface PRNG {
  next(): number; // [0, 1)
  seed: number;
}

/** Bare source of uniform numbers in [0, 1); `Math.random` or `createPRNG(seed).next`. */
export type RandomSource = () => number;

export function createPRNG(seed: number): PRNG {
  let state = seed | 0;

  function next(): number {
    state = (state + 0x6d2b79f5) | 0;
    let t = Math.imul(state ^ (state >>> 15), 1 | state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  return { next, seed };
}

/** Fisher-Yates shuffle */
export function shuffle<T>(array: readonly T[], random: RandomSource): T[] {
  const result = [...array];
  for (let i = result.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [result[i], result[j]] = [result[j], result[i]];
  }
  return result;
}

/** Uniform pick; undefined for an empty array. */
export function pickRandom<T>(array: readonly T[], random: RandomSource): T | undefined {
  if (array.length === 0) return undefined;
  return array[Math.floor(random() * array.length)];
}
