/** Returns a number in [0, 1), like Math.random. */
export type RandomSource = () => number;

export const defaultRandom: RandomSource = Math.random;

/**
 * Deterministic source (mulberry32) for reproducible question sets.
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

export function shuffleArray<T>(items: readonly T[], random: RandomSource = defaultRandom): T[] {
  const result = [...items];
  for (let i = result.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [result[i], result[j]] = [result[j], result[i]];
  }
  return result;
}

/**
 * Picks up to `count` items without replacement. Returns all of them,
 * shuffled, when fewer are available.
 */
export function sample<T>(items: readonly T[], count: number, random: RandomSource = defaultRandom): T[] {
  return shuffleArray(items, random).slice(0, count);
}
