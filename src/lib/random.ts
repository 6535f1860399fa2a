/** Returns a float in [0, 1), like Math.random */
export type RandomSource = () => number;

/**
 * Create a deterministic random source (mulberry32).
 * The same seed always yields the same sequence.
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

/**
 * Pick `count` distinct items uniformly at random.
 * Uses a partial Fisher-Yates shuffle, so every subset is equally likely.
 */
export function sampleWithoutReplacement<T>(
  items: readonly T[],
  count: number,
  random: RandomSource = Math.random
): T[] {
  const pool = [...items];
  const take = Math.max(0, Math.min(count, pool.length));

  for (let i = 0; i < take; i++) {
    const offset = Math.floor(random() * (pool.length - i));
    const j = i + Math.min(offset, pool.length - i - 1);
    [pool[i], pool[j]] = [pool[j], pool[i]];
  }

  return pool.slice(0, take);
}
