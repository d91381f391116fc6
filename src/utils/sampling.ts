// CHANGE: Uniform sampling helpers with an injectable random source.
// WHY: Per-run selection of arrivals and retries must be reproducible under a seed.

/**
 * Source of uniformly distributed numbers in `[0, 1)`. Injected so selection is reproducible in tests.
 */
export type RandomSource = () => number;

/**
 * Pick up to `count` items uniformly at random without replacement.
 *
 * When there are no more items than `count`, every item is returned in its original order.
 * Otherwise the result is in selection order (partial Fisher-Yates).
 */
export function sampleWithoutReplacement<T>(items: readonly T[], count: number, random: RandomSource = Math.random): T[] {
  if (count <= 0) {
    return [];
  }
  if (items.length <= count) {
    return [...items];
  }
  const pool = [...items];
  for (let i = 0; i < count; i += 1) {
    const offset = Math.min(pool.length - i - 1, Math.floor(random() * (pool.length - i)));
    const j = i + Math.max(0, offset);
    const picked = pool[j];
    pool[j] = pool[i];
    pool[i] = picked;
  }
  return pool.slice(0, count);
}

/**
 * Deterministic random source for reproducible runs (mulberry32).
 */
export function seededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}
