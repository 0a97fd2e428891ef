/**
 * Random number source.
 *
 * Every stochastic decision in the simulation draws from a RandomSource
 * so runs can be seeded and tests can script the draws.
 */
export interface RandomSource {
  /** Next value in [0, 1) */
  next(): number;
}

/**
 * Seeded generator (mulberry32). Same seed, same sequence.
 */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return {
    next(): number {
      state = (state + 0x6d2b79f5) >>> 0;
      let t = state;
      t = Math.imul(t ^ (t >>> 15), t | 1);
      t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
      return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    },
  };
}

/**
 * Create a random source. Seeded when a seed is given, Math.random otherwise.
 */
export function createRandomSource(seed: number | null = null): RandomSource {
  if (seed !== null) {
    return createSeededRandom(seed);
  }
  return { next: () => Math.random() };
}

/**
 * Uniform draw in [min, max).
 */
export function uniform(random: RandomSource, min: number, max: number): number {
  return min + random.next() * (max - min);
}

/**
 * Pick one element uniformly.
 */
export function pickOne<T>(random: RandomSource, items: readonly T[]): T {
  if (items.length === 0) {
    throw new Error('Cannot pick from an empty list');
  }
  const index = Math.min(items.length - 1, Math.floor(random.next() * items.length));
  return at(items, index);
}

/**
 * Weighted choice: each item is picked with probability weight / total.
 *
 * Walks the cumulative weights with a single draw, so a draw of 0 always
 * lands on the first item with positive weight.
 */
export function weightedPick<T>(
  random: RandomSource,
  items: readonly T[],
  weights: readonly number[]
): T {
  if (items.length === 0 || items.length !== weights.length) {
    throw new Error('Weighted pick needs one weight per item and at least one item');
  }

  const total = weights.reduce((sum, w) => sum + w, 0);
  if (total <= 0) {
    return pickOne(random, items);
  }

  const target = random.next() * total;
  let cumulative = 0;
  for (let i = 0; i < items.length; i++) {
    cumulative += weights[i] ?? 0;
    if (target < cumulative) {
      return at(items, i);
    }
  }
  return at(items, items.length - 1);
}

function at<T>(items: readonly T[], index: number): T {
  const item = items[index];
  if (item === undefined) {
    throw new RangeError(`Index ${String(index)} out of bounds`);
  }
  return item;
}
