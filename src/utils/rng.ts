import seedrandom from 'seedrandom';

/** Uniform random source returning values in [0, 1). */
export type RandomSource = () => number;

/** Options accepted by every component that draws random numbers. */
export interface RandomOptions {
  /** Explicit random source; wins over `seed`. */
  rng?: RandomSource;
  /** Seed for a reproducible `seedrandom` stream. */
  seed?: string | number;
}

/**
 * Resolve the random source for a run.
 *
 * Precedence: a caller supplied `rng`, then a `seedrandom` stream built from
 * `seed`, then `Math.random`.
 *
 * @example
 * const rng = resolveRng({ seed: 42 });
 * rng(); // same sequence on every run
 */
export function resolveRng(options: RandomOptions = {}): RandomSource {
  if (typeof options.rng === 'function') return options.rng;
  if (options.seed !== undefined) {
    const prng = seedrandom(String(options.seed));
    return () => prng();
  }
  return Math.random;
}

/** Integer in [0, bound). */
export function randomInt(rng: RandomSource, bound: number): number {
  return Math.floor(rng() * bound);
}

/** Uniformly chosen element of a non-empty array. */
export function pick<T>(rng: RandomSource, items: readonly T[]): T {
  return items[randomInt(rng, items.length)];
}

/** Fair coin. */
export function coin(rng: RandomSource, probability = 0.5): boolean {
  return rng() < probability;
}

/** In-place Fisher-Yates shuffle; returns the same array. */
export function shuffle<T>(rng: RandomSource, items: T[]): T[] {
  for (let i = items.length - 1; i > 0; i--) {
    const j = randomInt(rng, i + 1);
    const tmp = items[i];
    items[i] = items[j];
    items[j] = tmp;
  }
  return items;
}

/**
 * Two distinct elements drawn uniformly without replacement.
 * Callers guarantee `items.length >= 2`.
 */
export function sampleTwo<T>(rng: RandomSource, items: readonly T[]): [T, T] {
  const first = randomInt(rng, items.length);
  let second = randomInt(rng, items.length - 1);
  if (second >= first) second++;
  return [items[first], items[second]];
}
