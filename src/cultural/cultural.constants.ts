/**
 * Shared numerical / heuristic constants for the cultural solver modules.
 *
 * Keeping these in a single dependency-free module avoids scattering magic
 * numbers across the operators.
 */

/** Population size when the caller gives none. */
export const DEFAULT_POP_SIZE = 100;

/** Fraction of the sorted population kept as elites. */
export const DEFAULT_ELITE_FRAC = 0.1;

/** Iteration budget for 9×9 boards. */
export const DEFAULT_MAX_ITERS = 2000;

/** Iteration budget for boards of size 6 or smaller. */
export const DEFAULT_MAX_ITERS_SMALL = 1000;

/** Boards up to this size use {@link DEFAULT_MAX_ITERS_SMALL}. */
export const SMALL_GRID_LIMIT = 6;

/** Lower bound on the elite count regardless of `eliteFrac`. */
export const MIN_ELITE = 2;

/** Probability that an offspring receives a belief-guided row swap. */
export const DEFAULT_MUTATION_RATE = 0.4;

/** Probability of copying a row from the second parent during crossover. */
export const ROW_INHERIT_PROBABILITY = 0.5;

// Add new constants above; keep file import-free.
