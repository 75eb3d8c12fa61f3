import { config } from '../config';
import type { CulturalOptions } from '../cultural/cultural.types';
import {
  BacktrackingStrategy,
  CulturalStrategy,
} from '../strategies/strategy';

/**
 * Descriptors of the built-in solving strategies, in the same spirit as the
 * selection / crossover method tables: plain objects naming a strategy and
 * its default knobs, turned into live strategies by {@link createStrategy}.
 */
export const strategy = {
  /**
   * Cultural algorithm: population evolution steered by a belief space of
   * conflict-prone rows. `popSize` falls back to `config.strategyPopSize`
   * (150); `maxIters` is left to the solver (2000, or 1000 for N ≤ 6).
   */
  CULTURAL: {
    name: 'CULTURAL',
  },

  /**
   * Depth-first backtracking over empty cells; deterministic and complete.
   */
  BACKTRACKING: {
    name: 'BACKTRACKING',
  },
} as const;

export type StrategyDescriptor = (typeof strategy)[keyof typeof strategy];

/**
 * Build a strategy from its descriptor.
 *
 * @example
 * const cultural = createStrategy(strategy.CULTURAL, { seed: 3 });
 * const steps = cultural.steps(puzzle);
 */
export function createStrategy(
  descriptor: typeof strategy.CULTURAL,
  overrides?: CulturalOptions
): CulturalStrategy;
export function createStrategy(
  descriptor: typeof strategy.BACKTRACKING
): BacktrackingStrategy;
export function createStrategy(
  descriptor: StrategyDescriptor,
  overrides: CulturalOptions = {}
): CulturalStrategy | BacktrackingStrategy {
  switch (descriptor.name) {
    case 'CULTURAL':
      return new CulturalStrategy({
        popSize: config.strategyPopSize,
        ...overrides,
      });
    case 'BACKTRACKING':
      return new BacktrackingStrategy();
  }
}
