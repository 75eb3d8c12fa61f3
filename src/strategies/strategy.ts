import type { Board } from '../board/board.types';
import CulturalSolver from '../cultural';
import type { CulturalOptions, CulturalStep } from '../cultural/cultural.types';
import { BacktrackingSolver } from './backtracking';
import type { BacktrackStep } from './backtracking';

/**
 * A solving strategy: given a starting board, produce a finite sequence of
 * progress / result steps. Drivers treat every strategy the same way.
 */
export interface SolverStrategy<TStep extends { type: string }> {
  readonly name: string;
  steps(puzzle: Board): IterableIterator<TStep>;
}

/** Any step either built-in strategy can produce. */
export type SolveStep = CulturalStep | BacktrackStep;

/** Cultural algorithm strategy; each call to `steps` starts a fresh solve. */
export class CulturalStrategy implements SolverStrategy<CulturalStep> {
  readonly name = 'CULTURAL';
  readonly options: CulturalOptions;

  constructor(options: CulturalOptions = {}) {
    this.options = options;
  }

  steps(puzzle: Board): CulturalSolver {
    return new CulturalSolver(puzzle, this.options);
  }
}

/** Deterministic depth-first search strategy. */
export class BacktrackingStrategy implements SolverStrategy<BacktrackStep> {
  readonly name = 'BACKTRACKING';

  steps(puzzle: Board): BacktrackingSolver {
    return new BacktrackingSolver(puzzle);
  }
}
