/**
 * Shared types for the cultural solver modules.
 *
 * Helper modules receive narrow structural contexts instead of the concrete
 * `CulturalSolver` class so they stay testable in isolation and free of
 * circular imports.
 */
import type {
  Board,
  BlockDims,
  Cell,
  FixedMask,
  MissingMap,
} from '../board/board.types';
import type { RandomOptions, RandomSource } from '../utils/rng';

/**
 * One population slot: a row-complete board and the fitness cached for it.
 * Both fields are replaced together whenever the slot changes.
 */
export interface Candidate {
  board: Board;
  fitness: number;
}

/**
 * How elites carried into the next generation get their fitness.
 *
 * - `inherit`: copy the fitness of the sorted population's best slot to every
 *   elite clone (the historical behaviour; an elite may be under- or
 *   over-stated until it is next re-sorted).
 * - `recompute`: evaluate every elite clone exactly.
 */
export type EliteFitnessMode = 'inherit' | 'recompute';

/**
 * Options accepted by {@link CulturalSolver}. Omitted fields receive the
 * defaults listed in `cultural.constants.ts`.
 *
 * @example
 * const opts: CulturalOptions = { popSize: 10, eliteFrac: 0.2, maxIters: 50, seed: 7 };
 */
export interface CulturalOptions extends RandomOptions {
  /** Individuals per generation (≥ 2). */
  popSize?: number;
  /** Share of the sorted population kept as elites, in [0, 1]. */
  eliteFrac?: number;
  /** Iteration budget (non-negative integer). Defaults depend on N. */
  maxIters?: number;
  /** Probability of a belief-guided swap per offspring, in [0, 1]. */
  mutationRate?: number;
  /** See {@link EliteFitnessMode}. Default `inherit`. */
  eliteFitness?: EliteFitnessMode;
}

/** Options after default hydration. */
export interface ResolvedCulturalOptions {
  popSize: number;
  eliteFrac: number;
  maxIters: number;
  mutationRate: number;
  eliteFitness: EliteFitnessMode;
}

/**
 * Immutable facts about the puzzle being solved, shared by every operator.
 */
export interface PuzzleContext {
  size: number;
  dims: BlockDims;
  puzzle: Board;
  fixed: FixedMask;
  missing: MissingMap;
  /** Per row, the non-fixed column indices in ascending order. */
  mutableCols: number[][];
  rng: RandomSource;
}

// Step protocol ------------------------------------------------------------

/** First population evaluated. */
export interface InitStep {
  type: 'init';
  board: Board;
  fitness: number;
  iteration: 0;
  conflictCells: Cell[];
}

/** End of one iteration; `fitness` is the best-known fitness. */
export interface IterStep {
  type: 'iter';
  board: Board;
  fitness: number;
  iteration: number;
  conflictCells: Cell[];
}

/** Local repair swap proposed on the current best board. */
export interface SwapTryStep {
  type: 'swap_try';
  row: number;
  col1: number;
  newVal1: number;
  col2: number;
  newVal2: number;
}

/** Local repair swap settled; the two cells may return to steady colouring. */
export interface SwapResetStep {
  type: 'swap_reset';
  row: number;
  col1: number;
  col2: number;
}

/** Zero-conflict board found. */
export interface CulturalDoneStep {
  type: 'done';
  board: Board;
  fitness: 0;
  iteration: number;
  conflictCells: Cell[];
}

/** Iteration budget exhausted. */
export interface CulturalFailStep {
  type: 'fail';
  board: Board;
  fitness: number;
  iteration: number;
  conflictCells: Cell[];
}

/** Every step the cultural solver can produce. */
export type CulturalStep =
  | InitStep
  | IterStep
  | SwapTryStep
  | SwapResetStep
  | CulturalDoneStep
  | CulturalFailStep;

/** Steps that carry a board snapshot and a fitness value. */
export type CulturalProgressStep = Extract<CulturalStep, { fitness: number }>;

/** Solve lifecycle: `initializing → evolving → solved | exhausted`. */
export type CulturalPhase = 'initializing' | 'evolving' | 'solved' | 'exhausted';
