import type { Board, Cell } from './board/board.types';
import { assertPuzzle, cloneBoard } from './board/board.rules';
import { SolverConfigError } from './utils/errors';
import { resolveRng } from './utils/rng';
import type { BeliefSpace } from './cultural/cultural.belief';
import {
  DEFAULT_ELITE_FRAC,
  DEFAULT_MAX_ITERS,
  DEFAULT_MAX_ITERS_SMALL,
  DEFAULT_MUTATION_RATE,
  DEFAULT_POP_SIZE,
  SMALL_GRID_LIMIT,
} from './cultural/cultural.constants';
import { createPuzzleContext } from './cultural/cultural.context';
import { advance, createEngineState } from './cultural/cultural.evolve';
import type { EngineState } from './cultural/cultural.evolve';
import { conflictedCells, fitness } from './cultural/cultural.fitness';
import type {
  Candidate,
  CulturalOptions,
  CulturalPhase,
  CulturalStep,
  PuzzleContext,
  ResolvedCulturalOptions,
} from './cultural/cultural.types';

/**
 * Cultural-algorithm solver for 4×4, 6×6 and 9×9 puzzles.
 *
 * The solver is a finite, non-restartable cursor over {@link CulturalStep}s.
 * Each `next()` performs only the work needed for the next step, so a driver
 * can pace it, render each step and stop pulling at any point.
 *
 * Per iteration the population is sorted, elites update the
 * {@link BeliefSpace}, the current best gets one greedy swap repair attempt
 * and the next generation is bred by row crossover plus belief-guided row
 * swaps. The run ends with `done` (zero conflicts) or `fail` (budget spent).
 *
 * @example
 * const solver = new CulturalSolver(puzzle, { popSize: 150, seed: 1 });
 * for (const step of solver) {
 *   if (step.type === 'done') console.log(step.board);
 * }
 */
export default class CulturalSolver implements IterableIterator<CulturalStep> {
  /** Hydrated options (defaults applied). */
  readonly options: ResolvedCulturalOptions;
  private readonly ctx: PuzzleContext;
  private readonly state: EngineState;

  /**
   * @param puzzle Starting board; non-zero cells are fixed clues.
   * @param options Solver knobs; see {@link CulturalOptions}.
   * @throws SolverConfigError on malformed puzzles or option values, before
   *         any work is done.
   */
  constructor(puzzle: Board, options: CulturalOptions = {}) {
    const size = assertPuzzle(puzzle);
    this.options = CulturalSolver.resolveOptions(size, options);
    this.ctx = createPuzzleContext(puzzle, resolveRng(options));
    this.state = createEngineState(this.ctx, this.options);
  }

  /**
   * Apply defaults & validate option ranges.
   * `maxIters` defaults to 1000 for N ≤ 6 and 2000 otherwise.
   */
  static resolveOptions(
    size: number,
    options: CulturalOptions = {}
  ): ResolvedCulturalOptions {
    const resolved: ResolvedCulturalOptions = {
      popSize: options.popSize ?? DEFAULT_POP_SIZE,
      eliteFrac: options.eliteFrac ?? DEFAULT_ELITE_FRAC,
      maxIters:
        options.maxIters ??
        (size <= SMALL_GRID_LIMIT ? DEFAULT_MAX_ITERS_SMALL : DEFAULT_MAX_ITERS),
      mutationRate: options.mutationRate ?? DEFAULT_MUTATION_RATE,
      eliteFitness: options.eliteFitness ?? 'inherit',
    };
    if (!Number.isInteger(resolved.popSize) || resolved.popSize < 2)
      throw new SolverConfigError(
        'popSize',
        `popSize must be an integer >= 2, got ${resolved.popSize}`
      );
    if (!(resolved.eliteFrac >= 0 && resolved.eliteFrac <= 1))
      throw new SolverConfigError(
        'eliteFrac',
        `eliteFrac must be within [0, 1], got ${resolved.eliteFrac}`
      );
    if (!Number.isInteger(resolved.maxIters) || resolved.maxIters < 0)
      throw new SolverConfigError(
        'maxIters',
        `maxIters must be a non-negative integer, got ${resolved.maxIters}`
      );
    if (!(resolved.mutationRate >= 0 && resolved.mutationRate <= 1))
      throw new SolverConfigError(
        'mutationRate',
        `mutationRate must be within [0, 1], got ${resolved.mutationRate}`
      );
    if (
      resolved.eliteFitness !== 'inherit' &&
      resolved.eliteFitness !== 'recompute'
    )
      throw new SolverConfigError(
        'eliteFitness',
        `eliteFitness must be 'inherit' or 'recompute', got ${String(resolved.eliteFitness)}`
      );
    return resolved;
  }

  /** Produce the next step, or `{ done: true }` once the run has ended. */
  next(): IteratorResult<CulturalStep, undefined> {
    while (this.state.queue.length === 0 && this.state.stage !== 'finished') {
      advance(this.state);
    }
    const step = this.state.queue.shift();
    return step ? { done: false, value: step } : { done: true, value: undefined };
  }

  [Symbol.iterator](): this {
    return this;
  }

  /** Lifecycle position: `initializing`, `evolving`, `solved` or `exhausted`. */
  get phase(): CulturalPhase {
    return this.state.phase;
  }

  /** Last started iteration (0 until the first `iter` step). */
  get iteration(): number {
    return this.state.iteration;
  }

  /** Grid size N. */
  get size(): number {
    return this.ctx.size;
  }

  /** Best-known fitness, `Infinity` before `init`. */
  get bestFitness(): number {
    return this.state.best ? this.state.best.fitness : Infinity;
  }

  /** Copy of the best-known board, `null` before `init`. */
  get bestBoard(): Board | null {
    return this.state.best ? cloneBoard(this.state.best.board) : null;
  }

  /** Copies of the current population slots. */
  get population(): Candidate[] {
    return this.state.population.map((slot) => ({
      board: cloneBoard(slot.board),
      fitness: slot.fitness,
    }));
  }

  /** Number of elites kept per generation. */
  get eliteCount(): number {
    return this.state.numElite;
  }

  /** The run's belief space (read accessors return copies). */
  get belief(): BeliefSpace {
    return this.state.belief;
  }

  /** Fitness of an arbitrary board of this puzzle's size. */
  fitness(board: Board): number {
    return fitness(board, this.ctx.dims);
  }

  /** Repairable conflicted cells of a board under this puzzle's clues. */
  conflictedCells(board: Board): Cell[] {
    return conflictedCells(board, this.ctx.fixed, this.ctx.dims);
  }
}

export { CulturalSolver };
