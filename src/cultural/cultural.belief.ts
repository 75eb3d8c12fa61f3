import type { Board, Cell } from '../board/board.types';
import { cloneBoard } from '../board/board.rules';
import type { RandomSource } from '../utils/rng';
import { randomInt } from '../utils/rng';
import type { Candidate } from './cultural.types';

/**
 * Cultural knowledge derived from the elites of each generation.
 *
 * Two kinds of knowledge are kept:
 * 1. Situational: the best board seen so far. Its fitness only ever goes down.
 * 2. Normative: a per-cell "conflict heat" (`conflictMatrix`) and its row sums
 *    (`rowConflictScores`), rebuilt from scratch on every {@link update} so
 *    they describe the current elite generation only. There is no decay and
 *    no accumulation across generations.
 *
 * The row scores act as roulette weights when mutation asks which row to
 * disturb ({@link selectTargetRow}).
 *
 * @example
 * const belief = new BeliefSpace(9, rng);
 * belief.update(elites, (b) => conflictedCells(b, fixed, dims));
 * const row = belief.selectTargetRow();
 */
export class BeliefSpace {
  readonly size: number;
  private readonly rng: RandomSource;
  private _globalBest: Board | null = null;
  private _globalBestFitness = Infinity;
  private _conflictMatrix: number[][];
  private _rowConflictScores: number[];

  constructor(size: number, rng: RandomSource) {
    this.size = size;
    this.rng = rng;
    this._conflictMatrix = BeliefSpace.zeroMatrix(size);
    this._rowConflictScores = new Array<number>(size).fill(0);
  }

  private static zeroMatrix(size: number): number[][] {
    return Array.from({ length: size }, () => new Array<number>(size).fill(0));
  }

  /** Best board accepted so far (a copy), or `null` before the first update. */
  get globalBest(): Board | null {
    return this._globalBest ? cloneBoard(this._globalBest) : null;
  }

  /** Fitness of {@link globalBest}; `Infinity` before the first update. */
  get globalBestFitness(): number {
    return this._globalBestFitness;
  }

  /** Copy of the per-cell conflict counts for the latest elite set. */
  get conflictMatrix(): number[][] {
    return this._conflictMatrix.map((row) => row.slice());
  }

  /** Copy of the per-row conflict sums used as roulette weights. */
  get rowConflictScores(): number[] {
    return this._rowConflictScores.slice();
  }

  /**
   * Acceptance function: fold the current elites into the belief space.
   *
   * The first elite holding the minimal fitness becomes the global best when
   * it is strictly better; then the normative tables are reset and refilled
   * with one count per conflicted cell of every elite.
   *
   * @param elites Current elite slots (any order).
   * @param locateConflicts Conflict locator for one board.
   */
  update(elites: readonly Candidate[], locateConflicts: (board: Board) => Cell[]) {
    let bestElite: Candidate | undefined;
    for (const elite of elites) {
      if (!bestElite || elite.fitness < bestElite.fitness) bestElite = elite;
    }
    if (bestElite && bestElite.fitness < this._globalBestFitness) {
      this._globalBest = cloneBoard(bestElite.board);
      this._globalBestFitness = bestElite.fitness;
    }

    this._conflictMatrix = BeliefSpace.zeroMatrix(this.size);
    this._rowConflictScores = new Array<number>(this.size).fill(0);
    for (const elite of elites) {
      for (const { row, col } of locateConflicts(elite.board)) {
        this._conflictMatrix[row][col]++;
        this._rowConflictScores[row]++;
      }
    }
  }

  /**
   * Influence function: choose a row to mutate.
   *
   * Without recorded conflicts every row is equally likely. Otherwise a
   * roulette wheel over `rowConflictScores` is spun: a draw in [0, total) is
   * compared against the running sum and the first row whose sum exceeds it
   * wins.
   */
  selectTargetRow(): number {
    const total = this._rowConflictScores.reduce((acc, v) => acc + v, 0);
    if (total === 0) return randomInt(this.rng, this.size);
    const draw = this.rng() * total;
    let running = 0;
    for (let row = 0; row < this.size; row++) {
      running += this._rowConflictScores[row];
      if (running > draw) return row;
    }
    // Only reached when a custom source returns exactly 1.
    let last = this.size - 1;
    while (last > 0 && this._rowConflictScores[last] === 0) last--;
    return last;
  }
}
