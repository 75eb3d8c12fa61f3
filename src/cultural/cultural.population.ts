import type { Board } from '../board/board.types';
import { cloneBoard } from '../board/board.rules';
import { coin, pick, sampleTwo, shuffle } from '../utils/rng';
import { onceWarn } from '../utils/warnings';
import type { BeliefSpace } from './cultural.belief';
import { MIN_ELITE, ROW_INHERIT_PROBABILITY } from './cultural.constants';
import { fitness } from './cultural.fitness';
import type { Candidate, PuzzleContext } from './cultural.types';

/**
 * Population operators for the cultural solver.
 *
 * Every operator preserves row-completeness: the initial fill places each
 * row's missing values once, crossover copies whole rows and mutation swaps
 * two non-fixed cells of one row.
 */

/** Score a board and wrap it in a population slot. */
export function evaluate(ctx: PuzzleContext, board: Board): Candidate {
  return { board, fitness: fitness(board, ctx.dims) };
}

/**
 * Random row-complete individual: per row the missing values are shuffled
 * and written to the non-fixed cells in column order.
 */
export function createIndividual(ctx: PuzzleContext): Board {
  const board = cloneBoard(ctx.puzzle);
  for (let row = 0; row < ctx.size; row++) {
    const values = shuffle(ctx.rng, ctx.missing[row].slice());
    ctx.mutableCols[row].forEach((col, idx) => {
      board[row][col] = values[idx];
    });
  }
  return board;
}

/**
 * Number of elites for a population: `max(2, round(popSize * eliteFrac))`.
 */
export function eliteCount(popSize: number, eliteFrac: number): number {
  const raw = Math.round(popSize * eliteFrac);
  if (raw < MIN_ELITE)
    onceWarn(
      'elite-min',
      `eliteFrac ${eliteFrac} keeps ${raw} of ${popSize} individuals; using the minimum of ${MIN_ELITE} elites`
    );
  return Math.max(MIN_ELITE, raw);
}

/**
 * Row-wise crossover.
 *
 * The child starts as a copy of `p1` or `p2` (fair coin) and then every row
 * is independently overwritten with `p2`'s row on a fair coin. The first
 * flip only matters for rows the second pass leaves alone.
 */
export function crossover(ctx: PuzzleContext, p1: Board, p2: Board): Board {
  const child = cloneBoard(coin(ctx.rng) ? p1 : p2);
  for (let row = 0; row < ctx.size; row++) {
    if (coin(ctx.rng, ROW_INHERIT_PROBABILITY)) child[row] = p2[row].slice();
  }
  return child;
}

/**
 * Belief-guided mutation, applied in place with probability `rate`: the
 * belief space picks a row and two of its non-fixed cells (distinct, uniform)
 * trade values. Rows with fewer than two free cells are left untouched.
 *
 * @returns Whether a swap happened.
 */
export function mutate(
  ctx: PuzzleContext,
  board: Board,
  belief: BeliefSpace,
  rate: number
): boolean {
  if (!coin(ctx.rng, rate)) return false;
  const row = belief.selectTargetRow();
  const free = ctx.mutableCols[row];
  if (free.length < 2) return false;
  const [c1, c2] = sampleTwo(ctx.rng, free);
  const tmp = board[row][c1];
  board[row][c1] = board[row][c2];
  board[row][c2] = tmp;
  return true;
}

/**
 * Build one offspring: `p1` from the elites, `p2` from the better half of the
 * sorted population, crossover then mutation, then evaluation.
 */
export function breed(
  ctx: PuzzleContext,
  elites: readonly Candidate[],
  betterHalf: readonly Candidate[],
  belief: BeliefSpace,
  mutationRate: number
): Candidate {
  const p1 = pick(ctx.rng, elites);
  const p2 = pick(ctx.rng, betterHalf);
  const child = crossover(ctx, p1.board, p2.board);
  mutate(ctx, child, belief, mutationRate);
  return evaluate(ctx, child);
}
