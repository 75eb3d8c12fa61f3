import type { Board, Cell } from '../board/board.types';
import { cloneBoard } from '../board/board.rules';
import { pick } from '../utils/rng';
import type { PuzzleContext, SwapResetStep, SwapTryStep } from './cultural.types';

/** A prepared greedy repair: the swapped clone plus its two visual steps. */
export interface PolishMove {
  board: Board;
  trial: SwapTryStep;
  reset: SwapResetStep;
}

/**
 * Prepare a single-swap repair of `best`.
 *
 * A conflicted cell (r, c1) is chosen uniformly, then a partner column c2
 * uniformly among the other non-fixed columns of row r. The returned clone
 * already holds the swapped values; `best` is left untouched.
 *
 * @returns `null` when there is nothing to repair or no partner column.
 */
export function proposePolish(
  ctx: PuzzleContext,
  best: Board,
  conflicts: readonly Cell[]
): PolishMove | null {
  if (conflicts.length === 0) return null;
  const { row, col: col1 } = pick(ctx.rng, conflicts);
  const partners = ctx.mutableCols[row].filter((col) => col !== col1);
  if (partners.length === 0) return null;
  const col2 = pick(ctx.rng, partners);

  const board = cloneBoard(best);
  const trial: SwapTryStep = {
    type: 'swap_try',
    row,
    col1,
    newVal1: board[row][col2],
    col2,
    newVal2: board[row][col1],
  };
  board[row][col1] = trial.newVal1;
  board[row][col2] = trial.newVal2;
  return { board, trial, reset: { type: 'swap_reset', row, col1, col2 } };
}
