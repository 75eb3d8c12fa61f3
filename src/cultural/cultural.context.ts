import type { Board } from '../board/board.types';
import {
  assertPuzzle,
  blockDims,
  cloneBoard,
  countEmpty,
  fixedMaskOf,
  missingMapOf,
} from '../board/board.rules';
import { SolverConfigError } from '../utils/errors';
import type { RandomSource } from '../utils/rng';
import type { PuzzleContext } from './cultural.types';

/**
 * Validate a puzzle and derive the facts every operator shares: fixed mask,
 * missing values per row and the free columns of each row.
 *
 * Rejects rows that repeat a clue (their free cells could not hold a
 * permutation) and puzzles without a single empty cell.
 */
export function createPuzzleContext(
  puzzle: Board,
  rng: RandomSource
): PuzzleContext {
  const size = assertPuzzle(puzzle);
  const fixed = fixedMaskOf(puzzle);
  const missing = missingMapOf(puzzle);
  const mutableCols = fixed.map((row) =>
    row.flatMap((isFixed, col) => (isFixed ? [] : [col]))
  );
  mutableCols.forEach((cols, row) => {
    if (cols.length !== missing[row].length)
      throw new SolverConfigError(
        'puzzle',
        `Row ${row} repeats a clue; its free cells cannot hold a permutation`
      );
  });
  if (countEmpty(puzzle) === 0)
    throw new SolverConfigError('puzzle', 'Puzzle has no missing cells');
  return {
    size,
    dims: blockDims(size),
    puzzle: cloneBoard(puzzle),
    fixed,
    missing,
    mutableCols,
    rng,
  };
}
