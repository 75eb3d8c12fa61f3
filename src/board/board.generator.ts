import type { Board, GridSize } from './board.types';
import { blockDims, cloneBoard, createEmptyBoard, validAt } from './board.rules';
import { resolveRng, shuffle } from '../utils/rng';
import type { RandomOptions, RandomSource } from '../utils/rng';
import { SolverConfigError } from '../utils/errors';

export interface GenerateOptions extends RandomOptions {
  /** Share of the N×N cells to blank, in [0, 1]. Default 0.5. */
  difficulty?: number;
}

export interface GeneratedPuzzle {
  /** Board with blanked cells set to 0. */
  puzzle: Board;
  /** The full board the puzzle was cut from. */
  solution: Board;
}

/**
 * Generate a puzzle: randomized depth-first fill of an empty board followed
 * by blanking `floor(N * N * difficulty)` cells in shuffled order.
 *
 * Uniqueness of the solution is not enforced; both strategies only need a
 * solvable board.
 *
 * @example
 * const { puzzle } = generatePuzzle(6, { difficulty: 0.4, seed: 'demo' });
 */
export function generatePuzzle(
  size: GridSize,
  options: GenerateOptions = {}
): GeneratedPuzzle {
  blockDims(size);
  const difficulty = options.difficulty ?? 0.5;
  if (!(difficulty >= 0 && difficulty <= 1))
    throw new SolverConfigError(
      'difficulty',
      `difficulty must be within [0, 1], got ${difficulty}`
    );
  const rng = resolveRng(options);

  const solution = createEmptyBoard(size);
  fillBoard(solution, rng);

  const puzzle = cloneBoard(solution);
  const removeCount = Math.floor(size * size * difficulty);
  const cells: number[] = [];
  for (let idx = 0; idx < size * size; idx++) cells.push(idx);
  shuffle(rng, cells);
  for (const idx of cells.slice(0, removeCount)) {
    puzzle[Math.floor(idx / size)][idx % size] = 0;
  }
  return { puzzle, solution };
}

// Randomized backtracking fill; always succeeds on an empty board.
function fillBoard(board: Board, rng: RandomSource): boolean {
  const n = board.length;
  for (let r = 0; r < n; r++) {
    for (let c = 0; c < n; c++) {
      if (board[r][c] !== 0) continue;
      const values = shuffle(
        rng,
        Array.from({ length: n }, (_, i) => i + 1)
      );
      for (const val of values) {
        if (validAt(board, r, c, val)) {
          board[r][c] = val;
          if (fillBoard(board, rng)) return true;
          board[r][c] = 0;
        }
      }
      return false;
    }
  }
  return true;
}
