import type {
  Board,
  BlockDims,
  FixedMask,
  GridSize,
  MissingMap,
} from './board.types';
import { SolverConfigError } from '../utils/errors';

/** Grid sizes the block layout is defined for. */
export const SUPPORTED_SIZES: readonly GridSize[] = [4, 6, 9];

/** Narrow a number to a supported grid size. */
export function isGridSize(n: number): n is GridSize {
  return n === 4 || n === 6 || n === 9;
}

/**
 * Block dimensions for a grid of size `n`.
 *
 * Size 6 uses 2-row × 3-column blocks; square sizes use √N × √N.
 *
 * @example
 * blockDims(6); // { height: 2, width: 3 }
 * blockDims(9); // { height: 3, width: 3 }
 */
export function blockDims(n: number): BlockDims {
  if (!isGridSize(n))
    throw new SolverConfigError(
      'size',
      `Unsupported grid size ${n}; expected one of ${SUPPORTED_SIZES.join(', ')}`
    );
  if (n === 6) return { height: 2, width: 3 };
  const side = Math.round(Math.sqrt(n));
  return { height: side, width: side };
}

/** N×N board of zeros. */
export function createEmptyBoard(n: number): Board {
  blockDims(n);
  return Array.from({ length: n }, () => new Array<number>(n).fill(0));
}

/** Deep value copy; the result shares no rows with `board`. */
export function cloneBoard(board: Board): Board {
  return board.map((row) => row.slice());
}

/**
 * Whether `val` may be placed at (r, c) without repeating inside the row,
 * the column or the block. Zero (clearing a cell) is always valid.
 */
export function validAt(
  board: Board,
  r: number,
  c: number,
  val: number
): boolean {
  if (val === 0) return true;
  const n = board.length;
  const { height, width } = blockDims(n);
  for (let j = 0; j < n; j++) if (board[r][j] === val) return false;
  for (let i = 0; i < n; i++) if (board[i][c] === val) return false;
  const startRow = Math.floor(r / height) * height;
  const startCol = Math.floor(c / width) * width;
  for (let i = startRow; i < startRow + height; i++) {
    for (let j = startCol; j < startCol + width; j++) {
      if (board[i][j] === val) return false;
    }
  }
  return true;
}

/**
 * Validate puzzle shape & contents: square, supported size, integer values
 * in [0, N]. Returns the grid size on success.
 */
export function assertPuzzle(puzzle: Board): GridSize {
  const n = puzzle.length;
  if (!isGridSize(n))
    throw new SolverConfigError(
      'puzzle',
      `Puzzle has ${n} rows; expected one of ${SUPPORTED_SIZES.join(', ')}`
    );
  puzzle.forEach((row, r) => {
    if (!Array.isArray(row) || row.length !== n)
      throw new SolverConfigError(
        'puzzle',
        `Row ${r} has ${Array.isArray(row) ? row.length : 0} cells; expected ${n}`
      );
    row.forEach((val, c) => {
      if (!Number.isInteger(val) || val < 0 || val > n)
        throw new SolverConfigError(
          'puzzle',
          `Cell (${r}, ${c}) holds ${val}; expected an integer in [0, ${n}]`
        );
    });
  });
  return n;
}

/** `true` wherever the puzzle supplies a clue. */
export function fixedMaskOf(puzzle: Board): FixedMask {
  return puzzle.map((row) => row.map((val) => val !== 0));
}

/** Per row, the values in [1, N] absent from the row's clues, ascending. */
export function missingMapOf(puzzle: Board): MissingMap {
  const n = puzzle.length;
  return puzzle.map((row) => {
    const present = new Set(row.filter((val) => val !== 0));
    const missing: number[] = [];
    for (let val = 1; val <= n; val++) if (!present.has(val)) missing.push(val);
    return missing;
  });
}

/** Number of unassigned cells. */
export function countEmpty(board: Board): number {
  return board.reduce(
    (acc, row) => acc + row.filter((val) => val === 0).length,
    0
  );
}

/**
 * Whether the board is completely filled and every row, column and block
 * holds each value exactly once.
 */
export function isSolved(board: Board): boolean {
  const n = board.length;
  if (!isGridSize(n)) return false;
  for (let r = 0; r < n; r++) {
    for (let c = 0; c < n; c++) {
      const val = board[r][c];
      if (val < 1 || val > n) return false;
      board[r][c] = 0;
      const ok = validAt(board, r, c, val);
      board[r][c] = val;
      if (!ok) return false;
    }
  }
  return true;
}
