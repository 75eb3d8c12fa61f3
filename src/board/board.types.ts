/**
 * Structural types shared by the board rules, the strategies and the driver.
 *
 * Boards are plain nested number arrays so they can be cloned, compared with
 * `toEqual` in tests and handed to a UI without conversion. A value of `0`
 * marks an unassigned cell.
 */

/** Grid sizes with a well defined block layout. */
export type GridSize = 4 | 6 | 9;

/** N×N grid of integers in [0, N]. */
export type Board = number[][];

/** Parallel N×N grid, `true` where the puzzle supplied a clue. */
export type FixedMask = boolean[][];

/** Per row, the values in [1, N] the row's clues do not use. */
export type MissingMap = number[][];

/** A single coordinate on the board. */
export interface Cell {
  row: number;
  col: number;
}

/** Height and width of one block (2×3 blocks for N = 6). */
export interface BlockDims {
  height: number;
  width: number;
}
