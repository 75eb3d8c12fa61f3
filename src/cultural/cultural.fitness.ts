import type { Board, BlockDims, Cell, FixedMask } from '../board/board.types';

/**
 * Fitness & conflict location for row-complete boards.
 *
 * Rows are permutations by construction, so only columns and blocks can hold
 * duplicates. Both functions are pure: the same board always yields the same
 * result.
 */

// Group layouts keyed by `size:heightxwidth`; built once per layout.
const groupCache = new Map<string, Cell[][]>();

/**
 * Cells of every constraint group checked by the fitness model: all columns
 * first, then all blocks in row-major block order. The returned arrays are
 * shared; callers must not mutate them.
 */
export function constraintGroups(size: number, dims: BlockDims): Cell[][] {
  const key = `${size}:${dims.height}x${dims.width}`;
  const cached = groupCache.get(key);
  if (cached) return cached;
  const groups: Cell[][] = [];
  for (let col = 0; col < size; col++) {
    const group: Cell[] = [];
    for (let row = 0; row < size; row++) group.push({ row, col });
    groups.push(group);
  }
  for (let top = 0; top < size; top += dims.height) {
    for (let left = 0; left < size; left += dims.width) {
      const group: Cell[] = [];
      for (let row = top; row < top + dims.height; row++) {
        for (let col = left; col < left + dims.width; col++) {
          group.push({ row, col });
        }
      }
      groups.push(group);
    }
  }
  groupCache.set(key, groups);
  return groups;
}

// Cells of one group bucketed by value, in first-seen order.
function groupByValue(board: Board, group: Cell[]): Map<number, Cell[]> {
  const byValue = new Map<number, Cell[]>();
  for (const cell of group) {
    const val = board[cell.row][cell.col];
    const bucket = byValue.get(val);
    if (bucket) bucket.push(cell);
    else byValue.set(val, [cell]);
  }
  return byValue;
}

/**
 * Number of duplicate occurrences over all columns and blocks. A value that
 * appears k > 1 times in one group contributes k.
 *
 * @example
 * // column holding 1, 1, 2, 3 contributes 2
 * fitness(board, blockDims(4));
 */
export function fitness(board: Board, dims: BlockDims): number {
  let conflicts = 0;
  for (const group of constraintGroups(board.length, dims)) {
    for (const cells of groupByValue(board, group).values()) {
      if (cells.length > 1) conflicts += cells.length;
    }
  }
  return conflicts;
}

/**
 * Non-fixed cells taking part in a duplicate group of some column or block.
 * Each cell is reported once, in order of discovery (columns, then blocks).
 * Fixed cells are never reported since they cannot be repaired.
 */
export function conflictedCells(
  board: Board,
  fixed: FixedMask,
  dims: BlockDims
): Cell[] {
  const size = board.length;
  const seen = new Set<number>();
  const result: Cell[] = [];
  for (const group of constraintGroups(size, dims)) {
    for (const cells of groupByValue(board, group).values()) {
      if (cells.length < 2) continue;
      for (const cell of cells) {
        const key = cell.row * size + cell.col;
        if (fixed[cell.row][cell.col] || seen.has(key)) continue;
        seen.add(key);
        result.push({ row: cell.row, col: cell.col });
      }
    }
  }
  return result;
}
