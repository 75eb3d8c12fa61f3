import type { Board } from '../board/board.types';
import { assertPuzzle, cloneBoard, validAt } from '../board/board.rules';

/** Search started. */
export interface BacktrackStartStep {
  type: 'start';
  step: 0;
}

/** A value was placed at (row, col). */
export interface BacktrackUpdateStep {
  type: 'update';
  row: number;
  col: number;
  value: number;
  step: number;
}

/** A placement was undone; the cell is empty again. */
export interface BacktrackUndoStep {
  type: 'backtrack';
  row: number;
  col: number;
  value: 0;
  step: number;
}

/** Every cell filled consistently. */
export interface BacktrackDoneStep {
  type: 'done';
  board: Board;
  step: number;
}

/** Search space exhausted without a solution. */
export interface BacktrackFailStep {
  type: 'fail';
  step: number;
}

export type BacktrackStep =
  | BacktrackStartStep
  | BacktrackUpdateStep
  | BacktrackUndoStep
  | BacktrackDoneStep
  | BacktrackFailStep;

// One open decision: the cell and the next value to try there.
interface Frame {
  row: number;
  col: number;
  nextValue: number;
}

/**
 * Depth-first search over empty cells in row-major order, trying values
 * 1..N, as an explicit stack so it can be pulled one step at a time.
 *
 * Every placement emits `update` and every undo emits `backtrack`; the step
 * counter counts both. The working board is a private copy of the puzzle.
 */
export class BacktrackingSolver implements IterableIterator<BacktrackStep> {
  private readonly board: Board;
  private readonly size: number;
  private readonly stack: Frame[] = [];
  private stepCount = 0;
  private started = false;
  private finished = false;

  constructor(puzzle: Board) {
    this.size = assertPuzzle(puzzle);
    this.board = cloneBoard(puzzle);
  }

  /** Steps taken so far (placements + undos). */
  get steps(): number {
    return this.stepCount;
  }

  [Symbol.iterator](): this {
    return this;
  }

  next(): IteratorResult<BacktrackStep, undefined> {
    if (this.finished) return { done: true, value: undefined };
    if (!this.started) {
      this.started = true;
      this.openNextCell();
      return { done: false, value: { type: 'start', step: 0 } };
    }
    return { done: false, value: this.search() };
  }

  // Push a frame for the first empty cell; false when the board is full.
  private openNextCell(): boolean {
    for (let row = 0; row < this.size; row++) {
      for (let col = 0; col < this.size; col++) {
        if (this.board[row][col] === 0) {
          this.stack.push({ row, col, nextValue: 1 });
          return true;
        }
      }
    }
    return false;
  }

  private search(): BacktrackStep {
    for (;;) {
      const frame = this.stack[this.stack.length - 1];
      if (!frame) {
        this.finished = true;
        if (this.isComplete())
          return { type: 'done', board: cloneBoard(this.board), step: this.stepCount };
        return { type: 'fail', step: this.stepCount };
      }
      const { row, col } = frame;
      if (this.board[row][col] !== 0) {
        // Returning to this cell: undo the previous attempt first.
        this.board[row][col] = 0;
        this.stepCount++;
        return { type: 'backtrack', row, col, value: 0, step: this.stepCount };
      }
      while (frame.nextValue <= this.size) {
        const value = frame.nextValue++;
        if (validAt(this.board, row, col, value)) {
          this.board[row][col] = value;
          this.stepCount++;
          if (!this.openNextCell()) this.stack.length = 0;
          return { type: 'update', row, col, value, step: this.stepCount };
        }
      }
      this.stack.pop();
    }
  }

  private isComplete(): boolean {
    return this.board.every((row) => row.every((val) => val !== 0));
  }
}
