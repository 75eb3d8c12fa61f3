import { generatePuzzle } from '../../src/board/board.generator';
import {
  createEmptyBoard,
  fixedMaskOf,
  isSolved,
} from '../../src/board/board.rules';
import { BacktrackingSolver } from '../../src/strategies/backtracking';
import type { BacktrackStep } from '../../src/strategies/backtracking';
import { SOLVED_4, blank, keepsClues } from '../utils/test-helpers';

describe('BacktrackingSolver', () => {
  it('emits start, one update per placement and done', () => {
    // Arrange
    const puzzle = blank(SOLVED_4, [
      [0, 0],
      [1, 1],
      [3, 3],
    ]);
    // Act
    const steps = [...new BacktrackingSolver(puzzle)];
    // Assert
    expect(steps).toEqual([
      { type: 'start', step: 0 },
      { type: 'update', row: 0, col: 0, value: 1, step: 1 },
      { type: 'update', row: 1, col: 1, value: 4, step: 2 },
      { type: 'update', row: 3, col: 3, value: 1, step: 3 },
      { type: 'done', board: SOLVED_4, step: 3 },
    ]);
  });

  it('fails when the first empty cell has no candidate', () => {
    // Arrange: (0, 3) needs 4, which column 3 already holds
    const puzzle = createEmptyBoard(4);
    puzzle[0] = [1, 2, 3, 0];
    puzzle[1][3] = 4;
    // Act & Assert
    expect([...new BacktrackingSolver(puzzle)]).toEqual([
      { type: 'start', step: 0 },
      { type: 'fail', step: 0 },
    ]);
  });

  it('does not modify the puzzle it was given', () => {
    const puzzle = blank(SOLVED_4, [[2, 2]]);
    [...new BacktrackingSolver(puzzle)];
    expect(puzzle[2][2]).toBe(0);
  });

  it('counts placements and undos in the steps getter', () => {
    const solver = new BacktrackingSolver(blank(SOLVED_4, [[0, 0]]));
    expect(solver.steps).toBe(0);
    [...solver];
    expect(solver.steps).toBe(1);
    expect(solver.next()).toEqual({ done: true, value: undefined });
  });

  const cases: Array<[4 | 6 | 9, string]> = [
    [4, 'a'],
    [6, 'b'],
    [6, 'c'],
    [9, 'd'],
  ];
  it.each(cases)('solves generated %i×%i puzzles (seed %s)', (size, seed) => {
    // Arrange
    const { puzzle } = generatePuzzle(size, { difficulty: 0.5, seed });
    const blanks = puzzle.flat().filter((val) => val === 0).length;
    // Act
    const steps: BacktrackStep[] = [...new BacktrackingSolver(puzzle)];
    // Assert
    const updates = steps.filter((step) => step.type === 'update').length;
    const undos = steps.filter((step) => step.type === 'backtrack').length;
    expect(updates - undos).toBe(blanks);
    const last = steps[steps.length - 1];
    expect(last.type).toBe('done');
    if (last.type !== 'done') return;
    expect(last.step).toBe(updates + undos);
    expect(isSolved(last.board)).toBe(true);
    expect(keepsClues(last.board, puzzle, fixedMaskOf(puzzle))).toBe(true);
  });
});
