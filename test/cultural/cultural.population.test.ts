import { createEmptyBoard } from '../../src/board/board.rules';
import { config } from '../../src/config';
import { BeliefSpace } from '../../src/cultural/cultural.belief';
import { createPuzzleContext } from '../../src/cultural/cultural.context';
import {
  breed,
  createIndividual,
  crossover,
  eliteCount,
  evaluate,
  mutate,
} from '../../src/cultural/cultural.population';
import { resolveRng } from '../../src/utils/rng';
import { resetWarnings } from '../../src/utils/warnings';
import {
  SOLVED_4,
  blank,
  keepsClues,
  patternSolution,
  rowsArePermutations,
  sequenceRng,
} from '../utils/test-helpers';

describe('Population operators', () => {
  describe('createIndividual()', () => {
    const puzzle = blank(patternSolution(9, 3, 3), [
      [0, 0],
      [0, 4],
      [2, 8],
      [4, 1],
      [4, 2],
      [4, 5],
      [8, 8],
    ]);
    const ctx = createPuzzleContext(puzzle, resolveRng({ seed: 'individual' }));

    it('fills every row with a permutation and keeps the clues', () => {
      for (let trial = 0; trial < 20; trial++) {
        const board = createIndividual(ctx);
        expect(rowsArePermutations(board)).toBe(true);
        expect(keepsClues(board, puzzle, ctx.fixed)).toBe(true);
      }
    });

    it('does not touch the context puzzle', () => {
      createIndividual(ctx);
      expect(ctx.puzzle).toEqual(puzzle);
    });
  });

  describe('eliteCount()', () => {
    afterEach(() => {
      config.warnings = false;
      resetWarnings();
    });

    it('rounds popSize * eliteFrac', () => {
      expect(eliteCount(100, 0.1)).toBe(10);
      expect(eliteCount(150, 0.1)).toBe(15);
      expect(eliteCount(7, 0.5)).toBe(4);
    });

    it('keeps at least two elites', () => {
      expect(eliteCount(10, 0.2)).toBe(2);
      expect(eliteCount(10, 0.05)).toBe(2);
      expect(eliteCount(10, 0)).toBe(2);
    });

    it('warns once about the minimum when warnings are enabled', () => {
      // Arrange
      config.warnings = true;
      resetWarnings();
      const warn = jest.spyOn(console, 'warn');
      // Act
      eliteCount(10, 0.05);
      eliteCount(10, 0.05);
      // Assert
      expect(warn).toHaveBeenCalledTimes(1);
      expect(warn).toHaveBeenCalledWith(
        'eliteFrac 0.05 keeps 1 of 10 individuals; using the minimum of 2 elites'
      );
      warn.mockRestore();
    });

    it('stays silent when warnings are disabled', () => {
      resetWarnings();
      const warn = jest.spyOn(console, 'warn');
      eliteCount(10, 0.05);
      expect(warn).not.toHaveBeenCalled();
      warn.mockRestore();
    });
  });

  describe('crossover()', () => {
    const p1 = SOLVED_4.map((row) => row.slice());
    const p2 = [
      [2, 1, 4, 3],
      [4, 3, 2, 1],
      [1, 2, 3, 4],
      [3, 4, 1, 2],
    ];

    it('overwrites rows with the second parent on each row coin', () => {
      // Arrange: baseline p1 (0.1), then rows keep, take, keep, take
      const ctx = createPuzzleContext(
        createEmptyBoard(4),
        sequenceRng([0.1, 0.9, 0.1, 0.9, 0.1])
      );
      // Act
      const child = crossover(ctx, p1, p2);
      // Assert
      expect(child).toEqual([p1[0], p2[1], p1[2], p2[3]]);
    });

    it('starts from the second parent when the first coin says so', () => {
      // Arrange: baseline p2 (0.9), no row overwrites
      const ctx = createPuzzleContext(
        createEmptyBoard(4),
        sequenceRng([0.9, 0.9, 0.9, 0.9, 0.9])
      );
      // Act & Assert
      expect(crossover(ctx, p1, p2)).toEqual(p2);
    });

    it('shares no rows with either parent', () => {
      const ctx = createPuzzleContext(
        createEmptyBoard(4),
        sequenceRng([0.1, 0.1, 0.1, 0.1, 0.1])
      );
      const child = crossover(ctx, p1, p2);
      child[1][0] = 0;
      expect(p2[1][0]).toBe(4);
    });
  });

  describe('mutate()', () => {
    const puzzle = createEmptyBoard(4);
    puzzle[0][0] = 1;

    it('swaps two free cells of one row', () => {
      // Arrange
      const ctx = createPuzzleContext(puzzle, resolveRng({ seed: 'mutate' }));
      const belief = new BeliefSpace(4, ctx.rng);
      for (let trial = 0; trial < 20; trial++) {
        const before = createIndividual(ctx);
        const after = before.map((row) => row.slice());
        // Act
        const swapped = mutate(ctx, after, belief, 1);
        // Assert
        const changed: Array<[number, number]> = [];
        after.forEach((row, r) =>
          row.forEach((val, c) => {
            if (val !== before[r][c]) changed.push([r, c]);
          })
        );
        expect(swapped).toBe(true);
        expect(changed).toHaveLength(2);
        expect(changed[0][0]).toBe(changed[1][0]);
        expect(after[0][0]).toBe(1);
        expect(rowsArePermutations(after)).toBe(true);
      }
    });

    it('does nothing when the rate coin fails', () => {
      const ctx = createPuzzleContext(puzzle, resolveRng({ seed: 'idle' }));
      const board = createIndividual(ctx);
      const copy = board.map((row) => row.slice());
      expect(mutate(ctx, copy, new BeliefSpace(4, ctx.rng), 0)).toBe(false);
      expect(copy).toEqual(board);
    });

    it('skips rows with fewer than two free cells', () => {
      // Arrange: only (3, 3) is free, and the uniform fallback picks row 3
      const single = blank(SOLVED_4, [[3, 3]]);
      const ctx = createPuzzleContext(single, sequenceRng([0, 0.99]));
      const board = SOLVED_4.map((row) => row.slice());
      // Act & Assert
      expect(mutate(ctx, board, new BeliefSpace(4, ctx.rng), 1)).toBe(false);
      expect(board).toEqual(SOLVED_4);
    });
  });

  describe('breed()', () => {
    it('returns a row-complete child with exact fitness', () => {
      // Arrange
      const puzzle = blank(SOLVED_4, [
        [0, 1],
        [0, 2],
        [1, 0],
        [1, 3],
        [2, 1],
        [3, 2],
      ]);
      const ctx = createPuzzleContext(puzzle, resolveRng({ seed: 'breed' }));
      const belief = new BeliefSpace(4, ctx.rng);
      const population = Array.from({ length: 6 }, () =>
        evaluate(ctx, createIndividual(ctx))
      );
      // Act
      const child = breed(ctx, population.slice(0, 2), population.slice(0, 3), belief, 0.4);
      // Assert
      expect(rowsArePermutations(child.board)).toBe(true);
      expect(keepsClues(child.board, puzzle, ctx.fixed)).toBe(true);
      expect(child.fitness).toBe(evaluate(ctx, child.board).fitness);
    });
  });
});
