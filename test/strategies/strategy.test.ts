import { config } from '../../src/config';
import { createStrategy, strategy } from '../../src/methods/strategy';
import {
  BacktrackingStrategy,
  CulturalStrategy,
} from '../../src/strategies/strategy';
import { SOLVED_4, blank } from '../utils/test-helpers';

describe('Strategy descriptors', () => {
  afterEach(() => {
    config.strategyPopSize = 150;
  });

  it('builds a cultural strategy with the configured population size', () => {
    const cultural = createStrategy(strategy.CULTURAL);
    expect(cultural).toBeInstanceOf(CulturalStrategy);
    expect(cultural.name).toBe('CULTURAL');
    expect(cultural.options).toEqual({ popSize: 150 });
  });

  it('follows config.strategyPopSize', () => {
    config.strategyPopSize = 40;
    expect(createStrategy(strategy.CULTURAL).options.popSize).toBe(40);
  });

  it('lets overrides win over defaults', () => {
    const cultural = createStrategy(strategy.CULTURAL, {
      popSize: 20,
      seed: 'override',
    });
    expect(cultural.options).toEqual({ popSize: 20, seed: 'override' });
  });

  it('builds the backtracking strategy', () => {
    const backtracking = createStrategy(strategy.BACKTRACKING);
    expect(backtracking).toBeInstanceOf(BacktrackingStrategy);
    expect(backtracking.name).toBe('BACKTRACKING');
  });

  it('starts a fresh solve on every steps() call', () => {
    // Arrange
    const puzzle = blank(SOLVED_4, [[0, 0]]);
    const backtracking = createStrategy(strategy.BACKTRACKING);
    // Act
    const first = [...backtracking.steps(puzzle)];
    const second = [...backtracking.steps(puzzle)];
    // Assert
    expect(second).toEqual(first);
    expect(first.map((step) => step.type)).toEqual(['start', 'update', 'done']);
  });

  it('passes its options to every cultural solve', () => {
    const cultural = createStrategy(strategy.CULTURAL, {
      popSize: 6,
      maxIters: 0,
      seed: 'pass',
    });
    const solver = cultural.steps(blank(SOLVED_4, [[0, 0], [0, 1]]));
    expect(solver.options.popSize).toBe(6);
    expect(solver.options.maxIters).toBe(0);
  });
});
