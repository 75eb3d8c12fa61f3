/**
 * Public entry point: solvers, strategies, board rules and the driver.
 */
export { default as CulturalSolver } from './cultural';
export { BeliefSpace } from './cultural/cultural.belief';
export { FitnessHistory } from './cultural/cultural.history';
export type { FitnessPoint } from './cultural/cultural.history';
export { fitness, conflictedCells } from './cultural/cultural.fitness';
export type {
  Candidate,
  CulturalOptions,
  CulturalPhase,
  CulturalStep,
  EliteFitnessMode,
  InitStep,
  IterStep,
  SwapTryStep,
  SwapResetStep,
  CulturalDoneStep,
  CulturalFailStep,
} from './cultural/cultural.types';
export { BacktrackingSolver } from './strategies/backtracking';
export type { BacktrackStep } from './strategies/backtracking';
export {
  CulturalStrategy,
  BacktrackingStrategy,
} from './strategies/strategy';
export type { SolverStrategy, SolveStep } from './strategies/strategy';
export { strategy, createStrategy } from './methods/strategy';
export type { StrategyDescriptor } from './methods/strategy';
export {
  runSolver,
  isProgressStep,
  isTerminalStep,
} from './driver/solve.runner';
export type { RunOptions, RunStatus, RunSummary } from './driver/solve.runner';
export {
  blockDims,
  validAt,
  cloneBoard,
  createEmptyBoard,
  fixedMaskOf,
  missingMapOf,
  assertPuzzle,
  isSolved,
} from './board/board.rules';
export { generatePuzzle } from './board/board.generator';
export type { GenerateOptions, GeneratedPuzzle } from './board/board.generator';
export type {
  Board,
  BlockDims,
  Cell,
  FixedMask,
  GridSize,
  MissingMap,
} from './board/board.types';
export { SolverConfigError } from './utils/errors';
export { resolveRng } from './utils/rng';
export type { RandomOptions, RandomSource } from './utils/rng';
export { config } from './config';
export type { SolverLibraryConfig } from './config';
