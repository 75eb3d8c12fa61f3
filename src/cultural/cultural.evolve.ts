import { cloneBoard } from '../board/board.rules';
import { onceWarn } from '../utils/warnings';
import { BeliefSpace } from './cultural.belief';
import { conflictedCells } from './cultural.fitness';
import type { PolishMove } from './cultural.polish';
import { proposePolish } from './cultural.polish';
import {
  breed,
  createIndividual,
  eliteCount,
  evaluate,
} from './cultural.population';
import type {
  Candidate,
  CulturalPhase,
  CulturalStep,
  PuzzleContext,
  ResolvedCulturalOptions,
} from './cultural.types';

/**
 * Explicit state machine behind {@link CulturalSolver}.
 *
 * One solve walks through these stages:
 *
 *   init ──▶ evaluate ──▶ settle? ──▶ regenerate ──▶ evaluate ─ … ─▶ finished
 *
 * - `init`: random population, `init` step.
 * - `evaluate`: sort, belief update, `iter` step and (when the current best
 *   has repairable conflicts) a `swap_try` step; emits `fail` once the
 *   iteration budget is spent.
 * - `settle`: `swap_reset` step, keeps the polished board when it is strictly
 *   better, may finish with `done`.
 * - `regenerate`: elites forward, offspring by crossover + belief-guided
 *   mutation, `done` when the best-known fitness reached zero.
 *
 * Each stage queues zero or more steps; the owning solver drains the queue
 * one step per `next()` and advances stages only when the queue is empty, so
 * no work happens ahead of what the consumer has pulled.
 */
export type EngineStage =
  | 'init'
  | 'evaluate'
  | 'settle'
  | 'regenerate'
  | 'finished';

/** Mutable state owned by exactly one solve. */
export interface EngineState {
  ctx: PuzzleContext;
  options: ResolvedCulturalOptions;
  belief: BeliefSpace;
  numElite: number;
  population: Candidate[];
  /** Best-known slot (owned copy); `null` until initialization. */
  best: Candidate | null;
  iteration: number;
  stage: EngineStage;
  phase: CulturalPhase;
  pendingPolish: PolishMove | null;
  queue: CulturalStep[];
}

/** Fresh engine state; nothing is evaluated until the first stage runs. */
export function createEngineState(
  ctx: PuzzleContext,
  options: ResolvedCulturalOptions
): EngineState {
  const numElite = eliteCount(options.popSize, options.eliteFrac);
  if (numElite >= options.popSize)
    onceWarn(
      'elite-all',
      `${numElite} elites out of ${options.popSize} individuals leave no room for offspring`
    );
  return {
    ctx,
    options,
    belief: new BeliefSpace(ctx.size, ctx.rng),
    numElite: Math.min(numElite, options.popSize),
    population: [],
    best: null,
    iteration: 0,
    stage: 'init',
    phase: 'initializing',
    pendingPolish: null,
    queue: [],
  };
}

/** Run the current stage once. */
export function advance(state: EngineState): void {
  switch (state.stage) {
    case 'init':
      return initialize(state);
    case 'evaluate':
      return evaluateGeneration(state);
    case 'settle':
      return settlePolish(state);
    case 'regenerate':
      return regenerate(state);
    case 'finished':
      return;
  }
}

function snapshot(candidate: Candidate): Candidate {
  return { board: cloneBoard(candidate.board), fitness: candidate.fitness };
}

function locate(state: EngineState, candidate: Candidate) {
  return conflictedCells(candidate.board, state.ctx.fixed, state.ctx.dims);
}

// Best-known slot; always set once `init` ran.
function bestOf(state: EngineState): Candidate {
  if (!state.best) throw new Error('Cultural engine used before initialization');
  return state.best;
}

function finishSolved(state: EngineState, best: Candidate) {
  state.queue.push({
    type: 'done',
    board: cloneBoard(best.board),
    fitness: 0,
    iteration: state.iteration,
    conflictCells: [],
  });
  state.stage = 'finished';
  state.phase = 'solved';
}

function initialize(state: EngineState) {
  const { ctx, options } = state;
  const population: Candidate[] = [];
  for (let idx = 0; idx < options.popSize; idx++) {
    population.push(evaluate(ctx, createIndividual(ctx)));
  }
  let first = population[0];
  for (const candidate of population) {
    if (candidate.fitness < first.fitness) first = candidate;
  }
  state.population = population;
  state.best = snapshot(first);
  state.queue.push({
    type: 'init',
    board: cloneBoard(first.board),
    fitness: first.fitness,
    iteration: 0,
    conflictCells: [],
  });
  state.stage = 'evaluate';
  state.phase = 'evolving';
}

function evaluateGeneration(state: EngineState) {
  const best = bestOf(state);
  if (state.iteration >= state.options.maxIters) {
    state.queue.push({
      type: 'fail',
      board: cloneBoard(best.board),
      fitness: best.fitness,
      iteration: state.options.maxIters,
      conflictCells: locate(state, best),
    });
    state.stage = 'finished';
    state.phase = 'exhausted';
    return;
  }

  state.iteration++;
  state.population.sort((a, b) => a.fitness - b.fitness);
  const elites = state.population.slice(0, state.numElite);
  state.belief.update(elites, (board) =>
    conflictedCells(board, state.ctx.fixed, state.ctx.dims)
  );

  const current = state.population[0];
  const conflicts = locate(state, current);
  if (current.fitness < best.fitness) state.best = snapshot(current);
  const known = bestOf(state);
  state.queue.push({
    type: 'iter',
    board: cloneBoard(known.board),
    fitness: known.fitness,
    iteration: state.iteration,
    conflictCells: conflicts,
  });

  const move = proposePolish(state.ctx, current.board, conflicts);
  if (move) {
    state.pendingPolish = move;
    state.queue.push(move.trial);
    state.stage = 'settle';
  } else {
    state.stage = 'regenerate';
  }
}

function settlePolish(state: EngineState) {
  const move = state.pendingPolish;
  state.pendingPolish = null;
  state.stage = 'regenerate';
  if (!move) return;
  state.queue.push(move.reset);

  const polished = evaluate(state.ctx, move.board);
  if (polished.fitness >= state.population[0].fitness) return;
  state.population[0] = polished;
  if (polished.fitness < bestOf(state).fitness) {
    state.best = snapshot(polished);
    if (polished.fitness === 0) finishSolved(state, state.best);
  }
}

function regenerate(state: EngineState) {
  const { ctx, options, population, numElite } = state;
  const leaderFitness = population[0].fitness;
  const next: Candidate[] = population.slice(0, numElite).map((elite) =>
    options.eliteFitness === 'recompute'
      ? evaluate(ctx, cloneBoard(elite.board))
      : { board: cloneBoard(elite.board), fitness: leaderFitness }
  );
  const elites = next.slice();
  const betterHalf = population.slice(
    0,
    Math.max(1, Math.floor(options.popSize / 2))
  );
  while (next.length < options.popSize) {
    next.push(
      breed(ctx, elites, betterHalf, state.belief, options.mutationRate)
    );
  }
  state.population = next;

  const best = bestOf(state);
  if (best.fitness === 0) finishSolved(state, best);
  else state.stage = 'evaluate';
}
