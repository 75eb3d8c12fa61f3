import { setTimeout as sleep } from 'node:timers/promises';
import { performance } from 'node:perf_hooks';
import type { Board } from '../board/board.types';
import { cloneBoard } from '../board/board.rules';
import { FitnessHistory } from '../cultural/cultural.history';
import type { FitnessPoint } from '../cultural/cultural.history';
import type { CulturalProgressStep } from '../cultural/cultural.types';
import type { SolveStep, SolverStrategy } from '../strategies/strategy';

export interface RunOptions<TStep> {
  /** Receives every step in order; errors it throws end the run. */
  onStep?: (step: TStep) => void | Promise<void>;
  /** Checked once per produced step; when aborted no further steps are pulled. */
  signal?: AbortSignal;
  /**
   * Pause after each forwarded step except the final `done` / `fail`, in
   * milliseconds. Default 0.
   */
  delayMs?: number;
}

export type RunStatus = 'solved' | 'failed' | 'cancelled';

export interface RunSummary<TStep> {
  status: RunStatus;
  /** Steps forwarded to the sink. */
  steps: number;
  /** Last forwarded step, `undefined` when none was forwarded. */
  lastStep?: TStep;
  /** Fitness-over-time points (cultural runs only). */
  history: FitnessPoint[];
  elapsedMs: number;
}

/** Whether a step carries a fitness value (cultural progress steps). */
export function isProgressStep(step: SolveStep): step is CulturalProgressStep {
  return 'fitness' in step;
}

/** Whether a step ends its run (`done` or `fail` of either strategy). */
export function isTerminalStep(step: SolveStep): boolean {
  return step.type === 'done' || step.type === 'fail';
}

/**
 * Drive a strategy to completion.
 *
 * The puzzle is copied before the strategy sees it. Each produced step is
 * checked against `signal`, forwarded to `onStep`, recorded in the fitness
 * history and, unless it ends the run, followed by an optional `delayMs`
 * pause. Cancellation is cooperative: a step that is already being produced
 * finishes first.
 *
 * @example
 * const controller = new AbortController();
 * const summary = await runSolver(createStrategy(strategy.CULTURAL), puzzle, {
 *   onStep: (step) => render(step),
 *   signal: controller.signal,
 *   delayMs: 50,
 * });
 */
export async function runSolver<TStep extends SolveStep>(
  solver: SolverStrategy<TStep>,
  puzzle: Board,
  options: RunOptions<TStep> = {}
): Promise<RunSummary<TStep>> {
  const startTime = performance.now();
  const history = new FitnessHistory();
  const delayMs = options.delayMs ?? 0;
  let forwarded = 0;
  let lastStep: TStep | undefined;
  let cancelled = false;

  for (const step of solver.steps(cloneBoard(puzzle))) {
    if (options.signal?.aborted) {
      cancelled = true;
      break;
    }
    if (options.onStep) await options.onStep(step);
    forwarded++;
    lastStep = step;
    if (isProgressStep(step)) history.record(step);
    if (delayMs > 0 && !isTerminalStep(step)) await sleep(delayMs);
  }

  let status: RunStatus = 'failed';
  if (cancelled) status = 'cancelled';
  else if (lastStep?.type === 'done') status = 'solved';

  return {
    status,
    steps: forwarded,
    lastStep,
    history: history.toArray(),
    elapsedMs: performance.now() - startTime,
  };
}
