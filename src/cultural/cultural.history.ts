import type { CulturalStep } from './cultural.types';

/** One point of the fitness-over-time curve. */
export interface FitnessPoint {
  iteration: number;
  fitness: number;
}

/**
 * Fitness-over-time series built from a cultural run's steps.
 *
 * `init`, `iter` and `done` steps each add a point, which is what a plot of
 * the run needs; repair and `fail` steps add nothing.
 *
 * @example
 * const history = new FitnessHistory();
 * for (const step of solver) history.record(step);
 * fs.writeFileSync('fitness.csv', history.toCSV());
 */
export class FitnessHistory {
  private readonly points: FitnessPoint[] = [];

  /** Record a step; returns whether it produced a point. */
  record(step: CulturalStep): boolean {
    switch (step.type) {
      case 'init':
      case 'iter':
      case 'done':
        this.points.push({ iteration: step.iteration, fitness: step.fitness });
        return true;
      default:
        return false;
    }
  }

  /** Number of recorded points. */
  get length(): number {
    return this.points.length;
  }

  /** Copy of the recorded points in arrival order. */
  toArray(): FitnessPoint[] {
    return this.points.map((point) => ({ ...point }));
  }

  /** Lowest recorded fitness, `undefined` when empty. */
  best(): number | undefined {
    if (this.points.length === 0) return undefined;
    return Math.min(...this.points.map((point) => point.fitness));
  }

  /**
   * CSV export with an `iteration,fitness` header and one line per point,
   * lines joined by `\n` without a trailing newline.
   */
  toCSV(): string {
    const lines = ['iteration,fitness'];
    for (const point of this.points) lines.push(`${point.iteration},${point.fitness}`);
    return lines.join('\n');
  }
}
