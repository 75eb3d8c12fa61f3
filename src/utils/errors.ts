/**
 * Raised when a solver, strategy or generator receives input it cannot work
 * with (unsupported grid size, malformed puzzle, impossible option values).
 *
 * These are caller contract violations: they are thrown before any step is
 * produced, never in the middle of a run.
 */
export class SolverConfigError extends Error {
  /** Name of the offending option or input. */
  readonly field: string;

  constructor(field: string, message: string) {
    super(message);
    this.name = 'SolverConfigError';
    this.field = field;
  }
}
