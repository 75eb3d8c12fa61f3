/**
 * Global library configuration contract & default instance.
 *
 * A central `config` object offers a small documented surface for end-users
 * (and tests) to tweak library behaviour without digging through scattered
 * constants.
 *
 * USAGE PATTERN
 * ------------
 *   import { config } from 'cultural-sudoku';
 *   config.warnings = true; // print guidance about suspicious solver options
 *
 * Adjust BEFORE constructing solvers so that option hydration sees the
 * intended values.
 *
 * DESIGN NOTES
 * ------------
 * - A plain serializable object; no setters / proxies.
 * - Optional flags are conservative by default (disabled).
 */
export interface SolverLibraryConfig {
  /**
   * Emit guidance warnings (e.g. an elite fraction that rounds below the
   * two-elite minimum) to `console.warn`.
   * Default: false
   */
  warnings: boolean;

  /**
   * Population size used by the CULTURAL strategy descriptor when the caller
   * gives none. The solver class itself defaults to {@link DEFAULT_POP_SIZE}.
   * Default: 150
   */
  strategyPopSize: number;
}

/**
 * Singleton mutable configuration object consumed throughout the library.
 * Modify properties directly; do NOT reassign the binding (imports retain reference).
 */
export const config: SolverLibraryConfig = {
  warnings: false, // emit runtime guidance
  strategyPopSize: 150, // population used by strategy descriptors
};
