/**
 * Solver option resolution shared by the exact-cover and brute-force solvers
 */

import { SolverOptions } from '../domain/types.js';
import { DEFAULT_SOLVER_OPTIONS } from '../domain/constants.js';

/**
 * Fill in defaults. Without an explicit limit, 'all' means no limit.
 */
export function resolveSolverOptions(options: Partial<SolverOptions> = {}): SolverOptions {
  const mode = options.mode ?? DEFAULT_SOLVER_OPTIONS.mode;
  const maxSolutions = options.maxSolutions ?? (mode === 'all' ? Infinity : DEFAULT_SOLVER_OPTIONS.maxSolutions);

  if (!(maxSolutions >= 1)) {
    throw new RangeError(`maxSolutions must be at least 1, got ${maxSolutions}`);
  }

  return {
    mode,
    maxSolutions,
    sortSolutions: options.sortSolutions ?? DEFAULT_SOLVER_OPTIONS.sortSolutions,
    partition: options.partition ?? DEFAULT_SOLVER_OPTIONS.partition,
  };
}
