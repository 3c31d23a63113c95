/**
 * Compare an exact-cover result against the brute-force solver
 */

import { Cell, Puzzle, SolveResult, SolverOptions } from '../domain/types.js';
import { solveBruteForce } from './brute-force.js';
import { solutionSignature } from './decoder.js';

export interface CrossCheckReport {
  passed: boolean;
  message: string;
}

/**
 * Both solvers must agree on solvability, and on the solution set when both
 * searches ran to completion
 */
export function crossCheck(
  puzzle: Pick<Puzzle, 'board' | 'pieces'>,
  excluded: readonly Cell[],
  result: SolveResult,
  options: Partial<SolverOptions> = {}
): CrossCheckReport {
  const reference = solveBruteForce(puzzle, excluded, options);

  if (reference.status !== result.status) {
    return {
      passed: false,
      message: `Check failed: exact cover says ${result.status}, brute force says ${reference.status}`,
    };
  }

  if (result.status === 'SOLVED' && reference.status === 'SOLVED' && result.stats.exhausted && reference.stats.exhausted) {
    const ours = new Set(result.solutions.map(s => solutionSignature(s, puzzle.pieces)));
    const theirs = new Set(reference.solutions.map(s => solutionSignature(s, puzzle.pieces)));
    const same = ours.size === theirs.size && [...ours].every(key => theirs.has(key));
    if (!same) {
      return {
        passed: false,
        message: `Check failed: ${ours.size} solutions vs ${theirs.size} from brute force`,
      };
    }
  }

  return {
    passed: true,
    message: `Check passed: brute force agrees (${reference.stats.nodesExplored.toLocaleString('en-US')} nodes)`,
  };
}
