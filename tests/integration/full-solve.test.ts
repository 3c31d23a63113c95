/**
 * End-to-end tests on the shipped calendar boards
 */

import { describe, it } from 'node:test';
import { strict as assert } from 'node:assert';
import { loadBuiltinPuzzle } from '../../src/io/catalog-parser.js';
import { excludedCellsForDate, parseIsoDate } from '../../src/calendar/calendar.js';
import { CalendarSolver } from '../../src/solver/solver.js';
import { solveBruteForce } from '../../src/solver/brute-force.js';
import { solutionSignature } from '../../src/solver/decoder.js';
import { validateSolution } from '../../src/solver/validator.js';
import { formatBoard } from '../../src/io/solution-formatter.js';
import { Piece, SolveResult, TilingSolution } from '../../src/domain/types.js';

function solutionsOf(result: SolveResult): TilingSolution[] {
  assert.strictEqual(result.status, 'SOLVED');
  return result.status === 'SOLVED' ? result.solutions : [];
}

function signatures(solutions: TilingSolution[], pieces: readonly Piece[]): string[] {
  return solutions.map(s => solutionSignature(s, pieces));
}

describe('Full Solve Integration', () => {
  describe('classic board', () => {
    const puzzle = loadBuiltinPuzzle('classic');
    const solver = new CalendarSolver(puzzle);

    for (const text of ['2024-01-01', '2024-02-29', '2024-10-18', '2024-12-31']) {
      it(`should tile the board for ${text}`, () => {
        const date = parseIsoDate(text);
        const excluded = excludedCellsForDate(puzzle, date);
        const [solution] = solutionsOf(solver.solveForDate(date));

        const validation = validateSolution(puzzle, excluded, solution.placements);
        assert.deepStrictEqual(validation.errors, []);
        assert.strictEqual(solution.placements.length, 8);
      });
    }

    it('should count every tiling for Dec 31', () => {
      const result = solver.solveForDate(parseIsoDate('2024-12-31'), { mode: 'all' });

      assert.strictEqual(solutionsOf(result).length, 77);
      assert.strictEqual(result.stats.exhausted, true);
    });

    it('should match the brute-force solver for Dec 31', () => {
      const date = parseIsoDate('2024-12-31');
      const excluded = excludedCellsForDate(puzzle, date);
      const exact = solutionsOf(solver.solveForDate(date, { mode: 'all' }));
      const reference = solutionsOf(solveBruteForce(puzzle, excluded, { mode: 'all' }));

      assert.deepStrictEqual(
        signatures(reference, puzzle.pieces).sort(),
        signatures(exact, puzzle.pieces).sort()
      );
    });

    it('should give the same solutions when partitioned', () => {
      const date = parseIsoDate('2024-12-31');
      const whole = solutionsOf(solver.solveForDate(date, { mode: 'all' }));
      const split = solutionsOf(solver.solveForDate(date, { mode: 'all', partition: true }));

      assert.deepStrictEqual(signatures(split, puzzle.pieces), signatures(whole, puzzle.pieces));
    });

    it('should leave only the date cells showing', () => {
      const date = parseIsoDate('2024-12-31');
      const excluded = excludedCellsForDate(puzzle, date);
      const [solution] = solutionsOf(solver.solveForDate(date));
      const text = formatBoard(puzzle.board, puzzle.pieces, solution, excluded);

      assert.strictEqual(text.split('#').length - 1, 2);
      assert.strictEqual(text.includes('.'), false);
      assert.strictEqual(text.split('\n')[1].split(' ')[5], '#');
      assert.strictEqual(text.split('\n')[6].split(' ')[2], '#');
    });
  });

  describe('weekday board', () => {
    const puzzle = loadBuiltinPuzzle('weekday');
    const solver = new CalendarSolver(puzzle);

    for (const text of ['2026-10-18', '2025-01-01']) {
      it(`should tile the board for ${text}`, () => {
        const date = parseIsoDate(text);
        const excluded = excludedCellsForDate(puzzle, date);
        assert.strictEqual(excluded.length, 3);

        const [solution] = solutionsOf(solver.solveForDate(date));
        const validation = validateSolution(puzzle, excluded, solution.placements);
        assert.deepStrictEqual(validation.errors, []);
      });
    }
  });
});
