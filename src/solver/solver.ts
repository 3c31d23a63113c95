/**
 * Main Solver Interface
 */

import { Cell, Puzzle, SolveResult, SolverOptions } from '../domain/types.js';
import { getOpenCells } from '../domain/board.js';
import { CalendarDate, excludedCellsForDate } from '../calendar/calendar.js';
import { buildExactCoverMatrix, describeColumn } from '../matrix/matrix-builder.js';
import { DancingLinks } from '../dlx/dancing-links.js';
import { searchDancingLinks, searchPartitioned } from '../dlx/algorithm-x.js';
import { decodeSolution, sortSolutions } from './decoder.js';
import { resolveSolverOptions } from './options.js';

/**
 * Main calendar puzzle solver class
 */
export class CalendarSolver {
  constructor(private readonly puzzle: Puzzle) {}

  get name(): string {
    return this.puzzle.name;
  }

  /**
   * Solve with an explicit list of excluded cells
   */
  solve(excluded: readonly Cell[], options: Partial<SolverOptions> = {}): SolveResult {
    return solvePuzzle(this.puzzle, excluded, options);
  }

  /**
   * Solve for the cells of a date on the puzzle's calendar layout
   */
  solveForDate(date: CalendarDate, options: Partial<SolverOptions> = {}): SolveResult {
    return solvePuzzle(this.puzzle, excludedCellsForDate(this.puzzle, date), options);
  }

  analyze(excluded: readonly Cell[]): PuzzleAnalysis {
    return analyzePuzzle(this.puzzle, excluded);
  }
}

/**
 * Build the matrix, search it and decode the covers found.
 * No cover is a normal outcome reported as UNSOLVABLE.
 */
export function solvePuzzle(
  puzzle: Pick<Puzzle, 'board' | 'pieces'>,
  excluded: readonly Cell[],
  options: Partial<SolverOptions> = {}
): SolveResult {
  const opts = resolveSolverOptions(options);
  const matrix = buildExactCoverMatrix(puzzle, excluded);

  const { solutions: rows, stats } = opts.partition
    ? searchPartitioned(matrix, { maxSolutions: opts.maxSolutions })
    : searchDancingLinks(new DancingLinks(matrix), { maxSolutions: opts.maxSolutions });

  if (rows.length === 0) {
    return { status: 'UNSOLVABLE', stats };
  }

  const solutions = rows.map(solutionRows => decodeSolution(matrix, solutionRows));

  return {
    status: 'SOLVED',
    solutions: opts.sortSolutions ? sortSolutions(solutions, puzzle.pieces) : solutions,
    stats,
  };
}

export interface PuzzleAnalysis {
  openCells: number;
  pieceArea: number;
  columnCount: number;
  rowCount: number;
  placementsPerPiece: Record<string, number>;
  uncoverableColumns: string[];
  suggestions: string[];
}

/**
 * Describe the exact-cover instance without searching it
 */
export function analyzePuzzle(puzzle: Pick<Puzzle, 'board' | 'pieces'>, excluded: readonly Cell[]): PuzzleAnalysis {
  const matrix = buildExactCoverMatrix(puzzle, excluded);
  const openCells = getOpenCells(matrix.board, excluded).length;
  const pieceArea = puzzle.pieces.reduce((sum, piece) => sum + piece.cells.length, 0);

  const placementsPerPiece: Record<string, number> = {};
  for (const piece of puzzle.pieces) {
    placementsPerPiece[piece.id] = 0;
  }
  const candidates: number[] = matrix.columns.map(() => 0);
  for (const row of matrix.rows) {
    placementsPerPiece[row.placement.pieceId]++;
    for (const column of row.columns) {
      candidates[column]++;
    }
  }

  const uncoverableColumns = matrix.columns
    .filter((_, index) => candidates[index] === 0)
    .map(describeColumn);

  const suggestions: string[] = [];
  if (pieceArea !== openCells) {
    suggestions.push(`Pieces cover ${pieceArea} cells but ${openCells} cells are open`);
  }
  if (uncoverableColumns.length > 0) {
    suggestions.push(`No placement reaches ${uncoverableColumns.join(', ')}`);
  }

  return {
    openCells,
    pieceArea,
    columnCount: matrix.columnCount,
    rowCount: matrix.rows.length,
    placementsPerPiece,
    uncoverableColumns,
    suggestions,
  };
}
