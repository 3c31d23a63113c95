#!/usr/bin/env node
/**
 * Calendar Tiling Solver - CLI Interface
 */

import * as fs from 'fs';

import { Puzzle, SolverOptions } from '../domain/types.js';
import { BUILTIN_PUZZLES, MONTH_NAMES, WEEKDAY_NAMES } from '../domain/constants.js';
import { PuzzleError } from '../domain/errors.js';
import { formatShapeRows } from '../domain/shape.js';
import { CalendarDate, excludedCellsForDate, formatCalendarDate, parseIsoDate, toCalendarDate } from '../calendar/calendar.js';
import { CalendarSolver } from '../solver/solver.js';
import { solveBruteForce } from '../solver/brute-force.js';
import { crossCheck } from '../solver/cross-check.js';
import { validateSolution } from '../solver/validator.js';
import { loadBuiltinPuzzle, loadPuzzleFile } from '../io/catalog-parser.js';
import { formatSolveResult, formatSolveResultJSON, renderToPpm } from '../io/solution-formatter.js';
import { CLIOptions, parseArgs } from './args.js';

const args = process.argv.slice(2);

function printHelp(): void {
  console.log(`
Calendar Tiling Solver
======================

Covers every cell of a calendar board except today's date with each piece
exactly once.

USAGE:
  calendar-solver <command> [options]

COMMANDS:
  solve       Solve the puzzle for a date
  analyze     Describe the exact-cover instance for a date without solving
  list        Show the puzzle's pieces
  help        Show this help message

OPTIONS:
  -p, --puzzle <name|file>  Built-in puzzle (${BUILTIN_PUZZLES.join(', ')}) or catalog JSON file
  -d, --date <YYYY-MM-DD>   Date to solve for (default: today)
  -a, --all                 Find every solution
  --limit <n>               Stop after n solutions
  --sorted                  Sort solutions canonically instead of discovery order
  --partition               Search each top-level branch separately
  -f, --format <type>       Output format: text (default) or json
  --ppm <file>              Write the first solution as a PPM image
  --brute-force             Use the brute-force reference solver
  --check                   Cross-check the result against the brute-force solver
  -h, --help                Show help

EXAMPLES:
  calendar-solver solve
  calendar-solver solve --date 2024-02-29 --all
  calendar-solver solve --puzzle weekday --ppm today.ppm
`);
}

function loadPuzzle(nameOrFile: string): Puzzle {
  return nameOrFile.endsWith('.json') ? loadPuzzleFile(nameOrFile) : loadBuiltinPuzzle(nameOrFile);
}

function resolveDate(options: CLIOptions): CalendarDate {
  return options.date !== undefined ? parseIsoDate(options.date) : toCalendarDate(new Date());
}

function solverOptions(options: CLIOptions): Partial<SolverOptions> {
  return {
    mode: options.all ? 'all' : 'first',
    maxSolutions: options.limit,
    sortSolutions: options.sorted,
    partition: options.partition,
  };
}

function runSolve(options: CLIOptions): number {
  const puzzle = loadPuzzle(options.puzzle);
  const date = resolveDate(options);
  const excluded = excludedCellsForDate(puzzle, date);

  const isText = options.outputFormat === 'text';
  if (isText) {
    console.log(`Puzzle: ${puzzle.name}`);
    console.log(`Date: ${formatCalendarDate(date, MONTH_NAMES, WEEKDAY_NAMES)}`);
    console.log(`Solver: ${options.bruteForce ? 'brute force' : 'exact cover (dancing links)'}`);
    console.log('');
  }

  const result = options.bruteForce
    ? solveBruteForce(puzzle, excluded, solverOptions(options))
    : new CalendarSolver(puzzle).solve(excluded, solverOptions(options));

  // In JSON mode the report goes inside the document, stdout stays parseable
  const check = options.check && !options.bruteForce
    ? crossCheck(puzzle, excluded, result, solverOptions(options))
    : undefined;

  if (isText) {
    console.log(formatSolveResult(result, puzzle, excluded));
  } else {
    console.log(formatSolveResultJSON(result, check));
  }

  if (result.status === 'SOLVED') {
    for (const solution of result.solutions) {
      const validation = validateSolution(puzzle, excluded, solution.placements);
      if (!validation.valid) {
        console.error('Invalid solution:');
        validation.errors.forEach(e => console.error(`  - ${e}`));
        return 1;
      }
    }

    if (options.ppmFile) {
      fs.writeFileSync(options.ppmFile, renderToPpm(puzzle.board, puzzle.pieces, result.solutions[0]));
      if (isText) console.log(`\nWrote ${options.ppmFile}`);
    }
  }

  if (check) {
    if (!check.passed) {
      console.error(check.message);
      return 1;
    }
    if (isText) console.log(check.message);
  }

  return result.status === 'SOLVED' ? 0 : 2;
}

function runAnalyze(options: CLIOptions): number {
  const puzzle = loadPuzzle(options.puzzle);
  const date = resolveDate(options);
  const excluded = excludedCellsForDate(puzzle, date);
  const analysis = new CalendarSolver(puzzle).analyze(excluded);

  console.log('=== PUZZLE ANALYSIS ===');
  console.log('');
  console.log(`Puzzle: ${puzzle.name}`);
  console.log(`Date: ${formatCalendarDate(date, MONTH_NAMES, WEEKDAY_NAMES)}`);
  console.log(`Open Cells: ${analysis.openCells}`);
  console.log(`Piece Area: ${analysis.pieceArea}`);
  console.log(`Columns: ${analysis.columnCount}`);
  console.log(`Candidate Rows: ${analysis.rowCount}`);
  console.log('');

  console.log('Placements per Piece:');
  for (const [pieceId, count] of Object.entries(analysis.placementsPerPiece)) {
    console.log(`  ${pieceId}: ${count}`);
  }

  if (analysis.suggestions.length > 0) {
    console.log('');
    console.log('Problems:');
    for (const suggestion of analysis.suggestions) {
      console.log(`  • ${suggestion}`);
    }
  }

  return 0;
}

function runList(options: CLIOptions): number {
  const puzzle = loadPuzzle(options.puzzle);

  console.log(`Puzzle: ${puzzle.name} (${puzzle.board.rows}x${puzzle.board.cols})`);
  console.log('');
  for (const piece of puzzle.pieces) {
    console.log(`${piece.id} - ${piece.name}`);
    for (const row of formatShapeRows(piece.cells)) {
      console.log(`  ${row}`);
    }
    console.log('');
  }

  return 0;
}

// Main entry point
function main(): number {
  const options = parseArgs(args);

  switch (options.command) {
    case 'solve':
      return runSolve(options);

    case 'analyze':
      return runAnalyze(options);

    case 'list':
      return runList(options);

    case 'help':
    default:
      printHelp();
      return 0;
  }
}

try {
  process.exitCode = main();
} catch (err) {
  if (err instanceof PuzzleError) {
    console.error(`Error [${err.code}]: ${err.message}`);
  } else {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
  }
  process.exitCode = 1;
}
