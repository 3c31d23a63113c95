/**
 * Parse puzzle catalogs (board, pieces, calendar layout) from JSON
 */

import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';

import { CalendarLayout, Cell, Piece, Puzzle } from '../domain/types.js';
import { BUILTIN_PUZZLES } from '../domain/constants.js';
import { InvalidCatalogError } from '../domain/errors.js';
import { createBoard, isOnBoard } from '../domain/board.js';
import { formatShapeRows, parseShapeRows, validatePiece } from '../domain/shape.js';

// Catalogs live in <project>/puzzles, both from src/io and from dist/src/io
const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);
const PUZZLE_DIR_CANDIDATES = [
  path.join(__dirname, '../../puzzles'),
  path.join(__dirname, '../../../puzzles'),
];

const CellSchema = z
  .tuple([z.number().int().nonnegative(), z.number().int().nonnegative()])
  .transform(([row, col]): Cell => ({ row, col }));

const PieceSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1).optional(),
  shape: z.array(z.string().min(1)).min(1),
  color: z
    .string()
    .regex(/^#[0-9a-fA-F]{6}$/, 'color must be #RRGGBB')
    .optional(),
});

const CalendarSchema = z.object({
  months: z.array(CellSchema).length(12),
  days: z.array(CellSchema).length(31),
  weekdays: z.array(CellSchema).length(7).optional(),
});

export const PuzzleSchema = z.object({
  name: z.string().min(1),
  description: z.string().optional(),
  board: z.object({
    rows: z.number().int().positive(),
    cols: z.number().int().positive(),
    blocked: z.array(CellSchema).default([]),
  }),
  pieces: z.array(PieceSchema).min(1),
  calendar: CalendarSchema.optional(),
});

/**
 * Input format for a puzzle catalog
 */
export type PuzzleInput = z.input<typeof PuzzleSchema>;

/**
 * Parse JSON input into a puzzle
 */
export function parsePuzzleFromJSON(json: string): Puzzle {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (err) {
    throw new InvalidCatalogError(`Puzzle catalog is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
  return createPuzzleFromInput(raw);
}

/**
 * Validate structured input and build the puzzle
 */
export function createPuzzleFromInput(input: unknown): Puzzle {
  const parsed = PuzzleSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new InvalidCatalogError(`Invalid puzzle catalog: ${issues.join('; ')}`, issues);
  }

  const data = parsed.data;
  const board = createBoard(data.board);

  const pieces: Piece[] = data.pieces.map(pieceInput => {
    const piece: Piece = {
      id: pieceInput.id,
      name: pieceInput.name ?? pieceInput.id,
      cells: parseShapeRows(pieceInput.shape, pieceInput.id),
    };
    if (pieceInput.color !== undefined) {
      piece.color = pieceInput.color;
    }
    validatePiece(piece);
    return piece;
  });

  const ids = new Set<string>();
  for (const piece of pieces) {
    if (ids.has(piece.id)) {
      throw new InvalidCatalogError(`Piece id "${piece.id}" is declared twice`, [`pieces: duplicate id ${piece.id}`]);
    }
    ids.add(piece.id);
  }

  let calendar: CalendarLayout | undefined;
  if (data.calendar) {
    calendar = { months: data.calendar.months, days: data.calendar.days };
    if (data.calendar.weekdays) {
      calendar.weekdays = data.calendar.weekdays;
    }

    const all = [...calendar.months, ...calendar.days, ...(calendar.weekdays ?? [])];
    const offBoard = all.filter(cell => !isOnBoard(board, cell));
    if (offBoard.length > 0) {
      const issues = offBoard.map(cell => `calendar: cell (${cell.row}, ${cell.col}) is not on the board`);
      throw new InvalidCatalogError(`Invalid puzzle catalog: ${issues.join('; ')}`, issues);
    }
  }

  const puzzle: Puzzle = {
    name: data.name,
    board: { rows: data.board.rows, cols: data.board.cols, blocked: data.board.blocked },
    pieces,
  };
  if (calendar) {
    puzzle.calendar = calendar;
  }
  return puzzle;
}

/**
 * Load a catalog file
 */
export function loadPuzzleFile(filePath: string): Puzzle {
  const content = fs.readFileSync(filePath, 'utf-8');
  return parsePuzzleFromJSON(content);
}

export function isBuiltinPuzzle(name: string): name is (typeof BUILTIN_PUZZLES)[number] {
  return BUILTIN_PUZZLES.some(builtin => builtin === name);
}

/**
 * Load one of the catalogs shipped in puzzles/
 */
export function loadBuiltinPuzzle(name: string): Puzzle {
  if (!isBuiltinPuzzle(name)) {
    throw new InvalidCatalogError(`Unknown puzzle "${name}" (available: ${BUILTIN_PUZZLES.join(', ')})`);
  }

  const dir = PUZZLE_DIR_CANDIDATES.find(candidate => fs.existsSync(path.join(candidate, `${name}.json`)));
  if (dir === undefined) {
    throw new InvalidCatalogError(`Catalog file for puzzle "${name}" was not found`);
  }
  return loadPuzzleFile(path.join(dir, `${name}.json`));
}

/**
 * Export a puzzle back to catalog JSON
 */
export function exportPuzzleToJSON(puzzle: Puzzle): string {
  const toPair = (cell: Cell): [number, number] => [cell.row, cell.col];

  const output: PuzzleInput = {
    name: puzzle.name,
    board: {
      rows: puzzle.board.rows,
      cols: puzzle.board.cols,
      blocked: puzzle.board.blocked.map(toPair),
    },
    pieces: puzzle.pieces.map(piece => ({
      id: piece.id,
      name: piece.name,
      shape: formatShapeRows(piece.cells),
      ...(piece.color !== undefined ? { color: piece.color } : {}),
    })),
  };

  if (puzzle.calendar) {
    output.calendar = {
      months: puzzle.calendar.months.map(toPair),
      days: puzzle.calendar.days.map(toPair),
      ...(puzzle.calendar.weekdays ? { weekdays: puzzle.calendar.weekdays.map(toPair) } : {}),
    };
  }

  return JSON.stringify(output, null, 2);
}
