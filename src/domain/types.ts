/**
 * Core type definitions for the calendar tiling solver
 */

// A board square, or a relative offset inside a piece shape
export interface Cell {
  row: number;
  col: number;
}

// A set of relative offsets, kept sorted row-major once normalized
export type Shape = readonly Cell[];

// A piece from the catalog
export interface Piece {
  id: string;
  name: string;
  cells: Shape;
  color?: string; // #RRGGBB, used by the PPM renderer
}

// Board description as loaded from a catalog
export interface BoardSpec {
  rows: number;
  cols: number;
  blocked: Cell[]; // cells inside the rectangle that are not part of the board
}

// One rotation/reflection of a piece
export interface Orientation {
  pieceId: string;
  index: number; // position in the piece's orbit
  cells: Shape;
  height: number;
  width: number;
}

// A piece orientation anchored on the board (a candidate row)
export interface Placement {
  pieceId: string;
  orientation: number;
  anchor: Cell; // top-left corner of the orientation's bounding box
  cells: Cell[];
}

// Where the date cells sit on a board
export interface CalendarLayout {
  months: Cell[]; // index 0 = January
  days: Cell[]; // index 0 = day 1
  weekdays?: Cell[]; // index 0 = Sunday
}

// A complete puzzle: board, pieces and (optionally) its calendar layout
export interface Puzzle {
  name: string;
  board: BoardSpec;
  pieces: Piece[];
  calendar?: CalendarLayout;
}

// cell key -> piece id
export type CellAssignment = ReadonlyMap<string, string>;

// Decoded solution
export interface TilingSolution {
  placements: Placement[];
  assignment: CellAssignment;
}

// Search statistics
export interface SearchStats {
  nodesExplored: number;
  solutionsFound: number;
  timeTaken: number;
  exhausted: boolean; // true when every branch was visited
}

export type SolveMode = 'first' | 'all';

// Solver options
export interface SolverOptions {
  mode: SolveMode;
  maxSolutions: number;
  sortSolutions: boolean;
  partition: boolean; // search each top-level branch on its own structure
}

// Result of a solve; an unsolvable puzzle is a normal outcome, not an error
export type SolveResult =
  | { status: 'SOLVED'; solutions: TilingSolution[]; stats: SearchStats }
  | { status: 'UNSOLVABLE'; stats: SearchStats };

// Validation result
export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

// Helper type for cell key
export function cellKey(c: Cell): string {
  return `${c.row},${c.col}`;
}

export function compareCells(a: Cell, b: Cell): number {
  return a.row - b.row || a.col - b.col;
}

export function getAdjacentCells(c: Cell): Cell[] {
  return [
    { row: c.row - 1, col: c.col }, // Up
    { row: c.row + 1, col: c.col }, // Down
    { row: c.row, col: c.col - 1 }, // Left
    { row: c.row, col: c.col + 1 }, // Right
  ];
}
