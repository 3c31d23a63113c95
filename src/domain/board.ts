/**
 * Board representation and candidate placement generation
 */

import { BoardSpec, Cell, Piece, Placement, cellKey } from './types.js';
import { InvalidBoardError, InvalidExcludedCellError } from './errors.js';
import { orbit } from './shape.js';

export interface Board {
  rows: number;
  cols: number;
  cells: Cell[]; // row-major
  blocked: Set<string>;
}

/**
 * Create a board from its description
 */
export function createBoard(spec: BoardSpec): Board {
  if (!Number.isInteger(spec.rows) || !Number.isInteger(spec.cols) || spec.rows <= 0 || spec.cols <= 0) {
    throw new InvalidBoardError(`Board size ${spec.rows}x${spec.cols} must be positive integers`);
  }

  const blocked = new Set<string>();
  for (const cell of spec.blocked) {
    if (!isInBounds(spec.rows, spec.cols, cell)) {
      throw new InvalidBoardError(`Blocked cell (${cell.row}, ${cell.col}) is outside the board`);
    }
    blocked.add(cellKey(cell));
  }

  const cells: Cell[] = [];
  for (let row = 0; row < spec.rows; row++) {
    for (let col = 0; col < spec.cols; col++) {
      if (!blocked.has(cellKey({ row, col }))) {
        cells.push({ row, col });
      }
    }
  }

  return { rows: spec.rows, cols: spec.cols, cells, blocked };
}

function isInBounds(rows: number, cols: number, cell: Cell): boolean {
  return cell.row >= 0 && cell.row < rows && cell.col >= 0 && cell.col < cols;
}

/**
 * Check if a cell is part of the board (inside the rectangle and not blocked)
 */
export function isOnBoard(board: Board, cell: Cell): boolean {
  return isInBounds(board.rows, board.cols, cell) && !board.blocked.has(cellKey(cell));
}

/**
 * Excluded cells must be distinct board cells
 */
export function validateExcludedCells(board: Board, excluded: readonly Cell[]): void {
  const seen = new Set<string>();

  for (const cell of excluded) {
    if (!isOnBoard(board, cell)) {
      throw new InvalidExcludedCellError(`Excluded cell (${cell.row}, ${cell.col}) is not on the board`);
    }
    const key = cellKey(cell);
    if (seen.has(key)) {
      throw new InvalidExcludedCellError(`Excluded cell (${cell.row}, ${cell.col}) is listed twice`);
    }
    seen.add(key);
  }
}

/**
 * Board cells left to cover, row-major
 */
export function getOpenCells(board: Board, excluded: readonly Cell[]): Cell[] {
  const skip = new Set(excluded.map(cellKey));
  return board.cells.filter(cell => !skip.has(cellKey(cell)));
}

/**
 * Every legal placement of a piece: orientations in orbit order, anchors row-major.
 * Only board bounds and excluded cells are checked; overlaps with other pieces are
 * left to the exact-cover matrix.
 */
export function placementsFor(piece: Piece, board: Board, excluded: readonly Cell[] = []): Placement[] {
  const skip = new Set(excluded.map(cellKey));
  const placements: Placement[] = [];

  for (const orientation of orbit(piece)) {
    for (let row = 0; row + orientation.height <= board.rows; row++) {
      for (let col = 0; col + orientation.width <= board.cols; col++) {
        const cells = orientation.cells.map(offset => ({ row: row + offset.row, col: col + offset.col }));
        const fits = cells.every(cell => isOnBoard(board, cell) && !skip.has(cellKey(cell)));

        if (fits) {
          placements.push({
            pieceId: piece.id,
            orientation: orientation.index,
            anchor: { row, col },
            cells,
          });
        }
      }
    }
  }

  return placements;
}
