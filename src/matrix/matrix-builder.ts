/**
 * Translation of board + pieces into an exact-cover matrix.
 *
 * Columns are the open board cells (row-major) followed by one column per piece
 * (declaration order). Rows are the legal placements: pieces in declaration order,
 * orientations in orbit order, anchors row-major. Each row lists its cell columns
 * in ascending order, then its piece column.
 */

import { BoardSpec, Cell, Piece, Placement, cellKey } from '../domain/types.js';
import { Board, createBoard, getOpenCells, placementsFor, validateExcludedCells } from '../domain/board.js';
import { validatePiece } from '../domain/shape.js';
import { InvalidPieceShapeError } from '../domain/errors.js';

/**
 * A generic exact-cover instance: rows are lists of column indices
 */
export interface ExactCoverInstance {
  columnCount: number;
  rows: ReadonlyArray<{ columns: readonly number[] }>;
}

export type ColumnDef =
  | { kind: 'cell'; cell: Cell }
  | { kind: 'piece'; pieceId: string };

export interface MatrixRow {
  placement: Placement;
  columns: number[];
}

export interface ExactCoverMatrix extends ExactCoverInstance {
  board: Board;
  excluded: Cell[];
  pieces: Piece[];
  columns: ColumnDef[];
  rows: MatrixRow[];
  cellColumns: Map<string, number>;
  pieceColumns: Map<string, number>;
}

/**
 * Build the exact-cover matrix for one puzzle instance.
 * Excluded cells and piece shapes are validated before any row is generated.
 */
export function buildExactCoverMatrix(
  puzzle: { board: BoardSpec; pieces: Piece[] },
  excluded: readonly Cell[]
): ExactCoverMatrix {
  const board = createBoard(puzzle.board);
  validateExcludedCells(board, excluded);

  const pieceIds = new Set<string>();
  for (const piece of puzzle.pieces) {
    if (pieceIds.has(piece.id)) {
      throw new InvalidPieceShapeError(`Piece id "${piece.id}" is declared twice`, piece.id);
    }
    pieceIds.add(piece.id);
    validatePiece(piece);
  }

  const columns: ColumnDef[] = [];
  const cellColumns = new Map<string, number>();
  const pieceColumns = new Map<string, number>();

  for (const cell of getOpenCells(board, excluded)) {
    cellColumns.set(cellKey(cell), columns.length);
    columns.push({ kind: 'cell', cell });
  }

  for (const piece of puzzle.pieces) {
    pieceColumns.set(piece.id, columns.length);
    columns.push({ kind: 'piece', pieceId: piece.id });
  }

  const rows: MatrixRow[] = [];
  for (const piece of puzzle.pieces) {
    const pieceColumn = pieceColumns.get(piece.id);
    if (pieceColumn === undefined) continue;

    for (const placement of placementsFor(piece, board, excluded)) {
      const cellIndices: number[] = [];
      for (const cell of placement.cells) {
        const column = cellColumns.get(cellKey(cell));
        if (column !== undefined) cellIndices.push(column);
      }
      cellIndices.sort((a, b) => a - b);
      rows.push({ placement, columns: [...cellIndices, pieceColumn] });
    }
  }

  return {
    board,
    excluded: [...excluded],
    pieces: [...puzzle.pieces],
    columnCount: columns.length,
    columns,
    rows,
    cellColumns,
    pieceColumns,
  };
}

/**
 * Human-readable column label, for diagnostics
 */
export function describeColumn(column: ColumnDef): string {
  return column.kind === 'cell'
    ? `cell (${column.cell.row}, ${column.cell.col})`
    : `piece ${column.pieceId}`;
}
