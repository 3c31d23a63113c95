/**
 * Piece shapes: normalization, rotation/reflection orbits and validation
 */

import { Cell, Orientation, Piece, Shape, cellKey, compareCells, getAdjacentCells } from './types.js';
import { InvalidPieceShapeError } from './errors.js';
import { SHAPE_EMPTY, SHAPE_FILLED } from './constants.js';

/**
 * Translate a shape so its minimum row and column are 0, sorted row-major.
 * The result is the canonical form used to compare orientations.
 */
export function normalize(shape: Shape): Cell[] {
  if (shape.length === 0) return [];

  let minRow = Infinity;
  let minCol = Infinity;
  for (const cell of shape) {
    minRow = Math.min(minRow, cell.row);
    minCol = Math.min(minCol, cell.col);
  }

  return shape
    .map(cell => ({ row: cell.row - minRow, col: cell.col - minCol }))
    .sort(compareCells);
}

export function shapeKey(shape: Shape): string {
  return normalize(shape).map(cellKey).join(';');
}

/**
 * Rotate 90° clockwise: (row, col) -> (col, -row)
 */
export function rotate90(shape: Shape): Cell[] {
  return shape.map(cell => ({ row: cell.col, col: -cell.row }));
}

/**
 * Mirror across the vertical axis
 */
export function mirror(shape: Shape): Cell[] {
  return shape.map(cell => ({ row: cell.row, col: -cell.col }));
}

export function shapeBounds(shape: Shape): { height: number; width: number } {
  let height = 0;
  let width = 0;
  for (const cell of normalize(shape)) {
    height = Math.max(height, cell.row + 1);
    width = Math.max(width, cell.col + 1);
  }
  return { height, width };
}

/**
 * All distinct orientations of a piece: the 4 rotations, then the 4 rotations
 * of its mirror image. Orientations that coincide after translation are kept once,
 * in order of first appearance.
 */
export function orbit(piece: Piece): Orientation[] {
  const seen = new Set<string>();
  const orientations: Orientation[] = [];
  let current: Shape = piece.cells;

  for (let flip = 0; flip < 2; flip++) {
    for (let turn = 0; turn < 4; turn++) {
      const cells = normalize(current);
      const key = cells.map(cellKey).join(';');

      if (!seen.has(key)) {
        seen.add(key);
        orientations.push({
          pieceId: piece.id,
          index: orientations.length,
          cells,
          ...shapeBounds(cells),
        });
      }
      current = rotate90(current);
    }
    current = mirror(current);
  }

  return orientations;
}

/**
 * Reject empty shapes, non-integer or duplicate offsets and shapes whose cells
 * are not edge-connected.
 */
export function validatePiece(piece: Piece): void {
  if (piece.cells.length === 0) {
    throw new InvalidPieceShapeError(`Piece "${piece.id}" has no cells`, piece.id);
  }

  const keys = new Set<string>();
  for (const cell of piece.cells) {
    if (!Number.isInteger(cell.row) || !Number.isInteger(cell.col)) {
      throw new InvalidPieceShapeError(
        `Piece "${piece.id}" has a non-integer offset (${cell.row}, ${cell.col})`,
        piece.id
      );
    }
    const key = cellKey(cell);
    if (keys.has(key)) {
      throw new InvalidPieceShapeError(
        `Piece "${piece.id}" repeats offset (${cell.row}, ${cell.col})`,
        piece.id
      );
    }
    keys.add(key);
  }

  // Flood fill from the first cell
  const reached = new Set<string>([cellKey(piece.cells[0])]);
  const queue: Cell[] = [piece.cells[0]];
  while (queue.length > 0) {
    const cell = queue.pop();
    if (cell === undefined) break;
    for (const next of getAdjacentCells(cell)) {
      const key = cellKey(next);
      if (keys.has(key) && !reached.has(key)) {
        reached.add(key);
        queue.push(next);
      }
    }
  }

  if (reached.size !== keys.size) {
    throw new InvalidPieceShapeError(`Piece "${piece.id}" is not connected`, piece.id);
  }
}

/**
 * Parse a shape drawn as text rows:
 * ```
 * XXX
 * X..
 * ```
 */
export function parseShapeRows(rows: readonly string[], pieceId: string): Cell[] {
  const cells: Cell[] = [];

  rows.forEach((line, row) => {
    [...line].forEach((char, col) => {
      if (char === SHAPE_FILLED) {
        cells.push({ row, col });
      } else if (char !== SHAPE_EMPTY && char !== ' ') {
        throw new InvalidPieceShapeError(
          `Piece "${pieceId}" uses unknown shape character "${char}"`,
          pieceId
        );
      }
    });
  });

  return cells;
}

/**
 * Inverse of parseShapeRows, on the normalized shape
 */
export function formatShapeRows(shape: Shape): string[] {
  const { height, width } = shapeBounds(shape);
  const rows = Array.from({ length: height }, () => Array<string>(width).fill(SHAPE_EMPTY));
  for (const cell of normalize(shape)) {
    rows[cell.row][cell.col] = SHAPE_FILLED;
  }
  return rows.map(row => row.join(''));
}
