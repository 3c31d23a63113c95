/**
 * Small puzzles shared by the tests
 */

import { Cell, Piece, Puzzle } from '../src/domain/types.js';
import { parseShapeRows } from '../src/domain/shape.js';

export function piece(id: string, rows: string[], color?: string): Piece {
  const result: Piece = { id, name: id, cells: parseShapeRows(rows, id) };
  if (color !== undefined) result.color = color;
  return result;
}

export function dominoes(count: number): Piece[] {
  return Array.from({ length: count }, (_, i) => piece(`D${i + 1}`, ['XX']));
}

/**
 * 4x4 board, corners (0,0) and (3,3) excluded, two 7-cell pieces
 */
export const HEPTOMINO_PUZZLE: Puzzle = {
  name: 'heptominoes',
  board: { rows: 4, cols: 4, blocked: [] },
  pieces: [piece('A', ['.XXX', 'XXXX']), piece('B', ['XXXX', 'XXX.'])],
};

export const HEPTOMINO_EXCLUDED: Cell[] = [
  { row: 0, col: 0 },
  { row: 3, col: 3 },
];

/**
 * 2x3 board, three dominoes, nothing excluded
 */
export const DOMINO_PUZZLE: Puzzle = {
  name: 'dominoes',
  board: { rows: 2, cols: 3, blocked: [] },
  pieces: dominoes(3),
};

/**
 * Exact-cover example from Knuth's "Dancing Links" paper; its only cover is rows 3, 0, 4
 */
export const KNUTH_INSTANCE = {
  columnCount: 7,
  rows: [
    { columns: [2, 4, 5] },
    { columns: [0, 3, 6] },
    { columns: [1, 2, 5] },
    { columns: [0, 3] },
    { columns: [1, 6] },
    { columns: [3, 4, 6] },
  ],
};
