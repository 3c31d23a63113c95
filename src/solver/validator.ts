/**
 * Independent check of a finished tiling
 */

import { BoardSpec, Cell, Piece, Placement, ValidationResult, cellKey } from '../domain/types.js';
import { createBoard, getOpenCells, isOnBoard } from '../domain/board.js';
import { orbit, shapeKey } from '../domain/shape.js';

/**
 * Validate that placements cover exactly the open board cells, without overlap,
 * using every piece exactly once in one of its orientations
 */
export function validateSolution(
  puzzle: { board: BoardSpec; pieces: Piece[] },
  excluded: readonly Cell[],
  placements: readonly Placement[]
): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  const board = createBoard(puzzle.board);
  const excludedKeys = new Set(excluded.map(cellKey));
  const covered = new Map<string, string>();
  const uses = new Map<string, number>();

  const orientationKeys = new Map<string, Set<string>>();
  for (const piece of puzzle.pieces) {
    orientationKeys.set(piece.id, new Set(orbit(piece).map(o => shapeKey(o.cells))));
  }

  for (const placement of placements) {
    const known = orientationKeys.get(placement.pieceId);
    if (known === undefined) {
      errors.push(`Unknown piece "${placement.pieceId}"`);
    } else if (!known.has(shapeKey(placement.cells))) {
      errors.push(`Placement of "${placement.pieceId}" does not match any of its orientations`);
    }
    uses.set(placement.pieceId, (uses.get(placement.pieceId) ?? 0) + 1);

    for (const cell of placement.cells) {
      const key = cellKey(cell);
      if (!isOnBoard(board, cell)) {
        errors.push(`"${placement.pieceId}" covers (${cell.row}, ${cell.col}), which is off the board`);
      } else if (excludedKeys.has(key)) {
        errors.push(`"${placement.pieceId}" covers excluded cell (${cell.row}, ${cell.col})`);
      }

      const owner = covered.get(key);
      if (owner !== undefined) {
        errors.push(`Cell (${cell.row}, ${cell.col}) is covered by both "${owner}" and "${placement.pieceId}"`);
      } else {
        covered.set(key, placement.pieceId);
      }
    }
  }

  for (const cell of getOpenCells(board, excluded)) {
    if (!covered.has(cellKey(cell))) {
      errors.push(`Cell (${cell.row}, ${cell.col}) is not covered`);
    }
  }

  for (const piece of puzzle.pieces) {
    const count = uses.get(piece.id) ?? 0;
    if (count !== 1) {
      errors.push(`Piece "${piece.id}" is used ${count} times`);
    }
  }

  if (placements.length === 0 && puzzle.pieces.length > 0) {
    warnings.push('Solution has no placements');
  }

  return { valid: errors.length === 0, errors, warnings };
}
