/**
 * Map selected matrix rows back to piece placements on the board
 */

import { BoardSpec, Piece, Placement, TilingSolution, cellKey, compareCells } from '../domain/types.js';
import { MalformedSolutionError } from '../domain/errors.js';
import { ExactCoverMatrix } from '../matrix/matrix-builder.js';

/**
 * Decode the rows of one exact cover
 */
export function decodeSolution(matrix: ExactCoverMatrix, rows: readonly number[]): TilingSolution {
  const placements = rows.map(rowIndex => {
    const row = matrix.rows[rowIndex];
    if (row === undefined) {
      throw new MalformedSolutionError(`Row ${rowIndex} is not part of the matrix`);
    }
    return row.placement;
  });
  return assignPlacements(placements);
}

/**
 * Build the cell -> piece assignment of a list of placements.
 * Two placements claiming one cell means the search is broken.
 */
export function assignPlacements(placements: readonly Placement[]): TilingSolution {
  const assignment = new Map<string, string>();

  for (const placement of placements) {
    for (const cell of placement.cells) {
      const key = cellKey(cell);
      const owner = assignment.get(key);
      if (owner !== undefined) {
        throw new MalformedSolutionError(
          `Cell (${cell.row}, ${cell.col}) is claimed by both "${owner}" and "${placement.pieceId}"`
        );
      }
      assignment.set(key, placement.pieceId);
    }
  }

  return { placements: [...placements], assignment };
}

/**
 * Solution as a rows x cols matrix of piece ids, null where no piece sits
 */
export function toGrid(board: BoardSpec, solution: TilingSolution): (string | null)[][] {
  const grid: (string | null)[][] = [];
  for (let row = 0; row < board.rows; row++) {
    const line: (string | null)[] = [];
    for (let col = 0; col < board.cols; col++) {
      line.push(solution.assignment.get(cellKey({ row, col })) ?? null);
    }
    grid.push(line);
  }
  return grid;
}

/**
 * Order-independent identity of a solution: placements in piece declaration
 * order, each written as its row-major cell list
 */
export function solutionSignature(solution: TilingSolution, pieces: readonly Piece[]): string {
  const order = new Map(pieces.map((piece, index) => [piece.id, index]));
  const rank = (placement: Placement): number => order.get(placement.pieceId) ?? pieces.length;

  return [...solution.placements]
    .sort((a, b) => rank(a) - rank(b) || a.pieceId.localeCompare(b.pieceId))
    .map(placement => {
      const cells = [...placement.cells].sort(compareCells).map(cellKey).join(' ');
      return `${placement.pieceId}:${cells}`;
    })
    .join('|');
}

/**
 * Canonical ordering of a solution list, independent of search order
 */
export function sortSolutions(solutions: readonly TilingSolution[], pieces: readonly Piece[]): TilingSolution[] {
  return solutions
    .map(solution => ({ solution, key: solutionSignature(solution, pieces) }))
    .sort((a, b) => (a.key < b.key ? -1 : a.key > b.key ? 1 : 0))
    .map(entry => entry.solution);
}
