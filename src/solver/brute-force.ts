/**
 * Reference solver: plain backtracking over board cells.
 *
 * The first uncovered cell (row-major) must be covered by some unused piece;
 * every placement covering it is tried in turn. Slow but independent of the
 * exact-cover matrix and the dancing-links search, which it cross-checks.
 */

import { BoardSpec, Cell, Piece, Placement, SolveResult, SolverOptions, TilingSolution, cellKey } from '../domain/types.js';
import { InvalidPieceShapeError } from '../domain/errors.js';
import { createBoard, getOpenCells, placementsFor, validateExcludedCells } from '../domain/board.js';
import { validatePiece } from '../domain/shape.js';
import { assignPlacements, sortSolutions } from './decoder.js';
import { resolveSolverOptions } from './options.js';

interface Candidate {
  pieceIndex: number;
  placement: Placement;
}

export function solveBruteForce(
  puzzle: { board: BoardSpec; pieces: Piece[] },
  excluded: readonly Cell[],
  options: Partial<SolverOptions> = {}
): SolveResult {
  const opts = resolveSolverOptions(options);
  const startTime = Date.now();

  const board = createBoard(puzzle.board);
  validateExcludedCells(board, excluded);
  const seenIds = new Set<string>();
  for (const piece of puzzle.pieces) {
    if (seenIds.has(piece.id)) {
      throw new InvalidPieceShapeError(`Piece id "${piece.id}" is declared twice`, piece.id);
    }
    seenIds.add(piece.id);
    validatePiece(piece);
  }

  const openCells = getOpenCells(board, excluded);

  // Candidates by the cell they cover, in piece then placement order
  const byCell = new Map<string, Candidate[]>();
  puzzle.pieces.forEach((piece, pieceIndex) => {
    for (const placement of placementsFor(piece, board, excluded)) {
      for (const cell of placement.cells) {
        const key = cellKey(cell);
        const list = byCell.get(key) ?? [];
        list.push({ pieceIndex, placement });
        byCell.set(key, list);
      }
    }
  });

  const filled = new Set<string>();
  const used: boolean[] = puzzle.pieces.map(() => false);
  const stack: Placement[] = [];
  const found: TilingSolution[] = [];
  let nodesExplored = 0;
  let stopped = false;

  const search = (start: number): void => {
    let next = start;
    while (next < openCells.length && filled.has(cellKey(openCells[next]))) {
      next++;
    }

    if (next === openCells.length) {
      if (used.every(Boolean)) {
        found.push(assignPlacements(stack));
        if (found.length >= opts.maxSolutions) stopped = true;
      }
      return;
    }

    for (const candidate of byCell.get(cellKey(openCells[next])) ?? []) {
      if (used[candidate.pieceIndex]) continue;
      if (candidate.placement.cells.some(cell => filled.has(cellKey(cell)))) continue;

      nodesExplored++;
      used[candidate.pieceIndex] = true;
      for (const cell of candidate.placement.cells) filled.add(cellKey(cell));
      stack.push(candidate.placement);

      search(next + 1);

      stack.pop();
      for (const cell of candidate.placement.cells) filled.delete(cellKey(cell));
      used[candidate.pieceIndex] = false;

      if (stopped) break;
    }
  };

  const pieceArea = puzzle.pieces.reduce((sum, piece) => sum + piece.cells.length, 0);
  if (pieceArea === openCells.length) {
    search(0);
  }

  const stats = {
    nodesExplored,
    solutionsFound: found.length,
    timeTaken: Date.now() - startTime,
    exhausted: !stopped,
  };

  if (found.length === 0) {
    return { status: 'UNSOLVABLE', stats };
  }

  return {
    status: 'SOLVED',
    solutions: opts.sortSolutions ? sortSolutions(found, puzzle.pieces) : found,
    stats,
  };
}
