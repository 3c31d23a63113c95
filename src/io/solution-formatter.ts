/**
 * Format solutions for human-readable output
 */

import { BoardSpec, Cell, Piece, SolveResult, TilingSolution, cellKey } from '../domain/types.js';
import { CrossCheckReport } from '../solver/cross-check.js';
import { PPM_CELL_SIZE_PX, PPM_FALLBACK_RGB, PPM_UNCOVERED_RGB } from '../domain/constants.js';

const BLOCKED_SYMBOL = ' ';
const EXCLUDED_SYMBOL = '#';
const OPEN_SYMBOL = '.';

/**
 * Spreadsheet-style label: A..Z, then AA, AB, ...
 */
function labelFor(index: number): string {
  let label = '';
  for (let n = index + 1; n > 0; n = Math.floor((n - 1) / 26)) {
    label = String.fromCharCode(65 + ((n - 1) % 26)) + label;
  }
  return label;
}

/**
 * One distinct label per piece, in declaration order
 */
export function pieceLabels(pieces: readonly Piece[]): Map<string, string> {
  return new Map(pieces.map((piece, index) => [piece.id, labelFor(index)]));
}

/**
 * Format a board as text: piece labels, # for excluded cells, . for
 * uncovered cells and a blank where the board has no cell. Cells are padded
 * to the longest label.
 */
export function formatBoard(
  board: BoardSpec,
  pieces: readonly Piece[],
  solution: TilingSolution | null,
  excluded: readonly Cell[] = []
): string {
  const labels = pieceLabels(pieces);
  const width = Math.max(1, ...[...labels.values()].map(label => label.length));
  const blocked = new Set(board.blocked.map(cellKey));
  const skip = new Set(excluded.map(cellKey));
  const lines: string[] = [];

  for (let row = 0; row < board.rows; row++) {
    const symbols: string[] = [];
    for (let col = 0; col < board.cols; col++) {
      const key = cellKey({ row, col });
      const pieceId = solution?.assignment.get(key);

      if (blocked.has(key)) {
        symbols.push(BLOCKED_SYMBOL);
      } else if (pieceId !== undefined) {
        symbols.push(labels.get(pieceId) ?? '?');
      } else if (skip.has(key)) {
        symbols.push(EXCLUDED_SYMBOL);
      } else {
        symbols.push(OPEN_SYMBOL);
      }
    }
    lines.push(symbols.map(symbol => symbol.padEnd(width)).join(' ').trimEnd());
  }

  return lines.join('\n');
}

/**
 * Format the piece legend
 */
export function formatLegend(pieces: readonly Piece[]): string {
  const labels = pieceLabels(pieces);
  return pieces.map(piece => `${labels.get(piece.id)} = ${piece.name} (${piece.id})`).join('\n');
}

/**
 * Format a complete solve result for console output
 */
export function formatSolveResult(
  result: SolveResult,
  puzzle: { board: BoardSpec; pieces: Piece[] },
  excluded: readonly Cell[]
): string {
  const lines: string[] = [];

  lines.push('=== CALENDAR SOLUTION ===');
  lines.push('');

  if (result.status === 'UNSOLVABLE') {
    lines.push('No tiling exists for these cells.');
    lines.push('');
    lines.push(formatBoard(puzzle.board, puzzle.pieces, null, excluded));
  } else {
    result.solutions.forEach((solution, index) => {
      if (result.solutions.length > 1) {
        lines.push(`Solution ${index + 1}:`);
      }
      lines.push(formatBoard(puzzle.board, puzzle.pieces, solution, excluded));
      lines.push('');
    });
    lines.push(formatLegend(puzzle.pieces));
  }

  lines.push('');
  lines.push('=== SEARCH STATISTICS ===');
  lines.push(`Solutions Found: ${result.stats.solutionsFound}`);
  lines.push(`Nodes Explored: ${result.stats.nodesExplored.toLocaleString('en-US')}`);
  lines.push(`Time Taken: ${result.stats.timeTaken}ms`);
  lines.push(`Search Complete: ${result.stats.exhausted ? 'Yes' : 'No (stopped at solution limit)'}`);

  return lines.join('\n');
}

/**
 * Format a solve result as JSON, with the cross-check report when one ran
 */
export function formatSolveResultJSON(result: SolveResult, check?: CrossCheckReport): string {
  return JSON.stringify({
    status: result.status,
    stats: result.stats,
    ...(check !== undefined ? { check } : {}),
    solutions: result.status === 'SOLVED'
      ? result.solutions.map(solution => ({
          placements: solution.placements.map(p => ({
            piece: p.pieceId,
            orientation: p.orientation,
            anchor: [p.anchor.row, p.anchor.col],
            cells: p.cells.map(c => [c.row, c.col]),
          })),
        }))
      : [],
  }, null, 2);
}

/**
 * Parse #RRGGBB
 */
export function hexToRgb(color: string): [number, number, number] {
  const match = /^#?([0-9a-fA-F]{2})([0-9a-fA-F]{2})([0-9a-fA-F]{2})$/.exec(color);
  if (!match) return PPM_FALLBACK_RGB;
  return [parseInt(match[1], 16), parseInt(match[2], 16), parseInt(match[3], 16)];
}

/**
 * Render a solution as a plain PPM (P3) image, one colour per piece
 */
export function renderToPpm(
  board: BoardSpec,
  pieces: readonly Piece[],
  solution: TilingSolution,
  cellSize: number = PPM_CELL_SIZE_PX
): string {
  const colors = new Map(pieces.map(piece => [piece.id, piece.color ? hexToRgb(piece.color) : PPM_FALLBACK_RGB]));
  const lines: string[] = [`P3`, `${board.cols * cellSize} ${board.rows * cellSize}`, '255'];

  for (let row = 0; row < board.rows; row++) {
    const pixelRow: string[] = [];
    for (let col = 0; col < board.cols; col++) {
      const pieceId = solution.assignment.get(cellKey({ row, col }));
      const rgb = (pieceId !== undefined ? colors.get(pieceId) : undefined) ?? PPM_UNCOVERED_RGB;
      for (let x = 0; x < cellSize; x++) {
        pixelRow.push(rgb.join(' '));
      }
    }
    for (let y = 0; y < cellSize; y++) {
      lines.push(...pixelRow);
    }
  }

  return lines.join('\n') + '\n';
}
