/**
 * Error taxonomy. Construction-time errors abort before any search begins;
 * an unsolvable puzzle is reported through SolveResult instead.
 */

export type PuzzleErrorCode =
  | 'INVALID_PIECE_SHAPE'
  | 'INVALID_EXCLUDED_CELL'
  | 'INVALID_BOARD'
  | 'INVALID_CATALOG'
  | 'INVALID_DATE'
  | 'MALFORMED_SOLUTION'
  | 'COVER_ORDER';

/** Base class for every error raised by the solver */
export class PuzzleError extends Error {
  constructor(
    message: string,
    public readonly code: PuzzleErrorCode
  ) {
    super(message);
    this.name = 'PuzzleError';
  }
}

export class InvalidPieceShapeError extends PuzzleError {
  constructor(
    message: string,
    public readonly pieceId: string
  ) {
    super(message, 'INVALID_PIECE_SHAPE');
    this.name = 'InvalidPieceShapeError';
  }
}

export class InvalidExcludedCellError extends PuzzleError {
  constructor(message: string) {
    super(message, 'INVALID_EXCLUDED_CELL');
    this.name = 'InvalidExcludedCellError';
  }
}

export class InvalidBoardError extends PuzzleError {
  constructor(message: string) {
    super(message, 'INVALID_BOARD');
    this.name = 'InvalidBoardError';
  }
}

export class InvalidCatalogError extends PuzzleError {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(message, 'INVALID_CATALOG');
    this.name = 'InvalidCatalogError';
  }
}

export class InvalidDateError extends PuzzleError {
  constructor(message: string) {
    super(message, 'INVALID_DATE');
    this.name = 'InvalidDateError';
  }
}

/** Two placements of one solution claim the same cell: a bug, never a puzzle outcome */
export class MalformedSolutionError extends PuzzleError {
  constructor(message: string) {
    super(message, 'MALFORMED_SOLUTION');
    this.name = 'MalformedSolutionError';
  }
}

/** uncover() was called out of LIFO order relative to cover() */
export class CoverOrderError extends PuzzleError {
  constructor(message: string) {
    super(message, 'COVER_ORDER');
    this.name = 'CoverOrderError';
  }
}
