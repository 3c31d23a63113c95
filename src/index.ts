/**
 * Calendar Tiling Solver
 *
 * Solves the daily calendar puzzle: cover every board cell except the date
 * with a set of polyominoes, each used exactly once, via exact cover and
 * dancing links.
 */

// Domain exports
export * from './domain/types.js';
export * from './domain/errors.js';
export * from './domain/constants.js';
export * from './domain/shape.js';
export * from './domain/board.js';

// Exact-cover engine exports
export * from './matrix/matrix-builder.js';
export * from './dlx/dancing-links.js';
export * from './dlx/algorithm-x.js';

// Solver exports
export * from './solver/solver.js';
export * from './solver/decoder.js';
export * from './solver/options.js';
export * from './solver/brute-force.js';
export * from './solver/validator.js';
export * from './solver/cross-check.js';

// Calendar exports
export * from './calendar/calendar.js';

// I/O exports
export * from './io/catalog-parser.js';
export * from './io/solution-formatter.js';
