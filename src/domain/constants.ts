/**
 * Constants for the calendar tiling solver
 */

import { SolverOptions } from './types.js';

// Default solver options: stop at the first cover, discovery order
export const DEFAULT_SOLVER_OPTIONS: SolverOptions = {
  mode: 'first',
  maxSolutions: 1,
  sortSolutions: false,
  partition: false,
};

// Built-in puzzle catalogs (puzzles/<name>.json)
export const BUILTIN_PUZZLES = ['classic', 'weekday'] as const;
export type BuiltinPuzzleName = (typeof BUILTIN_PUZZLES)[number];

export const DEFAULT_PUZZLE: BuiltinPuzzleName = 'classic';

// Shape rows in catalogs
export const SHAPE_FILLED = 'X';
export const SHAPE_EMPTY = '.';

// Rendering
export const PPM_CELL_SIZE_PX = 50;
export const PPM_UNCOVERED_RGB: [number, number, number] = [0, 0, 0];
export const PPM_FALLBACK_RGB: [number, number, number] = [200, 200, 200];

export const MONTH_NAMES = [
  'Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun',
  'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec',
];

export const WEEKDAY_NAMES = ['Sun', 'Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat'];
