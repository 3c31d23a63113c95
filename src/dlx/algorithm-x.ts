/**
 * Algorithm X over dancing links
 */

import { SearchStats } from '../domain/types.js';
import { ExactCoverInstance } from '../matrix/matrix-builder.js';
import { DancingLinks } from './dancing-links.js';

export interface SearchOptions {
  /** Stop after this many solutions; 1 = first solution, Infinity = all */
  maxSolutions?: number;
  /** Called with each solution as it is found; returning false stops the search */
  onSolution?: (rows: readonly number[]) => boolean | void;
  /** Rows forced into every solution before the search starts */
  presetRows?: readonly number[];
}

export interface SearchResult {
  /** Row indices of each solution, in discovery order */
  solutions: number[][];
  stats: SearchStats;
}

/**
 * Find exact covers of an instance. Builds a fresh dancing-links structure, so
 * independent calls never share state.
 */
export function searchExactCover(instance: ExactCoverInstance, options: SearchOptions = {}): SearchResult {
  return searchDancingLinks(new DancingLinks(instance), options);
}

/**
 * Run Algorithm X on an existing structure. The structure is restored to its
 * starting state when the search returns, whether it ran to the end, stopped early
 * or was interrupted by an exception from onSolution.
 */
export function searchDancingLinks(dlx: DancingLinks, options: SearchOptions = {}): SearchResult {
  const maxSolutions = options.maxSolutions ?? Infinity;
  if (!(maxSolutions >= 1)) {
    throw new RangeError(`maxSolutions must be at least 1, got ${maxSolutions}`);
  }

  const startTime = Date.now();
  const solutions: number[][] = [];
  const stack: number[] = [];
  let nodesExplored = 0;
  let stopped = false;

  const emit = (): void => {
    const rows = [...stack];
    solutions.push(rows);
    const keepGoing = options.onSolution?.(rows);
    if (keepGoing === false || solutions.length >= maxSolutions) {
      stopped = true;
    }
  };

  const search = (): void => {
    const column = dlx.chooseColumn();
    if (column === null) {
      emit();
      return;
    }
    if (dlx.columnSize(column) === 0) return;

    dlx.cover(column);
    try {
      for (const row of dlx.rowsOf(column)) {
        nodesExplored++;
        stack.push(row);

        const others = dlx.otherColumns(row, column);
        for (const other of others) {
          dlx.cover(other);
        }

        try {
          search();
        } finally {
          for (let k = others.length - 1; k >= 0; k--) {
            dlx.uncover(others[k]);
          }
          stack.pop();
        }

        if (stopped) break;
      }
    } finally {
      dlx.uncover(column);
    }
  };

  // Preset rows are selected up front and undone in reverse afterwards,
  // also when onSolution throws
  const selected: number[] = [];
  try {
    let presetsFit = true;
    for (const row of options.presetRows ?? []) {
      if (!dlx.selectRow(row)) {
        presetsFit = false;
        break;
      }
      selected.push(row);
      stack.push(row);
    }

    if (presetsFit) {
      search();
    }
  } finally {
    for (let k = selected.length - 1; k >= 0; k--) {
      dlx.deselectRow(selected[k]);
    }
  }

  return {
    solutions,
    stats: {
      nodesExplored,
      solutionsFound: solutions.length,
      timeTaken: Date.now() - startTime,
      exhausted: !stopped,
    },
  };
}

/**
 * Split the search on its first branching column: one preset per candidate row.
 * Each branch can be searched on its own copy of the structure; concatenating
 * the branch results in order gives the result of the full search.
 * An instance with no columns has a single, empty branch; an instance whose
 * first column has no rows has none.
 */
export function partitionTopLevel(instance: ExactCoverInstance): number[][] {
  const dlx = new DancingLinks(instance);
  const column = dlx.chooseColumn();
  if (column === null) return [[]];
  return dlx.rowsOf(column).map(row => [row]);
}

/**
 * Search every top-level branch independently and merge the results
 */
export function searchPartitioned(
  instance: ExactCoverInstance,
  options: Omit<SearchOptions, 'presetRows'> = {}
): SearchResult {
  const startTime = Date.now();
  const maxSolutions = options.maxSolutions ?? Infinity;
  const solutions: number[][] = [];
  let nodesExplored = 0;
  let exhausted = true;

  for (const branch of partitionTopLevel(instance)) {
    const result = searchExactCover(instance, {
      ...options,
      presetRows: branch,
      maxSolutions: maxSolutions - solutions.length,
    });

    solutions.push(...result.solutions);
    // The branch row itself counts as one explored node
    nodesExplored += result.stats.nodesExplored + branch.length;

    if (!result.stats.exhausted) {
      exhausted = false;
      break;
    }
  }

  return {
    solutions,
    stats: {
      nodesExplored,
      solutionsFound: solutions.length,
      timeTaken: Date.now() - startTime,
      exhausted,
    },
  };
}
