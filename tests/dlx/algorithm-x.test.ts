/**
 * Tests for Algorithm X
 */

import { describe, it } from 'node:test';
import { strict as assert } from 'node:assert';
import {
  partitionTopLevel,
  searchDancingLinks,
  searchExactCover,
  searchPartitioned,
} from '../../src/dlx/algorithm-x.js';
import { DancingLinks } from '../../src/dlx/dancing-links.js';
import { KNUTH_INSTANCE } from '../fixtures.js';

// Two columns; {0,1} alone or {0} with {1}
const SMALL_INSTANCE = {
  columnCount: 2,
  rows: [{ columns: [0, 1] }, { columns: [0] }, { columns: [1] }],
};

describe('searchExactCover', () => {
  it('should find the unique cover', () => {
    const result = searchExactCover(KNUTH_INSTANCE);

    assert.deepStrictEqual(result.solutions, [[3, 0, 4]]);
    assert.strictEqual(result.stats.nodesExplored, 5);
    assert.strictEqual(result.stats.solutionsFound, 1);
    assert.strictEqual(result.stats.exhausted, true);
  });

  it('should report covers in discovery order', () => {
    const result = searchExactCover(SMALL_INSTANCE);

    assert.deepStrictEqual(result.solutions, [[0], [1, 2]]);
    assert.strictEqual(result.stats.nodesExplored, 3);
  });

  it('should stop at maxSolutions', () => {
    const result = searchExactCover(SMALL_INSTANCE, { maxSolutions: 1 });

    assert.deepStrictEqual(result.solutions, [[0]]);
    assert.strictEqual(result.stats.exhausted, false);
  });

  it('should stop when onSolution returns false', () => {
    const seen: number[][] = [];
    const result = searchExactCover(SMALL_INSTANCE, {
      onSolution: rows => {
        seen.push([...rows]);
        return false;
      },
    });

    assert.deepStrictEqual(seen, [[0]]);
    assert.strictEqual(result.stats.solutionsFound, 1);
  });

  it('should reject a limit below one', () => {
    assert.throws(() => searchExactCover(SMALL_INSTANCE, { maxSolutions: 0 }), RangeError);
  });

  it('should cover an instance without columns with the empty selection', () => {
    const result = searchExactCover({ columnCount: 0, rows: [] });
    assert.deepStrictEqual(result.solutions, [[]]);
  });

  it('should find nothing when a column has no rows', () => {
    const result = searchExactCover({ columnCount: 2, rows: [{ columns: [0] }] });

    assert.deepStrictEqual(result.solutions, []);
    assert.strictEqual(result.stats.nodesExplored, 0);
    assert.strictEqual(result.stats.exhausted, true);
  });

  it('should start from preset rows', () => {
    const result = searchExactCover(SMALL_INSTANCE, { presetRows: [1] });
    assert.deepStrictEqual(result.solutions, [[1, 2]]);
  });

  it('should find nothing when preset rows clash', () => {
    const result = searchExactCover(SMALL_INSTANCE, { presetRows: [0, 1] });
    assert.deepStrictEqual(result.solutions, []);
  });
});

describe('searchDancingLinks', () => {
  it('should leave the structure as it found it', () => {
    const dlx = new DancingLinks(KNUTH_INSTANCE);
    const before = dlx.snapshot();

    searchDancingLinks(dlx, { maxSolutions: 1 });

    assert.strictEqual(dlx.depth, 0);
    assert.deepStrictEqual(dlx.snapshot(), before);
  });

  it('should restore the structure when onSolution throws', () => {
    const dlx = new DancingLinks(KNUTH_INSTANCE);
    const before = dlx.snapshot();

    assert.throws(
      () => searchDancingLinks(dlx, { onSolution: () => { throw new Error('rejected'); } }),
      /rejected/
    );

    assert.strictEqual(dlx.depth, 0);
    assert.deepStrictEqual(dlx.snapshot(), before);
    assert.deepStrictEqual(searchDancingLinks(dlx).solutions, [[3, 0, 4]]);
  });

  it('should undo preset rows when onSolution throws', () => {
    const dlx = new DancingLinks(KNUTH_INSTANCE);
    const before = dlx.snapshot();

    assert.throws(
      () => searchDancingLinks(dlx, { presetRows: [3], onSolution: () => { throw new Error('rejected'); } }),
      /rejected/
    );

    assert.strictEqual(dlx.depth, 0);
    assert.deepStrictEqual(dlx.snapshot(), before);
  });

  it('should give the same answer on repeated runs', () => {
    const dlx = new DancingLinks(SMALL_INSTANCE);
    const first = searchDancingLinks(dlx);
    const second = searchDancingLinks(dlx, { presetRows: [2] });
    const third = searchDancingLinks(dlx);

    assert.deepStrictEqual(second.solutions, [[2, 1]]);
    assert.deepStrictEqual(third.solutions, first.solutions);
  });
});

describe('partitionTopLevel', () => {
  it('should branch on the rows of the first chosen column', () => {
    assert.deepStrictEqual(partitionTopLevel(SMALL_INSTANCE), [[0], [1]]);
    assert.deepStrictEqual(partitionTopLevel(KNUTH_INSTANCE), [[1], [3]]);
  });

  it('should give one empty branch without columns', () => {
    assert.deepStrictEqual(partitionTopLevel({ columnCount: 0, rows: [] }), [[]]);
  });

  it('should give no branch when the first column is empty', () => {
    assert.deepStrictEqual(partitionTopLevel({ columnCount: 2, rows: [{ columns: [0] }] }), []);
  });
});

describe('searchPartitioned', () => {
  it('should match the full search', () => {
    const full = searchExactCover(SMALL_INSTANCE);
    const split = searchPartitioned(SMALL_INSTANCE);

    assert.deepStrictEqual(split.solutions, full.solutions);
    assert.strictEqual(split.stats.nodesExplored, full.stats.nodesExplored);
    assert.strictEqual(split.stats.exhausted, true);
  });

  it('should respect maxSolutions across branches', () => {
    const result = searchPartitioned(SMALL_INSTANCE, { maxSolutions: 1 });

    assert.deepStrictEqual(result.solutions, [[0]]);
    assert.strictEqual(result.stats.exhausted, false);
  });
});
