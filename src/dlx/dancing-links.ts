/**
 * Dancing links: a sparse 0/1 matrix stored as circular doubly-linked lists.
 *
 * Nodes live in an arena of typed arrays and link to each other by index.
 * Node 0 is the root, nodes 1..C are the column headers (column i has header
 * i + 1), the remaining nodes are the 1-entries of the matrix, appended row by row.
 *
 * cover()/uncover() must nest like parentheses. The structure keeps the stack of
 * covered columns and rejects an uncover() that does not match the latest cover().
 */

import { CoverOrderError } from '../domain/errors.js';
import { ExactCoverInstance } from '../matrix/matrix-builder.js';

const ROOT = 0;

export interface LinkSnapshot {
  left: number[];
  right: number[];
  up: number[];
  down: number[];
  size: number[];
}

export class DancingLinks {
  readonly columnCount: number;
  readonly rowCount: number;

  private readonly left: Int32Array;
  private readonly right: Int32Array;
  private readonly up: Int32Array;
  private readonly down: Int32Array;
  private readonly header: Int32Array; // column header of each node
  private readonly rowOf: Int32Array; // row index of each node, -1 for headers
  private readonly size: Int32Array; // live rows per header
  private readonly rowHead: Int32Array; // first node of each row, -1 for empty rows
  private readonly coverStack: number[] = [];

  constructor(instance: ExactCoverInstance) {
    const columnCount = instance.columnCount;
    if (!Number.isInteger(columnCount) || columnCount < 0) {
      throw new RangeError(`Invalid column count ${columnCount}`);
    }

    let entries = 0;
    for (const row of instance.rows) {
      entries += row.columns.length;
    }

    const nodeCount = 1 + columnCount + entries;
    this.columnCount = columnCount;
    this.rowCount = instance.rows.length;
    this.left = new Int32Array(nodeCount);
    this.right = new Int32Array(nodeCount);
    this.up = new Int32Array(nodeCount);
    this.down = new Int32Array(nodeCount);
    this.header = new Int32Array(nodeCount);
    this.rowOf = new Int32Array(nodeCount);
    this.size = new Int32Array(columnCount + 1);
    this.rowHead = new Int32Array(instance.rows.length);

    // Root and headers form the column list, in declaration order
    for (let h = 0; h <= columnCount; h++) {
      this.left[h] = h === 0 ? columnCount : h - 1;
      this.right[h] = h === columnCount ? ROOT : h + 1;
      this.up[h] = h;
      this.down[h] = h;
      this.header[h] = h;
      this.rowOf[h] = -1;
    }

    let next = columnCount + 1;
    instance.rows.forEach((row, rowIndex) => {
      const seen = new Set<number>();
      let first = -1;

      for (const column of row.columns) {
        if (!Number.isInteger(column) || column < 0 || column >= columnCount) {
          throw new RangeError(`Row ${rowIndex} references unknown column ${column}`);
        }
        if (seen.has(column)) {
          throw new RangeError(`Row ${rowIndex} references column ${column} twice`);
        }
        seen.add(column);

        const h = column + 1;
        const node = next++;
        this.header[node] = h;
        this.rowOf[node] = rowIndex;

        // Append at the bottom of the column
        this.up[node] = this.up[h];
        this.down[node] = h;
        this.down[this.up[h]] = node;
        this.up[h] = node;
        this.size[h]++;

        // Append at the end of the row
        if (first < 0) {
          first = node;
          this.left[node] = node;
          this.right[node] = node;
        } else {
          this.left[node] = this.left[first];
          this.right[node] = first;
          this.right[this.left[first]] = node;
          this.left[first] = node;
        }
      }

      this.rowHead[rowIndex] = first;
    });
  }

  /**
   * Number of columns currently covered
   */
  get depth(): number {
    return this.coverStack.length;
  }

  isLive(column: number): boolean {
    const h = this.headerOf(column);
    return this.right[this.left[h]] === h;
  }

  columnSize(column: number): number {
    return this.size[this.headerOf(column)];
  }

  /**
   * Live column with the fewest rows; ties go to the earliest declared column.
   * Returns null once every column is covered.
   */
  chooseColumn(): number | null {
    let best = -1;
    let bestSize = Infinity;

    for (let h = this.right[ROOT]; h !== ROOT; h = this.right[h]) {
      if (this.size[h] < bestSize) {
        best = h;
        bestSize = this.size[h];
        if (bestSize === 0) break;
      }
    }

    return best < 0 ? null : best - 1;
  }

  /**
   * Live rows of a column, top to bottom
   */
  rowsOf(column: number): number[] {
    const h = this.headerOf(column);
    const rows: number[] = [];
    for (let node = this.down[h]; node !== h; node = this.down[node]) {
      rows.push(this.rowOf[node]);
    }
    return rows;
  }

  /**
   * Columns of a row, in row order
   */
  columnsOfRow(row: number): number[] {
    const first = this.rowHeadOf(row);
    if (first < 0) return [];

    const columns: number[] = [];
    let node = first;
    do {
      columns.push(this.header[node] - 1);
      node = this.right[node];
    } while (node !== first);
    return columns;
  }

  /**
   * Columns of a row other than the given one, left to right starting after it
   */
  otherColumns(row: number, column: number): number[] {
    const first = this.rowHeadOf(row);
    const h = this.headerOf(column);
    if (first < 0) {
      throw new RangeError(`Row ${row} does not intersect column ${column}`);
    }

    let start = first;
    while (this.header[start] !== h) {
      start = this.right[start];
      if (start === first) {
        throw new RangeError(`Row ${row} does not intersect column ${column}`);
      }
    }

    const columns: number[] = [];
    for (let node = this.right[start]; node !== start; node = this.right[node]) {
      columns.push(this.header[node] - 1);
    }
    return columns;
  }

  /**
   * Remove a column from the header list and every row intersecting it from
   * all other columns. The column's own list is left intact for uncover().
   */
  cover(column: number): void {
    const h = this.headerOf(column);
    if (this.right[this.left[h]] !== h) {
      throw new CoverOrderError(`Column ${column} is already covered`);
    }

    this.right[this.left[h]] = this.right[h];
    this.left[this.right[h]] = this.left[h];

    for (let i = this.down[h]; i !== h; i = this.down[i]) {
      for (let j = this.right[i]; j !== i; j = this.right[j]) {
        this.down[this.up[j]] = this.down[j];
        this.up[this.down[j]] = this.up[j];
        this.size[this.header[j]]--;
      }
    }

    this.coverStack.push(column);
  }

  /**
   * Exact inverse of the most recent unmatched cover()
   */
  uncover(column: number): void {
    const top = this.coverStack.at(-1);
    if (top !== column) {
      throw new CoverOrderError(
        top === undefined
          ? `Cannot uncover column ${column}: nothing is covered`
          : `Cannot uncover column ${column}: column ${top} was covered last`
      );
    }
    this.coverStack.pop();

    const h = this.headerOf(column);
    for (let i = this.up[h]; i !== h; i = this.up[i]) {
      for (let j = this.left[i]; j !== i; j = this.left[j]) {
        this.size[this.header[j]]++;
        this.down[this.up[j]] = j;
        this.up[this.down[j]] = j;
      }
    }

    this.right[this.left[h]] = h;
    this.left[this.right[h]] = h;
  }

  /**
   * Cover every column of a row, as if the row had been chosen.
   * Returns false, covering nothing, when the row clashes with the current selection.
   */
  selectRow(row: number): boolean {
    const columns = this.columnsOfRow(row);
    if (columns.length === 0 || !columns.every(column => this.isLive(column))) {
      return false;
    }
    for (const column of columns) {
      this.cover(column);
    }
    return true;
  }

  deselectRow(row: number): void {
    const columns = this.columnsOfRow(row);
    for (let k = columns.length - 1; k >= 0; k--) {
      this.uncover(columns[k]);
    }
  }

  snapshot(): LinkSnapshot {
    return {
      left: Array.from(this.left),
      right: Array.from(this.right),
      up: Array.from(this.up),
      down: Array.from(this.down),
      size: Array.from(this.size),
    };
  }

  private headerOf(column: number): number {
    if (!Number.isInteger(column) || column < 0 || column >= this.columnCount) {
      throw new RangeError(`Unknown column ${column}`);
    }
    return column + 1;
  }

  private rowHeadOf(row: number): number {
    if (!Number.isInteger(row) || row < 0 || row >= this.rowCount) {
      throw new RangeError(`Unknown row ${row}`);
    }
    return this.rowHead[row];
  }
}
