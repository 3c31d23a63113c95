/**
 * Tests for date parsing and date cells
 */

import { describe, it } from 'node:test';
import { strict as assert } from 'node:assert';
import {
  dateCells,
  excludedCellsForDate,
  formatCalendarDate,
  parseIsoDate,
  toCalendarDate,
} from '../../src/calendar/calendar.js';
import { loadBuiltinPuzzle } from '../../src/io/catalog-parser.js';
import { MONTH_NAMES, WEEKDAY_NAMES } from '../../src/domain/constants.js';
import { InvalidDateError } from '../../src/domain/errors.js';
import { CalendarLayout, Puzzle } from '../../src/domain/types.js';
import { HEPTOMINO_PUZZLE } from '../fixtures.js';

function layoutOf(puzzle: Puzzle): CalendarLayout {
  if (!puzzle.calendar) throw new Error(`${puzzle.name} has no calendar`);
  return puzzle.calendar;
}

describe('parseIsoDate', () => {
  it('should read month, day and weekday', () => {
    assert.deepStrictEqual(parseIsoDate('2024-02-29'), { month: 2, day: 29, weekday: 4 });
    assert.deepStrictEqual(parseIsoDate('2026-10-18'), { month: 10, day: 18, weekday: 0 });
  });

  it('should keep two-digit years as written', () => {
    assert.deepStrictEqual(parseIsoDate('0024-02-29'), { month: 2, day: 29, weekday: 4 });
    assert.deepStrictEqual(parseIsoDate('0024-01-01'), { month: 1, day: 1, weekday: 1 });
    assert.throws(() => parseIsoDate('0023-02-29'), InvalidDateError);
  });

  it('should reject dates that do not exist', () => {
    assert.throws(() => parseIsoDate('2023-02-29'), InvalidDateError);
    assert.throws(() => parseIsoDate('2024-13-01'), InvalidDateError);
  });

  it('should reject other formats', () => {
    assert.throws(
      () => parseIsoDate('Feb 3'),
      (err: unknown) => err instanceof InvalidDateError && err.message === 'Date "Feb 3" is not in YYYY-MM-DD format'
    );
  });
});

describe('toCalendarDate', () => {
  it('should take the local date parts', () => {
    assert.deepStrictEqual(toCalendarDate(new Date(2024, 11, 31)), { month: 12, day: 31, weekday: 2 });
  });
});

describe('dateCells', () => {
  const classic = loadBuiltinPuzzle('classic');
  const weekday = loadBuiltinPuzzle('weekday');

  it('should place months in two rows of six', () => {
    const layout = layoutOf(classic);
    assert.deepStrictEqual(dateCells(layout, { month: 1, day: 1, weekday: 0 }), [
      { row: 0, col: 0 },
      { row: 2, col: 0 },
    ]);
    assert.deepStrictEqual(dateCells(layout, { month: 12, day: 31, weekday: 0 }), [
      { row: 1, col: 5 },
      { row: 6, col: 2 },
    ]);
  });

  it('should add the weekday cell when the layout has one', () => {
    const layout = layoutOf(weekday);
    assert.deepStrictEqual(dateCells(layout, parseIsoDate('2026-10-18')), [
      { row: 1, col: 3 },
      { row: 4, col: 3 },
      { row: 6, col: 3 },
    ]);
  });

  it('should reject months and days without a cell', () => {
    const layout = layoutOf(classic);
    assert.throws(() => dateCells(layout, { month: 13, day: 1, weekday: 0 }), InvalidDateError);
    assert.throws(() => dateCells(layout, { month: 1, day: 0, weekday: 0 }), InvalidDateError);
  });
});

describe('excludedCellsForDate', () => {
  it('should require a calendar layout', () => {
    assert.throws(
      () => excludedCellsForDate(HEPTOMINO_PUZZLE, { month: 1, day: 1, weekday: 0 }),
      (err: unknown) =>
        err instanceof InvalidDateError && err.message === 'Puzzle "heptominoes" has no calendar layout'
    );
  });
});

describe('formatCalendarDate', () => {
  it('should print weekday, month and day', () => {
    assert.strictEqual(formatCalendarDate({ month: 10, day: 18, weekday: 0 }, MONTH_NAMES, WEEKDAY_NAMES), 'Sun Oct 18');
  });
});
