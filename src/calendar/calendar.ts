/**
 * Mapping from a calendar date to the board cells left uncovered
 */

import { CalendarLayout, Cell, Puzzle } from '../domain/types.js';
import { InvalidDateError } from '../domain/errors.js';

export interface CalendarDate {
  month: number; // 1 = January
  day: number; // 1-31
  weekday: number; // 0 = Sunday
}

/**
 * Date parts of a local Date
 */
export function toCalendarDate(date: Date): CalendarDate {
  return { month: date.getMonth() + 1, day: date.getDate(), weekday: date.getDay() };
}

/**
 * Parse YYYY-MM-DD. The weekday is computed from the date itself.
 */
export function parseIsoDate(text: string): CalendarDate {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(text.trim());
  if (!match) {
    throw new InvalidDateError(`Date "${text}" is not in YYYY-MM-DD format`);
  }

  const [year, month, day] = [Number(match[1]), Number(match[2]), Number(match[3])];
  // Years 0-99 stay as written (Date.UTC would map them to 19xx)
  const utc = new Date(0);
  utc.setUTCFullYear(year, month - 1, day);
  if (utc.getUTCFullYear() !== year || utc.getUTCMonth() !== month - 1 || utc.getUTCDate() !== day) {
    throw new InvalidDateError(`Date "${text}" does not exist`);
  }

  return { month, day, weekday: utc.getUTCDay() };
}

/**
 * Cells encoding the date on a layout: month, day and, when the layout has
 * weekday cells, the weekday
 */
export function dateCells(layout: CalendarLayout, date: CalendarDate): Cell[] {
  const month = layout.months[date.month - 1];
  if (!Number.isInteger(date.month) || month === undefined) {
    throw new InvalidDateError(`Month ${date.month} has no cell on this board`);
  }

  const day = layout.days[date.day - 1];
  if (!Number.isInteger(date.day) || day === undefined) {
    throw new InvalidDateError(`Day ${date.day} has no cell on this board`);
  }

  if (!layout.weekdays) {
    return [month, day];
  }

  const weekday = layout.weekdays[date.weekday];
  if (!Number.isInteger(date.weekday) || weekday === undefined) {
    throw new InvalidDateError(`Weekday ${date.weekday} has no cell on this board`);
  }
  return [month, day, weekday];
}

/**
 * Excluded cells of a puzzle for a date
 */
export function excludedCellsForDate(puzzle: Puzzle, date: CalendarDate): Cell[] {
  if (!puzzle.calendar) {
    throw new InvalidDateError(`Puzzle "${puzzle.name}" has no calendar layout`);
  }
  return dateCells(puzzle.calendar, date);
}

export function formatCalendarDate(date: CalendarDate, monthNames: readonly string[], weekdayNames: readonly string[]): string {
  return `${weekdayNames[date.weekday] ?? '?'} ${monthNames[date.month - 1] ?? '?'} ${date.day}`;
}
