import dayjs, { type Dayjs } from 'dayjs';
import utc from 'dayjs/plugin/utc.js';
import isoWeek from 'dayjs/plugin/isoWeek.js';
import customParseFormat from 'dayjs/plugin/customParseFormat.js';
import isSameOrBefore from 'dayjs/plugin/isSameOrBefore.js';

import { InvalidDateFormatError } from './errors.js';

dayjs.extend(utc);
dayjs.extend(isoWeek);
dayjs.extend(customParseFormat);
dayjs.extend(isSameOrBefore);

export const FORMAT_DATE = 'YYYY-MM-DD';
export const FORMAT_ICS_DATE = 'YYYYMMDD';
export const FORMAT_ICS_TIMESTAMP = 'YYYYMMDD[T]HHmmss[Z]';

const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Builds a local midnight date. `setFullYear` keeps years below 100 as written;
 * the `Date` constructor would map them to 1900-1999.
 */
export function calendarDate(year: number, month: number, day: number): Dayjs {
  const date = new Date(2000, 0, 1);
  date.setFullYear(year, month - 1, day);
  return dayjs(date);
}

export function daysInMonth(year: number, month: number): number {
  return calendarDate(year, month + 1, 0).date();
}

/**
 * Parses a calendar date in exactly `YYYY-MM-DD` form.
 * Rolled-over dates such as `2025-02-30` are rejected, not normalized.
 */
export function parseDate(value: string, field?: string): Dayjs {
  const match = ISO_DATE_PATTERN.exec(value);
  if (!match) {
    throw new InvalidDateFormatError(value, field);
  }

  const [year, month, day] = [match[1], match[2], match[3]].map(Number);
  const date = calendarDate(year, month, day);
  if (date.year() !== year || date.month() !== month - 1 || date.date() !== day) {
    throw new InvalidDateFormatError(value, field);
  }

  return date;
}

export function formatDate(date: Dayjs, pattern: string = FORMAT_DATE): string {
  return date.format(pattern);
}

export function formatIcsDate(date: Dayjs): string {
  return date.format(FORMAT_ICS_DATE);
}

export function formatIcsTimestamp(date: Date): string {
  return dayjs(date).utc().format(FORMAT_ICS_TIMESTAMP);
}

export function isWeekend(date: Dayjs): boolean {
  return date.isoWeekday() >= 6;
}

export function isDateInRange(date: Dayjs, start: Dayjs, end: Dayjs): boolean {
  return !date.isBefore(start, 'day') && !date.isAfter(end, 'day');
}

/**
 * Yields every day from `start` to `end`, both inclusive. Nothing is yielded when
 * `start` is after `end`.
 */
export function* daysInRange(start: Dayjs, end: Dayjs): Generator<Dayjs> {
  let cursor = start.startOf('day');
  while (cursor.isSameOrBefore(end, 'day')) {
    yield cursor;
    cursor = cursor.add(1, 'day');
  }
}

export function daysInYear(year: number): Generator<Dayjs> {
  return daysInRange(calendarDate(year, 1, 1), calendarDate(year, 12, 31));
}

/**
 * Returns the weeks of a month, Monday first. Days outside the month are 0.
 */
export function getMonthGrid(year: number, month: number): number[][] {
  if (!Number.isInteger(month) || month < 1 || month > 12) {
    throw new RangeError(`Invalid month: ${month}`);
  }

  const first = calendarDate(year, month, 1);
  const lastDay = daysInMonth(year, month);
  const weeks: number[][] = [];
  let week: number[] = new Array<number>(first.isoWeekday() - 1).fill(0);

  for (let day = 1; day <= lastDay; day++) {
    week.push(day);
    if (week.length === 7) {
      weeks.push(week);
      week = [];
    }
  }

  if (week.length > 0) {
    while (week.length < 7) week.push(0);
    weeks.push(week);
  }

  return weeks;
}

export { dayjs };
