import { InvalidRangeError } from './daylight/errors';

const DAY_MS = 1000 * 60 * 60 * 24;

// setUTCFullYear keeps years 0-99 as given; Date.UTC would move them to 1900-1999
function utcDate(year: number, month: number, day: number): Date {
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  return date;
}

function utcDay(year: number, month: number, day: number): number {
  const check = utcDate(year, month, day);
  if (
    !Number.isInteger(year) ||
    check.getUTCFullYear() !== year ||
    check.getUTCMonth() !== month - 1 ||
    check.getUTCDate() !== day
  ) {
    throw new InvalidRangeError('date', `${year}-${month}-${day}`, 'a valid calendar date');
  }
  return check.getTime() / DAY_MS;
}

/** Day of month of the nth Sunday (1-based) in the given month. */
function nthSunday(year: number, month: number, n: number): number {
  const weekday = utcDate(year, month, 1).getUTCDay();
  return 1 + ((7 - weekday) % 7) + (n - 1) * 7;
}

export interface DstBounds {
  /** Second Sunday of March, first day on DST. */
  start: { year: number; month: number; day: number };
  /** First Sunday of November, first day back on standard time. */
  end: { year: number; month: number; day: number };
}

export function dstBounds(year: number): DstBounds {
  return {
    start: { year, month: 3, day: nthSunday(year, 3, 2) },
    end: { year, month: 11, day: nthSunday(year, 11, 1) },
  };
}

/**
 * Whether US daylight saving time applies on a calendar date: from the
 * second Sunday of March (inclusive) to the first Sunday of November
 * (exclusive), compared at midnight.
 */
export function dstInEffect(year: number, month: number, day: number): boolean {
  const today = utcDay(year, month, day);
  const { start, end } = dstBounds(year);
  return utcDay(start.year, start.month, start.day) <= today && today < utcDay(end.year, end.month, end.day);
}
