/**
 * Calendar-date helpers. Dates travel as "YYYY-MM-DD" strings in the
 * invocation's local calendar, which is also how the provider keys its data.
 */

import { LogicError } from "@fitsync/proto";

const CALENDAR_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

/** Upper bound on the number of days one sync may cover */
export const MAX_SYNC_DAYS = 31;

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

/**
 * Format a Date as a local calendar date.
 */
export function formatCalendarDate(date: Date): string {
  return `${pad(date.getFullYear(), 4)}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

/**
 * Parse a "YYYY-MM-DD" string into local midnight of that day.
 * Rejects malformed strings and impossible dates such as 2025-02-30.
 */
export function parseCalendarDate(value: string): Date {
  const match = CALENDAR_DATE.exec(value);
  if (match) {
    const year = parseInt(match[1], 10);
    const month = parseInt(match[2], 10);
    const day = parseInt(match[3], 10);
    const date = new Date(year, month - 1, day);
    if (
      date.getFullYear() === year &&
      date.getMonth() === month - 1 &&
      date.getDate() === day
    ) {
      return date;
    }
  }
  throw new LogicError(`Invalid date "${value}", expected YYYY-MM-DD`, {
    source: "dates.parseCalendarDate",
  });
}

export function isCalendarDate(value: string): boolean {
  try {
    parseCalendarDate(value);
    return true;
  } catch {
    return false;
  }
}

/**
 * The local calendar day before `now`. Today's intraday data is usually
 * incomplete, so this is the default sync target.
 */
export function yesterday(now: Date = new Date()): string {
  return formatCalendarDate(
    new Date(now.getFullYear(), now.getMonth(), now.getDate() - 1)
  );
}

/**
 * Every calendar date from `from` to `to`, inclusive, ascending.
 */
export function calendarDateRange(
  from: string,
  to: string,
  maxDays = MAX_SYNC_DAYS
): string[] {
  const start = parseCalendarDate(from);
  const end = parseCalendarDate(to);
  if (start.getTime() > end.getTime()) {
    throw new LogicError(`Date range start ${from} is after end ${to}`, {
      source: "dates.calendarDateRange",
    });
  }

  const dates: string[] = [];
  const cursor = new Date(start.getFullYear(), start.getMonth(), start.getDate());
  while (cursor.getTime() <= end.getTime()) {
    if (dates.length >= maxDays) {
      throw new LogicError(
        `Date range ${from}..${to} exceeds ${maxDays} days`,
        { source: "dates.calendarDateRange" }
      );
    }
    dates.push(formatCalendarDate(cursor));
    cursor.setDate(cursor.getDate() + 1);
  }
  return dates;
}
