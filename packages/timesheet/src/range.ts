/**
 * Date-range resolution for report periods.
 *
 * Calendar dates travel as YYYY-MM-DD strings. The default period is
 * derived from the caller's notion of "today" so it can be pinned in tests.
 */

import { InputError, type DateRange, type EpochBounds } from '@clockwork/core';

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const SECONDS_PER_DAY = 86_400;

interface CalendarDate {
  year: number;
  month: number;
  day: number;
}

/** Parse a YYYY-MM-DD string, rejecting impossible dates such as 2026-02-30 */
export function parseIsoDate(value: string): CalendarDate {
  const match = ISO_DATE.exec(value.trim());
  if (!match) {
    throw new InputError(`Invalid date "${value}" (expected YYYY-MM-DD)`);
  }
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);

  const calendarDay = new Date(Date.UTC(year, month - 1, day));
  if (
    calendarDay.getUTCFullYear() !== year ||
    calendarDay.getUTCMonth() !== month - 1 ||
    calendarDay.getUTCDate() !== day
  ) {
    throw new InputError(`Invalid date "${value}" (no such calendar day)`);
  }
  return { year, month, day };
}

/** Format the local calendar date of `date` as YYYY-MM-DD */
export function formatLocalDate(date: Date): string {
  const y = String(date.getFullYear()).padStart(4, '0');
  const m = String(date.getMonth() + 1).padStart(2, '0');
  const d = String(date.getDate()).padStart(2, '0');
  return `${y}-${m}-${d}`;
}

function addDays(date: Date, days: number): Date {
  return new Date(date.getFullYear(), date.getMonth(), date.getDate() + days);
}

/**
 * Resolve the report period.
 *
 * Explicit dates must both be given. Without them: on a Monday the whole
 * previous week (Monday to Sunday), on any other day this week's Monday
 * through today.
 */
export function resolveDateRange(options: {
  start?: string;
  end?: string;
  today: Date;
}): DateRange {
  const { start, end, today } = options;

  if (start !== undefined || end !== undefined) {
    if (start === undefined || end === undefined) {
      throw new InputError('Provide both a start and an end date, or neither');
    }
    const from = parseIsoDate(start);
    const to = parseIsoDate(end);
    if (Date.UTC(from.year, from.month - 1, from.day) > Date.UTC(to.year, to.month - 1, to.day)) {
      throw new InputError(`Start date ${start} is after end date ${end}`);
    }
    return { start: start.trim(), end: end.trim() };
  }

  // 0 = Monday … 6 = Sunday
  const weekday = (today.getDay() + 6) % 7;

  if (weekday === 0) {
    return {
      start: formatLocalDate(addDays(today, -7)),
      end: formatLocalDate(addDays(today, -1)),
    };
  }

  return {
    start: formatLocalDate(addDays(today, -weekday)),
    end: formatLocalDate(today),
  };
}

/**
 * UTC epoch-second bounds of a range: the start date's midnight through
 * the last second of the end date, both inclusive.
 */
export function toEpochBounds(range: DateRange): EpochBounds {
  const from = parseIsoDate(range.start);
  const to = parseIsoDate(range.end);
  const start = Date.UTC(from.year, from.month - 1, from.day) / 1000;
  const end = Date.UTC(to.year, to.month - 1, to.day) / 1000 + SECONDS_PER_DAY - 1;
  return { start, end };
}
