/**
 * Calendar period boundaries in local time
 *
 * Weeks run Monday 00:00 through Sunday 23:59:59.999. All ends are inclusive.
 */

import { InputError } from '../../utils/errors.js';
import type { PeriodKind } from '../../types/index.js';

export interface PeriodBounds {
  kind: PeriodKind;
  start: Date;
  end: Date;
  label: string;
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/**
 * YYYY-MM-DD of a date in local time
 */
export function formatLocalDate(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

/**
 * ISO 8601 with the local UTC offset, e.g. 2024-03-11T00:00:00.000+01:00
 */
export function toLocalIsoString(date: Date): string {
  const offset = -date.getTimezoneOffset();
  const sign = offset >= 0 ? '+' : '-';
  const abs = Math.abs(offset);
  return (
    `${formatLocalDate(date)}T${pad(date.getHours())}:${pad(date.getMinutes())}:` +
    `${pad(date.getSeconds())}.${pad(date.getMilliseconds(), 3)}` +
    `${sign}${pad(Math.floor(abs / 60))}:${pad(abs % 60)}`
  );
}

function endOfDay(year: number, month: number, day: number): Date {
  return new Date(year, month, day, 23, 59, 59, 999);
}

/**
 * Resolve the calendar period of the given kind that contains anchor
 */
export function periodBounds(kind: PeriodKind, anchor: Date): PeriodBounds {
  const year = anchor.getFullYear();
  const month = anchor.getMonth();
  const day = anchor.getDate();

  switch (kind) {
    case 'day': {
      const start = new Date(year, month, day);
      return { kind, start, end: endOfDay(year, month, day), label: `Daily report: ${formatLocalDate(start)}` };
    }
    case 'week': {
      const sinceMonday = (anchor.getDay() + 6) % 7;
      const start = new Date(year, month, day - sinceMonday);
      const end = endOfDay(year, month, day - sinceMonday + 6);
      return {
        kind,
        start,
        end,
        label: `Weekly report: ${formatLocalDate(start)} to ${formatLocalDate(end)}`,
      };
    }
    case 'month': {
      const start = new Date(year, month, 1);
      // Day 0 of the next month is the last day of this one
      const end = endOfDay(year, month + 1, 0);
      return { kind, start, end, label: `Monthly report: ${year}-${pad(month + 1)}` };
    }
    case 'year':
      return {
        kind,
        start: new Date(year, 0, 1),
        end: endOfDay(year, 11, 31),
        label: `Yearly report: ${year}`,
      };
  }
}

function daysInCalendarPeriod(kind: PeriodKind, year: number, month: number): number {
  switch (kind) {
    case 'day':
      return 1;
    case 'week':
      return 7;
    case 'month':
      // Day 0 of the next month is the last day of this one
      return new Date(Date.UTC(year, month + 1, 0)).getUTCDate();
    case 'year': {
      const leap = (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
      return leap ? 366 : 365;
    }
  }
}

/**
 * Number of calendar days in the period of the given kind containing date
 */
export function daysInPeriod(kind: PeriodKind, date: Date): number {
  return daysInCalendarPeriod(kind, date.getFullYear(), date.getMonth());
}

const PERIOD_START_DATE = /^(\d{4})-(\d{2})-\d{2}/;

/**
 * Number of calendar days in a period, read from the calendar date written in
 * its start timestamp rather than the host time zone
 */
export function daysInPeriodStarting(kind: PeriodKind, periodStart: string): number {
  const match = PERIOD_START_DATE.exec(periodStart);
  if (!match) {
    throw new RangeError(`Invalid period start: ${periodStart}`);
  }
  return daysInCalendarPeriod(kind, Number(match[1]), Number(match[2]) - 1);
}

const DATE_ONLY = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Parse a report anchor: YYYY-MM-DD (local calendar date) or a full ISO
 * timestamp. Falls back to now when value is undefined.
 */
export function parseAnchor(value: string | undefined, now: Date): Date {
  if (value === undefined) return now;

  const dateOnly = DATE_ONLY.exec(value.trim());
  if (dateOnly) {
    const year = Number(dateOnly[1]);
    const month = Number(dateOnly[2]) - 1;
    const day = Number(dateOnly[3]);
    const date = new Date(year, month, day);
    if (date.getFullYear() !== year || date.getMonth() !== month || date.getDate() !== day) {
      throw new InputError(`Invalid date: ${value}`);
    }
    return date;
  }

  const time = Date.parse(value);
  if (Number.isNaN(time)) {
    throw new InputError(`Invalid date "${value}". Use YYYY-MM-DD or an ISO 8601 timestamp.`);
  }
  return new Date(time);
}
