/**
 * Calendar-day helpers for the date cursor
 */

import { DateTime } from 'luxon';
import type { CalendarDate } from '../types/index.js';
import { ConfigError } from './errors.js';

const ISO_DAY = 'yyyy-MM-dd';

export function parseCalendarDate(value: string): CalendarDate {
  if (!isCalendarDate(value)) {
    throw new ConfigError(`Invalid calendar date "${value}" (expected YYYY-MM-DD)`);
  }
  return value;
}

/**
 * True for an existing day written as `YYYY-MM-DD`
 */
export function isCalendarDate(value: string): boolean {
  return /^\d{4}-\d{2}-\d{2}$/.test(value) && DateTime.fromFormat(value, ISO_DAY, { zone: 'utc' }).isValid;
}

/**
 * Today's date in the given IANA zone
 */
export function today(zone: string, now: Date = new Date()): CalendarDate {
  return DateTime.fromJSDate(now).setZone(zone).toFormat(ISO_DAY);
}

export function addDays(date: CalendarDate, days: number): CalendarDate {
  return DateTime.fromFormat(date, ISO_DAY, { zone: 'utc' }).plus({ days }).toFormat(ISO_DAY);
}

export function previousDay(date: CalendarDate): CalendarDate {
  return addDays(date, -1);
}

/**
 * `YYYYMMDD`, as used in listing URLs
 */
export function toCompact(date: CalendarDate): string {
  return date.replace(/-/g, '');
}

export function isBefore(date: CalendarDate, other: CalendarDate): boolean {
  return date < other;
}
