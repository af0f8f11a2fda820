import dayjs from 'dayjs';
import utc from 'dayjs/plugin/utc';
import { DateDisplayFormat, DateString, MonthBounds } from './types';

dayjs.extend(utc);

export const DATE_FORMAT_ISO: DateDisplayFormat = 'YYYY-MM-DD';

const DATE_STRING_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export function formatDate(date: Date): DateString {
  return date.toISOString().split('T')[0] as DateString;
}

export function isDateString(value: string): value is DateString {
  return DATE_STRING_PATTERN.test(value);
}

/**
 * Parses a `YYYY-MM-DD` string as UTC midnight.
 * @throws Error if the string is not a real calendar date
 */
export function parseDate(date: string): Date {
  const d = new Date(date);
  if (!isDateString(date) || isNaN(d.getTime()) || formatDate(d) !== date) {
    throw new Error(`Invalid date '${date}'`);
  }
  return d;
}

/**
 * Builds a UTC midnight date from calendar parts
 * @param month - 0-indexed month
 */
export function utcDate(year: number, month: number, day: number): Date {
  return new Date(Date.UTC(year, month, day));
}

export function startOfDay(date: Date): Date {
  return dayjs.utc(date).startOf('day').toDate();
}

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

/**
 * First and last instant of the UTC calendar month containing `date`.
 */
export function getMonthBounds(date: Date): MonthBounds {
  const d = dayjs.utc(date);
  return {
    startOfMonth: d.startOf('month').toDate(),
    endOfMonth: d.endOf('month').toDate(),
  };
}

/**
 * Whole calendar days from `from` to `to`, negative when `to` is earlier.
 * Time of day is ignored on both sides.
 */
export function daysBetween(from: Date, to: Date): number {
  return dayjs.utc(to).startOf('day').diff(dayjs.utc(from).startOf('day'), 'day');
}

export function addDays(date: Date, days: number): Date {
  return dayjs.utc(date).add(days, 'day').toDate();
}

/**
 * Formats a date for display using one of the user-selectable formats
 * @param format - Defaults to ISO
 */
export function formatDisplayDate(date: Date | null, format: DateDisplayFormat = DATE_FORMAT_ISO): string | null {
  if (!date) {
    return null;
  }
  return dayjs.utc(date).format(format);
}

/**
 * `YYYY-MM` key of the UTC month containing `date`
 */
export function monthKey(date: Date): string {
  return dayjs.utc(date).format('YYYY-MM');
}
