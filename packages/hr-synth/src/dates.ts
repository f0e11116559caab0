/**
 * Calendar-date helpers. All arithmetic is done in UTC so that results do not
 * depend on the host time zone.
 */

import type { IsoDate } from './types.js';

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const MS_PER_DAY = 24 * 60 * 60 * 1000;

export function isIsoDate(value: string): boolean {
  const match = ISO_DATE.exec(value);
  if (!match) return false;
  const [, y, m, d] = match;
  const date = new Date(Date.UTC(Number(y), Number(m) - 1, Number(d)));
  return formatIsoDate(date) === value;
}

export function parseIsoDate(value: IsoDate): Date {
  if (!isIsoDate(value)) {
    throw new RangeError(`Invalid calendar date: ${value}`);
  }
  const [y, m, d] = value.split('-').map(Number);
  return new Date(Date.UTC(y, m - 1, d));
}

export function formatIsoDate(date: Date): IsoDate {
  return date.toISOString().slice(0, 10);
}

/**
 * Normalize a caller-supplied date. `Date` inputs keep their UTC calendar day.
 */
export function toIsoDate(value: string | Date): IsoDate {
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) {
      throw new RangeError('Invalid Date');
    }
    return formatIsoDate(value);
  }
  parseIsoDate(value);
  return value;
}

export function isoDate(year: number, month: number, day: number): IsoDate {
  return formatIsoDate(new Date(Date.UTC(year, month - 1, day)));
}

export function addDays(date: IsoDate, days: number): IsoDate {
  return formatIsoDate(new Date(parseIsoDate(date).getTime() + days * MS_PER_DAY));
}

/**
 * Same month/day `years` later. Feb 29 falls back to Feb 28 in non-leap years.
 */
export function addYears(date: IsoDate, years: number): IsoDate {
  const d = parseIsoDate(date);
  const year = d.getUTCFullYear() + years;
  const month = d.getUTCMonth();
  const day = Math.min(d.getUTCDate(), daysInMonth(year, month + 1));
  return formatIsoDate(new Date(Date.UTC(year, month, day)));
}

export function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

/** Whole days from `from` to `to` (negative when `to` is earlier). */
export function diffDays(from: IsoDate, to: IsoDate): number {
  return Math.round((parseIsoDate(to).getTime() - parseIsoDate(from).getTime()) / MS_PER_DAY);
}

export function yearOf(date: IsoDate): number {
  return Number(date.slice(0, 4));
}

export function maxDate(a: IsoDate, b: IsoDate): IsoDate {
  return a >= b ? a : b;
}

export function minDate(a: IsoDate, b: IsoDate): IsoDate {
  return a <= b ? a : b;
}
