/**
 * @pkv2/core — Date and time helpers
 */
import { isValid, parseISO } from 'date-fns';
import { HIDDEN_BIRTH_YEAR } from './constants.js';
import type { CalendarDate } from './types.js';

const CALENDAR_DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;
const INSTANT_RE = /^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}/;
const OFFSET_RE = /(?:Z|[+-]\d{2}(?::?\d{2})?)$/i;

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

function daysInMonth(year: number, month: number): number {
  if (month === 2) return isLeapYear(year) ? 29 : 28;
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

/**
 * Parse an ISO-8601 date-time into a Date. Returns null for anything that is
 * not a full date-time (date-only strings included). A date-time without an
 * offset is read as UTC, never as host-local time.
 */
export function parseInstant(text: string): Date | null {
  if (!INSTANT_RE.test(text)) return null;
  const date = parseISO(OFFSET_RE.test(text) ? text : `${text}Z`);
  return isValid(date) ? date : null;
}

/**
 * Parse `YYYY-MM-DD`. Year 0004 marks a birthday with a hidden year and is a
 * leap year, so 0004-02-29 is accepted.
 */
export function parseCalendarDate(text: string): CalendarDate | null {
  const match = CALENDAR_DATE_RE.exec(text);
  if (!match) return null;
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  if (month < 1 || month > 12) return null;
  if (day < 1 || day > daysInMonth(year, month)) return null;
  return { year, month, day };
}

/** Whether a birthday was stored without its year */
export function isBirthYearHidden(date: CalendarDate): boolean {
  return date.year === HIDDEN_BIRTH_YEAR;
}

export function formatCalendarDate(date: CalendarDate): string {
  const pad = (n: number, width: number) => String(n).padStart(width, '0');
  return `${pad(date.year, 4)}-${pad(date.month, 2)}-${pad(date.day, 2)}`;
}

export function isCalendarDate(value: unknown): value is CalendarDate {
  if (value === null || typeof value !== 'object') return false;
  return (
    'year' in value && typeof value.year === 'number' &&
    'month' in value && typeof value.month === 'number' &&
    'day' in value && typeof value.day === 'number'
  );
}
