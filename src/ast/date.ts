import { DATE_LIMITS } from '../config/constants.js';
import { DateFormatError } from '../errors/index.js';

/**
 * Calendar date of a `YEAR.MONTH.DAY` literal.
 *
 * Kept as a plain record rather than a `Date`: game scripts use years
 * outside the range `Date` handles well, and days are never checked
 * against the month (`1444.2.30` stays as written).
 */
export interface PdxDate {
  readonly year: number;
  readonly month: number;
  readonly day: number;
}

const DATE_PART = /^\d+$/;

function splitDate(text: string): [number, number, number] | null {
  const parts = text.split('.');
  if (parts.length !== 3 || !parts.every((p) => DATE_PART.test(p))) return null;
  return [Number(parts[0]), Number(parts[1]), Number(parts[2])];
}

function inRange(year: number, month: number, day: number): boolean {
  return (
    year >= DATE_LIMITS.MIN_YEAR &&
    year <= DATE_LIMITS.MAX_YEAR &&
    month >= DATE_LIMITS.MIN_MONTH &&
    month <= DATE_LIMITS.MAX_MONTH &&
    day >= DATE_LIMITS.MIN_DAY &&
    day <= DATE_LIMITS.MAX_DAY
  );
}

export function isValidDateText(text: string): boolean {
  const parts = splitDate(text);
  return parts !== null && inRange(...parts);
}

/**
 * Parse `YEAR.MONTH.DAY`.
 * @throws DateFormatError when the text is not a valid date literal
 */
export function parseDate(text: string): PdxDate {
  const parts = splitDate(text);
  if (!parts || !inRange(...parts)) {
    throw new DateFormatError(text);
  }
  const [year, month, day] = parts;
  return { year, month, day };
}

export function formatDate(date: PdxDate): string {
  return `${date.year}.${date.month}.${date.day}`;
}

export function compareDates(a: PdxDate, b: PdxDate): number {
  return a.year - b.year || a.month - b.month || a.day - b.day;
}

export function isPdxDate(value: unknown): value is PdxDate {
  return (
    typeof value === 'object' &&
    value !== null &&
    'year' in value &&
    'month' in value &&
    'day' in value &&
    typeof value.year === 'number' &&
    typeof value.month === 'number' &&
    typeof value.day === 'number'
  );
}
