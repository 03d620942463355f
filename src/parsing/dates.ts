/**
 * Date normalisation. Every date that enters the store is a `yyyy-MM-dd` string.
 */

import { format, isValid, parse, parseISO } from 'date-fns';

/** Tried in order after the mapping's own hint. US month-first wins ambiguous dates. */
export const DATE_FORMATS: readonly string[] = [
  'MM/dd/yyyy',
  'M/d/yyyy',
  'yyyy-MM-dd',
  'dd/MM/yyyy',
  'd/M/yyyy',
  'dd-MM-yyyy',
  'yyyy/MM/dd',
  'dd.MM.yyyy',
  'MMM d, yyyy',
  'MMMM d, yyyy',
  'd MMM yyyy',
];

const ISO_PREFIX = /^\d{4}-\d{2}-\d{2}(?:[T ]|$)/;
const EPOCH_DIGITS = /^\d{9,13}$/;
/** Anything at or above this is treated as milliseconds. */
const EPOCH_MS_THRESHOLD = 1e11;

const REFERENCE_DATE = new Date(2000, 0, 1);

const MIN_YEAR = 1970;
const MAX_YEAR = 2100;

/**
 * Normalise a raw date value to `yyyy-MM-dd`, or null when nothing recognises it.
 * Order: format hint, known formats, ISO-8601, epoch seconds/millis (UTC), `Date` parse.
 */
export function normalizeDate(value: unknown, formatHint: string | null = null): string | null {
  if (typeof value === 'number') {
    return fromEpoch(value);
  }
  if (typeof value !== 'string') return null;

  const text = value.trim();
  if (text === '') return null;

  const formats = formatHint ? [formatHint, ...DATE_FORMATS] : DATE_FORMATS;
  for (const fmt of formats) {
    const parsed = parseWith(text, fmt);
    if (parsed && inRange(parsed)) return format(parsed, 'yyyy-MM-dd');
  }

  if (ISO_PREFIX.test(text) && isValid(parseISO(text))) {
    return text.slice(0, 10);
  }

  if (EPOCH_DIGITS.test(text)) {
    return fromEpoch(Number(text));
  }

  const loose = new Date(text);
  return inRange(loose) ? format(loose, 'yyyy-MM-dd') : null;
}

/**
 * Whether date-fns accepts `pattern` for both formatting and parsing.
 * Patterns such as `YYYY-MM-DD` (week-numbering year, day of year) are rejected.
 */
export function isDateFormat(pattern: string): boolean {
  if (pattern.trim() === '') return false;
  try {
    format(REFERENCE_DATE, pattern);
    parse('', pattern, REFERENCE_DATE);
  } catch (err) {
    if (err instanceof RangeError) return false;
    throw err;
  }
  return true;
}

/** Null when the pattern itself is invalid; date-fns throws RangeError for those. */
function parseWith(text: string, pattern: string): Date | null {
  try {
    return parse(text, pattern, REFERENCE_DATE);
  } catch (err) {
    if (err instanceof RangeError) return null;
    throw err;
  }
}

function fromEpoch(value: number): string | null {
  if (!Number.isFinite(value) || value <= 0) return null;
  const ms = value >= EPOCH_MS_THRESHOLD ? value : value * 1000;
  const date = new Date(ms);
  return inRange(date) ? date.toISOString().slice(0, 10) : null;
}

function inRange(date: Date): boolean {
  if (!isValid(date)) return false;
  const year = date.getFullYear();
  return year >= MIN_YEAR && year <= MAX_YEAR;
}
