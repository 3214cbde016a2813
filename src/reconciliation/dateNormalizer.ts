/**
 * Date Normalization for the Reconciliation Engine
 *
 * Extracted dates arrive in whatever format the receipt or statement used.
 * This module turns that text into a calendar date, or reports that it
 * could not. It never throws.
 *
 * Formats are tried in a fixed order and the first valid parse wins:
 * - ISO: 2024-01-15
 * - Day/month pairs: 15/01/2024, 01/15/2024 (order set by `dateOrder`)
 * - Year first: 2024/01/15, 2024.01.15
 * - Dash and dotted day/month: 15-01-2024, 15.01.2024
 * - Compact: 20240115
 * - Month names: January 15, 2024 / 15 January 2024 / Jan 15, 2024 / 15-Jan-2024
 * - ISO-8601 date-time: 2024-01-15T10:30:00+05:00
 *
 * Known limitation: 03/04/2024 is read as 3 April under DMY and as
 * March 4 under MDY. No locale inference is attempted.
 */

import type { DateOrder } from './config';

// ============================================
// Types
// ============================================

export type DateParseResult =
  | { ok: true; date: Date; iso: string; format: string }
  | { ok: false; reason: 'empty' | 'unrecognized' };

export interface DateParseOptions {
  dateOrder?: DateOrder;
}

type Part = 'day' | 'month' | 'year' | 'monthName';

interface DateFormat {
  name: string;
  pattern: RegExp;
  parts: Part[];
}

const MS_PER_DAY = 1000 * 60 * 60 * 24;

const MONTHS: Record<string, number> = {
  jan: 1,
  january: 1,
  feb: 2,
  february: 2,
  mar: 3,
  march: 3,
  apr: 4,
  april: 4,
  may: 5,
  jun: 6,
  june: 6,
  jul: 7,
  july: 7,
  aug: 8,
  august: 8,
  sep: 9,
  sept: 9,
  september: 9,
  oct: 10,
  october: 10,
  nov: 11,
  november: 11,
  dec: 12,
  december: 12,
};

// ============================================
// Format table
// ============================================

const ISO: DateFormat = {
  name: 'YYYY-MM-DD',
  pattern: /^(\d{4})-(\d{1,2})-(\d{1,2})$/,
  parts: ['year', 'month', 'day'],
};

/**
 * Formats whose relative order depends on `dateOrder`.
 * Each pair is [day-first, month-first].
 */
const DAY_MONTH_PAIRS: Array<[DateFormat, DateFormat]> = [
  [
    { name: 'DD/MM/YYYY', pattern: /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/, parts: ['day', 'month', 'year'] },
    { name: 'MM/DD/YYYY', pattern: /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/, parts: ['month', 'day', 'year'] },
  ],
];

const YEAR_FIRST_SLASH: DateFormat = {
  name: 'YYYY/MM/DD',
  pattern: /^(\d{4})\/(\d{1,2})\/(\d{1,2})$/,
  parts: ['year', 'month', 'day'],
};

const SEPARATED_PAIRS: Array<[DateFormat, DateFormat]> = [
  [
    { name: 'DD-MM-YYYY', pattern: /^(\d{1,2})-(\d{1,2})-(\d{4})$/, parts: ['day', 'month', 'year'] },
    { name: 'MM-DD-YYYY', pattern: /^(\d{1,2})-(\d{1,2})-(\d{4})$/, parts: ['month', 'day', 'year'] },
  ],
  [
    { name: 'DD.MM.YYYY', pattern: /^(\d{1,2})\.(\d{1,2})\.(\d{4})$/, parts: ['day', 'month', 'year'] },
    { name: 'MM.DD.YYYY', pattern: /^(\d{1,2})\.(\d{1,2})\.(\d{4})$/, parts: ['month', 'day', 'year'] },
  ],
];

const TRAILING_FORMATS: DateFormat[] = [
  { name: 'YYYY.MM.DD', pattern: /^(\d{4})\.(\d{1,2})\.(\d{1,2})$/, parts: ['year', 'month', 'day'] },
  { name: 'YYYYMMDD', pattern: /^(\d{4})(\d{2})(\d{2})$/, parts: ['year', 'month', 'day'] },
  // Long and abbreviated month names share patterns; the lookup table decides validity
  {
    name: 'Month DD, YYYY',
    pattern: /^([A-Za-z]{3,9})\.?\s+(\d{1,2})(?:st|nd|rd|th)?,?\s+(\d{4})$/,
    parts: ['monthName', 'day', 'year'],
  },
  {
    name: 'DD Month YYYY',
    pattern: /^(\d{1,2})(?:st|nd|rd|th)?\s+([A-Za-z]{3,9})\.?,?\s+(\d{4})$/,
    parts: ['day', 'monthName', 'year'],
  },
  {
    name: 'DD-Mon-YYYY',
    pattern: /^(\d{1,2})-([A-Za-z]{3,9})-(\d{4})$/,
    parts: ['day', 'monthName', 'year'],
  },
];

const ISO_DATE_TIME = /^(\d{4})-(\d{2})-(\d{2})[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})?$/i;

/**
 * Returns the ordered list of formats for the given day/month preference.
 */
export function getDateFormats(dateOrder: DateOrder = 'DMY'): DateFormat[] {
  const pick = ([dayFirst, monthFirst]: [DateFormat, DateFormat]): DateFormat[] =>
    dateOrder === 'DMY' ? [dayFirst, monthFirst] : [monthFirst, dayFirst];

  return [
    ISO,
    ...DAY_MONTH_PAIRS.flatMap(pick),
    YEAR_FIRST_SLASH,
    ...SEPARATED_PAIRS.flatMap(pick),
    ...TRAILING_FORMATS,
  ];
}

// ============================================
// Helpers
// ============================================

/**
 * Builds a UTC-midnight Date for a calendar day, or null if the day
 * does not exist (e.g. February 30).
 */
function toCalendarDate(year: number, month: number, day: number): Date | null {
  if (month < 1 || month > 12 || day < 1 || day > 31) {
    return null;
  }

  const date = new Date(Date.UTC(year, month - 1, day));

  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return null;
  }

  return date;
}

function applyFormat(format: DateFormat, text: string): Date | null {
  const match = format.pattern.exec(text);
  if (!match) {
    return null;
  }

  let day = 0;
  let month = 0;
  let year = 0;

  for (let i = 0; i < format.parts.length; i++) {
    const raw = match[i + 1] ?? '';
    switch (format.parts[i]) {
      case 'day':
        day = parseInt(raw, 10);
        break;
      case 'month':
        month = parseInt(raw, 10);
        break;
      case 'year':
        year = parseInt(raw, 10);
        break;
      case 'monthName':
        month = MONTHS[raw.toLowerCase()] ?? 0;
        break;
    }
  }

  return toCalendarDate(year, month, day);
}

/**
 * Formats a calendar date as YYYY-MM-DD.
 */
export function toIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * The calendar day of `now` in local time, as a UTC-midnight Date.
 * Comparable with dates returned by parseDate.
 */
export function startOfDay(now: Date): Date {
  return new Date(Date.UTC(now.getFullYear(), now.getMonth(), now.getDate()));
}

/**
 * Signed number of whole days from `from` to `to` (calendar dates).
 */
export function dayDifference(from: Date, to: Date): number {
  return Math.round((to.getTime() - from.getTime()) / MS_PER_DAY);
}

// ============================================
// Public API
// ============================================

/**
 * Parses free-text date into a calendar date.
 *
 * @example
 * parseDate('2024-01-10')        // { ok: true, iso: '2024-01-10', format: 'YYYY-MM-DD', ... }
 * parseDate('10 Jan 2024')       // { ok: true, iso: '2024-01-10', format: 'DD Month YYYY', ... }
 * parseDate('tomorrow-ish')      // { ok: false, reason: 'unrecognized' }
 */
export function parseDate(text: string | null | undefined, options: DateParseOptions = {}): DateParseResult {
  const trimmed = (text ?? '').trim();
  if (!trimmed) {
    return { ok: false, reason: 'empty' };
  }

  for (const format of getDateFormats(options.dateOrder)) {
    const date = applyFormat(format, trimmed);
    if (date) {
      return { ok: true, date, iso: toIsoDate(date), format: format.name };
    }
  }

  // Last resort: ISO-8601 with a time and optional zone. Keep the written calendar day.
  const dateTime = ISO_DATE_TIME.exec(trimmed);
  if (dateTime && !Number.isNaN(Date.parse(trimmed))) {
    const date = toCalendarDate(
      parseInt(dateTime[1] ?? '', 10),
      parseInt(dateTime[2] ?? '', 10),
      parseInt(dateTime[3] ?? '', 10)
    );
    if (date) {
      return { ok: true, date, iso: toIsoDate(date), format: 'ISO-8601' };
    }
  }

  return { ok: false, reason: 'unrecognized' };
}

/**
 * Convenience wrapper returning the Date or null.
 */
export function normalizeDate(text: string | null | undefined, options: DateParseOptions = {}): Date | null {
  const result = parseDate(text, options);
  return result.ok ? result.date : null;
}

export default parseDate;
