// engine/normalizeDate.ts
// Multi-format date parsing into year-month buckets

import {
  DATE_COMPACT_YYYYMMDD,
  DATE_DD_MON_YY,
  DATE_ISO_YYYY_MM_DD,
  DATE_MM_DD_YYYY_SLASH
} from './regex';
import { ErrorCodes } from './errorCodes';
import { toSafeTrimmedString } from './normalizeFields';
import type { DateParseResult, MonthBucketKey } from './types';

interface CalendarDate {
  year: number;
  month: number; // 1..12
  day: number;
}

const MONTH_INDEX: Record<string, number> = {
  jan: 1,
  feb: 2,
  mar: 3,
  apr: 4,
  may: 5,
  jun: 6,
  jul: 7,
  aug: 8,
  sep: 9,
  oct: 10,
  nov: 11,
  dec: 12
};

function makeCalendarDate(y: number, m1: number, d: number): CalendarDate | null {
  if (!Number.isFinite(y) || !Number.isFinite(m1) || !Number.isFinite(d)) return null;
  if (m1 < 1 || m1 > 12) return null;
  if (d < 1 || d > 31) return null;

  const dt = new Date(Date.UTC(y, m1 - 1, d));

  // Reject JS rollover (e.g., 2025-02-30 → 2025-03-02)
  if (dt.getUTCFullYear() !== y) return null;
  if (dt.getUTCMonth() !== m1 - 1) return null;
  if (dt.getUTCDate() !== d) return null;

  return { year: y, month: m1, day: d };
}

// Two-digit years pivot like strptime's %y: 00–68 → 20xx, 69–99 → 19xx
function expandTwoDigitYear(yy: number): number {
  return yy <= 68 ? 2000 + yy : 1900 + yy;
}

// 1. Compact 20250615 (MCMIS CHANGE_DATE may carry a trailing time: "20250615 1432")
function parseCompact(raw: string): CalendarDate | null {
  const token = raw.split(/\s+/)[0] ?? '';
  const m = DATE_COMPACT_YYYYMMDD.exec(token);
  if (!m) return null;
  return makeCalendarDate(Number(m[1]), Number(m[2]), Number(m[3]));
}

// 2. ISO 2025-06-15, 2025-06-15T00:00:00, 2025-06-15 00:00:00
function parseIso(raw: string): CalendarDate | null {
  const datePart = raw.split(/[T\s]/)[0] ?? '';
  const m = DATE_ISO_YYYY_MM_DD.exec(datePart);
  if (!m) return null;
  return makeCalendarDate(Number(m[1]), Number(m[2]), Number(m[3]));
}

// 3. 15-JUN-25
function parseDayMonthAbbrevYear(raw: string): CalendarDate | null {
  const m = DATE_DD_MON_YY.exec(raw);
  if (!m) return null;
  const month = MONTH_INDEX[m[2].toLowerCase()];
  if (month === undefined) return null;
  return makeCalendarDate(expandTwoDigitYear(Number(m[3])), month, Number(m[1]));
}

// 4. 06/15/2025
function parseUsSlash(raw: string): CalendarDate | null {
  const m = DATE_MM_DD_YYYY_SLASH.exec(raw);
  if (!m) return null;
  return makeCalendarDate(Number(m[3]), Number(m[1]), Number(m[2]));
}

const PARSERS: ReadonlyArray<(raw: string) => CalendarDate | null> = [
  parseCompact,
  parseIso,
  parseDayMonthAbbrevYear,
  parseUsSlash
];

export function toMonthBucketKey(year: number, month: number): MonthBucketKey {
  const mm = String(month).padStart(2, '0');
  return { year, month: mm, key: `${year}-${mm}` };
}

/**
 * Parse raw date text into a year-month bucket.
 *
 * Encodings are attempted in fixed priority order; the first that yields a
 * real calendar date wins.
 */
export function parseMonthBucket(raw: unknown): DateParseResult {
  const value = toSafeTrimmedString(raw);
  if (!value) {
    return { ok: false, reason: ErrorCodes.MISSING_DATE };
  }

  for (const parse of PARSERS) {
    const date = parse(value);
    if (date) {
      return { ok: true, value: toMonthBucketKey(date.year, date.month) };
    }
  }

  return { ok: false, reason: ErrorCodes.UNPARSEABLE_DATE };
}

/**
 * Parse and apply the analysis-start cutoff. A record dated before the
 * start year is a domain exclusion, not a parse failure.
 */
export function normalizeRecordDate(raw: unknown, analysisStartYear: number): DateParseResult {
  const parsed = parseMonthBucket(raw);
  if (!parsed.ok) return parsed;

  if (parsed.value.year < analysisStartYear) {
    return { ok: false, reason: ErrorCodes.BEFORE_ANALYSIS_START };
  }

  return parsed;
}
