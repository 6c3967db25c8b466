// engine/normalizeFields.ts
// Field normalization helpers for the ELP engine

import { CODE_SEPARATORS, HEADER_SEPARATORS } from './regex';
import type { RawRow } from './types';

// ------------------------------------------------------------
// Core string helper
// ------------------------------------------------------------

/**
 * Safely convert any unknown value to a trimmed string.
 * Never returns null/undefined; always returns a string (possibly empty).
 * Objects (other than Dates) are treated as absent.
 */
export function toSafeTrimmedString(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'string') return value.trim();
  if (typeof value === 'number') return Number.isFinite(value) ? String(value) : '';
  if (typeof value === 'boolean' || typeof value === 'bigint') return String(value);
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? '' : value.toISOString().slice(0, 10);
  }
  return '';
}

// ------------------------------------------------------------
// Header keys
// ------------------------------------------------------------

/**
 * "INSPECTION_ID", "Inspection Id", "inspection-id" → "inspection_id"
 */
export function normalizeHeaderKey(raw: string): string {
  return raw.trim().toLowerCase().replace(HEADER_SEPARATORS, '_');
}

/**
 * Re-key a raw row by normalized header. When two raw keys collapse onto the
 * same normalized key, the first non-empty value wins.
 */
export function normalizeRowKeys(row: RawRow): Map<string, string> {
  const out = new Map<string, string>();
  for (const [key, value] of Object.entries(row)) {
    const k = normalizeHeaderKey(key);
    const v = toSafeTrimmedString(value);
    const existing = out.get(k);
    if (existing === undefined || (existing === '' && v !== '')) {
      out.set(k, v);
    }
  }
  return out;
}

/** First non-empty value among the alias keys, or ''. */
export function pickFirst(row: ReadonlyMap<string, string>, keys: readonly string[]): string {
  for (const key of keys) {
    const v = row.get(key);
    if (v !== undefined && v.length > 0) return v;
  }
  return '';
}

// ------------------------------------------------------------
// Domain values
// ------------------------------------------------------------

/** Case-fold and strip separators: "11(b)(2)" → "11B2", "391.11B2-S" → "39111B2S". */
export function normalizeCodeText(raw: unknown): string {
  return toSafeTrimmedString(raw).toUpperCase().replace(CODE_SEPARATORS, '');
}

/** Region codes are compared upper-case: " ca " → "CA". */
export function normalizeRegionCode(raw: unknown): string {
  return toSafeTrimmedString(raw).toUpperCase();
}

/**
 * Identifiers are compared as text. Numeric identifiers from JSON (1) and
 * their CSV spelling ("1") must join, so numbers are stringified first.
 */
export function normalizeIdentifier(raw: unknown): string {
  return toSafeTrimmedString(raw);
}
