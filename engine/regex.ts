// engine/regex.ts
// Centralized regular expressions for the ELP engine

// ------------------------------------------------------------
// Date encodings (string patterns only, tried in this order)
// ------------------------------------------------------------

// Compact: 20250615
export const DATE_COMPACT_YYYYMMDD = /^(\d{4})(\d{2})(\d{2})$/;

// ISO date part: 2025-06-15 (time suffix is cut before matching)
export const DATE_ISO_YYYY_MM_DD = /^(\d{4})-(\d{2})-(\d{2})$/;

// Day-month abbreviation-year: 15-JUN-25
export const DATE_DD_MON_YY = /^(\d{1,2})-([A-Za-z]{3})-(\d{2})$/;

// US slash: 06/15/2025 or 6/5/2025
export const DATE_MM_DD_YYYY_SLASH = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/;

// ------------------------------------------------------------
// Violation code text
// ------------------------------------------------------------

// Everything that is not a letter or digit: ".", "(", ")", "-", spaces
export const CODE_SEPARATORS = /[^A-Z0-9]+/g;

// Base section followed only by letters: 11B2, 11B2S, 11B2Q, 11B2Z
export const TARGET_SECTION_WITH_SUFFIX = /^11B2[A-Z]*$/;

// ------------------------------------------------------------
// Header keys
// ------------------------------------------------------------

export const HEADER_SEPARATORS = /[\s\-]+/g;
