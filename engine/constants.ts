// engine/constants.ts
// Canonical constants for the ELP engine.
// Ensures predictable classification and ranking across all modules.

// ------------------------------------------------------------
// Target violation category (FMCSR 391.11(b)(2), English proficiency)
// ------------------------------------------------------------

export const TARGET_PART_NO = '391';

// Section text after case-folding and stripping separators: "11(B)(2)" → "11B2"
export const TARGET_SECTION_CANONICAL = '11B2';

// Description keywords used only when matchDescriptionKeywords is enabled
export const TARGET_DESCRIPTION_KEYWORDS = ['english', 'language proficiency'] as const;

// ------------------------------------------------------------
// Out-of-service indicator
// ------------------------------------------------------------

export const OOS_TRUTHY_VALUES: ReadonlySet<string> = new Set(['true', 't', 'y', 'yes', '1']);

// ------------------------------------------------------------
// Statistics
// ------------------------------------------------------------

export const TOP_REGIONS_LIMIT = 10;

// Regions below this previous-month OOS count never appear as movers
export const MOVERS_MIN_PREVIOUS_COUNT = 5;

export const MOVERS_LIMIT = 3;

// ------------------------------------------------------------
// Labels
// ------------------------------------------------------------

export const MONTH_ABBREVIATIONS = [
  'Jan',
  'Feb',
  'Mar',
  'Apr',
  'May',
  'Jun',
  'Jul',
  'Aug',
  'Sep',
  'Oct',
  'Nov',
  'Dec'
] as const;

export const MONTH_NAMES = [
  'January',
  'February',
  'March',
  'April',
  'May',
  'June',
  'July',
  'August',
  'September',
  'October',
  'November',
  'December'
] as const;

export const NO_PEAK_LABEL = 'N/A';

export const SAMPLE_DATA_SUFFIX = ' (Representative Sample Data)';
