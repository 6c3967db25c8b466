// engine/errorCodes.ts
// Canonical exclusion and request codes for the ELP engine
//
// Code ranges:
//
//  E200–E299 → Missing fields on a single record
//  E300–E399 → Invalid formats / unrecognized row shapes
//  E400–E499 → Domain filters (category, cutoff, duplicates, join misses)
//  E600–E699 → Run-level / transport issues (request body, empty result, source)

// NOTE:
// - E2xx / E3xx / E4xx codes exclude a single record and never abort a run.
// - E6xx codes describe the run or the HTTP request as a whole.

export const ErrorCodes = {
  // 2xx – Missing fields
  MISSING_INSPECTION_ID: 'E201',
  MISSING_REGION: 'E202',
  MISSING_DATE: 'E203',
  MISSING_VIOLATION_CODE: 'E204',

  // 3xx – Invalid formats
  UNPARSEABLE_DATE: 'E301',
  UNKNOWN_SCHEMA: 'E302',

  // 4xx – Domain filters
  NOT_TARGET_CATEGORY: 'E401',
  BEFORE_ANALYSIS_START: 'E402',
  DUPLICATE_IDENTIFIER: 'E403',
  UNMATCHED_IDENTIFIER: 'E404',

  // 6xx – Run / transport
  INVALID_JSON_BODY: 'E601',
  INVALID_REQUEST_STRUCTURE: 'E602',
  EMPTY_INPUT: 'E603',
  NO_MATCHED_RECORDS: 'E604',
  SOURCE_UNAVAILABLE: 'E605',
  INTERNAL_PIPELINE_ERROR: 'E607'
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/** Codes that can exclude a single record (E2xx–E4xx). */
export type ExclusionCode = Exclude<
  ErrorCode,
  | typeof ErrorCodes.INVALID_JSON_BODY
  | typeof ErrorCodes.INVALID_REQUEST_STRUCTURE
  | typeof ErrorCodes.EMPTY_INPUT
  | typeof ErrorCodes.NO_MATCHED_RECORDS
  | typeof ErrorCodes.SOURCE_UNAVAILABLE
  | typeof ErrorCodes.INTERNAL_PIPELINE_ERROR
>;

// Human-readable descriptions (for logs / diagnostics output)
export const ErrorCodeDescriptions: Record<ErrorCode, string> = {
  [ErrorCodes.MISSING_INSPECTION_ID]: 'Inspection identifier is missing.',
  [ErrorCodes.MISSING_REGION]: 'Inspection region (report state) is missing.',
  [ErrorCodes.MISSING_DATE]: 'Date is missing.',
  [ErrorCodes.MISSING_VIOLATION_CODE]: 'Violation part/section is missing.',

  [ErrorCodes.UNPARSEABLE_DATE]: 'Date is not in a supported format.',
  [ErrorCodes.UNKNOWN_SCHEMA]: 'Row shape does not match any known export schema.',

  [ErrorCodes.NOT_TARGET_CATEGORY]: 'Violation is not an English Language Proficiency violation.',
  [ErrorCodes.BEFORE_ANALYSIS_START]: 'Record falls before the analysis start year.',
  [ErrorCodes.DUPLICATE_IDENTIFIER]: 'Inspection identifier already seen in this extract.',
  [ErrorCodes.UNMATCHED_IDENTIFIER]: 'No inspection record found for this identifier.',

  [ErrorCodes.INVALID_JSON_BODY]: 'Request body is not valid JSON.',
  [ErrorCodes.INVALID_REQUEST_STRUCTURE]: 'Request structure is invalid.',
  [ErrorCodes.EMPTY_INPUT]: 'No violation or inspection rows were supplied.',
  [ErrorCodes.NO_MATCHED_RECORDS]: 'No ELP violations matched an inspection.',
  [ErrorCodes.SOURCE_UNAVAILABLE]: 'Remote data source could not be read.',
  [ErrorCodes.INTERNAL_PIPELINE_ERROR]: 'Internal pipeline failure.'
};

export type ExclusionCounts = Partial<Record<ExclusionCode, number>>;

// Helper: bump the counter for one excluded record
export function countExclusion(counts: ExclusionCounts, code: ExclusionCode): void {
  counts[code] = (counts[code] ?? 0) + 1;
}

export const EXCLUSION_CODES: readonly ExclusionCode[] = [
  ErrorCodes.MISSING_INSPECTION_ID,
  ErrorCodes.MISSING_REGION,
  ErrorCodes.MISSING_DATE,
  ErrorCodes.MISSING_VIOLATION_CODE,
  ErrorCodes.UNPARSEABLE_DATE,
  ErrorCodes.UNKNOWN_SCHEMA,
  ErrorCodes.NOT_TARGET_CATEGORY,
  ErrorCodes.BEFORE_ANALYSIS_START,
  ErrorCodes.DUPLICATE_IDENTIFIER,
  ErrorCodes.UNMATCHED_IDENTIFIER
];

export interface ExclusionSummaryLine {
  code: ExclusionCode;
  count: number;
  description: string;
}

// Helper: non-zero counters in code order, with their descriptions
export function describeExclusions(counts: ExclusionCounts): ExclusionSummaryLine[] {
  const lines: ExclusionSummaryLine[] = [];
  for (const code of EXCLUSION_CODES) {
    const count = counts[code] ?? 0;
    if (count > 0) {
      lines.push({ code, count, description: ErrorCodeDescriptions[code] });
    }
  }
  return lines;
}
