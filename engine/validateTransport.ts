// engine/validateTransport.ts
// Transport-level validation for POST /api/elpAnalyze
//
// Responsibilities:
//  - Validate the top-level request structure
//  - Accept either CSV text for both datasets or JSON row arrays for both
//  - Turn optional overrides into a partial PipelineConfig
//  - Do NOT classify, join or aggregate

import { ErrorCodes, type ErrorCode } from './errorCodes';
import { isDuplicatePolicy, isMonthSource, type PipelineConfig } from './config';
import { errorMessage } from './logger';
import { parseCsvRows } from './tabularFiles';
import type { RawRow } from './types';

export interface AnalyzeRequestBody {
  violations_csv_text?: string;
  inspections_csv_text?: string;
  violations?: RawRow[];
  inspections?: RawRow[];
  start_year?: number;
  month_source?: string;
  duplicate_policy?: string;
}

export interface AnalyzeInput {
  format: 'csv' | 'json';
  violations: RawRow[];
  inspections: RawRow[];
  config: Partial<PipelineConfig>;
}

export interface TransportErrorBody {
  error: string;
  code: ErrorCode;
  error_codes: ErrorCode[];
}

export type TransportValidationResult =
  | { ok: true; input: AnalyzeInput }
  | { ok: false; errorStatus: number; errorBody: TransportErrorBody };

function fail(error: string, code: ErrorCode): TransportValidationResult {
  return { ok: false, errorStatus: 400, errorBody: { error, code, error_codes: [code] } };
}

function isPlainObject(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function readRowArray(v: unknown): RawRow[] | null {
  if (!Array.isArray(v)) return null;
  const rows: RawRow[] = [];
  for (const r of v) {
    if (!isPlainObject(r)) return null;
    rows.push(r);
  }
  return rows;
}

function readOverrides(body: Record<string, unknown>): Partial<PipelineConfig> | string {
  const config: Partial<PipelineConfig> = {};

  if (body.start_year !== undefined) {
    const y = body.start_year;
    if (typeof y !== 'number' || !Number.isInteger(y) || y < 1900) {
      return 'start_year must be an integer year.';
    }
    config.analysisStartYear = y;
  }

  if (body.month_source !== undefined) {
    const m = body.month_source;
    if (typeof m !== 'string' || !isMonthSource(m)) {
      return 'month_source must be "violation" or "inspection".';
    }
    config.monthSource = m;
  }

  if (body.duplicate_policy !== undefined) {
    const d = body.duplicate_policy;
    if (typeof d !== 'string' || !isDuplicatePolicy(d)) {
      return 'duplicate_policy must be "last-seen" or "first-seen".';
    }
    config.duplicatePolicy = d;
  }

  return config;
}

/**
 * NOTE:
 *  - JSON parsing of a string body is handled in api/elpAnalyze.ts
 *  - This function operates on already parsed JSON
 */
export function validateAnalyzeTransport(body: unknown): TransportValidationResult {
  // -----------------------------------------
  // 1) Top-level JSON object shape
  // -----------------------------------------
  if (!isPlainObject(body)) {
    return fail('Invalid request structure.', ErrorCodes.INVALID_REQUEST_STRUCTURE);
  }

  const overrides = readOverrides(body);
  if (typeof overrides === 'string') {
    return fail(overrides, ErrorCodes.INVALID_REQUEST_STRUCTURE);
  }

  // -----------------------------------------
  // 2) CSV text form
  // -----------------------------------------
  const vText = body.violations_csv_text;
  const iText = body.inspections_csv_text;

  if (vText !== undefined || iText !== undefined) {
    if (typeof vText !== 'string' || typeof iText !== 'string') {
      return fail(
        'violations_csv_text and inspections_csv_text must both be strings.',
        ErrorCodes.INVALID_REQUEST_STRUCTURE
      );
    }

    let violations: RawRow[];
    let inspections: RawRow[];
    try {
      violations = parseCsvRows(vText);
      inspections = parseCsvRows(iText);
    } catch (err) {
      return fail(`CSV could not be parsed: ${errorMessage(err)}`, ErrorCodes.INVALID_REQUEST_STRUCTURE);
    }

    if (violations.length === 0 || inspections.length === 0) {
      return fail('Both CSV texts must contain a header row and at least one data row.', ErrorCodes.EMPTY_INPUT);
    }

    return { ok: true, input: { format: 'csv', violations, inspections, config: overrides } };
  }

  // -----------------------------------------
  // 3) JSON rows form
  // -----------------------------------------
  const violations = readRowArray(body.violations);
  const inspections = readRowArray(body.inspections);

  if (!violations || !inspections) {
    return fail(
      'Provide violations_csv_text + inspections_csv_text, or violations[] + inspections[] of objects.',
      ErrorCodes.INVALID_REQUEST_STRUCTURE
    );
  }

  if (violations.length === 0 || inspections.length === 0) {
    return fail('violations and inspections must not be empty.', ErrorCodes.EMPTY_INPUT);
  }

  return { ok: true, input: { format: 'json', violations, inspections, config: overrides } };
}
