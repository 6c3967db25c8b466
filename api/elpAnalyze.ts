// api/elpAnalyze.ts
// ELP engine HTTP entrypoint: posted exports in, dashboard snapshot out.

import type { VercelRequest, VercelResponse } from '@vercel/node';

import { ErrorCodes } from '../engine/errorCodes';
import { errorMessage, logError, logInfo, logWarn } from '../engine/logger';
import { runElpPipeline } from '../engine/pipeline';
import type { ElpSnapshot, PipelineDiagnostics } from '../engine/types';
import { validateAnalyzeTransport, type TransportErrorBody } from '../engine/validateTransport';

// Vercel rejects request bodies above 4.5 MB before they reach us; keep a
// slightly lower limit so the error is ours.
const MAX_ANALYZE_BODY_BYTES = 4_000_000;

export interface AnalyzeSuccessBody {
  snapshot: ElpSnapshot;
  diagnostics: PipelineDiagnostics;
}

export interface AnalyzeResult {
  status: number;
  body: AnalyzeSuccessBody | TransportErrorBody | { error: string };
}

function approxBodySize(rawBody: unknown): number {
  if (typeof rawBody === 'string') return rawBody.length;
  if (rawBody === null || rawBody === undefined) return 0;
  try {
    return JSON.stringify(rawBody).length;
  } catch {
    // circular structures cannot come from a JSON body parser
    return 0;
  }
}

function errorBody(error: string, code: TransportErrorBody['code']): TransportErrorBody {
  return { error, code, error_codes: [code] };
}

/**
 * Request → result, without touching the response object.
 * `now` stamps last_updated.
 */
export function analyzeRequest(method: string | undefined, rawBody: unknown, now: Date = new Date()): AnalyzeResult {
  if (method !== 'POST') {
    logWarn('method_not_allowed', { method });
    return { status: 405, body: { error: 'Method Not Allowed' } };
  }

  const size = approxBodySize(rawBody);
  if (size > MAX_ANALYZE_BODY_BYTES) {
    logWarn('request_body_too_large', { approx_size: size, max_bytes: MAX_ANALYZE_BODY_BYTES });
    return {
      status: 413,
      body: errorBody('Request body too large for ELP engine.', ErrorCodes.INVALID_REQUEST_STRUCTURE)
    };
  }

  let body: unknown;
  try {
    body = typeof rawBody === 'string' ? JSON.parse(rawBody) : rawBody;
  } catch {
    logWarn('invalid_json_body', {});
    return { status: 400, body: errorBody('Invalid JSON body.', ErrorCodes.INVALID_JSON_BODY) };
  }

  const transport = validateAnalyzeTransport(body);
  if (!transport.ok) {
    logWarn('transport_validation_failed_4xx', {
      status: transport.errorStatus,
      error_body: transport.errorBody
    });
    return { status: transport.errorStatus, body: transport.errorBody };
  }

  const { input } = transport;

  try {
    const { snapshot, diagnostics } = runElpPipeline(input.violations, input.inspections, {
      config: input.config,
      now
    });

    if (diagnostics.matched_records === 0) {
      logWarn('no_matched_records', {
        format: input.format,
        violations_scanned: diagnostics.violations_scanned,
        inspections_scanned: diagnostics.inspections_scanned
      });
      return {
        status: 400,
        body: errorBody('No ELP violations matched an inspection.', ErrorCodes.NO_MATCHED_RECORDS)
      };
    }

    logInfo('analyze_completed', {
      format: input.format,
      matched_records: diagnostics.matched_records,
      total_oos: snapshot.total_oos
    });

    return { status: 200, body: { snapshot, diagnostics } };
  } catch (err) {
    logError('analyze_failed', { error: errorMessage(err) });
    return {
      status: 500,
      body: errorBody('Internal ELP engine error.', ErrorCodes.INTERNAL_PIPELINE_ERROR)
    };
  }
}

export default function handler(req: VercelRequest, res: VercelResponse) {
  const result = analyzeRequest(req.method, req.body);
  if (result.status === 405) {
    res.setHeader('Allow', 'POST');
  }
  return res.status(result.status).json(result.body);
}
