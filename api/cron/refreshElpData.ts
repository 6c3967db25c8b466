// api/cron/refreshElpData.ts
// Purpose: Rebuild the ELP dashboard snapshot from the Socrata datasets and store it in Blob.
// Schedule: daily (via Vercel Cron, see vercel.json)
// Supports: dry-run mode (compute, do not store)

import type { VercelRequest, VercelResponse } from '@vercel/node';

import {
  loadPipelineConfig,
  loadSocrataConfig,
  loadStorageConfig,
  parseBool,
  type Env
} from '../../engine/config';
import { ErrorCodes } from '../../engine/errorCodes';
import { errorMessage, logError, logInfo, logWarn } from '../../engine/logger';
import { loadSampleSnapshot } from '../../engine/sampleSnapshot';
import { runRemotePipeline, type FetchLike } from '../../engine/socrataSource';
import { saveSnapshot, type StoredSnapshot } from '../../engine/snapshotStore';
import type { ElpSnapshot } from '../../engine/types';

export interface RefreshOptions {
  dryRun: boolean;
  env?: Env;
  now?: Date;
  fetchImpl?: FetchLike;
  retryDelayMs?: number;
  store?: (snapshot: ElpSnapshot, pathname: string) => Promise<StoredSnapshot>;
}

export interface RefreshOutcome {
  status: number;
  body: Record<string, unknown>;
}

/** Vercel Cron sends `Authorization: Bearer $CRON_SECRET` when the secret is set. */
export function isAuthorizedCronCall(authorization: string | undefined, secret: string | undefined): boolean {
  if (!secret) return true;
  return authorization === `Bearer ${secret}`;
}

export async function refreshElpData(options: RefreshOptions): Promise<RefreshOutcome> {
  const env = options.env ?? process.env;
  const now = options.now ?? new Date();
  const store = options.store ?? saveSnapshot;

  const socrata = loadSocrataConfig(env);
  const storage = loadStorageConfig(env);

  const run = await runRemotePipeline(
    socrata,
    { config: loadPipelineConfig(env), now },
    { fetchImpl: options.fetchImpl, retryDelayMs: options.retryDelayMs }
  );

  let snapshot = run.snapshot;

  if (run.diagnostics.matched_records === 0) {
    const code =
      run.violationPages.truncated && run.violationPages.rows === 0
        ? ErrorCodes.SOURCE_UNAVAILABLE
        : ErrorCodes.NO_MATCHED_RECORDS;

    if (!storage.allowSampleFallback) {
      logWarn('refresh_no_matched_records', { code, violation_rows: run.violationPages.rows });
      return {
        status: 502,
        body: {
          ok: false,
          dry_run: options.dryRun,
          error: 'Refresh matched no ELP violations; nothing stored.',
          code,
          error_codes: [code],
          diagnostics: run.diagnostics
        }
      };
    }

    logWarn('refresh_sample_fallback', { code });
    snapshot = loadSampleSnapshot(now);
  }

  let stored: StoredSnapshot | null = null;
  if (!options.dryRun) {
    stored = await store(snapshot, storage.blobPathname);
  }

  logInfo('refresh_completed', {
    dry_run: options.dryRun,
    data_source: snapshot.data_source,
    matched_records: run.diagnostics.matched_records
  });

  return {
    status: 200,
    body: {
      ok: true,
      dry_run: options.dryRun,
      data_source: snapshot.data_source,
      matched_records: run.diagnostics.matched_records,
      total_oos: snapshot.total_oos,
      total_all: snapshot.total_all,
      stored_url: stored ? stored.url : null,
      violation_pages: run.violationPages,
      inspection_pages: run.inspectionPages,
      diagnostics: run.diagnostics
    }
  };
}

export default async function handler(req: VercelRequest, res: VercelResponse) {
  // Cron calls are GET by default
  if (req.method !== 'GET') {
    res.setHeader('Allow', 'GET');
    return res.status(405).json({ error: 'Method not allowed' });
  }

  if (!isAuthorizedCronCall(req.headers.authorization, process.env.CRON_SECRET)) {
    logWarn('refresh_unauthorized', {});
    return res.status(401).json({ error: 'Unauthorized' });
  }

  // Dry-run can be controlled via query or env
  const dryRun = parseBool(req.query.dry_run) || parseBool(process.env.REFRESH_DRY_RUN);

  try {
    const outcome = await refreshElpData({ dryRun });
    return res.status(outcome.status).json(outcome.body);
  } catch (err) {
    logError('refresh_failed', { error: errorMessage(err) });
    return res.status(500).json({
      ok: false,
      error: 'Refresh failed',
      dry_run: dryRun,
      code: ErrorCodes.INTERNAL_PIPELINE_ERROR,
      error_codes: [ErrorCodes.INTERNAL_PIPELINE_ERROR]
    });
  }
}
