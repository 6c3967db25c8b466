// engine/socrataSource.ts
//
// Paginated reads from Socrata SODA endpoints (data.transportation.gov).
// Page failures never reach the core as exceptions: after the configured
// retries pagination stops and the caller sees a truncated collection.

import { setTimeout as sleep } from 'node:timers/promises';

import type { SocrataConfig } from './config';
import { errorMessage, logInfo, logWarn } from './logger';
import {
  runElpPipelineIncremental,
  type PipelineOptions,
  type PipelineResult
} from './pipeline';
import type { RawRow } from './types';

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export interface SocrataQuery {
  dataset: string;
  select?: string;
  where?: string;
  /** Stable ordering keeps offsets consistent between pages. */
  order: string;
}

export interface PaginateOptions {
  fetchImpl?: FetchLike;
  /** Base delay between retry attempts; multiplied by the attempt number. */
  retryDelayMs?: number;
}

export interface PaginationSummary {
  pages: number;
  rows: number;
  /** True when a page failed after every retry. */
  truncated: boolean;
}

const DEFAULT_RETRY_DELAY_MS = 1000;

export class SocrataRequestError extends Error {
  constructor(
    message: string,
    readonly status: number | null
  ) {
    super(message);
    this.name = 'SocrataRequestError';
  }
}

// ------------------------------------------------------------
// Queries
// ------------------------------------------------------------

export function violationsQuery(config: SocrataConfig): SocrataQuery {
  return {
    dataset: config.violationsDataset,
    select: config.violationsSelect,
    where: config.violationsWhere,
    order: ':id'
  };
}

export function inspectionsQuery(config: SocrataConfig): SocrataQuery {
  return {
    dataset: config.inspectionsDataset,
    select: config.inspectionsSelect,
    order: ':id'
  };
}

export function buildSocrataUrl(config: SocrataConfig, query: SocrataQuery, offset: number): string {
  const params = new URLSearchParams();
  if (query.select) params.set('$select', query.select);
  if (query.where) params.set('$where', query.where);
  params.set('$order', query.order);
  params.set('$limit', String(config.pageSize));
  params.set('$offset', String(offset));
  return `https://${config.domain}/resource/${query.dataset}.json?${params.toString()}`;
}

function isRawRow(value: unknown): value is RawRow {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ------------------------------------------------------------
// Single page
// ------------------------------------------------------------

export async function fetchSocrataPage(
  config: SocrataConfig,
  query: SocrataQuery,
  offset: number,
  fetchImpl: FetchLike = fetch
): Promise<RawRow[]> {
  const headers: Record<string, string> = { Accept: 'application/json' };
  if (config.appToken) {
    headers['X-App-Token'] = config.appToken;
  }

  const response = await fetchImpl(buildSocrataUrl(config, query, offset), {
    headers,
    signal: AbortSignal.timeout(config.timeoutMs)
  });

  if (!response.ok) {
    throw new SocrataRequestError(`HTTP ${response.status}: ${response.statusText}`, response.status);
  }

  const data: unknown = await response.json();
  if (!Array.isArray(data)) {
    throw new SocrataRequestError('Invalid response: expected a JSON array of rows', response.status);
  }

  return data.filter(isRawRow);
}

// ------------------------------------------------------------
// Pagination
// ------------------------------------------------------------

/**
 * Yields one batch per page. Stops on a short page, an empty page, the page
 * cap, or a page that still fails after `retries` extra attempts.
 * `summary` (when given) is filled in as pages arrive.
 */
export async function* paginateSocrata(
  config: SocrataConfig,
  query: SocrataQuery,
  options: PaginateOptions = {},
  summary: PaginationSummary = { pages: 0, rows: 0, truncated: false }
): AsyncGenerator<RawRow[], void, undefined> {
  const fetchImpl = options.fetchImpl ?? fetch;
  const retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;

  for (let page = 0; page < config.maxPages; page++) {
    const offset = page * config.pageSize;
    let rows: RawRow[] | null = null;

    for (let attempt = 0; attempt <= config.retries; attempt++) {
      try {
        rows = await fetchSocrataPage(config, query, offset, fetchImpl);
        break;
      } catch (err) {
        logWarn('socrata_page_failed', {
          dataset: query.dataset,
          offset,
          attempt: attempt + 1,
          error: errorMessage(err)
        });
        if (attempt < config.retries && retryDelayMs > 0) {
          await sleep(retryDelayMs * (attempt + 1));
        }
      }
    }

    if (rows === null) {
      summary.truncated = true;
      logWarn('socrata_pagination_stopped', { dataset: query.dataset, reason: 'page_failed', offset });
      return;
    }

    summary.pages += 1;
    summary.rows += rows.length;
    logInfo('socrata_page_fetched', { dataset: query.dataset, offset, rows: rows.length });

    if (rows.length === 0) return;
    yield rows;
    if (rows.length < config.pageSize) return;
  }

  logWarn('socrata_pagination_stopped', {
    dataset: query.dataset,
    reason: 'max_pages',
    max_pages: config.maxPages
  });
}

export async function fetchAllSocrata(
  config: SocrataConfig,
  query: SocrataQuery,
  options: PaginateOptions = {},
  summary?: PaginationSummary
): Promise<RawRow[]> {
  const all: RawRow[] = [];
  for await (const rows of paginateSocrata(config, query, options, summary)) {
    all.push(...rows);
  }
  return all;
}

// ------------------------------------------------------------
// Remote run
// ------------------------------------------------------------

export interface RemoteRunResult extends PipelineResult {
  violationPages: PaginationSummary;
  inspectionPages: PaginationSummary;
}

/**
 * Fetch every violation page, then stream inspection pages into the
 * incremental pipeline. Inspection pages stop as soon as every wanted
 * identifier has a region.
 */
export async function runRemotePipeline(
  config: SocrataConfig,
  pipelineOptions: PipelineOptions = {},
  sourceOptions: PaginateOptions = {}
): Promise<RemoteRunResult> {
  const violationPages: PaginationSummary = { pages: 0, rows: 0, truncated: false };
  const inspectionPages: PaginationSummary = { pages: 0, rows: 0, truncated: false };

  const violations = await fetchAllSocrata(config, violationsQuery(config), sourceOptions, violationPages);

  const result = await runElpPipelineIncremental(
    violations,
    paginateSocrata(config, inspectionsQuery(config), sourceOptions, inspectionPages),
    pipelineOptions
  );

  return { ...result, violationPages, inspectionPages };
}
