// engine/config.ts
// Canonical config for the ELP engine and its remote source.

import { logWarn } from './logger';

export type MonthSource = 'violation' | 'inspection';
export type DuplicatePolicy = 'last-seen' | 'first-seen';

export interface PipelineConfig {
  analysisStartYear: number;       // records before this year are excluded
  monthSource: MonthSource;        // which date decides the month bucket
  duplicatePolicy: DuplicatePolicy; // duplicate violation identifiers
  matchDescriptionKeywords: boolean;
  chunkSize: number;               // records per join/aggregate chunk
}

export interface SocrataConfig {
  domain: string;
  violationsDataset: string;
  inspectionsDataset: string;
  violationsSelect: string;
  violationsWhere: string;
  inspectionsSelect: string;
  appToken: string | null;
  pageSize: number;
  maxPages: number;
  timeoutMs: number;
  retries: number;
}

export interface StorageConfig {
  blobPathname: string;
  allowSampleFallback: boolean;
}

// OOS criteria for English proficiency were restored mid-2025; earlier
// records use a different enforcement regime.
export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = {
  analysisStartYear: 2025,
  monthSource: 'violation',
  duplicatePolicy: 'last-seen',
  matchDescriptionKeywords: false,
  chunkSize: 5000
};

export const DEFAULT_SOCRATA_CONFIG: SocrataConfig = {
  domain: 'data.transportation.gov',
  violationsDataset: '876r-jsdb',
  inspectionsDataset: 'fx4q-ay7w',
  violationsSelect:
    'inspection_id, part_no, part_no_section, change_date, out_of_service_indicator',
  violationsWhere: "part_no = '391'",
  inspectionsSelect: 'inspection_id, report_state, insp_date',
  appToken: null,
  pageSize: 50000,
  maxPages: 5,
  timeoutMs: 60000,
  retries: 2
};

export const DEFAULT_STORAGE_CONFIG: StorageConfig = {
  blobPathname: 'elp-data/elp_data.json',
  allowSampleFallback: false
};

export type Env = Record<string, string | undefined>;

function readString(env: Env, name: string): string | undefined {
  const v = env[name];
  if (v === undefined) return undefined;
  const s = v.trim();
  return s === '' ? undefined : s;
}

function readInt(env: Env, name: string, fallback: number, min: number): number {
  const raw = readString(env, name);
  if (raw === undefined) return fallback;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < min) {
    logWarn('config_value_ignored', { name, value: raw, fallback });
    return fallback;
  }
  return n;
}

export function parseBool(v: unknown): boolean {
  const s = String(v ?? '').trim().toLowerCase();
  return s === '1' || s === 'true' || s === 'yes' || s === 'y';
}

export function isMonthSource(v: string): v is MonthSource {
  return v === 'violation' || v === 'inspection';
}

export function isDuplicatePolicy(v: string): v is DuplicatePolicy {
  return v === 'last-seen' || v === 'first-seen';
}

export function loadPipelineConfig(env: Env = process.env): PipelineConfig {
  const base = DEFAULT_PIPELINE_CONFIG;

  const monthRaw = readString(env, 'ELP_MONTH_SOURCE');
  let monthSource = base.monthSource;
  if (monthRaw !== undefined) {
    if (isMonthSource(monthRaw)) {
      monthSource = monthRaw;
    } else {
      logWarn('config_value_ignored', { name: 'ELP_MONTH_SOURCE', value: monthRaw, fallback: monthSource });
    }
  }

  const dupRaw = readString(env, 'ELP_DUPLICATE_POLICY');
  let duplicatePolicy = base.duplicatePolicy;
  if (dupRaw !== undefined) {
    if (isDuplicatePolicy(dupRaw)) {
      duplicatePolicy = dupRaw;
    } else {
      logWarn('config_value_ignored', { name: 'ELP_DUPLICATE_POLICY', value: dupRaw, fallback: duplicatePolicy });
    }
  }

  const descRaw = readString(env, 'ELP_MATCH_DESCRIPTION');

  return {
    analysisStartYear: readInt(env, 'ELP_ANALYSIS_START_YEAR', base.analysisStartYear, 1900),
    monthSource,
    duplicatePolicy,
    matchDescriptionKeywords: descRaw === undefined ? base.matchDescriptionKeywords : parseBool(descRaw),
    chunkSize: readInt(env, 'ELP_CHUNK_SIZE', base.chunkSize, 1)
  };
}

export function loadSocrataConfig(env: Env = process.env): SocrataConfig {
  const base = DEFAULT_SOCRATA_CONFIG;
  return {
    ...base,
    domain: readString(env, 'SOCRATA_DOMAIN') ?? base.domain,
    violationsDataset: readString(env, 'SOCRATA_VIOLATIONS_DATASET') ?? base.violationsDataset,
    inspectionsDataset: readString(env, 'SOCRATA_INSPECTIONS_DATASET') ?? base.inspectionsDataset,
    appToken: readString(env, 'SOCRATA_APP_TOKEN') ?? base.appToken,
    pageSize: readInt(env, 'SOCRATA_PAGE_SIZE', base.pageSize, 1),
    maxPages: readInt(env, 'SOCRATA_MAX_PAGES', base.maxPages, 1),
    timeoutMs: readInt(env, 'SOCRATA_TIMEOUT_MS', base.timeoutMs, 1),
    retries: readInt(env, 'SOCRATA_RETRIES', base.retries, 0)
  };
}

export function loadStorageConfig(env: Env = process.env): StorageConfig {
  const base = DEFAULT_STORAGE_CONFIG;
  const fallbackRaw = readString(env, 'ELP_ALLOW_SAMPLE_FALLBACK');
  return {
    blobPathname: readString(env, 'ELP_BLOB_PATHNAME') ?? base.blobPathname,
    allowSampleFallback:
      fallbackRaw === undefined ? base.allowSampleFallback : parseBool(fallbackRaw)
  };
}
