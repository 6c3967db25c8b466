// scripts/buildElpData.ts
//
// Batch build of elp_data.json from local exports or the Socrata API.
// Exit codes: 0 written, 1 nothing matched (unless --allow-sample) or bad
// arguments / unreadable input.

import { writeFile } from 'node:fs/promises';

import { Command, InvalidArgumentError } from 'commander';

import {
  isDuplicatePolicy,
  isMonthSource,
  loadPipelineConfig,
  loadSocrataConfig,
  type DuplicatePolicy,
  type Env,
  type MonthSource,
  type PipelineConfig
} from '../engine/config';
import { describeExclusions } from '../engine/errorCodes';
import { errorMessage, logError, logInfo, logWarn } from '../engine/logger';
import { runElpPipeline, type PipelineResult } from '../engine/pipeline';
import { loadSampleSnapshot } from '../engine/sampleSnapshot';
import { buildSnapshotWorkbook } from '../engine/snapshotWorkbook';
import { runRemotePipeline, type FetchLike } from '../engine/socrataSource';
import { loadTabularFile } from '../engine/tabularFiles';
import type { RawRow } from '../engine/types';

export const DEFAULT_OUTPUT_FILE = 'elp_data.json';

// Full-year extracts hold well above this many ELP violations; fewer usually
// means a truncated download.
export const DEFAULT_MIN_RECORDS = 40000;

export interface BuildCliOptions {
  violations?: string;
  inspections?: string;
  remote?: boolean;
  output: string;
  xlsx?: string;
  startYear?: number;
  monthSource?: MonthSource;
  duplicates?: DuplicatePolicy;
  minRecords: number;
  allowSample?: boolean;
}

export interface BuildDeps {
  env?: Env;
  now?: Date;
  fetchImpl?: FetchLike;
  retryDelayMs?: number;
}

// ------------------------------------------------------------
// Argument parsers
// ------------------------------------------------------------

function parseYear(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1900 || n > 9999) {
    throw new InvalidArgumentError('Expected a four-digit year.');
  }
  return n;
}

function parseCount(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return n;
}

function parseMonthSource(value: string): MonthSource {
  if (!isMonthSource(value)) {
    throw new InvalidArgumentError('Expected "violation" or "inspection".');
  }
  return value;
}

function parseDuplicatePolicy(value: string): DuplicatePolicy {
  if (!isDuplicatePolicy(value)) {
    throw new InvalidArgumentError('Expected "last-seen" or "first-seen".');
  }
  return value;
}

// ------------------------------------------------------------
// Run
// ------------------------------------------------------------

function pipelineConfigFor(options: BuildCliOptions, env: Env): PipelineConfig {
  const config = loadPipelineConfig(env);
  if (options.startYear !== undefined) config.analysisStartYear = options.startYear;
  if (options.monthSource !== undefined) config.monthSource = options.monthSource;
  if (options.duplicates !== undefined) config.duplicatePolicy = options.duplicates;
  return config;
}

async function runLocal(
  violationsPath: string,
  inspectionsPath: string,
  config: PipelineConfig,
  now: Date
): Promise<PipelineResult | null> {
  let inputs: [RawRow[], RawRow[]];
  try {
    inputs = await Promise.all([loadTabularFile(violationsPath), loadTabularFile(inspectionsPath)]);
  } catch (err) {
    logError('input_load_failed', { error: errorMessage(err) });
    return null;
  }

  const [violations, inspections] = inputs;
  logInfo('input_loaded', { violations: violations.length, inspections: inspections.length });
  return runElpPipeline(violations, inspections, { config, now });
}

/** Returns the process exit code. */
export async function runBuild(options: BuildCliOptions, deps: BuildDeps = {}): Promise<number> {
  const env = deps.env ?? process.env;
  const now = deps.now ?? new Date();

  const hasLocal = Boolean(options.violations || options.inspections);
  if (options.remote && hasLocal) {
    logError('invalid_arguments', { reason: '--remote cannot be combined with --violations/--inspections' });
    return 1;
  }
  if (!options.remote && (!options.violations || !options.inspections)) {
    logError('invalid_arguments', { reason: 'both --violations and --inspections are required (or --remote)' });
    return 1;
  }

  const config = pipelineConfigFor(options, env);

  let result: PipelineResult | null;
  if (options.remote) {
    result = await runRemotePipeline(
      loadSocrataConfig(env),
      { config, now },
      { fetchImpl: deps.fetchImpl, retryDelayMs: deps.retryDelayMs }
    );
  } else {
    result = await runLocal(options.violations ?? '', options.inspections ?? '', config, now);
  }
  if (!result) return 1;

  const { diagnostics } = result;
  let snapshot = result.snapshot;

  logInfo('exclusion_summary', {
    violations: describeExclusions(diagnostics.violation_exclusions),
    inspections: describeExclusions(diagnostics.inspection_exclusions)
  });

  if (diagnostics.matched_records === 0) {
    if (!options.allowSample) {
      logError('no_matched_records', {
        violations_scanned: diagnostics.violations_scanned,
        violations_kept: diagnostics.violations_kept,
        inspections_scanned: diagnostics.inspections_scanned
      });
      return 1;
    }
    logWarn('sample_fallback', { output: options.output });
    snapshot = loadSampleSnapshot(now);
  } else if (diagnostics.matched_records < options.minRecords) {
    logWarn('low_record_count', {
      matched_records: diagnostics.matched_records,
      min_records: options.minRecords
    });
  }

  try {
    await writeFile(options.output, `${JSON.stringify(snapshot, null, 2)}\n`, 'utf8');
    if (options.xlsx) {
      await writeFile(options.xlsx, await buildSnapshotWorkbook(snapshot));
    }
  } catch (err) {
    logError('output_write_failed', { output: options.output, error: errorMessage(err) });
    return 1;
  }

  logInfo('snapshot_written', {
    output: options.output,
    xlsx: options.xlsx ?? null,
    data_source: snapshot.data_source,
    total_oos: snapshot.total_oos,
    total_all: snapshot.total_all,
    months: snapshot.monthly.labels.length,
    state_count: snapshot.state_count
  });
  return 0;
}

export function createProgram(deps: BuildDeps = {}): Command {
  const program = new Command();

  program
    .name('build-elp-data')
    .description('Build the ELP dashboard snapshot (elp_data.json)')
    .option('--violations <file>', 'local violations export (.csv or .xlsx)')
    .option('--inspections <file>', 'local inspections export (.csv or .xlsx)')
    .option('--remote', 'fetch both datasets from the Socrata API instead')
    .option('-o, --output <file>', 'output path', DEFAULT_OUTPUT_FILE)
    .option('--xlsx <file>', 'also write the snapshot as an XLSX workbook')
    .option('--start-year <year>', 'analysis start year', parseYear)
    .option('--month-source <src>', 'violation | inspection', parseMonthSource)
    .option('--duplicates <policy>', 'last-seen | first-seen', parseDuplicatePolicy)
    .option('--min-records <n>', 'warn when fewer records matched', parseCount, DEFAULT_MIN_RECORDS)
    .option('--allow-sample', 'write the sample snapshot when nothing matched')
    .action(async (options: BuildCliOptions) => {
      process.exitCode = await runBuild(options, deps);
    });

  return program;
}
