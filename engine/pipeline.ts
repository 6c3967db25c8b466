// engine/pipeline.ts
//
// Classify → Join → Aggregate → Statistics for one run.
//
// Joined records are aggregated in chunks of chunkSize; each chunk fills its
// own context and the chunk contexts are merged into the run context one at
// a time.

import { AggregationContext } from './aggregator';
import { buildSnapshot } from './buildSnapshot';
import { DEFAULT_PIPELINE_CONFIG, type PipelineConfig } from './config';
import { ErrorCodes, countExclusion, type ExclusionCounts } from './errorCodes';
import {
  RegionIndex,
  deduplicateViolations,
  joinViolations,
  type IndexedInspection,
  type RebucketResult
} from './joinEngine';
import { logInfo } from './logger';
import { normalizeRecordDate } from './normalizeDate';
import { adaptViolationRow } from './schemaAdapters';
import { computeStatistics } from './statistics';
import { classifyViolation } from './violationClassifier';
import type {
  ElpSnapshot,
  FrozenBuckets,
  NormalizedViolation,
  PipelineDiagnostics,
  RawRow,
  ViolationSchemaName
} from './types';

export interface PipelineOptions {
  config?: Partial<PipelineConfig>;
  /** Clock for last_updated. */
  now?: Date;
  includeStateMonthly?: boolean;
}

export interface PipelineResult {
  snapshot: ElpSnapshot;
  diagnostics: PipelineDiagnostics;
  frozen: FrozenBuckets;
}

// ------------------------------------------------------------
// Classification
// ------------------------------------------------------------

export interface ClassifiedViolations {
  records: NormalizedViolation[];
  scanned: number;
  exclusions: ExclusionCounts;
  schemas: Partial<Record<ViolationSchemaName, number>>;
}

function chunksOf<T>(items: readonly T[], size: number): T[][] {
  const step = Math.max(1, Math.floor(size));
  const out: T[][] = [];
  for (let i = 0; i < items.length; i += step) {
    out.push(items.slice(i, i + step));
  }
  return out;
}

/** Adapt, classify and date every violation row. Pure per row. */
export function classifyViolationRows(
  rows: readonly RawRow[],
  config: PipelineConfig = DEFAULT_PIPELINE_CONFIG
): ClassifiedViolations {
  const result: ClassifiedViolations = { records: [], scanned: 0, exclusions: {}, schemas: {} };

  for (const row of rows) {
    result.scanned += 1;

    const adapted = adaptViolationRow(row);
    if (adapted.kind === 'excluded') {
      countExclusion(result.exclusions, adapted.reason);
      continue;
    }

    const violation = adapted.record;
    result.schemas[violation.schema] = (result.schemas[violation.schema] ?? 0) + 1;

    if (!violation.part_no && !violation.section) {
      countExclusion(result.exclusions, ErrorCodes.MISSING_VIOLATION_CODE);
      continue;
    }

    const { is_target, is_oos } = classifyViolation(violation, {
      matchDescriptionKeywords: config.matchDescriptionKeywords
    });
    if (!is_target) {
      countExclusion(result.exclusions, ErrorCodes.NOT_TARGET_CATEGORY);
      continue;
    }

    const date = normalizeRecordDate(violation.raw_date, config.analysisStartYear);
    if (!date.ok) {
      countExclusion(result.exclusions, date.reason);
      continue;
    }

    result.records.push({
      inspection_id: violation.inspection_id,
      year: date.value.year,
      month: date.value.month,
      month_key: date.value.key,
      is_target,
      is_oos
    });
  }

  return result;
}

// ------------------------------------------------------------
// Shared stages
// ------------------------------------------------------------

function resolveConfig(partial: Partial<PipelineConfig> | undefined): PipelineConfig {
  return { ...DEFAULT_PIPELINE_CONFIG, ...partial };
}

function inspectionRebucket(config: PipelineConfig) {
  return (record: NormalizedViolation, inspection: IndexedInspection): RebucketResult => {
    const date = normalizeRecordDate(inspection.raw_date, config.analysisStartYear);
    if (!date.ok) return { excluded: date.reason };
    return { ...record, year: date.value.year, month: date.value.month, month_key: date.value.key };
  };
}

interface PreparedViolations {
  config: PipelineConfig;
  classified: ClassifiedViolations;
  records: NormalizedViolation[];
  index: RegionIndex;
}

function prepareViolations(violationRows: readonly RawRow[], options: PipelineOptions): PreparedViolations {
  const config = resolveConfig(options.config);
  const classified = classifyViolationRows(violationRows, config);

  const deduped = deduplicateViolations(classified.records, config.duplicatePolicy);
  for (let i = 0; i < deduped.duplicates; i++) {
    countExclusion(classified.exclusions, ErrorCodes.DUPLICATE_IDENTIFIER);
  }

  const index = new RegionIndex(deduped.records.map((r) => r.inspection_id));
  return { config, classified, records: deduped.records, index };
}

function finishRun(
  prepared: PreparedViolations,
  inspectionBatches: number,
  terminatedEarly: boolean,
  options: PipelineOptions
): PipelineResult {
  const { config, classified, records, index } = prepared;
  const exclusions = classified.exclusions;
  const rebucket = config.monthSource === 'inspection' ? inspectionRebucket(config) : undefined;

  const run = new AggregationContext();
  for (const chunk of chunksOf(records, config.chunkSize)) {
    const { enriched } = joinViolations(chunk, index, exclusions, rebucket);
    run.merge(new AggregationContext().addAll(enriched));
  }

  const frozen = run.freeze();
  const stats = computeStatistics(frozen);
  const snapshot = buildSnapshot(frozen, stats, {
    now: options.now,
    includeStateMonthly: options.includeStateMonthly
  });

  const diagnostics: PipelineDiagnostics = {
    violations_scanned: classified.scanned,
    violations_kept: records.length,
    inspections_scanned: index.stats.scanned,
    inspections_indexed: index.stats.indexed,
    identifiers_wanted: records.length,
    identifiers_resolved: records.length - index.unresolvedCount,
    matched_records: frozen.total_all,
    region_conflicts: index.stats.conflicts,
    inspection_batches: inspectionBatches,
    terminated_early: terminatedEarly,
    violation_exclusions: exclusions,
    inspection_exclusions: index.stats.exclusions,
    violation_schemas: classified.schemas,
    inspection_schemas: index.stats.schemas
  };

  logInfo('pipeline_completed', {
    matched_records: diagnostics.matched_records,
    total_oos: frozen.total_oos,
    months: frozen.monthly.size,
    regions: frozen.regions.size,
    terminated_early: terminatedEarly
  });

  return { snapshot, diagnostics, frozen };
}

// ------------------------------------------------------------
// Entry points
// ------------------------------------------------------------

/** Batch form over finite, fully loaded collections. Empty input gives an all-zero snapshot. */
export function runElpPipeline(
  violationRows: readonly RawRow[],
  inspectionRows: readonly RawRow[],
  options: PipelineOptions = {}
): PipelineResult {
  const prepared = prepareViolations(violationRows, options);
  prepared.index.ingestBatch(inspectionRows);
  return finishRun(prepared, 1, false, options);
}

/**
 * Incremental form: inspection rows arrive as batches from an async source.
 * Stops pulling batches as soon as every wanted identifier has a region.
 */
export async function runElpPipelineIncremental(
  violationRows: readonly RawRow[],
  inspectionBatches: AsyncIterable<readonly RawRow[]>,
  options: PipelineOptions = {}
): Promise<PipelineResult> {
  const prepared = prepareViolations(violationRows, options);
  const { index } = prepared;

  let batches = 0;
  let terminatedEarly = index.isSatisfied();

  if (!terminatedEarly) {
    for await (const batch of inspectionBatches) {
      index.ingestBatch(batch);
      batches += 1;
      if (index.isSatisfied()) {
        terminatedEarly = true;
        break;
      }
    }
  }

  return finishRun(prepared, batches, terminatedEarly, options);
}
