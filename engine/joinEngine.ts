// engine/joinEngine.ts
//
// Inspection → region index and the violation join.
//
// Inspection rows may arrive in batches (paginated source). The index keeps
// accumulating across batches; when an identifier is seen again with a
// different region, the most recently observed region wins.

import { adaptInspectionRow } from './schemaAdapters';
import { ErrorCodes, countExclusion, type ExclusionCode, type ExclusionCounts } from './errorCodes';
import type { DuplicatePolicy } from './config';
import type {
  EnrichedRecord,
  InspectionSchemaName,
  NormalizedViolation,
  RawRow
} from './types';

export interface IndexedInspection {
  region: string;
  raw_date: string;
}

export interface InspectionIngestStats {
  scanned: number;
  indexed: number;
  conflicts: number;
  exclusions: ExclusionCounts;
  schemas: Partial<Record<InspectionSchemaName, number>>;
}

export class RegionIndex {
  private readonly byId = new Map<string, IndexedInspection>();
  private readonly wanted: ReadonlySet<string> | null;
  private readonly pending: Set<string>;

  readonly stats: InspectionIngestStats = {
    scanned: 0,
    indexed: 0,
    conflicts: 0,
    exclusions: {},
    schemas: {}
  };

  /**
   * @param wantedIds identifiers the violations need. When given, only these
   *   identifiers are indexed and isSatisfied() can report completion.
   */
  constructor(wantedIds?: Iterable<string>) {
    this.wanted = wantedIds ? new Set(wantedIds) : null;
    this.pending = new Set(this.wanted ?? []);
  }

  /** Accept one (possibly partial) batch of raw inspection rows. */
  ingestBatch(rows: readonly RawRow[]): void {
    for (const row of rows) {
      this.stats.scanned += 1;

      const outcome = adaptInspectionRow(row);
      if (outcome.kind === 'excluded') {
        countExclusion(this.stats.exclusions, outcome.reason);
        continue;
      }

      const { inspection_id, region, raw_date, schema } = outcome.record;
      this.stats.schemas[schema] = (this.stats.schemas[schema] ?? 0) + 1;

      if (this.wanted && !this.wanted.has(inspection_id)) continue;

      const existing = this.byId.get(inspection_id);
      if (existing && existing.region !== region) {
        this.stats.conflicts += 1;
      }
      if (!existing) {
        this.stats.indexed += 1;
      }

      this.byId.set(inspection_id, { region, raw_date });
      this.pending.delete(inspection_id);
    }
  }

  resolve(inspectionId: string): IndexedInspection | undefined {
    return this.byId.get(inspectionId);
  }

  get size(): number {
    return this.byId.size;
  }

  /** True once every wanted identifier has a region. Always false without a wanted set. */
  isSatisfied(): boolean {
    return this.wanted !== null && this.pending.size === 0;
  }

  get unresolvedCount(): number {
    return this.pending.size;
  }
}

export interface DeduplicationResult {
  records: NormalizedViolation[];
  duplicates: number;
}

/**
 * One record per inspection identifier.
 * - 'last-seen': a later row replaces an earlier one (position of first sighting is kept)
 * - 'first-seen': later rows are discarded
 */
export function deduplicateViolations(
  records: readonly NormalizedViolation[],
  policy: DuplicatePolicy
): DeduplicationResult {
  const byId = new Map<string, NormalizedViolation>();
  let duplicates = 0;

  for (const record of records) {
    if (byId.has(record.inspection_id)) {
      duplicates += 1;
      if (policy === 'first-seen') continue;
    }
    byId.set(record.inspection_id, record);
  }

  return { records: Array.from(byId.values()), duplicates };
}

export type RebucketResult = NormalizedViolation | { excluded: ExclusionCode };

export interface JoinResult {
  enriched: EnrichedRecord[];
  unmatched: number;
}

/**
 * Attach regions to violations. Violations whose identifier never resolved
 * are dropped and counted.
 *
 * @param rebucket optional hook that replaces the month bucket using the
 *   matched inspection (month source = inspection); returning an exclusion
 *   code drops the record.
 */
export function joinViolations(
  violations: readonly NormalizedViolation[],
  index: RegionIndex,
  exclusions: ExclusionCounts,
  rebucket?: (record: NormalizedViolation, inspection: IndexedInspection) => RebucketResult
): JoinResult {
  const enriched: EnrichedRecord[] = [];
  let unmatched = 0;

  for (const violation of violations) {
    const inspection = index.resolve(violation.inspection_id);
    if (!inspection) {
      unmatched += 1;
      countExclusion(exclusions, ErrorCodes.UNMATCHED_IDENTIFIER);
      continue;
    }

    let record = violation;
    if (rebucket) {
      const next = rebucket(violation, inspection);
      if ('excluded' in next) {
        countExclusion(exclusions, next.excluded);
        continue;
      }
      record = next;
    }

    enriched.push({ ...record, region: inspection.region });
  }

  return { enriched, unmatched };
}
