// engine/types.ts
// Shared TypeScript interfaces for the ELP engine
import type { ExclusionCode, ExclusionCounts } from './errorCodes';

/**
 * RawRow – one record as delivered by a CSV/XLSX export or the SODA API.
 * Untyped at the boundary; schema adapters turn it into a canonical record.
 */
export type RawRow = Record<string, unknown>;

export type ViolationSchemaName =
  | 'mcmis_violation_export'
  | 'sms_violation_api'
  | 'compact_violation';

export type InspectionSchemaName = 'mcmis_inspection_export' | 'compact_inspection';

/**
 * ViolationRecord – canonical violation row after schema adaptation.
 * All fields are trimmed strings; absent values are ''.
 */
export interface ViolationRecord {
  inspection_id: string;
  part_no: string;
  section: string;
  description: string;
  raw_date: string;
  oos_indicator: string;
  schema: ViolationSchemaName;
}

/** InspectionRecord – canonical inspection row after schema adaptation. */
export interface InspectionRecord {
  inspection_id: string;
  region: string;
  raw_date: string;
  schema: InspectionSchemaName;
}

export interface MonthBucketKey {
  year: number;
  /** Two-digit month, '01'..'12'. */
  month: string;
  /** Lexicographically sortable 'YYYY-MM'. */
  key: string;
}

export type DateParseResult =
  | { ok: true; value: MonthBucketKey }
  | { ok: false; reason: ExclusionCode };

/**
 * NormalizedViolation – derived purely from one violation row.
 * Only target-category rows survive classification, so is_target is always
 * true on kept records; it is carried so downstream code never re-derives it.
 */
export interface NormalizedViolation {
  inspection_id: string;
  year: number;
  month: string;
  month_key: string;
  is_target: boolean;
  is_oos: boolean;
}

/** EnrichedRecord – a NormalizedViolation with a resolved region. */
export interface EnrichedRecord extends NormalizedViolation {
  region: string;
}

/**
 * Typed per-record outcome. Excluded records carry the reason code and are
 * counted into diagnostics.
 */
export type RecordOutcome<T> =
  | { kind: 'kept'; record: T }
  | { kind: 'excluded'; reason: ExclusionCode };

export interface CountBucket {
  oos: number;
  all: number;
}

export type MonthlyTable = ReadonlyMap<string, Readonly<CountBucket>>;
export type RegionTable = ReadonlyMap<string, Readonly<CountBucket>>;
export type RegionMonthlyTable = ReadonlyMap<string, ReadonlyMap<string, Readonly<CountBucket>>>;

/**
 * FrozenBuckets – immutable, key-sorted copy of the aggregation tables.
 * monthly: ascending month key; regions / region_monthly: ascending region code.
 */
export interface FrozenBuckets {
  total_oos: number;
  total_all: number;
  monthly: MonthlyTable;
  regions: RegionTable;
  region_monthly: RegionMonthlyTable;
}

export interface RegionCount {
  state: string;
  oos: number;
  all: number;
}

export interface RegionMove {
  state: string;
  current: number;
  previous: number;
  /** Percentage change, one decimal. */
  change: number;
}

export interface BiggestMovers {
  increases: RegionMove[];
  decreases: RegionMove[];
}

export interface PeakMonth {
  /** Month key ('YYYY-MM') or null when there is no data. */
  key: string | null;
  count: number;
}

export interface ElpStatistics {
  total_oos: number;
  total_all: number;
  oos_rate: number;
  avg_per_month: number;
  peak: PeakMonth;
  mom_change: number;
  top_regions: RegionCount[];
  biggest_movers: BiggestMovers;
  state_count: number;
}

export type DataSource = 'real' | 'sample';

export interface MonthlySeries {
  labels: string[];
  oos: number[];
  all: number[];
}

/**
 * ElpSnapshot – the persisted artifact consumed by the dashboard.
 * Field names and types are a strict compatibility contract.
 */
export interface ElpSnapshot {
  last_updated: string;
  total_oos: number;
  total_all: number;
  oos_rate: number;
  avg_per_month: number;
  peak_month: string;
  peak_count: number;
  mom_change: number;
  monthly: MonthlySeries;
  states: RegionCount[];
  state_monthly?: Record<string, Record<string, CountBucket>>;
  biggest_movers: BiggestMovers;
  state_count: number;
  data_source: DataSource;
}

export interface PipelineDiagnostics {
  violations_scanned: number;
  violations_kept: number;
  inspections_scanned: number;
  inspections_indexed: number;
  /** Distinct identifiers the violations asked the join for. */
  identifiers_wanted: number;
  identifiers_resolved: number;
  matched_records: number;
  region_conflicts: number;
  inspection_batches: number;
  terminated_early: boolean;
  violation_exclusions: ExclusionCounts;
  inspection_exclusions: ExclusionCounts;
  violation_schemas: Partial<Record<ViolationSchemaName, number>>;
  inspection_schemas: Partial<Record<InspectionSchemaName, number>>;
}
