// engine/buildSnapshot.ts
// Labels + assembly of the dashboard JSON contract.

import { MONTH_ABBREVIATIONS, MONTH_NAMES, NO_PEAK_LABEL } from './constants';
import type {
  CountBucket,
  DataSource,
  ElpSnapshot,
  ElpStatistics,
  FrozenBuckets,
  MonthlySeries
} from './types';

function splitMonthKey(key: string): { year: number; monthIndex: number } | null {
  const m = /^(\d{4})-(\d{2})$/.exec(key);
  if (!m) return null;
  const monthIndex = Number(m[2]) - 1;
  if (monthIndex < 0 || monthIndex > 11) return null;
  return { year: Number(m[1]), monthIndex };
}

function twoDigitYear(year: number): string {
  return String(year % 100).padStart(2, '0');
}

/** "2025-06" → "Jun 25" */
export function formatMonthLabel(key: string): string {
  const parts = splitMonthKey(key);
  if (!parts) return key;
  return `${MONTH_ABBREVIATIONS[parts.monthIndex]} ${twoDigitYear(parts.year)}`;
}

/** "2025-06" → "Jun '25"; no peak → "N/A" */
export function formatPeakLabel(key: string | null): string {
  if (key === null) return NO_PEAK_LABEL;
  const parts = splitMonthKey(key);
  if (!parts) return NO_PEAK_LABEL;
  return `${MONTH_ABBREVIATIONS[parts.monthIndex]} '${twoDigitYear(parts.year)}`;
}

/** "October 19, 2026" (local calendar date of `now`) */
export function formatLastUpdated(now: Date): string {
  const day = String(now.getDate()).padStart(2, '0');
  return `${MONTH_NAMES[now.getMonth()]} ${day}, ${now.getFullYear()}`;
}

export function buildMonthlySeries(frozen: FrozenBuckets): MonthlySeries {
  const series: MonthlySeries = { labels: [], oos: [], all: [] };
  for (const [key, bucket] of frozen.monthly) {
    series.labels.push(formatMonthLabel(key));
    series.oos.push(bucket.oos);
    series.all.push(bucket.all);
  }
  return series;
}

// Region → month label → bucket; only months the region has data for,
// chronological because the frozen tables are key-sorted.
export function buildStateMonthly(frozen: FrozenBuckets): Record<string, Record<string, CountBucket>> {
  const out: Record<string, Record<string, CountBucket>> = {};
  for (const [region, cells] of frozen.region_monthly) {
    const months: Record<string, CountBucket> = {};
    for (const [key, bucket] of cells) {
      months[formatMonthLabel(key)] = { oos: bucket.oos, all: bucket.all };
    }
    out[region] = months;
  }
  return out;
}

export interface BuildSnapshotOptions {
  now?: Date;
  dataSource?: DataSource;
  includeStateMonthly?: boolean;
}

export function buildSnapshot(
  frozen: FrozenBuckets,
  stats: ElpStatistics,
  options: BuildSnapshotOptions = {}
): ElpSnapshot {
  const now = options.now ?? new Date();
  const withStateMonthly = options.includeStateMonthly ?? true;

  return {
    last_updated: formatLastUpdated(now),
    total_oos: stats.total_oos,
    total_all: stats.total_all,
    oos_rate: stats.oos_rate,
    avg_per_month: stats.avg_per_month,
    peak_month: formatPeakLabel(stats.peak.key),
    peak_count: stats.peak.count,
    mom_change: stats.mom_change,
    monthly: buildMonthlySeries(frozen),
    states: stats.top_regions.map((r) => ({ state: r.state, oos: r.oos, all: r.all })),
    ...(withStateMonthly ? { state_monthly: buildStateMonthly(frozen) } : {}),
    biggest_movers: {
      increases: stats.biggest_movers.increases.map((m) => ({ ...m })),
      decreases: stats.biggest_movers.decreases.map((m) => ({ ...m }))
    },
    state_count: stats.state_count,
    data_source: options.dataSource ?? 'real'
  };
}
