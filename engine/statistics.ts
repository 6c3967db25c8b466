// engine/statistics.ts
// Derived metrics over frozen count tables.

import { MOVERS_LIMIT, MOVERS_MIN_PREVIOUS_COUNT, TOP_REGIONS_LIMIT } from './constants';
import type {
  BiggestMovers,
  ElpStatistics,
  FrozenBuckets,
  MonthlyTable,
  PeakMonth,
  RegionCount,
  RegionMonthlyTable,
  RegionMove,
  RegionTable
} from './types';

// ------------------------------------------------------------
// Rounding
// ------------------------------------------------------------

// Widest fixed-point expansion Number#toFixed allows; exact for every double
// this module rounds.
const EXACT_FRACTION_DIGITS = 100;

/**
 * Half-to-even rounding on the exact binary value, so 2.5 → 2, 3.5 → 4 and
 * 12.25 → 12.2 (12.25 is exact in binary), while 2.675 → 2.67 (stored just
 * below the half). Non-finite input gives 0.
 */
export function roundTo(value: number, decimals: number): number {
  if (!Number.isFinite(value)) return 0;

  const [whole, fraction = ''] = Math.abs(value).toFixed(EXACT_FRACTION_DIGITS).split('.');
  const kept = Number(whole + fraction.slice(0, decimals));
  const rest = fraction.slice(decimals);

  const firstDropped = rest.charAt(0);
  const exactHalf = firstDropped === '5' && /^0*$/.test(rest.slice(1));
  const roundUp = firstDropped > '5' || (firstDropped === '5' && (!exactHalf || kept % 2 === 1));

  const rounded = (roundUp ? kept + 1 : kept) / 10 ** decimals;
  return value < 0 && rounded !== 0 ? -rounded : rounded;
}

function percentChange(current: number, previous: number): number {
  if (previous <= 0) return 0;
  return roundTo(((current - previous) / previous) * 100, 1);
}

function compareCodes(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

// ------------------------------------------------------------
// Totals
// ------------------------------------------------------------

export function computeOosRate(totalOos: number, totalAll: number): number {
  if (totalAll <= 0) return 0;
  return roundTo((totalOos / totalAll) * 100, 1);
}

export function computeAveragePerMonth(totalOos: number, monthsWithData: number): number {
  if (monthsWithData <= 0) return 0;
  return roundTo(totalOos / monthsWithData, 0);
}

// ------------------------------------------------------------
// Month series
// ------------------------------------------------------------

/** Ascending scan; the first maximum wins. */
export function findPeakMonth(monthly: MonthlyTable): PeakMonth {
  let peak: PeakMonth = { key: null, count: 0 };
  for (const key of Array.from(monthly.keys()).sort(compareCodes)) {
    const oos = monthly.get(key)?.oos ?? 0;
    if (peak.key === null || oos > peak.count) {
      peak = { key, count: oos };
    }
  }
  return peak;
}

// The most recent month is treated as incomplete: compare months[-2] with
// months[-3]. With only two months the latest two are compared directly.
export function computeMomChange(oosSeries: readonly number[]): number {
  const n = oosSeries.length;
  if (n >= 3) return percentChange(oosSeries[n - 2], oosSeries[n - 3]);
  if (n === 2) return percentChange(oosSeries[1], oosSeries[0]);
  return 0;
}

// ------------------------------------------------------------
// Regions
// ------------------------------------------------------------

export function rankTopRegions(regions: RegionTable, limit: number = TOP_REGIONS_LIMIT): RegionCount[] {
  return Array.from(regions, ([state, bucket]) => ({ state, oos: bucket.oos, all: bucket.all }))
    .sort((a, b) => b.oos - a.oos || compareCodes(a.state, b.state))
    .slice(0, limit);
}

export function countActiveRegions(regions: RegionTable): number {
  let n = 0;
  for (const bucket of regions.values()) {
    if (bucket.oos > 0) n += 1;
  }
  return n;
}

/**
 * Per-region percentage change between the two complete reference months.
 * Only regions with at least MOVERS_MIN_PREVIOUS_COUNT OOS violations in the
 * previous month qualify. Qualifying regions are ranked by change (ties by
 * region code); increases are the head of the ranking, decreases its tail
 * read from the most negative end. Needs three months of history.
 */
export function calculateBiggestMovers(
  regionMonthly: RegionMonthlyTable,
  monthKeys: readonly string[]
): BiggestMovers {
  if (monthKeys.length < 3) return { increases: [], decreases: [] };

  const current = monthKeys[monthKeys.length - 2];
  const previous = monthKeys[monthKeys.length - 3];

  const ranked: RegionMove[] = [];
  for (const [state, cells] of regionMonthly) {
    const cur = cells.get(current)?.oos ?? 0;
    const prev = cells.get(previous)?.oos ?? 0;
    if (prev < MOVERS_MIN_PREVIOUS_COUNT) continue;
    ranked.push({ state, current: cur, previous: prev, change: percentChange(cur, prev) });
  }
  ranked.sort((a, b) => b.change - a.change || compareCodes(a.state, b.state));

  return {
    increases: ranked.slice(0, MOVERS_LIMIT).map((m) => ({ ...m })),
    decreases: ranked
      .slice(-MOVERS_LIMIT)
      .reverse()
      .map((m) => ({ ...m }))
  };
}

// ------------------------------------------------------------
// Entry point
// ------------------------------------------------------------

export function computeStatistics(frozen: FrozenBuckets): ElpStatistics {
  const monthKeys = Array.from(frozen.monthly.keys()).sort(compareCodes);
  const oosSeries = monthKeys.map((key) => frozen.monthly.get(key)?.oos ?? 0);

  return {
    total_oos: frozen.total_oos,
    total_all: frozen.total_all,
    oos_rate: computeOosRate(frozen.total_oos, frozen.total_all),
    avg_per_month: computeAveragePerMonth(frozen.total_oos, monthKeys.length),
    peak: findPeakMonth(frozen.monthly),
    mom_change: computeMomChange(oosSeries),
    top_regions: rankTopRegions(frozen.regions),
    biggest_movers: calculateBiggestMovers(frozen.region_monthly, monthKeys),
    state_count: countActiveRegions(frozen.regions)
  };
}
