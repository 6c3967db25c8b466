// engine/validateSnapshot.ts
// Shape check for snapshots read back from storage or the bundled sample.

import type { BiggestMovers, CountBucket, ElpSnapshot, RegionCount, RegionMove } from './types';

type Obj = Record<string, unknown>;

function isObject(v: unknown): v is Obj {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function isFiniteNumber(v: unknown): v is number {
  return typeof v === 'number' && Number.isFinite(v);
}

function isNumberArray(v: unknown): v is number[] {
  return Array.isArray(v) && v.every(isFiniteNumber);
}

function isStringArray(v: unknown): v is string[] {
  return Array.isArray(v) && v.every((s) => typeof s === 'string');
}

function isCountBucket(v: unknown): v is CountBucket {
  return isObject(v) && isFiniteNumber(v.oos) && isFiniteNumber(v.all);
}

function isRegionCount(v: unknown): v is RegionCount {
  return isObject(v) && typeof v.state === 'string' && isCountBucket(v);
}

function isRegionMove(v: unknown): v is RegionMove {
  return (
    isObject(v) &&
    typeof v.state === 'string' &&
    isFiniteNumber(v.current) &&
    isFiniteNumber(v.previous) &&
    isFiniteNumber(v.change)
  );
}

function isBiggestMovers(v: unknown): v is BiggestMovers {
  return (
    isObject(v) &&
    Array.isArray(v.increases) &&
    v.increases.every(isRegionMove) &&
    Array.isArray(v.decreases) &&
    v.decreases.every(isRegionMove)
  );
}

function isStateMonthly(v: unknown): v is Record<string, Record<string, CountBucket>> {
  if (!isObject(v)) return false;
  return Object.values(v).every((months) => isObject(months) && Object.values(months).every(isCountBucket));
}

export function isElpSnapshot(v: unknown): v is ElpSnapshot {
  if (!isObject(v)) return false;

  const monthly = v.monthly;
  if (!isObject(monthly)) return false;
  if (!isStringArray(monthly.labels) || !isNumberArray(monthly.oos) || !isNumberArray(monthly.all)) {
    return false;
  }
  if (monthly.oos.length !== monthly.labels.length || monthly.all.length !== monthly.labels.length) {
    return false;
  }

  return (
    typeof v.last_updated === 'string' &&
    isFiniteNumber(v.total_oos) &&
    isFiniteNumber(v.total_all) &&
    isFiniteNumber(v.oos_rate) &&
    isFiniteNumber(v.avg_per_month) &&
    typeof v.peak_month === 'string' &&
    isFiniteNumber(v.peak_count) &&
    isFiniteNumber(v.mom_change) &&
    Array.isArray(v.states) &&
    v.states.every(isRegionCount) &&
    (v.state_monthly === undefined || isStateMonthly(v.state_monthly)) &&
    isBiggestMovers(v.biggest_movers) &&
    isFiniteNumber(v.state_count) &&
    (v.data_source === 'real' || v.data_source === 'sample')
  );
}
