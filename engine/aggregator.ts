// engine/aggregator.ts
//
// Owned aggregation context for one run. Three count tables keyed from the
// same record: month, region, region×month. Counts only ever go up.

import type {
  CountBucket,
  EnrichedRecord,
  FrozenBuckets,
  MonthlyTable,
  RegionMonthlyTable,
  RegionTable
} from './types';

function bump(table: Map<string, CountBucket>, key: string, isOos: boolean): void {
  let bucket = table.get(key);
  if (!bucket) {
    bucket = { oos: 0, all: 0 };
    table.set(key, bucket);
  }
  bucket.all += 1;
  if (isOos) bucket.oos += 1;
}

function addInto(table: Map<string, CountBucket>, key: string, src: Readonly<CountBucket>): void {
  const bucket = table.get(key);
  if (bucket) {
    bucket.oos += src.oos;
    bucket.all += src.all;
  } else {
    table.set(key, { oos: src.oos, all: src.all });
  }
}

function compareKeys(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function freezeTable(table: ReadonlyMap<string, CountBucket>): Map<string, Readonly<CountBucket>> {
  const out = new Map<string, Readonly<CountBucket>>();
  for (const key of Array.from(table.keys()).sort(compareKeys)) {
    const bucket = table.get(key);
    if (bucket) out.set(key, Object.freeze({ oos: bucket.oos, all: bucket.all }));
  }
  return out;
}

export class AggregationContext {
  private readonly monthly = new Map<string, CountBucket>();
  private readonly regions = new Map<string, CountBucket>();
  private readonly regionMonthly = new Map<string, Map<string, CountBucket>>();
  private totalOos = 0;
  private totalAll = 0;

  add(record: EnrichedRecord): void {
    const isOos = record.is_oos;

    bump(this.monthly, record.month_key, isOos);
    bump(this.regions, record.region, isOos);

    let cells = this.regionMonthly.get(record.region);
    if (!cells) {
      cells = new Map();
      this.regionMonthly.set(record.region, cells);
    }
    bump(cells, record.month_key, isOos);

    this.totalAll += 1;
    if (isOos) this.totalOos += 1;
  }

  addAll(records: Iterable<EnrichedRecord>): this {
    for (const record of records) this.add(record);
    return this;
  }

  /** Fold another (partial) context into this one. `other` is left untouched. */
  merge(other: AggregationContext): this {
    for (const [key, bucket] of other.monthly) addInto(this.monthly, key, bucket);
    for (const [key, bucket] of other.regions) addInto(this.regions, key, bucket);

    for (const [region, cells] of other.regionMonthly) {
      let mine = this.regionMonthly.get(region);
      if (!mine) {
        mine = new Map();
        this.regionMonthly.set(region, mine);
      }
      for (const [key, bucket] of cells) addInto(mine, key, bucket);
    }

    this.totalOos += other.totalOos;
    this.totalAll += other.totalAll;
    return this;
  }

  get recordCount(): number {
    return this.totalAll;
  }

  freeze(): FrozenBuckets {
    const monthly: MonthlyTable = freezeTable(this.monthly);
    const regions: RegionTable = freezeTable(this.regions);

    const regionMonthly = new Map<string, ReadonlyMap<string, Readonly<CountBucket>>>();
    for (const region of Array.from(this.regionMonthly.keys()).sort(compareKeys)) {
      const cells = this.regionMonthly.get(region);
      if (cells) regionMonthly.set(region, freezeTable(cells));
    }
    const region_monthly: RegionMonthlyTable = regionMonthly;

    return Object.freeze({
      total_oos: this.totalOos,
      total_all: this.totalAll,
      monthly,
      regions,
      region_monthly
    });
  }
}
