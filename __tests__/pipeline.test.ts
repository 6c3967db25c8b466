import { describe, expect, it } from 'vitest';

import { DEFAULT_PIPELINE_CONFIG } from '../engine/config';
import { classifyViolationRows, runElpPipeline, runElpPipelineIncremental } from '../engine/pipeline';
import type { RawRow } from '../engine/types';

const NOW = new Date(2026, 9, 19);

function v(id: string, section = '11B2', date = '20250615', oos = 'Y'): RawRow {
  return {
    INSPECTION_ID: id,
    PART_NO: '391',
    PART_NO_SECTION: section,
    CHANGE_DATE: date,
    OUT_OF_SERVICE_INDICATOR: oos
  };
}

function i(id: string, state: string, date = '20250801'): RawRow {
  return { INSPECTION_ID: id, REPORT_STATE: state, INSP_DATE: date };
}

async function* batches(list: RawRow[][], pulled: { count: number }): AsyncGenerator<RawRow[]> {
  for (const batch of list) {
    pulled.count += 1;
    yield batch;
  }
}

describe('classifyViolationRows', () => {
  it('reads the combined API code and ISO timestamps', () => {
    const result = classifyViolationRows([
      {
        unique_id: '11',
        violation_code: '391.11B2',
        inspection_date: '2025-07-04T00:00:00.000',
        oos_indicator: 'true'
      }
    ]);

    expect(result.records).toEqual([
      { inspection_id: '11', year: 2025, month: '07', month_key: '2025-07', is_target: true, is_oos: true }
    ]);
    expect(result.schemas).toEqual({ sms_violation_api: 1 });
  });

  it('matches description keywords only when enabled', () => {
    const row: RawRow = {
      INSPECTION_ID: '12',
      PART_NO: '391',
      PART_NO_SECTION: '11',
      SECTION_DESC: 'Driver lacks English proficiency',
      CHANGE_DATE: '20250615'
    };

    expect(classifyViolationRows([row]).exclusions).toEqual({ E401: 1 });
    expect(
      classifyViolationRows([row], { ...DEFAULT_PIPELINE_CONFIG, matchDescriptionKeywords: true }).records
    ).toHaveLength(1);
  });
});

describe('runElpPipeline', () => {
  it('builds the full dashboard snapshot', () => {
    const { snapshot } = runElpPipeline([v('1')], [i('1', 'CA')], { now: NOW });

    expect(snapshot).toEqual({
      last_updated: 'October 19, 2026',
      total_oos: 1,
      total_all: 1,
      oos_rate: 100,
      avg_per_month: 1,
      peak_month: "Jun '25",
      peak_count: 1,
      mom_change: 0,
      monthly: { labels: ['Jun 25'], oos: [1], all: [1] },
      states: [{ state: 'CA', oos: 1, all: 1 }],
      state_monthly: { CA: { 'Jun 25': { oos: 1, all: 1 } } },
      biggest_movers: { increases: [], decreases: [] },
      state_count: 1,
      data_source: 'real'
    });
  });

  it('counts every exclusion into diagnostics', () => {
    const violations: RawRow[] = [
      v('1'),
      v('2', '11B3'),
      v('3', '11B2', '20240115'),
      { INSPECTION_ID: '4', PART_NO: '', PART_NO_SECTION: '', CHANGE_DATE: '20250615' },
      v('5'),
      { foo: 'bar' },
      v('6', '11B2', 'not a date')
    ];
    const inspections: RawRow[] = [
      i('1', 'CA'),
      i('2', 'TX'),
      { INSPECTION_ID: '9', REPORT_STATE: '', INSP_DATE: '20250601' }
    ];

    const { diagnostics } = runElpPipeline(violations, inspections, { now: NOW });

    expect(diagnostics).toEqual({
      violations_scanned: 7,
      violations_kept: 2,
      inspections_scanned: 3,
      inspections_indexed: 1,
      identifiers_wanted: 2,
      identifiers_resolved: 1,
      matched_records: 1,
      region_conflicts: 0,
      inspection_batches: 1,
      terminated_early: false,
      violation_exclusions: { E401: 1, E402: 1, E204: 1, E302: 1, E301: 1, E404: 1 },
      inspection_exclusions: { E202: 1 },
      violation_schemas: { mcmis_violation_export: 6 },
      inspection_schemas: { mcmis_inspection_export: 2 }
    });
  });

  it('returns an all-zero snapshot for empty input', () => {
    const { snapshot, diagnostics } = runElpPipeline([], [], { now: NOW });

    expect(snapshot.total_all).toBe(0);
    expect(snapshot.oos_rate).toBe(0);
    expect(snapshot.avg_per_month).toBe(0);
    expect(snapshot.peak_month).toBe('N/A');
    expect(snapshot.peak_count).toBe(0);
    expect(snapshot.monthly).toEqual({ labels: [], oos: [], all: [] });
    expect(snapshot.states).toEqual([]);
    expect(snapshot.state_monthly).toEqual({});
    expect(snapshot.state_count).toBe(0);
    expect(diagnostics.matched_records).toBe(0);
  });

  it('can leave out the region×month breakdown', () => {
    const { snapshot } = runElpPipeline([v('1')], [i('1', 'CA')], { now: NOW, includeStateMonthly: false });
    expect('state_monthly' in snapshot).toBe(false);
  });

  describe('order and chunking', () => {
    const violations: RawRow[] = [
      v('1', '11B2', '20250615', 'Y'),
      v('2', '11(B)(2)', '20250620', 'N'),
      v('3', '11B2-S', '20250705', 'Y'),
      v('4', '11b2', '07/09/2025', 'Y'),
      v('5', '11B2', '15-AUG-25', 'N'),
      v('6', '11B2', '2025-08-30', 'Y'),
      v('7', '11B2', '20250901', 'Y')
    ];
    const inspections: RawRow[] = [
      i('1', 'CA'),
      i('2', 'TX'),
      i('3', 'CA'),
      i('4', 'AZ'),
      i('5', 'TX'),
      i('6', 'NV'),
      i('7', 'CA')
    ];

    const baseline = runElpPipeline(violations, inspections, { now: NOW }).snapshot;

    it('does not depend on record order', () => {
      const reversed = runElpPipeline([...violations].reverse(), [...inspections].reverse(), { now: NOW });
      const rotated = runElpPipeline(
        [...violations.slice(3), ...violations.slice(0, 3)],
        [...inspections.slice(5), ...inspections.slice(0, 5)],
        { now: NOW }
      );

      expect(reversed.snapshot).toEqual(baseline);
      expect(rotated.snapshot).toEqual(baseline);
    });

    it('does not depend on chunk size', () => {
      for (const chunkSize of [1, 2, 3]) {
        const { snapshot } = runElpPipeline(violations, inspections, { now: NOW, config: { chunkSize } });
        expect(snapshot).toEqual(baseline);
      }
    });

    it('aggregates the mixed encodings into months', () => {
      expect(baseline.monthly).toEqual({
        labels: ['Jun 25', 'Jul 25', 'Aug 25', 'Sep 25'],
        oos: [1, 2, 1, 1],
        all: [2, 2, 2, 1]
      });
      expect(baseline.states).toEqual([
        { state: 'CA', oos: 3, all: 3 },
        { state: 'AZ', oos: 1, all: 1 },
        { state: 'NV', oos: 1, all: 1 },
        { state: 'TX', oos: 0, all: 2 }
      ]);
      expect(baseline.state_count).toBe(3);
    });
  });

  describe('duplicate identifiers', () => {
    const violations = [v('1', '11B2', '20250615', 'Y'), v('1', '11B2', '20250710', 'N')];

    it('keeps the last row by default', () => {
      const { snapshot, diagnostics } = runElpPipeline(violations, [i('1', 'CA')], { now: NOW });
      expect(snapshot.monthly).toEqual({ labels: ['Jul 25'], oos: [0], all: [1] });
      expect(diagnostics.violation_exclusions).toEqual({ E403: 1 });
    });

    it('keeps the first row under first-seen', () => {
      const { snapshot, diagnostics } = runElpPipeline(violations, [i('1', 'CA')], {
        now: NOW,
        config: { duplicatePolicy: 'first-seen' }
      });
      expect(snapshot.monthly).toEqual({ labels: ['Jun 25'], oos: [1], all: [1] });
      expect(diagnostics.violation_exclusions).toEqual({ E403: 1 });
    });
  });

  it('buckets by inspection date when configured', () => {
    const { snapshot, diagnostics } = runElpPipeline(
      [v('1', '11B2', '20250615'), v('2', '11B2', '20250615')],
      [i('1', 'CA', '20250820'), i('2', 'TX', '20241231')],
      { now: NOW, config: { monthSource: 'inspection' } }
    );

    expect(snapshot.monthly).toEqual({ labels: ['Aug 25'], oos: [1], all: [1] });
    expect(snapshot.states).toEqual([{ state: 'CA', oos: 1, all: 1 }]);
    expect(diagnostics.violation_exclusions).toEqual({ E402: 1 });
  });
});

describe('runElpPipelineIncremental', () => {
  it('stops pulling batches once every identifier has a region', async () => {
    const pulled = { count: 0 };
    const { diagnostics, snapshot } = await runElpPipelineIncremental(
      [v('1'), v('2')],
      batches([[i('1', 'CA')], [i('2', 'TX')], [i('3', 'NV')]], pulled),
      { now: NOW }
    );

    expect(pulled.count).toBe(2);
    expect(diagnostics.inspection_batches).toBe(2);
    expect(diagnostics.terminated_early).toBe(true);
    expect(snapshot.total_all).toBe(2);
  });

  it('reads the source to the end when identifiers stay unresolved', async () => {
    const pulled = { count: 0 };
    const { diagnostics } = await runElpPipelineIncremental(
      [v('1'), v('7')],
      batches([[i('1', 'CA')], [i('2', 'TX')]], pulled),
      { now: NOW }
    );

    expect(pulled.count).toBe(2);
    expect(diagnostics.terminated_early).toBe(false);
    expect(diagnostics.identifiers_resolved).toBe(1);
    expect(diagnostics.matched_records).toBe(1);
    expect(diagnostics.violation_exclusions).toEqual({ E404: 1 });
  });

  it('lets the most recent batch decide a conflicting region', async () => {
    const pulled = { count: 0 };
    const { diagnostics, snapshot } = await runElpPipelineIncremental(
      [v('1'), v('2')],
      batches([[i('1', 'CA')], [i('1', 'TX'), i('2', 'OR')]], pulled),
      { now: NOW }
    );

    expect(diagnostics.region_conflicts).toBe(1);
    expect(snapshot.states).toEqual([
      { state: 'OR', oos: 1, all: 1 },
      { state: 'TX', oos: 1, all: 1 }
    ]);
  });

  it('pulls nothing when no violation needs a region', async () => {
    const pulled = { count: 0 };
    const { diagnostics } = await runElpPipelineIncremental([v('1', '11B3')], batches([[i('1', 'CA')]], pulled), {
      now: NOW
    });

    expect(pulled.count).toBe(0);
    expect(diagnostics.inspection_batches).toBe(0);
    expect(diagnostics.terminated_early).toBe(true);
  });
});
