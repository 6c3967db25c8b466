import { describe, expect, it } from 'vitest';

import { loadSampleSnapshot } from '../engine/sampleSnapshot';
import { isElpSnapshot } from '../engine/validateSnapshot';

describe('loadSampleSnapshot', () => {
  it('stamps the date and marks the data as sample', () => {
    const snapshot = loadSampleSnapshot(new Date(2026, 9, 19));

    expect(snapshot.last_updated).toBe('October 19, 2026 (Representative Sample Data)');
    expect(snapshot.data_source).toBe('sample');
    expect(snapshot.total_oos).toBe(540);
    expect(snapshot.monthly.labels).toHaveLength(9);
  });

  it('keeps the sample internally consistent', () => {
    const snapshot = loadSampleSnapshot(new Date(2026, 9, 19));
    const sum = (xs: number[]) => xs.reduce((a, b) => a + b, 0);

    expect(sum(snapshot.monthly.oos)).toBe(snapshot.total_oos);
    expect(sum(snapshot.monthly.all)).toBe(snapshot.total_all);
    expect(Math.max(...snapshot.monthly.oos)).toBe(snapshot.peak_count);
  });

  it('returns an independent copy each time', () => {
    const first = loadSampleSnapshot();
    first.states.length = 0;
    expect(loadSampleSnapshot().states).toHaveLength(10);
  });
});

describe('isElpSnapshot', () => {
  const valid = loadSampleSnapshot(new Date(2026, 9, 19));

  it('accepts a well-formed snapshot', () => {
    expect(isElpSnapshot(valid)).toBe(true);
  });

  it('rejects wrong shapes', () => {
    expect(isElpSnapshot(null)).toBe(false);
    expect(isElpSnapshot({ ...valid, data_source: 'live' })).toBe(false);
    expect(isElpSnapshot({ ...valid, total_oos: '540' })).toBe(false);
    expect(isElpSnapshot({ ...valid, monthly: { ...valid.monthly, oos: [1] } })).toBe(false);
    expect(isElpSnapshot({ ...valid, states: [{ state: 'CA', oos: 1 }] })).toBe(false);
    expect(isElpSnapshot({ ...valid, state_monthly: { CA: { 'Jun 25': { oos: 1 } } } })).toBe(false);
  });
});
