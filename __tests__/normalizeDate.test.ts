import { describe, expect, it } from 'vitest';

import { ErrorCodes } from '../engine/errorCodes';
import { normalizeRecordDate, parseMonthBucket, toMonthBucketKey } from '../engine/normalizeDate';

describe('parseMonthBucket', () => {
  it.each([
    ['20250615', 2025, '06'],
    ['20250615 1432', 2025, '06'],
    ['2025-06-15', 2025, '06'],
    ['2025-06-15T00:00:00', 2025, '06'],
    ['2025-06-15 08:30:00', 2025, '06'],
    ['15-JUN-25', 2025, '06'],
    ['15-oct-25', 2025, '10'],
    ['31-DEC-99', 1999, '12'],
    ['06/15/2025', 2025, '06'],
    ['6/5/2025', 2025, '06']
  ])('%s → %i-%s', (raw, year, month) => {
    expect(parseMonthBucket(raw)).toEqual({
      ok: true,
      value: { year, month, key: `${year}-${month}` }
    });
  });

  it('reads numeric compact dates', () => {
    expect(parseMonthBucket(20250701)).toEqual({
      ok: true,
      value: { year: 2025, month: '07', key: '2025-07' }
    });
  });

  it('reports blank input as missing', () => {
    expect(parseMonthBucket('   ')).toEqual({ ok: false, reason: ErrorCodes.MISSING_DATE });
    expect(parseMonthBucket(undefined)).toEqual({ ok: false, reason: ErrorCodes.MISSING_DATE });
  });

  it.each(['not-a-date', '20250230', '2025-13-01', '32-JAN-25', '15-XYZ-25', '15/06/2025'])(
    'rejects %s',
    (raw) => {
      expect(parseMonthBucket(raw)).toEqual({ ok: false, reason: ErrorCodes.UNPARSEABLE_DATE });
    }
  );
});

describe('normalizeRecordDate', () => {
  it('excludes records before the analysis start year', () => {
    expect(normalizeRecordDate('20241231', 2025)).toEqual({
      ok: false,
      reason: ErrorCodes.BEFORE_ANALYSIS_START
    });
  });

  it('keeps records in the start year', () => {
    expect(normalizeRecordDate('20250101', 2025)).toEqual({
      ok: true,
      value: { year: 2025, month: '01', key: '2025-01' }
    });
  });

  it('passes parse failures through', () => {
    expect(normalizeRecordDate('garbage', 2025)).toEqual({
      ok: false,
      reason: ErrorCodes.UNPARSEABLE_DATE
    });
  });
});

describe('toMonthBucketKey', () => {
  it('zero-pads the month', () => {
    expect(toMonthBucketKey(2026, 3)).toEqual({ year: 2026, month: '03', key: '2026-03' });
  });
});
