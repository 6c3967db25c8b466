import { describe, expect, it } from 'vitest';

import { ErrorCodes } from '../engine/errorCodes';
import { adaptInspectionRow, adaptViolationRow } from '../engine/schemaAdapters';

describe('adaptViolationRow', () => {
  it('reads an MCMIS export row with upper-case headers', () => {
    const outcome = adaptViolationRow({
      INSPECTION_ID: '100',
      PART_NO: '391',
      PART_NO_SECTION: '11B2-S',
      CHANGE_DATE: '20250702 0915',
      OUT_OF_SERVICE_INDICATOR: 'TRUE',
      SECTION_DESC: 'English proficiency'
    });

    expect(outcome).toEqual({
      kind: 'kept',
      record: {
        inspection_id: '100',
        part_no: '391',
        section: '11B2-S',
        description: 'English proficiency',
        raw_date: '20250702 0915',
        oos_indicator: 'TRUE',
        schema: 'mcmis_violation_export'
      }
    });
  });

  it('reads an SMS API row with a combined violation code', () => {
    const outcome = adaptViolationRow({
      unique_id: '7',
      violation_code: '391.11B2',
      violation_desc: 'Non-English speaking driver',
      inspection_date: '2025-07-03T00:00:00.000',
      oos_indicator: 'Y'
    });

    expect(outcome).toEqual({
      kind: 'kept',
      record: {
        inspection_id: '7',
        part_no: '',
        section: '391.11B2',
        description: 'Non-English speaking driver',
        raw_date: '2025-07-03T00:00:00.000',
        oos_indicator: 'Y',
        schema: 'sms_violation_api'
      }
    });
  });

  it('reads compact JSON rows with numeric identifiers', () => {
    const outcome = adaptViolationRow({ id: 1, date: '20250601', code: '391', section: '11(B)(2)', oos: 'Y' });

    expect(outcome).toEqual({
      kind: 'kept',
      record: {
        inspection_id: '1',
        part_no: '391',
        section: '11(B)(2)',
        description: '',
        raw_date: '20250601',
        oos_indicator: 'Y',
        schema: 'compact_violation'
      }
    });
  });

  it('folds spaced and dashed headers', () => {
    const outcome = adaptViolationRow({ 'Inspection Id': '9', 'Part No': '391', 'Part-No-Section': '11B2' });
    expect(outcome.kind).toBe('kept');
    if (outcome.kind === 'kept') {
      expect(outcome.record.inspection_id).toBe('9');
      expect(outcome.record.schema).toBe('mcmis_violation_export');
    }
  });

  it('excludes unknown shapes and missing identifiers', () => {
    expect(adaptViolationRow({ foo: 'bar' })).toEqual({ kind: 'excluded', reason: ErrorCodes.UNKNOWN_SCHEMA });
    expect(adaptViolationRow({ part_no_section: '11B2', inspection_id: '  ' })).toEqual({
      kind: 'excluded',
      reason: ErrorCodes.MISSING_INSPECTION_ID
    });
  });
});

describe('adaptInspectionRow', () => {
  it('reads an MCMIS inspection row and upper-cases the region', () => {
    expect(adaptInspectionRow({ INSPECTION_ID: '100', REPORT_STATE: 'ca', INSP_DATE: '20250702' })).toEqual({
      kind: 'kept',
      record: { inspection_id: '100', region: 'CA', raw_date: '20250702', schema: 'mcmis_inspection_export' }
    });
  });

  it('reads compact rows keyed by state', () => {
    expect(adaptInspectionRow({ id: 4, state: 'TX', inspection_date: '2025-08-01' })).toEqual({
      kind: 'kept',
      record: { inspection_id: '4', region: 'TX', raw_date: '2025-08-01', schema: 'compact_inspection' }
    });
  });

  it('excludes rows without region or identifier', () => {
    expect(adaptInspectionRow({ inspection_id: '3', report_state: '' })).toEqual({
      kind: 'excluded',
      reason: ErrorCodes.MISSING_REGION
    });
    expect(adaptInspectionRow({ inspection_id: '', report_state: 'CA' })).toEqual({
      kind: 'excluded',
      reason: ErrorCodes.MISSING_INSPECTION_ID
    });
    expect(adaptInspectionRow({ insp_date: '20250101' })).toEqual({
      kind: 'excluded',
      reason: ErrorCodes.UNKNOWN_SCHEMA
    });
  });
});
