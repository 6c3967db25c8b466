// engine/schemaAdapters.ts
//
// Per-schema adapters: translate every known upstream row shape (MCMIS CSV
// exports, the SODA API, compact JSON) into one canonical record type.
// Header keys are compared after normalizeHeaderKey, so "INSPECTION_ID" and
// "inspection_id" resolve to the same column.

import { ErrorCodes } from './errorCodes';
import { normalizeIdentifier, normalizeRegionCode, normalizeRowKeys, pickFirst } from './normalizeFields';
import type {
  InspectionRecord,
  InspectionSchemaName,
  RawRow,
  RecordOutcome,
  ViolationRecord,
  ViolationSchemaName
} from './types';

interface ViolationSchema {
  name: ViolationSchemaName;
  /** Schema applies when any of these headers is present. */
  detect: readonly string[];
  fields: {
    inspection_id: readonly string[];
    part_no: readonly string[];
    section: readonly string[];
    description: readonly string[];
    raw_date: readonly string[];
    oos_indicator: readonly string[];
  };
}

interface InspectionSchema {
  name: InspectionSchemaName;
  detect: readonly string[];
  fields: {
    inspection_id: readonly string[];
    region: readonly string[];
    raw_date: readonly string[];
  };
}

// Order matters: the first schema whose detect header is present wins.
export const VIOLATION_SCHEMAS: readonly ViolationSchema[] = [
  {
    name: 'mcmis_violation_export',
    detect: ['part_no_section'],
    fields: {
      inspection_id: ['inspection_id'],
      part_no: ['part_no'],
      section: ['part_no_section'],
      description: ['section_desc', 'viol_desc'],
      raw_date: ['change_date', 'insp_date'],
      oos_indicator: ['out_of_service_indicator', 'oos_indicator']
    }
  },
  {
    name: 'sms_violation_api',
    detect: ['violation_code'],
    fields: {
      inspection_id: ['inspection_id', 'unique_id'],
      part_no: [],
      section: ['violation_code'],
      description: ['violation_desc'],
      raw_date: ['inspection_date', 'insp_date'],
      oos_indicator: ['oos_indicator', 'out_of_service_indicator']
    }
  },
  {
    name: 'compact_violation',
    detect: ['section', 'code'],
    fields: {
      inspection_id: ['id', 'inspection_id'],
      part_no: ['code', 'part_no'],
      section: ['section'],
      description: ['description'],
      raw_date: ['date'],
      oos_indicator: ['oos']
    }
  }
];

export const INSPECTION_SCHEMAS: readonly InspectionSchema[] = [
  {
    name: 'mcmis_inspection_export',
    detect: ['report_state'],
    fields: {
      inspection_id: ['inspection_id'],
      region: ['report_state'],
      raw_date: ['insp_date']
    }
  },
  {
    name: 'compact_inspection',
    detect: ['region', 'state'],
    fields: {
      inspection_id: ['inspection_id', 'id'],
      region: ['region', 'state'],
      raw_date: ['insp_date', 'inspection_date', 'date']
    }
  }
];

function detectSchema<S extends { detect: readonly string[] }>(
  schemas: readonly S[],
  keys: ReadonlyMap<string, string>
): S | null {
  for (const schema of schemas) {
    if (schema.detect.some((header) => keys.has(header))) {
      return schema;
    }
  }
  return null;
}

/**
 * Adapt one raw violation row.
 * Excluded when no schema recognizes the row or the identifier is missing.
 */
export function adaptViolationRow(row: RawRow): RecordOutcome<ViolationRecord> {
  const keys = normalizeRowKeys(row);
  const schema = detectSchema(VIOLATION_SCHEMAS, keys);
  if (!schema) {
    return { kind: 'excluded', reason: ErrorCodes.UNKNOWN_SCHEMA };
  }

  const { fields } = schema;
  const inspection_id = normalizeIdentifier(pickFirst(keys, fields.inspection_id));
  if (!inspection_id) {
    return { kind: 'excluded', reason: ErrorCodes.MISSING_INSPECTION_ID };
  }

  return {
    kind: 'kept',
    record: {
      inspection_id,
      part_no: pickFirst(keys, fields.part_no),
      section: pickFirst(keys, fields.section),
      description: pickFirst(keys, fields.description),
      raw_date: pickFirst(keys, fields.raw_date),
      oos_indicator: pickFirst(keys, fields.oos_indicator),
      schema: schema.name
    }
  };
}

/**
 * Adapt one raw inspection row.
 * Excluded when no schema recognizes the row, or identifier/region is missing.
 */
export function adaptInspectionRow(row: RawRow): RecordOutcome<InspectionRecord> {
  const keys = normalizeRowKeys(row);
  const schema = detectSchema(INSPECTION_SCHEMAS, keys);
  if (!schema) {
    return { kind: 'excluded', reason: ErrorCodes.UNKNOWN_SCHEMA };
  }

  const { fields } = schema;
  const inspection_id = normalizeIdentifier(pickFirst(keys, fields.inspection_id));
  if (!inspection_id) {
    return { kind: 'excluded', reason: ErrorCodes.MISSING_INSPECTION_ID };
  }

  const region = normalizeRegionCode(pickFirst(keys, fields.region));
  if (!region) {
    return { kind: 'excluded', reason: ErrorCodes.MISSING_REGION };
  }

  return {
    kind: 'kept',
    record: {
      inspection_id,
      region,
      raw_date: pickFirst(keys, fields.raw_date),
      schema: schema.name
    }
  };
}
