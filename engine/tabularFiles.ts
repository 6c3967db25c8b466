// engine/tabularFiles.ts
//
// Local exports (CSV / XLSX) → RawRow[]. Header row 1, values trimmed,
// empty rows skipped. Column names are left as-is; schema adapters fold them.

import { readFile } from 'node:fs/promises';
import { extname } from 'node:path';

import { parse } from 'csv-parse/sync';
import ExcelJS from 'exceljs';

import type { RawRow } from './types';

function isRawRow(value: unknown): value is RawRow {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseCsvRows(csvText: string): RawRow[] {
  if (!csvText || csvText.trim().length === 0) {
    return [];
  }

  const records: unknown = parse(csvText, {
    columns: true,
    bom: true,
    skip_empty_lines: true,
    trim: true,
    relax_column_count: true
  });

  return Array.isArray(records) ? records.filter(isRawRow) : [];
}

// ------------------------------------------------------------
// XLSX
// ------------------------------------------------------------

function toIsoDate(d: Date): string {
  const year = d.getUTCFullYear();
  const month = String(d.getUTCMonth() + 1).padStart(2, '0');
  const day = String(d.getUTCDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

function readCellAsString(cell: ExcelJS.Cell): string {
  const v = cell.value;
  if (v === null || v === undefined) return '';
  if (typeof v === 'string') return v.trim();
  if (typeof v === 'number' || typeof v === 'boolean') return String(v);
  // exceljs stores dates as UTC midnight
  if (v instanceof Date) return toIsoDate(v);
  // rich text, hyperlinks, formulas: use the displayed text
  return cell.text.trim();
}

export async function parseXlsxRows(buffer: Buffer, sheetName?: string): Promise<RawRow[]> {
  const workbook = new ExcelJS.Workbook();
  await workbook.xlsx.load(buffer);

  const sheet = sheetName ? workbook.getWorksheet(sheetName) : workbook.worksheets[0];
  if (!sheet) {
    throw new Error(sheetName ? `Worksheet not found: ${sheetName}` : 'Workbook has no worksheets');
  }

  const headers = new Map<number, string>();
  sheet.getRow(1).eachCell((cell, colNumber) => {
    const name = readCellAsString(cell);
    if (name) headers.set(colNumber, name);
  });

  const rows: RawRow[] = [];
  sheet.eachRow((row, rowNumber) => {
    if (rowNumber === 1) return;

    const record: RawRow = {};
    let hasValue = false;
    for (const [colNumber, name] of headers) {
      const value = readCellAsString(row.getCell(colNumber));
      record[name] = value;
      if (value) hasValue = true;
    }

    if (hasValue) rows.push(record);
  });

  return rows;
}

// ------------------------------------------------------------
// Files
// ------------------------------------------------------------

export async function loadTabularFile(path: string): Promise<RawRow[]> {
  const ext = extname(path).toLowerCase();

  if (ext === '.csv') {
    return parseCsvRows(await readFile(path, 'utf8'));
  }
  if (ext === '.xlsx') {
    return parseXlsxRows(await readFile(path));
  }

  throw new Error(`Unsupported file type "${ext || path}": expected .csv or .xlsx`);
}
