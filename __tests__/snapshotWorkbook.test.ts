import ExcelJS from 'exceljs';
import { describe, expect, it } from 'vitest';

import { loadSampleSnapshot } from '../engine/sampleSnapshot';
import { buildSnapshotWorkbook } from '../engine/snapshotWorkbook';

async function readBack(buffer: Buffer): Promise<ExcelJS.Workbook> {
  const workbook = new ExcelJS.Workbook();
  await workbook.xlsx.load(buffer);
  return workbook;
}

function rowValues(sheet: ExcelJS.Worksheet, rowNumber: number, columns: number): unknown[] {
  const row = sheet.getRow(rowNumber);
  return Array.from({ length: columns }, (_, i) => row.getCell(i + 1).value);
}

describe('buildSnapshotWorkbook', () => {
  const snapshot = loadSampleSnapshot(new Date(2026, 9, 19));

  it('writes one sheet per dashboard section', async () => {
    const workbook = await readBack(await buildSnapshotWorkbook(snapshot));
    expect(workbook.worksheets.map((s) => s.name)).toEqual(['Summary', 'Monthly', 'States', 'Movers']);
  });

  it('fills the summary and monthly series', async () => {
    const workbook = await readBack(await buildSnapshotWorkbook(snapshot));

    const summary = workbook.getWorksheet('Summary');
    const monthly = workbook.getWorksheet('Monthly');
    if (!summary || !monthly) throw new Error('missing worksheet');

    expect(rowValues(summary, 1, 2)).toEqual(['Metric', 'Value']);
    expect(rowValues(summary, 2, 2)).toEqual(['Last Updated', 'October 19, 2026 (Representative Sample Data)']);
    expect(rowValues(summary, 3, 2)).toEqual(['Total OOS', 540]);

    expect(monthly.rowCount).toBe(10);
    expect(rowValues(monthly, 2, 3)).toEqual(['Jun 25', 50, 121]);
    expect(rowValues(monthly, 10, 3)).toEqual(['Feb 26', 24, 56]);
  });

  it('ranks states and lists movers by direction', async () => {
    const workbook = await readBack(await buildSnapshotWorkbook(snapshot));

    const states = workbook.getWorksheet('States');
    const movers = workbook.getWorksheet('Movers');
    if (!states || !movers) throw new Error('missing worksheet');

    expect(states.rowCount).toBe(11);
    expect(rowValues(states, 2, 4)).toEqual([1, 'CA', 96, 224]);
    expect(rowValues(states, 11, 4)).toEqual([10, 'NC', 25, 60]);

    expect(movers.rowCount).toBe(7);
    expect(rowValues(movers, 2, 5)).toEqual(['Increase', 'AZ', 6, 9, 50]);
    expect(rowValues(movers, 5, 5)).toEqual(['Decrease', 'MI', 6, 4, -33.3]);
  });
});
