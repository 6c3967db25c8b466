// engine/snapshotWorkbook.ts
// Single source of truth for ELP_Dashboard_Data.xlsx (export endpoint + CLI).

import ExcelJS from 'exceljs';
import type { ElpSnapshot } from './types';

export const SNAPSHOT_WORKBOOK_FILENAME = 'ELP_Dashboard_Data.xlsx';

export const XLSX_CONTENT_TYPE =
  'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet';

function styleHeader(sheet: ExcelJS.Worksheet): void {
  sheet.getRow(1).font = { bold: true };
  sheet.autoFilter = {
    from: { row: 1, column: 1 },
    to: { row: 1, column: sheet.columnCount }
  };
}

function addSummarySheet(workbook: ExcelJS.Workbook, snapshot: ElpSnapshot): void {
  const sheet = workbook.addWorksheet('Summary');
  sheet.columns = [
    { header: 'Metric', key: 'metric', width: 24 },
    { header: 'Value', key: 'value', width: 36 }
  ];

  const rows: Array<[string, string | number]> = [
    ['Last Updated', snapshot.last_updated],
    ['Total OOS', snapshot.total_oos],
    ['Total ELP Violations', snapshot.total_all],
    ['OOS Rate (%)', snapshot.oos_rate],
    ['Avg OOS per Month', snapshot.avg_per_month],
    ['Peak Month', snapshot.peak_month],
    ['Peak Count', snapshot.peak_count],
    ['MoM Change (%)', snapshot.mom_change],
    ['States with OOS', snapshot.state_count],
    ['Data Source', snapshot.data_source]
  ];

  for (const [metric, value] of rows) {
    sheet.addRow({ metric, value });
  }
  sheet.getRow(1).font = { bold: true };
}

function addMonthlySheet(workbook: ExcelJS.Workbook, snapshot: ElpSnapshot): void {
  const sheet = workbook.addWorksheet('Monthly');
  sheet.columns = [
    { header: 'Month', key: 'month', width: 12 },
    { header: 'OOS', key: 'oos', width: 10 },
    { header: 'All', key: 'all', width: 10 }
  ];

  const { labels, oos, all } = snapshot.monthly;
  labels.forEach((month, i) => {
    sheet.addRow({ month, oos: oos[i] ?? 0, all: all[i] ?? 0 });
  });
  styleHeader(sheet);
}

function addStatesSheet(workbook: ExcelJS.Workbook, snapshot: ElpSnapshot): void {
  const sheet = workbook.addWorksheet('States');
  sheet.columns = [
    { header: 'Rank', key: 'rank', width: 8 },
    { header: 'State', key: 'state', width: 10 },
    { header: 'OOS', key: 'oos', width: 10 },
    { header: 'All', key: 'all', width: 10 }
  ];

  snapshot.states.forEach((s, i) => {
    sheet.addRow({ rank: i + 1, state: s.state, oos: s.oos, all: s.all });
  });
  styleHeader(sheet);
}

function addMoversSheet(workbook: ExcelJS.Workbook, snapshot: ElpSnapshot): void {
  const sheet = workbook.addWorksheet('Movers');
  sheet.columns = [
    { header: 'Direction', key: 'direction', width: 12 },
    { header: 'State', key: 'state', width: 10 },
    { header: 'Previous', key: 'previous', width: 10 },
    { header: 'Current', key: 'current', width: 10 },
    { header: 'Change (%)', key: 'change', width: 12 }
  ];

  for (const m of snapshot.biggest_movers.increases) {
    sheet.addRow({ direction: 'Increase', ...m });
  }
  for (const m of snapshot.biggest_movers.decreases) {
    sheet.addRow({ direction: 'Decrease', ...m });
  }
  styleHeader(sheet);
}

export async function buildSnapshotWorkbook(snapshot: ElpSnapshot): Promise<Buffer> {
  const workbook = new ExcelJS.Workbook();
  workbook.creator = 'elp-engine';

  addSummarySheet(workbook, snapshot);
  addMonthlySheet(workbook, snapshot);
  addStatesSheet(workbook, snapshot);
  addMoversSheet(workbook, snapshot);

  const buffer = await workbook.xlsx.writeBuffer();
  return Buffer.from(buffer);
}
