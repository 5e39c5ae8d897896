/**
 * Report Workbook Builder
 * Lays the on-duty rows out into the printable three-sheet report
 */

import * as XLSX from 'xlsx';
import { OnDutyReport, PairedSlotRow, TimedRow } from '../types/roster';

export type SheetRow = string[];

export const REPORT_SHEET_NAMES = {
  onDuty: 'ON Duty',
  travelers: 'Travelers',
  other: 'EDU-REACH-ETC'
} as const;

export const CHIEF_HEADER: SheetRow = ['Shift', 'Unit', 'Chief', '', '', 'Shift', 'Unit', 'Chief'];
export const MEDIC_HEADER: SheetRow = [
  'Shift', 'Unit', 'Paramedic', 'EMT', '3rd Employee',
  'Shift', 'Unit', 'Paramedic', 'EMT', '3rd Employee'
];
export const TIMED_HEADER: SheetRow = ['', 'Times', 'Unit', 'Name'];

export const ON_DUTY_COLUMN_WIDTHS = [10, 45, 45, 45, 45, 10, 45, 45, 45, 45];

const LINE_HEIGHT_PT = 15; // approx for Calibri 11pt
const ROW_PADDING_PT = 2;
const MAX_SHEET_NAME_LENGTH = 31;

const ON_DUTY_MARGINS: XLSX.MarginInfo = {
  left: 0.8,
  right: 0.8,
  top: 0.5,
  bottom: 0.5,
  header: 0.3,
  footer: 0.3
};

/**
 * Banner rows heading each sheet. The ON Duty sheet prints two pages side by
 * side, so its banner repeats over the PM half.
 */
export function buildBannerRows(report: Pick<OnDutyReport, 'reportDate' | 'generatedAt'>, doubled: boolean): SheetRow[] {
  const titles = [
    `On-Duty Roster Report\n${report.reportDate}`,
    `Roster Report Generated\n${report.generatedAt}`
  ];
  return titles.map(title => (doubled ? ['', '', title, '', '', '', '', title] : ['', '', title]));
}

/** Chief and assistant rows leave two gap columns between the AM and PM sides */
export function spreadPairedRow(row: PairedSlotRow): SheetRow {
  return [row[0], row[1], row[2], '', '', row[3], row[4], row[5]];
}

/** Timed rows sit behind an empty spacer column */
export function withSpacerColumn(row: TimedRow): SheetRow {
  return ['', ...row];
}

export function buildOnDutySheetRows(report: OnDutyReport): SheetRow[] {
  return [
    ...buildBannerRows(report, true),
    [],
    CHIEF_HEADER,
    ...report.rows.chiefAndAssistantRows.map(spreadPairedRow),
    [],
    MEDIC_HEADER,
    ...report.rows.medicRows.map(row => [...row]),
    []
  ];
}

export function buildTravelerSheetRows(report: OnDutyReport): SheetRow[] {
  return [
    ...buildBannerRows(report, false),
    TIMED_HEADER,
    ...report.rows.travelerAmRows.map(withSpacerColumn),
    [],
    ...report.rows.travelerPmRows.map(withSpacerColumn)
  ];
}

export function buildOtherSheetRows(report: OnDutyReport): SheetRow[] {
  return [
    ...buildBannerRows(report, false),
    TIMED_HEADER,
    [],
    ...report.rows.otherRows.map(withSpacerColumn)
  ];
}

/**
 * Greedy word wrap line count, long words broken at the column width.
 */
export function countWrappedLines(text: string, width: number): number {
  const columnWidth = Math.max(1, Math.floor(width));
  let total = 0;

  for (const paragraph of text.split(/\r?\n/)) {
    const words = paragraph.split(/\s+/).filter(Boolean);
    let lines = 1;
    let current = 0;

    for (const word of words) {
      let length = word.length;
      if (current > 0 && current + 1 + length <= columnWidth) {
        current += 1 + length;
        continue;
      }
      if (current > 0) {
        lines += 1;
      }
      while (length > columnWidth) {
        lines += 1;
        length -= columnWidth;
      }
      current = length;
    }

    total += lines;
  }

  return total;
}

/**
 * Rough row heights for wrapped text under fixed column widths
 */
export function estimateRowHeights(rows: readonly SheetRow[], columnWidths: readonly number[]): XLSX.RowInfo[] {
  return rows.map(row => {
    let maxLines = 1;
    row.slice(0, columnWidths.length).forEach((cell, index) => {
      maxLines = Math.max(maxLines, countWrappedLines(cell, columnWidths[index]));
    });
    return { hpt: maxLines * LINE_HEIGHT_PT + ROW_PADDING_PT };
  });
}

/**
 * Column widths from the longest text in each column, plus padding
 */
export function autoColumnWidths(rows: readonly SheetRow[]): XLSX.ColInfo[] {
  const width = rows.reduce((max, row) => Math.max(max, row.length), 0);
  const columnWidths: XLSX.ColInfo[] = [];
  for (let col = 0; col < width; col++) {
    const longest = rows.reduce((max, row) => Math.max(max, (row[col] ?? '').length), 0);
    columnWidths.push({ wch: longest + 2 });
  }
  return columnWidths;
}

function createOnDutySheet(report: OnDutyReport): XLSX.WorkSheet {
  const rows = buildOnDutySheetRows(report);
  const worksheet = XLSX.utils.aoa_to_sheet(rows);
  worksheet['!cols'] = ON_DUTY_COLUMN_WIDTHS.map(wch => ({ wch }));
  worksheet['!rows'] = estimateRowHeights(rows, ON_DUTY_COLUMN_WIDTHS);
  worksheet['!margins'] = ON_DUTY_MARGINS;
  return worksheet;
}

function createAutoWidthSheet(rows: SheetRow[]): XLSX.WorkSheet {
  const worksheet = XLSX.utils.aoa_to_sheet(rows);
  worksheet['!cols'] = autoColumnWidths(rows);
  return worksheet;
}

export function buildReportWorkbook(report: OnDutyReport): XLSX.WorkBook {
  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, createOnDutySheet(report), REPORT_SHEET_NAMES.onDuty);
  XLSX.utils.book_append_sheet(workbook, createAutoWidthSheet(buildTravelerSheetRows(report)), REPORT_SHEET_NAMES.travelers);
  XLSX.utils.book_append_sheet(workbook, createAutoWidthSheet(buildOtherSheetRows(report)), REPORT_SHEET_NAMES.other);
  return workbook;
}

/**
 * Picks a sheet name not yet used in the workbook: `name`, `name (2)`, `name (3)`...
 * Characters Excel rejects are replaced and the result fits Excel's length limit.
 */
export function uniqueSheetName(existing: readonly string[], requested: string): string {
  const base = (requested.replace(/[[\]:*?\/\\]/g, '-').trim() || 'Sheet1').slice(0, MAX_SHEET_NAME_LENGTH);
  const taken = new Set(existing.map(name => name.toLowerCase()));

  let candidate = base;
  for (let index = 2; taken.has(candidate.toLowerCase()); index++) {
    const suffix = ` (${index})`;
    candidate = `${base.slice(0, MAX_SHEET_NAME_LENGTH - suffix.length)}${suffix}`;
  }
  return candidate;
}

/**
 * Copies the first sheet of `source` (cells, merges, widths, heights, margins) into `target`.
 * Returns the name it was stored under.
 */
export function appendSourceSheet(target: XLSX.WorkBook, source: XLSX.WorkBook, requestedName?: string): string {
  const sourceName = source.SheetNames[0];
  const sourceSheet = sourceName === undefined ? undefined : source.Sheets[sourceName];
  if (sourceName === undefined || !sourceSheet) {
    throw new Error('Source workbook has no worksheets');
  }

  const name = uniqueSheetName(target.SheetNames, requestedName || sourceName);
  XLSX.utils.book_append_sheet(target, structuredClone(sourceSheet), name);
  return name;
}

export function writeReportWorkbook(workbook: XLSX.WorkBook): Buffer {
  const output: Buffer = XLSX.write(workbook, { bookType: 'xlsx', type: 'buffer', compression: true });
  return output;
}
