import * as XLSX from 'xlsx';
import { RawRosterRow, RosterCellValue } from '../types/roster';
import { RosterFileError } from '../middleware/errorHandler';
import { cellToText, isEmptyCell } from './rosterNormalizer';

/** Local file header signature every .xlsx (zip) container starts with */
const ZIP_SIGNATURE = [0x50, 0x4b, 0x03, 0x04];

export interface RosterSheet {
  /** Name of the first worksheet, the one the rows came from */
  sheetName: string;
  /** Field names in column order */
  fieldNames: string[];
  rows: RawRosterRow[];
  workbook: XLSX.WorkBook;
}

export function isZipContainer(data: Uint8Array): boolean {
  return data.length >= ZIP_SIGNATURE.length && ZIP_SIGNATURE.every((byte, index) => data[index] === byte);
}

/**
 * Names columns the way the roster import always has: the first sheet row holds
 * the headers, a blank header at column n becomes `Unnamed: n`, and repeated
 * names get `.1`, `.2`, ... suffixes.
 */
export function deriveFieldNames(headerRow: readonly RosterCellValue[], width: number): string[] {
  const names: string[] = [];
  const seen = new Map<string, number>();

  for (let index = 0; index < width; index++) {
    const cell = headerRow[index];
    const base = cell === undefined || cell === null || isEmptyCell(cell) ? `Unnamed: ${index}` : cellToText(cell);
    const occurrences = seen.get(base) ?? 0;
    seen.set(base, occurrences + 1);
    names.push(occurrences === 0 ? base : `${base}.${occurrences}`);
  }

  return names;
}

export function sheetToRosterRows(sheet: XLSX.WorkSheet): { fieldNames: string[]; rows: RawRosterRow[] } {
  const ref = sheet['!ref'];
  if (!ref) {
    return { fieldNames: [], rows: [] };
  }

  // Columns are numbered from A even when the used range starts further right
  const used = XLSX.utils.decode_range(ref);
  const matrix = XLSX.utils.sheet_to_json<RosterCellValue[]>(sheet, {
    header: 1,
    defval: null,
    blankrows: false,
    raw: true,
    range: { s: { r: used.s.r, c: 0 }, e: used.e }
  });

  if (matrix.length === 0) {
    return { fieldNames: [], rows: [] };
  }

  const width = matrix.reduce((max, row) => Math.max(max, row.length), 0);
  const fieldNames = deriveFieldNames(matrix[0], width);

  const rows = matrix.slice(1).map(cells => {
    const row: RawRosterRow = {};
    fieldNames.forEach((fieldName, index) => {
      row[fieldName] = cells[index] ?? null;
    });
    return row;
  });

  return { fieldNames, rows };
}

/**
 * Parses an .xlsx roster export and returns the raw rows of its first sheet.
 */
export function readRosterWorkbook(data: Buffer, fileLabel: string = 'roster.xlsx'): RosterSheet {
  if (!isZipContainer(data)) {
    throw new RosterFileError(fileLabel, 'not an .xlsx workbook');
  }

  let workbook: XLSX.WorkBook;
  try {
    workbook = XLSX.read(data, { type: 'buffer', cellDates: true });
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new RosterFileError(fileLabel, `unable to parse workbook (${reason})`);
  }

  const sheetName = workbook.SheetNames[0];
  const sheet = sheetName === undefined ? undefined : workbook.Sheets[sheetName];
  if (sheetName === undefined || !sheet) {
    throw new RosterFileError(fileLabel, 'workbook has no worksheets');
  }

  const { fieldNames, rows } = sheetToRosterRows(sheet);
  if (rows.length === 0) {
    throw new RosterFileError(fileLabel, `worksheet "${sheetName}" has no roster rows`);
  }

  return { sheetName, fieldNames, rows, workbook };
}
