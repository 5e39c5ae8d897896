/**
 * Roster fixtures shared by the unit and service tests
 */

import * as XLSX from 'xlsx';
import JSZip from 'jszip';
import { DutyCodeSets, RawRosterRow, RosterCellValue, RosterRecord } from '../types/roster';
import { createDutyCodeSets } from '../config/dutyCodes';

/** Field names the reader derives for a sheet whose first row reads `Roster` in column A */
export const ROSTER_FIELD_NAMES = [
  'Roster',
  'Unnamed: 1',
  'Unnamed: 2',
  'Unnamed: 3',
  'Unnamed: 4',
  'Unnamed: 5',
  'Unnamed: 6',
  'Unnamed: 7',
  'Unnamed: 8'
];

export const TEST_DUTY_CODES: DutyCodeSets = createDutyCodeSets({
  allowed: ['STWEP', 'STWEA', 'OTS15', '+OOCAC'],
  disqualifying: ['*ESTNWAM', '*ESTNWPM', '.VAM'],
  generic: ['.']
});

export interface AssignmentInput {
  id?: string;
  name: string;
  code: string;
  from?: string;
  through?: string;
  hours?: number;
}

export type RosterEntry = string | AssignmentInput;

export function assignmentCells(input: AssignmentInput): RosterCellValue[] {
  return [
    null,
    null,
    input.id ?? null,
    input.name,
    null,
    input.code,
    input.from ?? null,
    input.through ?? null,
    input.hours ?? null
  ];
}

export function headerCells(label: string): RosterCellValue[] {
  return [label, null, null, null, null, null, null, null, null];
}

export function toRawRow(cells: readonly RosterCellValue[]): RawRosterRow {
  const row: RawRosterRow = {};
  ROSTER_FIELD_NAMES.forEach((fieldName, index) => {
    row[fieldName] = cells[index] ?? null;
  });
  return row;
}

/** Strings are section headers, objects are assignments */
export function rosterMatrix(entries: readonly RosterEntry[]): RosterCellValue[][] {
  return entries.map(entry => (typeof entry === 'string' ? headerCells(entry) : assignmentCells(entry)));
}

export function rawRosterRows(entries: readonly RosterEntry[]): RawRosterRow[] {
  return rosterMatrix(entries).map(toRawRow);
}

export function rosterWorkbook(entries: readonly RosterEntry[], sheetName: string = 'Roster'): XLSX.WorkBook {
  const workbook = XLSX.utils.book_new();
  const sheet = XLSX.utils.aoa_to_sheet([headerCells('Roster'), ...rosterMatrix(entries)]);
  XLSX.utils.book_append_sheet(workbook, sheet, sheetName);
  return workbook;
}

export function rosterWorkbookBuffer(entries: readonly RosterEntry[]): Buffer {
  const output: Buffer = XLSX.write(rosterWorkbook(entries), { bookType: 'xlsx', type: 'buffer' });
  return output;
}

/**
 * Writes page header/footer XML (already entity-escaped) into the first sheet of an .xlsx buffer.
 */
export async function withHeaderFooter(data: Buffer, oddHeader: string, oddFooter: string): Promise<Buffer> {
  const zip = await JSZip.loadAsync(data);
  const sheetPath = 'xl/worksheets/sheet1.xml';
  const sheetXml = await zip.file(sheetPath)?.async('string');
  if (!sheetXml) {
    throw new Error(`${sheetPath} missing from test workbook`);
  }
  const headerFooter = `<headerFooter><oddHeader>${oddHeader}</oddHeader><oddFooter>${oddFooter}</oddFooter></headerFooter>`;
  zip.file(sheetPath, sheetXml.replace('</worksheet>', `${headerFooter}</worksheet>`));
  return zip.generateAsync({ type: 'nodebuffer' });
}

export function makeRecord(overrides: Partial<RosterRecord> = {}): RosterRecord {
  return {
    name: 'Avery Test',
    code: 'STWEP',
    fromTime: '06:00',
    throughTime: '18:00',
    hours: 12,
    group: 'Medic 10',
    extraFields: {},
    ...overrides
  };
}
