import dayjs from 'dayjs';
import {
  CleanRosterRow,
  NormalizedRosterRow,
  PresentCellValue,
  RawRosterRow,
  RosterCellValue,
  RosterFieldName,
  RosterRecord
} from '../types/roster';
import { formatTimeCell } from './timeUtils';

/**
 * Positional names produced by the roster import, mapped to their meaning.
 */
export const FIELD_RENAME_MAP: Readonly<Record<string, RosterFieldName>> = {
  'Unnamed: 2': 'id',
  'Unnamed: 3': 'name',
  'Unnamed: 5': 'code',
  'Unnamed: 6': 'from_time',
  'Unnamed: 7': 'through_time',
  'Unnamed: 8': 'hours'
};

/** Value found in the rank-key legend rows of the roster layout */
export const DEFAULT_RESERVED_MARKERS: readonly string[] = ['Rank'];

export interface NormalizerOptions {
  renameMap?: Readonly<Record<string, string>>;
  reservedMarkers?: readonly string[];
}

export function isEmptyCell(value: RosterCellValue): boolean {
  if (value === null || value === undefined) return true;
  if (typeof value === 'number') return Number.isNaN(value);
  if (typeof value === 'string') return value.trim() === '';
  return false;
}

function isPresentCell(value: RosterCellValue): value is PresentCellValue {
  return !isEmptyCell(value);
}

/**
 * Renders a present cell as display text. Dates keep the roster's MM/DD/YYYY style.
 */
export function cellToText(value: PresentCellValue): string {
  if (value instanceof Date) {
    return dayjs(value).format('MM/DD/YYYY');
  }
  return String(value).trim();
}

/**
 * Drops empty fields and renames positional ones. Returns null for rows that carry
 * nothing or that belong to a legend block.
 */
export function cleanRosterRow(
  row: RawRosterRow,
  options: NormalizerOptions = {}
): CleanRosterRow | null {
  const renameMap = options.renameMap ?? FIELD_RENAME_MAP;
  const reservedMarkers = options.reservedMarkers ?? DEFAULT_RESERVED_MARKERS;
  const cleaned: CleanRosterRow = {};

  for (const [key, value] of Object.entries(row)) {
    if (!isPresentCell(value)) continue;
    cleaned[renameMap[key] ?? key] = value;
  }

  const values = Object.values(cleaned);
  if (values.length === 0) {
    return null;
  }
  if (values.some(value => reservedMarkers.includes(cellToText(value)))) {
    return null;
  }
  return cleaned;
}

/**
 * A row with a single populated field is a section header; anything else is data.
 */
export function normalizeRosterRows(
  rows: readonly RawRosterRow[],
  options: NormalizerOptions = {}
): NormalizedRosterRow[] {
  const normalized: NormalizedRosterRow[] = [];

  for (const row of rows) {
    const cleaned = cleanRosterRow(row, options);
    if (!cleaned) continue;

    const values = Object.values(cleaned);
    if (values.length === 1) {
      normalized.push({ kind: 'header', label: cellToText(values[0]) });
    } else {
      normalized.push({ kind: 'data', fields: cleaned });
    }
  }

  return normalized;
}

const RECORD_FIELDS: ReadonlySet<string> = new Set<RosterFieldName>([
  'id',
  'name',
  'code',
  'from_time',
  'through_time',
  'hours'
]);

function toHours(value: PresentCellValue): number | undefined {
  const hours = typeof value === 'number' ? value : Number(cellToText(value));
  return Number.isFinite(hours) ? hours : undefined;
}

/**
 * Types the semantic fields of a data row. Unrecognized fields ride along untouched.
 */
export function toRosterRecord(fields: CleanRosterRow): RosterRecord {
  const record: RosterRecord = { extraFields: {} };

  for (const [key, value] of Object.entries(fields)) {
    if (!RECORD_FIELDS.has(key)) {
      record.extraFields[key] = value;
    }
  }

  if (fields.id !== undefined) record.id = cellToText(fields.id);
  if (fields.name !== undefined) record.name = cellToText(fields.name);
  if (fields.code !== undefined) record.code = cellToText(fields.code);
  if (fields.from_time !== undefined) record.fromTime = formatTimeCell(fields.from_time);
  if (fields.through_time !== undefined) record.throughTime = formatTimeCell(fields.through_time);
  if (fields.hours !== undefined) record.hours = toHours(fields.hours);

  return record;
}
