/**
 * Represents a cell value read from a roster worksheet
 */
export type RosterCellValue = string | number | boolean | Date | null | undefined;

/**
 * A cell value that survived pruning (never empty, never NaN)
 */
export type PresentCellValue = string | number | boolean | Date;

/**
 * One raw row as produced by the workbook reader, keyed by import-generated field names
 */
export type RawRosterRow = Record<string, RosterCellValue>;

/**
 * A raw row after empty fields were dropped and positional names were renamed
 */
export type CleanRosterRow = Record<string, PresentCellValue>;

/**
 * Semantic names the positional columns are renamed to
 */
export type RosterFieldName = 'id' | 'name' | 'code' | 'from_time' | 'through_time' | 'hours';

/**
 * Output of the normalizer: a section label or an assignment row
 */
export type NormalizedRosterRow =
  | { kind: 'header'; label: string }
  | { kind: 'data'; fields: CleanRosterRow };

export type ShiftLabel = 'AM' | 'PM' | 'Special';

/**
 * One scheduled assignment
 */
export interface RosterRecord {
  /** External identifier */
  id?: string;
  /** Person's display name */
  name?: string;
  /** Duty/assignment code */
  code?: string;
  /** Shift start, HH:MM */
  fromTime?: string;
  /** Shift end, HH:MM */
  throughTime?: string;
  /** Scheduled duration, informational only */
  hours?: number;
  /** Unit/section label from the nearest preceding header row */
  group?: string;
  /** Set once by the shift assigner */
  shift?: ShiftLabel;
  /** Unrecognized source fields, untouched */
  extraFields: Record<string, PresentCellValue>;
}

/**
 * Read-only duty code vocabulary used by the duty classifier
 */
export interface DutyCodeSets {
  /** Exact-match qualifying codes */
  readonly allowed: ReadonlySet<string>;
  /** Exact-match codes that veto a person regardless of other codes */
  readonly disqualifying: ReadonlySet<string>;
  /** Substrings that qualify any code containing them */
  readonly generic: ReadonlySet<string>;
}

export type GroupCategory =
  | 'Medic'
  | 'OnDutyAssistant'
  | 'DistrictChief'
  | 'TravelerAM'
  | 'TravelerPM'
  | 'Other';

/** `[shift, unit, name1, name2, name3]` */
export type MedicShiftRow = readonly [string, string, string, string, string];

/** AM half followed by PM half */
export type MedicRow = readonly [...MedicShiftRow, ...MedicShiftRow];

/** `[shift, unit or "ASST", name]` */
export type SingleSlotRow = readonly [string, string, string];

/** AM side followed by PM side */
export type PairedSlotRow = readonly [...SingleSlotRow, ...SingleSlotRow];

/** `[timeRange, group, name]` */
export type TimedRow = readonly [string, string, string];

/**
 * Row collections handed to the report assembler
 */
export interface RosterReportRows {
  /** Assistant row first, then one row per district chief group (6 wide) */
  chiefAndAssistantRows: readonly PairedSlotRow[];
  /** One row per medic unit (10 wide) */
  medicRows: readonly MedicRow[];
  travelerAmRows: readonly TimedRow[];
  travelerPmRows: readonly TimedRow[];
  /** Sorted by name */
  otherRows: readonly TimedRow[];
}

export type RosterAnomalyKind =
  | 'medic-overflow'
  | 'medic-understaffed'
  | 'medic-empty-shift'
  | 'assistant-missing'
  | 'assistant-multiple'
  | 'assistant-group-missing'
  | 'chief-missing'
  | 'chief-multiple'
  | 'report-date-missing'
  | 'generated-date-missing';

/**
 * Observational note about a structurally odd input; never a fault
 */
export interface RosterAnomaly {
  kind: RosterAnomalyKind;
  message: string;
  group?: string;
  shift?: 'AM' | 'PM';
  /** Number of occupants found, where relevant */
  count?: number;
}

export interface RosterRunSummary {
  inputRows: number;
  records: number;
  onDutyRecords: number;
  onDutyPeople: number;
  vetoedPeople: number;
  groups: number;
  groupsByCategory: Record<GroupCategory, number>;
}

/**
 * Everything one run produces for the assembler
 */
export interface OnDutyReport {
  reportDate: string;
  generatedAt: string;
  rows: RosterReportRows;
  anomalies: RosterAnomaly[];
  summary: RosterRunSummary;
}
