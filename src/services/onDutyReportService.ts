import {
  DutyCodeSets,
  OnDutyReport,
  RawRosterRow,
  RosterAnomaly
} from '../types/roster';
import { normalizeRosterRows } from '../utils/rosterNormalizer';
import { propagateGroupLabels } from '../utils/labelPropagator';
import { DutyClassifier } from '../utils/dutyClassifier';
import { assignShifts } from '../utils/shiftAssigner';
import { buildReportRows } from '../utils/reportRowBuilder';
import { DEFAULT_GROUP_SEPARATOR, GroupCategoryRule } from '../utils/groupCategorizer';

export interface OnDutyReportOptions {
  dutyCodes: DutyCodeSets;
  groupSeparator?: string;
  reservedMarkers?: readonly string[];
  renameMap?: Readonly<Record<string, string>>;
  rules?: readonly GroupCategoryRule[];
  /** Display date from the roster header, MM-DD-YYYY */
  reportDate?: string;
  /** Display timestamp from the roster footer */
  generatedAt?: string;
}

/**
 * Runs the whole classification pipeline over one roster snapshot.
 *
 * normalize -> propagate labels -> duty filter -> shift -> rows.
 * Pure and synchronous: the same rows and options always give the same report.
 */
export function buildOnDutyReport(rawRows: readonly RawRosterRow[], options: OnDutyReportOptions): OnDutyReport {
  const reportDate = options.reportDate ?? '';
  const generatedAt = options.generatedAt ?? '';
  const anomalies: RosterAnomaly[] = [];

  if (!reportDate) {
    anomalies.push({ kind: 'report-date-missing', message: 'No report date found' });
  }
  if (!generatedAt) {
    anomalies.push({ kind: 'generated-date-missing', message: 'No generated date/time found' });
  }

  const normalized = normalizeRosterRows(rawRows, {
    reservedMarkers: options.reservedMarkers,
    renameMap: options.renameMap
  });
  const records = propagateGroupLabels(normalized);

  const classification = new DutyClassifier(options.dutyCodes).classify(records);
  const withShifts = assignShifts(classification.records);

  const built = buildReportRows(withShifts, {
    groupSeparator: options.groupSeparator ?? DEFAULT_GROUP_SEPARATOR,
    rules: options.rules
  });
  anomalies.push(...built.anomalies);

  const groups = Object.values(built.groupsByCategory).reduce((sum, count) => sum + count, 0);

  return {
    reportDate,
    generatedAt,
    rows: built.rows,
    anomalies,
    summary: {
      inputRows: rawRows.length,
      records: records.length,
      onDutyRecords: withShifts.length,
      onDutyPeople: classification.onDutyNames.length,
      vetoedPeople: classification.vetoedNames.length,
      groups,
      groupsByCategory: built.groupsByCategory
    }
  };
}
