import { NormalizedRosterRow, RosterRecord } from '../types/roster';
import { toRosterRecord } from './rosterNormalizer';

/**
 * Stamps each data row with the label of the nearest preceding header row.
 * Header rows are consumed; rows before the first header come out without a group.
 */
export function propagateGroupLabels(rows: readonly NormalizedRosterRow[]): RosterRecord[] {
  const records: RosterRecord[] = [];
  let currentLabel: string | undefined;

  for (const row of rows) {
    if (row.kind === 'header') {
      currentLabel = row.label;
      continue;
    }

    const record = toRosterRecord(row.fields);
    if (currentLabel !== undefined) {
      record.group = currentLabel;
    }
    records.push(record);
  }

  return records;
}
