import { RosterRecord, ShiftLabel } from '../types/roster';

export const AM_SHIFT_START = '06:00';
export const PM_SHIFT_START = '18:00';

// Only the start time decides; the through time is not consulted.
export function determineShift(fromTime: string | undefined): ShiftLabel {
  if (fromTime === AM_SHIFT_START) return 'AM';
  if (fromTime === PM_SHIFT_START) return 'PM';
  return 'Special';
}

export function assignShifts(records: readonly RosterRecord[]): RosterRecord[] {
  return records.map(record => ({
    ...record,
    shift: determineShift(record.fromTime)
  }));
}
