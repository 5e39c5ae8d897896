import {
  GroupCategory,
  MedicRow,
  MedicShiftRow,
  PairedSlotRow,
  RosterAnomaly,
  RosterRecord,
  RosterReportRows,
  SingleSlotRow,
  TimedRow
} from '../types/roster';
import {
  DEFAULT_GROUP_SEPARATOR,
  GROUP_CATEGORY_RULES,
  GroupCategoryRule,
  categorizeUnit,
  compareText,
  groupSortKey,
  truncateGroupName
} from './groupCategorizer';

type ShiftSide = 'AM' | 'PM';

const MEDIC_SLOTS = 3;
const ASSISTANT_UNIT = 'ASST';
const EMPTY_MEDIC_HALF: MedicShiftRow = ['', '', '', '', ''];
const EMPTY_CHIEF_SIDE: SingleSlotRow = ['', '', ''];

export interface RowBuilderOptions {
  groupSeparator?: string;
  rules?: readonly GroupCategoryRule[];
}

export interface RowBuildResult {
  rows: RosterReportRows;
  anomalies: RosterAnomaly[];
  groupsByCategory: Record<GroupCategory, number>;
}

interface UnitGroup {
  /** Untruncated section labels in first-seen order */
  labels: string[];
  members: RosterRecord[];
}

interface ShiftPartition {
  am: RosterRecord[];
  pm: RosterRecord[];
  special: RosterRecord[];
}

export function isEmptyRow(row: readonly string[]): boolean {
  return row.every(cell => cell === '');
}

export function formatTimeRange(record: RosterRecord): string {
  if (record.fromTime === undefined && record.throughTime === undefined) {
    return '';
  }
  return `${record.fromTime ?? ''}-${record.throughTime ?? ''}`;
}

function partitionByShift(records: readonly RosterRecord[]): ShiftPartition {
  const partition: ShiftPartition = { am: [], pm: [], special: [] };
  for (const record of records) {
    if (record.shift === 'AM') partition.am.push(record);
    else if (record.shift === 'PM') partition.pm.push(record);
    else partition.special.push(record);
  }
  return partition;
}

function buildTimedRow(record: RosterRecord, groupName: string): TimedRow {
  return [formatTimeRange(record), groupName, record.name ?? ''];
}

/**
 * Groups records by truncated group name, keeping input order inside each group.
 * Records without a group never reach the report.
 */
function collectGroups(records: readonly RosterRecord[], separator: string): Map<string, UnitGroup> {
  const groups = new Map<string, UnitGroup>();
  for (const record of records) {
    if (!record.group) continue;
    const groupName = truncateGroupName(record.group, separator);
    const group = groups.get(groupName) ?? { labels: [], members: [] };
    if (!group.labels.includes(record.group)) {
      group.labels.push(record.group);
    }
    group.members.push(record);
    groups.set(groupName, group);
  }
  return groups;
}

/**
 * Builds the fixed-width report rows for every category and notes anything odd along the way.
 */
export class ReportRowBuilder {
  private readonly separator: string;
  private readonly rules: readonly GroupCategoryRule[];

  private anomalies: RosterAnomaly[] = [];
  private medicRows: MedicRow[] = [];
  private chiefRows: PairedSlotRow[] = [];
  private travelerAmRows: TimedRow[] = [];
  private travelerPmRows: TimedRow[] = [];
  private otherRows: TimedRow[] = [];
  private assistantAm: RosterRecord[] = [];
  private assistantPm: RosterRecord[] = [];
  private assistantGroupCount = 0;

  constructor(options: RowBuilderOptions = {}) {
    this.separator = options.groupSeparator ?? DEFAULT_GROUP_SEPARATOR;
    this.rules = options.rules ?? GROUP_CATEGORY_RULES;
  }

  build(records: readonly RosterRecord[]): RowBuildResult {
    this.reset();

    const groupsByCategory: Record<GroupCategory, number> = {
      Medic: 0,
      OnDutyAssistant: 0,
      DistrictChief: 0,
      TravelerAM: 0,
      TravelerPM: 0,
      Other: 0
    };

    const groups = collectGroups(records, this.separator);
    const groupNames = [...groups.keys()].sort((a, b) =>
      compareText(groupSortKey(a, this.separator), groupSortKey(b, this.separator))
    );

    for (const groupName of groupNames) {
      const group = groups.get(groupName);
      if (!group) continue;
      const category = categorizeUnit(groupName, group.labels, this.rules);
      groupsByCategory[category] += 1;
      this.addGroup(groupName, category, group.members);
    }

    const rows: RosterReportRows = {
      chiefAndAssistantRows: [this.buildAssistantRow(), ...this.chiefRows],
      medicRows: this.medicRows,
      travelerAmRows: this.travelerAmRows,
      travelerPmRows: this.travelerPmRows,
      otherRows: [...this.otherRows].sort((a, b) => compareText(a[2], b[2]))
    };

    return { rows, anomalies: this.anomalies, groupsByCategory };
  }

  private reset(): void {
    this.anomalies = [];
    this.medicRows = [];
    this.chiefRows = [];
    this.travelerAmRows = [];
    this.travelerPmRows = [];
    this.otherRows = [];
    this.assistantAm = [];
    this.assistantPm = [];
    this.assistantGroupCount = 0;
  }

  private addGroup(groupName: string, category: GroupCategory, members: RosterRecord[]): void {
    switch (category) {
      case 'Medic': {
        const { am, pm, special } = partitionByShift(members);
        this.addTimedRows(this.otherRows, special, groupName);
        const row: MedicRow = [
          ...this.buildMedicHalf(groupName, 'AM', am),
          ...this.buildMedicHalf(groupName, 'PM', pm)
        ];
        if (!isEmptyRow(row)) {
          this.medicRows.push(row);
        }
        return;
      }
      case 'OnDutyAssistant': {
        const { am, pm, special } = partitionByShift(members);
        this.addTimedRows(this.otherRows, special, groupName);
        this.assistantGroupCount += 1;
        this.assistantAm.push(...am);
        this.assistantPm.push(...pm);
        return;
      }
      case 'DistrictChief': {
        const { am, pm, special } = partitionByShift(members);
        this.addTimedRows(this.otherRows, special, groupName);
        const row: PairedSlotRow = [
          ...this.buildChiefSide(groupName, 'AM', am),
          ...this.buildChiefSide(groupName, 'PM', pm)
        ];
        if (!isEmptyRow(row)) {
          this.chiefRows.push(row);
        }
        return;
      }
      case 'TravelerAM':
        this.addTimedRows(this.travelerAmRows, members, groupName);
        return;
      case 'TravelerPM':
        this.addTimedRows(this.travelerPmRows, members, groupName);
        return;
      case 'Other':
        this.addTimedRows(this.otherRows, members, groupName);
        return;
    }
  }

  private addTimedRows(target: TimedRow[], members: readonly RosterRecord[], groupName: string): void {
    for (const record of members) {
      const row = buildTimedRow(record, groupName);
      if (!isEmptyRow(row)) {
        target.push(row);
      }
    }
  }

  private buildMedicHalf(groupName: string, side: ShiftSide, members: readonly RosterRecord[]): MedicShiftRow {
    const count = members.length;

    if (count === 0) {
      this.note({ kind: 'medic-empty-shift', group: groupName, shift: side, count, message: `No employees on ${groupName} ${side}` });
      return EMPTY_MEDIC_HALF;
    }
    if (count === 1) {
      this.note({ kind: 'medic-understaffed', group: groupName, shift: side, count, message: `Less than 2 employees on ${groupName} ${side}` });
    } else if (count > MEDIC_SLOTS) {
      this.note({ kind: 'medic-overflow', group: groupName, shift: side, count, message: `More than ${MEDIC_SLOTS} employees on ${groupName} ${side}` });
    }

    const names = members.slice(0, MEDIC_SLOTS).map(record => record.name ?? '');
    return [side, groupName, names[0] ?? '', names[1] ?? '', names[2] ?? ''];
  }

  private buildChiefSide(groupName: string, side: ShiftSide, members: readonly RosterRecord[]): SingleSlotRow {
    if (members.length === 0) {
      this.note({ kind: 'chief-missing', group: groupName, shift: side, count: 0, message: `No chief on ${groupName} ${side}` });
      return EMPTY_CHIEF_SIDE;
    }
    const chosen = members[0];
    if (members.length > 1) {
      this.note({
        kind: 'chief-multiple',
        group: groupName,
        shift: side,
        count: members.length,
        message: `${members.length} chiefs on ${groupName} ${side}; showing ${chosen.name ?? ''}`
      });
    }
    return [side, groupName, chosen.name ?? ''];
  }

  private buildAssistantSide(side: ShiftSide, members: readonly RosterRecord[]): SingleSlotRow {
    if (members.length === 0) {
      this.note({ kind: 'assistant-missing', shift: side, count: 0, message: `No assistant on duty ${side}` });
      return [side, ASSISTANT_UNIT, ''];
    }
    const chosen = members[0];
    if (members.length > 1) {
      this.note({
        kind: 'assistant-multiple',
        shift: side,
        count: members.length,
        message: `${members.length} assistants on duty ${side}; showing ${chosen.name ?? ''}`
      });
    }
    return [side, ASSISTANT_UNIT, chosen.name ?? ''];
  }

  private buildAssistantRow(): PairedSlotRow {
    if (this.assistantGroupCount === 0) {
      this.note({ kind: 'assistant-group-missing', message: 'No assistants on duty' });
      return ['AM', ASSISTANT_UNIT, '', 'PM', ASSISTANT_UNIT, ''];
    }
    return [
      ...this.buildAssistantSide('AM', this.assistantAm),
      ...this.buildAssistantSide('PM', this.assistantPm)
    ];
  }

  private note(anomaly: RosterAnomaly): void {
    this.anomalies.push(anomaly);
  }
}

export function buildReportRows(records: readonly RosterRecord[], options: RowBuilderOptions = {}): RowBuildResult {
  return new ReportRowBuilder(options).build(records);
}
