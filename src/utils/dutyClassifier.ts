import { DutyCodeSets, RosterRecord } from '../types/roster';

export interface DutyClassification {
  /** Qualifying assignment rows of on-duty people, input order */
  records: RosterRecord[];
  /** Names judged on duty, first-seen order */
  onDutyNames: string[];
  /** Names holding at least one disqualifying code, first-seen order */
  vetoedNames: string[];
}

/**
 * Decides who is on duty from the codes each person holds across the roster.
 *
 * A person is on duty when at least one of their codes is allowed (exact match,
 * or containing a generic marker) and none of their codes is disqualifying.
 * Only the allowed assignment rows of those people are kept.
 */
export class DutyClassifier {
  constructor(private readonly codes: DutyCodeSets) {}

  isAllowedCode(code: string): boolean {
    if (this.codes.allowed.has(code)) {
      return true;
    }
    for (const marker of this.codes.generic) {
      if (code.includes(marker)) return true;
    }
    return false;
  }

  isDisqualifyingCode(code: string): boolean {
    return this.codes.disqualifying.has(code);
  }

  collectCodesByName(records: readonly RosterRecord[]): Map<string, Set<string>> {
    const codesByName = new Map<string, Set<string>>();
    for (const record of records) {
      if (!record.name || !record.code) continue;
      const codes = codesByName.get(record.name) ?? new Set<string>();
      codes.add(record.code);
      codesByName.set(record.name, codes);
    }
    return codesByName;
  }

  classify(records: readonly RosterRecord[]): DutyClassification {
    const onDutyNames: string[] = [];
    const vetoedNames: string[] = [];

    for (const [name, codes] of this.collectCodesByName(records)) {
      const held = [...codes];
      if (held.some(code => this.isDisqualifyingCode(code))) {
        vetoedNames.push(name);
        continue;
      }
      if (held.some(code => this.isAllowedCode(code))) {
        onDutyNames.push(name);
      }
    }

    const onDuty = new Set(onDutyNames);
    const kept = records.filter(
      record =>
        record.name !== undefined &&
        record.code !== undefined &&
        onDuty.has(record.name) &&
        this.isAllowedCode(record.code)
    );

    return { records: kept, onDutyNames, vetoedNames };
  }

  filterOnDuty(records: readonly RosterRecord[]): RosterRecord[] {
    return this.classify(records).records;
  }
}
