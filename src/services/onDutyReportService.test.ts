import { buildOnDutyReport } from './onDutyReportService';
import { TEST_DUTY_CODES, rawRosterRows, toRawRow } from '../utils/testFactories';

const DATED = { dutyCodes: TEST_DUTY_CODES, reportDate: '03-05-2024', generatedAt: '03-05-2024 05:45:10' };
const ASSISTANT_PLACEHOLDER = ['AM', 'ASST', '', 'PM', 'ASST', ''];

describe('buildOnDutyReport', () => {
  it('fills the AM half of a medic unit and leaves the PM half blank', () => {
    const report = buildOnDutyReport(
      rawRosterRows([
        'Medic 10',
        { name: 'A', code: 'STWEP', from: '06:00' },
        { name: 'B', code: 'STWEP', from: '06:00' }
      ]),
      DATED
    );

    expect(report.rows.medicRows).toEqual([['AM', 'Medic 10', 'A', 'B', '', '', '', '', '', '']]);
    expect(report.rows.chiefAndAssistantRows).toEqual([ASSISTANT_PLACEHOLDER]);
    expect(report.anomalies.map(anomaly => anomaly.message)).toEqual([
      'No employees on Medic 10 PM',
      'No assistants on duty'
    ]);
    expect(report.summary).toEqual({
      inputRows: 3,
      records: 2,
      onDutyRecords: 2,
      onDutyPeople: 2,
      vetoedPeople: 0,
      groups: 1,
      groupsByCategory: { Medic: 1, OnDutyAssistant: 0, DistrictChief: 0, TravelerAM: 0, TravelerPM: 0, Other: 0 }
    });
  });

  it('excludes a person holding a disqualifying code anywhere on the roster', () => {
    const report = buildOnDutyReport(
      rawRosterRows([
        'Medic 10',
        { name: 'A', code: 'STWEP', from: '06:00' },
        'Education',
        { name: 'A', code: '*ESTNWAM', from: '08:00' }
      ]),
      DATED
    );

    expect(report.rows.medicRows).toEqual([]);
    expect(report.rows.otherRows).toEqual([]);
    expect(report.summary.onDutyPeople).toBe(0);
    expect(report.summary.vetoedPeople).toBe(1);
  });

  it('shows a district post under its unit name', () => {
    const report = buildOnDutyReport(
      rawRosterRows(['District 3 / Station 12', { name: 'Hal Moss', code: 'STWEP', from: '18:00' }]),
      DATED
    );

    expect(report.rows.chiefAndAssistantRows).toEqual([
      ASSISTANT_PLACEHOLDER,
      ['', '', '', 'PM', 'Station 12', 'Hal Moss']
    ]);
    expect(report.anomalies[0]).toEqual({
      kind: 'chief-missing',
      group: 'Station 12',
      shift: 'AM',
      count: 0,
      message: 'No chief on Station 12 AM'
    });
  });

  it('files an EMS district office under other', () => {
    const report = buildOnDutyReport(
      rawRosterRows(['EMS District HQ', { name: 'Ivy Chen', code: 'STWEP', from: '06:00', through: '18:00' }]),
      DATED
    );

    expect(report.rows.chiefAndAssistantRows).toEqual([ASSISTANT_PLACEHOLDER]);
    expect(report.rows.otherRows).toEqual([['06:00-18:00', 'EMS District HQ', 'Ivy Chen']]);
    expect(report.summary.groupsByCategory.Other).toBe(1);
  });

  it('routes an off-hours medic to the other rows', () => {
    const report = buildOnDutyReport(
      rawRosterRows(['Medic 10', { name: 'Joe Park', code: 'STWEP', from: '07:00', through: '15:00' }]),
      DATED
    );

    expect(report.rows.medicRows).toEqual([]);
    expect(report.rows.otherRows).toEqual([['07:00-15:00', 'Medic 10', 'Joe Park']]);
  });

  it('fills assistant and traveler rows from a realistic roster', () => {
    const report = buildOnDutyReport(
      [
        toRawRow([null, null, 'Rank', 'Name', null, 'Code', 'From', 'Through', 'Hours']),
        ...rawRosterRows([
          'On-Duty Assistant',
          { id: '2001', name: 'Fay Hart', code: 'STWEA', from: '06:00', through: '18:00', hours: 12 },
          { id: '2002', name: 'Gus Lee', code: '.SWAP', from: '18:00', through: '06:00', hours: 12 },
          'Travelers AM',
          { id: '2003', name: 'Kim Yu', code: 'OTS15', from: '05:00', through: '13:00', hours: 8 },
          'Travelers PM',
          { id: '2004', name: 'Lou Vance', code: 'NOPE', from: '17:00', through: '01:00', hours: 8 }
        ])
      ],
      DATED
    );

    expect(report.rows.chiefAndAssistantRows).toEqual([['AM', 'ASST', 'Fay Hart', 'PM', 'ASST', 'Gus Lee']]);
    expect(report.rows.travelerAmRows).toEqual([['05:00-13:00', 'Travelers AM', 'Kim Yu']]);
    expect(report.rows.travelerPmRows).toEqual([]);
    expect(report.anomalies).toEqual([]);
    expect(report.summary.records).toBe(4);
    expect(report.summary.onDutyRecords).toBe(3);
  });

  it('reads numeric time cells as day fractions', () => {
    const report = buildOnDutyReport(
      [
        toRawRow(['Medic 10']),
        toRawRow([null, null, null, 'A', null, 'STWEP', 0.75, 0.25, 12]),
        toRawRow([null, null, null, 'B', null, 'STWEP', 0.75, 0.25, 12])
      ],
      DATED
    );

    expect(report.rows.medicRows).toEqual([['', '', '', '', '', 'PM', 'Medic 10', 'A', 'B', '']]);
  });

  it('keeps records that precede the first header out of the report', () => {
    const report = buildOnDutyReport(
      rawRosterRows([
        { name: 'A', code: 'STWEP', from: '06:00' },
        'Education',
        { name: 'B', code: 'STWEP', from: '08:00' }
      ]),
      DATED
    );

    expect(report.rows.otherRows).toEqual([['08:00-', 'Education', 'B']]);
    expect(report.summary.onDutyRecords).toBe(2);
    expect(report.summary.groups).toBe(1);
  });

  it('notes missing report metadata and carries on', () => {
    const report = buildOnDutyReport(rawRosterRows([]), { dutyCodes: TEST_DUTY_CODES });

    expect(report.reportDate).toBe('');
    expect(report.generatedAt).toBe('');
    expect(report.anomalies.map(anomaly => anomaly.kind)).toEqual([
      'report-date-missing',
      'generated-date-missing',
      'assistant-group-missing'
    ]);
  });

  it('passes the display dates through', () => {
    const report = buildOnDutyReport([], DATED);
    expect(report.reportDate).toBe('03-05-2024');
    expect(report.generatedAt).toBe('03-05-2024 05:45:10');
  });

  it('gives identical output for identical input', () => {
    const rows = rawRosterRows([
      'Medic 10',
      { name: 'A', code: 'STWEP', from: '06:00' },
      { name: 'B', code: 'STWEA', from: '18:00' },
      'Reach',
      { name: 'C', code: 'X.Y', from: '09:00', through: '17:00' }
    ]);

    expect(buildOnDutyReport(rows, DATED)).toEqual(buildOnDutyReport(rows, DATED));
  });
});
