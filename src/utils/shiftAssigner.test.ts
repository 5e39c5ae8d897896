import { assignShifts, determineShift } from './shiftAssigner';
import { makeRecord } from './testFactories';

describe('determineShift', () => {
  test.each([
    ['06:00', 'AM'],
    ['18:00', 'PM'],
    ['07:00', 'Special'],
    ['6:00', 'Special'],
    ['', 'Special'],
    [undefined, 'Special']
  ])('%p -> %s', (fromTime, expected) => {
    expect(determineShift(fromTime)).toBe(expected);
  });
});

describe('assignShifts', () => {
  it('ignores the through time', () => {
    const [record] = assignShifts([makeRecord({ fromTime: '06:00', throughTime: '10:00' })]);
    expect(record.shift).toBe('AM');
  });

  it('returns copies and leaves the input untouched', () => {
    const input = [makeRecord({ fromTime: '18:00' })];
    const output = assignShifts(input);

    expect(output[0]).not.toBe(input[0]);
    expect(output[0].shift).toBe('PM');
    expect(input[0].shift).toBeUndefined();
  });

  it('overwrites a stale shift label', () => {
    const [record] = assignShifts([makeRecord({ fromTime: '09:30', shift: 'AM' })]);
    expect(record.shift).toBe('Special');
  });
});
