import { describe, expect, it } from 'vitest';
import { InvalidTimeRangeError, RangeSplitError } from '../errors';
import {
  addDays,
  combine,
  computeBoundaries,
  createDailyWindow,
  createTimeRange,
  formatTimestamp,
  parseClockTime,
  parseTimestamp,
  startOfDay,
  toISODateString,
} from './time';

function range(start: string, end: string) {
  return createTimeRange(parseTimestamp(start), parseTimestamp(end));
}

describe('parseTimestamp', () => {
  it('parses the request format as UTC', () => {
    expect(parseTimestamp('2024-01-01 06:00:00').toISOString()).toBe('2024-01-01T06:00:00.000Z');
  });

  it('accepts the portal observation format', () => {
    expect(parseTimestamp('2023-12-17T18:45:56Z').toISOString()).toBe('2023-12-17T18:45:56.000Z');
  });

  it('rejects malformed text', () => {
    expect(() => parseTimestamp('2024-01-01')).toThrow(InvalidTimeRangeError);
    expect(() => parseTimestamp('yesterday')).toThrow(InvalidTimeRangeError);
  });

  it('rejects dates that do not exist', () => {
    expect(() => parseTimestamp('2023-11-31 23:59:59')).toThrow(InvalidTimeRangeError);
    expect(() => parseTimestamp('2024-01-01 24:00:00')).toThrow(InvalidTimeRangeError);
  });
});

describe('formatTimestamp', () => {
  it('formats in the API request form', () => {
    expect(formatTimestamp(new Date(Date.UTC(2024, 6, 2, 5, 45, 59)))).toBe('2024-07-02 05:45:59');
  });

  it('throws on invalid dates', () => {
    expect(() => formatTimestamp(new Date('invalid'))).toThrow('Invalid date');
  });
});

describe('toISODateString', () => {
  it('returns the UTC calendar date', () => {
    expect(toISODateString(new Date(Date.UTC(2024, 0, 15, 23, 30)))).toBe('2024-01-15');
  });
});

describe('parseClockTime', () => {
  it('returns seconds after midnight', () => {
    expect(parseClockTime('05:45:00')).toEqual({ text: '05:45:00', seconds: 20700 });
    expect(parseClockTime('00:00:00').seconds).toBe(0);
    expect(parseClockTime('23:59:59').seconds).toBe(86399);
  });

  it('rejects bad clock times', () => {
    expect(() => parseClockTime('5:45')).toThrow(InvalidTimeRangeError);
    expect(() => parseClockTime('25:00:00')).toThrow(InvalidTimeRangeError);
    expect(() => parseClockTime('12:60:00')).toThrow(InvalidTimeRangeError);
  });
});

describe('createDailyWindow', () => {
  it('accepts an ordered window', () => {
    const window = createDailyWindow('05:45:00', '06:00:59');
    expect(window.start.seconds).toBe(20700);
    expect(window.end.seconds).toBe(21659);
    expect(Object.isFrozen(window)).toBe(true);
  });

  it('rejects a window that wraps past midnight', () => {
    expect(() => createDailyWindow('23:00:00', '01:00:00')).toThrow('Daily window start 23:00:00 is after its end');
  });
});

describe('createTimeRange', () => {
  it('allows start equal to end', () => {
    const r = range('2024-01-01 00:00:00', '2024-01-01 00:00:00');
    expect(r.start.getTime()).toBe(r.end.getTime());
  });

  it('rejects start after end', () => {
    expect(() => range('2024-01-02 00:00:00', '2024-01-01 00:00:00')).toThrow(InvalidTimeRangeError);
  });

  it('is frozen and does not alias its inputs', () => {
    const start = parseTimestamp('2024-01-01 00:00:00');
    const r = createTimeRange(start, parseTimestamp('2024-01-02 00:00:00'));
    start.setUTCFullYear(1999);
    expect(r.start.getUTCFullYear()).toBe(2024);
    expect(Object.isFrozen(r)).toBe(true);
  });
});

describe('day arithmetic', () => {
  it('combines a calendar day with a clock time', () => {
    const day = parseTimestamp('2024-01-02 17:30:00');
    expect(formatTimestamp(combine(day, parseClockTime('06:00:59')))).toBe('2024-01-02 06:00:59');
  });

  it('moves to the next day across a month end', () => {
    expect(toISODateString(addDays(startOfDay(parseTimestamp('2024-01-31 12:00:00')), 1))).toBe('2024-02-01');
  });
});

describe('computeBoundaries', () => {
  it('splits an exact range into equal pieces', () => {
    const boundaries = computeBoundaries(range('2024-01-01 00:00:00', '2024-01-01 08:00:00'), 2);
    expect(boundaries.map(formatTimestamp)).toEqual([
      '2024-01-01 00:00:00',
      '2024-01-01 04:00:00',
      '2024-01-01 08:00:00',
    ]);
  });

  it('forces the last boundary to the exact range end', () => {
    const boundaries = computeBoundaries(range('2024-01-01 00:00:00', '2024-01-01 01:00:30'), 4);
    expect(boundaries.map(formatTimestamp)).toEqual([
      '2024-01-01 00:00:00',
      '2024-01-01 00:15:00',
      '2024-01-01 00:30:00',
      '2024-01-01 00:45:00',
      '2024-01-01 01:00:30',
    ]);
  });

  it('returns divisions + 1 boundaries', () => {
    const boundaries = computeBoundaries(range('2024-01-01 00:00:00', '2024-01-08 00:00:00'), 64);
    expect(boundaries).toHaveLength(65);
    expect(boundaries[64]?.getTime()).toBe(parseTimestamp('2024-01-08 00:00:00').getTime());
  });

  it('throws when pieces would be shorter than a minute', () => {
    expect(() => computeBoundaries(range('2024-01-01 00:00:00', '2024-01-01 00:03:00'), 4)).toThrow(RangeSplitError);
  });

  it('throws when the remainder does not fit below one interval', () => {
    // 5 minutes 30 seconds in 4 pieces: interval 1, remainder 1.5 spreads to 1
    expect(() => computeBoundaries(range('2024-01-01 00:00:00', '2024-01-01 00:05:30'), 4)).toThrow(
      'Timestamp reduction error'
    );
  });

  it('rejects a non-positive division count', () => {
    expect(() => computeBoundaries(range('2024-01-01 00:00:00', '2024-01-02 00:00:00'), 0)).toThrow(RangeSplitError);
  });
});
