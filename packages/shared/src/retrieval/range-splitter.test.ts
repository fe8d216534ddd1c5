import { describe, expect, it } from 'vitest';
import { AuthenticationError, RangeSplitError, RemoteServerError } from '../errors';
import { minutesOf, observationsEvery, ScriptedFetcher } from '../test-utils/fixtures';
import type { FetchResult } from '../types/chords';
import { SilentLogger } from '../utils/logger';
import { createTimeRange, formatTimestamp, parseTimestamp, type TimeRange } from '../utils/time';
import { DatasetBuilder } from './dataset';
import { planSweep, splitAndFetch } from './range-splitter';

const logger = new SilentLogger();
const eightHours = createTimeRange(parseTimestamp('2024-01-01 00:00:00'), parseTimestamp('2024-01-01 08:00:00'));

function okEvery15Minutes(range: TimeRange): FetchResult {
  return { kind: 'ok', observations: observationsEvery(range, 15) };
}

describe('planSweep', () => {
  it('covers the whole range on the first sweep', () => {
    const pieces = planSweep(eightHours, 2, eightHours.start);
    expect(pieces.map((p) => [formatTimestamp(p.start), formatTimestamp(p.end)])).toEqual([
      ['2024-01-01 00:00:00', '2024-01-01 04:00:00'],
      ['2024-01-01 04:00:00', '2024-01-01 08:00:00'],
    ]);
  });

  it('skips pieces before the resume point', () => {
    const pieces = planSweep(eightHours, 4, parseTimestamp('2024-01-01 04:00:00'));
    expect(pieces.map((p) => formatTimestamp(p.start))).toEqual(['2024-01-01 04:00:00', '2024-01-01 06:00:00']);
  });

  it('clips a piece that straddles the resume point', () => {
    // 61 minutes in 4 pieces: 00:00, 00:15, 00:30, 00:45, 01:01
    const range = createTimeRange(parseTimestamp('2024-01-01 00:00:00'), parseTimestamp('2024-01-01 01:01:00'));
    const pieces = planSweep(range, 4, parseTimestamp('2024-01-01 00:35:00'));
    expect(pieces.map((p) => [formatTimestamp(p.start), formatTimestamp(p.end)])).toEqual([
      ['2024-01-01 00:35:00', '2024-01-01 00:45:00'],
      ['2024-01-01 00:45:00', '2024-01-01 01:01:00'],
    ]);
  });
});

describe('splitAndFetch', () => {
  it('converges once every piece is at most an hour', async () => {
    const fetcher = new ScriptedFetcher((range) =>
      minutesOf(range) > 60 ? { kind: 'too-many', detail: 'too many data points' } : okEvery15Minutes(range)
    );
    const collector = new DatasetBuilder('');

    const outcome = await splitAndFetch(fetcher, 1, eightHours, collector, { maxDivisions: 4096, logger });

    expect(outcome.divisions).toBe(8);
    // one failing piece at 2 and 4 divisions, then the 8 pieces of the final sweep
    expect(outcome.requests).toBe(10);
    expect(fetcher.calls).toHaveLength(10);
    const finalSweep = fetcher.calls.slice(2);
    expect(finalSweep.map((call) => call.start)).toEqual([
      '2024-01-01 00:00:00',
      '2024-01-01 01:00:00',
      '2024-01-01 02:00:00',
      '2024-01-01 03:00:00',
      '2024-01-01 04:00:00',
      '2024-01-01 05:00:00',
      '2024-01-01 06:00:00',
      '2024-01-01 07:00:00',
    ]);
    // 4 observations per final piece
    expect(collector.size).toBe(32);
    expect(collector.build().timestamps[31]).toBe('2024-01-01T07:45:00Z');
  });

  it('keeps what earlier sweeps collected and never refetches it', async () => {
    const denseFrom = parseTimestamp('2024-01-01 04:00:00').getTime();
    const fetcher = new ScriptedFetcher((range) =>
      range.end.getTime() > denseFrom && minutesOf(range) > 60
        ? { kind: 'too-many', detail: 'too many data points' }
        : okEvery15Minutes(range)
    );
    const collector = new DatasetBuilder('');

    const outcome = await splitAndFetch(fetcher, 1, eightHours, collector, { maxDivisions: 4096, logger });

    expect(outcome).toEqual({ divisions: 8, requests: 7 });
    expect(fetcher.calls.map((call) => `${call.start} -> ${call.end}`)).toEqual([
      '2024-01-01 00:00:00 -> 2024-01-01 04:00:00',
      '2024-01-01 04:00:00 -> 2024-01-01 08:00:00',
      '2024-01-01 04:00:00 -> 2024-01-01 06:00:00',
      '2024-01-01 04:00:00 -> 2024-01-01 05:00:00',
      '2024-01-01 05:00:00 -> 2024-01-01 06:00:00',
      '2024-01-01 06:00:00 -> 2024-01-01 07:00:00',
      '2024-01-01 07:00:00 -> 2024-01-01 08:00:00',
    ]);
    const { timestamps } = collector.build();
    expect(timestamps).toHaveLength(32);
    expect(timestamps[0]).toBe('2024-01-01T00:00:00Z');
    expect(timestamps[16]).toBe('2024-01-01T04:00:00Z');
  });

  it('gives up past the division limit', async () => {
    const fetcher = new ScriptedFetcher(() => ({ kind: 'too-many', detail: 'too many data points' }));

    await expect(
      splitAndFetch(fetcher, 1, eightHours, new DatasetBuilder(''), { maxDivisions: 8, logger })
    ).rejects.toThrow(RangeSplitError);
    expect(fetcher.calls).toHaveLength(3);
  });

  it('gives up when the range can no longer be cut', async () => {
    const short = createTimeRange(parseTimestamp('2024-01-01 00:00:00'), parseTimestamp('2024-01-01 00:03:00'));
    const fetcher = new ScriptedFetcher(() => ({ kind: 'too-many', detail: 'too many data points' }));

    await expect(
      splitAndFetch(fetcher, 1, short, new DatasetBuilder(''), { maxDivisions: 4096, logger })
    ).rejects.toThrow(RangeSplitError);
  });

  it('raises authentication failures', async () => {
    const fetcher = new ScriptedFetcher(() => ({
      kind: 'auth-error',
      message: 'Access Denied, user authentication required.',
    }));

    await expect(
      splitAndFetch(fetcher, 1, eightHours, new DatasetBuilder(''), { maxDivisions: 4096, logger })
    ).rejects.toThrow(AuthenticationError);
  });

  it('raises server errors', async () => {
    const fetcher = new ScriptedFetcher(() => ({ kind: 'server-error', message: 'Internal Server Error' }));

    await expect(
      splitAndFetch(fetcher, 9, eightHours, new DatasetBuilder(''), { maxDivisions: 4096, logger })
    ).rejects.toThrow(RemoteServerError);
  });
});
