import type { RangeFetcher } from '../clients/base/ChordsClient';
import {
  addDays,
  combine,
  createTimeRange,
  type DailyWindow,
  formatTimestamp,
  startOfDay,
  type TimeRange,
  toISODateString,
} from '../utils/time';
import type { DatasetBuilder } from './dataset';
import { assertUsable, splitAndFetch } from './range-splitter';
import type { RetrievalOptions, WalkOutcome } from './types';

const DEFAULT_PROGRESS_INTERVAL_DAYS = 100;

function later(a: Date, b: Date): Date {
  return a.getTime() >= b.getTime() ? a : b;
}

function earlier(a: Date, b: Date): Date {
  return a.getTime() <= b.getTime() ? a : b;
}

/**
 * Slice of the first calendar day's window that falls inside the range, if any
 */
export function firstDaySlice(range: TimeRange, window: DailyWindow): TimeRange | undefined {
  const day = startOfDay(range.start);
  const windowEnd = combine(day, window.end);
  if (windowEnd.getTime() < range.start.getTime()) return undefined;

  const start = later(combine(day, window.start), range.start);
  const end = earlier(windowEnd, range.end);
  return start.getTime() <= end.getTime() ? createTimeRange(start, end) : undefined;
}

/**
 * Fetch only the daily window of every calendar day in `range`, oldest first.
 *
 * After the first day, a day is fetched while its window closes strictly before the range end.
 * A window slice the portal refuses as too large is handed to the range splitter.
 */
export async function walkDailyWindows(
  fetcher: RangeFetcher,
  instrumentId: number,
  range: TimeRange,
  window: DailyWindow,
  collector: DatasetBuilder,
  options: RetrievalOptions
): Promise<WalkOutcome> {
  const log = options.logger.child({ component: 'window-walker', instrumentId });
  const progressInterval = options.progressIntervalDays ?? DEFAULT_PROGRESS_INTERVAL_DAYS;
  let requests = 0;
  let days = 0;

  const fetchSlice = async (slice: TimeRange): Promise<void> => {
    requests++;
    const result = await fetcher.fetchRange(instrumentId, slice);
    assertUsable(result, instrumentId);

    if (result.kind === 'too-many') {
      log.info(`Window slice ${formatTimestamp(slice.start)} -> ${formatTimestamp(slice.end)} too large, subdividing`);
      const outcome = await splitAndFetch(fetcher, instrumentId, slice, collector, options);
      requests += outcome.requests;
    } else {
      collector.append(result.observations);
    }
    days++;
  };

  log.info(`Returning data from ${window.start.text} -> ${window.end.text} each day`);

  const first = firstDaySlice(range, window);
  if (first) {
    await fetchSlice(first);
  }

  let day = addDays(startOfDay(range.start), 1);
  while (combine(day, window.end).getTime() < range.end.getTime()) {
    await fetchSlice(createTimeRange(combine(day, window.start), combine(day, window.end)));

    if (days % progressInterval === 0) {
      log.info(`Large data request: ${days} days fetched, continuing from ${toISODateString(addDays(day, 1))}`);
    }
    day = addDays(day, 1);
  }

  return { days, requests };
}
