/**
 * Timestamp, clock-time and range helpers for the retrieval engine.
 *
 * Every Date handled here is interpreted in UTC; the portal stamps its
 * observations in UTC and accepts request bounds in the same zone.
 */

import { InvalidTimeRangeError, RangeSplitError } from '../errors';

const MS_PER_SECOND = 1000;
const MS_PER_MINUTE = 60 * MS_PER_SECOND;
const MS_PER_DAY = 24 * 60 * MS_PER_MINUTE;

const TIMESTAMP_PATTERN = /^(\d{4})-(\d{2})-(\d{2})[ T](\d{2}):(\d{2}):(\d{2})Z?$/;
const CLOCK_PATTERN = /^(\d{2}):(\d{2}):(\d{2})$/;

export interface TimeRange {
  readonly start: Date;
  readonly end: Date;
}

/**
 * A time of day, kept both as seconds after midnight and as the text it was parsed from
 */
export interface ClockTime {
  readonly text: string;
  readonly seconds: number;
}

export interface DailyWindow {
  readonly start: ClockTime;
  readonly end: ClockTime;
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/**
 * Parse `YYYY-MM-DD HH:MM:SS` (a `T` separator and trailing `Z` are also accepted)
 *
 * @throws InvalidTimeRangeError when the text is not a real calendar timestamp
 *
 * @example
 * ```typescript
 * parseTimestamp('2024-01-01 06:00:00').toISOString(); // "2024-01-01T06:00:00.000Z"
 * ```
 */
export function parseTimestamp(text: string): Date {
  const match = TIMESTAMP_PATTERN.exec(text.trim());
  if (!match) {
    throw new InvalidTimeRangeError(`Invalid timestamp "${text}": expected YYYY-MM-DD HH:MM:SS`);
  }

  const [year, month, day, hours, minutes, seconds] = match.slice(1).map(Number);
  if (
    year === undefined ||
    month === undefined ||
    day === undefined ||
    hours === undefined ||
    minutes === undefined ||
    seconds === undefined
  ) {
    throw new InvalidTimeRangeError(`Invalid timestamp "${text}"`);
  }

  const date = new Date(Date.UTC(year, month - 1, day, hours, minutes, seconds));
  // Date.UTC rolls 2024-02-30 over into March; reject instead
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day ||
    date.getUTCHours() !== hours ||
    date.getUTCMinutes() !== minutes ||
    date.getUTCSeconds() !== seconds
  ) {
    throw new InvalidTimeRangeError(`Invalid timestamp "${text}": not a calendar date and time`);
  }

  return date;
}

/**
 * Format as `YYYY-MM-DD HH:MM:SS`, the form the portal API takes for `start` and `end`
 */
export function formatTimestamp(date: Date): string {
  assertValidDate(date);
  return `${toISODateString(date)} ${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`;
}

/**
 * Convert a Date to ISO date string (YYYY-MM-DD format)
 *
 * @throws Error if the date is invalid
 */
export function toISODateString(date: Date): string {
  assertValidDate(date);
  return `${pad(date.getUTCFullYear(), 4)}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}`;
}

function assertValidDate(date: Date): void {
  if (Number.isNaN(date.getTime())) {
    throw new Error('Invalid date: Date object represents an invalid date');
  }
}

/**
 * Parse `HH:MM:SS` into a clock time
 */
export function parseClockTime(text: string): ClockTime {
  const trimmed = text.trim();
  const match = CLOCK_PATTERN.exec(trimmed);
  const [hours, minutes, seconds] = match ? match.slice(1).map(Number) : [];
  if (hours === undefined || minutes === undefined || seconds === undefined) {
    throw new InvalidTimeRangeError(`Invalid clock time "${text}": expected HH:MM:SS`);
  }
  if (hours > 23 || minutes > 59 || seconds > 59) {
    throw new InvalidTimeRangeError(`Invalid clock time "${text}": out of range`);
  }

  return { text: trimmed, seconds: hours * 3600 + minutes * 60 + seconds };
}

/**
 * Build a daily window; windows that wrap past midnight are not supported
 */
export function createDailyWindow(start: string, end: string): DailyWindow {
  const window = { start: parseClockTime(start), end: parseClockTime(end) };
  if (window.start.seconds > window.end.seconds) {
    throw new InvalidTimeRangeError(`Daily window start ${window.start.text} is after its end ${window.end.text}`);
  }
  return Object.freeze(window);
}

/**
 * Build an immutable range; start may equal end but never follow it
 */
export function createTimeRange(start: Date, end: Date): TimeRange {
  if (Number.isNaN(start.getTime()) || Number.isNaN(end.getTime())) {
    throw new InvalidTimeRangeError('Time range bounds must be valid dates');
  }
  if (start.getTime() > end.getTime()) {
    throw new InvalidTimeRangeError(
      `Starting time cannot be after end time. Start: ${formatTimestamp(start)} End: ${formatTimestamp(end)}`
    );
  }
  return Object.freeze({ start: new Date(start.getTime()), end: new Date(end.getTime()) });
}

export function startOfDay(date: Date): Date {
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));
}

export function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * MS_PER_DAY);
}

/**
 * The instant at `clock` on the calendar day of `day`
 */
export function combine(day: Date, clock: ClockTime): Date {
  return new Date(startOfDay(day).getTime() + clock.seconds * MS_PER_SECOND);
}

export function durationMinutes(range: TimeRange): number {
  return (range.end.getTime() - range.start.getTime()) / MS_PER_MINUTE;
}

/**
 * Cut a range into `divisions` pieces of equal whole-minute length.
 *
 * Returns `divisions + 1` boundaries. The first is the range start, the last is
 * the exact range end; the last piece absorbs whatever the floor division left
 * over. That remainder, spread back over the pieces and rounded up to whole
 * minutes, has to stay below one interval.
 *
 * @throws RangeSplitError when the range is too short for the requested number of pieces
 *
 * @example
 * ```typescript
 * computeBoundaries(range('00:00:00', '01:00:30'), 4);
 * // 00:00:00, 00:15:00, 00:30:00, 00:45:00, 01:00:30
 * ```
 */
export function computeBoundaries(range: TimeRange, divisions: number): Date[] {
  if (!Number.isInteger(divisions) || divisions < 1) {
    throw new RangeSplitError(`Division count must be a positive integer, got ${divisions}`);
  }

  const startMs = range.start.getTime();
  const endMs = range.end.getTime();
  const intervalMinutes = Math.floor(durationMinutes(range) / divisions);

  if (intervalMinutes < 1) {
    throw new RangeSplitError(
      `Cannot split ${formatTimestamp(range.start)} -> ${formatTimestamp(range.end)} into ${divisions} whole-minute pieces`
    );
  }

  const intervalMs = intervalMinutes * MS_PER_MINUTE;
  const remainderMinutes = (endMs - (startMs + divisions * intervalMs)) / MS_PER_MINUTE;
  const spreadMinutes = Math.ceil(remainderMinutes / divisions);

  if (remainderMinutes > 0 && spreadMinutes >= intervalMinutes) {
    throw new RangeSplitError(
      `Timestamp reduction error: remainder of ${remainderMinutes} minutes does not fit ${divisions} pieces of ${intervalMinutes} minutes`
    );
  }

  const boundaries: Date[] = [];
  for (let k = 0; k < divisions; k++) {
    boundaries.push(new Date(startMs + k * intervalMs));
  }
  boundaries.push(new Date(endMs));

  return boundaries;
}
