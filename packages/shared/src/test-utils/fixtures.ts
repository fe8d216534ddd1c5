import type { RangeFetcher } from '../clients/base/ChordsClient';
import type { DatasetSink, TableTarget } from '../retrieval/types';
import type { FetchResult, Measurements, MeasurementValue, RawObservation } from '../types/chords';
import { formatTimestamp, type TimeRange } from '../utils/time';

export function observation(time: string, measurements: Measurements, test = 'false'): RawObservation {
  return { time, test, measurements };
}

/**
 * One observation every `stepMinutes` from range start (inclusive) to range end (exclusive)
 */
export function observationsEvery(range: TimeRange, stepMinutes: number, measurements: Measurements = { t1: 20 }) {
  const result: RawObservation[] = [];
  for (let t = range.start.getTime(); t < range.end.getTime(); t += stepMinutes * 60_000) {
    result.push(observation(new Date(t).toISOString().replace('.000Z', 'Z'), measurements));
  }
  return result;
}

export function minutesOf(range: TimeRange): number {
  return (range.end.getTime() - range.start.getTime()) / 60_000;
}

export type FetchHandler = (range: TimeRange, instrumentId: number) => FetchResult;

export interface RecordedCall {
  instrumentId: number;
  start: string;
  end: string;
}

/**
 * RangeFetcher stand-in that answers from a handler and records every request
 */
export class ScriptedFetcher implements RangeFetcher {
  readonly calls: RecordedCall[] = [];

  constructor(private readonly handler: FetchHandler) {}

  async fetchRange(instrumentId: number, range: TimeRange): Promise<FetchResult> {
    this.calls.push({ instrumentId, start: formatTimestamp(range.start), end: formatTimestamp(range.end) });
    return this.handler(range, instrumentId);
  }
}

export interface WrittenTable {
  target: TableTarget;
  headers: string[];
  rows: MeasurementValue[][];
}

/**
 * DatasetSink that keeps everything in memory
 */
export class InMemorySink implements DatasetSink {
  readonly tables: WrittenTable[] = [];
  readonly warnings: TableTarget[] = [];

  async writeTable(target: TableTarget, headers: readonly string[], rows: readonly MeasurementValue[][]) {
    this.tables.push({ target, headers: [...headers], rows: rows.map((row) => [...row]) });
    return `${target.outputDir}/${target.portal}_ID${target.instrumentId}.csv`;
  }

  async writeNoDataWarning(target: TableTarget) {
    this.warnings.push(target);
    return `${target.outputDir}/${target.portal}_instrumentID_${target.instrumentId}_[WARNING].txt`;
  }
}
