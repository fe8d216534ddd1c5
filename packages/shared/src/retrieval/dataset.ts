import { TimestampMismatchError } from '../errors';
import type { MeasurementValue, NormalizedObservation, RawObservation } from '../types/chords';
import { normalizeMeasurements } from './normalizer';

export const TIME_COLUMN = 'time';
export const TEST_COLUMN = 'test';

export interface DatasetParts {
  timestamps: readonly string[];
  observations: readonly NormalizedObservation[];
  testFlags: readonly string[];
  measurementCount: number;
}

/**
 * One instrument's assembled observations: three parallel columns that always have equal length
 */
export class Dataset {
  readonly timestamps: readonly string[];
  readonly observations: readonly NormalizedObservation[];
  readonly testFlags: readonly string[];
  /** Raw measurement entries seen, before compass fields were derived */
  readonly measurementCount: number;

  constructor(parts: DatasetParts) {
    const { timestamps, observations, testFlags } = parts;
    if (timestamps.length !== observations.length || timestamps.length !== testFlags.length) {
      throw new TimestampMismatchError(timestamps.length, observations.length, testFlags.length);
    }

    this.timestamps = Object.freeze([...timestamps]);
    this.observations = Object.freeze([...observations]);
    this.testFlags = Object.freeze([...testFlags]);
    this.measurementCount = parts.measurementCount;
  }

  static empty(): Dataset {
    return new Dataset({ timestamps: [], observations: [], testFlags: [], measurementCount: 0 });
  }

  get length(): number {
    return this.timestamps.length;
  }

  isEmpty(): boolean {
    return this.length === 0;
  }

  /**
   * One row per timestamp in header order; fields absent from a row get the null marker
   */
  toRows(headers: readonly string[], nullMarker: string): MeasurementValue[][] {
    return this.timestamps.map((timestamp, i) => {
      const observation: NormalizedObservation = this.observations[i] ?? {};
      const testFlag = this.testFlags[i] ?? nullMarker;
      return headers.map((header) => {
        if (header === TIME_COLUMN) return timestamp;
        if (header === TEST_COLUMN) return testFlag;
        return observation[header] ?? nullMarker;
      });
    });
  }
}

/**
 * Accumulates fetched chunks in chronological order and normalizes them on the way in
 */
export class DatasetBuilder {
  private readonly timestamps: string[] = [];
  private readonly observations: NormalizedObservation[] = [];
  private readonly testFlags: string[] = [];
  private measurementCount = 0;

  constructor(private readonly nullMarker: string) {}

  get size(): number {
    return this.timestamps.length;
  }

  get totalMeasurements(): number {
    return this.measurementCount;
  }

  get lastTimestamp(): string | undefined {
    return this.timestamps[this.timestamps.length - 1];
  }

  /**
   * Append one fetched chunk. Adjacent requests share their boundary instant, so a leading
   * observation stamped exactly like the last collected one is dropped.
   *
   * @returns number of observations kept
   */
  append(chunk: readonly RawObservation[]): number {
    const first = chunk[0];
    const start = first !== undefined && first.time === this.lastTimestamp ? 1 : 0;

    for (const raw of chunk.slice(start)) {
      this.timestamps.push(raw.time);
      this.observations.push(normalizeMeasurements(raw.measurements, this.nullMarker));
      this.testFlags.push(raw.test);
      this.measurementCount += Object.keys(raw.measurements).length;
    }

    return chunk.length - start;
  }

  build(): Dataset {
    return new Dataset({
      timestamps: this.timestamps,
      observations: this.observations,
      testFlags: this.testFlags,
      measurementCount: this.measurementCount,
    });
  }
}
