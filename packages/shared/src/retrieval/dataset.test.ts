import { describe, expect, it } from 'vitest';
import { TimestampMismatchError } from '../errors';
import { observation } from '../test-utils/fixtures';
import { Dataset, DatasetBuilder } from './dataset';

describe('Dataset', () => {
  it('keeps parallel columns of equal length', () => {
    const dataset = new Dataset({
      timestamps: ['2024-01-01T00:00:00Z', '2024-01-01T00:15:00Z'],
      observations: [{ t1: 1 }, { t1: 2 }],
      testFlags: ['false', 'false'],
      measurementCount: 2,
    });
    expect(dataset.length).toBe(2);
    expect(dataset.observations).toHaveLength(2);
    expect(dataset.testFlags).toHaveLength(2);
  });

  it('rejects mismatched column lengths', () => {
    expect(
      () =>
        new Dataset({
          timestamps: ['2024-01-01T00:00:00Z', '2024-01-01T00:15:00Z'],
          observations: [{ t1: 1 }],
          testFlags: ['false', 'false'],
          measurementCount: 1,
        })
    ).toThrow(TimestampMismatchError);
  });

  it('builds rows in header order with the null marker for absent fields', () => {
    const dataset = new Dataset({
      timestamps: ['2024-01-01T00:00:00Z', '2024-01-01T00:15:00Z'],
      observations: [{ wd: 90, wd_compass_dir: 'E', t1: 25.3 }, { t1: 26 }],
      testFlags: ['false', 'true'],
      measurementCount: 3,
    });

    expect(dataset.toRows(['time', 'wd', 'test', 'wd_compass_dir', 't1', 'test'], 'NaN')).toEqual([
      ['2024-01-01T00:00:00Z', 90, 'false', 'E', 25.3, 'false'],
      ['2024-01-01T00:15:00Z', 'NaN', 'true', 'NaN', 26, 'true'],
    ]);
  });

  it('substitutes the null marker for null values', () => {
    const dataset = new Dataset({
      timestamps: ['2024-01-01T00:00:00Z'],
      observations: [{ t1: null, rain: 0 }],
      testFlags: ['false'],
      measurementCount: 2,
    });
    expect(dataset.toRows(['time', 't1', 'rain'], '')).toEqual([['2024-01-01T00:00:00Z', '', 0]]);
  });

  it('creates an empty dataset', () => {
    expect(Dataset.empty().isEmpty()).toBe(true);
  });
});

describe('DatasetBuilder', () => {
  it('normalizes and counts raw measurements', () => {
    const builder = new DatasetBuilder('');
    builder.append([observation('2024-01-01T00:00:00Z', { wd: 180, ws: 2 })]);

    const dataset = builder.build();
    expect(dataset.observations[0]).toEqual({ wd: 180, ws: 2, wd_compass_dir: 'S' });
    expect(dataset.measurementCount).toBe(2);
  });

  it('drops one observation repeated across a chunk seam', () => {
    const builder = new DatasetBuilder('');
    builder.append([observation('2024-01-01T00:00:00Z', { t1: 1 }), observation('2024-01-01T04:00:00Z', { t1: 2 })]);
    const kept = builder.append([
      observation('2024-01-01T04:00:00Z', { t1: 2 }),
      observation('2024-01-01T05:00:00Z', { t1: 3 }),
    ]);

    expect(kept).toBe(1);
    expect(builder.build().timestamps).toEqual([
      '2024-01-01T00:00:00Z',
      '2024-01-01T04:00:00Z',
      '2024-01-01T05:00:00Z',
    ]);
    expect(builder.totalMeasurements).toBe(3);
  });

  it('accepts empty chunks', () => {
    const builder = new DatasetBuilder('');
    expect(builder.append([])).toBe(0);
    expect(builder.build().isEmpty()).toBe(true);
  });
});
