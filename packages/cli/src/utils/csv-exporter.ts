import { mkdir, writeFile } from 'node:fs/promises';
import * as path from 'node:path';
import { type DatasetSink, type MeasurementValue, type TableTarget, toISODateString } from '@chords-export/shared';
import { NO_DATA_MESSAGE } from './constants.js';

export function tableFilename(target: TableTarget): string {
  return `${target.portal}_ID${target.instrumentId}_${toISODateString(target.start)}_${toISODateString(target.end)}.csv`;
}

export function warningFilename(target: TableTarget): string {
  return `${target.portal}_instrumentID_${target.instrumentId}_[WARNING].txt`;
}

export function escapeCSV(value: MeasurementValue | undefined): string {
  if (value === null || value === undefined) return '';
  const str = String(value);
  if (str.includes(',') || str.includes('"') || str.includes('\n') || str.includes('\r')) {
    return `"${str.replace(/"/g, '""')}"`;
  }
  return str;
}

export function toCSV(headers: readonly string[], rows: readonly (readonly MeasurementValue[])[]): string {
  const lines = [
    headers.map((h) => escapeCSV(h)).join(','),
    ...rows.map((row) => row.map((cell) => escapeCSV(cell)).join(',')),
  ];
  return `${lines.join('\n')}\n`;
}

/**
 * Writes each instrument to its own CSV file in the target's output directory
 */
export class CsvExporter implements DatasetSink {
  private async ensureOutputDir(dir: string): Promise<void> {
    await mkdir(dir, { recursive: true });
  }

  async writeTable(
    target: TableTarget,
    headers: readonly string[],
    rows: readonly MeasurementValue[][]
  ): Promise<string> {
    await this.ensureOutputDir(target.outputDir);
    const filepath = path.join(target.outputDir, tableFilename(target));
    await writeFile(filepath, toCSV(headers, rows), 'utf-8');
    return filepath;
  }

  async writeNoDataWarning(target: TableTarget): Promise<string> {
    await this.ensureOutputDir(target.outputDir);
    const filepath = path.join(target.outputDir, warningFilename(target));
    await writeFile(filepath, NO_DATA_MESSAGE, 'utf-8');
    return filepath;
  }
}
