/**
 * Units-of-measurement guide written beside the downloaded files
 */

import { mkdir, writeFile } from 'node:fs/promises';
import * as path from 'node:path';
import type { PortalProfile } from '@chords-export/shared';
import { README_FILENAME } from './constants.js';

const COLUMN_GAP = '    ';
const HEADER_ROW = ['Sensor name', '(shortname)', 'Measured Property', '(units)'] as const;

function alignRows(rows: readonly (readonly string[])[]): string[] {
  const widths: number[] = [];
  for (const row of rows) {
    row.forEach((cell, i) => {
      widths[i] = Math.max(widths[i] ?? 0, cell.length);
    });
  }
  return rows.map((row) =>
    row.map((cell, i) => (i === row.length - 1 ? cell : cell.padEnd(widths[i] ?? cell.length))).join(COLUMN_GAP)
  );
}

export function renderReadme(profile: PortalProfile): string {
  const title = `Units of measurement guide: ${profile.name}`;

  if (profile.units.length === 0) {
    const rule = '='.repeat(title.length);
    return [
      rule,
      title,
      rule,
      '',
      `No units of measurement guide is available for the ${profile.name} portal.`,
      'Check the CHORDS portal for sensor details.',
      '',
    ].join('\n');
  }

  const [header = '', ...entries] = alignRows([
    HEADER_ROW,
    ...profile.units.map((unit) => [unit.sensor, `(${unit.shortName})`, unit.property, `(${unit.units})`]),
  ]);
  const width = Math.max(title.length, header.length, ...entries.map((line) => line.length));
  const rule = '='.repeat(width);

  return [rule, title, rule, '', header, '_'.repeat(width), '', ...entries, ''].join('\n');
}

/**
 * @returns path of the written README
 */
export async function writeReadme(profile: PortalProfile, outputDir: string): Promise<string> {
  await mkdir(outputDir, { recursive: true });
  const filepath = path.join(outputDir, README_FILENAME);
  await writeFile(filepath, renderReadme(profile), 'utf-8');
  return filepath;
}
