import { BearingTypeError } from '../errors';
import type { Measurements, MeasurementValue, NormalizedObservation } from '../types/chords';

export type CompassLabel = 'N' | 'NE' | 'E' | 'SE' | 'S' | 'SW' | 'W' | 'NW';

export const COMPASS_SUFFIX = '_compass_dir';

/** Short-names that carry a bearing in degrees; extend as portals add sensors */
export const DIRECTIONAL_FIELDS: ReadonlySet<string> = new Set(['wd', 'wgd', 'wind_direction']);

// Closed buckets, first match wins: 22.5 is N, 337.5 is NW
const COMPASS_EDGES = [0, 22.5, 67.5, 112.5, 157.5, 202.5, 247.5, 292.5, 337.5, 360] as const;
const COMPASS_LABELS: readonly CompassLabel[] = ['N', 'NE', 'E', 'SE', 'S', 'SW', 'W', 'NW', 'N'];

export function isDirectionalField(field: string): boolean {
  return DIRECTIONAL_FIELDS.has(field);
}

export function isCompassField(field: string): boolean {
  return field.endsWith(COMPASS_SUFFIX);
}

export function compassFieldFor(field: string): string {
  return `${field}${COMPASS_SUFFIX}`;
}

/**
 * 8-point compass label for a whole-degree bearing; outside [0, 360] yields the null marker
 *
 * @throws BearingTypeError when the bearing is not an integer
 */
export function compassLabel<M>(bearing: number, nullMarker: M): CompassLabel | M {
  if (!Number.isInteger(bearing)) {
    throw new BearingTypeError('bearing', bearing);
  }
  if (bearing < 0 || bearing > 360) {
    return nullMarker;
  }

  for (let i = 0; i < COMPASS_LABELS.length; i++) {
    const low = COMPASS_EDGES[i];
    const high = COMPASS_EDGES[i + 1];
    const label = COMPASS_LABELS[i];
    if (low !== undefined && high !== undefined && label !== undefined && bearing >= low && bearing <= high) {
      return label;
    }
  }

  // [0, 360] is fully covered by the buckets above
  return nullMarker;
}

/**
 * Whole-degree bearing of a reported value. Portals send numbers, sometimes fractional,
 * and occasionally numeric strings; fractions are truncated toward zero.
 */
function toBearing(field: string, value: MeasurementValue): number | null {
  if (value === null) return null;
  if (typeof value === 'number' && Number.isFinite(value)) return Math.trunc(value);
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    if (Number.isFinite(parsed)) return Math.trunc(parsed);
  }
  throw new BearingTypeError(field, value);
}

/**
 * Copy of `fields` with a `<field>_compass_dir` entry for every directional field.
 * The input is never modified, and running it over its own output changes nothing.
 */
export function normalizeMeasurements(
  fields: Measurements | NormalizedObservation,
  nullMarker: string
): NormalizedObservation {
  const normalized: Record<string, MeasurementValue> = { ...fields };

  for (const [field, value] of Object.entries(fields)) {
    if (!isDirectionalField(field)) continue;

    const bearing = toBearing(field, value);
    normalized[compassFieldFor(field)] = bearing === null ? nullMarker : compassLabel(bearing, nullMarker);
  }

  return normalized;
}
