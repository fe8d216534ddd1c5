import { ColumnSelectionError } from '../errors';
import type { PortalProfile } from '../portals/portal-profiles';
import { TEST_COLUMN, TIME_COLUMN } from '../retrieval/dataset';
import { compassFieldFor, isCompassField, isDirectionalField } from '../retrieval/normalizer';
import type { NormalizedObservation } from '../types/chords';

/**
 * Measurement fields in order of first appearance, compass-derived names left out
 */
export function discoverFields(observations: readonly NormalizedObservation[]): string[] {
  const seen = new Set<string>();
  for (const observation of observations) {
    for (const field of Object.keys(observation)) {
      if (!isCompassField(field)) seen.add(field);
    }
  }
  return [...seen];
}

/**
 * Order fields by the portal's canonical column order. Fields the portal does not rank
 * keep their discovery order after the ranked ones.
 */
export function sortByPortalOrder(fields: readonly string[], profile: PortalProfile): string[] {
  const rankOf = (field: string) => profile.rank.get(field) ?? Number.POSITIVE_INFINITY;
  return [...fields].sort((a, b) => {
    const diff = rankOf(a) - rankOf(b);
    return Number.isNaN(diff) ? 0 : diff;
  });
}

function selectColumns(discovered: readonly string[], requested: readonly string[]): string[] {
  if (requested.length === 0) return [...discovered];

  const available = new Set(discovered);
  const rejected = requested.filter((name) => isCompassField(name) || !available.has(name));
  if (rejected.length > 0) {
    throw new ColumnSelectionError(
      `Requested columns not available: ${rejected.join(', ')}. Fields found: ${discovered.join(', ')}`,
      rejected,
      [...discovered]
    );
  }

  const wanted = new Set(requested);
  return discovered.filter((field) => wanted.has(field));
}

/**
 * Build the output header row for one instrument.
 *
 * Starts with `time`; each kept field is followed by `test` when requested, then by its
 * compass column when the field is a bearing. Empty when the observations carry no fields.
 *
 * @throws ColumnSelectionError when a requested column was not found or names a derived compass column
 */
export function buildHeaders(
  observations: readonly NormalizedObservation[],
  requestedColumns: readonly string[],
  includeTest: boolean,
  profile: PortalProfile
): string[] {
  const discovered = sortByPortalOrder(discoverFields(observations), profile);
  if (discovered.length === 0) return [];

  const headers = [TIME_COLUMN];
  for (const field of selectColumns(discovered, requestedColumns)) {
    headers.push(field);
    if (includeTest) headers.push(TEST_COLUMN);
    if (isDirectionalField(field)) headers.push(compassFieldFor(field));
  }
  return headers;
}
