/**
 * Static reference data for the known CHORDS portals: canonical column order and units guide
 */

import { z } from 'zod';
import { UnknownPortalError } from '../errors';
import portalsData from './portals.json';

export const UnitEntrySchema = z.object({
  sensor: z.string().min(1),
  shortName: z.string().min(1),
  property: z.string().min(1),
  units: z.string().min(1),
});

export const PortalProfileSchema = z.object({
  name: z.string().min(1),
  columnOrder: z.array(z.string().min(1)),
  units: z.array(UnitEntrySchema),
});

const PortalCatalogSchema = z.object({ portals: z.array(PortalProfileSchema).min(1) });

export type UnitEntry = z.infer<typeof UnitEntrySchema>;

export interface PortalProfile {
  readonly name: string;
  readonly columnOrder: readonly string[];
  readonly units: readonly UnitEntry[];
  /** Position of each short-name in `columnOrder`; the first occurrence wins */
  readonly rank: ReadonlyMap<string, number>;
}

function toProfile(raw: z.infer<typeof PortalProfileSchema>): PortalProfile {
  const rank = new Map<string, number>();
  raw.columnOrder.forEach((field, index) => {
    if (!rank.has(field)) rank.set(field, index);
  });
  return Object.freeze({ ...raw, rank });
}

const PROFILES: ReadonlyMap<string, PortalProfile> = new Map(
  PortalCatalogSchema.parse(portalsData).portals.map((raw) => [raw.name, toProfile(raw)])
);

export function listPortals(): PortalProfile[] {
  return [...PROFILES.values()];
}

export function portalNames(): string[] {
  return [...PROFILES.keys()];
}

export function isKnownPortal(name: string): boolean {
  return PROFILES.has(name);
}

/**
 * Look up a portal by its exact, case-sensitive name
 *
 * @throws UnknownPortalError
 */
export function getPortalProfile(name: string): PortalProfile {
  const profile = PROFILES.get(name);
  if (!profile) {
    throw new UnknownPortalError(name, portalNames());
  }
  return profile;
}
