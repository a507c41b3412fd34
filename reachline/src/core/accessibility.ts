/**
 * Cumulative-opportunity accessibility: for each origin, the sum of a zone
 * attribute over every destination reachable within a time limit.
 */
import { ValidationError } from './errors.js';
import type { ZoneSkim } from './skim-aggregator.js';
import { attributeValue, requireNumericAttribute, type ZoneTable } from './zones.js';

export interface AccessibilityEntry {
  zoneId: number;
  accessibleValue: number;
}

/**
 * Origins with no destination within `timeLimit` (inclusive) are absent
 * from the result; use `zeroFillAccessibility` before merging onto zones.
 * Destinations missing from the zone table do not contribute.
 */
export function calculateAccessibility(
  skim: ZoneSkim,
  zones: ZoneTable,
  timeLimit: number,
  attribute: string
): AccessibilityEntry[] {
  if (!Number.isFinite(timeLimit) || timeLimit < 0) {
    throw new ValidationError(`Time limit must be a non-negative number, got ${timeLimit}`);
  }
  requireNumericAttribute(zones, attribute);

  const destinationValue = new Map<number, number>();
  for (const zone of zones) {
    destinationValue.set(zone.id, attributeValue(zone, attribute));
  }

  const sums = new Map<number, number>();
  for (const entry of skim) {
    if (entry.travelTime > timeLimit) continue;
    const value = destinationValue.get(entry.destinationZone);
    if (value === undefined) continue;
    sums.set(entry.originZone, (sums.get(entry.originZone) ?? 0) + value);
  }

  return [...sums]
    .map(([zoneId, accessibleValue]) => ({ zoneId, accessibleValue }))
    .sort((a, b) => a.zoneId - b.zoneId);
}

/**
 * One value per zone id, zero for origins missing from `entries`.
 */
export function zeroFillAccessibility(
  ids: readonly number[],
  entries: readonly AccessibilityEntry[]
): Map<number, number> {
  const byZone = new Map(entries.map((e) => [e.zoneId, e.accessibleValue]));
  return new Map(ids.map((id) => [id, byZone.get(id) ?? 0]));
}

/**
 * Share of the zone-wide total, in whole percent.
 */
export function accessibilityShare(value: number | null, total: number): number | null {
  if (value === null || total === 0 || !Number.isFinite(total)) return null;
  return Math.round((value / total) * 100);
}

export function formatShare(share: number | null): string {
  return share === null ? 'N/A' : `${share}%`;
}

/**
 * Signed share of the total for a change, e.g. `+12%` or `-3%`.
 */
export function formatSignedShare(delta: number, total: number): string {
  if (total === 0 || !Number.isFinite(total)) return 'N/A';
  const share = Math.abs(Math.round((delta / total) * 100));
  return `${delta < 0 ? '-' : '+'}${share}%`;
}
