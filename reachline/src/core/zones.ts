/**
 * Zone table types and helpers.
 * Zones are treated as immutable snapshots: helpers return new objects.
 */
import type { Geometry } from 'geojson';
import { ValidationError } from './errors.js';
import { mean, standardDeviation } from '../utils/stats.js';

// ============================================================================
// Types
// ============================================================================

export interface Zone {
  id: number;
  attributes: Readonly<Record<string, number | null>>;
  geometry: Geometry | null;
}

export type ZoneTable = readonly Zone[];

// Population, employment and area columns are allowed a wider spread
const WIDE_SPREAD_PATTERN = /Emp|POP|Area/;

// ============================================================================
// Attribute access
// ============================================================================

/**
 * Attribute value with missing and null treated as zero.
 */
export function attributeValue(zone: Zone, attribute: string): number {
  const value = zone.attributes[attribute];
  return value === null || value === undefined || Number.isNaN(value) ? 0 : value;
}

export function attributeTotal(zones: ZoneTable, attribute: string): number {
  let total = 0;
  for (const zone of zones) total += attributeValue(zone, attribute);
  return total;
}

export function zoneIds(zones: ZoneTable): number[] {
  return zones.map((z) => z.id);
}

/**
 * Names of every attribute carried by at least one zone, in first-seen order.
 */
export function listNumericAttributes(zones: ZoneTable): string[] {
  const seen = new Set<string>();
  for (const zone of zones) {
    for (const key of Object.keys(zone.attributes)) seen.add(key);
  }
  return [...seen];
}

export function requireNumericAttribute(zones: ZoneTable, attribute: string): void {
  const present = zones.some((z) => Object.prototype.hasOwnProperty.call(z.attributes, attribute));
  if (!present) {
    throw new ValidationError(`Attribute "${attribute}" is not a numeric zone attribute`);
  }
}

// ============================================================================
// Cleaning
// ============================================================================

/**
 * Clip negative attribute values to zero and log a summary of outliers.
 */
export function cleanZones(zones: ZoneTable): Zone[] {
  const cleaned = zones.map((zone) => {
    const attributes: Record<string, number | null> = {};
    for (const [key, value] of Object.entries(zone.attributes)) {
      attributes[key] = value !== null && value < 0 ? 0 : value;
    }
    return { ...zone, attributes };
  });

  const outliers = countOutliers(cleaned);
  if (outliers.size > 0) {
    let total = 0;
    for (const count of outliers.values()) total += count;
    console.log(
      `Zone validation: ${total} outliers across ${outliers.size} attributes`
    );
  }

  return cleaned;
}

/**
 * Count values above mean + kσ per attribute (k = 4 for wide-spread columns, 3 otherwise).
 */
export function countOutliers(zones: ZoneTable): Map<string, number> {
  const result = new Map<string, number>();

  for (const attribute of listNumericAttributes(zones)) {
    const values: number[] = [];
    for (const zone of zones) {
      const v = zone.attributes[attribute];
      if (v !== null && v !== undefined) values.push(v);
    }
    if (values.length < 2) continue;

    const k = WIDE_SPREAD_PATTERN.test(attribute) ? 4 : 3;
    const threshold = mean(values) + k * standardDeviation(values);
    const count = values.filter((v) => v > threshold).length;
    if (count > 0) result.set(attribute, count);
  }

  return result;
}
