/**
 * Time-band reachability: per origin, how many destination zones fall in each
 * of five consecutive travel-time bands.
 *
 * Band i covers (lower, upper] with lower = (i-1)*w and upper = i*w. Trips longer
 * than 5*w and zero-minute trips belong to no band.
 */
import { ValidationError } from './errors.js';
import type { ZoneSkim } from './skim-aggregator.js';

export const BAND_COUNT = 5;

export interface BandBounds {
  index: number;
  lower: number;
  upper: number;
  /** Column name used by the rendering layer, e.g. `zones_0_15` */
  key: string;
}

export interface BandCount {
  zoneId: number;
  count: number;
}

export interface TimeBandResult extends BandBounds {
  /** Origins with at least one destination in the band, sorted by zone id */
  counts: BandCount[];
}

export type BandCounts = Record<string, number>;

export function bandKey(lower: number, upper: number): string {
  return `zones_${lower}_${upper}`;
}

export function timeBandBounds(bandWidth: number): BandBounds[] {
  if (!Number.isFinite(bandWidth) || bandWidth <= 0) {
    throw new ValidationError(`Band width must be a positive number, got ${bandWidth}`);
  }
  return Array.from({ length: BAND_COUNT }, (_, i) => {
    const lower = i * bandWidth;
    const upper = (i + 1) * bandWidth;
    return { index: i + 1, lower, upper, key: bandKey(lower, upper) };
  });
}

export function calculateTimeBands(skim: ZoneSkim, bandWidth: number): TimeBandResult[] {
  const bounds = timeBandBounds(bandWidth);
  // destinations per band per origin
  const reached = bounds.map(() => new Map<number, Set<number>>());

  for (const entry of skim) {
    const band = bounds.findIndex(
      (b) => entry.travelTime > b.lower && entry.travelTime <= b.upper
    );
    if (band === -1) continue;
    const byOrigin = reached[band];
    let destinations = byOrigin.get(entry.originZone);
    if (!destinations) {
      destinations = new Set();
      byOrigin.set(entry.originZone, destinations);
    }
    destinations.add(entry.destinationZone);
  }

  return bounds.map((b, i) => ({
    ...b,
    counts: [...reached[i]]
      .map(([zoneId, destinations]) => ({ zoneId, count: destinations.size }))
      .sort((x, y) => x.zoneId - y.zoneId),
  }));
}

/**
 * Per zone, a record keyed by band key holding the count (zero when absent).
 */
export function zeroFillTimeBands(
  ids: readonly number[],
  bands: readonly TimeBandResult[]
): Map<number, BandCounts> {
  const lookups = bands.map((b) => ({
    key: b.key,
    byZone: new Map(b.counts.map((c) => [c.zoneId, c.count])),
  }));

  return new Map(
    ids.map((id) => {
      const counts: BandCounts = {};
      for (const { key, byZone } of lookups) {
        counts[key] = byZone.get(id) ?? 0;
      }
      return [id, counts];
    })
  );
}

export function sumBandCounts(counts: BandCounts): number {
  let total = 0;
  for (const value of Object.values(counts)) total += value;
  return total;
}
