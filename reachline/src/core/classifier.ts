/**
 * Classification of zone values into colored, labelled bins for the map legend.
 *
 * - `classifyDistribution`: Sturges-sized quantile bins with nice-rounded edges
 * - `classifyTimeMappingTotals`: five quantile classes over a time scheme
 * - `classifyByOriginTravelTime`: band-width intervals of travel time from one origin
 *
 * Zero and null values are always "No Access". A classifier that throws is
 * logged and degrades to an empty classification (no styling).
 */
import {
  NO_ACCESS_COLOR,
  NO_ACCESS_LABEL,
  NO_DATA_COLOR,
  NO_DATA_LABEL,
  darkToLight,
  ensureTimeSchemeKeys,
  generateDynamicPalette,
  getColorScale,
  niceNumber,
  type TimeScheme,
} from './color-scale.js';
import { errorMessage, ValidationError } from './errors.js';
import { travelTimesFrom, type ZoneSkim } from './skim-aggregator.js';
import type { ZoneTable } from './zones.js';
import { formatAttributeValue } from '../registry/attributes.js';
import {
  forceIncreasing,
  quantile,
  quantiles,
  sortedNumbers,
  sturgesBinCount,
} from '../utils/stats.js';

// ============================================================================
// Types
// ============================================================================

export interface ZoneValue {
  zoneId: number;
  value: number | null;
}

export interface ZoneStyle {
  zoneId: number;
  value: number | null;
  color: string;
  label: string;
}

export interface Classification {
  /** Bin boundaries, one more than the number of colors (empty when unclassified) */
  edges: number[];
  colors: string[];
  styles: ZoneStyle[];
}

export type AccessLevel = 'No Access' | 'No Data' | 'Low' | 'Medium' | 'High';

export type ImpactLevel =
  | 'No Change'
  | 'High Improvement'
  | 'Moderate Improvement'
  | 'Improvement'
  | 'High Decrease'
  | 'Moderate Decrease'
  | 'Decrease';

const TIME_MAPPING_QUANTILES = [0, 0.2, 0.4, 0.6, 0.8, 1.0];

// ============================================================================
// Helpers
// ============================================================================

/**
 * Bin for a value given `edges` (length binCount + 1). Values below the
 * first interior edge land in bin 0, values at or above the last interior
 * edge land in the open top bin.
 */
export function binIndex(value: number, edges: readonly number[]): number {
  const binCount = edges.length - 1;
  for (let i = 0; i < binCount - 1; i++) {
    if (value < edges[i + 1]) return i;
  }
  return binCount - 1;
}

function withFallback(name: string, classify: () => Classification): Classification {
  try {
    return classify();
  } catch (err) {
    console.error(`Classification failed (${name}): ${errorMessage(err)}`);
    return { edges: [], colors: [], styles: [] };
  }
}

function noAccessStyle(zoneId: number, value: number | null): ZoneStyle {
  return { zoneId, value, color: NO_ACCESS_COLOR, label: NO_ACCESS_LABEL };
}

// ============================================================================
// Distribution bins
// ============================================================================

export function distributionEdges(values: readonly (number | null)[]): number[] {
  const sorted = sortedNumbers(values);
  if (sorted.length === 0) return [];
  const binCount = sturgesBinCount(sorted.length);
  const steps = Array.from({ length: binCount + 1 }, (_, i) => i / binCount);
  return forceIncreasing(quantiles(sorted, steps).map((q) => niceNumber(q, 3)));
}

export function classifyDistribution(values: readonly ZoneValue[]): Classification {
  return withFallback('distribution', () => {
    const edges = distributionEdges(values.map((v) => v.value));
    if (edges.length === 0) {
      return {
        edges: [],
        colors: [],
        styles: values.map((v) => noAccessStyle(v.zoneId, v.value)),
      };
    }

    const binCount = edges.length - 1;
    const colors = getColorScale(binCount);

    const styles = values.map(({ zoneId, value }): ZoneStyle => {
      if (value === null || value === 0 || Number.isNaN(value)) {
        return noAccessStyle(zoneId, value);
      }
      const bin = binIndex(value, edges);
      const lower = formatAttributeValue(edges[bin]);
      const label =
        bin === binCount - 1
          ? `${lower}+`
          : `${lower} - ${formatAttributeValue(edges[bin + 1])}`;
      return { zoneId, value, color: colors[bin], label };
    });

    return { edges, colors, styles };
  });
}

// ============================================================================
// Time mapping totals
// ============================================================================

export function classifyTimeMappingTotals(
  values: readonly ZoneValue[],
  colorScheme?: Partial<Record<string, unknown>> | null
): Classification {
  return withFallback('time mapping totals', () => {
    const sorted = sortedNumbers(values.map((v) => v.value));
    if (sorted.length === 0) return { edges: [], colors: [], styles: [] };

    const edges = forceIncreasing(quantiles(sorted, TIME_MAPPING_QUANTILES));
    const colors = darkToLight(ensureTimeSchemeKeys(colorScheme));

    const styles = values.map(({ zoneId, value }): ZoneStyle => {
      if (value === null || value === 0 || Number.isNaN(value)) {
        return noAccessStyle(zoneId, value);
      }
      const bin = binIndex(value, edges);
      return { zoneId, value, color: colors[bin], label: `Class ${bin + 1}` };
    });

    return { edges, colors, styles };
  });
}

// ============================================================================
// Travel time from one origin
// ============================================================================

/**
 * Interval boundaries 0, w, 2w, ... up to the first boundary at or above `maxTime`.
 */
export function travelTimeBoundaries(maxTime: number, bandWidth: number): number[] {
  if (!Number.isFinite(bandWidth) || bandWidth <= 0) {
    throw new ValidationError(`Band width must be a positive number, got ${bandWidth}`);
  }
  const boundaries = [0];
  while (boundaries[boundaries.length - 1] < maxTime) {
    boundaries.push(boundaries[boundaries.length - 1] + bandWidth);
  }
  return boundaries;
}

function minutes(value: number): string {
  return value.toFixed(0);
}

export function classifyByOriginTravelTime(
  zones: ZoneTable,
  skim: ZoneSkim,
  originZone: number,
  bandWidth: number,
  colorScheme?: Partial<Record<string, unknown>> | null
): Classification {
  return withFallback('origin travel time', () => {
    const scheme: TimeScheme = ensureTimeSchemeKeys(colorScheme);
    const times = travelTimesFrom(skim, originZone);
    const values = zones.map((z) => ({ zoneId: z.id, value: times.get(z.id) ?? null }));

    const valid = sortedNumbers(values.map((v) => v.value));
    if (valid.length === 0) {
      console.warn(`No valid travel times found for origin zone ${originZone}`);
      return {
        edges: [],
        colors: [],
        styles: values.map(({ zoneId, value }) => ({
          zoneId,
          value,
          color: NO_DATA_COLOR,
          label: NO_DATA_LABEL,
        })),
      };
    }

    const minTime = valid[0];
    const maxTime = valid[valid.length - 1];

    if (maxTime - minTime <= 0) {
      const color = scheme['60_plus'];
      const label = `${minutes(minTime)} min`;
      return {
        edges: [minTime],
        colors: [color],
        styles: values.map(({ zoneId, value }) => ({ zoneId, value, color, label })),
      };
    }

    const edges = travelTimeBoundaries(maxTime, bandWidth);
    const classCount = edges.length - 1;
    const colors = generateDynamicPalette(scheme, classCount);

    const styles = values.map(({ zoneId, value }): ZoneStyle => {
      if (value === null) {
        return { zoneId, value, color: NO_DATA_COLOR, label: NO_DATA_LABEL };
      }
      let cls = classCount - 1;
      for (let i = 0; i < classCount; i++) {
        if (value <= edges[i + 1]) {
          cls = i;
          break;
        }
      }
      const label =
        cls === classCount - 1
          ? `${minutes(edges[cls])}+ min`
          : `${minutes(edges[cls])}-${minutes(edges[cls + 1])} min`;
      return { zoneId, value, color: colors[cls], label };
    });

    return { edges, colors, styles };
  });
}

// ============================================================================
// Zone levels
// ============================================================================

/**
 * Low/Medium/High against the 0.33 and 0.67 quantiles of the positive values
 * in `column`. Zero and null are "No Access".
 */
export function accessLevel(value: number | null, column: readonly (number | null)[]): AccessLevel {
  if (value === null || value === 0 || Number.isNaN(value)) return 'No Access';

  const positive = sortedNumbers(column).filter((v) => v > 0);
  if (positive.length === 0) return 'No Data';

  if (value <= quantile(positive, 0.33)) return 'Low';
  if (value <= quantile(positive, 0.67)) return 'Medium';
  return 'High';
}

/**
 * Size of a change relative to the other changes of the same sign: gains at or
 * above the 0.67 quantile of gains, losses at or below the 0.33 quantile of losses.
 */
export function impactLevel(delta: number, deltas: readonly (number | null)[]): ImpactLevel {
  if (delta === 0 || Number.isNaN(delta)) return 'No Change';

  const sorted = sortedNumbers(deltas);
  if (delta > 0) {
    const gains = sorted.filter((v) => v > 0);
    if (gains.length === 0) return 'Improvement';
    return delta >= quantile(gains, 0.67) ? 'High Improvement' : 'Moderate Improvement';
  }

  const losses = sorted.filter((v) => v < 0);
  if (losses.length === 0) return 'Decrease';
  return delta <= quantile(losses, 0.33) ? 'High Decrease' : 'Moderate Decrease';
}
