/**
 * Skim aggregation: node-level travel times to zone-level travel times.
 *
 * Both endpoints are translated through the node mapping and all node pairs
 * sharing a zone pair are averaged. Rows that cannot be used (unreachable
 * sentinel, malformed time, unmapped node) are dropped and counted.
 */
import type { NodeZoneMapper } from './node-zone-mapper.js';

// ============================================================================
// Types
// ============================================================================

export interface RawSkimRow {
  originNode: number;
  destinationNode: number;
  travelTime: number | string | null;
}

export interface SkimEntry {
  originZone: number;
  destinationZone: number;
  /** Minutes */
  travelTime: number;
}

export type ZoneSkim = readonly SkimEntry[];

export interface AggregationStats {
  inputRows: number;
  unreachableRows: number;
  malformedRows: number;
  unmappedRows: number;
  zonePairs: number;
}

export interface AggregationResult {
  skim: SkimEntry[];
  stats: AggregationStats;
}

export interface AggregateOptions {
  /** Text that marks an unreachable pair in the source file */
  sentinel?: string;
  /** Label used in log lines */
  label?: string;
}

export const DEFAULT_SENTINEL = '--';

export type ParsedTravelTime = number | 'unreachable' | 'malformed';

// ============================================================================
// Parsing
// ============================================================================

export function parseTravelTime(
  value: number | string | null | undefined,
  sentinel = DEFAULT_SENTINEL
): ParsedTravelTime {
  if (value === null || value === undefined) return 'malformed';

  let minutes: number;
  if (typeof value === 'number') {
    minutes = value;
  } else {
    const text = value.trim();
    if (text === sentinel) return 'unreachable';
    if (text === '') return 'malformed';
    minutes = Number(text);
  }

  if (!Number.isFinite(minutes) || minutes < 0) return 'malformed';
  return minutes;
}

// ============================================================================
// Aggregation
// ============================================================================

interface PairAccumulator {
  originZone: number;
  destinationZone: number;
  sum: number;
  count: number;
}

function pairKey(originZone: number, destinationZone: number): string {
  return `${originZone}:${destinationZone}`;
}

export function aggregateSkim(
  rows: Iterable<RawSkimRow>,
  mapper: NodeZoneMapper,
  options: AggregateOptions = {}
): AggregationResult {
  const { sentinel = DEFAULT_SENTINEL, label = 'skim' } = options;
  const pairs = new Map<string, PairAccumulator>();

  let inputRows = 0;
  let unreachableRows = 0;
  let malformedRows = 0;
  let unmappedRows = 0;

  for (const row of rows) {
    inputRows++;

    const minutes = parseTravelTime(row.travelTime, sentinel);
    if (minutes === 'unreachable') {
      unreachableRows++;
      continue;
    }
    if (minutes === 'malformed') {
      malformedRows++;
      continue;
    }

    const originZone = mapper.zoneOf(row.originNode);
    const destinationZone = mapper.zoneOf(row.destinationNode);
    if (originZone === undefined || destinationZone === undefined) {
      unmappedRows++;
      continue;
    }

    const key = pairKey(originZone, destinationZone);
    const acc = pairs.get(key);
    if (acc) {
      acc.sum += minutes;
      acc.count++;
    } else {
      pairs.set(key, { originZone, destinationZone, sum: minutes, count: 1 });
    }
  }

  const skim: SkimEntry[] = [];
  for (const acc of pairs.values()) {
    skim.push({
      originZone: acc.originZone,
      destinationZone: acc.destinationZone,
      travelTime: acc.sum / acc.count,
    });
  }
  skim.sort((a, b) => a.originZone - b.originZone || a.destinationZone - b.destinationZone);

  const stats: AggregationStats = {
    inputRows,
    unreachableRows,
    malformedRows,
    unmappedRows,
    zonePairs: skim.length,
  };

  if (malformedRows > 0 || unmappedRows > 0) {
    console.warn(
      `${label}: dropped ${malformedRows} malformed rows and ${unmappedRows} rows with unmapped nodes`
    );
  }

  return { skim, stats };
}

/**
 * Travel times from one origin, keyed by destination zone.
 */
export function travelTimesFrom(skim: ZoneSkim, originZone: number): Map<number, number> {
  const times = new Map<number, number>();
  for (const entry of skim) {
    if (entry.originZone === originZone) {
      times.set(entry.destinationZone, entry.travelTime);
    }
  }
  return times;
}

export function originZones(skim: ZoneSkim): number[] {
  return [...new Set(skim.map((e) => e.originZone))].sort((a, b) => a - b);
}
