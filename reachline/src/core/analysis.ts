/**
 * One analysis pass: accessibility or time-band values for every zone plus
 * the classification used to color the map.
 *
 * Every function here returns new rows built from one snapshot of zones and
 * skims; nothing is written back onto the zone table.
 */
import {
  accessibilityShare,
  calculateAccessibility,
  formatShare,
  formatSignedShare,
  zeroFillAccessibility,
  type AccessibilityEntry,
} from './accessibility.js';
import {
  accessLevel,
  classifyByOriginTravelTime,
  classifyDistribution,
  classifyTimeMappingTotals,
  impactLevel,
  type AccessLevel,
  type Classification,
  type ImpactLevel,
} from './classifier.js';
import type { TimeScheme } from './color-scale.js';
import { ValidationError } from './errors.js';
import { travelTimesFrom, type ZoneSkim } from './skim-aggregator.js';
import {
  calculateTimeBands,
  sumBandCounts,
  timeBandBounds,
  zeroFillTimeBands,
  type BandBounds,
  type BandCounts,
  type TimeBandResult,
} from './time-bands.js';
import { viewLabel, viewTitle, viewValue, type AnalysisView } from './views.js';
import {
  attributeTotal,
  attributeValue,
  requireNumericAttribute,
  zoneIds,
  type Zone,
  type ZoneTable,
} from './zones.js';
import {
  EMPLOYMENT_ATTRIBUTE,
  POPULATION_ATTRIBUTE,
  getAttributeDefinition,
} from '../registry/attributes.js';

// ============================================================================
// Types
// ============================================================================

export interface ScenarioSkim {
  name: string;
  skim: ZoneSkim;
}

export interface AnalysisSnapshot {
  zones: ZoneTable;
  baseSkim: ZoneSkim;
  scenario: ScenarioSkim | null;
}

export interface AccessibilityRow {
  zoneId: number;
  accessA: number;
  accessAShare: number | null;
  accessAShareLabel: string;
  accessALevel: AccessLevel;
  accessB?: number;
  accessBShare?: number | null;
  accessBShareLabel?: string;
  accessBLevel?: AccessLevel;
  delta?: number;
  /** Signed share of the attribute total, e.g. `+5%` */
  deltaShareLabel?: string;
  impact?: ImpactLevel;
}

export interface TimeBandRow {
  zoneId: number;
  base: BandCounts;
  total: number;
  scenario?: BandCounts;
  scenarioTotal?: number;
}

/**
 * What one origin reaches in the base skim.
 */
export interface OriginSummary {
  originZone: number;
  zonesReached: number;
  population: number;
  employment: number;
}

export type AnalysisRequest =
  | {
      mode: 'accessibility';
      timeThreshold: number;
      attribute: string;
      view: AnalysisView;
    }
  | {
      mode: 'time-mapping';
      bandWidth: number;
      originZone: number | null;
      colorScheme?: Partial<TimeScheme>;
    };

export type AnalysisResult =
  | {
      mode: 'accessibility';
      title: string;
      attribute: string;
      view: AnalysisView;
      rows: AccessibilityRow[];
      classification: Classification;
    }
  | {
      mode: 'time-mapping';
      title: string;
      bandWidth: number;
      originZone: number | null;
      originSummary: OriginSummary | null;
      bands: BandBounds[];
      rows: TimeBandRow[];
      classification: Classification;
    };

/**
 * The calculators an analysis pass runs. A session swaps in memoized versions.
 */
export interface Calculators {
  accessibility(
    skim: ZoneSkim,
    zones: ZoneTable,
    timeLimit: number,
    attribute: string
  ): AccessibilityEntry[];
  timeBands(skim: ZoneSkim, bandWidth: number): TimeBandResult[];
}

export const DIRECT_CALCULATORS: Calculators = {
  accessibility: calculateAccessibility,
  timeBands: calculateTimeBands,
};

// ============================================================================
// Tables
// ============================================================================

export function buildAccessibilityTable(
  zones: ZoneTable,
  attribute: string,
  base: readonly AccessibilityEntry[],
  scenario: readonly AccessibilityEntry[] | null
): AccessibilityRow[] {
  requireNumericAttribute(zones, attribute);
  const ids = zoneIds(zones);
  const total = attributeTotal(zones, attribute);
  const baseValues = zeroFillAccessibility(ids, base);
  const scenarioValues = scenario ? zeroFillAccessibility(ids, scenario) : null;

  const columnA = [...baseValues.values()];
  const columnB = scenarioValues ? [...scenarioValues.values()] : [];
  const deltas = scenarioValues
    ? ids.map((id) => (scenarioValues.get(id) ?? 0) - (baseValues.get(id) ?? 0))
    : [];

  return ids.map((zoneId) => {
    const accessA = baseValues.get(zoneId) ?? 0;
    const accessAShare = accessibilityShare(accessA, total);
    const row: AccessibilityRow = {
      zoneId,
      accessA,
      accessAShare,
      accessAShareLabel: formatShare(accessAShare),
      accessALevel: accessLevel(accessA, columnA),
    };

    if (scenarioValues) {
      const accessB = scenarioValues.get(zoneId) ?? 0;
      const accessBShare = accessibilityShare(accessB, total);
      const delta = accessB - accessA;
      row.accessB = accessB;
      row.accessBShare = accessBShare;
      row.accessBShareLabel = formatShare(accessBShare);
      row.accessBLevel = accessLevel(accessB, columnB);
      row.delta = delta;
      row.deltaShareLabel = formatSignedShare(delta, total);
      row.impact = impactLevel(delta, deltas);
    }

    return row;
  });
}

export function buildTimeBandTable(
  zones: ZoneTable,
  base: readonly TimeBandResult[],
  scenario: readonly TimeBandResult[] | null
): TimeBandRow[] {
  const ids = zoneIds(zones);
  const baseCounts = zeroFillTimeBands(ids, base);
  const scenarioCounts = scenario ? zeroFillTimeBands(ids, scenario) : null;

  return ids.map((zoneId) => {
    const counts = baseCounts.get(zoneId) ?? {};
    const row: TimeBandRow = { zoneId, base: counts, total: sumBandCounts(counts) };

    const scenarioRow = scenarioCounts?.get(zoneId);
    if (scenarioRow) {
      row.scenario = scenarioRow;
      row.scenarioTotal = sumBandCounts(scenarioRow);
    }

    return row;
  });
}

/**
 * Destinations an origin reaches in `skim` and the population and employment
 * in them. Null when the origin has no trips.
 */
export function originSummary(
  zones: ZoneTable,
  skim: ZoneSkim,
  originZone: number
): OriginSummary | null {
  const times = travelTimesFrom(skim, originZone);
  if (times.size === 0) return null;

  const byId = new Map<number, Zone>(zones.map((z) => [z.id, z]));
  let population = 0;
  let employment = 0;
  for (const destination of times.keys()) {
    const zone = byId.get(destination);
    if (!zone) continue;
    population += attributeValue(zone, POPULATION_ATTRIBUTE);
    employment += attributeValue(zone, EMPLOYMENT_ATTRIBUTE);
  }

  return { originZone, zonesReached: times.size, population, employment };
}

// ============================================================================
// Analysis pass
// ============================================================================

function attributeLabel(attribute: string): string {
  return getAttributeDefinition(attribute)?.name ?? attribute;
}

/**
 * Scenario and difference views need the matching scenario in the snapshot.
 */
function checkView(view: AnalysisView, scenario: ScenarioSkim | null): void {
  if (view.kind === 'base') return;
  if (!scenario) {
    throw new ValidationError(`View "${viewLabel(view)}" needs a loaded scenario`);
  }
  if (view.kind === 'scenario' && view.name !== scenario.name) {
    throw new ValidationError(
      `View "${view.name}" does not match the loaded scenario "${scenario.name}"`
    );
  }
}

export function runAnalysis(
  snapshot: AnalysisSnapshot,
  request: AnalysisRequest,
  calculators: Calculators = DIRECT_CALCULATORS
): AnalysisResult {
  const { zones, baseSkim, scenario } = snapshot;

  switch (request.mode) {
    case 'accessibility': {
      const { timeThreshold, attribute, view } = request;
      checkView(view, scenario);
      const base = calculators.accessibility(baseSkim, zones, timeThreshold, attribute);
      const alt = scenario
        ? calculators.accessibility(scenario.skim, zones, timeThreshold, attribute)
        : null;
      const rows = buildAccessibilityTable(zones, attribute, base, alt);
      const classification = classifyDistribution(
        rows.map((row) => ({ zoneId: row.zoneId, value: viewValue(row, view) }))
      );
      return {
        mode: 'accessibility',
        title: viewTitle(view, attributeLabel(attribute)),
        attribute,
        view,
        rows,
        classification,
      };
    }

    case 'time-mapping': {
      const { bandWidth, originZone, colorScheme } = request;
      const bands = timeBandBounds(bandWidth);
      const base = calculators.timeBands(baseSkim, bandWidth);
      const alt = scenario ? calculators.timeBands(scenario.skim, bandWidth) : null;
      const rows = buildTimeBandTable(zones, base, alt);

      const classification =
        originZone === null
          ? classifyTimeMappingTotals(
              rows.map((row) => ({ zoneId: row.zoneId, value: row.total })),
              colorScheme
            )
          : classifyByOriginTravelTime(zones, baseSkim, originZone, bandWidth, colorScheme);

      const title =
        originZone === null
          ? `Zones Reachable within ${bands[bands.length - 1].upper} min`
          : `Travel Time from Zone ${originZone}`;

      return {
        mode: 'time-mapping',
        title,
        bandWidth,
        originZone,
        originSummary: originZone === null ? null : originSummary(zones, baseSkim, originZone),
        bands,
        rows,
        classification,
      };
    }
  }
}
