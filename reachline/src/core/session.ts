/**
 * Analysis session: loads the zone table, node mapping and skims through the
 * artifact cache and runs analysis passes with memoized calculators.
 */
import pLimit from 'p-limit';
import { calculateAccessibility, type AccessibilityEntry } from './accessibility.js';
import {
  runAnalysis,
  type AnalysisRequest,
  type AnalysisResult,
  type AnalysisSnapshot,
  type Calculators,
  type ScenarioSkim,
} from './analysis.js';
import { ArtifactCache, cacheKey, fileCacheKey, getCache } from './cache.js';
import { DataLoadError, errorMessage } from './errors.js';
import { readNodeMappingCsv, readSkimCsv, readZonesGeoJson } from './loader.js';
import { NodeZoneMapper, type NodeZoneRow } from './node-zone-mapper.js';
import { aggregateSkim, type SkimEntry, type ZoneSkim } from './skim-aggregator.js';
import { calculateTimeBands, type TimeBandResult } from './time-bands.js';
import { cleanZones, type Zone, type ZoneTable } from './zones.js';
import { hoursToMs, type AppConfig } from '../registry/config.js';

interface LoadedMapping {
  key: string;
  mapper: NodeZoneMapper;
}

export class AnalysisSession {
  readonly config: AppConfig;
  private readonly cache: ArtifactCache;
  // cache keys of the tables this session handed out
  private readonly skimKeys = new WeakMap<ZoneSkim, string>();
  private readonly zoneKeys = new WeakMap<ZoneTable, string>();

  constructor(config: AppConfig, cache: ArtifactCache) {
    this.config = config;
    this.cache = cache;
  }

  static async open(config: AppConfig): Promise<AnalysisSession> {
    return new AnalysisSession(config, await getCache(config.cache.path));
  }

  close(): void {
    this.cache.close();
  }

  // ==========================================================================
  // Loading
  // ==========================================================================

  private get dataTtl(): number {
    return hoursToMs(this.config.cache.dataTtlHours);
  }

  async loadZones(): Promise<Zone[]> {
    const path = this.config.dataPaths.zones;
    const key = await this.fileKey(path, 'zones');
    const zones = await this.cache.getOrLoad(key, 'zones', this.dataTtl, async () =>
      cleanZones(await readZonesGeoJson(path))
    );
    this.zoneKeys.set(zones, key);
    return zones;
  }

  private async loadMapping(): Promise<LoadedMapping> {
    const path = this.config.dataPaths.nodeMapping;
    const key = await this.fileKey(path, 'node-mapping');
    const rows = await this.cache.getOrLoad<NodeZoneRow[]>(key, 'node-mapping', this.dataTtl, () =>
      readNodeMappingCsv(path)
    );
    return { key, mapper: NodeZoneMapper.fromRows(rows) };
  }

  private async loadSkim(path: string, label: string, ttlMs: number): Promise<SkimEntry[]> {
    const { key: mappingKey, mapper } = await this.loadMapping();
    const sentinel = this.config.unreachableSentinel;
    const key = cacheKey([await this.fileKey(path, 'skim'), mappingKey, sentinel]);

    const skim = await this.cache.getOrLoad(key, 'skim', ttlMs, async () => {
      const rows = await readSkimCsv(path);
      const { skim, stats } = aggregateSkim(rows, mapper, { sentinel, label });
      console.log(
        `${label}: ${stats.inputRows.toLocaleString()} rows -> ${stats.zonePairs.toLocaleString()} zone pairs ` +
          `(${mapper.size.toLocaleString()} nodes in ${mapper.zoneCount.toLocaleString()} zones)`
      );
      return skim;
    });
    this.skimKeys.set(skim, key);
    return skim;
  }

  /**
   * Load zones, node mapping and base skim. Missing files raise DataLoadError.
   */
  async loadSnapshot(): Promise<AnalysisSnapshot> {
    const limit = pLimit(this.config.loadConcurrency);
    const [zones, baseSkim] = await Promise.all([
      limit(() => this.loadZones()),
      limit(() =>
        this.loadSkim(this.config.dataPaths.baseSkim, 'Base scenario', this.dataTtl)
      ),
    ]);
    return { zones, baseSkim, scenario: null };
  }

  /**
   * Load a scenario skim through the same node mapping. A scenario that fails
   * to load is logged and returns null so the base analysis can go on.
   */
  async loadScenario(path: string, name: string): Promise<ScenarioSkim | null> {
    try {
      const skim = await this.loadSkim(
        path,
        `Scenario ${name}`,
        hoursToMs(this.config.cache.scenarioTtlHours)
      );
      return { name, skim };
    } catch (err) {
      if (!(err instanceof DataLoadError)) throw err;
      console.error(`Error loading scenario file ${path}: ${errorMessage(err)}`);
      return null;
    }
  }

  private async fileKey(path: string, kind: string): Promise<string> {
    try {
      return await fileCacheKey(path, [kind]);
    } catch (err) {
      throw new DataLoadError(`${kind} file (${path}) not found`, path, { cause: err });
    }
  }

  // ==========================================================================
  // Calculations
  // ==========================================================================

  /**
   * Calculators memoized in the artifact cache for tables this session loaded.
   */
  get calculators(): Calculators {
    const ttl = hoursToMs(this.config.cache.calculationTtlHours);

    return {
      accessibility: (skim, zones, timeLimit, attribute): AccessibilityEntry[] => {
        const skimKey = this.skimKeys.get(skim);
        const zonesKey = this.zoneKeys.get(zones);
        if (!skimKey || !zonesKey) {
          return calculateAccessibility(skim, zones, timeLimit, attribute);
        }
        return this.cache.getOrCompute(
          cacheKey(['accessibility', skimKey, zonesKey, timeLimit, attribute]),
          'accessibility',
          ttl,
          () => calculateAccessibility(skim, zones, timeLimit, attribute)
        );
      },
      timeBands: (skim, bandWidth): TimeBandResult[] => {
        const skimKey = this.skimKeys.get(skim);
        if (!skimKey) return calculateTimeBands(skim, bandWidth);
        return this.cache.getOrCompute(
          cacheKey(['time-bands', skimKey, bandWidth]),
          'time-bands',
          ttl,
          () => calculateTimeBands(skim, bandWidth)
        );
      },
    };
  }

  analyze(snapshot: AnalysisSnapshot, request: AnalysisRequest): AnalysisResult {
    return runAnalysis(snapshot, request, this.calculators);
  }

  evictExpired(): number {
    return this.cache.evictExpired();
  }
}
