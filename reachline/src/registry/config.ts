/**
 * Application configuration: data file locations, analysis defaults, cache
 * lifetimes and color schemes. A JSON file may override any part of the defaults.
 */
import { readFile } from 'node:fs/promises';
import { dirname, isAbsolute, resolve } from 'node:path';
import { ensureTimeSchemeKeys, type TimeScheme } from '../core/color-scale.js';
import { errorMessage } from '../core/errors.js';
import { DEFAULT_SENTINEL } from '../core/skim-aggregator.js';

// ============================================================================
// Types
// ============================================================================

export interface DataPaths {
  zones: string;
  baseSkim: string;
  nodeMapping: string;
}

export interface AnalysisDefaults {
  timeThreshold: number;
  timeBand: number;
  attribute: string;
}

export interface CacheSettings {
  /** Path of the SQLite cache, or `:memory:` */
  path: string;
  /** Loaded zones, mapping and base skim */
  dataTtlHours: number;
  /** Accessibility and time-band results */
  calculationTtlHours: number;
  /** Aggregated scenario skims */
  scenarioTtlHours: number;
}

export interface ColorSchemes {
  timeMapping: TimeScheme;
}

export interface AppConfig {
  dataPaths: DataPaths;
  analysis: AnalysisDefaults;
  cache: CacheSettings;
  colors: ColorSchemes;
  /** Text marking an unreachable pair in skim files */
  unreachableSentinel: string;
  /** Files loaded at once */
  loadConcurrency: number;
}

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULT_CONFIG: AppConfig = {
  dataPaths: {
    zones: 'data/zones.geojson',
    baseSkim: 'data/base-skim.csv',
    nodeMapping: 'data/node-mapping.csv',
  },
  analysis: {
    timeThreshold: 45,
    timeBand: 15,
    attribute: 'Emp 2024',
  },
  cache: {
    path: 'data/cache/artifacts.db',
    dataTtlHours: 2,
    calculationTtlHours: 1,
    scenarioTtlHours: 0.5,
  },
  colors: {
    timeMapping: ensureTimeSchemeKeys(),
  },
  unreachableSentinel: DEFAULT_SENTINEL,
  loadConcurrency: 3,
};

export function hoursToMs(hours: number): number {
  return hours * 60 * 60 * 1000;
}

// ============================================================================
// Loading
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function pickString(source: Record<string, unknown>, key: string, fallback: string): string {
  const value = source[key];
  return typeof value === 'string' && value ? value : fallback;
}

function pickNumber(
  source: Record<string, unknown>,
  key: string,
  fallback: number,
  allowZero = false
): number {
  const value = source[key];
  if (typeof value !== 'number' || !Number.isFinite(value)) return fallback;
  return value > 0 || (allowZero && value === 0) ? value : fallback;
}

function section(source: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = source[key];
  return isRecord(value) ? value : {};
}

/**
 * Merge a parsed JSON object over the defaults. Unknown keys are ignored and
 * values of the wrong type keep their default.
 */
export function mergeConfig(raw: unknown, base: AppConfig = DEFAULT_CONFIG): AppConfig {
  if (!isRecord(raw)) return structuredClone(base);

  const paths = section(raw, 'dataPaths');
  const analysis = section(raw, 'analysis');
  const cache = section(raw, 'cache');
  const colors = section(raw, 'colors');

  return {
    dataPaths: {
      zones: pickString(paths, 'zones', base.dataPaths.zones),
      baseSkim: pickString(paths, 'baseSkim', base.dataPaths.baseSkim),
      nodeMapping: pickString(paths, 'nodeMapping', base.dataPaths.nodeMapping),
    },
    analysis: {
      // Zero counts only destinations reached instantly
      timeThreshold: pickNumber(analysis, 'timeThreshold', base.analysis.timeThreshold, true),
      timeBand: pickNumber(analysis, 'timeBand', base.analysis.timeBand),
      attribute: pickString(analysis, 'attribute', base.analysis.attribute),
    },
    cache: {
      path: pickString(cache, 'path', base.cache.path),
      dataTtlHours: pickNumber(cache, 'dataTtlHours', base.cache.dataTtlHours),
      calculationTtlHours: pickNumber(cache, 'calculationTtlHours', base.cache.calculationTtlHours),
      scenarioTtlHours: pickNumber(cache, 'scenarioTtlHours', base.cache.scenarioTtlHours),
    },
    colors: {
      timeMapping: ensureTimeSchemeKeys({
        ...base.colors.timeMapping,
        ...section(colors, 'timeMapping'),
      }),
    },
    unreachableSentinel: pickString(raw, 'unreachableSentinel', base.unreachableSentinel),
    loadConcurrency: Math.max(
      1,
      Math.floor(pickNumber(raw, 'loadConcurrency', base.loadConcurrency))
    ),
  };
}

/**
 * Resolve relative data and cache paths against a directory.
 */
export function resolvePaths(config: AppConfig, baseDir: string): AppConfig {
  const abs = (p: string) => (isAbsolute(p) || p === ':memory:' ? p : resolve(baseDir, p));
  return {
    ...config,
    dataPaths: {
      zones: abs(config.dataPaths.zones),
      baseSkim: abs(config.dataPaths.baseSkim),
      nodeMapping: abs(config.dataPaths.nodeMapping),
    },
    cache: { ...config.cache, path: abs(config.cache.path) },
  };
}

/**
 * Load configuration from a JSON file. Relative paths inside it resolve
 * against the file's directory. A missing or unreadable file falls back to
 * the defaults, resolved against the same directory.
 */
export async function loadConfig(configPath: string): Promise<AppConfig> {
  const baseDir = dirname(resolve(configPath));

  let text: string;
  try {
    text = await readFile(configPath, 'utf-8');
  } catch {
    console.warn(`Config file ${configPath} not found, using defaults`);
    return resolvePaths(structuredClone(DEFAULT_CONFIG), baseDir);
  }

  try {
    return resolvePaths(mergeConfig(JSON.parse(text)), baseDir);
  } catch (err) {
    console.error(`Error loading config from ${configPath}: ${errorMessage(err)}`);
    return resolvePaths(structuredClone(DEFAULT_CONFIG), baseDir);
  }
}
