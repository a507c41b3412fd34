/**
 * File loaders for zones (GeoJSON), node mappings and skims (CSV).
 *
 * Loaders only parse; cleaning and aggregation happen downstream. Missing
 * files and missing columns raise DataLoadError.
 */
import { createReadStream } from 'node:fs';
import { readFile, stat } from 'node:fs/promises';
import { createInterface } from 'node:readline';
import type { Geometry } from 'geojson';
import { DataLoadError, errorMessage } from './errors.js';
import type { NodeZoneRow } from './node-zone-mapper.js';
import type { RawSkimRow } from './skim-aggregator.js';
import type { Zone } from './zones.js';

const NODE_COLUMNS = ['node_id', 'id', 'node'];
const ZONE_COLUMNS = ['zone_id', 'taz', 'zone'];

// ============================================================================
// CSV helpers
// ============================================================================

/**
 * Split one CSV line, honoring quoted values that contain commas.
 */
export function parseCSVLine(line: string): string[] {
  const values: string[] = [];
  let current = '';
  let inQuotes = false;

  for (let i = 0; i < line.length; i++) {
    const char = line[i];

    if (char === '"') {
      if (inQuotes && line[i + 1] === '"') {
        current += '"';
        i++;
      } else {
        inQuotes = !inQuotes;
      }
    } else if (char === ',' && !inQuotes) {
      values.push(current.trim());
      current = '';
    } else {
      current += char;
    }
  }
  values.push(current.trim());

  return values;
}

async function ensureReadable(path: string, what: string): Promise<void> {
  try {
    await stat(path);
  } catch (err) {
    throw new DataLoadError(`${what} file (${path}) not found`, path, { cause: err });
  }
}

async function* csvRows(path: string): AsyncGenerator<string[]> {
  const rl = createInterface({
    input: createReadStream(path),
    crlfDelay: Infinity,
  });

  for await (const line of rl) {
    if (!line.trim()) continue;
    yield parseCSVLine(line.replace(/^\uFEFF/, ''));
  }
}

function toNumber(text: string | undefined): number | null {
  if (text === undefined || text.trim() === '') return null;
  const value = Number(text);
  return Number.isFinite(value) ? value : null;
}

function isNodeId(value: number | null): value is number {
  return value !== null && Number.isInteger(value);
}

// ============================================================================
// Skims
// ============================================================================

/**
 * Read a node-level skim: origin node, destination node, travel time. A header
 * row is detected and skipped. Travel time keeps its text so the aggregator can
 * tell the unreachable sentinel from malformed values.
 */
export async function readSkimCsv(path: string): Promise<RawSkimRow[]> {
  await ensureReadable(path, 'Skim');

  const rows: RawSkimRow[] = [];
  let first = true;
  let badRows = 0;

  try {
    for await (const cells of csvRows(path)) {
      const originNode = toNumber(cells[0]);
      const destinationNode = toNumber(cells[1]);

      if (first) {
        first = false;
        if (originNode === null && destinationNode === null) continue;
      }

      if (cells.length < 3 || !isNodeId(originNode) || !isNodeId(destinationNode)) {
        badRows++;
        continue;
      }

      rows.push({ originNode, destinationNode, travelTime: cells[2] });
    }
  } catch (err) {
    throw new DataLoadError(`Failed to read skim ${path}: ${errorMessage(err)}`, path, {
      cause: err,
    });
  }

  if (badRows > 0) {
    console.warn(`${path}: skipped ${badRows} rows without three usable columns`);
  }

  return rows;
}

// ============================================================================
// Node mapping
// ============================================================================

function findColumn(header: string[], candidates: string[]): number {
  const lower = header.map((h) => h.toLowerCase());
  for (const candidate of candidates) {
    const idx = lower.indexOf(candidate);
    if (idx !== -1) return idx;
  }
  return -1;
}

/**
 * Read a node-to-zone mapping CSV. Columns are found by name:
 * `node_id`/`ID`/`NODE` and `zone_id`/`TAZ`/`ZONE`.
 */
export async function readNodeMappingCsv(path: string): Promise<NodeZoneRow[]> {
  await ensureReadable(path, 'Node mapping');

  const rows: NodeZoneRow[] = [];
  let nodeIdx = -1;
  let zoneIdx = -1;
  let header: string[] | null = null;

  try {
    for await (const cells of csvRows(path)) {
      if (!header) {
        header = cells;
        nodeIdx = findColumn(header, NODE_COLUMNS);
        zoneIdx = findColumn(header, ZONE_COLUMNS);
        if (nodeIdx === -1 || zoneIdx === -1) {
          throw new DataLoadError(
            `Node mapping ${path} needs node and zone columns, found: ${header.join(', ')}`,
            path
          );
        }
        continue;
      }

      rows.push({ nodeId: toNumber(cells[nodeIdx]), zoneId: toNumber(cells[zoneIdx]) });
    }
  } catch (err) {
    if (err instanceof DataLoadError) throw err;
    throw new DataLoadError(`Failed to read node mapping ${path}: ${errorMessage(err)}`, path, {
      cause: err,
    });
  }

  if (!header) {
    throw new DataLoadError(`Node mapping ${path} is empty`, path);
  }

  return rows;
}

// ============================================================================
// Zones
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

const GEOMETRY_TYPES = new Set([
  'Point',
  'MultiPoint',
  'LineString',
  'MultiLineString',
  'Polygon',
  'MultiPolygon',
  'GeometryCollection',
]);

function isGeometry(value: unknown): value is Geometry {
  return isRecord(value) && typeof value.type === 'string' && GEOMETRY_TYPES.has(value.type);
}

function numericProperty(value: unknown): number | null | undefined {
  if (value === null) return null;
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

/**
 * Read zones from a GeoJSON FeatureCollection. Each feature needs an integer
 * `ZONE_ID`; numeric properties (or numeric strings) become attributes and
 * geometry passes through untouched.
 */
export async function readZonesGeoJson(path: string): Promise<Zone[]> {
  await ensureReadable(path, 'Zones');

  let parsed: unknown;
  try {
    parsed = JSON.parse(await readFile(path, 'utf-8'));
  } catch (err) {
    throw new DataLoadError(`Failed to parse zones ${path}: ${errorMessage(err)}`, path, {
      cause: err,
    });
  }

  if (!isRecord(parsed) || parsed.type !== 'FeatureCollection' || !Array.isArray(parsed.features)) {
    throw new DataLoadError(`Zones file ${path} is not a GeoJSON FeatureCollection`, path);
  }

  const zones: Zone[] = [];
  const seen = new Set<number>();
  let skipped = 0;

  for (const feature of parsed.features) {
    if (!isRecord(feature)) {
      skipped++;
      continue;
    }
    const props = isRecord(feature.properties) ? feature.properties : {};
    const id = numericProperty(props.ZONE_ID);
    if (id === null || id === undefined || !Number.isInteger(id) || seen.has(id)) {
      skipped++;
      continue;
    }
    seen.add(id);

    const attributes: Record<string, number | null> = {};
    for (const [key, value] of Object.entries(props)) {
      if (key === 'ZONE_ID') continue;
      const numeric = numericProperty(value);
      if (numeric !== undefined) attributes[key] = numeric;
    }

    const geometry = isGeometry(feature.geometry) ? feature.geometry : null;
    zones.push({ id, attributes, geometry });
  }

  if (zones.length === 0) {
    throw new DataLoadError(`Zones file ${path} has no features with a ZONE_ID`, path);
  }
  if (skipped > 0) {
    console.warn(`${path}: skipped ${skipped} features without a unique integer ZONE_ID`);
  }

  return zones;
}
