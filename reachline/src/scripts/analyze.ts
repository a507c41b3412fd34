/**
 * Run one accessibility or time-mapping pass and write the result as JSON.
 *
 * Usage:
 *   npm run analyze --workspace reachline -- \
 *     --config reachline.json \
 *     --mode accessibility \
 *     --threshold 30 \
 *     --attribute "Emp 2024" \
 *     --scenario data/scenario-skim.csv \
 *     --view Difference \
 *     --output out/accessibility.json
 */
import { mkdir, writeFile } from 'node:fs/promises';
import { basename, dirname, extname, resolve } from 'node:path';
import type { AnalysisRequest, AnalysisResult } from '../core/analysis.js';
import { errorMessage } from '../core/errors.js';
import { AnalysisSession } from '../core/session.js';
import { originZones } from '../core/skim-aggregator.js';
import { BASE_VIEW, parseView, viewLabel } from '../core/views.js';
import type { ZoneTable } from '../core/zones.js';
import { organizeAvailableAttributes } from '../registry/attributes.js';
import { loadConfig, type AppConfig } from '../registry/config.js';

type Mode = AnalysisRequest['mode'];

interface CliArgs {
  config: string;
  mode: Mode;
  threshold: number | null;
  attribute: string | null;
  band: number | null;
  origin: number | null;
  scenario: string | null;
  scenarioName: string | null;
  view: string;
  output: string;
}

function usage(): never {
  console.error('Usage: analyze --output <file> [--config <file>] [--mode accessibility|time-mapping] [options]');
  console.error('Options:');
  console.error('  --config        Path to config JSON (default: reachline.json)');
  console.error('  --mode          accessibility or time-mapping (default: accessibility)');
  console.error('  --threshold     Travel time limit in minutes');
  console.error('  --attribute     Zone attribute to sum');
  console.error('  --band          Time band width in minutes');
  console.error('  --origin        Origin zone for travel time coloring');
  console.error('  --scenario      Path to a scenario skim CSV');
  console.error('  --scenario-name Display name of the scenario (default: file name)');
  console.error('  --view          Base Scenario, scenario name, or Difference');
  console.error('  --output        Path to output JSON (required)');
  process.exit(1);
}

function requireValue(flag: string, value: string | undefined): string {
  if (value === undefined || value.startsWith('--')) {
    console.error(`${flag} needs a value`);
    usage();
  }
  return value;
}

function parseNumber(flag: string, value: string | undefined): number {
  const parsed = Number(value);
  if (value === undefined || !Number.isFinite(parsed)) {
    console.error(`${flag} needs a number, got: ${value ?? '(nothing)'}`);
    usage();
  }
  return parsed;
}

function parseMode(value: string | undefined): Mode {
  if (value === 'accessibility' || value === 'time-mapping') return value;
  console.error(`Unknown mode: ${value ?? '(nothing)'}`);
  usage();
}

function parseArgs(): CliArgs {
  const args = process.argv.slice(2);
  const result: CliArgs = {
    config: 'reachline.json',
    mode: 'accessibility',
    threshold: null,
    attribute: null,
    band: null,
    origin: null,
    scenario: null,
    scenarioName: null,
    view: '',
    output: '',
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '--config':
        result.config = requireValue(arg, args[++i]);
        break;
      case '--mode':
        result.mode = parseMode(args[++i]);
        break;
      case '--threshold':
        result.threshold = parseNumber(arg, args[++i]);
        break;
      case '--attribute':
        result.attribute = requireValue(arg, args[++i]);
        break;
      case '--band':
        result.band = parseNumber(arg, args[++i]);
        break;
      case '--origin':
        result.origin = parseNumber(arg, args[++i]);
        break;
      case '--scenario':
        result.scenario = requireValue(arg, args[++i]);
        break;
      case '--scenario-name':
        result.scenarioName = requireValue(arg, args[++i]);
        break;
      case '--view':
        result.view = requireValue(arg, args[++i]);
        break;
      case '--output':
        result.output = requireValue(arg, args[++i]);
        break;
      case '--help':
        return usage();
      default:
        console.error(`Unknown option: ${arg}`);
        usage();
    }
  }

  if (!result.output) usage();

  return result;
}

function buildRequest(args: CliArgs, config: AppConfig): AnalysisRequest {
  if (args.mode === 'time-mapping') {
    return {
      mode: 'time-mapping',
      bandWidth: args.band ?? config.analysis.timeBand,
      originZone: args.origin,
      colorScheme: config.colors.timeMapping,
    };
  }
  return {
    mode: 'accessibility',
    timeThreshold: args.threshold ?? config.analysis.timeThreshold,
    attribute: args.attribute ?? config.analysis.attribute,
    view: parseView(args.view),
  };
}

function checkAttribute(zones: ZoneTable, attribute: string): void {
  const { attributes, displayNames } = organizeAvailableAttributes(zones);
  if (attributes.includes(attribute)) return;

  console.error(`Attribute "${attribute}" is not on the zone table. Available:`);
  for (const name of attributes) {
    console.error(`  ${name} (${displayNames[name]})`);
  }
  process.exit(1);
}

function summarize(result: AnalysisResult): void {
  console.log(`\n${result.title}`);
  console.log(`  Zones: ${result.rows.length}`);
  if (result.mode === 'time-mapping' && result.originSummary) {
    const { zonesReached, population, employment } = result.originSummary;
    console.log(`  Zones reached: ${zonesReached.toLocaleString()}`);
    console.log(`  Population reached: ${population.toLocaleString()}`);
    console.log(`  Jobs reached: ${employment.toLocaleString()}`);
  }
  const { edges, colors } = result.classification;
  if (edges.length > 0) {
    console.log(`  Class edges: ${edges.join(', ')}`);
    console.log(`  Colors: ${colors.join(', ')}`);
  }
}

async function main() {
  const args = parseArgs();

  console.log('Transit Accessibility Analysis');
  console.log('==============================\n');

  const config = await loadConfig(resolve(args.config));
  console.log(`Zones: ${config.dataPaths.zones}`);
  console.log(`Base skim: ${config.dataPaths.baseSkim}`);
  console.log(`Node mapping: ${config.dataPaths.nodeMapping}`);
  console.log(`Cache: ${config.cache.path}\n`);

  const session = await AnalysisSession.open(config);
  try {
    const evicted = session.evictExpired();
    if (evicted > 0) console.log(`Evicted ${evicted} expired cache entries`);

    let snapshot = await session.loadSnapshot();

    if (args.scenario) {
      const path = resolve(args.scenario);
      const name = args.scenarioName ?? basename(path, extname(path));
      const scenario = await session.loadScenario(path, name);
      if (scenario) snapshot = { ...snapshot, scenario };
    }

    const request = buildRequest(args, config);
    if (request.mode === 'accessibility' && request.view.kind !== 'base' && !snapshot.scenario) {
      console.warn(`No scenario loaded, showing ${viewLabel(BASE_VIEW)} instead of ${args.view}`);
      request.view = BASE_VIEW;
    }
    if (request.mode === 'accessibility') {
      checkAttribute(snapshot.zones, request.attribute);
    }
    if (request.mode === 'time-mapping' && request.originZone !== null) {
      if (!originZones(snapshot.baseSkim).includes(request.originZone)) {
        console.warn(`Zone ${request.originZone} has no trips in the base skim`);
      }
    }

    const result = session.analyze(snapshot, request);
    summarize(result);

    const outputPath = resolve(args.output);
    await mkdir(dirname(outputPath), { recursive: true });
    await writeFile(outputPath, JSON.stringify(result, null, 2));
    console.log(`\nWrote ${outputPath}`);
  } finally {
    session.close();
  }
}

main().catch((err: unknown) => {
  console.error(errorMessage(err));
  process.exit(1);
});
