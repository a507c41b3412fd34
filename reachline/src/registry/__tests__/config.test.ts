import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { DEFAULT_CONFIG, hoursToMs, loadConfig, mergeConfig, resolvePaths } from '../config.js';

describe('config', () => {
  describe('mergeConfig', () => {
    it('returns the defaults for anything but an object', () => {
      expect(mergeConfig(null)).toEqual(DEFAULT_CONFIG);
      expect(mergeConfig([1, 2])).toEqual(DEFAULT_CONFIG);
    });

    it('overrides individual settings', () => {
      const config = mergeConfig({
        analysis: { timeThreshold: 30 },
        cache: { scenarioTtlHours: 0.25 },
        unreachableSentinel: 'NA',
      });

      expect(config.analysis).toEqual({ timeThreshold: 30, timeBand: 15, attribute: 'Emp 2024' });
      expect(config.cache.scenarioTtlHours).toBe(0.25);
      expect(config.cache.dataTtlHours).toBe(2);
      expect(config.unreachableSentinel).toBe('NA');
    });

    it('keeps defaults for values of the wrong type or sign', () => {
      const config = mergeConfig({
        analysis: { timeThreshold: '30', timeBand: -5, attribute: '' },
        loadConcurrency: 0,
      });

      expect(config.analysis).toEqual(DEFAULT_CONFIG.analysis);
      expect(config.loadConcurrency).toBe(3);
    });

    it('keeps at least one concurrent load for fractional settings', () => {
      expect(mergeConfig({ loadConcurrency: 0.5 }).loadConcurrency).toBe(1);
      expect(mergeConfig({ loadConcurrency: 2.7 }).loadConcurrency).toBe(2);
    });

    it('accepts a zero time threshold', () => {
      const config = mergeConfig({ analysis: { timeThreshold: 0, timeBand: 0 } });

      expect(config.analysis.timeThreshold).toBe(0);
      expect(config.analysis.timeBand).toBe(15);
    });

    it('fills color scheme keys from the defaults', () => {
      const config = mergeConfig({ colors: { timeMapping: { '0_15': '#ffffff' } } });

      expect(config.colors.timeMapping['0_15']).toBe('#ffffff');
      expect(config.colors.timeMapping['60_plus']).toBe('#0d47a1');
    });
  });

  describe('resolvePaths', () => {
    it('resolves relative paths and keeps absolute and in-memory ones', () => {
      const config = resolvePaths(
        mergeConfig({
          dataPaths: { zones: 'zones.geojson', baseSkim: '/data/base.csv' },
          cache: { path: ':memory:' },
        }),
        '/project'
      );

      expect(config.dataPaths).toEqual({
        zones: '/project/zones.geojson',
        baseSkim: '/data/base.csv',
        nodeMapping: '/project/data/node-mapping.csv',
      });
      expect(config.cache.path).toBe(':memory:');
    });
  });

  describe('hoursToMs', () => {
    it('converts hours', () => {
      expect(hoursToMs(0.5)).toBe(30 * 60 * 1000);
    });
  });

  describe('loadConfig', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), 'reachline-config-'));
    });

    afterEach(async () => {
      vi.restoreAllMocks();
      await rm(dir, { recursive: true, force: true });
    });

    it('reads a file and resolves paths against its directory', async () => {
      const path = join(dir, 'reachline.json');
      await writeFile(path, JSON.stringify({ dataPaths: { zones: 'zones.geojson' } }));

      const config = await loadConfig(path);

      expect(config.dataPaths.zones).toBe(join(dir, 'zones.geojson'));
      expect(config.cache.path).toBe(join(dir, 'data/cache/artifacts.db'));
    });

    it('falls back to the defaults for a missing file', async () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
      const path = join(dir, 'missing.json');

      const config = await loadConfig(path);

      expect(config).toEqual(resolvePaths(DEFAULT_CONFIG, dir));
      expect(config.dataPaths.baseSkim).toBe(join(dir, 'data/base-skim.csv'));
      expect(warn).toHaveBeenCalledWith(`Config file ${path} not found, using defaults`);
    });

    it('falls back to the defaults for malformed JSON', async () => {
      const error = vi.spyOn(console, 'error').mockImplementation(() => {});
      const path = join(dir, 'broken.json');
      await writeFile(path, '{ "analysis": ');

      const config = await loadConfig(path);

      expect(config).toEqual(resolvePaths(DEFAULT_CONFIG, dir));
      expect(config.cache.path).toBe(join(dir, 'data/cache/artifacts.db'));
      expect(error).toHaveBeenCalledTimes(1);
    });
  });
});
