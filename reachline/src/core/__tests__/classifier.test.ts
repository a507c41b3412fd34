import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  accessLevel,
  binIndex,
  classifyByOriginTravelTime,
  classifyDistribution,
  classifyTimeMappingTotals,
  distributionEdges,
  impactLevel,
  travelTimeBoundaries,
} from '../classifier.js';
import { NO_ACCESS_COLOR, NO_DATA_COLOR } from '../color-scale.js';
import { ValidationError } from '../errors.js';
import type { SkimEntry } from '../skim-aggregator.js';
import type { Zone } from '../zones.js';

function zones(...ids: number[]): Zone[] {
  return ids.map((id) => ({ id, attributes: {}, geometry: null }));
}

describe('classifier', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('binIndex', () => {
    const edges = [0, 10, 20, 30];

    it('finds the bin of a value', () => {
      expect(binIndex(5, edges)).toBe(0);
      expect(binIndex(10, edges)).toBe(1);
      expect(binIndex(25, edges)).toBe(2);
    });

    it('clamps values outside the edges', () => {
      expect(binIndex(-5, edges)).toBe(0);
      expect(binIndex(500, edges)).toBe(2);
    });
  });

  describe('classifyDistribution', () => {
    const values = [0, 0, 5, 10, 15, 1000000].map((value, i) => ({ zoneId: i + 1, value }));

    it('builds nice-rounded quantile edges', () => {
      expect(distributionEdges(values.map((v) => v.value))).toEqual([0, 1, 8, 14, 1000000]);
    });

    it('colors and labels each zone by bin', () => {
      const { edges, colors, styles } = classifyDistribution(values);

      expect(edges).toEqual([0, 1, 8, 14, 1000000]);
      expect(colors).toEqual(['#ffffcc', '#ffeda0', '#feb24c', '#fd8d3c']);
      expect(styles[2]).toEqual({ zoneId: 3, value: 5, color: '#ffeda0', label: '1 - 8' });
      expect(styles[3]).toEqual({ zoneId: 4, value: 10, color: '#feb24c', label: '8 - 14' });
      expect(styles[4]).toEqual({ zoneId: 5, value: 15, color: '#fd8d3c', label: '14+' });
      expect(styles[5].label).toBe('14+');
    });

    it('marks zero values as No Access', () => {
      const { styles } = classifyDistribution(values);
      expect(styles[0]).toEqual({ zoneId: 1, value: 0, color: NO_ACCESS_COLOR, label: 'No Access' });
      expect(styles[1].label).toBe('No Access');
    });

    it('keeps edges strictly increasing for constant values', () => {
      const { edges } = classifyDistribution([1, 2, 3].map((zoneId) => ({ zoneId, value: 7 })));
      expect(edges).toEqual([7, 8, 9, 10, 11]);
    });

    it('marks every zone No Access when there are no values', () => {
      const result = classifyDistribution([{ zoneId: 1, value: null }]);
      expect(result.edges).toEqual([]);
      expect(result.styles).toEqual([
        { zoneId: 1, value: null, color: NO_ACCESS_COLOR, label: 'No Access' },
      ]);
    });
  });

  describe('classifyTimeMappingTotals', () => {
    const totals = [0, 10, 20, 30, 40, 50].map((value, i) => ({ zoneId: i + 1, value }));

    it('splits totals into five quantile classes dark to light', () => {
      const { edges, colors, styles } = classifyTimeMappingTotals(totals);

      expect(edges).toEqual([0, 10, 20, 30, 40, 50]);
      expect(colors).toEqual(['#0d47a1', '#1976d2', '#42a5f5', '#90caf9', '#e3f2fd']);
      expect(styles.map((s) => s.label)).toEqual([
        'No Access',
        'Class 2',
        'Class 3',
        'Class 4',
        'Class 5',
        'Class 5',
      ]);
      expect(styles[1].color).toBe('#1976d2');
    });

    it('uses a custom scheme', () => {
      const { colors } = classifyTimeMappingTotals(totals, { '60_plus': '#000000' });
      expect(colors[0]).toBe('#000000');
    });

    it('returns an empty classification without values', () => {
      expect(classifyTimeMappingTotals([])).toEqual({ edges: [], colors: [], styles: [] });
    });
  });

  describe('travelTimeBoundaries', () => {
    it('steps by the band width until the maximum is covered', () => {
      expect(travelTimeBoundaries(35, 15)).toEqual([0, 15, 30, 45]);
      expect(travelTimeBoundaries(30, 15)).toEqual([0, 15, 30]);
    });

    it('rejects non-positive widths', () => {
      expect(() => travelTimeBoundaries(30, 0)).toThrow(ValidationError);
    });
  });

  describe('classifyByOriginTravelTime', () => {
    const skim: SkimEntry[] = [
      { originZone: 1, destinationZone: 1, travelTime: 2 },
      { originZone: 1, destinationZone: 2, travelTime: 10 },
      { originZone: 1, destinationZone: 3, travelTime: 35 },
      { originZone: 2, destinationZone: 1, travelTime: 8 },
    ];

    it('classifies destinations by travel time from the origin', () => {
      const { edges, colors, styles } = classifyByOriginTravelTime(zones(1, 2, 3, 4), skim, 1, 15);

      expect(edges).toEqual([0, 15, 30, 45]);
      expect(colors).toEqual(['#0d47a1', '#1976d2', '#90caf9']);
      expect(styles).toEqual([
        { zoneId: 1, value: 2, color: '#0d47a1', label: '0-15 min' },
        { zoneId: 2, value: 10, color: '#0d47a1', label: '0-15 min' },
        { zoneId: 3, value: 35, color: '#90caf9', label: '30+ min' },
        { zoneId: 4, value: null, color: NO_DATA_COLOR, label: 'No data' },
      ]);
    });

    it('uses a single class when every time is equal', () => {
      const single: SkimEntry[] = [{ originZone: 1, destinationZone: 2, travelTime: 10 }];
      const { edges, colors, styles } = classifyByOriginTravelTime(zones(1, 2), single, 1, 15);

      expect(edges).toEqual([10]);
      expect(colors).toEqual(['#0d47a1']);
      expect(styles.map((s) => s.label)).toEqual(['10 min', '10 min']);
    });

    it('colors every zone gray when the origin reaches nothing', () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
      const { styles } = classifyByOriginTravelTime(zones(1, 2), skim, 9, 15);

      expect(styles.every((s) => s.color === NO_DATA_COLOR && s.label === 'No data')).toBe(true);
      expect(warn).toHaveBeenCalledWith('No valid travel times found for origin zone 9');
    });

    it('logs and returns an empty classification when classification fails', () => {
      const error = vi.spyOn(console, 'error').mockImplementation(() => {});

      expect(classifyByOriginTravelTime(zones(1, 2, 3), skim, 1, 0)).toEqual({
        edges: [],
        colors: [],
        styles: [],
      });
      expect(error).toHaveBeenCalledTimes(1);
    });
  });

  describe('accessLevel', () => {
    const column = [10, 20, 30, 0, null];

    it('splits positive values at the 33rd and 67th percentiles', () => {
      expect([10, 20, 30].map((v) => accessLevel(v, column))).toEqual(['Low', 'Medium', 'High']);
    });

    it('treats zero, null and NaN as no access', () => {
      expect(accessLevel(0, column)).toBe('No Access');
      expect(accessLevel(null, column)).toBe('No Access');
      expect(accessLevel(NaN, column)).toBe('No Access');
    });

    it('reports no data when the column has no positive values', () => {
      expect(accessLevel(5, [0, 0, null])).toBe('No Data');
    });
  });

  describe('impactLevel', () => {
    const deltas = [-30, -10, 0, 10, 40];

    it('ranks gains against the 67th percentile of positive deltas', () => {
      expect(impactLevel(40, deltas)).toBe('High Improvement');
      expect(impactLevel(10, deltas)).toBe('Moderate Improvement');
    });

    it('ranks losses against the 33rd percentile of negative deltas', () => {
      expect(impactLevel(-30, deltas)).toBe('High Decrease');
      expect(impactLevel(-10, deltas)).toBe('Moderate Decrease');
    });

    it('labels zero as no change', () => {
      expect(impactLevel(0, deltas)).toBe('No Change');
    });

    it('falls back to a plain direction when no delta shares its sign', () => {
      expect(impactLevel(5, [-1, -2])).toBe('Improvement');
      expect(impactLevel(-5, [1, 2])).toBe('Decrease');
    });
  });
});
