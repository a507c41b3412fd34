import { describe, it, expect } from 'vitest';
import {
  forceIncreasing,
  mean,
  quantile,
  quantiles,
  sortedNumbers,
  standardDeviation,
  sturgesBinCount,
} from '../stats.js';

describe('stats', () => {
  describe('quantile', () => {
    it('returns exact ranks', () => {
      expect(quantile([1, 2, 3, 4, 5], 0)).toBe(1);
      expect(quantile([1, 2, 3, 4, 5], 0.5)).toBe(3);
      expect(quantile([1, 2, 3, 4, 5], 1)).toBe(5);
    });

    it('interpolates between ranks', () => {
      expect(quantile([1, 2, 3, 4], 0.5)).toBe(2.5);
      expect(quantile([0, 10], 0.25)).toBe(2.5);
    });

    it('handles a single value', () => {
      expect(quantile([7], 0.3)).toBe(7);
    });

    it('throws on empty input', () => {
      expect(() => quantile([], 0.5)).toThrow('quantile of empty array');
    });

    it('maps several quantiles at once', () => {
      expect(quantiles([0, 10, 20, 30, 40], [0, 0.25, 1])).toEqual([0, 10, 40]);
    });
  });

  describe('sturgesBinCount', () => {
    it('clamps small samples to the minimum', () => {
      expect(sturgesBinCount(1)).toBe(4);
      expect(sturgesBinCount(6)).toBe(4);
    });

    it('uses Sturges rule in range', () => {
      expect(sturgesBinCount(20)).toBe(5);
      expect(sturgesBinCount(40)).toBe(6);
    });

    it('clamps large samples to the maximum', () => {
      expect(sturgesBinCount(1000)).toBe(7);
    });
  });

  describe('forceIncreasing', () => {
    it('bumps repeated and decreasing edges', () => {
      expect(forceIncreasing([0, 0, 5, 5, 3])).toEqual([0, 1, 5, 6, 7]);
    });

    it('leaves increasing edges alone and does not mutate input', () => {
      const edges = [1, 2, 3];
      expect(forceIncreasing(edges)).toEqual([1, 2, 3]);
      expect(forceIncreasing(edges)).not.toBe(edges);
    });
  });

  describe('mean and standardDeviation', () => {
    it('computes the mean', () => {
      expect(mean([1, 2, 3, 6])).toBe(3);
      expect(mean([])).toBe(0);
    });

    it('computes the sample standard deviation', () => {
      expect(standardDeviation([1, 3])).toBeCloseTo(Math.SQRT2);
      expect(standardDeviation([5])).toBe(0);
    });
  });

  describe('sortedNumbers', () => {
    it('drops null, undefined and NaN and sorts ascending', () => {
      expect(sortedNumbers([3, null, 1, undefined, NaN, 2])).toEqual([1, 2, 3]);
    });
  });
});
