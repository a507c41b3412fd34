import { describe, it, expect } from 'vitest';
import {
  DEFAULT_TIME_SCHEME,
  darkToLight,
  ensureTimeSchemeKeys,
  generateDynamicPalette,
  getColorScale,
  hexToRgb,
  niceNumber,
  rgbToHex,
} from '../color-scale.js';

describe('color-scale', () => {
  describe('getColorScale', () => {
    it('returns the palette of the requested size', () => {
      expect(getColorScale(4)).toEqual(['#ffffcc', '#ffeda0', '#feb24c', '#fd8d3c']);
      expect(getColorScale(1)).toEqual(['#fd8d3c']);
    });

    it('samples the largest palette for more than nine classes', () => {
      const colors = getColorScale(12);
      expect(colors).toHaveLength(12);
      expect(colors[0]).toBe('#ffffcc');
      expect(colors[11]).toBe('#800026');
    });

    it('returns nothing for zero classes', () => {
      expect(getColorScale(0)).toEqual([]);
    });
  });

  describe('niceNumber', () => {
    it('rounds to three significant digits', () => {
      expect(niceNumber(123456)).toBe(123000);
      expect(niceNumber(1234.5)).toBe(1230);
      expect(niceNumber(1000000)).toBe(1000000);
    });

    it('rounds small values to whole numbers', () => {
      expect(niceNumber(1.25)).toBe(1);
      expect(niceNumber(7.5)).toBe(8);
      expect(niceNumber(13.75)).toBe(14);
      expect(niceNumber(999)).toBe(999);
      expect(niceNumber(0)).toBe(0);
    });
  });

  describe('time scheme', () => {
    it('fills missing and empty keys from the defaults', () => {
      expect(ensureTimeSchemeKeys({ '0_15': '#ffffff', '15_30': '' })).toEqual({
        ...DEFAULT_TIME_SCHEME,
        '0_15': '#ffffff',
      });
      expect(ensureTimeSchemeKeys(null)).toEqual(DEFAULT_TIME_SCHEME);
    });

    it('orders colors dark to light', () => {
      expect(darkToLight(ensureTimeSchemeKeys())).toEqual([
        '#0d47a1',
        '#1976d2',
        '#42a5f5',
        '#90caf9',
        '#e3f2fd',
      ]);
    });
  });

  describe('hex conversion', () => {
    it('converts between hex and rgb', () => {
      expect(hexToRgb('#0d47a1')).toEqual([13, 71, 161]);
      expect(rgbToHex([13, 71, 161])).toBe('#0d47a1');
    });

    it('rejects invalid colors', () => {
      expect(() => hexToRgb('red')).toThrow('Invalid hex color: red');
    });
  });

  describe('generateDynamicPalette', () => {
    const scheme = ensureTimeSchemeKeys();

    it('takes a subset of the base colors for five or fewer classes', () => {
      expect(generateDynamicPalette(scheme, 3)).toEqual(['#0d47a1', '#1976d2', '#90caf9']);
      expect(generateDynamicPalette(scheme, 5)).toEqual(darkToLight(scheme));
      expect(generateDynamicPalette(scheme, 0)).toEqual([]);
    });

    it('interpolates for more than five classes', () => {
      const colors = generateDynamicPalette(scheme, 9);
      expect(colors).toHaveLength(9);
      expect(colors[0]).toBe('#0d47a1');
      expect(colors[1]).toBe('#135eb9');
      expect(colors[2]).toBe('#1976d2');
      expect(colors[8]).toBe('#e3f2fd');
    });
  });
});
