/**
 * Color palettes and value rounding for map classification.
 */

export const NO_ACCESS_COLOR = '#f0f0f0';
export const NO_ACCESS_LABEL = 'No Access';
export const NO_DATA_COLOR = '#808080';
export const NO_DATA_LABEL = 'No data';

// YlOrRd-like sequential palettes by size
const SEQUENTIAL_PALETTES: Record<number, readonly string[]> = {
  9: ['#ffffcc', '#ffeda0', '#fed976', '#feb24c', '#fd8d3c', '#fc4e2a', '#e31a1c', '#bd0026', '#800026'],
  8: ['#ffffcc', '#ffeda0', '#fed976', '#feb24c', '#fd8d3c', '#fc4e2a', '#e31a1c', '#bd0026'],
  7: ['#ffffcc', '#ffeda0', '#fed976', '#feb24c', '#fd8d3c', '#fc4e2a', '#e31a1c'],
  6: ['#ffffcc', '#ffeda0', '#fed976', '#feb24c', '#fd8d3c', '#fc4e2a'],
  5: ['#ffffcc', '#ffeda0', '#fed976', '#feb24c', '#fd8d3c'],
  4: ['#ffffcc', '#ffeda0', '#feb24c', '#fd8d3c'],
  3: ['#ffffcc', '#feb24c', '#fd8d3c'],
  2: ['#ffffcc', '#fd8d3c'],
  1: ['#fd8d3c'],
};

const FALLBACK_COLOR = '#fd8d3c';

/**
 * `n` colors from the largest palette that fits, sampled evenly when `n` exceeds it.
 */
export function getColorScale(n: number): string[] {
  for (let k = 9; k >= 1; k--) {
    if (n >= k) {
      const palette = SEQUENTIAL_PALETTES[k];
      if (n === 1) return [palette[0]];
      return Array.from({ length: n }, (_, i) => palette[Math.round((i * (k - 1)) / (n - 1))]);
    }
  }
  return Array.from({ length: Math.max(0, n) }, () => FALLBACK_COLOR);
}

/**
 * Round to at most `digits` significant digits (integers below 10^digits are
 * rounded to whole numbers).
 */
export function niceNumber(x: number, digits = 3): number {
  if (x === 0) return 0;
  const exponent = Math.max(0, Math.trunc(Math.log10(Math.abs(x))) - (digits - 1));
  const magnitude = 10 ** exponent;
  return Math.round(x / magnitude) * magnitude;
}

// ============================================================================
// Time mapping scheme
// ============================================================================

export const TIME_SCHEME_KEYS = ['0_15', '15_30', '30_45', '45_60', '60_plus'] as const;

export type TimeSchemeKey = (typeof TIME_SCHEME_KEYS)[number];

export type TimeScheme = Record<TimeSchemeKey, string>;

export const DEFAULT_TIME_SCHEME: Readonly<TimeScheme> = {
  '0_15': '#e3f2fd',
  '15_30': '#90caf9',
  '30_45': '#42a5f5',
  '45_60': '#1976d2',
  '60_plus': '#0d47a1',
};

/**
 * Fill any missing or empty scheme key from the defaults.
 */
export function ensureTimeSchemeKeys(scheme?: Partial<Record<string, unknown>> | null): TimeScheme {
  const merged: TimeScheme = { ...DEFAULT_TIME_SCHEME };
  if (!scheme) return merged;
  for (const key of TIME_SCHEME_KEYS) {
    const value = scheme[key];
    if (typeof value === 'string' && value) merged[key] = value;
  }
  return merged;
}

/**
 * Scheme colors ordered darkest (shortest time) to lightest.
 */
export function darkToLight(scheme: TimeScheme): string[] {
  return [scheme['60_plus'], scheme['45_60'], scheme['30_45'], scheme['15_30'], scheme['0_15']];
}

// ============================================================================
// Gradients
// ============================================================================

export type Rgb = [number, number, number];

export function hexToRgb(hex: string): Rgb {
  const clean = hex.replace(/^#/, '');
  if (!/^[0-9a-fA-F]{6}$/.test(clean)) {
    throw new Error(`Invalid hex color: ${hex}`);
  }
  return [
    parseInt(clean.slice(0, 2), 16),
    parseInt(clean.slice(2, 4), 16),
    parseInt(clean.slice(4, 6), 16),
  ];
}

export function rgbToHex([r, g, b]: Rgb): string {
  return `#${[r, g, b].map((c) => c.toString(16).padStart(2, '0')).join('')}`;
}

/**
 * `numClasses` colors running dark to light across the scheme. Up to five classes
 * take a subset of the base colors; more are linearly interpolated in RGB.
 */
export function generateDynamicPalette(scheme: TimeScheme, numClasses: number): string[] {
  const base = darkToLight(scheme);
  if (numClasses <= 0) return [];

  if (numClasses <= base.length) {
    const step = base.length / numClasses;
    return Array.from({ length: numClasses }, (_, i) => base[Math.trunc(i * step)]);
  }

  const rgb = base.map(hexToRgb);
  return Array.from({ length: numClasses }, (_, i) => {
    const pos = (i * (rgb.length - 1)) / (numClasses - 1);
    const lowerIdx = Math.trunc(pos);
    const upperIdx = Math.min(lowerIdx + 1, rgb.length - 1);
    if (lowerIdx === upperIdx) return rgbToHex(rgb[lowerIdx]);

    const t = pos - lowerIdx;
    const lower = rgb[lowerIdx];
    const upper = rgb[upperIdx];
    const mixed: Rgb = [
      Math.trunc(lower[0] + t * (upper[0] - lower[0])),
      Math.trunc(lower[1] + t * (upper[1] - lower[1])),
      Math.trunc(lower[2] + t * (upper[2] - lower[2])),
    ];
    return rgbToHex(mixed);
  });
}
