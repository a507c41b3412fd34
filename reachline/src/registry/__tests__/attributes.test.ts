import { describe, it, expect } from 'vitest';
import {
  displayName,
  formatAttributeValue,
  getAttributeDefinition,
  organizeAvailableAttributes,
} from '../attributes.js';
import type { Zone } from '../../core/zones.js';

describe('attributes', () => {
  it('looks up known attributes', () => {
    expect(getAttributeDefinition('Emp 2024')).toEqual({ name: 'Jobs', unit: 'jobs' });
    expect(getAttributeDefinition('HLT_BLDG')).toEqual({
      name: 'Healthcare Buildings',
      unit: 'facilities',
    });
    expect(getAttributeDefinition('parks')).toBeNull();
    expect(getAttributeDefinition('constructor')).toBeNull();
  });

  it('formats values with thousands separators', () => {
    expect(formatAttributeValue(1234567)).toBe('1,234,567');
    expect(formatAttributeValue(12.6)).toBe('13');
    expect(formatAttributeValue(null)).toBe('N/A');
  });

  it('builds display names', () => {
    expect(displayName('POP_2024')).toBe('Population (people)');
    expect(displayName('park_area')).toBe('Park Area');
  });

  it('lists known attributes first and drops excluded columns', () => {
    const zones: Zone[] = [
      {
        id: 1,
        attributes: { park_area: 3, HEALTH_BLDG: 1, dev_type_2: 4, 'Emp 2024': 50 },
        geometry: null,
      },
    ];

    expect(organizeAvailableAttributes(zones)).toEqual({
      attributes: ['Emp 2024', 'HEALTH_BLDG', 'park_area'],
      displayNames: {
        'Emp 2024': 'Jobs (jobs)',
        HEALTH_BLDG: 'Healthcare Facilities (facilities)',
        park_area: 'Park Area',
      },
    });
  });
});
