/**
 * Attribute registry: display names, units and formatting for zone attributes.
 */
import { listNumericAttributes, type ZoneTable } from '../core/zones.js';

// ============================================================================
// Types
// ============================================================================

export interface AttributeDefinition {
  name: string;
  unit: string;
}

export type AttributeCategory = 'demographic' | 'facilities';

// ============================================================================
// Known attributes
// ============================================================================

export const POPULATION_ATTRIBUTE = 'POP_2024';
export const EMPLOYMENT_ATTRIBUTE = 'Emp 2024';

export const ATTRIBUTE_METADATA: Record<AttributeCategory, Record<string, AttributeDefinition>> = {
  demographic: {
    [EMPLOYMENT_ATTRIBUTE]: { name: 'Jobs', unit: 'jobs' },
    [POPULATION_ATTRIBUTE]: { name: 'Population', unit: 'people' },
  },
  facilities: {
    HEALTH_BLDG: { name: 'Healthcare Facilities', unit: 'facilities' },
    EDU_PRIM24: { name: 'Primary Schools 2024', unit: 'schools' },
    EDU_SEC24: { name: 'Secondary Schools 2024', unit: 'schools' },
    EDU_UNI24: { name: 'Universities 2024', unit: 'schools' },
    EDU_PRIM48: { name: 'Primary Schools 2048', unit: 'schools' },
    EDU_SEC48: { name: 'Secondary Schools 2048', unit: 'schools' },
    EDU_UNI48: { name: 'Universities 2048', unit: 'schools' },
    edu_agg_24: { name: 'Education Facilities 2024', unit: 'facilities' },
    HLT_BLDG: { name: 'Healthcare Buildings', unit: 'facilities' },
  },
};

// Columns never offered for analysis
const EXCLUDED_ATTRIBUTES = new Set(['dev type_2', 'dev_type_2', 'ZONE_ID']);

export function getAttributeDefinition(attribute: string): AttributeDefinition | null {
  for (const category of Object.values(ATTRIBUTE_METADATA)) {
    if (Object.hasOwn(category, attribute)) return category[attribute];
  }
  return null;
}

// ============================================================================
// Formatting
// ============================================================================

const integerFormat = new Intl.NumberFormat('en-US', { maximumFractionDigits: 0 });

/**
 * Thousands-separated value; `N/A` for null.
 */
export function formatAttributeValue(value: number | null): string {
  if (value === null || Number.isNaN(value)) return 'N/A';
  return integerFormat.format(value);
}

export function displayName(attribute: string): string {
  const def = getAttributeDefinition(attribute);
  if (def) return `${def.name} (${def.unit})`;
  return titleCase(attribute.replace(/_/g, ' '));
}

function titleCase(text: string): string {
  return text
    .toLowerCase()
    .replace(/(^|\s)(\S)/g, (_, space: string, ch: string) => space + ch.toUpperCase());
}

/**
 * Attributes available on the zone table: known attributes first (in registry
 * order), then any other numeric column.
 */
export function organizeAvailableAttributes(zones: ZoneTable): {
  attributes: string[];
  displayNames: Record<string, string>;
} {
  const present = new Set(listNumericAttributes(zones));
  const attributes: string[] = [];
  const displayNames: Record<string, string> = {};

  for (const category of Object.values(ATTRIBUTE_METADATA)) {
    for (const attribute of Object.keys(category)) {
      if (present.has(attribute) && !EXCLUDED_ATTRIBUTES.has(attribute)) {
        attributes.push(attribute);
        displayNames[attribute] = displayName(attribute);
      }
    }
  }

  for (const attribute of present) {
    if (Object.hasOwn(displayNames, attribute) || EXCLUDED_ATTRIBUTES.has(attribute)) continue;
    attributes.push(attribute);
    displayNames[attribute] = displayName(attribute);
  }

  return { attributes, displayNames };
}
