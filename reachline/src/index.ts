/**
 * Transit accessibility engine: node-to-zone mapping, skim aggregation,
 * accessibility and time-band calculation, and map classification.
 */
export * from './core/errors.js';
export * from './core/zones.js';
export * from './core/node-zone-mapper.js';
export * from './core/skim-aggregator.js';
export * from './core/accessibility.js';
export * from './core/time-bands.js';
export * from './core/color-scale.js';
export * from './core/classifier.js';
export * from './core/views.js';
export * from './core/analysis.js';
export * from './core/cache.js';
export * from './core/loader.js';
export * from './core/session.js';
export * from './registry/config.js';
export * from './registry/attributes.js';
export * from './utils/stats.js';
