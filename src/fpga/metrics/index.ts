/**
 * Metric Registry Component
 *
 * Chart templates, series keys and device naming.
 */

export * from './definitions.js';
export * from './series-key.js';
export * from './metric-registry.js';
export * from './device-identity-mapper.js';
