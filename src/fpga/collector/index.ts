/**
 * Collector Component
 *
 * The collection cycle and its database boundary.
 */

export * from './stats-client.js';
export * from './fpga-stats-collector.js';
