/**
 * Host Integration Component
 *
 * Chart protocol output and the tick loop that drives a collector.
 */

export * from './chart-protocol.js';
export * from './plugin-runner.js';
