/**
 * FPGA Stats Collector Entry Point
 *
 * Public surface of the collector: configuration loading, the collector
 * itself and the runner that reports to the host agent.
 */

export * from './types/index.js';
export * from './errors.js';
export * from './metrics/index.js';
export * from './vendor-probe/index.js';
export * from './sampling-loop/index.js';
export * from './collector/index.js';
export * from './config/index.js';
export * from './host/index.js';
