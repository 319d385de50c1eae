/**
 * FPGA Stats Collector - Type Definitions
 *
 * This module exports all TypeScript interfaces and types for the collector.
 */

export * from './metric-template.js';
export * from './collector-config.js';
export * from './snapshot.js';
