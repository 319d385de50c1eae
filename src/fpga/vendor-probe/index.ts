/**
 * Vendor Probe Component
 *
 * Temperature and power readings from Intel and Xilinx FPGA tools.
 */

export * from './detection.js';
export * from './vendor-probe.js';
