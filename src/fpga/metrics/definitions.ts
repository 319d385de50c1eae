/**
 * Metric Definitions
 *
 * Chart templates for every metric group. Field names match the columns
 * returned by `swarm64da.get_fpga_stats()`, except `temperature` and
 * `power` which come from the vendor tools.
 */

import type { MetricKind, MetricTemplate } from '../types/index.js';

const BYTES_PER_MEGABYTE = 1024 * 1024;

export const METRIC_DEFINITIONS: Readonly<Record<MetricKind, MetricTemplate>> = {
  bytes: {
    kind: 'bytes',
    options: { title: 'Transferred data', units: 'MB/sec', family: 'fpga', context: 'fpga.bytes', chartType: 'line' },
    dimensions: [
      { field: 'host_to_fpga_byte_count', label: 'sent to fpga', algorithm: 'incremental', multiplier: 1, divisor: BYTES_PER_MEGABYTE },
      { field: 'fpga_to_host_byte_count', label: 'received from fpga', algorithm: 'incremental', multiplier: -1, divisor: BYTES_PER_MEGABYTE },
    ],
  },
  jobs: {
    kind: 'jobs',
    options: { title: 'Processed jobs', units: 'Jobs/sec', family: 'fpga', context: 'fpga.jobs', chartType: 'line' },
    dimensions: [
      { field: 'compression_job_count', label: 'compressed jobs', algorithm: 'incremental' },
      { field: 'decompression_job_count', label: 'decompressed jobs', algorithm: 'incremental' },
      { field: 'decompression_and_filter_job_count', label: 'decompressed and filtered jobs', algorithm: 'incremental' },
      { field: 'filter_job_count', label: 'filtered jobs', algorithm: 'incremental' },
    ],
  },
  max: {
    kind: 'max',
    options: { title: 'Max outstanding jobs', units: 'max outstanding', family: 'fpga', context: 'fpga.max', chartType: 'line' },
    dimensions: [
      { field: 'max_outstanding_compression_jobs', label: 'compression', algorithm: 'absolute' },
      { field: 'max_outstanding_decompression_and_filter_jobs', label: 'decompress and filter', algorithm: 'absolute' },
      { field: 'max_outstanding_filter_jobs', label: 'filter', algorithm: 'absolute' },
    ],
  },
  pu_stats: {
    kind: 'pu_stats',
    options: { title: 'PUs utilisation', units: 'PU utilised', family: 'fpga', context: 'fpga.pu_stats', chartType: 'line' },
    dimensions: [
      { field: 'current_pu_utilised_comp_percent', label: 'current compress PUs (%)', algorithm: 'absolute' },
      { field: 'current_pu_utilised_decomp_percent', label: 'current decompress PUs (%)', algorithm: 'absolute' },
      { field: 'avg_pu_utilised_comp_percent', label: 'avg compress PUs (%)', algorithm: 'absolute' },
      { field: 'avg_pu_utilised_decomp_percent', label: 'avg decompress PUs (%)', algorithm: 'absolute' },
      { field: 'max_pu_utilised_comp', label: 'max. compress PUs', algorithm: 'absolute' },
      { field: 'max_pu_utilised_decomp', label: 'max. decompress PUs', algorithm: 'absolute' },
    ],
  },
  ddr_stats: {
    kind: 'ddr_stats',
    options: { title: 'Successful and denied DDR transfers', units: 'Transfers', family: 'fpga', context: 'fpga.ddr_stats', chartType: 'line' },
    dimensions: [
      { field: 'avg_memory_write_transactions_percent', label: 'successful write transfers (%)', algorithm: 'absolute' },
      { field: 'avg_memory_read_transactions_percent', label: 'successful read transfers (%)', algorithm: 'absolute' },
      { field: 'avg_memory_write_denied_percent', label: 'denied write transfers (%)', algorithm: 'absolute' },
      { field: 'avg_memory_read_denied_percent', label: 'denied read transfers (%)', algorithm: 'absolute' },
    ],
  },
  temps: {
    kind: 'temps',
    options: { title: 'FPGA Temperature', units: '°C', family: 'fpga', context: 'fpga.temps', chartType: 'line' },
    dimensions: [
      { field: 'temperature', label: 'degrees Celsius', algorithm: 'absolute' },
    ],
  },
  powers: {
    kind: 'powers',
    options: { title: 'FPGA Power Consumption', units: 'Watts', family: 'fpga', context: 'fpga.powers', chartType: 'line' },
    dimensions: [
      { field: 'power', label: 'total Watts', algorithm: 'absolute' },
    ],
  },
};

/** Groups reported for every device and for the `fpga-total` rollup */
export const BASE_METRICS: readonly MetricKind[] = ['bytes', 'jobs', 'max'];

/** Groups added when `pu_ddr_stats_enable` is set */
export const UTILISATION_METRICS: readonly MetricKind[] = ['pu_stats', 'ddr_stats'];

/** Groups added when `check_temp_power` is set */
export const TEMP_POWER_METRICS: readonly MetricKind[] = ['temps', 'powers'];

/** Synthetic device name under which multi-device totals are reported */
export const TOTAL_DEVICE = 'fpga-total';

/**
 * Local name of the device at the given zero-based index
 */
export function deviceName(index: number): string {
  return `fpga-${index}`;
}
