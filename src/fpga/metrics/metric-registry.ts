/**
 * Metric Registry
 *
 * Builds the fixed set of charts and series keys for the configured
 * devices, in registration order, and produces the all-zero snapshot
 * every collection cycle starts from.
 */

import { createSubsystemLogger } from '../../logging/subsystem.js';
import {
  BASE_METRICS,
  METRIC_DEFINITIONS,
  TEMP_POWER_METRICS,
  TOTAL_DEVICE,
  UTILISATION_METRICS,
  deviceName,
} from './definitions.js';
import { formatSeriesKey, seriesKey } from './series-key.js';
import type { ChartDefinition, MetricKind, SeriesKey, Snapshot } from '../types/index.js';

export interface RegistryLayout {
  /** Number of physical devices reported at setup */
  deviceCount: number;
  /** Register `pu_stats` and `ddr_stats` per device */
  puDdrStats: boolean;
  /** Register `temps` and `powers` per device */
  tempPower: boolean;
}

export class MetricRegistry {
  private readonly logger = createSubsystemLogger('fpga/registry');
  private readonly charts: ChartDefinition[] = [];
  private readonly keys = new Map<string, SeriesKey>();

  /**
   * Registers one metric group for one device
   */
  register(kind: MetricKind, device: string): ChartDefinition {
    const template = METRIC_DEFINITIONS[kind];
    const chart: ChartDefinition = {
      id: `${device}-${kind}`,
      kind,
      device,
      options: { ...template.options, family: device },
      dimensions: template.dimensions.map(({ field, ...dimension }) => ({
        ...dimension,
        key: seriesKey(device, field),
      })),
    };

    this.charts.push(chart);
    for (const dimension of chart.dimensions) {
      this.keys.set(formatSeriesKey(dimension.key), dimension.key);
    }

    return chart;
  }

  /**
   * Registers every chart for a device layout. The `fpga-total` rollup
   * comes first and only exists for more than one device; it covers the
   * database-sourced groups, never temperature or power.
   */
  registerLayout(layout: RegistryLayout): void {
    if (layout.deviceCount > 1) {
      const totals: MetricKind[] = [
        ...BASE_METRICS,
        ...(layout.puDdrStats ? UTILISATION_METRICS : []),
      ];
      for (const kind of totals) {
        this.register(kind, TOTAL_DEVICE);
      }
    }

    const kinds: MetricKind[] = [
      ...BASE_METRICS,
      ...(layout.puDdrStats ? UTILISATION_METRICS : []),
      ...(layout.tempPower ? TEMP_POWER_METRICS : []),
    ];

    for (let index = 0; index < layout.deviceCount; index++) {
      for (const kind of kinds) {
        this.register(kind, deviceName(index));
      }
    }

    this.logger.info('Metric registry built', {
      deviceCount: layout.deviceCount,
      charts: this.charts.length,
      series: this.keys.size,
    });
  }

  /** Chart ids in reporting order */
  get order(): string[] {
    return this.charts.map(chart => chart.id);
  }

  get definitions(): readonly ChartDefinition[] {
    return this.charts;
  }

  /** Formatted ids of every registered series */
  get seriesIds(): string[] {
    return [...this.keys.keys()];
  }

  /**
   * Returns the registered key for a device/field pair, or undefined when
   * no chart declares it
   */
  lookup(device: string, field: string): SeriesKey | undefined {
    return this.keys.get(formatSeriesKey(seriesKey(device, field)));
  }

  has(device: string, field: string): boolean {
    return this.lookup(device, field) !== undefined;
  }

  /**
   * Builds a fresh snapshot with every registered series set to zero
   */
  createDefaultSnapshot(): Snapshot {
    const snapshot: Snapshot = {};
    for (const id of this.keys.keys()) {
      snapshot[id] = 0;
    }
    return snapshot;
  }
}
