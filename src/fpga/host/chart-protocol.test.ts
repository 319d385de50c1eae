/**
 * Chart Protocol Tests
 */

import { describe, it, expect, vi } from 'vitest';
import {
  formatChartDefinition,
  formatChartDefinitions,
  formatChartValues,
  formatSnapshot,
} from './chart-protocol.js';
import { MetricRegistry } from '../metrics/index.js';
import type { ChartDefinition, MetricKind } from '../types/index.js';

vi.mock('../../logging/subsystem.js', () => ({
  createSubsystemLogger: vi.fn(() => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    debug: vi.fn(),
  })),
}));

function chartsFor(...kinds: MetricKind[]): readonly ChartDefinition[] {
  const registry = new MetricRegistry();
  for (const kind of kinds) {
    registry.register(kind, 'fpga-0');
  }
  return registry.definitions;
}

describe('formatChartDefinition', () => {
  it('should describe a chart and its dimensions', () => {
    const [bytes] = chartsFor('bytes');

    expect(formatChartDefinition(bytes, 90000, 1)).toEqual([
      "CHART fpga.fpga-0-bytes '' 'Transferred data' 'MB/sec' 'fpga-0' 'fpga.bytes' line 90000 1",
      "DIMENSION fpga-0-host_to_fpga_byte_count 'sent to fpga' incremental 1 1048576",
      "DIMENSION fpga-0-fpga_to_host_byte_count 'received from fpga' incremental -1 1048576",
    ]);
  });

  it('should default multiplier and divisor to 1', () => {
    const [temps] = chartsFor('temps');

    expect(formatChartDefinition(temps, 90005, 5)).toEqual([
      "CHART fpga.fpga-0-temps '' 'FPGA Temperature' '°C' 'fpga-0' 'fpga.temps' line 90005 5",
      "DIMENSION fpga-0-temperature 'degrees Celsius' absolute 1 1",
    ]);
  });

  it('should replace single quotes inside quoted values', () => {
    const chart: ChartDefinition = {
      id: 'fpga-0-powers',
      kind: 'powers',
      device: 'fpga-0',
      options: { title: "Card's power", units: 'Watts', family: 'fpga-0', context: 'fpga.powers', chartType: 'line' },
      dimensions: [{ key: { device: 'fpga-0', field: 'power' }, label: 'total', algorithm: 'absolute' }],
    };

    expect(formatChartDefinition(chart, 90000, 1)[0]).toBe(
      "CHART fpga.fpga-0-powers '' 'Card\"s power' 'Watts' 'fpga-0' 'fpga.powers' line 90000 1",
    );
  });
});

describe('formatChartDefinitions', () => {
  it('should raise the priority once per chart in order', () => {
    const lines = formatChartDefinitions(chartsFor('bytes', 'jobs', 'max'), 1);

    expect(lines.filter(line => line.startsWith('CHART'))).toEqual([
      "CHART fpga.fpga-0-bytes '' 'Transferred data' 'MB/sec' 'fpga-0' 'fpga.bytes' line 90000 1",
      "CHART fpga.fpga-0-jobs '' 'Processed jobs' 'Jobs/sec' 'fpga-0' 'fpga.jobs' line 90001 1",
      "CHART fpga.fpga-0-max '' 'Max outstanding jobs' 'max outstanding' 'fpga-0' 'fpga.max' line 90002 1",
    ]);
    expect(lines).toHaveLength(3 + 2 + 4 + 3);
  });
});

describe('formatChartValues', () => {
  it('should write one rounded SET per dimension', () => {
    const [max] = chartsFor('max');

    expect(formatChartValues(max, {
      'fpga-0-max_outstanding_compression_jobs': 69.5,
      'fpga-0-max_outstanding_decompression_and_filter_jobs': 2.4,
    })).toEqual([
      'BEGIN fpga.fpga-0-max',
      'SET fpga-0-max_outstanding_compression_jobs = 70',
      'SET fpga-0-max_outstanding_decompression_and_filter_jobs = 2',
      'SET fpga-0-max_outstanding_filter_jobs = 0',
      'END',
    ]);
  });
});

describe('formatSnapshot', () => {
  it('should write a block per chart', () => {
    const charts = chartsFor('temps', 'powers');

    expect(formatSnapshot(charts, { 'fpga-0-temperature': 55, 'fpga-0-power': 30 })).toEqual([
      'BEGIN fpga.fpga-0-temps',
      'SET fpga-0-temperature = 55',
      'END',
      'BEGIN fpga.fpga-0-powers',
      'SET fpga-0-power = 30',
      'END',
    ]);
  });
});
