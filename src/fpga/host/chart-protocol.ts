/**
 * Chart Protocol
 *
 * Formats chart definitions and snapshots as the line-oriented text the
 * host agent reads from an external plugin's stdout.
 */

import { formatSeriesKey } from '../metrics/index.js';
import type { ChartDefinition, Snapshot } from '../types/index.js';

export const CHART_TYPE = 'fpga';
export const BASE_PRIORITY = 90000;

function quote(value: string): string {
  return `'${value.replace(/'/g, '"')}'`;
}

/**
 * CHART and DIMENSION lines for one chart
 */
export function formatChartDefinition(
  chart: ChartDefinition,
  priority: number,
  updateEvery: number,
): string[] {
  const { title, units, family, context, chartType } = chart.options;
  const lines = [
    [
      'CHART',
      `${CHART_TYPE}.${chart.id}`,
      "''",
      quote(title),
      quote(units),
      quote(family),
      quote(context),
      chartType,
      String(priority),
      String(updateEvery),
    ].join(' '),
  ];

  for (const dimension of chart.dimensions) {
    lines.push([
      'DIMENSION',
      formatSeriesKey(dimension.key),
      quote(dimension.label),
      dimension.algorithm,
      String(dimension.multiplier ?? 1),
      String(dimension.divisor ?? 1),
    ].join(' '));
  }

  return lines;
}

/**
 * Definitions for every chart, prioritised in reporting order
 */
export function formatChartDefinitions(charts: readonly ChartDefinition[], updateEvery: number): string[] {
  return charts.flatMap((chart, index) => formatChartDefinition(chart, BASE_PRIORITY + index, updateEvery));
}

/**
 * BEGIN/SET/END block for one chart. Values are sent as integers.
 */
export function formatChartValues(chart: ChartDefinition, snapshot: Snapshot): string[] {
  const lines = [`BEGIN ${CHART_TYPE}.${chart.id}`];
  for (const dimension of chart.dimensions) {
    const id = formatSeriesKey(dimension.key);
    lines.push(`SET ${id} = ${Math.round(snapshot[id] ?? 0)}`);
  }
  lines.push('END');
  return lines;
}

export function formatSnapshot(charts: readonly ChartDefinition[], snapshot: Snapshot): string[] {
  return charts.flatMap(chart => formatChartValues(chart, snapshot));
}
