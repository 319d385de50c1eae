/**
 * Metric Template Types
 *
 * Static description of one group of related series: display metadata
 * plus the ordered list of dimensions reported under it.
 */

/** Metric groups a device can report */
export type MetricKind =
  | 'bytes'
  | 'jobs'
  | 'max'
  | 'pu_stats'
  | 'ddr_stats'
  | 'temps'
  | 'powers';

/**
 * How the host turns successive values into a plotted point.
 * `incremental` plots the per-second difference, `absolute` the value itself.
 */
export type Algorithm = 'incremental' | 'absolute';

export interface DimensionTemplate {
  /** Column or reading name, e.g. `compression_job_count` */
  field: string;
  /** Human-readable label */
  label: string;
  algorithm: Algorithm;
  /** Sign/scale applied by the host before plotting (defaults to 1) */
  multiplier?: number;
  /** Divisor applied by the host before plotting (defaults to 1) */
  divisor?: number;
}

export interface ChartOptions {
  title: string;
  units: string;
  /** Grouping shown by the host; rewritten to the device name on registration */
  family: string;
  context: string;
  chartType: 'line' | 'area' | 'stacked';
}

export interface MetricTemplate {
  kind: MetricKind;
  options: ChartOptions;
  dimensions: DimensionTemplate[];
}

/** Identifies one reported series */
export interface SeriesKey {
  readonly device: string;
  readonly field: string;
}

/** A registered dimension, bound to the series it reports */
export interface ChartDimension extends Omit<DimensionTemplate, 'field'> {
  key: SeriesKey;
}

/** A template registered for one device */
export interface ChartDefinition {
  /** `<device>-<kind>` */
  id: string;
  kind: MetricKind;
  device: string;
  options: ChartOptions;
  dimensions: ChartDimension[];
}
