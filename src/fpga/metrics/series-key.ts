/**
 * Series key helpers
 */

import type { SeriesKey } from '../types/index.js';

export function seriesKey(device: string, field: string): SeriesKey {
  return { device, field };
}

/**
 * Formats a key into its flat id, `<device>-<field>`
 */
export function formatSeriesKey(key: SeriesKey): string {
  return `${key.device}-${key.field}`;
}
