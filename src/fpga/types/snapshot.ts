/**
 * Snapshot
 *
 * The complete set of values reported for one tick, keyed by formatted
 * series id (`<device>-<field>`).
 */

export type Snapshot = Record<string, number>;
