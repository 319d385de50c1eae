/**
 * Stats Client
 *
 * The slice of a PostgreSQL client the collector needs, with the pg-backed
 * implementation used in production.
 */

import pg from 'pg';

export interface StatsField {
  name: string;
}

export interface StatsResult {
  rows: Array<Record<string, unknown>>;
  fields: StatsField[];
}

export interface StatsClient {
  connect(): Promise<void>;
  query(sql: string): Promise<StatsResult>;
  end(): Promise<void>;
}

export type StatsClientFactory = (dsn: string) => StatsClient;

export const ENSURE_EXTENSION_SQL = 'CREATE EXTENSION IF NOT EXISTS swarm64da';
export const COUNT_DEVICES_SQL = 'SELECT COUNT(*) FROM swarm64da.get_fpga_stats()';
export const FETCH_STATS_SQL = 'SELECT * FROM swarm64da.get_fpga_stats()';

/**
 * Creates a pg client for the given connection URI. pg runs every
 * statement in autocommit mode unless a transaction is opened.
 */
export const createPgStatsClient: StatsClientFactory = (dsn) => {
  const client = new pg.Client({ connectionString: dsn });

  return {
    connect: () => client.connect(),
    async query(sql: string): Promise<StatsResult> {
      const result = await client.query<Record<string, unknown>>(sql);
      return {
        rows: result.rows,
        fields: result.fields.map(field => ({ name: field.name })),
      };
    },
    end: () => client.end(),
  };
};

/**
 * Converts a column value to a number. pg returns bigint and numeric
 * columns as strings.
 */
export function toMetricValue(value: unknown): number | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value === 'bigint') {
    return Number(value);
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}
