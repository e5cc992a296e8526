/**
 * PostgreSQL metrics store.
 *
 * Persists one row per payload in `payload_metrics`. BIGINT columns come
 * back from pg as strings and are converted on read.
 *
 * @module engine/metrics/postgres
 */

import { Pool, type PoolConfig } from 'pg';
import {
  StoreUnavailableError,
  type DatabaseConfig,
  type MetricRecord,
  type MetricsStore,
} from '../types.js';

// =============================================================================
// Types
// =============================================================================

interface MetricRow {
  hash: string;
  smoothed_rate: number | string;
  last_uploaded: number | string;
  last_checked: number | string;
}

/**
 * Subset of the pg Pool the store uses
 */
export interface Queryable {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
  end(): Promise<void>;
}

// =============================================================================
// SQL
// =============================================================================

const CREATE_TABLE = `
  CREATE TABLE IF NOT EXISTS payload_metrics (
    hash          VARCHAR(64) PRIMARY KEY,
    smoothed_rate DOUBLE PRECISION NOT NULL,
    last_uploaded BIGINT NOT NULL,
    last_checked  BIGINT NOT NULL
  )`;

const SELECT_ONE =
  'SELECT hash, smoothed_rate, last_uploaded, last_checked FROM payload_metrics WHERE hash = $1';

const SELECT_ALL = 'SELECT hash, smoothed_rate, last_uploaded, last_checked FROM payload_metrics';

const UPSERT = `
  INSERT INTO payload_metrics (hash, smoothed_rate, last_uploaded, last_checked)
  VALUES ($1, $2, $3, $4)
  ON CONFLICT (hash) DO UPDATE SET
    smoothed_rate = EXCLUDED.smoothed_rate,
    last_uploaded = EXCLUDED.last_uploaded,
    last_checked  = EXCLUDED.last_checked`;

const DELETE_ONE = 'DELETE FROM payload_metrics WHERE hash = $1';

// =============================================================================
// Helpers
// =============================================================================

function isNumeric(value: unknown): value is number | string {
  return typeof value === 'number' || (typeof value === 'string' && value.trim() !== '');
}

function isMetricRow(row: unknown): row is MetricRow {
  if (typeof row !== 'object' || row === null) return false;
  if (!('hash' in row && 'smoothed_rate' in row && 'last_uploaded' in row && 'last_checked' in row)) {
    return false;
  }
  return (
    typeof row.hash === 'string' &&
    isNumeric(row.smoothed_rate) &&
    isNumeric(row.last_uploaded) &&
    isNumeric(row.last_checked)
  );
}

function toRecord(row: MetricRow): MetricRecord {
  return {
    smoothedRate: Number(row.smoothed_rate),
    lastUploaded: Number(row.last_uploaded),
    lastChecked: Number(row.last_checked),
  };
}

/**
 * pg pool settings for a database configuration
 */
export function toPoolConfig(config: DatabaseConfig): PoolConfig {
  return {
    host: config.host,
    port: config.port,
    database: config.database,
    user: config.user,
    password: config.password,
    max: 2,
    connectionTimeoutMillis: 10000,
  };
}

// =============================================================================
// PostgresMetricsStore Class
// =============================================================================

/**
 * MetricsStore backed by PostgreSQL
 *
 * @example
 * ```typescript
 * const store = PostgresMetricsStore.connect(config.database);
 * await store.init();
 * const records = await store.getAll();
 * ```
 */
export class PostgresMetricsStore implements MetricsStore {
  private readonly db: Queryable;

  constructor(db: Queryable) {
    this.db = db;
  }

  /**
   * Create a store with its own connection pool
   */
  static connect(config: DatabaseConfig): PostgresMetricsStore {
    return new PostgresMetricsStore(new Pool(toPoolConfig(config)));
  }

  /**
   * Create the metrics table if it does not exist
   *
   * @throws {StoreUnavailableError} When the database cannot be reached
   */
  async init(): Promise<void> {
    await this.run('initialize metrics table', CREATE_TABLE);
  }

  async get(id: string): Promise<MetricRecord | undefined> {
    const rows = await this.run('read metric', SELECT_ONE, [id]);
    return rows.length > 0 ? toRecord(rows[0]) : undefined;
  }

  async getAll(): Promise<Map<string, MetricRecord>> {
    const rows = await this.run('read metrics', SELECT_ALL);
    return new Map(rows.map((row) => [row.hash, toRecord(row)]));
  }

  async upsert(id: string, record: MetricRecord): Promise<void> {
    await this.run('write metric', UPSERT, [
      id,
      record.smoothedRate,
      Math.round(record.lastUploaded),
      Math.round(record.lastChecked),
    ]);
  }

  async delete(id: string): Promise<void> {
    await this.run('delete metric', DELETE_ONE, [id]);
  }

  async close(): Promise<void> {
    await this.db.end();
  }

  private async run(action: string, text: string, values?: unknown[]): Promise<MetricRow[]> {
    try {
      const result = await this.db.query(text, values);
      return result.rows.filter(isMetricRow);
    } catch (err) {
      throw new StoreUnavailableError(`Failed to ${action}: ${(err as Error).message}`);
    }
  }
}
