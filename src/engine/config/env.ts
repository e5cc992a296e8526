/**
 * Environment variable configuration loader.
 *
 * Reads every setting from the process environment, applies defaults and
 * validates ranges. All problems are collected and reported together in a
 * single ConfigurationError so a misconfigured container fails once with
 * the full list.
 *
 * @module engine/config/env
 */

import {
  ConfigurationError,
  type DatabaseConfig,
  type EngineConfig,
  type LogLevel,
} from '../types.js';
import { DEFAULT_CONFIG, mergeWithDefaults } from './defaults.js';

// =============================================================================
// Types
// =============================================================================

export type Environment = Record<string, string | undefined>;

export interface EnvLoadOptions {
  /** Keep metrics in memory; database variables are then not required */
  memoryStore?: boolean;
}

// =============================================================================
// Parsing Helpers
// =============================================================================

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

/**
 * Collects problems while reading variables
 */
class EnvReader {
  readonly problems: string[] = [];

  constructor(private readonly env: Environment) {}

  private raw(name: string): string | undefined {
    const value = this.env[name]?.trim();
    return value === undefined || value === '' ? undefined : value;
  }

  required(name: string): string {
    const value = this.raw(name);
    if (value === undefined) {
      this.problems.push(`${name} is required`);
      return '';
    }
    return value;
  }

  optional(name: string): string | undefined {
    return this.raw(name);
  }

  integer(name: string, fallback: number, min: number, max = Number.MAX_SAFE_INTEGER): number {
    const value = this.raw(name);
    if (value === undefined) return fallback;

    if (!/^-?\d+$/.test(value)) {
      this.problems.push(`${name} must be an integer, got "${value}"`);
      return fallback;
    }
    const parsed = Number(value);
    if (parsed < min || parsed > max) {
      this.problems.push(`${name} must be between ${min} and ${max}, got ${parsed}`);
      return fallback;
    }
    return parsed;
  }

  number(name: string, fallback: number, min: number, max = Number.POSITIVE_INFINITY): number {
    const value = this.raw(name);
    if (value === undefined) return fallback;

    const parsed = Number(value);
    if (!Number.isFinite(parsed)) {
      this.problems.push(`${name} must be a number, got "${value}"`);
      return fallback;
    }
    if (parsed < min || parsed > max) {
      this.problems.push(`${name} must be between ${min} and ${max}, got ${parsed}`);
      return fallback;
    }
    return parsed;
  }

  boolean(name: string, fallback: boolean): boolean {
    const value = this.raw(name)?.toLowerCase();
    if (value === undefined) return fallback;

    if (['true', '1', 'yes'].includes(value)) return true;
    if (['false', '0', 'no'].includes(value)) return false;
    this.problems.push(`${name} must be true or false, got "${value}"`);
    return fallback;
  }
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Build the engine configuration from environment variables.
 *
 * @throws {ConfigurationError} Listing every missing or invalid variable
 */
export function loadConfigFromEnv(env: Environment, options: EnvLoadOptions = {}): EngineConfig {
  const read = new EnvReader(env);
  const defaults = DEFAULT_CONFIG;

  const client = {
    host: read.required('QBIT_HOST'),
    port: read.integer('QBIT_PORT', defaults.client.port, 1, 65535),
    username: read.required('QBIT_USER'),
    password: read.required('QBIT_PASS'),
    timeoutMs: read.integer('REQUEST_TIMEOUT_MS', defaults.client.timeoutMs, 1),
  };

  const backend = (read.optional('METRICS_STORE') ?? 'postgres').toLowerCase();
  if (backend !== 'postgres' && backend !== 'memory') {
    read.problems.push(`METRICS_STORE must be postgres or memory, got "${backend}"`);
  }

  let database: DatabaseConfig | null = null;
  if (!options.memoryStore && backend !== 'memory') {
    database = {
      host: read.required('DB_HOST'),
      port: read.integer('DB_PORT', 5432, 1, 65535),
      database: read.required('DB_NAME'),
      user: read.required('DB_USER'),
      password: read.required('DB_PASS'),
    };
  }

  const maxOperations = read.integer('MAX_OPERATIONS_PER_CYCLE', defaults.maxOperationsPerCycle, -1);
  let manualCapacityGb: number | null = null;
  if (read.optional('MANUAL_CACHE_CAPACITY_GB') !== undefined) {
    manualCapacityGb = read.number('MANUAL_CACHE_CAPACITY_GB', 0, 0);
    if (manualCapacityGb === 0) {
      read.problems.push('MANUAL_CACHE_CAPACITY_GB must be greater than 0');
    }
  }

  const level = (read.optional('LOG_LEVEL') ?? defaults.logging.level).toLowerCase();
  const logLevel = LOG_LEVELS.find((candidate) => candidate === level);
  if (!logLevel) {
    read.problems.push(`LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}, got "${level}"`);
  }

  const emaAlpha = read.number('EMA_ALPHA', defaults.emaAlpha, 0, 1);
  if (emaAlpha === 0) {
    read.problems.push('EMA_ALPHA must be greater than 0');
  }

  const config = mergeWithDefaults({
    client,
    database,
    cachePath: read.required('CACHE_PATH'),
    masterPath: read.required('MASTER_PATH'),
    checkIntervalSeconds: read.integer('CHECK_INTERVAL_SECONDS', defaults.checkIntervalSeconds, 1),
    targetFillPercent: read.number('CACHE_TARGET_FILL_PERCENT', defaults.targetFillPercent, 0, 100),
    maxOperationsPerCycle: maxOperations === -1 ? Number.POSITIVE_INFINITY : maxOperations,
    dryRun: read.boolean('DRY_RUN', defaults.dryRun),
    weights: {
      leechers: read.number('WEIGHT_LEECHERS', defaults.weights.leechers, 0),
      ratio: read.number('WEIGHT_RATIO', defaults.weights.ratio, 0),
      history: read.number('WEIGHT_HISTORY', defaults.weights.history, 0),
    },
    emaAlpha,
    manualCacheCapacityGb: manualCapacityGb,
    metricGracePeriodSeconds: read.integer(
      'METRIC_GRACE_PERIOD_SECONDS',
      defaults.metricGracePeriodSeconds,
      0
    ),
    logging: {
      level: logLevel ?? defaults.logging.level,
      file: read.optional('LOG_FILE') ?? null,
    },
  });

  if (config.cachePath && config.masterPath && config.cachePath === config.masterPath) {
    read.problems.push('CACHE_PATH and MASTER_PATH must differ');
  }

  if (read.problems.length > 0) {
    throw new ConfigurationError(read.problems);
  }

  return config;
}

/**
 * Copy of a configuration with secrets masked, for display
 */
export function redactConfig(config: EngineConfig): EngineConfig {
  return {
    ...config,
    client: { ...config.client, password: config.client.password ? '********' : '' },
    database: config.database
      ? { ...config.database, password: config.database.password ? '********' : '' }
      : null,
  };
}
