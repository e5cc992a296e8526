/**
 * Default configuration values for the seedtier engine.
 *
 * The defaults are conservative: dry-run is on and only one relocation
 * runs per cycle, so a fresh installation only logs what it would do.
 *
 * @module engine/config/defaults
 */

import type { EngineConfig, PartialEngineConfig } from '../types.js';

/**
 * Default engine configuration.
 *
 * Connection credentials and tier roots have no meaningful default and are
 * left empty; loadConfigFromEnv requires them.
 */
export const DEFAULT_CONFIG: EngineConfig = {
  /** qBittorrent WebUI connection */
  client: {
    host: '',
    port: 8080,
    username: '',
    password: '',
    timeoutMs: 30000,
  },

  /** Metrics database; null keeps metrics in memory */
  database: null,

  cachePath: '',
  masterPath: '',

  /** One hour between cycles */
  checkIntervalSeconds: 3600,

  /** Leave 10% of the cache volume as headroom */
  targetFillPercent: 90,

  /** A single move per cycle keeps I/O on the slow tier bounded */
  maxOperationsPerCycle: 1,

  /** Simulate until explicitly disabled */
  dryRun: true,

  /** Demand dominates, under-seeded swarms get a bonus */
  weights: {
    leechers: 1000,
    ratio: 200,
    history: 1,
  },

  /** Half-life of about 58 cycles */
  emaAlpha: 0.012,

  manualCacheCapacityGb: null,

  /** One week */
  metricGracePeriodSeconds: 7 * 24 * 3600,

  logging: {
    level: 'info',
    file: null,
  },
};

/**
 * Merges a partial configuration with the default configuration.
 *
 * @param partialConfig - Partial configuration to merge
 * @returns Complete configuration with defaults applied
 */
export function mergeWithDefaults(partialConfig?: PartialEngineConfig): EngineConfig {
  if (!partialConfig) {
    return {
      ...DEFAULT_CONFIG,
      client: { ...DEFAULT_CONFIG.client },
      weights: { ...DEFAULT_CONFIG.weights },
      logging: { ...DEFAULT_CONFIG.logging },
    };
  }

  return {
    ...DEFAULT_CONFIG,
    ...partialConfig,
    client: {
      ...DEFAULT_CONFIG.client,
      ...partialConfig.client,
    },
    database: partialConfig.database ? { ...partialConfig.database } : null,
    weights: {
      ...DEFAULT_CONFIG.weights,
      ...partialConfig.weights,
    },
    logging: {
      ...DEFAULT_CONFIG.logging,
      ...partialConfig.logging,
    },
  };
}
