import { describe, it, expect } from 'vitest';
import { loadConfigFromEnv, redactConfig } from '../../../src/engine/config/env.js';
import { DEFAULT_CONFIG, mergeWithDefaults } from '../../../src/engine/config/defaults.js';
import { ConfigurationError } from '../../../src/engine/types.js';

const BASE_ENV = {
  QBIT_HOST: 'qbittorrent',
  QBIT_USER: 'admin',
  QBIT_PASS: 'test-secret',
  DB_HOST: 'postgres',
  DB_NAME: 'seedtier',
  DB_USER: 'seedtier',
  DB_PASS: 'test-secret',
  CACHE_PATH: '/cache',
  MASTER_PATH: '/data',
};

function loadError(env: Record<string, string>): ConfigurationError {
  try {
    loadConfigFromEnv(env);
  } catch (err) {
    if (err instanceof ConfigurationError) return err;
    throw err;
  }
  throw new Error('expected a ConfigurationError');
}

describe('loadConfigFromEnv', () => {
  it('should apply defaults to a minimal environment', () => {
    const config = loadConfigFromEnv(BASE_ENV);

    expect(config.client).toEqual({
      host: 'qbittorrent',
      port: 8080,
      username: 'admin',
      password: 'test-secret',
      timeoutMs: 30000,
    });
    expect(config.database).toEqual({
      host: 'postgres',
      port: 5432,
      database: 'seedtier',
      user: 'seedtier',
      password: 'test-secret',
    });
    expect(config.dryRun).toBe(true);
    expect(config.maxOperationsPerCycle).toBe(1);
    expect(config.targetFillPercent).toBe(90);
    expect(config.weights).toEqual({ leechers: 1000, ratio: 200, history: 1 });
    expect(config.emaAlpha).toBe(0.012);
    expect(config.manualCacheCapacityGb).toBeNull();
    expect(config.logging).toEqual({ level: 'info', file: null });
  });

  it('should read overrides', () => {
    const config = loadConfigFromEnv({
      ...BASE_ENV,
      QBIT_PORT: '9090',
      DRY_RUN: 'false',
      MAX_OPERATIONS_PER_CYCLE: '-1',
      CACHE_TARGET_FILL_PERCENT: '75.5',
      WEIGHT_HISTORY: '2.5',
      MANUAL_CACHE_CAPACITY_GB: '500',
      LOG_LEVEL: 'DEBUG',
      LOG_FILE: '~/seedtier.log',
    });

    expect(config.client.port).toBe(9090);
    expect(config.dryRun).toBe(false);
    expect(config.maxOperationsPerCycle).toBe(Number.POSITIVE_INFINITY);
    expect(config.targetFillPercent).toBe(75.5);
    expect(config.weights.history).toBe(2.5);
    expect(config.manualCacheCapacityGb).toBe(500);
    expect(config.logging).toEqual({ level: 'debug', file: '~/seedtier.log' });
  });

  it('should not require database settings for the memory store', () => {
    const env = { ...BASE_ENV, DB_HOST: '', DB_NAME: '', DB_USER: '', DB_PASS: '' };

    expect(loadConfigFromEnv(env, { memoryStore: true }).database).toBeNull();
    expect(loadConfigFromEnv({ ...env, METRICS_STORE: 'memory' }).database).toBeNull();
  });

  it('should report every problem at once', () => {
    const error = loadError({
      QBIT_HOST: 'qbittorrent',
      QBIT_USER: 'admin',
      QBIT_PASS: 'test-secret',
      METRICS_STORE: 'memory',
      CACHE_PATH: '/cache',
      CHECK_INTERVAL_SECONDS: 'hourly',
      CACHE_TARGET_FILL_PERCENT: '120',
      DRY_RUN: 'maybe',
    });

    expect(error.message).toBe(
      'Invalid configuration: ' +
        'MASTER_PATH is required; ' +
        'CHECK_INTERVAL_SECONDS must be an integer, got "hourly"; ' +
        'CACHE_TARGET_FILL_PERCENT must be between 0 and 100, got 120; ' +
        'DRY_RUN must be true or false, got "maybe"'
    );
  });

  it('should reject out-of-range tuning values', () => {
    const error = loadError({
      ...BASE_ENV,
      EMA_ALPHA: '0',
      MANUAL_CACHE_CAPACITY_GB: '0',
      MAX_OPERATIONS_PER_CYCLE: '-2',
      WEIGHT_LEECHERS: '-1',
      LOG_LEVEL: 'verbose',
    });

    expect(error.problems).toEqual([
      'MAX_OPERATIONS_PER_CYCLE must be between -1 and 9007199254740991, got -2',
      'MANUAL_CACHE_CAPACITY_GB must be greater than 0',
      'LOG_LEVEL must be one of debug, info, warn, error, got "verbose"',
      'EMA_ALPHA must be greater than 0',
      'WEIGHT_LEECHERS must be between 0 and Infinity, got -1',
    ]);
  });

  it('should reject identical tier roots', () => {
    expect(loadError({ ...BASE_ENV, MASTER_PATH: '/cache' }).problems).toEqual([
      'CACHE_PATH and MASTER_PATH must differ',
    ]);
  });
});

describe('redactConfig', () => {
  it('should mask passwords', () => {
    const shown = redactConfig(loadConfigFromEnv(BASE_ENV));

    expect(shown.client.password).toBe('********');
    expect(shown.database?.password).toBe('********');
    expect(shown.client.username).toBe('admin');
  });
});

describe('mergeWithDefaults', () => {
  it('should return an independent copy of the defaults', () => {
    const config = mergeWithDefaults();
    config.weights.leechers = 1;

    expect(DEFAULT_CONFIG.weights.leechers).toBe(1000);
  });

  it('should merge nested sections', () => {
    const config = mergeWithDefaults({ weights: { ratio: 50 }, client: { host: 'qbt' } });

    expect(config.weights).toEqual({ leechers: 1000, ratio: 50, history: 1 });
    expect(config.client.host).toBe('qbt');
    expect(config.client.port).toBe(8080);
  });
});
