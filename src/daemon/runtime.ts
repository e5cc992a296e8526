/**
 * Daemon runtime wiring.
 *
 * Builds the engine collaborators from a configuration, checks connectivity
 * at startup and runs the cycle scheduler in the foreground until a signal
 * arrives.
 *
 * @module daemon/runtime
 */

import { Logger } from '../engine/logger.js';
import {
  SourceUnavailableError,
  StoreUnavailableError,
  type EngineConfig,
  type MetricsStore,
} from '../engine/types.js';
import { QBittorrentSource } from '../engine/source/qbittorrent.js';
import { MemoryMetricsStore } from '../engine/metrics/memory.js';
import { PostgresMetricsStore } from '../engine/metrics/postgres.js';
import { FsTransferProvider } from '../engine/relocation/transfer.js';
import { StatfsStorageProvider } from '../engine/relocation/storage.js';
import { CycleScheduler } from '../engine/cycle/scheduler.js';
import type { CycleDependencies } from '../engine/cycle/orchestrator.js';
import { isWindows } from '../utils/platform.js';

// =============================================================================
// Types
// =============================================================================

export interface Runtime {
  config: EngineConfig;
  logger: Logger;
  source: QBittorrentSource;
  store: MetricsStore;
  deps: Omit<CycleDependencies, 'events' | 'logger'>;

  /** Release the store and flush logs */
  close(): Promise<void>;
}

export interface RuntimeOptions {
  /** Use this logger instead of one built from config.logging */
  logger?: Logger;
}

// =============================================================================
// Construction
// =============================================================================

/**
 * Build collaborators and verify the client and the store are reachable.
 *
 * @throws {SourceUnavailableError} When qBittorrent rejects the login
 * @throws {StoreUnavailableError} When the metrics database is unreachable
 */
export async function createRuntime(config: EngineConfig, options: RuntimeOptions = {}): Promise<Runtime> {
  const logger = options.logger ?? new Logger({ level: config.logging.level, file: config.logging.file });
  const roots = { cache: config.cachePath, master: config.masterPath };

  const source = new QBittorrentSource(config.client, roots, { logger: logger.child({ component: 'source' }) });

  let store: MetricsStore;
  if (config.database) {
    const postgres = PostgresMetricsStore.connect(config.database);
    try {
      await postgres.init();
    } catch (err) {
      await postgres.close().catch((closeErr: unknown) => {
        logger.warn('failed to close metrics pool', { error: (closeErr as Error).message });
      });
      throw err;
    }
    store = postgres;
    logger.info('metrics store ready', { backend: 'postgres', host: config.database.host });
  } else {
    store = new MemoryMetricsStore();
    logger.warn('metrics kept in memory, history is lost on restart');
  }

  try {
    await source.login();
  } catch (err) {
    await store.close();
    throw err;
  }

  return {
    config,
    logger,
    source,
    store,
    deps: {
      source,
      store,
      storage: new StatfsStorageProvider(roots),
      transfer: new FsTransferProvider(),
    },
    async close(): Promise<void> {
      await store.close();
      await logger.flush();
    },
  };
}

/**
 * Whether an error is one of the expected startup failures
 */
export function isStartupError(err: unknown): err is SourceUnavailableError | StoreUnavailableError {
  return err instanceof SourceUnavailableError || err instanceof StoreUnavailableError;
}

// =============================================================================
// Foreground Daemon
// =============================================================================

/**
 * Run the scheduler until SIGINT/SIGTERM, then stop gracefully.
 *
 * @returns Resolves once the daemon has shut down
 */
export async function runDaemon(runtime: Runtime): Promise<void> {
  const { config, logger } = runtime;

  const scheduler = new CycleScheduler({
    deps: runtime.deps,
    settings: config,
    intervalMs: config.checkIntervalSeconds * 1000,
    logger,
  });

  const stopped = scheduler.waitFor('scheduler:stopped');
  let stopping = false;

  const shutdown = (signal: string): void => {
    if (stopping) return;
    stopping = true;
    logger.info('shutting down', { signal });
    scheduler.stop().catch((err: unknown) => {
      logger.error('shutdown error', { error: (err as Error).message });
    });
  };

  const onSigint = (): void => shutdown('SIGINT');
  const onSigterm = (): void => shutdown('SIGTERM');

  // SIGTERM is not available on Windows, only register on Unix
  if (!isWindows) {
    process.on('SIGTERM', onSigterm);
  }
  process.on('SIGINT', onSigint);

  logger.info('daemon started', {
    dryRun: config.dryRun,
    intervalSeconds: config.checkIntervalSeconds,
    cache: config.cachePath,
    master: config.masterPath,
  });
  scheduler.start();

  try {
    await stopped;
  } finally {
    process.off('SIGINT', onSigint);
    process.off('SIGTERM', onSigterm);
    await runtime.close();
  }
}
