/**
 * Relocation Executor
 *
 * Performs a single relocation operation against the filesystem and the
 * torrent client, sequencing steps so that the client never points at data
 * that is about to disappear and the master copy is never touched:
 *
 *   PROMOTE   copy master -> cache, verify, repoint to cache
 *   RELEGATE  check master copy, repoint to master, delete cache copy
 *   CLEANUP   delete a cache copy the client does not serve from
 *
 * Every removal is confined to paths strictly inside the cache root.
 *
 * @module engine/relocation/executor
 */

import {
  CopyError,
  OperationKind,
  OperationStatus,
  RelocationError,
  type FileEntry,
  type FileTransferProvider,
  type OperationResult,
  type RelocationOperation,
  type TorrentSource,
} from '../types.js';
import { Logger, createSilentLogger } from '../logger.js';
import { isStrictlyInside, type TierRoots } from './paths.js';

// =============================================================================
// Types
// =============================================================================

export interface RelocationExecutorOptions {
  source: TorrentSource;
  transfer: FileTransferProvider;
  roots: TierRoots;
  logger?: Logger;
}

export interface ExecuteOptions {
  /** Simulate and log every step without side effects */
  dryRun: boolean;

  /** Checked before every phase; an abort never interrupts a started step */
  signal?: AbortSignal;
}

// =============================================================================
// Helpers
// =============================================================================

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

/**
 * Compare two inventories by relative path and size.
 *
 * @returns Description of the first mismatch, or null when they match
 */
export function compareInventories(expected: FileEntry[], actual: FileEntry[]): string | null {
  const actualSizes = new Map(actual.map((entry) => [entry.relativePath, entry.size]));

  for (const entry of expected) {
    const size = actualSizes.get(entry.relativePath);
    if (size === undefined) {
      return `missing ${entry.relativePath}`;
    }
    if (size !== entry.size) {
      return `size mismatch for ${entry.relativePath}: expected ${entry.size}, got ${size}`;
    }
  }

  if (actual.length !== expected.length) {
    return `expected ${expected.length} files, found ${actual.length}`;
  }
  return null;
}

// =============================================================================
// RelocationExecutor Class
// =============================================================================

/**
 * Executes relocation operations one at a time
 *
 * @example
 * ```typescript
 * const executor = new RelocationExecutor({ source, transfer, roots, logger });
 * const result = await executor.execute(operation, { dryRun: false });
 * if (result.status === OperationStatus.FAILED) {
 *   console.log(result.error?.message);
 * }
 * ```
 */
export class RelocationExecutor {
  private readonly source: TorrentSource;
  private readonly transfer: FileTransferProvider;
  private readonly roots: TierRoots;
  private readonly logger: Logger;

  constructor(options: RelocationExecutorOptions) {
    this.source = options.source;
    this.transfer = options.transfer;
    this.roots = options.roots;
    this.logger = options.logger ?? createSilentLogger();
  }

  /**
   * Execute one operation. Never throws: failures are reported in the
   * result and the payload is re-evaluated next cycle.
   */
  async execute(operation: RelocationOperation, options: ExecuteOptions): Promise<OperationResult> {
    const log = this.logger.child({
      op: operation.kind,
      id: operation.payloadId,
      name: operation.name,
      dryRun: options.dryRun,
    });

    operation.status = OperationStatus.IN_PROGRESS;

    try {
      if (options.dryRun) {
        this.simulate(operation, log);
      } else {
        switch (operation.kind) {
          case OperationKind.PROMOTE:
            await this.promote(operation, log, options.signal);
            break;
          case OperationKind.RELEGATE:
            await this.relegate(operation, log, options.signal);
            break;
          case OperationKind.CLEANUP:
            await this.cleanup(operation, log, options.signal);
            break;
        }
      }
    } catch (err) {
      const error = toError(err);
      operation.status = OperationStatus.FAILED;
      log.error('operation failed', { error: error.message, errorType: error.name });
      return { operation, status: OperationStatus.FAILED, dryRun: options.dryRun, error };
    }

    operation.status = OperationStatus.COMPLETED;
    log.info(options.dryRun ? 'operation would complete' : 'operation completed');
    return { operation, status: OperationStatus.COMPLETED, dryRun: options.dryRun };
  }

  // ===========================================================================
  // Protocols
  // ===========================================================================

  private simulate(operation: RelocationOperation, log: Logger): void {
    switch (operation.kind) {
      case OperationKind.PROMOTE:
        log.info('would copy', { from: operation.sourcePath, to: operation.destinationPath });
        log.info('would verify copy', { path: operation.destinationPath });
        log.info('would repoint', { location: operation.saveLocation });
        break;
      case OperationKind.RELEGATE:
        log.info('would repoint', { location: operation.saveLocation });
        log.info('would remove cache copy', { path: operation.sourcePath });
        break;
      case OperationKind.CLEANUP:
        log.info('would remove orphaned cache copy', { path: operation.sourcePath });
        break;
    }
  }

  private async promote(
    operation: RelocationOperation,
    log: Logger,
    signal: AbortSignal | undefined
  ): Promise<void> {
    const { sourcePath, destinationPath, saveLocation, payloadId } = operation;

    this.checkAborted(signal, 'copy', destinationPath);
    this.assertInsideCache(destinationPath);

    log.info('copying', { from: sourcePath, to: destinationPath });
    try {
      await this.transfer.copy(sourcePath, destinationPath);
      await this.verifyCopy(sourcePath, destinationPath);
    } catch (err) {
      await this.discardPartialCopy(destinationPath, log);
      throw err;
    }
    log.info('copy verified', { path: destinationPath });

    // The copy stays if we stop here; the next cycle cleans it up as an orphan
    this.checkAborted(signal, 'repoint', saveLocation);

    log.info('repointing', { location: saveLocation });
    try {
      await this.source.setSaveLocation(payloadId, saveLocation);
    } catch (err) {
      log.warn('repoint failed, cache copy left for cleanup', { path: destinationPath });
      throw err;
    }
  }

  private async relegate(
    operation: RelocationOperation,
    log: Logger,
    signal: AbortSignal | undefined
  ): Promise<void> {
    const { sourcePath, destinationPath, saveLocation, payloadId } = operation;

    this.checkAborted(signal, 'repoint', saveLocation);
    this.assertInsideCache(sourcePath);

    if (!(await this.transfer.exists(destinationPath))) {
      throw new RelocationError(
        `Master copy missing at ${destinationPath}, refusing to relegate`,
        destinationPath
      );
    }

    log.info('repointing', { location: saveLocation });
    await this.source.setSaveLocation(payloadId, saveLocation);

    // Client already serves from master; the cache copy becomes an orphan
    this.checkAborted(signal, 'delete', sourcePath);

    log.info('removing cache copy', { path: sourcePath });
    await this.transfer.remove(sourcePath);
  }

  private async cleanup(
    operation: RelocationOperation,
    log: Logger,
    signal: AbortSignal | undefined
  ): Promise<void> {
    this.checkAborted(signal, 'delete', operation.sourcePath);
    this.assertInsideCache(operation.sourcePath);

    log.info('removing orphaned cache copy', { path: operation.sourcePath });
    await this.transfer.remove(operation.sourcePath);
  }

  // ===========================================================================
  // Guards
  // ===========================================================================

  private async verifyCopy(sourcePath: string, destinationPath: string): Promise<void> {
    const [expected, actual] = await Promise.all([
      this.transfer.inventory(sourcePath),
      this.transfer.inventory(destinationPath),
    ]);

    const mismatch = compareInventories(expected, actual);
    if (mismatch) {
      throw new CopyError(`Copy verification failed: ${mismatch}`, destinationPath);
    }
  }

  private async discardPartialCopy(destinationPath: string, log: Logger): Promise<void> {
    try {
      await this.transfer.remove(destinationPath);
    } catch (err) {
      log.error('failed to discard partial copy', {
        path: destinationPath,
        error: toError(err).message,
      });
    }
  }

  private assertInsideCache(target: string): void {
    if (!isStrictlyInside(this.roots.cache, target)) {
      throw new RelocationError(`Refusing to modify ${target}: not inside the cache root`, target);
    }
  }

  private checkAborted(signal: AbortSignal | undefined, phase: string, target: string): void {
    if (signal?.aborted) {
      throw new RelocationError(`Cancelled before ${phase}`, target);
    }
  }
}
