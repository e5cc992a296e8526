/**
 * Cycle Orchestrator
 *
 * Runs one rebalancing cycle end to end:
 *
 *   FETCH -> SCORE -> PLAN -> RECONCILE -> EXECUTE -> PERSIST -> IDLE
 *
 * Only a FETCH failure ends a cycle early. Every later failure degrades the
 * affected phase and the cycle carries on; nothing here throws for an
 * expected collaborator failure.
 *
 * @module engine/cycle/orchestrator
 */

import {
  CyclePhase,
  OperationKind,
  OperationStatus,
  RelocationError,
  Tier,
  type EngineConfig,
  type FileTransferProvider,
  type MetricRecord,
  type MetricsStore,
  type OperationResult,
  type Payload,
  type PlacementDecision,
  type RejectedEntry,
  type RelocationOperation,
  type StorageStatProvider,
  type TorrentSource,
} from '../types.js';
import type { EngineEventEmitter } from '../events.js';
import { Logger, createSilentLogger } from '../logger.js';
import { scoreAll, updateMetric } from '../scoring/scorer.js';
import { plan, toDecisions, type CapacityPlan } from '../planning/planner.js';
import { cacheCopyCandidates, reconcile } from '../planning/reconciler.js';
import { RelocationExecutor } from '../relocation/executor.js';
import { gbToBytes } from '../relocation/storage.js';
import type { TierRoots } from '../relocation/paths.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Settings a cycle reads from the engine configuration
 */
export type CycleSettings = Pick<
  EngineConfig,
  | 'cachePath'
  | 'masterPath'
  | 'targetFillPercent'
  | 'maxOperationsPerCycle'
  | 'dryRun'
  | 'weights'
  | 'emaAlpha'
  | 'manualCacheCapacityGb'
  | 'metricGracePeriodSeconds'
>;

/**
 * Collaborators of a cycle
 */
export interface CycleDependencies {
  source: TorrentSource;
  store: MetricsStore;
  storage: StorageStatProvider;
  transfer: FileTransferProvider;
  logger?: Logger;
  events?: EngineEventEmitter;

  /** Clock in milliseconds, defaults to Date.now */
  now?: () => number;
}

export interface CycleOptions {
  /** Sequence number, for logs and events */
  cycle: number;
  settings: CycleSettings;

  /** Overrides settings.dryRun */
  dryRun?: boolean;

  /** Overrides settings.maxOperationsPerCycle */
  opBudget?: number;

  /** Stops execution between operations */
  signal?: AbortSignal;

  /** Write metric records in PERSIST, defaults to true */
  persist?: boolean;
}

/**
 * Everything one cycle observed, decided and did
 */
export interface CycleReport {
  cycle: number;
  startedAt: number;
  finishedAt: number;
  dryRun: boolean;

  /** Phase the cycle ended in early, null when it ran through */
  aborted: CyclePhase | null;

  /** Why the cycle ended early */
  error: Error | null;

  /** Execution stopped by the abort signal */
  cancelled: boolean;

  payloads: Payload[];
  rejected: RejectedEntry[];

  /** Cache capacity used for planning, null when it could not be read */
  capacityBytes: number | null;
  plan: CapacityPlan | null;
  decisions: PlacementDecision[];

  /** Operations selected for this cycle, in execution order */
  operations: RelocationOperation[];

  /**
   * Operations held back by the budget or by cancellation. A promotion
   * skipped for space hands its slot to the next deferred promotion.
   */
  deferred: RelocationOperation[];
  unmappable: PlacementDecision[];
  results: OperationResult[];

  /** Metric records written successfully */
  persisted: boolean;

  /** Metric records removed as stale */
  pruned: number;
}

// =============================================================================
// Helpers
// =============================================================================

const DRY_RUN_VERBS: Record<OperationKind, string> = {
  [OperationKind.PROMOTE]: 'would promote',
  [OperationKind.RELEGATE]: 'would relegate',
  [OperationKind.CLEANUP]: 'would clean up',
};

const LIVE_VERBS: Record<OperationKind, string> = {
  [OperationKind.PROMOTE]: 'promoting',
  [OperationKind.RELEGATE]: 'relegating',
  [OperationKind.CLEANUP]: 'cleaning up',
};

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

function emptyReport(cycle: number, startedAt: number, dryRun: boolean): CycleReport {
  return {
    cycle,
    startedAt,
    finishedAt: startedAt,
    dryRun,
    aborted: null,
    error: null,
    cancelled: false,
    payloads: [],
    rejected: [],
    capacityBytes: null,
    plan: null,
    decisions: [],
    operations: [],
    deferred: [],
    unmappable: [],
    results: [],
    persisted: false,
    pruned: 0,
  };
}

/**
 * Bytes the cache holds according to the snapshot, used when the volume
 * cannot be read
 */
function cachedBytes(payloads: readonly Payload[]): number {
  return payloads
    .filter((payload) => payload.tier === Tier.CACHE)
    .reduce((sum, payload) => sum + payload.size, 0);
}

// =============================================================================
// Cycle
// =============================================================================

/**
 * Run one cycle.
 *
 * @example
 * ```typescript
 * const report = await runCycle(
 *   { source, store, storage, transfer, logger },
 *   { cycle: 1, settings: config }
 * );
 * console.log(`${report.results.length} operations, persisted=${report.persisted}`);
 * ```
 */
export async function runCycle(
  deps: CycleDependencies,
  options: CycleOptions
): Promise<CycleReport> {
  const now = deps.now ?? Date.now;
  const { cycle, settings, signal } = options;
  const dryRun = options.dryRun ?? settings.dryRun;
  const opBudget = options.opBudget ?? settings.maxOperationsPerCycle;
  const roots: TierRoots = { cache: settings.cachePath, master: settings.masterPath };
  const log = (deps.logger ?? createSilentLogger()).child({ cycle });
  const events = deps.events;

  const report = emptyReport(cycle, now(), dryRun);
  const enter = (phase: CyclePhase): void => {
    log.debug('phase', { phase });
    events?.emit('cycle:phase', { cycle, phase });
  };

  events?.emit('cycle:started', { cycle });
  log.info('cycle started', { dryRun, budget: opBudget });

  // ---------------------------------------------------------------------------
  // FETCH
  // ---------------------------------------------------------------------------
  enter(CyclePhase.FETCH);
  try {
    const snapshot = await deps.source.listPayloads();
    report.payloads = snapshot.payloads;
    report.rejected = snapshot.rejected;
  } catch (err) {
    report.aborted = CyclePhase.FETCH;
    report.error = toError(err);
    log.error('cycle aborted: torrent source unavailable', { error: errorMessage(err) });
    return finish(report, now, log, events);
  }

  const managed = report.payloads.filter((payload) => payload.tier !== Tier.UNMANAGED);
  log.info('payloads fetched', {
    total: report.payloads.length,
    managed: managed.length,
    rejected: report.rejected.length,
  });

  // ---------------------------------------------------------------------------
  // SCORE
  // ---------------------------------------------------------------------------
  enter(CyclePhase.SCORE);
  let metrics = new Map<string, MetricRecord>();
  let metricsLoaded = true;
  try {
    metrics = await deps.store.getAll();
  } catch (err) {
    metricsLoaded = false;
    log.warn('metrics unavailable, scoring from current rates', { error: errorMessage(err) });
  }
  const scored = scoreAll(managed, metrics, settings.weights);

  // ---------------------------------------------------------------------------
  // PLAN
  // ---------------------------------------------------------------------------
  enter(CyclePhase.PLAN);
  report.capacityBytes = await readCacheCapacity(deps.storage, settings, log);
  report.plan = plan(scored, report.capacityBytes ?? 0, settings.targetFillPercent);
  report.decisions = toDecisions(scored, report.plan.targets);
  log.info('plan ready', {
    capacity: report.capacityBytes,
    budget: report.plan.budgetBytes,
    planned: report.plan.plannedBytes,
  });
  for (const decision of report.decisions) {
    log.debug('decision', {
      id: decision.payload.id,
      score: decision.score,
      current: decision.current,
      target: decision.target,
    });
  }

  // ---------------------------------------------------------------------------
  // RECONCILE
  // ---------------------------------------------------------------------------
  enter(CyclePhase.RECONCILE);
  const cacheCopies = await probeCacheCopies(deps.transfer, report.decisions, roots, log);
  const reconciliation = reconcile(report.decisions, { roots, opBudget, cacheCopies });
  report.operations = reconciliation.operations;
  report.deferred = reconciliation.deferred;
  report.unmappable = reconciliation.unmappable;

  for (const decision of report.unmappable) {
    log.warn('cannot map payload between tier roots', {
      id: decision.payload.id,
      savePath: decision.payload.savePath,
      contentPath: decision.payload.contentPath,
    });
  }
  for (const operation of report.operations) {
    log.info((dryRun ? DRY_RUN_VERBS : LIVE_VERBS)[operation.kind], {
      id: operation.payloadId,
      name: operation.name,
      score: operation.score,
      size: operation.size,
    });
  }
  for (const operation of report.deferred) {
    log.info('deferred by operation budget', { op: operation.kind, id: operation.payloadId });
  }

  // ---------------------------------------------------------------------------
  // EXECUTE
  // ---------------------------------------------------------------------------
  enter(CyclePhase.EXECUTE);
  const executor = new RelocationExecutor({
    source: deps.source,
    transfer: deps.transfer,
    roots,
    logger: log,
  });
  let projectedUsed =
    report.capacityBytes === null ? 0 : await readCacheUsage(deps.storage, report.payloads, log);

  for (let i = 0; i < report.operations.length; i++) {
    const operation = report.operations[i];

    if (signal?.aborted) {
      const remaining = report.operations.slice(i);
      report.cancelled = true;
      report.deferred = [...remaining, ...report.deferred];
      report.operations = report.operations.slice(0, i);
      log.info('execution cancelled', { remaining: remaining.length });
      break;
    }

    let result: OperationResult;
    if (
      operation.kind === OperationKind.PROMOTE &&
      report.capacityBytes !== null &&
      projectedUsed + operation.size > report.capacityBytes
    ) {
      operation.status = OperationStatus.FAILED;
      result = {
        operation,
        status: OperationStatus.FAILED,
        dryRun,
        error: new RelocationError('insufficient cache space', operation.destinationPath),
      };
      log.warn('promotion skipped: insufficient cache space', {
        id: operation.payloadId,
        size: operation.size,
        used: projectedUsed,
        capacity: report.capacityBytes,
      });

      const next = report.deferred.findIndex((op) => op.kind === OperationKind.PROMOTE);
      if (next !== -1) {
        const [replacement] = report.deferred.splice(next, 1);
        report.operations.push(replacement);
        log.info('trying next deferred promotion', { id: replacement.payloadId });
      }
    } else {
      result = await executor.execute(operation, { dryRun, signal });
    }

    if (result.status === OperationStatus.COMPLETED) {
      if (operation.kind === OperationKind.PROMOTE) projectedUsed += operation.size;
      if (operation.kind === OperationKind.RELEGATE) projectedUsed -= operation.size;
    }

    report.results.push(result);
    events?.emit('operation:finished', { cycle, result });
  }

  // ---------------------------------------------------------------------------
  // PERSIST
  // ---------------------------------------------------------------------------
  enter(CyclePhase.PERSIST);
  if (options.persist === false) {
    log.info('metrics not persisted, evaluate-only cycle');
    return finish(report, now, log, events);
  }
  if (!metricsLoaded) {
    log.warn('metrics not persisted, stored history could not be read');
    return finish(report, now, log, events);
  }

  const nowSeconds = Math.floor(now() / 1000);
  try {
    for (const payload of report.payloads) {
      const record = updateMetric(metrics.get(payload.id), payload, nowSeconds, settings.emaAlpha);
      await deps.store.upsert(payload.id, record);
    }
    report.pruned = await pruneStale(deps.store, metrics, report.payloads, nowSeconds, settings);
    report.persisted = true;
  } catch (err) {
    log.error('failed to persist metrics', { error: errorMessage(err) });
  }

  return finish(report, now, log, events);
}

// =============================================================================
// Phase Helpers
// =============================================================================

async function readCacheCapacity(
  storage: StorageStatProvider,
  settings: CycleSettings,
  log: Logger
): Promise<number | null> {
  if (settings.manualCacheCapacityGb !== null) {
    return gbToBytes(settings.manualCacheCapacityGb);
  }
  try {
    return await storage.capacityBytes(Tier.CACHE);
  } catch (err) {
    log.warn('cache capacity unavailable, planning everything to master', {
      error: errorMessage(err),
    });
    return null;
  }
}

/**
 * Bytes in use on the cache volume, falling back to the snapshot
 */
async function readCacheUsage(
  storage: StorageStatProvider,
  payloads: readonly Payload[],
  log: Logger
): Promise<number> {
  try {
    return await storage.usedBytes(Tier.CACHE);
  } catch (err) {
    const fallback = cachedBytes(payloads);
    log.warn('cache usage unavailable, using payload sizes', {
      error: errorMessage(err),
      used: fallback,
    });
    return fallback;
  }
}

/**
 * Ids of master payloads whose cache location holds a leftover copy
 */
async function probeCacheCopies(
  transfer: FileTransferProvider,
  decisions: readonly PlacementDecision[],
  roots: TierRoots,
  log: Logger
): Promise<Set<string>> {
  const found = new Set<string>();

  for (const candidate of cacheCopyCandidates(decisions, roots)) {
    try {
      if (await transfer.exists(candidate.cachePath)) {
        log.info('orphaned cache copy found', {
          id: candidate.payloadId,
          path: candidate.cachePath,
        });
        found.add(candidate.payloadId);
      }
    } catch (err) {
      log.warn('cannot probe cache copy', {
        id: candidate.payloadId,
        path: candidate.cachePath,
        error: errorMessage(err),
      });
    }
  }

  return found;
}

async function pruneStale(
  store: MetricsStore,
  metrics: ReadonlyMap<string, MetricRecord>,
  observed: readonly Payload[],
  nowSeconds: number,
  settings: CycleSettings
): Promise<number> {
  const seen = new Set(observed.map((payload) => payload.id));
  let pruned = 0;

  for (const [id, record] of metrics) {
    if (seen.has(id)) continue;
    if (nowSeconds - record.lastChecked > settings.metricGracePeriodSeconds) {
      await store.delete(id);
      pruned++;
    }
  }

  return pruned;
}

function finish(
  report: CycleReport,
  now: () => number,
  log: Logger,
  events: EngineEventEmitter | undefined
): CycleReport {
  events?.emit('cycle:phase', { cycle: report.cycle, phase: CyclePhase.IDLE });
  report.finishedAt = now();

  const failed = report.results.filter((r) => r.status === OperationStatus.FAILED).length;
  log.info('cycle finished', {
    aborted: report.aborted,
    operations: report.results.length,
    failed,
    deferred: report.deferred.length,
    persisted: report.persisted,
    durationMs: report.finishedAt - report.startedAt,
  });

  events?.emit('cycle:completed', { report });
  return report;
}
