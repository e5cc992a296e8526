/**
 * Placement Reconciler
 *
 * Diffs observed placement against the planned placement and derives the
 * relocation operations needed to converge, in priority order, bounded by
 * the per-cycle operation budget.
 *
 * Priority order:
 *   1. RELEGATE, lowest score first. Frees cache space for what follows, and
 *      under a budget of one the worst cached payload leaves first.
 *   2. CLEANUP of orphaned cache copies, lowest score first.
 *   3. PROMOTE, highest score first.
 *
 * @module engine/planning/reconciler
 */

import {
  OperationKind,
  OperationStatus,
  Tier,
  type PlacementDecision,
  type RelocationOperation,
} from '../types.js';
import { mapLocation, type TierRoots } from '../relocation/paths.js';

// =============================================================================
// Types
// =============================================================================

export interface ReconcileOptions {
  roots: TierRoots;

  /** Maximum operations returned; 0 evaluates only, Infinity is unlimited */
  opBudget: number;

  /** Ids of master-tier payloads that still have a copy on the cache tier */
  cacheCopies?: ReadonlySet<string>;
}

export interface Reconciliation {
  /** Operations to execute this cycle, in order */
  operations: RelocationOperation[];

  /** Operations cut by the budget; they are re-derived next cycle */
  deferred: RelocationOperation[];

  /** Decisions whose paths could not be mapped between tier roots */
  unmappable: PlacementDecision[];
}

/**
 * Where a master payload's cache copy would live
 */
export interface CacheCopyCandidate {
  payloadId: string;
  cachePath: string;
}

// =============================================================================
// Operation Construction
// =============================================================================

function operationFor(
  decision: PlacementDecision,
  roots: TierRoots,
  cacheCopies: ReadonlySet<string>
): RelocationOperation | null | undefined {
  const { payload, current, target, score } = decision;
  const location = { saveLocation: payload.savePath, contentPath: payload.contentPath };

  const base = {
    payloadId: payload.id,
    name: payload.name,
    category: payload.category,
    size: payload.size,
    score,
    status: OperationStatus.PENDING,
  };

  if (current === Tier.MASTER && target === Tier.CACHE) {
    const mapped = mapLocation(location, Tier.MASTER, Tier.CACHE, roots);
    if (!mapped) return null;
    return {
      ...base,
      kind: OperationKind.PROMOTE,
      sourcePath: payload.contentPath,
      destinationPath: mapped.contentPath,
      saveLocation: mapped.saveLocation,
    };
  }

  if (current === Tier.CACHE && target === Tier.MASTER) {
    const mapped = mapLocation(location, Tier.CACHE, Tier.MASTER, roots);
    if (!mapped) return null;
    return {
      ...base,
      kind: OperationKind.RELEGATE,
      sourcePath: payload.contentPath,
      destinationPath: mapped.contentPath,
      saveLocation: mapped.saveLocation,
    };
  }

  if (current === Tier.MASTER && target === Tier.MASTER && cacheCopies.has(payload.id)) {
    const mapped = mapLocation(location, Tier.MASTER, Tier.CACHE, roots);
    if (!mapped) return null;
    return {
      ...base,
      kind: OperationKind.CLEANUP,
      sourcePath: mapped.contentPath,
      destinationPath: payload.contentPath,
      saveLocation: payload.savePath,
    };
  }

  // Already where it belongs
  return undefined;
}

const KIND_RANK: Record<OperationKind, number> = {
  [OperationKind.RELEGATE]: 0,
  [OperationKind.CLEANUP]: 1,
  [OperationKind.PROMOTE]: 2,
};

/**
 * Priority order of operations, see module docs
 */
export function compareOperations(a: RelocationOperation, b: RelocationOperation): number {
  if (a.kind !== b.kind) {
    return KIND_RANK[a.kind] - KIND_RANK[b.kind];
  }
  if (a.score !== b.score) {
    return a.kind === OperationKind.PROMOTE ? b.score - a.score : a.score - b.score;
  }
  if (a.payloadId < b.payloadId) return -1;
  if (a.payloadId > b.payloadId) return 1;
  return 0;
}

// =============================================================================
// Reconciliation
// =============================================================================

/**
 * Derive the ordered, budget-bounded operation list for one cycle
 */
export function reconcile(
  decisions: readonly PlacementDecision[],
  options: ReconcileOptions
): Reconciliation {
  const cacheCopies = options.cacheCopies ?? new Set<string>();
  const all: RelocationOperation[] = [];
  const unmappable: PlacementDecision[] = [];

  for (const decision of decisions) {
    const operation = operationFor(decision, options.roots, cacheCopies);
    if (operation === null) {
      unmappable.push(decision);
    } else if (operation) {
      all.push(operation);
    }
  }

  all.sort(compareOperations);

  const budget = Number.isNaN(options.opBudget) ? 0 : Math.max(0, options.opBudget);
  const cut = Math.min(all.length, budget);

  return {
    operations: all.slice(0, cut),
    deferred: all.slice(cut),
    unmappable,
  };
}

/**
 * Cache locations to probe for orphaned copies: payloads the client serves
 * from master and which are planned to stay there.
 */
export function cacheCopyCandidates(
  decisions: readonly PlacementDecision[],
  roots: TierRoots
): CacheCopyCandidate[] {
  const candidates: CacheCopyCandidate[] = [];

  for (const { payload, current, target } of decisions) {
    if (current !== Tier.MASTER || target !== Tier.MASTER) continue;

    const mapped = mapLocation(
      { saveLocation: payload.savePath, contentPath: payload.contentPath },
      Tier.MASTER,
      Tier.CACHE,
      roots
    );
    if (mapped) {
      candidates.push({ payloadId: payload.id, cachePath: mapped.contentPath });
    }
  }

  return candidates;
}
