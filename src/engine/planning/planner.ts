/**
 * Capacity Planner
 *
 * Chooses the top-K working set for the cache tier: walk payloads in
 * ranking order and keep them on the cache while their cumulative size stays
 * within the fill budget. The walk stops at the first payload that does not
 * fit; it and everything ranked below it are planned for the master tier,
 * even if a smaller, lower-ranked payload would still fit. Strict prefix
 * truncation keeps the target set predictable from one cycle to the next.
 *
 * @module engine/planning/planner
 */

import { Tier, type PlacementDecision, type ScoredPayload } from '../types.js';
import { compareScored } from '../scoring/scorer.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Result of one planning pass
 */
export interface CapacityPlan {
  /** Target tier per payload id (CACHE or MASTER) */
  targets: Map<string, Tier>;

  /** Bytes the cache may hold this cycle */
  budgetBytes: number;

  /** Bytes of payloads planned for the cache */
  plannedBytes: number;
}

// =============================================================================
// Planning
// =============================================================================

/**
 * Byte budget for the cache tier. Unknown or non-positive capacity yields 0.
 *
 * @param capacityBytes - Total cache capacity
 * @param targetFillPercent - Share of capacity to fill, 0-100
 */
export function cacheBudget(capacityBytes: number, targetFillPercent: number): number {
  if (!Number.isFinite(capacityBytes) || capacityBytes <= 0) {
    return 0;
  }
  const percent = Math.min(Math.max(targetFillPercent, 0), 100);
  return capacityBytes * (percent / 100);
}

/**
 * Partition scored payloads into cache and master targets.
 *
 * @param scored - Payloads with this cycle's scores, in any order
 * @param capacityBytes - Cache capacity; 0 or non-finite plans everything to master
 * @param targetFillPercent - Share of capacity the working set may occupy
 */
export function plan(
  scored: readonly ScoredPayload[],
  capacityBytes: number,
  targetFillPercent: number
): CapacityPlan {
  const budgetBytes = cacheBudget(capacityBytes, targetFillPercent);
  const targets = new Map<string, Tier>();
  let plannedBytes = 0;
  let truncated = budgetBytes <= 0;

  for (const entry of [...scored].sort(compareScored)) {
    const { id, size } = entry.payload;

    if (!truncated && plannedBytes + size <= budgetBytes) {
      targets.set(id, Tier.CACHE);
      plannedBytes += size;
    } else {
      truncated = true;
      targets.set(id, Tier.MASTER);
    }
  }

  return { targets, budgetBytes, plannedBytes };
}

/**
 * Pair each scored payload with its observed and planned tier
 */
export function toDecisions(
  scored: readonly ScoredPayload[],
  targets: ReadonlyMap<string, Tier>
): PlacementDecision[] {
  return scored.map(({ payload, score }) => ({
    payload,
    score,
    current: payload.tier,
    target: targets.get(payload.id) ?? Tier.MASTER,
  }));
}
