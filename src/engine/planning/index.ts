/**
 * Planning Module
 *
 * Capacity planning and placement reconciliation.
 *
 * @module engine/planning
 */

export { plan, cacheBudget, toDecisions, type CapacityPlan } from './planner.js';

export {
  reconcile,
  compareOperations,
  cacheCopyCandidates,
  type ReconcileOptions,
  type Reconciliation,
  type CacheCopyCandidate,
} from './reconciler.js';
