/**
 * Cycle Module
 *
 * @module engine/cycle
 */

export {
  runCycle,
  type CycleDependencies,
  type CycleOptions,
  type CycleReport,
  type CycleSettings,
} from './orchestrator.js';

export { CycleScheduler, type CycleSchedulerOptions } from './scheduler.js';
