/**
 * CLI Commands Index
 *
 * Exports all CLI command implementations.
 *
 * @module cli/commands
 */

export { executeRun } from './run.js';
export { executeOnce, formatReport } from './once.js';
export { executePlan, PlanCommand, runPlan, type PlanCommandOptions } from './plan.js';
export { executeConfig, formatConfig } from './config.js';
