/**
 * Run command for seedtier CLI.
 *
 * Runs the rebalancing daemon in the foreground until interrupted.
 *
 * @module cli/commands/run
 */

import type { EngineConfig } from '../../engine/types.js';
import { createRuntime, runDaemon } from '../../daemon/runtime.js';

/**
 * Execute the run command
 */
export async function executeRun(config: EngineConfig): Promise<void> {
  const runtime = await createRuntime(config);
  await runDaemon(runtime);
}
