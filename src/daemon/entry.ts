#!/usr/bin/env node
/**
 * Daemon Entry Point for seedtier
 *
 * Container entry: reads the configuration from the environment and runs
 * the rebalancing daemon in the foreground. Configuration and startup
 * connectivity failures exit with code 1.
 *
 * @module daemon/entry
 */

import { loadConfigFromEnv } from '../engine/config/env.js';
import { ConfigurationError } from '../engine/types.js';
import { createRuntime, isStartupError, runDaemon } from './runtime.js';

// =============================================================================
// Main Entry Point
// =============================================================================

async function main(): Promise<void> {
  // Set process name for ps/htop
  process.title = 'seedtier';

  const config = loadConfigFromEnv(process.env);

  const runtime = await createRuntime(config);

  process.on('unhandledRejection', (reason) => {
    runtime.logger.error('unhandled rejection', { error: String(reason) });
  });

  await runDaemon(runtime);
}

main().catch((err: unknown) => {
  if (err instanceof ConfigurationError) {
    console.error(`[seedtier] ${err.message}`);
  } else if (isStartupError(err)) {
    console.error(`[seedtier] Startup failed: ${err.message}`);
  } else {
    console.error(`[seedtier] Fatal error:`, err);
  }
  process.exit(1);
});
