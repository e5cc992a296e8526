#!/usr/bin/env node
/**
 * seedtier CLI Entry Point
 *
 * This module handles command-line argument parsing and routes
 * to the appropriate command implementations.
 *
 * @module cli
 */

import React from 'react';
import { render, Text, Box } from 'ink';
import meow from 'meow';
import { engineVersion } from '../engine/index.js';
import type { EngineConfig } from '../engine/types.js';
import { resolveConfig } from './utils/config.js';
import { errorMessage } from './utils/output.js';

// Import command implementations
import { executeRun } from './commands/run.js';
import { executeOnce } from './commands/once.js';
import { runPlan } from './commands/plan.js';
import { executeConfig } from './commands/config.js';

// =============================================================================
// CLI Configuration
// =============================================================================

const cli = meow(
  `
  Usage
    $ seedtier <command> [options]

  Commands
    run                 Run the rebalancing daemon in the foreground
    once                Run a single cycle and exit
    plan                Show the ranked placement plan (always simulated)
    config              Show the effective configuration

  Options
    --dry-run           Simulate every relocation step
    --live              Perform relocations (overrides DRY_RUN)
    --max-ops <n>       Operations per cycle, -1 for unlimited
    --memory-store      Keep metrics in memory instead of PostgreSQL
    --limit <n>         Rows shown by plan
    --version, -v       Show version
    --help, -h          Show help

  Configuration is read from environment variables (QBIT_HOST, CACHE_PATH,
  MASTER_PATH, DB_HOST, ...). Flags override DRY_RUN and
  MAX_OPERATIONS_PER_CYCLE.

  Examples
    $ seedtier plan --memory-store
    $ seedtier once --dry-run --max-ops 3
    $ seedtier run --live
`,
  {
    importMeta: import.meta,
    version: engineVersion,
    flags: {
      version: {
        type: 'boolean',
        shortFlag: 'v',
      },
      dryRun: {
        type: 'boolean',
        default: false,
      },
      live: {
        type: 'boolean',
        default: false,
      },
      maxOps: {
        type: 'number',
      },
      memoryStore: {
        type: 'boolean',
        default: false,
      },
      limit: {
        type: 'number',
      },
    },
  }
);

// =============================================================================
// Error Display Component
// =============================================================================

interface ErrorProps {
  message: string;
}

/**
 * Error display component
 */
function ErrorDisplay({ message }: ErrorProps) {
  return (
    <Box flexDirection="column" padding={1}>
      <Text color="red" bold>
        Error: {message}
      </Text>
      <Box marginTop={1}>
        <Text>Run </Text>
        <Text color="yellow">seedtier --help</Text>
        <Text> for usage information</Text>
      </Box>
    </Box>
  );
}

// =============================================================================
// Command Routing
// =============================================================================

/**
 * Print a command failure and exit with status 1
 */
function fail(err: unknown): never {
  console.error(errorMessage(err instanceof Error ? err.message : String(err)));
  process.exit(1);
}

function loadConfig(): EngineConfig {
  try {
    return resolveConfig({
      dryRun: cli.flags.dryRun,
      live: cli.flags.live,
      maxOps: cli.flags.maxOps,
      memoryStore: cli.flags.memoryStore,
    });
  } catch (err) {
    fail(err);
  }
}

/**
 * Route the command to the appropriate handler
 */
function routeCommand(): void {
  const [command] = cli.input;
  const flags = cli.flags;

  // Handle version flag
  if (flags.version) {
    console.log(engineVersion);
    process.exit(0);
  }

  if (!command) {
    cli.showHelp(0);
    return;
  }

  switch (command.toLowerCase()) {
    case 'run':
    case 'start': {
      executeRun(loadConfig()).then(() => process.exit(0), fail);
      break;
    }

    case 'once': {
      executeOnce(loadConfig()).then((code) => process.exit(code), fail);
      break;
    }

    case 'plan': {
      runPlan({ config: loadConfig(), limit: flags.limit });
      break;
    }

    case 'config': {
      executeConfig(loadConfig());
      break;
    }

    default: {
      render(<ErrorDisplay message={`Unknown command: ${command}`} />);
      process.exit(1);
    }
  }
}

// =============================================================================
// Main Entry Point
// =============================================================================

routeCommand();
