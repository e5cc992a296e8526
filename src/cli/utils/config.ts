/**
 * Configuration resolution for CLI commands.
 *
 * Loads the environment configuration and applies command-line overrides.
 *
 * @module cli/utils/config
 */

import { loadConfigFromEnv, type Environment } from '../../engine/config/env.js';
import { ConfigurationError, type EngineConfig } from '../../engine/types.js';

export interface ConfigFlags {
  /** Force dry-run */
  dryRun: boolean;
  /** Force live mode */
  live: boolean;
  /** Operation budget override; -1 is unlimited */
  maxOps?: number;
  /** Keep metrics in memory */
  memoryStore: boolean;
}

/**
 * Resolve the effective configuration for a command.
 *
 * @throws {ConfigurationError} On invalid environment or conflicting flags
 */
export function resolveConfig(flags: ConfigFlags, env: Environment = process.env): EngineConfig {
  const problems: string[] = [];

  if (flags.dryRun && flags.live) {
    problems.push('--dry-run and --live cannot be combined');
  }
  if (flags.maxOps !== undefined && (!Number.isInteger(flags.maxOps) || flags.maxOps < -1)) {
    problems.push(`--max-ops must be an integer >= -1, got ${flags.maxOps}`);
  }
  if (problems.length > 0) {
    throw new ConfigurationError(problems);
  }

  const config = loadConfigFromEnv(env, { memoryStore: flags.memoryStore });

  if (flags.dryRun) config.dryRun = true;
  if (flags.live) config.dryRun = false;
  if (flags.maxOps !== undefined) {
    config.maxOperationsPerCycle = flags.maxOps === -1 ? Number.POSITIVE_INFINITY : flags.maxOps;
  }

  return config;
}
