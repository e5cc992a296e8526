/**
 * Config command for seedtier CLI.
 *
 * Prints the effective configuration with secrets masked.
 *
 * @module cli/commands/config
 */

import type { EngineConfig } from '../../engine/types.js';
import { redactConfig } from '../../engine/config/env.js';
import { formatBudget, formatDuration, formatInfoBlock } from '../utils/output.js';

/**
 * Render the configuration as key-value lines
 */
export function formatConfig(config: EngineConfig): string {
  const shown = redactConfig(config);
  const { client, database, weights, logging } = shown;

  const pairs: Array<[string, string]> = [
    ['qBittorrent', `${client.username}@${client.host}:${client.port}`],
    ['Password', client.password],
    [
      'Metrics store',
      database
        ? `postgres://${database.user}@${database.host}:${database.port}/${database.database}`
        : 'memory',
    ],
    ['Cache root', shown.cachePath],
    ['Master root', shown.masterPath],
    ['Interval', formatDuration(shown.checkIntervalSeconds)],
    ['Target fill', `${shown.targetFillPercent}%`],
    ['Max ops/cycle', formatBudget(shown.maxOperationsPerCycle)],
    ['Dry run', shown.dryRun ? 'yes' : 'no'],
    ['Weights', `leechers=${weights.leechers} ratio=${weights.ratio} history=${weights.history}`],
    ['EMA alpha', String(shown.emaAlpha)],
    [
      'Cache capacity',
      shown.manualCacheCapacityGb === null ? 'detected' : `${shown.manualCacheCapacityGb} GB`,
    ],
    ['Metric grace', formatDuration(shown.metricGracePeriodSeconds)],
    ['Log level', logging.level],
    ['Log file', logging.file ?? '-'],
  ];

  return formatInfoBlock(pairs, 16);
}

/**
 * Execute the config command
 */
export function executeConfig(config: EngineConfig): void {
  console.log(formatConfig(config));
}
