/**
 * Plan command for seedtier CLI.
 *
 * Runs one evaluate-only cycle (always simulated) and renders the ranked
 * placement table.
 *
 * @module cli/commands/plan
 */

import React, { useEffect, useState } from 'react';
import { render, Text, Box, useApp } from 'ink';
import type { EngineConfig } from '../../engine/types.js';
import {
  runCycle,
  type CycleDependencies,
  type CycleReport,
} from '../../engine/cycle/orchestrator.js';
import { createSilentLogger } from '../../engine/logger.js';
import { createRuntime } from '../../daemon/runtime.js';
import { PlanTable } from '../../ui/components/PlanTable.js';

// =============================================================================
// Types
// =============================================================================

export interface PlanCommandOptions {
  config: EngineConfig;
  /** Maximum rows shown */
  limit?: number;
}

// =============================================================================
// Main Plan Function
// =============================================================================

/**
 * Evaluate placement without side effects: relocations are simulated and
 * no metric record is written
 */
export function evaluatePlan(deps: CycleDependencies, config: EngineConfig): Promise<CycleReport> {
  return runCycle(deps, { cycle: 1, settings: config, dryRun: true, persist: false });
}

/**
 * Run a simulated cycle and return its report
 */
export async function executePlan(config: EngineConfig): Promise<CycleReport> {
  const runtime = await createRuntime(config, { logger: createSilentLogger() });

  try {
    return await evaluatePlan(runtime.deps, config);
  } finally {
    await runtime.close();
  }
}

/**
 * Plan command component using Ink for rendering
 */
export function PlanCommand({ config, limit }: PlanCommandOptions): React.ReactElement {
  const { exit } = useApp();
  const [report, setReport] = useState<CycleReport | null>(null);
  const [error, setError] = useState<string | null>(null);

  useEffect(() => {
    executePlan(config)
      .then(setReport)
      .catch((err: unknown) => {
        setError(err instanceof Error ? err.message : String(err));
      });
  }, [config]);

  useEffect(() => {
    if (error) {
      exit(new Error(error));
    } else if (report) {
      exit(report.aborted ? report.error ?? new Error('cycle aborted') : undefined);
    }
  }, [report, error, exit]);

  if (error) {
    return (
      <Box>
        <Text color="red">[ERROR] {error}</Text>
      </Box>
    );
  }

  if (!report) {
    return (
      <Box>
        <Text color="cyan">Evaluating placement...</Text>
      </Box>
    );
  }

  return <PlanTable report={report} limit={limit} />;
}

/**
 * Run the plan command with Ink rendering
 */
export function runPlan(options: PlanCommandOptions): void {
  const { waitUntilExit } = render(<PlanCommand {...options} />);
  waitUntilExit().then(
    () => process.exit(0),
    () => process.exit(1)
  );
}
