/**
 * Once command for seedtier CLI.
 *
 * Runs a single rebalancing cycle with the effective configuration, prints
 * what happened and exits.
 *
 * @module cli/commands/once
 */

import { OperationStatus, type EngineConfig } from '../../engine/types.js';
import { runCycle, type CycleReport } from '../../engine/cycle/orchestrator.js';
import { createRuntime } from '../../daemon/runtime.js';
import {
  ansiColors,
  colorize,
  errorMessage,
  formatBytes,
  formatScore,
  formatTableHeader,
  formatTableRow,
  infoMessage,
  successMessage,
  truncateText,
  warnMessage,
  type TableColumn,
} from '../utils/output.js';

// =============================================================================
// Constants
// =============================================================================

const TABLE_COLUMNS: TableColumn[] = [
  { header: 'Operation', width: 9, align: 'left' },
  { header: 'Name', width: 30, align: 'left' },
  { header: 'Score', width: 10, align: 'right' },
  { header: 'Size', width: 10, align: 'right' },
  { header: 'Result', width: 10, align: 'left' },
];

// =============================================================================
// Output
// =============================================================================

function resultLabel(status: OperationStatus, dryRun: boolean): string {
  if (status === OperationStatus.FAILED) {
    return colorize('failed', ansiColors.red);
  }
  return colorize(dryRun ? 'simulated' : 'done', ansiColors.green);
}

/**
 * Render a cycle report as CLI output lines
 */
export function formatReport(report: CycleReport): string[] {
  if (report.aborted) {
    return [
      errorMessage(
        `Cycle aborted during ${report.aborted}: ${report.error?.message ?? 'unknown error'}`
      ),
    ];
  }

  const lines: string[] = [];

  if (report.results.length === 0) {
    lines.push(infoMessage('Placement already matches the plan'));
  } else {
    lines.push(formatTableHeader(TABLE_COLUMNS));
    for (const result of report.results) {
      const { operation } = result;
      // Result cell carries ANSI codes, so it is appended unpadded
      const row = formatTableRow(
        [
          operation.kind,
          truncateText(operation.name, 30),
          formatScore(operation.score),
          formatBytes(operation.size),
        ],
        TABLE_COLUMNS
      );
      lines.push(`${row} | ${resultLabel(result.status, result.dryRun)}`);
      if (result.error) {
        lines.push(`  ${colorize(result.error.message, ansiColors.gray)}`);
      }
    }
  }

  if (report.deferred.length > 0) {
    lines.push(infoMessage(`${report.deferred.length} operation(s) deferred to later cycles`));
  }
  if (!report.persisted) {
    lines.push(warnMessage('Metrics were not persisted'));
  }

  const failed = report.results.filter((r) => r.status === OperationStatus.FAILED).length;
  const mode = report.dryRun ? ' (dry run)' : '';
  lines.push(
    failed > 0
      ? errorMessage(`Cycle ${report.cycle} finished with ${failed} failed operation(s)${mode}`)
      : successMessage(`Cycle ${report.cycle} finished${mode}`)
  );

  return lines;
}

// =============================================================================
// Main Once Function
// =============================================================================

/**
 * Execute the once command.
 *
 * @returns Process exit code
 */
export async function executeOnce(config: EngineConfig): Promise<number> {
  const runtime = await createRuntime(config);

  try {
    const report = await runCycle(
      { ...runtime.deps, logger: runtime.logger },
      { cycle: 1, settings: config }
    );
    for (const line of formatReport(report)) {
      console.log(line);
    }
    return report.aborted ? 1 : 0;
  } finally {
    await runtime.close();
  }
}
