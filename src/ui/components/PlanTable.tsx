import React from 'react';
import { Box, Text } from 'ink';
import { OperationStatus, type OperationKind, type PlacementDecision } from '../../engine/types.js';
import type { CycleReport } from '../../engine/cycle/orchestrator.js';
import { colors, operationColors, tierColors, getStatusColor } from '../theme/index.js';
import { formatBytes, formatScore, truncateText } from '../utils/format.js';

export interface PlanTableProps {
  /** Report of the cycle to display */
  report: CycleReport;
  /** Maximum rows shown (default: all) */
  limit?: number;
}

interface RowAction {
  kind: OperationKind;
  deferred: boolean;
  status: OperationStatus;
}

/**
 * Index operations by payload id
 */
function actionsById(report: CycleReport): Map<string, RowAction> {
  const actions = new Map<string, RowAction>();
  for (const operation of report.operations) {
    actions.set(operation.payloadId, {
      kind: operation.kind,
      deferred: false,
      status: operation.status,
    });
  }
  for (const operation of report.deferred) {
    actions.set(operation.payloadId, {
      kind: operation.kind,
      deferred: true,
      status: operation.status,
    });
  }
  return actions;
}

const Header: React.FC = () => (
  <Box>
    <Box width={4}>
      <Text bold dimColor>
        {'  #'}
      </Text>
    </Box>
    <Box width={32}>
      <Text bold dimColor>
        Name
      </Text>
    </Box>
    <Box width={12} justifyContent="flex-end">
      <Text bold dimColor>
        Score
      </Text>
    </Box>
    <Box width={12} justifyContent="flex-end">
      <Text bold dimColor>
        Size
      </Text>
    </Box>
    <Box width={20}>
      <Text bold dimColor>
        {' '}
        Tier
      </Text>
    </Box>
    <Box width={20}>
      <Text bold dimColor>
        Action
      </Text>
    </Box>
  </Box>
);

const Row: React.FC<{ decision: PlacementDecision; index: number; action?: RowAction }> = ({
  decision,
  index,
  action,
}) => (
  <Box>
    <Box width={4}>
      <Text dimColor>{(index + 1).toString().padStart(3)}.</Text>
    </Box>
    <Box width={32}>
      <Text>{truncateText(decision.payload.name, 30)}</Text>
    </Box>
    <Box width={12} justifyContent="flex-end">
      <Text>{formatScore(decision.score)}</Text>
    </Box>
    <Box width={12} justifyContent="flex-end">
      <Text>{formatBytes(decision.payload.size)}</Text>
    </Box>
    <Box width={20}>
      <Text>
        {' '}
        <Text color={tierColors[decision.current]}>{decision.current}</Text>
        {decision.current !== decision.target ? (
          <>
            {' -> '}
            <Text color={tierColors[decision.target]}>{decision.target}</Text>
          </>
        ) : null}
      </Text>
    </Box>
    <Box width={20}>
      {action ? (
        <Text color={action.deferred ? colors.muted : operationColors[action.kind]}>
          {action.kind}
          {action.deferred ? ' (deferred)' : ''}
          {action.status === OperationStatus.FAILED ? (
            <Text color={getStatusColor(action.status)}> failed</Text>
          ) : null}
        </Text>
      ) : (
        <Text dimColor>-</Text>
      )}
    </Box>
  </Box>
);

/**
 * Table of one cycle's placement decisions, ranked by score, with the
 * operation derived for each payload
 */
export const PlanTable: React.FC<PlanTableProps> = ({ report, limit }) => {
  if (report.aborted) {
    return (
      <Box>
        <Text color={colors.error}>
          [ERROR] Cycle aborted during {report.aborted}: {report.error?.message ?? 'unknown error'}
        </Text>
      </Box>
    );
  }

  if (report.decisions.length === 0) {
    return (
      <Box>
        <Text color={colors.warning}>[INFO] No managed payloads found</Text>
      </Box>
    );
  }

  const actions = actionsById(report);
  const rows = limit !== undefined ? report.decisions.slice(0, limit) : report.decisions;
  const capacity = report.capacityBytes;

  return (
    <Box flexDirection="column">
      <Header />
      <Text dimColor>{'-'.repeat(100)}</Text>
      {rows.map((decision, index) => (
        <Row
          key={decision.payload.id}
          decision={decision}
          index={index}
          action={actions.get(decision.payload.id)}
        />
      ))}
      <Text dimColor>{'-'.repeat(100)}</Text>
      {rows.length < report.decisions.length ? (
        <Text dimColor>… {report.decisions.length - rows.length} more</Text>
      ) : null}
      <Box marginTop={1} flexDirection="column">
        <Text>
          Cache: {formatBytes(report.plan?.plannedBytes ?? 0)} planned of{' '}
          {formatBytes(report.plan?.budgetBytes ?? 0)} budget
          {capacity === null ? ' (capacity unknown)' : ` (${formatBytes(capacity)} capacity)`}
        </Text>
        <Text>
          {report.operations.length} operation{report.operations.length !== 1 ? 's' : ''} this
          cycle, {report.deferred.length} deferred
          {report.dryRun ? <Text color={colors.warning}> [dry run]</Text> : null}
        </Text>
        {report.unmappable.length > 0 ? (
          <Text color={colors.warning}>
            {report.unmappable.length} payload{report.unmappable.length !== 1 ? 's' : ''} outside
            the tier roots
          </Text>
        ) : null}
        {report.rejected.length > 0 ? (
          <Text color={colors.warning}>
            {report.rejected.length} torrent entr{report.rejected.length !== 1 ? 'ies' : 'y'}{' '}
            rejected
          </Text>
        ) : null}
      </Box>
    </Box>
  );
};
