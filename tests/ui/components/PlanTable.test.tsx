import { describe, it, expect } from 'vitest';
import React from 'react';
import { render } from 'ink-testing-library';
import { PlanTable } from '../../../src/ui/components/PlanTable.js';
import { runCycle, type CycleReport, type CycleSettings } from '../../../src/engine/cycle/orchestrator.js';
import { FakeSource, makeScenario } from '../../helpers/fakes.js';

const SETTINGS: CycleSettings = {
  cachePath: '/cache',
  masterPath: '/data',
  targetFillPercent: 100,
  maxOperationsPerCycle: Number.POSITIVE_INFINITY,
  dryRun: true,
  weights: { leechers: 1000, ratio: 200, history: 1 },
  emaAlpha: 0.5,
  manualCacheCapacityGb: null,
  metricGracePeriodSeconds: 3600,
};

async function scenarioReport(opBudget?: number): Promise<CycleReport> {
  return runCycle(makeScenario(), { cycle: 1, settings: SETTINGS, opBudget });
}

describe('PlanTable', () => {
  it('should rank payloads by score', async () => {
    const { lastFrame } = render(<PlanTable report={await scenarioReport()} />);
    const frame = lastFrame() ?? '';

    expect(frame).toContain('Name');
    expect(frame).toContain('Action');
    expect(frame.indexOf('Hot')).toBeLessThan(frame.indexOf('Warm'));
    expect(frame.indexOf('Warm')).toBeLessThan(frame.indexOf('Cold'));
    expect(frame).toContain('6,000');
    expect(frame).toContain('2,400');
  });

  it('should show the action for each payload', async () => {
    const { lastFrame } = render(<PlanTable report={await scenarioReport()} />);
    const rows = (lastFrame() ?? '').split('\n');

    const hotRow = rows.find((row) => row.includes('Hot')) ?? '';
    const warmRow = rows.find((row) => row.includes('Warm')) ?? '';
    const coldRow = rows.find((row) => row.includes('Cold')) ?? '';
    expect(hotRow).toContain('promote');
    expect(coldRow).toContain('relegate');
    expect(warmRow).not.toContain('promote');
    expect(warmRow).not.toContain('relegate');
  });

  it('should mark operations held back by the budget', async () => {
    const { lastFrame } = render(<PlanTable report={await scenarioReport(1)} />);
    const rows = (lastFrame() ?? '').split('\n');

    expect(rows.find((row) => row.includes('Hot'))).toContain('promote (deferred)');
    expect(lastFrame()).toContain('1 operation this cycle, 1 deferred');
  });

  it('should summarize the cache budget', async () => {
    const { lastFrame } = render(<PlanTable report={await scenarioReport()} />);

    expect(lastFrame()).toContain('Cache: 2.0 KB planned of 2.0 KB budget (2.0 KB capacity)');
    expect(lastFrame()).toContain('2 operations this cycle, 0 deferred');
    expect(lastFrame()).toContain('[dry run]');
  });

  it('should note an unknown capacity', async () => {
    const scenario = makeScenario();
    scenario.storage.fail = true;
    const report = await runCycle(scenario, { cycle: 1, settings: SETTINGS });

    const { lastFrame } = render(<PlanTable report={report} />);

    expect(lastFrame()).toContain('Cache: 0 B planned of 0 B budget (capacity unknown)');
  });

  it('should limit the number of rows', async () => {
    const { lastFrame } = render(<PlanTable report={await scenarioReport()} limit={1} />);

    expect(lastFrame()).toContain('Hot');
    expect(lastFrame()).not.toContain('Warm');
    expect(lastFrame()).toContain('… 2 more');
  });

  it('should count rejected entries', async () => {
    const report = await scenarioReport();

    const { lastFrame } = render(
      <PlanTable report={{ ...report, rejected: [{ reason: 'missing name' }] }} />
    );

    expect(lastFrame()).toContain('1 torrent entry rejected');
  });

  it('should show an aborted cycle', async () => {
    const scenario = makeScenario();
    scenario.source.failListing = true;
    const report = await runCycle(scenario, { cycle: 1, settings: SETTINGS });

    const { lastFrame } = render(<PlanTable report={report} />);

    expect(lastFrame()).toContain('[ERROR] Cycle aborted during fetch: connection refused');
  });

  it('should say when there is nothing to plan', async () => {
    const report = await runCycle(
      { ...makeScenario(), source: new FakeSource([]) },
      { cycle: 1, settings: SETTINGS }
    );

    const { lastFrame } = render(<PlanTable report={report} />);

    expect(lastFrame()).toContain('[INFO] No managed payloads found');
  });
});
