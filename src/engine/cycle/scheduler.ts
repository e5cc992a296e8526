/**
 * Cycle Scheduler
 *
 * Runs cycles back to back with a fixed pause between the end of one cycle
 * and the start of the next, so cycles never overlap however long one
 * takes. Owns the abort controller handed to every cycle.
 *
 * @module engine/cycle/scheduler
 */

import { TypedEventEmitter, type EngineEvents } from '../events.js';
import { Logger, createSilentLogger } from '../logger.js';
import { runCycle, type CycleDependencies, type CycleReport, type CycleSettings } from './orchestrator.js';

// =============================================================================
// Types
// =============================================================================

export interface CycleSchedulerOptions {
  deps: Omit<CycleDependencies, 'events' | 'logger'>;
  settings: CycleSettings;

  /** Pause between cycles in milliseconds */
  intervalMs: number;
  logger?: Logger;
}

// =============================================================================
// CycleScheduler Class
// =============================================================================

/**
 * Periodic cycle runner
 *
 * @example
 * ```typescript
 * const scheduler = new CycleScheduler({ deps, settings: config, intervalMs: 3600_000 });
 * scheduler.on('cycle:completed', ({ report }) => console.log(report.results.length));
 * scheduler.start();
 * // later
 * await scheduler.stop();
 * ```
 */
export class CycleScheduler extends TypedEventEmitter<EngineEvents> {
  private readonly deps: Omit<CycleDependencies, 'events' | 'logger'>;
  private readonly settings: CycleSettings;
  private readonly intervalMs: number;
  private readonly logger: Logger;

  private controller = new AbortController();
  private timer: ReturnType<typeof setTimeout> | null = null;
  private inFlight: Promise<CycleReport | null> | null = null;
  private cycleCount = 0;
  private running = false;

  constructor(options: CycleSchedulerOptions) {
    super();
    this.deps = options.deps;
    this.settings = options.settings;
    this.intervalMs = options.intervalMs;
    this.logger = options.logger ?? createSilentLogger();
  }

  /** Whether start() was called and stop() was not */
  get isRunning(): boolean {
    return this.running;
  }

  /** Number of cycles started so far */
  get cycles(): number {
    return this.cycleCount;
  }

  /**
   * Run a cycle now and keep running them until stopped
   */
  start(): void {
    if (this.running) {
      return;
    }
    this.running = true;
    this.controller = new AbortController();
    this.logger.info('scheduler started', { intervalMs: this.intervalMs });
    this.tick();
  }

  /**
   * Cancel the pending timer, abort the in-flight cycle and wait for it to
   * settle
   */
  async stop(): Promise<void> {
    if (!this.running) {
      return;
    }
    this.running = false;

    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.controller.abort();

    if (this.inFlight) {
      await this.inFlight;
    }

    this.logger.info('scheduler stopped', { cycles: this.cycleCount });
    this.emit('scheduler:stopped');
  }

  /**
   * Run a single cycle outside the timer. Waits for a cycle already in
   * flight first.
   *
   * @returns The report, or null when the cycle failed unexpectedly
   */
  async runOnce(overrides: { dryRun?: boolean; opBudget?: number } = {}): Promise<CycleReport | null> {
    if (this.inFlight) {
      await this.inFlight;
    }
    return this.track(this.runTracked(overrides));
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  private tick(): void {
    this.timer = null;
    const cycle = this.track(this.runTracked({}));

    void cycle.then(() => {
      if (this.running) {
        this.timer = setTimeout(() => this.tick(), this.intervalMs);
      }
    });
  }

  private track(cycle: Promise<CycleReport | null>): Promise<CycleReport | null> {
    this.inFlight = cycle;
    return cycle.finally(() => {
      if (this.inFlight === cycle) {
        this.inFlight = null;
      }
    });
  }

  /**
   * Run one cycle; unexpected errors are reported as events, never thrown
   */
  private async runTracked(overrides: { dryRun?: boolean; opBudget?: number }): Promise<CycleReport | null> {
    const cycle = ++this.cycleCount;

    try {
      return await runCycle(
        { ...this.deps, events: this, logger: this.logger },
        {
          cycle,
          settings: this.settings,
          signal: this.controller.signal,
          ...overrides,
        }
      );
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      this.logger.error('cycle failed', { cycle, error: error.message });
      this.emit('cycle:failed', { cycle, error });
      return null;
    }
  }
}
