/**
 * In-memory metrics store.
 *
 * Keeps metric records for the lifetime of the process. Used by tests and
 * when the daemon runs without a database; history is lost on restart.
 *
 * @module engine/metrics/memory
 */

import type { MetricRecord, MetricsStore } from '../types.js';

export class MemoryMetricsStore implements MetricsStore {
  private readonly records = new Map<string, MetricRecord>();

  constructor(initial?: Iterable<[string, MetricRecord]>) {
    if (initial) {
      for (const [id, record] of initial) {
        this.records.set(id, { ...record });
      }
    }
  }

  async get(id: string): Promise<MetricRecord | undefined> {
    const record = this.records.get(id);
    return record ? { ...record } : undefined;
  }

  async getAll(): Promise<Map<string, MetricRecord>> {
    const copy = new Map<string, MetricRecord>();
    for (const [id, record] of this.records) {
      copy.set(id, { ...record });
    }
    return copy;
  }

  async upsert(id: string, record: MetricRecord): Promise<void> {
    this.records.set(id, { ...record });
  }

  async delete(id: string): Promise<void> {
    this.records.delete(id);
  }

  async close(): Promise<void> {
    // Nothing to release
  }

  /** Number of stored records */
  get size(): number {
    return this.records.size;
  }
}
