/**
 * Metrics Store Module
 *
 * @module engine/metrics
 */

export { MemoryMetricsStore } from './memory.js';
export { PostgresMetricsStore, toPoolConfig, type Queryable } from './postgres.js';
