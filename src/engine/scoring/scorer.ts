/**
 * Payload Scorer
 *
 * Maps a payload's swarm signals and its historical upload rate to a single
 * popularity score. Payloads that are both in demand and under-seeded rank
 * highest. Also owns the moving-average update applied to metric records at
 * the end of each cycle.
 *
 * @module engine/scoring/scorer
 */

import type { MetricRecord, Payload, ScoredPayload, ScoringWeights } from '../types.js';

// =============================================================================
// Constants
// =============================================================================

const SECONDS_PER_DAY = 86400;
const BYTES_PER_GB = 1024 ** 3;

// =============================================================================
// Scoring
// =============================================================================

/**
 * Leechers per available seeder. A swarm without seeders counts as having
 * one so the ratio stays finite.
 */
export function scarcity(leechers: number, seeders: number): number {
  return leechers / Math.max(seeders, 1);
}

/**
 * Convert a rate in bytes/second to GB/day
 */
export function toGbPerDay(bytesPerSecond: number): number {
  return (bytesPerSecond * SECONDS_PER_DAY) / BYTES_PER_GB;
}

/**
 * Score a payload.
 *
 * Without a metric record the historical term falls back to the payload's
 * instantaneous upload rate.
 *
 * @param payload - Snapshot attributes
 * @param metric - Historical record, if one exists
 * @param weights - Non-negative term weights
 */
export function score(
  payload: Payload,
  metric: MetricRecord | undefined,
  weights: ScoringWeights
): number {
  const historical = metric ? metric.smoothedRate : toGbPerDay(payload.uploadSpeed);

  return (
    weights.leechers * payload.leechers +
    weights.ratio * scarcity(payload.leechers, payload.seeders) +
    weights.history * historical
  );
}

/**
 * Ranking order: score descending, then id ascending.
 */
export function compareScored(a: ScoredPayload, b: ScoredPayload): number {
  if (a.score !== b.score) {
    return b.score - a.score;
  }
  if (a.payload.id < b.payload.id) return -1;
  if (a.payload.id > b.payload.id) return 1;
  return 0;
}

/**
 * Score every payload and return them in ranking order
 */
export function scoreAll(
  payloads: readonly Payload[],
  metrics: ReadonlyMap<string, MetricRecord>,
  weights: ScoringWeights
): ScoredPayload[] {
  return payloads
    .map((payload) => ({ payload, score: score(payload, metrics.get(payload.id), weights) }))
    .sort(compareScored);
}

// =============================================================================
// Metric Updates
// =============================================================================

/**
 * Fold one observation into a payload's metric record.
 *
 * The observed rate is the uploaded-counter delta over the time since the
 * last observation. A counter that went backwards (torrent re-added) counts
 * as no upload. The first observation seeds the average with the
 * instantaneous rate.
 *
 * @param previous - Record from the last cycle, if any
 * @param payload - This cycle's snapshot
 * @param now - Unix timestamp in seconds
 * @param alpha - Smoothing factor in (0, 1]
 */
export function updateMetric(
  previous: MetricRecord | undefined,
  payload: Payload,
  now: number,
  alpha: number
): MetricRecord {
  if (!previous) {
    return {
      smoothedRate: toGbPerDay(payload.uploadSpeed),
      lastUploaded: payload.uploaded,
      lastChecked: now,
    };
  }

  const elapsed = now - previous.lastChecked;
  let observedRate = 0;
  if (elapsed > 0) {
    const delta = Math.max(0, payload.uploaded - previous.lastUploaded);
    observedRate = toGbPerDay(delta / elapsed);
  }

  return {
    smoothedRate: alpha * observedRate + (1 - alpha) * previous.smoothedRate,
    lastUploaded: payload.uploaded,
    lastChecked: now,
  };
}
