import { describe, it, expect } from 'vitest';
import {
  score,
  scoreAll,
  scarcity,
  toGbPerDay,
  updateMetric,
  compareScored,
} from '../../../src/engine/scoring/scorer.js';
import type { ScoringWeights } from '../../../src/engine/types.js';
import { makePayload } from '../../helpers/fakes.js';

const WEIGHTS: ScoringWeights = { leechers: 1000, ratio: 200, history: 1 };
const GB = 1024 ** 3;

describe('scarcity', () => {
  it('should divide leechers by seeders', () => {
    expect(scarcity(10, 4)).toBe(2.5);
  });

  it('should treat a seederless swarm as having one seeder', () => {
    expect(scarcity(7, 0)).toBe(7);
  });
});

describe('toGbPerDay', () => {
  it('should convert bytes per second to GB per day', () => {
    expect(toGbPerDay(GB / 86400)).toBeCloseTo(1, 10);
    expect(toGbPerDay(0)).toBe(0);
  });
});

describe('score', () => {
  it('should rank demand and scarcity above a calm swarm', () => {
    const a = makePayload({ name: 'A', leechers: 50, seeders: 1 });
    const b = makePayload({ name: 'B', leechers: 5, seeders: 10 });
    const c = makePayload({ name: 'C', leechers: 0, seeders: 5 });

    expect(score(a, undefined, WEIGHTS)).toBe(60000);
    expect(score(b, undefined, WEIGHTS)).toBe(5100);
    expect(score(c, undefined, WEIGHTS)).toBe(0);

    const ranked = scoreAll([c, a, b], new Map(), WEIGHTS);
    expect(ranked.map((s) => s.payload.name)).toEqual(['A', 'B', 'C']);
  });

  it('should use the smoothed rate when a metric record exists', () => {
    const payload = makePayload({ leechers: 0, seeders: 1, uploadSpeed: GB / 86400 });
    const metric = { smoothedRate: 42, lastUploaded: 0, lastChecked: 0 };

    expect(score(payload, metric, WEIGHTS)).toBe(42);
  });

  it('should fall back to the instantaneous rate on cold start', () => {
    const payload = makePayload({ leechers: 0, seeders: 1, uploadSpeed: (3 * GB) / 86400 });

    expect(score(payload, undefined, WEIGHTS)).toBeCloseTo(3, 10);
  });

  it('should be non-negative for non-negative inputs', () => {
    for (const leechers of [0, 1, 7, 1000]) {
      for (const seeders of [0, 1, 50]) {
        const payload = makePayload({ leechers, seeders, uploadSpeed: 123 });
        expect(score(payload, undefined, WEIGHTS)).toBeGreaterThanOrEqual(0);
      }
    }
  });

  it('should strictly increase with leecher count', () => {
    let previous = -1;
    for (let leechers = 0; leechers <= 20; leechers++) {
      const value = score(makePayload({ leechers, seeders: 3 }), undefined, WEIGHTS);
      expect(value).toBeGreaterThan(previous);
      previous = value;
    }
  });
});

describe('compareScored', () => {
  it('should break ties by ascending id', () => {
    const first = { payload: makePayload({ id: 'a'.repeat(40) }), score: 10 };
    const second = { payload: makePayload({ id: 'b'.repeat(40) }), score: 10 };

    expect([second, first].sort(compareScored)).toEqual([first, second]);
  });
});

describe('updateMetric', () => {
  it('should seed the average with the instantaneous rate', () => {
    const payload = makePayload({ uploadSpeed: (2 * GB) / 86400, uploaded: 5000 });
    const record = updateMetric(undefined, payload, 1000, 0.5);

    expect(record.smoothedRate).toBeCloseTo(2, 10);
    expect(record.lastUploaded).toBe(5000);
    expect(record.lastChecked).toBe(1000);
  });

  it('should blend the observed rate into the average', () => {
    const previous = { smoothedRate: 10, lastUploaded: 0, lastChecked: 1000 };
    const payload = makePayload({ uploaded: GB });
    const record = updateMetric(previous, payload, 1000 + 86400, 0.5);

    expect(record.smoothedRate).toBeCloseTo(5.5, 10);
    expect(record.lastUploaded).toBe(GB);
    expect(record.lastChecked).toBe(87400);
  });

  it('should count a counter reset as no upload', () => {
    const previous = { smoothedRate: 4, lastUploaded: 9000, lastChecked: 0 };
    const record = updateMetric(previous, makePayload({ uploaded: 100 }), 3600, 0.25);

    expect(record.smoothedRate).toBe(3);
    expect(record.lastUploaded).toBe(100);
  });

  it('should decay the average when no time has passed', () => {
    const previous = { smoothedRate: 8, lastUploaded: 0, lastChecked: 500 };
    const record = updateMetric(previous, makePayload({ uploaded: GB }), 500, 0.5);

    expect(record.smoothedRate).toBe(4);
  });
});
