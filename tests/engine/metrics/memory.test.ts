import { describe, it, expect } from 'vitest';
import { MemoryMetricsStore } from '../../../src/engine/metrics/memory.js';

const RECORD = { smoothedRate: 512, lastUploaded: 4096, lastChecked: 1700000000 };

describe('MemoryMetricsStore', () => {
  it('should start with the given records', async () => {
    const store = new MemoryMetricsStore([['a', RECORD]]);

    expect(store.size).toBe(1);
    expect(await store.get('a')).toEqual(RECORD);
    expect(await store.get('b')).toBeUndefined();
  });

  it('should replace a record on upsert', async () => {
    const store = new MemoryMetricsStore();

    await store.upsert('a', RECORD);
    await store.upsert('a', { ...RECORD, smoothedRate: 1 });

    expect(store.size).toBe(1);
    expect((await store.get('a'))?.smoothedRate).toBe(1);
  });

  it('should hand out copies', async () => {
    const store = new MemoryMetricsStore([['a', RECORD]]);

    const all = await store.getAll();
    const record = all.get('a');
    if (record) record.smoothedRate = 0;
    all.delete('a');

    expect(await store.get('a')).toEqual(RECORD);
  });

  it('should delete records', async () => {
    const store = new MemoryMetricsStore([['a', RECORD]]);

    await store.delete('a');
    await store.delete('missing');

    expect(store.size).toBe(0);
  });
});
