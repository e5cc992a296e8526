import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as path from 'path';
import * as fs from 'fs/promises';
import { StatfsStorageProvider, gbToBytes } from '../../../src/engine/relocation/storage.js';
import { Tier } from '../../../src/engine/types.js';
import { cleanupTestDir, createTestDir } from '../../helpers/fakes.js';

describe('gbToBytes', () => {
  it('should use binary gigabytes', () => {
    expect(gbToBytes(1)).toBe(1073741824);
    expect(gbToBytes(0.5)).toBe(536870912);
  });
});

describe('StatfsStorageProvider', () => {
  let testDir: string;
  let provider: StatfsStorageProvider;

  beforeEach(async () => {
    testDir = await createTestDir('storage');
    await fs.mkdir(path.join(testDir, 'cache'));
    await fs.mkdir(path.join(testDir, 'data'));
    provider = new StatfsStorageProvider({
      cache: path.join(testDir, 'cache'),
      master: path.join(testDir, 'data'),
    });
  });

  afterEach(async () => {
    await cleanupTestDir(testDir);
  });

  it('should report the volume holding each root', async () => {
    const capacity = await provider.capacityBytes(Tier.CACHE);
    const used = await provider.usedBytes(Tier.CACHE);

    expect(capacity).toBeGreaterThan(0);
    expect(used).toBeGreaterThanOrEqual(0);
    expect(used).toBeLessThanOrEqual(capacity);
  });

  it('should fail for a missing root', async () => {
    await fs.rm(path.join(testDir, 'data'), { recursive: true });

    await expect(provider.capacityBytes(Tier.MASTER)).rejects.toThrow();
  });

  it('should refuse unmanaged payloads', async () => {
    await expect(provider.capacityBytes(Tier.UNMANAGED)).rejects.toThrow(
      'Unmanaged payloads have no storage root'
    );
  });
});
