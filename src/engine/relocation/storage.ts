/**
 * Storage stat provider.
 *
 * Reports capacity and occupancy of the volumes holding each tier root.
 * Values are read on every call; nothing is cached between cycles.
 *
 * @module engine/relocation/storage
 */

import * as fs from 'fs/promises';
import { Tier, type StorageStatProvider } from '../types.js';
import { rootOf, type TierRoots } from './paths.js';

// =============================================================================
// Helpers
// =============================================================================

/**
 * Convert a capacity in GB (1024^3 bytes) to bytes
 */
export function gbToBytes(gb: number): number {
  return Math.round(gb * 1024 ** 3);
}

function managedRoot(tier: Tier, roots: TierRoots): string {
  if (tier === Tier.UNMANAGED) {
    throw new Error('Unmanaged payloads have no storage root');
  }
  return rootOf(tier, roots);
}

// =============================================================================
// StatfsStorageProvider Class
// =============================================================================

/**
 * StorageStatProvider backed by fs.statfs
 */
export class StatfsStorageProvider implements StorageStatProvider {
  private readonly roots: TierRoots;

  constructor(roots: TierRoots) {
    this.roots = roots;
  }

  async capacityBytes(tier: Tier): Promise<number> {
    const stats = await fs.statfs(managedRoot(tier, this.roots));
    return stats.blocks * stats.bsize;
  }

  async usedBytes(tier: Tier): Promise<number> {
    const stats = await fs.statfs(managedRoot(tier, this.roots));
    return (stats.blocks - stats.bfree) * stats.bsize;
  }
}
