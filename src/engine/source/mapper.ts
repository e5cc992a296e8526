/**
 * qBittorrent torrent-info mapping.
 *
 * Validates the loosely typed entries of `/api/v2/torrents/info` and maps
 * them to Payload snapshots. A malformed entry is rejected on its own; the
 * rest of the listing is still usable.
 *
 * @module engine/source/mapper
 */

import type { Payload, RejectedEntry, SourceSnapshot } from '../types.js';
import { deriveTier, type TierRoots } from '../relocation/paths.js';

// =============================================================================
// Types
// =============================================================================

export type MapResult = { ok: true; payload: Payload } | { ok: false; rejected: RejectedEntry };

type RawEntry = Record<string, unknown>;

// =============================================================================
// Field Readers
// =============================================================================

const HASH_PATTERN = /^(?:[0-9a-f]{40}|[0-9a-f]{64})$/;

function isRecord(value: unknown): value is RawEntry {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isCount(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

/**
 * Swarm count, preferring the tracker-reported total and falling back to
 * connected peers when the tracker reports none (-1)
 */
function swarmCount(entry: RawEntry, total: string, connected: string): number | null {
  const totalValue = entry[total];
  const connectedValue = entry[connected];

  if (isCount(totalValue) && totalValue >= 0) return totalValue;
  if (isCount(connectedValue) && connectedValue >= 0) return connectedValue;
  return null;
}

// =============================================================================
// Mapping
// =============================================================================

/**
 * Map one raw torrent entry to a payload
 */
export function toPayload(raw: unknown, roots: TierRoots): MapResult {
  if (!isRecord(raw)) {
    return { ok: false, rejected: { reason: 'entry is not an object' } };
  }

  const hash = typeof raw.hash === 'string' ? raw.hash.toLowerCase() : undefined;
  const reject = (reason: string): MapResult => ({ ok: false, rejected: { id: hash, reason } });

  if (!hash || !HASH_PATTERN.test(hash)) {
    return reject('missing or malformed hash');
  }
  const { name, save_path: savePath, content_path: contentPath, size } = raw;

  if (typeof name !== 'string') {
    return reject('missing name');
  }
  if (typeof savePath !== 'string' || savePath === '') {
    return reject('missing save_path');
  }
  if (typeof contentPath !== 'string' || contentPath === '') {
    return reject('missing content_path');
  }
  if (!isCount(size) || size < 0) {
    return reject('missing or negative size');
  }

  const seeders = swarmCount(raw, 'num_complete', 'num_seeds');
  const leechers = swarmCount(raw, 'num_incomplete', 'num_leechs');
  if (seeders === null || leechers === null) {
    return reject('missing swarm counts');
  }

  const { upspeed, uploaded, added_on: addedOn, category } = raw;

  return {
    ok: true,
    payload: {
      id: hash,
      name,
      category: typeof category === 'string' ? category : '',
      size,
      seeders,
      leechers,
      uploadSpeed: isCount(upspeed) ? Math.max(0, upspeed) : 0,
      uploaded: isCount(uploaded) ? Math.max(0, uploaded) : 0,
      savePath,
      contentPath,
      addedOn: isCount(addedOn) ? addedOn : 0,
      tier: deriveTier(savePath, roots),
    },
  };
}

/**
 * Map a whole listing, splitting payloads from rejected entries
 */
export function toSnapshot(entries: readonly unknown[], roots: TierRoots): SourceSnapshot {
  const payloads: Payload[] = [];
  const rejected: RejectedEntry[] = [];

  for (const entry of entries) {
    const result = toPayload(entry, roots);
    if (result.ok) {
      payloads.push(result.payload);
    } else {
      rejected.push(result.rejected);
    }
  }

  return { payloads, rejected };
}
