/**
 * In-process stand-ins for the engine's collaborators.
 */

import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import {
  RepointError,
  SourceUnavailableError,
  StoreUnavailableError,
  Tier,
  type FileEntry,
  type FileTransferProvider,
  type MetricRecord,
  type Payload,
  type SourceSnapshot,
  type StorageStatProvider,
  type TorrentSource,
} from '../../src/engine/types.js';
import { MemoryMetricsStore } from '../../src/engine/metrics/memory.js';
import { deriveTier, type TierRoots } from '../../src/engine/relocation/paths.js';

// =============================================================================
// Payloads
// =============================================================================

export const ROOTS: TierRoots = { cache: '/cache', master: '/data' };

let hashCounter = 0;

/**
 * 40-char hex id built from a short label, e.g. hashOf('A') = '4141...'
 */
export function hashOf(label: string): string {
  const hex = Buffer.from(label).toString('hex');
  return hex.repeat(Math.ceil(40 / hex.length)).slice(0, 40);
}

/**
 * Build a payload on the given tier, under `<root>/movies/<name>`
 */
export function makePayload(
  overrides: Partial<Payload> & { name?: string; tier?: Tier } = {},
  roots: TierRoots = ROOTS
): Payload {
  hashCounter++;
  const name = overrides.name ?? `payload-${hashCounter}`;
  const tier = overrides.tier ?? Tier.MASTER;
  const root = tier === Tier.CACHE ? roots.cache : tier === Tier.MASTER ? roots.master : '/elsewhere';
  const savePath = overrides.savePath ?? path.join(root, 'movies');

  return {
    id: overrides.id ?? hashOf(name),
    name,
    category: 'movies',
    size: 1000,
    seeders: 1,
    leechers: 0,
    uploadSpeed: 0,
    uploaded: 0,
    contentPath: path.join(savePath, name),
    addedOn: 1700000000,
    ...overrides,
    savePath,
    tier: deriveTier(savePath, roots),
  };
}

// =============================================================================
// Torrent Source
// =============================================================================

/**
 * Torrent source over an in-memory payload list. Repointing moves the
 * payload's save and content paths, as the real client does.
 */
export class FakeSource implements TorrentSource {
  payloads: Payload[];
  readonly calls: string[] = [];
  failListing = false;
  failRepoint = false;

  constructor(payloads: Payload[] = [], private readonly roots: TierRoots = ROOTS) {
    this.payloads = payloads;
  }

  async listPayloads(): Promise<SourceSnapshot> {
    this.calls.push('list');
    if (this.failListing) {
      throw new SourceUnavailableError('connection refused');
    }
    return { payloads: this.payloads.map((p) => ({ ...p })), rejected: [] };
  }

  async setSaveLocation(id: string, location: string): Promise<void> {
    this.calls.push(`repoint ${id} ${location}`);
    if (this.failRepoint) {
      throw new RepointError(`Repoint of ${id} rejected (HTTP 500)`, location, 500);
    }
    this.payloads = this.payloads.map((p) =>
      p.id === id
        ? {
            ...p,
            savePath: location,
            contentPath: path.join(location, path.basename(p.contentPath)),
            tier: deriveTier(location, this.roots),
          }
        : p
    );
  }
}

// =============================================================================
// File Transfer
// =============================================================================

/**
 * Transfer provider over a set of existing paths; records every call
 */
export class FakeTransfer implements FileTransferProvider {
  readonly calls: string[] = [];
  readonly present = new Set<string>();
  failCopy = false;
  failRemove = false;

  /** Report a truncated inventory for paths under the cache root */
  corruptCopy = false;

  constructor(present: Iterable<string> = []) {
    for (const p of present) this.present.add(p);
  }

  async copy(source: string, destination: string): Promise<void> {
    this.calls.push(`copy ${source} ${destination}`);
    if (this.failCopy) {
      throw new Error('disk full');
    }
    this.present.add(destination);
  }

  async remove(target: string): Promise<void> {
    this.calls.push(`remove ${target}`);
    if (this.failRemove) {
      throw new Error('permission denied');
    }
    this.present.delete(target);
  }

  async exists(target: string): Promise<boolean> {
    this.calls.push(`exists ${target}`);
    return this.present.has(target);
  }

  async inventory(target: string): Promise<FileEntry[]> {
    this.calls.push(`inventory ${target}`);
    const size = this.corruptCopy && target.startsWith(ROOTS.cache) ? 10 : 1000;
    return [{ relativePath: path.basename(target), size, mtimeMs: 0 }];
  }

  /** Calls that change something */
  get mutations(): string[] {
    return this.calls.filter((c) => c.startsWith('copy') || c.startsWith('remove'));
  }
}

// =============================================================================
// Storage and Store
// =============================================================================

export class FakeStorage implements StorageStatProvider {
  constructor(
    public capacity: number,
    public used = 0,
    public fail = false
  ) {}

  async capacityBytes(): Promise<number> {
    if (this.fail) throw new Error('statfs failed');
    return this.capacity;
  }

  async usedBytes(): Promise<number> {
    if (this.fail) throw new Error('statfs failed');
    return this.used;
  }
}

/**
 * Memory store that counts writes and can be switched to fail
 */
export class RecordingStore extends MemoryMetricsStore {
  writes = 0;
  failReads = false;
  failWrites = false;

  async getAll(): Promise<Map<string, MetricRecord>> {
    if (this.failReads) throw new StoreUnavailableError('store down');
    return super.getAll();
  }

  async upsert(id: string, record: MetricRecord): Promise<void> {
    if (this.failWrites) throw new StoreUnavailableError('store down');
    this.writes++;
    return super.upsert(id, record);
  }

  async delete(id: string): Promise<void> {
    if (this.failWrites) throw new StoreUnavailableError('store down');
    this.writes++;
    return super.delete(id);
  }
}

// =============================================================================
// Scenarios
// =============================================================================

/**
 * Three payloads and room for two on the cache: Hot (score 6000) waits on
 * master, Warm (2400) and Cold (0) sit on cache and fill it. The plan
 * promotes Hot and relegates Cold.
 */
export function makeScenario() {
  const hot = makePayload({ name: 'Hot', leechers: 5 });
  const warm = makePayload({ name: 'Warm', tier: Tier.CACHE, leechers: 2 });
  const cold = makePayload({ name: 'Cold', tier: Tier.CACHE });

  return {
    hot,
    warm,
    cold,
    source: new FakeSource([hot, warm, cold]),
    transfer: new FakeTransfer([
      '/data/movies/Hot',
      '/cache/movies/Warm',
      '/data/movies/Warm',
      '/cache/movies/Cold',
      '/data/movies/Cold',
    ]),
    storage: new FakeStorage(2000, 2000),
    store: new RecordingStore(),
  };
}

// =============================================================================
// Temporary Directories
// =============================================================================

let testCounter = 0;

/**
 * Create a unique temporary directory for each test
 */
export async function createTestDir(label: string): Promise<string> {
  testCounter++;
  const dir = path.join(os.tmpdir(), `seedtier-${label}-${Date.now()}-${testCounter}`);
  await fs.mkdir(dir, { recursive: true });
  return dir;
}

/**
 * Clean up test directory
 */
export async function cleanupTestDir(dir: string): Promise<void> {
  try {
    await fs.rm(dir, { recursive: true, force: true });
  } catch {
    // Ignore cleanup errors
  }
}
