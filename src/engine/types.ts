/**
 * Core type definitions for the seedtier engine.
 *
 * These types describe payload snapshots reported by the torrent client,
 * historical metric records, placement decisions and the relocation
 * operations derived from them, along with the collaborator interfaces
 * the engine consumes and its error hierarchy.
 *
 * @module engine/types
 */

// =============================================================================
// Enums
// =============================================================================

/**
 * Storage tier a payload is served from.
 *
 * UNMANAGED payloads live outside both configured roots. They are observed
 * and tracked but never planned or relocated.
 */
export enum Tier {
  /** Fast, bounded, disposable tier */
  CACHE = 'cache',

  /** Slow, permanent, authoritative tier */
  MASTER = 'master',

  /** Save path lies under neither tier root */
  UNMANAGED = 'unmanaged',
}

/**
 * Kind of relocation a payload needs.
 */
export enum OperationKind {
  /** master -> cache: copy, verify, repoint */
  PROMOTE = 'promote',

  /** cache -> master: repoint, then delete the cache copy */
  RELEGATE = 'relegate',

  /** Delete a cache copy the client no longer serves from */
  CLEANUP = 'cleanup',
}

/**
 * Lifecycle of a single relocation operation.
 *
 *   PENDING -> IN_PROGRESS -> COMPLETED
 *                         \-> FAILED
 */
export enum OperationStatus {
  PENDING = 'pending',
  IN_PROGRESS = 'in_progress',
  COMPLETED = 'completed',
  FAILED = 'failed',
}

/**
 * Phases of one rebalancing cycle, in execution order.
 */
export enum CyclePhase {
  FETCH = 'fetch',
  SCORE = 'score',
  PLAN = 'plan',
  RECONCILE = 'reconcile',
  EXECUTE = 'execute',
  PERSIST = 'persist',
  IDLE = 'idle',
}

// =============================================================================
// Core Interfaces
// =============================================================================

/**
 * One torrent's content as reported in a single source snapshot.
 */
export interface Payload {
  /** Lowercase hex info hash, 40 characters (v1) or 64 (v2); stable across cycles */
  id: string;

  /** Display name */
  name: string;

  /** Client category label, empty when uncategorized */
  category: string;

  /** Total size in bytes */
  size: number;

  /** Seeders in the swarm */
  seeders: number;

  /** Leechers in the swarm */
  leechers: number;

  /** Current upload rate in bytes/second */
  uploadSpeed: number;

  /** Total bytes uploaded over the torrent's lifetime */
  uploaded: number;

  /** Directory the client saves the torrent into */
  savePath: string;

  /** Absolute path of the torrent's root file or directory */
  contentPath: string;

  /** Unix timestamp (seconds) the torrent was added */
  addedOn: number;

  /** Tier derived from savePath for this snapshot */
  tier: Tier;
}

/**
 * Historical scoring inputs kept per payload across cycles.
 */
export interface MetricRecord {
  /** Exponential moving average of the upload rate, in GB/day */
  smoothedRate: number;

  /** Value of the uploaded counter when last observed */
  lastUploaded: number;

  /** Unix timestamp (seconds) of the last observation */
  lastChecked: number;
}

/**
 * A payload together with the score computed for it this cycle.
 */
export interface ScoredPayload {
  payload: Payload;
  score: number;
}

/**
 * Weights applied by the scorer. All must be non-negative.
 */
export interface ScoringWeights {
  /** Weight of the raw leecher count */
  leechers: number;

  /** Weight of the leecher/seeder scarcity ratio */
  ratio: number;

  /** Weight of the smoothed historical upload rate */
  history: number;
}

/**
 * Target placement chosen for one payload in one cycle.
 */
export interface PlacementDecision {
  payload: Payload;
  score: number;
  current: Tier;
  target: Tier;
}

/**
 * A single unit of relocation work.
 */
export interface RelocationOperation {
  kind: OperationKind;
  payloadId: string;
  name: string;
  category: string;
  size: number;
  score: number;

  /** Content path the data is read from (or removed, for CLEANUP) */
  sourcePath: string;

  /** Content path the data ends up at */
  destinationPath: string;

  /** Save location handed to the client on repoint */
  saveLocation: string;

  status: OperationStatus;
}

/**
 * Outcome of executing one operation.
 */
export interface OperationResult {
  operation: RelocationOperation;
  status: OperationStatus.COMPLETED | OperationStatus.FAILED;

  /** True when every step was only simulated */
  dryRun: boolean;

  /** Failure cause, when status is FAILED */
  error?: Error;
}

/**
 * Raw entry the source could not map to a payload.
 */
export interface RejectedEntry {
  /** Hash, when one could be read */
  id?: string;
  reason: string;
}

/**
 * Everything returned by one source poll.
 */
export interface SourceSnapshot {
  payloads: Payload[];
  rejected: RejectedEntry[];
}

/**
 * Per-file inventory entry used to verify copies.
 */
export interface FileEntry {
  /** Path relative to the inventoried root, '/'-separated */
  relativePath: string;
  size: number;
  mtimeMs: number;
}

// =============================================================================
// Collaborator Interfaces
// =============================================================================

/**
 * The torrent client control surface.
 */
export interface TorrentSource {
  /**
   * Fetch a snapshot of all known payloads.
   *
   * @throws {SourceUnavailableError} When the client cannot be reached
   */
  listPayloads(): Promise<SourceSnapshot>;

  /**
   * Repoint a torrent's save location. Resolves only on an affirmative
   * success response.
   *
   * @throws {RepointError} On any other outcome
   */
  setSaveLocation(id: string, location: string): Promise<void>;
}

/**
 * Key-value persistence of metric records.
 */
export interface MetricsStore {
  get(id: string): Promise<MetricRecord | undefined>;
  getAll(): Promise<Map<string, MetricRecord>>;
  upsert(id: string, record: MetricRecord): Promise<void>;
  delete(id: string): Promise<void>;
  close(): Promise<void>;
}

/**
 * Capacity and occupancy of a tier's volume.
 */
export interface StorageStatProvider {
  capacityBytes(tier: Tier): Promise<number>;
  usedBytes(tier: Tier): Promise<number>;
}

/**
 * Filesystem operations used by the relocation executor.
 */
export interface FileTransferProvider {
  /** Recursively copy, creating parents and preserving timestamps */
  copy(source: string, destination: string): Promise<void>;

  /** Recursively remove */
  remove(target: string): Promise<void>;

  exists(target: string): Promise<boolean>;

  /** List every regular file under a path (or the path itself) */
  inventory(target: string): Promise<FileEntry[]>;
}

// =============================================================================
// Configuration
// =============================================================================

/**
 * Torrent client connection settings.
 */
export interface ClientConfig {
  host: string;
  port: number;
  username: string;
  password: string;

  /** Per-request timeout in milliseconds */
  timeoutMs: number;
}

/**
 * PostgreSQL connection settings for the metrics store.
 */
export interface DatabaseConfig {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
}

/**
 * Logging settings.
 */
export interface LoggingConfig {
  level: LogLevel;

  /** Also append to this file when set */
  file: string | null;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Complete engine configuration.
 */
export interface EngineConfig {
  client: ClientConfig;

  /** null selects the in-memory metrics store */
  database: DatabaseConfig | null;

  /** Root of the fast tier */
  cachePath: string;

  /** Root of the permanent tier */
  masterPath: string;

  /** Seconds between the end of one cycle and the start of the next */
  checkIntervalSeconds: number;

  /** Share of cache capacity the planner may fill, 0-100 */
  targetFillPercent: number;

  /** Operations per cycle; 0 evaluates only, Infinity is unlimited */
  maxOperationsPerCycle: number;

  /** Simulate every relocation step */
  dryRun: boolean;

  weights: ScoringWeights;

  /** Smoothing factor of the upload-rate EMA, in (0, 1] */
  emaAlpha: number;

  /** Overrides the detected cache capacity when set */
  manualCacheCapacityGb: number | null;

  /** Seconds a metric record may go unobserved before it is pruned */
  metricGracePeriodSeconds: number;

  logging: LoggingConfig;
}

// =============================================================================
// Error Types
// =============================================================================

/**
 * Base error class for all seedtier errors.
 */
export class SeedtierError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SeedtierError';
  }
}

/**
 * The torrent client could not be reached or returned an unusable listing.
 */
export class SourceUnavailableError extends SeedtierError {
  constructor(message: string) {
    super(message);
    this.name = 'SourceUnavailableError';
  }
}

/**
 * The metrics store could not be reached.
 */
export class StoreUnavailableError extends SeedtierError {
  constructor(message: string) {
    super(message);
    this.name = 'StoreUnavailableError';
  }
}

/**
 * Base class for failures scoped to a single relocation operation.
 */
export class RelocationError extends SeedtierError {
  /** The path involved in the failed step */
  readonly path: string;

  constructor(message: string, path: string) {
    super(message);
    this.name = 'RelocationError';
    this.path = path;
  }
}

/**
 * Copying or verifying a payload failed.
 */
export class CopyError extends RelocationError {
  constructor(message: string, path: string) {
    super(message, path);
    this.name = 'CopyError';
  }
}

/**
 * The client did not confirm a save location change.
 */
export class RepointError extends RelocationError {
  /** HTTP status returned by the client, if any */
  readonly status?: number;

  constructor(message: string, path: string, status?: number) {
    super(message, path);
    this.name = 'RepointError';
    this.status = status;
  }
}

/**
 * Removing a cache copy failed.
 */
export class DeleteError extends RelocationError {
  constructor(message: string, path: string) {
    super(message, path);
    this.name = 'DeleteError';
  }
}

/**
 * Invalid configuration. Fatal at startup.
 */
export class ConfigurationError extends SeedtierError {
  /** Every problem found */
  readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid configuration: ${problems.join('; ')}`);
    this.name = 'ConfigurationError';
    this.problems = problems;
  }
}

// =============================================================================
// Utility Types
// =============================================================================

/**
 * Partial configuration accepted by mergeWithDefaults.
 */
export type PartialEngineConfig = Partial<
  Omit<EngineConfig, 'client' | 'weights' | 'logging'>
> & {
  client?: Partial<ClientConfig>;
  weights?: Partial<ScoringWeights>;
  logging?: Partial<LoggingConfig>;
};
