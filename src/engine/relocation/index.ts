/**
 * Relocation Module
 *
 * Moves payloads between the cache and master tiers.
 *
 * @module engine/relocation
 */

export {
  RelocationExecutor,
  compareInventories,
  type RelocationExecutorOptions,
  type ExecuteOptions,
} from './executor.js';

export { FsTransferProvider } from './transfer.js';

export { StatfsStorageProvider, gbToBytes } from './storage.js';

export {
  deriveTier,
  mapLocation,
  rootOf,
  isSameOrInside,
  isStrictlyInside,
  type TierRoots,
  type TierLocation,
} from './paths.js';
