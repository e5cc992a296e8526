/**
 * Tier path mapping.
 *
 * Derives a payload's tier from its save path and maps save/content paths
 * from one tier root to the other, keeping the category subdirectory.
 *
 * e.g. with cache root `/cache` and master root `/data/downloads`:
 *   save    /data/downloads/movies          -> /cache/movies
 *   content /data/downloads/movies/Film     -> /cache/movies/Film
 *
 * @module engine/relocation/paths
 */

import * as path from 'path';
import { Tier } from '../types.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Roots of both managed tiers
 */
export interface TierRoots {
  cache: string;
  master: string;
}

/**
 * A payload's locations within one tier
 */
export interface TierLocation {
  /** Directory handed to the client as save location */
  saveLocation: string;

  /** Path of the payload's root file or directory */
  contentPath: string;
}

// =============================================================================
// Path Predicates
// =============================================================================

function relativeTo(root: string, target: string): string | null {
  const rel = path.relative(path.resolve(root), path.resolve(target));
  if (rel === '..' || rel.startsWith(`..${path.sep}`) || path.isAbsolute(rel)) {
    return null;
  }
  return rel;
}

/**
 * Whether target is root itself or lies below it, on a segment boundary
 */
export function isSameOrInside(root: string, target: string): boolean {
  return relativeTo(root, target) !== null;
}

/**
 * Whether target lies strictly below root
 */
export function isStrictlyInside(root: string, target: string): boolean {
  const rel = relativeTo(root, target);
  return rel !== null && rel !== '';
}

// =============================================================================
// Tier Mapping
// =============================================================================

/**
 * Tier of a save path. When one root contains the other, the deeper root
 * wins.
 */
export function deriveTier(savePath: string, roots: TierRoots): Tier {
  const inCache = isSameOrInside(roots.cache, savePath);
  const inMaster = isSameOrInside(roots.master, savePath);

  if (inCache && inMaster) {
    return path.resolve(roots.cache).length >= path.resolve(roots.master).length
      ? Tier.CACHE
      : Tier.MASTER;
  }
  if (inCache) return Tier.CACHE;
  if (inMaster) return Tier.MASTER;
  return Tier.UNMANAGED;
}

/**
 * Root directory of a managed tier
 */
export function rootOf(tier: Tier.CACHE | Tier.MASTER, roots: TierRoots): string {
  return tier === Tier.CACHE ? roots.cache : roots.master;
}

/**
 * Map a payload's location from one tier root to another.
 *
 * @returns null when the save or content path is not under the source root
 */
export function mapLocation(
  location: TierLocation,
  from: Tier.CACHE | Tier.MASTER,
  to: Tier.CACHE | Tier.MASTER,
  roots: TierRoots
): TierLocation | null {
  const sourceRoot = rootOf(from, roots);
  const targetRoot = rootOf(to, roots);

  const relSave = relativeTo(sourceRoot, location.saveLocation);
  const relContent = relativeTo(sourceRoot, location.contentPath);
  if (relSave === null || relContent === null || relContent === '') {
    return null;
  }

  return {
    saveLocation: path.join(targetRoot, relSave),
    contentPath: path.join(targetRoot, relContent),
  };
}
