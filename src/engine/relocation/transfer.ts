/**
 * Filesystem transfer provider.
 *
 * Copies payloads between tier roots preserving names, sizes and
 * modification times so the torrent client recognizes the copy as
 * complete, and removes cache copies.
 *
 * @module engine/relocation/transfer
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import {
  CopyError,
  DeleteError,
  type FileEntry,
  type FileTransferProvider,
} from '../types.js';

// =============================================================================
// Helpers
// =============================================================================

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Collect regular files below a directory, '/'-separated relative paths
 */
async function walk(root: string, prefix: string, out: FileEntry[]): Promise<void> {
  const entries = await fs.readdir(path.join(root, prefix), { withFileTypes: true });

  for (const entry of entries) {
    const relativePath = prefix ? `${prefix}/${entry.name}` : entry.name;

    if (entry.isDirectory()) {
      await walk(root, relativePath, out);
    } else if (entry.isFile()) {
      const stats = await fs.stat(path.join(root, relativePath));
      out.push({ relativePath, size: stats.size, mtimeMs: stats.mtimeMs });
    }
  }
}

// =============================================================================
// FsTransferProvider Class
// =============================================================================

/**
 * FileTransferProvider backed by the local filesystem
 *
 * @example
 * ```typescript
 * const transfer = new FsTransferProvider();
 * await transfer.copy('/data/downloads/movies/Film', '/cache/movies/Film');
 * const files = await transfer.inventory('/cache/movies/Film');
 * ```
 */
export class FsTransferProvider implements FileTransferProvider {
  /**
   * Recursively copy a file or directory, creating parent directories.
   * Existing files at the destination are overwritten.
   *
   * @throws {CopyError} If any part of the copy fails
   */
  async copy(source: string, destination: string): Promise<void> {
    try {
      await fs.mkdir(path.dirname(destination), { recursive: true });
      await fs.cp(source, destination, {
        recursive: true,
        preserveTimestamps: true,
        force: true,
        errorOnExist: false,
      });
    } catch (err) {
      throw new CopyError(
        `Failed to copy ${source} to ${destination}: ${errorMessage(err)}`,
        destination
      );
    }
  }

  /**
   * Recursively remove a file or directory. A missing target is not an error.
   *
   * @throws {DeleteError} If removal fails
   */
  async remove(target: string): Promise<void> {
    try {
      await fs.rm(target, { recursive: true, force: true });
    } catch (err) {
      throw new DeleteError(`Failed to remove ${target}: ${errorMessage(err)}`, target);
    }
  }

  async exists(target: string): Promise<boolean> {
    try {
      await fs.access(target);
      return true;
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === 'ENOENT') {
        return false;
      }
      throw err;
    }
  }

  /**
   * List the regular files making up a payload, sorted by relative path.
   * A single-file payload lists itself under its base name.
   */
  async inventory(target: string): Promise<FileEntry[]> {
    const stats = await fs.stat(target);

    if (!stats.isDirectory()) {
      return [{ relativePath: path.basename(target), size: stats.size, mtimeMs: stats.mtimeMs }];
    }

    const files: FileEntry[] = [];
    await walk(target, '', files);
    return files.sort((a, b) => (a.relativePath < b.relativePath ? -1 : a.relativePath > b.relativePath ? 1 : 0));
  }
}
