/**
 * Platform-specific utilities.
 *
 * Provides path expansion that works across Windows, macOS, and Linux.
 *
 * @module utils/platform
 */

import { platform, homedir } from 'os';
import { resolve } from 'path';

/** Current platform is Windows */
export const isWindows = platform() === 'win32';

/**
 * Expands a path that may contain ~ to the user's home directory.
 *
 * @param path - Path that may start with ~/ or ~
 * @returns Expanded absolute path
 */
export function expandPath(path: string): string {
  if (path.startsWith('~/')) {
    return resolve(homedir(), path.slice(2));
  }
  if (path.startsWith('~')) {
    return resolve(homedir(), path.slice(1));
  }
  return path;
}
