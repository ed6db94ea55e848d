/**
 * Removal of directories emptied by relocation
 */

import path from 'node:path';
import { setImmediate as yieldToEventLoop } from 'node:timers/promises';
import type { FileSystem } from './filesystem.js';
import { errorMessage, logger as rootLogger } from './logger.js';
import type { OperationLog } from './operation-log.js';
import { isInside } from './path-planner.js';

export interface CleanupOptions {
  fileSystem: FileSystem;
  operationLog: OperationLog;
  sourceRoot: string;
  backupRoot: string;
  /** Directories that stay even when empty (scope roots) */
  keep?: readonly string[];
  signal?: AbortSignal;
}

/**
 * Directories between each vacated file and the source root, deepest first
 */
export function collectVacatedDirectories(sourceRoot: string, vacatedFiles: Iterable<string>): string[] {
  const root = path.resolve(sourceRoot);
  const directories = new Set<string>();

  for (const file of vacatedFiles) {
    let current = path.dirname(path.resolve(file));
    while (current !== root && isInside(root, current) && !directories.has(current)) {
      directories.add(current);
      current = path.dirname(current);
    }
  }

  const depth = (directory: string) => directory.split(path.sep).length;
  return [...directories].sort((a, b) => depth(b) - depth(a) || (a < b ? -1 : a > b ? 1 : 0));
}

/**
 * Remove every directory left empty after its files were moved away,
 * bottom-up. The source root, the backup root (and anything inside it) and
 * the `keep` directories are never removed. Returns the number removed.
 */
export async function removeEmptyDirectories(
  vacatedFiles: Iterable<string>,
  options: CleanupOptions,
): Promise<number> {
  const logger = rootLogger.child('directory-cleanup');
  const sourceRoot = path.resolve(options.sourceRoot);
  const backupRoot = path.resolve(options.backupRoot);
  const keep = new Set((options.keep ?? []).map(directory => path.resolve(directory)));
  let removed = 0;

  for (const directory of collectVacatedDirectories(sourceRoot, vacatedFiles)) {
    // Let a pending interrupt land before the next removal
    await yieldToEventLoop();
    if (options.signal?.aborted) break;
    if (keep.has(directory) || isInside(backupRoot, directory) || isInside(directory, backupRoot)) continue;

    try {
      if (!options.fileSystem.exists(directory)) continue;
      if (options.fileSystem.readdir(directory).length > 0) continue;
      options.fileSystem.rmdir(directory);
    } catch (error) {
      logger.warn('Could not remove directory', { path: directory, error: errorMessage(error) });
      continue;
    }

    removed += 1;
    options.operationLog.record({
      kind: 'remove-directory',
      sourcePath: directory,
      simulated: false,
    });
  }

  return removed;
}
