/**
 * Lazy, restartable directory walk
 */

import path from 'node:path';
import type { DirectoryEntry, FileSystem } from './filesystem.js';
import { isInside } from './path-planner.js';

export interface ScannedFile {
  path: string;
  sizeBytes: number;
  /** False for symlinks, FIFOs, sockets and devices; their size is reported as 0 */
  regular: boolean;
}

export interface WalkOptions {
  /** Absolute directories that are neither listed nor descended into */
  exclude?: readonly string[];
  onError?: (targetPath: string, error: unknown) => void;
}

/**
 * Entries under `root` in a stable order: a directory's files (sorted by name)
 * come before its subdirectories, which are visited depth-first in name order.
 * Anything that is not a directory is listed, symlinks included; symlinked
 * directories are not followed.
 *
 * Each iteration starts a fresh walk of the current tree.
 */
export function walkFiles(fileSystem: FileSystem, root: string, options: WalkOptions = {}): Iterable<ScannedFile> {
  const exclude = (options.exclude ?? []).map(entry => path.resolve(entry));
  const isExcluded = (candidate: string) => exclude.some(excluded => isInside(excluded, candidate));

  function* walk(): Generator<ScannedFile> {
    const stack: string[] = [path.resolve(root)];

    while (stack.length > 0) {
      const directory = stack.pop();
      if (directory === undefined) break;

      let entries: DirectoryEntry[];
      try {
        entries = fileSystem.readdir(directory).sort((a, b) => compareNames(a.name, b.name));
      } catch (error) {
        options.onError?.(directory, error);
        continue;
      }

      const subdirectories: string[] = [];
      for (const entry of entries) {
        const absolutePath = path.join(directory, entry.name);
        if (isExcluded(absolutePath)) continue;

        if (entry.isDirectory()) {
          subdirectories.push(absolutePath);
          continue;
        }

        if (!entry.isFile()) {
          yield { path: absolutePath, sizeBytes: 0, regular: false };
          continue;
        }

        let sizeBytes: number;
        try {
          sizeBytes = fileSystem.stat(absolutePath).size;
        } catch (error) {
          options.onError?.(absolutePath, error);
          continue;
        }

        yield { path: absolutePath, sizeBytes, regular: true };
      }

      for (const subdirectory of subdirectories.reverse()) {
        stack.push(subdirectory);
      }
    }
  }

  return { [Symbol.iterator]: walk };
}

function compareNames(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}
