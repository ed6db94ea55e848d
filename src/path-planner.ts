/**
 * Destination planning for relocated files
 *
 * Preserve mode mirrors the source tree under the backup root. Flatten mode
 * treats each top-level directory as a scope: media collapses onto the scope
 * root, everything else is backed up under backupRoot/<scope>/...
 */

import path from 'node:path';
import type { FileSystem } from './filesystem.js';
import type { Classification, PersonScope, PlanMode } from './types.js';

const MAX_SUFFIX_ATTEMPTS = 10_000;

export function isInside(parentAbs: string, candidateAbs: string): boolean {
  const relative = path.relative(parentAbs, candidateAbs);
  return relative === '' || (!relative.startsWith('..') && !path.isAbsolute(relative));
}

/**
 * First of `name.ext`, `name (1).ext`, `name (2).ext`, ... that is not taken
 */
export function disambiguate(candidate: string, isTaken: (candidatePath: string) => boolean): string {
  if (!isTaken(candidate)) {
    return candidate;
  }

  const parsed = path.parse(candidate);
  for (let attempt = 1; attempt <= MAX_SUFFIX_ATTEMPTS; attempt++) {
    const alternative = path.join(parsed.dir, `${parsed.name} (${attempt})${parsed.ext}`);
    if (!isTaken(alternative)) {
      return alternative;
    }
  }

  throw new Error(`Unable to find a free name for ${candidate}`);
}

/**
 * Top-level directories of the source root, excluding the backup root
 */
export function listScopes(fileSystem: FileSystem, sourceRoot: string, backupRoot: string): PersonScope[] {
  return fileSystem
    .readdir(sourceRoot)
    .filter(entry => entry.isDirectory())
    .map(entry => ({ name: entry.name, root: path.join(sourceRoot, entry.name) }))
    .filter(scope => !isInside(scope.root, backupRoot) && !isInside(backupRoot, scope.root))
    .sort((a, b) => a.name.localeCompare(b.name));
}

export function resolveScope(
  sourcePath: string,
  sourceRoot: string,
  scopes: readonly PersonScope[],
): PersonScope | null {
  const relative = path.relative(sourceRoot, sourcePath);
  const [topLevel, ...rest] = relative.split(path.sep);
  // A file directly in the source root belongs to no scope
  if (!topLevel || rest.length === 0) return null;
  return scopes.find(scope => scope.name === topLevel) ?? null;
}

/**
 * Where a file would go, before collision handling
 */
export function plan(
  sourcePath: string,
  sourceRoot: string,
  backupRoot: string,
  mode: PlanMode,
  classification: Classification = 'non-media',
  scopes: readonly PersonScope[] = [],
): string {
  const relative = path.relative(sourceRoot, sourcePath);

  if (mode === 'flatten-by-scope') {
    const scope = resolveScope(sourcePath, sourceRoot, scopes);
    if (scope) {
      if (classification === 'media') {
        return path.join(scope.root, path.basename(sourcePath));
      }
      return path.join(backupRoot, scope.name, path.relative(scope.root, sourcePath));
    }
  }

  return path.join(backupRoot, relative);
}

export interface PathPlannerOptions {
  sourceRoot: string;
  backupRoot: string;
  mode: PlanMode;
  fileSystem: FileSystem;
  scopes?: readonly PersonScope[];
}

/**
 * Plans destinations for one pass, never handing out the same path twice.
 *
 * Reserved paths are tracked in memory so a dry run (where nothing moves)
 * assigns exactly the suffixes the live pass will.
 */
export class PathPlanner {
  private readonly sourceRoot: string;
  private readonly backupRoot: string;
  private readonly mode: PlanMode;
  private readonly fileSystem: FileSystem;
  private readonly scopes: readonly PersonScope[];
  private readonly reserved = new Set<string>();

  constructor(options: PathPlannerOptions) {
    this.sourceRoot = path.resolve(options.sourceRoot);
    this.backupRoot = path.resolve(options.backupRoot);
    this.mode = options.mode;
    this.fileSystem = options.fileSystem;
    this.scopes = options.scopes ?? [];
  }

  resolveScope(sourcePath: string): PersonScope | null {
    return resolveScope(sourcePath, this.sourceRoot, this.scopes);
  }

  /**
   * Destination for `sourcePath`. Returns `sourcePath` itself when the file
   * stays where it is: media in preserve mode, media outside any scope, or
   * media already at its scope root.
   */
  plan(sourcePath: string, classification: Classification): string {
    // Media only moves when it is flattened onto a scope root
    if (classification === 'media' && (this.mode === 'preserve' || !this.resolveScope(sourcePath))) {
      this.reserved.add(sourcePath);
      return sourcePath;
    }

    const candidate = plan(sourcePath, this.sourceRoot, this.backupRoot, this.mode, classification, this.scopes);

    if (candidate === sourcePath) {
      this.reserved.add(candidate);
      return candidate;
    }

    const destination = disambiguate(
      candidate,
      candidatePath => this.reserved.has(candidatePath) || this.fileSystem.exists(candidatePath),
    );
    this.reserved.add(destination);
    return destination;
  }
}
