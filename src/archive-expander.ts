/**
 * In-place archive expansion
 *
 * Archives are extracted next to themselves and deleted, pass after pass,
 * until a pass finds none. Archives that fail to extract stay where they are
 * and are recorded as errors; so are archives still present once the pass
 * limit runs out.
 */

import path from 'node:path';
import glob from 'fast-glob';
import JSZip from 'jszip';
import type { FileSystem } from './filesystem.js';
import { errorMessage, logger as rootLogger } from './logger.js';
import type { OperationLog } from './operation-log.js';
import { disambiguate, isInside } from './path-planner.js';

export const DEFAULT_MAX_ARCHIVE_PASSES = 10;

export interface ArchiveExpanderOptions {
  fileSystem: FileSystem;
  operationLog: OperationLog;
  archiveExtensions: ReadonlySet<string>;
  /** Directories never searched for archives (the backup root) */
  exclude?: readonly string[];
  maxPasses?: number;
  dryRun?: boolean;
  signal?: AbortSignal;
  onArchive?: (archivePath: string) => void;
}

function toPosixPath(value: string): string {
  return value.split(path.sep).join('/');
}

export class ArchiveExpander {
  private readonly fileSystem: FileSystem;
  private readonly operationLog: OperationLog;
  private readonly archiveExtensions: ReadonlySet<string>;
  private readonly exclude: string[];
  private readonly maxPasses: number;
  private readonly dryRun: boolean;
  private readonly signal?: AbortSignal;
  private readonly onArchive?: (archivePath: string) => void;
  private readonly failed = new Set<string>();
  private readonly extracted = new Set<string>();
  private readonly logger = rootLogger.child('archive-expander');

  constructor(options: ArchiveExpanderOptions) {
    this.fileSystem = options.fileSystem;
    this.operationLog = options.operationLog;
    this.archiveExtensions = options.archiveExtensions;
    this.exclude = (options.exclude ?? []).map(entry => path.resolve(entry));
    this.maxPasses = Math.max(1, options.maxPasses ?? DEFAULT_MAX_ARCHIVE_PASSES);
    this.dryRun = options.dryRun ?? false;
    this.signal = options.signal;
    this.onArchive = options.onArchive;
  }

  /**
   * Paths of files written by extraction during this expander's lifetime
   */
  get extractedPaths(): ReadonlySet<string> {
    return this.extracted;
  }

  /**
   * Archive files currently under `rootDir`, sorted
   */
  findArchives(rootDir: string): string[] {
    const root = path.resolve(rootDir);
    const patterns = [...this.archiveExtensions].map(extension => `**/*${glob.escapePath(extension)}`);
    if (patterns.length === 0) return [];

    const ignore = this.exclude
      .filter(excluded => isInside(root, excluded) && excluded !== root)
      .map(excluded => `${glob.escapePath(toPosixPath(path.relative(root, excluded)))}/**`);

    return glob
      .sync(patterns, {
        cwd: root,
        absolute: true,
        onlyFiles: true,
        dot: true,
        caseSensitiveMatch: false,
        followSymbolicLinks: false,
        ignore,
      })
      .map(match => path.resolve(match))
      .filter(match => !this.failed.has(match))
      .sort();
  }

  /**
   * Extract every archive under `rootDir` until none remain.
   * Returns the number of archives processed (simulated ones in a dry run).
   */
  async expand(rootDir: string): Promise<number> {
    if (this.dryRun) {
      return this.simulate(rootDir);
    }

    let processed = 0;

    for (let pass = 1; pass <= this.maxPasses; pass++) {
      const archives = this.findArchives(rootDir);
      if (archives.length === 0) {
        this.logger.info('No more archives found', { passes: pass - 1, processed });
        return processed;
      }

      this.logger.info(`Extraction pass ${pass}: ${archives.length} archive(s)`);

      for (const archivePath of archives) {
        if (this.signal?.aborted) return processed;
        this.onArchive?.(archivePath);
        if (await this.extractArchive(archivePath)) {
          processed += 1;
        }
      }
    }

    for (const archivePath of this.findArchives(rootDir)) {
      this.failed.add(archivePath);
      this.operationLog.record({
        kind: 'error',
        sourcePath: archivePath,
        sizeBytes: this.sizeOf(archivePath),
        error: `Archive still present after ${this.maxPasses} extraction passes`,
        simulated: false,
      });
      this.logger.warn('Archive pass limit reached', { path: archivePath, maxPasses: this.maxPasses });
    }

    return processed;
  }

  private simulate(rootDir: string): number {
    const archives = this.findArchives(rootDir);
    for (const archivePath of archives) {
      this.operationLog.record({
        kind: 'extract',
        sourcePath: archivePath,
        destinationPath: path.dirname(archivePath),
        sizeBytes: this.sizeOf(archivePath),
        simulated: true,
      });
    }
    return archives.length;
  }

  /**
   * Extract one archive beside itself and delete it. Returns false (and
   * records an error) when the archive could not be extracted.
   */
  private async extractArchive(archivePath: string): Promise<boolean> {
    const directory = path.dirname(archivePath);
    const sizeBytes = this.sizeOf(archivePath);
    const written: string[] = [];
    const createdDirectories: string[] = [];

    try {
      const zip = await JSZip.loadAsync(this.fileSystem.readFile(archivePath), { checkCRC32: true });
      const entries = Object.values(zip.files).sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

      for (const entry of entries) {
        const target = path.resolve(directory, entry.name);
        if (target === directory || !isInside(directory, target)) {
          throw new Error(`Entry escapes extraction directory: ${entry.name}`);
        }

        if (entry.dir) {
          this.ensureDirectory(target, createdDirectories);
          continue;
        }

        this.ensureDirectory(path.dirname(target), createdDirectories);
        const destination = disambiguate(target, candidate => this.fileSystem.exists(candidate));
        const content = await entry.async('uint8array');
        this.fileSystem.writeFile(destination, content);
        written.push(destination);
      }

      this.fileSystem.unlink(archivePath);
    } catch (error) {
      this.rollback(written, createdDirectories);
      this.failed.add(archivePath);
      this.operationLog.record({
        kind: 'error',
        sourcePath: archivePath,
        sizeBytes,
        error: errorMessage(error),
        simulated: false,
      });
      this.logger.warn('Archive left in place', { path: archivePath, error: errorMessage(error) });
      return false;
    }

    this.extracted.delete(archivePath);
    for (const file of written) {
      this.extracted.add(file);
    }

    this.operationLog.record({
      kind: 'extract',
      sourcePath: archivePath,
      destinationPath: directory,
      sizeBytes,
      simulated: false,
      reason: `${written.length} file(s) extracted`,
    });
    this.logger.debug('Extracted archive', { path: archivePath, files: written.length });
    return true;
  }

  /**
   * mkdir -p that remembers which directories did not exist before
   */
  private ensureDirectory(directory: string, created: string[]): void {
    const missing: string[] = [];
    let current = directory;
    while (!this.fileSystem.exists(current)) {
      missing.push(current);
      const parent = path.dirname(current);
      if (parent === current) break;
      current = parent;
    }
    if (missing.length === 0) return;

    this.fileSystem.mkdir(directory);
    created.push(...missing);
  }

  /**
   * Undo a failed extraction: written files first, then the directories it
   * created, deepest first
   */
  private rollback(written: readonly string[], createdDirectories: readonly string[]): void {
    for (const file of written) {
      try {
        this.fileSystem.unlink(file);
      } catch (error) {
        this.logger.warn('Could not remove partially extracted file', { path: file, error: errorMessage(error) });
      }
    }

    const depth = (directory: string) => directory.split(path.sep).length;
    for (const directory of [...createdDirectories].sort((a, b) => depth(b) - depth(a))) {
      try {
        this.fileSystem.rmdir(directory);
      } catch (error) {
        this.logger.warn('Could not remove directory created for extraction', {
          path: directory,
          error: errorMessage(error),
        });
      }
    }
  }

  private sizeOf(filePath: string): number {
    try {
      return this.fileSystem.stat(filePath).size;
    } catch {
      return 0;
    }
  }
}
