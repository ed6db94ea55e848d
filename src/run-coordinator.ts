/**
 * Run orchestration: preview, confirmation, execution, cleanup.
 *
 * idle -> dry-run -> awaiting-confirmation -> executing -> cleanup -> completed
 * with dry-run, executing and cleanup able to end in interrupted. The live
 * pass re-derives its whole plan instead of reusing the preview's.
 */

import fs from 'node:fs';
import path from 'node:path';
import { setImmediate as yieldToEventLoop } from 'node:timers/promises';
import { ArchiveExpander } from './archive-expander.js';
import { classify, extensionOf, hasExtension, sniffMimeType } from './classifier.js';
import { removeEmptyDirectories } from './directory-cleanup.js';
import { nodeFileSystem, type FileSystem } from './filesystem.js';
import { AppError, errorMessage, logger as rootLogger } from './logger.js';
import { buildSummary, OperationLog } from './operation-log.js';
import { isInside, listScopes, PathPlanner } from './path-planner.js';
import { Relocator } from './relocator.js';
import { walkFiles } from './scanner.js';
import type {
  ConfirmationDecision,
  ConfirmRun,
  FileRecord,
  PersonScope,
  ProgressListener,
  RunLogSink,
  RunPhase,
  RunState,
  RunStatus,
  RunSummary,
  SorterConfig,
} from './types.js';

export interface RunCoordinatorOptions {
  config: SorterConfig;
  /** Asked once with the preview; nothing is mutated without 'proceed' */
  confirm: ConfirmRun;
  sink?: RunLogSink;
  onProgress?: ProgressListener;
  onStateChange?: (state: RunState, previous: RunState) => void;
  signal?: AbortSignal;
  fileSystem?: FileSystem;
  sniff?: (filePath: string) => Promise<string | null>;
}

export interface RunOutcome {
  state: RunState;
  preview: RunSummary;
  decision?: ConfirmationDecision;
  /** Live run summary; absent when the run stopped before executing */
  summary?: RunSummary;
}

interface PlannedMove {
  file: FileRecord;
  destination: string;
}

interface PassResult {
  interrupted: boolean;
  filesScanned: number;
  vacated: string[];
  scopes: PersonScope[];
}

function newPassResult(): PassResult {
  return { interrupted: false, filesScanned: 0, vacated: [], scopes: [] };
}

export const NOT_A_REGULAR_FILE = 'not a regular file';

const TERMINAL_STATES: readonly RunState[] = ['completed', 'interrupted', 'declined'];

export class RunCoordinator {
  private readonly config: SorterConfig;
  private readonly confirm: ConfirmRun;
  private readonly sink?: RunLogSink;
  private readonly onProgress?: ProgressListener;
  private readonly onStateChange?: (state: RunState, previous: RunState) => void;
  private readonly signal?: AbortSignal;
  private readonly fileSystem: FileSystem;
  private readonly sniff: (filePath: string) => Promise<string | null>;
  private readonly relocator: Relocator;
  private readonly logger = rootLogger.child('run-coordinator');
  private state: RunState = 'idle';

  constructor(options: RunCoordinatorOptions) {
    this.config = {
      ...options.config,
      sourceRoot: path.resolve(options.config.sourceRoot),
      backupRoot: path.resolve(options.config.backupRoot),
    };
    this.confirm = options.confirm;
    this.sink = options.sink;
    this.onProgress = options.onProgress;
    this.onStateChange = options.onStateChange;
    this.signal = options.signal;
    this.fileSystem = options.fileSystem ?? nodeFileSystem;
    this.sniff = options.sniff ?? (filePath => sniffMimeType(this.fileSystem, filePath));
    this.relocator = new Relocator(this.fileSystem);
  }

  getState(): RunState {
    return this.state;
  }

  async run(): Promise<RunOutcome> {
    if (this.state !== 'idle') {
      throw new AppError(`Run already started (state: ${this.state})`, 'INVALID_STATE');
    }

    this.preflight();

    // Preview
    this.transition('dry-run');
    const previewLog = new OperationLog();
    const previewStartedAt = new Date();
    const previewPass = newPassResult();
    await this.guard(previewLog, previewStartedAt, true, previewPass, () => this.pass(previewLog, true, previewPass));
    const preview = this.summarize(previewLog, previewStartedAt, true, previewPass);

    if (previewPass.interrupted) {
      return this.interrupt(preview);
    }

    if (this.config.dryRun) {
      this.transition('completed');
      await this.sink?.persist(preview);
      return { state: this.state, preview };
    }

    this.transition('awaiting-confirmation');
    const decision = await this.confirm(preview);
    if (decision !== 'proceed') {
      this.logger.info('Run declined at confirmation; nothing was changed');
      this.transition('declined');
      return { state: this.state, preview, decision };
    }

    // Live pass
    this.transition('executing');
    const liveLog = new OperationLog();
    const startedAt = new Date();
    const livePass = newPassResult();
    await this.guard(liveLog, startedAt, false, livePass, async () => {
      this.ensureBackupRoot();
      await this.pass(liveLog, false, livePass);
    });

    if (livePass.interrupted) {
      const partial = this.summarize(liveLog, startedAt, false, livePass, 'interrupted');
      return { ...(await this.interrupt(partial)), preview, decision };
    }

    this.transition('cleanup');
    await this.guard(liveLog, startedAt, false, livePass, async () => {
      this.emitProgress('cleanup', false, 0, 0, 0, null);
      await removeEmptyDirectories(livePass.vacated, {
        fileSystem: this.fileSystem,
        operationLog: liveLog,
        sourceRoot: this.config.sourceRoot,
        backupRoot: this.config.backupRoot,
        keep: livePass.scopes.map(scope => scope.root),
        signal: this.signal,
      });
    });

    if (this.signal?.aborted) {
      livePass.interrupted = true;
      const partial = this.summarize(liveLog, startedAt, false, livePass, 'interrupted');
      return { ...(await this.interrupt(partial)), preview, decision };
    }

    const summary = this.summarize(liveLog, startedAt, false, livePass);
    this.transition('completed');
    await this.sink?.persist(summary);
    this.logger.info('Run completed', { ...summary.counts, bytesRelocated: summary.bytesRelocated });

    return { state: this.state, preview, decision, summary };
  }

  /**
   * Fatal preconditions, checked before anything is scanned
   */
  private preflight(): void {
    const { sourceRoot, backupRoot } = this.config;

    try {
      if (!this.fileSystem.stat(sourceRoot).isDirectory()) {
        throw new Error('not a directory');
      }
      this.fileSystem.access(sourceRoot, fs.constants.R_OK);
    } catch (error) {
      throw new AppError(
        `Source directory is missing or unreadable: ${sourceRoot} (${errorMessage(error)})`,
        'SOURCE_ROOT_UNAVAILABLE',
        { sourceRoot },
      );
    }

    if (backupRoot === sourceRoot || isInside(backupRoot, sourceRoot)) {
      throw new AppError(
        `Backup root must not contain the source root: ${backupRoot}`,
        'INVALID_CONFIG',
        { sourceRoot, backupRoot },
      );
    }

    // The nearest existing ancestor must be a writable directory
    let candidate = backupRoot;
    while (!this.fileSystem.exists(candidate)) {
      const parent = path.dirname(candidate);
      if (parent === candidate) break;
      candidate = parent;
    }

    try {
      if (!this.fileSystem.stat(candidate).isDirectory()) {
        throw new Error(`${candidate} is not a directory`);
      }
      this.fileSystem.access(candidate, fs.constants.W_OK);
    } catch (error) {
      throw new AppError(
        `Backup root cannot be created: ${backupRoot} (${errorMessage(error)})`,
        'BACKUP_ROOT_UNAVAILABLE',
        { backupRoot },
      );
    }
  }

  private ensureBackupRoot(): void {
    try {
      this.fileSystem.mkdir(this.config.backupRoot);
    } catch (error) {
      throw new AppError(
        `Backup root cannot be created: ${this.config.backupRoot} (${errorMessage(error)})`,
        'BACKUP_ROOT_UNAVAILABLE',
        { backupRoot: this.config.backupRoot },
      );
    }
  }

  /**
   * expand -> scan/classify/plan -> relocate, shared by preview and live pass
   */
  private async pass(log: OperationLog, dryRun: boolean, result: PassResult): Promise<void> {
    const { sourceRoot, backupRoot } = this.config;

    let archivesSeen = 0;
    const expander = new ArchiveExpander({
      fileSystem: this.fileSystem,
      operationLog: log,
      archiveExtensions: this.config.archiveExtensions,
      exclude: [backupRoot],
      maxPasses: this.config.maxArchivePasses,
      dryRun,
      signal: this.signal,
      onArchive: archivePath => {
        archivesSeen += 1;
        this.emitProgress('expand', dryRun, archivesSeen, archivesSeen, 0, archivePath);
      },
    });
    await expander.expand(sourceRoot);
    if (this.signal?.aborted) {
      result.interrupted = true;
      return;
    }

    for (const record of log.records()) {
      if (record.kind === 'extract' && !record.simulated) result.vacated.push(record.sourcePath);
    }

    result.scopes = this.config.mode === 'flatten-by-scope'
      ? listScopes(this.fileSystem, sourceRoot, backupRoot)
      : [];
    const planner = new PathPlanner({
      sourceRoot,
      backupRoot,
      mode: this.config.mode,
      fileSystem: this.fileSystem,
      scopes: result.scopes,
    });

    // Planning completes before the first move, so destinations are
    // allocated in one place and the tree does not shift under the walk.
    const planned: PlannedMove[] = [];
    const files = walkFiles(this.fileSystem, sourceRoot, {
      exclude: [backupRoot],
      onError: (targetPath, error) => {
        log.record({ kind: 'error', sourcePath: targetPath, error: errorMessage(error), simulated: dryRun });
      },
    });

    for (const scanned of files) {
      await yieldToEventLoop();
      if (this.signal?.aborted) {
        result.interrupted = true;
        return;
      }

      if (!scanned.regular) {
        result.filesScanned += 1;
        log.record({ kind: 'skip', sourcePath: scanned.path, simulated: dryRun, reason: NOT_A_REGULAR_FILE });
        continue;
      }
      // Archives are accounted for by their extract or error record
      if (hasExtension(scanned.path, this.config.archiveExtensions)) continue;

      result.filesScanned += 1;
      const mimeType = await this.sniff(scanned.path);
      const file: FileRecord = Object.freeze({
        path: scanned.path,
        sizeBytes: scanned.sizeBytes,
        extension: extensionOf(scanned.path),
        mimeType,
        classification: classify(scanned.path, mimeType, this.config.mediaExtensions),
        archiveOrigin: expander.extractedPaths.has(scanned.path),
      });
      this.emitProgress('scan', dryRun, result.filesScanned, result.filesScanned, 0, file.path);

      try {
        planned.push({ file, destination: planner.plan(file.path, file.classification) });
      } catch (error) {
        log.record({
          kind: 'error',
          sourcePath: file.path,
          sizeBytes: file.sizeBytes,
          error: errorMessage(error),
          simulated: dryRun,
        });
      }
    }

    let bytesMoved = 0;
    for (const [index, move] of planned.entries()) {
      // Cancellation lands between files, never inside a move
      await yieldToEventLoop();
      if (this.signal?.aborted) {
        result.interrupted = true;
        return;
      }

      const record = log.append(this.relocator.relocate(move.file, move.destination, dryRun));
      if (record.kind === 'move') {
        bytesMoved += record.sizeBytes;
        if (!dryRun) result.vacated.push(record.sourcePath);
      }
      this.emitProgress('relocate', dryRun, index + 1, planned.length, bytesMoved, move.file.path);
    }
  }

  /**
   * Runs a phase; an unexpected exception flushes the partial log as an
   * interrupted summary before it propagates.
   */
  private async guard(
    log: OperationLog,
    startedAt: Date,
    simulated: boolean,
    result: PassResult,
    phase: () => Promise<void>,
  ): Promise<void> {
    try {
      await phase();
    } catch (error) {
      this.logger.error('Run failed unexpectedly', error instanceof Error ? error : undefined);
      result.interrupted = true;
      const partial = this.summarize(log, startedAt, simulated, result);
      await this.interrupt(partial);
      throw error;
    }
  }

  private async interrupt(partial: RunSummary): Promise<RunOutcome> {
    this.transition('interrupted');
    this.logger.warn('Run interrupted; saving partial operation log', {
      operations: partial.operations.length,
    });
    await this.sink?.persist(partial);
    return { state: this.state, preview: partial, summary: partial };
  }

  private summarize(
    log: OperationLog,
    startedAt: Date,
    simulated: boolean,
    pass: PassResult,
    status: RunStatus = pass.interrupted ? 'interrupted' : 'completed',
  ): RunSummary {
    return buildSummary(log.records(), {
      status,
      simulated,
      mode: this.config.mode,
      sourceRoot: this.config.sourceRoot,
      backupRoot: this.config.backupRoot,
      startedAt,
      filesScanned: pass.filesScanned,
    });
  }

  private transition(next: RunState): void {
    const previous = this.state;
    if (TERMINAL_STATES.includes(previous)) {
      throw new AppError(`Cannot leave terminal state ${previous}`, 'INVALID_STATE');
    }
    this.state = next;
    this.logger.debug(`State ${previous} -> ${next}`);
    this.onStateChange?.(next, previous);
  }

  private emitProgress(
    phase: RunPhase,
    simulated: boolean,
    filesProcessed: number,
    totalFiles: number,
    bytesMoved: number,
    currentFile: string | null,
  ): void {
    this.onProgress?.({ phase, simulated, filesProcessed, totalFiles, bytesMoved, currentFile });
  }
}
