/**
 * Core types for the media sorting engine
 */

export type Classification = 'media' | 'non-media';

export type PlanMode = 'preserve' | 'flatten-by-scope';

export type OperationKind = 'extract' | 'move' | 'skip' | 'error' | 'remove-directory';

export type RunStatus = 'completed' | 'interrupted';

export type RunState =
  | 'idle'
  | 'dry-run'
  | 'awaiting-confirmation'
  | 'executing'
  | 'cleanup'
  | 'completed'
  | 'interrupted'
  | 'declined';

export type ConfirmationDecision = 'proceed' | 'abort';

export type RunPhase = 'expand' | 'scan' | 'relocate' | 'cleanup';

/**
 * A file seen during the scan phase. Frozen once classified.
 */
export interface FileRecord {
  readonly path: string;
  readonly sizeBytes: number;
  /** Lower-cased, including the dot; empty when the name has none */
  readonly extension: string;
  readonly mimeType: string | null;
  readonly classification: Classification;
  /** True when the file was written by archive extraction during this run */
  readonly archiveOrigin: boolean;
}

export interface OperationRecord {
  readonly kind: OperationKind;
  readonly sourcePath: string;
  readonly destinationPath: string | null;
  readonly timestamp: string;
  readonly sizeBytes: number;
  readonly error: string | null;
  readonly simulated: boolean;
  readonly reason?: string;
}

/**
 * A top-level directory of the source root whose media is flattened to its root.
 */
export interface PersonScope {
  readonly name: string;
  readonly root: string;
}

export interface RunCounts {
  scanned: number;
  moved: number;
  skipped: number;
  errored: number;
  extracted: number;
  directoriesRemoved: number;
}

export interface RunSummary {
  status: RunStatus;
  simulated: boolean;
  mode: PlanMode;
  sourceRoot: string;
  backupRoot: string;
  startedAt: string;
  finishedAt: string;
  counts: RunCounts;
  bytesRelocated: number;
  operations: OperationRecord[];
}

export interface SorterConfig {
  sourceRoot: string;
  backupRoot: string;
  mode: PlanMode;
  dryRun: boolean;
  mediaExtensions: ReadonlySet<string>;
  archiveExtensions: ReadonlySet<string>;
  /** Circuit breaker for archives that keep producing archives */
  maxArchivePasses: number;
}

export interface ProgressUpdate {
  phase: RunPhase;
  /** True while the preview pass runs */
  simulated: boolean;
  filesProcessed: number;
  totalFiles: number;
  bytesMoved: number;
  currentFile: string | null;
}

export type ConfirmRun = (preview: RunSummary) => Promise<ConfirmationDecision>;

export type ProgressListener = (update: ProgressUpdate) => void;

export interface RunLogSink {
  persist(summary: RunSummary): Promise<void>;
}
