/**
 * Append-only operation log and run summary construction
 */

import type { OperationKind, OperationRecord, PlanMode, RunCounts, RunStatus, RunSummary } from './types.js';

export interface OperationInput {
  kind: OperationKind;
  sourcePath: string;
  destinationPath?: string | null;
  sizeBytes?: number;
  error?: string | null;
  simulated: boolean;
  reason?: string;
}

export function createOperationRecord(input: OperationInput, now: Date = new Date()): OperationRecord {
  const record: OperationRecord = {
    kind: input.kind,
    sourcePath: input.sourcePath,
    destinationPath: input.destinationPath ?? null,
    timestamp: now.toISOString(),
    sizeBytes: input.sizeBytes ?? 0,
    error: input.error ?? null,
    simulated: input.simulated,
    ...(input.reason ? { reason: input.reason } : {}),
  };
  return Object.freeze(record);
}

export class OperationLog {
  private readonly entries: OperationRecord[] = [];

  append(record: OperationRecord): OperationRecord {
    const stored = Object.isFrozen(record) ? record : Object.freeze({ ...record });
    this.entries.push(stored);
    return stored;
  }

  record(input: OperationInput): OperationRecord {
    return this.append(createOperationRecord(input));
  }

  /**
   * Snapshot of the records so far; later appends do not show up in it
   */
  records(): OperationRecord[] {
    return [...this.entries];
  }

  get size(): number {
    return this.entries.length;
  }

  countOf(kind: OperationKind): number {
    return this.entries.filter(entry => entry.kind === kind).length;
  }
}

export interface SummaryContext {
  status: RunStatus;
  simulated: boolean;
  mode: PlanMode;
  sourceRoot: string;
  backupRoot: string;
  startedAt: Date;
  finishedAt?: Date;
  filesScanned: number;
}

export function buildSummary(records: readonly OperationRecord[], context: SummaryContext): RunSummary {
  const counts: RunCounts = {
    scanned: context.filesScanned,
    moved: 0,
    skipped: 0,
    errored: 0,
    extracted: 0,
    directoriesRemoved: 0,
  };
  let bytesRelocated = 0;

  for (const record of records) {
    switch (record.kind) {
      case 'move':
        counts.moved += 1;
        bytesRelocated += record.sizeBytes;
        break;
      case 'skip':
        counts.skipped += 1;
        break;
      case 'error':
        counts.errored += 1;
        break;
      case 'extract':
        counts.extracted += 1;
        break;
      case 'remove-directory':
        counts.directoriesRemoved += 1;
        break;
    }
  }

  return {
    status: context.status,
    simulated: context.simulated,
    mode: context.mode,
    sourceRoot: context.sourceRoot,
    backupRoot: context.backupRoot,
    startedAt: context.startedAt.toISOString(),
    finishedAt: (context.finishedAt ?? new Date()).toISOString(),
    counts,
    bytesRelocated,
    operations: [...records],
  };
}
