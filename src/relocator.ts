/**
 * Moves single files, or records what a move would do in a dry run.
 *
 * Per-file failures never escape: they come back as error records so the
 * caller can carry on with the next file.
 */

import path from 'node:path';
import { hasErrorCode, type FileSystem } from './filesystem.js';
import { errorMessage, logger as rootLogger } from './logger.js';
import { createOperationRecord } from './operation-log.js';
import type { FileRecord, OperationRecord } from './types.js';

export const MEDIA_LEFT_IN_PLACE = 'media left in place';

export class Relocator {
  private readonly logger = rootLogger.child('relocator');

  constructor(private readonly fileSystem: FileSystem) {}

  relocate(file: FileRecord, destination: string, dryRun: boolean): OperationRecord {
    if (path.resolve(destination) === path.resolve(file.path)) {
      return createOperationRecord({
        kind: 'skip',
        sourcePath: file.path,
        destinationPath: null,
        sizeBytes: file.sizeBytes,
        simulated: dryRun,
        reason: file.classification === 'media' ? MEDIA_LEFT_IN_PLACE : 'already in place',
      });
    }

    if (dryRun) {
      return createOperationRecord({
        kind: 'move',
        sourcePath: file.path,
        destinationPath: destination,
        sizeBytes: file.sizeBytes,
        simulated: true,
      });
    }

    try {
      this.fileSystem.mkdir(path.dirname(destination));

      if (this.fileSystem.exists(destination)) {
        return this.failure(file, destination, `Destination already exists: ${destination}`);
      }

      const reason = this.move(file, destination);
      return createOperationRecord({
        kind: 'move',
        sourcePath: file.path,
        destinationPath: destination,
        sizeBytes: file.sizeBytes,
        simulated: false,
        ...(reason ? { reason } : {}),
      });
    } catch (error) {
      return this.failure(file, destination, errorMessage(error));
    }
  }

  /**
   * Rename, or copy-verify-delete when the rename crosses devices
   */
  private move(file: FileRecord, destination: string): string | undefined {
    try {
      this.fileSystem.rename(file.path, destination);
      return undefined;
    } catch (error) {
      if (!hasErrorCode(error, 'EXDEV')) throw error;
    }

    this.logger.debug('Cross-device move, copying', { from: file.path, to: destination });
    try {
      this.fileSystem.copyFile(file.path, destination);
    } catch (error) {
      // EEXIST means the file there is not ours to remove
      if (!hasErrorCode(error, 'EEXIST')) this.discardCopy(destination);
      throw error;
    }

    const sourceSize = this.fileSystem.stat(file.path).size;
    let copiedSize: number;
    try {
      copiedSize = this.fileSystem.stat(destination).size;
    } catch (error) {
      this.discardCopy(destination);
      throw new Error(`Copy verification failed: ${errorMessage(error)}`);
    }

    if (copiedSize !== sourceSize) {
      this.discardCopy(destination);
      throw new Error(`Copy verification failed: expected ${sourceSize} bytes, found ${copiedSize}`);
    }

    this.fileSystem.unlink(file.path);
    return 'copied across devices';
  }

  private discardCopy(destination: string): void {
    try {
      if (this.fileSystem.exists(destination)) {
        this.fileSystem.unlink(destination);
      }
    } catch (error) {
      this.logger.warn('Could not remove unverified copy', { path: destination, error: errorMessage(error) });
    }
  }

  private failure(file: FileRecord, destination: string, message: string): OperationRecord {
    this.logger.warn('Move failed', { path: file.path, error: message });
    return createOperationRecord({
      kind: 'error',
      sourcePath: file.path,
      destinationPath: destination,
      sizeBytes: file.sizeBytes,
      error: message,
      simulated: false,
    });
  }
}
