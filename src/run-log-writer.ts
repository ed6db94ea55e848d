/**
 * Writes run summaries as JSON files
 */

import { existsSync, mkdirSync, writeFileSync } from 'fs';
import { join } from 'path';
import { logger } from './logger.js';
import { disambiguate } from './path-planner.js';
import type { RunLogSink, RunSummary } from './types.js';

export const COMPLETED_LOG_NAME = 'operations_log.json';
export const INTERRUPTED_LOG_NAME = 'operations_log_interrupted.json';
export const DRY_RUN_LOG_NAME = 'operations_log_dry_run.json';

export function logFileName(summary: RunSummary): string {
  if (summary.status === 'interrupted') return INTERRUPTED_LOG_NAME;
  return summary.simulated ? DRY_RUN_LOG_NAME : COMPLETED_LOG_NAME;
}

/**
 * Earlier logs in the same directory are kept; a new one gets a " (n)" suffix.
 */
export class RunLogWriter implements RunLogSink {
  private written: string[] = [];

  constructor(private readonly logDir: string) {}

  async persist(summary: RunSummary): Promise<void> {
    mkdirSync(this.logDir, { recursive: true });
    const target = disambiguate(join(this.logDir, logFileName(summary)), candidate => existsSync(candidate));
    writeFileSync(target, `${JSON.stringify(summary, null, 2)}\n`, 'utf8');
    this.written.push(target);
    logger.info(`Operations log saved to: ${target}`, undefined, 'run-log');
  }

  /**
   * Paths written so far, oldest first
   */
  getWrittenPaths(): string[] {
    return [...this.written];
  }
}
