/**
 * Terminal progress display for sorting runs
 */

import type { ProgressListener, ProgressUpdate, RunPhase } from './types.js';

export interface OutputStream {
  write(chunk: string): unknown;
}

export interface ProgressOptions {
  total: number;
  label?: string;
  showBar?: boolean;
  showPercent?: boolean;
  showElapsed?: boolean;
  showETA?: boolean;
  stream?: OutputStream;
}

export interface ProgressStats {
  current: number;
  total: number;
  percent: number;
  elapsed: number;
  eta: number;
  rate: number;
  isComplete: boolean;
}

export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  const units = ['KB', 'MB', 'GB', 'TB'];
  let value = bytes / 1024;
  let unit = 0;
  while (value >= 1024 && unit < units.length - 1) {
    value /= 1024;
    unit += 1;
  }
  return `${value.toFixed(2)} ${units[unit]}`;
}

/**
 * Format time in seconds to human-readable format
 */
export function formatTime(seconds: number): string {
  if (seconds < 60) return `${Math.round(seconds)}s`;
  if (seconds < 3600) {
    const mins = Math.floor(seconds / 60);
    const secs = Math.round(seconds % 60);
    return `${mins}m ${secs}s`;
  }
  const hours = Math.floor(seconds / 3600);
  const mins = Math.floor((seconds % 3600) / 60);
  return `${hours}h ${mins}m`;
}

/**
 * Simple progress tracker for CLI operations
 */
export class ProgressTracker {
  private current = 0;
  private total: number;
  private label: string;
  private suffix = '';
  private startTime = Date.now();
  private showBar: boolean;
  private showPercent: boolean;
  private showElapsed: boolean;
  private showETA: boolean;
  private stream: OutputStream;
  private lastUpdate = 0;
  private updateIntervalMs = 100;

  constructor(options: ProgressOptions) {
    this.total = Math.max(0, options.total);
    this.label = options.label || 'Progress';
    this.showBar = options.showBar !== false;
    this.showPercent = options.showPercent !== false;
    this.showElapsed = options.showElapsed !== false;
    this.showETA = options.showETA !== false;
    this.stream = options.stream ?? process.stdout;
  }

  /**
   * Set progress to specific value, with optional trailing text
   */
  set(value: number, suffix?: string): void {
    this.current = Math.min(Math.max(value, 0), this.total);
    if (suffix !== undefined) this.suffix = suffix;
    this.updateDisplay();
  }

  /**
   * Mark as complete
   */
  complete(): void {
    this.current = this.total;
    this.lastUpdate = 0;
    this.updateDisplay();
    this.stream.write('\n');
  }

  /**
   * Get current statistics
   */
  getStats(): ProgressStats {
    const elapsed = Math.max((Date.now() - this.startTime) / 1000, 0.001);
    const rate = this.current / elapsed;
    const remaining = this.total - this.current;
    const eta = rate > 0 ? remaining / rate : 0;

    return {
      current: this.current,
      total: this.total,
      percent: this.total === 0 ? 100 : (this.current / this.total) * 100,
      elapsed: Math.round(elapsed),
      eta: Math.round(eta),
      rate: Math.round(rate * 10) / 10,
      isComplete: this.current >= this.total
    };
  }

  /**
   * Create progress bar string
   */
  private createBar(width: number = 20): string {
    const filled = this.total === 0 ? width : Math.round((this.current / this.total) * width);
    const empty = width - filled;
    return '[' + '█'.repeat(filled) + '░'.repeat(empty) + ']';
  }

  /**
   * Update and display progress
   */
  private updateDisplay(): void {
    const now = Date.now();
    if (now - this.lastUpdate < this.updateIntervalMs && this.current < this.total) {
      return;
    }
    this.lastUpdate = now;

    const stats = this.getStats();
    const parts: string[] = [`${this.label}:`];

    if (this.showBar) {
      parts.push(this.createBar());
    }

    parts.push(`${this.current}/${this.total}`);

    if (this.showPercent) {
      parts.push(`${Math.round(stats.percent)}%`);
    }

    if (this.showElapsed) {
      parts.push(formatTime(stats.elapsed));
    }

    if (this.showETA && stats.current > 0 && stats.current < stats.total) {
      parts.push(`ETA ${formatTime(stats.eta)}`);
    }

    if (this.suffix) {
      parts.push(this.suffix);
    }

    // Clear line and write
    this.stream.write('\r' + ' '.repeat(120));
    this.stream.write('\r' + parts.join(' ').slice(0, 120));
  }
}

const PHASE_LABELS: Record<RunPhase, string> = {
  expand: 'Extracting archives',
  scan: 'Scanning',
  relocate: 'Moving',
  cleanup: 'Cleaning up',
};

/**
 * Progress listener that renders the live pass; the preview stays quiet
 */
export function createProgressListener(stream: OutputStream = process.stdout): ProgressListener {
  let tracker: ProgressTracker | null = null;
  let trackedPhase: RunPhase | null = null;

  const finish = () => {
    tracker?.complete();
    tracker = null;
    trackedPhase = null;
  };

  return (update: ProgressUpdate) => {
    if (update.simulated) return;

    if (update.phase !== 'relocate') {
      if (trackedPhase === 'relocate') finish();
      if (update.phase !== 'cleanup' && update.currentFile) {
        stream.write(`\r${PHASE_LABELS[update.phase]}: ${update.filesProcessed} `.padEnd(40));
      }
      return;
    }

    if (trackedPhase !== 'relocate') {
      stream.write('\n');
      tracker = new ProgressTracker({ total: update.totalFiles, label: PHASE_LABELS.relocate, stream });
      trackedPhase = 'relocate';
    }

    tracker?.set(update.filesProcessed, formatBytes(update.bytesMoved));
    if (update.filesProcessed >= update.totalFiles) finish();
  };
}
