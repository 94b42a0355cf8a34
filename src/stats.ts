/**
 * Run statistics: mutable collectors fed by the scanner and copy executor,
 * frozen snapshots for readers, and the process-wide holder of the latest run.
 */

import {
  emptyCategoryCounts,
  type CategoryCopyCounts,
  type CopyOutcome,
  type CopyPhase,
  type CopyProgress,
  type CopyStats,
  type FailureRecord,
  type FileRecord,
  type LayoutMode,
  type MediaCategory,
  type ScanPhase,
  type ScanProgress,
  type ScanStats,
} from './types.js';

function freezeCopy<T>(value: T): Readonly<T> {
  return Object.freeze(structuredClone(value));
}

export class ScanStatsCollector {
  private stats: ScanStats;
  private startedMs: number;
  private now: () => number;

  constructor(root: string, now: () => number = Date.now) {
    this.now = now;
    this.startedMs = now();
    this.stats = {
      root,
      startedAt: new Date(this.startedMs).toISOString(),
      finishedAt: null,
      elapsedMs: 0,
      filesSeen: 0,
      directoriesVisited: 0,
      totalFiles: 0,
      totalBytes: 0,
      found: emptyCategoryCounts(),
      bytesByCategory: emptyCategoryCounts(),
      excludedDirectories: 0,
      excludedFiles: 0,
      filteredFiles: 0,
      thumbnails: 0,
      emptyFiles: 0,
      skippedDirectories: [],
      failures: [],
      cancelled: false,
    };
  }

  directoryVisited(): void {
    this.stats.directoriesVisited++;
  }

  fileSeen(): void {
    this.stats.filesSeen++;
  }

  recordFound(record: FileRecord): void {
    this.stats.totalFiles++;
    this.stats.totalBytes += record.size;
    this.stats.found[record.category]++;
    this.stats.bytesByCategory[record.category] += record.size;
  }

  excludedDirectory(): void {
    this.stats.excludedDirectories++;
  }

  excludedFile(): void {
    this.stats.excludedFiles++;
  }

  filtered(): void {
    this.stats.filteredFiles++;
  }

  thumbnail(): void {
    this.stats.thumbnails++;
  }

  emptyFile(): void {
    this.stats.emptyFiles++;
  }

  skippedDirectory(failure: FailureRecord): void {
    this.stats.skippedDirectories.push(failure);
  }

  failure(failure: FailureRecord): void {
    this.stats.failures.push(failure);
  }

  finish(cancelled: boolean): Readonly<ScanStats> {
    const finishedMs = this.now();
    this.stats.cancelled = cancelled;
    this.stats.finishedAt = new Date(finishedMs).toISOString();
    this.stats.elapsedMs = finishedMs - this.startedMs;
    return this.snapshot();
  }

  snapshot(): Readonly<ScanStats> {
    const elapsedMs = this.stats.finishedAt ? this.stats.elapsedMs : this.now() - this.startedMs;
    return freezeCopy({ ...this.stats, elapsedMs });
  }

  progress(phase: ScanPhase, currentPath: string): ScanProgress {
    return {
      phase,
      currentPath,
      filesSeen: this.stats.filesSeen,
      directoriesVisited: this.stats.directoriesVisited,
      found: { ...this.stats.found },
      totalBytes: this.stats.totalBytes,
      elapsedMs: this.now() - this.startedMs,
    };
  }
}

function emptyCopyCounts(): Record<MediaCategory, CategoryCopyCounts> {
  const zero = (): CategoryCopyCounts => ({ copied: 0, duplicates: 0, filtered: 0, failed: 0 });
  return { photo: zero(), video: zero(), pdf: zero(), other: zero() };
}

export class CopyStatsCollector {
  private stats: CopyStats;
  private startedMs: number;
  private now: () => number;

  constructor(
    options: { destination: string; layout: LayoutMode; dryRun: boolean; total: number },
    now: () => number = Date.now
  ) {
    this.now = now;
    this.startedMs = now();
    this.stats = {
      destination: options.destination,
      layout: options.layout,
      dryRun: options.dryRun,
      startedAt: new Date(this.startedMs).toISOString(),
      finishedAt: null,
      elapsedMs: 0,
      total: options.total,
      processed: 0,
      copied: 0,
      duplicates: 0,
      filtered: 0,
      failed: 0,
      bytesCopied: 0,
      byCategory: emptyCopyCounts(),
      failures: [],
      outcomes: [],
      cancelled: false,
    };
  }

  /**
   * Record one file's outcome. A dry-run `would-copy` counts as copied.
   */
  record(outcome: CopyOutcome, bytes: number = 0): void {
    const perCategory = this.stats.byCategory[outcome.category];
    this.stats.processed++;
    this.stats.outcomes.push(outcome);

    switch (outcome.status) {
      case 'copied':
      case 'would-copy':
        this.stats.copied++;
        this.stats.bytesCopied += bytes;
        perCategory.copied++;
        break;
      case 'duplicate':
        this.stats.duplicates++;
        perCategory.duplicates++;
        break;
      case 'filtered':
        this.stats.filtered++;
        perCategory.filtered++;
        break;
      case 'failed':
        this.stats.failed++;
        perCategory.failed++;
        if (outcome.error) this.stats.failures.push(outcome.error);
        break;
    }
  }

  finish(cancelled: boolean): Readonly<CopyStats> {
    const finishedMs = this.now();
    this.stats.cancelled = cancelled;
    this.stats.finishedAt = new Date(finishedMs).toISOString();
    this.stats.elapsedMs = finishedMs - this.startedMs;
    return this.snapshot();
  }

  snapshot(): Readonly<CopyStats> {
    const elapsedMs = this.stats.finishedAt ? this.stats.elapsedMs : this.now() - this.startedMs;
    return freezeCopy({ ...this.stats, elapsedMs });
  }

  progress(phase: CopyPhase, currentPath: string): CopyProgress {
    const last = this.stats.outcomes[this.stats.outcomes.length - 1];
    return {
      phase,
      currentPath,
      lastStatus: last ? last.status : null,
      processed: this.stats.processed,
      total: this.stats.total,
      copied: this.stats.copied,
      duplicates: this.stats.duplicates,
      filtered: this.stats.filtered,
      failed: this.stats.failed,
      bytesCopied: this.stats.bytesCopied,
      elapsedMs: this.now() - this.startedMs,
    };
  }
}

/**
 * Holds the most recent scan and copy runs. A run in progress is read
 * through its collector, so readers get a best-effort point-in-time copy.
 */
export class StatsAggregator {
  private scan: ScanStatsCollector | null = null;
  private copy: CopyStatsCollector | null = null;

  /**
   * Make `collector` the latest scan. The returned function puts the
   * previous one back, for runs rejected before doing any work.
   */
  beginScan(collector: ScanStatsCollector): () => void {
    const previous = this.scan;
    this.scan = collector;
    return () => {
      if (this.scan === collector) this.scan = previous;
    };
  }

  beginCopy(collector: CopyStatsCollector): () => void {
    const previous = this.copy;
    this.copy = collector;
    return () => {
      if (this.copy === collector) this.copy = previous;
    };
  }

  scanStats(): Readonly<ScanStats> | null {
    return this.scan ? this.scan.snapshot() : null;
  }

  copyStats(): Readonly<CopyStats> | null {
    return this.copy ? this.copy.snapshot() : null;
  }

  reset(): void {
    this.scan = null;
    this.copy = null;
  }
}

export function formatBytes(bytes: number): string {
  const units = ['B', 'KB', 'MB', 'GB', 'TB'];
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < units.length - 1) {
    value /= 1024;
    unit++;
  }
  return unit === 0 ? `${value} B` : `${value.toFixed(2)} ${units[unit]}`;
}

export function formatDuration(ms: number): string {
  const seconds = ms / 1000;
  if (seconds < 60) return `${seconds.toFixed(1)}s`;
  if (seconds < 3600) {
    const mins = Math.floor(seconds / 60);
    const secs = Math.round(seconds % 60);
    return `${mins}m ${secs}s`;
  }
  const hours = Math.floor(seconds / 3600);
  const mins = Math.floor((seconds % 3600) / 60);
  return `${hours}h ${mins}m`;
}

function formatFailures(title: string, failures: FailureRecord[], limit: number): string[] {
  if (failures.length === 0) return [];
  const lines = [`  ${title}: ${failures.length}`];
  for (const failure of failures.slice(0, limit)) {
    lines.push(`    - ${failure.path} (${failure.kind}): ${failure.message}`);
  }
  if (failures.length > limit) {
    lines.push(`    ... and ${failures.length - limit} more`);
  }
  return lines;
}

export function formatScanSummary(stats: Readonly<ScanStats>, failureLimit: number = 10): string {
  const lines = [
    `Scan of ${stats.root}: ${stats.totalFiles} files (${formatBytes(stats.totalBytes)}) in ${formatDuration(stats.elapsedMs)}`,
    `  Photos: ${stats.found.photo}, Videos: ${stats.found.video}, PDFs: ${stats.found.pdf}, Other: ${stats.found.other}`,
    `  Seen ${stats.filesSeen} files in ${stats.directoriesVisited} folders; excluded ${stats.excludedDirectories} folders and ${stats.excludedFiles} files`,
    ...formatFailures('Skipped folders', stats.skippedDirectories, failureLimit),
    ...formatFailures('Failures', stats.failures, failureLimit),
  ];
  if (stats.cancelled) lines.push('  Cancelled before completion');
  return lines.join('\n');
}

export function formatCopySummary(stats: Readonly<CopyStats>, failureLimit: number = 10): string {
  const verb = stats.dryRun ? 'Would copy' : 'Copied';
  const lines = [
    `${verb} ${stats.copied} of ${stats.total} files (${formatBytes(stats.bytesCopied)}) to ${stats.destination} in ${formatDuration(stats.elapsedMs)}`,
    `  Duplicates: ${stats.duplicates}, Filtered: ${stats.filtered}, Failed: ${stats.failed}`,
    ...formatFailures('Failures', stats.failures, failureLimit),
  ];
  if (stats.cancelled) lines.push(`  Cancelled after ${stats.processed} files`);
  return lines.join('\n');
}
