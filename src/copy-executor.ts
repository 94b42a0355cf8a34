/**
 * Copies an inventory to an organized destination. Per-file failures are
 * recorded and the batch carries on; only precondition failures abort.
 */

import { constants, createReadStream, createWriteStream, existsSync, type Stats } from 'fs';
import { access, lstat, mkdir, rm, stat, utimes } from 'fs/promises';
import { dirname, isAbsolute, relative, resolve } from 'path';
import { pipeline } from 'stream/promises';
import pRetry, { AbortError } from 'p-retry';
import { DuplicateDetector, DuplicateRegistry } from './duplicate-detector.js';
import type { ExclusionSet } from './exclusion-engine.js';
import {
  classifyFsError,
  errnoCode,
  errorMessage,
  isTransientFsError,
  sideOfStreamError,
  type FailureSide,
} from './fs-errors.js';
import { logger as baseLogger, AppError, type ErrorCode } from './logger.js';
import { Organizer } from './organizer.js';
import { ProgressThrottle } from './progress.js';
import { CopyStatsCollector, formatCopySummary } from './stats.js';
import {
  MEDIA_CATEGORIES,
  type CopyOutcome,
  type CopyPlanEntry,
  type CopyProgress,
  type CopyStats,
  type FailureKind,
  type FailureRecord,
  type FileCopyProgress,
  type FileRecord,
  type Inventory,
  type LayoutMode,
  type MediaCategory,
  type ProgressCallback,
} from './types.js';

const logger = baseLogger.child('copy');

export interface CopyOptions {
  destination: string;
  layout: LayoutMode;
  dryRun?: boolean;
  /** Prior run's registry; files it already holds are skipped as duplicates */
  registry?: DuplicateRegistry;
  seedFromDestination?: boolean;
  /** Categories to copy; others become skip-filtered. Defaults to all. */
  categories?: Iterable<MediaCategory>;
  /** Records now excluded by this set become skip-filtered */
  exclusions?: ExclusionSet;
  onProgress?: ProgressCallback<CopyProgress>;
  onFileProgress?: ProgressCallback<FileCopyProgress>;
  progressEveryFiles?: number;
  progressIntervalMs?: number;
  fileProgressIntervalMs?: number;
  retries?: number;
  /** Failures listed in the logged summary */
  failureSummaryLimit?: number;
  signal?: AbortSignal;
  collector?: CopyStatsCollector;
}

export function isInside(parent: string, candidate: string): boolean {
  const rel = relative(resolve(parent), resolve(candidate));
  return rel === '' || (!rel.startsWith('..') && !isAbsolute(rel));
}

export function assertDestinationOutsideSource(destination: string, sourceRoot: string): void {
  if (isInside(sourceRoot, destination)) {
    throw new AppError(
      `Destination ${resolve(destination)} is the source root or inside it`,
      'INVALID_CONFIGURATION',
      400,
      { destination: resolve(destination), source: resolve(sourceRoot) }
    );
  }
}

function nearestExistingAncestor(target: string): string {
  let current = target;
  while (!existsSync(current)) {
    const parent = dirname(current);
    if (parent === current) break;
    current = parent;
  }
  return current;
}

/**
 * With `create`, make the destination root; otherwise (dry-run) only check
 * that it, or the closest existing ancestor, could be written.
 */
export async function assertDestinationWritable(destination: string, create: boolean): Promise<void> {
  const root = resolve(destination);
  const fail = (reason: string): AppError =>
    new AppError(`Destination is not writable: ${root} (${reason})`, 'DESTINATION_WRITE_FAILURE', 400, {
      destination: root,
    });

  if (create) {
    try {
      await mkdir(root, { recursive: true });
    } catch (error) {
      throw fail(errnoCode(error) ?? errorMessage(error));
    }
  }

  const target = create ? root : nearestExistingAncestor(root);
  let targetStat: Stats;
  try {
    targetStat = await stat(target);
  } catch (error) {
    throw fail(errnoCode(error) ?? errorMessage(error));
  }
  if (!targetStat.isDirectory()) {
    throw fail(`${target} is not a directory`);
  }
  try {
    await access(target, constants.W_OK);
  } catch (error) {
    throw fail(errnoCode(error) ?? errorMessage(error));
  }
}

function toFailureKind(code: ErrorCode): FailureKind {
  switch (code) {
    case 'ACCESS_DENIED':
    case 'SOURCE_VANISHED':
    case 'DESTINATION_WRITE_FAILURE':
      return code;
    default:
      return 'UNKNOWN_ERROR';
  }
}

/**
 * Run `work`, turning any filesystem error into an AppError coded by side.
 */
async function onSide<T>(side: FailureSide, path: string, work: () => Promise<T>): Promise<T> {
  try {
    return await work();
  } catch (error) {
    if (error instanceof AppError) throw error;
    throw new AppError(errorMessage(error), classifyFsError(error, side), 500, { path });
  }
}

export class CopyExecutor {
  private options: CopyOptions;
  private detector: DuplicateDetector;
  private categories: Set<MediaCategory>;
  private dryRun: boolean;
  // destination path -> hash planned or written there during this run
  private claimed = new Map<string, string>();
  private planEntries: CopyPlanEntry[] = [];

  constructor(options: CopyOptions) {
    this.options = options;
    this.dryRun = options.dryRun ?? false;
    this.detector = new DuplicateDetector(options.registry ?? new DuplicateRegistry());
    this.categories = new Set(options.categories ?? MEDIA_CATEGORIES);
  }

  get registry(): DuplicateRegistry {
    return this.detector.getRegistry();
  }

  get plan(): readonly CopyPlanEntry[] {
    return this.planEntries;
  }

  async run(inventory: Inventory): Promise<Readonly<CopyStats>> {
    const destination = resolve(this.options.destination);
    assertDestinationOutsideSource(destination, inventory.root);
    await assertDestinationWritable(destination, !this.dryRun);

    const organizer = new Organizer({
      layout: this.options.layout,
      destinationRoot: destination,
      sourceRoot: inventory.root,
    });
    const collector =
      this.options.collector ??
      new CopyStatsCollector({
        destination,
        layout: this.options.layout,
        dryRun: this.dryRun,
        total: inventory.records.length,
      });
    const throttle = new ProgressThrottle(this.options.onProgress, {
      everyItems: this.options.progressEveryFiles ?? 25,
      intervalMs: this.options.progressIntervalMs ?? 200,
    });
    const signal = this.options.signal;

    logger.info(this.dryRun ? 'Dry run started' : 'Copy started', {
      destination,
      layout: this.options.layout,
      files: inventory.records.length,
    });

    if (this.options.seedFromDestination) {
      await this.detector.seedFromDestination(destination, signal);
    }

    for (const record of inventory.records) {
      // Cancellation is honoured between files, never mid-copy.
      if (signal?.aborted) break;
      const outcome = await this.processRecord(record, organizer, inventory.root);
      collector.record(outcome, outcome.status === 'copied' || outcome.status === 'would-copy' ? record.size : 0);
      throttle.tick(() => collector.progress('copying', record.path));
    }

    const cancelled = signal?.aborted === true;
    const stats = collector.finish(cancelled);
    throttle.flush(() => collector.progress(cancelled ? 'cancelled' : 'done', destination));
    logger.info(formatCopySummary(stats, this.options.failureSummaryLimit));
    return stats;
  }

  private async processRecord(record: FileRecord, organizer: Organizer, sourceRoot: string): Promise<CopyOutcome> {
    const base = { source: record.path, category: record.category };

    if (!this.categories.has(record.category) || this.options.exclusions?.isExcluded(record.path, sourceRoot)) {
      this.planEntries.push({ record, destination: null, action: 'skip-filtered' });
      return { ...base, status: 'filtered' };
    }

    try {
      const hash = await onSide('source', record.path, () => this.detector.hashOf(record));

      const known = this.detector.duplicateOf(hash);
      if (known) {
        this.planEntries.push({ record, destination: null, action: 'skip-duplicate' });
        return { ...base, status: 'duplicate', duplicateOf: known };
      }

      const candidate = organizer.destinationFor(record);
      const resolved = await onSide('destination', candidate, () =>
        organizer.resolveCollision(candidate, (path) => this.probe(path, hash, record.size))
      );

      if (resolved.duplicateOf) {
        this.detector.markCopied(record, hash, resolved.path);
        this.planEntries.push({ record, destination: resolved.path, action: 'skip-duplicate' });
        return { ...base, status: 'duplicate', destination: resolved.path, duplicateOf: resolved.duplicateOf };
      }

      this.planEntries.push({ record, destination: resolved.path, action: 'copy' });
      this.claimed.set(resolved.path, hash);

      if (this.dryRun) {
        this.detector.markCopied(record, hash, resolved.path);
        return { ...base, status: 'would-copy', destination: resolved.path };
      }

      try {
        await this.copyOne(record, resolved.path);
      } catch (error) {
        // Later files probe the disk for this slot instead.
        this.claimed.delete(resolved.path);
        throw error;
      }
      this.detector.markCopied(record, hash, resolved.path);
      return { ...base, status: 'copied', destination: resolved.path };
    } catch (error) {
      const failure: FailureRecord = {
        path: record.path,
        kind: error instanceof AppError ? toFailureKind(error.code) : 'UNKNOWN_ERROR',
        message: errorMessage(error),
      };
      logger.warn('File not copied', { ...failure });
      return { ...base, status: 'failed', error: failure };
    }
  }

  /**
   * null: free. true: holds this content already. false: holds something else.
   */
  private async probe(candidate: string, hash: string, size: number): Promise<boolean | null> {
    const claimedHash = this.claimed.get(candidate);
    if (claimedHash !== undefined) return claimedHash === hash;

    let existing: Stats;
    try {
      existing = await lstat(candidate);
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') return null;
      throw error;
    }

    if (!existing.isFile() || existing.size !== size) return false;
    return (await this.detector.hashOf(candidate)) === hash;
  }

  private async copyOne(record: FileRecord, destination: string): Promise<void> {
    const sourceStat = await onSide('source', record.path, () => stat(record.path));
    await onSide('destination', destination, () => mkdir(dirname(destination), { recursive: true }));

    try {
      await pRetry(() => this.streamCopy(record.path, destination, sourceStat.size), {
        retries: this.options.retries ?? 2,
        minTimeout: 100,
        maxTimeout: 1000,
        onFailedAttempt: (error) => {
          logger.warn(`Copy attempt ${error.attemptNumber} failed`, {
            path: record.path,
            retriesLeft: error.retriesLeft,
            error: error.message,
          });
        },
      });
    } catch (error) {
      if (error instanceof AppError) throw error;
      throw new AppError(errorMessage(error), classifyFsError(error, sideOfStreamError(error, record.path)), 500, {
        path: record.path,
      });
    }

    await onSide('destination', destination, () => utimes(destination, sourceStat.atime, sourceStat.mtime));
  }

  private async streamCopy(source: string, destination: string, totalBytes: number): Promise<void> {
    const fileThrottle = new ProgressThrottle(this.options.onFileProgress, {
      everyItems: Number.MAX_SAFE_INTEGER,
      intervalMs: this.options.fileProgressIntervalMs ?? 100,
    });
    const started = Date.now();
    let bytesCopied = 0;
    const snapshot = (): FileCopyProgress => {
      const elapsedSeconds = (Date.now() - started) / 1000;
      return {
        source,
        destination,
        bytesCopied,
        totalBytes,
        rateMbps: elapsedSeconds > 0 ? bytesCopied / (1024 * 1024) / elapsedSeconds : 0,
      };
    };

    const reader = createReadStream(source);
    reader.on('data', (chunk) => {
      bytesCopied += chunk.length;
      fileThrottle.tick(snapshot);
    });

    try {
      await pipeline(reader, createWriteStream(destination, { flags: 'wx' }));
    } catch (error) {
      // EEXIST means someone else's file is there; leave it alone.
      if (errnoCode(error) !== 'EEXIST') {
        await rm(destination, { force: true }).catch((cleanupError: unknown) => {
          logger.warn('Could not remove partial file', { path: destination, error: errorMessage(cleanupError) });
        });
      }
      if (isTransientFsError(error)) throw error;
      throw new AbortError(
        new AppError(errorMessage(error), classifyFsError(error, sideOfStreamError(error, source)), 500, {
          path: source,
        })
      );
    }

    fileThrottle.flush(snapshot);
  }
}
