/**
 * Depth-first tree walker producing the inventory of candidate media files.
 * Excluded directories are pruned before they are opened; nothing is hashed here.
 */

import type { Dirent, Stats } from 'fs';
import { lstat, readdir, stat } from 'fs/promises';
import { join, resolve } from 'path';
import { categoryOf, classify, DEFAULT_THUMBNAIL_THRESHOLD_BYTES, enabledCategories } from './classifier.js';
import { ExclusionSet } from './exclusion-engine.js';
import { classifyFsError, errnoCode, errorMessage } from './fs-errors.js';
import { logger as baseLogger, AppError } from './logger.js';
import { ProgressThrottle } from './progress.js';
import { formatScanSummary, ScanStatsCollector } from './stats.js';
import type {
  FileRecord,
  Inventory,
  ProgressCallback,
  ScanProgress,
  ScanStats,
  TypeFilters,
} from './types.js';

const logger = baseLogger.child('scanner');

export interface DirectoryReader {
  readdir(path: string): Promise<Dirent[]>;
  lstat(path: string): Promise<Stats>;
}

export const nodeDirectoryReader: DirectoryReader = {
  readdir: (path) => readdir(path, { withFileTypes: true }),
  lstat: (path) => lstat(path),
};

export interface ScanOptions {
  thumbnailThresholdBytes?: number;
  onProgress?: ProgressCallback<ScanProgress>;
  progressEveryFiles?: number;
  progressIntervalMs?: number;
  failureSummaryLimit?: number;
  signal?: AbortSignal;
  /** Supply a collector to make in-flight counters readable elsewhere */
  collector?: ScanStatsCollector;
  reader?: DirectoryReader;
}

export interface ScanResult {
  inventory: Inventory;
  stats: Readonly<ScanStats>;
}

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

// Case-folded first, so `downloads` and `Downloads` both sort before `Photos`.
function byName(a: Dirent, b: Dirent): number {
  return compareText(a.name.toLowerCase(), b.name.toLowerCase()) || compareText(a.name, b.name);
}

async function assertScanRoot(rootPath: string): Promise<void> {
  let rootStat: Stats;
  try {
    rootStat = await stat(rootPath);
  } catch (error) {
    throw new AppError(`Source path does not exist: ${rootPath}`, 'INVALID_CONFIGURATION', 400, {
      root: rootPath,
      cause: errnoCode(error),
    });
  }
  if (!rootStat.isDirectory()) {
    throw new AppError(`Source path is not a directory: ${rootPath}`, 'INVALID_CONFIGURATION', 400, {
      root: rootPath,
    });
  }
}

export async function scan(
  root: string,
  filters: TypeFilters,
  exclusions: ExclusionSet = new ExclusionSet(),
  options: ScanOptions = {}
): Promise<ScanResult> {
  const rootPath = resolve(root);
  const enabled = enabledCategories(filters);
  if (enabled.size === 0) {
    throw new AppError(
      'At least one file type must be selected (photos, videos, or PDFs)',
      'INVALID_CONFIGURATION',
      400
    );
  }
  await assertScanRoot(rootPath);

  const reader = options.reader ?? nodeDirectoryReader;
  const threshold = options.thumbnailThresholdBytes ?? DEFAULT_THUMBNAIL_THRESHOLD_BYTES;
  const signal = options.signal;
  const collector = options.collector ?? new ScanStatsCollector(rootPath);
  const throttle = new ProgressThrottle(options.onProgress, {
    everyItems: options.progressEveryFiles ?? 250,
    intervalMs: options.progressIntervalMs ?? 200,
  });

  const records: FileRecord[] = [];
  const seen = new Set<string>();

  async function visitFile(fullPath: string): Promise<void> {
    collector.fileSeen();
    throttle.tick(() => collector.progress('scanning', fullPath));

    if (exclusions.isExcluded(fullPath, rootPath)) {
      collector.excludedFile();
      return;
    }

    const category = categoryOf(fullPath);
    if (!enabled.has(category)) {
      collector.filtered();
      return;
    }

    let fileStat: Stats;
    try {
      fileStat = await reader.lstat(fullPath);
    } catch (error) {
      collector.failure({ path: fullPath, kind: classifyFsError(error, 'source'), message: errorMessage(error) });
      return;
    }

    if (fileStat.size === 0) {
      collector.emptyFile();
      return;
    }
    if (classify(fullPath, fileStat.size, threshold).likelyThumbnail) {
      collector.thumbnail();
      return;
    }
    if (seen.has(fullPath)) return;
    seen.add(fullPath);

    const record: FileRecord = Object.freeze({
      path: fullPath,
      category,
      size: fileStat.size,
      modifiedAt: fileStat.mtime,
    });
    records.push(record);
    collector.recordFound(record);
  }

  async function walk(directory: string): Promise<void> {
    if (signal?.aborted) return;
    collector.directoryVisited();

    let entries: Dirent[];
    try {
      entries = await reader.readdir(directory);
    } catch (error) {
      collector.skippedDirectory({
        path: directory,
        kind: classifyFsError(error, 'source'),
        message: errorMessage(error),
      });
      logger.warn('Skipping unreadable directory', { path: directory, code: errnoCode(error) });
      return;
    }

    entries.sort(byName);

    for (const entry of entries) {
      if (signal?.aborted) return;
      const fullPath = join(directory, entry.name);

      // Links and junctions are never followed.
      if (entry.isSymbolicLink()) continue;

      if (entry.isDirectory()) {
        if (exclusions.isExcluded(fullPath, rootPath)) {
          collector.excludedDirectory();
          continue;
        }
        await walk(fullPath);
      } else if (entry.isFile()) {
        await visitFile(fullPath);
      }
    }
  }

  logger.info('Scan started', { root: rootPath, categories: [...enabled] });
  await walk(rootPath);

  const cancelled = signal?.aborted === true;
  const stats = collector.finish(cancelled);
  throttle.flush(() => collector.progress(cancelled ? 'cancelled' : 'done', rootPath));
  logger.info(formatScanSummary(stats, options.failureSummaryLimit));

  const inventory: Inventory = Object.freeze({
    root: rootPath,
    filters: Object.freeze({ ...filters }),
    records: Object.freeze(records),
    createdAt: new Date(),
  });

  return { inventory, stats };
}
