/**
 * The surface front-ends drive: one scan or copy at a time, the retained
 * inventory and registry, and the session's exclusion set.
 */

import { resolve } from 'path';
import { DEFAULT_CONFIG, getConfig, type AppConfig } from './config.js';
import { CopyExecutor } from './copy-executor.js';
import { DuplicateRegistry } from './duplicate-detector.js';
import { ExclusionSet } from './exclusion-engine.js';
import { logger as baseLogger, AppError, handleError } from './logger.js';
import { scan } from './scanner.js';
import { CopyStatsCollector, ScanStatsCollector, StatsAggregator } from './stats.js';
import { startTask, type PipelineTask } from './task.js';
import type {
  CopyProgress,
  CopyStats,
  FileCopyProgress,
  Inventory,
  LayoutMode,
  MediaCategory,
  ProgressCallback,
  ScanProgress,
  ScanStats,
  TypeFilters,
} from './types.js';

const logger = baseLogger.child('session');

export interface CopyFilesOptions {
  /** Start from the registry of this session's last real copy */
  resume?: boolean;
  /** Explicit prior registry; takes precedence over `resume` */
  registry?: DuplicateRegistry;
  seedFromDestination?: boolean;
  categories?: Iterable<MediaCategory>;
  onFileProgress?: ProgressCallback<FileCopyProgress>;
}

type OperationKind = 'scan' | 'copy';

export class HarvestSession {
  private config: AppConfig;
  private exclusions: ExclusionSet;
  private stats = new StatsAggregator();
  private inventory: Inventory | null = null;
  private registry: DuplicateRegistry | null = null;
  private active: { kind: OperationKind; task: PipelineTask<unknown> } | null = null;

  constructor(config: AppConfig = DEFAULT_CONFIG) {
    this.config = structuredClone(config);
    this.exclusions = new ExclusionSet(config.exclusions.folders, {
      caseInsensitive: config.scan.caseInsensitive,
    });
  }

  get busy(): boolean {
    return this.active?.task.running === true;
  }

  private assertIdle(action: string): void {
    if (this.active?.task.running) {
      throw new AppError(`Cannot ${action} while a ${this.active.kind} is running`, 'BUSY', 409, {
        running: this.active.kind,
      });
    }
  }

  private track<T>(kind: OperationKind, task: PipelineTask<T>): PipelineTask<T> {
    this.active = { kind, task };
    return task;
  }

  startScan(
    root: string,
    filters: TypeFilters,
    excludedFolders: Iterable<string> = [],
    onProgress?: ProgressCallback<ScanProgress>
  ): PipelineTask<Readonly<ScanStats>> {
    this.assertIdle('start a scan');

    const exclusions = this.exclusions.snapshot(excludedFolders);
    const collector = new ScanStatsCollector(resolve(root));
    const scanConfig = this.config.scan;

    return this.track(
      'scan',
      startTask(async (signal) => {
        const rollback = this.stats.beginScan(collector);
        try {
          const result = await scan(root, filters, exclusions, {
            thumbnailThresholdBytes: scanConfig.thumbnailThresholdBytes,
            progressEveryFiles: scanConfig.progressEveryFiles,
            progressIntervalMs: scanConfig.progressIntervalMs,
            failureSummaryLimit: this.config.copy.failureSummaryLimit,
            onProgress,
            signal,
            collector,
          });
          this.inventory = result.inventory;
          return result.stats;
        } catch (error) {
          rollback();
          throw handleError(error, 'session');
        }
      })
    );
  }

  async scan(
    root: string,
    filters: TypeFilters,
    excludedFolders: Iterable<string> = [],
    onProgress?: ProgressCallback<ScanProgress>
  ): Promise<Readonly<ScanStats>> {
    return this.startScan(root, filters, excludedFolders, onProgress).promise;
  }

  startCopy(
    destination: string,
    organizeMethod: LayoutMode = this.config.copy.layout,
    dryRun: boolean = false,
    onProgress?: ProgressCallback<CopyProgress>,
    options: CopyFilesOptions = {}
  ): PipelineTask<Readonly<CopyStats>> {
    this.assertIdle('start a copy');

    const inventory = this.inventory;
    if (!inventory) {
      throw new AppError('No files to copy. Run scan first.', 'INVALID_CONFIGURATION', 400);
    }

    // Dry runs work on a copy so they never leave entries behind.
    const prior = options.registry ?? (options.resume ? this.registry : null);
    const registry = prior ? DuplicateRegistry.fromSnapshot(prior.snapshot()) : undefined;

    const copyConfig = this.config.copy;
    const collector = new CopyStatsCollector({
      destination: resolve(destination),
      layout: organizeMethod,
      dryRun,
      total: inventory.records.length,
    });

    return this.track(
      'copy',
      startTask(async (signal) => {
        const executor = new CopyExecutor({
          destination,
          layout: organizeMethod,
          dryRun,
          registry,
          seedFromDestination: options.seedFromDestination ?? copyConfig.seedFromDestination,
          categories: options.categories,
          exclusions: this.exclusions.snapshot(),
          onProgress,
          onFileProgress: options.onFileProgress,
          progressEveryFiles: copyConfig.progressEveryFiles,
          progressIntervalMs: copyConfig.progressIntervalMs,
          fileProgressIntervalMs: copyConfig.fileProgressIntervalMs,
          retries: copyConfig.retries,
          failureSummaryLimit: copyConfig.failureSummaryLimit,
          signal,
          collector,
        });

        const rollback = this.stats.beginCopy(collector);
        try {
          const stats = await executor.run(inventory);
          if (!dryRun) this.registry = executor.registry;
          return stats;
        } catch (error) {
          rollback();
          throw handleError(error, 'session');
        }
      })
    );
  }

  async copyFiles(
    destination: string,
    organizeMethod: LayoutMode = this.config.copy.layout,
    dryRun: boolean = false,
    onProgress?: ProgressCallback<CopyProgress>,
    options: CopyFilesOptions = {}
  ): Promise<Readonly<CopyStats>> {
    return this.startCopy(destination, organizeMethod, dryRun, onProgress, options).promise;
  }

  getScanStats(): Readonly<ScanStats> | null {
    return this.stats.scanStats();
  }

  getCopyStats(): Readonly<CopyStats> | null {
    return this.stats.copyStats();
  }

  getInventory(): Inventory | null {
    return this.inventory;
  }

  /**
   * Registry of the last real (non dry-run) copy, or null.
   */
  getRegistry(): DuplicateRegistry | null {
    return this.registry;
  }

  addExclusion(folder: string): boolean {
    this.assertIdle('change exclusions');
    return this.exclusions.add(folder);
  }

  removeExclusion(folder: string): boolean {
    this.assertIdle('change exclusions');
    return this.exclusions.remove(folder);
  }

  clearExclusions(): void {
    this.assertIdle('change exclusions');
    this.exclusions.clear();
    logger.debug('Exclusions cleared');
  }

  listExclusions(): string[] {
    return this.exclusions.list();
  }
}

/**
 * Session seeded from configuration; defaults to the global config file.
 * The configured log level applies to every module logger.
 */
export function createSession(config: AppConfig = getConfig().getAll()): HarvestSession {
  baseLogger.setMinLevel(config.logLevel);
  const session = new HarvestSession(config);
  logger.info('Session created', {
    exclusions: session.listExclusions().length,
    layout: config.copy.layout,
  });
  return session;
}
