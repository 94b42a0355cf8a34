/**
 * Public entry point for the media harvesting pipeline
 */

export { HarvestSession, createSession, type CopyFilesOptions } from './session.js';
export { scan, nodeDirectoryReader, type DirectoryReader, type ScanOptions, type ScanResult } from './scanner.js';
export {
  CopyExecutor,
  assertDestinationOutsideSource,
  assertDestinationWritable,
  type CopyOptions,
} from './copy-executor.js';
export {
  DuplicateDetector,
  DuplicateRegistry,
  hashFile,
  type FileHasher,
  type RegistrySnapshot,
} from './duplicate-detector.js';
export { ExclusionSet, matchesBuiltInRule, isThumbnailDatabase } from './exclusion-engine.js';
export { classify, categoryOf, enabledCategories, CATEGORY_FOLDERS } from './classifier.js';
export { Organizer, sourceRootIdentifier, withDisambiguator, type ResolvedDestination } from './organizer.js';
export {
  StatsAggregator,
  ScanStatsCollector,
  CopyStatsCollector,
  formatBytes,
  formatDuration,
  formatScanSummary,
  formatCopySummary,
} from './stats.js';
export { startTask, type PipelineTask } from './task.js';
export { ConfigManager, getConfig, mergeConfigs, DEFAULT_CONFIG, type AppConfig } from './config.js';
export { Logger, logger, AppError, handleError, type ErrorCode, type LogLevel } from './logger.js';
export { classifyFsError } from './fs-errors.js';
export * from './types.js';
