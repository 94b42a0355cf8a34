/**
 * Configuration system with YAML and JSON support
 */

import { readFileSync, writeFileSync, existsSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import YAML from 'js-yaml';
import { config as loadEnv } from 'dotenv';
import { logger as baseLogger, parseLogLevel, type LogLevel } from './logger.js';
import type { LayoutMode } from './types.js';

const logger = baseLogger.child('ConfigManager');

export interface ScanConfig {
  thumbnailThresholdBytes: number;
  progressEveryFiles: number;
  progressIntervalMs: number;
  caseInsensitive: boolean;
}

export interface CopyConfig {
  layout: LayoutMode;
  retries: number;
  progressEveryFiles: number;
  progressIntervalMs: number;
  fileProgressIntervalMs: number;
  seedFromDestination: boolean;
  failureSummaryLimit: number;
}

export interface ExclusionConfig {
  folders: string[];
}

export interface AppConfig {
  scan: ScanConfig;
  copy: CopyConfig;
  exclusions: ExclusionConfig;
  logLevel: LogLevel;
}

export const DEFAULT_CONFIG: AppConfig = {
  scan: {
    thumbnailThresholdBytes: 1024,
    progressEveryFiles: 250,
    progressIntervalMs: 200,
    caseInsensitive: process.platform === 'win32' || process.platform === 'darwin'
  },
  copy: {
    layout: 'date',
    retries: 2,
    progressEveryFiles: 25,
    progressIntervalMs: 200,
    fileProgressIntervalMs: 100,
    seedFromDestination: false,
    failureSummaryLimit: 10
  },
  exclusions: {
    folders: []
  },
  logLevel: 'info'
};

type UnknownRecord = Record<string, unknown>;

function isRecord(value: unknown): value is UnknownRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function pickNumber(source: UnknownRecord, key: string, fallback: number): number {
  const value = source[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

function pickBoolean(source: UnknownRecord, key: string, fallback: boolean): boolean {
  const value = source[key];
  return typeof value === 'boolean' ? value : fallback;
}

function pickLayout(source: UnknownRecord, key: string, fallback: LayoutMode): LayoutMode {
  const value = source[key];
  return value === 'date' || value === 'source' ? value : fallback;
}

function pickStrings(source: UnknownRecord, key: string, fallback: string[]): string[] {
  const value = source[key];
  if (!Array.isArray(value)) return fallback;
  return value.filter((item): item is string => typeof item === 'string' && item.trim().length > 0);
}

function section(source: UnknownRecord, key: string): UnknownRecord {
  const value = source[key];
  return isRecord(value) ? value : {};
}

function cloneConfig(config: AppConfig): AppConfig {
  return structuredClone(config);
}

/**
 * Merge user config with defaults (user config takes precedence).
 * Unknown keys and values of the wrong type fall back to the defaults.
 */
export function mergeConfigs(defaults: AppConfig, user: unknown): AppConfig {
  if (!isRecord(user)) return cloneConfig(defaults);

  const scan = section(user, 'scan');
  const copy = section(user, 'copy');
  const exclusions = section(user, 'exclusions');
  const logLevel = user.logLevel;

  return {
    scan: {
      thumbnailThresholdBytes: pickNumber(scan, 'thumbnailThresholdBytes', defaults.scan.thumbnailThresholdBytes),
      progressEveryFiles: pickNumber(scan, 'progressEveryFiles', defaults.scan.progressEveryFiles),
      progressIntervalMs: pickNumber(scan, 'progressIntervalMs', defaults.scan.progressIntervalMs),
      caseInsensitive: pickBoolean(scan, 'caseInsensitive', defaults.scan.caseInsensitive)
    },
    copy: {
      layout: pickLayout(copy, 'layout', defaults.copy.layout),
      retries: pickNumber(copy, 'retries', defaults.copy.retries),
      progressEveryFiles: pickNumber(copy, 'progressEveryFiles', defaults.copy.progressEveryFiles),
      progressIntervalMs: pickNumber(copy, 'progressIntervalMs', defaults.copy.progressIntervalMs),
      fileProgressIntervalMs: pickNumber(copy, 'fileProgressIntervalMs', defaults.copy.fileProgressIntervalMs),
      seedFromDestination: pickBoolean(copy, 'seedFromDestination', defaults.copy.seedFromDestination),
      failureSummaryLimit: pickNumber(copy, 'failureSummaryLimit', defaults.copy.failureSummaryLimit)
    },
    exclusions: {
      folders: pickStrings(exclusions, 'folders', [...defaults.exclusions.folders])
    },
    logLevel: typeof logLevel === 'string' ? parseLogLevel(logLevel, defaults.logLevel) : defaults.logLevel
  };
}

/**
 * Configuration manager
 */
export class ConfigManager {
  private config: AppConfig;
  private configPath: string;
  private isDirty = false;

  constructor(configPath: string = './config.yaml') {
    this.configPath = configPath;
    this.config = this.loadConfig();
  }

  /**
   * Load configuration from file or use defaults
   */
  private loadConfig(): AppConfig {
    if (!existsSync(this.configPath)) {
      logger.info(`Config file not found: ${this.configPath}, using defaults`, { path: this.configPath });
      return cloneConfig(DEFAULT_CONFIG);
    }

    try {
      const content = readFileSync(this.configPath, 'utf-8');
      let parsed: unknown;

      if (this.configPath.endsWith('.json')) {
        parsed = JSON.parse(content);
      } else if (this.configPath.endsWith('.yaml') || this.configPath.endsWith('.yml')) {
        parsed = YAML.load(content);
      } else {
        throw new Error(`Unsupported config format: ${this.configPath}`);
      }

      logger.info(`Loaded configuration from ${this.configPath}`);
      return mergeConfigs(DEFAULT_CONFIG, parsed);
    } catch (error) {
      logger.warn(`Failed to load config: ${error instanceof Error ? error.message : String(error)}`);
      return cloneConfig(DEFAULT_CONFIG);
    }
  }

  /**
   * Get complete configuration
   */
  getAll(): AppConfig {
    return cloneConfig(this.config);
  }

  get<K extends keyof AppConfig>(key: K): AppConfig[K] {
    return cloneConfig(this.config)[key];
  }

  set<K extends keyof AppConfig>(key: K, value: AppConfig[K]): void {
    this.config[key] = structuredClone(value);
    this.isDirty = true;
    logger.debug(`Config updated: ${String(key)}`);
  }

  /**
   * Replace the persisted exclusion list
   */
  setExclusions(folders: Iterable<string>): void {
    this.set('exclusions', { folders: [...folders] });
  }

  /**
   * Save configuration to file
   */
  save(): void {
    if (!this.isDirty) return;

    try {
      mkdirSync(dirname(this.configPath), { recursive: true });
      const content = this.configPath.endsWith('.json') ? this.toJSON() : this.toYAML();

      writeFileSync(this.configPath, content);
      this.isDirty = false;

      logger.info(`Configuration saved to ${this.configPath}`);
    } catch (error) {
      logger.error(
        `Failed to save config: ${error instanceof Error ? error.message : String(error)}`,
        error instanceof Error ? error : undefined
      );
    }
  }

  /**
   * Reset to defaults
   */
  reset(): void {
    this.config = cloneConfig(DEFAULT_CONFIG);
    this.isDirty = true;
    logger.info('Configuration reset to defaults');
  }

  /**
   * Validate configuration
   */
  validate(): { valid: boolean; errors: string[] } {
    const errors: string[] = [];
    const { scan, copy } = this.config;

    if (scan.thumbnailThresholdBytes < 0) {
      errors.push('Thumbnail threshold must not be negative');
    }

    if (scan.progressEveryFiles < 1 || copy.progressEveryFiles < 1) {
      errors.push('Progress cadence must be at least 1 file');
    }

    if (scan.progressIntervalMs < 0 || copy.progressIntervalMs < 0 || copy.fileProgressIntervalMs < 0) {
      errors.push('Progress intervals must not be negative');
    }

    if (!Number.isInteger(copy.retries) || copy.retries < 0 || copy.retries > 10) {
      errors.push('Copy retries must be an integer between 0 and 10');
    }

    if (copy.failureSummaryLimit < 0) {
      errors.push('Failure summary limit must not be negative');
    }

    return {
      valid: errors.length === 0,
      errors
    };
  }

  toJSON(): string {
    return JSON.stringify(this.config, null, 2);
  }

  toYAML(): string {
    return YAML.dump(this.config, { indent: 2 });
  }

  getPath(): string {
    return this.configPath;
  }
}

/**
 * Global config instance
 */
let globalConfig: ConfigManager | null = null;

/**
 * Get or create global config instance. Reads `.env` first so
 * MEDIA_HARVEST_CONFIG and LOG_LEVEL can come from there.
 */
export function getConfig(path?: string): ConfigManager {
  if (!globalConfig) {
    loadEnv();
    globalConfig = new ConfigManager(path ?? process.env.MEDIA_HARVEST_CONFIG ?? './config.yaml');
  }
  return globalConfig;
}
