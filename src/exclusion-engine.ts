/**
 * Exclusion rules: built-in system/cache/temp patterns plus a user-editable
 * set of excluded folders.
 */

import { basename, isAbsolute, parse, relative, resolve, sep } from 'path';
import { logger as baseLogger } from './logger.js';

const logger = baseLogger.child('exclusions');

// Matched against any single path component, case-insensitively.
const EXCLUDED_DIRECTORY_NAMES = new Set([
  // OS and program installation
  'windows',
  'program files',
  'program files (x86)',
  'programdata',
  'appdata',
  'application data',
  'local settings',
  '$recycle.bin',
  'system volume information',
  'recovery',
  'perflogs',
  'msocache',
  'node_modules',
  // Browser cache and history
  'cache',
  'caches',
  'cookies',
  'history',
  'temporary internet files',
  'content.ie5',
  'inetcache',
  'gpucache',
  'code cache',
  // Temp
  'temp',
  'tmp',
]);

// Matched only directly below a filesystem root.
const SYSTEM_ROOT_NAMES = new Set([
  'proc',
  'sys',
  'dev',
  'run',
  'boot',
  'bin',
  'sbin',
  'lib',
  'lib64',
  'usr',
  'etc',
  'var',
  'snap',
  'system',
  'library',
  'applications',
  'private',
]);

const EXCLUDED_FILE_NAMES = new Set([
  'thumbs.db',
  'ehthumbs.db',
  'ehthumbs_vista.db',
  'iconcache.db',
  'desktop.ini',
  'pagefile.sys',
  'hiberfil.sys',
  'swapfile.sys',
]);

const THUMBCACHE_PATTERN = /^thumbcache_.*\.db$/;

function splitComponents(absolutePath: string): string[] {
  return absolutePath.slice(parse(absolutePath).root.length).split(sep).filter(Boolean);
}

/**
 * Components of `absolutePath` below `root`, or all of them when the path is
 * not inside the root (or no root is given).
 */
function componentsBelow(absolutePath: string, root?: string): string[] {
  if (!root) return splitComponents(absolutePath);

  const rel = relative(resolve(root), absolutePath);
  if (rel === '') return [];
  if (rel.startsWith('..') || isAbsolute(rel)) return splitComponents(absolutePath);
  return rel.split(sep).filter(Boolean);
}

export function isHiddenName(name: string): boolean {
  return name.startsWith('.') && name !== '.' && name !== '..';
}

export function isThumbnailDatabase(name: string): boolean {
  const lower = name.toLowerCase();
  return EXCLUDED_FILE_NAMES.has(lower) || THUMBCACHE_PATTERN.test(lower);
}

/**
 * Built-in rules. With a root, only components below it are considered so a
 * scan rooted inside e.g. a temp directory still sees its own files.
 */
export function matchesBuiltInRule(target: string, root?: string): boolean {
  const absolute = resolve(target);
  const below = componentsBelow(absolute, root);
  if (below.length === 0) return false;

  const depthOffset = splitComponents(absolute).length - below.length;

  const componentExcluded = below.some((name, index) => {
    const lower = name.toLowerCase();
    if (isHiddenName(name)) return true;
    if (EXCLUDED_DIRECTORY_NAMES.has(lower)) return true;
    return depthOffset + index === 0 && SYSTEM_ROOT_NAMES.has(lower);
  });

  return componentExcluded || isThumbnailDatabase(basename(absolute));
}

export interface ExclusionSetOptions {
  caseInsensitive?: boolean;
}

export class ExclusionSet {
  // normalized key -> resolved path as given
  private folders = new Map<string, string>();
  private caseInsensitive: boolean;

  constructor(folders: Iterable<string> = [], options: ExclusionSetOptions = {}) {
    this.caseInsensitive = options.caseInsensitive ?? (process.platform === 'win32' || process.platform === 'darwin');
    for (const folder of folders) {
      this.add(folder);
    }
  }

  private normalize(folder: string): string {
    let resolved = resolve(folder);
    if (resolved.length > parse(resolved).root.length && resolved.endsWith(sep)) {
      resolved = resolved.slice(0, -1);
    }
    return this.caseInsensitive ? resolved.toLowerCase() : resolved;
  }

  /**
   * Returns false when the folder was already present.
   */
  add(folder: string): boolean {
    const key = this.normalize(folder);
    if (this.folders.has(key)) return false;
    this.folders.set(key, resolve(folder));
    logger.debug('Exclusion added', { folder: resolve(folder) });
    return true;
  }

  /**
   * Returns false when the folder was not present.
   */
  remove(folder: string): boolean {
    const removed = this.folders.delete(this.normalize(folder));
    if (removed) {
      logger.debug('Exclusion removed', { folder: resolve(folder) });
    }
    return removed;
  }

  clear(): void {
    this.folders.clear();
  }

  has(folder: string): boolean {
    return this.folders.has(this.normalize(folder));
  }

  list(): string[] {
    return [...this.folders.values()];
  }

  get size(): number {
    return this.folders.size;
  }

  isUserExcluded(target: string): boolean {
    const candidate = this.normalize(target);
    for (const base of this.folders.keys()) {
      if (candidate === base) return true;
      const prefix = base.endsWith(sep) ? base : base + sep;
      if (candidate.startsWith(prefix)) return true;
    }
    return false;
  }

  isExcluded(target: string, root?: string): boolean {
    return this.isUserExcluded(target) || matchesBuiltInRule(target, root);
  }

  /**
   * Independent copy, optionally with extra folders for a single run.
   */
  snapshot(extra: Iterable<string> = []): ExclusionSet {
    const copy = new ExclusionSet([], { caseInsensitive: this.caseInsensitive });
    for (const folder of this.folders.values()) copy.add(folder);
    for (const folder of extra) copy.add(folder);
    return copy;
  }
}
