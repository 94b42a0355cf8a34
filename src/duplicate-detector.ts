/**
 * Content-addressed duplicate detection. Hashes are computed only for copy
 * candidates, never during scanning.
 */

import { createHash } from 'crypto';
import { createReadStream, existsSync } from 'fs';
import { resolve } from 'path';
import fg from 'fast-glob';
import pLimit from 'p-limit';
import { errorMessage } from './fs-errors.js';
import { logger as baseLogger } from './logger.js';
import type { FileRecord } from './types.js';

const logger = baseLogger.child('duplicates');

const SEED_CONCURRENCY = 4;

/**
 * Whole-file MD5. A digest collision counts as a real duplicate.
 */
export async function hashFile(filePath: string): Promise<string> {
  const hash = createHash('md5');
  for await (const chunk of createReadStream(filePath)) {
    hash.update(chunk);
  }
  return hash.digest('hex');
}

export interface RegistrySnapshot {
  entries: Array<[hash: string, paths: string[]]>;
}

/**
 * hash -> every path known to hold that content
 */
export class DuplicateRegistry {
  private byHash = new Map<string, string[]>();

  static fromSnapshot(snapshot: RegistrySnapshot): DuplicateRegistry {
    const registry = new DuplicateRegistry();
    for (const [hash, paths] of snapshot.entries) {
      for (const path of paths) registry.register(hash, path);
    }
    return registry;
  }

  has(hash: string): boolean {
    return this.byHash.has(hash);
  }

  firstPath(hash: string): string | undefined {
    return this.byHash.get(hash)?.[0];
  }

  register(hash: string, path: string): void {
    const paths = this.byHash.get(hash);
    if (!paths) {
      this.byHash.set(hash, [path]);
    } else if (!paths.includes(path)) {
      paths.push(path);
    }
  }

  get size(): number {
    return this.byHash.size;
  }

  snapshot(): RegistrySnapshot {
    return {
      entries: [...this.byHash.entries()].map(([hash, paths]) => [hash, [...paths]]),
    };
  }
}

export type FileHasher = (filePath: string) => Promise<string>;

export class DuplicateDetector {
  private hashes = new Map<string, string>();
  private registry: DuplicateRegistry;
  private hasher: FileHasher;

  constructor(registry: DuplicateRegistry = new DuplicateRegistry(), hasher: FileHasher = hashFile) {
    this.registry = registry;
    this.hasher = hasher;
  }

  /**
   * Memoized per path for the lifetime of this detector.
   */
  async hashOf(record: FileRecord | string): Promise<string> {
    const path = typeof record === 'string' ? record : record.path;
    const cached = this.hashes.get(path);
    if (cached) return cached;

    const hash = await this.hasher(path);
    this.hashes.set(path, hash);
    return hash;
  }

  async isDuplicate(record: FileRecord): Promise<boolean> {
    return this.registry.has(await this.hashOf(record));
  }

  duplicateOf(hash: string): string | undefined {
    return this.registry.firstPath(hash);
  }

  markCopied(record: FileRecord, hash: string, destination?: string): void {
    this.registry.register(hash, record.path);
    if (destination) this.registry.register(hash, destination);
  }

  register(hash: string, path: string): void {
    this.registry.register(hash, path);
  }

  /**
   * Pre-register everything already under the destination so content copied
   * by an earlier run counts as a duplicate. Unreadable files are skipped.
   */
  async seedFromDestination(root: string, signal?: AbortSignal): Promise<number> {
    const rootPath = resolve(root);
    if (!existsSync(rootPath)) return 0;

    const files = await fg('**/*', {
      cwd: rootPath,
      absolute: true,
      onlyFiles: true,
      dot: false,
      followSymbolicLinks: false,
    });

    const limit = pLimit(SEED_CONCURRENCY);
    let seeded = 0;

    await Promise.all(
      files.map((file) =>
        limit(async () => {
          if (signal?.aborted) return;
          try {
            this.registry.register(await this.hashOf(file), file);
            seeded++;
          } catch (error) {
            logger.warn('Could not hash existing destination file', { path: file, error: errorMessage(error) });
          }
        })
      )
    );

    logger.info('Seeded duplicate registry from destination', { root: rootPath, files: seeded });
    return seeded;
  }

  getRegistry(): DuplicateRegistry {
    return this.registry;
  }

  snapshot(): RegistrySnapshot {
    return this.registry.snapshot();
  }
}
