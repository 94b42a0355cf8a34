import fs from 'fs';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { DEFAULT_CONFIG } from '../src/config.js';
import { ExclusionSet } from '../src/exclusion-engine.js';
import { nodeDirectoryReader, scan, type DirectoryReader } from '../src/scanner.js';
import { HarvestSession } from '../src/session.js';
import type { TypeFilters } from '../src/types.js';
import { fileContent, listFiles, makeTempDir, removeDir, writeFixture } from './helpers.js';

const PHOTOS_ONLY: TypeFilters = { includePhotos: true, includeVideos: false, includePdfs: false };
const MEDIA: TypeFilters = { includePhotos: true, includeVideos: true, includePdfs: true };
const MARCH_15 = new Date(2024, 2, 15, 14, 0);

describe('scan and copy pipeline', () => {
  let tmpDir: string | null = null;
  let root: string;
  let dest: string;
  let session: HarvestSession;

  beforeEach(() => {
    tmpDir = makeTempDir('media-harvest-pipeline-');
    root = path.join(tmpDir, 'C');
    dest = path.join(tmpDir, 'Dest');
    session = new HarvestSession({ ...DEFAULT_CONFIG, scan: { ...DEFAULT_CONFIG.scan, caseInsensitive: false } });
  });

  afterEach(() => {
    removeDir(tmpDir);
    tmpDir = null;
    vi.restoreAllMocks();
  });

  it('copies a downloaded photo once and skips its identical twin', async () => {
    const photo = fileContent('img1', 2 * 1024 * 1024);
    writeFixture(root, 'Photos/2024/img1.jpg', photo, MARCH_15);
    writeFixture(root, 'Downloads/img1.jpg', photo, MARCH_15);

    const scanned = await session.scan(root, PHOTOS_ONLY);
    expect(scanned.totalFiles).toBe(2);

    const copied = await session.copyFiles(dest, 'date', false, undefined);

    expect(copied).toMatchObject({ copied: 1, duplicates: 1, failed: 0 });
    expect(listFiles(dest)).toEqual(['Downloads/img1.jpg']);
    expect(copied.outcomes[1]).toMatchObject({
      source: path.join(root, 'Photos', '2024', 'img1.jpg'),
      status: 'duplicate',
      duplicateOf: path.join(root, 'Downloads', 'img1.jpg'),
    });
    expect(fs.statSync(path.join(dest, 'Downloads', 'img1.jpg')).mtime.getTime()).toBe(MARCH_15.getTime());
  });

  it('rejects a destination inside the source root and touches nothing', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    writeFixture(root, 'Photos/a.jpg', fileContent('a'));
    await session.scan(root, PHOTOS_ONLY);

    for (const target of [root, path.join(root, 'Backup')]) {
      await expect(session.copyFiles(target, 'date', false, undefined)).rejects.toMatchObject({
        code: 'INVALID_CONFIGURATION',
      });
    }
    expect(listFiles(root)).toEqual(['Photos/a.jpg']);
  });

  it('drops a 512-byte photo as a likely thumbnail', async () => {
    writeFixture(root, 'Photos/small.jpg', fileContent('s', 512));
    writeFixture(root, 'Photos/large.jpg', fileContent('l'));

    const stats = await session.scan(root, PHOTOS_ONLY);

    expect(stats.thumbnails).toBe(1);
    expect(session.getInventory()?.records.map((record) => path.basename(record.path))).toEqual(['large.jpg']);
  });

  it('reports the same counts for a dry run as for the real copy', async () => {
    writeFixture(root, 'Photos/a.jpg', fileContent('a'), MARCH_15);
    writeFixture(root, 'Photos/b.jpg', fileContent('a'), MARCH_15);
    writeFixture(root, 'Docs/c.pdf', fileContent('c'), MARCH_15);
    writeFixture(root, 'Videos/d.mp4', fileContent('d'), MARCH_15);
    await session.scan(root, MEDIA);

    const dry = await session.copyFiles(dest, 'date', true, undefined);
    expect(fs.existsSync(dest)).toBe(false);
    const real = await session.copyFiles(dest, 'date', false, undefined);

    const counts = (stats: typeof dry) => [stats.copied, stats.duplicates, stats.filtered, stats.failed, stats.byCategory];
    expect(counts(dry)).toEqual(counts(real));
    expect(real.copied).toBe(3);
  });

  it('never opens excluded subtrees and keeps every record inside the root', async () => {
    writeFixture(root, 'Photos/a.jpg', fileContent('a'));
    writeFixture(root, 'AppData/Local/cache.jpg', fileContent('x'));
    writeFixture(root, 'Private/p.jpg', fileContent('p'));
    const opened: string[] = [];
    const reader: DirectoryReader = {
      readdir: (dir) => {
        opened.push(path.relative(root, dir));
        return nodeDirectoryReader.readdir(dir);
      },
      lstat: (file) => nodeDirectoryReader.lstat(file),
    };
    const exclusions = new ExclusionSet([path.join(root, 'Private')], { caseInsensitive: false });

    const { inventory } = await scan(root, PHOTOS_ONLY, exclusions, { reader });

    expect(opened).toEqual(['', 'Photos']);
    for (const record of inventory.records) {
      expect(record.path.startsWith(root + path.sep)).toBe(true);
      expect(exclusions.isExcluded(record.path, root)).toBe(false);
    }
  });
});
