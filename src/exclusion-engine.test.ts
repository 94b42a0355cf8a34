import { describe, it, expect } from 'vitest';
import { join, resolve } from 'path';
import { ExclusionSet, isHiddenName, isThumbnailDatabase, matchesBuiltInRule } from './exclusion-engine.js';

const ROOT = resolve('/data/library');

describe('built-in rules', () => {
  it('excludes cache, temp and program folders anywhere below the root', () => {
    expect(matchesBuiltInRule(join(ROOT, 'AppData', 'a.jpg'), ROOT)).toBe(true);
    expect(matchesBuiltInRule(join(ROOT, 'work', 'Cache', 'b.jpg'), ROOT)).toBe(true);
    expect(matchesBuiltInRule(join(ROOT, 'temp'), ROOT)).toBe(true);
    expect(matchesBuiltInRule(join(ROOT, 'Program Files (x86)'), ROOT)).toBe(true);
    expect(matchesBuiltInRule(join(ROOT, 'Photos', 'beach.jpg'), ROOT)).toBe(false);
  });

  it('matches whole components only', () => {
    expect(matchesBuiltInRule(join(ROOT, 'temperature', 'chart.png'), ROOT)).toBe(false);
    expect(matchesBuiltInRule(join(ROOT, 'my-cache-notes', 'a.pdf'), ROOT)).toBe(false);
  });

  it('excludes hidden entries and thumbnail databases', () => {
    expect(matchesBuiltInRule(join(ROOT, '.git', 'x.png'), ROOT)).toBe(true);
    expect(matchesBuiltInRule(join(ROOT, '.DS_Store'), ROOT)).toBe(true);
    expect(matchesBuiltInRule(join(ROOT, 'Photos', 'Thumbs.db'), ROOT)).toBe(true);
    expect(matchesBuiltInRule(join(ROOT, 'thumbcache_256.db'), ROOT)).toBe(true);
    expect(isThumbnailDatabase('desktop.ini')).toBe(true);
    expect(isHiddenName('.hidden')).toBe(true);
    expect(isHiddenName('visible')).toBe(false);
  });

  it('ignores components at or above the scan root', () => {
    const tempRoot = resolve('/tmp/.work/scan-root');
    expect(matchesBuiltInRule(join(tempRoot, 'Photos', 'a.jpg'), tempRoot)).toBe(false);
    expect(matchesBuiltInRule(tempRoot, tempRoot)).toBe(false);
  });

  it('applies system root names only directly under a filesystem root', () => {
    expect(matchesBuiltInRule(resolve('/proc/1'))).toBe(true);
    expect(matchesBuiltInRule(join(ROOT, 'proc', 'a.jpg'), ROOT)).toBe(false);
  });
});

describe('ExclusionSet', () => {
  it('excludes a folder and everything beneath it', () => {
    const set = new ExclusionSet([join(ROOT, 'Private')], { caseInsensitive: false });
    expect(set.isExcluded(join(ROOT, 'Private'), ROOT)).toBe(true);
    expect(set.isExcluded(join(ROOT, 'Private', 'deep', 'a.jpg'), ROOT)).toBe(true);
    expect(set.isExcluded(join(ROOT, 'PrivateNot', 'a.jpg'), ROOT)).toBe(false);
  });

  it('honours case sensitivity', () => {
    const sensitive = new ExclusionSet([join(ROOT, 'Private')], { caseInsensitive: false });
    const insensitive = new ExclusionSet([join(ROOT, 'Private')], { caseInsensitive: true });
    expect(sensitive.isUserExcluded(join(ROOT, 'private', 'a.jpg'))).toBe(false);
    expect(insensitive.isUserExcluded(join(ROOT, 'private', 'a.jpg'))).toBe(true);
  });

  it('makes add and remove idempotent', () => {
    const set = new ExclusionSet([], { caseInsensitive: false });
    expect(set.add(join(ROOT, 'A'))).toBe(true);
    expect(set.add(join(ROOT, 'A') + '/')).toBe(false);
    expect(set.size).toBe(1);
    expect(set.remove(join(ROOT, 'A'))).toBe(true);
    expect(set.remove(join(ROOT, 'A'))).toBe(false);
    expect(set.list()).toEqual([]);
  });

  it('snapshots independently of later changes', () => {
    const set = new ExclusionSet([join(ROOT, 'A')], { caseInsensitive: false });
    const snapshot = set.snapshot([join(ROOT, 'B')]);
    set.clear();
    expect(set.size).toBe(0);
    expect(snapshot.list()).toEqual([join(ROOT, 'A'), join(ROOT, 'B')]);
    expect(snapshot.has(join(ROOT, 'B'))).toBe(true);
  });
});
