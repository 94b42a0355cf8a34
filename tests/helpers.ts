import fs from 'fs';
import os from 'os';
import path from 'path';

export function makeTempDir(prefix: string = 'media-harvest-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string | null): void {
  if (dir && fs.existsSync(dir)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
}

/**
 * `size` bytes built from `seed`, so equal seeds give equal content.
 */
export function fileContent(seed: string, size: number = 2048): string {
  return seed.repeat(Math.ceil(size / seed.length)).slice(0, size);
}

export function writeFixture(root: string, relativePath: string, content: string, mtime?: Date): string {
  const fullPath = path.join(root, relativePath);
  fs.mkdirSync(path.dirname(fullPath), { recursive: true });
  fs.writeFileSync(fullPath, content);
  if (mtime) fs.utimesSync(fullPath, mtime, mtime);
  return fullPath;
}

export function listFiles(root: string): string[] {
  if (!fs.existsSync(root)) return [];
  const found: string[] = [];
  const walk = (dir: string): void => {
    for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
      const full = path.join(dir, entry.name);
      if (entry.isDirectory()) walk(full);
      else found.push(path.relative(root, full).split(path.sep).join('/'));
    }
  };
  walk(root);
  return found.sort();
}
