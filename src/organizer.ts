/**
 * Destination layout: Downloads override, then by date or by source root.
 */

import { basename, extname, join, parse, resolve, sep } from 'path';
import { CATEGORY_FOLDERS } from './classifier.js';
import type { FileRecord, LayoutMode } from './types.js';

export const DOWNLOADS_FOLDER = 'Downloads';

const UNSAFE_SEGMENT_CHARS = /[<>:"/\\|?*\x00-\x1f]/g;

export function isFromDownloads(filePath: string): boolean {
  return resolve(filePath)
    .split(sep)
    .some((component) => component.toLowerCase() === 'downloads');
}

/**
 * Short stable token for a scan root: the drive letter of a drive root,
 * `root` for `/`, otherwise the root folder's own name.
 */
export function sourceRootIdentifier(root: string): string {
  const resolved = resolve(root);
  const parsed = parse(resolved);
  if (resolved === parsed.root) {
    const drive = parsed.root.replace(/[:\\/]/g, '');
    return drive || 'root';
  }
  return basename(resolved).replace(UNSAFE_SEGMENT_CHARS, '_');
}

/**
 * `photo.jpg` -> `photo_2.jpg`
 */
export function withDisambiguator(filePath: string, counter: number): string {
  if (counter <= 0) return filePath;
  const ext = extname(filePath);
  const stem = filePath.slice(0, filePath.length - ext.length);
  return `${stem}_${counter}${ext}`;
}

export interface OrganizerOptions {
  layout: LayoutMode;
  destinationRoot: string;
  sourceRoot: string;
}

export interface ResolvedDestination {
  path: string;
  /** Set when an existing file at a candidate path already holds this content */
  duplicateOf?: string;
}

/**
 * `null` when nothing exists at the path, otherwise whether the existing
 * file has the same content.
 */
export type ExistingContentProbe = (candidate: string) => Promise<boolean | null>;

export class Organizer {
  readonly layout: LayoutMode;
  readonly destinationRoot: string;
  private sourceToken: string;

  constructor(options: OrganizerOptions) {
    this.layout = options.layout;
    this.destinationRoot = resolve(options.destinationRoot);
    this.sourceToken = sourceRootIdentifier(options.sourceRoot);
  }

  relativeDestination(record: FileRecord): string {
    const name = basename(record.path);

    if (isFromDownloads(record.path)) {
      return join(DOWNLOADS_FOLDER, name);
    }

    const categoryFolder = CATEGORY_FOLDERS[record.category];
    if (this.layout === 'date') {
      const year = String(record.modifiedAt.getFullYear());
      const month = String(record.modifiedAt.getMonth() + 1).padStart(2, '0');
      return join(categoryFolder, year, month, name);
    }

    return join(categoryFolder, this.sourceToken, name);
  }

  destinationFor(record: FileRecord): string {
    return join(this.destinationRoot, this.relativeDestination(record));
  }

  /**
   * Walk `name`, `name_1`, `name_2`, ... until a free slot or a slot that
   * already holds identical content.
   */
  async resolveCollision(candidate: string, probe: ExistingContentProbe): Promise<ResolvedDestination> {
    for (let counter = 0; ; counter++) {
      const path = withDisambiguator(candidate, counter);
      const same = await probe(path);
      if (same === null) return { path };
      if (same) return { path, duplicateOf: path };
    }
  }
}
