import { extname } from 'path';
import type { Classification, MediaCategory, TypeFilters } from './types.js';

export const DEFAULT_THUMBNAIL_THRESHOLD_BYTES = 1024;

const CATEGORY_BY_EXTENSION = new Map<string, MediaCategory>();

function map(exts: string[], category: MediaCategory): void {
  for (const ext of exts) CATEGORY_BY_EXTENSION.set(ext, category);
}

map(['.jpg', '.jpeg', '.png', '.gif', '.webp', '.heic', '.heif'], 'photo');
map([
  '.mp4', '.avi', '.mov', '.wmv', '.flv', '.mkv', '.webm', '.m4v', '.mpg', '.mpeg',
  '.3gp', '.3g2', '.asf', '.rm', '.rmvb', '.vob', '.ts', '.mts', '.m2ts'
], 'video');
map(['.pdf'], 'pdf');

export function categoryOf(filePath: string): MediaCategory {
  return CATEGORY_BY_EXTENSION.get(extname(filePath).toLowerCase()) ?? 'other';
}

/**
 * Classify a file from its name and an already-known size. No I/O.
 */
export function classify(
  filePath: string,
  size: number,
  thumbnailThresholdBytes: number = DEFAULT_THUMBNAIL_THRESHOLD_BYTES
): Classification {
  return {
    category: categoryOf(filePath),
    likelyThumbnail: size < thumbnailThresholdBytes,
  };
}

export function enabledCategories(filters: TypeFilters): Set<MediaCategory> {
  const enabled = new Set<MediaCategory>();
  if (filters.includePhotos) enabled.add('photo');
  if (filters.includeVideos) enabled.add('video');
  if (filters.includePdfs) enabled.add('pdf');
  if (filters.includeOther) enabled.add('other');
  return enabled;
}

export const CATEGORY_FOLDERS: Record<MediaCategory, string> = {
  photo: 'Photos',
  video: 'Videos',
  pdf: 'PDFs',
  other: 'Other',
};
