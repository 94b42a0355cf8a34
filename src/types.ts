/**
 * Core types for the media harvesting pipeline
 */

export type MediaCategory = 'photo' | 'video' | 'pdf' | 'other';

export const MEDIA_CATEGORIES: readonly MediaCategory[] = ['photo', 'video', 'pdf', 'other'];

export type LayoutMode = 'date' | 'source';

/**
 * Which categories a scan keeps. `includeOther` must be asked for explicitly.
 */
export interface TypeFilters {
  includePhotos: boolean;
  includeVideos: boolean;
  includePdfs: boolean;
  includeOther?: boolean;
}

export interface Classification {
  category: MediaCategory;
  likelyThumbnail: boolean;
}

export interface FileRecord {
  readonly path: string;
  readonly category: MediaCategory;
  readonly size: number;
  readonly modifiedAt: Date;
}

export interface Inventory {
  readonly root: string;
  readonly filters: Readonly<TypeFilters>;
  readonly records: readonly FileRecord[];
  readonly createdAt: Date;
}

export type FailureKind =
  | 'ACCESS_DENIED'
  | 'SOURCE_VANISHED'
  | 'DESTINATION_WRITE_FAILURE'
  | 'UNKNOWN_ERROR';

export interface FailureRecord {
  path: string;
  kind: FailureKind;
  message: string;
}

export type CategoryCounts = Record<MediaCategory, number>;

export interface ScanStats {
  root: string;
  startedAt: string;
  finishedAt: string | null;
  elapsedMs: number;
  filesSeen: number;
  directoriesVisited: number;
  totalFiles: number;
  totalBytes: number;
  found: CategoryCounts;
  bytesByCategory: CategoryCounts;
  excludedDirectories: number;
  excludedFiles: number;
  filteredFiles: number;
  thumbnails: number;
  emptyFiles: number;
  skippedDirectories: FailureRecord[];
  failures: FailureRecord[];
  cancelled: boolean;
}

export type PlanAction = 'copy' | 'skip-duplicate' | 'skip-filtered';

export interface CopyPlanEntry {
  record: FileRecord;
  destination: string | null;
  action: PlanAction;
}

export type CopyStatus = 'copied' | 'would-copy' | 'duplicate' | 'filtered' | 'failed';

export interface CopyOutcome {
  source: string;
  category: MediaCategory;
  status: CopyStatus;
  destination?: string;
  duplicateOf?: string;
  error?: FailureRecord;
}

export interface CategoryCopyCounts {
  copied: number;
  duplicates: number;
  filtered: number;
  failed: number;
}

export interface CopyStats {
  destination: string;
  layout: LayoutMode;
  dryRun: boolean;
  startedAt: string;
  finishedAt: string | null;
  elapsedMs: number;
  total: number;
  processed: number;
  copied: number;
  duplicates: number;
  filtered: number;
  failed: number;
  bytesCopied: number;
  byCategory: Record<MediaCategory, CategoryCopyCounts>;
  failures: FailureRecord[];
  outcomes: CopyOutcome[];
  cancelled: boolean;
}

export type ScanPhase = 'scanning' | 'done' | 'cancelled';

export type CopyPhase = 'copying' | 'done' | 'cancelled';

export interface ScanProgress {
  phase: ScanPhase;
  currentPath: string;
  filesSeen: number;
  directoriesVisited: number;
  found: CategoryCounts;
  totalBytes: number;
  elapsedMs: number;
}

export interface CopyProgress {
  phase: CopyPhase;
  currentPath: string;
  lastStatus: CopyStatus | null;
  processed: number;
  total: number;
  copied: number;
  duplicates: number;
  filtered: number;
  failed: number;
  bytesCopied: number;
  elapsedMs: number;
}

export interface FileCopyProgress {
  source: string;
  destination: string;
  bytesCopied: number;
  totalBytes: number;
  rateMbps: number;
}

export type ProgressCallback<T> = (progress: Readonly<T>) => void;

export function emptyCategoryCounts(): CategoryCounts {
  return { photo: 0, video: 0, pdf: 0, other: 0 };
}
