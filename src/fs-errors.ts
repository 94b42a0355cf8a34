import type { FailureKind } from './types.js';

export type FailureSide = 'source' | 'destination';

const VANISHED_CODES = new Set(['ENOENT', 'ENOTDIR']);
const ACCESS_CODES = new Set(['EACCES', 'EPERM']);
const DESTINATION_CODES = new Set([
  'ENOSPC',
  'EDQUOT',
  'EFBIG',
  'ENAMETOOLONG',
  'EROFS',
  'EEXIST',
  'EISDIR',
  'ENOTDIR',
  'EINVAL',
  'EIO',
  'ENOENT',
  'EACCES',
  'EPERM',
]);
const TRANSIENT_CODES = new Set(['EBUSY', 'EAGAIN', 'EMFILE', 'ENFILE']);

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error && typeof error.code === 'string';
}

export function errnoCode(error: unknown): string | undefined {
  return isErrnoException(error) ? error.code : undefined;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Map a Node filesystem error to a failure kind.
 * `side` says which end of the copy the failing call touched.
 */
export function classifyFsError(error: unknown, side: FailureSide): FailureKind {
  const code = errnoCode(error);
  if (!code) return 'UNKNOWN_ERROR';

  if (side === 'source') {
    if (VANISHED_CODES.has(code)) return 'SOURCE_VANISHED';
    if (ACCESS_CODES.has(code)) return 'ACCESS_DENIED';
    return 'UNKNOWN_ERROR';
  }

  return DESTINATION_CODES.has(code) ? 'DESTINATION_WRITE_FAILURE' : 'UNKNOWN_ERROR';
}

/**
 * Work out which side a streamed copy failed on from the errno path, if any.
 */
export function sideOfStreamError(error: unknown, sourcePath: string): FailureSide {
  return isErrnoException(error) && error.path === sourcePath ? 'source' : 'destination';
}

export function isTransientFsError(error: unknown): boolean {
  const code = errnoCode(error);
  return code !== undefined && TRANSIENT_CODES.has(code);
}
