/**
 * Result union returned by every provider operation
 *
 * A failure carries both the platform errno and its symbolic code, so an
 * injected failure has exactly the shape of a genuine one.
 */

export interface FsFailure {
  errno: number;
  code: string; // e.g. "ENOSPC", or "UNKNOWN" for unnamed codes
  message: string;
  syscall: string;
  path?: string;
  dest?: string;
}

export type FsResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: FsFailure };

export function ok<T>(value: T): FsResult<T> {
  return { ok: true, value };
}

export function fail<T = never>(error: FsFailure): FsResult<T> {
  return { ok: false, error };
}
