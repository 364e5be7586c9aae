/**
 * Error descriptor types (registry of injectable error names)
 */

/**
 * Error names every supported platform defines.
 */
export const PORTABLE_ERROR_NAMES = [
  "EACCES",
  "EAGAIN",
  "EBADF",
  "EEXIST",
  "EIO",
  "EINTR",
  "ENOENT",
  "ENOMEM",
  "ENOSPC",
  "EPERM",
] as const;

/**
 * Error names that are only registered when the running platform has them.
 */
export const EXTENDED_ERROR_NAMES = [
  "EBUSY",
  "EDQUOT",
  "EFBIG",
  "EMFILE",
  "EMLINK",
  "ENFILE",
  "ENODEV",
  "ENOTEMPTY",
  "ENXIO",
  "EOPNOTSUPP",
  "EROFS",
  "ESTALE",
  "ETXTBUSY",
] as const;

export type PortableErrorName = (typeof PORTABLE_ERROR_NAMES)[number];
export type ExtendedErrorName = (typeof EXTENDED_ERROR_NAMES)[number];
export type ErrorName = PortableErrorName | ExtendedErrorName;

export interface ErrorDescriptor {
  readonly name: ErrorName;
  readonly code: number; // platform errno
}
