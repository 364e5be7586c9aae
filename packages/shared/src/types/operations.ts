/**
 * Filesystem operations eligible for fault injection
 *
 * open, stat, lstat and fstat are left out on purpose: failing those takes
 * down the host process instead of exercising its error paths.
 */

export const FAULT_OPERATIONS = [
  "chmod",
  "chown",
  "chroot",
  "close",
  "closedir",
  "fchmod",
  "fchown",
  "lchown",
  "lseek",
  "mkdir",
  "opendir",
  "read",
  "readdir",
  "readlink",
  "rename",
  "rmdir",
  "unlink",
  "utimes",
  "write",
] as const;

export type OperationName = (typeof FAULT_OPERATIONS)[number];

/**
 * Operations that share another operation's binding.
 * pread faults with "read", pwrite with "write".
 */
export const COUPLED_OPERATIONS = {
  pread: "read",
  pwrite: "write",
} as const satisfies Record<string, OperationName>;

export interface FaultBinding {
  operation: OperationName;
  errorCode: number;
}
