/**
 * Building FsFailure values, for real and injected errors alike
 */

import type { FsFailure } from "@fsfault/shared";
import {
  errnoMessage,
  platformErrnoFor,
  systemErrorCode,
} from "./registry.js";

export interface FailureTarget {
  path?: string;
  dest?: string;
}

export function errnoFailure(
  errno: number,
  syscall: string,
  target: FailureTarget = {}
): FsFailure {
  const failure: FsFailure = {
    errno,
    code: systemErrorCode(errno),
    message: errnoMessage(errno),
    syscall,
  };
  if (target.path !== undefined) failure.path = target.path;
  if (target.dest !== undefined) failure.dest = target.dest;
  return failure;
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}

/**
 * Convert an error thrown by a node:fs primitive into an FsFailure.
 * Anything that is not a system error (bad arguments, closed Dir objects
 * and the like) is rethrown.
 */
export function fromNodeError(
  err: unknown,
  syscall: string,
  target: FailureTarget = {}
): FsFailure {
  if (isErrnoException(err) && typeof err.code === "string") {
    const errno =
      platformErrnoFor(err.code) ??
      (typeof err.errno === "number" ? Math.abs(err.errno) : undefined);
    if (errno !== undefined) {
      return errnoFailure(errno, syscall, target);
    }
  }
  throw err;
}

/**
 * Turn a failure back into the error Node itself would have thrown
 */
export function toErrnoException(failure: FsFailure): NodeJS.ErrnoException {
  let detail = failure.syscall;
  if (failure.path !== undefined) detail += ` '${failure.path}'`;
  if (failure.dest !== undefined) detail += ` -> '${failure.dest}'`;

  const err: NodeJS.ErrnoException = new Error(
    `${failure.code}: ${failure.message}, ${detail}`
  );
  err.code = failure.code;
  err.errno = -failure.errno;
  err.syscall = failure.syscall;
  if (failure.path !== undefined) err.path = failure.path;
  return err;
}
