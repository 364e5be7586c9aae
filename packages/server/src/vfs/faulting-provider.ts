/**
 * Faulting filesystem provider
 *
 * Wraps a real provider. Each interceptable operation looks up its binding
 * in the session's fault table: unbound calls go to the real provider
 * untouched, bound calls never reach it and return the configured errno
 * through the same FsResult channel a genuine failure uses.
 */

import type { Logger } from "pino";
import {
  COUPLED_OPERATIONS,
  FAULT_MOUNT,
  fail,
  type DirEntry,
  type DirectoryHandle,
  type FileHandle,
  type FileStats,
  type FilesystemProvider,
  type FsFailure,
  type FsResult,
  type OperationName,
  type SeekWhence,
  type TimeLike,
} from "@fsfault/shared";
import { errnoFailure, type FailureTarget } from "../errors/failure.js";
import { describeErrno } from "../errors/registry.js";
import type { FaultTableView } from "../faults/table.js";

export interface FaultingProviderOptions {
  /** Provider that serves every call without a configured fault */
  real: FilesystemProvider;
  /** The session's snapshot of the fault table */
  table: FaultTableView;
  logger: Logger;
  name?: string;
}

interface Interception {
  operation: OperationName;
  syscall: string;
  /** Human-readable call description for the detail log, e.g. `mkdir '/tmp/x'` */
  call: string;
  target?: FailureTarget;
  context?: Record<string, unknown>;
}

export class FaultingFilesystemProvider implements FilesystemProvider {
  readonly name: string;
  private readonly real: FilesystemProvider;
  private readonly table: FaultTableView;
  private readonly log: Logger;

  constructor(options: FaultingProviderOptions) {
    this.name = options.name ?? FAULT_MOUNT.NAME;
    this.real = options.real;
    this.table = options.table;
    this.log = options.logger;
  }

  // Foundational operations are never faulted

  open(path: string, flags: string | number, mode?: number): FsResult<FileHandle> {
    return this.real.open(path, flags, mode);
  }

  stat(path: string): FsResult<FileStats> {
    return this.real.stat(path);
  }

  lstat(path: string): FsResult<FileStats> {
    return this.real.lstat(path);
  }

  fstat(fh: FileHandle): FsResult<FileStats> {
    return this.real.fstat(fh);
  }

  chmod(path: string, mode: number): FsResult<void> {
    const failure = this.intercept({
      operation: "chmod",
      syscall: "chmod",
      call: `chmod '${path}' (mode ${mode.toString(8)})`,
      target: { path },
      context: { path, mode },
    });
    return failure ? fail(failure) : this.real.chmod(path, mode);
  }

  chown(path: string, uid: number, gid: number): FsResult<void> {
    const failure = this.intercept({
      operation: "chown",
      syscall: "chown",
      call: `chown '${path}' (UID ${uid}, GID ${gid})`,
      target: { path },
      context: { path, uid, gid },
    });
    return failure ? fail(failure) : this.real.chown(path, uid, gid);
  }

  lchown(path: string, uid: number, gid: number): FsResult<void> {
    const failure = this.intercept({
      operation: "lchown",
      syscall: "lchown",
      call: `lchown '${path}' (UID ${uid}, GID ${gid})`,
      target: { path },
      context: { path, uid, gid },
    });
    return failure ? fail(failure) : this.real.lchown(path, uid, gid);
  }

  fchmod(fh: FileHandle, mode: number): FsResult<void> {
    const failure = this.intercept({
      operation: "fchmod",
      syscall: "fchmod",
      call: `fchmod ${fh.fd} ('${fh.path}', mode ${mode.toString(8)})`,
      context: { fd: fh.fd, path: fh.path, mode },
    });
    return failure ? fail(failure) : this.real.fchmod(fh, mode);
  }

  fchown(fh: FileHandle, uid: number, gid: number): FsResult<void> {
    const failure = this.intercept({
      operation: "fchown",
      syscall: "fchown",
      call: `fchown ${fh.fd} ('${fh.path}', UID ${uid}, GID ${gid})`,
      context: { fd: fh.fd, path: fh.path, uid, gid },
    });
    return failure ? fail(failure) : this.real.fchown(fh, uid, gid);
  }

  /**
   * The session root only moves when the real provider succeeds, so an
   * injected failure leaves it where it was.
   */
  chroot(path: string): FsResult<void> {
    const failure = this.intercept({
      operation: "chroot",
      syscall: "chroot",
      call: `chroot '${path}'`,
      target: { path },
      context: { path },
    });
    return failure ? fail(failure) : this.real.chroot(path);
  }

  close(fh: FileHandle): FsResult<void> {
    const failure = this.intercept({
      operation: "close",
      syscall: "close",
      call: `close ${fh.fd} ('${fh.path}')`,
      context: { fd: fh.fd, path: fh.path },
    });
    return failure ? fail(failure) : this.real.close(fh);
  }

  lseek(fh: FileHandle, offset: number, whence: SeekWhence): FsResult<number> {
    const failure = this.intercept({
      operation: "lseek",
      syscall: "lseek",
      call: `lseek ${fh.fd} ('${fh.path}', offset ${offset}, whence ${whence})`,
      context: { fd: fh.fd, path: fh.path, offset, whence },
    });
    return failure ? fail(failure) : this.real.lseek(fh, offset, whence);
  }

  read(fh: FileHandle, buffer: Uint8Array, length = buffer.byteLength): FsResult<number> {
    const failure = this.intercept({
      operation: "read",
      syscall: "read",
      call: `read ${fh.fd} ('${fh.path}', ${length} bytes)`,
      context: { fd: fh.fd, path: fh.path, length },
    });
    return failure ? fail(failure) : this.real.read(fh, buffer, length);
  }

  pread(
    fh: FileHandle,
    buffer: Uint8Array,
    length: number,
    offset: number
  ): FsResult<number> {
    const failure = this.intercept({
      operation: COUPLED_OPERATIONS.pread,
      syscall: "pread",
      call: `pread ${fh.fd} ('${fh.path}', ${length} bytes, ${offset} offset)`,
      context: { fd: fh.fd, path: fh.path, length, offset },
    });
    return failure ? fail(failure) : this.real.pread(fh, buffer, length, offset);
  }

  write(fh: FileHandle, buffer: Uint8Array, length = buffer.byteLength): FsResult<number> {
    const failure = this.intercept({
      operation: "write",
      syscall: "write",
      call: `write ${fh.fd} ('${fh.path}', ${length} bytes)`,
      context: { fd: fh.fd, path: fh.path, length },
    });
    return failure ? fail(failure) : this.real.write(fh, buffer, length);
  }

  pwrite(
    fh: FileHandle,
    buffer: Uint8Array,
    length: number,
    offset: number
  ): FsResult<number> {
    const failure = this.intercept({
      operation: COUPLED_OPERATIONS.pwrite,
      syscall: "pwrite",
      call: `pwrite ${fh.fd} ('${fh.path}', ${length} bytes, ${offset} offset)`,
      context: { fd: fh.fd, path: fh.path, length, offset },
    });
    return failure ? fail(failure) : this.real.pwrite(fh, buffer, length, offset);
  }

  mkdir(path: string, mode?: number): FsResult<void> {
    const failure = this.intercept({
      operation: "mkdir",
      syscall: "mkdir",
      call: `mkdir '${path}'`,
      target: { path },
      context: { path },
    });
    return failure ? fail(failure) : this.real.mkdir(path, mode);
  }

  rmdir(path: string): FsResult<void> {
    const failure = this.intercept({
      operation: "rmdir",
      syscall: "rmdir",
      call: `rmdir '${path}'`,
      target: { path },
      context: { path },
    });
    return failure ? fail(failure) : this.real.rmdir(path);
  }

  unlink(path: string): FsResult<void> {
    const failure = this.intercept({
      operation: "unlink",
      syscall: "unlink",
      call: `unlink '${path}'`,
      target: { path },
      context: { path },
    });
    return failure ? fail(failure) : this.real.unlink(path);
  }

  rename(from: string, to: string): FsResult<void> {
    const failure = this.intercept({
      operation: "rename",
      syscall: "rename",
      call: `rename '${from}' to '${to}'`,
      target: { path: from, dest: to },
      context: { path: from, dest: to },
    });
    return failure ? fail(failure) : this.real.rename(from, to);
  }

  readlink(path: string): FsResult<string> {
    const failure = this.intercept({
      operation: "readlink",
      syscall: "readlink",
      call: `readlink '${path}'`,
      target: { path },
      context: { path },
    });
    return failure ? fail(failure) : this.real.readlink(path);
  }

  utimes(path: string, atime: TimeLike, mtime: TimeLike): FsResult<void> {
    const failure = this.intercept({
      operation: "utimes",
      syscall: "utime",
      call: `utimes '${path}'`,
      target: { path },
      context: { path },
    });
    return failure ? fail(failure) : this.real.utimes(path, atime, mtime);
  }

  opendir(path: string): FsResult<DirectoryHandle> {
    const failure = this.intercept({
      operation: "opendir",
      syscall: "opendir",
      call: `opendir '${path}'`,
      target: { path },
      context: { path },
    });
    return failure ? fail(failure) : this.real.opendir(path);
  }

  readdir(dir: DirectoryHandle): FsResult<DirEntry | null> {
    const failure = this.intercept({
      operation: "readdir",
      syscall: "readdir",
      call: `readdir '${dir.path}'`,
      target: { path: dir.path },
      context: { path: dir.path },
    });
    return failure ? fail(failure) : this.real.readdir(dir);
  }

  closedir(dir: DirectoryHandle): FsResult<void> {
    const failure = this.intercept({
      operation: "closedir",
      syscall: "closedir",
      call: `closedir '${dir.path}'`,
      target: { path: dir.path },
      context: { path: dir.path },
    });
    return failure ? fail(failure) : this.real.closedir(dir);
  }

  /**
   * Failure to return for this call, or undefined to pass it through
   */
  private intercept(call: Interception): FsFailure | undefined {
    const errorCode = this.table.lookup(call.operation);
    if (errorCode === undefined) {
      return undefined;
    }

    const failure = errnoFailure(errorCode, call.syscall, call.target);
    const error = describeErrno(errorCode);
    this.log.debug(
      {
        operation: call.syscall,
        ...call.context,
        error,
        errno: errorCode,
      },
      `fsio: ${call.call}, returning ${error} (${failure.message})`
    );
    return failure;
  }
}
