/**
 * Node.js filesystem provider
 *
 * The pass-through implementation: every operation goes straight to the
 * synchronous node:fs primitive, and system errors come back as FsResult
 * failures instead of exceptions.
 */

import {
  constants as fsConstants,
  chmodSync,
  chownSync,
  closeSync,
  fchmodSync,
  fchownSync,
  fstatSync,
  lchownSync,
  lstatSync,
  mkdirSync,
  openSync,
  opendirSync,
  readSync,
  readlinkSync,
  renameSync,
  rmdirSync,
  statSync,
  unlinkSync,
  utimesSync,
  writeSync,
  type Dir,
  type Dirent,
  type Stats,
} from "node:fs";
import { constants } from "node:os";
import { resolve } from "node:path";
import {
  fail,
  ok,
  REAL_PROVIDER_NAME,
  SEEK_CUR,
  SEEK_END,
  SEEK_SET,
  type DirEntry,
  type DirectoryHandle,
  type FileHandle,
  type FileStats,
  type FilesystemProvider,
  type FsResult,
  type SeekWhence,
  type TimeLike,
} from "@fsfault/shared";
import {
  errnoFailure,
  fromNodeError,
  type FailureTarget,
} from "../errors/failure.js";

/**
 * Ambient per-session state kept by the provider
 */
export interface SessionState {
  /** Effective root directory, changed by a successful chroot */
  root: string;
}

/**
 * Positioned I/O support of the platform
 */
export interface PlatformCapabilities {
  pread: boolean;
  pwrite: boolean;
}

export interface NodeProviderOptions {
  name?: string;
  state?: SessionState;
  capabilities?: Partial<PlatformCapabilities>;
}

/**
 * Handle returned by open. Pipes, sockets and character devices have no
 * file offset, so I/O on them goes through read(2)/write(2) without one.
 */
class NodeFileHandle implements FileHandle {
  position = 0;

  constructor(
    readonly fd: number,
    readonly path: string,
    readonly seekable: boolean,
    readonly append: boolean
  ) {}
}

function isAppendMode(flags: string | number): boolean {
  return typeof flags === "string"
    ? flags.includes("a")
    : (flags & fsConstants.O_APPEND) !== 0;
}

class NodeDirectoryHandle implements DirectoryHandle {
  closed = false;

  constructor(
    readonly path: string,
    readonly dir: Dir
  ) {}
}

function isSeekable(fh: FileHandle): boolean {
  return !(fh instanceof NodeFileHandle) || fh.seekable;
}

function toEntryType(entry: Dirent | Stats): DirEntry["type"] {
  if (entry.isFile()) return "file";
  if (entry.isDirectory()) return "directory";
  if (entry.isSymbolicLink()) return "symlink";
  return "other";
}

function toFileStats(stats: Stats): FileStats {
  return {
    type: toEntryType(stats),
    size: stats.size,
    mode: stats.mode,
    uid: stats.uid,
    gid: stats.gid,
    atime: stats.atime,
    mtime: stats.mtime,
    ctime: stats.ctime,
  };
}

export class NodeFilesystemProvider implements FilesystemProvider {
  readonly name: string;
  readonly state: SessionState;
  private readonly capabilities: PlatformCapabilities;

  constructor(options: NodeProviderOptions = {}) {
    this.name = options.name ?? REAL_PROVIDER_NAME;
    this.state = options.state ?? { root: "/" };
    this.capabilities = {
      pread: options.capabilities?.pread ?? true,
      pwrite: options.capabilities?.pwrite ?? true,
    };
  }

  open(path: string, flags: string | number, mode?: number): FsResult<FileHandle> {
    return this.attempt("open", { path }, () => {
      const fd = openSync(path, flags, mode);
      let stats: Stats;
      try {
        stats = fstatSync(fd);
      } catch (err) {
        closeSync(fd);
        throw err;
      }
      const seekable = !(stats.isFIFO() || stats.isSocket() || stats.isCharacterDevice());
      return new NodeFileHandle(fd, path, seekable, isAppendMode(flags));
    });
  }

  stat(path: string): FsResult<FileStats> {
    return this.attempt("stat", { path }, () => toFileStats(statSync(path)));
  }

  lstat(path: string): FsResult<FileStats> {
    return this.attempt("lstat", { path }, () => toFileStats(lstatSync(path)));
  }

  fstat(fh: FileHandle): FsResult<FileStats> {
    return this.attempt("fstat", {}, () => toFileStats(fstatSync(fh.fd)));
  }

  chmod(path: string, mode: number): FsResult<void> {
    return this.attempt("chmod", { path }, () => chmodSync(path, mode));
  }

  chown(path: string, uid: number, gid: number): FsResult<void> {
    return this.attempt("chown", { path }, () => chownSync(path, uid, gid));
  }

  lchown(path: string, uid: number, gid: number): FsResult<void> {
    return this.attempt("lchown", { path }, () => lchownSync(path, uid, gid));
  }

  fchmod(fh: FileHandle, mode: number): FsResult<void> {
    return this.attempt("fchmod", {}, () => fchmodSync(fh.fd, mode));
  }

  fchown(fh: FileHandle, uid: number, gid: number): FsResult<void> {
    return this.attempt("fchown", {}, () => fchownSync(fh.fd, uid, gid));
  }

  /**
   * Node has no chroot(2); the session root is tracked here instead, after
   * checking the target is an existing directory.
   */
  chroot(path: string): FsResult<void> {
    const target = resolve(this.state.root, path);
    const stats = this.stat(target);
    if (!stats.ok) {
      return fail({ ...stats.error, syscall: "chroot" });
    }
    if (stats.value.type !== "directory") {
      return fail(errnoFailure(constants.errno.ENOTDIR, "chroot", { path }));
    }

    this.state.root = target;
    return ok(undefined);
  }

  close(fh: FileHandle): FsResult<void> {
    return this.attempt("close", {}, () => closeSync(fh.fd));
  }

  lseek(fh: FileHandle, offset: number, whence: SeekWhence): FsResult<number> {
    if (!isSeekable(fh)) {
      return fail(errnoFailure(constants.errno.ESPIPE, "lseek"));
    }

    let base: number;
    switch (whence) {
      case SEEK_SET:
        base = 0;
        break;
      case SEEK_CUR:
        base = fh.position;
        break;
      case SEEK_END: {
        const stats = this.fstat(fh);
        if (!stats.ok) {
          return fail({ ...stats.error, syscall: "lseek" });
        }
        base = stats.value.size;
        break;
      }
      default:
        return fail(errnoFailure(constants.errno.EINVAL, "lseek"));
    }

    const next = base + offset;
    if (!Number.isSafeInteger(next) || next < 0) {
      return fail(errnoFailure(constants.errno.EINVAL, "lseek"));
    }

    fh.position = next;
    return ok(next);
  }

  read(fh: FileHandle, buffer: Uint8Array, length = buffer.byteLength): FsResult<number> {
    if (!isSeekable(fh)) {
      return this.attempt("read", {}, () => readSync(fh.fd, buffer, 0, length, null));
    }

    const result = this.attempt("read", {}, () =>
      readSync(fh.fd, buffer, 0, length, fh.position)
    );
    if (result.ok) {
      fh.position += result.value;
    }
    return result;
  }

  pread(
    fh: FileHandle,
    buffer: Uint8Array,
    length: number,
    offset: number
  ): FsResult<number> {
    // Without pread(2) a positioned read is served as a plain read
    if (!this.capabilities.pread) {
      return this.read(fh, buffer, length);
    }
    return this.attempt("pread", {}, () =>
      readSync(fh.fd, buffer, 0, length, offset)
    );
  }

  write(fh: FileHandle, buffer: Uint8Array, length = buffer.byteLength): FsResult<number> {
    if (!isSeekable(fh)) {
      return this.attempt("write", {}, () => writeSync(fh.fd, buffer, 0, length, null));
    }

    if (fh instanceof NodeFileHandle && fh.append) {
      // O_APPEND writes land at end of file; the offset follows them there
      return this.attempt("write", {}, () => {
        const written = writeSync(fh.fd, buffer, 0, length, null);
        fh.position = fstatSync(fh.fd).size;
        return written;
      });
    }

    const result = this.attempt("write", {}, () =>
      writeSync(fh.fd, buffer, 0, length, fh.position)
    );
    if (result.ok) {
      fh.position += result.value;
    }
    return result;
  }

  pwrite(
    fh: FileHandle,
    buffer: Uint8Array,
    length: number,
    offset: number
  ): FsResult<number> {
    if (!this.capabilities.pwrite) {
      return fail(errnoFailure(constants.errno.ENOSYS, "pwrite"));
    }
    return this.attempt("pwrite", {}, () =>
      writeSync(fh.fd, buffer, 0, length, offset)
    );
  }

  mkdir(path: string, mode = 0o777): FsResult<void> {
    return this.attempt("mkdir", { path }, () => {
      mkdirSync(path, { mode });
    });
  }

  rmdir(path: string): FsResult<void> {
    return this.attempt("rmdir", { path }, () => rmdirSync(path));
  }

  unlink(path: string): FsResult<void> {
    return this.attempt("unlink", { path }, () => unlinkSync(path));
  }

  rename(from: string, to: string): FsResult<void> {
    return this.attempt("rename", { path: from, dest: to }, () =>
      renameSync(from, to)
    );
  }

  readlink(path: string): FsResult<string> {
    return this.attempt("readlink", { path }, () => readlinkSync(path, "utf8"));
  }

  utimes(path: string, atime: TimeLike, mtime: TimeLike): FsResult<void> {
    return this.attempt("utime", { path }, () => utimesSync(path, atime, mtime));
  }

  opendir(path: string): FsResult<DirectoryHandle> {
    return this.attempt(
      "opendir",
      { path },
      () => new NodeDirectoryHandle(path, opendirSync(path))
    );
  }

  readdir(dir: DirectoryHandle): FsResult<DirEntry | null> {
    if (!(dir instanceof NodeDirectoryHandle) || dir.closed) {
      return fail(errnoFailure(constants.errno.EBADF, "readdir"));
    }

    return this.attempt("readdir", { path: dir.path }, () => {
      const entry = dir.dir.readSync();
      return entry === null ? null : { name: entry.name, type: toEntryType(entry) };
    });
  }

  closedir(dir: DirectoryHandle): FsResult<void> {
    if (!(dir instanceof NodeDirectoryHandle) || dir.closed) {
      return fail(errnoFailure(constants.errno.EBADF, "closedir"));
    }

    return this.attempt("closedir", { path: dir.path }, () => {
      dir.dir.closeSync();
      dir.closed = true;
    });
  }

  private attempt<T>(
    syscall: string,
    target: FailureTarget,
    fn: () => T
  ): FsResult<T> {
    try {
      return ok(fn());
    } catch (err) {
      return fail(fromNodeError(err, syscall, target));
    }
  }
}
