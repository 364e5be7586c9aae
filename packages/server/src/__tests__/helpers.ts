import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { pino, type Logger } from "pino";
import {
  ok,
  type DirEntry,
  type DirectoryHandle,
  type FileHandle,
  type FileStats,
  type FilesystemProvider,
  type FsResult,
  type SeekWhence,
  type TimeLike,
} from "@fsfault/shared";

export interface LogRecord {
  level: number;
  msg: string;
  [key: string]: unknown;
}

export const LEVELS = { trace: 10, debug: 20, info: 30 } as const;

/**
 * Logger whose records are collected as parsed JSON
 */
export function createCapturingLogger(level = "trace"): {
  logger: Logger;
  records: LogRecord[];
} {
  const records: LogRecord[] = [];
  const logger = pino(
    { level },
    {
      write(line: string) {
        records.push(JSON.parse(line));
      },
    }
  );
  return { logger, records };
}

export function silentLogger(): Logger {
  return pino({ level: "silent" });
}

export function makeTempDir(): { dir: string; cleanup: () => void } {
  const dir = mkdtempSync(join(tmpdir(), "fsfault-"));
  return {
    dir,
    cleanup: () => rmSync(dir, { recursive: true, force: true }),
  };
}

export const FAKE_STATS: FileStats = {
  type: "file",
  size: 42,
  mode: 0o100644,
  uid: 1000,
  gid: 1000,
  atime: new Date(0),
  mtime: new Date(0),
  ctime: new Date(0),
};

/**
 * Provider that records every call and answers with fixed values
 */
export class RecordingProvider implements FilesystemProvider {
  readonly name = "recording";
  readonly calls: string[] = [];

  open(path: string): FsResult<FileHandle> {
    this.calls.push("open");
    return ok({ fd: 7, path, position: 0 });
  }
  stat(): FsResult<FileStats> {
    this.calls.push("stat");
    return ok(FAKE_STATS);
  }
  lstat(): FsResult<FileStats> {
    this.calls.push("lstat");
    return ok(FAKE_STATS);
  }
  fstat(): FsResult<FileStats> {
    this.calls.push("fstat");
    return ok(FAKE_STATS);
  }
  chmod(): FsResult<void> {
    this.calls.push("chmod");
    return ok(undefined);
  }
  chown(): FsResult<void> {
    this.calls.push("chown");
    return ok(undefined);
  }
  lchown(): FsResult<void> {
    this.calls.push("lchown");
    return ok(undefined);
  }
  fchmod(): FsResult<void> {
    this.calls.push("fchmod");
    return ok(undefined);
  }
  fchown(): FsResult<void> {
    this.calls.push("fchown");
    return ok(undefined);
  }
  chroot(): FsResult<void> {
    this.calls.push("chroot");
    return ok(undefined);
  }
  close(): FsResult<void> {
    this.calls.push("close");
    return ok(undefined);
  }
  lseek(_fh: FileHandle, offset: number, _whence: SeekWhence): FsResult<number> {
    this.calls.push("lseek");
    return ok(offset);
  }
  read(_fh: FileHandle, _buffer: Uint8Array, length = 0): FsResult<number> {
    this.calls.push("read");
    return ok(length);
  }
  pread(_fh: FileHandle, _buffer: Uint8Array, length: number): FsResult<number> {
    this.calls.push("pread");
    return ok(length);
  }
  write(_fh: FileHandle, _buffer: Uint8Array, length = 0): FsResult<number> {
    this.calls.push("write");
    return ok(length);
  }
  pwrite(_fh: FileHandle, _buffer: Uint8Array, length: number): FsResult<number> {
    this.calls.push("pwrite");
    return ok(length);
  }
  mkdir(): FsResult<void> {
    this.calls.push("mkdir");
    return ok(undefined);
  }
  rmdir(): FsResult<void> {
    this.calls.push("rmdir");
    return ok(undefined);
  }
  unlink(): FsResult<void> {
    this.calls.push("unlink");
    return ok(undefined);
  }
  rename(): FsResult<void> {
    this.calls.push("rename");
    return ok(undefined);
  }
  readlink(path: string): FsResult<string> {
    this.calls.push("readlink");
    return ok(`${path}.target`);
  }
  utimes(_path: string, _atime: TimeLike, _mtime: TimeLike): FsResult<void> {
    this.calls.push("utimes");
    return ok(undefined);
  }
  opendir(path: string): FsResult<DirectoryHandle> {
    this.calls.push("opendir");
    return ok({ path });
  }
  readdir(): FsResult<DirEntry | null> {
    this.calls.push("readdir");
    return ok({ name: "entry.txt", type: "file" });
  }
  closedir(): FsResult<void> {
    this.calls.push("closedir");
    return ok(undefined);
  }
}
