import { execFileSync } from "node:child_process";
import {
  constants as fsConstants,
  existsSync,
  mkdirSync,
  readFileSync,
  statSync,
  symlinkSync,
  writeFileSync,
} from "node:fs";
import { constants } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  SEEK_CUR,
  SEEK_END,
  SEEK_SET,
  type DirEntry,
  type FileHandle,
  type FsResult,
} from "@fsfault/shared";
import { NodeFilesystemProvider } from "../vfs/node-provider.js";
import { makeTempDir } from "./helpers.js";

function unwrap<T>(result: FsResult<T>): T {
  if (!result.ok) {
    throw new Error(`unexpected failure: ${result.error.code}`);
  }
  return result.value;
}

describe("NodeFilesystemProvider", () => {
  let dir: string;
  let cleanup: () => void;
  let provider: NodeFilesystemProvider;

  beforeEach(() => {
    ({ dir, cleanup } = makeTempDir());
    provider = new NodeFilesystemProvider();
  });

  afterEach(() => {
    cleanup();
  });

  describe("file I/O", () => {
    let fh: FileHandle;

    beforeEach(() => {
      fh = unwrap(provider.open(join(dir, "data.txt"), "w+"));
      unwrap(provider.write(fh, Buffer.from("hello world")));
    });

    afterEach(() => {
      provider.close(fh);
    });

    it("advances the position on sequential writes", () => {
      expect(fh.position).toBe(11);
      expect(unwrap(provider.fstat(fh)).size).toBe(11);
    });

    it("reads from the position set by lseek", () => {
      expect(unwrap(provider.lseek(fh, 0, SEEK_SET))).toBe(0);

      const buffer = Buffer.alloc(5);
      expect(unwrap(provider.read(fh, buffer))).toBe(5);
      expect(buffer.toString()).toBe("hello");
      expect(fh.position).toBe(5);

      expect(unwrap(provider.lseek(fh, 1, SEEK_CUR))).toBe(6);
      expect(unwrap(provider.lseek(fh, -5, SEEK_END))).toBe(6);
    });

    it("rejects seeking before the start of the file", () => {
      const result = provider.lseek(fh, -1, SEEK_SET);
      expect(result).toMatchObject({
        ok: false,
        error: { code: "EINVAL", errno: constants.errno.EINVAL, syscall: "lseek" },
      });
      expect(fh.position).toBe(11);
    });

    it("reads at an offset without moving the position", () => {
      const buffer = Buffer.alloc(5);
      expect(unwrap(provider.pread(fh, buffer, 5, 6))).toBe(5);
      expect(buffer.toString()).toBe("world");
      expect(fh.position).toBe(11);
    });

    it("writes at an offset without moving the position", () => {
      expect(unwrap(provider.pwrite(fh, Buffer.from("HELLO"), 5, 0))).toBe(5);
      expect(fh.position).toBe(11);
      expect(readFileSync(join(dir, "data.txt"), "utf-8")).toBe("HELLO world");
    });

    it("reports 0 bytes at end of file", () => {
      expect(unwrap(provider.read(fh, Buffer.alloc(4)))).toBe(0);
    });
  });

  describe("append mode", () => {
    it("moves the position to end of file after each write", () => {
      const path = join(dir, "log.txt");
      writeFileSync(path, "0123456789");
      const fh = unwrap(provider.open(path, "a+"));

      expect(unwrap(provider.write(fh, Buffer.from("xy")))).toBe(2);
      expect(readFileSync(path, "utf-8")).toBe("0123456789xy");
      expect(unwrap(provider.lseek(fh, 0, SEEK_CUR))).toBe(12);

      unwrap(provider.lseek(fh, 0, SEEK_SET));
      unwrap(provider.write(fh, Buffer.from("z")));
      expect(readFileSync(path, "utf-8")).toBe("0123456789xyz");
      expect(fh.position).toBe(13);
      provider.close(fh);
    });

    it("treats O_APPEND in numeric flags as append mode", () => {
      const path = join(dir, "numeric.txt");
      writeFileSync(path, "abc");
      const fh = unwrap(
        provider.open(path, fsConstants.O_WRONLY | fsConstants.O_APPEND)
      );

      unwrap(provider.write(fh, Buffer.from("de")));
      expect(readFileSync(path, "utf-8")).toBe("abcde");
      expect(fh.position).toBe(5);
      provider.close(fh);
    });
  });

  describe.skipIf(process.platform === "win32")("pipes", () => {
    let fifo: string;

    beforeEach(() => {
      fifo = join(dir, "pipe");
      execFileSync("mkfifo", [fifo]);
    });

    it("writes and reads a FIFO without a file offset", () => {
      const fh = unwrap(provider.open(fifo, fsConstants.O_RDWR));

      expect(unwrap(provider.write(fh, Buffer.from("abc")))).toBe(3);
      expect(fh.position).toBe(0);

      const buffer = Buffer.alloc(3);
      expect(unwrap(provider.read(fh, buffer))).toBe(3);
      expect(buffer.toString()).toBe("abc");
      expect(fh.position).toBe(0);
      provider.close(fh);
    });

    it("fails lseek on a FIFO with ESPIPE", () => {
      const fh = unwrap(provider.open(fifo, fsConstants.O_RDWR));

      expect(provider.lseek(fh, 0, SEEK_CUR)).toMatchObject({
        ok: false,
        error: { code: "ESPIPE", errno: constants.errno.ESPIPE, syscall: "lseek" },
      });
      provider.close(fh);
    });
  });

  describe("without positioned I/O", () => {
    it("serves pread as a sequential read", () => {
      const limited = new NodeFilesystemProvider({ capabilities: { pread: false } });
      const path = join(dir, "seq.txt");
      writeFileSync(path, "hello world");
      const fh = unwrap(limited.open(path, "r"));

      const buffer = Buffer.alloc(5);
      expect(unwrap(limited.pread(fh, buffer, 5, 6))).toBe(5);
      expect(buffer.toString()).toBe("hello");
      expect(fh.position).toBe(5);
      limited.close(fh);
    });

    it("fails pwrite with ENOSYS and writes nothing", () => {
      const limited = new NodeFilesystemProvider({ capabilities: { pwrite: false } });
      const path = join(dir, "nopwrite.txt");
      const fh = unwrap(limited.open(path, "w"));

      const result = limited.pwrite(fh, Buffer.from("data"), 4, 0);
      expect(result).toEqual({
        ok: false,
        error: {
          errno: constants.errno.ENOSYS,
          code: "ENOSYS",
          message: "function not implemented",
          syscall: "pwrite",
        },
      });
      expect(statSync(path).size).toBe(0);
      limited.close(fh);
    });
  });

  describe("path operations", () => {
    it("creates and removes directories", () => {
      const path = join(dir, "sub");
      unwrap(provider.mkdir(path));
      expect(statSync(path).isDirectory()).toBe(true);

      unwrap(provider.rmdir(path));
      expect(existsSync(path)).toBe(false);
    });

    it("returns system errors as failures", () => {
      const path = join(dir, "twice");
      unwrap(provider.mkdir(path));

      expect(provider.mkdir(path)).toEqual({
        ok: false,
        error: {
          errno: constants.errno.EEXIST,
          code: "EEXIST",
          message: "file already exists",
          syscall: "mkdir",
          path,
        },
      });
    });

    it("renames, reads links and unlinks", () => {
      const from = join(dir, "a.txt");
      const to = join(dir, "b.txt");
      writeFileSync(from, "x");

      unwrap(provider.rename(from, to));
      expect(existsSync(to)).toBe(true);

      const link = join(dir, "link");
      symlinkSync(to, link);
      expect(unwrap(provider.readlink(link))).toBe(to);

      unwrap(provider.unlink(link));
      expect(existsSync(link)).toBe(false);
    });

    it("reports both paths on a failed rename", () => {
      const from = join(dir, "missing");
      const to = join(dir, "dest");
      const result = provider.rename(from, to);
      expect(result).toMatchObject({
        ok: false,
        error: { code: "ENOENT", syscall: "rename", path: from, dest: to },
      });
    });

    it("changes mode, ownership and times", () => {
      const path = join(dir, "meta.txt");
      writeFileSync(path, "x");
      const before = statSync(path);

      unwrap(provider.chmod(path, 0o600));
      expect(statSync(path).mode & 0o777).toBe(0o600);

      unwrap(provider.chown(path, before.uid, before.gid));
      unwrap(provider.lchown(path, before.uid, before.gid));

      unwrap(provider.utimes(path, 1000, 2000));
      expect(statSync(path).mtimeMs).toBe(2_000_000);
    });

    it("changes mode and ownership through a handle", () => {
      const path = join(dir, "fmeta.txt");
      const fh = unwrap(provider.open(path, "w"));
      const before = statSync(path);

      unwrap(provider.fchmod(fh, 0o640));
      unwrap(provider.fchown(fh, before.uid, before.gid));
      expect(statSync(path).mode & 0o777).toBe(0o640);
      provider.close(fh);
    });

    it("fails closing a handle twice with EBADF", () => {
      const fh = unwrap(provider.open(join(dir, "c.txt"), "w"));
      unwrap(provider.close(fh));
      expect(provider.close(fh)).toMatchObject({
        ok: false,
        error: { code: "EBADF", syscall: "close" },
      });
    });
  });

  describe("directories", () => {
    it("lists entries until the end marker", () => {
      writeFileSync(join(dir, "one.txt"), "1");
      mkdirSync(join(dir, "two"));

      const handle = unwrap(provider.opendir(dir));
      const entries: DirEntry[] = [];
      for (;;) {
        const entry = unwrap(provider.readdir(handle));
        if (entry === null) break;
        entries.push(entry);
      }
      unwrap(provider.closedir(handle));

      expect(entries.sort((a, b) => a.name.localeCompare(b.name))).toEqual([
        { name: "one.txt", type: "file" },
        { name: "two", type: "directory" },
      ]);
    });

    it("rejects a closed directory handle", () => {
      const handle = unwrap(provider.opendir(dir));
      unwrap(provider.closedir(handle));

      expect(provider.readdir(handle)).toMatchObject({
        ok: false,
        error: { code: "EBADF", syscall: "readdir" },
      });
      expect(provider.closedir(handle)).toMatchObject({
        ok: false,
        error: { code: "EBADF", syscall: "closedir" },
      });
    });

    it("rejects handles it did not open", () => {
      expect(provider.readdir({ path: dir })).toMatchObject({
        ok: false,
        error: { code: "EBADF" },
      });
    });
  });

  describe("chroot", () => {
    it("records the new root on success", () => {
      unwrap(provider.chroot(dir));
      expect(provider.state.root).toBe(dir);
    });

    it("resolves a relative target against the current root", () => {
      mkdirSync(join(dir, "pub"));
      unwrap(provider.chroot(dir));

      unwrap(provider.chroot("pub"));
      expect(provider.state.root).toBe(join(dir, "pub"));
    });

    it("checks a relative target under the current root", () => {
      unwrap(provider.chroot(dir));

      expect(provider.chroot("missing")).toMatchObject({
        ok: false,
        error: { code: "ENOENT", syscall: "chroot", path: join(dir, "missing") },
      });
      expect(provider.state.root).toBe(dir);
    });

    it("leaves the root alone when the target is not a directory", () => {
      const file = join(dir, "plain.txt");
      writeFileSync(file, "x");

      expect(provider.chroot(file)).toMatchObject({
        ok: false,
        error: { code: "ENOTDIR", syscall: "chroot", path: file },
      });
      expect(provider.state.root).toBe("/");
    });

    it("leaves the root alone when the target is missing", () => {
      const missing = join(dir, "nope");
      expect(provider.chroot(missing)).toMatchObject({
        ok: false,
        error: { code: "ENOENT", syscall: "chroot", path: missing },
      });
      expect(provider.state.root).toBe("/");
    });
  });
});
