/**
 * Filesystem provider interface
 *
 * The capability set a provider mounted at a path has to implement. It
 * mirrors the synchronous POSIX surface the host calls into, with every
 * errno-style failure returned through FsResult instead of thrown.
 */

import type { FsResult } from "../types/result.js";

export interface FileHandle {
	readonly fd: number;
	readonly path: string;
	/** Offset used by sequential read/write, moved by lseek */
	position: number;
}

export interface DirectoryHandle {
	readonly path: string;
}

export interface DirEntry {
	name: string;
	type: "file" | "directory" | "symlink" | "other";
}

export interface FileStats {
	type: "file" | "directory" | "symlink" | "other";
	size: number;
	mode: number;
	uid: number;
	gid: number;
	atime: Date;
	mtime: Date;
	ctime: Date;
}

export const SEEK_SET = 0;
export const SEEK_CUR = 1;
export const SEEK_END = 2;

export type SeekWhence = typeof SEEK_SET | typeof SEEK_CUR | typeof SEEK_END;

export type TimeLike = Date | number;

/**
 * FilesystemProvider - one implementation of the host's filesystem surface
 *
 * open/stat/lstat/fstat are foundational and never faulted; all the other
 * operations may be intercepted by a faulting provider.
 */
export interface FilesystemProvider {
	/** Provider name, as registered with the mount table */
	readonly name: string;

	open(path: string, flags: string | number, mode?: number): FsResult<FileHandle>;
	stat(path: string): FsResult<FileStats>;
	lstat(path: string): FsResult<FileStats>;
	fstat(fh: FileHandle): FsResult<FileStats>;

	chmod(path: string, mode: number): FsResult<void>;
	chown(path: string, uid: number, gid: number): FsResult<void>;
	lchown(path: string, uid: number, gid: number): FsResult<void>;
	fchmod(fh: FileHandle, mode: number): FsResult<void>;
	fchown(fh: FileHandle, uid: number, gid: number): FsResult<void>;

	/**
	 * Change the session's effective root. Only a successful call updates
	 * the session state.
	 */
	chroot(path: string): FsResult<void>;

	close(fh: FileHandle): FsResult<void>;
	lseek(fh: FileHandle, offset: number, whence: SeekWhence): FsResult<number>;

	/** Returns the number of bytes read; 0 at end of file */
	read(fh: FileHandle, buffer: Uint8Array, length?: number): FsResult<number>;
	pread(
		fh: FileHandle,
		buffer: Uint8Array,
		length: number,
		offset: number
	): FsResult<number>;
	write(fh: FileHandle, buffer: Uint8Array, length?: number): FsResult<number>;
	pwrite(
		fh: FileHandle,
		buffer: Uint8Array,
		length: number,
		offset: number
	): FsResult<number>;

	mkdir(path: string, mode?: number): FsResult<void>;
	rmdir(path: string): FsResult<void>;
	unlink(path: string): FsResult<void>;
	rename(from: string, to: string): FsResult<void>;
	readlink(path: string): FsResult<string>;
	utimes(path: string, atime: TimeLike, mtime: TimeLike): FsResult<void>;

	opendir(path: string): FsResult<DirectoryHandle>;
	/** Returns the next entry, or null once the directory is exhausted */
	readdir(dir: DirectoryHandle): FsResult<DirEntry | null>;
	closedir(dir: DirectoryHandle): FsResult<void>;
}
