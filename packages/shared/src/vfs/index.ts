/**
 * Filesystem provider exports
 */

export type {
	FilesystemProvider,
	FileHandle,
	DirectoryHandle,
	DirEntry,
	FileStats,
	SeekWhence,
	TimeLike,
} from './interface.js';
export { SEEK_SET, SEEK_CUR, SEEK_END } from './interface.js';
