import type { DirEntry, FileAttributes } from "./FileAttributes";
import type { NormalizedPath } from "./NormalizedPath";

/**
 * The storage contract every backend satisfies.
 *
 * Failures are reported by rejecting with the error classes in `src/errors`:
 * `FileSystemObjectNotFound`, `FileSystemObjectAlreadyExists`,
 * `NotADirectoryError`, `IsADirectoryError`, `DirectoryNotEmptyError`,
 * `PermissionDeniedError`, `InvalidOperationForPathError` and
 * `BackendUnavailableError`.  Anything else is treated as an unexpected fault.
 *
 * Implementations must tolerate concurrent calls.  Calls against the same
 * path need only be linearizable.
 */
export interface StorageBackend {
	/** Rejects with not found, or not a directory when `path` is a file. */
	listDir: (path: NormalizedPath) => Promise<DirEntry[]>;

	fileInfo: (path: NormalizedPath) => Promise<FileAttributes>;

	/** Parents are never created implicitly. */
	makeDir: (path: NormalizedPath) => Promise<void>;

	delDir: (path: NormalizedPath) => Promise<void>;

	delete: (path: NormalizedPath) => Promise<void>;

	/**
	 * Moves a file or directory.  There is no moment where neither `source`
	 * nor `destination` exists.  An occupied destination is rejected with
	 * `FileSystemObjectAlreadyExists` by every bundled backend.
	 */
	rename: (source: NormalizedPath, destination: NormalizedPath) => Promise<void>;

	readFile: (path: NormalizedPath) => Promise<Buffer>;

	/** Replaces or creates the whole file. */
	writeFile: (path: NormalizedPath, content: Buffer) => Promise<void>;
}
