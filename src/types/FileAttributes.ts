export type FileType = "file" | "directory" | "other";

/**
 * Attributes of a file system object.  Anything a backend cannot report is
 * left undefined rather than zeroed.
 */
export interface FileAttributes {
	type: FileType;
	size?: number;
	/** Permission bits only (e.g. 0o644); the type bits are derived from `type`. */
	permissions?: number;
	/** Seconds since the epoch. */
	mtime?: number;
	/** Seconds since the epoch. */
	atime?: number;
	uid?: number;
	gid?: number;
}

export interface DirEntry {
	/** A single path segment. */
	name: string;
	attributes: FileAttributes;
}
