import fs from "node:fs/promises";
import nodePath from "node:path";
import {
	BackendUnavailableError,
	DirectoryNotEmptyError,
	FileSystemObjectAlreadyExists,
	FileSystemObjectNotFound,
	InvalidOperationForPathError,
	IsADirectoryError,
	NotADirectoryError,
	PermissionDeniedError,
} from "../errors";
import { logger } from "../logger";
import {
	getFileTypeForMode,
	getParentPath,
	isDescendantPath,
	isRootPath,
	toUnixTimestamp,
} from "../utils";
import type { Stats } from "node:fs";
import type {
	DirEntry,
	FileAttributes,
	NormalizedPath,
	StorageBackend,
} from "../types";

// eslint-disable-next-line no-bitwise
const getPermissionBits = (mode: number): number => mode & 0o7777;

const getAttributesForStats = (stats: Stats): FileAttributes => {
	const type = getFileTypeForMode(stats.mode);
	return {
		type,
		size: type === "file" ? stats.size : undefined,
		permissions: getPermissionBits(stats.mode),
		mtime: toUnixTimestamp(stats.mtime),
		atime: toUnixTimestamp(stats.atime),
		uid: stats.uid,
		gid: stats.gid,
	};
};

// Errors raised by `fs` may come from another realm, so `instanceof Error`
// cannot be relied on.
const getErrorCode = (err: unknown): string | undefined =>
	typeof err === "object" &&
	err !== null &&
	"code" in err &&
	typeof err.code === "string"
		? err.code
		: undefined;

/**
 * Serves a directory on the host's disk.  Virtual paths are resolved below
 * `rootPath`; normalized paths cannot climb out of it, and paths that pass
 * through a symbolic link are refused.
 */
export class LocalBackend implements StorageBackend {
	private readonly rootPath: string;

	private realRootPath?: Promise<string>;

	public constructor(rootPath: string) {
		this.rootPath = nodePath.resolve(rootPath);
	}

	public async listDir(path: NormalizedPath): Promise<DirEntry[]> {
		const directoryPath = await this.toHostPath(path);
		const names = await this.callFs(path, async () => fs.readdir(directoryPath));
		const entries = await Promise.all(
			names.map(async (name): Promise<DirEntry | undefined> => {
				try {
					const stats = await fs.lstat(nodePath.join(directoryPath, name));
					return { name, attributes: getAttributesForStats(stats) };
				} catch (err: unknown) {
					// Removed between the listing and the stat.
					if (getErrorCode(err) === "ENOENT") {
						return undefined;
					}
					throw this.mapFsError(path, err);
				}
			}),
		);
		return entries
			.filter((entry): entry is DirEntry => entry !== undefined)
			.sort((a, b) => a.name.localeCompare(b.name));
	}

	public async fileInfo(path: NormalizedPath): Promise<FileAttributes> {
		const hostPath = await this.toHostPath(path);
		const stats = await this.callFs(path, async () => fs.lstat(hostPath));
		return getAttributesForStats(stats);
	}

	public async makeDir(path: NormalizedPath): Promise<void> {
		const hostPath = await this.toHostPath(path);
		await this.callFs(path, async () => fs.mkdir(hostPath));
	}

	public async delDir(path: NormalizedPath): Promise<void> {
		if (isRootPath(path)) {
			throw new InvalidOperationForPathError(
				"The root directory cannot be removed.",
			);
		}
		const hostPath = await this.toHostPath(path);
		await this.callFs(path, async () => fs.rmdir(hostPath));
	}

	public async delete(path: NormalizedPath): Promise<void> {
		const attributes = await this.fileInfo(path);
		if (attributes.type === "directory") {
			throw new IsADirectoryError(`${path} is a directory, not a file.`);
		}
		const hostPath = await this.toHostPath(path);
		await this.callFs(path, async () => fs.unlink(hostPath));
	}

	public async rename(
		source: NormalizedPath,
		destination: NormalizedPath,
	): Promise<void> {
		const sourceAttributes = await this.fileInfo(source);
		if (isRootPath(source)) {
			throw new InvalidOperationForPathError(
				"The root directory cannot be moved.",
			);
		}
		if (
			sourceAttributes.type === "directory" &&
			isDescendantPath(destination, source)
		) {
			throw new InvalidOperationForPathError(
				"A directory cannot be moved into itself.",
			);
		}
		const destinationHostPath = await this.toHostPath(destination);
		if (await this.exists(destination)) {
			throw new FileSystemObjectAlreadyExists(
				`A file or directory already exists at ${destination}.`,
			);
		}
		const parentAttributes = await this.fileInfo(getParentPath(destination));
		if (parentAttributes.type !== "directory") {
			throw new NotADirectoryError(
				`${getParentPath(destination)} is a file, not a directory.`,
			);
		}
		const sourceHostPath = await this.toHostPath(source);
		await this.callFs(source, async () =>
			fs.rename(sourceHostPath, destinationHostPath),
		);
	}

	public async readFile(path: NormalizedPath): Promise<Buffer> {
		const hostPath = await this.toHostPath(path);
		return this.callFs(path, async () => fs.readFile(hostPath));
	}

	public async writeFile(
		path: NormalizedPath,
		content: Buffer,
	): Promise<void> {
		const hostPath = await this.toHostPath(path);
		await this.callFs(path, async () => fs.writeFile(hostPath, content));
	}

	private resolve(path: NormalizedPath): string {
		return nodePath.join(this.rootPath, ...path.split("/"));
	}

	private async getRealRootPath(): Promise<string> {
		if (this.realRootPath === undefined) {
			this.realRootPath = fs.realpath(this.rootPath);
		}
		return this.realRootPath;
	}

	/**
	 * Resolves a virtual path to its place on disk, refusing paths whose
	 * existing part passes through a symbolic link.
	 */
	private async toHostPath(path: NormalizedPath): Promise<string> {
		await this.assertNoSymbolicLinks(path, path);
		return this.resolve(path);
	}

	private async assertNoSymbolicLinks(
		path: NormalizedPath,
		requestedPath: NormalizedPath,
	): Promise<void> {
		const realRootPath = await this.getRealRootPath();
		let realPath: string;
		try {
			realPath = await fs.realpath(this.resolve(path));
		} catch (err: unknown) {
			if (getErrorCode(err) !== "ENOENT") {
				throw this.mapFsError(requestedPath, err);
			}
			// A dangling link still exists as a link.
			if (await this.exists(path)) {
				throw LocalBackend.createLinkError(requestedPath);
			}
			if (isRootPath(path)) {
				return;
			}
			await this.assertNoSymbolicLinks(getParentPath(path), requestedPath);
			return;
		}
		if (realPath !== nodePath.join(realRootPath, ...path.split("/"))) {
			throw LocalBackend.createLinkError(requestedPath);
		}
	}

	private static createLinkError(path: NormalizedPath): PermissionDeniedError {
		return new PermissionDeniedError(
			`${path} passes through a symbolic link, which this server does not follow.`,
		);
	}

	private async exists(path: NormalizedPath): Promise<boolean> {
		try {
			await fs.lstat(this.resolve(path));
			return true;
		} catch (err: unknown) {
			if (getErrorCode(err) === "ENOENT") {
				return false;
			}
			throw this.mapFsError(path, err);
		}
	}

	private async callFs<T>(
		path: NormalizedPath,
		operation: () => Promise<T>,
	): Promise<T> {
		try {
			return await operation();
		} catch (err: unknown) {
			throw this.mapFsError(path, err);
		}
	}

	private mapFsError(path: NormalizedPath, err: unknown): Error {
		switch (getErrorCode(err)) {
			case "ENOENT":
				return new FileSystemObjectNotFound(
					`No file or directory exists at ${path}.`,
				);
			case "EEXIST":
				return new FileSystemObjectAlreadyExists(
					`A file or directory already exists at ${path}.`,
				);
			case "ENOTDIR":
				return new NotADirectoryError(
					`A component of ${path} is not a directory.`,
				);
			case "EISDIR":
				return new IsADirectoryError(`${path} is a directory.`);
			case "ENOTEMPTY":
				return new DirectoryNotEmptyError(
					"This directory is not empty, so it cannot be removed.",
				);
			case "EACCES":
			case "EPERM":
				return new PermissionDeniedError(`Access to ${path} was denied.`);
			default:
				logger.warn("Local file system request failed", { path });
				logger.debug(err);
				return new BackendUnavailableError(
					"The local file system could not complete this request.",
				);
		}
	}
}
