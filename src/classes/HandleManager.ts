import { logger } from "../logger";
import { READDIR_PAGE_SIZE } from "../constants";
import {
	FileSystemObjectNotFound,
	InvalidHandleError,
	MissingTemporaryFileError,
	WrongHandleTypeError,
} from "../errors";
import { generateAttributesForFile } from "../utils";
import { TemporaryFileManager } from "./TemporaryFileManager";
import type {
	DirEntry,
	FileAttributes,
	NormalizedPath,
	StorageBackend,
} from "../types";

export enum HandleResourceType {
	File = "file",
	Directory = "directory",
}

export type FileAccessMode = "read" | "write";

interface GenericHandleResource {
	path: NormalizedPath;
	resourceType: HandleResourceType;
}

interface ReadableFileResource extends GenericHandleResource {
	resourceType: HandleResourceType.File;
	mode: "read";
	cursor: number;
	// Loaded from the backend by the first read.
	content?: Buffer;
}

interface WritableFileResource extends GenericHandleResource {
	resourceType: HandleResourceType.File;
	mode: "write";
	cursor: number;
	size: number;
}

interface DirectoryResource extends GenericHandleResource {
	resourceType: HandleResourceType.Directory;
	pendingEntries: DirEntry[];
	populated: boolean;
	exhausted: boolean;
}

type FileResource = ReadableFileResource | WritableFileResource;

type HandleResource = FileResource | DirectoryResource;

export interface OpenFileOptions {
	/** Seeds a write handle's spool, e.g. when a file is opened without truncation. */
	initialContent?: Buffer;
}

export interface HandleManagerOptions {
	readDirPageSize?: number;
	temporaryFileManager?: TemporaryFileManager;
}

const HANDLE_PATTERN = /^[1-9][0-9]*$/;

/**
 * Tracks the files and directory listings one SFTP connection has open.
 *
 * Handle ids start at 1, grow monotonically and are never reused while the
 * manager lives.  Operations on a single handle run one at a time in the
 * order they were issued; operations on different handles may overlap.
 *
 * Writes are spooled to a temporary file and only handed to the backend, as
 * one complete file, when the handle is closed.
 */
export class HandleManager {
	private readonly backend: StorageBackend;

	private readonly temporaryFileManager: TemporaryFileManager;

	private readonly readDirPageSize: number;

	private readonly activeHandles = new Map<number, HandleResource>();

	private readonly handleQueues = new Map<number, Promise<void>>();

	private nextHandleId = 1;

	// Set once the connection is gone; opens still in flight must not land.
	private dropped = false;

	public constructor(
		backend: StorageBackend,
		options: HandleManagerOptions = {},
	) {
		this.backend = backend;
		this.temporaryFileManager =
			options.temporaryFileManager ?? new TemporaryFileManager();
		this.readDirPageSize = options.readDirPageSize ?? READDIR_PAGE_SIZE;
	}

	public static parseHandle(handle: Buffer | string): number {
		const handleString = handle.toString();
		if (!HANDLE_PATTERN.test(handleString)) {
			throw new InvalidHandleError(
				"There is no server resource associated with this handle.",
			);
		}
		return Number.parseInt(handleString, 10);
	}

	public static formatHandle(handleId: number): Buffer {
		return Buffer.from(String(handleId));
	}

	public get openHandleCount(): number {
		return this.activeHandles.size;
	}

	public async openFile(
		path: NormalizedPath,
		mode: FileAccessMode,
		options: OpenFileOptions = {},
	): Promise<number> {
		this.assertNotDropped();
		const handleId = this.allocateHandleId();
		if (mode === "read") {
			this.activeHandles.set(handleId, {
				path,
				resourceType: HandleResourceType.File,
				mode,
				cursor: 0,
			});
			return handleId;
		}

		const { initialContent } = options;
		await this.temporaryFileManager.createTemporaryFile(handleId);
		try {
			if (initialContent !== undefined && initialContent.length > 0) {
				await this.temporaryFileManager.writeTemporaryFile(
					handleId,
					initialContent,
					0,
				);
			}
			this.assertNotDropped();
		} catch (err: unknown) {
			await this.discardTemporaryFile(handleId);
			this.assertNotDropped();
			throw err;
		}
		this.activeHandles.set(handleId, {
			path,
			resourceType: HandleResourceType.File,
			mode,
			cursor: 0,
			size: initialContent?.length ?? 0,
		});
		return handleId;
	}

	public openDir(path: NormalizedPath): number {
		this.assertNotDropped();
		const handleId = this.allocateHandleId();
		this.activeHandles.set(handleId, {
			path,
			resourceType: HandleResourceType.Directory,
			pendingEntries: [],
			populated: false,
			exhausted: false,
		});
		return handleId;
	}

	/**
	 * Resolves with `null` once `offset` (the cursor when omitted) is at or
	 * past the end of the file.
	 */
	public async read(
		handleId: number,
		length: number,
		offset?: number,
	): Promise<Buffer | null> {
		return this.enqueue(handleId, async () => {
			const resource = this.getFileResource(handleId, "read");
			if (resource.mode !== "read") {
				throw new WrongHandleTypeError(
					"This handle does not refer to a readable file.",
				);
			}
			const content =
				resource.content ?? (await this.backend.readFile(resource.path));
			resource.content = content;

			const start = offset ?? resource.cursor;
			if (start >= content.length) {
				return null;
			}
			const end = Math.min(start + length, content.length);
			resource.cursor = end;
			return content.subarray(start, end);
		});
	}

	public async write(
		handleId: number,
		data: Buffer,
		offset: number,
	): Promise<void> {
		return this.enqueue(handleId, async () => {
			const resource = this.getFileResource(handleId, "write");
			if (resource.mode !== "write") {
				throw new WrongHandleTypeError(
					"This handle does not refer to a writable file.",
				);
			}
			const written = await this.temporaryFileManager.writeTemporaryFile(
				handleId,
				data,
				offset,
			);
			resource.cursor = offset + written;
			resource.size = Math.max(resource.size, resource.cursor);
			logger.silly("Spooled write", { handleId, offset, written });
		});
	}

	/**
	 * Returns the next batch of entries, or an empty list once the listing
	 * has been fully drained.
	 */
	public async readDir(handleId: number): Promise<DirEntry[]> {
		return this.enqueue(handleId, async () => {
			const resource = this.getResource(handleId);
			if (resource.resourceType !== HandleResourceType.Directory) {
				throw new WrongHandleTypeError(
					"This handle does not refer to an open directory.",
				);
			}
			if (resource.exhausted) {
				return [];
			}
			if (!resource.populated) {
				resource.pendingEntries = await this.backend.listDir(resource.path);
				resource.populated = true;
			}
			const batch = resource.pendingEntries.splice(0, this.readDirPageSize);
			if (batch.length === 0) {
				resource.exhausted = true;
			}
			return batch;
		});
	}

	public async stat(handleId: number): Promise<FileAttributes> {
		return this.enqueue(handleId, async () => {
			const resource = this.getResource(handleId);
			if (
				resource.resourceType === HandleResourceType.File &&
				resource.mode === "write"
			) {
				const { size } = resource;
				try {
					const attributes = await this.backend.fileInfo(resource.path);
					return { ...attributes, size };
				} catch (err: unknown) {
					if (err instanceof FileSystemObjectNotFound) {
						// Nothing is stored until the handle is closed.
						return generateAttributesForFile(size);
					}
					throw err;
				}
			}
			return this.backend.fileInfo(resource.path);
		});
	}

	/**
	 * Removes the handle.  A write handle's spool is handed to the backend
	 * first; the handle is gone afterwards whether or not that succeeds.
	 */
	public async close(handleId: number): Promise<void> {
		return this.enqueue(handleId, async () => {
			const resource = this.getResource(handleId);
			this.activeHandles.delete(handleId);
			if (
				resource.resourceType !== HandleResourceType.File ||
				resource.mode !== "write"
			) {
				return;
			}
			try {
				const content =
					await this.temporaryFileManager.readTemporaryFile(handleId);
				await this.backend.writeFile(resource.path, content);
				logger.debug("Flushed file to storage", {
					handleId,
					path: resource.path,
					size: content.length,
				});
			} finally {
				await this.temporaryFileManager.deleteTemporaryFile(handleId);
			}
		});
	}

	/**
	 * Forgets every handle without flushing anything.  Used when the transport
	 * goes away: unflushed uploads are discarded, never committed.
	 */
	public async dropAll(): Promise<void> {
		this.dropped = true;
		const droppedCount = this.activeHandles.size;
		this.activeHandles.clear();
		await this.temporaryFileManager.deleteAllTemporaryFiles();
		if (droppedCount > 0) {
			logger.verbose("Dropped open handles", { droppedCount });
		}
	}

	private async discardTemporaryFile(handleId: number): Promise<void> {
		try {
			await this.temporaryFileManager.deleteTemporaryFile(handleId);
		} catch (err: unknown) {
			if (!(err instanceof MissingTemporaryFileError)) {
				throw err;
			}
			logger.debug("The spool file was already removed", { handleId });
		}
	}

	private assertNotDropped(): void {
		if (this.dropped) {
			throw new InvalidHandleError(
				"The connection has closed, so no more handles can be opened.",
			);
		}
	}

	private allocateHandleId(): number {
		const handleId = this.nextHandleId;
		this.nextHandleId += 1;
		return handleId;
	}

	private getResource(handleId: number): HandleResource {
		const resource = this.activeHandles.get(handleId);
		if (resource === undefined) {
			throw new InvalidHandleError(
				"There is no server resource associated with this handle.",
			);
		}
		return resource;
	}

	private getFileResource(
		handleId: number,
		requiredMode: FileAccessMode,
	): FileResource {
		const resource = this.getResource(handleId);
		if (resource.resourceType !== HandleResourceType.File) {
			throw new WrongHandleTypeError(
				`This handle does not refer to a ${requiredMode === "read" ? "readable" : "writable"} file.`,
			);
		}
		return resource;
	}

	private async enqueue<T>(
		handleId: number,
		operation: () => Promise<T>,
	): Promise<T> {
		const previous = this.handleQueues.get(handleId) ?? Promise.resolve();
		const result = previous.then(operation);
		// The queue only orders operations; each caller sees its own failure
		// through `result`.
		const tail = result.then(
			() => undefined,
			() => undefined,
		);
		this.handleQueues.set(handleId, tail);
		await tail;
		if (this.handleQueues.get(handleId) === tail) {
			this.handleQueues.delete(handleId);
		}
		return result;
	}
}
