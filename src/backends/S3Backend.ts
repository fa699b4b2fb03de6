import {
	CopyObjectCommand,
	DeleteObjectCommand,
	GetObjectCommand,
	HeadObjectCommand,
	ListObjectsV2Command,
	PutObjectCommand,
	S3ServiceException,
} from "@aws-sdk/client-s3";
import { logger } from "../logger";
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
import {
	generateAttributesForDirectory,
	generateAttributesForFile,
	getParentPath,
	isDescendantPath,
	isRootPath,
} from "../utils";
import type { S3Client } from "@aws-sdk/client-s3";
import type {
	DirEntry,
	FileAttributes,
	NormalizedPath,
	StorageBackend,
} from "../types";

const KEY_DELIMITER = "/";

// Directories are persisted as an empty object under this name.
export const DIRECTORY_MARKER_NAME = ".keep";

const NOT_FOUND_ERROR_NAMES = new Set(["NoSuchKey", "NotFound"]);

const PERMISSION_ERROR_NAMES = new Set(["AccessDenied", "Forbidden"]);

export interface S3BackendOptions {
	bucket: string;
	/** Keys are stored under this prefix, e.g. `exports/`. */
	prefix?: string;
}

const normalizePrefix = (prefix: string): string => {
	const trimmed = prefix.replace(/^\/+|\/+$/g, "");
	return trimmed === "" ? "" : `${trimmed}${KEY_DELIMITER}`;
};

const encodeCopySource = (bucket: string, key: string): string =>
	`${bucket}/${key.split(KEY_DELIMITER).map(encodeURIComponent).join(KEY_DELIMITER)}`;

/**
 * Stores files as objects in an S3 bucket.  A virtual path `/a/b.txt` maps to
 * the key `<prefix>a/b.txt`; a directory `/a` exists when `<prefix>a/.keep`
 * or any other key below `<prefix>a/` does.
 *
 * S3 has no atomic rename, so objects are copied before their originals are
 * deleted.  A failure part way through can leave both copies in place.
 */
export class S3Backend implements StorageBackend {
	private readonly client: S3Client;

	private readonly bucket: string;

	private readonly prefix: string;

	public constructor(client: S3Client, options: S3BackendOptions) {
		this.client = client;
		this.bucket = options.bucket;
		this.prefix = normalizePrefix(options.prefix ?? "");
	}

	public async listDir(path: NormalizedPath): Promise<DirEntry[]> {
		const attributes = await this.fileInfo(path);
		if (attributes.type !== "directory") {
			throw new NotADirectoryError(`${path} is a file, not a directory.`);
		}
		const directoryPrefix = this.getDirectoryPrefix(path);
		const entries = new Map<string, DirEntry>();
		let continuationToken: string | undefined;
		do {
			// eslint-disable-next-line no-await-in-loop
			const result = await this.callS3(path, async () =>
				this.client.send(
					new ListObjectsV2Command({
						Bucket: this.bucket,
						Prefix: directoryPrefix,
						Delimiter: KEY_DELIMITER,
						ContinuationToken: continuationToken,
					}),
				),
			);
			(result.CommonPrefixes ?? []).forEach(({ Prefix: commonPrefix }) => {
				if (commonPrefix === undefined) {
					return;
				}
				const name = commonPrefix.slice(directoryPrefix.length, -1);
				if (name !== "" && !entries.has(name)) {
					entries.set(name, {
						name,
						attributes: generateAttributesForDirectory(),
					});
				}
			});
			(result.Contents ?? []).forEach((object) => {
				if (object.Key === undefined) {
					return;
				}
				const name = object.Key.slice(directoryPrefix.length);
				if (name === "" || name === DIRECTORY_MARKER_NAME) {
					return;
				}
				entries.set(name, {
					name,
					attributes: generateAttributesForFile(
						object.Size ?? 0,
						object.LastModified,
					),
				});
			});
			continuationToken =
				result.IsTruncated === true ? result.NextContinuationToken : undefined;
		} while (continuationToken !== undefined);

		return Array.from(entries.values()).sort((a, b) =>
			a.name.localeCompare(b.name),
		);
	}

	public async fileInfo(path: NormalizedPath): Promise<FileAttributes> {
		const attributes = await this.getAttributesIfExists(path);
		if (attributes === undefined) {
			throw new FileSystemObjectNotFound(
				`No file or directory exists at ${path}.`,
			);
		}
		return attributes;
	}

	public async makeDir(path: NormalizedPath): Promise<void> {
		if ((await this.getAttributesIfExists(path)) !== undefined) {
			throw new FileSystemObjectAlreadyExists(
				`A file or directory already exists at ${path}.`,
			);
		}
		await this.assertParentIsDirectory(path);
		await this.callS3(path, async () =>
			this.client.send(
				new PutObjectCommand({
					Bucket: this.bucket,
					Key: this.getDirectoryMarkerKey(path),
					Body: "",
				}),
			),
		);
	}

	public async delDir(path: NormalizedPath): Promise<void> {
		const attributes = await this.fileInfo(path);
		if (attributes.type !== "directory") {
			throw new NotADirectoryError(`${path} is a file, not a directory.`);
		}
		if (isRootPath(path)) {
			throw new InvalidOperationForPathError(
				"The root directory cannot be removed.",
			);
		}
		const markerKey = this.getDirectoryMarkerKey(path);
		const keys = await this.listKeys(path, 2);
		if (keys.some((key) => key !== markerKey)) {
			throw new DirectoryNotEmptyError(
				"This directory is not empty, so it cannot be removed.",
			);
		}
		await this.deleteKey(path, markerKey);
	}

	public async delete(path: NormalizedPath): Promise<void> {
		const attributes = await this.fileInfo(path);
		if (attributes.type === "directory") {
			throw new IsADirectoryError(`${path} is a directory, not a file.`);
		}
		await this.deleteKey(path, this.getFileKey(path));
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
		if ((await this.getAttributesIfExists(destination)) !== undefined) {
			throw new FileSystemObjectAlreadyExists(
				`A file or directory already exists at ${destination}.`,
			);
		}
		await this.assertParentIsDirectory(destination);

		if (sourceAttributes.type !== "directory") {
			await this.moveKey(
				source,
				this.getFileKey(source),
				this.getFileKey(destination),
			);
			return;
		}
		if (isDescendantPath(destination, source)) {
			throw new InvalidOperationForPathError(
				"A directory cannot be moved into itself.",
			);
		}
		const sourcePrefix = this.getDirectoryPrefix(source);
		const destinationPrefix = this.getDirectoryPrefix(destination);
		const keys = await this.listKeys(source);
		logger.debug("Moving S3 directory", {
			source,
			destination,
			objectCount: keys.length,
		});
		await Promise.all(
			keys.map(async (key) =>
				this.moveKey(
					source,
					key,
					`${destinationPrefix}${key.slice(sourcePrefix.length)}`,
				),
			),
		);
	}

	public async readFile(path: NormalizedPath): Promise<Buffer> {
		try {
			const result = await this.client.send(
				new GetObjectCommand({
					Bucket: this.bucket,
					Key: this.getFileKey(path),
				}),
			);
			if (result.Body === undefined) {
				return Buffer.alloc(0);
			}
			return Buffer.from(await result.Body.transformToByteArray());
		} catch (err: unknown) {
			const mappedError = this.mapS3Error(path, err);
			if (
				mappedError instanceof FileSystemObjectNotFound &&
				(await this.directoryExists(path))
			) {
				throw new IsADirectoryError(`${path} is a directory, not a file.`);
			}
			throw mappedError;
		}
	}

	public async writeFile(
		path: NormalizedPath,
		content: Buffer,
	): Promise<void> {
		if (isRootPath(path) || (await this.directoryExists(path))) {
			throw new IsADirectoryError(
				"This path is a directory, so it cannot be written as a file.",
			);
		}
		await this.assertParentIsDirectory(path);
		await this.callS3(path, async () =>
			this.client.send(
				new PutObjectCommand({
					Bucket: this.bucket,
					Key: this.getFileKey(path),
					Body: content,
					ContentLength: content.length,
				}),
			),
		);
	}

	private getFileKey(path: NormalizedPath): string {
		return `${this.prefix}${path.slice(1)}`;
	}

	private getDirectoryPrefix(path: NormalizedPath): string {
		return isRootPath(path)
			? this.prefix
			: `${this.getFileKey(path)}${KEY_DELIMITER}`;
	}

	private getDirectoryMarkerKey(path: NormalizedPath): string {
		return `${this.getDirectoryPrefix(path)}${DIRECTORY_MARKER_NAME}`;
	}

	private async getAttributesIfExists(
		path: NormalizedPath,
	): Promise<FileAttributes | undefined> {
		if (isRootPath(path)) {
			return generateAttributesForDirectory();
		}
		try {
			const result = await this.client.send(
				new HeadObjectCommand({
					Bucket: this.bucket,
					Key: this.getFileKey(path),
				}),
			);
			return generateAttributesForFile(
				result.ContentLength ?? 0,
				result.LastModified,
			);
		} catch (err: unknown) {
			const mappedError = this.mapS3Error(path, err);
			if (!(mappedError instanceof FileSystemObjectNotFound)) {
				throw mappedError;
			}
		}
		return (await this.directoryExists(path))
			? generateAttributesForDirectory()
			: undefined;
	}

	private async directoryExists(path: NormalizedPath): Promise<boolean> {
		if (isRootPath(path)) {
			return true;
		}
		const keys = await this.listKeys(path, 1);
		return keys.length > 0;
	}

	private async assertParentIsDirectory(path: NormalizedPath): Promise<void> {
		const parentPath = getParentPath(path);
		const parentAttributes = await this.getAttributesIfExists(parentPath);
		if (parentAttributes === undefined) {
			throw new FileSystemObjectNotFound(
				`The parent directory ${parentPath} does not exist.`,
			);
		}
		if (parentAttributes.type !== "directory") {
			throw new NotADirectoryError(
				`${parentPath} is a file, not a directory.`,
			);
		}
	}

	/**
	 * Every key below the directory at `path`, up to `limit` when given.
	 */
	private async listKeys(
		path: NormalizedPath,
		limit?: number,
	): Promise<string[]> {
		const keys: string[] = [];
		let continuationToken: string | undefined;
		do {
			// eslint-disable-next-line no-await-in-loop
			const result = await this.callS3(path, async () =>
				this.client.send(
					new ListObjectsV2Command({
						Bucket: this.bucket,
						Prefix: this.getDirectoryPrefix(path),
						MaxKeys: limit,
						ContinuationToken: continuationToken,
					}),
				),
			);
			(result.Contents ?? []).forEach(({ Key: key }) => {
				if (key !== undefined) {
					keys.push(key);
				}
			});
			continuationToken =
				result.IsTruncated === true ? result.NextContinuationToken : undefined;
		} while (
			continuationToken !== undefined &&
			(limit === undefined || keys.length < limit)
		);
		return limit === undefined ? keys : keys.slice(0, limit);
	}

	private async moveKey(
		path: NormalizedPath,
		sourceKey: string,
		destinationKey: string,
	): Promise<void> {
		await this.callS3(path, async () =>
			this.client.send(
				new CopyObjectCommand({
					Bucket: this.bucket,
					CopySource: encodeCopySource(this.bucket, sourceKey),
					Key: destinationKey,
				}),
			),
		);
		await this.deleteKey(path, sourceKey);
	}

	private async deleteKey(path: NormalizedPath, key: string): Promise<void> {
		await this.callS3(path, async () =>
			this.client.send(
				new DeleteObjectCommand({
					Bucket: this.bucket,
					Key: key,
				}),
			),
		);
	}

	private async callS3<T>(
		path: NormalizedPath,
		operation: () => Promise<T>,
	): Promise<T> {
		try {
			return await operation();
		} catch (err: unknown) {
			throw this.mapS3Error(path, err);
		}
	}

	private mapS3Error(path: NormalizedPath, err: unknown): Error {
		if (err instanceof S3ServiceException) {
			if (NOT_FOUND_ERROR_NAMES.has(err.name)) {
				return new FileSystemObjectNotFound(
					`No file or directory exists at ${path}.`,
				);
			}
			if (PERMISSION_ERROR_NAMES.has(err.name)) {
				return new PermissionDeniedError(
					`Access to ${path} was denied by the storage service.`,
				);
			}
		}
		logger.warn("S3 request failed", { bucket: this.bucket, path });
		logger.debug(err);
		return new BackendUnavailableError(
			"The storage service could not complete this request.",
		);
	}
}
