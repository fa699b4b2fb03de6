import fs from "node:fs";
import tmp from "tmp";
import { logger } from "../logger";
import { MissingTemporaryFileError } from "../errors";
import type { FileResult } from "tmp";

export interface TemporaryFile extends FileResult {
	handleId: number;
}

/**
 * Spools uploads to local disk until their handle is closed, so the storage
 * backend only ever receives complete files.
 */
export class TemporaryFileManager {
	private readonly openTemporaryFiles = new Map<number, TemporaryFile>();

	private static async verifyPathExistsOnDisk(
		localPath: string,
	): Promise<boolean> {
		return new Promise((resolve) => {
			fs.access(localPath, (err) => {
				resolve(err === null);
			});
		});
	}

	public async getTemporaryFile(handleId: number): Promise<TemporaryFile> {
		const temporaryFile = this.openTemporaryFiles.get(handleId);
		if (temporaryFile === undefined) {
			throw new MissingTemporaryFileError(
				"Attempted to access a temporary file that does not exist in memory.",
			);
		}
		if (
			!(await TemporaryFileManager.verifyPathExistsOnDisk(temporaryFile.name))
		) {
			throw new MissingTemporaryFileError(
				"Attempted to access a temporary file that does not exist on disk.",
			);
		}
		return temporaryFile;
	}

	public async createTemporaryFile(handleId: number): Promise<TemporaryFile> {
		return new Promise<TemporaryFile>((resolve, reject) => {
			tmp.file((err, name, fd, removeCallback) => {
				if (err !== null) {
					reject(err);
					return;
				}
				const temporaryFile = {
					name,
					fd,
					removeCallback,
					handleId,
				};
				this.openTemporaryFiles.set(handleId, temporaryFile);
				logger.silly("Created temporary file", { handleId, name });
				resolve(temporaryFile);
			});
		});
	}

	public async writeTemporaryFile(
		handleId: number,
		data: Buffer,
		position: number,
	): Promise<number> {
		const temporaryFile = await this.getTemporaryFile(handleId);
		return new Promise<number>((resolve, reject) => {
			fs.write(
				temporaryFile.fd,
				data,
				0,
				data.length,
				position,
				(err, written) => {
					if (err !== null) {
						reject(err);
						return;
					}
					resolve(written);
				},
			);
		});
	}

	public async readTemporaryFile(handleId: number): Promise<Buffer> {
		const temporaryFile = await this.getTemporaryFile(handleId);
		return new Promise<Buffer>((resolve, reject) => {
			fs.readFile(temporaryFile.name, (err, data) => {
				if (err !== null) {
					reject(err);
					return;
				}
				resolve(data);
			});
		});
	}

	public async deleteTemporaryFile(handleId: number): Promise<void> {
		const temporaryFile = await this.getTemporaryFile(handleId);
		this.openTemporaryFiles.delete(handleId);
		temporaryFile.removeCallback();
		logger.silly("Deleted temporary file", {
			handleId,
			name: temporaryFile.name,
		});
	}

	public async deleteAllTemporaryFiles(): Promise<void> {
		const handleIds = Array.from(this.openTemporaryFiles.keys());
		await Promise.all(
			handleIds.map(async (handleId) => {
				try {
					await this.deleteTemporaryFile(handleId);
				} catch (err: unknown) {
					if (!(err instanceof MissingTemporaryFileError)) {
						throw err;
					}
					// Already gone from disk; forget it.
					this.openTemporaryFiles.delete(handleId);
					logger.info(
						`The temporary file associated with handle ${String(handleId)} does not exist.`,
					);
				}
			}),
		);
	}
}
