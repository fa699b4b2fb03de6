import {
	DirectoryNotEmptyError,
	FileSystemObjectAlreadyExists,
	FileSystemObjectNotFound,
	InvalidOperationForPathError,
	IsADirectoryError,
	NotADirectoryError,
} from "../errors";
import {
	generateAttributesForDirectory,
	generateAttributesForFile,
	getBaseName,
	getParentPath,
	isDescendantPath,
	isRootPath,
	joinPath,
	normalizePath,
} from "../utils";
import type {
	DirEntry,
	FileAttributes,
	NormalizedPath,
	StorageBackend,
} from "../types";

interface MemoryFile {
	type: "file";
	content: Buffer;
	modifiedAt: Date;
}

interface MemoryDirectory {
	type: "directory";
	modifiedAt: Date;
}

type MemoryNode = MemoryFile | MemoryDirectory;

const getAttributesForNode = (node: MemoryNode): FileAttributes =>
	node.type === "file"
		? generateAttributesForFile(node.content.length, node.modifiedAt)
		: generateAttributesForDirectory(node.modifiedAt);

/**
 * Keeps the whole file system in a map keyed by normalized path.  Nothing
 * survives a restart; useful for tests and throwaway servers.
 */
export class MemoryBackend implements StorageBackend {
	private readonly nodes = new Map<NormalizedPath, MemoryNode>();

	/**
	 * @param initialFiles - file contents keyed by path; parent directories
	 * are created as needed.
	 */
	public constructor(initialFiles: Record<string, Buffer | string> = {}) {
		this.nodes.set(normalizePath("/"), {
			type: "directory",
			modifiedAt: new Date(),
		});
		Object.entries(initialFiles).forEach(([rawPath, content]) => {
			const path = normalizePath(rawPath);
			this.ensureDirectoryTree(getParentPath(path));
			this.nodes.set(path, {
				type: "file",
				content: Buffer.from(content),
				modifiedAt: new Date(),
			});
		});
	}

	public async listDir(path: NormalizedPath): Promise<DirEntry[]> {
		this.getDirectory(path);
		const entries: DirEntry[] = [];
		this.nodes.forEach((node, nodePath) => {
			if (!isRootPath(nodePath) && getParentPath(nodePath) === path) {
				entries.push({
					name: getBaseName(nodePath),
					attributes: getAttributesForNode(node),
				});
			}
		});
		return entries.sort((a, b) => a.name.localeCompare(b.name));
	}

	public async fileInfo(path: NormalizedPath): Promise<FileAttributes> {
		return getAttributesForNode(this.getNode(path));
	}

	public async makeDir(path: NormalizedPath): Promise<void> {
		if (this.nodes.has(path)) {
			throw new FileSystemObjectAlreadyExists(
				`A file or directory already exists at ${path}.`,
			);
		}
		this.getParentDirectory(path);
		this.nodes.set(path, { type: "directory", modifiedAt: new Date() });
	}

	public async delDir(path: NormalizedPath): Promise<void> {
		this.getDirectory(path);
		if (isRootPath(path)) {
			throw new InvalidOperationForPathError(
				"The root directory cannot be removed.",
			);
		}
		if (this.hasChildren(path)) {
			throw new DirectoryNotEmptyError(
				"This directory is not empty, so it cannot be removed.",
			);
		}
		this.nodes.delete(path);
	}

	public async delete(path: NormalizedPath): Promise<void> {
		this.getFile(path);
		this.nodes.delete(path);
	}

	public async rename(
		source: NormalizedPath,
		destination: NormalizedPath,
	): Promise<void> {
		const sourceNode = this.getNode(source);
		if (isRootPath(source)) {
			throw new InvalidOperationForPathError(
				"The root directory cannot be moved.",
			);
		}
		if (this.nodes.has(destination)) {
			throw new FileSystemObjectAlreadyExists(
				`A file or directory already exists at ${destination}.`,
			);
		}
		this.getParentDirectory(destination);
		if (
			sourceNode.type === "directory" &&
			isDescendantPath(destination, source)
		) {
			throw new InvalidOperationForPathError(
				"A directory cannot be moved into itself.",
			);
		}

		const movedNodes: [NormalizedPath, MemoryNode][] = [];
		this.nodes.forEach((node, nodePath) => {
			if (nodePath === source || isDescendantPath(nodePath, source)) {
				movedNodes.push([nodePath, node]);
			}
		});
		movedNodes.forEach(([nodePath, node]) => {
			this.nodes.set(
				joinPath(destination, nodePath.slice(source.length)),
				node,
			);
		});
		movedNodes.forEach(([nodePath]) => {
			this.nodes.delete(nodePath);
		});
	}

	public async readFile(path: NormalizedPath): Promise<Buffer> {
		return Buffer.from(this.getFile(path).content);
	}

	public async writeFile(
		path: NormalizedPath,
		content: Buffer,
	): Promise<void> {
		if (this.nodes.get(path)?.type === "directory") {
			throw new IsADirectoryError(
				"This path is a directory, so it cannot be written as a file.",
			);
		}
		this.getParentDirectory(path);
		this.nodes.set(path, {
			type: "file",
			content: Buffer.from(content),
			modifiedAt: new Date(),
		});
	}

	private ensureDirectoryTree(path: NormalizedPath): void {
		const node = this.nodes.get(path);
		if (node?.type === "directory") {
			return;
		}
		if (node !== undefined) {
			throw new NotADirectoryError(`${path} is a file, not a directory.`);
		}
		this.ensureDirectoryTree(getParentPath(path));
		this.nodes.set(path, { type: "directory", modifiedAt: new Date() });
	}

	private hasChildren(path: NormalizedPath): boolean {
		return Array.from(this.nodes.keys()).some(
			(nodePath) => !isRootPath(nodePath) && getParentPath(nodePath) === path,
		);
	}

	private getNode(path: NormalizedPath): MemoryNode {
		const node = this.nodes.get(path);
		if (node === undefined) {
			throw new FileSystemObjectNotFound(
				`No file or directory exists at ${path}.`,
			);
		}
		return node;
	}

	private getFile(path: NormalizedPath): MemoryFile {
		const node = this.getNode(path);
		if (node.type === "directory") {
			throw new IsADirectoryError(`${path} is a directory, not a file.`);
		}
		return node;
	}

	private getDirectory(path: NormalizedPath): MemoryDirectory {
		const node = this.getNode(path);
		if (node.type === "file") {
			throw new NotADirectoryError(`${path} is a file, not a directory.`);
		}
		return node;
	}

	private getParentDirectory(path: NormalizedPath): MemoryDirectory {
		const parentPath = getParentPath(path);
		const parent = this.nodes.get(parentPath);
		if (parent === undefined) {
			throw new FileSystemObjectNotFound(
				`The parent directory ${parentPath} does not exist.`,
			);
		}
		if (parent.type === "file") {
			throw new NotADirectoryError(
				`${parentPath} is a file, not a directory.`,
			);
		}
		return parent;
	}
}
