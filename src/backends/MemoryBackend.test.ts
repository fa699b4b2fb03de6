import {
	DirectoryNotEmptyError,
	FileSystemObjectAlreadyExists,
	FileSystemObjectNotFound,
	InvalidOperationForPathError,
	IsADirectoryError,
	NotADirectoryError,
} from "../errors";
import { normalizePath } from "../utils";
import { MemoryBackend } from "./MemoryBackend";

const path = normalizePath;

describe("MemoryBackend", () => {
	let backend: MemoryBackend;

	beforeEach(() => {
		backend = new MemoryBackend({
			"/projects/alpha/plan.md": "# Plan",
			"/projects/alpha/budget.csv": "item,cost",
			"/readme.txt": "top level",
		});
	});

	describe("seeding", () => {
		it("should create the parents of seeded files", async () => {
			await expect(backend.fileInfo(path("/projects"))).resolves.toMatchObject({
				type: "directory",
			});
			await expect(
				backend.fileInfo(path("/projects/alpha")),
			).resolves.toMatchObject({ type: "directory" });
		});
	});

	describe("listDir", () => {
		it("should list direct children sorted by name", async () => {
			const entries = await backend.listDir(path("/"));

			expect(entries.map(({ name }) => name)).toEqual(["projects", "readme.txt"]);
			expect(entries[1]?.attributes).toMatchObject({ type: "file", size: 9 });
		});

		it("should reject files", async () => {
			await expect(backend.listDir(path("/readme.txt"))).rejects.toThrow(
				NotADirectoryError,
			);
		});

		it("should reject missing directories", async () => {
			await expect(backend.listDir(path("/missing"))).rejects.toThrow(
				FileSystemObjectNotFound,
			);
		});
	});

	describe("makeDir", () => {
		it("should create a directory", async () => {
			await backend.makeDir(path("/projects/beta"));

			await expect(backend.listDir(path("/projects/beta"))).resolves.toEqual([]);
		});

		it("should not create missing parents", async () => {
			await expect(backend.makeDir(path("/a/b"))).rejects.toThrow(
				FileSystemObjectNotFound,
			);
		});

		it("should refuse an existing path", async () => {
			await expect(backend.makeDir(path("/projects"))).rejects.toThrow(
				FileSystemObjectAlreadyExists,
			);
		});
	});

	describe("delDir", () => {
		it("should refuse a directory with children", async () => {
			await expect(backend.delDir(path("/projects/alpha"))).rejects.toThrow(
				DirectoryNotEmptyError,
			);
		});

		it("should refuse the root", async () => {
			await expect(backend.delDir(path("/"))).rejects.toThrow(
				InvalidOperationForPathError,
			);
		});

		it("should refuse a file", async () => {
			await expect(backend.delDir(path("/readme.txt"))).rejects.toThrow(
				NotADirectoryError,
			);
		});
	});

	describe("delete", () => {
		it("should delete a file", async () => {
			await backend.delete(path("/readme.txt"));

			await expect(backend.fileInfo(path("/readme.txt"))).rejects.toThrow(
				FileSystemObjectNotFound,
			);
		});

		it("should refuse a directory", async () => {
			await expect(backend.delete(path("/projects"))).rejects.toThrow(
				IsADirectoryError,
			);
		});
	});

	describe("rename", () => {
		it("should move a directory with everything below it", async () => {
			await backend.rename(path("/projects/alpha"), path("/archive"));

			const content = await backend.readFile(path("/archive/plan.md"));
			expect(content.toString()).toBe("# Plan");
			await expect(
				backend.fileInfo(path("/projects/alpha/plan.md")),
			).rejects.toThrow(FileSystemObjectNotFound);
		});

		it("should not overwrite the destination", async () => {
			await expect(
				backend.rename(path("/readme.txt"), path("/projects/alpha/plan.md")),
			).rejects.toThrow(FileSystemObjectAlreadyExists);
			expect((await backend.readFile(path("/readme.txt"))).toString()).toBe(
				"top level",
			);
		});

		it("should refuse to move a directory into itself", async () => {
			await expect(
				backend.rename(path("/projects"), path("/projects/alpha/inner")),
			).rejects.toThrow(InvalidOperationForPathError);
		});

		it("should refuse a destination without a parent", async () => {
			await expect(
				backend.rename(path("/readme.txt"), path("/nowhere/readme.txt")),
			).rejects.toThrow(FileSystemObjectNotFound);
		});
	});

	describe("readFile and writeFile", () => {
		it("should replace the whole file", async () => {
			await backend.writeFile(path("/readme.txt"), Buffer.from("new"));

			expect((await backend.readFile(path("/readme.txt"))).toString()).toBe(
				"new",
			);
		});

		it("should not share buffers with callers", async () => {
			const content = Buffer.from("abc");
			await backend.writeFile(path("/copy.txt"), content);
			content.write("x");

			expect((await backend.readFile(path("/copy.txt"))).toString()).toBe(
				"abc",
			);
		});

		it("should refuse to write over a directory", async () => {
			await expect(
				backend.writeFile(path("/projects"), Buffer.from("x")),
			).rejects.toThrow(IsADirectoryError);
		});

		it("should refuse to write below a file", async () => {
			await expect(
				backend.writeFile(path("/readme.txt/child"), Buffer.from("x")),
			).rejects.toThrow(NotADirectoryError);
		});

		it("should refuse to read a directory", async () => {
			await expect(backend.readFile(path("/projects"))).rejects.toThrow(
				IsADirectoryError,
			);
		});
	});
});
