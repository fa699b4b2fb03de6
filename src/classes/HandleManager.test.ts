import { mockLogger } from "../test/mocks";
import { MemoryBackend } from "../backends";
import {
	FileSystemObjectNotFound,
	InvalidHandleError,
	WrongHandleTypeError,
} from "../errors";
import { normalizePath } from "../utils";
import { HandleManager } from "./HandleManager";
import { TemporaryFileManager } from "./TemporaryFileManager";

jest.mock("../logger", () => ({
	logger: mockLogger,
}));

describe("HandleManager", () => {
	let backend: MemoryBackend;
	let manager: HandleManager;

	beforeEach(() => {
		jest.clearAllMocks();
		backend = new MemoryBackend({
			"/photos/cat.jpg": "meow",
			"/photos/dog.jpg": "woof",
			"/photos/fish.jpg": "blub",
		});
		manager = new HandleManager(backend, { readDirPageSize: 2 });
	});

	afterEach(async () => {
		await manager.dropAll();
	});

	describe("parseHandle", () => {
		it("should parse a decimal handle", () => {
			expect(HandleManager.parseHandle(Buffer.from("12"))).toBe(12);
		});

		it.each(["", "0", "01", "-1", "1.5", "abc", "1 "])(
			"should reject %j",
			(handle) => {
				expect(() => HandleManager.parseHandle(handle)).toThrow(
					InvalidHandleError,
				);
			},
		);
	});

	describe("formatHandle", () => {
		it("should format a handle as decimal text", () => {
			expect(HandleManager.formatHandle(305).toString()).toBe("305");
		});
	});

	it("should assign increasing ids and never reuse them", async () => {
		const first = await manager.openFile(
			normalizePath("/photos/cat.jpg"),
			"read",
		);
		const second = manager.openDir(normalizePath("/photos"));
		await manager.close(first);
		const third = await manager.openFile(
			normalizePath("/photos/dog.jpg"),
			"read",
		);

		expect([first, second, third]).toEqual([1, 2, 3]);
		expect(manager.openHandleCount).toBe(2);
	});

	describe("read", () => {
		it("should advance the cursor when no offset is given", async () => {
			const handleId = await manager.openFile(
				normalizePath("/photos/cat.jpg"),
				"read",
			);

			const first = await manager.read(handleId, 2);
			const second = await manager.read(handleId, 10);
			const third = await manager.read(handleId, 10);

			expect(first?.toString()).toBe("me");
			expect(second?.toString()).toBe("ow");
			expect(third).toBeNull();
		});

		it("should load the file from storage only once", async () => {
			const readFileSpy = jest.spyOn(backend, "readFile");
			const handleId = await manager.openFile(
				normalizePath("/photos/cat.jpg"),
				"read",
			);

			await manager.read(handleId, 1, 0);
			await manager.read(handleId, 1, 1);

			expect(readFileSpy).toHaveBeenCalledTimes(1);
		});

		it("should reject a write handle", async () => {
			const handleId = await manager.openFile(
				normalizePath("/photos/new.jpg"),
				"write",
			);

			await expect(manager.read(handleId, 1, 0)).rejects.toThrow(
				WrongHandleTypeError,
			);
		});

		it("should reject an unknown handle", async () => {
			await expect(manager.read(99, 1, 0)).rejects.toThrow(InvalidHandleError);
		});
	});

	describe("write", () => {
		it("should apply writes in the order they were issued", async () => {
			const path = normalizePath("/photos/bird.jpg");
			const handleId = await manager.openFile(path, "write");

			await Promise.all([
				manager.write(handleId, Buffer.from("tweet"), 0),
				manager.write(handleId, Buffer.from("TW"), 0),
				manager.write(handleId, Buffer.from("!"), 5),
			]);
			await manager.close(handleId);

			expect((await backend.readFile(path)).toString()).toBe("TWeet!");
		});

		it("should start from the initial content when one is given", async () => {
			const path = normalizePath("/photos/cat.jpg");
			const handleId = await manager.openFile(path, "write", {
				initialContent: Buffer.from("meow"),
			});

			await manager.write(handleId, Buffer.from("!"), 4);
			await manager.close(handleId);

			expect((await backend.readFile(path)).toString()).toBe("meow!");
		});

		it("should reject a directory handle", async () => {
			const handleId = manager.openDir(normalizePath("/photos"));

			await expect(
				manager.write(handleId, Buffer.from("x"), 0),
			).rejects.toThrow(WrongHandleTypeError);
		});
	});

	describe("readDir", () => {
		it("should return the listing in batches and then an empty list", async () => {
			const handleId = manager.openDir(normalizePath("/photos"));

			const first = await manager.readDir(handleId);
			const second = await manager.readDir(handleId);
			const third = await manager.readDir(handleId);
			const fourth = await manager.readDir(handleId);

			expect(first.map(({ name }) => name)).toEqual(["cat.jpg", "dog.jpg"]);
			expect(second.map(({ name }) => name)).toEqual(["fish.jpg"]);
			expect(third).toEqual([]);
			expect(fourth).toEqual([]);
		});

		it("should list storage only once per handle", async () => {
			const listDirSpy = jest.spyOn(backend, "listDir");
			const handleId = manager.openDir(normalizePath("/photos"));

			await manager.readDir(handleId);
			await manager.readDir(handleId);
			await manager.readDir(handleId);

			expect(listDirSpy).toHaveBeenCalledTimes(1);
		});

		it("should reject a file handle", async () => {
			const handleId = await manager.openFile(
				normalizePath("/photos/cat.jpg"),
				"read",
			);

			await expect(manager.readDir(handleId)).rejects.toThrow(
				WrongHandleTypeError,
			);
		});
	});

	describe("stat", () => {
		it("should report the stored attributes of a read handle", async () => {
			const handleId = await manager.openFile(
				normalizePath("/photos/dog.jpg"),
				"read",
			);

			const attributes = await manager.stat(handleId);

			expect(attributes.type).toBe("file");
			expect(attributes.size).toBe(4);
		});

		it("should report the spooled size of a write handle", async () => {
			const handleId = await manager.openFile(
				normalizePath("/photos/dog.jpg"),
				"write",
				{ initialContent: Buffer.from("woof") },
			);
			await manager.write(handleId, Buffer.from("woof woof"), 0);

			const attributes = await manager.stat(handleId);

			expect(attributes.size).toBe(9);
		});
	});

	describe("close", () => {
		it("should make the handle invalid", async () => {
			const handleId = manager.openDir(normalizePath("/photos"));

			await manager.close(handleId);

			await expect(manager.close(handleId)).rejects.toThrow(InvalidHandleError);
			await expect(manager.readDir(handleId)).rejects.toThrow(
				InvalidHandleError,
			);
		});

		it("should remove the handle even when storage refuses the file", async () => {
			const path = normalizePath("/missing/new.jpg");
			const handleId = await manager.openFile(path, "write");
			await manager.write(handleId, Buffer.from("data"), 0);

			await expect(manager.close(handleId)).rejects.toThrow(
				FileSystemObjectNotFound,
			);
			expect(manager.openHandleCount).toBe(0);
		});
	});

	describe("dropAll", () => {
		it("should forget every handle without storing pending uploads", async () => {
			const writeFileSpy = jest.spyOn(backend, "writeFile");
			const handleId = await manager.openFile(
				normalizePath("/photos/unsaved.jpg"),
				"write",
			);
			await manager.write(handleId, Buffer.from("data"), 0);
			manager.openDir(normalizePath("/photos"));

			await manager.dropAll();

			expect(manager.openHandleCount).toBe(0);
			expect(writeFileSpy).not.toHaveBeenCalled();
			await expect(manager.stat(handleId)).rejects.toThrow(InvalidHandleError);
		});

		it("should discard a write handle whose open was still in progress", async () => {
			const temporaryFileManager = new TemporaryFileManager();
			const deleteTemporaryFileSpy = jest.spyOn(
				temporaryFileManager,
				"deleteTemporaryFile",
			);
			const racingManager = new HandleManager(backend, { temporaryFileManager });

			const opening = racingManager.openFile(
				normalizePath("/photos/late.jpg"),
				"write",
			);
			await racingManager.dropAll();

			await expect(opening).rejects.toThrow(
				"The connection has closed, so no more handles can be opened.",
			);
			expect(racingManager.openHandleCount).toBe(0);
			expect(deleteTemporaryFileSpy).toHaveBeenCalledWith(1);
		});

		it("should refuse new handles once dropped", async () => {
			await manager.dropAll();

			expect(() => manager.openDir(normalizePath("/photos"))).toThrow(
				InvalidHandleError,
			);
			await expect(
				manager.openFile(normalizePath("/photos/cat.jpg"), "read"),
			).rejects.toThrow(InvalidHandleError);
		});
	});
});
