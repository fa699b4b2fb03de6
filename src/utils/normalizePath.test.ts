import { InvalidPathError } from "../errors";
import {
	getBaseName,
	getParentPath,
	isDescendantPath,
	isNormalizedPath,
	isRootPath,
	joinPath,
	normalizePath,
} from "./normalizePath";

describe("normalizePath", () => {
	it.each([
		["/", "/"],
		["", "/"],
		[".", "/"],
		["/a/b", "/a/b"],
		["a/b", "/a/b"],
		["/a//b/", "/a/b"],
		["/a/./b", "/a/b"],
		["/a/b/../c", "/a/c"],
		["/a/b/..", "/a"],
		["./reports/2024/../2025/", "/reports/2025"],
	])("should normalize %j to %j", (rawPath, expected) => {
		expect(normalizePath(rawPath)).toBe(expected);
	});

	it("should be idempotent", () => {
		const once = normalizePath("x/./y/../z//w/");
		expect(normalizePath(once)).toBe(once);
	});

	it("should reject paths that climb above the root", () => {
		expect(() => normalizePath("/..")).toThrow(InvalidPathError);
		expect(() => normalizePath("/a/../../b")).toThrow(InvalidPathError);
	});

	it("should reject null bytes", () => {
		expect(() => normalizePath("/a\0b")).toThrow(InvalidPathError);
	});
});

describe("isNormalizedPath", () => {
	it.each(["/", "/a", "/a/b.txt", "/a/.hidden"])(
		"should accept %j",
		(candidate) => {
			expect(isNormalizedPath(candidate)).toBe(true);
		},
	);

	it.each(["", "a", "/a/", "//a", "/a/./b", "/a/../b", "/a/.."])(
		"should refuse %j",
		(candidate) => {
			expect(isNormalizedPath(candidate)).toBe(false);
		},
	);
});

describe("path helpers", () => {
	it("should find parents", () => {
		expect(getParentPath(normalizePath("/a/b/c"))).toBe("/a/b");
		expect(getParentPath(normalizePath("/a"))).toBe("/");
		expect(getParentPath(normalizePath("/"))).toBe("/");
	});

	it("should find base names", () => {
		expect(getBaseName(normalizePath("/a/b.txt"))).toBe("b.txt");
		expect(getBaseName(normalizePath("/"))).toBe("");
	});

	it("should join a child onto a parent", () => {
		expect(joinPath(normalizePath("/"), "a")).toBe("/a");
		expect(joinPath(normalizePath("/a"), "b")).toBe("/a/b");
	});

	it("should recognise the root", () => {
		expect(isRootPath(normalizePath("/"))).toBe(true);
		expect(isRootPath(normalizePath("/a"))).toBe(false);
	});

	it("should recognise descendants", () => {
		expect(isDescendantPath(normalizePath("/a/b"), normalizePath("/a"))).toBe(
			true,
		);
		expect(isDescendantPath(normalizePath("/ab"), normalizePath("/a"))).toBe(
			false,
		);
		expect(isDescendantPath(normalizePath("/a"), normalizePath("/a"))).toBe(
			false,
		);
		expect(isDescendantPath(normalizePath("/a"), normalizePath("/"))).toBe(
			true,
		);
	});
});
