import { InvalidPathError } from "../errors";
import type { NormalizedPath } from "../types";

const SEPARATOR = "/";

const ROOT_PATH = SEPARATOR as NormalizedPath;

const isNormalizedSegment = (segment: string): boolean =>
	segment !== "" && segment !== "." && segment !== "..";

export const isNormalizedPath = (rawPath: string): rawPath is NormalizedPath => {
	if (rawPath === SEPARATOR) {
		return true;
	}
	if (!rawPath.startsWith(SEPARATOR) || rawPath.endsWith(SEPARATOR)) {
		return false;
	}
	if (rawPath.includes("\0")) {
		return false;
	}
	return rawPath.slice(1).split(SEPARATOR).every(isNormalizedSegment);
};

/**
 * Resolves a client supplied path against the virtual root.
 *
 * Already normalized input is handed back as is; anything else is rebuilt.
 * Throws `InvalidPathError` for null bytes and for `..` segments that would
 * climb above the root.
 */
export const normalizePath = (rawPath: string): NormalizedPath => {
	if (rawPath.includes("\0")) {
		throw new InvalidPathError("Paths may not contain null bytes.");
	}
	if (isNormalizedPath(rawPath)) {
		return rawPath;
	}
	const segments: string[] = [];
	rawPath.split(SEPARATOR).forEach((segment) => {
		if (segment === "" || segment === ".") {
			return;
		}
		if (segment === "..") {
			if (segments.pop() === undefined) {
				throw new InvalidPathError(
					`The path resolves above the root directory: ${rawPath}`,
				);
			}
			return;
		}
		segments.push(segment);
	});
	if (segments.length === 0) {
		return ROOT_PATH;
	}
	// The segments were all validated above, so the joined value is normalized.
	return `${SEPARATOR}${segments.join(SEPARATOR)}` as NormalizedPath;
};

export const isRootPath = (normalizedPath: NormalizedPath): boolean =>
	normalizedPath === ROOT_PATH;

export const getParentPath = (normalizedPath: NormalizedPath): NormalizedPath => {
	const lastSeparatorIndex = normalizedPath.lastIndexOf(SEPARATOR);
	if (lastSeparatorIndex <= 0) {
		return ROOT_PATH;
	}
	return normalizedPath.slice(0, lastSeparatorIndex) as NormalizedPath;
};

export const getBaseName = (normalizedPath: NormalizedPath): string =>
	normalizedPath.slice(normalizedPath.lastIndexOf(SEPARATOR) + 1);

export const joinPath = (
	parentPath: NormalizedPath,
	childName: string,
): NormalizedPath => normalizePath(`${parentPath}${SEPARATOR}${childName}`);

// e.g. '/a/b' is a descendant of '/a', but '/ab' is not
export const isDescendantPath = (
	candidatePath: NormalizedPath,
	ancestorPath: NormalizedPath,
): boolean =>
	isRootPath(ancestorPath)
		? !isRootPath(candidatePath)
		: candidatePath.startsWith(`${ancestorPath}${SEPARATOR}`);
