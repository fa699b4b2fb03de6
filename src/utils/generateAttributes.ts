import { DEFAULT_FILE_ATTRIBUTES, MS_PER_SECOND } from "../constants";
import type { FileAttributes } from "../types";

export const toUnixTimestamp = (date: Date): number =>
	Math.floor(date.getTime() / MS_PER_SECOND);

export const generateAttributesForFile = (
	size: number,
	modifiedAt?: Date,
): FileAttributes => {
	const timestamp = modifiedAt === undefined ? undefined : toUnixTimestamp(modifiedAt);
	return {
		type: "file",
		size,
		permissions: DEFAULT_FILE_ATTRIBUTES.FILE_PERMISSIONS,
		mtime: timestamp,
		atime: timestamp,
	};
};

export const generateAttributesForDirectory = (
	modifiedAt?: Date,
): FileAttributes => {
	const timestamp = modifiedAt === undefined ? undefined : toUnixTimestamp(modifiedAt);
	return {
		type: "directory",
		permissions: DEFAULT_FILE_ATTRIBUTES.DIRECTORY_PERMISSIONS,
		mtime: timestamp,
		atime: timestamp,
	};
};
