// We are living in the realm of bits for these operations
// and so we must accept our fate and use the bitwise operators.
/* eslint-disable no-bitwise */
import fs from "node:fs";
import type { FileAttributes, FileType } from "../types";

const PERMISSION_BITS = 0o7777;

export const getTypeBits = (fileType: FileType): number => {
	switch (fileType) {
		case "directory":
			return fs.constants.S_IFDIR;
		case "file":
			return fs.constants.S_IFREG;
		case "other":
		default:
			return 0;
	}
};

export const getFileTypeForMode = (mode: number): FileType => {
	switch (mode & fs.constants.S_IFMT) {
		case fs.constants.S_IFDIR:
			return "directory";
		case fs.constants.S_IFREG:
			return "file";
		default:
			return "other";
	}
};

/**
 * Builds the POSIX mode sent on the wire.  Returns undefined when there is
 * neither a known type nor a permission value to report.
 */
export const getModeForAttributes = (
	attributes: FileAttributes,
): number | undefined => {
	const typeBits = getTypeBits(attributes.type);
	if (attributes.permissions === undefined) {
		return typeBits === 0 ? undefined : typeBits;
	}
	return typeBits | (attributes.permissions & PERMISSION_BITS);
};
