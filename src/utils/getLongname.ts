import { DEFAULT_FILE_ATTRIBUTES } from "../constants";
import type { FileAttributes } from "../types";

const PERMISSION_CHARACTERS = ["r", "w", "x"];

const getTypeCharacter = (attributes: FileAttributes): string => {
	switch (attributes.type) {
		case "directory":
			return "d";
		case "file":
			return "-";
		default:
			return "?";
	}
};

const getPermissionString = (permissions: number): string =>
	Array.from({ length: 9 }, (_value, index) => {
		// eslint-disable-next-line no-bitwise
		const isSet = (permissions & (0o400 >> index)) !== 0;
		return isSet ? PERMISSION_CHARACTERS[index % 3] : "-";
	}).join("");

/**
 * Builds the `ls -l` style line that SFTP version 3 clients display.
 */
export const getLongname = (
	filename: string,
	attributes: FileAttributes,
	owner = DEFAULT_FILE_ATTRIBUTES.OWNER_NAME,
	group = DEFAULT_FILE_ATTRIBUTES.GROUP_NAME,
): string => {
	const permissionString =
		attributes.permissions === undefined
			? "?????????"
			: getPermissionString(attributes.permissions);
	const size = attributes.size ?? 0;
	return `${getTypeCharacter(attributes)}${permissionString} 1 ${owner} ${group} ${String(size)} ${filename}`;
};
