import { getLongname } from "./getLongname";
import type { FileAttributes } from "../types";

export interface FileEntry {
	filename: string;
	longname: string;
	attributes: FileAttributes;
}

export const generateFileEntry = (
	filename: string,
	attributes: FileAttributes,
): FileEntry => ({
	filename,
	longname: getLongname(filename, attributes),
	attributes,
});
