import ssh2 from "ssh2";
import {
	BackendUnavailableError,
	DirectoryNotEmptyError,
	FileSystemObjectAlreadyExists,
	FileSystemObjectNotFound,
	InvalidHandleError,
	InvalidOperationForPathError,
	InvalidPathError,
	IsADirectoryError,
	NotADirectoryError,
	PermissionDeniedError,
	WrongHandleTypeError,
} from "../errors";

const SFTP_STATUS_CODE = ssh2.utils.sftp.STATUS_CODE;

export interface SftpStatus {
	code: number;
	message: string;
	/** False when the error was not one of the known failure types. */
	isExpected: boolean;
}

const withMessage = (err: Error, fallback: string): string =>
	err.message === "" ? fallback : err.message;

/**
 * Translates a backend or handle error into the status reply a client sees.
 * SFTP version 3 has few status codes, so several errors share a code and
 * are told apart by their message.
 */
export const getStatusForError = (err: unknown): SftpStatus => {
	if (err instanceof FileSystemObjectNotFound) {
		return {
			code: SFTP_STATUS_CODE.NO_SUCH_FILE,
			message: withMessage(err, "No such file or directory."),
			isExpected: true,
		};
	}
	if (err instanceof NotADirectoryError) {
		return {
			code: SFTP_STATUS_CODE.NO_SUCH_FILE,
			message: withMessage(err, "Not a directory."),
			isExpected: true,
		};
	}
	if (err instanceof InvalidPathError) {
		return {
			code: SFTP_STATUS_CODE.NO_SUCH_FILE,
			message: withMessage(err, "Invalid path."),
			isExpected: true,
		};
	}
	if (err instanceof PermissionDeniedError) {
		return {
			code: SFTP_STATUS_CODE.PERMISSION_DENIED,
			message: withMessage(err, "Permission denied."),
			isExpected: true,
		};
	}
	if (err instanceof FileSystemObjectAlreadyExists) {
		return {
			code: SFTP_STATUS_CODE.FAILURE,
			message: withMessage(err, "A file or directory already exists at this path."),
			isExpected: true,
		};
	}
	if (err instanceof IsADirectoryError) {
		return {
			code: SFTP_STATUS_CODE.FAILURE,
			message: withMessage(err, "This path is a directory."),
			isExpected: true,
		};
	}
	if (err instanceof DirectoryNotEmptyError) {
		return {
			code: SFTP_STATUS_CODE.FAILURE,
			message: withMessage(err, "The directory is not empty."),
			isExpected: true,
		};
	}
	if (err instanceof InvalidHandleError) {
		return {
			code: SFTP_STATUS_CODE.FAILURE,
			message: withMessage(
				err,
				"There is no server resource associated with this handle.",
			),
			isExpected: true,
		};
	}
	if (err instanceof WrongHandleTypeError) {
		return {
			code: SFTP_STATUS_CODE.FAILURE,
			message: withMessage(
				err,
				"This handle does not refer to a resource of the required type.",
			),
			isExpected: true,
		};
	}
	if (err instanceof InvalidOperationForPathError) {
		return {
			code: SFTP_STATUS_CODE.FAILURE,
			message: withMessage(err, "This operation is not valid for this path."),
			isExpected: true,
		};
	}
	if (err instanceof BackendUnavailableError) {
		return {
			code: SFTP_STATUS_CODE.FAILURE,
			message: withMessage(err, "The storage backend is unavailable."),
			isExpected: true,
		};
	}
	return {
		code: SFTP_STATUS_CODE.FAILURE,
		message: "An unexpected error occurred when processing this request.",
		isExpected: false,
	};
};
