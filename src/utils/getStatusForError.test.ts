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
import { getStatusForError } from "./getStatusForError";

const SFTP_STATUS_CODE = ssh2.utils.sftp.STATUS_CODE;

describe("getStatusForError", () => {
	it.each([
		[new FileSystemObjectNotFound("gone"), SFTP_STATUS_CODE.NO_SUCH_FILE],
		[new NotADirectoryError("file"), SFTP_STATUS_CODE.NO_SUCH_FILE],
		[new InvalidPathError("bad"), SFTP_STATUS_CODE.NO_SUCH_FILE],
		[new PermissionDeniedError("no"), SFTP_STATUS_CODE.PERMISSION_DENIED],
		[new FileSystemObjectAlreadyExists("taken"), SFTP_STATUS_CODE.FAILURE],
		[new IsADirectoryError("dir"), SFTP_STATUS_CODE.FAILURE],
		[new DirectoryNotEmptyError("full"), SFTP_STATUS_CODE.FAILURE],
		[new InvalidHandleError("handle"), SFTP_STATUS_CODE.FAILURE],
		[new WrongHandleTypeError("kind"), SFTP_STATUS_CODE.FAILURE],
		[new InvalidOperationForPathError("loop"), SFTP_STATUS_CODE.FAILURE],
		[new BackendUnavailableError("down"), SFTP_STATUS_CODE.FAILURE],
	])("should map %p to status %i", (err, code) => {
		expect(getStatusForError(err)).toEqual({
			code,
			message: err.message,
			isExpected: true,
		});
	});

	it("should fall back to a default message", () => {
		expect(getStatusForError(new FileSystemObjectNotFound()).message).toBe(
			"No such file or directory.",
		);
	});

	it("should not leak the message of an unexpected error", () => {
		expect(getStatusForError(new TypeError("secret internals"))).toEqual({
			code: SFTP_STATUS_CODE.FAILURE,
			message: "An unexpected error occurred when processing this request.",
			isExpected: false,
		});
	});
});
