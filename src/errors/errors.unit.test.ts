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
	ProtocolError,
	WrongHandleTypeError,
} from ".";

const errorClasses = [
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
	ProtocolError,
	WrongHandleTypeError,
];

describe("errors", () => {
	it.each(errorClasses)("%p should be an instance of Error", (ErrorClass) => {
		const error = new ErrorClass("Test message");
		expect(error).toBeInstanceOf(Error);
		expect(error).toBeInstanceOf(ErrorClass);
		expect(error.message).toBe("Test message");
	});

	it("should be distinguishable with instanceof", () => {
		const error: Error = new FileSystemObjectNotFound("/missing");
		expect(error instanceof FileSystemObjectNotFound).toBe(true);
		expect(error instanceof FileSystemObjectAlreadyExists).toBe(false);
		expect(error instanceof PermissionDeniedError).toBe(false);
	});

	it("should work without message", () => {
		const error = new InvalidHandleError();
		expect(error.message).toBe("");
	});
});
