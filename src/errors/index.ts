export * from "./BackendUnavailableError";
export * from "./DirectoryNotEmptyError";
export * from "./FileSystemObjectAlreadyExists";
export * from "./FileSystemObjectNotFound";
export * from "./InvalidHandleError";
export * from "./InvalidOperationForPathError";
export * from "./InvalidPathError";
export * from "./IsADirectoryError";
export * from "./MissingTemporaryFileError";
export * from "./NotADirectoryError";
export * from "./PermissionDeniedError";
export * from "./ProtocolError";
export * from "./SystemConfigurationError";
export * from "./WrongHandleTypeError";
