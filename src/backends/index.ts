export * from "./createBackend";
export * from "./LocalBackend";
export * from "./MemoryBackend";
export * from "./S3Backend";
