export * from "./FileAttributes";
export * from "./NormalizedPath";
export * from "./StorageBackend";
