export class FileSystemObjectNotFound extends Error {}
