export class FileSystemObjectAlreadyExists extends Error {}
