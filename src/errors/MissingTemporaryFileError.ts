export class MissingTemporaryFileError extends Error {}
