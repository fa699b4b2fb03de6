export class NotADirectoryError extends Error {}
