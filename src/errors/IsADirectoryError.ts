export class IsADirectoryError extends Error {}
