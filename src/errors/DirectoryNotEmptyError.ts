export class DirectoryNotEmptyError extends Error {}
