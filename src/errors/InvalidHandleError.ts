export class InvalidHandleError extends Error {}
