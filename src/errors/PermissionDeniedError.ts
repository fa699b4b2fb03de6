export class PermissionDeniedError extends Error {}
