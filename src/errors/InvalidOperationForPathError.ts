// Raised when an operation is well formed but cannot apply to the
// given path, e.g. moving a directory inside itself.
export class InvalidOperationForPathError extends Error {}
