// Raised when a backend cannot reach its underlying storage at all
// (as opposed to the storage answering that something is missing).
export class BackendUnavailableError extends Error {}
