export class SystemConfigurationError extends Error {}
