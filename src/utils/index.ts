export * from "./checkPassword";
export * from "./checkPublicKey";
export * from "./generateAttributes";
export * from "./generateFileEntry";
export * from "./getLongname";
export * from "./getModeForAttributes";
export * from "./getStatusForError";
export * from "./normalizePath";
