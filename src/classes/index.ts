export * from "./HandleManager";
export * from "./SftpPacketReader";
export * from "./SftpPacketWriter";
export * from "./SftpSessionHandler";
export * from "./SshConnectionHandler";
export * from "./SshSessionHandler";
export * from "./TemporaryFileManager";
