// Protocol errors are fatal to the SFTP stream they occur on.
export class ProtocolError extends Error {}
