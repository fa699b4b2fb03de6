export const MS_PER_SECOND = 1000;

export const DEFAULT_SSH_PORT = 2222;

export const DEFAULT_SSH_HOST = "127.0.0.1";

export const DEFAULT_FILE_ATTRIBUTES = {
	OWNER_NAME: "nobody",
	GROUP_NAME: "nogroup",
	FILE_PERMISSIONS: 0o644,
	DIRECTORY_PERMISSIONS: 0o755,
};

// https://datatracker.ietf.org/doc/html/draft-ietf-secsh-filexfer-02#section-3
export const SFTP_PROTOCOL_VERSION = 3;

// The largest packet OpenSSH will send, plus room for the packet header.
export const MAXIMUM_SFTP_PACKET_LENGTH = 256 * 1024 + 1024;

export const READDIR_PAGE_SIZE = 100;

export const SFTP_PACKET_TYPE = {
	INIT: 1,
	VERSION: 2,
	OPEN: 3,
	CLOSE: 4,
	READ: 5,
	WRITE: 6,
	LSTAT: 7,
	FSTAT: 8,
	SETSTAT: 9,
	FSETSTAT: 10,
	OPENDIR: 11,
	READDIR: 12,
	REMOVE: 13,
	MKDIR: 14,
	RMDIR: 15,
	REALPATH: 16,
	STAT: 17,
	RENAME: 18,
	READLINK: 19,
	SYMLINK: 20,
	STATUS: 101,
	HANDLE: 102,
	DATA: 103,
	NAME: 104,
	ATTRS: 105,
	EXTENDED: 200,
	EXTENDED_REPLY: 201,
} as const;

export const SFTP_ATTRIBUTE_FLAG = {
	SIZE: 0x00000001,
	UIDGID: 0x00000002,
	PERMISSIONS: 0x00000004,
	ACMODTIME: 0x00000008,
	EXTENDED: 0x80000000,
} as const;
