import ssh2 from "ssh2";
import { logger } from "../logger";
import {
	MAXIMUM_SFTP_PACKET_LENGTH,
	SFTP_PACKET_TYPE,
	SFTP_PROTOCOL_VERSION,
} from "../constants";
import {
	FileSystemObjectAlreadyExists,
	FileSystemObjectNotFound,
	InvalidOperationForPathError,
	IsADirectoryError,
	NotADirectoryError,
	ProtocolError,
} from "../errors";
import {
	generateFileEntry,
	getParentPath,
	getStatusForError,
	isRootPath,
	normalizePath,
} from "../utils";
import { HandleManager } from "./HandleManager";
import { SftpPacketReader } from "./SftpPacketReader";
import { SftpPacketWriter } from "./SftpPacketWriter";
import type { Duplex } from "node:stream";
import type { SftpInputAttributes } from "./SftpPacketReader";
import type { FileEntry } from "../utils";
import type {
	FileAttributes,
	NormalizedPath,
	StorageBackend,
} from "../types";

const SFTP_STATUS_CODE = ssh2.utils.sftp.STATUS_CODE;
const SFTP_OPEN_MODE = ssh2.utils.sftp.OPEN_MODE;

const PACKET_LENGTH_HEADER_SIZE = 4;

export enum SftpSessionState {
	AwaitingVersion = "awaitingVersion",
	Negotiated = "negotiated",
	Closed = "closed",
}

const getStatusCodeName = (code: number): string =>
	Object.entries(SFTP_STATUS_CODE).find(([, value]) => value === code)?.[0] ??
	String(code);

// eslint-disable-next-line no-bitwise
const hasFlag = (flags: number, flag: number): boolean => (flags & flag) !== 0;

/**
 * The SFTP protocol engine for a single channel.
 *
 * Inbound bytes are framed into packets and dispatched as soon as they are
 * decoded; replies are written whenever their operation completes and carry
 * the request id they answer, so they can leave in any order.  Only the
 * version exchange is accepted until it has happened.  Malformed packets end
 * the stream; every other failure is answered with a status reply.
 *
 * See: SSH File Transfer Protocol
 * https://datatracker.ietf.org/doc/html/draft-ietf-secsh-filexfer-02
 */
export class SftpSessionHandler {
	private readonly sftpConnection: Duplex;

	private readonly backend: StorageBackend;

	private readonly handleManager: HandleManager;

	private inboundBuffer = Buffer.alloc(0);

	private sessionState = SftpSessionState.AwaitingVersion;

	private negotiatedVersion?: number;

	public constructor(
		sftpConnection: Duplex,
		backend: StorageBackend,
		handleManager = new HandleManager(backend),
	) {
		this.sftpConnection = sftpConnection;
		this.backend = backend;
		this.handleManager = handleManager;
	}

	public get state(): SftpSessionState {
		return this.sessionState;
	}

	public get protocolVersion(): number | undefined {
		return this.negotiatedVersion;
	}

	public onData(chunk: Buffer): void {
		if (this.sessionState === SftpSessionState.Closed) {
			return;
		}
		this.inboundBuffer = Buffer.concat([this.inboundBuffer, chunk]);
		try {
			while (this.inboundBuffer.length >= PACKET_LENGTH_HEADER_SIZE) {
				const packetLength = this.inboundBuffer.readUInt32BE(0);
				if (packetLength === 0 || packetLength > MAXIMUM_SFTP_PACKET_LENGTH) {
					throw new ProtocolError(
						`Invalid packet length: ${String(packetLength)}.`,
					);
				}
				const packetEnd = PACKET_LENGTH_HEADER_SIZE + packetLength;
				if (this.inboundBuffer.length < packetEnd) {
					return;
				}
				const packet = this.inboundBuffer.subarray(
					PACKET_LENGTH_HEADER_SIZE,
					packetEnd,
				);
				this.inboundBuffer = this.inboundBuffer.subarray(packetEnd);
				this.processPacket(packet);
				if (this.state === SftpSessionState.Closed) {
					return;
				}
			}
		} catch (err: unknown) {
			if (err instanceof ProtocolError) {
				this.terminate(err);
				return;
			}
			throw err;
		}
	}

	/**
	 * The client ended its side of the channel.
	 */
	public onEnd(): void {
		logger.verbose("SFTP client ended the stream");
		this.sftpConnection.end();
	}

	/**
	 * The transport is gone.  Open handles are dropped and spooled uploads are
	 * discarded rather than committed.
	 */
	public onClose(): void {
		logger.verbose("SFTP stream closed");
		this.sessionState = SftpSessionState.Closed;
		this.inboundBuffer = Buffer.alloc(0);
		this.handleManager.dropAll().catch((err: unknown) => {
			logger.warn("Failed to discard open handles after the stream closed");
			logger.debug(err);
		});
	}

	public onError(error: Error): void {
		logger.verbose("SFTP stream error", { message: error.message });
	}

	/**
	 * See: Protocol Initialization
	 * https://datatracker.ietf.org/doc/html/draft-ietf-secsh-filexfer-02#section-4
	 */
	public initHandler(clientVersion: number): void {
		logger.verbose("Request: SFTP initialization (SSH_FXP_INIT)", {
			clientVersion,
		});
		if (clientVersion < SFTP_PROTOCOL_VERSION) {
			throw new ProtocolError(
				`Unsupported SFTP protocol version: ${String(clientVersion)}.`,
			);
		}
		const version = Math.min(clientVersion, SFTP_PROTOCOL_VERSION);
		this.negotiatedVersion = version;
		this.sessionState = SftpSessionState.Negotiated;
		logger.verbose("Response: Version", { version });
		this.send(
			new SftpPacketWriter(SFTP_PACKET_TYPE.VERSION).writeUInt32(version),
		);
	}

	/**
	 * See: Opening, Creating, and Closing Files
	 * https://datatracker.ietf.org/doc/html/draft-ietf-secsh-filexfer-02#section-6.3
	 */
	public openHandler(
		reqId: number,
		filePath: string,
		flags: number,
		attrs: SftpInputAttributes,
	): void {
		logger.verbose("Request: SFTP file open (SSH_FXP_OPEN)", {
			reqId,
			filePath,
			flags: ssh2.utils.sftp.flagsToString(flags) ?? flags,
			attrs,
		});
		this.runRequest(reqId, async () => {
			const path = normalizePath(filePath);
			if (hasFlag(flags, SFTP_OPEN_MODE.APPEND)) {
				this.sendStatus(
					reqId,
					SFTP_STATUS_CODE.OP_UNSUPPORTED,
					"Append operations are not supported by this server.",
				);
				return;
			}
			let handleId: number;
			if (hasFlag(flags, SFTP_OPEN_MODE.WRITE)) {
				handleId = await this.openFileForWrite(path, flags);
			} else if (hasFlag(flags, SFTP_OPEN_MODE.READ)) {
				handleId = await this.openFileForRead(path);
			} else {
				this.sendStatus(
					reqId,
					SFTP_STATUS_CODE.FAILURE,
					`Unsupported flag value: ${String(flags)}.`,
				);
				return;
			}
			this.sendHandle(reqId, handleId, path);
		});
	}

	/**
	 * See: Reading and Writing
	 * https://datatracker.ietf.org/doc/html/draft-ietf-secsh-filexfer-02#section-6.4
	 */
	public readHandler(
		reqId: number,
		handle: Buffer,
		offset: number,
		length: number,
	): void {
		logger.verbose("Request: SFTP read file (SSH_FXP_READ)", {
			reqId,
			handle: handle.toString(),
			offset,
			length,
		});
		this.runRequest(reqId, async () => {
			const handleId = HandleManager.parseHandle(handle);
			const data = await this.handleManager.read(handleId, length, offset);
			if (data === null) {
				this.sendStatus(reqId, SFTP_STATUS_CODE.EOF);
				return;
			}
			logger.verbose("Response: Data", { reqId, length: data.length });
			logger.silly("Sent data...", { data });
			this.send(
				new SftpPacketWriter(SFTP_PACKET_TYPE.DATA)
					.writeUInt32(reqId)
					.writeString(data),
			);
		});
	}

	/**
	 * See: Reading and Writing
	 * https://datatracker.ietf.org/doc/html/draft-ietf-secsh-filexfer-02#section-6.4
	 */
	public writeHandler(
		reqId: number,
		handle: Buffer,
		offset: number,
		data: Buffer,
	): void {
		logger.verbose("Request: SFTP write file (SSH_FXP_WRITE)", {
			reqId,
			handle: handle.toString(),
			offset,
			length: data.length,
		});
		logger.silly("Request Data:", { reqId, data });
		this.runRequest(reqId, async () => {
			const handleId = HandleManager.parseHandle(handle);
			await this.handleManager.write(handleId, data, offset);
			this.sendStatus(reqId, SFTP_STATUS_CODE.OK);
		});
	}

	/**
	 * See: Opening, Creating, and Closing Files
	 * https://datatracker.ietf.org/doc/html/draft-ietf-secsh-filexfer-02#section-6.3
	 */
	public closeHandler(reqId: number, handle: Buffer): void {
		logger.verbose("Request: SFTP close file (SSH_FXP_CLOSE)", {
			reqId,
			handle: handle.toString(),
		});
		this.runRequest(reqId, async () => {
			const handleId = HandleManager.parseHandle(handle);
			await this.handleManager.close(handleId);
			this.sendStatus(reqId, SFTP_STATUS_CODE.OK);
		});
	}

	/**
	 * See: Retrieving File Attributes
	 * https://datatracker.ietf.org/doc/html/draft-ietf-secsh-filexfer-02#section-6.8
	 */
	public fstatHandler(reqId: number, handle: Buffer): void {
		logger.verbose("Request: SFTP read open file statistics (SSH_FXP_FSTAT)", {
			reqId,
			handle: handle.toString(),
		});
		this.runRequest(reqId, async () => {
			const handleId = HandleManager.parseHandle(handle);
			const attributes = await this.handleManager.stat(handleId);
			this.sendAttrs(reqId, attributes);
		});
	}

	/**
	 * Attributes are not stored by any backend, so changes are acknowledged
	 * and otherwise ignored.
	 *
	 * See: Setting File Attributes
	 * https://datatracker.ietf.org/doc/html/draft-ietf-secsh-filexfer-02#section-6.9
	 */
	public fsetStatHandler(
		reqId: number,
		handle: Buffer,
		attrs: SftpInputAttributes,
	): void {
		logger.verbose(
			"Request: SFTP write open file statistics (SSH_FXP_FSETSTAT)",
			{ reqId, handle: handle.toString(), attrs },
		);
		this.sendStatus(reqId, SFTP_STATUS_CODE.OK);
	}

	/**
	 * See: Setting File Attributes
	 * https://datatracker.ietf.org/doc/html/draft-ietf-secsh-filexfer-02#section-6.9
	 */
	public setStatHandler(
		reqId: number,
		filePath: string,
		attrs: SftpInputAttributes,
	): void {
		logger.verbose(
			"Request: SFTP set file attributes request (SSH_FXP_SETSTAT)",
			{ reqId, path: filePath, attrs },
		);
		this.sendStatus(reqId, SFTP_STATUS_CODE.OK);
	}

	/**
	 * See: Scanning Directories
	 * https://datatracker.ietf.org/doc/html/draft-ietf-secsh-filexfer-02#section-6.7
	 */
	public openDirHandler(reqId: number, dirPath: string): void {
		logger.verbose("Request: SFTP open directory (SSH_FXP_OPENDIR)", {
			reqId,
			dirPath,
		});
		this.runRequest(reqId, async () => {
			const path = normalizePath(dirPath);
			const attributes = await this.backend.fileInfo(path);
			if (attributes.type !== "directory") {
				throw new NotADirectoryError(
					"This path is not a directory, so it cannot be listed.",
				);
			}
			const handleId = this.handleManager.openDir(path);
			this.sendHandle(reqId, handleId, path);
		});
	}

	/**
	 * See: Scanning Directories
	 * https://datatracker.ietf.org/doc/html/draft-ietf-secsh-filexfer-02#section-6.7
	 */
	public readDirHandler(reqId: number, handle: Buffer): void {
		logger.verbose("Request: SFTP read directory (SSH_FXP_READDIR)", {
			reqId,
			handle: handle.toString(),
		});
		this.runRequest(reqId, async () => {
			const handleId = HandleManager.parseHandle(handle);
			const entries = await this.handleManager.readDir(handleId);
			if (entries.length === 0) {
				this.sendStatus(reqId, SFTP_STATUS_CODE.EOF);
				return;
			}
			this.sendName(
				reqId,
				entries.map((entry) => generateFileEntry(entry.name, entry.attributes)),
			);
		});
	}

	/**
	 * There are no symbolic links in the virtual file system, so this is the
	 * same as STAT.
	 *
	 * See: Retrieving File Attributes
	 * https://datatracker.ietf.org/doc/html/draft-ietf-secsh-filexfer-02#section-6.8
	 */
	public lstatHandler(reqId: number, itemPath: string): void {
		logger.verbose(
			"Request: SFTP read file statistics without following symbolic links (SSH_FXP_LSTAT)",
			{ reqId, itemPath },
		);
		this.genericStatHandler(reqId, itemPath);
	}

	/**
	 * See: Retrieving File Attributes
	 * https://datatracker.ietf.org/doc/html/draft-ietf-secsh-filexfer-02#section-6.8
	 */
	public statHandler(reqId: number, itemPath: string): void {
		logger.verbose(
			"Request: SFTP read file statistics following symbolic links (SSH_FXP_STAT)",
			{ reqId, itemPath },
		);
		this.genericStatHandler(reqId, itemPath);
	}

	/**
	 * See: Removing and Renaming Files
	 * https://datatracker.ietf.org/doc/html/draft-ietf-secsh-filexfer-02#section-6.5
	 */
	public removeHandler(reqId: number, filePath: string): void {
		logger.verbose("Request: SFTP remove file (SSH_FXP_REMOVE)", {
			reqId,
			filePath,
		});
		this.runRequest(reqId, async () => {
			await this.backend.delete(normalizePath(filePath));
			this.sendStatus(reqId, SFTP_STATUS_CODE.OK);
		});
	}

	/**
	 * See: Removing and Renaming Files
	 * https://datatracker.ietf.org/doc/html/draft-ietf-secsh-filexfer-02#section-6.5
	 */
	public renameHandler(reqId: number, oldPath: string, newPath: string): void {
		logger.verbose("Request: SFTP file rename (SSH_FXP_RENAME)", {
			reqId,
			oldPath,
			newPath,
		});
		this.runRequest(reqId, async () => {
			await this.backend.rename(normalizePath(oldPath), normalizePath(newPath));
			this.sendStatus(reqId, SFTP_STATUS_CODE.OK);
		});
	}

	/**
	 * See: Creating and Deleting Directories
	 * https://datatracker.ietf.org/doc/html/draft-ietf-secsh-filexfer-02#section-6.6
	 */
	public mkDirHandler(
		reqId: number,
		dirPath: string,
		attrs: SftpInputAttributes,
	): void {
		logger.verbose("Request: SFTP create directory (SSH_FXP_MKDIR)", {
			reqId,
			path: dirPath,
			attrs,
		});
		this.runRequest(reqId, async () => {
			await this.backend.makeDir(normalizePath(dirPath));
			this.sendStatus(reqId, SFTP_STATUS_CODE.OK);
		});
	}

	/**
	 * See: Creating and Deleting Directories
	 * https://datatracker.ietf.org/doc/html/draft-ietf-secsh-filexfer-02#section-6.6
	 */
	public rmDirHandler(reqId: number, directoryPath: string): void {
		logger.verbose("Request: SFTP remove directory path (SSH_FXP_RMDIR)", {
			reqId,
			directoryPath,
		});
		this.runRequest(reqId, async () => {
			await this.backend.delDir(normalizePath(directoryPath));
			this.sendStatus(reqId, SFTP_STATUS_CODE.OK);
		});
	}

	/**
	 * Paths that do not exist yet still canonicalize (clients resolve upload
	 * targets this way); they are reported without attributes.
	 *
	 * See: Canonicalizing the Server-Side Path Name
	 * https://datatracker.ietf.org/doc/html/draft-ietf-secsh-filexfer-02#section-6.11
	 */
	public realPathHandler(reqId: number, relativePath: string): void {
		logger.verbose("Request: SFTP canonicalize path (SSH_FXP_REALPATH)", {
			reqId,
			relativePath,
		});
		this.runRequest(reqId, async () => {
			const path = normalizePath(relativePath);
			const attributes = (await this.getAttributesIfExists(path)) ?? {
				type: "other",
			};
			this.sendName(reqId, [
				{ filename: path, longname: path, attributes },
			]);
		});
	}

	/**
	 * See: Dealing with Symbolic Links
	 * https://datatracker.ietf.org/doc/html/draft-ietf-secsh-filexfer-02#section-6.10
	 */
	public readLinkHandler(reqId: number, linkPath: string): void {
		logger.verbose("Request: SFTP read link (SSH_FXP_READLINK)", {
			reqId,
			linkPath,
		});
		this.sendStatus(
			reqId,
			SFTP_STATUS_CODE.OP_UNSUPPORTED,
			"Symlinks are not supported by this server.",
		);
	}

	/**
	 * See: Dealing with Symbolic links
	 * https://datatracker.ietf.org/doc/html/draft-ietf-secsh-filexfer-02#section-6.10
	 */
	public symLinkHandler(
		reqId: number,
		linkPath: string,
		targetPath: string,
	): void {
		logger.verbose("Request: SFTP create symlink (SSH_FXP_SYMLINK)", {
			reqId,
			linkPath,
			targetPath,
		});
		this.sendStatus(
			reqId,
			SFTP_STATUS_CODE.OP_UNSUPPORTED,
			"Symlinks are not supported by this server.",
		);
	}

	/**
	 * See: Extensions
	 * https://datatracker.ietf.org/doc/html/draft-ietf-secsh-filexfer-02#section-8
	 */
	public unsupportedHandler(reqId: number, description: string): void {
		logger.verbose("Request: Unsupported SFTP operation", {
			reqId,
			description,
		});
		this.sendStatus(
			reqId,
			SFTP_STATUS_CODE.OP_UNSUPPORTED,
			`This operation is not supported by this server: ${description}.`,
		);
	}

	private processPacket(packet: Buffer): void {
		const reader = new SftpPacketReader(packet);
		const packetType = reader.readUInt8();

		if (this.sessionState === SftpSessionState.AwaitingVersion) {
			if (packetType !== SFTP_PACKET_TYPE.INIT) {
				throw new ProtocolError(
					`Received packet type ${String(packetType)} before version negotiation.`,
				);
			}
			this.initHandler(reader.readUInt32());
			return;
		}
		if (packetType === SFTP_PACKET_TYPE.INIT) {
			throw new ProtocolError("Received a second version negotiation.");
		}

		const reqId = reader.readUInt32();
		switch (packetType) {
			case SFTP_PACKET_TYPE.OPEN:
				this.openHandler(
					reqId,
					reader.readUtf8String(),
					reader.readUInt32(),
					reader.readAttributes(),
				);
				break;
			case SFTP_PACKET_TYPE.CLOSE:
				this.closeHandler(reqId, reader.readString());
				break;
			case SFTP_PACKET_TYPE.READ:
				this.readHandler(
					reqId,
					reader.readString(),
					reader.readUInt64(),
					reader.readUInt32(),
				);
				break;
			case SFTP_PACKET_TYPE.WRITE:
				this.writeHandler(
					reqId,
					reader.readString(),
					reader.readUInt64(),
					reader.readString(),
				);
				break;
			case SFTP_PACKET_TYPE.LSTAT:
				this.lstatHandler(reqId, reader.readUtf8String());
				break;
			case SFTP_PACKET_TYPE.FSTAT:
				this.fstatHandler(reqId, reader.readString());
				break;
			case SFTP_PACKET_TYPE.SETSTAT:
				this.setStatHandler(
					reqId,
					reader.readUtf8String(),
					reader.readAttributes(),
				);
				break;
			case SFTP_PACKET_TYPE.FSETSTAT:
				this.fsetStatHandler(
					reqId,
					reader.readString(),
					reader.readAttributes(),
				);
				break;
			case SFTP_PACKET_TYPE.OPENDIR:
				this.openDirHandler(reqId, reader.readUtf8String());
				break;
			case SFTP_PACKET_TYPE.READDIR:
				this.readDirHandler(reqId, reader.readString());
				break;
			case SFTP_PACKET_TYPE.REMOVE:
				this.removeHandler(reqId, reader.readUtf8String());
				break;
			case SFTP_PACKET_TYPE.MKDIR:
				this.mkDirHandler(
					reqId,
					reader.readUtf8String(),
					reader.readAttributes(),
				);
				break;
			case SFTP_PACKET_TYPE.RMDIR:
				this.rmDirHandler(reqId, reader.readUtf8String());
				break;
			case SFTP_PACKET_TYPE.REALPATH:
				this.realPathHandler(reqId, reader.readUtf8String());
				break;
			case SFTP_PACKET_TYPE.STAT:
				this.statHandler(reqId, reader.readUtf8String());
				break;
			case SFTP_PACKET_TYPE.RENAME:
				this.renameHandler(
					reqId,
					reader.readUtf8String(),
					reader.readUtf8String(),
				);
				break;
			case SFTP_PACKET_TYPE.READLINK:
				this.readLinkHandler(reqId, reader.readUtf8String());
				break;
			case SFTP_PACKET_TYPE.SYMLINK:
				this.symLinkHandler(
					reqId,
					reader.readUtf8String(),
					reader.readUtf8String(),
				);
				break;
			case SFTP_PACKET_TYPE.EXTENDED:
				this.unsupportedHandler(
					reqId,
					`extended request "${reader.readUtf8String()}"`,
				);
				break;
			default:
				this.unsupportedHandler(
					reqId,
					`packet type ${String(packetType)}`,
				);
		}
	}

	private genericStatHandler(reqId: number, itemPath: string): void {
		this.runRequest(reqId, async () => {
			const attributes = await this.backend.fileInfo(normalizePath(itemPath));
			this.sendAttrs(reqId, attributes);
		});
	}

	private async openFileForRead(path: NormalizedPath): Promise<number> {
		const attributes = await this.backend.fileInfo(path);
		if (attributes.type === "directory") {
			throw new IsADirectoryError(
				"This path is a directory, so it cannot be opened as a file.",
			);
		}
		if (attributes.type !== "file") {
			throw new InvalidOperationForPathError(
				"This path is not a regular file, so it cannot be opened.",
			);
		}
		return this.handleManager.openFile(path, "read");
	}

	private async openFileForWrite(
		path: NormalizedPath,
		flags: number,
	): Promise<number> {
		if (isRootPath(path)) {
			throw new IsADirectoryError("The root directory cannot be written to.");
		}
		// The parent must exist even though nothing is stored until close.
		const parentAttributes = await this.backend.fileInfo(getParentPath(path));
		if (parentAttributes.type !== "directory") {
			throw new NotADirectoryError(
				"The parent of this path is not a directory.",
			);
		}
		const existingAttributes = await this.getAttributesIfExists(path);
		if (existingAttributes?.type === "directory") {
			throw new IsADirectoryError(
				"This path already exists as a directory.",
			);
		}
		if (
			existingAttributes !== undefined &&
			hasFlag(flags, SFTP_OPEN_MODE.EXCL)
		) {
			throw new FileSystemObjectAlreadyExists(
				`A file already exists at ${path}.`,
			);
		}
		if (
			existingAttributes === undefined &&
			!hasFlag(flags, SFTP_OPEN_MODE.CREAT)
		) {
			throw new FileSystemObjectNotFound(
				"This path does not point to an existing file, so it cannot be opened.",
			);
		}
		const initialContent =
			existingAttributes !== undefined && !hasFlag(flags, SFTP_OPEN_MODE.TRUNC)
				? await this.backend.readFile(path)
				: undefined;
		return this.handleManager.openFile(path, "write", { initialContent });
	}

	private async getAttributesIfExists(
		path: NormalizedPath,
	): Promise<FileAttributes | undefined> {
		try {
			return await this.backend.fileInfo(path);
		} catch (err: unknown) {
			if (err instanceof FileSystemObjectNotFound) {
				return undefined;
			}
			throw err;
		}
	}

	private runRequest(reqId: number, operation: () => Promise<void>): void {
		operation().catch((err: unknown) => {
			const { code, message, isExpected } = getStatusForError(err);
			if (!isExpected) {
				logger.warn("Unexpected failure when handling an SFTP request", {
					reqId,
				});
				logger.debug(err);
			}
			this.sendStatus(reqId, code, message);
		});
	}

	private sendStatus(reqId: number, code: number, message = ""): void {
		logger.verbose(`Response: Status (${getStatusCodeName(code)})`, {
			reqId,
			code,
			message,
		});
		this.send(
			new SftpPacketWriter(SFTP_PACKET_TYPE.STATUS)
				.writeUInt32(reqId)
				.writeUInt32(code)
				.writeString(message)
				.writeString(""),
		);
	}

	private sendHandle(
		reqId: number,
		handleId: number,
		path: NormalizedPath,
	): void {
		logger.verbose("Response: Handle", { reqId, handle: handleId, path });
		this.send(
			new SftpPacketWriter(SFTP_PACKET_TYPE.HANDLE)
				.writeUInt32(reqId)
				.writeString(HandleManager.formatHandle(handleId)),
		);
	}

	private sendName(reqId: number, names: FileEntry[]): void {
		logger.verbose("Response: Name", {
			reqId,
			names: names.map(({ filename }) => filename),
		});
		const writer = new SftpPacketWriter(SFTP_PACKET_TYPE.NAME)
			.writeUInt32(reqId)
			.writeUInt32(names.length);
		names.forEach(({ filename, longname, attributes }) => {
			writer
				.writeString(filename)
				.writeString(longname)
				.writeAttributes(attributes);
		});
		this.send(writer);
	}

	private sendAttrs(reqId: number, attributes: FileAttributes): void {
		logger.verbose("Response: Attrs", { reqId, attributes });
		this.send(
			new SftpPacketWriter(SFTP_PACKET_TYPE.ATTRS)
				.writeUInt32(reqId)
				.writeAttributes(attributes),
		);
	}

	private send(writer: SftpPacketWriter): void {
		if (this.sessionState === SftpSessionState.Closed) {
			logger.silly("Discarding reply for a closed SFTP stream");
			return;
		}
		this.sftpConnection.write(writer.toBuffer());
	}

	private terminate(err: ProtocolError): void {
		logger.warn("Closing SFTP stream after a protocol error", {
			message: err.message,
		});
		this.sessionState = SftpSessionState.Closed;
		this.inboundBuffer = Buffer.alloc(0);
		this.sftpConnection.end();
		this.handleManager.dropAll().catch((dropError: unknown) => {
			logger.warn("Failed to discard open handles after a protocol error");
			logger.debug(dropError);
		});
	}
}
