import { ProtocolError } from "../errors";
import { SFTP_ATTRIBUTE_FLAG } from "../constants";

const UINT8_LENGTH = 1;
const UINT32_LENGTH = 4;
const UINT64_LENGTH = 8;

/**
 * Attributes as a client sends them (OPEN, MKDIR, SETSTAT).
 */
export interface SftpInputAttributes {
	size?: number;
	uid?: number;
	gid?: number;
	mode?: number;
	atime?: number;
	mtime?: number;
}

/**
 * Reads the fields of a single SFTP packet payload.  Running past the end of
 * the payload means the packet was malformed, which is a protocol error.
 *
 * See: Data Types
 * https://datatracker.ietf.org/doc/html/draft-ietf-secsh-filexfer-02#section-4
 */
export class SftpPacketReader {
	private readonly payload: Buffer;

	private offset = 0;

	public constructor(payload: Buffer) {
		this.payload = payload;
	}

	public get remaining(): number {
		return this.payload.length - this.offset;
	}

	public readUInt8(): number {
		this.assertAvailable(UINT8_LENGTH);
		const value = this.payload.readUInt8(this.offset);
		this.offset += UINT8_LENGTH;
		return value;
	}

	public readUInt32(): number {
		this.assertAvailable(UINT32_LENGTH);
		const value = this.payload.readUInt32BE(this.offset);
		this.offset += UINT32_LENGTH;
		return value;
	}

	public readUInt64(): number {
		this.assertAvailable(UINT64_LENGTH);
		const value = this.payload.readBigUInt64BE(this.offset);
		this.offset += UINT64_LENGTH;
		if (value > BigInt(Number.MAX_SAFE_INTEGER)) {
			throw new ProtocolError(
				`Malformed packet: 64-bit value ${value.toString()} is out of range.`,
			);
		}
		return Number(value);
	}

	public readString(): Buffer {
		const length = this.readUInt32();
		this.assertAvailable(length);
		const value = this.payload.subarray(this.offset, this.offset + length);
		this.offset += length;
		return value;
	}

	public readUtf8String(): string {
		return this.readString().toString("utf8");
	}

	/**
	 * See: File Attributes
	 * https://datatracker.ietf.org/doc/html/draft-ietf-secsh-filexfer-02#section-5
	 */
	public readAttributes(): SftpInputAttributes {
		/* eslint-disable no-bitwise */
		const flags = this.readUInt32();
		const attributes: SftpInputAttributes = {};
		if ((flags & SFTP_ATTRIBUTE_FLAG.SIZE) !== 0) {
			attributes.size = this.readUInt64();
		}
		if ((flags & SFTP_ATTRIBUTE_FLAG.UIDGID) !== 0) {
			attributes.uid = this.readUInt32();
			attributes.gid = this.readUInt32();
		}
		if ((flags & SFTP_ATTRIBUTE_FLAG.PERMISSIONS) !== 0) {
			attributes.mode = this.readUInt32();
		}
		if ((flags & SFTP_ATTRIBUTE_FLAG.ACMODTIME) !== 0) {
			attributes.atime = this.readUInt32();
			attributes.mtime = this.readUInt32();
		}
		if ((flags & SFTP_ATTRIBUTE_FLAG.EXTENDED) !== 0) {
			const extendedCount = this.readUInt32();
			for (let i = 0; i < extendedCount; i += 1) {
				this.readString(); // extended type
				this.readString(); // extended data
			}
		}
		/* eslint-enable no-bitwise */
		return attributes;
	}

	private assertAvailable(length: number): void {
		if (this.offset + length > this.payload.length) {
			throw new ProtocolError(
				`Malformed packet: expected ${String(length)} more bytes but only ${String(this.remaining)} remain.`,
			);
		}
	}
}
