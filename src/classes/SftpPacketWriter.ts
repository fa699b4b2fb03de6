import { SFTP_ATTRIBUTE_FLAG } from "../constants";
import { getModeForAttributes } from "../utils";
import type { FileAttributes } from "../types";

const UINT32_LENGTH = 4;

/**
 * Builds a single length-prefixed SFTP packet.
 */
export class SftpPacketWriter {
	private readonly chunks: Buffer[] = [];

	public constructor(packetType: number) {
		this.writeUInt8(packetType);
	}

	public writeUInt8(value: number): this {
		const chunk = Buffer.alloc(1);
		chunk.writeUInt8(value);
		this.chunks.push(chunk);
		return this;
	}

	public writeUInt32(value: number): this {
		const chunk = Buffer.alloc(UINT32_LENGTH);
		chunk.writeUInt32BE(value);
		this.chunks.push(chunk);
		return this;
	}

	public writeUInt64(value: number): this {
		const chunk = Buffer.alloc(8);
		chunk.writeBigUInt64BE(BigInt(value));
		this.chunks.push(chunk);
		return this;
	}

	public writeString(value: Buffer | string): this {
		const data = typeof value === "string" ? Buffer.from(value, "utf8") : value;
		this.writeUInt32(data.length);
		this.chunks.push(data);
		return this;
	}

	/**
	 * Only fields the attributes actually carry are flagged and written.
	 */
	public writeAttributes(attributes: FileAttributes): this {
		/* eslint-disable no-bitwise */
		const mode = getModeForAttributes(attributes);
		const hasOwner = attributes.uid !== undefined && attributes.gid !== undefined;
		let flags = 0;
		if (attributes.size !== undefined) {
			flags |= SFTP_ATTRIBUTE_FLAG.SIZE;
		}
		if (hasOwner) {
			flags |= SFTP_ATTRIBUTE_FLAG.UIDGID;
		}
		if (mode !== undefined) {
			flags |= SFTP_ATTRIBUTE_FLAG.PERMISSIONS;
		}
		if (attributes.mtime !== undefined) {
			flags |= SFTP_ATTRIBUTE_FLAG.ACMODTIME;
		}
		/* eslint-enable no-bitwise */

		this.writeUInt32(flags);
		if (attributes.size !== undefined) {
			this.writeUInt64(attributes.size);
		}
		if (hasOwner) {
			this.writeUInt32(attributes.uid ?? 0);
			this.writeUInt32(attributes.gid ?? 0);
		}
		if (mode !== undefined) {
			this.writeUInt32(mode);
		}
		if (attributes.mtime !== undefined) {
			this.writeUInt32(attributes.atime ?? attributes.mtime);
			this.writeUInt32(attributes.mtime);
		}
		return this;
	}

	public toBuffer(): Buffer {
		const payload = Buffer.concat(this.chunks);
		const header = Buffer.alloc(UINT32_LENGTH);
		header.writeUInt32BE(payload.length);
		return Buffer.concat([header, payload]);
	}
}
