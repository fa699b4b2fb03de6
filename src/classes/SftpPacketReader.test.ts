import { ProtocolError } from "../errors";
import { SftpPacketReader } from "./SftpPacketReader";

describe("SftpPacketReader", () => {
	it("should read fields in order", () => {
		const reader = new SftpPacketReader(
			Buffer.from("03000000090000000568656c6c6f", "hex"),
		);

		expect(reader.readUInt8()).toBe(3);
		expect(reader.readUInt32()).toBe(9);
		expect(reader.readUtf8String()).toBe("hello");
		expect(reader.remaining).toBe(0);
	});

	it("should read 64-bit values", () => {
		const reader = new SftpPacketReader(
			Buffer.from("0000000100000005", "hex"),
		);

		expect(reader.readUInt64()).toBe(2 ** 32 + 5);
	});

	it("should refuse 64-bit values beyond the safe integer range", () => {
		const reader = new SftpPacketReader(
			Buffer.from("ffffffffffffffff", "hex"),
		);

		expect(() => reader.readUInt64()).toThrow(ProtocolError);
	});

	it("should refuse to read past the end of the packet", () => {
		const reader = new SftpPacketReader(Buffer.from("0000000a6869", "hex"));

		expect(() => reader.readString()).toThrow(
			"Malformed packet: expected 10 more bytes but only 2 remain.",
		);
	});

	it("should read attributes and skip extended pairs", () => {
		const reader = new SftpPacketReader(
			Buffer.from(
				[
					"8000000d", // EXTENDED | ACMODTIME | PERMISSIONS | SIZE
					"0000000000000400",
					"000081a4",
					"00000001",
					"00000002",
					"00000001",
					"00000001",
					"61",
					"00000001",
					"62",
					"ff",
				].join(""),
				"hex",
			),
		);

		expect(reader.readAttributes()).toEqual({
			size: 1024,
			mode: 0o100644,
			atime: 1,
			mtime: 2,
		});
		expect(reader.readUInt8()).toBe(0xff);
	});
});
