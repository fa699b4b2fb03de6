import { utils } from "ssh2";
import { checkPublicKey } from "./checkPublicKey";
import type { ParsedKey } from "ssh2";

const parseTestKey = (keyData: string): ParsedKey => {
	const parsedKey = utils.parseKey(keyData);
	if (parsedKey instanceof Error) {
		throw parsedKey;
	}
	return parsedKey;
};

const createTestKeyPair = (): { privateKey: ParsedKey; publicKey: ParsedKey } => {
	const keyPair = utils.generateKeyPairSync("ed25519");
	return {
		privateKey: parseTestKey(keyPair.private),
		publicKey: parseTestKey(keyPair.public),
	};
};

const signTestBlob = (privateKey: ParsedKey, blob: Buffer): Buffer => {
	const signature = privateKey.sign(blob);
	if (!Buffer.isBuffer(signature)) {
		throw new Error("The test key could not sign");
	}
	return signature;
};

describe("checkPublicKey", () => {
	const authorized = createTestKeyPair();
	const stranger = createTestKeyPair();
	const blob = Buffer.from("session identifier and request");

	const offer = (key: ParsedKey): { algo: string; data: Buffer } => ({
		algo: key.type,
		data: key.getPublicSSH(),
	});

	it("should accept an authorized key offered without a signature", () => {
		expect(checkPublicKey([authorized.publicKey], offer(authorized.publicKey))).toBe(
			true,
		);
	});

	it("should refuse a key that is not authorized", () => {
		expect(
			checkPublicKey([authorized.publicKey], offer(stranger.publicKey)),
		).toBe(false);
	});

	it("should refuse every key when none are authorized", () => {
		expect(checkPublicKey([], offer(authorized.publicKey))).toBe(false);
	});

	it("should accept a valid signature from an authorized key", () => {
		expect(
			checkPublicKey([authorized.publicKey], offer(authorized.publicKey), {
				blob,
				signature: signTestBlob(authorized.privateKey, blob),
			}),
		).toBe(true);
	});

	it("should refuse a signature made with another key", () => {
		expect(
			checkPublicKey([authorized.publicKey], offer(authorized.publicKey), {
				blob,
				signature: signTestBlob(stranger.privateKey, blob),
			}),
		).toBe(false);
	});

	it("should refuse a key whose algorithm does not match", () => {
		expect(
			checkPublicKey([authorized.publicKey], {
				algo: "ssh-rsa",
				data: authorized.publicKey.getPublicSSH(),
			}),
		).toBe(false);
	});
});
