import { timingSafeEqual } from "node:crypto";
import type { ParsedKey } from "ssh2";

export interface OfferedPublicKey {
	algo: string;
	data: Buffer;
}

export interface PublicKeySignature {
	blob: Buffer;
	signature: Buffer;
	hashAlgo?: string;
}

const isSameKey = (
	authorizedKey: ParsedKey,
	offeredKey: OfferedPublicKey,
): boolean => {
	const authorizedBlob = authorizedKey.getPublicSSH();
	return (
		authorizedKey.type === offeredKey.algo &&
		authorizedBlob.length === offeredKey.data.length &&
		timingSafeEqual(authorizedBlob, offeredKey.data)
	);
};

/**
 * Checks an offered key against the authorized keys.  Without a signature the
 * client is only asking whether the key would be accepted; with one, the
 * signature must verify against the matching authorized key.
 *
 * See: Public Key Authentication Method
 * https://datatracker.ietf.org/doc/html/rfc4252#section-7
 */
export const checkPublicKey = (
	authorizedKeys: readonly ParsedKey[],
	offeredKey: OfferedPublicKey,
	signature?: PublicKeySignature,
): boolean => {
	const authorizedKey = authorizedKeys.find((key) =>
		isSameKey(key, offeredKey),
	);
	if (authorizedKey === undefined) {
		return false;
	}
	if (signature === undefined) {
		return true;
	}
	return (
		authorizedKey.verify(
			signature.blob,
			signature.signature,
			signature.hashAlgo,
		) === true
	);
};
