import { createHash, timingSafeEqual } from "node:crypto";

const hashSecret = (secret: string): Buffer =>
	createHash("sha256").update(secret, "utf8").digest();

/**
 * Looks the user up and compares passwords in constant time.  Both sides are
 * hashed first so the comparison does not depend on their lengths.
 */
export const checkPassword = (
	users: ReadonlyMap<string, string>,
	username: string,
	password: string,
): boolean => {
	const expectedPassword = users.get(username);
	// Compared even when the user is unknown.
	const isMatch = timingSafeEqual(
		hashSecret(password),
		hashSecret(expectedPassword ?? ""),
	);
	return expectedPassword !== undefined && isMatch;
};
