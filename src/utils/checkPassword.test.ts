import { checkPassword } from "./checkPassword";

describe("checkPassword", () => {
	const users = new Map([
		["alice", "test-secret"],
		["bob", "another-secret"],
	]);

	it("should accept the configured password", () => {
		expect(checkPassword(users, "alice", "test-secret")).toBe(true);
	});

	it("should refuse another user's password", () => {
		expect(checkPassword(users, "alice", "another-secret")).toBe(false);
	});

	it("should refuse unknown users", () => {
		expect(checkPassword(users, "mallory", "")).toBe(false);
		expect(checkPassword(users, "mallory", "test-secret")).toBe(false);
	});
});
