import fs from "node:fs";
import { utils } from "ssh2";
import tmp from "tmp";
import { mockLogger } from "./test/mocks";
import { MemoryBackend } from "./backends";
import { createServer } from "./server";
import type { FileResult } from "tmp";

jest.mock("./logger", () => ({
	logger: mockLogger,
}));

describe("createServer", () => {
	let hostKeyFile: FileResult;

	beforeEach(() => {
		hostKeyFile = tmp.fileSync();
		fs.writeFileSync(
			hostKeyFile.name,
			utils.generateKeyPairSync("ed25519").private,
		);
	});

	afterEach(() => {
		hostKeyFile.removeCallback();
	});

	it("should create a server that handles connections", () => {
		const server = createServer(
			{
				hostKeyPath: hostKeyFile.name,
				users: new Map([["alice", "test-secret"]]),
				authorizedKeys: [],
			},
			new MemoryBackend(),
		);

		expect(server.listeners("connection")).toHaveLength(1);
	});

	it("should fail when the host key cannot be read", () => {
		expect(() =>
			createServer(
				{
					hostKeyPath: `${hostKeyFile.name}.missing`,
					users: new Map(),
					authorizedKeys: [],
				},
				new MemoryBackend(),
			),
		).toThrow("ENOENT");
	});

	it("should generate a host key when none is configured", () => {
		const server = createServer(
			{ users: new Map([["alice", "test-secret"]]), authorizedKeys: [] },
			new MemoryBackend(),
		);

		expect(server.listeners("connection")).toHaveLength(1);
		expect(mockLogger.warn).toHaveBeenCalledWith(
			"No SSH_HOST_KEY_PATH is set, so a host key was generated; clients will see it change on every restart",
		);
	});
});
