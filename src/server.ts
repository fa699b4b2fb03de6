import { readFileSync } from "node:fs";
import { Server, utils } from "ssh2";
import { logger } from "./logger";
import { SshConnectionHandler } from "./classes";
import type { Connection, ServerConfig } from "ssh2";
import type { ServerConfiguration } from "./config";
import type { StorageBackend } from "./types";

const loadHostKey = (hostKeyPath: string | undefined): Buffer | string => {
	if (hostKeyPath !== undefined) {
		return readFileSync(hostKeyPath);
	}
	logger.warn(
		"No SSH_HOST_KEY_PATH is set, so a host key was generated; clients will see it change on every restart",
	);
	return utils.generateKeyPairSync("ed25519").private;
};

export const createServer = (
	configuration: Pick<
		ServerConfiguration,
		"hostKeyPath" | "users" | "authorizedKeys"
	>,
	backend: StorageBackend,
): Server => {
	const hostKeys = [loadHostKey(configuration.hostKeyPath)];

	const serverConfig: ServerConfig = {
		hostKeys,
		debug: (message) => {
			logger.silly(message);
		},
	};

	const connectionListener = (client: Connection): void => {
		logger.verbose("New connection");
		const connectionHandler = new SshConnectionHandler(backend, {
			users: configuration.users,
			authorizedKeys: configuration.authorizedKeys,
		});
		client.on(
			"authentication",
			connectionHandler.onAuthentication.bind(connectionHandler),
		);
		client.on("close", connectionHandler.onClose.bind(connectionHandler));
		client.on("end", connectionHandler.onEnd.bind(connectionHandler));
		client.on("error", connectionHandler.onError.bind(connectionHandler));
		client.on(
			"handshake",
			connectionHandler.onHandshake.bind(connectionHandler),
		);
		client.on("ready", connectionHandler.onReady.bind(connectionHandler));
		client.on("rekey", connectionHandler.onRekey.bind(connectionHandler));
		client.on("session", connectionHandler.onSession.bind(connectionHandler));
		client.on("tcpip", connectionHandler.onTcpip.bind(connectionHandler));
	};

	return new Server(serverConfig, connectionListener);
};
