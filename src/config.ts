import { readFileSync } from "node:fs";
import { requireEnv } from "require-env-variable";
import { utils } from "ssh2";
import { DEFAULT_SSH_HOST, DEFAULT_SSH_PORT } from "./constants";
import { SystemConfigurationError } from "./errors";
import type { ParsedKey } from "ssh2";

export type BackendConfiguration =
	| { type: "memory" }
	| { type: "local"; rootPath: string }
	| {
			type: "s3";
			bucket: string;
			prefix?: string;
			region?: string;
			endpoint?: string;
	  };

export interface ServerConfiguration {
	host: string;
	port: number;
	/** A key is generated at startup when this is unset. */
	hostKeyPath?: string;
	/** Passwords keyed by username. */
	users: Map<string, string>;
	/** Public keys that may log in as any user. */
	authorizedKeys: ParsedKey[];
	backend: BackendConfiguration;
}

const MAXIMUM_PORT = 65535;

const getOptionalEnv = (name: string): string | undefined => {
	const value = process.env[name]?.trim();
	return value === undefined || value === "" ? undefined : value;
};

const requireEnvironment = (...names: string[]): Record<string, string> => {
	const missingNames = names.filter(
		(name) => getOptionalEnv(name) === undefined,
	);
	if (missingNames.length > 0) {
		throw new SystemConfigurationError(
			`Missing required environment variables: ${missingNames.join(", ")}`,
		);
	}
	return requireEnv(...names);
};

export const parsePort = (value: string | undefined): number => {
	if (value === undefined) {
		return DEFAULT_SSH_PORT;
	}
	if (!/^[0-9]+$/.test(value)) {
		throw new SystemConfigurationError(`SSH_PORT is not a number: ${value}`);
	}
	const port = Number.parseInt(value, 10);
	if (port < 1 || port > MAXIMUM_PORT) {
		throw new SystemConfigurationError(`SSH_PORT is out of range: ${value}`);
	}
	return port;
};

/**
 * Parses `name:password` pairs separated by commas.  Passwords may contain
 * colons; usernames may not.
 */
export const parseUsers = (value: string): Map<string, string> => {
	const users = new Map<string, string>();
	value
		.split(",")
		.map((pair) => pair.trim())
		.filter((pair) => pair !== "")
		.forEach((pair) => {
			const separatorIndex = pair.indexOf(":");
			const username = pair.slice(0, separatorIndex);
			const password = pair.slice(separatorIndex + 1);
			if (separatorIndex <= 0 || password === "") {
				throw new SystemConfigurationError(
					"SFTP_USERS entries must have the form username:password",
				);
			}
			if (users.has(username)) {
				throw new SystemConfigurationError(
					`SFTP_USERS lists ${username} more than once`,
				);
			}
			users.set(username, password);
		});
	if (users.size === 0) {
		throw new SystemConfigurationError("SFTP_USERS does not list any users");
	}
	return users;
};

/**
 * Parses OpenSSH `authorized_keys` content: one key per line, blank lines and
 * `#` comments ignored.
 */
export const parseAuthorizedKeys = (
	contents: string,
	source: string,
): ParsedKey[] =>
	contents.split(/\r?\n/).flatMap((rawLine, index) => {
		const line = rawLine.trim();
		if (line === "" || line.startsWith("#")) {
			return [];
		}
		const parsedKey = utils.parseKey(line);
		if (parsedKey instanceof Error) {
			throw new SystemConfigurationError(
				`${source} line ${String(index + 1)} is not a valid public key: ${parsedKey.message}`,
			);
		}
		return [parsedKey];
	});

const loadAuthorizedKeys = (): ParsedKey[] => {
	const authorizedKeysFile = getOptionalEnv("AUTHORIZED_KEYS_FILE");
	if (authorizedKeysFile !== undefined) {
		let contents: string;
		try {
			contents = readFileSync(authorizedKeysFile, "utf8");
		} catch {
			throw new SystemConfigurationError(
				`AUTHORIZED_KEYS_FILE could not be read: ${authorizedKeysFile}`,
			);
		}
		return parseAuthorizedKeys(contents, authorizedKeysFile);
	}
	const authorizedKeys = getOptionalEnv("AUTHORIZED_KEYS");
	return authorizedKeys === undefined
		? []
		: parseAuthorizedKeys(authorizedKeys, "AUTHORIZED_KEYS");
};

const loadBackendConfiguration = (): BackendConfiguration => {
	const backendType = getOptionalEnv("STORAGE_BACKEND") ?? "memory";
	switch (backendType) {
		case "memory":
			return { type: "memory" };
		case "local": {
			const { LOCAL_ROOT_PATH } = requireEnvironment("LOCAL_ROOT_PATH");
			return { type: "local", rootPath: LOCAL_ROOT_PATH };
		}
		case "s3": {
			const { S3_BUCKET } = requireEnvironment("S3_BUCKET");
			return {
				type: "s3",
				bucket: S3_BUCKET,
				prefix: getOptionalEnv("S3_PREFIX"),
				region: getOptionalEnv("S3_REGION"),
				endpoint: getOptionalEnv("S3_ENDPOINT"),
			};
		}
		default:
			throw new SystemConfigurationError(
				`STORAGE_BACKEND must be one of memory, local or s3 (got ${backendType})`,
			);
	}
};

export const loadConfiguration = (): ServerConfiguration => {
	const sftpUsers = getOptionalEnv("SFTP_USERS");
	const users =
		sftpUsers === undefined ? new Map<string, string>() : parseUsers(sftpUsers);
	const authorizedKeys = loadAuthorizedKeys();
	if (users.size === 0 && authorizedKeys.length === 0) {
		throw new SystemConfigurationError(
			"No authentication is configured: set SFTP_USERS, AUTHORIZED_KEYS_FILE or AUTHORIZED_KEYS",
		);
	}
	return {
		host: getOptionalEnv("SSH_HOST") ?? DEFAULT_SSH_HOST,
		port: parsePort(getOptionalEnv("SSH_PORT")),
		hostKeyPath: getOptionalEnv("SSH_HOST_KEY_PATH"),
		users,
		authorizedKeys,
		backend: loadBackendConfiguration(),
	};
};
