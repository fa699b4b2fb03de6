import { logger } from "../logger";
import { checkPassword, checkPublicKey } from "../utils";
import { SshSessionHandler } from "./SshSessionHandler";
import type {
	AuthContext,
	AuthenticationType,
	ParsedKey,
	RejectConnection,
	Session,
} from "ssh2";
import type { StorageBackend } from "../types";

export interface SshCredentials {
	/** Passwords keyed by username. */
	users: ReadonlyMap<string, string>;
	/** Public keys that may log in as any user. */
	authorizedKeys: readonly ParsedKey[];
}

export class SshConnectionHandler {
	private readonly backend: StorageBackend;

	private readonly credentials: SshCredentials;

	private authenticatedUsername?: string;

	public constructor(backend: StorageBackend, credentials: SshCredentials) {
		this.backend = backend;
		this.credentials = credentials;
	}

	/**
	 * See: Authentication Requests
	 * https://datatracker.ietf.org/doc/html/rfc4252#section-5
	 */
	public onAuthentication(authContext: AuthContext): void {
		logger.verbose("SSH authentication request received.", {
			username: authContext.username,
			method: authContext.method,
		});
		switch (authContext.method) {
			case "password": {
				if (
					checkPassword(
						this.credentials.users,
						authContext.username,
						authContext.password,
					)
				) {
					this.acceptAuthentication(authContext);
					return;
				}
				this.rejectAuthentication(authContext);
				return;
			}
			case "publickey": {
				const { blob, signature, hashAlgo } = authContext;
				const offeredSignature =
					blob === undefined || signature === undefined
						? undefined
						: { blob, signature, hashAlgo };
				if (
					!checkPublicKey(
						this.credentials.authorizedKeys,
						authContext.key,
						offeredSignature,
					)
				) {
					this.rejectAuthentication(authContext);
					return;
				}
				if (offeredSignature === undefined) {
					// The client is asking whether this key would be accepted.
					authContext.accept();
					return;
				}
				this.acceptAuthentication(authContext);
				return;
			}
			case "none":
			default:
				authContext.reject(this.allowedMethods);
		}
	}

	/**
	 * See: Connection Events (close)
	 * https://github.com/mscdex/ssh2#connection-events
	 */
	// eslint-disable-next-line class-methods-use-this
	public onClose(): void {
		logger.verbose("SSH connection has closed");
	}

	/**
	 * See: Connection Events (end)
	 * https://github.com/mscdex/ssh2#connection-events
	 */
	// eslint-disable-next-line class-methods-use-this
	public onEnd(): void {
		logger.verbose("SSH connection is ending");
	}

	/**
	 * See: Connection Events (error)
	 * https://github.com/mscdex/ssh2#connection-events
	 */
	// eslint-disable-next-line class-methods-use-this
	public onError(error: Error): void {
		logger.verbose("SSH error: ", error);
	}

	/**
	 * See: Connection Events (handshake)
	 * https://github.com/mscdex/ssh2#connection-events
	 */
	// eslint-disable-next-line class-methods-use-this
	public onHandshake(): void {
		logger.verbose("SSH handshake complete");
	}

	/**
	 * See: Connection Events (ready)
	 * https://github.com/mscdex/ssh2#connection-events
	 */
	public onReady(): void {
		logger.verbose("SSH connection is ready", {
			username: this.authenticatedUsername,
		});
	}

	/**
	 * See: Connection Events (rekey)
	 * https://github.com/mscdex/ssh2#connection-events
	 */
	// eslint-disable-next-line class-methods-use-this
	public onRekey(): void {
		logger.verbose("SSH connection has been re-keyed");
	}

	/**
	 * See: Connection Events (session)
	 * https://github.com/mscdex/ssh2#connection-events
	 */
	public onSession(accept: () => Session): void {
		logger.verbose("SSH request for a new session");
		const session = accept();
		if (this.authenticatedUsername === undefined) {
			logger.verbose(
				"Closing SSH session immediately (no authentication context)",
			);
			session.close();
			return;
		}
		const sessionHandler = new SshSessionHandler(this.backend);
		session.on("subsystem", sessionHandler.onSubsystem.bind(sessionHandler));
		session.on("close", sessionHandler.onClose.bind(sessionHandler));
	}

	/**
	 * See: Connection Events (tcpip)
	 * https://github.com/mscdex/ssh2#connection-events
	 */
	// eslint-disable-next-line class-methods-use-this
	public onTcpip(_accept: unknown, reject: RejectConnection): void {
		logger.verbose("Rejecting SSH request for an outbound TCP connection");
		reject();
	}

	private get allowedMethods(): AuthenticationType[] {
		const methods: AuthenticationType[] = [];
		if (this.credentials.users.size > 0) {
			methods.push("password");
		}
		if (this.credentials.authorizedKeys.length > 0) {
			methods.push("publickey");
		}
		return methods;
	}

	private acceptAuthentication(authContext: AuthContext): void {
		this.authenticatedUsername = authContext.username;
		logger.verbose("SSH authentication succeeded", {
			username: authContext.username,
			method: authContext.method,
		});
		authContext.accept();
	}

	private rejectAuthentication(authContext: AuthContext): void {
		logger.verbose("SSH authentication failed", {
			username: authContext.username,
			method: authContext.method,
		});
		authContext.reject(this.allowedMethods);
	}
}
