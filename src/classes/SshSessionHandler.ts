import { logger } from "../logger";
import { SftpSessionHandler } from "./SftpSessionHandler";
import type {
	AcceptConnection,
	RejectConnection,
	ServerChannel,
} from "ssh2";
import type { StorageBackend } from "../types";

const SFTP_SUBSYSTEM_NAME = "sftp";

export class SshSessionHandler {
	private readonly backend: StorageBackend;

	public constructor(backend: StorageBackend) {
		this.backend = backend;
	}

	/**
	 * The SFTP subsystem is accepted as a raw channel; packets are decoded by
	 * our own protocol engine rather than by ssh2's SFTP implementation.
	 *
	 * See: Session Events (subsystem)
	 * https://github.com/mscdex/ssh2#session-events
	 */
	public onSubsystem(
		accept: AcceptConnection<ServerChannel>,
		reject: RejectConnection,
		info: { name: string },
	): void {
		logger.verbose("SSH subsystem requested", { name: info.name });
		if (info.name !== SFTP_SUBSYSTEM_NAME) {
			reject();
			return;
		}
		const sftpConnection = accept();
		const sftpSessionHandler = new SftpSessionHandler(
			sftpConnection,
			this.backend,
		);
		sftpConnection.on(
			"data",
			sftpSessionHandler.onData.bind(sftpSessionHandler),
		);
		sftpConnection.on("end", sftpSessionHandler.onEnd.bind(sftpSessionHandler));
		sftpConnection.on(
			"close",
			sftpSessionHandler.onClose.bind(sftpSessionHandler),
		);
		sftpConnection.on(
			"error",
			sftpSessionHandler.onError.bind(sftpSessionHandler),
		);
	}

	/**
	 * See: Session Events (close)
	 * https://github.com/mscdex/ssh2#session-events
	 */
	// eslint-disable-next-line class-methods-use-this
	public onClose(): void {
		logger.verbose("SSH session closed");
	}
}
