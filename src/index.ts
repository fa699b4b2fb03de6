import "./instrument";
import { createBackend } from "./backends";
import { loadConfiguration } from "./config";
import { createServer } from "./server";
import { logger } from "./logger";
import type { ListenOptions } from "net";

const configuration = loadConfiguration();

const server = createServer(
	configuration,
	createBackend(configuration.backend),
);

const listenOptions: ListenOptions = {
	port: configuration.port,
	host: configuration.host,
};

server.listen(listenOptions, () => {
	logger.info(
		`Listening for SSH requests on ${listenOptions.host ?? ""}:${String(listenOptions.port)}`,
	);
	logger.info(`Serving files from the ${configuration.backend.type} backend`);
	if (configuration.authorizedKeys.length > 0) {
		logger.info(
			`Loaded ${String(configuration.authorizedKeys.length)} authorized public key(s)`,
		);
	}
});
