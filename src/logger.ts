import winston from "winston";

const getDefaultLogLevel = (): string =>
	process.env.NODE_ENV === "production" ? "info" : "debug";

const productionFormat = winston.format.combine(
	winston.format.timestamp(),
	winston.format.errors({ stack: true }),
	winston.format.json(),
);

const developmentFormat = winston.format.combine(
	winston.format.colorize(),
	winston.format.errors({ stack: true }),
	winston.format.simple(),
);

export const logger = winston.createLogger({
	level: process.env.LOG_LEVEL ?? getDefaultLogLevel(),
	format:
		process.env.NODE_ENV === "production"
			? productionFormat
			: developmentFormat,
	transports: [new winston.transports.Console()],
});
