import { S3Client } from "@aws-sdk/client-s3";
import { LocalBackend } from "./LocalBackend";
import { MemoryBackend } from "./MemoryBackend";
import { S3Backend } from "./S3Backend";
import type { BackendConfiguration } from "../config";
import type { StorageBackend } from "../types";

export const createBackend = (
	configuration: BackendConfiguration,
): StorageBackend => {
	switch (configuration.type) {
		case "local":
			return new LocalBackend(configuration.rootPath);
		case "s3":
			return new S3Backend(
				new S3Client({
					region: configuration.region,
					endpoint: configuration.endpoint,
					// S3 compatible endpoints generally need path-style addressing.
					forcePathStyle: configuration.endpoint !== undefined,
				}),
				{ bucket: configuration.bucket, prefix: configuration.prefix },
			);
		case "memory":
		default:
			return new MemoryBackend();
	}
};
