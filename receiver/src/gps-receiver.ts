import "dotenv/config";
import fs from "node:fs";
import type winston from "winston";
import type { TelemetryRecord } from "@gps-json/common";

import { GpsQueueConsumer } from "./lib/amqp";
import { loadConfig } from "./lib/config";
import type { QueueConfig, BrokerConfig } from "./lib/config";
import { asAppError } from "./lib/errors";
import { createLogger } from "./lib/log";
import { formatGpsReport } from "./lib/report";
import { createGpsMessageHandler } from "./message-handler";

function printReport(record: TelemetryRecord): void {
	process.stdout.write(formatGpsReport(record).join("\n") + "\n");
}

function waitForShutdown(logger: winston.Logger): Promise<string> {
	return new Promise(resolve => {
		const stop = (signal: string) => {
			logger.info("Stopping gps receiver (signal=%s)", signal);
			resolve(signal);
		};
		process.once("SIGINT", () => stop("SIGINT"));
		process.once("SIGTERM", () => stop("SIGTERM"));
	});
}

/** One-shot: decode a message saved to disk. Exit code 1 when it is malformed. */
function decodeFile(path: string, logger: winston.Logger): number {
	const handle = createGpsMessageHandler({ logger, onRecord: printReport });

	logger.info("Decoding message from file %s", path);
	const result = handle(fs.readFileSync(path));

	switch (result.status) {
		case "decoded":
			return 0;
		case "ignored":
			logger.info("Unable to decode message: not a valid gps v1 message");
			return 0;
		case "malformed_envelope":
		case "malformed_payload":
			logger.error("Unable to decode message: %s", result.error.message);
			return 1;
	}
}

async function consume(broker: BrokerConfig, queue: QueueConfig, logger: winston.Logger): Promise<number> {
	const handle = createGpsMessageHandler({ logger, onRecord: printReport });
	const consumer = new GpsQueueConsumer({ broker, queue, logger, handle });

	await consumer.start();
	logger.info("Waiting for messages, press Ctrl+C to exit");

	try {
		await waitForShutdown(logger);
	} finally {
		await consumer.stop();
	}
	return 0;
}

async function main(): Promise<number> {
	const config = loadConfig();

	const logger = createLogger({
		serviceName: "gps-receiver",
		level: config.log.level,
		logDir: config.log.dir
	});

	logger.info("Starting gps receiver (source=%s)", config.source.kind);

	if (config.source.kind === "file") {
		return decodeFile(config.source.path, logger);
	}
	return consume(config.source.broker, config.source.queue, logger);
}

main()
	.then(code => process.exit(code))
	.catch(err => {
		const e = asAppError(err);
		console.error(`[${e.code}] ${e.message}`);
		process.exit(1);
	});
