import { Command } from "commander";

import { configError } from "./errors";

export type LogLevel = "error" | "warn" | "info" | "http" | "verbose" | "debug" | "silly";

export interface BrokerConfig {
	hostname: string;
	port: number;
	username: string;
	password: string;
	vhost: string;
}

export interface QueueConfig {
	name: string;
	exchange: string;
	routingKey: string;
	durable: boolean;
	exclusive: boolean;
	autoDelete: boolean;
	/** Upper bound on unacknowledged deliveries in flight. */
	prefetch: number;
}

export type SourceConfig =
	| { kind: "file"; path: string }
	| { kind: "broker"; broker: BrokerConfig; queue: QueueConfig };

export interface AppConfig {
	source: SourceConfig;
	log: {
		level: LogLevel;
		dir?: string;
	};
}

type Env = Record<string, string | undefined>;

interface CliOptions {
	file?: string;
	logLevel?: string;
	logDir?: string;
}

/* ---------- defaults ---------- */

const DEFAULT_PORT = 5672;
const DEFAULT_VHOST = "/";
const DEFAULT_QUEUE = "gps.receiver.test";
const DEFAULT_EXCHANGE = "acm.gws";
// Messages are published as gps.{imei}
const DEFAULT_ROUTING_KEY = "gps.#";
const DEFAULT_PREFETCH = 10;
const DEFAULT_LOG_LEVEL: LogLevel = "info";

const LOG_LEVELS: readonly LogLevel[] = ["error", "warn", "info", "http", "verbose", "debug", "silly"];

export function parseCommandLine(argv: readonly string[] = process.argv): CliOptions {
	const program = new Command();

	program
		.name("gps-receiver")
		.option("-f, --file <path>", "Decode a single GPS JSON message from a file instead of consuming from the broker")
		.option("-l, --log-level <level>", "Log level (overrides LOG_LEVEL)")
		.option("--log-dir <dir>", "Directory for rotated log files (overrides LOG_DIR)")
		.allowUnknownOption(true)
		.allowExcessArguments(true);

	program.parse([...argv]);

	return program.opts<CliOptions>();
}

function requireEnv(env: Env, name: string): string {
	const value = env[name];
	if (!value || value.trim() === "") {
		throw configError(`Missing required environment variable: ${name}`);
	}
	return value;
}

function optionalStringEnv(env: Env, name: string, def: string): string {
	const value = env[name];
	if (value === undefined || value.trim() === "") return def;
	return value;
}

function optionalPositiveIntEnv(env: Env, name: string, def: number): number {
	const raw = env[name];
	if (raw === undefined || raw.trim() === "") return def;
	const n = Number(raw);
	if (!Number.isInteger(n) || n <= 0) {
		throw configError(`Environment variable ${name} must be a positive integer`, { value: raw });
	}
	return n;
}

function optionalBooleanEnv(env: Env, name: string, def: boolean): boolean {
	const value = env[name];
	if (value === undefined || value.trim() === "") return def;
	const lower = value.trim().toLowerCase();
	if (lower === "true") return true;
	if (lower === "false") return false;
	throw configError(`Environment variable ${name} must be "true" or "false"`, { value });
}

function parseLogLevel(raw: string | undefined): LogLevel {
	if (raw === undefined || raw.trim() === "") return DEFAULT_LOG_LEVEL;
	const lower = raw.trim().toLowerCase();
	const level = LOG_LEVELS.find(l => l === lower);
	if (!level) {
		throw configError(`Log level must be one of: ${LOG_LEVELS.join(", ")}`, { value: raw });
	}
	return level;
}

export function loadBrokerConfig(env: Env): BrokerConfig {
	const port = optionalPositiveIntEnv(env, "AMQP_PORT", DEFAULT_PORT);
	if (port > 65535) {
		throw configError("Environment variable AMQP_PORT must be a valid TCP port", { value: port });
	}

	return {
		hostname: requireEnv(env, "AMQP_HOST"),
		port,
		username: requireEnv(env, "AMQP_USERNAME"),
		password: requireEnv(env, "AMQP_PASSWORD"),
		vhost: optionalStringEnv(env, "AMQP_VHOST", DEFAULT_VHOST)
	};
}

export function loadQueueConfig(env: Env): QueueConfig {
	return {
		name: optionalStringEnv(env, "AMQP_QUEUE", DEFAULT_QUEUE),
		exchange: optionalStringEnv(env, "AMQP_EXCHANGE", DEFAULT_EXCHANGE),
		routingKey: optionalStringEnv(env, "AMQP_ROUTING_KEY", DEFAULT_ROUTING_KEY),
		durable: optionalBooleanEnv(env, "AMQP_QUEUE_DURABLE", true),
		exclusive: optionalBooleanEnv(env, "AMQP_QUEUE_EXCLUSIVE", false),
		autoDelete: optionalBooleanEnv(env, "AMQP_QUEUE_AUTO_DELETE", false),
		prefetch: optionalPositiveIntEnv(env, "AMQP_PREFETCH", DEFAULT_PREFETCH)
	};
}

/* ---------- public API ---------- */

export function loadConfig(argv: readonly string[] = process.argv, env: Env = process.env): AppConfig {
	const cli = parseCommandLine(argv);

	// Broker settings are only needed when actually consuming.
	const source: SourceConfig = cli.file
		? { kind: "file", path: cli.file }
		: { kind: "broker", broker: loadBrokerConfig(env), queue: loadQueueConfig(env) };

	const dir = cli.logDir ?? env.LOG_DIR;

	return {
		source,
		log: {
			level: parseLogLevel(cli.logLevel ?? env.LOG_LEVEL),
			dir: dir && dir.trim() !== "" ? dir : undefined
		}
	};
}
