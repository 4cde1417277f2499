import fs from "node:fs";
import winston from "winston";
import DailyRotateFile from "winston-daily-rotate-file";

export interface LoggerOptions {
	serviceName: string;
	level?: string;
	/** When set, logs are also written to daily rotated files here. */
	logDir?: string;
	console?: boolean;
}

// stdout belongs to the message report, so every level goes to stderr.
const ALL_LEVELS = ["error", "warn", "info", "http", "verbose", "debug", "silly"];

function getLevel(level?: string): string {
	return (level ?? process.env.LOG_LEVEL ?? "info").toLowerCase();
}

export function createLogger(opts: LoggerOptions): winston.Logger {
	const level = getLevel(opts.level);

	const baseFormat = winston.format.combine(
		winston.format.timestamp(),
		winston.format.errors({ stack: true }),
		winston.format.splat(),
		winston.format.printf(info => {
			const ts = String(info.timestamp);
			const svc = opts.serviceName;
			const meta = info.stack ? `\n${String(info.stack)}` : "";
			return `${ts} [${svc}] ${info.level}: ${String(info.message)}${meta}`;
		})
	);

	const transports: winston.transport[] = [];

	if (opts.console ?? true) {
		transports.push(
			new winston.transports.Console({
				level,
				format: baseFormat,
				stderrLevels: ALL_LEVELS
			})
		);
	}

	if (opts.logDir) {
		fs.mkdirSync(opts.logDir, { recursive: true });

		transports.push(
			new DailyRotateFile({
				level,
				dirname: opts.logDir,
				filename: `${opts.serviceName}.%DATE%.log`,
				datePattern: "YYYY-MM-DD",
				maxFiles: "14d",
				zippedArchive: false
			})
		);

		transports.push(
			new DailyRotateFile({
				level: "error",
				dirname: opts.logDir,
				filename: `${opts.serviceName}.error.%DATE%.log`,
				datePattern: "YYYY-MM-DD",
				maxFiles: "30d",
				zippedArchive: false
			})
		);
	}

	return winston.createLogger({
		level,
		format: baseFormat,
		// No transports at all would make winston complain on every write.
		transports: transports.length > 0 ? transports : [new winston.transports.Console({ silent: true })]
	});
}
