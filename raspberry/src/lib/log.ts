import fs from "node:fs";
import winston from "winston";
import DailyRotateFile from "winston-daily-rotate-file";

export interface LoggerOptions {
	serviceName: string;
	// File logging is skipped when no directory is given
	logDir?: string;
	level?: string;
	console?: boolean;
}

function ensureDir(dir: string): void {
	fs.mkdirSync(dir, { recursive: true });
}

function getLevel(level?: string): string {
	return (level ?? process.env.LOG_LEVEL ?? "info").toLowerCase();
}

function lineFormat(serviceName: string): winston.Logform.Format {
	return winston.format.combine(
		winston.format.timestamp(),
		winston.format.errors({ stack: true }),
		winston.format.splat(),
		winston.format.printf(info => {
			const ts = String(info.timestamp);
			const component = typeof info.component === "string" ? `/${info.component}` : "";
			const meta = typeof info.stack === "string" ? `\n${info.stack}` : "";
			return `${ts} [${serviceName}${component}] ${info.level}: ${String(info.message)}${meta}`;
		})
	);
}

export function createLogger(opts: LoggerOptions): winston.Logger {
	const level = getLevel(opts.level);
	const format = lineFormat(opts.serviceName);

	const transports: winston.transport[] = [];

	if (opts.console ?? true) {
		transports.push(new winston.transports.Console({ level }));
	}

	if (opts.logDir) {
		ensureDir(opts.logDir);

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
		format,
		transports,
		// winston warns on every write when there are no transports
		silent: transports.length === 0
	});
}

/**
 * Child logger whose lines are tagged with the component name,
 * e.g. `[weather-station/broker]`.
 */
export function componentLogger(logger: winston.Logger, component: string): winston.Logger {
	return logger.child({ component });
}
