/**
 * Logger
 *
 * winston-based logging. Every MockServer owns its own root logger so that
 * several servers in one process keep separate levels and transports.
 */

import winston from "winston";

export type LogLevel = "error" | "warn" | "info" | "http" | "verbose" | "debug" | "silly";

export const LOG_LEVELS: readonly LogLevel[] = ["error", "warn", "info", "http", "verbose", "debug", "silly"];

export type Logger = winston.Logger;

export function isLogLevel(value: string): value is LogLevel {
	return LOG_LEVELS.some((level) => level === value);
}

const consoleFormat = winston.format.combine(
	winston.format.timestamp({ format: "HH:mm:ss.SSS" }),
	winston.format.errors({ stack: true }),
	winston.format.printf(({ timestamp, level, message, module, ...meta }) => {
		const moduleStr = typeof module === "string" ? `[${module}]` : "[httpdouble]";
		const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : "";
		return `${timestamp} ${level.toUpperCase().padEnd(5)} ${moduleStr} ${message}${metaStr}`;
	}),
);

/**
 * Create a root logger writing to stderr
 */
export function createLogger(level: LogLevel = "warn"): Logger {
	return winston.createLogger({
		level,
		format: consoleFormat,
		transports: [
			new winston.transports.Console({
				stderrLevels: [...LOG_LEVELS],
			}),
		],
	});
}

/**
 * Create a module-scoped child logger
 */
export function moduleLogger(root: Logger, module: string): Logger {
	return root.child({ module });
}
