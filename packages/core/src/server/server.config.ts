/**
 * Server Configuration
 *
 * Explicit options win over environment variables, which win over defaults.
 */

import { ensure } from "../errors";
import type { LogLevel, Logger } from "../logging/logger";
import { LOG_LEVELS, isLogLevel } from "../logging/logger";
import type { HeaderMap } from "../response/response.types";
import type { UpgradeHandler } from "./server.types";

/**
 * PEM material for the secure listener
 */
export interface TlsOptions {
	key: string | Buffer;
	cert: string | Buffer;
	/** Secure listener port; ephemeral when omitted */
	port?: number;
}

export interface DefaultResponseOptions {
	status: number;
	headers?: HeaderMap;
	body?: string;
}

export interface MockServerOptions {
	host?: string;
	port?: number;
	tls?: TlsOptions;
	/** Response rendered when no expectation matches */
	defaultResponse?: DefaultResponseOptions;
	/** Negotiate Content-Encoding from Accept-Encoding */
	compression?: boolean;
	logLevel?: LogLevel;
	logger?: Logger;
	/** WebSocket upgrade binding */
	upgrade?: UpgradeHandler;
	/** Fallback poll interval for verify(timeout), in ms */
	pollInterval?: number;
}

export interface ResolvedServerOptions {
	readonly host: string;
	readonly port: number;
	readonly tls?: TlsOptions;
	readonly defaultResponse: DefaultResponseOptions;
	readonly compression: boolean;
	readonly logLevel: LogLevel;
	readonly logger?: Logger;
	readonly upgrade?: UpgradeHandler;
	readonly pollInterval: number;
}

export const DEFAULT_SERVER_OPTIONS = {
	host: "127.0.0.1",
	port: 0,
	defaultResponse: { status: 404 },
	compression: true,
	logLevel: "warn",
	pollInterval: 50,
} as const satisfies Partial<ResolvedServerOptions>;

function ensurePort(port: number, subject: string): void {
	ensure(Number.isInteger(port) && port >= 0 && port <= 65535, subject, `${port} is not a port number`);
}

function envPort(value: string | undefined): number | undefined {
	if (value === undefined || value.trim() === "") {
		return undefined;
	}
	const port = Number(value);
	ensurePort(port, "HTTPDOUBLE_PORT");
	return port;
}

function envLogLevel(value: string | undefined): LogLevel | undefined {
	if (value === undefined || value.trim() === "") {
		return undefined;
	}
	const level = value.trim().toLowerCase();
	ensure(isLogLevel(level), "HTTPDOUBLE_LOG_LEVEL", `"${value}" is not one of ${LOG_LEVELS.join(", ")}`);
	return level;
}

/**
 * Merge options, environment and defaults, validating the result
 */
export function resolveServerOptions(
	options: MockServerOptions = {},
	env: Record<string, string | undefined> = process.env,
): ResolvedServerOptions {
	const port = options.port ?? envPort(env.HTTPDOUBLE_PORT) ?? DEFAULT_SERVER_OPTIONS.port;
	ensurePort(port, "port");
	if (options.tls?.port !== undefined) {
		ensurePort(options.tls.port, "TLS port");
	}

	const defaultResponse = options.defaultResponse ?? DEFAULT_SERVER_OPTIONS.defaultResponse;
	ensure(
		Number.isInteger(defaultResponse.status) && defaultResponse.status >= 100 && defaultResponse.status <= 599,
		"default response",
		`${defaultResponse.status} is not an HTTP status`,
	);

	const pollInterval = options.pollInterval ?? DEFAULT_SERVER_OPTIONS.pollInterval;
	ensure(Number.isFinite(pollInterval) && pollInterval > 0, "poll interval", `${pollInterval}`);

	const logLevel = options.logLevel ?? envLogLevel(env.HTTPDOUBLE_LOG_LEVEL) ?? DEFAULT_SERVER_OPTIONS.logLevel;
	ensure(isLogLevel(logLevel), "log level", `"${logLevel}"`);

	return {
		host: options.host ?? env.HTTPDOUBLE_HOST ?? DEFAULT_SERVER_OPTIONS.host,
		port,
		defaultResponse,
		compression: options.compression ?? DEFAULT_SERVER_OPTIONS.compression,
		logLevel,
		pollInterval,
		...(options.tls ? { tls: options.tls } : {}),
		...(options.logger ? { logger: options.logger } : {}),
		...(options.upgrade ? { upgrade: options.upgrade } : {}),
	};
}
