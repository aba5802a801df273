/**
 * Server Configuration Tests
 */

import { ConfigurationError, DEFAULT_SERVER_OPTIONS, resolveServerOptions } from "httpdouble";
import { describe, expect, it } from "vitest";

describe("Server Configuration", () => {
	it("should fall back to defaults", () => {
		expect(resolveServerOptions({}, {})).toEqual({
			host: "127.0.0.1",
			port: 0,
			defaultResponse: { status: 404 },
			compression: true,
			logLevel: "warn",
			pollInterval: 50,
		});
		expect(DEFAULT_SERVER_OPTIONS.logLevel).toBe("warn");
	});

	it("should read the environment", () => {
		const resolved = resolveServerOptions(
			{},
			{ HTTPDOUBLE_PORT: "8089", HTTPDOUBLE_HOST: "0.0.0.0", HTTPDOUBLE_LOG_LEVEL: " DEBUG " },
		);

		expect(resolved.port).toBe(8089);
		expect(resolved.host).toBe("0.0.0.0");
		expect(resolved.logLevel).toBe("debug");
	});

	it("should let explicit options win over the environment", () => {
		const resolved = resolveServerOptions(
			{ port: 9000, host: "localhost", logLevel: "error" },
			{ HTTPDOUBLE_PORT: "8089", HTTPDOUBLE_HOST: "0.0.0.0", HTTPDOUBLE_LOG_LEVEL: "debug" },
		);

		expect([resolved.port, resolved.host, resolved.logLevel]).toEqual([9000, "localhost", "error"]);
	});

	it("should ignore blank environment values", () => {
		const resolved = resolveServerOptions({}, { HTTPDOUBLE_PORT: " ", HTTPDOUBLE_LOG_LEVEL: "" });

		expect(resolved.port).toBe(0);
		expect(resolved.logLevel).toBe("warn");
	});

	it("should keep optional bindings only when given", () => {
		const tls = { key: "test-key", cert: "test-cert" };

		expect(resolveServerOptions({ tls }, {}).tls).toBe(tls);
		expect("tls" in resolveServerOptions({}, {})).toBe(false);
	});

	describe("validation", () => {
		it("should reject out-of-range ports", () => {
			expect(() => resolveServerOptions({ port: 70000 }, {})).toThrow("Invalid port: 70000 is not a port number");
			expect(() => resolveServerOptions({ tls: { key: "k", cert: "c", port: -1 } }, {})).toThrow(
				"Invalid TLS port: -1 is not a port number",
			);
		});

		it("should reject malformed environment values", () => {
			expect(() => resolveServerOptions({}, { HTTPDOUBLE_PORT: "abc" })).toThrow(
				"Invalid HTTPDOUBLE_PORT: NaN is not a port number",
			);
			expect(() => resolveServerOptions({}, { HTTPDOUBLE_LOG_LEVEL: "loud" })).toThrow(
				'Invalid HTTPDOUBLE_LOG_LEVEL: "loud" is not one of error, warn, info, http, verbose, debug, silly',
			);
		});

		it("should reject an invalid default response and poll interval", () => {
			expect(() => resolveServerOptions({ defaultResponse: { status: 42 } }, {})).toThrow(
				"Invalid default response: 42 is not an HTTP status",
			);
			expect(() => resolveServerOptions({ pollInterval: 0 }, {})).toThrow(ConfigurationError);
			expect(() => resolveServerOptions({ pollInterval: 0 }, {})).toThrow("Invalid poll interval: 0");
		});
	});
});
