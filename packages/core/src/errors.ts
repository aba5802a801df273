/**
 * Errors
 *
 * Only configuration mistakes are fatal. Match-time failures (a throwing
 * predicate, an undecodable body) are caught by the engine and recorded as
 * failed matcher outcomes.
 */

/**
 * Thrown synchronously from a configuring call when the configuration is
 * invalid: bad matcher arguments, an encoder that cannot be resolved for a
 * declared body, a malformed forward target.
 *
 * @example
 * ```typescript
 * try {
 *   server.expectations((e) => e.get("/users").times(exactly(-1)));
 * } catch (error) {
 *   if (error instanceof ConfigurationError) {
 *     console.log(error.subject); // "call count"
 *   }
 * }
 * ```
 */
export class ConfigurationError extends Error {
	/**
	 * What was being configured when the error occurred
	 */
	readonly subject: string;

	constructor(subject: string, message: string) {
		super(`Invalid ${subject}: ${message}`);
		this.name = "ConfigurationError";
		this.subject = subject;
	}
}

/**
 * Assert a configuration condition, throwing ConfigurationError otherwise
 */
export function ensure(condition: boolean, subject: string, message: string): asserts condition {
	if (!condition) {
		throw new ConfigurationError(subject, message);
	}
}
