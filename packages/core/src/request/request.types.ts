/**
 * Request Types
 *
 * Normalized, immutable view of an inbound HTTP request. The listener builds
 * it once per request; matchers and codecs only read from it.
 */

export type HttpMethod = "GET" | "HEAD" | "POST" | "PUT" | "PATCH" | "DELETE" | "OPTIONS" | "TRACE" | "CONNECT";

/**
 * Method matcher value: a concrete method or any method
 */
export type MethodSelector = HttpMethod | "ANY";

export interface RequestView {
	/** Upper-case request method */
	readonly method: string;
	/** Decoded path without query string */
	readonly path: string;
	/** Path as received, still percent-encoded */
	readonly rawPath: string;
	/** Query parameters, repeated names keep every value in order */
	readonly query: Readonly<Record<string, readonly string[]>>;
	/** Header values keyed by lower-case header name */
	readonly headers: Readonly<Record<string, readonly string[]>>;
	/** Cookies parsed from every Cookie header */
	readonly cookies: Readonly<Record<string, string>>;
	/** Raw body bytes (empty when the request had no body) */
	readonly body: Uint8Array;
	/** Whether the request arrived on the encrypted listener */
	readonly secure: boolean;
}

/**
 * Raw request parts accepted by createRequestView
 */
export interface RequestInit {
	method?: string;
	/** Path with optional query string, e.g. "/users?page=2" */
	url: string;
	headers?: Record<string, string | readonly string[] | undefined>;
	body?: Uint8Array | string;
	secure?: boolean;
}
