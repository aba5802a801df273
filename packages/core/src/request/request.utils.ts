/**
 * Request normalization helpers
 */

import { createNameMap, ownValue, toBuffer } from "../utils";
import type { RequestInit, RequestView } from "./request.types";

function append(map: Record<string, string[]>, name: string, values: readonly string[]): void {
	const existing = ownValue(map, name);
	if (existing) {
		existing.push(...values);
	} else {
		map[name] = [...values];
	}
}

/**
 * Parse a query string (without the leading "?") into a multi-valued map
 */
export function parseQuery(query: string): Record<string, string[]> {
	const result = createNameMap<string[]>();
	for (const [name, value] of new URLSearchParams(query)) {
		append(result, name, [value]);
	}
	return result;
}

/**
 * Parse Cookie header values. Later duplicates win.
 */
export function parseCookies(headerValues: readonly string[]): Record<string, string> {
	const cookies = createNameMap<string>();
	for (const header of headerValues) {
		for (const pair of header.split(";")) {
			const separator = pair.indexOf("=");
			if (separator <= 0) {
				continue;
			}
			const name = pair.slice(0, separator).trim();
			const raw = pair.slice(separator + 1).trim();
			const unquoted = raw.startsWith('"') && raw.endsWith('"') && raw.length >= 2 ? raw.slice(1, -1) : raw;
			try {
				cookies[name] = decodeURIComponent(unquoted);
			} catch {
				cookies[name] = unquoted;
			}
		}
	}
	return cookies;
}

/**
 * Lower-case header names and collect values into arrays
 */
export function normalizeHeaders(
	headers: Record<string, string | readonly string[] | undefined>,
): Record<string, string[]> {
	const result = createNameMap<string[]>();
	for (const [name, value] of Object.entries(headers)) {
		if (value === undefined) {
			continue;
		}
		append(result, name.toLowerCase(), typeof value === "string" ? [value] : value);
	}
	return result;
}

/**
 * First value of a header, by case-insensitive name
 */
export function headerValue(request: Pick<RequestView, "headers">, name: string): string | undefined {
	return ownValue(request.headers, name.toLowerCase())?.[0];
}

/**
 * Build a RequestView from raw parts
 */
export function createRequestView(init: RequestInit): RequestView {
	const queryIndex = init.url.indexOf("?");
	const rawPath = queryIndex >= 0 ? init.url.slice(0, queryIndex) : init.url;
	const rawQuery = queryIndex >= 0 ? init.url.slice(queryIndex + 1) : "";
	const headers = normalizeHeaders(init.headers ?? {});

	let path: string;
	try {
		path = decodeURIComponent(rawPath || "/");
	} catch {
		path = rawPath || "/";
	}

	return Object.freeze({
		method: (init.method ?? "GET").toUpperCase(),
		path,
		rawPath: rawPath || "/",
		query: parseQuery(rawQuery),
		headers,
		cookies: parseCookies(ownValue(headers, "cookie") ?? []),
		body: init.body === undefined ? new Uint8Array(0) : toBuffer(init.body),
		secure: init.secure ?? false,
	});
}

/**
 * Serialize a query map back to a query string (without "?")
 */
export function formatQuery(query: Readonly<Record<string, readonly string[]>>): string {
	const params = new URLSearchParams();
	for (const [name, values] of Object.entries(query)) {
		for (const value of values) {
			params.append(name, value);
		}
	}
	return params.toString();
}
