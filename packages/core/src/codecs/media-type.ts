/**
 * Media type parsing and range matching
 */

import { createNameMap } from "../utils";

export interface MediaType {
	/** "type/subtype", lower-case */
	readonly essence: string;
	readonly type: string;
	readonly subtype: string;
	/** Parameters with lower-case names, unquoted values */
	readonly params: Readonly<Record<string, string>>;
}

export const DEFAULT_CONTENT_TYPE = "application/octet-stream";

export function parseMediaType(value: string | undefined): MediaType {
	const [essencePart = "", ...paramParts] = (value ?? "").split(";");
	const essence = essencePart.trim().toLowerCase() || DEFAULT_CONTENT_TYPE;
	const slash = essence.indexOf("/");
	const type = slash >= 0 ? essence.slice(0, slash) : essence;
	const subtype = slash >= 0 ? essence.slice(slash + 1) : "*";

	const params = createNameMap<string>();
	for (const part of paramParts) {
		const eq = part.indexOf("=");
		if (eq <= 0) {
			continue;
		}
		const name = part.slice(0, eq).trim().toLowerCase();
		let paramValue = part.slice(eq + 1).trim();
		if (paramValue.length >= 2 && paramValue.startsWith('"') && paramValue.endsWith('"')) {
			paramValue = paramValue.slice(1, -1);
		}
		params[name] = paramValue;
	}

	return { essence, type, subtype, params };
}

/**
 * Match a media range such as "text/*", "application/*+json" or "*\/*"
 * against a concrete essence
 */
export function mediaRangeMatches(range: string, essence: string): boolean {
	const normalized = range.trim().toLowerCase();
	if (normalized === "*/*" || normalized === "*") {
		return true;
	}
	if (!normalized.includes("*")) {
		return normalized === essence;
	}
	const source = normalized
		.split("*")
		.map((piece) => piece.replace(/[.+?^${}()|[\]\\/]/g, "\\$&"))
		.join("[^/]*");
	return new RegExp(`^${source}$`).test(essence);
}

const CHARSETS: Record<string, BufferEncoding> = {
	"utf-8": "utf-8",
	utf8: "utf-8",
	"us-ascii": "ascii",
	ascii: "ascii",
	"iso-8859-1": "latin1",
	latin1: "latin1",
	"utf-16le": "utf16le",
	utf16le: "utf16le",
};

/**
 * Resolve the charset parameter to a Node encoding. Unknown charsets fall
 * back to UTF-8.
 */
export function charsetOf(mediaType: MediaType): BufferEncoding {
	const charset = mediaType.params.charset?.toLowerCase();
	return (charset && CHARSETS[charset]) || "utf-8";
}
