/**
 * Multipart Codec
 *
 * Assembles and parses boundary-delimited bodies (multipart/form-data,
 * multipart/mixed). Each part's content is delegated to the chain the
 * multipart codec was resolved from, so nested content-types use the same
 * registries as top-level bodies.
 */

import { ensure } from "../errors";
import { createNameMap, generateId, toBuffer } from "../utils";
import type { DecodeFn, EncodeFn } from "./codec.types";
import { CodecError } from "./codec.types";
import type { CodecRegistry } from "./codec.registry";
import { parseMediaType } from "./media-type";

const CRLF = "\r\n";
const FIELD_CONTENT_TYPE = "text/plain";

export type MultipartPartSpec =
	| { readonly kind: "field"; readonly name: string; readonly value: string }
	| {
			readonly kind: "part";
			readonly name: string;
			readonly value: unknown;
			readonly contentType: string;
			readonly filename?: string;
			readonly headers?: Readonly<Record<string, string>>;
	  };

export interface MultipartOptions {
	/** Boundary to use; generated when omitted */
	boundary?: string;
	/** Per-part encoders, consulted before the response chain */
	encoders?: CodecRegistry;
}

/**
 * Multipart response body
 *
 * @example
 * ```typescript
 * const body = new MultipartBody([
 *   field("title", "report"),
 *   part("data", { rows: 3 }, { contentType: "application/json", filename: "data.json" }),
 * ]);
 * ```
 */
export class MultipartBody {
	readonly boundary: string;
	readonly encoders?: CodecRegistry;

	constructor(
		readonly parts: readonly MultipartPartSpec[],
		options: MultipartOptions = {},
	) {
		this.boundary = options.boundary ?? generateBoundary();
		this.encoders = options.encoders;
		ensure(/^[0-9A-Za-z'()+_,\-./:=?]{1,70}$/.test(this.boundary), "multipart boundary", `"${this.boundary}"`);
		for (const spec of parts) {
			ensure(spec.name.length > 0, "multipart part", "part name must not be empty");
		}
	}
}

/**
 * Decoded part of a multipart request body
 */
export interface MultipartPart {
	readonly name: string;
	readonly filename?: string;
	readonly contentType: string;
	readonly headers: Readonly<Record<string, string>>;
	readonly body: Buffer;
	/** Part body decoded through the decoder chain */
	readonly value: unknown;
}

export function field(name: string, value: string): MultipartPartSpec {
	return { kind: "field", name, value };
}

export function part(
	name: string,
	value: unknown,
	options: { contentType: string; filename?: string; headers?: Record<string, string> },
): MultipartPartSpec {
	return { kind: "part", name, value, ...options };
}

export function generateBoundary(): string {
	return `----httpdouble${generateId().replace(/[^0-9a-z]/g, "")}`;
}

function quote(value: string): string {
	return `"${value.replace(/"/g, "%22").replace(/\r|\n/g, " ")}"`;
}

/**
 * Assemble a multipart body. Field parts are text/plain; other parts are
 * encoded through the per-part registry first, then the response chain.
 */
export const encodeMultipart: EncodeFn<MultipartBody> = async (body, context) => {
	const boundary = context.mediaType.params.boundary ?? body.boundary;
	const chunks: Buffer[] = [];

	for (const spec of body.parts) {
		const contentType = spec.kind === "field" ? FIELD_CONTENT_TYPE : spec.contentType;
		let disposition = `form-data; name=${quote(spec.name)}`;
		if (spec.kind === "part" && spec.filename !== undefined) {
			disposition += `; filename=${quote(spec.filename)}`;
		}

		const headerLines = [`Content-Disposition: ${disposition}`, `Content-Type: ${contentType}`];
		if (spec.kind === "part" && spec.headers) {
			for (const [name, value] of Object.entries(spec.headers)) {
				headerLines.push(`${name}: ${value}`);
			}
		}

		let content: Buffer;
		if (spec.kind === "field") {
			content = Buffer.from(spec.value, "utf-8");
		} else {
			const local = body.encoders?.findEncoder(contentType, spec.value);
			if (local) {
				const mediaType = parseMediaType(contentType);
				content = await local.encode({ contentType, mediaType, charset: context.charset, chain: context.chain });
			} else {
				content = await context.chain.encode(spec.value, contentType);
			}
		}

		chunks.push(Buffer.from(`--${boundary}${CRLF}${headerLines.join(CRLF)}${CRLF}${CRLF}`, "utf-8"), content, Buffer.from(CRLF));
	}

	chunks.push(Buffer.from(`--${boundary}--${CRLF}`, "utf-8"));
	return Buffer.concat(chunks);
};

function parseDispositionParam(disposition: string, param: string): string | undefined {
	const match = new RegExp(`(?:^|;)\\s*${param}="([^"]*)"`, "i").exec(disposition) ??
		new RegExp(`(?:^|;)\\s*${param}=([^;\\s]*)`, "i").exec(disposition);
	return match?.[1]?.replace(/%22/g, '"');
}

/**
 * Split a multipart body into parts. Each part's value is decoded through
 * the chain by the part's own content-type.
 */
export const decodeMultipart: DecodeFn = (bytes, context) => {
	const boundary = context.mediaType.params.boundary;
	if (!boundary) {
		throw new CodecError(`Missing boundary in "${context.contentType}"`, "multipart", "decode");
	}

	const buffer = toBuffer(bytes);
	const delimiter = Buffer.from(`--${boundary}`, "utf-8");
	const parts: MultipartPart[] = [];

	let position = buffer.indexOf(delimiter);
	if (position < 0) {
		throw new CodecError("Body does not contain the boundary", "multipart", "decode");
	}

	while (position >= 0) {
		const afterDelimiter = position + delimiter.length;
		if (buffer.toString("utf-8", afterDelimiter, afterDelimiter + 2) === "--") {
			break;
		}

		const headerStart = afterDelimiter + CRLF.length;
		const headerEnd = buffer.indexOf(`${CRLF}${CRLF}`, headerStart, "utf-8");
		if (headerEnd < 0) {
			throw new CodecError("Part headers are not terminated", "multipart", "decode");
		}

		const next = buffer.indexOf(Buffer.concat([Buffer.from(CRLF), delimiter]), headerEnd);
		if (next < 0) {
			throw new CodecError("Closing boundary not found", "multipart", "decode");
		}

		const headers = createNameMap<string>();
		for (const line of buffer.toString("utf-8", headerStart, headerEnd).split(CRLF)) {
			const colon = line.indexOf(":");
			if (colon > 0) {
				headers[line.slice(0, colon).trim().toLowerCase()] = line.slice(colon + 1).trim();
			}
		}

		const disposition = headers["content-disposition"] ?? "";
		const name = parseDispositionParam(disposition, "name");
		if (name === undefined) {
			throw new CodecError("Part without a name", "multipart", "decode");
		}

		const contentType = headers["content-type"] ?? FIELD_CONTENT_TYPE;
		const body = Buffer.from(buffer.subarray(headerEnd + 4, next));
		const filename = parseDispositionParam(disposition, "filename");

		parts.push({
			name,
			...(filename !== undefined ? { filename } : {}),
			contentType,
			headers,
			body,
			value: context.chain.decode(body, contentType),
		});

		position = next + CRLF.length;
	}

	return parts;
};
