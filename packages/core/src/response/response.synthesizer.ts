/**
 * Response Synthesizer
 *
 * Turns the responder selected for a call into a response description or a
 * forward directive. It decides what to send and when; the listener does the
 * socket writes, the timed pauses, compression and the upstream request.
 */

import type { Expectation } from "../expectations/expectation.types";
import type { RequestView } from "../request/request.types";
import { formatQuery, headerValue } from "../request/request.utils";
import { createNameMap } from "../utils";
import type {
	ContentCoding,
	DelaySpec,
	ForwardDirective,
	HeaderMap,
	Responder,
	ResponseDescription,
	StreamChunk,
	Synthesis,
} from "./response.types";

export interface SynthesizerOptions {
	/** Negotiate Content-Encoding from Accept-Encoding */
	compression: boolean;
	/** Source of randomness for delay ranges, in [0, 1) */
	random?: () => number;
}

const SUPPORTED_CODINGS: readonly ContentCoding[] = ["gzip", "br", "deflate"];

const HOP_BY_HOP = new Set([
	"connection",
	"keep-alive",
	"proxy-authenticate",
	"proxy-authorization",
	"te",
	"trailer",
	"transfer-encoding",
	"upgrade",
	"host",
	"content-length",
]);

/**
 * Responder for the given 1-based call number. Calls beyond the list reuse
 * the last responder.
 */
export function selectResponder(expectation: Pick<Expectation, "responders">, callNumber: number): Responder {
	const { responders } = expectation;
	const index = Math.min(Math.max(callNumber, 1), responders.length) - 1;
	const responder = responders[index];
	if (!responder) {
		throw new Error("Expectation has no responders");
	}
	return responder;
}

export function computeDelay(delay: DelaySpec | undefined, random: () => number = Math.random): number {
	if (!delay) {
		return 0;
	}
	if (delay.kind === "fixed") {
		return delay.ms;
	}
	return Math.round(delay.min + random() * (delay.max - delay.min));
}

/**
 * Split bytes into `count` chunks whose lengths differ by at most one byte.
 * A body shorter than `count` yields one chunk per byte (or one empty chunk).
 */
export function splitBalanced(body: Buffer, count: number): Buffer[] {
	const parts = Math.max(1, Math.min(count, body.length));
	const base = Math.floor(body.length / parts);
	const remainder = body.length % parts;
	const chunks: Buffer[] = [];
	let offset = 0;
	for (let i = 0; i < parts; i++) {
		const size = base + (i < remainder ? 1 : 0);
		chunks.push(body.subarray(offset, offset + size));
		offset += size;
	}
	return chunks;
}

/**
 * Pick a content coding from an Accept-Encoding header, by q-value then by
 * server preference (gzip, br, deflate). Returns undefined for identity.
 */
export function negotiateEncoding(acceptEncoding: string | undefined): ContentCoding | undefined {
	if (!acceptEncoding) {
		return undefined;
	}

	const weights = new Map<string, number>();
	for (const entry of acceptEncoding.split(",")) {
		const [token = "", ...params] = entry.trim().split(";");
		const name = token.trim().toLowerCase();
		if (!name) {
			continue;
		}
		let q = 1;
		for (const param of params) {
			const [key, value] = param.trim().split("=");
			if (key?.trim().toLowerCase() === "q" && value !== undefined) {
				const parsed = Number.parseFloat(value);
				q = Number.isNaN(parsed) ? 0 : parsed;
			}
		}
		weights.set(name, q);
	}

	let best: ContentCoding | undefined;
	let bestQ = 0;
	for (const coding of SUPPORTED_CODINGS) {
		const q = weights.get(coding) ?? weights.get("*") ?? 0;
		if (q > bestQ) {
			best = coding;
			bestQ = q;
		}
	}
	return best;
}

/**
 * Build the forward directive: upstream base + original path and query
 */
export function forwardDirective(target: URL, extraHeaders: Readonly<Record<string, string>>, request: RequestView): ForwardDirective {
	const basePath = target.pathname.replace(/\/+$/, "");
	const url = new URL(target.href);
	url.pathname = `${basePath}${request.rawPath}`;
	url.search = formatQuery(request.query);

	const headers = createNameMap<string[]>();
	for (const [name, values] of Object.entries(request.headers)) {
		if (!HOP_BY_HOP.has(name)) {
			headers[name] = [...values];
		}
	}
	for (const [name, value] of Object.entries(extraHeaders)) {
		headers[name.toLowerCase()] = [value];
	}

	return { url: url.href, method: request.method, headers, body: request.body };
}

export class ResponseSynthesizer {
	private readonly random: () => number;

	constructor(private readonly options: SynthesizerOptions) {
		this.random = options.random ?? Math.random;
	}

	/**
	 * Synthesize the response for a matched call
	 */
	async synthesize(responder: Responder, request: RequestView): Promise<Synthesis> {
		switch (responder.kind) {
			case "forward":
				return { kind: "forward", directive: forwardDirective(responder.target, responder.headers, request) };
			case "static": {
				const body = responder.body
					? await responder.codecs.encode(responder.body.value, responder.body.contentType)
					: Buffer.alloc(0);
				return { kind: "respond", response: this.describe(responder, body, request) };
			}
			case "multipart": {
				const body = await responder.codecs.encode(responder.body, responder.contentType);
				return { kind: "respond", response: this.describe(responder, body, request) };
			}
		}
	}

	private describe(
		responder: Exclude<Responder, { kind: "forward" }>,
		body: Buffer,
		request: RequestView,
	): ResponseDescription {
		const headers: HeaderMap = createNameMap();
		for (const [name, value] of Object.entries(responder.headers)) {
			headers[name] = Array.isArray(value) ? [...value] : value;
		}

		const chunked = responder.chunks !== undefined || responder.trailers !== undefined;
		const precompressed = headers["content-encoding"] !== undefined;

		let compression: ContentCoding | undefined;
		if (this.options.compression && !precompressed && !chunked && body.length > 0) {
			compression = negotiateEncoding(headerValue(request, "accept-encoding"));
		}
		if (compression) {
			headers["content-encoding"] = compression;
			headers.vary = "accept-encoding";
		}

		let stream: { chunks: StreamChunk[] } | undefined;
		let delayMs = 0;
		if (chunked) {
			stream = {
				chunks: splitBalanced(body, responder.chunks ?? 1).map((bytes) => ({
					bytes,
					delayAfterMs: computeDelay(responder.delay, this.random),
				})),
			};
			headers["transfer-encoding"] = "chunked";
			delete headers["content-length"];
		} else {
			delayMs = computeDelay(responder.delay, this.random);
		}

		if (responder.trailers) {
			headers.trailer = Object.keys(responder.trailers).join(", ");
		}

		return {
			status: responder.status,
			headers,
			body,
			delayMs,
			...(stream ? { stream } : {}),
			...(compression ? { compression } : {}),
			...(responder.trailers ? { trailers: { ...responder.trailers } } : {}),
		};
	}
}
