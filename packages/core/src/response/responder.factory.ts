/**
 * Responder Factory
 *
 * Validates response specs at configuration time and turns them into
 * responders. A body whose encoder cannot be resolved is a configuration
 * error raised here, not at request time.
 */

import type { CodecRegistry, EncoderRegistrar } from "../codecs/codec.registry";
import { describePayload } from "../codecs/codec.registry";
import { MultipartBody, type MultipartPartSpec } from "../codecs/multipart.codec";
import { Base64Payload, FileSource } from "../codecs/payload.types";
import { ConfigurationError, ensure } from "../errors";
import { createNameMap } from "../utils";
import type { DelaySpec, HeaderMap, Responder } from "./response.types";

export type DelayInput = number | readonly [number, number] | DelaySpec;

interface TimingSpec {
	status?: number;
	headers?: HeaderMap;
	/** Fixed delay in ms, or [min, max] for a uniform random delay */
	delay?: DelayInput;
	/** Split the body into this many chunks, each followed by the delay */
	chunks?: number;
	trailers?: Record<string, string>;
}

export interface ResponseSpec extends TimingSpec {
	body?: unknown;
	/** Overrides the Content-Type header and the default for the body */
	contentType?: string;
	/** Responder-local encoders, consulted before the expectation's */
	encoders?: (registrar: EncoderRegistrar) => void;
}

export interface MultipartResponseSpec extends TimingSpec {
	parts: MultipartPartSpec[];
	/** Multipart subtype, "form-data" by default */
	subtype?: string;
	boundary?: string;
	/** Encoders used for parts only */
	partEncoders?: (registrar: EncoderRegistrar) => void;
	encoders?: (registrar: EncoderRegistrar) => void;
}

export interface ForwardSpec {
	headers?: Record<string, string>;
}

export function toDelaySpec(input: DelayInput): DelaySpec {
	if (typeof input === "number") {
		ensure(Number.isFinite(input) && input >= 0, "delay", `expected a non-negative number, got ${input}`);
		return { kind: "fixed", ms: input };
	}
	if ("kind" in input) {
		return input.kind === "fixed" ? toDelaySpec(input.ms) : toDelaySpec([input.min, input.max]);
	}
	const [min, max] = input;
	ensure(Number.isFinite(min) && min >= 0 && Number.isFinite(max), "delay", `range [${min}, ${max}] must be non-negative`);
	ensure(min <= max, "delay", `range [${min}, ${max}] is inverted`);
	return min === max ? { kind: "fixed", ms: min } : { kind: "range", min, max };
}

/**
 * Content-type used when a responder gives a body without one
 */
export function defaultContentType(value: unknown): string {
	if (typeof value === "string") {
		return "text/plain; charset=utf-8";
	}
	if (value instanceof Base64Payload) {
		return "text/plain; charset=us-ascii";
	}
	if (value instanceof Uint8Array || value instanceof URL || value instanceof FileSource || (typeof value === "object" && value !== null && "pipe" in value)) {
		return "application/octet-stream";
	}
	if (value instanceof MultipartBody) {
		return `multipart/form-data; boundary=${value.boundary}`;
	}
	return "application/json";
}

function normalizeHeaders(headers: HeaderMap | undefined): HeaderMap {
	const result: HeaderMap = createNameMap();
	for (const [name, value] of Object.entries(headers ?? {})) {
		ensure(name.trim().length > 0, "response header", "header name must not be empty");
		result[name.toLowerCase()] = Array.isArray(value) ? [...value] : value;
	}
	return result;
}

function firstHeader(headers: HeaderMap, name: string): string | undefined {
	const value = headers[name];
	return Array.isArray(value) ? value[0] : value;
}

function validateTiming(spec: TimingSpec): { status: number; delay?: DelaySpec; chunks?: number } {
	const status = spec.status ?? 200;
	ensure(Number.isInteger(status) && status >= 100 && status <= 599, "status", `${status} is not an HTTP status`);
	if (spec.chunks !== undefined) {
		ensure(Number.isInteger(spec.chunks) && spec.chunks >= 1, "chunks", `expected a positive integer, got ${spec.chunks}`);
	}
	return {
		status,
		...(spec.delay !== undefined ? { delay: toDelaySpec(spec.delay) } : {}),
		...(spec.chunks !== undefined ? { chunks: spec.chunks } : {}),
	};
}

export function createStaticResponder(spec: ResponseSpec, parent: CodecRegistry, scope: string): Responder {
	const timing = validateTiming(spec);
	const headers = normalizeHeaders(spec.headers);
	const codecs = parent.child(scope);
	spec.encoders?.(codecs);

	const base = { kind: "static" as const, ...timing, headers, codecs, ...(spec.trailers ? { trailers: { ...spec.trailers } } : {}) };
	if (spec.body === undefined) {
		return base;
	}

	const contentType = spec.contentType ?? firstHeader(headers, "content-type") ?? defaultContentType(spec.body);
	const encoder = codecs.findEncoder(contentType, spec.body);
	if (!encoder) {
		throw new ConfigurationError(
			"response body",
			`no encoder for content-type "${contentType}" and payload type ${describePayload(spec.body)}`,
		);
	}
	headers["content-type"] = contentType;
	return { ...base, body: { value: spec.body, contentType } };
}

export function createMultipartResponder(spec: MultipartResponseSpec, parent: CodecRegistry, scope: string): Responder {
	const timing = validateTiming(spec);
	const headers = normalizeHeaders(spec.headers);
	const codecs = parent.child(scope);
	spec.encoders?.(codecs);

	let partEncoders: CodecRegistry | undefined;
	if (spec.partEncoders) {
		partEncoders = codecs.child(`${scope} parts`);
		spec.partEncoders(partEncoders);
	}

	const body = new MultipartBody(spec.parts, {
		...(spec.boundary !== undefined ? { boundary: spec.boundary } : {}),
		...(partEncoders ? { encoders: partEncoders } : {}),
	});

	for (const partSpec of spec.parts) {
		if (partSpec.kind === "part" && !(partEncoders ?? codecs).findEncoder(partSpec.contentType, partSpec.value)) {
			throw new ConfigurationError(
				"multipart part",
				`no encoder for part "${partSpec.name}" with content-type "${partSpec.contentType}"`,
			);
		}
	}

	const contentType = `multipart/${spec.subtype ?? "form-data"}; boundary=${body.boundary}`;
	headers["content-type"] = contentType;
	return {
		kind: "multipart",
		...timing,
		headers,
		codecs,
		body,
		contentType,
		...(spec.trailers ? { trailers: { ...spec.trailers } } : {}),
	};
}

export function createForwardResponder(target: string | URL, spec: ForwardSpec = {}): Responder {
	let url: URL;
	try {
		url = new URL(target);
	} catch {
		throw new ConfigurationError("forward target", `"${String(target)}" is not a URL`);
	}
	ensure(url.protocol === "http:" || url.protocol === "https:", "forward target", `unsupported scheme ${url.protocol}`);
	return { kind: "forward", target: url, headers: { ...spec.headers } };
}
