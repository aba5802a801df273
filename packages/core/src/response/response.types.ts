/**
 * Response Types
 *
 * Responders describe candidate responses configured on an expectation.
 * The synthesizer turns the selected responder into either a response
 * description or a forward directive; the listener executes both.
 */

import type { CodecRegistry } from "../codecs/codec.registry";
import type { MultipartBody } from "../codecs/multipart.codec";

export type HeaderMap = Record<string, string | string[]>;

/**
 * Delay applied before the response (or after each chunk of a stream plan)
 */
export type DelaySpec = { readonly kind: "fixed"; readonly ms: number } | { readonly kind: "range"; readonly min: number; readonly max: number };

export interface BodySpec {
	readonly value: unknown;
	/** Content-type the body is encoded with */
	readonly contentType: string;
}

interface TimedResponder {
	readonly status: number;
	/** Header names are lower-case */
	readonly headers: Readonly<HeaderMap>;
	/** Responder-local codecs; parent is the expectation registry */
	readonly codecs: CodecRegistry;
	readonly delay?: DelaySpec;
	/** Number of chunks for a chunked stream plan */
	readonly chunks?: number;
	readonly trailers?: Readonly<Record<string, string>>;
}

export type Responder =
	| ({ readonly kind: "static"; readonly body?: BodySpec } & TimedResponder)
	| ({ readonly kind: "multipart"; readonly body: MultipartBody; readonly contentType: string } & TimedResponder)
	| {
			readonly kind: "forward";
			/** Upstream base URL; the original path and query are appended */
			readonly target: URL;
			/** Extra headers added to the forwarded request */
			readonly headers: Readonly<Record<string, string>>;
	  };

export type ResponderKind = Responder["kind"];

export type ContentCoding = "gzip" | "deflate" | "br";

export interface StreamChunk {
	readonly bytes: Buffer;
	/** Pause after writing this chunk */
	readonly delayAfterMs: number;
}

export interface StreamPlan {
	readonly chunks: readonly StreamChunk[];
}

export interface ResponseDescription {
	readonly status: number;
	/** Lower-case header names */
	readonly headers: HeaderMap;
	/** Full, uncompressed body */
	readonly body: Buffer;
	/** Pause before writing the status line */
	readonly delayMs: number;
	/** Timed chunked writes; when present the listener writes these instead of body */
	readonly stream?: StreamPlan;
	/** The listener compresses body with this coding and sets Content-Encoding */
	readonly compression?: ContentCoding;
	readonly trailers?: Readonly<Record<string, string>>;
}

export interface ForwardDirective {
	/** Absolute upstream URL including the original path and query */
	readonly url: string;
	readonly method: string;
	readonly headers: Record<string, string[]>;
	readonly body: Uint8Array;
}

export type Synthesis =
	| { readonly kind: "respond"; readonly response: ResponseDescription }
	| { readonly kind: "forward"; readonly directive: ForwardDirective };
