/**
 * Codec Types
 *
 * Decoders turn request bytes into objects for body matchers.
 * Encoders turn responder bodies into response bytes.
 * Both are resolved by content-type; encoders additionally by payload type,
 * so one content-type can carry several encoders for different shapes.
 */

import type { MediaType } from "./media-type";

/**
 * Runtime description of a payload shape used to key encoders
 *
 * @example
 * ```typescript
 * const orderType: PayloadType<Order> = {
 *   name: "Order",
 *   is: (value): value is Order => value instanceof Order,
 * };
 * ```
 */
export interface PayloadType<T> {
	readonly name: string;
	is(value: unknown): value is T;
}

/**
 * Handle to the decoder chain a decoder was resolved from.
 * Lets a decoder delegate nested content (e.g. multipart parts).
 */
export interface DecoderChain {
	decode(bytes: Uint8Array, contentType: string): unknown;
}

/**
 * Handle to the encoder chain an encoder was resolved from
 */
export interface EncoderChain {
	encode(value: unknown, contentType: string): Promise<Buffer>;
}

export interface DecodingContext {
	/** Content-Type header value as received */
	readonly contentType: string;
	readonly mediaType: MediaType;
	readonly charset: BufferEncoding;
	/** Declared Content-Length, or the byte length of the body */
	readonly contentLength: number;
	readonly chain: DecoderChain;
}

export interface EncodingContext {
	readonly contentType: string;
	readonly mediaType: MediaType;
	readonly charset: BufferEncoding;
	readonly chain: EncoderChain;
}

export type DecodeFn = (bytes: Uint8Array, context: DecodingContext) => unknown;

export type EncodeFn<T> = (value: T, context: EncodingContext) => Uint8Array | string | Promise<Uint8Array | string>;

/**
 * Codec operation type
 */
export type CodecOperation = "encode" | "decode";

/**
 * Error thrown when codec encoding or decoding fails.
 *
 * @example
 * ```typescript
 * try {
 *   registry.decode(bytes, "application/json");
 * } catch (error) {
 *   if (error instanceof CodecError) {
 *     console.log(`Codec ${error.codecName} failed to ${error.operation}`);
 *   }
 * }
 * ```
 */
export class CodecError extends Error {
	/**
	 * Name of the codec that failed
	 */
	readonly codecName: string;

	/**
	 * Operation that failed ("encode" or "decode")
	 */
	readonly operation: CodecOperation;

	/**
	 * The data that caused the error, truncated for large payloads
	 */
	readonly data?: unknown;

	constructor(
		message: string,
		codecName: string,
		operation: CodecOperation,
		options?: {
			cause?: Error;
			data?: unknown;
		},
	) {
		super(message, options?.cause ? { cause: options.cause } : undefined);
		this.name = "CodecError";
		this.codecName = codecName;
		this.operation = operation;
		this.data = options?.data;
	}

	static encodeError(codecName: string, cause: Error, data?: unknown): CodecError {
		return new CodecError(`Failed to encode body with ${codecName} codec: ${cause.message}`, codecName, "encode", {
			cause,
			data,
		});
	}

	static decodeError(codecName: string, cause: Error, data?: unknown): CodecError {
		return new CodecError(`Failed to decode body with ${codecName} codec: ${cause.message}`, codecName, "decode", {
			cause,
			data,
		});
	}

	static notFound(operation: CodecOperation, contentType: string, typeName?: string): CodecError {
		const what = operation === "decode" ? "decoder" : "encoder";
		const forType = typeName ? ` and payload type ${typeName}` : "";
		return new CodecError(`No ${what} registered for content-type "${contentType}"${forType}`, "none", operation);
	}
}

/**
 * Wrap any thrown value as an Error
 */
export function asError(error: unknown): Error {
	return error instanceof Error ? error : new Error(String(error));
}
