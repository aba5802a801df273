/**
 * Codec Registry
 *
 * Scoped decoder/encoder lookup. Registries form a chain from the closest
 * scope (expectation, responder) to the server-wide registry and finally the
 * built-in codecs. Lookup walks the chain from the closest scope outward, and
 * inside one registry the latest registration wins.
 */

import { toBuffer } from "../utils";
import type {
	DecodeFn,
	DecoderChain,
	DecodingContext,
	EncodeFn,
	EncoderChain,
	EncodingContext,
	PayloadType,
} from "./codec.types";
import { CodecError, asError } from "./codec.types";
import { charsetOf, mediaRangeMatches, parseMediaType } from "./media-type";

interface DecoderEntry {
	readonly range: string;
	readonly decode: DecodeFn;
}

interface EncoderEntry {
	readonly range: string;
	readonly typeName: string;
	accepts(value: unknown): boolean;
	encode(value: unknown, context: EncodingContext): Uint8Array | string | Promise<Uint8Array | string>;
}

/**
 * Decoder found by a lookup, with the scope that provided it
 */
export interface ResolvedDecoder {
	readonly scope: string;
	readonly range: string;
	readonly decode: DecodeFn;
}

/**
 * Encoder found by a lookup, bound to the value it was resolved for
 */
export interface ResolvedEncoder {
	readonly scope: string;
	readonly range: string;
	readonly typeName: string;
	encode(context: EncodingContext): Promise<Buffer>;
}

/**
 * Registration surface handed to `globalDecoders(fn)` and builder `decoders(fn)`
 */
export interface DecoderRegistrar {
	decoder(contentType: string, decode: DecodeFn): DecoderRegistrar;
}

/**
 * Registration surface handed to `globalEncoders(fn)` and builder `encoders(fn)`
 */
export interface EncoderRegistrar {
	encoder<T>(contentType: string, type: PayloadType<T>, encode: EncodeFn<T>): EncoderRegistrar;
}

export class CodecRegistry implements DecoderChain, EncoderChain, DecoderRegistrar, EncoderRegistrar {
	private readonly decoders: DecoderEntry[] = [];
	private readonly encoders: EncoderEntry[] = [];

	/**
	 * @param scope - Name used in diagnostics ("global", "expectation #2", ...)
	 * @param parent - Next registry to consult when this one has no match
	 */
	constructor(
		readonly scope: string,
		private readonly parent?: CodecRegistry,
	) {}

	/**
	 * Create a registry whose lookups fall back to this one
	 */
	child(scope: string): CodecRegistry {
		return new CodecRegistry(scope, this);
	}

	decoder(contentType: string, decode: DecodeFn): this {
		this.decoders.push({ range: contentType, decode });
		return this;
	}

	encoder<T>(contentType: string, type: PayloadType<T>, encode: EncodeFn<T>): this {
		this.encoders.push({
			range: contentType,
			typeName: type.name,
			accepts: (value) => type.is(value),
			encode: (value, context) => {
				if (!type.is(value)) {
					throw CodecError.notFound("encode", context.contentType, type.name);
				}
				return encode(value, context);
			},
		});
		return this;
	}

	/**
	 * Find the closest decoder for a content-type
	 */
	findDecoder(contentType: string): ResolvedDecoder | undefined {
		const { essence } = parseMediaType(contentType);
		for (let registry: CodecRegistry | undefined = this; registry; registry = registry.parent) {
			for (let i = registry.decoders.length - 1; i >= 0; i--) {
				const entry = registry.decoders[i];
				if (entry && mediaRangeMatches(entry.range, essence)) {
					return { scope: registry.scope, range: entry.range, decode: entry.decode };
				}
			}
		}
		return undefined;
	}

	/**
	 * Find the closest encoder for a content-type that accepts the value
	 */
	findEncoder(contentType: string, value: unknown): ResolvedEncoder | undefined {
		const { essence } = parseMediaType(contentType);
		for (let registry: CodecRegistry | undefined = this; registry; registry = registry.parent) {
			for (let i = registry.encoders.length - 1; i >= 0; i--) {
				const entry = registry.encoders[i];
				if (entry && mediaRangeMatches(entry.range, essence) && entry.accepts(value)) {
					return {
						scope: registry.scope,
						range: entry.range,
						typeName: entry.typeName,
						encode: async (context) => toBuffer(await entry.encode(value, context)),
					};
				}
			}
		}
		return undefined;
	}

	/**
	 * Decode bytes with the closest matching decoder.
	 * Throws CodecError when no decoder matches or the decoder fails.
	 */
	decode(bytes: Uint8Array, contentType: string): unknown {
		const resolved = this.findDecoder(contentType);
		if (!resolved) {
			throw CodecError.notFound("decode", contentType);
		}
		const mediaType = parseMediaType(contentType);
		const context: DecodingContext = {
			contentType,
			mediaType,
			charset: charsetOf(mediaType),
			contentLength: bytes.byteLength,
			chain: this,
		};
		try {
			return resolved.decode(bytes, context);
		} catch (error) {
			if (error instanceof CodecError) {
				throw error;
			}
			const preview = toBuffer(bytes).subarray(0, 200).toString("utf-8");
			throw CodecError.decodeError(`${resolved.scope} ${resolved.range}`, asError(error), preview);
		}
	}

	/**
	 * Encode a value with the closest matching encoder.
	 * Throws CodecError when no encoder matches or the encoder fails.
	 */
	async encode(value: unknown, contentType: string): Promise<Buffer> {
		const resolved = this.findEncoder(contentType, value);
		if (!resolved) {
			throw CodecError.notFound("encode", contentType, describePayload(value));
		}
		const mediaType = parseMediaType(contentType);
		try {
			return await resolved.encode({ contentType, mediaType, charset: charsetOf(mediaType), chain: this });
		} catch (error) {
			if (error instanceof CodecError) {
				throw error;
			}
			throw CodecError.encodeError(`${resolved.scope} ${resolved.range}`, asError(error));
		}
	}
}

/**
 * Short runtime description of a value for error messages
 */
export function describePayload(value: unknown): string {
	if (value === null) {
		return "null";
	}
	if (typeof value !== "object") {
		return typeof value;
	}
	return value.constructor?.name ?? "object";
}
