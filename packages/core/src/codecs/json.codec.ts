/**
 * JSON Codec
 *
 * Decoder and encoder for application/json and application/*+json.
 * Supports custom reviver/replacer functions.
 */

import type { DecodeFn, EncodeFn } from "./codec.types";
import { CodecError, asError } from "./codec.types";
import { toBuffer, truncate } from "../utils";

/**
 * JSON codec configuration options
 */
export interface JsonCodecOptions {
	/**
	 * Custom reviver function for JSON.parse().
	 *
	 * @example Convert ISO date strings to Date objects
	 * ```typescript
	 * const codec = new JsonCodec({
	 *   reviver: (key, value) => {
	 *     if (typeof value === "string" && /^\d{4}-\d{2}-\d{2}T/.test(value)) {
	 *       return new Date(value);
	 *     }
	 *     return value;
	 *   }
	 * });
	 * ```
	 */
	reviver?: (key: string, value: unknown) => unknown;

	/**
	 * Custom replacer function for JSON.stringify().
	 */
	replacer?: (key: string, value: unknown) => unknown;

	/**
	 * Indentation for pretty-printing. Leave undefined for compact output.
	 */
	space?: string | number;
}

export const JSON_MEDIA_RANGES = ["application/json", "application/*+json"] as const;

/**
 * JSON codec for text-based body serialization.
 *
 * @example Register a pretty-printing encoder server-wide
 * ```typescript
 * const codec = new JsonCodec({ space: 2 });
 * server.globalEncoders((e) => e.encoder("application/json", jsonType, codec.encode));
 * ```
 */
export class JsonCodec {
	readonly name = "json";

	private readonly reviver?: (key: string, value: unknown) => unknown;
	private readonly replacer?: (key: string, value: unknown) => unknown;
	private readonly space?: string | number;

	constructor(options: JsonCodecOptions = {}) {
		this.reviver = options.reviver;
		this.replacer = options.replacer;
		this.space = options.space;
	}

	/**
	 * Decode JSON bytes using the context charset
	 */
	readonly decode: DecodeFn = (bytes, context) => {
		const text = toBuffer(bytes).toString(context.charset);
		if (text.trim() === "") {
			return undefined;
		}
		try {
			return JSON.parse(text, this.reviver);
		} catch (error) {
			throw CodecError.decodeError(this.name, asError(error), truncate(text));
		}
	};

	/**
	 * Encode a value to JSON in the context charset
	 */
	readonly encode: EncodeFn<unknown> = (value, context) => {
		let text: string | undefined;
		try {
			text = JSON.stringify(value, this.replacer, this.space);
		} catch (error) {
			throw CodecError.encodeError(this.name, asError(error), value);
		}
		return Buffer.from(text ?? "null", context.charset);
	};
}

/**
 * Default JSON codec instance.
 */
export const defaultJsonCodec = new JsonCodec();
