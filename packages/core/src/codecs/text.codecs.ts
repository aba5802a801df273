/**
 * Text and byte codecs: byte passthrough, charset-aware strings,
 * URL-encoded forms, base64.
 */

import { parseQuery } from "../request/request.utils";
import { toBuffer } from "../utils";
import type { DecodeFn, EncodeFn } from "./codec.types";
import type { Base64Payload } from "./payload.types";

export const decodeBytes: DecodeFn = (bytes) => toBuffer(bytes);

export const decodeString: DecodeFn = (bytes, context) => toBuffer(bytes).toString(context.charset);

/**
 * application/x-www-form-urlencoded to a multi-valued map
 */
export const decodeForm: DecodeFn = (bytes, context) => parseQuery(toBuffer(bytes).toString(context.charset));

export const encodeBytes: EncodeFn<Uint8Array> = (bytes) => bytes;

export const encodeString: EncodeFn<string> = (text, context) => Buffer.from(text, context.charset);

export const encodeBase64: EncodeFn<Base64Payload> = (payload) =>
	Buffer.from(toBuffer(payload.bytes).toString("base64"), "ascii");
