/**
 * Payload Types
 *
 * Runtime shapes that built-in encoders are keyed on, plus the wrapper
 * classes responders use to ask for a specific encoding.
 */

import { Readable } from "node:stream";
import type { PayloadType } from "./codec.types";

/**
 * Body read from a file at response time
 */
export class FileSource {
	constructor(readonly path: string) {}
}

/**
 * Bytes sent base64-encoded as text
 */
export class Base64Payload {
	constructor(readonly bytes: Uint8Array) {}
}

export function fromFile(path: string): FileSource {
	return new FileSource(path);
}

export function base64(bytes: Uint8Array | string): Base64Payload {
	return new Base64Payload(typeof bytes === "string" ? Buffer.from(bytes, "utf-8") : bytes);
}

/**
 * Payload type matching instances of a class
 */
export function classType<T>(ctor: abstract new (...args: never[]) => T, name = ctor.name): PayloadType<T> {
	return {
		name,
		is: (value: unknown): value is T => value instanceof ctor,
	};
}

export type JsonValue = null | boolean | number | string | JsonValue[] | { [key: string]: JsonValue };

function isPlainObject(value: unknown): value is Record<string, unknown> {
	if (typeof value !== "object" || value === null) {
		return false;
	}
	const proto: unknown = Object.getPrototypeOf(value);
	return proto === Object.prototype || proto === null;
}

export const stringType: PayloadType<string> = {
	name: "string",
	is: (value): value is string => typeof value === "string",
};

export const bytesType: PayloadType<Uint8Array> = {
	name: "bytes",
	is: (value): value is Uint8Array => value instanceof Uint8Array,
};

export const streamType: PayloadType<Readable> = classType(Readable, "stream");
export const fileType: PayloadType<FileSource> = classType(FileSource, "file");
export const urlType: PayloadType<URL> = classType(URL, "url");
export const base64Type: PayloadType<Base64Payload> = classType(Base64Payload, "base64");

/**
 * Structured values the JSON encoder accepts. Strings are excluded: a string
 * body is sent as-is.
 */
export const jsonType: PayloadType<JsonValue | Record<string, unknown> | unknown[]> = {
	name: "json",
	is: (value): value is JsonValue | Record<string, unknown> | unknown[] =>
		value === null ||
		typeof value === "number" ||
		typeof value === "boolean" ||
		Array.isArray(value) ||
		isPlainObject(value),
};
