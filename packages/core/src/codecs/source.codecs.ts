/**
 * Source Encoders
 *
 * Read the body from a stream, a file path or a URL when the response is
 * synthesized.
 */

import { readFile } from "node:fs/promises";
import type { Readable } from "node:stream";
import { fileURLToPath } from "node:url";
import type { EncodeFn } from "./codec.types";
import { CodecError } from "./codec.types";
import type { FileSource } from "./payload.types";

/**
 * Bytes of every stream read so far; a stream drains once, later calls reuse them
 */
const drainedStreams = new WeakMap<Readable, Promise<Buffer>>();

export const encodeStream: EncodeFn<Readable> = (stream) => {
	let drained = drainedStreams.get(stream);
	if (!drained) {
		drained = drain(stream);
		drainedStreams.set(stream, drained);
	}
	return drained;
};

async function drain(stream: Readable): Promise<Buffer> {
	const chunks: Buffer[] = [];
	for await (const chunk of stream) {
		const value: unknown = chunk;
		if (typeof value === "string") {
			chunks.push(Buffer.from(value));
		} else if (value instanceof Uint8Array) {
			chunks.push(Buffer.from(value));
		} else {
			throw new CodecError("Stream produced a non-byte chunk", "stream", "encode");
		}
	}
	return Buffer.concat(chunks);
}

export const encodeFile: EncodeFn<FileSource> = (source) => readFile(source.path);

export const encodeUrl: EncodeFn<URL> = async (url) => {
	if (url.protocol === "file:") {
		return readFile(fileURLToPath(url));
	}
	if (url.protocol === "http:" || url.protocol === "https:") {
		const response = await fetch(url);
		if (!response.ok) {
			throw new CodecError(`GET ${url.href} returned ${response.status}`, "url", "encode");
		}
		return new Uint8Array(await response.arrayBuffer());
	}
	throw new CodecError(`Unsupported URL scheme "${url.protocol}"`, "url", "encode");
};
