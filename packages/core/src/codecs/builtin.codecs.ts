/**
 * Built-in Codecs
 *
 * The bottom of every codec chain. Registration order matters: later
 * entries shadow earlier ones, so the catch-all ranges come first.
 */

import { CodecRegistry } from "./codec.registry";
import { JSON_MEDIA_RANGES, defaultJsonCodec } from "./json.codec";
import { decodeMultipart, encodeMultipart, MultipartBody } from "./multipart.codec";
import {
	base64Type,
	bytesType,
	classType,
	fileType,
	jsonType,
	streamType,
	stringType,
	urlType,
} from "./payload.types";
import { encodeFile, encodeStream, encodeUrl } from "./source.codecs";
import { decodeBytes, decodeForm, decodeString, encodeBase64, encodeBytes, encodeString } from "./text.codecs";

export const multipartType = classType(MultipartBody, "multipart");

export function createBuiltinCodecs(): CodecRegistry {
	const registry = new CodecRegistry("builtin");

	registry
		.decoder("*/*", decodeBytes)
		.decoder("text/*", decodeString)
		.decoder("application/x-www-form-urlencoded", decodeForm)
		.decoder("multipart/*", decodeMultipart);
	for (const range of JSON_MEDIA_RANGES) {
		registry.decoder(range, defaultJsonCodec.decode);
	}

	registry
		.encoder("*/*", bytesType, encodeBytes)
		.encoder("*/*", stringType, encodeString)
		.encoder("*/*", streamType, encodeStream)
		.encoder("*/*", fileType, encodeFile)
		.encoder("*/*", urlType, encodeUrl)
		.encoder("*/*", base64Type, encodeBase64)
		.encoder("multipart/*", multipartType, encodeMultipart);
	for (const range of JSON_MEDIA_RANGES) {
		registry.encoder(range, jsonType, defaultJsonCodec.encode);
	}

	return registry;
}
