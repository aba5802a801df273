/**
 * Multipart Codec Tests
 */

import type { MultipartPart } from "httpdouble";
import { ConfigurationError, createBuiltinCodecs, field, jsonType, MultipartBody, part } from "httpdouble";
import { describe, expect, it } from "vitest";

const CONTENT_TYPE = "multipart/form-data; boundary=test-boundary";

function isPartList(value: unknown): value is MultipartPart[] {
	return (
		Array.isArray(value) &&
		value.every((item: unknown) => typeof item === "object" && item !== null && "name" in item && "body" in item)
	);
}

function decodeParts(bytes: Buffer): MultipartPart[] {
	const decoded = createBuiltinCodecs().decode(bytes, CONTENT_TYPE);
	if (!isPartList(decoded)) {
		throw new Error("Decoder did not return parts");
	}
	return decoded;
}

describe("Multipart Codec", () => {
	it("should assemble fields as text/plain parts", async () => {
		const body = new MultipartBody([field("a", "1")], { boundary: "b" });
		const bytes = await createBuiltinCodecs().encode(body, "multipart/form-data; boundary=b");

		expect(bytes.toString()).toBe(
			'--b\r\nContent-Disposition: form-data; name="a"\r\nContent-Type: text/plain\r\n\r\n1\r\n--b--\r\n',
		);
	});

	it("should round-trip names, content types and payload bytes", async () => {
		const body = new MultipartBody(
			[
				field("title", "report"),
				part("data", { rows: 3 }, { contentType: "application/json", filename: "data.json" }),
				part("raw", Buffer.from([1, 2, 3]), { contentType: "application/octet-stream" }),
			],
			{ boundary: "test-boundary" },
		);
		const parts = decodeParts(await createBuiltinCodecs().encode(body, CONTENT_TYPE));

		expect(parts.map((p) => p.name)).toEqual(["title", "data", "raw"]);
		expect(parts.map((p) => p.contentType)).toEqual(["text/plain", "application/json", "application/octet-stream"]);
		expect(parts.map((p) => p.body)).toEqual([Buffer.from("report"), Buffer.from('{"rows":3}'), Buffer.from([1, 2, 3])]);
		expect(parts[1]?.filename).toBe("data.json");
		expect(parts[1]?.value).toEqual({ rows: 3 });
		expect(parts[0]?.value).toBe("report");
	});

	it("should prefer per-part encoders over the response chain", async () => {
		const partEncoders = createBuiltinCodecs().child("parts");
		partEncoders.encoder("application/json", jsonType, () => "custom");
		const body = new MultipartBody([part("data", { rows: 3 }, { contentType: "application/json" })], {
			boundary: "test-boundary",
			encoders: partEncoders,
		});
		const bytes = await createBuiltinCodecs().encode(body, "multipart/mixed; boundary=test-boundary");

		expect(bytes.toString()).toBe(
			'--test-boundary\r\nContent-Disposition: form-data; name="data"\r\nContent-Type: application/json\r\n\r\ncustom\r\n--test-boundary--\r\n',
		);
	});

	it("should keep extra part headers", async () => {
		const body = new MultipartBody(
			[part("doc", "hello", { contentType: "text/plain", headers: { "X-Part-Id": "p1" } })],
			{ boundary: "test-boundary" },
		);
		const parts = decodeParts(await createBuiltinCodecs().encode(body, CONTENT_TYPE));

		expect(parts[0]?.headers["x-part-id"]).toBe("p1");
	});

	it("should refuse to decode without a boundary", () => {
		expect(() => createBuiltinCodecs().decode(Buffer.from("--x--\r\n"), "multipart/form-data")).toThrow(
			'Missing boundary in "multipart/form-data"',
		);
	});

	it("should validate boundaries and part names", () => {
		expect(() => new MultipartBody([], { boundary: "bad boundary!" })).toThrow(ConfigurationError);
		expect(() => new MultipartBody([field("", "x")])).toThrow(ConfigurationError);
	});
});
