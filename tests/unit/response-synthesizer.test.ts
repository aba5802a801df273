/**
 * Response Synthesizer Tests
 *
 * Responder cycling, chunk plans, delays, compression negotiation and
 * forward directives.
 */

import type { Responder, ResponseDescription, Synthesis } from "httpdouble";
import {
	computeDelay,
	ConfigurationError,
	createBuiltinCodecs,
	createForwardResponder,
	createMultipartResponder,
	createStaticResponder,
	field,
	forwardDirective,
	negotiateEncoding,
	ResponseSynthesizer,
	selectResponder,
	splitBalanced,
} from "httpdouble";
import { describe, expect, it } from "vitest";
import { request } from "../helpers/test-helpers";

const codecs = createBuiltinCodecs().child("global");

const statusOf = (responder: Responder): number | undefined =>
	responder.kind === "forward" ? undefined : responder.status;

const described = (synthesis: Synthesis): ResponseDescription => {
	if (synthesis.kind !== "respond") {
		throw new Error("expected a response");
	}
	return synthesis.response;
};

describe("Response Synthesizer", () => {
	// ==========================================================================
	// Responder cycling
	// ==========================================================================

	describe("selectResponder", () => {
		it("should use the Nth responder for the Nth call and reuse the last one", () => {
			const responders = [500, 503, 200].map((status) => createStaticResponder({ status }, codecs, `r${status}`));

			const statuses = [1, 2, 3, 4, 5].map((call) => statusOf(selectResponder({ responders }, call)));

			expect(statuses).toEqual([500, 503, 200, 200, 200]);
		});

		it("should select responders[min(i, K) - 1] for every call", () => {
			const responders = [201, 202].map((status) => createStaticResponder({ status }, codecs, `r${status}`));

			for (let call = 1; call <= 6; call++) {
				expect(selectResponder({ responders }, call)).toBe(responders[Math.min(call, responders.length) - 1]);
			}
		});
	});

	// ==========================================================================
	// Timing helpers
	// ==========================================================================

	describe("splitBalanced", () => {
		it("should split into chunks differing by at most one byte", () => {
			const chunks = splitBalanced(Buffer.from("abcdefghij"), 3);

			expect(chunks.map((chunk) => chunk.toString())).toEqual(["abcd", "efg", "hij"]);
		});

		it("should not produce more chunks than bytes", () => {
			expect(splitBalanced(Buffer.from("ab"), 5).map((chunk) => chunk.toString())).toEqual(["a", "b"]);
			expect(splitBalanced(Buffer.alloc(0), 3)).toHaveLength(1);
		});
	});

	describe("computeDelay", () => {
		it("should return fixed delays and interpolate ranges", () => {
			expect(computeDelay(undefined)).toBe(0);
			expect(computeDelay({ kind: "fixed", ms: 25 })).toBe(25);
			expect(computeDelay({ kind: "range", min: 10, max: 20 }, () => 0.5)).toBe(15);
		});
	});

	describe("negotiateEncoding", () => {
		it("should follow q-values and then server preference", () => {
			expect(negotiateEncoding(undefined)).toBeUndefined();
			expect(negotiateEncoding("gzip, deflate, br")).toBe("gzip");
			expect(negotiateEncoding("br;q=1.0, gzip;q=0.5")).toBe("br");
			expect(negotiateEncoding("gzip;q=0, deflate")).toBe("deflate");
			expect(negotiateEncoding("*;q=0.1, br")).toBe("br");
			expect(negotiateEncoding("identity")).toBeUndefined();
		});
	});

	// ==========================================================================
	// Synthesis
	// ==========================================================================

	describe("synthesize", () => {
		const synthesizer = new ResponseSynthesizer({ compression: true });

		it("should encode a JSON body with its content-type", async () => {
			const responder = createStaticResponder({ status: 201, body: { id: 7 } }, codecs, "r");

			const response = described(await synthesizer.synthesize(responder, request("/")));

			expect(response.status).toBe(201);
			expect(response.headers).toEqual({ "content-type": "application/json" });
			expect(response.body.toString()).toBe('{"id":7}');
			expect(response.delayMs).toBe(0);
			expect(response.stream).toBeUndefined();
			expect(response.compression).toBeUndefined();
		});

		it("should ask for compression when the client accepts it", async () => {
			const responder = createStaticResponder({ body: "hello" }, codecs, "r");

			const response = described(
				await synthesizer.synthesize(responder, request("/", { headers: { "accept-encoding": "gzip" } })),
			);

			expect(response.compression).toBe("gzip");
			expect(response.headers["content-encoding"]).toBe("gzip");
			expect(response.headers.vary).toBe("accept-encoding");
			expect(response.body.toString()).toBe("hello");
		});

		it("should not compress bodies the responder already encoded", async () => {
			const responder = createStaticResponder(
				{ body: Buffer.from([1, 2]), headers: { "Content-Encoding": "br" } },
				codecs,
				"r",
			);

			const response = described(
				await synthesizer.synthesize(responder, request("/", { headers: { "accept-encoding": "gzip" } })),
			);

			expect(response.compression).toBeUndefined();
			expect(response.headers["content-encoding"]).toBe("br");
		});

		it("should not compress when disabled", async () => {
			const responder = createStaticResponder({ body: "hello" }, codecs, "r");
			const plain = new ResponseSynthesizer({ compression: false });

			const response = described(
				await plain.synthesize(responder, request("/", { headers: { "accept-encoding": "gzip" } })),
			);

			expect(response.compression).toBeUndefined();
		});

		it("should emit a chunked stream plan with per-chunk delays", async () => {
			const responder = createStaticResponder({ body: "abcdefghij", chunks: 3, delay: 5 }, codecs, "r");

			const response = described(
				await synthesizer.synthesize(responder, request("/", { headers: { "accept-encoding": "gzip" } })),
			);

			expect(response.stream?.chunks.map((chunk) => [chunk.bytes.toString(), chunk.delayAfterMs])).toEqual([
				["abcd", 5],
				["efg", 5],
				["hij", 5],
			]);
			expect(response.headers).toEqual({
				"content-type": "text/plain; charset=utf-8",
				"transfer-encoding": "chunked",
			});
			expect(response.delayMs).toBe(0);
			expect(response.compression).toBeUndefined();
		});

		it("should delay the whole response when no chunk count is given", async () => {
			const responder = createStaticResponder({ body: "x", delay: 30 }, codecs, "r");

			const response = described(await synthesizer.synthesize(responder, request("/")));

			expect(response.delayMs).toBe(30);
			expect(response.stream).toBeUndefined();
		});

		it("should announce trailers and stream the body", async () => {
			const responder = createStaticResponder({ body: "x", trailers: { "x-checksum": "abc" } }, codecs, "r");

			const response = described(await synthesizer.synthesize(responder, request("/")));

			expect(response.headers.trailer).toBe("x-checksum");
			expect(response.trailers).toEqual({ "x-checksum": "abc" });
			expect(response.stream?.chunks.map((chunk) => chunk.bytes.toString())).toEqual(["x"]);
		});

		it("should assemble multipart responses", async () => {
			const responder = createMultipartResponder({ parts: [field("a", "1")], boundary: "b" }, codecs, "m");

			const response = described(await synthesizer.synthesize(responder, request("/")));

			expect(response.headers["content-type"]).toBe("multipart/form-data; boundary=b");
			expect(response.body.toString()).toBe(
				'--b\r\nContent-Disposition: form-data; name="a"\r\nContent-Type: text/plain\r\n\r\n1\r\n--b--\r\n',
			);
		});
	});

	// ==========================================================================
	// Forwarding
	// ==========================================================================

	describe("forwarding", () => {
		it("should append the original path and query and drop hop-by-hop headers", () => {
			const view = request("/orders?id=1&id=2", {
				method: "POST",
				headers: { host: "localhost:1", "content-length": "2", connection: "keep-alive", "x-trace": "t1" },
				body: "{}",
			});

			const directive = forwardDirective(new URL("http://upstream.test/api/"), { "X-Forwarded-By": "httpdouble" }, view);

			expect(directive.url).toBe("http://upstream.test/api/orders?id=1&id=2");
			expect(directive.method).toBe("POST");
			expect(directive.headers).toEqual({ "x-trace": ["t1"], "x-forwarded-by": ["httpdouble"] });
			expect(Buffer.from(directive.body).toString()).toBe("{}");
		});

		it("should keep percent-encoded path segments as received", () => {
			const target = new URL("http://upstream.test/api");

			expect(forwardDirective(target, {}, request("/files/a%2Fb")).url).toBe("http://upstream.test/api/files/a%2Fb");
			expect(forwardDirective(target, {}, request("/files/100%25")).url).toBe("http://upstream.test/api/files/100%25");
		});

		it("should produce a forward synthesis for forward responders", async () => {
			const responder = createForwardResponder("http://upstream.test");

			const synthesis = await new ResponseSynthesizer({ compression: true }).synthesize(responder, request("/a?b=c"));

			expect(synthesis.kind === "forward" && synthesis.directive.url).toBe("http://upstream.test/a?b=c");
		});
	});

	// ==========================================================================
	// Configuration errors
	// ==========================================================================

	describe("configuration errors", () => {
		it("should reject invalid statuses, chunk counts and delay ranges", () => {
			expect(() => createStaticResponder({ status: 99 }, codecs, "r")).toThrow(ConfigurationError);
			expect(() => createStaticResponder({ chunks: 0 }, codecs, "r")).toThrow(ConfigurationError);
			expect(() => createStaticResponder({ delay: [20, 10] }, codecs, "r")).toThrow("Invalid delay: range [20, 10] is inverted");
		});

		it("should reject bodies without a resolvable encoder at build time", () => {
			class Unencodable {}

			expect(() => createStaticResponder({ body: new Unencodable() }, codecs, "r")).toThrow(
				'Invalid response body: no encoder for content-type "application/json" and payload type Unencodable',
			);
		});

		it("should reject forward targets that are not http URLs", () => {
			expect(() => createForwardResponder("ftp://upstream.test")).toThrow(ConfigurationError);
			expect(() => createForwardResponder("not a url")).toThrow('Invalid forward target: "not a url" is not a URL');
		});
	});
});
