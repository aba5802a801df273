/**
 * HTTP Listener
 *
 * Socket side of the mock server. Reads requests into a RequestView, hands
 * them to the request handler and executes what comes back: timed pauses,
 * compression, chunked stream plans with trailers, and forwarding to an
 * upstream over fetch.
 */

import * as http from "node:http";
import * as https from "node:https";
import type { AddressInfo } from "node:net";
import { promisify } from "node:util";
import * as zlib from "node:zlib";
import { asError } from "../codecs/codec.types";
import type { Logger } from "../logging/logger";
import { createRequestView } from "../request/request.utils";
import type { ContentCoding, ForwardDirective, HeaderMap, ResponseDescription } from "../response/response.types";
import { createNameMap, sleep } from "../utils";
import type { TlsOptions } from "./server.config";
import type { RequestHandler, UpgradeContext, UpgradeHandler } from "./server.types";

const gzip = promisify(zlib.gzip);
const deflate = promisify(zlib.deflate);
const brotli = promisify(zlib.brotliCompress);

/**
 * Response headers fetch has already acted on
 */
const UPSTREAM_DROPPED_HEADERS = new Set(["content-encoding", "content-length", "transfer-encoding", "connection", "keep-alive"]);

export interface HttpListenerConfig {
	host: string;
	port: number;
	tls?: TlsOptions;
	handler: RequestHandler;
	logger: Logger;
	upgrade?: { handler: UpgradeHandler; context: UpgradeContext };
}

export interface BoundAddresses {
	port: number;
	securePort?: number;
}

export function compress(body: Buffer, coding: ContentCoding): Promise<Buffer> {
	switch (coding) {
		case "gzip":
			return gzip(body);
		case "deflate":
			return deflate(body);
		case "br":
			return brotli(body);
	}
}

function readBody(req: http.IncomingMessage): Promise<Buffer> {
	return new Promise((resolve, reject) => {
		const chunks: Buffer[] = [];
		req.on("data", (chunk: Buffer) => {
			chunks.push(chunk);
		});
		req.on("end", () => {
			resolve(Buffer.concat(chunks));
		});
		req.on("error", reject);
	});
}

function boundPort(server: http.Server): number {
	const address: AddressInfo | string | null = server.address();
	if (address === null || typeof address === "string") {
		throw new Error("Listener is not bound to a TCP port");
	}
	return address.port;
}

function listen(server: http.Server, port: number, host: string): Promise<number> {
	return new Promise((resolve, reject) => {
		server.once("error", reject);
		server.listen(port, host, () => {
			server.off("error", reject);
			resolve(boundPort(server));
		});
	});
}

function shutdown(server: http.Server): Promise<void> {
	return new Promise((resolve, reject) => {
		server.close((err) => (err ? reject(err) : resolve()));
		server.closeAllConnections();
	});
}

export class HttpListener {
	private plain?: http.Server;
	private secure?: https.Server;

	constructor(private readonly config: HttpListenerConfig) {}

	async start(): Promise<BoundAddresses> {
		const { host, port, tls, logger, upgrade } = this.config;

		const plain = http.createServer((req, res) => {
			void this.dispatch(req, res, false);
		});
		upgrade?.handler.attach(plain, upgrade.context);
		this.plain = plain;
		const boundPlain = await listen(plain, port, host);

		let boundSecure: number | undefined;
		if (tls) {
			const secure = https.createServer({ key: tls.key, cert: tls.cert }, (req, res) => {
				void this.dispatch(req, res, true);
			});
			upgrade?.handler.attach(secure, upgrade.context);
			this.secure = secure;
			boundSecure = await listen(secure, tls.port ?? 0, host);
		}

		logger.info("Listening", { host, port: boundPlain, ...(boundSecure !== undefined ? { securePort: boundSecure } : {}) });
		return { port: boundPlain, ...(boundSecure !== undefined ? { securePort: boundSecure } : {}) };
	}

	async stop(): Promise<void> {
		const servers = [this.plain, this.secure].filter((server): server is http.Server => server !== undefined);
		this.plain = undefined;
		this.secure = undefined;
		await this.config.upgrade?.handler.close();
		await Promise.all(servers.map(shutdown));
		this.config.logger.info("Stopped");
	}

	private async dispatch(req: http.IncomingMessage, res: http.ServerResponse, secure: boolean): Promise<void> {
		const { handler, logger } = this.config;
		try {
			const body = await readBody(req);
			const request = createRequestView({
				method: req.method ?? "GET",
				url: req.url ?? "/",
				headers: req.headers,
				body,
				secure,
			});

			const result = await handler.handle(request);
			switch (result.kind) {
				case "forward":
					await this.forward(result.directive, res);
					return;
				case "respond":
				case "unmatched":
					await this.write(result.response, res);
					return;
			}
		} catch (error) {
			const err = asError(error);
			logger.error("Request handling failed", { method: req.method, url: req.url, error: err.message });
			if (!res.headersSent) {
				res.writeHead(500, { "content-type": "text/plain; charset=utf-8" });
				res.end(err.message);
			} else {
				res.destroy(err);
			}
		}
	}

	private async write(response: ResponseDescription, res: http.ServerResponse): Promise<void> {
		if (response.delayMs > 0) {
			await sleep(response.delayMs);
		}

		if (response.stream) {
			res.writeHead(response.status, response.headers);
			for (const chunk of response.stream.chunks) {
				if (chunk.bytes.length > 0) {
					res.write(chunk.bytes);
				}
				if (chunk.delayAfterMs > 0) {
					await sleep(chunk.delayAfterMs);
				}
			}
			if (response.trailers) {
				res.addTrailers(response.trailers);
			}
			res.end();
			return;
		}

		const body = response.compression ? await compress(response.body, response.compression) : response.body;
		const headers: HeaderMap = { ...response.headers, "content-length": String(body.length) };
		res.writeHead(response.status, headers);
		res.end(body);
	}

	private async forward(directive: ForwardDirective, res: http.ServerResponse): Promise<void> {
		const headers = new Headers();
		for (const [name, values] of Object.entries(directive.headers)) {
			for (const value of values) {
				headers.append(name, value);
			}
		}

		const hasBody = directive.method !== "GET" && directive.method !== "HEAD" && directive.body.length > 0;

		let upstream: Response;
		try {
			upstream = await fetch(directive.url, {
				method: directive.method,
				headers,
				redirect: "manual",
				...(hasBody ? { body: directive.body } : {}),
			});
		} catch (error) {
			const message = asError(error).message;
			this.config.logger.error("Forward failed", { url: directive.url, error: message });
			res.writeHead(502, { "content-type": "text/plain; charset=utf-8" });
			res.end(`Forward to ${directive.url} failed: ${message}`);
			return;
		}

		const relayed: HeaderMap = createNameMap();
		upstream.headers.forEach((value, name) => {
			if (!UPSTREAM_DROPPED_HEADERS.has(name) && name !== "set-cookie") {
				relayed[name] = value;
			}
		});
		const cookies = upstream.headers.getSetCookie();
		if (cookies.length > 0) {
			relayed["set-cookie"] = cookies;
		}

		const body = Buffer.from(await upstream.arrayBuffer());
		relayed["content-length"] = String(body.length);
		res.writeHead(upstream.status, relayed);
		res.end(body);
	}
}
