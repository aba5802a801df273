/**
 * WebSocket Upgrade
 *
 * Handles HTTP upgrade requests on the mock server's listeners with a
 * `ws` server in noServer mode. An upgrade whose path matches no WebSocket
 * expectation is refused before the handshake.
 */

import type * as http from "node:http";
import type { Duplex } from "node:stream";
import type { UpgradeContext, UpgradeHandler, WsConnectionSink, WsExpectation } from "httpdouble";
import { asError, createRequestView } from "httpdouble";
import { type RawData, type WebSocket, WebSocketServer } from "ws";
import type { WebSocketUpgradeOptions } from "./types";

const STATUS_TEXT: Record<number, string> = {
	400: "Bad Request",
	403: "Forbidden",
	404: "Not Found",
};

/**
 * Normalize the three shapes `ws` delivers message data in
 */
export function rawDataToBuffer(data: RawData): Buffer {
	if (Array.isArray(data)) {
		return Buffer.concat(data);
	}
	if (data instanceof ArrayBuffer) {
		return Buffer.from(data);
	}
	return data;
}

/**
 * Answer an upgrade request with a plain HTTP status and drop the socket
 */
function refuse(socket: Duplex, status: number): void {
	if (socket.destroyed) {
		return;
	}
	if (!socket.writable) {
		socket.destroy();
		return;
	}
	const reason = STATUS_TEXT[status] ?? "Rejected";
	socket.end(`HTTP/1.1 ${status} ${reason}\r\nConnection: close\r\nContent-Length: 0\r\n\r\n`);
}

export class WebSocketUpgrade implements UpgradeHandler {
	private readonly wss: WebSocketServer;
	private readonly sockets = new Set<WebSocket>();
	private readonly rejectStatus: number;

	constructor(options: WebSocketUpgradeOptions = {}) {
		this.rejectStatus = options.rejectStatus ?? 404;
		this.wss = new WebSocketServer({
			noServer: true,
			perMessageDeflate: options.perMessageDeflate ?? false,
			...(options.maxPayload !== undefined ? { maxPayload: options.maxPayload } : {}),
		});
	}

	attach(server: http.Server, context: UpgradeContext): void {
		server.on("upgrade", (req: http.IncomingMessage, socket: Duplex, head: Buffer) => {
			try {
				this.handleUpgrade(req, socket, head, context);
			} catch (error) {
				context.logger.error("WebSocket upgrade failed", {
					url: req.url,
					error: asError(error).message,
				});
				refuse(socket, 400);
			}
		});
	}

	/**
	 * Terminate every open connection. The handler can be attached again.
	 */
	async close(): Promise<void> {
		for (const socket of this.sockets) {
			socket.terminate();
		}
		this.sockets.clear();
	}

	private handleUpgrade(req: http.IncomingMessage, socket: Duplex, head: Buffer, context: UpgradeContext): void {
		const { path } = createRequestView({ url: req.url ?? "/" });
		const expectation = context.find(path);

		if (!expectation) {
			context.logger.warn("No WebSocket expectation for path", { path });
			refuse(socket, this.rejectStatus);
			return;
		}

		socket.on("error", (error: Error) => {
			context.logger.error("WebSocket upgrade socket error", { path, error: error.message });
		});

		this.wss.handleUpgrade(req, socket, head, (ws) => {
			try {
				this.bind(ws, path, expectation, context);
			} catch (error) {
				context.logger.error("WebSocket session setup failed", {
					path,
					error: asError(error).message,
				});
				this.sockets.delete(ws);
				ws.terminate();
			}
		});
	}

	private bind(ws: WebSocket, path: string, expectation: WsExpectation, context: UpgradeContext): void {
		this.sockets.add(ws);

		const sink: WsConnectionSink = {
			send: (frame) =>
				new Promise<void>((resolve, reject) => {
					ws.send(frame.payload, { binary: frame.frame === "binary" }, (err) => (err ? reject(err) : resolve()));
				}),
			close: (code, reason) => {
				ws.close(code, reason);
			},
		};

		const connection = context.open(expectation, sink);
		context.logger.info("WebSocket connected", { path, expectation: expectation.index });

		ws.on("message", (data: RawData, isBinary: boolean) => {
			connection.receive({ frame: isBinary ? "binary" : "text", data: rawDataToBuffer(data) });
		});

		ws.on("close", (code: number) => {
			connection.close();
			this.sockets.delete(ws);
			context.logger.debug("WebSocket closed", { path, code });
		});

		ws.on("error", (error: Error) => {
			context.logger.error("WebSocket error", { path, error: error.message });
		});
	}
}
