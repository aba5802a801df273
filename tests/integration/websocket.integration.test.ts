/**
 * WebSocket Integration Tests
 *
 * A mock server with the ws upgrade binding, driven by a real ws client.
 */

import { WebSocketUpgrade } from "@httpdouble/protocol-ws";
import { MockServer } from "httpdouble";
import { afterEach, describe, expect, it } from "vitest";
import { type RawData, WebSocket } from "ws";

interface ReceivedFrame {
	data: Buffer;
	isBinary: boolean;
}

const toBuffer = (data: RawData): Buffer =>
	Array.isArray(data) ? Buffer.concat(data) : data instanceof ArrayBuffer ? Buffer.from(data) : data;

function open(url: string): Promise<WebSocket> {
	return new Promise((resolve, reject) => {
		const ws = new WebSocket(url);
		ws.once("open", () => resolve(ws));
		ws.once("error", reject);
	});
}

function nextFrame(ws: WebSocket): Promise<ReceivedFrame> {
	return new Promise((resolve) => {
		ws.once("message", (data: RawData, isBinary: boolean) => {
			resolve({ data: toBuffer(data), isBinary });
		});
	});
}

describe("WebSocket Integration", () => {
	let server: MockServer | undefined;
	const clients: WebSocket[] = [];

	const startServer = async (configure: (server: MockServer) => void): Promise<MockServer> => {
		const started = new MockServer({ upgrade: new WebSocketUpgrade() });
		server = started;
		configure(started);
		await started.start();
		return started;
	};

	const connect = async (path: string): Promise<WebSocket> => {
		if (!server) {
			throw new Error("server not started");
		}
		const ws = await open(`ws://127.0.0.1:${server.port}${path}`);
		clients.push(ws);
		return ws;
	};

	afterEach(async () => {
		for (const ws of clients.splice(0)) {
			ws.terminate();
		}
		await server?.close();
		server = undefined;
	});

	it("should react to a text message", async () => {
		const mock = await startServer((s) =>
			s.expectations((e) => {
				e.webSocket("/chat").onText("ping").reply("pong");
			}),
		);
		const ws = await connect("/chat");

		const reply = nextFrame(ws);
		ws.send("ping");
		const frame = await reply;

		expect(frame.data.toString()).toBe("pong");
		expect(frame.isBinary).toBe(false);
		expect(await mock.verify(500)).toBe(true);
	});

	it("should refuse upgrades on paths without an expectation", async () => {
		const mock = await startServer((s) =>
			s.expectations((e) => {
				e.webSocket("/chat").onAny().reply("x");
			}),
		);

		await expect(open(`ws://127.0.0.1:${mock.port}/other`)).rejects.toThrow("Unexpected server response: 404");
		expect(mock.webSocketConnections()).toHaveLength(0);
	});

	it("should accept upgrades whose query names shadow object members", async () => {
		const mock = await startServer((s) =>
			s.expectations((e) => {
				e.webSocket("/events").onText("ping").reply("pong");
			}),
		);
		const ws = await connect("/events?constructor=1&toString=2");

		const reply = nextFrame(ws);
		ws.send("ping");

		expect((await reply).data.toString()).toBe("pong");
		expect(mock.webSocketConnections()).toHaveLength(1);
	});

	it("should react to binary frames with binary frames", async () => {
		await startServer((s) =>
			s.expectations((e) => {
				e.webSocket("/bin")
					.onBinary((bytes) => bytes[0] === 1, "starts with 0x01")
					.reply(Buffer.from([2, 3]));
			}),
		);
		const ws = await connect("/bin");

		const reply = nextFrame(ws);
		ws.send(Buffer.from([1]));
		const frame = await reply;

		expect(frame.isBinary).toBe(true);
		expect([...frame.data]).toEqual([2, 3]);
	});

	it("should record unmatched messages", async () => {
		const mock = await startServer((s) =>
			s.expectations((e) => {
				e.webSocket("/chat").onText("ping").reply("pong");
			}),
		);
		const ws = await connect("/chat");

		const reply = nextFrame(ws);
		ws.send("hello");
		ws.send("ping");
		await reply;

		const [connection] = mock.webSocketConnections();
		expect(connection?.unmatchedMessages().map((message) => message.data.toString())).toEqual(["hello"]);
	});

	it("should close the connection after a closing reaction", async () => {
		await startServer((s) =>
			s.expectations((e) => {
				e.webSocket("/chat").onText("bye").reply("ciao", { close: { code: 4000, reason: "done" } });
			}),
		);
		const ws = await connect("/chat");

		const reply = nextFrame(ws);
		const closed = new Promise<{ code: number; reason: string }>((resolve) => {
			ws.once("close", (code: number, reason: Buffer) => {
				resolve({ code, reason: reason.toString() });
			});
		});
		ws.send("bye");

		expect((await reply).data.toString()).toBe("ciao");
		expect(await closed).toEqual({ code: 4000, reason: "done" });
	});
});
