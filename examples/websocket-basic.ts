/**
 * Basic WebSocket Example
 *
 * Scripted reactions on a WebSocket path, driven by a ws client.
 */

import { WebSocketUpgrade } from "@httpdouble/protocol-ws";
import { matching, MockServer } from "httpdouble";
import { WebSocket } from "ws";

const server = new MockServer({ upgrade: new WebSocketUpgrade() });

server.expectations((e) => {
	e.webSocket("/events")
		.onText("ping")
		.reply("pong")
		.onText(matching(/^bye/))
		.reply("ciao", { delay: 50, close: { code: 1000, reason: "done" } });
});

await server.start();

const ws = new WebSocket(`ws://127.0.0.1:${server.port}/events`);
ws.on("message", (data) => {
	console.log("received:", data.toString());
});
await new Promise<void>((resolve, reject) => {
	ws.once("open", resolve);
	ws.once("error", reject);
});

ws.send("ping");
ws.send("bye now");
await new Promise<void>((resolve) => {
	ws.once("close", () => resolve());
});

console.log("verified:", await server.verify(1000));
await server.close();
