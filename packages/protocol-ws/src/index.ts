/**
 * WebSocket binding for httpdouble
 *
 * Accepts upgrades on the mock server's listeners and drives the core
 * reaction engine from real `ws` connections.
 *
 * @example
 * ```typescript
 * import { MockServer } from "httpdouble";
 * import { WebSocketUpgrade } from "@httpdouble/protocol-ws";
 *
 * const server = new MockServer({ upgrade: new WebSocketUpgrade() });
 * server.expectations((e) => {
 *   e.webSocket("/events").onText("ping").reply("pong");
 * });
 * await server.start();
 * ```
 */

export * from "./types";
export * from "./ws.upgrade";
