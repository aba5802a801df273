/**
 * httpdouble
 *
 * Programmable HTTP/WebSocket test double. Register expectations, point the
 * code under test at the server, then verify that the expected calls
 * happened.
 *
 * WebSocket upgrades are handled by `@httpdouble/protocol-ws`.
 *
 * @example
 * ```typescript
 * import { MockServer, exactly } from "httpdouble";
 *
 * const server = new MockServer();
 * server.expectations((e) => {
 *   e.post("/orders")
 *     .header("content-type", "application/json")
 *     .body<{ sku: string }>((order) => order.sku === "A-1")
 *     .respond({ status: 503 })
 *     .respond({ status: 201, body: { id: 7 } })
 *     .times(exactly(2));
 * });
 * await server.start();
 * ```
 */

export * from "./errors";
export * from "./logging/logger";
export * from "./request";
export * from "./matchers";
export * from "./codecs";
export * from "./response";
export * from "./expectations";
export * from "./engine";
export * from "./verification";
export * from "./websocket";
export * from "./server";
export { sleep } from "./utils";
