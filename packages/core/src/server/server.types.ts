/**
 * Server Types
 *
 * Seams between the core and the transport bindings.
 */

import type * as http from "node:http";
import type { MismatchReport } from "../engine/mismatch.report";
import type { Logger } from "../logging/logger";
import type { RequestView } from "../request/request.types";
import type { ResponseDescription, Synthesis } from "../response/response.types";
import type { WsConnection } from "../websocket/ws.reaction-engine";
import type { WsConnectionSink, WsExpectation } from "../websocket/ws.types";

/**
 * Outcome of handling one request
 */
export type HandleResult =
	| (Synthesis & { readonly expectationIndex: number; readonly callNumber: number })
	| { readonly kind: "unmatched"; readonly response: ResponseDescription; readonly report: MismatchReport };

export interface RequestHandler {
	handle(request: RequestView): Promise<HandleResult>;
}

/**
 * What an upgrade binding needs from the server
 */
export interface UpgradeContext {
	readonly logger: Logger;
	/** WebSocket expectation for the path, if any */
	find(path: string): WsExpectation | undefined;
	/** Open a connected session after the handshake */
	open(expectation: WsExpectation, sink: WsConnectionSink): WsConnection;
}

/**
 * WebSocket upgrade binding attached to the HTTP listeners
 */
export interface UpgradeHandler {
	attach(server: http.Server, context: UpgradeContext): void;
	close(): Promise<void>;
}

/**
 * Journal entry for one handled request
 */
export interface ReceivedRequest {
	readonly request: RequestView;
	readonly receivedAt: Date;
	/** Index of the matched expectation, undefined on no-match */
	readonly expectationIndex?: number;
	readonly callNumber?: number;
}
