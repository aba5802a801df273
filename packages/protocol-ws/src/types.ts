/**
 * WebSocket Upgrade Types
 */

// =============================================================================
// Upgrade Options
// =============================================================================

export interface WebSocketUpgradeOptions {
	/** Largest accepted inbound message in bytes (ws default: 100 MiB) */
	maxPayload?: number;
	/** Negotiate permessage-deflate with clients. Off by default. */
	perMessageDeflate?: boolean;
	/** Status line written to an upgrade whose path matches no expectation */
	rejectStatus?: number;
}
