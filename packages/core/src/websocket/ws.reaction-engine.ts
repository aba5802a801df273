/**
 * WebSocket Reaction Engine
 *
 * Transport-agnostic state machine for WebSocket expectations:
 *
 *   awaiting-connect -> connected -> (message: reacted | unmatched)* -> closed
 *
 * Reactions are sent on a later turn of the event loop, never inside the
 * call that delivered the inbound message.
 */

import type { Logger } from "../logging/logger";
import { matchPath } from "../matchers/path.pattern";
import { describeValue, evaluateValue } from "../matchers/value.matchers";
import { computeDelay } from "../response/response.synthesizer";
import { asError } from "../codecs/codec.types";
import type {
	WsConnectionSink,
	WsExpectation,
	WsInboundMessage,
	WsMessageMatcher,
	WsReactionRule,
} from "./ws.types";

export type WsConnectionState = "awaiting-connect" | "connected" | "closed";

export type WsMessageOutcome = "reacted" | "unmatched" | "ignored";

export function matchWsMessage(matcher: WsMessageMatcher, message: WsInboundMessage): boolean {
	switch (matcher.kind) {
		case "any":
			return true;
		case "text":
			return message.frame === "text" && evaluateValue(matcher.value, message.data.toString("utf-8"));
		case "binary":
			return message.frame === "binary" && matcher.predicate(message.data);
	}
}

export function describeWsMatcher(matcher: WsMessageMatcher): string {
	switch (matcher.kind) {
		case "any":
			return "any message";
		case "text":
			return `text message ${describeValue(matcher.value)}`;
		case "binary":
			return `binary message ${matcher.description}`;
	}
}

/**
 * One WebSocket connection bound to the expectation it matched
 */
export class WsConnection {
	private _state: WsConnectionState = "awaiting-connect";
	private readonly unmatched: WsInboundMessage[] = [];
	private readonly pending = new Set<Promise<void>>();
	private sent = 0;

	constructor(
		readonly expectation: WsExpectation,
		private readonly sink: WsConnectionSink,
		private readonly logger: Logger,
		private readonly random: () => number = Math.random,
	) {}

	get state(): WsConnectionState {
		return this._state;
	}

	/**
	 * Number of reactions sent on this connection
	 */
	get reactionsSent(): number {
		return this.sent;
	}

	/**
	 * Mark the connection established and count it
	 */
	connect(): void {
		if (this._state !== "awaiting-connect") {
			throw new Error(`Cannot connect WebSocket in state ${this._state}`);
		}
		this._state = "connected";
		this.expectation.counter.increment();
	}

	/**
	 * Match an inbound message against the rules in order; the first match
	 * schedules its reaction.
	 */
	receive(message: WsInboundMessage): WsMessageOutcome {
		if (this._state !== "connected") {
			return "ignored";
		}

		const rule = this.expectation.rules.find((candidate) => {
			try {
				return matchWsMessage(candidate.matcher, message);
			} catch (error) {
				this.logger.debug("WebSocket matcher threw", {
					rule: candidate.index,
					matcher: describeWsMatcher(candidate.matcher),
					error: asError(error).message,
				});
				return false;
			}
		});

		if (!rule) {
			this.unmatched.push(message);
			this.logger.debug("Unmatched WebSocket message", {
				expectation: this.expectation.index,
				frame: message.frame,
				bytes: message.data.length,
			});
			return "unmatched";
		}

		this.schedule(rule);
		return "reacted";
	}

	/**
	 * Messages that matched no rule, in arrival order
	 */
	unmatchedMessages(): readonly WsInboundMessage[] {
		return [...this.unmatched];
	}

	/**
	 * Resolves once every scheduled reaction has been sent
	 */
	async whenIdle(): Promise<void> {
		while (this.pending.size > 0) {
			await Promise.all([...this.pending]);
		}
	}

	close(): void {
		this._state = "closed";
	}

	private schedule(rule: WsReactionRule): void {
		const { reaction } = rule;
		const delayMs = computeDelay(reaction.delay, this.random);

		const task = new Promise<void>((resolve) => {
			setTimeout(resolve, delayMs);
		})
			.then(async () => {
				if (this._state !== "connected") {
					return;
				}
				await this.sink.send({ frame: reaction.frame, payload: reaction.payload });
				this.sent += 1;
				rule.counter.increment();
				if (reaction.close) {
					this._state = "closed";
					this.sink.close(reaction.close.code, reaction.close.reason);
				}
			})
			.catch((error: unknown) => {
				this.logger.error("Failed to send WebSocket reaction", {
					expectation: this.expectation.index,
					rule: rule.index,
					error: asError(error).message,
				});
			})
			.finally(() => {
				this.pending.delete(task);
			});

		this.pending.add(task);
	}
}

/**
 * Finds the WebSocket expectation for an upgrade path and opens connections
 */
export class WsReactionEngine {
	constructor(
		private readonly expectations: () => readonly WsExpectation[],
		private readonly logger: Logger,
		private readonly random: () => number = Math.random,
	) {}

	/**
	 * First WebSocket expectation (registration order) matching the path
	 */
	find(path: string): WsExpectation | undefined {
		return this.expectations().find((expectation) => {
			try {
				return matchPath(expectation.path, path);
			} catch {
				return false;
			}
		});
	}

	/**
	 * Open and connect a session for an accepted upgrade
	 */
	open(expectation: WsExpectation, sink: WsConnectionSink): WsConnection {
		const connection = new WsConnection(expectation, sink, this.logger, this.random);
		connection.connect();
		this.logger.debug("WebSocket connected", { expectation: expectation.index });
		return connection;
	}

	/**
	 * Convenience: find + open, or null when no expectation matches
	 */
	accept(path: string, sink: WsConnectionSink): WsConnection | null {
		const expectation = this.find(path);
		return expectation ? this.open(expectation, sink) : null;
	}
}
