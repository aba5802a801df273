/**
 * WebSocket Types
 */

import type { CallCountConstraint } from "../matchers/call-count";
import type { PathPattern } from "../matchers/path.pattern";
import type { ValueMatcher } from "../matchers/value.matchers";
import type { DelaySpec } from "../response/response.types";
import type { CallCounter } from "../expectations/call-counter";

export type WsFrameType = "text" | "binary";

export interface WsInboundMessage {
	readonly frame: WsFrameType;
	readonly data: Buffer;
}

export interface WsOutboundFrame {
	readonly frame: WsFrameType;
	readonly payload: Buffer;
}

export type WsMessageMatcher =
	| { readonly kind: "text"; readonly value: ValueMatcher<string> }
	| { readonly kind: "binary"; readonly predicate: (bytes: Buffer) => boolean; readonly description: string }
	| { readonly kind: "any" };

export interface WsReaction {
	readonly frame: WsFrameType;
	readonly payload: Buffer;
	readonly delay?: DelaySpec;
	/** Close the connection after sending */
	readonly close?: { readonly code: number; readonly reason: string };
}

export interface WsReactionRuleDefinition {
	readonly matcher: WsMessageMatcher;
	readonly reaction: WsReaction;
	readonly callCount: CallCountConstraint;
}

export interface WsReactionRule extends WsReactionRuleDefinition {
	/** 1-based position within the expectation */
	readonly index: number;
	/** Counts reactions actually sent */
	readonly counter: CallCounter;
}

export interface WsExpectationDefinition {
	readonly description: string;
	readonly path: PathPattern;
	readonly rules: readonly WsReactionRuleDefinition[];
	/** Constraint on the number of accepted connections */
	readonly callCount: CallCountConstraint;
}

export interface WsExpectation extends Omit<WsExpectationDefinition, "rules"> {
	readonly index: number;
	readonly rules: readonly WsReactionRule[];
	/** Counts accepted connections */
	readonly counter: CallCounter;
}

/**
 * Transport side of one WebSocket connection
 */
export interface WsConnectionSink {
	send(frame: WsOutboundFrame): void | Promise<void>;
	close(code: number, reason: string): void;
}
