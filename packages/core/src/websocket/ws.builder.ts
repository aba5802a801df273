/**
 * WebSocket Expectation Builder
 *
 * @example
 * ```typescript
 * e.webSocket("/chat")
 *   .onText("ping").reply("pong")
 *   .onText(matching(/^bye/)).reply("ciao", { close: { code: 1000, reason: "done" } })
 *   .onBinary((bytes) => bytes[0] === 1).reply(Buffer.from([2]))
 *   .times(once());
 * ```
 */

import { ensure } from "../errors";
import type { CallCountConstraint } from "../matchers/call-count";
import { DEFAULT_CALL_COUNT } from "../matchers/call-count";
import type { PathInput, PathPattern } from "../matchers/path.pattern";
import { pathLabel, toPathPattern } from "../matchers/path.pattern";
import type { ValueMatcherInput } from "../matchers/value.matchers";
import { toValueMatcher } from "../matchers/value.matchers";
import type { DelayInput } from "../response/responder.factory";
import { toDelaySpec } from "../response/responder.factory";
import { toBuffer } from "../utils";
import { describeWsMatcher } from "./ws.reaction-engine";
import type { WsExpectationDefinition, WsFrameType, WsMessageMatcher, WsReactionRuleDefinition } from "./ws.types";

export interface WsReplyOptions {
	/** Frame type; defaults to text for strings and binary for bytes */
	frame?: WsFrameType;
	delay?: DelayInput;
	/** Constraint on how many times this reaction is sent */
	times?: CallCountConstraint;
	/** Close the connection after sending */
	close?: { code?: number; reason?: string };
}

/**
 * Pending rule: a matcher waiting for its reaction
 */
export class WsRuleBuilder {
	constructor(
		private readonly parent: WsExpectationBuilder,
		private readonly matcher: WsMessageMatcher,
	) {}

	reply(payload: string | Uint8Array, options: WsReplyOptions = {}): WsExpectationBuilder {
		const frame = options.frame ?? (typeof payload === "string" ? "text" : "binary");
		const closeCode = options.close?.code ?? 1000;
		ensure(Number.isInteger(closeCode) && closeCode >= 1000 && closeCode <= 4999, "close code", `${closeCode}`);

		this.parent.addRule({
			matcher: this.matcher,
			reaction: {
				frame,
				payload: toBuffer(payload),
				...(options.delay !== undefined ? { delay: toDelaySpec(options.delay) } : {}),
				...(options.close ? { close: { code: closeCode, reason: options.close.reason ?? "" } } : {}),
			},
			callCount: options.times ?? DEFAULT_CALL_COUNT,
		});
		return this.parent;
	}
}

export class WsExpectationBuilder {
	private readonly path: PathPattern;
	private readonly rules: WsReactionRuleDefinition[] = [];
	/** Matchers still waiting for reply() */
	private readonly unanswered = new Set<WsMessageMatcher>();
	private callCount: CallCountConstraint = DEFAULT_CALL_COUNT;
	private description?: string;

	constructor(path: PathInput) {
		this.path = toPathPattern(path);
	}

	onText(value: ValueMatcherInput<string>): WsRuleBuilder {
		return this.rule({ kind: "text", value: toValueMatcher(value) });
	}

	onBinary(predicate: (bytes: Buffer) => boolean, description = "satisfies predicate"): WsRuleBuilder {
		return this.rule({ kind: "binary", predicate, description });
	}

	onAny(): WsRuleBuilder {
		return this.rule({ kind: "any" });
	}

	private rule(matcher: WsMessageMatcher): WsRuleBuilder {
		this.unanswered.add(matcher);
		return new WsRuleBuilder(this, matcher);
	}

	/**
	 * Constraint on the number of accepted connections
	 */
	times(constraint: CallCountConstraint): this {
		this.callCount = constraint;
		return this;
	}

	describedAs(description: string): this {
		this.description = description;
		return this;
	}

	addRule(rule: WsReactionRuleDefinition): void {
		this.unanswered.delete(rule.matcher);
		this.rules.push(rule);
	}

	/**
	 * Throws ConfigurationError when a message matcher was never given a reply
	 */
	build(): WsExpectationDefinition {
		const unanswered = [...this.unanswered].map(describeWsMatcher);
		ensure(unanswered.length === 0, "WebSocket rule", `no reply for ${unanswered.join(", ")}`);
		return {
			description: this.description ?? `WS ${pathLabel(this.path)}`,
			path: this.path,
			rules: [...this.rules],
			callCount: this.callCount,
		};
	}
}
