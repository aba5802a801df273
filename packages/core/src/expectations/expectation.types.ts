/**
 * Expectation Types
 */

import type { CodecRegistry } from "../codecs/codec.registry";
import type { CallCountConstraint } from "../matchers/call-count";
import type { RequestMatcher } from "../matchers/matcher.types";
import type { PathPattern } from "../matchers/path.pattern";
import type { MethodSelector } from "../request/request.types";
import type { Responder } from "../response/response.types";
import type { CallCounter } from "./call-counter";

/**
 * Expectation as produced by a builder, before registration
 */
export interface ExpectationDefinition {
	readonly description: string;
	readonly method: MethodSelector;
	readonly path: PathPattern;
	/** Auxiliary matchers in registration order */
	readonly matchers: readonly RequestMatcher[];
	/** Never empty */
	readonly responders: readonly Responder[];
	readonly callCount: CallCountConstraint;
	/** Expectation-local codecs; parent is the group registry */
	readonly codecs: CodecRegistry;
}

/**
 * Registered expectation, owned by one ExpectationStore
 */
export interface Expectation extends ExpectationDefinition {
	/** 1-based registration position */
	readonly index: number;
	readonly counter: CallCounter;
}

export interface RequirementDefinition {
	readonly description: string;
	readonly method: MethodSelector;
	readonly path: PathPattern;
	readonly matchers: readonly RequestMatcher[];
}

export interface Requirement extends RequirementDefinition {
	readonly index: number;
}
