/**
 * Value Matchers
 *
 * Predicates over a single, possibly absent, value extracted from a request
 * facet (a header, a query parameter, a cookie, a WebSocket text frame).
 */

import { ensure } from "../errors";

export type ValueMatcher<T = string> =
	| { readonly kind: "equals"; readonly value: T }
	| { readonly kind: "satisfies"; readonly predicate: (value: T) => boolean; readonly description: string }
	| { readonly kind: "absent" }
	| { readonly kind: "present" };

/**
 * A value matcher, or a plain value meaning "equals"
 */
export type ValueMatcherInput<T = string> = ValueMatcher<T> | T;

export function equalTo<T>(value: T): ValueMatcher<T> {
	return { kind: "equals", value };
}

export function satisfies<T>(predicate: (value: T) => boolean, description = "satisfies predicate"): ValueMatcher<T> {
	ensure(typeof predicate === "function", "value matcher", "predicate must be a function");
	return { kind: "satisfies", predicate, description };
}

export function matching(pattern: RegExp): ValueMatcher<string> {
	return satisfies((value: string) => {
		pattern.lastIndex = 0;
		return pattern.test(value);
	}, `matches ${pattern}`);
}

export function oneOf<T>(...values: T[]): ValueMatcher<T> {
	ensure(values.length > 0, "value matcher", "oneOf() needs at least one value");
	return satisfies((value: T) => values.includes(value), `one of ${values.map((v) => JSON.stringify(v)).join(", ")}`);
}

export function absent<T = string>(): ValueMatcher<T> {
	return { kind: "absent" };
}

export function present<T = string>(): ValueMatcher<T> {
	return { kind: "present" };
}

function isValueMatcher<T>(input: ValueMatcherInput<T>): input is ValueMatcher<T> {
	if (typeof input !== "object" || input === null || !("kind" in input)) {
		return false;
	}
	const kind: unknown = input.kind;
	return kind === "equals" || kind === "satisfies" || kind === "absent" || kind === "present";
}

export function toValueMatcher<T>(input: ValueMatcherInput<T>): ValueMatcher<T> {
	return isValueMatcher(input) ? input : equalTo(input);
}

/**
 * Evaluate a value matcher. Throws if a predicate throws; callers turn that
 * into a failed outcome.
 */
export function evaluateValue<T>(matcher: ValueMatcher<T>, value: T | undefined): boolean {
	switch (matcher.kind) {
		case "absent":
			return value === undefined;
		case "present":
			return value !== undefined;
		case "equals":
			return value !== undefined && value === matcher.value;
		case "satisfies":
			return value !== undefined && matcher.predicate(value);
	}
}

/**
 * Evaluate against a multi-valued facet: passes when any value passes
 */
export function evaluateValues(matcher: ValueMatcher<string>, values: readonly string[] | undefined): boolean {
	if (matcher.kind === "absent") {
		return values === undefined || values.length === 0;
	}
	if (!values || values.length === 0) {
		return false;
	}
	return values.some((value) => evaluateValue(matcher, value));
}

export function describeValue<T>(matcher: ValueMatcher<T>): string {
	switch (matcher.kind) {
		case "absent":
			return "is absent";
		case "present":
			return "is present";
		case "equals":
			return `equals ${JSON.stringify(matcher.value)}`;
		case "satisfies":
			return matcher.description;
	}
}
