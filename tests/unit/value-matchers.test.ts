/**
 * Value, Path and Call-Count Matcher Tests
 */

import {
	absent,
	atLeast,
	atMost,
	between,
	compileGlob,
	ConfigurationError,
	countSatisfies,
	describeCallCount,
	describePath,
	describeValue,
	equalTo,
	evaluateValue,
	evaluateValues,
	exactly,
	isSatisfied,
	matching,
	matchPath,
	never,
	once,
	oneOf,
	pathWhere,
	present,
	satisfies,
	toPathPattern,
} from "httpdouble";
import { describe, expect, it } from "vitest";

// ============================================================================
// Value Matchers
// ============================================================================

describe("Value Matchers", () => {
	it("should compare exact values and reject absent ones", () => {
		expect(evaluateValue(equalTo("a"), "a")).toBe(true);
		expect(evaluateValue(equalTo("a"), "b")).toBe(false);
		expect(evaluateValue(equalTo("a"), undefined)).toBe(false);
	});

	it("should distinguish absent from present with any value", () => {
		expect(evaluateValue(absent(), undefined)).toBe(true);
		expect(evaluateValue(absent(), "x")).toBe(false);
		expect(evaluateValue(present(), undefined)).toBe(false);
		expect(evaluateValue(present(), "")).toBe(true);
	});

	it("should reset global regex state between evaluations", () => {
		const matcher = matching(/a/g);

		expect(evaluateValue(matcher, "a")).toBe(true);
		expect(evaluateValue(matcher, "a")).toBe(true);
	});

	it("should accept any listed value with oneOf", () => {
		const matcher = oneOf("GET", "POST");

		expect(evaluateValue(matcher, "POST")).toBe(true);
		expect(evaluateValue(matcher, "PUT")).toBe(false);
		expect(describeValue(matcher)).toBe('one of "GET", "POST"');
	});

	it("should reject oneOf without values", () => {
		expect(() => oneOf()).toThrow(ConfigurationError);
	});

	it("should pass multi-valued facets when any value passes", () => {
		expect(evaluateValues(equalTo("b"), ["a", "b"])).toBe(true);
		expect(evaluateValues(equalTo("c"), ["a", "b"])).toBe(false);
		expect(evaluateValues(absent(), [])).toBe(true);
		expect(evaluateValues(present(), undefined)).toBe(false);
	});

	it("should describe matchers for reports", () => {
		expect(describeValue(equalTo("x"))).toBe('equals "x"');
		expect(describeValue(absent())).toBe("is absent");
		expect(describeValue(present())).toBe("is present");
		expect(describeValue(satisfies((v: string) => v.length > 2, "longer than 2"))).toBe("longer than 2");
		expect(describeValue(matching(/^Bearer /))).toBe("matches /^Bearer /");
	});
});

// ============================================================================
// Path Patterns
// ============================================================================

describe("Path Patterns", () => {
	it("should match a single segment with *", () => {
		const regex = compileGlob("/users/*");

		expect(regex.test("/users/42")).toBe(true);
		expect(regex.test("/users/42/posts")).toBe(false);
	});

	it("should match across segments with **", () => {
		expect(compileGlob("/files/**").test("/files/a/b/c.txt")).toBe(true);
	});

	it("should match one character with ?", () => {
		const regex = compileGlob("/v?/items");

		expect(regex.test("/v1/items")).toBe(true);
		expect(regex.test("/v10/items")).toBe(false);
	});

	it("should treat regex characters in globs literally", () => {
		expect(compileGlob("/a.b/*").test("/axb/c")).toBe(false);
		expect(compileGlob("/a.b/*").test("/a.b/c")).toBe(true);
	});

	it("should pick exact or glob patterns from strings", () => {
		expect(toPathPattern("/users").kind).toBe("exact");
		expect(toPathPattern("/users/*").kind).toBe("glob");
		expect(describePath(toPathPattern("/users/*"))).toBe('path matches "/users/*"');
	});

	it("should reject paths without a leading slash", () => {
		expect(() => toPathPattern("users")).toThrow(ConfigurationError);
	});

	it("should evaluate predicate paths", () => {
		const pattern = pathWhere((path) => path.endsWith(".json"), "ends with .json");

		expect(matchPath(pattern, "/data/report.json")).toBe(true);
		expect(matchPath(pattern, "/data/report.xml")).toBe(false);
		expect(describePath(pattern)).toBe("ends with .json");
	});
});

// ============================================================================
// Call-Count Constraints
// ============================================================================

describe("Call-Count Constraints", () => {
	it("should check exact counts", () => {
		expect(isSatisfied(once(), 1)).toBe(true);
		expect(isSatisfied(once(), 2)).toBe(false);
		expect(isSatisfied(never(), 0)).toBe(true);
		expect(isSatisfied(exactly(3), 3)).toBe(true);
	});

	it("should check relational counts", () => {
		expect(isSatisfied(atLeast(2), 3)).toBe(true);
		expect(isSatisfied(atLeast(2), 1)).toBe(false);
		expect(isSatisfied(atMost(1), 2)).toBe(false);
		expect(isSatisfied(between(1, 3), 2)).toBe(true);
		expect(isSatisfied(between(1, 3), 4)).toBe(false);
	});

	it("should treat a throwing predicate as unsatisfied", () => {
		const even = countSatisfies((count) => count % 2 === 0, "an even number of times");
		const broken = countSatisfies(() => {
			throw new Error("boom");
		});

		expect(isSatisfied(even, 4)).toBe(true);
		expect(isSatisfied(broken, 4)).toBe(false);
	});

	it("should describe constraints", () => {
		expect(describeCallCount(atLeast(1))).toBe("at least 1 time(s)");
		expect(describeCallCount(between(1, 3))).toBe("between 1 and 3 time(s)");
		expect(describeCallCount(countSatisfies(() => true, "whenever"))).toBe("whenever");
	});

	it("should reject invalid counts", () => {
		expect(() => exactly(-1)).toThrow(ConfigurationError);
		expect(() => exactly(1.5)).toThrow(ConfigurationError);
		expect(() => between(3, 1)).toThrow("Invalid call count: range 3..1 is inverted");
	});
});
