/**
 * Match Engine Tests
 *
 * First-match selection, requirement composition and mismatch reports.
 */

import {
	createMatchContext,
	evaluateMatcher,
	formatMismatchSummary,
	headersWhere,
	MatchEngine,
	methodIs,
	present,
} from "httpdouble";
import { describe, expect, it } from "vitest";
import { createStoreFixture, request } from "../helpers/test-helpers";

describe("Match Engine", () => {
	// ==========================================================================
	// Selection
	// ==========================================================================

	describe("selection", () => {
		it("should select the earlier registration when several match", () => {
			const { store, registerExpectations } = createStoreFixture();
			const [first, second] = registerExpectations((e) => {
				e.get("/users/*").describedAs("first");
				e.get("/users/*").describedAs("second");
			});
			const engine = new MatchEngine(store);

			for (let i = 0; i < 3; i++) {
				const result = engine.match(request("/users/1"));
				expect(result.kind === "matched" && result.expectation.description).toBe("first");
			}
			expect(first?.counter.value).toBe(3);
			expect(second?.counter.value).toBe(0);
		});

		it("should number calls per expectation", () => {
			const { store, registerExpectations } = createStoreFixture();
			registerExpectations((e) => {
				e.get("/a");
				e.get("/b");
			});
			const engine = new MatchEngine(store);

			const calls = ["/a", "/b", "/a"].map((path) => {
				const result = engine.match(request(path));
				return result.kind === "matched" ? [result.expectation.index, result.callNumber] : [];
			});

			expect(calls).toEqual([
				[1, 1],
				[2, 1],
				[1, 2],
			]);
		});

		it("should evaluate method, path, then matchers in registration order", () => {
			const { store, registerExpectations } = createStoreFixture();
			const [expectation] = registerExpectations((e) => {
				e.get("/search").header("accept", "application/json").query("q");
			});
			if (!expectation) {
				throw new Error("not registered");
			}

			const outcomes = new MatchEngine(store).evaluate(expectation, request("/search?q=x"));

			expect(outcomes.map((o) => [o.kind, o.passed])).toEqual([
				["method", true],
				["path", true],
				["header", false],
				["queryParam", true],
			]);
		});

		it("should keep evaluating later expectations when a matcher throws", () => {
			const { store, registerExpectations } = createStoreFixture();
			registerExpectations((e) => {
				e.get("/x").matching(
					headersWhere(() => {
						throw new Error("boom");
					}),
				);
				e.get("/x");
			});
			const engine = new MatchEngine(store);

			const result = engine.match(request("/x"));

			expect(result.kind === "matched" && result.expectation.index).toBe(2);
			expect(engine.explain(request("/x")).entries[0]?.outcomes[2]?.reason).toBe("threw: boom");
		});

		it("should not count unmatched requests or explanations", () => {
			const { store, registerExpectations } = createStoreFixture();
			const [expectation] = registerExpectations((e) => {
				e.post("/orders");
			});
			const engine = new MatchEngine(store);

			engine.match(request("/orders"));
			engine.explain(request("/orders", { method: "POST" }));

			expect(expectation?.counter.value).toBe(0);
		});
	});

	// ==========================================================================
	// Requirements
	// ==========================================================================

	describe("requirements", () => {
		it("should AND requirement matchers into every applicable expectation", () => {
			const { store, registerExpectations, registerRequirements } = createStoreFixture();
			registerExpectations((e) => {
				e.get("/users");
			});
			registerRequirements((r) => {
				r.all().header("authorization", present());
			});
			const engine = new MatchEngine(store);

			const rejected = engine.match(request("/users"));
			const accepted = engine.match(request("/users", { headers: { authorization: "Bearer test-token" } }));

			expect(rejected.kind).toBe("unmatched");
			expect(accepted.kind).toBe("matched");
			if (rejected.kind === "unmatched") {
				const last = rejected.report.entries[0]?.outcomes.at(-1);
				expect(last?.source).toBe("requirement #1");
				expect(last?.passed).toBe(false);
			}
		});

		it("should only apply requirements to their method and path", () => {
			const { store, registerExpectations, registerRequirements } = createStoreFixture();
			registerExpectations((e) => {
				e.get("/users/1");
			});
			registerRequirements((r) => {
				r.post("/admin/**").secure();
			});

			expect(new MatchEngine(store).match(request("/users/1")).kind).toBe("matched");
		});

		it("should fail when requirement and expectation disagree on one facet", () => {
			const { store, registerExpectations, registerRequirements } = createStoreFixture();
			registerExpectations((e) => {
				e.get("/users").header("x-tenant", "a");
			});
			registerRequirements((r) => {
				r.get("/users").header("x-tenant", "b");
			});

			const result = new MatchEngine(store).match(request("/users", { headers: { "x-tenant": "a" } }));

			expect(result.kind).toBe("unmatched");
		});
	});

	// ==========================================================================
	// Mismatch reports
	// ==========================================================================

	describe("mismatch report", () => {
		it("should list every matcher of every expectation", () => {
			const { store, registerExpectations } = createStoreFixture();
			const expectations = registerExpectations((e) => {
				e.get("/users").header("accept", "text/html");
				e.post("/users/*").query("dryRun", "true");
				e.any("/health");
			});
			const view = request("/users?dryRun=false", { headers: { accept: "application/json" } });
			const engine = new MatchEngine(store);

			const result = engine.match(view);
			if (result.kind !== "unmatched") {
				throw new Error("expected no match");
			}
			const { report } = result;

			expect(report.entries.map((entry) => entry.index)).toEqual([1, 2, 3]);
			expect(report.entries.map((entry) => entry.outcomes.length)).toEqual([3, 3, 2]);

			for (const [i, entry] of report.entries.entries()) {
				const expectation = expectations[i];
				if (!expectation) {
					throw new Error("missing expectation");
				}
				const context = createMatchContext(view, expectation.codecs);
				const direct = [
					evaluateMatcher(methodIs(expectation.method), context).passed,
					evaluateMatcher({ kind: "path", path: expectation.path }, context).passed,
					...expectation.matchers.map((matcher) => evaluateMatcher(matcher, context).passed),
				];
				expect(entry.outcomes.map((o) => o.passed)).toEqual(direct);
			}

			expect(report.totals).toEqual({ expectations: 3, matchersPassed: 3, matchersFailed: 5 });
		});

		it("should summarize the closest expectation in one line", () => {
			const { store, registerExpectations } = createStoreFixture();
			registerExpectations((e) => {
				e.get("/users");
			});

			const report = new MatchEngine(store).explain(request("/orders"));

			expect(formatMismatchSummary(report)).toBe(
				'GET /orders matched none of 1 expectation(s); closest #1 "GET /users" failed 1 of 2: path equals "/users" (actual: "/orders")',
			);
		});
	});
});
