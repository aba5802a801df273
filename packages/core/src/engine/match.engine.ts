/**
 * Match Engine
 *
 * First-match selection over expectations in registration order. Each
 * expectation's matcher set is method, path, its own matchers in order, then
 * the matchers of every requirement that applies to the request. No scoring:
 * registration order is the tie-break.
 */

import type { ExpectationStore } from "../expectations/expectation.store";
import type { Expectation, Requirement } from "../expectations/expectation.types";
import type { MatcherOutcome, MatcherSource, RequestMatcher } from "../matchers/matcher.types";
import { matchPath } from "../matchers/path.pattern";
import { createMatchContext, evaluateMatcher, methodIs } from "../matchers/request.matchers";
import type { MatchContext } from "../matchers/request.matchers";
import type { RequestView } from "../request/request.types";
import type { Responder } from "../response/response.types";
import { selectResponder } from "../response/response.synthesizer";
import type { MismatchReport } from "./mismatch.report";
import { createMismatchEntry, createMismatchReport } from "./mismatch.report";

export type MatchResult =
	| {
			readonly kind: "matched";
			readonly expectation: Expectation;
			/** 1-based call number for this expectation */
			readonly callNumber: number;
			readonly responder: Responder;
	  }
	| { readonly kind: "unmatched"; readonly report: MismatchReport };

interface SourcedMatcher {
	readonly matcher: RequestMatcher;
	readonly source: MatcherSource;
}

function appliesTo(requirement: Requirement, request: RequestView): boolean {
	if (requirement.method !== "ANY" && requirement.method !== request.method) {
		return false;
	}
	try {
		return matchPath(requirement.path, request.path);
	} catch {
		return false;
	}
}

export class MatchEngine {
	constructor(private readonly store: ExpectationStore) {}

	/**
	 * Select the first expectation whose full matcher set passes and count
	 * the call. Builds a mismatch report when none passes.
	 */
	match(request: RequestView): MatchResult {
		const expectations = this.store.all();
		const requirements = this.applicableRequirements(request);

		for (const expectation of expectations) {
			const context = createMatchContext(request, expectation.codecs);
			const passed = this.matcherSet(expectation, requirements).every(
				({ matcher, source }) => evaluateMatcher(matcher, context, source).passed,
			);
			if (passed) {
				const callNumber = expectation.counter.increment();
				return { kind: "matched", expectation, callNumber, responder: selectResponder(expectation, callNumber) };
			}
		}

		return { kind: "unmatched", report: this.buildReport(request, expectations, requirements) };
	}

	/**
	 * Evaluate every matcher of every expectation without counting
	 */
	explain(request: RequestView): MismatchReport {
		return this.buildReport(request, this.store.all(), this.applicableRequirements(request));
	}

	/**
	 * Evaluate one expectation's full matcher set without counting
	 */
	evaluate(expectation: Expectation, request: RequestView): MatcherOutcome[] {
		const context = createMatchContext(request, expectation.codecs);
		return this.evaluateAll(expectation, this.applicableRequirements(request), context);
	}

	private applicableRequirements(request: RequestView): readonly Requirement[] {
		return this.store.requirements().filter((requirement) => appliesTo(requirement, request));
	}

	private matcherSet(expectation: Expectation, requirements: readonly Requirement[]): SourcedMatcher[] {
		const set: SourcedMatcher[] = [
			{ matcher: methodIs(expectation.method), source: "expectation" },
			{ matcher: { kind: "path", path: expectation.path }, source: "expectation" },
			...expectation.matchers.map((matcher): SourcedMatcher => ({ matcher, source: "expectation" })),
		];
		for (const requirement of requirements) {
			for (const matcher of requirement.matchers) {
				set.push({ matcher, source: `requirement #${requirement.index}` });
			}
		}
		return set;
	}

	private evaluateAll(
		expectation: Expectation,
		requirements: readonly Requirement[],
		context: MatchContext,
	): MatcherOutcome[] {
		return this.matcherSet(expectation, requirements).map(({ matcher, source }) =>
			evaluateMatcher(matcher, context, source),
		);
	}

	private buildReport(
		request: RequestView,
		expectations: readonly Expectation[],
		requirements: readonly Requirement[],
	): MismatchReport {
		const entries = expectations.map((expectation) =>
			createMismatchEntry(
				expectation.index,
				expectation.description,
				this.evaluateAll(expectation, requirements, createMatchContext(request, expectation.codecs)),
			),
		);
		return createMismatchReport(request, entries);
	}
}
