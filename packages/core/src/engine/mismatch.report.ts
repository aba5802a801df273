/**
 * Mismatch Report
 *
 * Structured diagnostics for a request that matched no expectation:
 * one entry per registered expectation, every matcher evaluated (no
 * short-circuit). Rendering is left to the caller.
 */

import type { MatcherOutcome } from "../matchers/matcher.types";

export interface MismatchEntry {
	/** 1-based expectation index */
	readonly index: number;
	readonly description: string;
	readonly outcomes: readonly MatcherOutcome[];
	readonly passed: number;
	readonly failed: number;
}

export interface MismatchReport {
	readonly request: { readonly method: string; readonly path: string };
	readonly entries: readonly MismatchEntry[];
	readonly totals: {
		readonly expectations: number;
		readonly matchersPassed: number;
		readonly matchersFailed: number;
	};
}

export function createMismatchEntry(index: number, description: string, outcomes: MatcherOutcome[]): MismatchEntry {
	const passed = outcomes.filter((outcome) => outcome.passed).length;
	return { index, description, outcomes, passed, failed: outcomes.length - passed };
}

export function createMismatchReport(request: { method: string; path: string }, entries: MismatchEntry[]): MismatchReport {
	let matchersPassed = 0;
	let matchersFailed = 0;
	for (const entry of entries) {
		matchersPassed += entry.passed;
		matchersFailed += entry.failed;
	}
	return {
		request: { method: request.method, path: request.path },
		entries,
		totals: { expectations: entries.length, matchersPassed, matchersFailed },
	};
}

/**
 * Entry with the fewest failed matchers; the first one wins ties
 */
export function closestEntry(report: MismatchReport): MismatchEntry | undefined {
	let closest: MismatchEntry | undefined;
	for (const entry of report.entries) {
		if (!closest || entry.failed < closest.failed) {
			closest = entry;
		}
	}
	return closest;
}

/**
 * One-line summary for log output
 */
export function formatMismatchSummary(report: MismatchReport): string {
	const { method, path } = report.request;
	const head = `${method} ${path} matched none of ${report.totals.expectations} expectation(s)`;
	const closest = closestEntry(report);
	if (!closest) {
		return head;
	}
	const firstFailure = closest.outcomes.find((outcome) => !outcome.passed);
	const detail = firstFailure
		? `: ${firstFailure.description}${firstFailure.reason ? ` (${firstFailure.reason})` : ""}`
		: "";
	return `${head}; closest #${closest.index} "${closest.description}" failed ${closest.failed} of ${closest.outcomes.length}${detail}`;
}
