/**
 * Call Count Constraints
 *
 * Evaluated only at verification time, never while matching.
 */

import { ensure } from "../errors";

export type CallCountConstraint =
	| { readonly kind: "exactly"; readonly count: number }
	| { readonly kind: "atLeast"; readonly count: number }
	| { readonly kind: "atMost"; readonly count: number }
	| { readonly kind: "between"; readonly min: number; readonly max: number }
	| { readonly kind: "satisfies"; readonly predicate: (count: number) => boolean; readonly description: string };

function ensureCount(count: number): void {
	ensure(Number.isInteger(count) && count >= 0, "call count", `expected a non-negative integer, got ${count}`);
}

export function exactly(count: number): CallCountConstraint {
	ensureCount(count);
	return { kind: "exactly", count };
}

export function atLeast(count: number): CallCountConstraint {
	ensureCount(count);
	return { kind: "atLeast", count };
}

export function atMost(count: number): CallCountConstraint {
	ensureCount(count);
	return { kind: "atMost", count };
}

export function between(min: number, max: number): CallCountConstraint {
	ensureCount(min);
	ensureCount(max);
	ensure(min <= max, "call count", `range ${min}..${max} is inverted`);
	return { kind: "between", min, max };
}

export function countSatisfies(predicate: (count: number) => boolean, description = "satisfies predicate"): CallCountConstraint {
	return { kind: "satisfies", predicate, description };
}

export const once = (): CallCountConstraint => exactly(1);
export const never = (): CallCountConstraint => exactly(0);

/**
 * Default constraint for expectations that declare none
 */
export const DEFAULT_CALL_COUNT: CallCountConstraint = { kind: "atLeast", count: 1 };

export function isSatisfied(constraint: CallCountConstraint, count: number): boolean {
	switch (constraint.kind) {
		case "exactly":
			return count === constraint.count;
		case "atLeast":
			return count >= constraint.count;
		case "atMost":
			return count <= constraint.count;
		case "between":
			return count >= constraint.min && count <= constraint.max;
		case "satisfies":
			try {
				return constraint.predicate(count);
			} catch {
				return false;
			}
	}
}

export function describeCallCount(constraint: CallCountConstraint): string {
	switch (constraint.kind) {
		case "exactly":
			return `exactly ${constraint.count} time(s)`;
		case "atLeast":
			return `at least ${constraint.count} time(s)`;
		case "atMost":
			return `at most ${constraint.count} time(s)`;
		case "between":
			return `between ${constraint.min} and ${constraint.max} time(s)`;
		case "satisfies":
			return constraint.description;
	}
}
