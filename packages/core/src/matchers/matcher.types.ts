/**
 * Request Matcher Types
 *
 * One tagged variant per request facet. Every variant is a pure function of
 * (request snapshot, configured value).
 */

import type { MethodSelector, RequestView } from "../request/request.types";
import type { PathPattern } from "./path.pattern";
import type { ValueMatcher } from "./value.matchers";

export type RequestMatcher =
	| { readonly kind: "method"; readonly method: MethodSelector }
	| { readonly kind: "path"; readonly path: PathPattern }
	| { readonly kind: "queryParam"; readonly name: string; readonly value: ValueMatcher }
	| {
			readonly kind: "query";
			readonly predicate: (query: RequestView["query"]) => boolean;
			readonly description: string;
	  }
	| { readonly kind: "header"; readonly name: string; readonly value: ValueMatcher }
	| {
			readonly kind: "headers";
			readonly predicate: (headers: RequestView["headers"]) => boolean;
			readonly description: string;
	  }
	| { readonly kind: "cookie"; readonly name: string; readonly value: ValueMatcher }
	| {
			readonly kind: "cookies";
			readonly predicate: (cookies: RequestView["cookies"]) => boolean;
			readonly description: string;
	  }
	| { readonly kind: "noCookies" }
	| {
			readonly kind: "body";
			readonly predicate: (body: unknown) => boolean;
			readonly description: string;
			/** Content-type to decode with; defaults to the request's Content-Type */
			readonly contentType?: string;
	  }
	| { readonly kind: "secure"; readonly secure: boolean };

export type MatcherKind = RequestMatcher["kind"];

/**
 * Where a matcher came from, for the mismatch report
 */
export type MatcherSource = "expectation" | `requirement #${number}`;

/**
 * Result of evaluating one matcher against one request
 */
export interface MatcherOutcome {
	readonly kind: MatcherKind;
	readonly source: MatcherSource;
	readonly description: string;
	readonly passed: boolean;
	/** Failure detail: thrown error message, decoding failure, actual value */
	readonly reason?: string;
}
