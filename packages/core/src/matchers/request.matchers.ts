/**
 * Request Matchers
 *
 * Construction, evaluation and description of request matchers.
 * Evaluation never throws: a throwing predicate or an undecodable body is a
 * failed outcome carrying the error message as its reason.
 */

import type { CodecRegistry } from "../codecs/codec.registry";
import { asError } from "../codecs/codec.types";
import { ensure } from "../errors";
import type { MethodSelector, RequestView } from "../request/request.types";
import { headerValue } from "../request/request.utils";
import { ownValue } from "../utils";
import type { MatcherOutcome, MatcherSource, RequestMatcher } from "./matcher.types";
import type { PathInput } from "./path.pattern";
import { describePath, matchPath, toPathPattern } from "./path.pattern";
import type { ValueMatcherInput } from "./value.matchers";
import { describeValue, evaluateValue, evaluateValues, toValueMatcher } from "./value.matchers";

type DecodedBody = { readonly ok: true; readonly value: unknown } | { readonly ok: false; readonly error: string };

/**
 * Per-request evaluation state. Decoded bodies are memoized by content-type
 * so several body matchers decode once.
 */
export interface MatchContext {
	readonly request: RequestView;
	decodeBody(contentType?: string): DecodedBody;
}

export function createMatchContext(request: RequestView, codecs: CodecRegistry): MatchContext {
	const decoded = new Map<string, DecodedBody>();
	return {
		request,
		decodeBody(contentType) {
			const effective = contentType ?? headerValue(request, "content-type") ?? "application/octet-stream";
			const cached = decoded.get(effective);
			if (cached) {
				return cached;
			}
			let result: DecodedBody;
			try {
				result = { ok: true, value: codecs.decode(request.body, effective) };
			} catch (error) {
				result = { ok: false, error: asError(error).message };
			}
			decoded.set(effective, result);
			return result;
		},
	};
}

// =============================================================================
// Constructors
// =============================================================================

export function methodIs(method: MethodSelector): RequestMatcher {
	return { kind: "method", method };
}

export function pathIs(path: PathInput): RequestMatcher {
	return { kind: "path", path: toPathPattern(path) };
}

export function queryParam(name: string, value: ValueMatcherInput = { kind: "present" }): RequestMatcher {
	ensure(name.length > 0, "query matcher", "parameter name must not be empty");
	return { kind: "queryParam", name, value: toValueMatcher(value) };
}

export function queryWhere(
	predicate: (query: RequestView["query"]) => boolean,
	description = "query satisfies predicate",
): RequestMatcher {
	return { kind: "query", predicate, description };
}

export function header(name: string, value: ValueMatcherInput = { kind: "present" }): RequestMatcher {
	ensure(name.trim().length > 0, "header matcher", "header name must not be empty");
	return { kind: "header", name: name.toLowerCase(), value: toValueMatcher(value) };
}

export function headersWhere(
	predicate: (headers: RequestView["headers"]) => boolean,
	description = "headers satisfy predicate",
): RequestMatcher {
	return { kind: "headers", predicate, description };
}

export function cookie(name: string, value: ValueMatcherInput = { kind: "present" }): RequestMatcher {
	ensure(name.length > 0, "cookie matcher", "cookie name must not be empty");
	return { kind: "cookie", name, value: toValueMatcher(value) };
}

export function cookiesWhere(
	predicate: (cookies: RequestView["cookies"]) => boolean,
	description = "cookies satisfy predicate",
): RequestMatcher {
	return { kind: "cookies", predicate, description };
}

export function noCookies(): RequestMatcher {
	return { kind: "noCookies" };
}

export function bodyWhere(
	predicate: (body: unknown) => boolean,
	options: { description?: string; contentType?: string } = {},
): RequestMatcher {
	return {
		kind: "body",
		predicate,
		description: options.description ?? "body satisfies predicate",
		...(options.contentType !== undefined ? { contentType: options.contentType } : {}),
	};
}

export function secure(flag = true): RequestMatcher {
	return { kind: "secure", secure: flag };
}

// =============================================================================
// Description
// =============================================================================

export function describeMatcher(matcher: RequestMatcher): string {
	switch (matcher.kind) {
		case "method":
			return matcher.method === "ANY" ? "any method" : `method is ${matcher.method}`;
		case "path":
			return describePath(matcher.path);
		case "queryParam":
			return `query parameter "${matcher.name}" ${describeValue(matcher.value)}`;
		case "query":
			return matcher.description;
		case "header":
			return `header "${matcher.name}" ${describeValue(matcher.value)}`;
		case "headers":
			return matcher.description;
		case "cookie":
			return `cookie "${matcher.name}" ${describeValue(matcher.value)}`;
		case "cookies":
			return matcher.description;
		case "noCookies":
			return "no cookies";
		case "body":
			return matcher.contentType ? `${matcher.description} (decoded as ${matcher.contentType})` : matcher.description;
		case "secure":
			return matcher.secure ? "request is secure" : "request is not secure";
	}
}

// =============================================================================
// Evaluation
// =============================================================================

function actual(value: unknown): string {
	return `actual: ${value === undefined ? "<absent>" : JSON.stringify(value)}`;
}

function check(matcher: RequestMatcher, context: MatchContext): { passed: boolean; reason?: string } {
	const { request } = context;
	switch (matcher.kind) {
		case "method": {
			const passed = matcher.method === "ANY" || matcher.method === request.method;
			return passed ? { passed } : { passed, reason: actual(request.method) };
		}
		case "path": {
			const passed = matchPath(matcher.path, request.path);
			return passed ? { passed } : { passed, reason: actual(request.path) };
		}
		case "queryParam": {
			const values = ownValue(request.query, matcher.name);
			const passed = evaluateValues(matcher.value, values);
			return passed ? { passed } : { passed, reason: actual(values) };
		}
		case "query":
			return { passed: matcher.predicate(request.query) };
		case "header": {
			const values = ownValue(request.headers, matcher.name);
			const passed = evaluateValues(matcher.value, values);
			return passed ? { passed } : { passed, reason: actual(values) };
		}
		case "headers":
			return { passed: matcher.predicate(request.headers) };
		case "cookie": {
			const value = ownValue(request.cookies, matcher.name);
			const passed = evaluateValue(matcher.value, value);
			return passed ? { passed } : { passed, reason: actual(value) };
		}
		case "cookies":
			return { passed: matcher.predicate(request.cookies) };
		case "noCookies": {
			const names = Object.keys(request.cookies);
			const passed = names.length === 0;
			return passed ? { passed } : { passed, reason: `cookies present: ${names.join(", ")}` };
		}
		case "body": {
			const decoded = context.decodeBody(matcher.contentType);
			if (!decoded.ok) {
				return { passed: false, reason: decoded.error };
			}
			return { passed: matcher.predicate(decoded.value) };
		}
		case "secure": {
			const passed = matcher.secure === request.secure;
			return passed ? { passed } : { passed, reason: actual(request.secure) };
		}
	}
}

/**
 * Evaluate one matcher. Thrown errors become failed outcomes.
 */
export function evaluateMatcher(
	matcher: RequestMatcher,
	context: MatchContext,
	source: MatcherSource = "expectation",
): MatcherOutcome {
	const description = describeMatcher(matcher);
	try {
		const { passed, reason } = check(matcher, context);
		return reason === undefined
			? { kind: matcher.kind, source, description, passed }
			: { kind: matcher.kind, source, description, passed, reason };
	} catch (error) {
		return { kind: matcher.kind, source, description, passed: false, reason: `threw: ${asError(error).message}` };
	}
}
