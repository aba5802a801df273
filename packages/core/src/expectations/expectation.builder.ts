/**
 * Expectation Builders
 *
 * Fluent configuration surface passed to `server.expectations(fn)` and
 * `server.requirements(fn)`. Builders only collect plain definitions; the
 * server registers them once the configuring function returns.
 *
 * @example
 * ```typescript
 * server.expectations((e) => {
 *   e.get("/users/*")
 *     .header("authorization", present())
 *     .respond({ status: 503 })
 *     .respond({ status: 200, body: { id: 1 } })
 *     .times(exactly(2));
 *
 *   e.webSocket("/events").onText("ping").reply("pong");
 * });
 * ```
 */

import type { CodecRegistry } from "../codecs/codec.registry";
import type { DecodeFn, EncodeFn, PayloadType } from "../codecs/codec.types";
import type { DecoderRegistrar, EncoderRegistrar } from "../codecs/codec.registry";
import type { CallCountConstraint } from "../matchers/call-count";
import { DEFAULT_CALL_COUNT } from "../matchers/call-count";
import type { RequestMatcher } from "../matchers/matcher.types";
import type { PathInput, PathPattern } from "../matchers/path.pattern";
import { pathLabel, toPathPattern } from "../matchers/path.pattern";
import {
	bodyWhere,
	cookie,
	cookiesWhere,
	header,
	headersWhere,
	noCookies,
	queryParam,
	queryWhere,
	secure,
} from "../matchers/request.matchers";
import type { ValueMatcherInput } from "../matchers/value.matchers";
import type { MethodSelector, RequestView } from "../request/request.types";
import type { ForwardSpec, MultipartResponseSpec, ResponseSpec } from "../response/responder.factory";
import { createForwardResponder, createMultipartResponder, createStaticResponder } from "../response/responder.factory";
import type { Responder } from "../response/response.types";
import { WsExpectationBuilder } from "../websocket/ws.builder";
import type { WsExpectationDefinition } from "../websocket/ws.types";
import type { ExpectationDefinition, RequirementDefinition } from "./expectation.types";

/**
 * Matcher methods shared by expectation and requirement builders
 */
abstract class MatcherChainBuilder {
	protected readonly matchers: RequestMatcher[] = [];
	protected readonly path: PathPattern;

	constructor(
		protected readonly method: MethodSelector,
		path: PathInput,
	) {
		this.path = toPathPattern(path);
	}

	/**
	 * Query parameter by name; a plain string means "equals"
	 */
	query(name: string, value?: ValueMatcherInput): this {
		this.matchers.push(queryParam(name, value));
		return this;
	}

	queryWhere(predicate: (query: RequestView["query"]) => boolean, description?: string): this {
		this.matchers.push(queryWhere(predicate, description));
		return this;
	}

	/**
	 * Header by case-insensitive name; a plain string means "equals"
	 */
	header(name: string, value?: ValueMatcherInput): this {
		this.matchers.push(header(name, value));
		return this;
	}

	headersWhere(predicate: (headers: RequestView["headers"]) => boolean, description?: string): this {
		this.matchers.push(headersWhere(predicate, description));
		return this;
	}

	cookie(name: string, value?: ValueMatcherInput): this {
		this.matchers.push(cookie(name, value));
		return this;
	}

	cookiesWhere(predicate: (cookies: RequestView["cookies"]) => boolean, description?: string): this {
		this.matchers.push(cookiesWhere(predicate, description));
		return this;
	}

	noCookies(): this {
		this.matchers.push(noCookies());
		return this;
	}

	/**
	 * Predicate over the decoded body. The body is decoded with the decoder
	 * resolved for `contentType`, or for the request's Content-Type.
	 */
	body<T = unknown>(predicate: (body: T) => boolean, options: { description?: string; contentType?: string } = {}): this {
		this.matchers.push(bodyWhere((body) => predicate(body as T), options));
		return this;
	}

	secure(flag = true): this {
		this.matchers.push(secure(flag));
		return this;
	}

	/**
	 * Add a prebuilt matcher
	 */
	matching(matcher: RequestMatcher): this {
		this.matchers.push(matcher);
		return this;
	}

	protected defaultDescription(): string {
		return `${this.method} ${pathLabel(this.path)}`;
	}
}

export class ExpectationBuilder extends MatcherChainBuilder {
	/** Created at build(), once every encoder of the expectation is registered */
	private readonly responders: (() => Responder)[] = [];
	private callCount: CallCountConstraint = DEFAULT_CALL_COUNT;
	private description?: string;
	readonly codecs: CodecRegistry;

	constructor(method: MethodSelector, path: PathInput, groupCodecs: CodecRegistry, position: number) {
		super(method, path);
		this.codecs = groupCodecs.child(`expectation #${position}`);
	}

	describedAs(description: string): this {
		this.description = description;
		return this;
	}

	/**
	 * Expectation-local decoder, consulted before group and global decoders
	 */
	decoder(contentType: string, decode: DecodeFn): this {
		this.codecs.decoder(contentType, decode);
		return this;
	}

	/**
	 * Expectation-local encoder, consulted before group and global encoders
	 */
	encoder<T>(contentType: string, type: PayloadType<T>, encode: EncodeFn<T>): this {
		this.codecs.encoder(contentType, type, encode);
		return this;
	}

	/**
	 * Append a responder. The Nth match uses the Nth responder; matches past
	 * the end reuse the last one.
	 */
	respond(spec: ResponseSpec = {}): this {
		const scope = this.responderScope();
		this.responders.push(() => createStaticResponder(spec, this.codecs, scope));
		return this;
	}

	respondMultipart(spec: MultipartResponseSpec): this {
		const scope = this.responderScope();
		this.responders.push(() => createMultipartResponder(spec, this.codecs, scope));
		return this;
	}

	/**
	 * Relay the request to an upstream base URL
	 */
	forwardTo(target: string | URL, spec?: ForwardSpec): this {
		const responder = createForwardResponder(target, spec);
		this.responders.push(() => responder);
		return this;
	}

	times(constraint: CallCountConstraint): this {
		this.callCount = constraint;
		return this;
	}

	private responderScope(): string {
		return `${this.codecs.scope} responder #${this.responders.length + 1}`;
	}

	/**
	 * Throws ConfigurationError when a response body has no encoder in reach
	 */
	build(): ExpectationDefinition {
		const responders =
			this.responders.length > 0
				? this.responders.map((create) => create())
				: [createStaticResponder({}, this.codecs, this.responderScope())];
		return {
			description: this.description ?? this.defaultDescription(),
			method: this.method,
			path: this.path,
			matchers: [...this.matchers],
			responders,
			callCount: this.callCount,
			codecs: this.codecs,
		};
	}
}

export class RequirementBuilder extends MatcherChainBuilder {
	private description?: string;

	describedAs(description: string): this {
		this.description = description;
		return this;
	}

	build(): RequirementDefinition {
		return {
			description: this.description ?? `requirement on ${this.defaultDescription()}`,
			method: this.method,
			path: this.path,
			matchers: [...this.matchers],
		};
	}
}

/**
 * Method shortcuts shared by expectation and requirement groups
 */
abstract class MethodShortcuts<B> {
	abstract request(method: MethodSelector, path: PathInput): B;

	get(path: PathInput): B {
		return this.request("GET", path);
	}

	head(path: PathInput): B {
		return this.request("HEAD", path);
	}

	post(path: PathInput): B {
		return this.request("POST", path);
	}

	put(path: PathInput): B {
		return this.request("PUT", path);
	}

	patch(path: PathInput): B {
		return this.request("PATCH", path);
	}

	delete(path: PathInput): B {
		return this.request("DELETE", path);
	}

	options(path: PathInput): B {
		return this.request("OPTIONS", path);
	}

	any(path: PathInput): B {
		return this.request("ANY", path);
	}
}

/**
 * Builder passed to `server.expectations(fn)`. Owns the group-level codec
 * registry, between expectation-local and global codecs.
 */
export class ExpectationGroupBuilder extends MethodShortcuts<ExpectationBuilder> {
	private readonly http: ExpectationBuilder[] = [];
	private readonly ws: WsExpectationBuilder[] = [];
	readonly codecs: CodecRegistry;

	/**
	 * @param globalCodecs - Server-wide registry
	 * @param firstPosition - Registration index the first expectation will get
	 */
	constructor(
		globalCodecs: CodecRegistry,
		private readonly firstPosition: number,
	) {
		super();
		this.codecs = globalCodecs.child("group");
	}

	request(method: MethodSelector, path: PathInput): ExpectationBuilder {
		const builder = new ExpectationBuilder(method, path, this.codecs, this.firstPosition + this.http.length);
		this.http.push(builder);
		return builder;
	}

	webSocket(path: PathInput): WsExpectationBuilder {
		const builder = new WsExpectationBuilder(path);
		this.ws.push(builder);
		return builder;
	}

	decoders(configure: (registrar: DecoderRegistrar) => void): this {
		configure(this.codecs);
		return this;
	}

	encoders(configure: (registrar: EncoderRegistrar) => void): this {
		configure(this.codecs);
		return this;
	}

	build(): { expectations: ExpectationDefinition[]; webSockets: WsExpectationDefinition[] } {
		return {
			expectations: this.http.map((builder) => builder.build()),
			webSockets: this.ws.map((builder) => builder.build()),
		};
	}
}

/**
 * Builder passed to `server.requirements(fn)`
 */
export class RequirementGroupBuilder extends MethodShortcuts<RequirementBuilder> {
	private readonly builders: RequirementBuilder[] = [];

	request(method: MethodSelector, path: PathInput): RequirementBuilder {
		const builder = new RequirementBuilder(method, path);
		this.builders.push(builder);
		return builder;
	}

	/**
	 * Requirement applying to every request
	 */
	all(): RequirementBuilder {
		return this.request("ANY", "/**");
	}

	build(): RequirementDefinition[] {
		return this.builders.map((builder) => builder.build());
	}
}
