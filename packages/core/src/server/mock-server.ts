/**
 * Mock Server
 *
 * Facade over the engine: owns one expectation store, one global codec
 * registry and one logger. Nothing is shared between instances, so several
 * servers can run side by side in one process.
 *
 * @example
 * ```typescript
 * const server = new MockServer();
 * server.expectations((e) => {
 *   e.get("/health").respond({ status: 200, body: { ok: true } });
 * });
 * await server.start();
 *
 * await fetch(`${server.url}/health`);
 * expect(server.verify()).toBe(true);
 *
 * await server.close();
 * ```
 */

import type { CodecRegistry, DecoderRegistrar, EncoderRegistrar } from "../codecs/codec.registry";
import { createBuiltinCodecs } from "../codecs/builtin.codecs";
import { asError } from "../codecs/codec.types";
import type { MismatchReport } from "../engine/mismatch.report";
import { formatMismatchSummary } from "../engine/mismatch.report";
import { MatchEngine } from "../engine/match.engine";
import { ConfigurationError } from "../errors";
import { ExpectationStore } from "../expectations/expectation.store";
import { ExpectationGroupBuilder, RequirementGroupBuilder } from "../expectations/expectation.builder";
import type { Logger } from "../logging/logger";
import { createLogger, moduleLogger } from "../logging/logger";
import type { RequestView } from "../request/request.types";
import { ResponseSynthesizer } from "../response/response.synthesizer";
import type { HeaderMap, ResponseDescription } from "../response/response.types";
import { createNameMap } from "../utils";
import type { VerificationEntry } from "../verification/verification.tracker";
import { VerificationTracker } from "../verification/verification.tracker";
import type { WsConnection } from "../websocket/ws.reaction-engine";
import { WsReactionEngine } from "../websocket/ws.reaction-engine";
import type { WsConnectionSink } from "../websocket/ws.types";
import { HttpListener } from "./http.listener";
import type { MockServerOptions, ResolvedServerOptions } from "./server.config";
import { resolveServerOptions } from "./server.config";
import type { HandleResult, ReceivedRequest, RequestHandler, UpgradeContext } from "./server.types";

/**
 * Server lifecycle state. "closed" is terminal.
 */
export type MockServerState = "created" | "starting" | "started" | "stopping" | "stopped" | "error" | "closed";

export class MockServer implements RequestHandler {
	private state: MockServerState = "created";
	private error?: Error;
	private configured = false;

	readonly options: ResolvedServerOptions;
	readonly logger: Logger;
	private readonly matchLogger: Logger;
	private readonly wsLogger: Logger;

	private readonly store = new ExpectationStore();
	private readonly globalCodecs: CodecRegistry;
	private readonly engine: MatchEngine;
	private readonly synthesizer: ResponseSynthesizer;
	private readonly tracker: VerificationTracker;
	private readonly wsEngine: WsReactionEngine;

	private journal: ReceivedRequest[] = [];
	private lastReport?: MismatchReport;
	private connections = new Set<WsConnection>();

	private listener?: HttpListener;
	private boundPort?: number;
	private boundSecurePort?: number;

	constructor(options: MockServerOptions = {}, env?: Record<string, string | undefined>) {
		this.options = resolveServerOptions(options, env);
		this.logger = this.options.logger ?? createLogger(this.options.logLevel);
		this.matchLogger = moduleLogger(this.logger, "match");
		this.wsLogger = moduleLogger(this.logger, "ws");

		this.globalCodecs = createBuiltinCodecs().child("global");
		this.engine = new MatchEngine(this.store);
		this.synthesizer = new ResponseSynthesizer({ compression: this.options.compression });
		this.tracker = new VerificationTracker(this.store, { pollInterval: this.options.pollInterval });
		this.wsEngine = new WsReactionEngine(() => this.store.webSockets(), this.wsLogger);
	}

	// =========================================================================
	// Configuration
	// =========================================================================

	/**
	 * Run a configuration function against this server and mark it configured
	 */
	configure(fn: (server: this) => void): this {
		this.assertConfigurable();
		fn(this);
		this.configured = true;
		return this;
	}

	/**
	 * Whether configure() has completed since creation or the last clearExpectations()
	 */
	isConfigured(): boolean {
		return this.configured;
	}

	/**
	 * Register expectations. Takes effect immediately, also while started.
	 */
	expectations(fn: (group: ExpectationGroupBuilder) => void): this {
		this.assertConfigurable();
		const group = new ExpectationGroupBuilder(this.globalCodecs, this.store.all().length + 1);
		fn(group);
		const { expectations, webSockets } = group.build();
		for (const definition of expectations) {
			this.store.register(definition);
		}
		for (const definition of webSockets) {
			this.store.registerWebSocket(definition);
		}
		return this;
	}

	/**
	 * Register requirements ANDed into every expectation they apply to
	 */
	requirements(fn: (group: RequirementGroupBuilder) => void): this {
		this.assertConfigurable();
		const group = new RequirementGroupBuilder();
		fn(group);
		for (const definition of group.build()) {
			this.store.registerRequirement(definition);
		}
		return this;
	}

	globalDecoders(fn: (registrar: DecoderRegistrar) => void): this {
		this.assertConfigurable();
		fn(this.globalCodecs);
		return this;
	}

	globalEncoders(fn: (registrar: EncoderRegistrar) => void): this {
		this.assertConfigurable();
		fn(this.globalCodecs);
		return this;
	}

	/**
	 * Drop expectations, requirements and their counters, the request
	 * journal and the last mismatch report. Global codecs are kept.
	 */
	clearExpectations(): void {
		this.store.clear();
		this.journal = [];
		this.lastReport = undefined;
		this.connections = new Set();
		this.configured = false;
	}

	// =========================================================================
	// Request handling
	// =========================================================================

	/**
	 * Match a request, count the call and synthesize the response. This is
	 * what the listener calls; tests may call it directly without sockets.
	 */
	async handle(request: RequestView): Promise<HandleResult> {
		const result = this.engine.match(request);

		if (result.kind === "unmatched") {
			this.lastReport = result.report;
			this.journal.push({ request, receivedAt: new Date() });
			this.matchLogger.warn(formatMismatchSummary(result.report));
			return { kind: "unmatched", response: this.defaultResponse(), report: result.report };
		}

		const { expectation, callNumber, responder } = result;
		this.journal.push({ request, receivedAt: new Date(), expectationIndex: expectation.index, callNumber });
		this.matchLogger.debug("Matched", {
			method: request.method,
			path: request.path,
			expectation: expectation.index,
			call: callNumber,
		});

		const synthesis = await this.synthesizer.synthesize(responder, request);
		if (synthesis.kind === "forward") {
			return { kind: "forward", directive: synthesis.directive, expectationIndex: expectation.index, callNumber };
		}
		return { kind: "respond", response: synthesis.response, expectationIndex: expectation.index, callNumber };
	}

	/**
	 * Evaluate every expectation against a request without counting
	 */
	explain(request: RequestView): MismatchReport {
		return this.engine.explain(request);
	}

	/**
	 * Accept a WebSocket connection on a path without a socket. Returns null
	 * when no WebSocket expectation matches the path.
	 */
	connectWebSocket(path: string, sink: WsConnectionSink): WsConnection | null {
		const expectation = this.wsEngine.find(path);
		return expectation ? this.upgradeContext().open(expectation, sink) : null;
	}

	/**
	 * Connections accepted since the last clearExpectations()
	 */
	webSocketConnections(): WsConnection[] {
		return [...this.connections];
	}

	// =========================================================================
	// Verification
	// =========================================================================

	/**
	 * Immediate check of every call-count constraint
	 */
	verify(): boolean;
	/**
	 * Wait up to `timeoutMs` (or WAIT_FOREVER) for every constraint to hold
	 */
	verify(timeoutMs: number): Promise<boolean>;
	verify(timeoutMs?: number): boolean | Promise<boolean> {
		return timeoutMs === undefined ? this.tracker.verify() : this.tracker.verify(timeoutMs);
	}

	verificationReport(): VerificationEntry[] {
		return this.tracker.report();
	}

	receivedRequests(): ReceivedRequest[] {
		return [...this.journal];
	}

	lastMismatchReport(): MismatchReport | undefined {
		return this.lastReport;
	}

	// =========================================================================
	// Lifecycle
	// =========================================================================

	getState(): MockServerState {
		return this.state;
	}

	getError(): Error | undefined {
		return this.error;
	}

	isStarted(): boolean {
		return this.state === "started";
	}

	async start(): Promise<void> {
		if (this.state !== "created" && this.state !== "stopped") {
			throw new Error(`Cannot start mock server in state ${this.state}`);
		}

		this.state = "starting";
		const { host, port, tls, upgrade } = this.options;
		const listener = new HttpListener({
			host,
			port,
			handler: this,
			logger: moduleLogger(this.logger, "listener"),
			...(tls ? { tls } : {}),
			...(upgrade ? { upgrade: { handler: upgrade, context: this.upgradeContext() } } : {}),
		});

		try {
			const bound = await listener.start();
			this.listener = listener;
			this.boundPort = bound.port;
			this.boundSecurePort = bound.securePort;
			this.state = "started";
		} catch (error) {
			this.state = "error";
			this.error = asError(error);
			await listener.stop().catch((stopError: unknown) => {
				this.logger.error("Failed to release listener after start failure", { error: asError(stopError).message });
			});
			throw error;
		}
	}

	/**
	 * Stop listening. Counters and expectations survive; start() may be
	 * called again.
	 */
	async stop(): Promise<void> {
		if (this.state === "created" || this.state === "stopped" || this.state === "closed") {
			return;
		}
		if (this.state !== "started" && this.state !== "error") {
			throw new Error(`Cannot stop mock server in state ${this.state}`);
		}

		this.state = "stopping";
		try {
			for (const connection of this.connections) {
				connection.close();
			}
			await this.listener?.stop();
			this.state = "stopped";
		} catch (error) {
			this.state = "error";
			this.error = asError(error);
			throw error;
		} finally {
			this.listener = undefined;
			this.boundPort = undefined;
			this.boundSecurePort = undefined;
		}
	}

	/**
	 * Stop and release the server for good
	 */
	async close(): Promise<void> {
		await this.stop();
		this.state = "closed";
	}

	get port(): number {
		if (this.boundPort === undefined) {
			throw new Error(`Mock server is not listening (state ${this.state})`);
		}
		return this.boundPort;
	}

	get securePort(): number {
		if (this.boundSecurePort === undefined) {
			throw new Error("Mock server has no secure listener");
		}
		return this.boundSecurePort;
	}

	/**
	 * Base URL of the plain listener, e.g. "http://127.0.0.1:40123"
	 */
	get url(): string {
		return `http://${this.options.host}:${this.port}`;
	}

	get secureUrl(): string {
		return `https://${this.options.host}:${this.securePort}`;
	}

	// =========================================================================
	// Internals
	// =========================================================================

	private assertConfigurable(): void {
		if (this.state === "closed") {
			throw new ConfigurationError("server", "cannot configure a closed server");
		}
	}

	private upgradeContext(): UpgradeContext {
		return {
			logger: this.wsLogger,
			find: (path) => this.wsEngine.find(path),
			open: (expectation, sink) => {
				const connection = this.wsEngine.open(expectation, sink);
				this.connections.add(connection);
				return connection;
			},
		};
	}

	private defaultResponse(): ResponseDescription {
		const { status, headers = {}, body } = this.options.defaultResponse;
		const normalized: HeaderMap = createNameMap();
		for (const [name, value] of Object.entries(headers)) {
			normalized[name.toLowerCase()] = value;
		}
		if (body !== undefined && normalized["content-type"] === undefined) {
			normalized["content-type"] = "text/plain; charset=utf-8";
		}
		return { status, headers: normalized, body: Buffer.from(body ?? "", "utf-8"), delayMs: 0 };
	}
}
