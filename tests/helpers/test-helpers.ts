/**
 * Test Helpers
 *
 * Shared builders for requests, WebSocket sinks and registries.
 */

import type {
	Expectation,
	HandleResult,
	RequestInit,
	RequestView,
	ResponseDescription,
	WsConnectionSink,
	WsOutboundFrame,
} from "httpdouble";
import {
	createBuiltinCodecs,
	createRequestView,
	ExpectationGroupBuilder,
	ExpectationStore,
	RequirementGroupBuilder,
} from "httpdouble";

/**
 * Build a request view; method defaults to GET
 */
export const request = (url: string, init: Omit<RequestInit, "url"> = {}): RequestView =>
	createRequestView({ ...init, url });

/**
 * WebSocket sink that records what the engine sends
 */
export interface RecordingSink extends WsConnectionSink {
	readonly frames: WsOutboundFrame[];
	readonly closes: { code: number; reason: string }[];
}

export const createRecordingSink = (): RecordingSink => {
	const frames: WsOutboundFrame[] = [];
	const closes: { code: number; reason: string }[] = [];
	return {
		frames,
		closes,
		send: (frame) => {
			frames.push(frame);
		},
		close: (code, reason) => {
			closes.push({ code, reason });
		},
	};
};

/**
 * Store plus helpers to register through the public builders
 */
export const createStoreFixture = () => {
	const store = new ExpectationStore();
	const globalCodecs = createBuiltinCodecs().child("global");

	const registerExpectations = (configure: (group: ExpectationGroupBuilder) => void): Expectation[] => {
		const group = new ExpectationGroupBuilder(globalCodecs, store.all().length + 1);
		configure(group);
		const built = group.build();
		for (const definition of built.webSockets) {
			store.registerWebSocket(definition);
		}
		return built.expectations.map((definition) => store.register(definition));
	};

	const registerRequirements = (configure: (group: RequirementGroupBuilder) => void): void => {
		const group = new RequirementGroupBuilder();
		configure(group);
		for (const definition of group.build()) {
			store.registerRequirement(definition);
		}
	};

	return { store, globalCodecs, registerExpectations, registerRequirements };
};

/**
 * Response of a handled request, failing the test for forwards
 */
export const responseOf = (result: HandleResult): ResponseDescription => {
	if (result.kind === "forward") {
		throw new Error(`Expected a response, got a forward to ${result.directive.url}`);
	}
	return result.response;
};
