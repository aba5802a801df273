/**
 * Expectation Store
 *
 * Ordered, append-only collection of expectations, requirements and
 * WebSocket expectations for one server. Registration replaces the backing
 * arrays instead of mutating them, so a match already iterating a snapshot
 * is never affected by a concurrent registration or clear.
 */

import type { CallCountConstraint } from "../matchers/call-count";
import type { WsExpectation, WsExpectationDefinition } from "../websocket/ws.types";
import { CallCounter } from "./call-counter";
import type { Expectation, ExpectationDefinition, Requirement, RequirementDefinition } from "./expectation.types";

/**
 * A counter and the constraint it is verified against
 */
export interface TrackedCounter {
	readonly label: string;
	readonly description: string;
	readonly counter: CallCounter;
	readonly constraint: CallCountConstraint;
}

export type StoreListener = () => void;

export class ExpectationStore {
	private expectations: readonly Expectation[] = [];
	private requirementList: readonly Requirement[] = [];
	private wsExpectations: readonly WsExpectation[] = [];
	private readonly listeners = new Set<StoreListener>();

	register(definition: ExpectationDefinition): Expectation {
		const expectation: Expectation = {
			...definition,
			index: this.expectations.length + 1,
			counter: new CallCounter(() => this.notify()),
		};
		this.expectations = [...this.expectations, expectation];
		this.notify();
		return expectation;
	}

	registerRequirement(definition: RequirementDefinition): Requirement {
		const requirement: Requirement = { ...definition, index: this.requirementList.length + 1 };
		this.requirementList = [...this.requirementList, requirement];
		return requirement;
	}

	registerWebSocket(definition: WsExpectationDefinition): WsExpectation {
		const expectation: WsExpectation = {
			...definition,
			index: this.wsExpectations.length + 1,
			counter: new CallCounter(() => this.notify()),
			rules: definition.rules.map((rule, i) => ({
				...rule,
				index: i + 1,
				counter: new CallCounter(() => this.notify()),
			})),
		};
		this.wsExpectations = [...this.wsExpectations, expectation];
		this.notify();
		return expectation;
	}

	/**
	 * Snapshot of expectations in registration order
	 */
	all(): readonly Expectation[] {
		return this.expectations;
	}

	requirements(): readonly Requirement[] {
		return this.requirementList;
	}

	webSockets(): readonly WsExpectation[] {
		return this.wsExpectations;
	}

	/**
	 * Every counter that takes part in verification
	 */
	trackedCounters(): TrackedCounter[] {
		const tracked: TrackedCounter[] = this.expectations.map((expectation) => ({
			label: `expectation #${expectation.index}`,
			description: expectation.description,
			counter: expectation.counter,
			constraint: expectation.callCount,
		}));

		for (const ws of this.wsExpectations) {
			tracked.push({
				label: `websocket #${ws.index}`,
				description: `connect ${ws.description}`,
				counter: ws.counter,
				constraint: ws.callCount,
			});
			for (const rule of ws.rules) {
				tracked.push({
					label: `websocket #${ws.index} reaction #${rule.index}`,
					description: `react on ${ws.description}`,
					counter: rule.counter,
					constraint: rule.callCount,
				});
			}
		}

		return tracked;
	}

	/**
	 * Drop every registration. Counters go away with their expectations.
	 */
	clear(): void {
		this.expectations = [];
		this.requirementList = [];
		this.wsExpectations = [];
		this.notify();
	}

	get size(): number {
		return this.expectations.length + this.wsExpectations.length;
	}

	/**
	 * Subscribe to counter changes and registrations
	 * @returns unsubscribe function
	 */
	subscribe(listener: StoreListener): () => void {
		this.listeners.add(listener);
		return () => {
			this.listeners.delete(listener);
		};
	}

	private notify(): void {
		for (const listener of [...this.listeners]) {
			listener();
		}
	}
}
