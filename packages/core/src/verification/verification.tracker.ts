/**
 * Verification Tracker
 *
 * Checks every tracked counter against its call-count constraint.
 * Verification never resets counters.
 */

import { ensure } from "../errors";
import type { ExpectationStore } from "../expectations/expectation.store";
import { describeCallCount, isSatisfied } from "../matchers/call-count";
import { monotonicNow } from "../utils";

/**
 * Timeout value that disables the verification deadline
 */
export const WAIT_FOREVER = Number.POSITIVE_INFINITY;

/**
 * Longest delay setTimeout takes without firing at once
 */
const MAX_TIMER_DELAY = 2 ** 31 - 1;

export interface VerificationEntry {
	readonly label: string;
	readonly description: string;
	readonly count: number;
	readonly expected: string;
	readonly satisfied: boolean;
}

export interface VerificationOptions {
	/** Fallback poll interval while waiting, in ms */
	pollInterval: number;
}

export class VerificationTracker {
	constructor(
		private readonly store: ExpectationStore,
		private readonly options: VerificationOptions,
	) {}

	/**
	 * Point-in-time state of every tracked counter
	 */
	report(): VerificationEntry[] {
		return this.store.trackedCounters().map(({ label, description, counter, constraint }) => {
			const count = counter.value;
			return {
				label,
				description,
				count,
				expected: describeCallCount(constraint),
				satisfied: isSatisfied(constraint, count),
			};
		});
	}

	/**
	 * Immediate check
	 */
	verify(): boolean;
	/**
	 * Wait until every constraint is satisfied or the timeout elapses
	 * @param timeoutMs - Budget in ms, or WAIT_FOREVER
	 */
	verify(timeoutMs: number): Promise<boolean>;
	verify(timeoutMs?: number): boolean | Promise<boolean> {
		if (timeoutMs === undefined) {
			return this.check();
		}
		return this.waitFor(timeoutMs);
	}

	private check(): boolean {
		return this.store
			.trackedCounters()
			.every(({ counter, constraint }) => isSatisfied(constraint, counter.value));
	}

	/**
	 * Re-checks on every counter change, with a coarse poll as a fallback.
	 * The deadline is measured on the monotonic clock.
	 */
	private waitFor(timeoutMs: number): Promise<boolean> {
		ensure(!Number.isNaN(timeoutMs) && timeoutMs >= 0, "verification timeout", `${timeoutMs}`);

		if (this.check()) {
			return Promise.resolve(true);
		}

		const deadline = timeoutMs === WAIT_FOREVER ? WAIT_FOREVER : monotonicNow() + timeoutMs;

		return new Promise<boolean>((resolve) => {
			let settled = false;
			let deadlineTimer: NodeJS.Timeout | undefined;

			const finish = (result: boolean): void => {
				if (settled) {
					return;
				}
				settled = true;
				unsubscribe();
				clearInterval(pollTimer);
				if (deadlineTimer) {
					clearTimeout(deadlineTimer);
				}
				resolve(result);
			};

			const recheck = (): void => {
				if (this.check()) {
					finish(true);
				} else if (monotonicNow() >= deadline) {
					finish(false);
				}
			};

			// Counter increments happen synchronously inside request handling,
			// so the check is deferred to let the increment's caller finish.
			const unsubscribe = this.store.subscribe(() => queueMicrotask(recheck));
			const pollTimer = setInterval(recheck, this.options.pollInterval);

			const armDeadline = (): void => {
				const remaining = deadline - monotonicNow();
				if (remaining > MAX_TIMER_DELAY) {
					deadlineTimer = setTimeout(armDeadline, MAX_TIMER_DELAY);
				} else {
					deadlineTimer = setTimeout(() => finish(this.check()), Math.max(remaining, 0));
				}
			};

			if (deadline !== WAIT_FOREVER) {
				armDeadline();
			}
		});
	}
}
