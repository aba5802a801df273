/**
 * Call Counter
 *
 * Monotonic per-expectation counter. `increment()` is a single synchronous
 * step that returns the new count, so concurrent requests to one expectation
 * each observe a distinct call number.
 */

export type CounterListener = () => void;

export class CallCounter {
	private count = 0;

	constructor(private readonly onChange?: CounterListener) {}

	get value(): number {
		return this.count;
	}

	/**
	 * Increment and return the 1-based call number
	 */
	increment(): number {
		this.count += 1;
		const callNumber = this.count;
		this.onChange?.();
		return callNumber;
	}
}
