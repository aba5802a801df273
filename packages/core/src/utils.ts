/**
 * Core Utilities
 */

/**
 * Generate unique ID with optional prefix
 */
export function generateId(prefix = ""): string {
	return `${prefix}${Date.now().toString(36)}_${Math.random().toString(36).slice(2, 9)}`;
}

/**
 * Sleep for specified milliseconds.
 */
export function sleep(ms: number): Promise<void> {
	return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Monotonic clock reading in milliseconds
 */
export function monotonicNow(): number {
	return performance.now();
}

/**
 * Normalize a bytes-like value to a Buffer without copying when possible
 */
export function toBuffer(value: Uint8Array | string): Buffer {
	if (typeof value === "string") {
		return Buffer.from(value, "utf-8");
	}
	return Buffer.isBuffer(value) ? value : Buffer.from(value.buffer, value.byteOffset, value.byteLength);
}

/**
 * Truncate a string for error messages and log lines
 */
export function truncate(text: string, max = 200): string {
	return text.length > max ? `${text.slice(0, max)}...` : text;
}

/**
 * Empty map without a prototype, so names like "constructor" or "__proto__"
 * are plain keys
 */
export function createNameMap<T>(): Record<string, T> {
	return Object.create(null);
}

/**
 * Own value of a name map; inherited members never count
 */
export function ownValue<T>(map: Readonly<Record<string, T>>, name: string): T | undefined {
	return Object.hasOwn(map, name) ? map[name] : undefined;
}
