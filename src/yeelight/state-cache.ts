// src/yeelight/state-cache.ts

import type { RawPropertySet } from './bulb.js';

/**
 * Last-known raw properties of one bulb and when they were last polled.
 *
 * A fetched set always replaces the previous one as a whole; the only
 * per-key change is the optimistic update made after a write.
 */
export class StateCache {
	private values: RawPropertySet = {};
	private lastPollAt: number | null = null;

	public get snapshot(): RawPropertySet {
		return this.values;
	}

	public get lastPoll(): number | null {
		return this.lastPollAt;
	}

	public get(key: string): string | undefined {
		return Object.prototype.hasOwnProperty.call(this.values, key) ? this.values[key] : undefined;
	}

	public has(key: string): boolean {
		return this.get(key) !== undefined;
	}

	/**
	 * Swap in a freshly fetched set. Returns false, leaving the cache alone,
	 * when the set is empty.
	 */
	public replace(values: RawPropertySet, polledAt?: number): boolean {
		if (Object.keys(values).length === 0) {
			return false;
		}
		this.values = Object.freeze({ ...values });
		if (polledAt !== undefined) {
			this.lastPollAt = polledAt;
		}
		return true;
	}

	/** Record the value just sent to the bulb without re-reading it. */
	public update(key: string, value: string): void {
		this.values = Object.freeze({ ...this.values, [key]: value });
	}

	/** True when no poll has happened yet or at least intervalMs has passed. */
	public isPollDue(now: number, intervalMs: number): boolean {
		return this.lastPollAt === null || now - this.lastPollAt >= intervalMs;
	}

	public clear(): void {
		this.values = {};
		this.lastPollAt = null;
	}
}
