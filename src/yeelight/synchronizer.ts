// src/yeelight/synchronizer.ts

import { Mutex } from 'async-mutex';

import type { DeviceField } from '../device/device-field.js';
import type { FieldNotFoundError } from '../device/errors.js';
import type { DeviceLogger } from '../device/logger.js';
import type { BulbHandle, RawPropertySet } from './bulb.js';
import type { TransportError } from './errors.js';
import { FieldValueError, asTransportError, describeError } from './errors.js';
import type { CacheUpdate } from './field-map.js';
import { bindingFor, decodeProperties } from './field-map.js';
import type { StateCache } from './state-cache.js';

export const DEFAULT_MIN_POLL_INTERVAL_MS = 5000;

/** Field name → new field value, for fields whose value changed. */
export type Patch = Record<string, string>;

export type PollError =
	| { kind: 'transport'; error: TransportError }
	| { kind: 'empty-response' };

export type PollOutcome =
	| { status: 'skipped'; reason: 'no-handle' | 'rate-limited' }
	| { status: 'failed'; error: PollError }
	| { status: 'polled'; patch: Patch };

export type WriteError =
	| { kind: 'conversion'; error: FieldValueError }
	| { kind: 'dispatch'; error: FieldNotFoundError }
	| { kind: 'transport'; error: TransportError };

export type WriteOutcome =
	| { status: 'sent'; field: string; cache: CacheUpdate }
	| { status: 'skipped'; reason: 'no-handle' | 'unsupported-field' }
	| { status: 'failed'; error: WriteError };

export interface FieldRegistry {
	getFieldByName(name: string): DeviceField | undefined;
}

export interface SynchronizerOptions {
	label: string;
	handle: () => BulbHandle | null;
	registry: FieldRegistry;
	cache: StateCache;
	logger: DeviceLogger;
	minPollIntervalMs?: number;
	now?: () => number;
}

type FetchResult =
	| { fetched: true; values: RawPropertySet }
	| { fetched: false; outcome: PollOutcome };

/**
 * Poll and write paths for one bulb. A single mutex covers all device I/O
 * of the bulb, so a poll never overlaps a write or another poll.
 */
export class Synchronizer {
	private readonly label: string;
	private readonly handle: () => BulbHandle | null;
	private readonly registry: FieldRegistry;
	private readonly cache: StateCache;
	private readonly log: DeviceLogger;
	private readonly mutex = new Mutex();
	private readonly now: () => number;

	public readonly minPollIntervalMs: number;

	constructor(options: SynchronizerOptions) {
		this.label = options.label;
		this.handle = options.handle;
		this.registry = options.registry;
		this.cache = options.cache;
		this.log = options.logger;
		this.minPollIntervalMs = options.minPollIntervalMs ?? DEFAULT_MIN_POLL_INTERVAL_MS;
		this.now = options.now ?? Date.now;
	}

	public runExclusive<T>(fn: () => Promise<T>): Promise<T> {
		return this.mutex.runExclusive(fn);
	}

	public async poll(): Promise<PollOutcome> {
		if (!this.handle()) {
			return { status: 'skipped', reason: 'no-handle' };
		}

		// Fast path, read without the lock.
		if (!this.cache.isPollDue(this.now(), this.minPollIntervalMs)) {
			return { status: 'skipped', reason: 'rate-limited' };
		}

		const result = await this.mutex.runExclusive(() => this.fetch());
		if (!result.fetched) {
			return result.outcome;
		}

		return { status: 'polled', patch: this.applyDelta(result.values) };
	}

	private async fetch(): Promise<FetchResult> {
		const bulb = this.handle();
		if (!bulb) {
			return { fetched: false, outcome: { status: 'skipped', reason: 'no-handle' } };
		}

		// Another caller may have polled while we waited for the lock.
		const startedAt = this.now();
		if (!this.cache.isPollDue(startedAt, this.minPollIntervalMs)) {
			return { fetched: false, outcome: { status: 'skipped', reason: 'rate-limited' } };
		}

		let values: RawPropertySet;
		try {
			values = await bulb.getProperties();
		} catch (err) {
			const error = asTransportError(err);
			this.log.warn('%s: poll failed: %s', this.label, error.message);
			return { fetched: false, outcome: { status: 'failed', error: { kind: 'transport', error } } };
		}

		if (!this.cache.replace(values, startedAt)) {
			this.log.warn('%s: poll returned no properties; keeping cached state', this.label);
			return { fetched: false, outcome: { status: 'failed', error: { kind: 'empty-response' } } };
		}

		return { fetched: true, values };
	}

	private applyDelta(values: RawPropertySet): Patch {
		const patch: Patch = {};
		for (const [name, value] of decodeProperties(values)) {
			const field = this.registry.getFieldByName(name);
			if (field && field.get() !== value) {
				field.set(value, 'device');
				patch[name] = value;
			}
		}
		if (Object.keys(patch).length > 0) {
			this.log.debug('%s: poll patch %o', this.label, patch);
		}
		return patch;
	}

	/**
	 * Send one field's value to the bulb. The field itself has already been
	 * written by the caller; this only issues the command and updates the
	 * cached raw value on success.
	 */
	public async write(field: DeviceField, value: string): Promise<WriteOutcome> {
		const name = field.getName();
		const binding = bindingFor(name);
		if (!binding) {
			this.log.debug('%s: field %s has no device command', this.label, name);
			return { status: 'skipped', reason: 'unsupported-field' };
		}

		return this.mutex.runExclusive(async (): Promise<WriteOutcome> => {
			const bulb = this.handle();
			if (!bulb) {
				this.log.warn('%s: cannot set %s, device is closed or unconfigured', this.label, name);
				return { status: 'skipped', reason: 'no-handle' };
			}

			try {
				const update = await binding.write(
					{
						bulb,
						bounds: { low: Number(field.low), high: Number(field.high) },
						partner: (partnerField, rawKey) =>
							this.registry.getFieldByName(partnerField)?.get() ?? this.cache.get(rawKey),
					},
					value,
				);
				this.cache.update(update.key, update.value);
				this.log.debug('%s: %s=%s sent (%s=%s)', this.label, name, value, update.key, update.value);
				return { status: 'sent', field: name, cache: update };
			} catch (err) {
				this.log.error('%s: error setting %s=%s: %s', this.label, name, value, describeError(err));
				if (err instanceof FieldValueError) {
					return { status: 'failed', error: { kind: 'conversion', error: err } };
				}
				return { status: 'failed', error: { kind: 'transport', error: asTransportError(err) } };
			}
		});
	}
}
