// src/yeelight/yeelight-device.ts

import { BaseDevice } from '../device/base-device.js';
import type { DeviceField } from '../device/device-field.js';
import { FieldNotFoundError } from '../device/errors.js';
import type { DeviceLogger } from '../device/logger.js';
import type { DeviceConfigSchema, DeviceSettings } from '../device/types.js';
import { DeviceGetData, DeviceType } from '../device/types.js';
import type { BulbHandle, RawPropertySet } from './bulb.js';
import { YeelightBulb } from './bulb.js';
import type { CapabilitySpec } from './capabilities.js';
import { defaultCapabilities } from './capabilities.js';
import { describeError } from './errors.js';
import { FIELD_BINDINGS } from './field-map.js';
import { StateCache } from './state-cache.js';
import type { Patch, PollOutcome, WriteOutcome } from './synchronizer.js';
import { Synchronizer } from './synchronizer.js';

export interface YeelightDeviceOptions {
	logger: DeviceLogger;
	minPollIntervalMs?: number;
	requestTimeoutMs?: number;
	now?: () => number;
	/** Builds the bulb handle; defaults to a LAN-connected YeelightBulb. */
	createBulb?: (settings: DeviceSettings & { address: string }) => BulbHandle;
}

/**
 * Adapter for one Yeelight bulb.
 *
 * Keeps a mirror of the bulb's raw properties, exposes them as typed fields,
 * and turns field writes into LAN commands. Nothing here throws at the
 * caller: failures are logged and leave state as it was.
 */
export class YeelightDevice extends BaseDevice {
	public static readonly deviceConfig: DeviceConfigSchema = {
		classImg: 'Yeelight/unnamed.jpg',
		fieldsCreation: false,
		initField: true,
		virtual: false,
		token: false,
		typeGetData: false,
		availableTypes: [DeviceType.Light],
	};

	public readonly getData: DeviceGetData | null = null;

	private bulb: BulbHandle | null = null;
	private readonly cache = new StateCache();
	private readonly sync: Synchronizer;
	private initialized = false;
	private capabilities: CapabilitySpec | null = null;

	constructor(data: DeviceSettings, options: YeelightDeviceOptions) {
		super(data, options.logger);

		this.sync = new Synchronizer({
			label: data.name,
			handle: () => this.bulb,
			registry: this,
			cache: this.cache,
			logger: options.logger,
			minPollIntervalMs: options.minPollIntervalMs,
			now: options.now,
		});

		const address = data.address?.trim();
		if (!address) {
			this.log.warn('%s: device address is missing; device disabled.', data.name);
			return;
		}

		const settings = { ...data, address };
		this.bulb = options.createBulb
			? options.createBulb(settings)
			: new YeelightBulb({
				host: address,
				port: data.port,
				requestTimeoutMs: options.requestTimeoutMs,
				logger: options.logger,
			});
		this.getData = DeviceGetData.Pull;
	}

	public get isConnected(): boolean {
		return this.bulb !== null && this.initialized;
	}

	public get capabilitySpec(): CapabilitySpec | null {
		return this.capabilities;
	}

	public get cachedValues(): RawPropertySet {
		return this.cache.snapshot;
	}

	// -------------------- INIT --------------------

	public async initialize(): Promise<void> {
		if (this.initialized || !this.bulb) {
			return;
		}

		await this.sync.runExclusive(async () => {
			const bulb = this.bulb;
			if (this.initialized || !bulb) {
				return;
			}

			try {
				const values = await bulb.getProperties();
				if (!this.cache.replace(values)) {
					this.log.warn('%s: failed to retrieve device properties.', this.name);
					return;
				}

				const capabilities = await this.loadCapabilities(bulb);
				this.registerFields(values, capabilities);
				this.capabilities = capabilities;

				this.initialized = true;
				this.log.info(
					'%s: initialized (%s capabilities, %d fields)',
					this.name,
					capabilities.source === 'discovered' ? `model ${capabilities.model}` : 'default',
					this.getFields().length,
				);
			} catch (err) {
				this.log.error('%s: initialization error: %s', this.name, describeError(err));
			}
		});
	}

	private async loadCapabilities(bulb: BulbHandle): Promise<CapabilitySpec> {
		try {
			return await bulb.getModelSpecs();
		} catch (err) {
			this.log.debug('%s: capability query failed (%s); using defaults', this.name, describeError(err));
			return defaultCapabilities();
		}
	}

	private registerFields(values: RawPropertySet, capabilities: CapabilitySpec): void {
		const spec = capabilities.spec;

		for (const binding of FIELD_BINDINGS) {
			if (this.getFieldByName(binding.field)) {
				continue;
			}

			let value: string;
			if (binding.registerWhen === 'night-light-supported') {
				if (!spec.nightLight) {
					continue;
				}
				value = binding.decode(values[binding.rawKey] ?? '0');
			} else {
				const raw = values[binding.rawKey];
				if (raw === undefined) {
					continue;
				}
				value = binding.decode(raw);
			}

			this.addField({
				name: binding.field,
				readOnly: false,
				high: binding.high(spec),
				low: binding.low(spec),
				kind: binding.kind,
				value,
				virtual: false,
			});
		}
	}

	// -------------------- POLLING --------------------

	public async poll(): Promise<Patch> {
		const outcome = await this.pollDetailed();
		return outcome.status === 'polled' ? outcome.patch : {};
	}

	public pollDetailed(): Promise<PollOutcome> {
		return this.sync.poll();
	}

	// -------------------- SET VALUE --------------------

	public override async setValue(fieldId: string, value: string, scripted = false): Promise<void> {
		await this.setValueDetailed(fieldId, value, scripted);
	}

	/**
	 * Same as setValue() but reports what happened. The field keeps the new
	 * value even when the command fails; the next poll reconciles it.
	 */
	public async setValueDetailed(fieldId: string, value: string, scripted = false): Promise<WriteOutcome> {
		let field: DeviceField;
		try {
			field = this.getField(fieldId);
		} catch (err) {
			if (!(err instanceof FieldNotFoundError)) {
				throw err;
			}
			this.log.error('%s: cannot set value: %s', this.name, err.message);
			return { status: 'failed', error: { kind: 'dispatch', error: err } };
		}

		await super.setValue(fieldId, value, scripted);
		return this.sync.write(field, value);
	}

	// -------------------- CLOSE --------------------

	public close(): void {
		if (!this.bulb) {
			return;
		}
		this.bulb.close();
		this.bulb = null;
		this.cache.clear();
		this.log.info('%s: closed.', this.name);
	}
}
