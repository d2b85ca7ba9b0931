// src/platform.ts
import type {
	API,
	DynamicPlatformPlugin,
	Logger,
	PlatformAccessory,
	PlatformConfig,
} from 'homebridge';

import { PLATFORM_NAME, PLUGIN_NAME } from './settings.js';
import type { DeviceLogger } from './device/logger.js';
import type { YeelightAccessoryContext, YeelightAccessoryEnv } from './yeelight/accessory-helpers.js';
import { describeError } from './yeelight/errors.js';
import type { YeelightPlatformSettings } from './yeelight/platform-config.js';
import { parsePlatformConfig } from './yeelight/platform-config.js';
import type { YeelightLightAccessory } from './yeelight/yeelight-light-accessory.js';
import { configureYeelightLightAccessory } from './yeelight/yeelight-light-accessory.js';
import { YeelightDevice } from './yeelight/yeelight-device.js';

const toDeviceLogger = (log: Logger): DeviceLogger => ({
	debug: log.debug.bind(log),
	info: log.info.bind(log),
	warn: log.warn.bind(log),
	error: log.error.bind(log),
});

interface ManagedDevice {
	uuid: string;
	address: string;
	device: YeelightDevice;
	binding: YeelightLightAccessory | null;
}

export class YeelightSyncPlatform implements DynamicPlatformPlugin {
	public readonly accessories: PlatformAccessory[] = [];
	public configureAccessory(accessory: PlatformAccessory): void {
		this.log.info('Restoring cached accessory', accessory.displayName);
		this.accessories.push(accessory);
	}
	private readonly log: Logger;
	private readonly api: API;
	private readonly settings: YeelightPlatformSettings;
	private readonly accessoryEnv: YeelightAccessoryEnv;
	private readonly managed: ManagedDevice[] = [];
	private pollTimer: NodeJS.Timeout | null = null;
	private polling = false;
	private stopped = false;

	constructor(log: Logger, config: PlatformConfig, api: API) {
		this.log = log;
		this.api = api;

		const deviceLogger = toDeviceLogger(this.log);
		this.settings = parsePlatformConfig(config, deviceLogger);
		this.accessoryEnv = { log: this.log, api: this.api };

		for (const settings of this.settings.devices) {
			const address = settings.address ?? '';
			const device = new YeelightDevice(settings, {
				logger: deviceLogger,
				minPollIntervalMs: this.settings.minPollIntervalMs,
				requestTimeoutMs: this.settings.requestTimeoutMs,
			});
			this.managed.push({
				uuid: this.api.hap.uuid.generate(`yeelight-${address || settings.name}`),
				address,
				device,
				binding: null,
			});
		}

		this.log.info(config.name ?? PLATFORM_NAME, 'initialized');

		this.api.on('didFinishLaunching', () => {
			this.log.info(PLATFORM_NAME, 'didFinishLaunching');
			void this.start();
		});
		this.api.on('shutdown', () => {
			this.stop();
		});
	}

	private async start(): Promise<void> {
		this.removeStaleAccessories();

		// First pass only connects; nothing is bound yet.
		await Promise.all(this.managed.map((entry) => this.refresh(entry)));
		if (this.stopped) {
			return;
		}

		this.pollTimer = setInterval(() => {
			void this.pollAll();
		}, this.settings.pollIntervalMs);

		this.log.info(
			'Yeelight: polling %d device(s) every %ds',
			this.managed.length,
			Math.round(this.settings.pollIntervalMs / 1000),
		);
	}

	private stop(): void {
		this.stopped = true;
		if (this.pollTimer) {
			clearInterval(this.pollTimer);
			this.pollTimer = null;
		}
		for (const entry of this.managed) {
			entry.device.close();
		}
	}

	/**
	 * Initialize a device (again, if an earlier attempt failed) and expose it
	 * to HomeKit once it is connected.
	 */
	private async connect(entry: ManagedDevice): Promise<void> {
		await entry.device.initialize();
		if (!entry.device.isConnected) {
			this.log.debug('Yeelight: %s not connected yet', entry.device.name);
			return;
		}
		if (!entry.binding) {
			this.bindAccessory(entry);
		}
	}

	private async pollAll(): Promise<void> {
		// A slow bulb must not stack up ticks.
		if (this.polling) {
			return;
		}
		this.polling = true;
		try {
			await Promise.all(this.managed.map((entry) => this.refresh(entry)));
		} finally {
			this.polling = false;
		}
	}

	private async refresh(entry: ManagedDevice): Promise<void> {
		try {
			if (!entry.device.isConnected || !entry.binding) {
				await this.connect(entry);
				return;
			}

			const patch = await entry.device.poll();
			const applied = entry.binding.applyPatch(patch);
			if (applied.length > 0) {
				this.log.debug('Yeelight: %s updated %s', entry.device.name, applied.join(', '));
			}
		} catch (err) {
			this.log.error('Yeelight: poll of %s failed: %s', entry.device.name, describeError(err));
		}
	}

	private bindAccessory(entry: ManagedDevice): void {
		const deviceName = entry.device.name;
		let accessory = this.accessories.find((acc) => acc.UUID === entry.uuid);

		if (accessory) {
			this.log.info('Yeelight: using cached accessory for %s (%s)', deviceName, entry.address);
		} else {
			this.log.info('Yeelight: registering new accessory for %s (%s)', deviceName, entry.address);
			accessory = new this.api.platformAccessory(deviceName, entry.uuid);
			this.api.registerPlatformAccessories(PLUGIN_NAME, PLATFORM_NAME, [accessory]);
			this.accessories.push(accessory);
		}

		const ctx = accessory.context as YeelightAccessoryContext;
		ctx.yeelight = { address: entry.address, name: deviceName };

		entry.binding = configureYeelightLightAccessory(
			this.accessoryEnv,
			entry.device,
			accessory,
			entry.address,
		);
		this.api.updatePlatformAccessories([accessory]);
	}

	private removeStaleAccessories(): void {
		const configured = new Set(this.managed.map((entry) => entry.uuid));
		const stale = this.accessories.filter((acc) => !configured.has(acc.UUID));
		if (stale.length === 0) {
			return;
		}

		for (const accessory of stale) {
			this.log.info('Yeelight: removing accessory %s (no longer configured)', accessory.displayName);
		}
		this.api.unregisterPlatformAccessories(PLUGIN_NAME, PLATFORM_NAME, stale);
		const remaining = this.accessories.filter((acc) => configured.has(acc.UUID));
		this.accessories.splice(0, this.accessories.length, ...remaining);
	}
}
