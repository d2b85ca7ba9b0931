// src/yeelight/platform-config.ts
import type { DeviceLogger } from '../device/logger.js';
import type { DeviceSettings } from '../device/types.js';
import { DEFAULT_LAN_PORT, DEFAULT_REQUEST_TIMEOUT_MS } from './lan-client.js';
import { DEFAULT_MIN_POLL_INTERVAL_MS } from './synchronizer.js';

export const DEFAULT_POLL_INTERVAL_MS = 10_000;

export interface YeelightPlatformSettings {
	pollIntervalMs: number;
	minPollIntervalMs: number;
	requestTimeoutMs: number;
	devices: DeviceSettings[];
}

function positiveNumber(value: unknown): number | undefined {
	return typeof value === 'number' && Number.isFinite(value) && value > 0 ? value : undefined;
}

function parseDevice(raw: unknown, index: number, log: DeviceLogger): DeviceSettings | null {
	if (typeof raw !== 'object' || raw === null) {
		log.warn('Yeelight: devices[%d] is not an object; skipping.', index);
		return null;
	}
	const entry = raw as Record<string, unknown>;

	const address =
		typeof entry.address === 'string' && entry.address.trim() !== ''
			? entry.address.trim()
			: typeof entry.host === 'string' && entry.host.trim() !== ''
				? entry.host.trim()
				: undefined;

	const name =
		typeof entry.name === 'string' && entry.name.trim() !== ''
			? entry.name.trim()
			: `Yeelight ${address ?? index + 1}`;

	const port = positiveNumber(entry.port) ?? DEFAULT_LAN_PORT;

	return { name, address, port };
}

/**
 * Read the platform block of config.json. Unknown or malformed values fall
 * back to defaults; a device without an address is kept so the adapter can
 * report it, but it will never talk to anything.
 */
export function parsePlatformConfig(config: Record<string, unknown>, log: DeviceLogger): YeelightPlatformSettings {
	const minPollSeconds = positiveNumber(config.minPollInterval);
	const minPollIntervalMs = minPollSeconds !== undefined
		? Math.round(minPollSeconds * 1000)
		: DEFAULT_MIN_POLL_INTERVAL_MS;

	const pollSeconds = positiveNumber(config.pollInterval);
	const pollIntervalMs = Math.max(
		pollSeconds !== undefined ? Math.round(pollSeconds * 1000) : DEFAULT_POLL_INTERVAL_MS,
		minPollIntervalMs,
	);

	const requestTimeoutMs = positiveNumber(config.requestTimeout) ?? DEFAULT_REQUEST_TIMEOUT_MS;

	const rawDevices = Array.isArray(config.devices) ? config.devices : [];
	if (rawDevices.length === 0) {
		log.warn('Yeelight: no devices configured.');
	}

	const devices: DeviceSettings[] = [];
	rawDevices.forEach((raw, index) => {
		const parsed = parseDevice(raw, index, log);
		if (parsed) {
			devices.push(parsed);
		}
	});

	return { pollIntervalMs, minPollIntervalMs, requestTimeoutMs, devices };
}
