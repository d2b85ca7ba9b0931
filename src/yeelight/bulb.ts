// src/yeelight/bulb.ts

import type { DeviceLogger } from '../device/logger.js';
import type { CapabilitySpec } from './capabilities.js';
import { discoveredCapabilities, lookupModelSpec, queryCapabilities } from './capabilities.js';
import { CapabilityError } from './errors.js';
import type { CommandParam } from './lan-client.js';
import { LanClient } from './lan-client.js';

/** Device-native key → raw value, exactly as the bulb last reported it. */
export type RawPropertySet = Readonly<Record<string, string>>;

export enum PowerMode {
	Last = 0,
	Normal = 1,
	Rgb = 2,
	Hsv = 3,
	ColorFlow = 4,
	Moonlight = 5,
}

export const TRANSITION_EFFECT = 'smooth';
export const TRANSITION_DURATION_MS = 300;

export interface KelvinRange {
	min: number;
	max: number;
}

/** Widest range any bulb accepts for set_ct_abx. */
export const FULL_KELVIN_RANGE: KelvinRange = { min: 1700, max: 6500 };

export const REQUESTED_PROPERTIES = [
	'power',
	'bright',
	'ct',
	'rgb',
	'hue',
	'sat',
	'color_mode',
	'flowing',
	'delayoff',
	'music_on',
	'name',
	'bg_power',
	'bg_flowing',
	'bg_ct',
	'bg_bright',
	'bg_hue',
	'bg_sat',
	'bg_rgb',
	'nl_br',
	'active_mode',
] as const;

/**
 * What the adapter needs from a bulb. YeelightBulb is the real one;
 * tests substitute their own. Setters resolve with the value actually sent.
 */
export interface BulbHandle {
	getProperties(): Promise<RawPropertySet>;
	getModelSpecs(): Promise<CapabilitySpec>;
	sendCommand(method: string, params: CommandParam[]): Promise<unknown[]>;
	setBrightness(brightness: number): Promise<number>;
	setColorTemp(kelvin: number, range?: KelvinRange): Promise<number>;
	setHsv(hue: number, saturation: number): Promise<{ hue: number; saturation: number }>;
	setPowerMode(mode: PowerMode): Promise<void>;
	close(): void;
}

function clamp(n: number, min: number, max: number): number {
	return Math.min(max, Math.max(min, n));
}

/**
 * Zip a get_prop reply onto the requested names. Empty strings mean the
 * bulb does not have the property and are left out. current_brightness is
 * derived from power, active_mode, nl_br and bright.
 */
export function buildPropertySet(names: readonly string[], values: unknown[]): RawPropertySet {
	const props: Record<string, string> = {};
	names.forEach((name, i) => {
		const value = values[i];
		if (value === undefined || value === null) {
			return;
		}
		const text = String(value);
		if (text !== '') {
			props[name] = text;
		}
	});

	if (Object.keys(props).length === 0) {
		return props;
	}

	let current: string | undefined;
	if (props.power === 'off') {
		current = '0';
	} else if (props.active_mode === '1') {
		current = props.nl_br;
	} else {
		current = props.bright;
	}
	if (current !== undefined) {
		props.current_brightness = current;
	}
	return props;
}

export interface YeelightBulbOptions {
	host: string;
	port?: number;
	requestTimeoutMs?: number;
	logger?: DeviceLogger;
}

export class YeelightBulb implements BulbHandle {
	private readonly host: string;
	private readonly client: LanClient;
	private model: string | null = null;

	constructor(options: YeelightBulbOptions) {
		this.host = options.host;
		this.client = new LanClient({
			host: options.host,
			port: options.port,
			requestTimeoutMs: options.requestTimeoutMs,
			logger: options.logger,
		});
	}

	public async getProperties(): Promise<RawPropertySet> {
		const result = await this.sendCommand('get_prop', [...REQUESTED_PROPERTIES]);
		return buildPropertySet(REQUESTED_PROPERTIES, result);
	}

	public async getModelSpecs(): Promise<CapabilitySpec> {
		if (!this.model) {
			const headers = await queryCapabilities(this.host);
			if (!headers.model) {
				throw new CapabilityError(`capability reply from ${this.host} has no model`);
			}
			this.model = headers.model;
		}

		const spec = lookupModelSpec(this.model);
		if (!spec) {
			throw new CapabilityError(`no specs known for model "${this.model}"`);
		}
		return discoveredCapabilities(this.model, spec);
	}

	public sendCommand(method: string, params: CommandParam[]): Promise<unknown[]> {
		return this.client.invoke(method, params);
	}

	public async setBrightness(brightness: number): Promise<number> {
		const value = clamp(Math.round(brightness), 1, 100);
		await this.sendCommand('set_bright', [value, TRANSITION_EFFECT, TRANSITION_DURATION_MS]);
		return value;
	}

	public async setColorTemp(kelvin: number, range: KelvinRange = FULL_KELVIN_RANGE): Promise<number> {
		const value = clamp(Math.round(kelvin), range.min, range.max);
		await this.sendCommand('set_ct_abx', [value, TRANSITION_EFFECT, TRANSITION_DURATION_MS]);
		return value;
	}

	public async setHsv(hue: number, saturation: number): Promise<{ hue: number; saturation: number }> {
		const h = clamp(Math.round(hue), 0, 359);
		const s = clamp(Math.round(saturation), 0, 100);
		await this.sendCommand('set_hsv', [h, s, TRANSITION_EFFECT, TRANSITION_DURATION_MS]);
		return { hue: h, saturation: s };
	}

	public async setPowerMode(mode: PowerMode): Promise<void> {
		await this.sendCommand('set_power', ['on', TRANSITION_EFFECT, TRANSITION_DURATION_MS, mode]);
	}

	public close(): void {
		this.client.close();
	}
}
