// src/yeelight/accessory-helpers.ts
import type {
	API,
	CharacteristicValue,
	Logger,
	PlatformAccessory,
} from 'homebridge';

import type { YeelightDevice } from './yeelight-device.js';

// Context stored on the accessory so cached accessories can be matched
// back to their configured bulb after a restart.
export interface YeelightAccessoryContext {
	yeelight?: {
		address: string;
		name: string;
	};
	[key: string]: unknown;
}

// Minimal runtime "env" that accessory modules need from the platform
export interface YeelightAccessoryEnv {
	log: Logger;
	api: API;
}

/**
 * How a field value travels between the device (string) and HomeKit.
 */
export interface FieldCodec {
	toHomeKit(value: string): CharacteristicValue;
	fromHomeKit(value: CharacteristicValue): string;
}

export function clampNumber(n: number, min: number, max: number): number {
	return Math.min(max, Math.max(min, n));
}

/**
 * Color Temperature Converters: Convert HomeKit mired values to Kelvin
 */
export function miredToKelvin(mired: number): number {
	const m = clampNumber(Number(mired), 1, 1_000_000);
	return Math.round(1_000_000 / m);
}

/**
 * Color Temperature Converters: Convert Kelvin to HomeKit mired values
 */
export function kelvinToMired(kelvin: number): number {
	const k = clampNumber(Number(kelvin), 1, 1_000_000);
	return Math.round(1_000_000 / k);
}

export const binaryCodec: FieldCodec = {
	toHomeKit: (value) => value === '1',
	fromHomeKit: (value) => (value === true || value === 1 ? '1' : '0'),
};

export const numberCodec: FieldCodec = {
	toHomeKit: (value) => {
		const n = Number(value);
		return Number.isFinite(n) ? n : 0;
	},
	fromHomeKit: (value) => String(Math.round(Number(value))),
};

/** Device keeps Kelvin; HomeKit speaks mired. */
export const colorTemperatureCodec: FieldCodec = {
	toHomeKit: (value) => kelvinToMired(Number(value)),
	fromHomeKit: (value) => String(miredToKelvin(Number(value))),
};

/**
 * Populate the standard Accessory Information service from what the
 * device learned during initialization.
 */
export function applyAccessoryInformation(
	api: API,
	accessory: PlatformAccessory,
	device: YeelightDevice,
	address: string,
): void {
	const infoService = accessory.getService(api.hap.Service.AccessoryInformation);
	if (!infoService) {
		return;
	}

	const Characteristic = api.hap.Characteristic;
	const capabilities = device.capabilitySpec;
	const model = capabilities?.source === 'discovered'
		? `Yeelight ${capabilities.model}`
		: 'Yeelight Light';

	infoService.updateCharacteristic(Characteristic.Name, device.name);
	infoService.updateCharacteristic(Characteristic.Manufacturer, 'Yeelight');
	infoService.updateCharacteristic(Characteristic.Model, model);
	infoService.updateCharacteristic(Characteristic.SerialNumber, address);
}
