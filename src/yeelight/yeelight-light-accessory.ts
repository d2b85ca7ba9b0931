// src/yeelight/yeelight-light-accessory.ts
import type {
	Characteristic,
	PlatformAccessory,
	Service,
} from 'homebridge';

import type { FieldCodec, YeelightAccessoryEnv } from './accessory-helpers.js';
import {
	applyAccessoryInformation,
	binaryCodec,
	colorTemperatureCodec,
	kelvinToMired,
	numberCodec,
} from './accessory-helpers.js';
import type { Patch } from './synchronizer.js';
import type { YeelightDevice } from './yeelight-device.js';

export const MAIN_SUBTYPE = 'main';
export const NIGHT_LIGHT_SUBTYPE = 'night-light';
export const BACKGROUND_SUBTYPE = 'background';

interface BoundCharacteristic {
	characteristic: Characteristic;
	codec: FieldCodec;
}

export interface YeelightLightAccessory {
	/** Push a poll patch into HomeKit. Returns the fields that were applied. */
	applyPatch(patch: Patch): string[];
}

export function configureYeelightLightAccessory(
	env: YeelightAccessoryEnv,
	device: YeelightDevice,
	accessory: PlatformAccessory,
	address: string,
): YeelightLightAccessory {
	const { Service: ServiceType, Characteristic: C } = env.api.hap;
	const deviceName = device.name;
	const bound = new Map<string, BoundCharacteristic>();

	if (accessory.category !== env.api.hap.Categories.LIGHTBULB) {
		accessory.category = env.api.hap.Categories.LIGHTBULB;
	}

	applyAccessoryInformation(env.api, accessory, device, address);

	const hasField = (name: string) => device.getFieldByName(name) !== undefined;

	const ensureService = (
		type: typeof ServiceType.Lightbulb | typeof ServiceType.Switch,
		name: string,
		subtype: string,
		wanted: boolean,
	): Service | null => {
		const existing = accessory.getServiceById(type, subtype);
		if (!wanted) {
			if (existing) {
				env.log.info('Yeelight: removing stale %s service from %s', subtype, deviceName);
				accessory.removeService(existing);
			}
			return null;
		}
		return existing ?? accessory.addService(type, name, subtype);
	};

	const bind = (characteristic: Characteristic, field: string, codec: FieldCodec): void => {
		characteristic
			.onGet(() => {
				const current = device.getFieldByName(field);
				if (!current) {
					throw new env.api.hap.HapStatusError(env.api.hap.HAPStatus.RESOURCE_DOES_NOT_EXIST);
				}
				return codec.toHomeKit(current.get());
			})
			.onSet(async (value) => {
				const current = device.getFieldByName(field);
				if (!current) {
					env.log.warn('Yeelight: %s.set for %s but the field is not registered', field, deviceName);
					return;
				}

				const encoded = codec.fromHomeKit(value);
				env.log.info('Yeelight: %s.set -> %s for %s', field, encoded, deviceName);

				const outcome = await device.setValueDetailed(current.getId(), encoded);
				if (outcome.status === 'failed' && outcome.error.kind === 'transport') {
					throw new env.api.hap.HapStatusError(
						env.api.hap.HAPStatus.SERVICE_COMMUNICATION_FAILURE,
					);
				}
			});

		bound.set(field, { characteristic, codec });
	};

	const bindColorTemperature = (service: Service, field: string): void => {
		const current = device.getFieldByName(field);
		if (!current) {
			return;
		}
		// Higher Kelvin means fewer mired, so the bounds swap.
		const characteristic = service.getCharacteristic(C.ColorTemperature).setProps({
			minValue: kelvinToMired(Number(current.high)),
			maxValue: kelvinToMired(Number(current.low)),
			minStep: 1,
		});
		bind(characteristic, field, colorTemperatureCodec);
	};

	// ----- Main light -----
	const main = ensureService(ServiceType.Lightbulb, deviceName, MAIN_SUBTYPE, hasField('state'));
	if (main) {
		bind(main.getCharacteristic(C.On), 'state', binaryCodec);
		if (hasField('brightness')) {
			bind(main.getCharacteristic(C.Brightness), 'brightness', numberCodec);
		}
		if (hasField('color')) {
			bind(main.getCharacteristic(C.Hue), 'color', numberCodec);
		}
		if (hasField('saturation')) {
			bind(main.getCharacteristic(C.Saturation), 'saturation', numberCodec);
		}
		bindColorTemperature(main, 'temp');
	}

	// ----- Night light -----
	const nightLight = ensureService(
		ServiceType.Switch,
		`${deviceName} Night Light`,
		NIGHT_LIGHT_SUBTYPE,
		hasField('night_light'),
	);
	if (nightLight) {
		bind(nightLight.getCharacteristic(C.On), 'night_light', binaryCodec);
	}

	// ----- Background light -----
	const background = ensureService(
		ServiceType.Lightbulb,
		`${deviceName} Background`,
		BACKGROUND_SUBTYPE,
		hasField('bg_power'),
	);
	if (background) {
		bind(background.getCharacteristic(C.On), 'bg_power', binaryCodec);
		if (hasField('bg_bright')) {
			bind(background.getCharacteristic(C.Brightness), 'bg_bright', numberCodec);
		}
		if (hasField('bg_color')) {
			bind(background.getCharacteristic(C.Hue), 'bg_color', numberCodec);
		}
		if (hasField('bg_saturation')) {
			bind(background.getCharacteristic(C.Saturation), 'bg_saturation', numberCodec);
		}
		bindColorTemperature(background, 'bg_temp');
	}

	env.log.debug('Yeelight: %s bound fields: %s', deviceName, [...bound.keys()].join(', '));

	return {
		applyPatch(patch: Patch): string[] {
			const applied: string[] = [];
			for (const [field, value] of Object.entries(patch)) {
				const target = bound.get(field);
				if (!target) {
					continue;
				}
				target.characteristic.updateValue(target.codec.toHomeKit(value));
				applied.push(field);
			}
			return applied;
		},
	};
}
