// src/yeelight/field-map.ts

import { FieldKind } from '../device/types.js';
import type { BulbHandle, RawPropertySet } from './bulb.js';
import { PowerMode } from './bulb.js';
import type { ModelSpec } from './capabilities.js';
import { FieldValueError } from './errors.js';

/** Raw key + value to store in the cache once a command went out. */
export interface CacheUpdate {
	key: string;
	value: string;
}

/** What a binding may touch while encoding and sending one write. */
export interface WriteContext {
	bulb: BulbHandle;
	/** Bounds of the field being written. */
	bounds: { low: number; high: number };
	/**
	 * Current value of another field, falling back to the cached raw value
	 * when that field is not registered.
	 */
	partner(field: string, rawKey: string): string | undefined;
}

export type RegistrationRule = 'key-present' | 'night-light-supported';

/**
 * Everything the adapter knows about one abstract field: where it lives in
 * the raw property set, how to register it, how to turn a raw value into
 * the field's value, and which command writes it.
 */
export interface FieldBinding {
	field: string;
	rawKey: string;
	kind: FieldKind;
	registerWhen: RegistrationRule;
	high(spec: ModelSpec): string;
	low(spec: ModelSpec): string;
	decode(raw: string): string;
	write(ctx: WriteContext, value: string): Promise<CacheUpdate>;
}

const fixed = (bound: string) => () => bound;
const passthrough = (raw: string) => raw;
const onOffToBinary = (raw: string) => (raw === 'on' ? '1' : '0');

export function parseNumber(field: string, value: string): number {
	const trimmed = value.trim();
	const n = Number(trimmed);
	if (trimmed === '' || !Number.isFinite(n)) {
		throw new FieldValueError(field, `${field}: "${value}" is not a number`);
	}
	return Math.round(n);
}

export function parseBinary(field: string, value: string): boolean {
	return parseNumber(field, value) === 1;
}

function partnerNumber(ctx: WriteContext, field: string, partnerField: string, rawKey: string): number {
	const current = ctx.partner(partnerField, rawKey);
	if (current === undefined) {
		throw new FieldValueError(field, `${field}: no current ${partnerField} value to combine with`);
	}
	return parseNumber(partnerField, current);
}

function powerBinding(field: string, rawKey: string, method: string): FieldBinding {
	return {
		field,
		rawKey,
		kind: FieldKind.Binary,
		registerWhen: 'key-present',
		high: fixed('1'),
		low: fixed('0'),
		decode: onOffToBinary,
		async write(ctx, value) {
			const state = parseBinary(field, value) ? 'on' : 'off';
			await ctx.bulb.sendCommand(method, [state]);
			return { key: rawKey, value: state };
		},
	};
}

function numberBinding(
	field: string,
	rawKey: string,
	high: string,
	low: string,
	write: FieldBinding['write'],
): FieldBinding {
	return {
		field,
		rawKey,
		kind: FieldKind.Number,
		registerWhen: 'key-present',
		high: fixed(high),
		low: fixed(low),
		decode: passthrough,
		write,
	};
}

function simpleCommand(field: string, rawKey: string, method: string): FieldBinding['write'] {
	return async (ctx, value) => {
		const n = parseNumber(field, value);
		await ctx.bulb.sendCommand(method, [n]);
		return { key: rawKey, value: String(n) };
	};
}

export const FIELD_BINDINGS: readonly FieldBinding[] = [
	powerBinding('state', 'power', 'set_power'),

	numberBinding('brightness', 'current_brightness', '100', '0', async (ctx, value) => {
		const sent = await ctx.bulb.setBrightness(parseNumber('brightness', value));
		return { key: 'current_brightness', value: String(sent) };
	}),

	numberBinding('bg_bright', 'bg_bright', '100', '0', simpleCommand('bg_bright', 'bg_bright', 'bg_set_bright')),

	{
		field: 'night_light',
		rawKey: 'active_mode',
		kind: FieldKind.Binary,
		registerWhen: 'night-light-supported',
		high: fixed('1'),
		low: fixed('0'),
		decode: passthrough,
		async write(ctx, value) {
			const moonlight = parseBinary('night_light', value);
			await ctx.bulb.setPowerMode(moonlight ? PowerMode.Moonlight : PowerMode.Normal);
			return { key: 'active_mode', value: moonlight ? '1' : '0' };
		},
	},

	{
		field: 'temp',
		rawKey: 'ct',
		kind: FieldKind.Number,
		registerWhen: 'key-present',
		high: (spec) => String(spec.colorTemp.max),
		low: (spec) => String(spec.colorTemp.min),
		decode: passthrough,
		async write(ctx, value) {
			const kelvin = parseNumber('temp', value);
			await ctx.bulb.setPowerMode(PowerMode.Normal);
			const sent = await ctx.bulb.setColorTemp(kelvin, { min: ctx.bounds.low, max: ctx.bounds.high });
			return { key: 'ct', value: String(sent) };
		},
	},

	numberBinding('bg_temp', 'bg_ct', '6500', '1700', simpleCommand('bg_temp', 'bg_ct', 'bg_set_ct_abx')),

	numberBinding('color', 'hue', '360', '0', async (ctx, value) => {
		const hue = parseNumber('color', value);
		const saturation = partnerNumber(ctx, 'color', 'saturation', 'sat');
		const sent = await ctx.bulb.setHsv(hue, saturation);
		return { key: 'hue', value: String(sent.hue) };
	}),

	numberBinding('bg_color', 'bg_hue', '360', '0', async (ctx, value) => {
		const hue = parseNumber('bg_color', value);
		const saturation = partnerNumber(ctx, 'bg_color', 'bg_saturation', 'bg_sat');
		await ctx.bulb.sendCommand('bg_set_hsv', [hue, saturation]);
		return { key: 'bg_hue', value: String(hue) };
	}),

	powerBinding('bg_power', 'bg_power', 'bg_set_power'),

	numberBinding('saturation', 'sat', '100', '0', async (ctx, value) => {
		const saturation = parseNumber('saturation', value);
		const hue = partnerNumber(ctx, 'saturation', 'color', 'hue');
		const sent = await ctx.bulb.setHsv(hue, saturation);
		return { key: 'sat', value: String(sent.saturation) };
	}),

	numberBinding('bg_saturation', 'bg_sat', '100', '0', async (ctx, value) => {
		const saturation = parseNumber('bg_saturation', value);
		const hue = partnerNumber(ctx, 'bg_saturation', 'bg_color', 'bg_hue');
		await ctx.bulb.sendCommand('bg_set_hsv', [hue, saturation]);
		return { key: 'bg_sat', value: String(saturation) };
	}),
];

const bindingsByField = new Map(FIELD_BINDINGS.map((binding) => [binding.field, binding]));

export function bindingFor(field: string): FieldBinding | undefined {
	return bindingsByField.get(field);
}

/**
 * Decode every known key present in `values`, keyed by field name.
 * Keys the bulb did not report are left out.
 */
export function decodeProperties(values: RawPropertySet): Map<string, string> {
	const decoded = new Map<string, string>();
	for (const binding of FIELD_BINDINGS) {
		const raw = values[binding.rawKey];
		if (raw !== undefined) {
			decoded.set(binding.field, binding.decode(raw));
		}
	}
	return decoded;
}
