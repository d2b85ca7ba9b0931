// test/yeelight/yeelight-device.test.ts
import { describe, expect, it, vi } from 'vitest';

import type { FieldInit } from '../../src/device/types.js';
import { DeviceGetData, DeviceType, FieldKind } from '../../src/device/types.js';
import { discoveredCapabilities } from '../../src/yeelight/capabilities.js';
import { TransportError } from '../../src/yeelight/errors.js';
import { YeelightDevice } from '../../src/yeelight/yeelight-device.js';
import { FakeBulb } from '../fake-bulb.js';
import { makeLogger } from '../helpers.js';

/** Exposes field registration so a registry can be pre-filled. */
class PrefilledDevice extends YeelightDevice {
	public register(init: FieldInit) {
		return this.addField(init);
	}
}

const tick = () => new Promise((resolve) => setTimeout(resolve, 0));

function setup(props: Record<string, string>) {
	const bulb = new FakeBulb(props);
	const logger = makeLogger();
	const clock = { now: 0 };
	const device = new PrefilledDevice(
		{ name: 'Desk', address: '192.0.2.10' },
		{
			logger,
			minPollIntervalMs: 5000,
			now: () => clock.now,
			createBulb: () => bulb,
		},
	);
	return { bulb, logger, clock, device };
}

function fieldOf(device: YeelightDevice, name: string) {
	const field = device.getFieldByName(name);
	if (!field) {
		throw new Error(`field ${name} is not registered`);
	}
	return field;
}

describe('YeelightDevice', () => {
	it('declares itself as a pulled light', () => {
		const { device } = setup({ power: 'on' });
		expect(YeelightDevice.deviceConfig.availableTypes).toEqual([DeviceType.Light]);
		expect(device.getData).toBe(DeviceGetData.Pull);
	});

	describe('initialize', () => {
		it('fetches properties and capabilities only once', async () => {
			const { bulb, device } = setup({ power: 'on', current_brightness: '50' });

			await Promise.all([device.initialize(), device.initialize()]);
			await device.initialize();

			expect(bulb.propertyReads).toBe(1);
			expect(bulb.capabilityReads).toBe(1);
			expect(device.isConnected).toBe(true);
		});

		it('registers fields with decoded initial values', async () => {
			const { device } = setup({ power: 'on', current_brightness: '50', ct: '4000', bg_power: 'off' });
			await device.initialize();

			expect(device.getFields().map((f) => [f.getName(), f.get()])).toEqual([
				['state', '1'],
				['brightness', '50'],
				['night_light', '0'],
				['temp', '4000'],
				['bg_power', '0'],
			]);
			expect(device.cachedValues).toEqual({ power: 'on', current_brightness: '50', ct: '4000', bg_power: 'off' });
		});

		it('stays disconnected when the first fetch is empty and can retry', async () => {
			const { bulb, logger, device } = setup({});

			await device.initialize();
			expect(device.isConnected).toBe(false);
			expect(device.getFields()).toEqual([]);
			expect(logger.warn).toHaveBeenCalledWith('%s: failed to retrieve device properties.', 'Desk');

			bulb.props = { power: 'on' };
			await device.initialize();
			expect(device.isConnected).toBe(true);
		});

		it('stays disconnected when the fetch throws', async () => {
			const { bulb, logger, device } = setup({ power: 'on' });
			bulb.readError = new TransportError('connect', 'cannot connect');

			await device.initialize();

			expect(device.isConnected).toBe(false);
			expect(logger.error).toHaveBeenCalledWith('%s: initialization error: %s', 'Desk', 'cannot connect');
		});

		it('leaves fields that are already registered alone', async () => {
			const { device } = setup({ power: 'on', active_mode: '1', current_brightness: '30' });
			const binary = { readOnly: false, high: '1', low: '0', kind: FieldKind.Binary, virtual: false };
			const state = device.register({ ...binary, name: 'state', value: '0' });
			const nightLight = device.register({ ...binary, name: 'night_light', value: '0' });

			await device.initialize();

			expect(device.isConnected).toBe(true);
			expect(device.getFields().map((f) => f.getName())).toEqual(['state', 'night_light', 'brightness']);
			expect(fieldOf(device, 'state')).toBe(state);
			expect(state.getId()).toBe(device.getFields()[0].getId());
			expect(state.get()).toBe('0');
			expect(fieldOf(device, 'night_light')).toBe(nightLight);
			expect(nightLight.get()).toBe('0');
		});

		it('falls back to default bounds when capabilities are unknown', async () => {
			const { bulb, device } = setup({ power: 'on', ct: '3000' });
			bulb.capabilities = null;

			await device.initialize();

			const temp = fieldOf(device, 'temp');
			expect(temp.high).toBe('6500');
			expect(temp.low).toBe('1700');
			expect(device.capabilitySpec?.source).toBe('default');
			expect(device.getFieldByName('night_light')).toBeDefined();
		});

		it('uses the discovered model spec', async () => {
			const { bulb, device } = setup({ power: 'on', ct: '2700', active_mode: '0' });
			bulb.capabilities = discoveredCapabilities('mono', {
				colorTemp: { min: 2700, max: 2700 },
				nightLight: false,
				backgroundLight: false,
			});

			await device.initialize();

			expect(fieldOf(device, 'temp').high).toBe('2700');
			expect(device.getFieldByName('night_light')).toBeUndefined();
		});
	});

	describe('poll', () => {
		it('fetches at most once per minimum interval', async () => {
			const { bulb, clock, device } = setup({ power: 'on' });
			await device.initialize();

			clock.now = 10_000;
			expect((await device.pollDetailed()).status).toBe('polled');
			clock.now = 11_000;
			expect(await device.pollDetailed()).toEqual({ status: 'skipped', reason: 'rate-limited' });
			expect(bulb.propertyReads).toBe(2);

			clock.now = 16_000;
			expect((await device.pollDetailed()).status).toBe('polled');
			expect(bulb.propertyReads).toBe(3);
		});

		it('lets concurrent callers share one fetch', async () => {
			const { bulb, device } = setup({ power: 'on' });
			await device.initialize();

			await Promise.all([device.poll(), device.poll(), device.poll()]);

			expect(bulb.propertyReads).toBe(2);
		});

		it('returns only the fields that changed', async () => {
			const { bulb, clock, device } = setup({ power: 'off' });
			await device.initialize();

			bulb.props = { power: 'on' };
			expect(await device.poll()).toEqual({ state: '1' });
			expect(fieldOf(device, 'state').getLastSource()).toBe('device');

			clock.now = 6000;
			expect(await device.poll()).toEqual({});
		});

		it('leaves cache and fields alone when the fetch fails', async () => {
			const { bulb, device } = setup({ power: 'on', current_brightness: '50' });
			await device.initialize();
			const before = device.cachedValues;

			bulb.props = { power: 'off', current_brightness: '0' };
			bulb.readError = new TransportError('timeout', 'get_prop timed out');
			const outcome = await device.pollDetailed();

			expect(outcome.status).toBe('failed');
			expect(outcome.status === 'failed' && outcome.error.kind).toBe('transport');
			expect(device.cachedValues).toBe(before);
			expect(fieldOf(device, 'state').get()).toBe('1');
			expect(fieldOf(device, 'brightness').get()).toBe('50');
			expect(await device.poll()).toEqual({});
		});

		it('treats an empty reply as a failure', async () => {
			const { bulb, device } = setup({ power: 'on' });
			await device.initialize();

			bulb.props = {};
			expect(await device.pollDetailed()).toEqual({ status: 'failed', error: { kind: 'empty-response' } });
			expect(device.cachedValues).toEqual({ power: 'on' });
		});

		it('skips keys without a registered field', async () => {
			const { bulb, device } = setup({ power: 'on' });
			await device.initialize();

			bulb.props = { power: 'on', hue: '10' };
			expect(await device.poll()).toEqual({});
			expect(device.cachedValues).toEqual({ power: 'on', hue: '10' });
		});
	});

	describe('setValue', () => {
		it('combines a hue write with the current saturation', async () => {
			const { bulb, device } = setup({ hue: '100', sat: '50' });
			await device.initialize();

			const outcome = await device.setValueDetailed(fieldOf(device, 'color').getId(), '200');

			expect(outcome).toEqual({ status: 'sent', field: 'color', cache: { key: 'hue', value: '200' } });
			expect(bulb.sent).toEqual([{ method: 'set_hsv', params: [200, 50] }]);
			expect(device.cachedValues).toEqual({ hue: '200', sat: '50' });
			expect(fieldOf(device, 'color').getLastSource()).toBe('user');
		});

		it('never reads properties while a command is in flight', async () => {
			const { bulb, device } = setup({ power: 'off' });
			await device.initialize();

			let release: () => void = () => undefined;
			bulb.commandGate = new Promise<void>((resolve) => {
				release = resolve;
			});

			const write = device.setValueDetailed(fieldOf(device, 'state').getId(), '1');
			await tick();
			expect(bulb.sent).toEqual([{ method: 'set_power', params: ['on'] }]);

			const poll = device.pollDetailed();
			await tick();
			expect(bulb.propertyReads).toBe(1);

			release();
			expect((await write).status).toBe('sent');
			// The bulb still reports off, so the poll overrides the optimistic "on".
			expect(await poll).toEqual({ status: 'polled', patch: { state: '0' } });
			expect(bulb.propertyReads).toBe(2);
			expect(device.cachedValues).toEqual({ power: 'off' });
		});

		it('clamps the color temperature to the model range', async () => {
			const { bulb, device } = setup({ power: 'on', ct: '3000' });
			bulb.capabilities = discoveredCapabilities('ceiling1', {
				colorTemp: { min: 2700, max: 6500 },
				nightLight: true,
				backgroundLight: false,
			});
			await device.initialize();

			const outcome = await device.setValueDetailed(fieldOf(device, 'temp').getId(), '1800');

			expect(outcome).toEqual({ status: 'sent', field: 'temp', cache: { key: 'ct', value: '2700' } });
			expect(bulb.sent).toEqual([
				{ method: 'set_power', params: ['on', 1] },
				{ method: 'set_ct_abx', params: [2700] },
			]);
		});

		it('uses the cached partner value when the partner field is missing', async () => {
			const { bulb, device } = setup({ power: 'on', hue: '100' });
			await device.initialize();
			bulb.props = { power: 'on', hue: '100', sat: '30' };
			await device.poll();

			await device.setValue(fieldOf(device, 'color').getId(), '200');

			expect(bulb.sent).toEqual([{ method: 'set_hsv', params: [200, 30] }]);
		});

		it('reports a conversion failure when no partner value exists', async () => {
			const { bulb, device } = setup({ hue: '100' });
			await device.initialize();

			const outcome = await device.setValueDetailed(fieldOf(device, 'color').getId(), '200');

			expect(outcome.status === 'failed' && outcome.error.kind).toBe('conversion');
			expect(bulb.sent).toEqual([]);
			expect(device.cachedValues).toEqual({ hue: '100' });
			expect(fieldOf(device, 'color').get()).toBe('200');
		});

		it('keeps the cache when the command fails', async () => {
			const { bulb, logger, device } = setup({ power: 'on' });
			await device.initialize();
			bulb.commandError = new TransportError('device', 'set_power rejected');

			const outcome = await device.setValueDetailed(fieldOf(device, 'state').getId(), '0', true);

			expect(outcome.status === 'failed' && outcome.error.kind).toBe('transport');
			expect(device.cachedValues).toEqual({ power: 'on' });
			expect(fieldOf(device, 'state').get()).toBe('0');
			expect(fieldOf(device, 'state').getLastSource()).toBe('script');
			expect(logger.error).toHaveBeenCalledWith(
				'%s: error setting %s=%s: %s',
				'Desk',
				'state',
				'0',
				'set_power rejected',
			);
		});

		it('reports unknown field ids without throwing', async () => {
			const { bulb, device } = setup({ power: 'on' });
			await device.initialize();

			expect((await device.setValueDetailed('nope', '1')).status).toBe('failed');
			await expect(device.setValue('nope', '1')).resolves.toBeUndefined();
			expect(bulb.sent).toEqual([]);
		});

		it('writes the optimistic value the bulb would report', async () => {
			const { device } = setup({ power: 'off', current_brightness: '0' });
			await device.initialize();

			await device.setValue(fieldOf(device, 'state').getId(), '1');
			await device.setValue(fieldOf(device, 'brightness').getId(), '70');

			expect(device.cachedValues).toEqual({ power: 'on', current_brightness: '70' });
		});
	});

	describe('without an address', () => {
		it('warns once and never touches a bulb', async () => {
			const logger = makeLogger();
			const createBulb = vi.fn(() => new FakeBulb({ power: 'on' }));
			const device = new YeelightDevice({ name: 'Nowhere', address: '  ' }, { logger, createBulb });

			await device.initialize();

			expect(createBulb).not.toHaveBeenCalled();
			expect(logger.warn).toHaveBeenCalledTimes(1);
			expect(logger.warn).toHaveBeenCalledWith('%s: device address is missing; device disabled.', 'Nowhere');
			expect(device.isConnected).toBe(false);
			expect(device.getData).toBeNull();
			expect(await device.pollDetailed()).toEqual({ status: 'skipped', reason: 'no-handle' });
		});
	});

	describe('close', () => {
		it('drops the bulb and turns every operation into a no-op', async () => {
			const { bulb, logger, device } = setup({ power: 'on' });
			await device.initialize();

			device.close();
			device.close();

			expect(bulb.closed).toBe(true);
			expect(device.isConnected).toBe(false);
			expect(device.cachedValues).toEqual({});
			expect(logger.info).toHaveBeenCalledWith('%s: closed.', 'Desk');
			expect(logger.info.mock.calls.filter(([message]) => message === '%s: closed.')).toHaveLength(1);

			expect(await device.pollDetailed()).toEqual({ status: 'skipped', reason: 'no-handle' });
			const outcome = await device.setValueDetailed(fieldOf(device, 'state').getId(), '0');
			expect(outcome).toEqual({ status: 'skipped', reason: 'no-handle' });
			expect(bulb.sent).toEqual([]);
			expect(bulb.propertyReads).toBe(1);
		});
	});
});
