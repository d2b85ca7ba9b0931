// src/device/base-device.ts
import { DeviceField } from './device-field.js';
import { FieldNotFoundError } from './errors.js';
import type { DeviceLogger } from './logger.js';
import type { DeviceSettings, FieldInit } from './types.js';

/**
 * Generic device with a field registry.
 *
 * Concrete devices add their fields during initialization and override
 * setValue() to forward writes to hardware, calling super.setValue() first
 * so the value is stored no matter what the device does with it.
 */
export abstract class BaseDevice {
	protected readonly log: DeviceLogger;
	protected readonly data: DeviceSettings;
	private readonly fields = new Map<string, DeviceField>();

	constructor(data: DeviceSettings, log: DeviceLogger) {
		this.data = data;
		this.log = log;
	}

	public get name(): string {
		return this.data.name;
	}

	public getFields(): DeviceField[] {
		return [...this.fields.values()];
	}

	public getFieldByName(name: string): DeviceField | undefined {
		for (const field of this.fields.values()) {
			if (field.getName() === name) {
				return field;
			}
		}
		return undefined;
	}

	public getField(fieldId: string): DeviceField {
		const field = this.fields.get(fieldId);
		if (!field) {
			throw new FieldNotFoundError(fieldId);
		}
		return field;
	}

	protected addField(init: FieldInit): DeviceField {
		const field = new DeviceField(init);
		this.fields.set(field.getId(), field);
		this.log.debug(
			'%s: registered field %s (kind=%s low=%s high=%s value=%s)',
			this.data.name,
			init.name,
			init.kind,
			init.low,
			init.high,
			init.value,
		);
		return field;
	}

	/**
	 * Base write: stores the value on the field. Subclasses extend this
	 * with the device command.
	 */
	public async setValue(fieldId: string, value: string, scripted = false): Promise<void> {
		const field = this.getField(fieldId);
		field.set(value, scripted ? 'script' : 'user');
		this.log.debug(
			'%s: field %s <- %s (%s)',
			this.data.name,
			field.getName(),
			value,
			scripted ? 'script' : 'user',
		);
	}

	public abstract initialize(): Promise<void>;
	public abstract poll(): Promise<Record<string, string>>;
	public abstract get isConnected(): boolean;
	public abstract close(): void;
}
