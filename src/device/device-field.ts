// src/device/device-field.ts
import { v4 as uuidv4 } from 'uuid';

import type { FieldChangeSource, FieldInit, FieldKind } from './types.js';

/**
 * One abstract, caller-visible field of a device.
 * Values are always stored as strings; bounds are strings too so that
 * binary and numeric fields share one shape.
 */
export class DeviceField {
	private readonly id: string;
	private readonly name: string;
	private value: string;
	private lastSource: FieldChangeSource = 'device';

	public readonly readOnly: boolean;
	public readonly high: string;
	public readonly low: string;
	public readonly kind: FieldKind;
	public readonly virtual: boolean;

	constructor(init: FieldInit, id: string = uuidv4()) {
		this.id = id;
		this.name = init.name;
		this.value = init.value;
		this.readOnly = init.readOnly;
		this.high = init.high;
		this.low = init.low;
		this.kind = init.kind;
		this.virtual = init.virtual;
	}

	public getId(): string {
		return this.id;
	}

	public getName(): string {
		return this.name;
	}

	public get(): string {
		return this.value;
	}

	public set(value: string, source: FieldChangeSource = 'device'): void {
		this.value = value;
		this.lastSource = source;
	}

	public getLastSource(): FieldChangeSource {
		return this.lastSource;
	}
}
