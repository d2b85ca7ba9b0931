// src/device/types.ts

export enum FieldKind {
	Binary = 'binary',
	Number = 'number',
}

export enum DeviceType {
	Light = 'light',
}

/** How the framework gets fresh data out of a device. */
export enum DeviceGetData {
	Pull = 'pull',
	Push = 'push',
}

/** Who caused the most recent change of a field value. */
export type FieldChangeSource = 'device' | 'user' | 'script';

export interface FieldInit {
	name: string;
	readOnly: boolean;
	high: string;
	low: string;
	kind: FieldKind;
	value: string;
	virtual: boolean;
}

/**
 * Static declaration a device class exposes to the type registry.
 * Nothing in the adapter logic reads it.
 */
export interface DeviceConfigSchema {
	classImg: string;
	fieldsCreation: boolean;
	initField: boolean;
	virtual: boolean;
	token: boolean;
	typeGetData: boolean;
	availableTypes: DeviceType[];
}

export interface DeviceSettings {
	name: string;
	address?: string;
	port?: number;
}
