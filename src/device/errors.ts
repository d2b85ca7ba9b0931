// src/device/errors.ts

export class FieldNotFoundError extends Error {
	public readonly fieldId: string;

	constructor(fieldId: string) {
		super(`Field not found: ${fieldId}`);
		this.name = 'FieldNotFoundError';
		this.fieldId = fieldId;
	}
}
