// src/yeelight/errors.ts

export type TransportFailure = 'connect' | 'timeout' | 'closed' | 'protocol' | 'device';

/**
 * Every failure of a bulb call surfaces as this one error kind,
 * whatever the socket or the bulb reported.
 */
export class TransportError extends Error {
	public readonly reason: TransportFailure;

	constructor(reason: TransportFailure, message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = 'TransportError';
		this.reason = reason;
	}
}

export class CapabilityError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = 'CapabilityError';
	}
}

export class FieldValueError extends Error {
	public readonly field: string;

	constructor(field: string, message: string) {
		super(message);
		this.name = 'FieldValueError';
		this.field = field;
	}
}

export function describeError(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}

/** Wrap whatever a bulb call threw so callers only ever see TransportError. */
export function asTransportError(err: unknown): TransportError {
	if (err instanceof TransportError) {
		return err;
	}
	return new TransportError('protocol', describeError(err), { cause: err });
}
