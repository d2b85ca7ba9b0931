// src/yeelight/capabilities.ts

import dgram from 'dgram';
import { readFileSync } from 'node:fs';

import { CapabilityError, describeError } from './errors.js';

export const CAPABILITY_PORT = 1982;
export const DEFAULT_CAPABILITY_TIMEOUT_MS = 2000;

export interface ModelSpec {
	colorTemp: { min: number; max: number };
	nightLight: boolean;
	backgroundLight: boolean;
}

/** Used whenever the bulb cannot tell us what it is. */
export const DEFAULT_MODEL_SPEC: ModelSpec = {
	colorTemp: { min: 1700, max: 6500 },
	nightLight: true,
	backgroundLight: false,
};

export type CapabilitySpec =
	| { source: 'discovered'; model: string; spec: ModelSpec }
	| { source: 'default'; spec: ModelSpec };

export function discoveredCapabilities(model: string, spec: ModelSpec): CapabilitySpec {
	return { source: 'discovered', model, spec };
}

export function defaultCapabilities(): CapabilitySpec {
	return {
		source: 'default',
		spec: {
			colorTemp: { ...DEFAULT_MODEL_SPEC.colorTemp },
			nightLight: DEFAULT_MODEL_SPEC.nightLight,
			backgroundLight: DEFAULT_MODEL_SPEC.backgroundLight,
		},
	};
}

const SEARCH_REQUEST = [
	'M-SEARCH * HTTP/1.1',
	'HOST: 239.255.255.250:1982',
	'MAN: "ssdp:discover"',
	'ST: wifi_bulb',
	'',
	'',
].join('\r\n');

/**
 * Parse the HTTP-style header block a bulb answers the search request with.
 * Header names are lower-cased; the status line is dropped.
 */
export function parseCapabilityReply(text: string): Record<string, string> {
	const headers: Record<string, string> = {};
	for (const rawLine of text.split(/\r?\n/)) {
		const idx = rawLine.indexOf(':');
		if (idx <= 0) {
			continue;
		}
		const key = rawLine.slice(0, idx).trim().toLowerCase();
		const value = rawLine.slice(idx + 1).trim();
		if (key.length > 0) {
			headers[key] = value;
		}
	}
	return headers;
}

/**
 * Ask one bulb, by unicast, for its capability headers (model, fw_ver,
 * support, ...). This is not network discovery: only the configured
 * address is queried.
 */
export function queryCapabilities(
	host: string,
	timeoutMs: number = DEFAULT_CAPABILITY_TIMEOUT_MS,
): Promise<Record<string, string>> {
	return new Promise((resolve, reject) => {
		const socket = dgram.createSocket('udp4');
		let settled = false;

		const finish = (err: Error | null, headers?: Record<string, string>) => {
			if (settled) {
				return;
			}
			settled = true;
			clearTimeout(timer);
			socket.close();
			if (err) {
				reject(err);
			} else {
				resolve(headers ?? {});
			}
		};

		const timer = setTimeout(() => {
			finish(new CapabilityError(`no capability reply from ${host} within ${timeoutMs}ms`));
		}, timeoutMs);

		socket.on('error', (err) => {
			finish(new CapabilityError(`capability query to ${host} failed: ${describeError(err)}`, { cause: err }));
		});

		socket.on('message', (msg) => {
			finish(null, parseCapabilityReply(msg.toString('utf8')));
		});

		socket.send(SEARCH_REQUEST, CAPABILITY_PORT, host, (err) => {
			if (err) {
				finish(new CapabilityError(`capability query to ${host} failed: ${describeError(err)}`, { cause: err }));
			}
		});
	});
}

function isModelSpec(value: unknown): value is ModelSpec {
	if (typeof value !== 'object' || value === null) {
		return false;
	}
	const record = value as Record<string, unknown>;
	const ct = record.colorTemp as Record<string, unknown> | undefined;
	return (
		typeof ct === 'object' &&
		ct !== null &&
		typeof ct.min === 'number' &&
		typeof ct.max === 'number' &&
		typeof record.nightLight === 'boolean' &&
		typeof record.backgroundLight === 'boolean'
	);
}

let modelSpecs: Map<string, ModelSpec> | null = null;

function loadModelSpecs(): Map<string, ModelSpec> {
	if (modelSpecs) {
		return modelSpecs;
	}
	const raw = readFileSync(new URL('../../data/model-specs.json', import.meta.url), 'utf8');
	const parsed = JSON.parse(raw) as Record<string, unknown>;

	const table = new Map<string, ModelSpec>();
	for (const [model, spec] of Object.entries(parsed)) {
		if (isModelSpec(spec)) {
			table.set(model, spec);
		}
	}
	modelSpecs = table;
	return table;
}

export function lookupModelSpec(model: string): ModelSpec | undefined {
	return loadModelSpecs().get(model.trim().toLowerCase());
}
