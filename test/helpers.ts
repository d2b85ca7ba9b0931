// test/helpers.ts
import { vi } from 'vitest';
import type { Mock } from 'vitest';

import type { DeviceLogger } from '../src/device/logger.js';

export type MockLogger = { [K in keyof DeviceLogger]: Mock };

export function makeLogger(): MockLogger {
	return {
		debug: vi.fn(),
		info: vi.fn(),
		warn: vi.fn(),
		error: vi.fn(),
	};
}
