/**
 * Structured logging.
 */

import { pino, type Logger } from 'pino';
import type { ShippingSlotsConfig } from './types.js';

export type { Logger };

export function createLogger(level: ShippingSlotsConfig['logLevel'] = 'info'): Logger {
	return pino({
		name: 'shipslot',
		level,
		base: null,
	});
}
