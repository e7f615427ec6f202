/**
 * Environment configuration.
 *
 * SHIPSLOT_LOG_LEVEL         pino level, or "silent" (default "info")
 * SHIPSLOT_DEFAULT_TIMEZONE  zone for start times given without an offset (default "UTC")
 */

import { isValidTimezone } from '@shipslot/core';
import { z } from 'zod';
import type { ShippingSlotsConfig } from './types.js';

const envSchema = z.object({
	SHIPSLOT_LOG_LEVEL: z
		.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
		.optional(),
	SHIPSLOT_DEFAULT_TIMEZONE: z.string().refine(isValidTimezone, 'unknown time zone').optional(),
});

export const defaultConfig: ShippingSlotsConfig = {
	logLevel: 'info',
	defaultTimezone: 'UTC',
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ShippingSlotsConfig {
	const parsed = envSchema.parse(env);
	return {
		logLevel: parsed.SHIPSLOT_LOG_LEVEL ?? defaultConfig.logLevel,
		defaultTimezone: parsed.SHIPSLOT_DEFAULT_TIMEZONE ?? defaultConfig.defaultTimezone,
	};
}

/**
 * Environment values with explicit overrides applied on top.
 * Variables an override replaces are not read.
 */
export function resolveConfig(
	overrides: Partial<ShippingSlotsConfig> = {},
	env: NodeJS.ProcessEnv = process.env,
): ShippingSlotsConfig {
	const base = loadConfig({
		SHIPSLOT_LOG_LEVEL: overrides.logLevel === undefined ? env.SHIPSLOT_LOG_LEVEL : undefined,
		SHIPSLOT_DEFAULT_TIMEZONE:
			overrides.defaultTimezone === undefined ? env.SHIPSLOT_DEFAULT_TIMEZONE : undefined,
	});
	return {
		logLevel: overrides.logLevel ?? base.logLevel,
		defaultTimezone: overrides.defaultTimezone ?? base.defaultTimezone,
	};
}
