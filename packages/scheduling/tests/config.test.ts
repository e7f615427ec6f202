import { ZodError } from 'zod';
import { describe, expect, test } from 'vitest';
import { loadConfig, resolveConfig } from '../src/config.js';
import { createLogger } from '../src/logger.js';

describe('loadConfig', () => {
	test('applies defaults', () => {
		expect(loadConfig({})).toEqual({ logLevel: 'info', defaultTimezone: 'UTC' });
	});

	test('reads environment values', () => {
		expect(
			loadConfig({ SHIPSLOT_LOG_LEVEL: 'debug', SHIPSLOT_DEFAULT_TIMEZONE: 'Europe/Paris' }),
		).toEqual({ logLevel: 'debug', defaultTimezone: 'Europe/Paris' });
	});

	test('rejects unknown log levels', () => {
		expect(() => loadConfig({ SHIPSLOT_LOG_LEVEL: 'verbose' })).toThrow(ZodError);
	});

	test('rejects unknown time zones', () => {
		expect(() => loadConfig({ SHIPSLOT_DEFAULT_TIMEZONE: 'Mars/Olympus_Mons' })).toThrow(
			'unknown time zone',
		);
	});
});

describe('resolveConfig', () => {
	test('does not read variables an override replaces', () => {
		expect(
			resolveConfig(
				{ logLevel: 'warn', defaultTimezone: 'Europe/Paris' },
				{ SHIPSLOT_LOG_LEVEL: 'verbose', SHIPSLOT_DEFAULT_TIMEZONE: 'Mars/Olympus_Mons' },
			),
		).toEqual({ logLevel: 'warn', defaultTimezone: 'Europe/Paris' });
	});

	test('still rejects invalid variables that no override replaces', () => {
		expect(() => resolveConfig({ logLevel: 'warn' }, { SHIPSLOT_DEFAULT_TIMEZONE: 'Mars/Olympus_Mons' })).toThrow(
			'unknown time zone',
		);
	});

	test('lets explicit values win over the environment', () => {
		expect(
			resolveConfig({ logLevel: 'silent' }, { SHIPSLOT_LOG_LEVEL: 'debug', SHIPSLOT_DEFAULT_TIMEZONE: 'Asia/Tokyo' }),
		).toEqual({ logLevel: 'silent', defaultTimezone: 'Asia/Tokyo' });
	});
});

describe('createLogger', () => {
	test('uses the requested level', () => {
		expect(createLogger('warn').level).toBe('warn');
		expect(createLogger().level).toBe('info');
	});
});
