/**
 * Instant formatting and UTC normalization.
 *
 * Two Date objects describe the same instant when their formatted keys match.
 * Keys use the W3C date-time form at second precision, rendered in UTC.
 */

import { parseISO } from 'date-fns';
import { formatInTimeZone, fromZonedTime, getTimezoneOffset } from 'date-fns-tz';

/**
 * W3C date-time pattern (e.g. `2024-01-02T09:00:00Z`, `2024-01-02T10:00:00+01:00`).
 */
export const INSTANT_FORMAT = "yyyy-MM-dd'T'HH:mm:ssXXX";

const zoneSuffixPattern = /([Zz]|[+-]\d{2}:?\d{2})$/;

/**
 * Formats an instant in the given zone using the W3C pattern.
 */
export function formatInstant(date: Date, timezone = 'UTC'): string {
	return formatInTimeZone(date, timezone, INSTANT_FORMAT);
}

/**
 * Comparison key for an instant. Sub-second precision is dropped.
 *
 * @example
 * instantKey(new Date('2024-01-02T10:00:00+01:00')); // "2024-01-02T09:00:00Z"
 */
export function instantKey(date: Date): string {
	return formatInstant(date, 'UTC');
}

export function isSameInstant(a: Date, b: Date): boolean {
	return instantKey(a) === instantKey(b);
}

export function isValidTimezone(timezone: string): boolean {
	if (timezone.length === 0) {
		return false;
	}
	return !Number.isNaN(getTimezoneOffset(timezone));
}

/**
 * The YYYY-MM-DD calendar date of an instant as seen in a zone.
 */
export function localDateKey(date: Date, timezone: string): string {
	return formatInTimeZone(date, timezone, 'yyyy-MM-dd');
}

/**
 * Converts a wall-clock time (HH:MM) on a local calendar date to UTC.
 *
 * @param localDate - Calendar date in YYYY-MM-DD form
 * @param localTime - Time in HH:MM form
 */
export function localTimeToUtc(localDate: string, localTime: string, timezone: string): Date {
	return fromZonedTime(`${localDate}T${localTime}:00`, timezone);
}

/**
 * Normalizes a point in time to a UTC Date.
 *
 * - Date instances are copied.
 * - ISO strings carrying `Z` or an offset are parsed as that instant.
 * - ISO strings without an offset are wall-clock times in `timezone`.
 *
 * Unparseable input yields an invalid Date, as date-fns does.
 */
export function toUtc(value: Date | string, timezone = 'UTC'): Date {
	if (value instanceof Date) {
		return new Date(value.getTime());
	}

	const trimmed = value.trim();
	if (zoneSuffixPattern.test(trimmed)) {
		return parseISO(trimmed);
	}

	return fromZonedTime(trimmed, timezone);
}
