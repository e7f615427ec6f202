/**
 * Time primitives shared by the shipslot packages.
 */

/**
 * A half-open interval [start, end).
 * All times are UTC internally.
 */
export interface Interval {
	start: Date;
	end: Date;
}

/**
 * Bounds of a query or expansion window.
 */
export interface DateRange {
	start: Date;
	end: Date;
}

export {
	INSTANT_FORMAT,
	formatInstant,
	instantKey,
	isSameInstant,
	isValidTimezone,
	localDateKey,
	localTimeToUtc,
	toUtc,
} from './time.js';
