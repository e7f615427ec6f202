/**
 * Recurrence expansion for shipping slot schedules.
 */

import { isValidTimezone, localDateKey, localTimeToUtc } from '@shipslot/core';
import { fromZonedTime } from 'date-fns-tz';
import { z } from 'zod';
import { InvalidRecurrenceError } from './errors.js';
import type { DateRange, DayOfWeek, ExpansionWindow, Occurrence, RecurrenceRule } from './types.js';

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Maps JavaScript's getUTCDay() values to DayOfWeek
 */
const NUMBER_TO_DAY: DayOfWeek[] = [
	'sunday',
	'monday',
	'tuesday',
	'wednesday',
	'thursday',
	'friday',
	'saturday',
];

const RRULE_DAYS: Record<string, DayOfWeek> = {
	MO: 'monday',
	TU: 'tuesday',
	WE: 'wednesday',
	TH: 'thursday',
	FR: 'friday',
	SA: 'saturday',
	SU: 'sunday',
};

const localTimePattern = /^([01]\d|2[0-3]):[0-5]\d$/;

// ============================================================================
// Validation
// ============================================================================

const dayOfWeekSchema = z.enum([
	'monday',
	'tuesday',
	'wednesday',
	'thursday',
	'friday',
	'saturday',
	'sunday',
]);

export const recurrenceRuleSchema = z
	.object({
		frequency: z.enum(['daily', 'weekly', 'biweekly', 'monthly']),
		interval: z.number().int().positive().optional(),
		days: z.array(dayOfWeekSchema).optional(),
		dayOfMonth: z.number().int().min(1).max(31).optional(),
		startTime: z.string().regex(localTimePattern, 'expected HH:MM'),
		endTime: z.string().regex(localTimePattern, 'expected HH:MM'),
		timezone: z.string().refine(isValidTimezone, 'unknown time zone'),
		start: z.date().optional(),
		until: z.date().optional(),
		count: z.number().int().nonnegative().optional(),
		exclude: z.array(z.date()).optional(),
	})
	.superRefine((rule, ctx) => {
		const weekly = rule.frequency === 'weekly' || rule.frequency === 'biweekly';
		if (weekly && (!rule.days || rule.days.length === 0)) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				path: ['days'],
				message: 'weekly rules need at least one day',
			});
		}
		if (rule.frequency === 'monthly' && rule.dayOfMonth === undefined) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				path: ['dayOfMonth'],
				message: 'monthly rules need a day of month',
			});
		}
		// HH:MM strings order lexically
		if (rule.endTime <= rule.startTime) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				path: ['endTime'],
				message: 'must be after startTime',
			});
		}
	});

function formatIssues(error: z.ZodError): string[] {
	return error.issues.map((issue) =>
		issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
	);
}

/**
 * Throws InvalidRecurrenceError when the rule cannot be expanded.
 */
export function validateRecurrenceRule(rule: RecurrenceRule): void {
	const result = recurrenceRuleSchema.safeParse(rule);
	if (!result.success) {
		const issues = formatIssues(result.error);
		throw new InvalidRecurrenceError(`Invalid recurrence rule: ${issues.join('; ')}`, issues);
	}
}

// ============================================================================
// Local calendar arithmetic
// ============================================================================

/**
 * A calendar date in the rule's zone, with counters used for interval checks.
 */
interface LocalDay {
	key: string;
	weekday: DayOfWeek;
	dayOfMonth: number;
	/** Days since 1970-01-01 */
	dayNumber: number;
	/** Monday-based weeks since the week of 1970-01-01 */
	weekNumber: number;
	/** Months since 0000-01 */
	monthNumber: number;
}

function describeLocalDay(key: string): LocalDay {
	const [year, month, day] = key.split('-').map(Number);
	const utc = Date.UTC(year, month - 1, day);
	const dayNumber = Math.round(utc / DAY_MS);
	return {
		key,
		weekday: NUMBER_TO_DAY[new Date(utc).getUTCDay()],
		dayOfMonth: day,
		dayNumber,
		// 1970-01-01 was a Thursday
		weekNumber: Math.floor((dayNumber + 3) / 7),
		monthNumber: year * 12 + (month - 1),
	};
}

function nextDayKey(key: string): string {
	const [year, month, day] = key.split('-').map(Number);
	return new Date(Date.UTC(year, month - 1, day + 1)).toISOString().slice(0, 10);
}

function isMultipleOf(difference: number, interval: number): boolean {
	return ((difference % interval) + interval) % interval === 0;
}

function effectiveInterval(rule: RecurrenceRule): number {
	const interval = rule.interval ?? 1;
	return rule.frequency === 'biweekly' ? interval * 2 : interval;
}

function matchesRule(rule: RecurrenceRule, day: LocalDay, anchor: LocalDay, interval: number): boolean {
	switch (rule.frequency) {
		case 'daily':
			return (
				(!rule.days || rule.days.includes(day.weekday)) &&
				isMultipleOf(day.dayNumber - anchor.dayNumber, interval)
			);

		case 'weekly':
		case 'biweekly':
			return (
				(rule.days?.includes(day.weekday) ?? false) &&
				isMultipleOf(day.weekNumber - anchor.weekNumber, interval)
			);

		case 'monthly':
			return (
				rule.dayOfMonth === day.dayOfMonth &&
				isMultipleOf(day.monthNumber - anchor.monthNumber, interval)
			);
	}
}

// ============================================================================
// Expansion
// ============================================================================

function* generateOccurrences(rule: RecurrenceRule, range: DateRange): Generator<Occurrence> {
	const { timezone } = rule;
	const interval = effectiveInterval(rule);
	const anchorInstant = rule.start ?? range.start;
	const anchor = describeLocalDay(localDateKey(anchorInstant, timezone));
	const maxCount = rule.count ?? Infinity;
	const excluded = new Set((rule.exclude ?? []).map((date) => localDateKey(date, timezone)));

	// COUNT is measured from the anchor, so counting starts there even when the
	// window opens later. Otherwise start one local day early: a local day can
	// begin before the UTC day boundary.
	let iterationStart: Date;
	if (rule.count !== undefined) {
		iterationStart = anchorInstant;
	} else {
		const from = rule.start && rule.start > range.start ? rule.start : range.start;
		iterationStart = new Date(from.getTime() - DAY_MS);
	}

	let lastKey = localDateKey(new Date(range.end.getTime() + DAY_MS), timezone);
	if (rule.until) {
		const untilKey = localDateKey(rule.until, timezone);
		if (untilKey < lastKey) {
			lastKey = untilKey;
		}
	}

	let emitted = 0;
	for (
		let key = localDateKey(iterationStart, timezone);
		key <= lastKey && emitted < maxCount;
		key = nextDayKey(key)
	) {
		const day = describeLocalDay(key);
		if (!matchesRule(rule, day, anchor, interval)) {
			continue;
		}

		const start = localTimeToUtc(key, rule.startTime, timezone);
		if (rule.start && start < rule.start) {
			continue;
		}
		if (rule.until && start > rule.until) {
			return;
		}
		// Without a rule start, COUNT is measured from the window start
		if (!rule.start && start < range.start) {
			continue;
		}

		// Excluded dates still consume COUNT
		emitted++;
		if (start >= range.end) {
			return;
		}
		if (start >= range.start && !excluded.has(key)) {
			yield { start, end: localTimeToUtc(key, rule.endTime, timezone) };
		}
	}
}

/**
 * Expands a recurrence rule into the occurrences whose start falls inside the
 * window: `window.start <= start < window.end`.
 *
 * The result is lazy and restartable: every iteration re-runs the expansion.
 * Without `window.start`, the rule's own `start` is used, then `now`.
 *
 * @throws InvalidRecurrenceError when the rule is malformed
 *
 * @example
 * const rule: RecurrenceRule = {
 *   frequency: 'weekly',
 *   days: ['tuesday'],
 *   startTime: '09:00',
 *   endTime: '12:00',
 *   timezone: 'UTC',
 * };
 * const occurrences = [...expandRecurrence(rule, { start: rangeStart, end: rangeEnd })];
 */
export function expandRecurrence(
	rule: RecurrenceRule,
	window: ExpansionWindow,
	now: Date = new Date(),
): Iterable<Occurrence> {
	validateRecurrenceRule(rule);

	const range: DateRange = {
		start: window.start ?? rule.start ?? now,
		end: window.end,
	};

	return {
		[Symbol.iterator]: () => generateOccurrences(rule, range),
	};
}

// ============================================================================
// RRULE parsing
// ============================================================================

const rruleFieldsSchema = z
	.object({
		FREQ: z.enum(['DAILY', 'WEEKLY', 'MONTHLY']),
		INTERVAL: z.coerce.number().int().positive().optional(),
		BYDAY: z
			.string()
			.regex(/^(MO|TU|WE|TH|FR|SA|SU)(,(MO|TU|WE|TH|FR|SA|SU))*$/, 'expected weekday codes')
			.optional(),
		BYMONTHDAY: z.coerce.number().int().min(1).max(31).optional(),
		UNTIL: z
			.string()
			.regex(/^\d{8}(T\d{6}Z?)?$/, 'expected YYYYMMDD or YYYYMMDDTHHMMSSZ')
			.optional(),
		COUNT: z.coerce.number().int().nonnegative().optional(),
		WKST: z.literal('MO').optional(),
	})
	.strict();

/**
 * Local times, zone and anchor an RRULE string does not carry.
 */
export type RecurrenceBase = Pick<RecurrenceRule, 'startTime' | 'endTime' | 'timezone'> &
	Pick<RecurrenceRule, 'start' | 'exclude'>;

function parseUntil(value: string, timezone: string): Date {
	const date = `${value.slice(0, 4)}-${value.slice(4, 6)}-${value.slice(6, 8)}`;
	if (value.length === 8) {
		// A date-only UNTIL includes that whole local day
		return localTimeToUtc(date, '23:59', timezone);
	}
	const time = `${value.slice(9, 11)}:${value.slice(11, 13)}:${value.slice(13, 15)}`;
	if (value.endsWith('Z')) {
		return new Date(`${date}T${time}Z`);
	}
	return fromZonedTime(`${date}T${time}`, timezone);
}

/**
 * Parses an iCalendar RRULE (`FREQ`, `INTERVAL`, `BYDAY`, `BYMONTHDAY`,
 * `UNTIL`, `COUNT`) into a RecurrenceRule.
 *
 * @throws InvalidRecurrenceError for unsupported or malformed parts
 *
 * @example
 * parseRecurrenceRule('FREQ=WEEKLY;BYDAY=TU,FR', {
 *   startTime: '09:00',
 *   endTime: '12:00',
 *   timezone: 'Europe/Paris',
 * });
 */
export function parseRecurrenceRule(rrule: string, base: RecurrenceBase): RecurrenceRule {
	const body = rrule.trim().replace(/^RRULE:/i, '');
	const fields: Record<string, string> = {};
	for (const part of body.split(';')) {
		if (part.length === 0) {
			continue;
		}
		const [name, value] = part.split('=');
		if (!name || value === undefined) {
			throw new InvalidRecurrenceError(`Invalid RRULE part "${part}"`);
		}
		fields[name.toUpperCase()] = value.toUpperCase();
	}

	const parsed = rruleFieldsSchema.safeParse(fields);
	if (!parsed.success) {
		const issues = formatIssues(parsed.error);
		throw new InvalidRecurrenceError(`Invalid RRULE: ${issues.join('; ')}`, issues);
	}

	const { FREQ, INTERVAL, BYDAY, BYMONTHDAY, UNTIL, COUNT } = parsed.data;
	const rule: RecurrenceRule = {
		frequency: FREQ === 'DAILY' ? 'daily' : FREQ === 'WEEKLY' ? 'weekly' : 'monthly',
		startTime: base.startTime,
		endTime: base.endTime,
		timezone: base.timezone,
	};

	if (INTERVAL !== undefined) rule.interval = INTERVAL;
	if (BYDAY !== undefined) rule.days = BYDAY.split(',').map((code) => RRULE_DAYS[code]);
	if (BYMONTHDAY !== undefined) rule.dayOfMonth = BYMONTHDAY;
	if (COUNT !== undefined) rule.count = COUNT;
	if (base.start) rule.start = base.start;
	if (base.exclude) rule.exclude = base.exclude;

	if (UNTIL !== undefined) {
		rule.until = parseUntil(UNTIL, base.timezone);
	}
	validateRecurrenceRule(rule);

	return rule;
}
