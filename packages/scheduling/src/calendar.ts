/**
 * Calendar feed projection.
 */

import { formatInstant, instantKey } from '@shipslot/core';
import type { Logger } from 'pino';
import type { CapacityTracker } from './capacity.js';
import { expandRecurrence } from './recurrence.js';
import type {
	CalendarEvent,
	CartContext,
	SerializedCalendarEvent,
	ShippingMethod,
	Slot,
} from './types.js';

export interface CalendarProjectorOptions {
	capacity: Pick<CapacityTracker, 'findFullOccurrences'>;
	findCurrentSlot: (cart: CartContext, method: ShippingMethod) => Promise<Slot | null>;
	logger: Logger;
	now: () => Date;
}

/**
 * Create the calendar projector.
 */
export function createCalendarProjector(options: CalendarProjectorOptions) {
	const { capacity, findCurrentSlot, logger, now } = options;

	/**
	 * Occurrences of the method's schedule in [start, end), minus full ones,
	 * in schedule order. The viewer's own occurrence is flagged `isCurrent`.
	 */
	async function buildEvents(
		cart: CartContext,
		method: ShippingMethod,
		start: Date,
		end: Date,
	): Promise<CalendarEvent[]> {
		const config = method.slotConfig;
		if (!config) {
			return [];
		}

		const occurrences = expandRecurrence(config.recurrence, { start, end }, now());
		const fullKeys = await capacity.findFullOccurrences(cart, method, start);
		const currentSlot = await findCurrentSlot(cart, method);
		const currentKey = currentSlot ? instantKey(currentSlot.timestamp) : null;

		const events: CalendarEvent[] = [];
		let skipped = 0;
		for (const occurrence of occurrences) {
			const key = instantKey(occurrence.start);
			if (fullKeys.has(key)) {
				skipped++;
				continue;
			}
			events.push({
				start: occurrence.start,
				end: occurrence.end,
				isCurrent: key === currentKey,
			});
		}

		logger.debug(
			{ methodCode: method.code, events: events.length, full: skipped },
			'calendar events built',
		);

		return events;
	}

	return {
		buildEvents,
	};
}

export type CalendarProjector = ReturnType<typeof createCalendarProjector>;

/**
 * Serializes an event with W3C timestamps in the given zone.
 *
 * @example
 * toFullCalendarEvent(event, 'Europe/Paris');
 * // { start: '2024-01-02T09:00:00+01:00', end: '2024-01-02T12:00:00+01:00', extendedProps: { isCurrent: false } }
 */
export function toFullCalendarEvent(event: CalendarEvent, timezone = 'UTC'): SerializedCalendarEvent {
	return {
		start: formatInstant(event.start, timezone),
		end: formatInstant(event.end, timezone),
		extendedProps: {
			isCurrent: event.isCurrent,
		},
	};
}
