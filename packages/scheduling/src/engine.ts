/**
 * Shipping slot engine with adapter-based data loading.
 */

import { instantKey } from '@shipslot/core';
import { createSlotAssignment, normalizeStartTime } from './assignment.js';
import { createCalendarProjector } from './calendar.js';
import { createCapacityTracker } from './capacity.js';
import { resolveConfig } from './config.js';
import { SlotUnavailableError } from './errors.js';
import { createKeyedLock } from './lock.js';
import { createLogger } from './logger.js';
import type {
	AssignOptions,
	CartContext,
	CreateShippingSlotsOptions,
	ShippingSlotsEngine,
	Slot,
	StartTimeInput,
} from './types.js';

/**
 * Create a shipping slot engine with the given adapter.
 *
 * @example
 * const slots = createShippingSlots({ adapter: { methods, slots: store, factory: store } });
 * const events = await slots.buildCalendarEvents(cart, method, weekStart, weekEnd);
 */
export function createShippingSlots(options: CreateShippingSlotsOptions): ShippingSlotsEngine {
	const { adapter } = options;
	const config = resolveConfig(options.config);
	const logger = options.logger ?? createLogger(config.logLevel);
	const now = options.now ?? (() => new Date());
	const lock = adapter.lock ?? createKeyedLock();

	const assignment = createSlotAssignment({
		adapter,
		logger,
		defaultTimezone: config.defaultTimezone,
	});
	const capacity = createCapacityTracker({
		slots: adapter.slots,
		findCurrentSlot: assignment.findByMethod,
	});
	const calendar = createCalendarProjector({
		capacity,
		findCurrentSlot: assignment.findByMethod,
		logger,
		now,
	});

	/**
	 * Assigns the slot, then gives it back if that overbooked the occurrence.
	 *
	 * Assign-and-check runs under a lock keyed by method and instant, so two
	 * customers racing for the last spot cannot both keep it. A rejected
	 * booking leaves the shipment without a slot.
	 */
	async function bookSlot(
		cart: CartContext,
		methodCode: string,
		shipmentIndex: number,
		startTime: StartTimeInput,
		assignOptions: AssignOptions = {},
	): Promise<Slot> {
		const timestamp = normalizeStartTime(
			startTime,
			assignOptions.timezone ?? config.defaultTimezone,
		);
		const key = `${methodCode}@${instantKey(timestamp)}`;

		return lock.withLock(key, async () => {
			const slot = await assignment.assign(cart, methodCode, shipmentIndex, timestamp);
			if (await capacity.isFull(slot)) {
				await assignment.reset(cart, shipmentIndex);
				logger.info({ methodCode, shipmentIndex, timestamp: instantKey(timestamp) }, 'slot full');
				throw new SlotUnavailableError(methodCode, instantKey(timestamp));
			}
			return slot;
		});
	}

	return {
		assignSlot: assignment.assign,
		bookSlot,
		resetSlot: assignment.reset,
		getCurrentSlot: assignment.findByMethod,
		getFullOccurrences: (cart, method, from = null) =>
			capacity.findFullOccurrences(cart, method, from),
		isSlotFull: capacity.isFull,
		buildCalendarEvents: calendar.buildEvents,
	};
}
