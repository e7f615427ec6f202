/**
 * Capacity tracking for slot occurrences.
 *
 * Two views of the same rule, "bookings by others >= spots means no room":
 *
 * - findFullOccurrences removes the viewer's own slot before counting, so an
 *   occurrence is full once its count reaches availableSpots.
 * - isFull tests one slot against every booking at its timestamp, the tested
 *   slot included, so it only reports full once the count exceeds
 *   availableSpots.
 */

import { instantKey } from '@shipslot/core';
import type { CartContext, ShippingMethod, Slot, SlotStore } from './types.js';

export interface CapacityTrackerOptions {
	slots: SlotStore;
	findCurrentSlot: (cart: CartContext, method: ShippingMethod) => Promise<Slot | null>;
}

function isSameSlot(slot: Slot, other: Slot | null): boolean {
	if (other === null) {
		return false;
	}
	if (slot.id !== undefined && other.id !== undefined) {
		return slot.id === other.id;
	}
	return slot === other;
}

/**
 * Create capacity queries over a slot store.
 */
export function createCapacityTracker(options: CapacityTrackerOptions) {
	const { slots, findCurrentSlot } = options;

	/**
	 * Bookings per instant key from `from` onward (all when null), leaving out
	 * orphaned slots and the viewer's own slot for the method.
	 */
	async function countOccupiedTimestamps(
		cart: CartContext,
		method: ShippingMethod,
		from: Date | null = null,
	): Promise<Map<string, number>> {
		const currentSlot = await findCurrentSlot(cart, method);
		const booked = await slots.findByMethodFromDate(method, from);

		const counts = new Map<string, number>();
		for (const slot of booked) {
			if (slot.shipment === null || isSameSlot(slot, currentSlot)) {
				continue;
			}
			const key = instantKey(slot.timestamp);
			counts.set(key, (counts.get(key) ?? 0) + 1);
		}

		return counts;
	}

	/**
	 * Instant keys of occurrences with no room left for the viewer.
	 * Methods without a slot configuration have none.
	 */
	async function findFullOccurrences(
		cart: CartContext,
		method: ShippingMethod,
		from: Date | null = null,
	): Promise<Set<string>> {
		const config = method.slotConfig;
		if (!config) {
			return new Set();
		}

		const counts = await countOccupiedTimestamps(cart, method, from);
		const full = new Set<string>();
		for (const [key, count] of counts) {
			if (count >= config.availableSpots) {
				full.add(key);
			}
		}

		return full;
	}

	/**
	 * Whether the bookings at this slot's timestamp exceed capacity.
	 * Orphaned slots and slots of unconfigured methods are never full.
	 */
	async function isFull(slot: Slot): Promise<boolean> {
		const shipment = slot.shipment;
		if (shipment === null) {
			return false;
		}

		const method = shipment.method;
		const config = method.slotConfig;
		if (!config) {
			return false;
		}

		const booked = await slots.findByMethodAndTimestamp(method, slot.timestamp);
		const count = booked.filter((other) => other.shipment !== null).length;

		// Not >= : the tested slot is one of the bookings
		return count > config.availableSpots;
	}

	return {
		countOccupiedTimestamps,
		findFullOccurrences,
		isFull,
	};
}

export type CapacityTracker = ReturnType<typeof createCapacityTracker>;
