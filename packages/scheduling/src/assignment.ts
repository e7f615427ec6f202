/**
 * Binding shipments to slot occurrences.
 */

import { instantKey, toUtc } from '@shipslot/core';
import type { Logger } from 'pino';
import {
	ConfigMissingError,
	InvalidTimestampError,
	MethodNotFoundError,
	ShipmentNotFoundError,
} from './errors.js';
import type {
	AssignOptions,
	CartContext,
	Shipment,
	ShippingMethod,
	ShippingSlotsAdapter,
	Slot,
	StartTimeInput,
} from './types.js';

/**
 * Normalizes a requested start time to a UTC Date.
 *
 * @param timezone - Zone for ISO strings that carry no offset
 * @throws InvalidTimestampError when the value is not a point in time
 */
export function normalizeStartTime(value: StartTimeInput, timezone: string): Date {
	const timestamp = toUtc(value, timezone);
	if (Number.isNaN(timestamp.getTime())) {
		throw new InvalidTimestampError(value instanceof Date ? 'Invalid Date' : value);
	}
	return timestamp;
}

export interface SlotAssignmentOptions {
	adapter: Pick<ShippingSlotsAdapter, 'methods' | 'slots' | 'factory'>;
	logger: Logger;
	defaultTimezone: string;
}

/**
 * Create the assign/reset/lookup operations over an adapter.
 */
export function createSlotAssignment(options: SlotAssignmentOptions) {
	const { adapter, logger, defaultTimezone } = options;
	const { methods, slots, factory } = adapter;

	async function resolveShipment(cart: CartContext, shipmentIndex: number): Promise<Shipment> {
		const order = await cart.getActiveOrder();
		const shipment = Number.isInteger(shipmentIndex) ? order.shipments[shipmentIndex] : undefined;
		if (!shipment) {
			throw new ShipmentNotFoundError(shipmentIndex);
		}
		return shipment;
	}

	/**
	 * Creates or overwrites the slot of a shipment.
	 *
	 * Duration and delays are copied from the method's configuration so later
	 * configuration edits leave existing bookings untouched.
	 */
	async function assign(
		cart: CartContext,
		methodCode: string,
		shipmentIndex: number,
		startTime: StartTimeInput,
		assignOptions: AssignOptions = {},
	): Promise<Slot> {
		const shipment = await resolveShipment(cart, shipmentIndex);

		const method = await methods.findByCode(methodCode);
		if (!method) {
			throw new MethodNotFoundError(methodCode);
		}

		const config = method.slotConfig;
		if (!config) {
			throw new ConfigMissingError(methodCode);
		}

		const timestamp = normalizeStartTime(startTime, assignOptions.timezone ?? defaultTimezone);

		const slot = shipment.slot ?? factory.newSlot();
		slot.shipment = shipment;
		slot.timestamp = timestamp;
		slot.durationRange = config.durationRange;
		slot.pickupDelay = config.pickupDelay;
		slot.preparationDelay = config.preparationDelay;

		await slots.save(slot);
		shipment.slot = slot;

		logger.debug(
			{ methodCode, shipmentIndex, timestamp: instantKey(timestamp), slotId: slot.id },
			'slot assigned',
		);

		return slot;
	}

	/**
	 * Removes the slot of a shipment. Shipments without a slot are left alone.
	 */
	async function reset(cart: CartContext, shipmentIndex: number): Promise<void> {
		const shipment = await resolveShipment(cart, shipmentIndex);

		const slot = shipment.slot;
		if (!slot) {
			return;
		}

		await slots.delete(slot);
		shipment.slot = null;

		logger.debug({ shipmentIndex, timestamp: instantKey(slot.timestamp), slotId: slot.id }, 'slot reset');
	}

	/**
	 * The slot of the first shipment in the active order using this method.
	 */
	async function findByMethod(cart: CartContext, method: ShippingMethod): Promise<Slot | null> {
		const order = await cart.getActiveOrder();
		for (const shipment of order.shipments) {
			if (shipment.method.code === method.code) {
				return shipment.slot;
			}
		}
		return null;
	}

	return {
		assign,
		reset,
		findByMethod,
	};
}

export type SlotAssignment = ReturnType<typeof createSlotAssignment>;
