/**
 * In-memory adapter.
 *
 * Keeps slot objects by reference, the way an ORM identity map does, and
 * remembers which method each slot was saved under so orphaned slots are
 * still returned by method queries.
 */

import { instantKey } from '@shipslot/core';
import type {
	CartContext,
	MethodLookup,
	Order,
	ShippingMethod,
	ShippingSlotsAdapter,
	Slot,
	SlotFactory,
	SlotStore,
} from './types.js';

interface StoredSlot {
	slot: Slot;
	methodCode: string;
}

export interface MemoryStore extends SlotStore, SlotFactory {
	/** Every stored slot, in insertion order */
	all: () => Slot[];
}

export function createMemoryStore(): MemoryStore {
	const records = new Map<string, StoredSlot>();
	let sequence = 0;

	function slotsOf(method: ShippingMethod): Slot[] {
		const result: Slot[] = [];
		for (const record of records.values()) {
			if (record.methodCode === method.code) {
				result.push(record.slot);
			}
		}
		return result;
	}

	return {
		newSlot() {
			return {
				timestamp: new Date(0),
				durationRange: 0,
				pickupDelay: 0,
				preparationDelay: 0,
				shipment: null,
			};
		},
		async findByMethodFromDate(method, fromDate) {
			return slotsOf(method).filter((slot) => fromDate === null || slot.timestamp >= fromDate);
		},
		async findByMethodAndTimestamp(method, timestamp) {
			const key = instantKey(timestamp);
			return slotsOf(method).filter((slot) => instantKey(slot.timestamp) === key);
		},
		async save(slot) {
			if (slot.id === undefined) {
				sequence++;
				slot.id = `slot-${sequence}`;
			}
			const existing = records.get(slot.id);
			const methodCode = slot.shipment?.method.code ?? existing?.methodCode;
			if (methodCode === undefined) {
				throw new Error(`Slot "${slot.id}" has no shipment to take a method from`);
			}
			records.set(slot.id, { slot, methodCode });
		},
		async delete(slot) {
			if (slot.id !== undefined) {
				records.delete(slot.id);
			}
		},
		all: () => Array.from(records.values(), (record) => record.slot),
	};
}

export function createMemoryMethods(methods: ShippingMethod[]): MethodLookup {
	const byCode = new Map(methods.map((method) => [method.code, method]));
	return {
		async findByCode(code) {
			return byCode.get(code) ?? null;
		},
	};
}

export function createMemoryCart(order: Order): CartContext {
	return {
		async getActiveOrder() {
			return order;
		},
	};
}

/**
 * Adapter over in-memory methods and a fresh memory store.
 */
export function createMemoryAdapter(
	methods: ShippingMethod[],
): ShippingSlotsAdapter & { store: MemoryStore } {
	const store = createMemoryStore();
	return {
		methods: createMemoryMethods(methods),
		slots: store,
		factory: store,
		store,
	};
}
