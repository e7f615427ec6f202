import { pino } from 'pino';
import type { MemoryStore } from '../src/memory.js';
import type {
	Order,
	RecurrenceRule,
	Shipment,
	ShippingMethod,
	ShippingSlotConfig,
	Slot,
} from '../src/types.js';

export const d = (iso: string) => new Date(iso);

export const silentLogger = pino({ level: 'silent' });

/**
 * Tuesdays 09:00 to 12:00 UTC from Monday 2024-01-01.
 */
export function tuesdayRule(overrides: Partial<RecurrenceRule> = {}): RecurrenceRule {
	return {
		frequency: 'weekly',
		days: ['tuesday'],
		startTime: '09:00',
		endTime: '12:00',
		timezone: 'UTC',
		start: d('2024-01-01T00:00:00Z'),
		...overrides,
	};
}

export function slotConfig(overrides: Partial<ShippingSlotConfig> = {}): ShippingSlotConfig {
	return {
		durationRange: 180,
		pickupDelay: 30,
		preparationDelay: 120,
		availableSpots: 1,
		recurrence: tuesdayRule(),
		...overrides,
	};
}

export function shippingMethod(
	code: string,
	config: ShippingSlotConfig | null = slotConfig(),
): ShippingMethod {
	return { code, name: code, slotConfig: config };
}

export function order(id: string, methods: ShippingMethod[]): Order {
	return {
		id,
		shipments: methods.map((method, index) => ({ id: `${id}-shipment-${index}`, method, slot: null })),
	};
}

let otherSequence = 0;

/**
 * Saves bookings made by other customers at the given instant.
 */
export async function bookOthers(
	store: MemoryStore,
	method: ShippingMethod,
	iso: string,
	count = 1,
): Promise<Slot[]> {
	const booked: Slot[] = [];
	for (let i = 0; i < count; i++) {
		otherSequence++;
		const shipment: Shipment = { id: `other-${otherSequence}`, method, slot: null };
		const slot: Slot = {
			timestamp: d(iso),
			durationRange: 180,
			pickupDelay: 30,
			preparationDelay: 120,
			shipment,
		};
		await store.save(slot);
		shipment.slot = slot;
		booked.push(slot);
	}
	return booked;
}
