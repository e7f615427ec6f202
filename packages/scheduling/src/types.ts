/**
 * Shipping Slot Type Definitions
 *
 * Plain data shapes for shipping methods, shipments and their booked slots,
 * plus the adapter contracts the scheduling components are written against.
 * All instants are UTC internally; wall-clock times only appear in recurrence
 * rules and in serialized calendar feeds.
 */

import type { DateRange, Interval } from '@shipslot/core';
import type { Logger } from 'pino';

export type { DateRange, Interval };

// ============================================================================
// Recurrence
// ============================================================================

/**
 * Days of the week used in recurrence rules.
 */
export type DayOfWeek =
	| 'monday'
	| 'tuesday'
	| 'wednesday'
	| 'thursday'
	| 'friday'
	| 'saturday'
	| 'sunday';

/**
 * A local time string in HH:MM format (24-hour).
 *
 * @example "09:00", "17:30"
 */
export type LocalTime = string;

/**
 * Recurrence frequency. `biweekly` is `weekly` with an interval of 2.
 */
export type RecurrenceFrequency = 'daily' | 'weekly' | 'biweekly' | 'monthly';

/**
 * A recurring pattern of slot occurrences.
 *
 * @example
 * // Tuesdays and Fridays, 09:00 to 12:00 Paris time
 * const rule: RecurrenceRule = {
 *   frequency: 'weekly',
 *   days: ['tuesday', 'friday'],
 *   startTime: '09:00',
 *   endTime: '12:00',
 *   timezone: 'Europe/Paris',
 *   start: new Date('2024-01-01T00:00:00Z'),
 * };
 */
export interface RecurrenceRule {
	frequency: RecurrenceFrequency;
	/** Repeat every N periods; defaults to 1 */
	interval?: number;
	/** Days of week (required for weekly/biweekly, optional filter for daily) */
	days?: DayOfWeek[];
	/** Day of month (required for monthly) */
	dayOfMonth?: number;
	startTime: LocalTime;
	endTime: LocalTime;
	/** IANA timezone identifier the local times are expressed in */
	timezone: string;
	/** Anchor of the pattern; no occurrence starts before it */
	start?: Date;
	/** Inclusive upper bound on occurrence starts */
	until?: Date;
	/** Maximum number of occurrences, counted from `start` */
	count?: number;
	/** Local dates to skip */
	exclude?: Date[];
}

/**
 * One concrete interval produced by expanding a recurrence rule.
 */
export type Occurrence = Interval;

/**
 * A window for expansion. Without `start`, the rule's own start is used.
 */
export interface ExpansionWindow {
	start?: Date;
	end: Date;
}

// ============================================================================
// Shipping Model
// ============================================================================

/**
 * Slot scheduling configuration attached to a shipping method.
 * Durations and delays are expressed in minutes.
 */
export interface ShippingSlotConfig {
	durationRange: number;
	pickupDelay: number;
	preparationDelay: number;
	/** Maximum bookings per occurrence */
	availableSpots: number;
	recurrence: RecurrenceRule;
	/** Zone used to render calendar feeds; defaults to the rule's zone */
	timezone?: string;
}

export interface ShippingMethod {
	code: string;
	name?: string;
	slotConfig: ShippingSlotConfig | null;
}

/**
 * A customer's booking of one occurrence for one shipment.
 * Delay and duration fields are snapshots taken at assignment time.
 */
export interface Slot {
	/** Assigned by the store on first save */
	id?: string;
	timestamp: Date;
	durationRange: number;
	pickupDelay: number;
	preparationDelay: number;
	/** null when orphaned; orphaned slots never count toward occupancy */
	shipment: Shipment | null;
}

export interface Shipment {
	id: string;
	method: ShippingMethod;
	slot: Slot | null;
}

export interface Order {
	id: string;
	shipments: Shipment[];
}

/**
 * A calendar entry for one available occurrence.
 */
export interface CalendarEvent {
	start: Date;
	end: Date;
	/** The viewer's current slot sits on this occurrence */
	isCurrent: boolean;
}

/**
 * Feed entry in the shape calendar widgets consume.
 */
export interface SerializedCalendarEvent {
	start: string;
	end: string;
	extendedProps: {
		isCurrent: boolean;
	};
}

// ============================================================================
// Adapter Types
// ============================================================================

/**
 * Resolves the order being checked out. Passed to every cart-aware operation.
 */
export interface CartContext {
	getActiveOrder: () => Promise<Order>;
}

export interface MethodLookup {
	findByCode: (code: string) => Promise<ShippingMethod | null>;
}

/**
 * Slot persistence. `save` must persist the slot together with its shipment
 * link, and `delete` must remove both sides of the link.
 */
export interface SlotStore {
	/** Slots of the method with timestamp >= fromDate, or all when fromDate is null */
	findByMethodFromDate: (method: ShippingMethod, fromDate: Date | null) => Promise<Slot[]>;
	findByMethodAndTimestamp: (method: ShippingMethod, timestamp: Date) => Promise<Slot[]>;
	save: (slot: Slot) => Promise<void>;
	delete: (slot: Slot) => Promise<void>;
}

export interface SlotFactory {
	newSlot: () => Slot;
}

/**
 * Serializes work per key. Stores shared between processes provide their own
 * implementation (an advisory lock, a reservation row).
 */
export interface SlotLock {
	withLock: <T>(key: string, fn: () => Promise<T>) => Promise<T>;
}

/**
 * Everything the scheduling components load data through.
 */
export interface ShippingSlotsAdapter {
	methods: MethodLookup;
	slots: SlotStore;
	factory: SlotFactory;
	lock?: SlotLock;
}

// ============================================================================
// Engine Types
// ============================================================================

export type StartTimeInput = Date | string;

export interface AssignOptions {
	/** Zone for start times given without an offset */
	timezone?: string;
}

export interface ShippingSlotsConfig {
	logLevel: 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';
	defaultTimezone: string;
}

export interface CreateShippingSlotsOptions {
	adapter: ShippingSlotsAdapter;
	logger?: Logger;
	config?: Partial<ShippingSlotsConfig>;
	/** Clock used when an expansion window has no start */
	now?: () => Date;
}

export interface ShippingSlotsEngine {
	assignSlot: (
		cart: CartContext,
		methodCode: string,
		shipmentIndex: number,
		startTime: StartTimeInput,
		options?: AssignOptions,
	) => Promise<Slot>;
	bookSlot: (
		cart: CartContext,
		methodCode: string,
		shipmentIndex: number,
		startTime: StartTimeInput,
		options?: AssignOptions,
	) => Promise<Slot>;
	resetSlot: (cart: CartContext, shipmentIndex: number) => Promise<void>;
	getCurrentSlot: (cart: CartContext, method: ShippingMethod) => Promise<Slot | null>;
	getFullOccurrences: (
		cart: CartContext,
		method: ShippingMethod,
		from?: Date | null,
	) => Promise<Set<string>>;
	isSlotFull: (slot: Slot) => Promise<boolean>;
	buildCalendarEvents: (
		cart: CartContext,
		method: ShippingMethod,
		start: Date,
		end: Date,
	) => Promise<CalendarEvent[]>;
}
