/**
 * Shipping Slots
 *
 * Recurring delivery and pickup slots with a per-occurrence capacity.
 * Expands a method's schedule, counts bookings per occurrence, and answers
 * the question: "Which slots can this customer still pick?"
 *
 * @packageDocumentation
 */

// Recurrence expansion
export {
	expandRecurrence,
	parseRecurrenceRule,
	recurrenceRuleSchema,
	validateRecurrenceRule,
	type RecurrenceBase,
} from './recurrence.js';
// Components
export { createCapacityTracker, type CapacityTracker } from './capacity.js';
export { createSlotAssignment, normalizeStartTime, type SlotAssignment } from './assignment.js';
export { createCalendarProjector, toFullCalendarEvent, type CalendarProjector } from './calendar.js';
// Adapter-based engine
export { createShippingSlots } from './engine.js';
export { createKeyedLock } from './lock.js';
export {
	createMemoryAdapter,
	createMemoryCart,
	createMemoryMethods,
	createMemoryStore,
	type MemoryStore,
} from './memory.js';
// Ambient
export { defaultConfig, loadConfig, resolveConfig } from './config.js';
export { createLogger, type Logger } from './logger.js';
export {
	ConfigMissingError,
	InvalidRecurrenceError,
	InvalidTimestampError,
	MethodNotFoundError,
	ShipmentNotFoundError,
	ShippingSlotError,
	SlotUnavailableError,
} from './errors.js';

// All types
export type {
	AssignOptions,
	CalendarEvent,
	CartContext,
	CreateShippingSlotsOptions,
	DateRange,
	DayOfWeek,
	ExpansionWindow,
	Interval,
	LocalTime,
	MethodLookup,
	Occurrence,
	Order,
	RecurrenceFrequency,
	RecurrenceRule,
	SerializedCalendarEvent,
	Shipment,
	ShippingMethod,
	ShippingSlotConfig,
	ShippingSlotsAdapter,
	ShippingSlotsConfig,
	ShippingSlotsEngine,
	Slot,
	SlotFactory,
	SlotLock,
	SlotStore,
	StartTimeInput,
} from './types.js';
