/**
 * Errors raised by slot operations. Each carries a stable `code` and the
 * HTTP status a transport layer should answer with.
 */

export class ShippingSlotError extends Error {
	public statusCode = 500;
	public code = 'SHIPPING_SLOT_ERROR';

	constructor(message: string) {
		super(message);
		this.name = 'ShippingSlotError';
	}
}

export class ShipmentNotFoundError extends ShippingSlotError {
	public statusCode = 404;
	public code = 'SHIPMENT_NOT_FOUND';
	public shipmentIndex: number;

	constructor(shipmentIndex: number) {
		super(`Cannot find shipment index "${shipmentIndex}"`);
		this.name = 'ShipmentNotFoundError';
		this.shipmentIndex = shipmentIndex;
	}
}

export class MethodNotFoundError extends ShippingSlotError {
	public statusCode = 404;
	public code = 'METHOD_NOT_FOUND';
	public methodCode: string;

	constructor(methodCode: string) {
		super(`Cannot find shipping method "${methodCode}"`);
		this.name = 'MethodNotFoundError';
		this.methodCode = methodCode;
	}
}

export class ConfigMissingError extends ShippingSlotError {
	public statusCode = 422;
	public code = 'CONFIG_MISSING';
	public methodCode: string;

	constructor(methodCode: string) {
		super(`Cannot find slot configuration for shipping method "${methodCode}"`);
		this.name = 'ConfigMissingError';
		this.methodCode = methodCode;
	}
}

export class SlotUnavailableError extends ShippingSlotError {
	public statusCode = 409;
	public code = 'SLOT_UNAVAILABLE';
	public methodCode: string;
	public timestamp: string;

	constructor(methodCode: string, timestamp: string) {
		super(`Slot "${timestamp}" of shipping method "${methodCode}" is full`);
		this.name = 'SlotUnavailableError';
		this.methodCode = methodCode;
		this.timestamp = timestamp;
	}
}

export class InvalidRecurrenceError extends ShippingSlotError {
	public statusCode = 400;
	public code = 'INVALID_RECURRENCE';
	public issues: string[];

	constructor(message: string, issues: string[] = []) {
		super(message);
		this.name = 'InvalidRecurrenceError';
		this.issues = issues;
	}
}

export class InvalidTimestampError extends ShippingSlotError {
	public statusCode = 400;
	public code = 'INVALID_TIMESTAMP';

	constructor(value: string) {
		super(`Cannot read "${value}" as a point in time`);
		this.name = 'InvalidTimestampError';
	}
}
