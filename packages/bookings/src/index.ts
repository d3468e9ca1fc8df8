/**
 * Slotwise Bookings
 *
 * Creates, reschedules, updates and cancels bookings with conflict detection
 * built on the store's atomic insert-if-absent.
 *
 * @packageDocumentation
 */

export { createBookings } from './manager.js';
export { canTransition } from './status.js';

export type {
	BookingManager,
	CreateBookingInput,
	CreateBookingsOptions,
	RescheduleInput,
	SlotRef,
	UpdateBookingInput,
} from './types.js';
