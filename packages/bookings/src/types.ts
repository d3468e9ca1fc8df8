/**
 * Booking transaction manager type definitions.
 */

import type { AppointmentDetails, Booking, BookingStatus, CalendarRepository } from '@slotwise/calendar';
import type { Logger } from '@slotwise/core';

/**
 * Identifies one slot of a provider's calendar.
 * `time` may be given as HH:MM or HHMM.
 */
export interface SlotRef {
	date: string;
	time: string;
}

export interface CreateBookingInput extends SlotRef {
	clientIdentifier: string;
	details?: AppointmentDetails;
	/** Defaults to PENDING */
	status?: BookingStatus;
}

export interface RescheduleInput {
	from: SlotRef;
	to: SlotRef;
}

export interface UpdateBookingInput {
	status?: BookingStatus;
	details?: AppointmentDetails;
}

export interface BookingManager {
	/**
	 * Reserve a slot. Fails with ConflictError when any booking row,
	 * including a cancelled one, already exists at the key.
	 */
	createBooking(providerId: string, input: CreateBookingInput): Promise<Booking>;
	getBooking(providerId: string, slot: SlotRef): Promise<Booking | undefined>;
	listBookings(providerId: string, startDate: string, endDate: string): Promise<Booking[]>;
	/**
	 * Move an active booking to another slot, carrying over its client,
	 * details, status and createdAt.
	 */
	rescheduleBooking(providerId: string, input: RescheduleInput): Promise<Booking>;
	/**
	 * Soft delete. Resolves undefined when nothing exists at the key.
	 */
	cancelBooking(providerId: string, slot: SlotRef): Promise<Booking | undefined>;
	/**
	 * Read-modify-write without a version check; the last writer wins.
	 */
	updateBooking(providerId: string, slot: SlotRef, input: UpdateBookingInput): Promise<Booking>;
}

export interface CreateBookingsOptions {
	repository: CalendarRepository;
	logger?: Logger;
}
