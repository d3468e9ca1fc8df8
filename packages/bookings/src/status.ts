/**
 * Booking status lifecycle.
 *
 * PENDING -> CONFIRMED -> CANCELLED
 * PENDING -> CANCELLED
 *
 * CANCELLED is terminal for its date and time key.
 */

import type { BookingStatus } from '@slotwise/calendar';

const TRANSITIONS: Record<BookingStatus, readonly BookingStatus[]> = {
	PENDING: ['CONFIRMED', 'CANCELLED'],
	CONFIRMED: ['CANCELLED'],
	CANCELLED: [],
};

/**
 * Whether a booking may move from one status to another.
 * Keeping the same status is always allowed.
 */
export function canTransition(from: BookingStatus, to: BookingStatus): boolean {
	return from === to || TRANSITIONS[from].includes(to);
}
