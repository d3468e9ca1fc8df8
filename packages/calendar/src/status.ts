import type { BookingStatus } from './types.js';

export const BOOKING_STATUSES = ['PENDING', 'CONFIRMED', 'CANCELLED'] as const;

/**
 * Active bookings occupy their slot; cancelled ones do not.
 */
export function isActiveStatus(status: BookingStatus): boolean {
	return status === 'PENDING' || status === 'CONFIRMED';
}
