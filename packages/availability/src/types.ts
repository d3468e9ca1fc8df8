/**
 * Availability engine type definitions.
 */

import type { Booking, CalendarRepository, DateOverride, GlobalSettings, RecurringRule } from '@slotwise/calendar';
import type { Clock, DateRange, IsoDate, Logger, SlotTime } from '@slotwise/core';

/**
 * Open slots on one date, ascending.
 *
 * @example
 * const day: DayAvailability = { date: '2024-03-15', slots: ['09:00', '10:00'] };
 */
export interface DayAvailability {
	date: IsoDate;
	slots: SlotTime[];
}

/**
 * Everything needed to compute availability for one provider.
 * Overrides and bookings outside the range are ignored.
 */
export interface ComputeAvailabilityInput {
	range: DateRange;
	settings: Pick<GlobalSettings, 'horizonDays' | 'minNoticeHours' | 'hardCutoffDate'>;
	rules: Pick<RecurringRule, 'dayOfMonth' | 'availableSlots'>[];
	overrides: Pick<DateOverride, 'date' | 'type' | 'overrideSlots'>[];
	bookings: Pick<Booking, 'date' | 'time' | 'status'>[];
	/** Also skip dates beyond today + horizonDays */
	enforceHorizon?: boolean;
}

export interface AvailabilityQueryOptions {
	/** Reference instant for the notice window; defaults to the engine clock */
	at?: Date;
}

export interface AvailabilityEngine {
	/**
	 * Open slots per day in the inclusive range.
	 *
	 * A slot held only by a CANCELLED booking is reported as open, but its key
	 * still exists, so createBooking or rescheduleBooking onto it fails with
	 * ConflictError.
	 */
	computeAvailability(
		providerId: string,
		startDate: string,
		endDate: string,
		options?: AvailabilityQueryOptions,
	): Promise<DayAvailability[]>;
}

export interface CreateAvailabilityOptions {
	repository: CalendarRepository;
	clock?: Clock;
	logger?: Logger;
	/** Skip dates beyond today + horizonDays; off by default */
	enforceHorizon?: boolean;
}
