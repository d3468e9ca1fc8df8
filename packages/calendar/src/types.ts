/**
 * Calendar entity types.
 * Every entity belongs to one provider, the owner of the calendar.
 */

import type { IsoDate, JsonValue, SlotTime } from '@slotwise/core';

/**
 * Booking-window settings. One per provider, created on first access.
 */
export interface GlobalSettings {
	providerId: string;
	/** How many days ahead bookings are allowed */
	horizonDays: number;
	/** Minimum lead time, in hours, before a slot is offered */
	minNoticeHours: number;
	/** No slots are offered after this date */
	hardCutoffDate: IsoDate | null;
	createdAt: string;
	updatedAt: string;
}

export interface SettingsInput {
	horizonDays: number;
	minNoticeHours: number;
	hardCutoffDate?: IsoDate | null;
}

/**
 * Partial settings update. `hardCutoffDate: null` clears the cutoff.
 */
export type SettingsPatch = Partial<SettingsInput>;

/**
 * Slots offered on every calendar day with this day of month.
 */
export interface RecurringRule {
	providerId: string;
	/** 1-31 */
	dayOfMonth: number;
	availableSlots: SlotTime[];
	createdAt: string;
	updatedAt: string;
}

/**
 * BLOCKED removes all availability for the date.
 * MODIFIED replaces the rule-derived slots with `overrideSlots`.
 */
export type OverrideType = 'BLOCKED' | 'MODIFIED';

export interface DateOverride {
	providerId: string;
	date: IsoDate;
	type: OverrideType;
	overrideSlots: SlotTime[];
	createdAt: string;
	updatedAt: string;
}

export type BookingStatus = 'PENDING' | 'CONFIRMED' | 'CANCELLED';

export type AppointmentDetails = Record<string, JsonValue>;

/**
 * A reservation of one slot. The provider, date and time form its key.
 * Cancelled bookings stay behind as tombstones.
 */
export interface Booking {
	providerId: string;
	date: IsoDate;
	time: SlotTime;
	/** Who booked, e.g. a mobile number */
	clientIdentifier: string;
	status: BookingStatus;
	appointmentDetails: AppointmentDetails;
	createdAt: string;
	updatedAt: string;
}

export interface PutBookingInput {
	date: IsoDate;
	time: string;
	clientIdentifier: string;
	status: BookingStatus;
	appointmentDetails: AppointmentDetails;
	/** Carried over when a booking moves to a new key */
	createdAt?: string;
}

/**
 * `must-not-exist` maps to the store's atomic insert-if-absent.
 */
export type BookingWriteCondition = 'must-not-exist' | 'none';
