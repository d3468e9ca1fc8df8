/**
 * Partition and sort key layout.
 *
 * PK  PROVIDER#{providerId}
 * SK  SETTINGS#GLOBAL
 *     RULE#DOM#{dd}
 *     DATE#{YYYY-MM-DD}
 *     BOOKING#{YYYY-MM-DD}#T{HHMM}
 */

import { fromSlotKey, toSlotKey, type IsoDate, type SlotTime } from '@slotwise/core';

export const SETTINGS_KEY = 'SETTINGS#GLOBAL';
export const RULE_PREFIX = 'RULE#DOM#';
export const OVERRIDE_PREFIX = 'DATE#';
export const BOOKING_PREFIX = 'BOOKING#';

const BOOKING_KEY_PATTERN = /^BOOKING#(\d{4}-\d{2}-\d{2})#T((?:[01]\d|2[0-3])[0-5]\d)$/;

export function partitionKey(providerId: string): string {
	return `PROVIDER#${providerId}`;
}

export function ruleKey(dayOfMonth: number): string {
	return `${RULE_PREFIX}${String(dayOfMonth).padStart(2, '0')}`;
}

export function overrideKey(date: IsoDate): string {
	return `${OVERRIDE_PREFIX}${date}`;
}

export function bookingKey(date: IsoDate, time: string): string {
	return `${BOOKING_PREFIX}${date}#T${toSlotKey(time)}`;
}

/**
 * Prefix matching every booking on one date.
 */
export function bookingDatePrefix(date: IsoDate): string {
	return `${BOOKING_PREFIX}${date}#`;
}

/**
 * Inclusive sort-key bounds covering every booking in a date range.
 */
export function bookingRangeKeys(startDate: IsoDate, endDate: IsoDate): [string, string] {
	return [`${BOOKING_PREFIX}${startDate}#T0000`, `${BOOKING_PREFIX}${endDate}#T2359`];
}

/**
 * Recovers the date and time from a booking sort key.
 * Returns undefined for anything that is not a well-formed booking key.
 */
export function parseBookingKey(sk: string): { date: IsoDate; time: SlotTime } | undefined {
	const match = BOOKING_KEY_PATTERN.exec(sk);
	if (!match) {
		return undefined;
	}
	return { date: match[1], time: fromSlotKey(match[2]) };
}
