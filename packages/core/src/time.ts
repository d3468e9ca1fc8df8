/**
 * Date and slot normalization on the UTC civil calendar.
 */

import { addHours, isValid } from 'date-fns';
import { formatInTimeZone, fromZonedTime } from 'date-fns-tz';
import { ValidationError } from './errors.js';
import type { DateRange, IsoDate, SlotKey, SlotTime } from './types.js';

const UTC = 'UTC';

const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/** Accepts "0930", "09:30" */
const SLOT_PATTERN = /^(\d{2}):?(\d{2})$/;

// ============================================================================
// Slots
// ============================================================================

/**
 * Normalizes a time of day to HH:MM.
 *
 * @example
 * normalizeSlot('0930');   // "09:30"
 * normalizeSlot(' 9:30 '); // throws ValidationError
 */
export function normalizeSlot(input: string): SlotTime {
	const match = SLOT_PATTERN.exec(input.trim());
	if (!match) {
		throw new ValidationError(`Invalid time "${input}": expected HH:MM or HHMM`);
	}

	const [, hours, minutes] = match;
	if (Number(hours) > 23 || Number(minutes) > 59) {
		throw new ValidationError(`Invalid time "${input}": out of range`);
	}

	return `${hours}:${minutes}`;
}

/**
 * Converts a time of day to the four-digit form used in sort keys.
 */
export function toSlotKey(input: string): SlotKey {
	return normalizeSlot(input).replace(':', '');
}

/**
 * Converts a four-digit sort-key time back to HH:MM.
 */
export function fromSlotKey(key: SlotKey): SlotTime {
	return normalizeSlot(key);
}

/**
 * Normalizes, de-duplicates and sorts a list of times.
 * HH:MM strings sort lexicographically in chronological order.
 */
export function normalizeSlots(inputs: readonly string[]): SlotTime[] {
	const unique = new Set(inputs.map(normalizeSlot));
	return Array.from(unique).sort();
}

// ============================================================================
// Dates
// ============================================================================

/**
 * Validates a YYYY-MM-DD string as a real calendar date.
 */
export function parseIsoDate(input: string): IsoDate {
	if (!ISO_DATE_PATTERN.test(input)) {
		throw new ValidationError(`Invalid date "${input}": expected YYYY-MM-DD`);
	}

	const instant = fromZonedTime(`${input}T00:00:00`, UTC);
	// Rejects dates that roll over, e.g. 2024-02-30
	if (!isValid(instant) || formatUtcDate(instant) !== input) {
		throw new ValidationError(`Invalid date "${input}": not a calendar date`);
	}

	return input;
}

/**
 * Validates both ends of an inclusive date range.
 */
export function parseDateRange(startDate: string, endDate: string): DateRange {
	const range = { startDate: parseIsoDate(startDate), endDate: parseIsoDate(endDate) };
	if (range.endDate < range.startDate) {
		throw new ValidationError(`Invalid range: ${endDate} is before ${startDate}`);
	}
	return range;
}

/**
 * Formats an instant as its UTC calendar date.
 */
export function formatUtcDate(instant: Date): IsoDate {
	return formatInTimeZone(instant, UTC, 'yyyy-MM-dd');
}

/**
 * Shifts a calendar date by a whole number of days.
 */
export function addUtcDays(date: IsoDate, days: number): IsoDate {
	const instant = fromZonedTime(`${date}T00:00:00`, UTC);
	instant.setUTCDate(instant.getUTCDate() + days);
	return formatUtcDate(instant);
}

/**
 * Lists every date in [startDate, endDate]. Empty when the range is inverted.
 */
export function eachDate(startDate: IsoDate, endDate: IsoDate): IsoDate[] {
	const dates: IsoDate[] = [];
	for (let current = startDate; current <= endDate; current = addUtcDays(current, 1)) {
		dates.push(current);
	}
	return dates;
}

/**
 * Day of month (1-31) of a calendar date.
 */
export function dayOfMonth(date: IsoDate): number {
	return fromZonedTime(`${date}T00:00:00`, UTC).getUTCDate();
}

/**
 * The UTC instant at which a slot on a given date starts.
 */
export function slotInstant(date: IsoDate, slot: SlotTime): Date {
	return fromZonedTime(`${date}T${normalizeSlot(slot)}:00`, UTC);
}

/**
 * Earliest instant a slot may start at, given a notice period.
 */
export function noticeCutoff(at: Date, minNoticeHours: number): Date {
	return addHours(at, minNoticeHours);
}
