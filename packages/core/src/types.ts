/**
 * Shared primitives for Slotwise packages.
 * All dates and times live on a single UTC civil calendar.
 */

/**
 * A calendar date in YYYY-MM-DD form.
 *
 * @example "2024-03-15"
 */
export type IsoDate = string;

/**
 * A time of day in canonical HH:MM form (24-hour).
 *
 * @example "09:00", "17:30"
 */
export type SlotTime = string;

/**
 * A time of day in the four-digit form used inside storage keys.
 *
 * @example "0900", "1730"
 */
export type SlotKey = string;

/**
 * An inclusive range of calendar dates.
 */
export interface DateRange {
	startDate: IsoDate;
	endDate: IsoDate;
}

/**
 * Any value that survives a JSON round trip.
 * Used for free-form payloads such as appointment details.
 */
export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

/**
 * Source of the current instant. Injected so callers and tests control time.
 */
export type Clock = () => Date;
