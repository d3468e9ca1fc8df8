/**
 * Open-slot computation.
 *
 * For each date in the range:
 * 1. Skip dates after the hard cutoff (and beyond the horizon, when enforced)
 * 2. A BLOCKED override empties the date; a MODIFIED override replaces the
 *    rule-derived slots outright
 * 3. Otherwise use the recurring rule for the day of month
 * 4. Drop slots held by active (PENDING or CONFIRMED) bookings
 * 5. Drop slots that do not start strictly after now + minNoticeHours
 * 6. Emit the date only if slots remain
 */

import { isActiveStatus } from '@slotwise/calendar';
import {
	addUtcDays,
	dayOfMonth,
	eachDate,
	formatUtcDate,
	noticeCutoff,
	normalizeSlot,
	normalizeSlots,
	slotInstant,
	type IsoDate,
	type SlotTime,
} from '@slotwise/core';
import type { ComputeAvailabilityInput, DayAvailability } from './types.js';

/**
 * Groups the slots held by active bookings by date.
 */
function collectTakenSlots(bookings: ComputeAvailabilityInput['bookings']): Map<IsoDate, Set<SlotTime>> {
	const taken = new Map<IsoDate, Set<SlotTime>>();

	for (const booking of bookings) {
		if (!isActiveStatus(booking.status)) {
			continue;
		}

		let slots = taken.get(booking.date);
		if (!slots) {
			slots = new Set();
			taken.set(booking.date, slots);
		}
		slots.add(normalizeSlot(booking.time));
	}

	return taken;
}

/**
 * Last date still inside the booking horizon.
 */
function horizonEnd(at: Date, horizonDays: number): IsoDate {
	return addUtcDays(formatUtcDate(at), horizonDays);
}

/**
 * Computes open slots per date.
 *
 * Pure: the result depends only on the input and the reference instant.
 * Because of the notice window, results for the same range shrink as `at`
 * moves forward and must not be cached across that boundary.
 *
 * @param input - Settings, rules, overrides and bookings for one provider
 * @param at - Reference instant for the notice window
 * @returns Dates with at least one open slot, ascending
 *
 * @example
 * ```typescript
 * const days = computeAvailability(
 *   {
 *     range: { startDate: '2024-03-15', endDate: '2024-03-15' },
 *     settings: { horizonDays: 30, minNoticeHours: 2, hardCutoffDate: null },
 *     rules: [{ dayOfMonth: 15, availableSlots: ['09:00', '10:00'] }],
 *     overrides: [],
 *     bookings: [],
 *   },
 *   new Date('2024-03-15T06:00:00Z'),
 * );
 * // [{ date: '2024-03-15', slots: ['09:00', '10:00'] }]
 * ```
 */
export function computeAvailability(input: ComputeAvailabilityInput, at: Date): DayAvailability[] {
	const { range, settings, rules, overrides, bookings, enforceHorizon = false } = input;

	const rulesByDay = new Map(rules.map((rule) => [rule.dayOfMonth, rule.availableSlots]));
	const overridesByDate = new Map(overrides.map((override) => [override.date, override]));
	const taken = collectTakenSlots(bookings);

	const cutoff = settings.minNoticeHours > 0 ? noticeCutoff(at, settings.minNoticeHours) : null;
	const lastBookableDate = enforceHorizon ? horizonEnd(at, settings.horizonDays) : null;

	const result: DayAvailability[] = [];

	for (const date of eachDate(range.startDate, range.endDate)) {
		if (settings.hardCutoffDate && date > settings.hardCutoffDate) {
			continue;
		}
		if (lastBookableDate && date > lastBookableDate) {
			continue;
		}

		const override = overridesByDate.get(date);
		if (override?.type === 'BLOCKED') {
			continue;
		}

		const base = override ? override.overrideSlots : (rulesByDay.get(dayOfMonth(date)) ?? []);
		const takenOnDate = taken.get(date);

		const slots = normalizeSlots(base).filter((slot) => {
			if (takenOnDate?.has(slot)) {
				return false;
			}
			return cutoff === null || slotInstant(date, slot) > cutoff;
		});

		if (slots.length > 0) {
			result.push({ date, slots });
		}
	}

	return result;
}
