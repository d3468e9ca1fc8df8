/**
 * Slotwise Availability
 *
 * Turns recurring rules, date overrides, notice and cutoff settings and
 * existing bookings into open slots per day.
 *
 * @packageDocumentation
 */

// Pure computation
export { computeAvailability } from './slots.js';
// Repository-backed engine
export { createAvailability } from './engine.js';

export type {
	AvailabilityEngine,
	AvailabilityQueryOptions,
	ComputeAvailabilityInput,
	CreateAvailabilityOptions,
	DayAvailability,
} from './types.js';
