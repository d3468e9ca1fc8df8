/**
 * Availability engine with repository-backed data loading.
 */

import { createLogger, parseDateRange } from '@slotwise/core';
import { computeAvailability } from './slots.js';
import type {
	AvailabilityEngine,
	AvailabilityQueryOptions,
	CreateAvailabilityOptions,
	DayAvailability,
} from './types.js';

/**
 * Create an availability engine over the given repository.
 *
 * The engine holds no state between calls; every query reads the store.
 */
export function createAvailability(options: CreateAvailabilityOptions): AvailabilityEngine {
	const { repository, clock = () => new Date(), enforceHorizon = false } = options;
	const logger = options.logger ?? createLogger();

	async function computeForProvider(
		providerId: string,
		startDate: string,
		endDate: string,
		query: AvailabilityQueryOptions = {},
	): Promise<DayAvailability[]> {
		const range = parseDateRange(startDate, endDate);
		const at = query.at ?? clock();

		const [settings, rules, overrides, bookings] = await Promise.all([
			repository.getOrCreateSettings(providerId),
			repository.listRules(providerId),
			repository.listOverrides(providerId, range.startDate, range.endDate),
			repository.listBookingsForRange(providerId, range.startDate, range.endDate),
		]);

		const days = computeAvailability({ range, settings, rules, overrides, bookings, enforceHorizon }, at);

		logger.debug(
			{ operation: 'computeAvailability', providerId, ...range, at: at.toISOString(), days: days.length },
			'availability computed',
		);

		return days;
	}

	return {
		computeAvailability: computeForProvider,
	};
}
