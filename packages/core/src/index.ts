/**
 * Slotwise Core
 *
 * Shared primitives for Slotwise packages: date and slot normalization,
 * domain errors, typed results, logging and configuration.
 * All times are UTC; there is no timezone conversion.
 */

export type { Clock, DateRange, IsoDate, JsonValue, SlotKey, SlotTime } from './types.js';

export {
	addUtcDays,
	dayOfMonth,
	eachDate,
	formatUtcDate,
	fromSlotKey,
	noticeCutoff,
	normalizeSlot,
	normalizeSlots,
	parseDateRange,
	parseIsoDate,
	slotInstant,
	toSlotKey,
} from './time.js';

export {
	CalendarError,
	ConflictError,
	InconsistencyError,
	NotFoundError,
	StorageFailure,
	ValidationError,
	type CalendarErrorCode,
} from './errors.js';

export { isDomainError, settle, type DomainError, type Result } from './results.js';

export { loadConfig, type CalendarConfig, type LogLevel } from './config.js';

export { createLogger, type Logger, type LoggerOptions } from './logger.js';
