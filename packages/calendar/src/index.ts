/**
 * Slotwise Calendar
 *
 * Storage adapter contract and the calendar repository that maps settings,
 * recurring rules, date overrides and bookings onto it.
 *
 * @packageDocumentation
 */

// Storage
export {
	ConditionFailedError,
	matchesCondition,
	type KeyCondition,
	type PutOptions,
	type StorageAdapter,
	type StorageItem,
} from './storage.js';
export { MemoryStorage } from './memory.js';

// Key layout
export {
	BOOKING_PREFIX,
	OVERRIDE_PREFIX,
	RULE_PREFIX,
	SETTINGS_KEY,
	bookingKey,
	overrideKey,
	parseBookingKey,
	partitionKey,
	ruleKey,
} from './keys.js';

// Repository
export {
	createCalendarRepository,
	type CalendarRepository,
	type CalendarRepositoryOptions,
	type SettingsDefaults,
} from './repository.js';

export { BOOKING_STATUSES, isActiveStatus } from './status.js';

export type {
	AppointmentDetails,
	Booking,
	BookingStatus,
	BookingWriteCondition,
	DateOverride,
	GlobalSettings,
	OverrideType,
	PutBookingInput,
	RecurringRule,
	SettingsInput,
	SettingsPatch,
} from './types.js';
