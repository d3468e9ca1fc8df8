/**
 * Calendar repository: settings, rules, overrides and bookings on top of a
 * storage adapter, using the key layout in keys.ts.
 */

import {
	CalendarError,
	ConflictError,
	NotFoundError,
	StorageFailure,
	ValidationError,
	loadConfig,
	normalizeSlot,
	normalizeSlots,
	parseDateRange,
	parseIsoDate,
	type Clock,
	type IsoDate,
} from '@slotwise/core';
import type { z } from 'zod';
import {
	OVERRIDE_PREFIX,
	RULE_PREFIX,
	SETTINGS_KEY,
	bookingDatePrefix,
	bookingKey,
	bookingRangeKeys,
	overrideKey,
	parseBookingKey,
	partitionKey,
	ruleKey,
} from './keys.js';
import { bookingItemSchema, overrideItemSchema, ruleItemSchema, settingsItemSchema } from './schemas.js';
import {
	ConditionFailedError,
	type KeyCondition,
	type StorageAdapter,
	type StorageItem,
} from './storage.js';
import type {
	Booking,
	BookingWriteCondition,
	DateOverride,
	GlobalSettings,
	OverrideType,
	PutBookingInput,
	RecurringRule,
	SettingsInput,
	SettingsPatch,
} from './types.js';

export interface SettingsDefaults {
	horizonDays: number;
	minNoticeHours: number;
}

export interface CalendarRepositoryOptions {
	storage: StorageAdapter;
	/** Source of write timestamps; defaults to the system clock */
	clock?: Clock;
	/** Values for settings created on first access; read from the environment when omitted */
	defaults?: SettingsDefaults;
}

export interface CalendarRepository {
	getSettings(providerId: string): Promise<GlobalSettings | undefined>;
	putSettings(providerId: string, input: SettingsInput): Promise<GlobalSettings>;
	updateSettings(providerId: string, patch: SettingsPatch): Promise<GlobalSettings | undefined>;
	getOrCreateSettings(providerId: string): Promise<GlobalSettings>;

	putRule(providerId: string, dayOfMonth: number, slots: readonly string[]): Promise<RecurringRule>;
	/** Replaces the slots of an existing rule; NotFoundError when the day has none */
	updateRule(providerId: string, dayOfMonth: number, slots: readonly string[]): Promise<RecurringRule>;
	getRule(providerId: string, dayOfMonth: number): Promise<RecurringRule | undefined>;
	listRules(providerId: string): Promise<RecurringRule[]>;
	deleteRule(providerId: string, dayOfMonth: number): Promise<void>;

	putOverride(
		providerId: string,
		date: string,
		type: OverrideType,
		slots?: readonly string[],
	): Promise<DateOverride>;
	getOverride(providerId: string, date: string): Promise<DateOverride | undefined>;
	listOverrides(providerId: string, startDate: string, endDate: string): Promise<DateOverride[]>;
	deleteOverride(providerId: string, date: string): Promise<void>;

	putBooking(
		providerId: string,
		input: PutBookingInput,
		condition: BookingWriteCondition,
	): Promise<Booking>;
	restoreBooking(booking: Booking): Promise<Booking>;
	getBooking(providerId: string, date: string, time: string): Promise<Booking | undefined>;
	deleteBooking(providerId: string, date: string, time: string): Promise<void>;
	listBookingsForDate(providerId: string, date: string): Promise<Booking[]>;
	listBookingsForRange(providerId: string, startDate: string, endDate: string): Promise<Booking[]>;
}

// ============================================================================
// Validation
// ============================================================================

function validateSettings(input: SettingsInput): Omit<SettingsInput, 'hardCutoffDate'> & {
	hardCutoffDate: IsoDate | null;
} {
	const { horizonDays, minNoticeHours, hardCutoffDate = null } = input;
	if (!Number.isInteger(horizonDays) || horizonDays < 1) {
		throw new ValidationError(`horizonDays must be an integer >= 1, got ${horizonDays}`);
	}
	if (!Number.isInteger(minNoticeHours) || minNoticeHours < 0) {
		throw new ValidationError(`minNoticeHours must be an integer >= 0, got ${minNoticeHours}`);
	}
	return {
		horizonDays,
		minNoticeHours,
		hardCutoffDate: hardCutoffDate === null ? null : parseIsoDate(hardCutoffDate),
	};
}

function validateDayOfMonth(dayOfMonth: number): number {
	if (!Number.isInteger(dayOfMonth) || dayOfMonth < 1 || dayOfMonth > 31) {
		throw new ValidationError(`dayOfMonth must be an integer between 1 and 31, got ${dayOfMonth}`);
	}
	return dayOfMonth;
}

function validateClient(clientIdentifier: string): string {
	const trimmed = clientIdentifier.trim();
	if (trimmed.length === 0) {
		throw new ValidationError('clientIdentifier must not be empty');
	}
	return trimmed;
}

// ============================================================================
// Item encoding
// ============================================================================

function decode<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, item: StorageItem): T {
	const result = schema.safeParse(item);
	if (!result.success) {
		throw new StorageFailure(`Malformed item ${item.pk} ${item.sk}`, { cause: result.error });
	}
	return result.data;
}

function settingsToItem(settings: GlobalSettings): StorageItem {
	return {
		pk: partitionKey(settings.providerId),
		sk: SETTINGS_KEY,
		horizonDays: settings.horizonDays,
		minNoticeHours: settings.minNoticeHours,
		hardCutoffDate: settings.hardCutoffDate,
		createdAt: settings.createdAt,
		updatedAt: settings.updatedAt,
	};
}

function ruleToItem(rule: RecurringRule): StorageItem {
	return {
		pk: partitionKey(rule.providerId),
		sk: ruleKey(rule.dayOfMonth),
		dayOfMonth: rule.dayOfMonth,
		availableSlots: rule.availableSlots,
		createdAt: rule.createdAt,
		updatedAt: rule.updatedAt,
	};
}

function overrideToItem(override: DateOverride): StorageItem {
	return {
		pk: partitionKey(override.providerId),
		sk: overrideKey(override.date),
		date: override.date,
		type: override.type,
		overrideSlots: override.overrideSlots,
		createdAt: override.createdAt,
		updatedAt: override.updatedAt,
	};
}

function bookingToItem(booking: Booking): StorageItem {
	return {
		pk: partitionKey(booking.providerId),
		sk: bookingKey(booking.date, booking.time),
		clientIdentifier: booking.clientIdentifier,
		status: booking.status,
		appointmentDetails: booking.appointmentDetails,
		createdAt: booking.createdAt,
		updatedAt: booking.updatedAt,
	};
}

function itemToBooking(providerId: string, item: StorageItem): Booking {
	const key = parseBookingKey(item.sk);
	if (!key) {
		throw new StorageFailure(`Malformed booking key ${item.pk} ${item.sk}`);
	}
	return { providerId, ...key, ...decode(bookingItemSchema, item) };
}

// ============================================================================
// Repository
// ============================================================================

/**
 * Create a calendar repository over the given storage adapter.
 *
 * Adapter errors surface as StorageFailure. The one exception is a rejected
 * insert-if-absent on a booking, which surfaces as ConflictError.
 */
export function createCalendarRepository(options: CalendarRepositoryOptions): CalendarRepository {
	const { storage, clock = () => new Date() } = options;

	function timestamp(): string {
		return clock().toISOString();
	}

	function resolveDefaults(): SettingsDefaults {
		if (options.defaults) {
			return options.defaults;
		}
		const config = loadConfig();
		return { horizonDays: config.defaultHorizonDays, minNoticeHours: config.defaultMinNoticeHours };
	}

	async function call<T>(action: string, run: () => Promise<T>): Promise<T> {
		try {
			return await run();
		} catch (error) {
			if (error instanceof CalendarError) {
				throw error;
			}
			throw new StorageFailure(`Storage ${action} failed`, { cause: error });
		}
	}

	const read = (pk: string, sk: string) => call('get', () => storage.get(pk, sk));
	const write = (item: StorageItem) => call('put', () => storage.put(item));
	const remove = (pk: string, sk: string) => call('delete', () => storage.delete(pk, sk));
	const query = (pk: string, condition: KeyCondition) => call('query', () => storage.query(pk, condition));

	/**
	 * Insert-if-absent. Resolves false when an item already exists at the key.
	 */
	function insert(item: StorageItem): Promise<boolean> {
		return call('put', async () => {
			try {
				await storage.put(item, { condition: 'insert-if-absent' });
				return true;
			} catch (error) {
				if (error instanceof ConditionFailedError) {
					return false;
				}
				throw error;
			}
		});
	}

	// --- Settings ---

	async function getSettings(providerId: string): Promise<GlobalSettings | undefined> {
		const item = await read(partitionKey(providerId), SETTINGS_KEY);
		return item ? { providerId, ...decode(settingsItemSchema, item) } : undefined;
	}

	async function putSettings(providerId: string, input: SettingsInput): Promise<GlobalSettings> {
		const now = timestamp();
		const settings: GlobalSettings = {
			providerId,
			...validateSettings(input),
			createdAt: now,
			updatedAt: now,
		};
		await write(settingsToItem(settings));
		return settings;
	}

	async function updateSettings(
		providerId: string,
		patch: SettingsPatch,
	): Promise<GlobalSettings | undefined> {
		const existing = await getSettings(providerId);
		if (!existing) {
			return undefined;
		}

		const settings: GlobalSettings = {
			...existing,
			...validateSettings({
				horizonDays: patch.horizonDays ?? existing.horizonDays,
				minNoticeHours: patch.minNoticeHours ?? existing.minNoticeHours,
				hardCutoffDate: patch.hardCutoffDate === undefined ? existing.hardCutoffDate : patch.hardCutoffDate,
			}),
			updatedAt: timestamp(),
		};
		await write(settingsToItem(settings));
		return settings;
	}

	async function getOrCreateSettings(providerId: string): Promise<GlobalSettings> {
		const existing = await getSettings(providerId);
		if (existing) {
			return existing;
		}

		const now = timestamp();
		const settings: GlobalSettings = {
			providerId,
			...validateSettings(resolveDefaults()),
			createdAt: now,
			updatedAt: now,
		};
		if (await insert(settingsToItem(settings))) {
			return settings;
		}

		// Another caller created them first
		const winner = await getSettings(providerId);
		if (!winner) {
			throw new StorageFailure(`Settings for ${providerId} vanished after a conflicting insert`);
		}
		return winner;
	}

	// --- Rules ---

	async function putRule(
		providerId: string,
		dayOfMonth: number,
		slots: readonly string[],
	): Promise<RecurringRule> {
		const now = timestamp();
		const rule: RecurringRule = {
			providerId,
			dayOfMonth: validateDayOfMonth(dayOfMonth),
			availableSlots: normalizeSlots(slots),
			createdAt: now,
			updatedAt: now,
		};
		await write(ruleToItem(rule));
		return rule;
	}

	async function getRule(providerId: string, dayOfMonth: number): Promise<RecurringRule | undefined> {
		const item = await read(partitionKey(providerId), ruleKey(validateDayOfMonth(dayOfMonth)));
		return item ? { providerId, ...decode(ruleItemSchema, item) } : undefined;
	}

	async function updateRule(
		providerId: string,
		dayOfMonth: number,
		slots: readonly string[],
	): Promise<RecurringRule> {
		const existing = await getRule(providerId, dayOfMonth);
		if (!existing) {
			throw new NotFoundError(`No rule for day ${dayOfMonth}`);
		}
		const rule: RecurringRule = {
			...existing,
			availableSlots: normalizeSlots(slots),
			updatedAt: timestamp(),
		};
		await write(ruleToItem(rule));
		return rule;
	}

	async function listRules(providerId: string): Promise<RecurringRule[]> {
		const items = await query(partitionKey(providerId), { beginsWith: RULE_PREFIX });
		return items.map((item) => ({ providerId, ...decode(ruleItemSchema, item) }));
	}

	async function deleteRule(providerId: string, dayOfMonth: number): Promise<void> {
		await remove(partitionKey(providerId), ruleKey(validateDayOfMonth(dayOfMonth)));
	}

	// --- Date overrides ---

	async function putOverride(
		providerId: string,
		date: string,
		type: OverrideType,
		slots: readonly string[] = [],
	): Promise<DateOverride> {
		const now = timestamp();
		const override: DateOverride = {
			providerId,
			date: parseIsoDate(date),
			type,
			overrideSlots: type === 'BLOCKED' ? [] : normalizeSlots(slots),
			createdAt: now,
			updatedAt: now,
		};
		await write(overrideToItem(override));
		return override;
	}

	async function getOverride(providerId: string, date: string): Promise<DateOverride | undefined> {
		const item = await read(partitionKey(providerId), overrideKey(parseIsoDate(date)));
		return item ? { providerId, ...decode(overrideItemSchema, item) } : undefined;
	}

	async function listOverrides(
		providerId: string,
		startDate: string,
		endDate: string,
	): Promise<DateOverride[]> {
		const range = parseDateRange(startDate, endDate);
		const items = await query(partitionKey(providerId), {
			between: [overrideKey(range.startDate), overrideKey(range.endDate)],
		});
		return items
			.filter((item) => item.sk.startsWith(OVERRIDE_PREFIX))
			.map((item) => ({ providerId, ...decode(overrideItemSchema, item) }));
	}

	async function deleteOverride(providerId: string, date: string): Promise<void> {
		await remove(partitionKey(providerId), overrideKey(parseIsoDate(date)));
	}

	// --- Bookings ---

	async function putBooking(
		providerId: string,
		input: PutBookingInput,
		condition: BookingWriteCondition,
	): Promise<Booking> {
		const now = timestamp();
		const booking: Booking = {
			providerId,
			date: parseIsoDate(input.date),
			time: normalizeSlot(input.time),
			clientIdentifier: validateClient(input.clientIdentifier),
			status: input.status,
			appointmentDetails: input.appointmentDetails,
			createdAt: input.createdAt ?? now,
			updatedAt: now,
		};
		const item = bookingToItem(booking);

		if (condition === 'none') {
			await write(item);
			return booking;
		}

		if (!(await insert(item))) {
			throw new ConflictError(`Slot ${booking.date} ${booking.time} is already booked`);
		}
		return booking;
	}

	function restoreBooking(booking: Booking): Promise<Booking> {
		return putBooking(booking.providerId, booking, 'none');
	}

	async function getBooking(providerId: string, date: string, time: string): Promise<Booking | undefined> {
		const item = await read(partitionKey(providerId), bookingKey(parseIsoDate(date), time));
		return item ? itemToBooking(providerId, item) : undefined;
	}

	async function deleteBooking(providerId: string, date: string, time: string): Promise<void> {
		await remove(partitionKey(providerId), bookingKey(parseIsoDate(date), time));
	}

	async function listBookingsForDate(providerId: string, date: string): Promise<Booking[]> {
		const items = await query(partitionKey(providerId), {
			beginsWith: bookingDatePrefix(parseIsoDate(date)),
		});
		return items.map((item) => itemToBooking(providerId, item));
	}

	async function listBookingsForRange(
		providerId: string,
		startDate: string,
		endDate: string,
	): Promise<Booking[]> {
		const range = parseDateRange(startDate, endDate);
		const items = await query(partitionKey(providerId), {
			between: bookingRangeKeys(range.startDate, range.endDate),
		});
		return items.map((item) => itemToBooking(providerId, item));
	}

	return {
		getSettings,
		putSettings,
		updateSettings,
		getOrCreateSettings,
		putRule,
		updateRule,
		getRule,
		listRules,
		deleteRule,
		putOverride,
		getOverride,
		listOverrides,
		deleteOverride,
		putBooking,
		restoreBooking,
		getBooking,
		deleteBooking,
		listBookingsForDate,
		listBookingsForRange,
	};
}
