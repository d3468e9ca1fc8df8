/**
 * Shapes of stored items, checked on every read.
 */

import type { JsonValue } from '@slotwise/core';
import { z } from 'zod';
import { BOOKING_STATUSES } from './status.js';

const jsonValue: z.ZodType<JsonValue> = z.lazy(() =>
	z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(jsonValue), z.record(jsonValue)]),
);

const storedDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/);
const storedSlot = z.string().regex(/^(?:[01]\d|2[0-3]):[0-5]\d$/);

const timestamps = {
	createdAt: z.string(),
	updatedAt: z.string(),
};

export const settingsItemSchema = z.object({
	horizonDays: z.number().int(),
	minNoticeHours: z.number().int(),
	hardCutoffDate: storedDate.nullable().default(null),
	...timestamps,
});

export const ruleItemSchema = z.object({
	dayOfMonth: z.number().int(),
	availableSlots: z.array(storedSlot),
	...timestamps,
});

export const overrideItemSchema = z.object({
	date: storedDate,
	type: z.enum(['BLOCKED', 'MODIFIED']),
	overrideSlots: z.array(storedSlot).default([]),
	...timestamps,
});

export const bookingItemSchema = z.object({
	clientIdentifier: z.string(),
	status: z.enum(BOOKING_STATUSES),
	appointmentDetails: z.record(jsonValue).default({}),
	...timestamps,
});
