/**
 * Environment configuration.
 */

import { z } from 'zod';
import { ValidationError } from './errors.js';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const envSchema = z.object({
	SLOTWISE_LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
	SLOTWISE_DEFAULT_HORIZON_DAYS: z.coerce.number().int().min(1).default(30),
	SLOTWISE_DEFAULT_MIN_NOTICE_HOURS: z.coerce.number().int().min(0).default(2),
});

export interface CalendarConfig {
	logLevel: LogLevel;
	/** Horizon given to settings created on first access */
	defaultHorizonDays: number;
	/** Notice period given to settings created on first access */
	defaultMinNoticeHours: number;
}

/**
 * Reads configuration from environment variables.
 *
 * @throws ValidationError naming every invalid variable
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): CalendarConfig {
	const parsed = envSchema.safeParse(env);
	if (!parsed.success) {
		const keys = parsed.error.issues.map((issue) => issue.path.join('.'));
		throw new ValidationError(`Invalid configuration: ${keys.join(', ')}`);
	}

	return {
		logLevel: parsed.data.SLOTWISE_LOG_LEVEL,
		defaultHorizonDays: parsed.data.SLOTWISE_DEFAULT_HORIZON_DAYS,
		defaultMinNoticeHours: parsed.data.SLOTWISE_DEFAULT_MIN_NOTICE_HOURS,
	};
}
