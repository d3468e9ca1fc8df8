import { describe, expect, test } from 'vitest';
import { loadConfig } from '../src/config.js';
import { ValidationError } from '../src/errors.js';
import { createLogger } from '../src/logger.js';

describe('loadConfig', () => {
	test('falls back to defaults', () => {
		expect(loadConfig({})).toEqual({
			logLevel: 'info',
			defaultHorizonDays: 30,
			defaultMinNoticeHours: 2,
		});
	});

	test('reads and coerces environment values', () => {
		const config = loadConfig({
			SLOTWISE_LOG_LEVEL: 'debug',
			SLOTWISE_DEFAULT_HORIZON_DAYS: '60',
			SLOTWISE_DEFAULT_MIN_NOTICE_HOURS: '0',
		});

		expect(config).toEqual({
			logLevel: 'debug',
			defaultHorizonDays: 60,
			defaultMinNoticeHours: 0,
		});
	});

	test('names every invalid variable', () => {
		expect(() =>
			loadConfig({
				SLOTWISE_LOG_LEVEL: 'loud',
				SLOTWISE_DEFAULT_HORIZON_DAYS: '0',
			}),
		).toThrow(
			new ValidationError('Invalid configuration: SLOTWISE_LOG_LEVEL, SLOTWISE_DEFAULT_HORIZON_DAYS'),
		);
	});

	test('rejects fractional values', () => {
		expect(() => loadConfig({ SLOTWISE_DEFAULT_MIN_NOTICE_HOURS: '1.5' })).toThrow(ValidationError);
	});
});

describe('createLogger', () => {
	test('writes JSON lines to the given destination', () => {
		const lines: string[] = [];
		const logger = createLogger({ level: 'info', destination: { write: (line) => lines.push(line) } });

		logger.info({ providerId: 'provider-1' }, 'settings created');
		logger.debug('not written');

		expect(lines).toHaveLength(1);
		const entry: unknown = JSON.parse(lines[0]);
		expect(entry).toMatchObject({
			level: 30,
			name: 'slotwise',
			providerId: 'provider-1',
			msg: 'settings created',
		});
	});
});
