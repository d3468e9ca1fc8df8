import { describe, expect, test } from 'vitest';
import { ValidationError } from '../src/errors.js';
import {
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
} from '../src/time.js';

describe('Slot normalization', () => {
	describe('normalizeSlot', () => {
		test('accepts HH:MM', () => {
			expect(normalizeSlot('09:30')).toBe('09:30');
		});

		test('accepts HHMM', () => {
			expect(normalizeSlot('0930')).toBe('09:30');
		});

		test('trims whitespace', () => {
			expect(normalizeSlot(' 1745 ')).toBe('17:45');
		});

		test('rejects values that do not reduce to four digits', () => {
			expect(() => normalizeSlot('930')).toThrow(ValidationError);
			expect(() => normalizeSlot('9:30')).toThrow(ValidationError);
			expect(() => normalizeSlot('09:300')).toThrow(ValidationError);
			expect(() => normalizeSlot('ab:cd')).toThrow(ValidationError);
			expect(() => normalizeSlot('')).toThrow(ValidationError);
		});

		test('rejects out-of-range hours and minutes', () => {
			expect(() => normalizeSlot('24:00')).toThrow(ValidationError);
			expect(() => normalizeSlot('12:60')).toThrow(ValidationError);
		});

		test('accepts the edges of the day', () => {
			expect(normalizeSlot('0000')).toBe('00:00');
			expect(normalizeSlot('23:59')).toBe('23:59');
		});
	});

	test('toSlotKey and fromSlotKey convert between forms', () => {
		expect(toSlotKey('09:30')).toBe('0930');
		expect(toSlotKey('0930')).toBe('0930');
		expect(fromSlotKey('1400')).toBe('14:00');
	});

	test('normalizeSlots de-duplicates and sorts', () => {
		expect(normalizeSlots(['1000', '09:00', '10:00', '0830'])).toEqual(['08:30', '09:00', '10:00']);
	});

	test('normalizeSlots returns an empty list for no input', () => {
		expect(normalizeSlots([])).toEqual([]);
	});
});

describe('Date normalization', () => {
	describe('parseIsoDate', () => {
		test('accepts real calendar dates', () => {
			expect(parseIsoDate('2024-02-29')).toBe('2024-02-29');
		});

		test('rejects dates that roll over', () => {
			expect(() => parseIsoDate('2024-02-30')).toThrow(ValidationError);
			expect(() => parseIsoDate('2023-02-29')).toThrow(ValidationError);
			expect(() => parseIsoDate('2024-13-01')).toThrow(ValidationError);
		});

		test('rejects other formats', () => {
			expect(() => parseIsoDate('2024-3-15')).toThrow(ValidationError);
			expect(() => parseIsoDate('15/03/2024')).toThrow(ValidationError);
			expect(() => parseIsoDate('2024-03-15T00:00:00Z')).toThrow(ValidationError);
		});
	});

	describe('parseDateRange', () => {
		test('accepts a single-day range', () => {
			expect(parseDateRange('2024-03-15', '2024-03-15')).toEqual({
				startDate: '2024-03-15',
				endDate: '2024-03-15',
			});
		});

		test('rejects an inverted range', () => {
			expect(() => parseDateRange('2024-03-16', '2024-03-15')).toThrow(ValidationError);
		});
	});

	test('addUtcDays crosses month and year boundaries', () => {
		expect(addUtcDays('2024-01-31', 1)).toBe('2024-02-01');
		expect(addUtcDays('2024-12-31', 1)).toBe('2025-01-01');
		expect(addUtcDays('2024-03-01', -1)).toBe('2024-02-29');
		expect(addUtcDays('2024-03-15', 30)).toBe('2024-04-14');
	});

	test('eachDate is inclusive at both ends', () => {
		expect(eachDate('2024-02-27', '2024-03-01')).toEqual([
			'2024-02-27',
			'2024-02-28',
			'2024-02-29',
			'2024-03-01',
		]);
	});

	test('eachDate is empty for an inverted range', () => {
		expect(eachDate('2024-03-02', '2024-03-01')).toEqual([]);
	});

	test('dayOfMonth reads the UTC day', () => {
		expect(dayOfMonth('2024-03-15')).toBe(15);
		expect(dayOfMonth('2024-03-31')).toBe(31);
	});

	test('formatUtcDate ignores the host timezone', () => {
		expect(formatUtcDate(new Date('2024-03-15T23:59:59Z'))).toBe('2024-03-15');
		expect(formatUtcDate(new Date('2024-03-16T00:00:00Z'))).toBe('2024-03-16');
	});

	test('slotInstant combines a date and a slot in UTC', () => {
		expect(slotInstant('2024-03-15', '09:00').toISOString()).toBe('2024-03-15T09:00:00.000Z');
		expect(slotInstant('2024-03-15', '1730').toISOString()).toBe('2024-03-15T17:30:00.000Z');
	});

	test('noticeCutoff adds whole hours', () => {
		const at = new Date('2024-03-15T07:00:00Z');
		expect(noticeCutoff(at, 2).toISOString()).toBe('2024-03-15T09:00:00.000Z');
		expect(noticeCutoff(at, 0).toISOString()).toBe('2024-03-15T07:00:00.000Z');
	});
});
