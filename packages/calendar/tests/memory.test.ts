import type { JsonValue } from '@slotwise/core';
import { describe, expect, test } from 'vitest';
import { MemoryStorage } from '../src/memory.js';
import { ConditionFailedError, type StorageItem } from '../src/storage.js';

const item = (sk: string, extra: Record<string, JsonValue> = {}): StorageItem => ({
	pk: 'PROVIDER#p1',
	sk,
	...extra,
});

describe('MemoryStorage', () => {
	test('returns undefined for a missing key', async () => {
		const storage = new MemoryStorage();

		expect(await storage.get('PROVIDER#p1', 'SETTINGS#GLOBAL')).toBeUndefined();
	});

	test('put overwrites by default', async () => {
		const storage = new MemoryStorage();

		await storage.put(item('A', { value: 1 }));
		await storage.put(item('A', { value: 2 }));

		expect(await storage.get('PROVIDER#p1', 'A')).toEqual(item('A', { value: 2 }));
		expect(storage.size).toBe(1);
	});

	test('insert-if-absent rejects an existing key and keeps the original', async () => {
		const storage = new MemoryStorage();

		await storage.put(item('A', { value: 1 }), { condition: 'insert-if-absent' });
		await expect(
			storage.put(item('A', { value: 2 }), { condition: 'insert-if-absent' }),
		).rejects.toBeInstanceOf(ConditionFailedError);

		expect(await storage.get('PROVIDER#p1', 'A')).toEqual(item('A', { value: 1 }));
	});

	test('only one of two concurrent inserts wins', async () => {
		const storage = new MemoryStorage();

		const results = await Promise.allSettled([
			storage.put(item('A', { by: 'first' }), { condition: 'insert-if-absent' }),
			storage.put(item('A', { by: 'second' }), { condition: 'insert-if-absent' }),
		]);

		expect(results.map((result) => result.status)).toEqual(['fulfilled', 'rejected']);
		expect(await storage.get('PROVIDER#p1', 'A')).toEqual(item('A', { by: 'first' }));
	});

	test('delete removes the item and ignores missing keys', async () => {
		const storage = new MemoryStorage();

		await storage.put(item('A'));
		await storage.delete('PROVIDER#p1', 'A');
		await storage.delete('PROVIDER#p1', 'B');

		expect(await storage.get('PROVIDER#p1', 'A')).toBeUndefined();
		expect(storage.size).toBe(0);
	});

	test('query by prefix is ordered by sort key', async () => {
		const storage = new MemoryStorage();

		await storage.put(item('RULE#DOM#15'));
		await storage.put(item('DATE#2024-03-15'));
		await storage.put(item('RULE#DOM#01'));

		const items = await storage.query('PROVIDER#p1', { beginsWith: 'RULE#DOM#' });

		expect(items.map((found) => found.sk)).toEqual(['RULE#DOM#01', 'RULE#DOM#15']);
	});

	test('query between is inclusive at both ends', async () => {
		const storage = new MemoryStorage();

		for (const sk of ['DATE#2024-03-14', 'DATE#2024-03-15', 'DATE#2024-03-16', 'DATE#2024-03-17']) {
			await storage.put(item(sk));
		}

		const items = await storage.query('PROVIDER#p1', {
			between: ['DATE#2024-03-15', 'DATE#2024-03-16'],
		});

		expect(items.map((found) => found.sk)).toEqual(['DATE#2024-03-15', 'DATE#2024-03-16']);
	});

	test('partitions are isolated', async () => {
		const storage = new MemoryStorage();

		await storage.put(item('A'));

		expect(await storage.get('PROVIDER#p2', 'A')).toBeUndefined();
		expect(await storage.query('PROVIDER#p2', { beginsWith: '' })).toEqual([]);
	});

	test('callers cannot mutate stored items', async () => {
		const storage = new MemoryStorage();
		const original = item('A', { slots: ['09:00'] });

		await storage.put(original);
		original.slots = ['10:00'];
		const read = await storage.get('PROVIDER#p1', 'A');
		if (read) {
			read.slots = ['11:00'];
		}

		expect(await storage.get('PROVIDER#p1', 'A')).toEqual(item('A', { slots: ['09:00'] }));
	});
});
