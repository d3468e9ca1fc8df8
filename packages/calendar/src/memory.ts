/**
 * In-process storage adapter.
 *
 * Each call runs to completion before another starts, which makes
 * insert-if-absent atomic without locks. Items are cloned on the way in
 * and out so callers never share references with the store.
 */

import {
	ConditionFailedError,
	matchesCondition,
	type KeyCondition,
	type PutOptions,
	type StorageAdapter,
	type StorageItem,
} from './storage.js';

export class MemoryStorage implements StorageAdapter {
	private readonly partitions = new Map<string, Map<string, StorageItem>>();

	async get(pk: string, sk: string): Promise<StorageItem | undefined> {
		const item = this.partitions.get(pk)?.get(sk);
		return item ? structuredClone(item) : undefined;
	}

	async put(item: StorageItem, options: PutOptions = {}): Promise<void> {
		let partition = this.partitions.get(item.pk);
		if (!partition) {
			partition = new Map();
			this.partitions.set(item.pk, partition);
		}

		if (options.condition === 'insert-if-absent' && partition.has(item.sk)) {
			throw new ConditionFailedError(item.pk, item.sk);
		}

		partition.set(item.sk, structuredClone(item));
	}

	async delete(pk: string, sk: string): Promise<void> {
		this.partitions.get(pk)?.delete(sk);
	}

	async query(pk: string, condition: KeyCondition): Promise<StorageItem[]> {
		const partition = this.partitions.get(pk);
		if (!partition) {
			return [];
		}

		return Array.from(partition.values())
			.filter((item) => matchesCondition(item.sk, condition))
			.sort((a, b) => (a.sk < b.sk ? -1 : a.sk > b.sk ? 1 : 0))
			.map((item) => structuredClone(item));
	}

	/**
	 * Number of items across all partitions.
	 */
	get size(): number {
		let count = 0;
		for (const partition of this.partitions.values()) {
			count += partition.size;
		}
		return count;
	}
}
