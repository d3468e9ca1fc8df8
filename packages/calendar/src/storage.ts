/**
 * Storage adapter contract.
 *
 * The calendar lives in a single partitioned key-value table. Items are
 * addressed by a partition key and a sort key; range queries return items
 * of one partition in ascending sort-key order.
 */

import type { JsonValue } from '@slotwise/core';

/**
 * A stored item. Every attribute must survive a JSON round trip.
 */
export interface StorageItem {
	pk: string;
	sk: string;
	[attribute: string]: JsonValue;
}

/**
 * Selects items within one partition.
 * `between` is inclusive at both ends.
 */
export type KeyCondition = { beginsWith: string } | { between: [string, string] };

export interface PutOptions {
	/** Fail with ConditionFailedError when an item already exists at the key */
	condition?: 'insert-if-absent';
}

/**
 * The only primitive that must be atomic is `put` with `insert-if-absent`.
 * Implementations for relational stores should map it to an insert guarded
 * by a unique constraint on (pk, sk).
 */
export interface StorageAdapter {
	get(pk: string, sk: string): Promise<StorageItem | undefined>;
	put(item: StorageItem, options?: PutOptions): Promise<void>;
	delete(pk: string, sk: string): Promise<void>;
	query(pk: string, condition: KeyCondition): Promise<StorageItem[]>;
}

/**
 * Raised by an adapter when a conditional write is rejected.
 */
export class ConditionFailedError extends Error {
	constructor(
		readonly pk: string,
		readonly sk: string,
	) {
		super(`Condition failed for ${pk} ${sk}`);
		this.name = 'ConditionFailedError';
	}
}

/**
 * Checks whether a sort key satisfies a key condition.
 */
export function matchesCondition(sk: string, condition: KeyCondition): boolean {
	if ('beginsWith' in condition) {
		return sk.startsWith(condition.beginsWith);
	}
	const [low, high] = condition.between;
	return sk >= low && sk <= high;
}
