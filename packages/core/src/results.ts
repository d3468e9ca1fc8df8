/**
 * Typed results for the boundary layer.
 */

import { ConflictError, NotFoundError, ValidationError } from './errors.js';

export type DomainError = ValidationError | ConflictError | NotFoundError;

export type Result<T> = { ok: true; value: T } | { ok: false; error: DomainError };

export function isDomainError(error: unknown): error is DomainError {
	return (
		error instanceof ValidationError ||
		error instanceof ConflictError ||
		error instanceof NotFoundError
	);
}

/**
 * Awaits an operation and folds business rejections into a Result.
 * Storage failures, inconsistencies and unknown errors are re-thrown as-is
 * so the boundary can map them to retry or 5xx behavior.
 *
 * @example
 * const result = await settle(bookings.createBooking('provider-1', input));
 * if (!result.ok && result.error.code === 'CONFLICT') {
 *   // ask the client to pick another slot
 * }
 */
export async function settle<T>(operation: Promise<T>): Promise<Result<T>> {
	try {
		return { ok: true, value: await operation };
	} catch (error) {
		if (isDomainError(error)) {
			return { ok: false, error };
		}
		throw error;
	}
}
