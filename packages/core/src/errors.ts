/**
 * Domain errors raised by Slotwise packages.
 *
 * Validation, conflict and not-found errors are business rejections the
 * caller can act on. StorageFailure wraps whatever the storage adapter threw.
 * InconsistencyError means data was lost and must be escalated.
 */

export type CalendarErrorCode =
	| 'VALIDATION'
	| 'CONFLICT'
	| 'NOT_FOUND'
	| 'STORAGE_FAILURE'
	| 'INCONSISTENCY';

export abstract class CalendarError extends Error {
	abstract readonly code: CalendarErrorCode;

	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = new.target.name;
	}
}

/**
 * Malformed date, time or field input. Never retried.
 */
export class ValidationError extends CalendarError {
	readonly code = 'VALIDATION';
}

/**
 * The slot, or the reschedule target, is already occupied.
 */
export class ConflictError extends CalendarError {
	readonly code = 'CONFLICT';
}

/**
 * The referenced settings, rule, override or booking does not exist.
 */
export class NotFoundError extends CalendarError {
	readonly code = 'NOT_FOUND';
}

/**
 * The storage adapter failed. The original error is kept as `cause`.
 */
export class StorageFailure extends CalendarError {
	readonly code = 'STORAGE_FAILURE';
}

/**
 * A multi-step write could not be undone and a record was lost.
 * `snapshot` holds the last known copy of the record.
 */
export class InconsistencyError extends CalendarError {
	readonly code = 'INCONSISTENCY';
	readonly snapshot: unknown;

	constructor(message: string, options: { cause?: unknown; snapshot: unknown }) {
		super(message, { cause: options.cause });
		this.snapshot = options.snapshot;
	}
}
