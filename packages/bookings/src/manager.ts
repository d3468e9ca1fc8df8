/**
 * Booking transaction manager.
 *
 * Stateless: all coordination between concurrent callers happens through the
 * store's atomic insert-if-absent. Nothing here holds a lock, so any number of
 * managers may run side by side over the same store.
 */

import type { Booking } from '@slotwise/calendar';
import {
	ConflictError,
	InconsistencyError,
	NotFoundError,
	ValidationError,
	createLogger,
	normalizeSlot,
	parseIsoDate,
	type Logger,
} from '@slotwise/core';
import { canTransition } from './status.js';
import type {
	BookingManager,
	CreateBookingInput,
	CreateBookingsOptions,
	RescheduleInput,
	SlotRef,
	UpdateBookingInput,
} from './types.js';

function resolveSlot(slot: SlotRef): SlotRef {
	return { date: parseIsoDate(slot.date), time: normalizeSlot(slot.time) };
}

/**
 * Create a booking manager over the given repository.
 */
export function createBookings(options: CreateBookingsOptions): BookingManager {
	const { repository } = options;
	const logger = options.logger ?? createLogger();

	async function createBooking(providerId: string, input: CreateBookingInput): Promise<Booking> {
		const slot = resolveSlot(input);
		const status = input.status ?? 'PENDING';
		if (status === 'CANCELLED') {
			throw new ValidationError('A booking cannot be created as CANCELLED');
		}

		const log = logger.child({ operation: 'createBooking', providerId, ...slot });

		try {
			const booking = await repository.putBooking(
				providerId,
				{
					...slot,
					clientIdentifier: input.clientIdentifier,
					status,
					appointmentDetails: input.details ?? {},
				},
				'must-not-exist',
			);
			log.info({ status }, 'booking created');
			return booking;
		} catch (error) {
			if (error instanceof ConflictError) {
				log.info('slot already booked');
			}
			throw error;
		}
	}

	async function getBooking(providerId: string, slotRef: SlotRef): Promise<Booking | undefined> {
		const slot = resolveSlot(slotRef);
		return repository.getBooking(providerId, slot.date, slot.time);
	}

	function listBookings(providerId: string, startDate: string, endDate: string): Promise<Booking[]> {
		return repository.listBookingsForRange(providerId, startDate, endDate);
	}

	/**
	 * Puts a booking back at its original key after a failed move.
	 */
	async function restore(snapshot: Booking, log: Logger): Promise<void> {
		try {
			await repository.restoreBooking(snapshot);
		} catch (error) {
			log.fatal({ err: error, booking: snapshot }, 'booking lost during reschedule');
			throw new InconsistencyError(
				`Booking ${snapshot.date} ${snapshot.time} was lost during reschedule`,
				{ cause: error, snapshot },
			);
		}
	}

	async function rescheduleBooking(providerId: string, input: RescheduleInput): Promise<Booking> {
		const from = resolveSlot(input.from);
		const to = resolveSlot(input.to);
		const log = logger.child({ operation: 'rescheduleBooking', providerId, from, to });

		const existing = await repository.getBooking(providerId, from.date, from.time);
		if (!existing || existing.status === 'CANCELLED') {
			log.info('no active booking to reschedule');
			throw new NotFoundError(`No active booking at ${from.date} ${from.time}`);
		}

		// Delete and insert are separate writes; a failed insert is undone below.
		await repository.deleteBooking(providerId, from.date, from.time);

		try {
			const moved = await repository.putBooking(
				providerId,
				{
					...to,
					clientIdentifier: existing.clientIdentifier,
					status: existing.status,
					appointmentDetails: existing.appointmentDetails,
					createdAt: existing.createdAt,
				},
				'must-not-exist',
			);
			log.info('booking rescheduled');
			return moved;
		} catch (error) {
			await restore(existing, log);
			if (error instanceof ConflictError) {
				log.info('target slot already booked; original restored');
			} else {
				log.error({ err: error }, 'reschedule failed; original restored');
			}
			throw error;
		}
	}

	async function cancelBooking(providerId: string, slotRef: SlotRef): Promise<Booking | undefined> {
		const slot = resolveSlot(slotRef);
		const log = logger.child({ operation: 'cancelBooking', providerId, ...slot });

		const existing = await repository.getBooking(providerId, slot.date, slot.time);
		if (!existing) {
			log.debug('nothing to cancel');
			return undefined;
		}
		if (existing.status === 'CANCELLED') {
			return existing;
		}

		const cancelled = await repository.restoreBooking({ ...existing, status: 'CANCELLED' });
		log.info('booking cancelled');
		return cancelled;
	}

	async function updateBooking(
		providerId: string,
		slotRef: SlotRef,
		input: UpdateBookingInput,
	): Promise<Booking> {
		const slot = resolveSlot(slotRef);
		const log = logger.child({ operation: 'updateBooking', providerId, ...slot });

		const existing = await repository.getBooking(providerId, slot.date, slot.time);
		if (!existing) {
			throw new NotFoundError(`No booking at ${slot.date} ${slot.time}`);
		}

		const status = input.status ?? existing.status;
		if (!canTransition(existing.status, status)) {
			throw new ValidationError(`Cannot change booking status from ${existing.status} to ${status}`);
		}

		// TODO: accept an expected updatedAt and reject stale writes once the
		// storage contract grows a conditional replace.
		const updated = await repository.restoreBooking({
			...existing,
			status,
			appointmentDetails: input.details ?? existing.appointmentDetails,
		});
		log.info({ status }, 'booking updated');
		return updated;
	}

	return {
		createBooking,
		getBooking,
		listBookings,
		rescheduleBooking,
		cancelBooking,
		updateBooking,
	};
}
