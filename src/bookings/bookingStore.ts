import type { ConfirmedBooking } from '../models/reservation.js';

/**
 * The point where a confirmed reservation becomes a committed fact.
 * Wire a real store (database, sheet, POS) behind this interface.
 */
export interface BookingStore {
  commit(booking: ConfirmedBooking): Promise<void>;
}

/**
 * Keeps the most recent bookings in memory, for tests and single-process
 * demos. Anything older than `maxBookings` is dropped; use a durable store
 * in production.
 */
export class InMemoryBookingStore implements BookingStore {
  private readonly bookings: ConfirmedBooking[] = [];

  constructor(private readonly maxBookings = 500) {}

  async commit(booking: ConfirmedBooking): Promise<void> {
    this.bookings.push(booking);
    if (this.bookings.length > this.maxBookings) {
      this.bookings.splice(0, this.bookings.length - this.maxBookings);
    }
    // eslint-disable-next-line no-console
    console.log(
      `[Bookings] Committed booking for call ${booking.callId}: ${booking.reservation.partySize} people, start ${booking.requestedStartISO ?? 'unresolved'}`,
    );
  }

  list(): readonly ConfirmedBooking[] {
    return this.bookings;
  }
}
