import { describe, expect, it } from 'vitest';

import type { ConfirmedBooking } from '../models/reservation.js';
import { createReservationFixture } from '../testing/fixtures.js';
import { InMemoryBookingStore } from './bookingStore.js';

const booking = (callId: string): ConfirmedBooking => ({
  callId,
  callerPhone: null,
  reservation: createReservationFixture(),
  requestedStartISO: null,
  confirmedAt: '2026-10-19T10:00:00.000Z',
});

describe('InMemoryBookingStore', () => {
  it('keeps only the most recent bookings', async () => {
    const store = new InMemoryBookingStore(2);

    await store.commit(booking('CA-1'));
    await store.commit(booking('CA-2'));
    await store.commit(booking('CA-3'));

    expect(store.list().map((b) => b.callId)).toEqual(['CA-2', 'CA-3']);
  });
});
