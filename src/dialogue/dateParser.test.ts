import { describe, expect, it } from 'vitest';

import { createReservationFixture } from '../testing/fixtures.js';
import { parseDateTimeFromText, resolveReservationStart } from './dateParser.js';

// Monday 19 October 2026, 10:00 local time
const REF = new Date(2026, 9, 19, 10, 0, 0);

describe('parseDateTimeFromText', () => {
  it('resolves a relative day with a time', () => {
    expect(parseDateTimeFromText('tomorrow at 7pm', REF)).toEqual({
      iso: new Date(2026, 9, 20, 19, 0, 0).toISOString(),
      hasTime: true,
    });
  });

  it('returns null when there is no date or time', () => {
    expect(parseDateTimeFromText('whenever suits you', REF)).toBeNull();
  });
});

describe('resolveReservationStart', () => {
  it('joins the spoken date and time', () => {
    expect(resolveReservationStart(createReservationFixture(), REF)).toBe(
      new Date(2026, 9, 20, 19, 0, 0).toISOString(),
    );
  });

  it('drops a leading "on" and looks forward to the next weekday', () => {
    const record = createReservationFixture({ dateText: 'on friday', timeText: '8pm' });
    expect(resolveReservationStart(record, REF)).toBe(new Date(2026, 9, 23, 20, 0, 0).toISOString());
  });

  it('returns null without date or time text', () => {
    const record = createReservationFixture({ dateText: null, timeText: null });
    expect(resolveReservationStart(record, REF)).toBeNull();
  });
});
