export interface ReservationRecord {
  partySize: number | null;
  dateText: string | null; // "tomorrow", "on friday 12"
  timeText: string | null; // "7pm", "7:30 p.m."
  name: string | null;
  rawUtterance: string;
}

export interface ConfirmedBooking {
  callId: string;
  callerPhone: string | null;
  reservation: ReservationRecord;
  requestedStartISO: string | null; // null when date/time could not be resolved
  confirmedAt: string; // ISO 8601
}

export function createEmptyReservation(rawUtterance = ''): ReservationRecord {
  return {
    partySize: null,
    dateText: null,
    timeText: null,
    name: null,
    rawUtterance,
  };
}

/** A record can be read back only with a party size and some date or time cue. */
export function isSufficientToConfirm(record: ReservationRecord): boolean {
  return record.partySize !== null && (record.dateText !== null || record.timeText !== null);
}
