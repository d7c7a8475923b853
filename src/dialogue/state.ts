import type { ReservationRecord } from '../models/reservation.js';

export const DIALOGUE_STATES = [
  'mainMenu',
  'awaitingReservationDetails',
  'awaitingConfirmation',
  'escalated',
  'terminated',
] as const;

export type DialogueState = (typeof DIALOGUE_STATES)[number];

export type TurnChannel = 'keypad' | 'speech' | 'realtime_transcript';

export interface TurnInput {
  callId: string;
  channel: TurnChannel;
  text: string | null;
  digit: string | null;
}

/**
 * Everything the dialogue needs to carry from one turn to the next.
 * Turn-based calls round-trip it through the continuation token.
 */
export interface DialogueSnapshot {
  state: DialogueState;
  reservation: ReservationRecord | null;
  misunderstandings: number;
}

export function createInitialSnapshot(): DialogueSnapshot {
  return {
    state: 'mainMenu',
    reservation: null,
    misunderstandings: 0,
  };
}
