import type { CafeProfile } from '../config/env.js';
import { isSufficientToConfirm, type ReservationRecord } from '../models/reservation.js';
import type { IntentClassifier, IntentLabel } from './intentClassifier.js';
import type { ReservationExtractor } from './reservationExtractor.js';
import { createInitialSnapshot, type DialogueSnapshot, type TurnInput } from './state.js';
import { shouldEscalate, shouldGiveUp } from './escalation.js';
import {
  DIGIT_ROUTES,
  isInfoIntent,
  infoAnswer,
  confirmationPrompt,
  RESERVATION_PROMPT,
  RESERVATION_RETRY,
  NOT_UNDERSTOOD,
  RESTART,
  BOOKING_CONFIRMED,
  CONNECTING_STAFF,
  NO_STAFF_LINE,
  CALL_BACK_LATER,
  GOODBYE,
} from './replies.js';

export type DialogueAction =
  /** Listen for the next utterance and post it back with the new snapshot */
  | { type: 'gather'; expect: 'reservationDetails' | 'confirmation' }
  /** Speak the reply, then offer the main menu again */
  | { type: 'mainMenu' }
  | { type: 'transfer'; to: string }
  | { type: 'end' };

export interface DialogueTurnResult {
  snapshot: DialogueSnapshot;
  replyText: string;
  action: DialogueAction;
  /** Set only on the turn where the caller accepted the read-back */
  confirmedReservation: ReservationRecord | null;
}

export interface DialogueContext {
  cafe: CafeProfile;
  classifier: IntentClassifier;
  extractor: ReservationExtractor;
  staffNumber: string | null;
  maxMisunderstandings: number;
  maxUnassistedMisunderstandings: number;
}

const CONFIRM_REGEX = /\b(confirm|confirmed|yes|yeah|correct|that's right)\b/i;
const DECLINE_REGEX = /\b(no|not|change|wrong)\b/i;

function result(
  snapshot: DialogueSnapshot,
  replyText: string,
  action: DialogueAction,
  confirmedReservation: ReservationRecord | null = null,
): DialogueTurnResult {
  return { snapshot, replyText, action, confirmedReservation };
}

function escalate(snapshot: DialogueSnapshot, ctx: DialogueContext): DialogueTurnResult {
  if (ctx.staffNumber) {
    return result(
      { state: 'escalated', reservation: null, misunderstandings: snapshot.misunderstandings },
      CONNECTING_STAFF,
      { type: 'transfer', to: ctx.staffNumber },
    );
  }
  return result(
    { state: 'mainMenu', reservation: null, misunderstandings: snapshot.misunderstandings },
    NO_STAFF_LINE,
    { type: 'mainMenu' },
  );
}

function misunderstood(snapshot: DialogueSnapshot, ctx: DialogueContext): DialogueTurnResult {
  const misunderstandings = snapshot.misunderstandings + 1;
  const hasHumanLine = Boolean(ctx.staffNumber);

  if (shouldEscalate(misunderstandings, ctx.maxMisunderstandings, hasHumanLine)) {
    return escalate({ ...snapshot, misunderstandings }, ctx);
  }

  if (shouldGiveUp(misunderstandings, ctx.maxUnassistedMisunderstandings, hasHumanLine)) {
    return result(
      { state: 'terminated', reservation: null, misunderstandings },
      CALL_BACK_LATER,
      { type: 'end' },
    );
  }

  if (snapshot.state === 'awaitingReservationDetails') {
    return result(
      { state: 'awaitingReservationDetails', reservation: null, misunderstandings },
      RESERVATION_RETRY,
      { type: 'gather', expect: 'reservationDetails' },
    );
  }

  return result(
    { state: 'mainMenu', reservation: null, misunderstandings },
    NOT_UNDERSTOOD,
    { type: 'mainMenu' },
  );
}

/**
 * One dialogue turn: (snapshot, input) -> (next snapshot, what to say and do).
 * Holds no per-call memory; the caller decides where the snapshot lives.
 */
export async function advanceDialogue(
  snapshot: DialogueSnapshot,
  input: TurnInput,
  ctx: DialogueContext,
  signal?: AbortSignal,
): Promise<DialogueTurnResult> {
  const text = (input.text ?? '').trim();
  const digit = (input.digit ?? '').trim();

  switch (snapshot.state) {
    case 'mainMenu': {
      let intent: IntentLabel = 'unknown';
      if (digit) {
        intent = DIGIT_ROUTES[digit.charAt(0)] ?? 'unknown';
      } else if (text) {
        intent = await ctx.classifier.classify(text, signal);
      }

      if (intent === 'reservation') {
        return result(
          { state: 'awaitingReservationDetails', reservation: null, misunderstandings: 0 },
          RESERVATION_PROMPT,
          { type: 'gather', expect: 'reservationDetails' },
        );
      }

      if (isInfoIntent(intent)) {
        return result(createInitialSnapshot(), infoAnswer(intent, ctx.cafe), { type: 'mainMenu' });
      }

      if (intent === 'human') {
        return escalate(snapshot, ctx);
      }

      return misunderstood(snapshot, ctx);
    }

    case 'awaitingReservationDetails': {
      const record = text ? await ctx.extractor.extract(text, signal) : null;
      if (!record) {
        return misunderstood(snapshot, ctx);
      }

      return result(
        { state: 'awaitingConfirmation', reservation: record, misunderstandings: 0 },
        confirmationPrompt(record),
        { type: 'gather', expect: 'confirmation' },
      );
    }

    case 'awaitingConfirmation': {
      const reservation = snapshot.reservation;
      const accepted = CONFIRM_REGEX.test(text) && !DECLINE_REGEX.test(text);

      if (reservation && isSufficientToConfirm(reservation) && accepted) {
        return result(
          { state: 'terminated', reservation, misunderstandings: 0 },
          BOOKING_CONFIRMED,
          { type: 'end' },
          reservation,
        );
      }

      return result(createInitialSnapshot(), RESTART, { type: 'mainMenu' });
    }

    case 'escalated':
      return escalate(snapshot, ctx);

    case 'terminated':
      return result(snapshot, GOODBYE, { type: 'end' });
  }
}
