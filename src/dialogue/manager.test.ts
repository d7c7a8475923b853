import { describe, expect, it } from 'vitest';

import { STAFF_NUMBER, createDialogueContext, createReservationFixture } from '../testing/fixtures.js';
import { advanceDialogue } from './manager.js';
import {
  BOOKING_CONFIRMED,
  CALL_BACK_LATER,
  CONNECTING_STAFF,
  GOODBYE,
  NOT_UNDERSTOOD,
  NO_STAFF_LINE,
  RESERVATION_PROMPT,
  RESERVATION_RETRY,
  RESTART,
} from './replies.js';
import { createInitialSnapshot, type DialogueSnapshot, type TurnInput } from './state.js';

function speech(text: string): TurnInput {
  return { callId: 'CA-test', channel: 'speech', text, digit: null };
}

function keypad(digit: string, text: string | null = null): TurnInput {
  return { callId: 'CA-test', channel: 'keypad', text, digit };
}

function menuWith(misunderstandings: number): DialogueSnapshot {
  return { state: 'mainMenu', reservation: null, misunderstandings };
}

describe('advanceDialogue from the main menu', () => {
  const ctx = createDialogueContext();

  it('starts a reservation on digit 1', async () => {
    const turn = await advanceDialogue(createInitialSnapshot(), keypad('1'), ctx);

    expect(turn.snapshot).toEqual({ state: 'awaitingReservationDetails', reservation: null, misunderstandings: 0 });
    expect(turn.replyText).toBe(RESERVATION_PROMPT);
    expect(turn.action).toEqual({ type: 'gather', expect: 'reservationDetails' });
  });

  it('gives the keypad priority over speech', async () => {
    const turn = await advanceDialogue(createInitialSnapshot(), keypad('2', 'book a table'), ctx);

    expect(turn.replyText).toBe('You can see our menu here: https://cafe.test/menu. Anything else I can help with?');
    expect(turn.action).toEqual({ type: 'mainMenu' });
  });

  it('answers info questions and resets the counter', async () => {
    const turn = await advanceDialogue(menuWith(2), speech('what are your hours'), ctx);

    expect(turn.replyText).toBe('Our opening hours are daily 8 AM to 9 PM. Anything else I can help with?');
    expect(turn.snapshot).toEqual(createInitialSnapshot());
  });

  it('gives the Wi-Fi details', async () => {
    const turn = await advanceDialogue(createInitialSnapshot(), keypad('5'), ctx);

    expect(turn.replyText).toBe('Here is the Wi-Fi information. Network: TestCafe, Password: test-secret. Anything else?');
  });

  it('transfers on request when a staff line exists', async () => {
    const turn = await advanceDialogue(createInitialSnapshot(), keypad('0'), ctx);

    expect(turn.snapshot.state).toBe('escalated');
    expect(turn.replyText).toBe(CONNECTING_STAFF);
    expect(turn.action).toEqual({ type: 'transfer', to: STAFF_NUMBER });
  });

  it('apologises and stays in the menu when no staff line exists', async () => {
    const turn = await advanceDialogue(
      createInitialSnapshot(),
      speech('let me speak to a human'),
      createDialogueContext({ staffNumber: null }),
    );

    expect(turn.snapshot.state).toBe('mainMenu');
    expect(turn.replyText).toBe(NO_STAFF_LINE);
    expect(turn.action).toEqual({ type: 'mainMenu' });
  });

  it('counts a misunderstanding', async () => {
    const turn = await advanceDialogue(createInitialSnapshot(), speech('purple elephants'), ctx);

    expect(turn.snapshot).toEqual(menuWith(1));
    expect(turn.replyText).toBe(NOT_UNDERSTOOD);
    expect(turn.action).toEqual({ type: 'mainMenu' });
  });

  it('treats an unmapped digit as a misunderstanding', async () => {
    const turn = await advanceDialogue(createInitialSnapshot(), keypad('9'), ctx);

    expect(turn.snapshot).toEqual(menuWith(1));
  });

  it('tolerates exactly the threshold before transferring', async () => {
    const second = await advanceDialogue(menuWith(1), speech('purple elephants'), ctx);
    expect(second.snapshot).toEqual(menuWith(2));

    const third = await advanceDialogue(second.snapshot, speech('purple elephants'), ctx);
    expect(third.snapshot.state).toBe('escalated');
    expect(third.action).toEqual({ type: 'transfer', to: STAFF_NUMBER });
  });

  it('keeps re-prompting without a staff line and no cap', async () => {
    const turn = await advanceDialogue(
      menuWith(10),
      speech('purple elephants'),
      createDialogueContext({ staffNumber: null }),
    );

    expect(turn.snapshot).toEqual(menuWith(11));
    expect(turn.action).toEqual({ type: 'mainMenu' });
  });

  it('ends the call past the cap without a staff line', async () => {
    const turn = await advanceDialogue(
      menuWith(2),
      speech('purple elephants'),
      createDialogueContext({ staffNumber: null, maxUnassistedMisunderstandings: 2 }),
    );

    expect(turn.snapshot).toEqual({ state: 'terminated', reservation: null, misunderstandings: 3 });
    expect(turn.replyText).toBe(CALL_BACK_LATER);
    expect(turn.action).toEqual({ type: 'end' });
  });
});

describe('advanceDialogue while taking a reservation', () => {
  const ctx = createDialogueContext();
  const details: DialogueSnapshot = { state: 'awaitingReservationDetails', reservation: null, misunderstandings: 0 };

  it('reads the reservation back for confirmation', async () => {
    const utterance = 'table for 4 tomorrow at 7pm under the name Asha';
    const turn = await advanceDialogue(details, speech(utterance), ctx);

    expect(turn.snapshot).toEqual({
      state: 'awaitingConfirmation',
      reservation: createReservationFixture({ rawUtterance: utterance }),
      misunderstandings: 0,
    });
    expect(turn.replyText).toBe(
      "Let me confirm: 4 people, tomorrow at 7pm, under the name Asha. If this is correct, say 'confirm'. To change, say 'change'.",
    );
    expect(turn.action).toEqual({ type: 'gather', expect: 'confirmation' });
  });

  it('asks again when details are missing', async () => {
    const turn = await advanceDialogue(details, speech('um not sure yet'), ctx);

    expect(turn.snapshot).toEqual({ state: 'awaitingReservationDetails', reservation: null, misunderstandings: 1 });
    expect(turn.replyText).toBe(RESERVATION_RETRY);
    expect(turn.action).toEqual({ type: 'gather', expect: 'reservationDetails' });
  });

  it('escalates after repeated extraction failures', async () => {
    const turn = await advanceDialogue({ ...details, misunderstandings: 2 }, speech(''), ctx);

    expect(turn.snapshot.state).toBe('escalated');
    expect(turn.action).toEqual({ type: 'transfer', to: STAFF_NUMBER });
  });
});

describe('advanceDialogue at the confirmation step', () => {
  const ctx = createDialogueContext();
  const reservation = createReservationFixture();
  const confirming: DialogueSnapshot = { state: 'awaitingConfirmation', reservation, misunderstandings: 0 };

  it('books on an explicit confirmation', async () => {
    const turn = await advanceDialogue(confirming, speech('Yes, confirm'), ctx);

    expect(turn.snapshot.state).toBe('terminated');
    expect(turn.replyText).toBe(BOOKING_CONFIRMED);
    expect(turn.action).toEqual({ type: 'end' });
    expect(turn.confirmedReservation).toEqual(reservation);
  });

  it.each(['no, change it', 'yes but the time is wrong', ''])('restarts on "%s"', async (text) => {
    const turn = await advanceDialogue(confirming, speech(text), ctx);

    expect(turn.snapshot).toEqual(createInitialSnapshot());
    expect(turn.replyText).toBe(RESTART);
    expect(turn.action).toEqual({ type: 'mainMenu' });
    expect(turn.confirmedReservation).toBeNull();
  });

  it('does not book a record that is not sufficient', async () => {
    const turn = await advanceDialogue(
      { ...confirming, reservation: createReservationFixture({ partySize: null }) },
      speech('confirm'),
      ctx,
    );

    expect(turn.replyText).toBe(RESTART);
    expect(turn.confirmedReservation).toBeNull();
  });
});

describe('advanceDialogue in final states', () => {
  const ctx = createDialogueContext();

  it('says goodbye once terminated', async () => {
    const snapshot: DialogueSnapshot = { state: 'terminated', reservation: null, misunderstandings: 0 };
    const turn = await advanceDialogue(snapshot, speech('hello?'), ctx);

    expect(turn.replyText).toBe(GOODBYE);
    expect(turn.action).toEqual({ type: 'end' });
  });

  it('keeps transferring once escalated', async () => {
    const snapshot: DialogueSnapshot = { state: 'escalated', reservation: null, misunderstandings: 3 };
    const turn = await advanceDialogue(snapshot, speech('hello?'), ctx);

    expect(turn.action).toEqual({ type: 'transfer', to: STAFF_NUMBER });
  });
});
