/**
 * Continuation tokens carry the dialogue snapshot through Twilio callback
 * URLs, because webhook turns share no server memory.
 *
 * The token is plain base64url JSON. It is not signed: anyone who can build
 * one can forge call state, so nothing in it may grant more than the caller
 * could get by talking to the menu.
 */
import { z } from 'zod';
import { DIALOGUE_STATES, createInitialSnapshot, type DialogueSnapshot } from './state.js';

const reservationSchema = z.object({
  partySize: z.number().int().positive().nullable(),
  dateText: z.string().nullable(),
  timeText: z.string().nullable(),
  name: z.string().nullable(),
  rawUtterance: z.string(),
});

const snapshotSchema = z.object({
  state: z.enum(DIALOGUE_STATES),
  reservation: reservationSchema.nullable(),
  misunderstandings: z.number().int().nonnegative(),
});

export function encodeContinuation(snapshot: DialogueSnapshot): string {
  try {
    return Buffer.from(JSON.stringify(snapshot), 'utf8').toString('base64url');
  } catch (err) {
    console.warn('[Continuation] Could not encode snapshot:', err instanceof Error ? err.message : err);
    return '';
  }
}

export function decodeContinuation(token: string | null | undefined): DialogueSnapshot {
  if (!token) return createInitialSnapshot();

  try {
    const json: unknown = JSON.parse(Buffer.from(token, 'base64url').toString('utf8'));
    const parsed = snapshotSchema.safeParse(json);
    if (parsed.success) return parsed.data;
    console.warn('[Continuation] Token did not match snapshot shape, starting over');
  } catch {
    console.warn('[Continuation] Undecodable token, starting over');
  }
  return createInitialSnapshot();
}
