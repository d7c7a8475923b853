import express, { type Request, type Response } from 'express';
import { z } from 'zod';
import type { EnvConfig } from '../config/env.js';
import type { BookingStore } from '../bookings/bookingStore.js';
import { advanceDialogue, type DialogueContext, type DialogueTurnResult } from '../dialogue/manager.js';
import { decodeContinuation } from '../dialogue/continuation.js';
import { resolveReservationStart } from '../dialogue/dateParser.js';
import { createInitialSnapshot, type TurnInput } from '../dialogue/state.js';
import type { ConfirmedBooking } from '../models/reservation.js';
import { MEDIA_STREAM_PATH } from '../realtime/mediaStream.js';
import { twilioWebhookAuth } from './signature.js';
import type { TwimlRenderer } from './twiml.js';

export interface TwilioVoiceRouterDeps {
  env: EnvConfig;
  dialogue: DialogueContext;
  renderer: TwimlRenderer;
  bookings: BookingStore;
  now?: () => Date;
}

const webhookBodySchema = z.object({
  CallSid: z.string().optional(),
  From: z.string().optional(),
  Digits: z.string().optional(),
  SpeechResult: z.string().optional(),
});

function stateParam(req: Request): string | null {
  return typeof req.query.state === 'string' ? req.query.state : null;
}

function readTurnInput(body: unknown): { input: TurnInput; from: string | null } {
  const parsed = webhookBodySchema.safeParse(body ?? {});
  const fields: z.infer<typeof webhookBodySchema> = parsed.success ? parsed.data : {};
  const digit = fields.Digits?.trim() || null;

  return {
    input: {
      callId: fields.CallSid || 'unknown-call',
      channel: digit ? 'keypad' : 'speech',
      text: digit ? null : fields.SpeechResult ?? null,
      digit,
    },
    from: fields.From || null,
  };
}

export function mediaStreamUrl(publicBaseUrl: string): string {
  return `${publicBaseUrl.replace(/^http/, 'ws')}${MEDIA_STREAM_PATH}`;
}

function sendTwiml(res: Response, twiml: string): void {
  res.type('text/xml').send(twiml);
}

export function createTwilioVoiceRouter(deps: TwilioVoiceRouterDeps): express.Router {
  const router = express.Router();
  const now = deps.now ?? (() => new Date());

  router.use(twilioWebhookAuth(deps.env));

  async function commitBooking(turn: DialogueTurnResult, input: TurnInput, from: string | null): Promise<void> {
    const reservation = turn.confirmedReservation;
    if (!reservation) return;

    const confirmedAt = now();
    const booking: ConfirmedBooking = {
      callId: input.callId,
      callerPhone: from,
      reservation,
      requestedStartISO: resolveReservationStart(reservation, confirmedAt),
      confirmedAt: confirmedAt.toISOString(),
    };

    try {
      await deps.bookings.commit(booking);
    } catch (err) {
      // eslint-disable-next-line no-console
      console.error(`[Twilio] Could not commit booking for call ${input.callId}:`, err, booking);
    }
  }

  // Main menu. Also the entry point configured on the phone number.
  router.all('/voice', async (req, res) => {
    try {
      const snapshot = decodeContinuation(stateParam(req));
      const { input } = readTurnInput(req.body);
      sendTwiml(res, await deps.renderer.renderMainMenu(input.callId, snapshot));
    } catch (err) {
      // eslint-disable-next-line no-console
      console.error('[Twilio] Error rendering main menu:', err);
      sendTwiml(res, deps.renderer.renderError());
    }
  });

  router.post('/voice-webhook', async (req, res) => {
    const { input, from } = readTurnInput(req.body);

    try {
      const snapshot = decodeContinuation(stateParam(req));
      const turn = await advanceDialogue(snapshot, input, deps.dialogue);
      // eslint-disable-next-line no-console
      console.log(`[Twilio] ${input.callId} ${input.channel}: ${snapshot.state} -> ${turn.snapshot.state}`);

      await commitBooking(turn, input, from);
      sendTwiml(res, await deps.renderer.renderTurn(input.callId, turn));
    } catch (err) {
      // eslint-disable-next-line no-console
      console.error(`[Twilio] Error handling turn for call ${input.callId}:`, err);
      sendTwiml(res, deps.renderer.renderError());
    }
  });

  // Realtime variant: hand the call audio to the media stream endpoint
  router.post('/realtime', async (req, res) => {
    const base = deps.env.publicBaseUrl;
    if (deps.env.realtimeEnabled && base) {
      sendTwiml(res, deps.renderer.renderStreamConnect(mediaStreamUrl(base)));
      return;
    }

    // eslint-disable-next-line no-console
    console.warn('[Twilio] Realtime requested but not enabled; using turn-based menu');
    try {
      const { input } = readTurnInput(req.body);
      sendTwiml(res, await deps.renderer.renderMainMenu(input.callId, createInitialSnapshot()));
    } catch (err) {
      // eslint-disable-next-line no-console
      console.error('[Twilio] Error rendering main menu:', err);
      sendTwiml(res, deps.renderer.renderError());
    }
  });

  return router;
}
