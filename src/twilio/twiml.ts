import twilio from 'twilio';
import type { SpeechLocale, CafeProfile } from '../config/env.js';
import type { DialogueTurnResult } from '../dialogue/manager.js';
import type { DialogueSnapshot } from '../dialogue/state.js';
import { encodeContinuation } from '../dialogue/continuation.js';
import { mainMenuPrompt, SPEECH_HINTS, TECHNICAL_ERROR } from '../dialogue/replies.js';
import type { SpeechSynthesizer } from '../tts/ttsProvider.js';
import { callAudio, audioUrl } from '../tts/callAudioCache.js';

export const VOICE_PATH = '/twilio/voice';
export const TURN_PATH = '/twilio/voice-webhook';

/** Anything TwiML lets us speak into: the response itself or a <Gather>. */
interface SpeakTarget {
  say(attributes: { language: SpeechLocale }, message: string): unknown;
  play(attributes: Record<string, never>, url: string): unknown;
}

export interface TwimlRendererOptions {
  cafe: CafeProfile;
  locale: SpeechLocale;
  /** Needed for <Play>; without it every reply uses <Say> */
  publicBaseUrl: string | null;
  synthesizer: SpeechSynthesizer;
  twilioCallerId: string | null;
}

export function withState(path: string, snapshot: DialogueSnapshot): string {
  const token = encodeContinuation(snapshot);
  return token ? `${path}?state=${encodeURIComponent(token)}` : path;
}

export class TwimlRenderer {
  constructor(private readonly options: TwimlRendererOptions) {}

  async renderMainMenu(callId: string, snapshot: DialogueSnapshot): Promise<string> {
    const response = new twilio.twiml.VoiceResponse();
    const gather = response.gather({
      input: ['speech', 'dtmf'],
      action: withState(TURN_PATH, snapshot),
      method: 'POST',
      timeout: 5,
      numDigits: 1,
      language: this.options.locale,
      hints: SPEECH_HINTS,
      actionOnEmptyResult: true,
    });
    await this.speak(callId, gather, mainMenuPrompt(this.options.cafe));
    // Silence is a turn too; it counts as a misunderstanding
    response.redirect({ method: 'POST' }, withState(TURN_PATH, snapshot));
    return response.toString();
  }

  async renderTurn(callId: string, turn: DialogueTurnResult): Promise<string> {
    const response = new twilio.twiml.VoiceResponse();
    const { snapshot, replyText, action } = turn;

    switch (action.type) {
      case 'gather': {
        const details = action.expect === 'reservationDetails';
        const gather = response.gather({
          input: ['speech'],
          action: withState(TURN_PATH, snapshot),
          method: 'POST',
          timeout: details ? 7 : 5,
          speechTimeout: 'auto',
          language: this.options.locale,
        });
        await this.speak(callId, gather, replyText);
        if (details) {
          response.redirect(
            { method: 'POST' },
            withState(VOICE_PATH, { state: 'mainMenu', reservation: null, misunderstandings: snapshot.misunderstandings }),
          );
        } else {
          // Silence at the read-back is handled as "not confirmed"
          response.redirect({ method: 'POST' }, withState(TURN_PATH, snapshot));
        }
        break;
      }

      case 'mainMenu':
        await this.speak(callId, response, replyText);
        response.redirect({ method: 'POST' }, withState(VOICE_PATH, snapshot));
        break;

      case 'transfer': {
        await this.speak(callId, response, replyText);
        const callerId = this.options.twilioCallerId;
        response.dial(callerId ? { callerId } : {}, action.to);
        break;
      }

      case 'end':
        await this.speak(callId, response, replyText);
        response.hangup();
        break;
    }

    return response.toString();
  }

  renderError(): string {
    const response = new twilio.twiml.VoiceResponse();
    response.say({ language: this.options.locale }, TECHNICAL_ERROR);
    response.redirect({ method: 'POST' }, VOICE_PATH);
    return response.toString();
  }

  renderStreamConnect(streamUrl: string): string {
    const response = new twilio.twiml.VoiceResponse();
    const connect = response.connect();
    connect.stream({ url: streamUrl });
    return response.toString();
  }

  private async speak(callId: string, target: SpeakTarget, text: string): Promise<void> {
    const base = this.options.publicBaseUrl;
    if (base) {
      try {
        const tts = await this.options.synthesizer.synthesize(text);
        if (tts) {
          const id = callAudio.put(callId, { bytes: tts.bytes, contentType: tts.contentType });
          target.play({}, audioUrl(base, id));
          // eslint-disable-next-line no-console
          console.log(`[TTS] Using provider: ${tts.provider}`);
          return;
        }
      } catch (e) {
        // eslint-disable-next-line no-console
        console.warn('[TTS] Synthesis failed; using Twilio <Say> fallback:', e);
      }
    }
    target.say({ language: this.options.locale }, text);
  }
}
