import twilio from 'twilio';
import type { SpeechLocale } from '../config/env.js';
import { MESSAGE_COUNT_PARAMETER, RESUME_PARAMETER } from '../realtime/mediaStream.js';
import type { CallController } from '../realtime/types.js';

/** The slice of the Twilio REST client used to redirect a live call. */
export interface LiveCallClient {
  calls(callSid: string): { update(params: { twiml: string }): Promise<unknown> };
}

export interface TwilioCallControllerOptions {
  accountSid: string;
  authToken: string;
  locale: SpeechLocale;
  callerId: string | null;
  /** wss:// URL of the media endpoint; the stream is reopened after each reply */
  streamUrl: string | null;
  /** Messages handled so far on the call, handed to the reopened stream */
  messageCount: (callId: string) => number;
  client?: LiveCallClient;
}

/**
 * Speaks into a live call by replacing its TwiML through the REST API.
 * Replacing the TwiML ends the current media stream, so replies end by
 * reconnecting it with resume=true.
 */
export class TwilioCallController implements CallController {
  private readonly client: LiveCallClient;

  constructor(private readonly options: TwilioCallControllerOptions) {
    this.client = options.client ?? twilio(options.accountSid, options.authToken);
  }

  async play(callId: string, audioUrl: string): Promise<void> {
    const response = new twilio.twiml.VoiceResponse();
    response.play({}, audioUrl);
    this.listenAgain(callId, response);
    await this.update(callId, response.toString());
  }

  async say(callId: string, text: string): Promise<void> {
    const response = new twilio.twiml.VoiceResponse();
    response.say({ language: this.options.locale }, text);
    this.listenAgain(callId, response);
    await this.update(callId, response.toString());
  }

  async transfer(callId: string, text: string, to: string): Promise<void> {
    const response = new twilio.twiml.VoiceResponse();
    response.say({ language: this.options.locale }, text);
    const callerId = this.options.callerId;
    response.dial(callerId ? { callerId } : {}, to);
    await this.update(callId, response.toString());
  }

  private listenAgain(callId: string, response: twilio.twiml.VoiceResponse): void {
    if (!this.options.streamUrl) {
      response.pause({ length: 1 });
      return;
    }
    const stream = response.connect().stream({ url: this.options.streamUrl });
    stream.parameter({ name: RESUME_PARAMETER, value: 'true' });
    stream.parameter({ name: MESSAGE_COUNT_PARAMETER, value: String(this.options.messageCount(callId)) });
  }

  private async update(callId: string, twiml: string): Promise<void> {
    await this.client.calls(callId).update({ twiml });
    // eslint-disable-next-line no-console
    console.log(`[Twilio] Updated live call ${callId}`);
  }
}
