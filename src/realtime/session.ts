import type { CafeProfile } from '../config/env.js';
import { PLEASE_REPEAT } from '../dialogue/replies.js';
import type { SpeechSynthesizer } from '../tts/ttsProvider.js';
import { callAudio, audioUrl } from '../tts/callAudioCache.js';
import { abortable } from './abortable.js';
import { AsyncQueue } from './asyncQueue.js';
import { realtimeGreeting, type ReplyGenerator } from './replyGenerator.js';
import type { SessionRegistry } from './sessionRegistry.js';
import type { CallController, Transcriber, TranscriberFactory, TranscriptEvent } from './types.js';

export interface RealtimeSessionDeps {
  cafe: CafeProfile;
  replies: ReplyGenerator;
  synthesizer: SpeechSynthesizer;
  calls: CallController;
  createTranscriber: TranscriberFactory;
  registry: SessionRegistry;
  publicBaseUrl: string | null;
  greetingDelayMs: number;
}

export interface RealtimeSessionOptions {
  /** The stream was reopened after a reply; skip the greeting */
  resumed?: boolean;
  /** Messages already handled on this call before the stream was reopened */
  messageCount?: number;
}

type SessionEvent = { kind: 'transcript'; text: string } | { kind: 'transcriptionError' };

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * One live phone call on a media stream. Audio only reaches the transcriber
 * after the greeting has been handed to the call, and every reply is produced
 * by a single consumer working through final transcripts in order.
 */
export class RealtimeSession {
  lastActivityMs = Date.now();

  private greeted = false;
  private stopped = false;
  private messageCount: number;
  private transcriber: Transcriber | null = null;
  private consumer: Promise<void> | null = null;
  private readonly queue = new AsyncQueue<SessionEvent>();
  private readonly abort = new AbortController();

  constructor(
    readonly callId: string,
    private readonly deps: RealtimeSessionDeps,
    private readonly options: RealtimeSessionOptions = {},
  ) {
    this.messageCount = options.messageCount ?? 0;
  }

  get isGreeted(): boolean {
    return this.greeted;
  }

  get isStopped(): boolean {
    return this.stopped;
  }

  get messagesHandled(): number {
    return this.messageCount;
  }

  async start(): Promise<void> {
    this.deps.registry.add(this);

    try {
      this.transcriber = await this.deps.createTranscriber(this.callId, {
        onTranscript: (event) => this.onTranscript(event),
        onError: (error) => this.onTranscriberError(error),
      });
    } catch (err) {
      // eslint-disable-next-line no-console
      console.error(`[Realtime] Transcriber unavailable for call ${this.callId}:`, err);
    }

    if (this.stopped) {
      await this.closeTranscriber();
      return;
    }

    this.consumer = this.consume();

    if (!this.options.resumed) {
      await sleep(this.deps.greetingDelayMs);
      if (this.stopped) return;
      const greeting = realtimeGreeting(this.deps.cafe);
      await this.speak(greeting, greeting);
    }

    if (!this.stopped) {
      this.greeted = true;
      // eslint-disable-next-line no-console
      console.log(`[Realtime] Call ${this.callId} ready for audio`);
    }
  }

  /** Returns whether the payload was handed to the transcriber. */
  relayAudio(payloadBase64: string): boolean {
    this.lastActivityMs = Date.now();
    if (!this.greeted || this.stopped || !this.transcriber) return false;

    try {
      this.transcriber.sendAudio(payloadBase64);
      return true;
    } catch (err) {
      // eslint-disable-next-line no-console
      console.warn(`[Realtime] Dropping audio for call ${this.callId}:`, err instanceof Error ? err.message : err);
      return false;
    }
  }

  async stop(): Promise<void> {
    if (this.stopped) return;
    this.stopped = true;
    this.abort.abort();
    this.queue.close();
    this.deps.registry.remove(this);

    await this.closeTranscriber();
    if (this.consumer) await this.consumer;

    // eslint-disable-next-line no-console
    console.log(`[Realtime] Session closed for call ${this.callId} after ${this.messageCount} messages`);
  }

  private onTranscript(event: TranscriptEvent): void {
    this.lastActivityMs = Date.now();
    if (!event.isFinal) return;
    const text = event.transcript.trim();
    if (!text) return;
    this.queue.push({ kind: 'transcript', text });
  }

  private onTranscriberError(error: Error): void {
    // eslint-disable-next-line no-console
    console.warn(`[Realtime] Transcription error on call ${this.callId}:`, error.message);
    this.queue.push({ kind: 'transcriptionError' });
  }

  private async closeTranscriber(): Promise<void> {
    const transcriber = this.transcriber;
    this.transcriber = null;
    if (!transcriber) return;
    try {
      await transcriber.close();
    } catch (err) {
      // eslint-disable-next-line no-console
      console.warn(`[Realtime] Transcriber close failed for call ${this.callId}:`, err);
    }
  }

  private async consume(): Promise<void> {
    const signal = this.abort.signal;

    for await (const event of this.queue) {
      if (signal.aborted) break;

      if (event.kind === 'transcriptionError') {
        await this.sayText(PLEASE_REPEAT);
        continue;
      }

      this.messageCount += 1;
      // eslint-disable-next-line no-console
      console.log(`[Realtime] Call ${this.callId} message #${this.messageCount}: "${event.text}"`);

      try {
        const reply = await abortable(this.deps.replies.reply(event.text, this.messageCount, signal), signal);
        if (reply.kind === 'transfer') {
          await abortable(this.deps.calls.transfer(this.callId, reply.text, reply.to), signal);
        } else {
          await this.speak(reply.text);
        }
      } catch (err) {
        if (signal.aborted) break;
        // eslint-disable-next-line no-console
        console.error(`[Realtime] Reply failed on call ${this.callId}:`, err);
        await this.sayText(PLEASE_REPEAT);
      }
    }
  }

  /** `fallbackText` goes out through <Say> when the reply cannot be delivered. */
  private async speak(text: string, fallbackText = PLEASE_REPEAT): Promise<void> {
    const signal = this.abort.signal;
    try {
      const audio = await abortable(this.deps.synthesizer.synthesize(text), signal);
      const base = this.deps.publicBaseUrl;
      if (audio && base) {
        const id = callAudio.put(this.callId, { bytes: audio.bytes, contentType: audio.contentType });
        await abortable(this.deps.calls.play(this.callId, audioUrl(base, id)), signal);
      } else {
        await abortable(this.deps.calls.say(this.callId, text), signal);
      }
    } catch (err) {
      if (signal.aborted) return;
      // eslint-disable-next-line no-console
      console.warn(`[Realtime] Could not speak on call ${this.callId}:`, err instanceof Error ? err.message : err);
      await this.sayText(fallbackText);
    }
  }

  private async sayText(text: string): Promise<void> {
    const signal = this.abort.signal;
    try {
      await abortable(this.deps.calls.say(this.callId, text), signal);
    } catch (err) {
      if (signal.aborted) return;
      // eslint-disable-next-line no-console
      console.error(`[Realtime] Fallback prompt failed on call ${this.callId}:`, err);
    }
  }
}
