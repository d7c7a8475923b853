export interface TranscriptEvent {
  isFinal: boolean;
  transcript: string;
}

export interface TranscriberHandlers {
  onTranscript(event: TranscriptEvent): void;
  onError(error: Error): void;
}

/** Streaming speech-to-text for one call. */
export interface Transcriber {
  /** Raw base64 media payload exactly as Twilio sent it */
  sendAudio(payloadBase64: string): void;
  close(): Promise<void>;
}

export type TranscriberFactory = (callId: string, handlers: TranscriberHandlers) => Promise<Transcriber>;

/**
 * Out-of-band control of a live call: each method replaces what the caller
 * hears next.
 */
export interface CallController {
  play(callId: string, audioUrl: string): Promise<void>;
  say(callId: string, text: string): Promise<void>;
  transfer(callId: string, text: string, to: string): Promise<void>;
}
