import crypto from 'crypto';

export interface AudioClip {
  contentType: string;
  bytes: Buffer;
}

interface StoredClip extends AudioClip {
  callId: string;
  expiresAtMs: number;
}

export interface CallAudioCacheOptions {
  ttlMs: number;
  /** Oldest clips are dropped past this many */
  maxClips: number;
  now?: () => number;
}

/**
 * Synthesized replies waiting for Twilio to fetch them through
 * GET /tts/:id.mp3.
 *
 * A call only ever plays its latest reply: new TwiML for the call replaces
 * whatever was playing, so storing a clip for a call drops the one before it.
 */
export class CallAudioCache {
  private readonly clips = new Map<string, StoredClip>();
  private readonly latestByCall = new Map<string, string>();
  private readonly now: () => number;

  constructor(private readonly options: CallAudioCacheOptions) {
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.clips.size;
  }

  put(callId: string, clip: AudioClip): string {
    const nowMs = this.now();
    this.evictExpired(nowMs);

    const previous = this.latestByCall.get(callId);
    if (previous) this.drop(previous);

    const id = crypto.randomBytes(16).toString('hex');
    this.clips.set(id, { ...clip, callId, expiresAtMs: nowMs + this.options.ttlMs });
    this.latestByCall.set(callId, id);

    // Map iteration is insertion order, so the first key is the oldest clip
    while (this.clips.size > this.options.maxClips) {
      const oldest = this.clips.keys().next();
      if (oldest.done) break;
      this.drop(oldest.value);
    }
    return id;
  }

  get(id: string): AudioClip | null {
    this.evictExpired(this.now());
    const found = this.clips.get(id);
    if (!found) return null;
    return { contentType: found.contentType, bytes: found.bytes };
  }

  private evictExpired(nowMs: number): void {
    for (const [id, clip] of this.clips) {
      if (clip.expiresAtMs <= nowMs) this.drop(id);
    }
  }

  private drop(id: string): void {
    const clip = this.clips.get(id);
    if (!clip) return;
    this.clips.delete(id);
    if (this.latestByCall.get(clip.callId) === id) this.latestByCall.delete(clip.callId);
  }
}

export const callAudio = new CallAudioCache({ ttlMs: 10 * 60 * 1000, maxClips: 500 });

export function audioUrl(publicBaseUrl: string, id: string): string {
  return `${publicBaseUrl.replace(/\/$/, '')}/tts/${id}.mp3`;
}
