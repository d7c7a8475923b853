import type { RealtimeSession } from './session.js';

/** Live realtime sessions keyed by call id. */
export class SessionRegistry {
  private readonly sessions = new Map<string, RealtimeSession>();

  add(session: RealtimeSession): void {
    const previous = this.sessions.get(session.callId);
    if (previous && previous !== session) {
      // eslint-disable-next-line no-console
      console.warn(`[Realtime] Replacing stale session for call ${session.callId}`);
    }
    this.sessions.set(session.callId, session);
  }

  /** Removes the entry only if it still belongs to this session. */
  remove(session: RealtimeSession): void {
    if (this.sessions.get(session.callId) === session) {
      this.sessions.delete(session.callId);
    }
  }

  get(callId: string): RealtimeSession | undefined {
    return this.sessions.get(callId);
  }

  get size(): number {
    return this.sessions.size;
  }
}
