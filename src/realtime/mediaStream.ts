/**
 * Twilio Media Streams WebSocket handler.
 *
 * Twilio opens one socket per <Connect><Stream>, sends `connected`, `start`,
 * a run of `media` frames (base64 mu-law) and finally `stop`.
 */

import type { Server as HttpServer } from 'http';
import { WebSocketServer, type RawData, type WebSocket } from 'ws';
import { z } from 'zod';
import { RealtimeSession, type RealtimeSessionDeps } from './session.js';

export const MEDIA_STREAM_PATH = '/twilio/media';
const SWEEP_INTERVAL_MS = 60 * 1000;

const connectedEvent = z.object({ event: z.literal('connected') });
const startEvent = z.object({
  event: z.literal('start'),
  streamSid: z.string().optional(),
  start: z.object({
    callSid: z.string().min(1),
    streamSid: z.string().optional(),
    customParameters: z.record(z.string()).optional(),
  }),
});
const mediaEvent = z.object({
  event: z.literal('media'),
  media: z.object({
    payload: z.string(),
    track: z.string().optional(),
  }),
});
const markEvent = z.object({ event: z.literal('mark') });
const stopEvent = z.object({ event: z.literal('stop') });

export const mediaStreamEventSchema = z.discriminatedUnion('event', [
  connectedEvent,
  startEvent,
  mediaEvent,
  markEvent,
  stopEvent,
]);

export type MediaStreamEvent = z.infer<typeof mediaStreamEventSchema>;

export function parseMediaStreamEvent(raw: string): MediaStreamEvent | null {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    // eslint-disable-next-line no-console
    console.warn('[MediaStream] Ignoring non-JSON frame');
    return null;
  }
  const parsed = mediaStreamEventSchema.safeParse(json);
  return parsed.success ? parsed.data : null;
}

export interface MediaStreamDeps extends RealtimeSessionDeps {
  sessionIdleTimeoutMs: number;
}

/** Stream parameters set by `<Parameter>` when the stream is reopened after a reply. */
export const RESUME_PARAMETER = 'resume';
export const MESSAGE_COUNT_PARAMETER = 'messages';

function parseMessageCount(raw: string | undefined): number {
  const count = Number.parseInt(raw ?? '', 10);
  return Number.isFinite(count) && count > 0 ? count : 0;
}

/** State of one media stream socket. */
export class MediaStreamConnection {
  private session: RealtimeSession | null = null;

  constructor(private readonly deps: MediaStreamDeps) {}

  get currentSession(): RealtimeSession | null {
    return this.session;
  }

  /** Resolves once the frame is handled; for `start` that includes the greeting. */
  async handleMessage(raw: string): Promise<void> {
    const event = parseMediaStreamEvent(raw);
    if (!event) return;

    switch (event.event) {
      case 'start': {
        if (this.session) return;
        const params = event.start.customParameters ?? {};
        const resumed = params[RESUME_PARAMETER] === 'true';
        const messageCount = resumed ? parseMessageCount(params[MESSAGE_COUNT_PARAMETER]) : 0;
        const session = new RealtimeSession(event.start.callSid, this.deps, { resumed, messageCount });
        this.session = session;
        // eslint-disable-next-line no-console
        console.log(`[MediaStream] Stream started for call ${session.callId}${resumed ? ' (resumed)' : ''}`);
        await session.start();
        return;
      }

      case 'media':
        this.session?.relayAudio(event.media.payload);
        return;

      case 'stop':
        await this.close('stop');
        return;

      case 'connected':
      case 'mark':
        return;
    }
  }

  isIdleSince(cutoffMs: number): boolean {
    return this.session !== null && this.session.lastActivityMs < cutoffMs;
  }

  async close(reason: string): Promise<void> {
    const session = this.session;
    this.session = null;
    if (!session) return;
    // eslint-disable-next-line no-console
    console.log(`[MediaStream] Closing call ${session.callId} (${reason})`);
    await session.stop();
  }
}

function rawToString(data: RawData): string {
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  return Buffer.from(data).toString('utf8');
}

/**
 * Ends the sessions of calls that went quiet without a `stop` and closes
 * their sockets.
 */
export async function sweepIdleConnections(
  open: ReadonlyMap<MediaStreamConnection, Pick<WebSocket, 'close'>>,
  cutoffMs: number,
): Promise<void> {
  for (const [connection, socket] of open) {
    if (!connection.isIdleSince(cutoffMs)) continue;
    await connection.close('idle');
    socket.close(1000, 'idle');
  }
}

/**
 * Attaches the media stream endpoint to the HTTP server and sweeps sessions
 * whose call went quiet without a `stop`.
 */
export function setupMediaStreamWebSocket(server: HttpServer, deps: MediaStreamDeps): WebSocketServer {
  const wss = new WebSocketServer({ server, path: MEDIA_STREAM_PATH });
  const open = new Map<MediaStreamConnection, WebSocket>();

  wss.on('connection', (ws) => {
    const connection = new MediaStreamConnection(deps);
    open.set(connection, ws);

    ws.on('message', (data) => {
      connection.handleMessage(rawToString(data)).catch((err: unknown) => {
        // eslint-disable-next-line no-console
        console.error('[MediaStream] Error handling frame:', err);
      });
    });

    ws.on('close', () => {
      open.delete(connection);
      connection.close('socket closed').catch((err: unknown) => {
        // eslint-disable-next-line no-console
        console.error('[MediaStream] Error closing session:', err);
      });
    });

    ws.on('error', (err) => {
      // eslint-disable-next-line no-console
      console.error('[MediaStream] Socket error:', err.message);
    });
  });

  const sweeper = setInterval(() => {
    sweepIdleConnections(open, Date.now() - deps.sessionIdleTimeoutMs).catch((err: unknown) => {
      // eslint-disable-next-line no-console
      console.error('[MediaStream] Error ending idle sessions:', err);
    });
  }, SWEEP_INTERVAL_MS);
  sweeper.unref();

  wss.on('close', () => clearInterval(sweeper));

  // eslint-disable-next-line no-console
  console.log(`[MediaStream] Listening on ${MEDIA_STREAM_PATH}`);
  return wss;
}
