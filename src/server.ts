import express from 'express';
import { createServer, type Server as HttpServer } from 'http';
import bodyParser from 'body-parser';
import cors from 'cors';
import { loadEnv, assertStartupConfig, type EnvConfig } from './config/env.js';
import { createIntentClassifier } from './dialogue/intentClassifier.js';
import { createReservationExtractor } from './dialogue/reservationExtractor.js';
import type { DialogueContext } from './dialogue/manager.js';
import { InMemoryBookingStore, type BookingStore } from './bookings/bookingStore.js';
import { createTextGenerator, getAvailableLlmProvider, type TextGenerator } from './llm/llmClient.js';
import { callAudio } from './tts/callAudioCache.js';
import { isTtsConfigured, ttsSynthesizer, type SpeechSynthesizer } from './tts/ttsProvider.js';
import { isAzureSttConfigured, createAzureTranscriber } from './stt/azureSpeechStt.js';
import { TwimlRenderer } from './twilio/twiml.js';
import { createTwilioVoiceRouter, mediaStreamUrl } from './twilio/voiceWebhook.js';
import { TwilioCallController } from './twilio/callControl.js';
import { setupMediaStreamWebSocket, MEDIA_STREAM_PATH } from './realtime/mediaStream.js';
import { SessionRegistry } from './realtime/sessionRegistry.js';
import { createReplyGenerator } from './realtime/replyGenerator.js';

export interface AppDeps {
  env: EnvConfig;
  dialogue: DialogueContext;
  synthesizer: SpeechSynthesizer;
  bookings: BookingStore;
  registry: SessionRegistry;
  /** Shared by the turn-based dialogue and realtime replies; null without a model */
  generator: TextGenerator | null;
  now?: () => Date;
}

/** Strategies are chosen once here, from what is configured. */
export function createAppDeps(env: EnvConfig): AppDeps {
  const generator = createTextGenerator();
  return {
    env,
    dialogue: {
      cafe: env.cafe,
      classifier: createIntentClassifier(generator),
      extractor: createReservationExtractor(generator),
      staffNumber: env.staffNumber,
      maxMisunderstandings: env.maxMisunderstandings,
      maxUnassistedMisunderstandings: env.maxUnassistedMisunderstandings,
    },
    synthesizer: ttsSynthesizer,
    bookings: new InMemoryBookingStore(),
    registry: new SessionRegistry(),
    generator,
  };
}

export function createApp(deps: AppDeps): express.Express {
  const app = express();
  const { env } = deps;

  app.use(bodyParser.urlencoded({ extended: false }));
  app.use(bodyParser.json());
  app.use(cors());

  app.get('/health', async (_req, res) => {
    const llmProvider = await getAvailableLlmProvider();
    res.json({
      ok: true,
      service: 'cafe-voice-receptionist',
      status: 'healthy',
      cafe: env.cafe.name,
      llm: llmProvider,
      tts: isTtsConfigured() ? 'neural' : 'twilio-say-fallback',
      stt: isAzureSttConfigured() ? 'azure-speech-sdk' : 'twilio-gather-only',
      realtime: env.realtimeEnabled ? 'enabled' : 'disabled',
      activeSessions: deps.registry.size,
    });
  });

  // Temporary TTS audio for Twilio <Play/>
  app.get('/tts/:id.mp3', (req, res) => {
    const audio = callAudio.get(String(req.params.id || ''));
    if (!audio) {
      res.status(404).send('not_found');
      return;
    }
    res.setHeader('Content-Type', audio.contentType);
    res.setHeader('Cache-Control', 'no-store');
    res.send(audio.bytes);
  });

  const renderer = new TwimlRenderer({
    cafe: env.cafe,
    locale: env.speechLocale,
    publicBaseUrl: env.publicBaseUrl,
    synthesizer: deps.synthesizer,
    twilioCallerId: env.twilioCallerId,
  });

  app.use(
    '/twilio',
    createTwilioVoiceRouter({
      env,
      dialogue: deps.dialogue,
      renderer,
      bookings: deps.bookings,
      now: deps.now,
    }),
  );

  return app;
}

function attachRealtime(httpServer: HttpServer, deps: AppDeps): void {
  const { env } = deps;
  if (!env.realtimeEnabled || !env.publicBaseUrl || !env.twilioAccountSid) return;

  const calls = new TwilioCallController({
    accountSid: env.twilioAccountSid,
    authToken: env.twilioAuthToken,
    locale: env.speechLocale,
    callerId: env.twilioCallerId,
    streamUrl: mediaStreamUrl(env.publicBaseUrl),
    messageCount: (callId) => deps.registry.get(callId)?.messagesHandled ?? 0,
  });

  setupMediaStreamWebSocket(httpServer, {
    cafe: env.cafe,
    replies: createReplyGenerator(deps.generator, env.cafe, env.staffNumber),
    synthesizer: deps.synthesizer,
    calls,
    createTranscriber: createAzureTranscriber,
    registry: deps.registry,
    publicBaseUrl: env.publicBaseUrl,
    greetingDelayMs: env.greetingDelayMs,
    sessionIdleTimeoutMs: env.sessionIdleTimeoutMs,
  });
}

export async function startServer(): Promise<HttpServer> {
  const env = loadEnv();
  assertStartupConfig(env);

  const deps = createAppDeps(env);
  const httpServer = createServer(createApp(deps));
  attachRealtime(httpServer, deps);

  await new Promise<void>((resolve) => {
    httpServer.listen(env.port, () => {
      // eslint-disable-next-line no-console
      console.log(`☕ ${env.cafe.name} receptionist listening on port ${env.port}`);
      if (env.realtimeEnabled) {
        // eslint-disable-next-line no-console
        console.log(`📞 Media stream available at ${MEDIA_STREAM_PATH}`);
      }
      if (!env.staffNumber) {
        // eslint-disable-next-line no-console
        console.log('⚠️ STAFF_NUMBER not set - callers cannot be transferred to a human');
      }
      resolve();
    });
  });

  return httpServer;
}
