/**
 * Unified TTS provider.
 * Backends are tried in order:
 *   1. Piper in a local container (DOCKER_TTS_URL)
 *   2. Azure neural voices
 * When none works the caller falls back to Twilio <Say>.
 */
import axios from 'axios';
import { loadEnv, type SpeechLocale } from '../config/env.js';
import { isAzureTtsConfigured, synthesizeAzureMp3 } from './azureNeuralTts.js';
import type { AudioClip } from './callAudioCache.js';

export type TtsProviderName = 'piper' | 'azure';

export interface TtsSynthResult extends AudioClip {
  provider: TtsProviderName;
}

export interface SpeechSynthesizer {
  synthesize(text: string): Promise<TtsSynthResult | null>;
}

interface TtsBackend {
  provider: TtsProviderName;
  isConfigured(): boolean;
  synthesize(text: string): Promise<AudioClip>;
}

/** Piper voices are chosen by language only; the region part is dropped. */
export function piperLanguage(locale: SpeechLocale): string {
  return locale.split('-')[0] ?? locale;
}

async function synthesizePiperMp3(text: string): Promise<AudioClip> {
  const env = loadEnv();
  if (!env.dockerTtsUrl) {
    throw new Error('Piper TTS not configured (DOCKER_TTS_URL)');
  }

  const response = await axios.post<ArrayBuffer>(
    `${env.dockerTtsUrl.replace(/\/$/, '')}/tts`,
    { text, language: piperLanguage(env.speechLocale) },
    {
      responseType: 'arraybuffer',
      headers: { 'Content-Type': 'application/json' },
      timeout: 30_000,
    },
  );

  return { bytes: Buffer.from(response.data), contentType: 'audio/mpeg' };
}

const BACKENDS: readonly TtsBackend[] = [
  { provider: 'piper', isConfigured: () => Boolean(loadEnv().dockerTtsUrl), synthesize: synthesizePiperMp3 },
  { provider: 'azure', isConfigured: isAzureTtsConfigured, synthesize: synthesizeAzureMp3 },
];

/** Returns `null` when no backend is configured or all of them failed. */
export async function synthesizeTts(text: string): Promise<TtsSynthResult | null> {
  for (const backend of BACKENDS) {
    if (!backend.isConfigured()) continue;
    try {
      const clip = await backend.synthesize(text);
      return { ...clip, provider: backend.provider };
    } catch (err) {
      // eslint-disable-next-line no-console
      console.warn(`[TTS] ${backend.provider} failed:`, err instanceof Error ? err.message : err);
    }
  }
  return null;
}

export function isTtsConfigured(): boolean {
  return BACKENDS.some((backend) => backend.isConfigured());
}

export const ttsSynthesizer: SpeechSynthesizer = { synthesize: synthesizeTts };
