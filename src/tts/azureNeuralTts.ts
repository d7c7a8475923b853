import axios from 'axios';
import { loadEnv, type SpeechLocale } from '../config/env.js';
import { enrichSsmlBody } from '../dialogue/humanizer.js';

const DEFAULT_VOICES: Record<SpeechLocale, string> = {
  'en-IN': 'en-IN-NeerjaNeural',
  'en-US': 'en-US-JennyNeural',
  'en-GB': 'en-GB-SoniaNeural',
  'en-AU': 'en-AU-NatashaNeural',
};

function escapeXml(text: string): string {
  return text
    .replaceAll('&', '&amp;')
    .replaceAll('<', '&lt;')
    .replaceAll('>', '&gt;')
    .replaceAll('"', '&quot;')
    .replaceAll("'", '&apos;');
}

export function isAzureTtsConfigured(): boolean {
  const env = loadEnv();
  return Boolean(env.azureSpeechKey && env.azureSpeechRegion);
}

export function buildSsml(text: string, locale: SpeechLocale, voiceName: string): string {
  const enrichedBody = enrichSsmlBody(escapeXml(text));
  return (
    `<speak version="1.0" xmlns="http://www.w3.org/2001/10/synthesis" xml:lang="${locale}">` +
    `<voice name="${voiceName}">${enrichedBody}</voice>` +
    `</speak>`
  );
}

export async function synthesizeAzureMp3(
  text: string,
): Promise<{ bytes: Buffer; contentType: string }> {
  const env = loadEnv();
  const key = env.azureSpeechKey;
  const region = env.azureSpeechRegion;
  if (!key || !region) {
    throw new Error('Azure TTS not configured (AZURE_SPEECH_KEY/AZURE_SPEECH_REGION)');
  }

  const voiceName = env.azureTtsVoice || DEFAULT_VOICES[env.speechLocale];
  const ssml = buildSsml(text, env.speechLocale, voiceName);

  const url = `https://${region}.tts.speech.microsoft.com/cognitiveservices/v1`;

  const response = await axios.post<ArrayBuffer>(url, ssml, {
    responseType: 'arraybuffer',
    headers: {
      'Ocp-Apim-Subscription-Key': key,
      'Content-Type': 'application/ssml+xml',
      'X-Microsoft-OutputFormat': 'audio-24khz-48kbitrate-mono-mp3',
      'User-Agent': 'cafe-voice-receptionist',
    },
    timeout: 15_000,
  });

  return {
    bytes: Buffer.from(response.data),
    contentType: 'audio/mpeg',
  };
}
