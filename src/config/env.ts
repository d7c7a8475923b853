export type SpeechLocale = 'en-IN' | 'en-US' | 'en-GB' | 'en-AU';

const SPEECH_LOCALES: readonly SpeechLocale[] = ['en-IN', 'en-US', 'en-GB', 'en-AU'];

export interface CafeProfile {
  name: string;
  hours: string;
  address: string;
  wifiInfo: string;
  menuLink: string;
}

export interface EnvConfig {
  port: number;
  cafe: CafeProfile;
  /** Staff line for transfers (E.164). null = no human escalation available */
  staffNumber: string | null;
  twilioCallerId: string | null;
  /** Consecutive misunderstandings tolerated before forced transfer */
  maxMisunderstandings: number;
  /**
   * Without a staff line, end the call once the counter passes this value.
   * 0 disables the cap (caller keeps getting the main menu).
   */
  maxUnassistedMisunderstandings: number;
  speechLocale: SpeechLocale;
  twilioAccountSid: string | null;
  twilioAuthToken: string;
  twilioValidateSignature: boolean;
  /** Public URL so Twilio can GET /tts/... and open the media WebSocket (ngrok/azure) */
  publicBaseUrl: string | null;
  realtimeEnabled: boolean;
  greetingDelayMs: number;
  sessionIdleTimeoutMs: number;
  azureSpeechKey: string | null;
  azureSpeechRegion: string | null;
  azureTtsVoice: string | null;
  /** Docker Piper TTS container. E.g. http://localhost:8000 */
  dockerTtsUrl: string | null;
  azureOpenaiEndpoint: string | null;
  azureOpenaiApiKey: string | null;
  azureOpenaiDeployment: string | null;
  azureOpenaiApiVersion: string | null;
  /** Local Ollama. E.g. http://localhost:11434 */
  ollamaUrl: string | null;
  ollamaModel: string;
  llmTimeoutMs: number;
}

function intFromEnv(value: string | undefined, fallback: number): number {
  const parsed = Number.parseInt(value ?? '', 10);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback;
}

function speechLocaleFromEnv(value: string | undefined): SpeechLocale {
  const found = SPEECH_LOCALES.find((locale) => locale === value);
  return found ?? 'en-IN';
}

export function loadEnv(source: NodeJS.ProcessEnv = process.env): EnvConfig {
  const cafe: CafeProfile = {
    name: source.CAFE_NAME || 'Your Café',
    hours: source.CAFE_HOURS || 'Monday to Sunday, 8 AM to 9 PM',
    address: source.CAFE_ADDRESS || '123, Main Street, Your City',
    wifiInfo: source.WIFI_INFO || 'Network: YOUR_CAFE_WIFI, Password: latte123',
    menuLink: source.MENU_LINK || 'https://example.com/menu',
  };

  const publicBaseUrl = source.PUBLIC_BASE_URL
    ? source.PUBLIC_BASE_URL.replace(/\/$/, '')
    : null;

  return {
    port: intFromEnv(source.PORT, 4000),
    cafe,
    staffNumber: source.STAFF_NUMBER || null,
    twilioCallerId: source.TWILIO_CALLER_ID || null,
    maxMisunderstandings: intFromEnv(source.MAX_MISUNDERSTANDINGS, 2),
    maxUnassistedMisunderstandings: intFromEnv(source.MAX_UNASSISTED_MISUNDERSTANDINGS, 0),
    speechLocale: speechLocaleFromEnv(source.SPEECH_LOCALE),
    twilioAccountSid: source.TWILIO_ACCOUNT_SID || null,
    twilioAuthToken: source.TWILIO_AUTH_TOKEN || '',
    twilioValidateSignature: source.TWILIO_VALIDATE_SIGNATURE !== 'false',
    publicBaseUrl,
    realtimeEnabled: source.REALTIME_ENABLED === 'true',
    greetingDelayMs: intFromEnv(source.GREETING_DELAY_MS, 500),
    sessionIdleTimeoutMs: intFromEnv(source.SESSION_IDLE_TIMEOUT_MS, 5 * 60 * 1000),
    azureSpeechKey: source.AZURE_SPEECH_KEY || null,
    azureSpeechRegion: source.AZURE_SPEECH_REGION || null,
    azureTtsVoice: source.AZURE_TTS_VOICE || null,
    dockerTtsUrl: source.DOCKER_TTS_URL || null,
    azureOpenaiEndpoint: source.AZURE_OPENAI_ENDPOINT || null,
    azureOpenaiApiKey: source.AZURE_OPENAI_API_KEY || null,
    azureOpenaiDeployment: source.AZURE_OPENAI_DEPLOYMENT || null,
    azureOpenaiApiVersion: source.AZURE_OPENAI_API_VERSION || null,
    ollamaUrl: source.OLLAMA_URL || null,
    ollamaModel: source.OLLAMA_MODEL || 'qwen2.5:3b',
    llmTimeoutMs: intFromEnv(source.LLM_TIMEOUT_MS, 8_000),
  };
}

export class StartupConfigError extends Error {
  constructor(readonly missing: string[]) {
    super(`Missing required configuration: ${missing.join(', ')}`);
    this.name = 'StartupConfigError';
  }
}

/**
 * The realtime variant cannot run at all without call-control and speech
 * credentials. The turn-based webhooks need nothing beyond defaults.
 */
export function assertStartupConfig(env: EnvConfig): void {
  if (!env.realtimeEnabled) return;

  const missing: string[] = [];
  if (!env.publicBaseUrl) missing.push('PUBLIC_BASE_URL');
  if (!env.twilioAccountSid) missing.push('TWILIO_ACCOUNT_SID');
  if (!env.twilioAuthToken) missing.push('TWILIO_AUTH_TOKEN');
  if (!env.azureSpeechKey) missing.push('AZURE_SPEECH_KEY');
  if (!env.azureSpeechRegion) missing.push('AZURE_SPEECH_REGION');

  if (missing.length > 0) {
    throw new StartupConfigError(missing);
  }
}
