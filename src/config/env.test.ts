import { describe, expect, it } from 'vitest';

import { StartupConfigError, assertStartupConfig, loadEnv } from './env.js';

describe('loadEnv', () => {
  it('applies defaults', () => {
    const env = loadEnv({});

    expect(env.port).toBe(4000);
    expect(env.staffNumber).toBeNull();
    expect(env.maxMisunderstandings).toBe(2);
    expect(env.maxUnassistedMisunderstandings).toBe(0);
    expect(env.speechLocale).toBe('en-IN');
    expect(env.twilioValidateSignature).toBe(true);
    expect(env.realtimeEnabled).toBe(false);
    expect(env.greetingDelayMs).toBe(500);
    expect(env.cafe.name).toBe('Your Café');
  });

  it('reads the café profile and thresholds', () => {
    const env = loadEnv({
      CAFE_NAME: 'Blue Door',
      STAFF_NUMBER: '+15550001111',
      MAX_MISUNDERSTANDINGS: '4',
      MAX_UNASSISTED_MISUNDERSTANDINGS: '3',
      SPEECH_LOCALE: 'en-GB',
    });

    expect(env.cafe.name).toBe('Blue Door');
    expect(env.staffNumber).toBe('+15550001111');
    expect(env.maxMisunderstandings).toBe(4);
    expect(env.maxUnassistedMisunderstandings).toBe(3);
    expect(env.speechLocale).toBe('en-GB');
  });

  it('ignores invalid numbers and locales', () => {
    const env = loadEnv({ MAX_MISUNDERSTANDINGS: 'lots', SPEECH_LOCALE: 'fr-FR' });

    expect(env.maxMisunderstandings).toBe(2);
    expect(env.speechLocale).toBe('en-IN');
  });

  it('strips a trailing slash from the public URL', () => {
    expect(loadEnv({ PUBLIC_BASE_URL: 'https://cafe.test/' }).publicBaseUrl).toBe('https://cafe.test');
  });
});

describe('assertStartupConfig', () => {
  it('accepts the turn-based setup with nothing configured', () => {
    expect(() => assertStartupConfig(loadEnv({}))).not.toThrow();
  });

  it('lists everything the realtime variant is missing', () => {
    let caught: unknown;
    try {
      assertStartupConfig(loadEnv({ REALTIME_ENABLED: 'true', TWILIO_AUTH_TOKEN: 'test-secret' }));
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(StartupConfigError);
    expect(caught instanceof StartupConfigError ? caught.missing : []).toEqual([
      'PUBLIC_BASE_URL',
      'TWILIO_ACCOUNT_SID',
      'AZURE_SPEECH_KEY',
      'AZURE_SPEECH_REGION',
    ]);
  });

  it('accepts a complete realtime setup', () => {
    const env = loadEnv({
      REALTIME_ENABLED: 'true',
      PUBLIC_BASE_URL: 'https://cafe.test',
      TWILIO_ACCOUNT_SID: 'ACtest',
      TWILIO_AUTH_TOKEN: 'test-secret',
      AZURE_SPEECH_KEY: 'test-key',
      AZURE_SPEECH_REGION: 'westeurope',
    });

    expect(() => assertStartupConfig(env)).not.toThrow();
  });
});
