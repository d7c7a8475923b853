/**
 * Azure Speech SDK - Speech-to-Text for Twilio media streams.
 *
 * Twilio sends 8 kHz mono mu-law frames as base64; they are written as-is
 * into a push stream declared with the matching wave format.
 */

import * as sdk from 'microsoft-cognitiveservices-speech-sdk';
import { loadEnv } from '../config/env.js';
import type { TranscriberFactory } from '../realtime/types.js';

const SEGMENTATION_SILENCE_MS = '800';

export function isAzureSttConfigured(): boolean {
  const env = loadEnv();
  return Boolean(env.azureSpeechKey && env.azureSpeechRegion);
}

function toArrayBuffer(bytes: Buffer): ArrayBuffer {
  const copy = new ArrayBuffer(bytes.length);
  new Uint8Array(copy).set(bytes);
  return copy;
}

/**
 * Opens a continuous recognizer for one call. Interim hypotheses are reported
 * with isFinal=false; only recognized utterances come through as final.
 */
export const createAzureTranscriber: TranscriberFactory = async (callId, handlers) => {
  const env = loadEnv();
  if (!env.azureSpeechKey || !env.azureSpeechRegion) {
    throw new Error('Azure Speech not configured (AZURE_SPEECH_KEY/AZURE_SPEECH_REGION)');
  }

  const speechCfg = sdk.SpeechConfig.fromSubscription(env.azureSpeechKey, env.azureSpeechRegion);
  speechCfg.speechRecognitionLanguage = env.speechLocale;
  speechCfg.setProperty(sdk.PropertyId.Speech_SegmentationSilenceTimeoutMs, SEGMENTATION_SILENCE_MS);

  const format = sdk.AudioStreamFormat.getWaveFormat(8000, 8, 1, sdk.AudioFormatTag.MuLaw);
  const pushStream = sdk.AudioInputStream.createPushStream(format);
  const recognizer = new sdk.SpeechRecognizer(speechCfg, sdk.AudioConfig.fromStreamInput(pushStream));

  recognizer.recognizing = (_sender, e) => {
    if (e.result.text) {
      handlers.onTranscript({ isFinal: false, transcript: e.result.text });
    }
  };

  recognizer.recognized = (_sender, e) => {
    if (e.result.reason === sdk.ResultReason.RecognizedSpeech && e.result.text) {
      handlers.onTranscript({ isFinal: true, transcript: e.result.text });
    }
  };

  recognizer.canceled = (_sender, e) => {
    if (e.reason === sdk.CancellationReason.Error) {
      handlers.onError(new Error(`Recognition canceled: ${e.errorDetails}`));
    }
  };

  await new Promise<void>((resolve, reject) => {
    recognizer.startContinuousRecognitionAsync(
      () => resolve(),
      (error) => reject(new Error(error)),
    );
  });

  // eslint-disable-next-line no-console
  console.log(`[STT] Recognition started for call ${callId} (${env.speechLocale})`);

  let closed = false;

  return {
    sendAudio(payloadBase64: string): void {
      if (closed) return;
      pushStream.write(toArrayBuffer(Buffer.from(payloadBase64, 'base64')));
    },

    close(): Promise<void> {
      if (closed) return Promise.resolve();
      closed = true;
      pushStream.close();
      return new Promise<void>((resolve) => {
        recognizer.stopContinuousRecognitionAsync(
          () => {
            recognizer.close();
            resolve();
          },
          (error) => {
            // eslint-disable-next-line no-console
            console.warn(`[STT] Stop failed for call ${callId}:`, error);
            recognizer.close();
            resolve();
          },
        );
      });
    },
  };
};
