import type { CafeProfile } from '../config/env.js';
import type { TextGenerator } from '../llm/llmClient.js';
import {
  classifyByKeywords,
  RuleBasedIntentClassifier,
  type IntentClassifier,
} from '../dialogue/intentClassifier.js';
import {
  RuleBasedReservationExtractor,
  type ReservationExtractor,
} from '../dialogue/reservationExtractor.js';
import {
  CONNECTING_STAFF,
  NO_STAFF_LINE,
  PLEASE_REPEAT,
  describeReservation,
  infoAnswer,
  isInfoIntent,
} from '../dialogue/replies.js';
import { ANYTHING_ELSE, GREETINGS, GREETING_BACK, vary } from '../dialogue/humanizer.js';

export type RealtimeReply =
  | { kind: 'speak'; text: string }
  | { kind: 'transfer'; text: string; to: string };

export interface ReplyGenerator {
  /** messageNumber counts final transcripts in this call, starting at 1 */
  reply(transcript: string, messageNumber: number, signal?: AbortSignal): Promise<RealtimeReply>;
}

export const MAX_REPLY_LENGTH = 200;

const GREETING_WORDS = /\b(hello|hi|hey)\b/i;

export const RESERVATION_DETAILS_REQUEST =
  'Sure! How many people, and what day and time would you like the table?';

export function realtimeGreeting(cafe: CafeProfile, turn = 0): string {
  return vary(GREETINGS, turn).replace('{cafe}', cafe.name);
}

export function capReply(text: string): string {
  const trimmed = text.trim();
  if (trimmed.length <= MAX_REPLY_LENGTH) return trimmed;
  return `${trimmed.slice(0, MAX_REPLY_LENGTH - 3)}...`;
}

export interface RuleBasedReplyOptions {
  cafe: CafeProfile;
  staffNumber: string | null;
  classifier?: IntentClassifier;
  extractor?: ReservationExtractor;
}

export class RuleBasedReplyGenerator implements ReplyGenerator {
  private readonly classifier: IntentClassifier;
  private readonly extractor: ReservationExtractor;

  constructor(private readonly options: RuleBasedReplyOptions) {
    this.classifier = options.classifier ?? new RuleBasedIntentClassifier();
    this.extractor = options.extractor ?? new RuleBasedReservationExtractor();
  }

  async reply(transcript: string, messageNumber: number, signal?: AbortSignal): Promise<RealtimeReply> {
    const intent = await this.classifier.classify(transcript, signal);

    if (intent === 'reservation') {
      const record = await this.extractor.extract(transcript, signal);
      if (!record) return { kind: 'speak', text: RESERVATION_DETAILS_REQUEST };
      return {
        kind: 'speak',
        text: `Lovely, I've noted ${describeReservation(record)}. Our team will confirm it shortly.`,
      };
    }

    if (isInfoIntent(intent)) {
      return { kind: 'speak', text: infoAnswer(intent, this.options.cafe) };
    }

    if (intent === 'human') {
      if (this.options.staffNumber) {
        return { kind: 'transfer', text: CONNECTING_STAFF, to: this.options.staffNumber };
      }
      return { kind: 'speak', text: `${NO_STAFF_LINE} ${vary(ANYTHING_ELSE, messageNumber)}` };
    }

    if (GREETING_WORDS.test(transcript)) {
      return { kind: 'speak', text: vary(GREETING_BACK, messageNumber) };
    }

    return { kind: 'speak', text: PLEASE_REPEAT };
  }
}

export function buildReplyPrompt(cafe: CafeProfile, transcript: string, messageNumber: number): string {
  return [
    `You are a polite and helpful receptionist for ${cafe.name}.`,
    '',
    'Context:',
    `- Opening hours: ${cafe.hours}`,
    `- Address: ${cafe.address}`,
    `- Menu available at: ${cafe.menuLink}`,
    `- Wi-Fi: ${cafe.wifiInfo}`,
    '',
    `This is message #${messageNumber} in the conversation.`,
    '',
    `Customer said: "${transcript}"`,
    '',
    'Reply briefly and naturally (1-2 sentences). Help with reservations, menu, hours, location or Wi-Fi.',
    'If you cannot help, offer to connect them to the staff.',
    '',
    'Response:',
  ].join('\n');
}

/**
 * Free-form replies from the language model, capped for the phone.
 * Hand-off requests and any model failure go through the rule-based path.
 */
export class ModelAssistedReplyGenerator implements ReplyGenerator {
  constructor(
    private readonly generator: TextGenerator,
    private readonly cafe: CafeProfile,
    private readonly fallback: ReplyGenerator,
  ) {}

  async reply(transcript: string, messageNumber: number, signal?: AbortSignal): Promise<RealtimeReply> {
    if (classifyByKeywords(transcript) === 'human') {
      return this.fallback.reply(transcript, messageNumber, signal);
    }

    try {
      const answer = await this.generator.generate(buildReplyPrompt(this.cafe, transcript, messageNumber), signal);
      const text = capReply(answer);
      if (text) return { kind: 'speak', text };
    } catch (err) {
      if (signal?.aborted) throw err;
      // eslint-disable-next-line no-console
      console.warn('[Realtime] Model reply failed, using rules:', err instanceof Error ? err.message : err);
    }

    return this.fallback.reply(transcript, messageNumber, signal);
  }
}

export function createReplyGenerator(
  generator: TextGenerator | null,
  cafe: CafeProfile,
  staffNumber: string | null,
): ReplyGenerator {
  const rules = new RuleBasedReplyGenerator({ cafe, staffNumber });
  return generator ? new ModelAssistedReplyGenerator(generator, cafe, rules) : rules;
}
