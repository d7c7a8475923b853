import { z } from 'zod';
import type { TextGenerator } from '../llm/llmClient.js';
import {
  createEmptyReservation,
  isSufficientToConfirm,
  type ReservationRecord,
} from '../models/reservation.js';

export interface ReservationExtractor {
  /** null means the utterance is not enough to read a booking back. */
  extract(utterance: string, signal?: AbortSignal): Promise<ReservationRecord | null>;
}

// Speech recognizers tend to spell out small party sizes
const NUMBER_WORDS: Record<string, number> = {
  one: 1,
  two: 2,
  three: 3,
  four: 4,
  five: 5,
  six: 6,
  seven: 7,
  eight: 8,
  nine: 9,
  ten: 10,
  eleven: 11,
  twelve: 12,
};

const PARTY_SIZE_REGEX = new RegExp(
  `\\b(?:for|party of)\\s*(\\d+|${Object.keys(NUMBER_WORDS).join('|')})\\b`,
  'i',
);
const NAME_REGEX = /\b(?:my name is|name is|name's|under the name)\s+([a-z][a-z ]*)/i;
const NAME_TAIL_REGEX = /\s+(?:at|for|on|today|tomorrow|and|please)\b.*$/i;
const TIME_REGEX = /\b(\d{1,2}(?::\d{2})?\s*[ap]\.?m\.?)(?![a-z])/i;
const DATE_REGEX = /\b(today|tomorrow|on\s+[a-z]+(?:\s+\d{1,2}(?:st|nd|rd|th)?)?)\b/i;

function parsePartySize(token: string): number | null {
  const lower = token.toLowerCase();
  const value = NUMBER_WORDS[lower] ?? Number.parseInt(lower, 10);
  return Number.isFinite(value) && value > 0 ? value : null;
}

function parseName(utterance: string): string | null {
  const match = utterance.match(NAME_REGEX);
  if (!match?.[1]) return null;
  const name = match[1].replace(NAME_TAIL_REGEX, '').trim();
  return name.length >= 2 ? name : null;
}

/** Pattern-matches every slot it can find; does not judge sufficiency. */
export function parseReservationSlots(utterance: string): ReservationRecord {
  const record = createEmptyReservation(utterance);

  const party = utterance.match(PARTY_SIZE_REGEX);
  if (party?.[1]) record.partySize = parsePartySize(party[1]);

  record.name = parseName(utterance);

  const time = utterance.match(TIME_REGEX);
  if (time?.[1]) record.timeText = time[1].trim();

  const date = utterance.match(DATE_REGEX);
  if (date?.[1]) record.dateText = date[1].trim();

  return record;
}

export class RuleBasedReservationExtractor implements ReservationExtractor {
  async extract(utterance: string): Promise<ReservationRecord | null> {
    const record = parseReservationSlots(utterance);
    return isSufficientToConfirm(record) ? record : null;
  }
}

const optionalText = z
  .string()
  .nullish()
  .transform((value) => (value && value.trim() ? value.trim() : null));

const modelReservationSchema = z.object({
  name: optionalText,
  party_size: z.coerce.number().int().positive().nullish(),
  date_text: optionalText,
  time_text: optionalText,
});

export function stripCodeFence(text: string): string {
  return text
    .trim()
    .replace(/^```(?:json)?\s*/i, '')
    .replace(/\s*```$/, '')
    .trim();
}

/** Parses a model answer into a record, or null when it is not usable JSON. */
export function parseModelReservation(answer: string, utterance: string): ReservationRecord | null {
  let json: unknown;
  try {
    json = JSON.parse(stripCodeFence(answer));
  } catch {
    return null;
  }

  const parsed = modelReservationSchema.safeParse(json);
  if (!parsed.success) return null;

  return {
    partySize: parsed.data.party_size ?? null,
    dateText: parsed.data.date_text,
    timeText: parsed.data.time_text,
    name: parsed.data.name,
    rawUtterance: utterance,
  };
}

/**
 * Asks the model for the whole record in one shot. Any failure (call,
 * timeout, JSON, schema, insufficient record) falls back to the patterns.
 */
export class ModelAssistedReservationExtractor implements ReservationExtractor {
  constructor(
    private readonly generator: TextGenerator,
    private readonly fallback: ReservationExtractor = new RuleBasedReservationExtractor(),
  ) {}

  async extract(utterance: string, signal?: AbortSignal): Promise<ReservationRecord | null> {
    if (!utterance.trim()) return null;

    const prompt =
      'Extract a café reservation from the text.\n' +
      'Return JSON with keys: name, party_size (int), date_text, time_text. Use null for anything missing.\n' +
      `Text: ${utterance}`;

    try {
      const answer = await this.generator.generate(prompt, signal);
      const record = parseModelReservation(answer, utterance);
      if (record && isSufficientToConfirm(record)) return record;
      console.warn('[Reservation] Model answer unusable, using pattern extraction');
    } catch (err) {
      console.warn('[Reservation] Model extraction failed:', err instanceof Error ? err.message : err);
    }

    return this.fallback.extract(utterance, signal);
  }
}

export function createReservationExtractor(generator: TextGenerator | null): ReservationExtractor {
  return generator
    ? new ModelAssistedReservationExtractor(generator)
    : new RuleBasedReservationExtractor();
}
