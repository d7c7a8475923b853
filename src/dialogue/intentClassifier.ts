import type { TextGenerator } from '../llm/llmClient.js';

export type IntentLabel =
  | 'reservation'
  | 'menu'
  | 'hours'
  | 'location'
  | 'wifi'
  | 'human'
  | 'unknown';

export type KnownIntent = Exclude<IntentLabel, 'unknown'>;

/** Order is precedence: the first rule with any keyword hit wins. */
export const INTENT_RULES: ReadonlyArray<readonly [KnownIntent, readonly string[]]> = [
  ['reservation', ['book', 'reservation', 'table', 'reserve']],
  ['menu', ['menu', 'food', 'special', 'dish', 'vegan', 'gluten']],
  ['hours', ['hour', 'open', 'close', 'timing', 'time do you open']],
  ['location', ['location', 'address', 'where are you', 'directions']],
  ['wifi', ['wifi', 'wi fi', 'wi-fi', 'internet', 'password']],
  ['human', ['human', 'staff', 'agent', 'manager', 'speak to']],
];

const KNOWN_INTENTS: readonly KnownIntent[] = INTENT_RULES.map(([label]) => label);

export interface IntentClassifier {
  classify(utterance: string, signal?: AbortSignal): Promise<IntentLabel>;
}

export function classifyByKeywords(utterance: string): IntentLabel {
  const text = utterance.toLowerCase();
  for (const [label, keywords] of INTENT_RULES) {
    if (keywords.some((k) => text.includes(k))) return label;
  }
  return 'unknown';
}

/** First known label mentioned anywhere in a model answer, in rule order. */
export function parseIntentLabel(answer: string): IntentLabel {
  const candidate = answer.trim().toLowerCase();
  return KNOWN_INTENTS.find((label) => candidate.includes(label)) ?? 'unknown';
}

export class RuleBasedIntentClassifier implements IntentClassifier {
  async classify(utterance: string): Promise<IntentLabel> {
    return classifyByKeywords(utterance);
  }
}

/**
 * Rules first; the model is only consulted when no rule matches.
 * A failing model never fails the turn: the answer is just `unknown`.
 */
export class ModelAssistedIntentClassifier implements IntentClassifier {
  constructor(
    private readonly generator: TextGenerator,
    private readonly rules: IntentClassifier = new RuleBasedIntentClassifier(),
  ) {}

  async classify(utterance: string, signal?: AbortSignal): Promise<IntentLabel> {
    const byRules = await this.rules.classify(utterance, signal);
    if (byRules !== 'unknown' || !utterance.trim()) return byRules;

    const prompt =
      `Classify this café caller request into one of: ${KNOWN_INTENTS.join(', ')}.\n` +
      `Utterance: ${utterance}\n` +
      'Return only the label.';

    try {
      const answer = await this.generator.generate(prompt, signal);
      return parseIntentLabel(answer);
    } catch (err) {
      console.warn('[Intent] Model classification failed:', err instanceof Error ? err.message : err);
      return 'unknown';
    }
  }
}

export function createIntentClassifier(generator: TextGenerator | null): IntentClassifier {
  return generator ? new ModelAssistedIntentClassifier(generator) : new RuleBasedIntentClassifier();
}
