// Humanization utilities for natural-sounding agent responses

/**
 * Pick a variant by turn number instead of at random, so a session never
 * repeats itself on consecutive turns and tests stay deterministic.
 */
export function vary<T>(arr: readonly [T, ...T[]], turn: number): T {
  const index = Math.abs(Math.trunc(turn)) % arr.length;
  return arr[index] ?? arr[0];
}

export const GREETINGS = [
  'Hello! Thank you for calling {cafe}. I\'m your virtual receptionist. How may I help you today?',
  'Hi there, thanks for calling {cafe}! I\'m the virtual receptionist. What can I do for you?',
] as const;

export const GREETING_BACK = [
  'Nice to hear from you! What can I help you with today?',
  'Hello again! What can I do for you?',
  'Hi! How can I help?',
] as const;

export const ANYTHING_ELSE = [
  'Anything else I can help with?',
  'Is there anything else you need?',
  'What else can I do for you?',
] as const;

/**
 * Transform plain (already XML-escaped) text into SSML for Azure Neural voices:
 * short pauses at punctuation, a little emphasis on greetings and confirmations,
 * say-as for times and long digit runs.
 */
export function enrichSsmlBody(text: string): string {
  let result = text;

  // Bullet points and list markers don't speak well
  result = result.replace(/^[•\-*]\s*/gm, '');
  result = result.replace(/^\d+\.\s*/gm, '');

  result = result.replace(/\n+/g, ' <break time="200ms"/> ');

  // Keep pauses shorter than written punctuation implies
  result = result.replace(/\.\s+(?!<break)/g, '. <break time="180ms"/> ');
  result = result.replace(/!\s+(?!<break)/g, '! <break time="150ms"/> ');
  result = result.replace(/\?\s+(?!<break)/g, '? <break time="120ms"/> ');
  result = result.replace(/,\s+(?!<break)/g, ', <break time="80ms"/> ');

  result = result.replace(
    /\b(Hello|Hi there|Welcome|Awesome|Great|Perfect)\b/g,
    '<emphasis level="moderate">$1</emphasis>',
  );

  // Phone-like numbers (4+ digits) - speak as digits
  result = result.replace(/\b(\d{4,})\b/g, '<say-as interpret-as="telephone">$1</say-as>');

  result = result.replace(/\b(\d{1,2}:\d{2})\b/g, '<say-as interpret-as="time" format="hms12">$1</say-as>');

  return result;
}
