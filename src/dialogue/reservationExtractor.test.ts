import { describe, expect, it, vi } from 'vitest';

import {
  ModelAssistedReservationExtractor,
  RuleBasedReservationExtractor,
  parseModelReservation,
  parseReservationSlots,
  stripCodeFence,
} from './reservationExtractor.js';

describe('parseReservationSlots', () => {
  it('reads every slot from a complete request', () => {
    const utterance = 'Book a table for 4 tomorrow at 7pm under the name Asha';

    expect(parseReservationSlots(utterance)).toEqual({
      partySize: 4,
      dateText: 'tomorrow',
      timeText: '7pm',
      name: 'Asha',
      rawUtterance: utterance,
    });
  });

  it('understands spelled-out party sizes, dotted times and trailing words after a name', () => {
    const record = parseReservationSlots('table for two on friday at 7:30 p.m., my name is Ravi Kumar please');

    expect(record.partySize).toBe(2);
    expect(record.dateText).toBe('on friday');
    expect(record.timeText).toBe('7:30 p.m.');
    expect(record.name).toBe('Ravi Kumar');
  });

  it('drops names shorter than two letters', () => {
    const record = parseReservationSlots('name is A for 2 today');

    expect(record.name).toBeNull();
    expect(record.partySize).toBe(2);
    expect(record.dateText).toBe('today');
  });
});

describe('RuleBasedReservationExtractor', () => {
  const extractor = new RuleBasedReservationExtractor();

  it('returns null without a party size', async () => {
    await expect(extractor.extract('I want a table tomorrow')).resolves.toBeNull();
  });

  it('returns null without any date or time', async () => {
    await expect(extractor.extract('a table for four people')).resolves.toBeNull();
  });

  it('accepts a party size with only a time', async () => {
    const record = await extractor.extract('for 3 at 6pm');
    expect(record?.partySize).toBe(3);
    expect(record?.timeText).toBe('6pm');
    expect(record?.dateText).toBeNull();
  });
});

describe('stripCodeFence', () => {
  it('removes a json fence', () => {
    expect(stripCodeFence('```json\n{"a":1}\n```')).toBe('{"a":1}');
  });
});

describe('parseModelReservation', () => {
  it('maps snake_case keys and blanks to null', () => {
    const answer = '```json\n{"name":"Asha","party_size":"4","date_text":"tomorrow","time_text":""}\n```';

    expect(parseModelReservation(answer, 'raw words')).toEqual({
      partySize: 4,
      dateText: 'tomorrow',
      timeText: null,
      name: 'Asha',
      rawUtterance: 'raw words',
    });
  });

  it('returns null for non-JSON answers', () => {
    expect(parseModelReservation('Sure! Four people tomorrow.', 'raw')).toBeNull();
  });
});

describe('ModelAssistedReservationExtractor', () => {
  it('uses a sufficient model answer', async () => {
    const extractor = new ModelAssistedReservationExtractor({
      generate: async () => '{"name":null,"party_size":2,"date_text":"tonight","time_text":"8pm"}',
    });

    await expect(extractor.extract('two of us tonight around eight')).resolves.toEqual({
      partySize: 2,
      dateText: 'tonight',
      timeText: '8pm',
      name: null,
      rawUtterance: 'two of us tonight around eight',
    });
  });

  it('falls back to patterns when the model fails', async () => {
    const extractor = new ModelAssistedReservationExtractor({
      generate: async () => {
        throw new Error('model offline');
      },
    });

    const record = await extractor.extract('table for 3 today');
    expect(record?.partySize).toBe(3);
    expect(record?.dateText).toBe('today');
  });

  it('falls back to patterns when the model answer is insufficient', async () => {
    const extractor = new ModelAssistedReservationExtractor({
      generate: async () => '{"name":"Asha","party_size":null,"date_text":null,"time_text":null}',
    });

    const record = await extractor.extract('for 5 at 9pm');
    expect(record?.partySize).toBe(5);
    expect(record?.timeText).toBe('9pm');
  });

  it('does not call the model for empty input', async () => {
    const generate = vi.fn(async (_prompt: string) => '{}');
    const extractor = new ModelAssistedReservationExtractor({ generate });

    await expect(extractor.extract('')).resolves.toBeNull();
    expect(generate).not.toHaveBeenCalled();
  });
});
