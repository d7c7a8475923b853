import { describe, expect, it } from 'vitest';

import { enrichSsmlBody } from '../dialogue/humanizer.js';
import { buildSsml } from './azureNeuralTts.js';

describe('buildSsml', () => {
  it('escapes text and wraps it in the chosen voice', () => {
    expect(buildSsml('Fish & chips', 'en-GB', 'en-GB-SoniaNeural')).toBe(
      '<speak version="1.0" xmlns="http://www.w3.org/2001/10/synthesis" xml:lang="en-GB">' +
        '<voice name="en-GB-SoniaNeural">Fish &amp; chips</voice></speak>',
    );
  });
});

describe('enrichSsmlBody', () => {
  it('adds pauses, emphasis and time reading', () => {
    expect(enrichSsmlBody('Great. See you at 7:30!')).toBe(
      '<emphasis level="moderate">Great</emphasis>. <break time="180ms"/> See you at ' +
        '<say-as interpret-as="time" format="hms12">7:30</say-as>!',
    );
  });
});
