import { describe, expect, it } from 'vitest';

import { shouldEscalate, shouldGiveUp } from './escalation.js';

describe('shouldEscalate', () => {
  it('tolerates exactly the threshold', () => {
    expect(shouldEscalate(2, 2, true)).toBe(false);
    expect(shouldEscalate(3, 2, true)).toBe(true);
  });

  it('never escalates without a staff line', () => {
    expect(shouldEscalate(10, 2, false)).toBe(false);
  });

  it('escalates on the first miss with a zero threshold', () => {
    expect(shouldEscalate(1, 0, true)).toBe(true);
  });
});

describe('shouldGiveUp', () => {
  it('is disabled by a zero cap', () => {
    expect(shouldGiveUp(50, 0, false)).toBe(false);
  });

  it('ends the call once the cap is passed', () => {
    expect(shouldGiveUp(3, 3, false)).toBe(false);
    expect(shouldGiveUp(4, 3, false)).toBe(true);
  });

  it('does not apply when a staff line exists', () => {
    expect(shouldGiveUp(4, 3, true)).toBe(false);
  });
});
