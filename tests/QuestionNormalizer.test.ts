import { describe, expect, it } from 'vitest';
import { containsAnyPhrase, containsPhrase, normalizeQuestion } from '../src/domain/services/QuestionNormalizer.js';

describe('QuestionNormalizer', () => {
  it('lowercases and strips punctuation', () => {
    expect(normalizeQuestion("  When will I be DEBT-free?!  ")).toBe('when will i be debt free');
  });

  it('matches whole words only', () => {
    const normalized = normalizeQuestion('How long until my payoff date?');

    expect(containsPhrase(normalized, 'payoff')).toBe(true);
    expect(containsPhrase(normalized, 'pay')).toBe(false);
    expect(containsAnyPhrase(normalized, ['how much', 'how long'])).toBe(true);
  });
});
