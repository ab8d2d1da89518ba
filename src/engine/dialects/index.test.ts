import { describe, it, expect } from 'vitest';
import { detectDialect } from './index';
import { UnknownDialectError } from '../errors';

describe('detectDialect', () => {
  it('picks the dialect from the base name', () => {
    expect(detectDialect('888_poker_hand_history_1.txt').tag).toBe('888poker');
    expect(detectDialect('exports/PokerStars_session.txt').tag).toBe('pokerstars');
    expect(detectDialect('HH20200515 Tokyo II.txt').tag).toBe('pokerstars');
  });

  it('throws for unknown naming conventions', () => {
    expect(() => detectDialect('data/partypoker_session.txt')).toThrow(UnknownDialectError);
    expect(() => detectDialect('partypoker_session.txt'))
      .toThrow('[Dialect] No known site naming convention matches "partypoker_session.txt"');
  });
});
