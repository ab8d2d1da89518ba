import { describe, it, expect } from 'vitest';
import { parseHands } from './hand-parser';
import { poker888 } from './dialects/poker888';
import { pokerStars } from './dialects/pokerstars';
import { DialectMismatchError } from './errors';
import { readFixture } from '../../test/fixtures';

const KYOTO = readFixture('888_poker_hand_history_2.txt');

describe('HandStream', () => {
  it('can be iterated more than once', () => {
    const stream = parseHands(KYOTO, poker888, { source: 'kyoto.txt', fileIndex: 3 });
    const first = [...stream].map(h => h.id);
    const second = [...stream].map(h => h.id);
    expect(second).toEqual(first);
    expect(stream.warnings).toHaveLength(1);
  });

  it('yields hands lazily', () => {
    const iterator = parseHands(KYOTO, poker888)[Symbol.iterator]();
    const first = iterator.next();
    expect(first.done).toBe(false);
    expect(first.value.id).toBe('1361380001');
  });

  it('stamps every hand with its source position', () => {
    const hands = parseHands(KYOTO, poker888, { source: 'kyoto.txt', fileIndex: 3 }).toArray();
    expect(hands.map(h => [h.source, h.fileIndex, h.blockIndex])).toEqual([
      ['kyoto.txt', 3, 0],
      ['kyoto.txt', 3, 2],
      ['kyoto.txt', 3, 3],
    ]);
  });

  it('yields nothing for an empty file', () => {
    const stream = parseHands('\n  \n', poker888);
    expect(stream.toArray()).toEqual([]);
    expect(stream.warnings).toEqual([]);
  });

  it('throws when the text is in another dialect', () => {
    const stream = parseHands(readFixture('888_misnamed_pokerstars.txt'), poker888, { source: '888_misnamed_pokerstars.txt' });
    expect(() => stream.toArray()).toThrow(DialectMismatchError);
    expect(() => stream.toArray())
      .toThrow('[Dialect] "888_misnamed_pokerstars.txt" does not contain 888poker hand histories');
  });

  it('ignores text before the first hand header', () => {
    const text = `exported by the client\n\n${readFixture('888_misnamed_pokerstars.txt')}`;
    expect(parseHands(text, pokerStars).toArray().map(h => h.id)).toEqual(['213000000009']);
  });
});
