import { describe, it, expect } from 'vitest';
import { pokerStars } from './pokerstars';
import { parseHands } from '../hand-parser';
import { ActionType, Street } from '../types';
import { readFixture } from '../../../test/fixtures';

const TOKYO = readFixture('pokerstars_hand_history_1.txt');

function cashHand(header: string, body: string[]): string {
  return [
    `PokerStars Hand #555: Hold'em No Limit ($0.05/$0.10 USD) - ${header}`,
    "Table 'Nara' 6-max Seat #1 is the button",
    'Seat 1: alice ($5 in chips)',
    'Seat 2: bob ($5 in chips)',
    ...body,
  ].join('\n');
}

describe('pokerStars dialect', () => {
  it('recognises PokerStars file names', () => {
    expect(pokerStars.matchesFileName('pokerstars_hand_history_1.txt')).toBe(true);
    expect(pokerStars.matchesFileName('HH20200515 Tokyo II.txt')).toBe(true);
    expect(pokerStars.matchesFileName('888_poker.txt')).toBe(false);
  });

  it('parses a side-pot hand', () => {
    const [hand] = parseHands(TOKYO, pokerStars).toArray();
    expect(hand.id).toBe('213000000001');
    expect(hand.site).toBe('pokerstars');
    expect(hand.timestamp.toISOString()).toBe('2020-05-15T21:43:00.000Z');
    expect(hand.tableName).toBe('Tokyo II');
    expect(hand.buttonSeat).toBe(1);
    expect(hand.stakes).toEqual({ smallBlind: 5, bigBlind: 10, currency: '$' });
    expect(hand.board).toHaveLength(5);
    expect(hand.awards).toEqual([
      { player: 'superpippa69', amount: 600, potIndex: 1 },
      { player: 'shorty', amount: 290, potIndex: 0 },
    ]);
    expect(hand.reportedPots).toEqual({ total: 900, main: 290, side: [600], rake: 10 });
  });

  it('turns "raises to" into the chips added', () => {
    const [hand] = parseHands(TOKYO, pokerStars).toArray();
    expect(hand.actions.slice(2, 5)).toEqual([
      { player: 'shorty', type: ActionType.RAISE, amount: 100, street: Street.PREFLOP, allIn: true },
      { player: 'superpippa69', type: ActionType.RAISE, amount: 295, street: Street.PREFLOP, allIn: false },
      { player: 'bigstack', type: ActionType.CALL, amount: 290, street: Street.PREFLOP, allIn: false },
    ]);
  });

  it('records uncalled bets as returns', () => {
    const [, hand] = parseHands(TOKYO, pokerStars).toArray();
    expect(hand.actions[hand.actions.length - 1]).toEqual({
      player: 'superpippa69', type: ActionType.RETURN, amount: 50, street: Street.FLOP, allIn: false,
    });
    expect(hand.reportedPots).toEqual({ total: 65, main: 65, side: [], rake: 2 });
  });

  it('skips tournament hands with a warning', () => {
    const stream = parseHands(TOKYO, pokerStars, { source: 'tokyo.txt' });
    expect(stream.toArray()).toHaveLength(2);
    expect(stream.warnings).toEqual([
      { source: 'tokyo.txt', blockIndex: 2, handId: '213000000003', reason: 'tournament hands are not supported' },
    ]);
  });

  it('uses the printed zone, falling back to the configured one', () => {
    const eastern = cashHand('2020/05/15 15:40:28 ET', ['alice: posts small blind $0.05']);
    const [withZone] = parseHands(eastern, pokerStars).toArray();
    expect(withZone.timestamp.toISOString()).toBe('2020-05-15T19:40:28.000Z');

    const bare = cashHand('2020/05/15 21:40:28', ['alice: posts small blind $0.05']);
    const [withoutZone] = parseHands(bare, pokerStars, { timeZone: 'Europe/Paris' }).toArray();
    expect(withoutZone.timestamp.toISOString()).toBe('2020-05-15T19:40:28.000Z');
  });

  it('counts only the big blind of a dead blind post toward the street', () => {
    const text = cashHand('2020/05/15 21:40:28 ET', [
      'alice: posts small & big blinds $0.15',
      'bob: posts big blind $0.10',
      'alice: raises $0.20 to $0.30',
    ]);
    const [hand] = parseHands(text, pokerStars).toArray();
    expect(hand.actions.map(a => [a.type, a.amount])).toEqual([
      [ActionType.POST, 15],
      [ActionType.POST, 10],
      [ActionType.RAISE, 20],
    ]);
  });

  it('fails a block whose raise does not add chips', () => {
    const text = cashHand('2020/05/15 21:40:28 ET', [
      'bob: posts big blind $0.10',
      'bob: raises $0 to $0.10',
    ]);
    const stream = parseHands(text, pokerStars);
    expect(stream.toArray()).toEqual([]);
    expect(stream.warnings[0].reason).toBe('bob raises to 10 but already has 10 in');
  });
});
