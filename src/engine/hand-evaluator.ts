import type { Card, EvaluatedHand } from './types';
import { HandRank } from './types';
import { RANK_LABELS } from './constants';

function combinations(n: number, k: number): number[][] {
  const result: number[][] = [];
  const combo: number[] = [];
  function backtrack(start: number) {
    if (combo.length === k) {
      result.push([...combo]);
      return;
    }
    for (let i = start; i < n; i++) {
      combo.push(i);
      backtrack(i + 1);
      combo.pop();
    }
  }
  backtrack(0);
  return result;
}

const COMBINATION_CACHE = new Map<number, number[][]>();

/**
 * Evaluate the best 5-card hand a player can make from shown hole cards and the board.
 * Returns null when fewer than five cards are known (hand ended before the river
 * or the player showed nothing).
 */
export function evaluateShownHand(holeCards: Card[], board: Card[]): EvaluatedHand | null {
  const allCards = [...holeCards, ...board];
  if (holeCards.length === 0 || allCards.length < 5) return null;

  let combos = COMBINATION_CACHE.get(allCards.length);
  if (!combos) {
    combos = combinations(allCards.length, 5);
    COMBINATION_CACHE.set(allCards.length, combos);
  }

  let best: EvaluatedHand | null = null;
  for (const combo of combos) {
    const evaluated = evaluateFiveCards(combo.map(i => allCards[i]));
    if (!best || compareEvaluatedHands(evaluated, best) > 0) {
      best = evaluated;
    }
  }
  return best;
}

function evaluateFiveCards(cards: Card[]): EvaluatedHand {
  const ranks = cards.map(c => c.rank).sort((a, b) => b - a);
  const isFlush = cards.every(c => c.suit === cards[0].suit);
  const straightHigh = getStraightHighCard(ranks);

  const freq = new Map<number, number>();
  for (const r of ranks) {
    freq.set(r, (freq.get(r) ?? 0) + 1);
  }
  // by count desc, then rank desc
  const groups = Array.from(freq.entries()).sort((a, b) => b[1] - a[1] || b[0] - a[0]);
  const groupRanks = groups.map(g => g[0]);

  if (isFlush && straightHigh > 0) {
    return straightHigh === 14
      ? makeResult(HandRank.ROYAL_FLUSH, cards, [14], 'Royal Flush')
      : makeResult(HandRank.STRAIGHT_FLUSH, cards, [straightHigh], `Straight Flush, ${RANK_LABELS[straightHigh]} high`);
  }
  if (groups[0][1] === 4) {
    return makeResult(HandRank.FOUR_OF_A_KIND, cards, groupRanks, `Four of a Kind, ${RANK_LABELS[groupRanks[0]]}s`);
  }
  if (groups[0][1] === 3 && groups[1][1] === 2) {
    return makeResult(
      HandRank.FULL_HOUSE, cards, groupRanks,
      `Full House, ${RANK_LABELS[groupRanks[0]]}s full of ${RANK_LABELS[groupRanks[1]]}s`,
    );
  }
  if (isFlush) {
    return makeResult(HandRank.FLUSH, cards, ranks, `Flush, ${RANK_LABELS[ranks[0]]} high`);
  }
  if (straightHigh > 0) {
    return makeResult(HandRank.STRAIGHT, cards, [straightHigh], `Straight, ${RANK_LABELS[straightHigh]} high`);
  }
  if (groups[0][1] === 3) {
    return makeResult(HandRank.THREE_OF_A_KIND, cards, groupRanks, `Three of a Kind, ${RANK_LABELS[groupRanks[0]]}s`);
  }
  if (groups[0][1] === 2 && groups[1][1] === 2) {
    return makeResult(
      HandRank.TWO_PAIR, cards, groupRanks,
      `Two Pair, ${RANK_LABELS[groupRanks[0]]}s and ${RANK_LABELS[groupRanks[1]]}s`,
    );
  }
  if (groups[0][1] === 2) {
    return makeResult(HandRank.ONE_PAIR, cards, groupRanks, `Pair of ${RANK_LABELS[groupRanks[0]]}s`);
  }
  return makeResult(HandRank.HIGH_CARD, cards, ranks, `${RANK_LABELS[ranks[0]]} High`);
}

/** High card of a straight (5 for the wheel), or 0 */
function getStraightHighCard(sortedRanks: number[]): number {
  const unique = [...new Set(sortedRanks)];
  if (unique.length < 5) return 0;
  if (unique[0] - unique[4] === 4) return unique[0];
  if (unique[0] === 14 && unique[1] === 5 && unique[4] === 2) return 5;
  return 0;
}

function makeResult(rank: HandRank, cards: Card[], tiebreak: number[], description: string): EvaluatedHand {
  return { rank, bestFive: [...cards], values: [rank, ...tiebreak], description };
}

/**
 * Compare two evaluated hands.
 * Returns >0 if a is better, <0 if b is better, 0 if tie.
 * Lower HandRank enum = better hand.
 */
export function compareEvaluatedHands(a: EvaluatedHand, b: EvaluatedHand): number {
  if (a.values[0] !== b.values[0]) return b.values[0] - a.values[0];
  const maxLen = Math.max(a.values.length, b.values.length);
  for (let i = 1; i < maxLen; i++) {
    const va = a.values[i] ?? 0;
    const vb = b.values[i] ?? 0;
    if (va !== vb) return va - vb;
  }
  return 0;
}
