import type { Hand, SessionPoint, SessionSeries } from './types';
import { NoHeroHandsError } from './errors';
import { classifyOutcome, computeHeroResult, evaluateShowdown } from './result-calculator';

/** Timestamp, then position in the configured file list, then hand id. */
export function compareHands(a: Hand, b: Hand): number {
  const byTime = a.timestamp.getTime() - b.timestamp.getTime();
  if (byTime !== 0) return byTime;
  if (a.fileIndex !== b.fileIndex) return a.fileIndex - b.fileIndex;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

/**
 * Merge hands from every file into the hero's running total.
 * Hands without the hero are left out entirely.
 */
export function aggregate(hands: Hand[], hero: string): SessionSeries {
  const scored = hands
    .map(hand => ({ hand, result: computeHeroResult(hand, hero) }))
    .filter((entry): entry is { hand: Hand; result: number } => entry.result !== null)
    .sort((a, b) => compareHands(a.hand, b.hand));

  if (scored.length === 0) throw new NoHeroHandsError(hero);

  const handsAtTable = new Map<string, number>();
  let cumulative = 0;

  const points: SessionPoint[] = scored.map(({ hand, result }, i) => {
    cumulative += result;

    const tableKey = `${hand.site}:${hand.tableName}`;
    const handNumberAtTable = (handsAtTable.get(tableKey) ?? 0) + 1;
    handsAtTable.set(tableKey, handNumberAtTable);

    return {
      timestamp: hand.timestamp,
      handId: hand.id,
      tableName: hand.tableName,
      site: hand.site,
      result,
      cumulative,
      handNumber: i + 1,
      handNumberAtTable,
      outcome: classifyOutcome(hand, hero),
      startStack: hand.seats.find(s => s.player === hero)?.stack ?? 0,
      showdown: evaluateShowdown(hand).get(hero)?.description ?? null,
    };
  });

  return {
    hero,
    points,
    total: cumulative,
    firstTimestamp: points[0].timestamp,
    lastTimestamp: points[points.length - 1].timestamp,
  };
}
