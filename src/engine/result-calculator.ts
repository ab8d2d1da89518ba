import type { Hand, Pot, PotSettlement, EvaluatedHand, HandOutcomeLabel } from './types';
import { ActionType } from './types';
import { PotInvariantError } from './errors';
import { buildSidePots, distributePots, findUncalledExcess, oddChipOrder } from './pot-manager';
import { compareEvaluatedHands, evaluateShownHand } from './hand-evaluator';
import { formatAmount } from './money';
import { createLogger } from '../logger';

const log = createLogger('Pots');

/** Net chips each player put in: posts, antes, calls, bets and raises minus uncalled returns. */
export function collectContributions(hand: Hand): Map<string, number> {
  const contributions = new Map<string, number>();
  for (const action of hand.actions) {
    const current = contributions.get(action.player) ?? 0;
    switch (action.type) {
      case ActionType.POST:
      case ActionType.ANTE:
      case ActionType.CALL:
      case ActionType.BET:
      case ActionType.RAISE:
        contributions.set(action.player, current + action.amount);
        break;
      case ActionType.RETURN:
        contributions.set(action.player, current - action.amount);
        break;
      default:
        break;
    }
  }
  return contributions;
}

export function foldedPlayers(hand: Hand): Set<string> {
  return new Set(hand.actions.filter(a => a.type === ActionType.FOLD).map(a => a.player));
}

export function collectAwards(hand: Hand): Map<string, number> {
  const awards = new Map<string, number>();
  for (const award of hand.awards) {
    awards.set(award.player, (awards.get(award.player) ?? 0) + award.amount);
  }
  return awards;
}

export function isSeated(hand: Hand, player: string): boolean {
  return hand.seats.some(s => s.player === player);
}

/** Best evaluable showdown hand per player; players who showed nothing usable are absent. */
export function evaluateShowdown(hand: Hand): Map<string, EvaluatedHand> {
  const evaluated = new Map<string, EvaluatedHand>();
  for (const shown of hand.shownHands) {
    const result = evaluateShownHand(shown.cards, hand.board);
    if (result) evaluated.set(shown.player, result);
  }
  return evaluated;
}

/**
 * Decide who won each computed pot.
 * Pot-labelled award lines name the winner directly. Otherwise a pot goes to the
 * collectors eligible for it, narrowed to the best shown hands when every
 * candidate can be evaluated against the board.
 */
export function resolvePotWinners(
  hand: Hand,
  pots: Pot[],
  showdown: Map<string, EvaluatedHand> = evaluateShowdown(hand),
): string[][] {
  const labelled = new Map<number, Set<string>>();
  const unlabelled = new Set<string>();

  for (const award of hand.awards) {
    if (award.amount <= 0) continue;
    if (award.potIndex !== null && award.potIndex < pots.length) {
      const winners = labelled.get(award.potIndex) ?? new Set<string>();
      winners.add(award.player);
      labelled.set(award.potIndex, winners);
    } else {
      if (award.potIndex !== null) {
        log.warnOnce(
          `pot-label:${hand.id}`,
          `Hand ${hand.id}: award to ${award.player} names pot ${award.potIndex}, only ${pots.length} pot(s) computed`,
        );
      }
      unlabelled.add(award.player);
    }
  }

  return pots.map((pot, potIndex) => {
    const named = labelled.get(potIndex);
    if (named) return [...named];

    const candidates = pot.eligible.filter(p => unlabelled.has(p));
    if (candidates.length <= 1) return candidates;

    const ranked = candidates.filter(p => showdown.has(p));
    if (ranked.length !== candidates.length) return candidates;

    let best: EvaluatedHand | null = null;
    for (const player of ranked) {
      const evaluated = showdown.get(player);
      if (evaluated && (!best || compareEvaluatedHands(evaluated, best) > 0)) best = evaluated;
    }
    return ranked.filter(p => {
      const evaluated = showdown.get(p);
      return !!evaluated && !!best && compareEvaluatedHands(evaluated, best) === 0;
    });
  });
}

/**
 * Rebuild the hand's pots and check the site's award lines against them.
 * Award amounts stay authoritative (they are net of rake); the computed shares
 * are the gross split the awards must fit inside.
 */
export function settleHand(hand: Hand): PotSettlement {
  const contributions = collectContributions(hand);
  const money = (cents: number) => formatAmount(cents, hand.stakes.currency);

  for (const [player, amount] of contributions) {
    if (amount < 0) {
      throw new PotInvariantError(hand.id, `${player} got back more than they put in`);
    }
  }

  const uncalled = findUncalledExcess(contributions);
  if (uncalled) {
    contributions.set(uncalled.player, (contributions.get(uncalled.player) ?? 0) - uncalled.amount);
  }
  const totalContributed = sum(contributions.values());

  const awards = collectAwards(hand);
  // 888 counts the unmatched chips into the winner's collect line
  if (uncalled && sum(awards.values()) > totalContributed) {
    const collected = awards.get(uncalled.player) ?? 0;
    if (collected >= uncalled.amount) awards.set(uncalled.player, collected - uncalled.amount);
  }
  const totalAwarded = sum(awards.values());

  if (totalAwarded > totalContributed) {
    throw new PotInvariantError(
      hand.id,
      `awards ${money(totalAwarded)} exceed contributions ${money(totalContributed)}`,
    );
  }

  const pots = buildSidePots(contributions, foldedPlayers(hand));

  for (const award of hand.awards) {
    if (award.amount <= 0 || award.potIndex === null || award.potIndex >= pots.length) continue;
    if (!pots[award.potIndex].eligible.includes(award.player)) {
      throw new PotInvariantError(
        hand.id,
        `${award.player} collected from pot ${award.potIndex} but is not eligible for it`,
      );
    }
  }

  const winnersByPot = resolvePotWinners(hand, pots);
  const shares = distributePots(pots, winnersByPot, oddChipOrder(hand.seats, hand.buttonSeat));

  const grossShares = new Map<string, number>();
  for (const share of shares) {
    grossShares.set(share.player, (grossShares.get(share.player) ?? 0) + share.amount);
  }

  for (const [player, amount] of awards) {
    if (amount <= 0) continue;
    const winnable = sum(pots.filter(p => p.eligible.includes(player)).map(p => p.amount));
    if (winnable === 0) {
      throw new PotInvariantError(hand.id, `${player} collected but is not eligible for any pot`);
    }
    if (amount > winnable) {
      throw new PotInvariantError(
        hand.id,
        `${player} collected ${money(amount)}, more than the ${money(winnable)} in pots they can win`,
      );
    }
    const gross = grossShares.get(player) ?? 0;
    if (amount > gross) {
      log.warn(`Hand ${hand.id}: ${player} collected ${money(amount)}, computed share is ${money(gross)}`);
    }
  }

  checkReportedPots(hand, pots, totalContributed, totalAwarded);

  return {
    contributions,
    uncalled,
    pots,
    winnersByPot,
    shares,
    awards,
    totalContributed,
    totalAwarded,
    rake: totalContributed - totalAwarded,
  };
}

/**
 * Compare the pots against the summary the site printed. Printed pots are net
 * of rake, so each may fall short of the computed one by at most the rake.
 */
function checkReportedPots(hand: Hand, pots: Pot[], totalContributed: number, totalAwarded: number): void {
  const reported = hand.reportedPots;
  if (!reported) return;
  const money = (cents: number) => formatAmount(cents, hand.stakes.currency);

  if (reported.total !== totalContributed) {
    throw new PotInvariantError(
      hand.id,
      `site reports a total pot of ${money(reported.total)}, contributions add up to ${money(totalContributed)}`,
    );
  }

  if (reported.side.length > 0) {
    const printed = [reported.main, ...reported.side];
    if (printed.length !== pots.length) {
      log.warn(`Hand ${hand.id}: site reports ${printed.length} pot(s), computed ${pots.length}`);
    } else {
      printed.forEach((amount, potIndex) => {
        const shortfall = pots[potIndex].amount - amount;
        if (shortfall < 0 || shortfall > reported.rake) {
          throw new PotInvariantError(
            hand.id,
            `site reports pot ${potIndex} as ${money(amount)}, computed ${money(pots[potIndex].amount)}`,
          );
        }
      });
    }
  }

  if (reported.rake !== totalContributed - totalAwarded) {
    log.warn(`Hand ${hand.id}: site reports rake ${money(reported.rake)}, awards leave ${money(totalContributed - totalAwarded)}`);
  }
}

/**
 * Net result for `hero` in one hand: awarded minus contributed.
 * Null when the hero is not seated, so absent hands never count as zero.
 */
export function computeHeroResult(hand: Hand, hero: string): number | null {
  if (!isSeated(hand, hero)) return null;

  const settlement = settleHand(hand);
  const awarded = settlement.awards.get(hero) ?? 0;
  const contributed = settlement.contributions.get(hero) ?? 0;
  return awarded - contributed;
}

export function classifyOutcome(hand: Hand, hero: string): HandOutcomeLabel {
  const collectors = new Set(hand.awards.filter(a => a.amount > 0).map(a => a.player));
  if (!collectors.has(hero)) return 'no-win';
  return collectors.size === 1 ? 'win' : 'split';
}

function sum(values: Iterable<number>): number {
  let total = 0;
  for (const v of values) total += v;
  return total;
}
