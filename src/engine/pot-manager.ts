import type { Pot, PotShare, Seat, UncalledExcess } from './types';

/**
 * Build the main pot and side pots from what every player put in.
 * 1. Collect unique contribution levels, sort ascending
 * 2. Peel each layer: amount = increment * players who reached it
 * 3. Eligible = reached the layer AND did not fold
 * 4. Merge adjacent pots with identical eligible sets
 */
export function buildSidePots(contributions: Map<string, number>, folded: Set<string>): Pot[] {
  const bettors = [...contributions.entries()].filter(([, amount]) => amount > 0);
  if (bettors.length === 0) return [];

  const levels = [...new Set(bettors.map(([, amount]) => amount))].sort((a, b) => a - b);

  const pots: Pot[] = [];
  let previousLevel = 0;

  for (const level of levels) {
    const increment = level - previousLevel;
    const contributors = bettors.filter(([, amount]) => amount >= level).map(([player]) => player);

    pots.push({
      amount: increment * contributors.length,
      eligible: contributors.filter(p => !folded.has(p)),
      contributors,
    });
    previousLevel = level;
  }

  return mergePots(pots);
}

/**
 * Chips nobody matched: the part of the single biggest contribution above the
 * next biggest one. Sites that print no "uncalled bet" line leave these in the
 * player's contribution; they always go back to that player.
 */
export function findUncalledExcess(contributions: Map<string, number>): UncalledExcess | null {
  let top: [string, number] | null = null;
  let second = 0;
  for (const [player, amount] of contributions) {
    if (!top || amount > top[1]) {
      second = Math.max(second, top ? top[1] : 0);
      top = [player, amount];
    } else {
      second = Math.max(second, amount);
    }
  }
  if (!top || top[1] <= second) return null;
  return { player: top[0], amount: top[1] - second };
}

function mergePots(pots: Pot[]): Pot[] {
  const merged: Pot[] = [];
  for (const pot of pots) {
    const last = merged[merged.length - 1];
    // A layer nobody can win (everyone in it folded) stays with the layer below.
    if (last && (pot.eligible.length === 0 || sameMembers(last.eligible, pot.eligible))) {
      last.amount += pot.amount;
    } else {
      merged.push({ ...pot, eligible: [...pot.eligible], contributors: [...pot.contributors] });
    }
  }
  return merged;
}

function sameMembers(a: string[], b: string[]): boolean {
  if (a.length !== b.length) return false;
  const set = new Set(a);
  return b.every(v => set.has(v));
}

/**
 * Seat order used for odd chips: first seat left of the button comes first.
 * Falls back to plain seat order when the button is unknown.
 */
export function oddChipOrder(seats: Seat[], buttonSeat: number | null): string[] {
  const bySeat = [...seats].sort((a, b) => a.seat - b.seat);
  if (buttonSeat === null) return bySeat.map(s => s.player);

  const leftOfButton = bySeat.filter(s => s.seat > buttonSeat);
  const rest = bySeat.filter(s => s.seat <= buttonSeat);
  return [...leftOfButton, ...rest].map(s => s.player);
}

/**
 * Split every pot among its winners.
 * Winners not eligible for a pot are dropped from it. Ties split evenly; the odd
 * chips go one each to the winners that come first in `order`, so the shares of
 * a pot always add up to its amount. A pot without an eligible winner yields no shares.
 */
export function distributePots(pots: Pot[], winnersByPot: string[][], order: string[]): PotShare[] {
  const shares: PotShare[] = [];
  const position = (player: string) => {
    const index = order.indexOf(player);
    return index === -1 ? order.length : index;
  };

  pots.forEach((pot, potIndex) => {
    const eligible = new Set(pot.eligible);
    const winners = [...new Set(winnersByPot[potIndex] ?? [])]
      .filter(p => eligible.has(p))
      .sort((a, b) => position(a) - position(b) || (a < b ? -1 : a > b ? 1 : 0));

    if (winners.length === 0) return;

    const share = Math.floor(pot.amount / winners.length);
    const remainder = pot.amount - share * winners.length;

    winners.forEach((player, i) => {
      shares.push({ player, amount: share + (i < remainder ? 1 : 0), potIndex });
    });
  });

  return shares;
}
