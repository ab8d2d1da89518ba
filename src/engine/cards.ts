import type { Card } from './types';
import { RANK_LETTERS, SUIT_LETTERS } from './constants';

/** Parse a card token such as `Ah`, `Td` or `10c`. */
export function parseCard(token: string): Card | null {
  const text = token.trim();
  if (text.length < 2) return null;

  const rank = RANK_LETTERS[text.slice(0, -1).toUpperCase()];
  const suit = SUIT_LETTERS[text.slice(-1).toLowerCase()];
  if (!rank || !suit) return null;
  return { rank, suit };
}

/**
 * Parse a bracketed card list as printed by either site:
 * `[ 7c, 8h, 2s ]` or `[7c 8h 2s]`. Null if any token is not a card.
 */
export function parseCardList(text: string): Card[] | null {
  const tokens = text
    .replace(/[[\]]/g, ' ')
    .split(/[\s,]+/)
    .filter(t => t.length > 0);

  const cards: Card[] = [];
  for (const token of tokens) {
    const card = parseCard(token);
    if (!card) return null;
    cards.push(card);
  }
  return cards;
}
