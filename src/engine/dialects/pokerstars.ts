import type { Dialect, ParseContext } from './types';
import type { ReportedPots } from '../types';
import { ActionType, Street } from '../types';
import { parseCardList } from '../cards';
import { currencyOf } from '../money';
import { toLocalDateTime, zonedTimeToUtc, zoneForAbbreviation } from '../timestamp';
import { splitAtHeaders, matchActor } from './block-reader';
import { BlockGrammarError, HandDraft, parseBlockWith, requireAmount } from './hand-draft';

const HEADER = /^PokerStars\b.*?Hand #(\d+):\s*(.*)$/;
const STAKES = /\((\S+?)\/(\S+?)(?:\s+[A-Z]{3})?\)/;
const STAMP = /(\d{4})\/(\d{1,2})\/(\d{1,2}) (\d{1,2}):(\d{2}):(\d{2})(?: ([A-Z]{2,4}))?/g;
const TABLE_LINE = /^Table '(.+?)'/;
const BUTTON = /Seat #(\d+) is the button/;
const SEAT_LINE = /^Seat (\d+): (.+?) \((\S+) in chips(?:,[^)]*)?\)/;
const STREET_LINE = /^\*\*\* (HOLE CARDS|FLOP|TURN|RIVER|SHOW DOWN|SUMMARY) \*\*\*\s*(.*)$/;
const UNCALLED = /^Uncalled bet \((\S+)\) returned to (.+)$/;
const TOTAL_POT = /^Total pot (\S+)(.*?)\|\s*Rake (\S+)/;

const STREETS: Record<string, Street> = {
  'HOLE CARDS': Street.PREFLOP,
  FLOP: Street.FLOP,
  TURN: Street.TURN,
  RIVER: Street.RIVER,
  'SHOW DOWN': Street.SHOWDOWN,
};

/** First stamp whose zone we know wins; a zone-less or unknown stamp uses the configured zone. */
function parseTimestamp(text: string, context: ParseContext): Date | null {
  let fallback: Date | null = null;
  for (const stamp of text.matchAll(STAMP)) {
    const [, year, month, day, hour, minute, second, zone] = stamp;
    const local = toLocalDateTime(
      Number(year), Number(month), Number(day),
      Number(hour), Number(minute), Number(second),
    );
    if (!local) continue;

    const timeZone = zone ? zoneForAbbreviation(zone) : null;
    if (timeZone) return zonedTimeToUtc(local, timeZone);
    fallback ??= zonedTimeToUtc(local, context.timeZone);
  }
  return fallback;
}

function parseHeader(draft: HandDraft, id: string, rest: string, context: ParseContext): void {
  draft.id = id;
  if (/tournament/i.test(rest)) {
    throw new BlockGrammarError('tournament hands are not supported');
  }

  const stakes = STAKES.exec(rest);
  if (!stakes) throw new BlockGrammarError('no stakes in header');
  draft.stakes = {
    smallBlind: requireAmount(stakes[1], 'small blind'),
    bigBlind: requireAmount(stakes[2], 'big blind'),
    currency: currencyOf(stakes[1]),
  };

  draft.timestamp = parseTimestamp(rest, context);
  if (!draft.timestamp) throw new BlockGrammarError('no timestamp in header');
}

/** `Total pot $3.50 Main pot $2.40. Side pot-1 $1.05. | Rake $0.05` */
function parseTotalPot(line: string): ReportedPots | null {
  const match = TOTAL_POT.exec(line);
  if (!match) return null;

  const total = requireAmount(match[1], 'total pot');
  const breakdown = match[2];
  const main = /Main pot (\S+?)\.?(?:\s|$)/.exec(breakdown);
  const side = [...breakdown.matchAll(/Side pot(?:-\d+)? (\S+?)\.?(?:\s|$)/g)]
    .map(m => requireAmount(m[1], 'side pot'));

  return {
    total,
    main: main ? requireAmount(main[1], 'main pot') : total,
    side,
    rake: requireAmount(match[3], 'rake'),
  };
}

function potIndexOf(label: string): number | null {
  if (label === 'pot' || label === 'main pot') return 0;
  if (label === 'side pot') return 1;
  const numbered = /^side pot-(\d+)$/.exec(label);
  return numbered ? Number(numbered[1]) : null;
}

function parseActionRest(draft: HandDraft, player: string, rest: string): void {
  const allIn = / and is all-in$/.test(rest);
  const text = rest.replace(/ and is all-in$/, '');

  let match = /^posts (?:the )?ante (\S+)$/.exec(text);
  if (match) {
    draft.ante(player, requireAmount(match[1], 'ante'));
    return;
  }

  match = /^posts small & big blinds (\S+)$/.exec(text);
  if (match) {
    const amount = requireAmount(match[1], 'blinds');
    const bigBlind = draft.stakes?.bigBlind ?? amount;
    draft.post(player, amount, Math.min(bigBlind, amount));
    return;
  }

  match = /^posts (?:small|big) blind (\S+)$/.exec(text);
  if (match) {
    draft.post(player, requireAmount(match[1], 'blind'));
    return;
  }

  if (text === 'folds' || text.startsWith('folds [')) {
    draft.fold(player);
    return;
  }
  if (text === 'checks') {
    draft.check(player);
    return;
  }

  match = /^calls (\S+)$/.exec(text);
  if (match) {
    draft.put(player, ActionType.CALL, requireAmount(match[1], 'call'), allIn);
    return;
  }

  match = /^bets (\S+)$/.exec(text);
  if (match) {
    draft.put(player, ActionType.BET, requireAmount(match[1], 'bet'), allIn);
    return;
  }

  match = /^raises (\S+) to (\S+)$/.exec(text);
  if (match) {
    draft.raiseTo(player, requireAmount(match[2], 'raise'), allIn);
    return;
  }

  match = /^shows \[(.*?)\]/.exec(text);
  if (match) {
    const cards = parseCardList(match[1]);
    if (!cards) throw new BlockGrammarError(`unreadable cards in "${rest}"`);
    draft.show(player, cards);
  }
  // mucks, "doesn't show hand", chat and table events carry no money
}

function parseLine(draft: HandDraft, line: string, context: ParseContext): void {
  const header = HEADER.exec(line);
  if (header) {
    parseHeader(draft, header[1], header[2], context);
    return;
  }

  const street = STREET_LINE.exec(line);
  if (street) {
    if (street[1] === 'SUMMARY') {
      draft.inSummary = true;
      return;
    }
    // only the newest bracket holds the cards dealt on this street
    const brackets = street[2].match(/\[[^\]]*\]/g) ?? [];
    const newest = brackets.length > 0 ? brackets[brackets.length - 1] : '';
    const cards = newest ? parseCardList(newest) : [];
    if (!cards) throw new BlockGrammarError(`unreadable board in "${line}"`);
    draft.startStreet(STREETS[street[1]], cards);
    return;
  }

  if (draft.inSummary) {
    const pots = parseTotalPot(line);
    if (pots) draft.reportedPots = pots;
    return;
  }

  const table = TABLE_LINE.exec(line);
  if (table) {
    draft.tableName = table[1];
    const button = BUTTON.exec(line);
    if (button) draft.buttonSeat = Number(button[1]);
    return;
  }

  const seat = SEAT_LINE.exec(line);
  if (seat) {
    draft.addSeat({
      seat: Number(seat[1]),
      player: seat[2],
      stack: requireAmount(seat[3], 'stack'),
    });
    return;
  }

  const uncalled = UNCALLED.exec(line);
  if (uncalled) {
    if (!draft.players.includes(uncalled[2])) {
      throw new BlockGrammarError(`uncalled bet returned to unseated player ${uncalled[2]}`);
    }
    draft.uncalled(uncalled[2], requireAmount(uncalled[1], 'uncalled bet'));
    return;
  }

  // "<name> collected $x from side pot-1" has no colon after the name
  const collected = matchActor(line, draft.players, ' ');
  const award = collected && /^collected (\S+) from (pot|main pot|side pot(?:-\d+)?)$/.exec(collected.rest);
  if (collected && award) {
    draft.award(collected.player, requireAmount(award[1], 'collected'), potIndexOf(award[2]));
    return;
  }

  const actor = matchActor(line, draft.players, ': ');
  if (actor) parseActionRest(draft, actor.player, actor.rest);
}

export const pokerStars: Dialect = {
  tag: 'pokerstars',
  label: 'PokerStars',

  matchesFileName(baseName) {
    return /^pokerstars/i.test(baseName) || /^HH\d{8}/.test(baseName);
  },

  splitIntoHandBlocks(text) {
    return splitAtHeaders(text, line => HEADER.test(line));
  },

  parseHandBlock(block, context) {
    return parseBlockWith('pokerstars', block, context, parseLine);
  },
};
