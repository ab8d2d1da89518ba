import type { Dialect } from './types';
import { ActionType, Street } from '../types';
import { parseCardList } from '../cards';
import { currencyOf } from '../money';
import { toLocalDateTime, zonedTimeToUtc } from '../timestamp';
import { splitAtHeaders, matchActor } from './block-reader';
import { BlockGrammarError, HandDraft, parseBlockWith, requireAmount } from './hand-draft';
import type { ParseContext } from './types';

const HEADER = /^#Game No\s*:\s*(\d+)\s*$/;
const STAKES_LINE = /^(\S+)\/(\S+)\s+Blinds\s+.+?\s+-\s+\*\*\*\s+(\d{2}) (\d{2}) (\d{4}) (\d{2}):(\d{2}):(\d{2})/;
const TABLE_LINE = /^Table\s+(.+?)\s+(?:\d+\s+Max\s+)?\((?:Real|Play) Money\)/;
const TABLE_FALLBACK = /^Table\s+(\S+)/;
const BUTTON_LINE = /^Seat (\d+) is the button$/;
const SEAT_LINE = /^Seat (\d+): (.+) \( (\S+) \)$/;
const STREET_LINE = /^\*\* Dealing (down cards|flop|turn|river) \*\*\s*(.*)$/;

const STREETS: Record<string, Street> = {
  'down cards': Street.PREFLOP,
  flop: Street.FLOP,
  turn: Street.TURN,
  river: Street.RIVER,
};

const ACTION_VERBS: Record<string, ActionType.CALL | ActionType.BET | ActionType.RAISE> = {
  calls: ActionType.CALL,
  bets: ActionType.BET,
  raises: ActionType.RAISE,
};

function parseHeaderLines(draft: HandDraft, line: string, context: ParseContext): boolean {
  const header = HEADER.exec(line);
  if (header) {
    draft.id = header[1];
    return true;
  }

  if (/tournament/i.test(line) && !draft.stakes) {
    throw new BlockGrammarError('tournament hands are not supported');
  }

  const stakes = STAKES_LINE.exec(line);
  if (stakes) {
    const [, sb, bb, day, month, year, hour, minute, second] = stakes;
    const local = toLocalDateTime(
      Number(year), Number(month), Number(day),
      Number(hour), Number(minute), Number(second),
    );
    if (!local) throw new BlockGrammarError(`invalid date in "${line}"`);

    draft.stakes = {
      smallBlind: requireAmount(sb, 'small blind'),
      bigBlind: requireAmount(bb, 'big blind'),
      currency: currencyOf(sb),
    };
    draft.timestamp = zonedTimeToUtc(local, context.timeZone);
    return true;
  }

  const table = TABLE_LINE.exec(line) ?? TABLE_FALLBACK.exec(line);
  if (table && line.startsWith('Table ')) {
    draft.tableName = table[1].replace(/'/g, '');
    return true;
  }

  const button = BUTTON_LINE.exec(line);
  if (button) {
    draft.buttonSeat = Number(button[1]);
    return true;
  }

  const seat = SEAT_LINE.exec(line);
  if (seat) {
    draft.addSeat({
      seat: Number(seat[1]),
      player: seat[2],
      stack: requireAmount(seat[3], 'stack'),
    });
    return true;
  }

  return false;
}

function parseActionRest(draft: HandDraft, player: string, rest: string): void {
  let match = /^posts ante \[(\S+)\]$/i.exec(rest);
  if (match) {
    draft.ante(player, requireAmount(match[1], 'ante'));
    return;
  }

  match = /^posts .+? \[(\S+)\]$/.exec(rest);
  if (match) {
    draft.post(player, requireAmount(match[1], 'blind'));
    return;
  }

  if (rest === 'folds') {
    draft.fold(player);
    return;
  }
  if (rest === 'checks') {
    draft.check(player);
    return;
  }

  match = /^(calls|bets|raises) \[(\S+)\]$/.exec(rest);
  if (match) {
    draft.put(player, ACTION_VERBS[match[1]], requireAmount(match[2], match[1]), false);
    return;
  }

  match = /^all-in(?: \((raise|call|bet)\))? \[(\S+)\]$/i.exec(rest);
  if (match) {
    const kind = match[1]?.toLowerCase();
    const type = kind === 'raise' ? ActionType.RAISE : kind === 'call' ? ActionType.CALL : ActionType.BET;
    draft.put(player, type, requireAmount(match[2], 'all-in'), true);
    return;
  }

  match = /^shows \[(.*)\]/.exec(rest);
  if (match) {
    const cards = parseCardList(match[1]);
    if (!cards) throw new BlockGrammarError(`unreadable cards in "${rest}"`);
    draft.show(player, cards);
    return;
  }

  match = /^collected \[\s*(\S+)\s*\]$/.exec(rest);
  if (match) {
    draft.award(player, requireAmount(match[1], 'collected'), null);
  }
  // mucks, "did not show" and anything else carry no money
}

function parseLine(draft: HandDraft, line: string, context: ParseContext): void {
  if (parseHeaderLines(draft, line, context)) return;

  const street = STREET_LINE.exec(line);
  if (street) {
    const cards = street[2] ? parseCardList(street[2]) : [];
    if (!cards) throw new BlockGrammarError(`unreadable board in "${line}"`);
    draft.startStreet(STREETS[street[1]], cards);
    return;
  }

  const actor = matchActor(line, draft.players, ' ');
  if (actor) parseActionRest(draft, actor.player, actor.rest);
}

export const poker888: Dialect = {
  tag: '888poker',
  label: '888poker',

  matchesFileName(baseName) {
    return /^888/i.test(baseName);
  },

  splitIntoHandBlocks(text) {
    return splitAtHeaders(text, line => HEADER.test(line));
  },

  parseHandBlock(block, context) {
    return parseBlockWith('888poker', block, context, parseLine);
  },
};
