import type {
  Award, Card, DialectTag, Hand, HandAction, ReportedPots, Seat, ShownHand, Stakes,
} from '../types';
import { ActionType, Street } from '../types';
import type { BlockParseResult, HandBlock, ParseContext } from './types';
import { parseAmount } from '../money';

/** Raised inside a dialect parser when a block does not fit the grammar. */
export class BlockGrammarError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BlockGrammarError';
  }
}

/**
 * Mutable accumulator a dialect fills line by line. It tracks what every player
 * has committed on the current street so "raises to" totals become chip deltas.
 */
export class HandDraft {
  id: string | null = null;
  timestamp: Date | null = null;
  tableName = '';
  stakes: Stakes | null = null;
  buttonSeat: number | null = null;
  reportedPots: ReportedPots | null = null;
  inSummary = false;

  private seats: Seat[] = [];
  private actions: HandAction[] = [];
  private board: Card[] = [];
  private shownHands: ShownHand[] = [];
  private awards: Award[] = [];
  private street: Street = Street.PREFLOP;
  private committed = new Map<string, number>();

  constructor(private readonly site: DialectTag) {}

  get players(): string[] {
    return this.seats.map(s => s.player);
  }

  addSeat(seat: Seat): void {
    if (this.seats.some(s => s.player === seat.player)) {
      throw new BlockGrammarError(`player ${seat.player} is seated twice`);
    }
    this.seats.push(seat);
  }

  startStreet(street: Street, cards: Card[] = []): void {
    this.street = street;
    this.committed.clear();
    this.board.push(...cards);
  }

  /** Blind or dead blind; `commits` is how much of it counts toward the street. */
  post(player: string, amount: number, commits: number = amount): void {
    this.record(player, ActionType.POST, amount, false);
    this.commit(player, commits);
  }

  ante(player: string, amount: number): void {
    this.record(player, ActionType.ANTE, amount, false);
  }

  fold(player: string): void {
    this.record(player, ActionType.FOLD, 0, false);
  }

  check(player: string): void {
    this.record(player, ActionType.CHECK, 0, false);
  }

  /** Call, bet or raise given as the chips added by this action. */
  put(player: string, type: ActionType.CALL | ActionType.BET | ActionType.RAISE, amount: number, allIn: boolean): void {
    this.record(player, type, amount, allIn);
    this.commit(player, amount);
  }

  /** Raise given as the player's new street total. */
  raiseTo(player: string, total: number, allIn: boolean): void {
    const already = this.committed.get(player) ?? 0;
    const added = total - already;
    if (added <= 0) {
      throw new BlockGrammarError(`${player} raises to ${total} but already has ${already} in`);
    }
    this.put(player, ActionType.RAISE, added, allIn);
  }

  uncalled(player: string, amount: number): void {
    this.record(player, ActionType.RETURN, amount, false);
    this.commit(player, -amount);
  }

  show(player: string, cards: Card[]): void {
    if (cards.length > 0) this.shownHands.push({ player, cards });
  }

  award(player: string, amount: number, potIndex: number | null): void {
    this.awards.push({ player, amount, potIndex });
  }

  private commit(player: string, amount: number): void {
    this.committed.set(player, (this.committed.get(player) ?? 0) + amount);
  }

  private record(player: string, type: ActionType, amount: number, allIn: boolean): void {
    this.actions.push({ player, type, amount, street: this.street, allIn });
  }

  build(block: HandBlock, context: ParseContext): Hand {
    if (!this.id) throw new BlockGrammarError('missing hand id');
    if (!this.timestamp) throw new BlockGrammarError('missing timestamp');
    if (!this.stakes) throw new BlockGrammarError('missing stakes');
    if (this.seats.length === 0) throw new BlockGrammarError('no seat lines');

    return {
      id: this.id,
      site: this.site,
      timestamp: this.timestamp,
      tableName: this.tableName,
      stakes: this.stakes,
      buttonSeat: this.buttonSeat,
      seats: [...this.seats],
      actions: [...this.actions],
      board: [...this.board],
      shownHands: [...this.shownHands],
      reportedPots: this.reportedPots,
      awards: [...this.awards],
      source: context.source,
      fileIndex: context.fileIndex,
      blockIndex: block.index,
    };
  }
}

export function requireAmount(raw: string, what: string): number {
  const amount = parseAmount(raw);
  if (amount === null) throw new BlockGrammarError(`unreadable ${what} amount "${raw}"`);
  return amount;
}

/**
 * Run a dialect's line parser over one block. Grammar errors become a failed
 * result for that block; anything else propagates.
 */
export function parseBlockWith(
  site: DialectTag,
  block: HandBlock,
  context: ParseContext,
  parseLine: (draft: HandDraft, line: string, context: ParseContext) => void,
): BlockParseResult {
  const draft = new HandDraft(site);
  try {
    for (const line of block.lines) {
      if (line.trim() === '') continue;
      parseLine(draft, line, context);
    }
    return { ok: true, hand: draft.build(block, context) };
  } catch (error) {
    if (error instanceof BlockGrammarError) {
      return draft.id
        ? { ok: false, reason: error.message, handId: draft.id }
        : { ok: false, reason: error.message };
    }
    throw error;
  }
}
