// ── Card Types ──────────────────────────────────────────────

export type Suit = 'hearts' | 'diamonds' | 'clubs' | 'spades';
export type Rank = 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9 | 10 | 11 | 12 | 13 | 14;
// 11=J, 12=Q, 13=K, 14=A

export interface Card {
  suit: Suit;
  rank: Rank;
}

// ── Hand Evaluation ─────────────────────────────────────────

export enum HandRank {
  ROYAL_FLUSH = 1,
  STRAIGHT_FLUSH = 2,
  FOUR_OF_A_KIND = 3,
  FULL_HOUSE = 4,
  FLUSH = 5,
  STRAIGHT = 6,
  THREE_OF_A_KIND = 7,
  TWO_PAIR = 8,
  ONE_PAIR = 9,
  HIGH_CARD = 10,
}

export interface EvaluatedHand {
  rank: HandRank;
  bestFive: Card[];
  values: number[];   // [handRank, primary, secondary, kicker1, ...]
  description: string;
}

// ── Streets & Actions ───────────────────────────────────────

export enum Street {
  PREFLOP = 'PREFLOP',
  FLOP = 'FLOP',
  TURN = 'TURN',
  RIVER = 'RIVER',
  SHOWDOWN = 'SHOWDOWN',
}

export enum ActionType {
  POST = 'POST',     // blind, counts toward the street commitment
  ANTE = 'ANTE',     // dead money
  FOLD = 'FOLD',
  CHECK = 'CHECK',
  CALL = 'CALL',
  BET = 'BET',
  RAISE = 'RAISE',
  RETURN = 'RETURN', // uncalled bet handed back
}

/** Amounts are integer cents. For RETURN, `amount` is what came back. */
export interface HandAction {
  player: string;
  type: ActionType;
  amount: number;
  street: Street;
  allIn: boolean;
}

// ── Hand Record ─────────────────────────────────────────────

export type DialectTag = '888poker' | 'pokerstars';

export interface Stakes {
  smallBlind: number;
  bigBlind: number;
  currency: string | null;
}

export interface Seat {
  seat: number;
  player: string;
  stack: number;
}

export interface Award {
  player: string;
  amount: number;
  /** 0 = main pot, k = k-th side pot, null when the site does not say */
  potIndex: number | null;
}

export interface ReportedPots {
  total: number;
  main: number;
  side: number[];
  rake: number;
}

export interface ShownHand {
  player: string;
  cards: Card[];
}

export interface Hand {
  id: string;
  site: DialectTag;
  timestamp: Date;
  tableName: string;
  stakes: Stakes;
  buttonSeat: number | null;
  seats: Seat[];
  actions: HandAction[];
  board: Card[];
  shownHands: ShownHand[];
  reportedPots: ReportedPots | null;
  awards: Award[];
  source: string;
  fileIndex: number;
  blockIndex: number;
}

// ── Pot Types ───────────────────────────────────────────────

export interface Pot {
  amount: number;
  eligible: string[];
  contributors: string[];
}

export interface PotShare {
  player: string;
  amount: number;
  potIndex: number;
}

/** Unmatched chips handed back to the player who put them in. */
export interface UncalledExcess {
  player: string;
  amount: number;
}

/** Contributions and awards are net of any unmatched chips returned. */
export interface PotSettlement {
  contributions: Map<string, number>;
  uncalled: UncalledExcess | null;
  pots: Pot[];
  winnersByPot: string[][];
  shares: PotShare[];
  awards: Map<string, number>;
  totalContributed: number;
  totalAwarded: number;
  rake: number;
}

// ── Session ─────────────────────────────────────────────────

export type HandOutcomeLabel = 'win' | 'split' | 'no-win';

export interface SessionPoint {
  timestamp: Date;
  handId: string;
  tableName: string;
  site: DialectTag;
  result: number;
  cumulative: number;
  handNumber: number;
  handNumberAtTable: number;
  outcome: HandOutcomeLabel;
  startStack: number;
  showdown: string | null;
}

export interface SessionSeries {
  hero: string;
  points: SessionPoint[];
  total: number;
  firstTimestamp: Date;
  lastTimestamp: Date;
}
