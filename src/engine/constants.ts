import type { Suit, Rank } from './types';

export const DEFAULT_INPUT_DIR = 'hand_histories';
export const DEFAULT_OUTPUT_DIR = 'plots';
export const DEFAULT_TIME_ZONE = 'UTC';
export const DEFAULT_READ_CONCURRENCY = 4;

export const CURRENCY_SYMBOLS = ['$', '€', '£'];

export const SUIT_LETTERS: Record<string, Suit> = {
  h: 'hearts',
  d: 'diamonds',
  c: 'clubs',
  s: 'spades',
};

export const RANK_LETTERS: Record<string, Rank> = {
  '2': 2, '3': 3, '4': 4, '5': 5, '6': 6, '7': 7, '8': 8, '9': 9,
  T: 10, '10': 10, J: 11, Q: 12, K: 13, A: 14,
};

export const RANK_LABELS: Record<number, string> = {
  2: '2', 3: '3', 4: '4', 5: '5', 6: '6', 7: '7',
  8: '8', 9: '9', 10: '10', 11: 'J', 12: 'Q', 13: 'K', 14: 'A',
};

// Zone abbreviations printed by the sites, mapped to IANA names so DST is honoured.
export const ZONE_ABBREVIATIONS: Record<string, string> = {
  UTC: 'UTC',
  GMT: 'UTC',
  WET: 'Europe/Lisbon',
  BST: 'Europe/London',
  CET: 'Europe/Paris',
  CEST: 'Europe/Paris',
  EET: 'Europe/Athens',
  MSK: 'Europe/Moscow',
  ET: 'America/New_York',
  EST: 'America/New_York',
  EDT: 'America/New_York',
  CT: 'America/Chicago',
  MT: 'America/Denver',
  PT: 'America/Los_Angeles',
  BRT: 'America/Sao_Paulo',
  AEST: 'Australia/Sydney',
  NZT: 'Pacific/Auckland',
};
