import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import type { Hand } from '../src/engine/types';
import type { Dialect } from '../src/engine/dialects';
import { detectDialect } from '../src/engine/dialects';
import { parseHands } from '../src/engine/hand-parser';

export const FIXTURE_DIR = fileURLToPath(new URL('./fixtures/hand_histories/', import.meta.url));

export function readFixture(name: string): string {
  return fs.readFileSync(path.join(FIXTURE_DIR, name), 'utf-8');
}

/** Parse a fixture file with the dialect its name selects. */
export function fixtureHands(name: string, fileIndex = 0, dialect: Dialect = detectDialect(name)): Hand[] {
  return parseHands(readFixture(name), dialect, { source: name, fileIndex }).toArray();
}

export function handById(hands: Hand[], id: string): Hand {
  const hand = hands.find(h => h.id === id);
  if (!hand) throw new Error(`fixture hand ${id} not found`);
  return hand;
}
