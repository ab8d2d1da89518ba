import path from 'path';
import type { Dialect } from './types';
import { UnknownDialectError } from '../errors';
import { poker888 } from './poker888';
import { pokerStars } from './pokerstars';

export type { Dialect, HandBlock, ParseContext, BlockParseResult } from './types';

export const DIALECTS: readonly Dialect[] = [poker888, pokerStars];

/** Pick the site format from a file's base name. */
export function detectDialect(fileName: string, dialects: readonly Dialect[] = DIALECTS): Dialect {
  const baseName = path.basename(fileName);
  const dialect = dialects.find(d => d.matchesFileName(baseName));
  if (!dialect) throw new UnknownDialectError(baseName);
  return dialect;
}
