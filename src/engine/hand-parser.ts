import type { Hand } from './types';
import type { Dialect, ParseContext } from './dialects';
import { DialectMismatchError } from './errors';
import { DEFAULT_TIME_ZONE } from './constants';

export interface ParseWarning {
  source: string;
  blockIndex: number;
  handId: string | null;
  reason: string;
}

/**
 * Lazy, restartable view over the hands in one file. Every iteration re-splits
 * the text; `warnings` describes the blocks skipped by the latest pass.
 */
export class HandStream implements Iterable<Hand> {
  private lastWarnings: ParseWarning[] = [];

  constructor(
    readonly text: string,
    readonly dialect: Dialect,
    readonly context: ParseContext,
  ) {}

  get warnings(): readonly ParseWarning[] {
    return this.lastWarnings;
  }

  *[Symbol.iterator](): Iterator<Hand> {
    const warnings: ParseWarning[] = [];
    this.lastWarnings = warnings;

    if (this.text.trim() === '') return;

    const blocks = this.dialect.splitIntoHandBlocks(this.text);
    if (blocks.length === 0) {
      throw new DialectMismatchError(this.context.source, this.dialect.label);
    }

    for (const block of blocks) {
      const result = this.dialect.parseHandBlock(block, this.context);
      if (result.ok) {
        yield result.hand;
      } else {
        warnings.push({
          source: this.context.source,
          blockIndex: block.index,
          handId: result.handId ?? null,
          reason: result.reason,
        });
      }
    }
  }

  toArray(): Hand[] {
    return [...this];
  }
}

export function parseHands(
  text: string,
  dialect: Dialect,
  context: Partial<ParseContext> = {},
): HandStream {
  return new HandStream(text, dialect, {
    source: context.source ?? '<memory>',
    fileIndex: context.fileIndex ?? 0,
    timeZone: context.timeZone ?? DEFAULT_TIME_ZONE,
  });
}
