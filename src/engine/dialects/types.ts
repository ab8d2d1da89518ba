import type { DialectTag, Hand } from '../types';

export interface ParseContext {
  source: string;
  fileIndex: number;
  /** IANA zone for timestamps that carry no zone of their own */
  timeZone: string;
}

export interface HandBlock {
  index: number;
  lines: string[];
}

export type BlockParseResult =
  | { ok: true; hand: Hand }
  | { ok: false; reason: string; handId?: string };

/** One site's text format. Adding a site means adding one of these to the registry. */
export interface Dialect {
  tag: DialectTag;
  label: string;
  matchesFileName(baseName: string): boolean;
  /** Zero blocks for non-blank text means the file is not in this dialect. */
  splitIntoHandBlocks(text: string): HandBlock[];
  parseHandBlock(block: HandBlock, context: ParseContext): BlockParseResult;
}
