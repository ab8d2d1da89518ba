import type { HandBlock } from './types';

export function toLines(text: string): string[] {
  return text.replace(/^\uFEFF/, '').split(/\r?\n/).map(line => line.trimEnd());
}

/**
 * Cut the text into blocks, each starting at a header line and running to the
 * next header. Anything before the first header is dropped; trailing blank lines
 * are trimmed from every block.
 */
export function splitAtHeaders(text: string, isHeader: (line: string) => boolean): HandBlock[] {
  const blocks: HandBlock[] = [];
  let current: string[] | null = null;

  const flush = () => {
    if (!current) return;
    while (current.length > 0 && current[current.length - 1] === '') current.pop();
    blocks.push({ index: blocks.length, lines: current });
  };

  for (const line of toLines(text)) {
    if (isHeader(line)) {
      flush();
      current = [line];
    } else if (current) {
      current.push(line);
    }
  }
  flush();

  return blocks;
}

/**
 * Match a line to the seated player it starts with. The longest name wins so
 * that "Bob" does not shadow "Bob Smith". Returns the rest of the line after the
 * name and separator.
 */
export function matchActor(
  line: string,
  players: string[],
  separator: string,
): { player: string; rest: string } | null {
  let best: string | null = null;
  for (const player of players) {
    if (line.startsWith(player + separator) && (!best || player.length > best.length)) {
      best = player;
    }
  }
  if (best === null) return null;
  return { player: best, rest: line.slice(best.length + separator.length).trim() };
}
