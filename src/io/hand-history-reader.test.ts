import { describe, it, expect } from 'vitest';
import { listHandHistoryFiles, readHandHistoryFiles } from './hand-history-reader';
import { UnknownDialectError } from '../engine/errors';
import { FIXTURE_DIR } from '../../test/fixtures';

describe('listHandHistoryFiles', () => {
  it('lists .txt files sorted by name', async () => {
    expect(await listHandHistoryFiles(FIXTURE_DIR)).toEqual([
      '888_misnamed_pokerstars.txt',
      '888_poker_hand_history_1.txt',
      '888_poker_hand_history_2.txt',
      'pokerstars_hand_history_1.txt',
      'unknown_site_export.txt',
    ]);
  });
});

describe('readHandHistoryFiles', () => {
  it('reads known files and reports the rest in order', async () => {
    const { files, failures } = await readHandHistoryFiles(
      FIXTURE_DIR,
      ['pokerstars_hand_history_1.txt', 'unknown_site_export.txt', '888_poker_hand_history_1.txt', '888_missing.txt'],
      { concurrency: 2 },
    );

    expect(files.map(f => [f.fileName, f.fileIndex, f.dialect.tag])).toEqual([
      ['pokerstars_hand_history_1.txt', 0, 'pokerstars'],
      ['888_poker_hand_history_1.txt', 2, '888poker'],
    ]);
    expect(files[1].text.startsWith('#Game No : 1361371073')).toBe(true);

    expect(failures.map(f => [f.fileName, f.fileIndex])).toEqual([
      ['unknown_site_export.txt', 1],
      ['888_missing.txt', 3],
    ]);
    expect(failures[0].error).toBeInstanceOf(UnknownDialectError);
    expect(failures[1].error).not.toBeInstanceOf(UnknownDialectError);
  });
});
