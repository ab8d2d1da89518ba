import fs from 'fs/promises';
import path from 'path';
import pLimit from 'p-limit';
import type { Dialect } from '../engine/dialects';
import { DIALECTS, detectDialect } from '../engine/dialects';
import { DEFAULT_READ_CONCURRENCY } from '../engine/constants';

export interface HandHistoryFile {
  path: string;
  fileName: string;
  fileIndex: number;
  dialect: Dialect;
  text: string;
}

export interface FileFailure {
  fileName: string;
  fileIndex: number;
  error: Error;
}

export interface ReadResult {
  files: HandHistoryFile[];
  failures: FileFailure[];
}

/** Every `.txt` file in the directory, sorted by name. */
export async function listHandHistoryFiles(dir: string): Promise<string[]> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  return entries
    .filter(e => e.isFile() && e.name.toLowerCase().endsWith('.txt'))
    .map(e => e.name)
    .sort();
}

/**
 * Detect each file's dialect and read it. Files with an unknown naming
 * convention become failures instead of aborting the batch. Reads run with
 * bounded concurrency; results keep the order of `fileNames`.
 */
export async function readHandHistoryFiles(
  dir: string,
  fileNames: string[],
  options: { concurrency?: number; dialects?: readonly Dialect[] } = {},
): Promise<ReadResult> {
  const limit = pLimit(options.concurrency ?? DEFAULT_READ_CONCURRENCY);
  const dialects = options.dialects ?? DIALECTS;

  const outcomes = await Promise.all(fileNames.map((fileName, fileIndex) => limit(async () => {
    try {
      const dialect = detectDialect(fileName, dialects);
      const filePath = path.join(dir, fileName);
      const text = await fs.readFile(filePath, 'utf-8');
      return { ok: true as const, file: { path: filePath, fileName, fileIndex, dialect, text } };
    } catch (error) {
      if (!(error instanceof Error)) throw error;
      return { ok: false as const, failure: { fileName, fileIndex, error } };
    }
  })));

  const result: ReadResult = { files: [], failures: [] };
  for (const outcome of outcomes) {
    if (outcome.ok) result.files.push(outcome.file);
    else result.failures.push(outcome.failure);
  }
  return result;
}
