import fs from 'fs/promises';
import path from 'path';
import type { SessionConfig } from './config';
import type { Hand, SessionSeries } from './engine/types';
import type { ParseWarning } from './engine/hand-parser';
import { parseHands } from './engine/hand-parser';
import { aggregate } from './engine/session-aggregator';
import { formatAmount } from './engine/money';
import { listHandHistoryFiles, readHandHistoryFiles } from './io/hand-history-reader';
import type { FileFailure } from './io/hand-history-reader';
import { sessionRows, toCSV } from './io/csv';
import { renderSessionChart } from './chart/render-chart';
import { chartFileName, outputBaseName } from './chart/chart-data';
import { DialectMismatchError } from './engine/errors';
import { createLogger } from './logger';

const log = createLogger('Session');

export interface LoadedHands {
  hands: Hand[];
  warnings: ParseWarning[];
  failures: FileFailure[];
  filesRead: number;
}

export interface SessionReport extends LoadedHands {
  series: SessionSeries;
  chartPath: string;
  csvPath: string | null;
}

/**
 * Read, detect and parse every configured file. Per-file errors are logged and
 * the file is skipped; if no file could be used the first error propagates.
 */
export async function loadHands(config: SessionConfig): Promise<LoadedHands> {
  let fileNames = config.fileNames;
  if (fileNames.length === 0) {
    fileNames = await listHandHistoryFiles(config.inputDir);
    log.info(`No file names configured; using ${fileNames.length} file(s) from ${config.inputDir}: ${fileNames.join(', ')}`);
  }

  const { files, failures } = await readHandHistoryFiles(config.inputDir, fileNames, {
    concurrency: config.concurrency,
  });

  const hands: Hand[] = [];
  const warnings: ParseWarning[] = [];
  let filesRead = 0;

  for (const file of files) {
    const stream = parseHands(file.text, file.dialect, {
      source: file.fileName,
      fileIndex: file.fileIndex,
      timeZone: config.timeZone,
    });

    try {
      const parsed = stream.toArray();
      hands.push(...parsed);
      warnings.push(...stream.warnings);
      filesRead++;
      log.info(`${file.fileName}: ${parsed.length} hand(s) as ${file.dialect.label}`);
    } catch (error) {
      if (!(error instanceof DialectMismatchError)) throw error;
      failures.push({ fileName: file.fileName, fileIndex: file.fileIndex, error });
    }
  }

  failures.sort((a, b) => a.fileIndex - b.fileIndex);
  for (const failure of failures) {
    log.error(`Skipping ${failure.fileName}: ${failure.error.message}`);
  }
  for (const warning of warnings) {
    log.warn(
      `${warning.source}: skipped block ${warning.blockIndex}${warning.handId ? ` (hand ${warning.handId})` : ''}: ${warning.reason}`,
    );
  }

  if (filesRead === 0 && failures.length > 0) {
    throw failures[0].error;
  }

  return { hands, warnings, failures, filesRead };
}

export async function runSession(config: SessionConfig): Promise<SessionReport> {
  const loaded = await loadHands(config);
  const series = aggregate(loaded.hands, config.hero);
  const currency = loaded.hands.find(h => h.stakes.currency)?.stakes.currency ?? '$';

  await fs.mkdir(config.outputDir, { recursive: true });

  const chartPath = path.join(config.outputDir, chartFileName(series));
  await fs.writeFile(chartPath, renderSessionChart(series, { currency }), 'utf-8');

  let csvPath: string | null = null;
  if (config.writeCsv) {
    csvPath = path.join(config.outputDir, `${outputBaseName(series)}.csv`);
    await fs.writeFile(csvPath, toCSV(sessionRows(series)), 'utf-8');
  }

  log.info(
    `${loaded.filesRead} file(s) read, ${loaded.failures.length} skipped, ${loaded.hands.length} hand(s) parsed, ${loaded.warnings.length} block(s) skipped`,
  );
  log.success(
    `${config.hero}: ${series.points.length} hand(s), result ${formatAmount(series.total, currency)} → ${chartPath}`,
  );

  return { ...loaded, series, chartPath, csvPath };
}
