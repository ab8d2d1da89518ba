import { parseArgs } from 'util';
import { ConfigError } from './engine/errors';
import {
  DEFAULT_INPUT_DIR,
  DEFAULT_OUTPUT_DIR,
  DEFAULT_READ_CONCURRENCY,
  DEFAULT_TIME_ZONE,
} from './engine/constants';
import { isValidTimeZone } from './engine/timestamp';
import type { LogLevel } from './logger';
import { isLogLevel } from './logger';

export interface SessionConfig {
  hero: string;
  /** Ordered; empty means every .txt file in `inputDir` */
  fileNames: string[];
  inputDir: string;
  outputDir: string;
  timeZone: string;
  concurrency: number;
  writeCsv: boolean;
  logLevel: LogLevel;
}

type Env = Record<string, string | undefined>;

function parseList(value: string | undefined): string[] {
  if (!value) return [];
  return value.split(',').map(v => v.trim()).filter(v => v.length > 0);
}

function parseBoolean(name: string, value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value === '') return fallback;
  if (/^(1|true|yes|on)$/i.test(value)) return true;
  if (/^(0|false|no|off)$/i.test(value)) return false;
  throw new ConfigError(`${name} must be true or false, got "${value}"`);
}

function parseFlags(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      options: {
        hero: { type: 'string' },
        input: { type: 'string' },
        output: { type: 'string' },
        timezone: { type: 'string' },
        concurrency: { type: 'string' },
        csv: { type: 'boolean' },
        'no-csv': { type: 'boolean' },
        'log-level': { type: 'string' },
      },
    });
  } catch (error) {
    throw new ConfigError(error instanceof Error ? error.message : String(error));
  }
}

/**
 * Flags win over environment variables, which win over defaults.
 * Positional arguments are the hand-history file names, in order.
 */
export function resolveConfig(argv: string[] = process.argv.slice(2), env: Env = process.env): SessionConfig {
  const { values, positionals } = parseFlags(argv);

  const hero = (values.hero ?? env.HERO ?? '').trim();
  if (!hero) throw new ConfigError('hero is required (--hero or HERO)');

  const timeZone = values.timezone ?? env.HAND_HISTORY_TIMEZONE ?? DEFAULT_TIME_ZONE;
  if (!isValidTimeZone(timeZone)) throw new ConfigError(`unknown time zone "${timeZone}"`);

  const rawConcurrency = values.concurrency ?? env.READ_CONCURRENCY;
  const concurrency = rawConcurrency === undefined ? DEFAULT_READ_CONCURRENCY : Number(rawConcurrency);
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new ConfigError(`concurrency must be a positive integer, got "${rawConcurrency}"`);
  }

  let writeCsv = parseBoolean('WRITE_CSV', env.WRITE_CSV, true);
  if (values.csv) writeCsv = true;
  if (values['no-csv']) writeCsv = false;

  const logLevel = (values['log-level'] ?? env.LOG_LEVEL ?? 'info').toLowerCase();
  if (!isLogLevel(logLevel)) throw new ConfigError(`unknown log level "${logLevel}"`);

  return {
    hero,
    fileNames: positionals.length > 0 ? positionals : parseList(env.HAND_HISTORY_FILES),
    inputDir: values.input ?? env.HAND_HISTORY_DIR ?? DEFAULT_INPUT_DIR,
    outputDir: values.output ?? env.PLOT_DIR ?? DEFAULT_OUTPUT_DIR,
    timeZone,
    concurrency,
    writeCsv,
    logLevel,
  };
}
