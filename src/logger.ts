import colors from 'colors/safe';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

// the CLI re-applies the level once .env is loaded
const envLevel = process.env.LOG_LEVEL ?? '';
let currentLevel: LogLevel = isLogLevel(envLevel) ? envLevel : 'info';

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  warnOnce(key: string, message: string): void;
  error(message: string, cause?: unknown): void;
}

const warnOnceKeys = new Set<string>();

export function createLogger(scope: string): Logger {
  const tag = `[${scope}]`;

  const warn = (message: string) => {
    if (enabled('warn')) console.warn(colors.yellow(`${tag} ${message}`));
  };

  return {
    debug(message) {
      if (enabled('debug')) console.debug(colors.gray(`${tag} ${message}`));
    },
    info(message) {
      if (enabled('info')) console.log(`${colors.cyan(tag)} ${message}`);
    },
    success(message) {
      if (enabled('info')) console.log(`${colors.cyan(tag)} ${colors.green(message)}`);
    },
    warn,
    warnOnce(key, message) {
      if (warnOnceKeys.has(key)) return;
      warnOnceKeys.add(key);
      warn(message);
    },
    error(message, cause) {
      if (!enabled('error')) return;
      console.error(colors.red(`${tag} ${message}`));
      if (cause instanceof Error && cause.stack && enabled('debug')) {
        console.error(colors.gray(cause.stack));
      }
    },
  };
}
