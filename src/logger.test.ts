import { afterEach, describe, it, expect, vi } from 'vitest';
import { createLogger, getLogLevel, setLogLevel } from './logger';

describe('createLogger', () => {
  const initial = getLogLevel();

  afterEach(() => {
    setLogLevel(initial);
    vi.restoreAllMocks();
  });

  it('prefixes messages with the scope', () => {
    setLogLevel('info');
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    createLogger('Session').info('3 file(s) read');
    expect(log).toHaveBeenCalledTimes(1);
    expect(String(log.mock.calls[0][0])).toContain('[Session]');
    expect(String(log.mock.calls[0][0])).toContain('3 file(s) read');
  });

  it('drops messages below the level', () => {
    setLogLevel('warn');
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const logger = createLogger('Pots');
    logger.info('hidden');
    logger.warn('shown');
    expect(log).not.toHaveBeenCalled();
    expect(String(warn.mock.calls[0][0])).toContain('[Pots] shown');
  });

  it('warns once per key', () => {
    setLogLevel('warn');
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const logger = createLogger('Pots');
    logger.warnOnce('hand-1', 'first');
    logger.warnOnce('hand-1', 'second');
    expect(warn).toHaveBeenCalledTimes(1);
  });
});
