import { afterEach, describe, expect, it, vi } from 'vitest';
import { createLogger, getLogLevel, setLogLevel } from './logger';

describe('createLogger', () => {
  const initial = getLogLevel();

  afterEach(() => {
    setLogLevel(initial);
    vi.restoreAllMocks();
  });

  it('prefixes lines with the scope', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    createLogger('weather').child('tools').info('ready', 3);

    expect(log).toHaveBeenCalledWith('[weather:tools]', 'ready', 3);
  });

  it('drops lines under the threshold', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    setLogLevel('warn');

    const logger = createLogger('t');
    logger.debug('hidden');
    logger.warn('shown');

    expect(debug).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith('[t]', 'shown');
  });
});
